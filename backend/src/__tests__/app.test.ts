/**
 * HTTP tests for the strike-scan routes (in-memory catalog and sink)
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { MemoryCatalogAccessor } from '../modules/catalog/catalog.memory.js';
import { MemoryReportingSink } from '../modules/reduction-scan/scan.sink.js';
import { SCAN_ROWS } from '../modules/reduction-scan/__tests__/scan.fixture.js';

describe('strike-scan routes', () => {
  let app: FastifyInstance;
  const sink = new MemoryReportingSink();

  beforeAll(async () => {
    app = buildApp({
      catalog: new MemoryCatalogAccessor(SCAN_ROWS),
      sink,
      logLevel: 'silent',
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /api/strike-scan/health reports the active setup', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/strike-scan/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      module: 'reduction-scan',
      catalog: 'memory',
      options: { kAbove: 3, kBelow: 3, thresholdPct: 50 },
    });
  });

  it('POST /api/strike-scan/strikes/select returns the neighborhood', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/strikes/select',
      payload: { strikes: [90, 95, 100, 105, 110, 115, 120, 125], referencePrice: 107 },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.count).toBe(7);
    expect(body.strikes.map((s: { strikePrice: number }) => s.strikePrice)).toEqual([90, 95, 100, 105, 110, 115, 120]);
  });

  it('rejects a non-positive reference price with 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/strikes/select',
      payload: { strikes: [100], referencePrice: 0 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      ok: false,
      error: 'INVALID_REFERENCE',
      message: 'Invalid reference price: 0 (must be a positive number)',
    });
  });

  it('POST /api/strike-scan/drawdown/analyze analyses a posted series', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/drawdown/analyze',
      payload: {
        series: [
          { date: '2024-01-01', close: 100 },
          { date: '2024-01-02', close: 80 },
          { date: '2024-01-03', close: 60 },
          { date: '2024-01-04', close: 45 },
        ],
      },
    });

    expect(res.statusCode).toBe(200);
    const { result } = res.json();
    expect(result.firstCrossingDate).toBe('2024-01-04');
    expect(result.maxConsecutiveDeclineLen).toBe(3);
    expect(result.severity).toBe('HIGH');
  });

  it('returns INVALID_SERIES for out-of-order dates', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/drawdown/analyze',
      payload: {
        series: [
          { date: '2024-01-02', close: 100 },
          { date: '2024-01-01', close: 80 },
        ],
      },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('INVALID_SERIES');
  });

  it('POST /api/strike-scan/drawdown/classify labels given metrics', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/drawdown/classify',
      payload: { totalReductionPct: 80, maxSingleStepDropPct: 25 },
    });

    expect(res.json()).toEqual({ ok: true, severity: 'SEVERE', riskLevel: 'CRITICAL' });
  });

  it('GET /api/strike-scan/neighborhood attaches catalog contracts', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/strike-scan/neighborhood?symbol=nifty&asOfDate=2024-01-02&referencePrice=102&kAbove=1&kBelow=1',
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.reference).toEqual({ symbol: 'NIFTY', asOfDate: '2024-01-02', referencePrice: 102 });
    expect(body.rows).toHaveLength(3);
    expect(body.strikeShortfall).toBe(1);
  });

  it('POST /api/strike-scan/run scans and emits to the sink', async () => {
    sink.clear();
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/run',
      payload: { symbol: 'NIFTY', asOfDate: '2024-01-02', referencePrice: 102, kAbove: 1, kBelow: 1 },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.ok).toBe(true);
    expect(body.records).toHaveLength(3);
    expect(body.summary.crossingCount).toBe(1);
    expect(sink.records).toHaveLength(3);
  });

  it('POST /api/strike-scan/run requires a symbol', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/run',
      payload: { asOfDate: '2024-01-02', referencePrice: 102 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ ok: false, error: 'INVALID_OPTIONS', message: 'symbol is required' });
  });

  it('POST /api/strike-scan/run-batch reports per-reference outcomes', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/run-batch',
      payload: {
        kAbove: 1,
        kBelow: 1,
        references: [
          { symbol: 'NIFTY', asOfDate: '2024-01-02', referencePrice: 102 },
          { symbol: 'NIFTY', asOfDate: '2024-01-02', referencePrice: -1 },
        ],
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.successCount).toBe(1);
    expect(body.failCount).toBe(1);
    expect(body.outcomes[1].ok).toBe(false);
  });

  it('rejects an empty batch', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/strike-scan/run-batch',
      payload: { references: [] },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('INVALID_OPTIONS');
  });

  it('returns 404 for unknown routes', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/strike-scan/unknown' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
