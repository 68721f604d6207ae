/**
 * REDUCTION SCAN ROUTES
 *
 * ROUTES:
 * - GET  /api/strike-scan/health             - Module health + active options
 * - POST /api/strike-scan/strikes/select     - Pure strike neighborhood
 * - POST /api/strike-scan/drawdown/analyze   - Pure drawdown analysis of a series
 * - POST /api/strike-scan/drawdown/classify  - Severity / risk of given metrics
 * - GET  /api/strike-scan/neighborhood       - Catalog-backed neighborhood with contracts
 * - POST /api/strike-scan/run                - Full scan for one reference point
 * - POST /api/strike-scan/run-batch          - Sequential scan for many reference points
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { InvalidOptionsError } from '../../common/errors.js';
import type { CatalogAccessor, PricePoint } from '../catalog/catalog.contract.js';
import { analyzeDrawdown, classifyDrawdown } from '../drawdown-engine/index.js';
import {
  selectNeighborhood,
  selectStrikes,
  type ReferencePoint,
} from '../strike-selector/index.js';
import type { ScanOptions } from './scan.contract.js';
import type { ReductionScanService } from './scan.service.js';

export interface ReductionScanRouteDeps {
  catalog: CatalogAccessor;
  scanService: ReductionScanService;
}

// ═══════════════════════════════════════════════════════════════
// BODY PARSING
// ═══════════════════════════════════════════════════════════════

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(body: Json, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidOptionsError(`${key} must be a number`);
  }
  return parsed;
}

function requireString(body: Json, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidOptionsError(`${key} is required`);
  }
  return value.trim();
}

/**
 * referencePrice is passed through as given (NaN when not numeric);
 * the selector rejects anything that is not a positive number.
 */
function parseReference(body: Json): ReferencePoint {
  const raw = body.referencePrice;
  return {
    symbol: requireString(body, 'symbol').toUpperCase(),
    asOfDate: requireString(body, 'asOfDate'),
    referencePrice: typeof raw === 'number' ? raw : Number(raw),
  };
}

function parseOverrides(body: Json): Partial<ScanOptions> {
  const overrides: Partial<ScanOptions> = {};
  const kAbove = optionalNumber(body, 'kAbove');
  const kBelow = optionalNumber(body, 'kBelow');
  const thresholdPct = optionalNumber(body, 'thresholdPct');
  if (kAbove !== undefined) overrides.kAbove = kAbove;
  if (kBelow !== undefined) overrides.kBelow = kBelow;
  if (thresholdPct !== undefined) overrides.thresholdPct = thresholdPct;
  return overrides;
}

function parseSeries(value: unknown): PricePoint[] {
  if (!Array.isArray(value)) {
    throw new InvalidOptionsError('series must be an array of { date, close, volume? }');
  }
  return value.map((item: unknown, i) => {
    if (!isObject(item) || typeof item.date !== 'string' || typeof item.close !== 'number') {
      throw new InvalidOptionsError(`series[${i}] must be { date: string, close: number }`);
    }
    const point: PricePoint = { date: item.date, close: item.close };
    if (typeof item.volume === 'number') point.volume = item.volume;
    return point;
  });
}

function parseStrikes(value: unknown): number[] {
  if (!Array.isArray(value) || value.some(v => typeof v !== 'number')) {
    throw new InvalidOptionsError('strikes must be an array of numbers');
  }
  return value.filter((v): v is number => typeof v === 'number');
}

function bodyOf(req: FastifyRequest): Json {
  return isObject(req.body) ? req.body : {};
}

// ═══════════════════════════════════════════════════════════════
// REGISTER ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerReductionScanRoutes(
  app: FastifyInstance,
  deps: ReductionScanRouteDeps
): Promise<void> {
  const { catalog, scanService } = deps;

  // ─────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────
  app.get('/api/strike-scan/health', async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ok: true,
      module: 'reduction-scan',
      catalog: catalog.name,
      options: scanService.getOptions(),
    });
  });

  // ─────────────────────────────────────────────────────────────
  // Pure selection
  // ─────────────────────────────────────────────────────────────
  app.post('/api/strike-scan/strikes/select', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = bodyOf(req);
    const defaults = scanService.getOptions();
    const overrides = parseOverrides(body);

    const strikes = selectStrikes(parseStrikes(body.strikes), Number(body.referencePrice), {
      kAbove: overrides.kAbove ?? defaults.kAbove,
      kBelow: overrides.kBelow ?? defaults.kBelow,
    });

    return reply.send({ ok: true, count: strikes.length, strikes });
  });

  // ─────────────────────────────────────────────────────────────
  // Pure drawdown analysis
  // ─────────────────────────────────────────────────────────────
  app.post('/api/strike-scan/drawdown/analyze', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = bodyOf(req);
    const thresholdPct = optionalNumber(body, 'thresholdPct') ?? scanService.getOptions().thresholdPct;
    const result = analyzeDrawdown(parseSeries(body.series), { thresholdPct });
    return reply.send({ ok: true, result });
  });

  app.post('/api/strike-scan/drawdown/classify', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = bodyOf(req);
    const classification = classifyDrawdown({
      totalReductionPct: optionalNumber(body, 'totalReductionPct') ?? null,
      maxSingleStepDropPct: optionalNumber(body, 'maxSingleStepDropPct') ?? 0,
      maxConsecutiveDeclineLen: optionalNumber(body, 'maxConsecutiveDeclineLen') ?? 0,
    });
    return reply.send({ ok: true, ...classification });
  });

  // ─────────────────────────────────────────────────────────────
  // Catalog-backed neighborhood
  // ─────────────────────────────────────────────────────────────
  app.get('/api/strike-scan/neighborhood', async (
    req: FastifyRequest<{ Querystring: Record<string, string | undefined> }>,
    reply: FastifyReply
  ) => {
    const query: Json = { ...req.query };
    const defaults = scanService.getOptions();
    const overrides = parseOverrides(query);

    const selection = await selectNeighborhood(catalog, parseReference(query), {
      kAbove: overrides.kAbove ?? defaults.kAbove,
      kBelow: overrides.kBelow ?? defaults.kBelow,
    });
    return reply.send({ ok: true, ...selection });
  });

  // ─────────────────────────────────────────────────────────────
  // Full scan
  // ─────────────────────────────────────────────────────────────
  app.post('/api/strike-scan/run', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = bodyOf(req);
    const report = await scanService.runScan(parseReference(body), parseOverrides(body));
    return reply.send(report);
  });

  app.post('/api/strike-scan/run-batch', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = bodyOf(req);
    const items = body.references;
    if (!Array.isArray(items) || items.length === 0) {
      throw new InvalidOptionsError('references must be a non-empty array');
    }

    const references = items.map((item: unknown, i) => {
      if (!isObject(item)) throw new InvalidOptionsError(`references[${i}] must be an object`);
      return parseReference(item);
    });

    const result = await scanService.runBatch(references, parseOverrides(body));
    return reply.send(result);
  });

  console.log('[Reduction Scan] Routes registered:');
  console.log('  GET  /api/strike-scan/health');
  console.log('  POST /api/strike-scan/strikes/select');
  console.log('  POST /api/strike-scan/drawdown/analyze');
  console.log('  POST /api/strike-scan/drawdown/classify');
  console.log('  GET  /api/strike-scan/neighborhood');
  console.log('  POST /api/strike-scan/run');
  console.log('  POST /api/strike-scan/run-batch');
}
