/**
 * Drawdown analyzer tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidOptionsError, InvalidSeriesError } from '../../../common/errors.js';
import type { PricePoint } from '../../catalog/catalog.contract.js';
import { analyzeDrawdown, longestDeclineRun, populationStd } from '../drawdown.service.js';

function series(closes: number[], volumes?: number[]): PricePoint[] {
  return closes.map((close, i) => ({
    date: `2024-01-${String(i + 1).padStart(2, '0')}`,
    close,
    ...(volumes ? { volume: volumes[i] } : {}),
  }));
}

describe('analyzeDrawdown', () => {
  it('measures a steady decline through the threshold', () => {
    const result = analyzeDrawdown(series([100, 80, 60, 45]), { thresholdPct: 50 });

    expect(result.status).toBe('OK');
    expect(result.maxPrice).toBe(100);
    expect(result.maxDate).toBe('2024-01-01');
    expect(result.minPrice).toBe(45);
    expect(result.minDate).toBe('2024-01-04');
    expect(result.totalReductionPct).toBeCloseTo(55, 10);
    expect(result.priceRangeRatio).toBeCloseTo(0.55, 10);
    expect(result.maxSingleStepDropPct).toBe(25);
    expect(result.maxSingleStepDate).toBe('2024-01-03');
    expect(result.maxConsecutiveDeclineLen).toBe(3);
    expect(result.maxConsecutiveDeclinePct).toBe(70);
    expect(result.crossesThreshold).toBe(true);
    expect(result.firstCrossingDate).toBe('2024-01-04');
    expect(result.severity).toBe('HIGH');
    expect(result.riskLevel).toBe('HIGH');
    expect(result.expiryImpact).toBe('MODERATE_TIME_DECAY');
    expect(result.priceVolatility).toBeCloseTo(Math.sqrt(429.6875), 10);
  });

  it('uses global extremes rather than first versus last', () => {
    const result = analyzeDrawdown(series([50, 55]));

    expect(result.maxPrice).toBe(55);
    expect(result.maxDate).toBe('2024-01-02');
    expect(result.minPrice).toBe(50);
    expect(result.minDate).toBe('2024-01-01');
    expect(result.totalReductionPct).toBeCloseTo(9.0909, 4);
    expect(result.crossesThreshold).toBe(false);
    expect(result.firstCrossingDate).toBeNull();
    expect(result.maxSingleStepDropPct).toBe(0);
    expect(result.maxSingleStepDate).toBeNull();
    expect(result.maxConsecutiveDeclineLen).toBe(0);
    expect(result.severity).toBe('MINIMAL');
    expect(result.riskLevel).toBe('MINIMAL');
    expect(result.expiryImpact).toBe('MINIMAL_TIME_IMPACT');
  });

  it('reports no reduction for a constant series', () => {
    const result = analyzeDrawdown(series([10, 10, 10]));

    expect(result.totalReductionPct).toBe(0);
    expect(result.maxConsecutiveDeclineLen).toBe(0);
    expect(result.priceVolatility).toBe(0);
  });

  it('only looks for the crossing after the peak', () => {
    const result = analyzeDrawdown(series([40, 100, 70]), { thresholdPct: 50 });

    expect(result.totalReductionPct).toBe(60);
    expect(result.crossesThreshold).toBe(true);
    expect(result.firstCrossingDate).toBeNull();
    expect(result.maxSingleStepDropPct).toBe(30);
    expect(result.maxSingleStepDate).toBe('2024-01-03');
  });

  it('treats a drop of exactly the threshold as crossing', () => {
    const result = analyzeDrawdown(series([1.4, 0.35]), { thresholdPct: 75 });

    expect(result.totalReductionPct).toBeCloseTo(75, 10);
    expect(result.crossesThreshold).toBe(true);
    expect(result.firstCrossingDate).toBe('2024-01-02');
    expect(result.severity).toBe('SEVERE');
    expect(result.riskLevel).toBe('CRITICAL');
  });

  it('keeps band lower bounds inclusive for tick-sized prices', () => {
    const result = analyzeDrawdown(series([0.36, 0.27]), { thresholdPct: 25 });

    expect(result.crossesThreshold).toBe(true);
    expect(result.firstCrossingDate).toBe('2024-01-02');
    expect(result.severity).toBe('MODERATE');
    expect(result.riskLevel).toBe('LOW');
  });

  it('returns the insufficient-data sentinel for an empty series', () => {
    const result = analyzeDrawdown([]);

    expect(result.status).toBe('INSUFFICIENT_DATA');
    expect(result.pointCount).toBe(0);
    expect(result.shortfall).toBe(2);
    expect(result.maxPrice).toBeNull();
    expect(result.totalReductionPct).toBeNull();
    expect(result.crossesThreshold).toBe(false);
    expect(result.severity).toBe('NO_DATA');
    expect(result.riskLevel).toBe('UNKNOWN');
  });

  it('keeps the single point of a one-point series', () => {
    const result = analyzeDrawdown(series([12]));

    expect(result.status).toBe('INSUFFICIENT_DATA');
    expect(result.shortfall).toBe(1);
    expect(result.maxPrice).toBe(12);
    expect(result.minDate).toBe('2024-01-01');
    expect(result.priceVolatility).toBe(0);
  });

  it('classifies traded volume stability', () => {
    expect(analyzeDrawdown(series([10, 9, 8, 7], [100, 100, 100, 100])).volumeStability).toBe('STABLE');
    expect(analyzeDrawdown(series([10, 9], [10, 30])).volumeStability).toBe('MODERATE');
    expect(analyzeDrawdown(series([10, 9], [0, 100])).volumeStability).toBe('VOLATILE');
    expect(analyzeDrawdown(series([10, 9], [10, 30])).avgDailyVolume).toBe(20);
    expect(analyzeDrawdown(series([10, 9])).volumeStability).toBeNull();
  });

  it('rejects malformed series', () => {
    expect(() => analyzeDrawdown(series([10, 0, 5]))).toThrow(InvalidSeriesError);
    expect(() => analyzeDrawdown([
      { date: '2024-01-02', close: 10 },
      { date: '2024-01-01', close: 9 },
    ])).toThrow(InvalidSeriesError);
    expect(() => analyzeDrawdown([
      { date: '2024-01-01', close: 10 },
      { date: '2024-01-01', close: 9 },
    ])).toThrow(InvalidSeriesError);
    expect(() => analyzeDrawdown([{ date: '2024-13-01', close: 10 }])).toThrow(InvalidSeriesError);
  });

  it('points at the offending index', () => {
    try {
      analyzeDrawdown(series([10, -1]));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSeriesError);
      if (error instanceof InvalidSeriesError) expect(error.index).toBe(1);
    }
  });

  it('rejects thresholds outside (0, 100]', () => {
    expect(() => analyzeDrawdown(series([10, 9]), { thresholdPct: 0 })).toThrow(InvalidOptionsError);
    expect(() => analyzeDrawdown(series([10, 9]), { thresholdPct: 150 })).toThrow(InvalidOptionsError);
  });
});

describe('longestDeclineRun', () => {
  it('prefers the longest run', () => {
    expect(longestDeclineRun([-1, -2, 5, -10, -10, 5, -3, -3, -3])).toEqual({ length: 3, pct: 9 });
  });

  it('breaks equal lengths by the larger decline', () => {
    expect(longestDeclineRun([-1, -2, 5, -10, -10])).toEqual({ length: 2, pct: 20 });
  });

  it('is empty without declines', () => {
    expect(longestDeclineRun([1, 0, 2])).toEqual({ length: 0, pct: 0 });
  });
});

describe('populationStd', () => {
  it('divides by the number of values', () => {
    expect(populationStd([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    expect(populationStd([])).toBeNull();
  });
});
