/**
 * DRAWDOWN ANALYZER
 *
 * Scans an ascending close-price series for a large contraction.
 *
 * Extremes are GLOBAL: max and min over the whole series regardless of
 * which comes first. The threshold crossing is searched forward from the
 * peak date only.
 */

import { InvalidOptionsError, InvalidSeriesError } from '../../common/errors.js';
import type { PriceSeries } from '../catalog/catalog.contract.js';
import { isIsoDate } from '../catalog/catalog.dates.js';
import {
  classifyDrawdown,
  classifyExpiryImpact,
  classifyVolumeStability,
} from './drawdown.classifier.js';
import {
  DEFAULT_DRAWDOWN_OPTIONS,
  DrawdownOptions,
  DrawdownResult,
  MIN_SERIES_POINTS,
} from './drawdown.contract.js';

// ═══════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════

export function assertThreshold(thresholdPct: number): void {
  if (!Number.isFinite(thresholdPct) || thresholdPct <= 0 || thresholdPct > 100) {
    throw new InvalidOptionsError(`thresholdPct must be in (0, 100], got ${thresholdPct}`);
  }
}

export function assertSeries(series: PriceSeries): void {
  series.forEach((point, i) => {
    if (!isIsoDate(point.date)) {
      throw new InvalidSeriesError(`Invalid date "${point.date}"`, i);
    }
    if (typeof point.close !== 'number' || !Number.isFinite(point.close) || point.close <= 0) {
      throw new InvalidSeriesError(`Close price must be positive, got ${point.close}`, i);
    }
    if (i > 0 && point.date <= series[i - 1].date) {
      throw new InvalidSeriesError(`Dates must be strictly increasing (${series[i - 1].date} → ${point.date})`, i);
    }
  });
}

// ═══════════════════════════════════════════════════════════════
// STATS HELPERS
// ═══════════════════════════════════════════════════════════════

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

export function populationStd(values: readonly number[]): number | null {
  const m = mean(values);
  if (m === null) return null;
  const variance = values.reduce((s, v) => s + (v - m) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function stepChanges(closes: readonly number[]): number[] {
  const steps: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    steps.push(((closes[i] - closes[i - 1]) / closes[i - 1]) * 100);
  }
  return steps;
}

interface DeclineRun {
  length: number;
  pct: number;
}

/**
 * Longest run of negative steps. Ties on length go to the greater
 * summed |step|; further ties keep the earliest run.
 */
export function longestDeclineRun(steps: readonly number[]): DeclineRun {
  let best: DeclineRun = { length: 0, pct: 0 };
  let current: DeclineRun = { length: 0, pct: 0 };

  const settle = () => {
    if (
      current.length > best.length ||
      (current.length === best.length && current.length > 0 && current.pct > best.pct)
    ) {
      best = { ...current };
    }
  };

  for (const step of steps) {
    if (step < 0) {
      current = { length: current.length + 1, pct: current.pct + Math.abs(step) };
    } else {
      settle();
      current = { length: 0, pct: 0 };
    }
  }
  settle();

  return best;
}

// ═══════════════════════════════════════════════════════════════
// ANALYZE
// ═══════════════════════════════════════════════════════════════

function insufficientResult(series: PriceSeries, thresholdPct: number): DrawdownResult {
  const volumes = collectVolumes(series);
  const avgDailyVolume = mean(volumes);
  const single = series.length === 1 ? series[0] : null;

  return {
    status: 'INSUFFICIENT_DATA',
    pointCount: series.length,
    shortfall: MIN_SERIES_POINTS - series.length,
    thresholdPct,
    maxPrice: single ? single.close : null,
    maxDate: single ? single.date : null,
    minPrice: single ? single.close : null,
    minDate: single ? single.date : null,
    totalReductionPct: null,
    priceRangeRatio: null,
    maxSingleStepDropPct: 0,
    maxSingleStepDate: null,
    maxConsecutiveDeclineLen: 0,
    maxConsecutiveDeclinePct: 0,
    crossesThreshold: false,
    firstCrossingDate: null,
    priceVolatility: single ? 0 : null,
    avgDailyVolume,
    volumeStability: null,
    expiryImpact: null,
    ...classifyDrawdown({ totalReductionPct: null, maxSingleStepDropPct: 0, maxConsecutiveDeclineLen: 0 }),
  };
}

function collectVolumes(series: PriceSeries): number[] {
  const volumes: number[] = [];
  for (const point of series) {
    if (typeof point.volume === 'number' && Number.isFinite(point.volume)) volumes.push(point.volume);
  }
  return volumes;
}

export function analyzeDrawdown(
  series: PriceSeries,
  options: Partial<DrawdownOptions> = {}
): DrawdownResult {
  const thresholdPct = options.thresholdPct ?? DEFAULT_DRAWDOWN_OPTIONS.thresholdPct;
  assertThreshold(thresholdPct);
  assertSeries(series);

  if (series.length < MIN_SERIES_POINTS) {
    return insufficientResult(series, thresholdPct);
  }

  const closes = series.map(p => p.close);

  // Global extremes, first occurrence on ties
  let maxIdx = 0;
  let minIdx = 0;
  for (let i = 1; i < closes.length; i++) {
    if (closes[i] > closes[maxIdx]) maxIdx = i;
    if (closes[i] < closes[minIdx]) minIdx = i;
  }
  const maxPrice = closes[maxIdx];
  const minPrice = closes[minIdx];

  const totalReductionPct = maxPrice > 0 ? ((maxPrice - minPrice) / maxPrice) * 100 : 0;

  // Worst single step (steps[i] belongs to series[i + 1])
  const steps = stepChanges(closes);
  let worstStep = 0;
  let worstStepIdx = -1;
  steps.forEach((step, i) => {
    if (step < worstStep) {
      worstStep = step;
      worstStepIdx = i;
    }
  });

  const run = longestDeclineRun(steps);

  // Crossing compares prices, not the derived percentage.
  // The first crossing date is searched strictly after the peak.
  const crossingLevel = maxPrice * (1 - thresholdPct / 100);
  let firstCrossingDate: string | null = null;
  for (let i = maxIdx + 1; i < series.length; i++) {
    if (closes[i] <= crossingLevel) {
      firstCrossingDate = series[i].date;
      break;
    }
  }

  const volumes = collectVolumes(series);
  const avgDailyVolume = mean(volumes);
  const volumeStd = populationStd(volumes);

  const maxSingleStepDropPct = Math.abs(worstStep);
  const classification = classifyDrawdown({
    totalReductionPct,
    maxSingleStepDropPct,
    maxConsecutiveDeclineLen: run.length,
  });

  return {
    status: 'OK',
    pointCount: series.length,
    shortfall: 0,
    thresholdPct,
    maxPrice,
    maxDate: series[maxIdx].date,
    minPrice,
    minDate: series[minIdx].date,
    totalReductionPct,
    priceRangeRatio: totalReductionPct / 100,
    maxSingleStepDropPct,
    maxSingleStepDate: worstStepIdx >= 0 ? series[worstStepIdx + 1].date : null,
    maxConsecutiveDeclineLen: run.length,
    maxConsecutiveDeclinePct: run.pct,
    crossesThreshold: minPrice <= crossingLevel,
    firstCrossingDate,
    priceVolatility: populationStd(closes),
    avgDailyVolume,
    volumeStability: classifyVolumeStability(avgDailyVolume, volumeStd),
    expiryImpact: classifyExpiryImpact(totalReductionPct, series.length),
    ...classification,
  };
}
