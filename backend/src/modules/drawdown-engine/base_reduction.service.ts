/**
 * Base-price reduction
 *
 * Measures how far later closes fall below a fixed base close
 * (the contract's close on the selection date), and how many calendar
 * days it took to first lose thresholdPct of it.
 */

import { InvalidReferenceError } from '../../common/errors.js';
import type { PriceSeries } from '../catalog/catalog.contract.js';
import { daysBetween, isIsoDate } from '../catalog/catalog.dates.js';
import {
  BaseReductionResult,
  DEFAULT_DRAWDOWN_OPTIONS,
  DrawdownOptions,
} from './drawdown.contract.js';
import { assertSeries, assertThreshold } from './drawdown.service.js';

export function analyzeBaseReduction(
  basePrice: number,
  baseDate: string,
  series: PriceSeries,
  options: Partial<DrawdownOptions> = {}
): BaseReductionResult {
  if (typeof basePrice !== 'number' || !Number.isFinite(basePrice) || basePrice <= 0) {
    throw new InvalidReferenceError(basePrice, 'base price');
  }
  if (!isIsoDate(baseDate)) {
    throw new InvalidReferenceError(baseDate, 'base date');
  }
  const thresholdPct = options.thresholdPct ?? DEFAULT_DRAWDOWN_OPTIONS.thresholdPct;
  assertThreshold(thresholdPct);
  assertSeries(series);

  const subsequent = series.filter(p => p.date > baseDate);
  const reductionLevel = basePrice * (1 - thresholdPct / 100);

  const result: BaseReductionResult = {
    basePrice,
    baseDate,
    thresholdPct,
    tradingDaysAnalyzed: subsequent.length,
    reductionFound: false,
    reductionDate: null,
    reducedPrice: null,
    reductionPct: null,
    daysToReduction: null,
    maxReductionPct: null,
    maxReductionDate: null,
    maxReductionPrice: null,
  };

  for (const point of subsequent) {
    const reductionPct = ((basePrice - point.close) / basePrice) * 100;

    if (result.maxReductionPct === null || reductionPct > result.maxReductionPct) {
      result.maxReductionPct = reductionPct;
      result.maxReductionDate = point.date;
      result.maxReductionPrice = point.close;
    }

    if (!result.reductionFound && point.close <= reductionLevel) {
      result.reductionFound = true;
      result.reductionDate = point.date;
      result.reducedPrice = point.close;
      result.reductionPct = reductionPct;
      result.daysToReduction = daysBetween(baseDate, point.date);
    }
  }

  return result;
}
