/**
 * Scan summary: counts, success rate and days-to-reduction stats
 * over a set of reduction records.
 */

import type { RiskLevel, Severity } from '../drawdown-engine/drawdown.contract.js';
import type { ReductionRecord, ScanSummary } from './scan.contract.js';

export function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : round4(value);
}

function avg(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

export function summarizeRecords(records: readonly ReductionRecord[]): ScanSummary {
  const bySeverity: Record<Severity, number> = {
    MINIMAL: 0, LOW: 0, MODERATE: 0, HIGH: 0, SEVERE: 0, EXTREME: 0, NO_DATA: 0,
  };
  const byRisk: Record<RiskLevel, number> = {
    MINIMAL: 0, LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0, UNKNOWN: 0,
  };

  const crossingReductions: number[] = [];
  const days: number[] = [];
  let insufficientCount = 0;
  let minDays: number | null = null;
  let maxDays: number | null = null;

  for (const record of records) {
    const { drawdown, baseReduction } = record;
    bySeverity[drawdown.severity]++;
    byRisk[drawdown.riskLevel]++;

    if (drawdown.status === 'INSUFFICIENT_DATA') insufficientCount++;
    if (drawdown.crossesThreshold && drawdown.totalReductionPct !== null) {
      crossingReductions.push(drawdown.totalReductionPct);
    }
    if (baseReduction?.reductionFound && baseReduction.daysToReduction !== null) {
      const d = baseReduction.daysToReduction;
      days.push(d);
      if (minDays === null || d < minDays) minDays = d;
      if (maxDays === null || d > maxDays) maxDays = d;
    }
  }

  const total = records.length;
  const crossingCount = crossingReductions.length;

  return {
    totalRecords: total,
    crossingCount,
    nonCrossingCount: total - crossingCount,
    insufficientCount,
    successRatePct: total > 0 ? round4((crossingCount / total) * 100) : null,
    avgReductionPct: roundOrNull(avg(crossingReductions)),
    baseReductionCount: days.length,
    daysToReduction: {
      avg: roundOrNull(avg(days)),
      min: minDays,
      max: maxDays,
    },
    bySeverity,
    byRisk,
  };
}
