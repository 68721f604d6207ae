/**
 * Severity / risk classification of a drawdown.
 * Pure functions, fixed thresholds.
 */

import {
  DrawdownClassification,
  EXPIRY_IMPACT_THRESHOLDS,
  ExpiryImpact,
  RISK_THRESHOLDS,
  RiskLevel,
  SEVERITY_BANDS,
  Severity,
  VOLUME_CV_THRESHOLDS,
  VolumeStability,
} from './drawdown.contract.js';

/**
 * Percentages derived from prices carry float error (1.4 → 0.35 gives
 * 74.99999999999999). Snap to 1e-9 so band lower bounds stay inclusive.
 */
export function snapPct(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

export interface ClassifierInput {
  totalReductionPct: number | null;
  maxSingleStepDropPct: number;
  maxConsecutiveDeclineLen: number;
}

export function classifySeverity(totalReductionPct: number | null): Severity {
  if (totalReductionPct === null) return 'NO_DATA';
  const reduction = snapPct(totalReductionPct);
  for (const band of SEVERITY_BANDS) {
    if (reduction >= band.min) return band.severity;
  }
  return 'MINIMAL';
}

export function classifyRisk(input: ClassifierInput): RiskLevel {
  if (input.totalReductionPct === null) return 'UNKNOWN';
  const reduction = snapPct(input.totalReductionPct);
  const stepDrop = snapPct(input.maxSingleStepDropPct);
  const run = input.maxConsecutiveDeclineLen;

  const t = RISK_THRESHOLDS;
  if (reduction >= t.CRITICAL_REDUCTION && stepDrop >= t.CRITICAL_STEP_DROP) return 'CRITICAL';
  if (reduction >= t.HIGH_REDUCTION && stepDrop >= t.HIGH_STEP_DROP) return 'HIGH';
  if (reduction >= t.MEDIUM_REDUCTION || run >= t.MEDIUM_DECLINE_RUN) return 'MEDIUM';
  if (reduction >= t.LOW_REDUCTION) return 'LOW';
  return 'MINIMAL';
}

export function classifyDrawdown(input: ClassifierInput): DrawdownClassification {
  return {
    severity: classifySeverity(input.totalReductionPct),
    riskLevel: classifyRisk(input),
  };
}

/**
 * Coefficient of variation of traded volume.
 * null when there is no volume to judge.
 */
export function classifyVolumeStability(mean: number | null, std: number | null): VolumeStability | null {
  if (mean === null || std === null || mean <= 0) return null;
  const cv = std / mean;
  if (cv < VOLUME_CV_THRESHOLDS.STABLE) return 'STABLE';
  if (cv < VOLUME_CV_THRESHOLDS.MODERATE) return 'MODERATE';
  return 'VOLATILE';
}

export function classifyExpiryImpact(totalReductionPct: number | null, pointCount: number): ExpiryImpact | null {
  if (totalReductionPct === null) return null;
  const reduction = snapPct(totalReductionPct);
  const t = EXPIRY_IMPACT_THRESHOLDS;
  if (reduction > t.THETA_REDUCTION && pointCount < t.THETA_MAX_POINTS) return 'SEVERE_THETA_DECAY';
  if (reduction > t.HIGH_REDUCTION) return 'HIGH_TIME_DECAY';
  if (reduction > t.MODERATE_REDUCTION) return 'MODERATE_TIME_DECAY';
  return 'MINIMAL_TIME_IMPACT';
}
