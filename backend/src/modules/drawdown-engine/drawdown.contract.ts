/**
 * DRAWDOWN ENGINE CONTRACT
 *
 * Characterizes a contraction in one option's close-price series:
 * - global extremes and total reduction (max → min)
 * - worst single step, longest run of declines
 * - first crossing of the reduction threshold after the peak
 */

// ═══════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════

export interface DrawdownOptions {
  thresholdPct: number;
}

export const DEFAULT_DRAWDOWN_OPTIONS: DrawdownOptions = {
  thresholdPct: 50,
};

export const MIN_SERIES_POINTS = 2;

// ═══════════════════════════════════════════════════════════════
// LABELS
// ═══════════════════════════════════════════════════════════════

export type Severity = 'MINIMAL' | 'LOW' | 'MODERATE' | 'HIGH' | 'SEVERE' | 'EXTREME' | 'NO_DATA';

export type RiskLevel = 'MINIMAL' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL' | 'UNKNOWN';

export type VolumeStability = 'STABLE' | 'MODERATE' | 'VOLATILE';

export type ExpiryImpact =
  | 'SEVERE_THETA_DECAY'
  | 'HIGH_TIME_DECAY'
  | 'MODERATE_TIME_DECAY'
  | 'MINIMAL_TIME_IMPACT';

/**
 * Severity by total reduction, lower bound inclusive:
 * [0,10) MINIMAL, [10,25) LOW, [25,50) MODERATE,
 * [50,75) HIGH, [75,90) SEVERE, [90,100] EXTREME
 */
export const SEVERITY_BANDS: ReadonlyArray<{ min: number; severity: Severity }> = [
  { min: 90, severity: 'EXTREME' },
  { min: 75, severity: 'SEVERE' },
  { min: 50, severity: 'HIGH' },
  { min: 25, severity: 'MODERATE' },
  { min: 10, severity: 'LOW' },
];

export const RISK_THRESHOLDS = {
  CRITICAL_REDUCTION: 75,
  CRITICAL_STEP_DROP: 20,
  HIGH_REDUCTION: 50,
  HIGH_STEP_DROP: 15,
  MEDIUM_REDUCTION: 50,
  MEDIUM_DECLINE_RUN: 3,
  LOW_REDUCTION: 25,
};

export const VOLUME_CV_THRESHOLDS = {
  STABLE: 0.3,
  MODERATE: 0.7,
};

export const EXPIRY_IMPACT_THRESHOLDS = {
  THETA_REDUCTION: 90,
  THETA_MAX_POINTS: 40,
  HIGH_REDUCTION: 70,
  MODERATE_REDUCTION: 50,
};

// ═══════════════════════════════════════════════════════════════
// RESULT
// ═══════════════════════════════════════════════════════════════

export interface DrawdownClassification {
  severity: Severity;
  riskLevel: RiskLevel;
}

export interface DrawdownResult extends DrawdownClassification {
  status: 'OK' | 'INSUFFICIENT_DATA';
  pointCount: number;
  shortfall: number;            // points missing to reach MIN_SERIES_POINTS
  thresholdPct: number;

  maxPrice: number | null;
  maxDate: string | null;
  minPrice: number | null;
  minDate: string | null;

  totalReductionPct: number | null;   // (max - min) / max * 100
  priceRangeRatio: number | null;     // (max - min) / max

  maxSingleStepDropPct: number;       // positive magnitude, 0 if no decline
  maxSingleStepDate: string | null;

  maxConsecutiveDeclineLen: number;
  maxConsecutiveDeclinePct: number;   // summed |step| within the run

  crossesThreshold: boolean;
  firstCrossingDate: string | null;

  priceVolatility: number | null;     // population std-dev of closes
  avgDailyVolume: number | null;
  volumeStability: VolumeStability | null;
  expiryImpact: ExpiryImpact | null;
}

// ═══════════════════════════════════════════════════════════════
// BASE REDUCTION
// ═══════════════════════════════════════════════════════════════

export interface BaseReductionResult {
  basePrice: number;
  baseDate: string;
  thresholdPct: number;
  tradingDaysAnalyzed: number;

  reductionFound: boolean;
  reductionDate: string | null;
  reducedPrice: number | null;
  reductionPct: number | null;
  daysToReduction: number | null;     // calendar days from baseDate

  maxReductionPct: number | null;     // may be negative when price only rose
  maxReductionDate: string | null;
  maxReductionPrice: number | null;
}
