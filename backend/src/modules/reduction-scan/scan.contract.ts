/**
 * REDUCTION SCAN CONTRACT
 *
 * Pipeline: reference point → strike neighborhood → per contract price series
 * → drawdown + base reduction → classification → plain records → sink
 */

import type { OptionClass } from '../catalog/catalog.contract.js';
import type {
  BaseReductionResult,
  DrawdownResult,
  RiskLevel,
  Severity,
} from '../drawdown-engine/drawdown.contract.js';
import type {
  MissingContract,
  Moneyness,
  ReferencePoint,
  SelectedStrike,
  StrikePosition,
} from '../strike-selector/strike_selector.contract.js';

// ═══════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════

export interface ScanOptions {
  kAbove: number;
  kBelow: number;
  thresholdPct: number;
}

export const DEFAULT_SCAN_OPTIONS: ScanOptions = {
  kAbove: 3,
  kBelow: 3,
  thresholdPct: 50,
};

// ═══════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════

/**
 * One row per selected contract. Numbers are rounded to 4 decimals;
 * formatting into sheets / tables is the sink's job.
 */
export interface ReductionRecord {
  symbol: string;
  asOfDate: string;
  referencePrice: number;

  strikePrice: number;
  optionClass: OptionClass;
  expiryDate: string;
  position: StrikePosition;
  strikeRank: number;
  distance: number;
  distancePct: number;
  moneyness: Moneyness;

  baseClosePrice: number | null;
  openInterest: number | null;
  tradedVolume: number | null;

  drawdown: DrawdownResult;
  baseReduction: BaseReductionResult | null;
}

export interface ReportingSink {
  readonly name: string;
  emit(records: ReductionRecord[]): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════
// REPORTS
// ═══════════════════════════════════════════════════════════════

export interface ScanSummary {
  totalRecords: number;
  crossingCount: number;          // drawdown crossed the threshold
  nonCrossingCount: number;
  insufficientCount: number;      // series shorter than 2 points
  successRatePct: number | null;
  avgReductionPct: number | null; // over crossing records

  baseReductionCount: number;     // fell thresholdPct below the base close
  daysToReduction: {
    avg: number | null;
    min: number | null;
    max: number | null;
  };

  bySeverity: Record<Severity, number>;
  byRisk: Record<RiskLevel, number>;
}

export interface ScanReport {
  ok: true;
  reference: ReferencePoint;
  options: ScanOptions;
  strikes: SelectedStrike[];
  records: ReductionRecord[];
  missing: MissingContract[];
  availableStrikes: number;
  strikeShortfall: number;
  selectionHash: string;
  summary: ScanSummary;
  computedAt: string;
}

export type ScanOutcome =
  | { ok: true; symbol: string; asOfDate: string; report: ScanReport }
  | { ok: false; symbol: string; asOfDate: string; error: string };

export interface BatchScanResult {
  ok: boolean;
  total: number;
  successCount: number;
  failCount: number;
  outcomes: ScanOutcome[];
  summary: ScanSummary;
  processingTimeMs: number;
}
