/**
 * STRIKE NEIGHBORHOOD CONTRACT
 *
 * Bounded, deterministic set of option strikes around a reference price:
 *   kAbove nearest above + kBelow nearest below + exact match / overall nearest,
 *   backfilled by distance up to kAbove + kBelow + 1 strikes.
 */

import type { Contract, OptionClass } from '../catalog/catalog.contract.js';

// ═══════════════════════════════════════════════════════════════
// INPUTS
// ═══════════════════════════════════════════════════════════════

export interface ReferencePoint {
  symbol: string;
  asOfDate: string;         // YYYY-MM-DD
  referencePrice: number;   // underlying close
}

export interface SelectorOptions {
  kAbove: number;
  kBelow: number;
}

export const DEFAULT_SELECTOR_OPTIONS: SelectorOptions = {
  kAbove: 3,
  kBelow: 3,
};

// ═══════════════════════════════════════════════════════════════
// OUTPUTS
// ═══════════════════════════════════════════════════════════════

export type StrikePosition = 'ABOVE' | 'BELOW' | 'EXACT';

export interface SelectedStrike {
  strikePrice: number;
  position: StrikePosition;
  rank: number;             // 1 = nearest
  distance: number;         // |strike - reference|
  distancePct: number;      // signed, % of reference
  contracts: Partial<Record<OptionClass, Contract>>;
}

export interface MissingContract {
  strikePrice: number;
  optionClass: OptionClass;
}

export interface NeighborhoodSelection {
  reference: ReferencePoint;
  strikes: SelectedStrike[];
  rows: Contract[];                 // 0..2 per strike, ascending strike, CALL before PUT
  missing: MissingContract[];
  availableStrikes: number;
  strikeShortfall: number;          // target strikes - selected strikes
}

// ═══════════════════════════════════════════════════════════════
// MONEYNESS
// ═══════════════════════════════════════════════════════════════

export type Moneyness = 'DEEP_ITM' | 'ITM' | 'NEAR_ATM' | 'OTM' | 'DEEP_OTM';

export const MONEYNESS_BANDS = {
  NEAR: 0.05,   // ±5% of spot
  FAR: 0.15,    // beyond ±15% of spot is deep OTM
};
