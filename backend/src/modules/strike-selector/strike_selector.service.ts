/**
 * STRIKE NEIGHBORHOOD SELECTOR
 *
 * selectStrikes()        - pure, strikes + reference → ordered neighborhood
 * selectNeighborhood()   - fetches strikes and both option classes per strike
 * classifyMoneyness()    - strike vs spot, per option class
 *
 * Determinism: strikes are sorted before any pick, and every tie is broken
 * by the lower strike price, so identical inputs give identical output.
 */

import { InvalidOptionsError, InvalidReferenceError } from '../../common/errors.js';
import {
  CatalogAccessor,
  Contract,
  OPTION_CLASSES,
  OptionClass,
} from '../catalog/catalog.contract.js';
import { isIsoDate } from '../catalog/catalog.dates.js';
import {
  DEFAULT_SELECTOR_OPTIONS,
  MONEYNESS_BANDS,
  MissingContract,
  Moneyness,
  NeighborhoodSelection,
  ReferencePoint,
  SelectedStrike,
  SelectorOptions,
  StrikePosition,
} from './strike_selector.contract.js';

// ═══════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════

export function assertReferencePrice(referencePrice: number): void {
  if (typeof referencePrice !== 'number' || !Number.isFinite(referencePrice) || referencePrice <= 0) {
    throw new InvalidReferenceError(referencePrice);
  }
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidOptionsError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export function resolveSelectorOptions(options: Partial<SelectorOptions> = {}): SelectorOptions {
  const resolved: SelectorOptions = {
    kAbove: options.kAbove ?? DEFAULT_SELECTOR_OPTIONS.kAbove,
    kBelow: options.kBelow ?? DEFAULT_SELECTOR_OPTIONS.kBelow,
  };
  assertCount('kAbove', resolved.kAbove);
  assertCount('kBelow', resolved.kBelow);
  return resolved;
}

// ═══════════════════════════════════════════════════════════════
// PURE SELECTION
// ═══════════════════════════════════════════════════════════════

function byDistance(referencePrice: number) {
  return (a: number, b: number): number => {
    const diff = Math.abs(a - referencePrice) - Math.abs(b - referencePrice);
    return diff !== 0 ? diff : a - b;
  };
}

function positionOf(strike: number, referencePrice: number): StrikePosition {
  if (strike > referencePrice) return 'ABOVE';
  if (strike < referencePrice) return 'BELOW';
  return 'EXACT';
}

export function selectStrikes(
  strikes: Iterable<number>,
  referencePrice: number,
  options: Partial<SelectorOptions> = {}
): SelectedStrike[] {
  assertReferencePrice(referencePrice);
  const { kAbove, kBelow } = resolveSelectorOptions(options);
  const target = kAbove + kBelow + 1;

  const available = [...new Set(strikes)]
    .filter(s => Number.isFinite(s) && s > 0)
    .sort((a, b) => a - b);

  if (available.length === 0) return [];

  const selected = new Set<number>();

  // nearest above, ascending
  for (const s of available.filter(s => s > referencePrice).slice(0, kAbove)) {
    selected.add(s);
  }

  // nearest below, descending
  const below = available.filter(s => s < referencePrice).reverse();
  for (const s of below.slice(0, kBelow)) {
    selected.add(s);
  }

  // exact match is in addition to the above/below picks
  for (const s of available) {
    if (s === referencePrice) selected.add(s);
  }

  const byNearest = [...available].sort(byDistance(referencePrice));
  selected.add(byNearest[0]);

  // backfill by distance until the target is reached or strikes run out
  for (const s of byNearest) {
    if (selected.size >= target) break;
    selected.add(s);
  }

  const ranked = [...selected].sort(byDistance(referencePrice));
  const rankOf = new Map<number, number>();
  ranked.forEach((s, i) => rankOf.set(s, i + 1));

  return [...selected]
    .sort((a, b) => a - b)
    .map(strikePrice => ({
      strikePrice,
      position: positionOf(strikePrice, referencePrice),
      rank: rankOf.get(strikePrice) ?? 0,
      distance: Math.abs(strikePrice - referencePrice),
      distancePct: ((strikePrice - referencePrice) / referencePrice) * 100,
      contracts: {},
    }));
}

// ═══════════════════════════════════════════════════════════════
// MONEYNESS
// ═══════════════════════════════════════════════════════════════

export function classifyMoneyness(strikePrice: number, spotPrice: number, optionClass: OptionClass): Moneyness {
  assertReferencePrice(spotPrice);
  const { NEAR, FAR } = MONEYNESS_BANDS;

  if (optionClass === 'CALL') {
    if (strikePrice < spotPrice * (1 - NEAR)) return 'DEEP_ITM';
    if (strikePrice < spotPrice) return 'ITM';
    if (strikePrice <= spotPrice * (1 + NEAR)) return 'NEAR_ATM';
    if (strikePrice <= spotPrice * (1 + FAR)) return 'OTM';
    return 'DEEP_OTM';
  }

  if (strikePrice > spotPrice * (1 + NEAR)) return 'DEEP_ITM';
  if (strikePrice > spotPrice) return 'ITM';
  if (strikePrice >= spotPrice * (1 - NEAR)) return 'NEAR_ATM';
  if (strikePrice >= spotPrice * (1 - FAR)) return 'OTM';
  return 'DEEP_OTM';
}

// ═══════════════════════════════════════════════════════════════
// CATALOG-BACKED SELECTION
// ═══════════════════════════════════════════════════════════════

export async function selectNeighborhood(
  catalog: CatalogAccessor,
  reference: ReferencePoint,
  options: Partial<SelectorOptions> = {}
): Promise<NeighborhoodSelection> {
  assertReferencePrice(reference.referencePrice);
  if (!isIsoDate(reference.asOfDate)) {
    throw new InvalidOptionsError(`asOfDate must be YYYY-MM-DD, got ${reference.asOfDate}`);
  }
  const resolved = resolveSelectorOptions(options);
  const target = resolved.kAbove + resolved.kBelow + 1;
  const { symbol, asOfDate, referencePrice } = reference;

  const available = await catalog.getStrikes(symbol, asOfDate);
  if (available.length === 0) {
    console.warn(`[Strike Selector] ${symbol} ${asOfDate}: no strikes available`);
  }

  const strikes = selectStrikes(available, referencePrice, resolved);
  const rows: Contract[] = [];
  const missing: MissingContract[] = [];

  for (const strike of strikes) {
    for (const optionClass of OPTION_CLASSES) {
      const contract = await catalog.getContract(symbol, strike.strikePrice, optionClass, asOfDate);
      if (contract) {
        strike.contracts[optionClass] = contract;
        rows.push(contract);
      } else {
        missing.push({ strikePrice: strike.strikePrice, optionClass });
        console.warn(`[Strike Selector] ${symbol} ${asOfDate}: no ${optionClass} at strike ${strike.strikePrice}`);
      }
    }
  }

  console.log(
    `[Strike Selector] ${symbol} ${asOfDate} @ ${referencePrice}: ` +
    `${strikes.length}/${target} strikes, ${rows.length} contracts`
  );

  return {
    reference: { symbol, asOfDate, referencePrice },
    strikes,
    rows,
    missing,
    availableStrikes: new Set(available).size,
    strikeShortfall: Math.max(0, target - strikes.length),
  };
}
