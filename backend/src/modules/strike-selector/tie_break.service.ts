/**
 * TIE-BREAK RESOLVER
 *
 * Picks one "best" contract among candidates competing for the same slot:
 * - several rows on the latest trade date for one strike/class
 * - several rows sharing an aggregation key when merging source batches
 *
 * Completeness score = number of priority fields that are present and non-zero.
 * Highest score wins; remaining ties keep the first candidate in input order.
 */

import { InvalidOptionsError } from '../../common/errors.js';
import {
  Contract,
  ContractNumericField,
  DEFAULT_PRIORITY_FIELDS,
} from '../catalog/catalog.contract.js';

// ═══════════════════════════════════════════════════════════════
// COMPLETENESS
// ═══════════════════════════════════════════════════════════════

function isPopulated(value: number | null): boolean {
  return value !== null && Number.isFinite(value) && value !== 0;
}

export function completenessScore(
  contract: Contract,
  priorityFields: readonly ContractNumericField[]
): number {
  let score = 0;
  for (const field of priorityFields) {
    if (isPopulated(contract[field])) score++;
  }
  return score;
}

// ═══════════════════════════════════════════════════════════════
// RESOLVE
// ═══════════════════════════════════════════════════════════════

export function resolveTie(
  candidates: readonly Contract[],
  priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS
): Contract {
  if (candidates.length === 0) {
    throw new InvalidOptionsError('Tie-break requires at least one candidate');
  }

  let best = candidates[0];
  if (candidates.length === 1 || priorityFields.length === 0) return best;

  let bestScore = completenessScore(best, priorityFields);
  for (let i = 1; i < candidates.length; i++) {
    const score = completenessScore(candidates[i], priorityFields);
    // strict: equal scores keep the earlier candidate
    if (score > bestScore) {
      best = candidates[i];
      bestScore = score;
    }
  }
  return best;
}

/**
 * Keep the candidates carrying the greatest value of `metric`
 * (e.g. identical max traded volume), then resolve the remaining tie.
 * Candidates without the metric only win when nobody has it.
 */
export function resolveByMax(
  candidates: readonly Contract[],
  metric: ContractNumericField,
  priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS
): Contract {
  let maxValue: number | null = null;
  for (const candidate of candidates) {
    const value = candidate[metric];
    if (value !== null && Number.isFinite(value) && (maxValue === null || value > maxValue)) {
      maxValue = value;
    }
  }

  const leaders = maxValue === null
    ? candidates
    : candidates.filter(c => c[metric] === maxValue);

  return resolveTie(leaders, priorityFields);
}

// ═══════════════════════════════════════════════════════════════
// BATCH MERGE
// ═══════════════════════════════════════════════════════════════

export function contractKey(contract: Contract): string {
  return [
    contract.symbol,
    contract.strikePrice,
    contract.optionClass,
    contract.expiryDate,
    contract.tradeDate,
  ].join('|');
}

export const DEFAULT_MERGE_METRIC: ContractNumericField = 'tradedVolume';

/**
 * Collapse duplicate rows (same symbol/strike/class/expiry/trade date)
 * coming from several source batches. The row with the greatest `metric`
 * wins; rows level on it go to the completeness tie-break.
 * Group order follows first appearance.
 */
export function dedupeContracts(
  rows: readonly Contract[],
  priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS,
  metric: ContractNumericField = DEFAULT_MERGE_METRIC
): Contract[] {
  const groups = new Map<string, Contract[]>();
  for (const row of rows) {
    const key = contractKey(row);
    const group = groups.get(key);
    if (group) group.push(row);
    else groups.set(key, [row]);
  }

  const merged: Contract[] = [];
  for (const group of groups.values()) {
    merged.push(resolveByMax(group, metric, priorityFields));
  }
  return merged;
}
