/**
 * Contract picking
 *
 * Turns the raw rows of one (symbol, strike, option class) into:
 * - a single contract as of a date (latest trade date, nearest expiry, tie-break)
 * - an ascending close-price series, one point per trade date
 *
 * Used by every catalog adapter so that memory, CSV and Mongo sources
 * resolve duplicates identically.
 */

import {
  Contract,
  ContractNumericField,
  DEFAULT_PRIORITY_FIELDS,
  PriceSeries,
} from '../catalog/catalog.contract.js';
import { daysBetween } from '../catalog/catalog.dates.js';
import { resolveTie } from './tie_break.service.js';

function nearestExpiry(rows: readonly Contract[], tradeDate: string): Contract[] {
  const unexpired = rows.filter(r => r.expiryDate >= tradeDate);
  const pool = unexpired.length > 0 ? unexpired : rows;

  let bestGap = Infinity;
  for (const row of pool) {
    bestGap = Math.min(bestGap, Math.abs(daysBetween(tradeDate, row.expiryDate)));
  }
  return pool.filter(r => Math.abs(daysBetween(tradeDate, r.expiryDate)) === bestGap);
}

export function pickContract(
  candidates: readonly Contract[],
  asOfDate: string,
  priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS
): Contract | null {
  const eligible = candidates.filter(c => c.tradeDate <= asOfDate);
  if (eligible.length === 0) return null;

  let latest = eligible[0].tradeDate;
  for (const c of eligible) {
    if (c.tradeDate > latest) latest = c.tradeDate;
  }

  const sameDay = eligible.filter(c => c.tradeDate === latest);
  return resolveTie(nearestExpiry(sameDay, latest), priorityFields);
}

/**
 * Rows without a positive close are skipped. When expiryDate is given
 * only that contract month is followed; otherwise each date takes its
 * nearest-expiry row.
 */
export function buildPriceSeries(
  rows: readonly Contract[],
  fromDate: string,
  priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS,
  expiryDate?: string
): PriceSeries {
  const byDate = new Map<string, Contract[]>();
  for (const row of rows) {
    if (row.tradeDate < fromDate) continue;
    if (expiryDate !== undefined && row.expiryDate !== expiryDate) continue;
    if (row.closePrice === null || !(row.closePrice > 0)) continue;

    const group = byDate.get(row.tradeDate);
    if (group) group.push(row);
    else byDate.set(row.tradeDate, [row]);
  }

  const dates = [...byDate.keys()].sort();
  const series: PriceSeries = [];
  for (const date of dates) {
    const group = byDate.get(date) ?? [];
    const picked = pickContract(group, date, priorityFields);
    if (picked === null || picked.closePrice === null) continue;
    series.push({ date, close: picked.closePrice, volume: picked.tradedVolume });
  }
  return series;
}
