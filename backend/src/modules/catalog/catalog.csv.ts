/**
 * CSV Catalog Adapter - OFFLINE ONLY
 *
 * Reads pre-downloaded F&O bhavcopy files (UDiFF layout) from the local
 * filesystem and serves them through the in-memory catalog.
 *
 * Accepted headers (either naming):
 *   TradDt / trade_date, TckrSymb / symbol, XpryDt / expiry_date,
 *   StrkPric / strike_price, OptnTp / option_type, OpnPric, HghPric, LwPric,
 *   ClsPric, LastPric, SttlmPric, TtlTradgVol, OpnIntrst, ChngInOpnIntrst
 *
 * Only option rows (CE / PE with a strike) are kept. Rows repeated across
 * files are merged with the tie-break resolver.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { dedupeContracts } from '../strike-selector/tie_break.service.js';
import {
  Contract,
  ContractNumericField,
  DEFAULT_PRIORITY_FIELDS,
  OptionClass,
} from './catalog.contract.js';
import { normalizeDate } from './catalog.dates.js';
import { MemoryCatalogAccessor } from './catalog.memory.js';

// ═══════════════════════════════════════════════════════════════
// COLUMN MAP
// ═══════════════════════════════════════════════════════════════

type CsvField =
  | 'tradeDate' | 'symbol' | 'expiryDate' | 'strikePrice' | 'optionType'
  | ContractNumericField;

const COLUMN_ALIASES: ReadonlyArray<[CsvField, string[]]> = [
  ['tradeDate', ['TradDt', 'trade_date']],
  ['symbol', ['TckrSymb', 'symbol']],
  ['expiryDate', ['XpryDt', 'expiry_date']],
  ['strikePrice', ['StrkPric', 'strike_price']],
  ['optionType', ['OptnTp', 'option_type']],
  ['openPrice', ['OpnPric', 'open_price']],
  ['highPrice', ['HghPric', 'high_price']],
  ['lowPrice', ['LwPric', 'low_price']],
  ['closePrice', ['ClsPric', 'close_price']],
  ['lastPrice', ['LastPric', 'last_price']],
  ['settlePrice', ['SttlmPric', 'settle_price']],
  ['tradedVolume', ['TtlTradgVol', 'TtlTrdgVol', 'contracts_traded']],
  ['openInterest', ['OpnIntrst', 'open_interest']],
  ['changeInOpenInterest', ['ChngInOpnIntrst', 'change_in_oi']],
];

const OPTION_TYPE_MAP: Record<string, OptionClass> = {
  CE: 'CALL',
  PE: 'PUT',
  CALL: 'CALL',
  PUT: 'PUT',
};

export interface CsvParseResult {
  rows: Contract[];
  skipped: number;
}

function parseNumber(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const value = raw.trim();
  if (value === '' || value === '-') return null;
  const parsed = Number(value.replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
}

// ═══════════════════════════════════════════════════════════════
// PARSE
// ═══════════════════════════════════════════════════════════════

export function parseContractsCsv(content: string): CsvParseResult {
  const table: string[][] = parse(content, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });

  if (table.length === 0) return { rows: [], skipped: 0 };

  const header = table[0];
  const index = new Map<CsvField, number>();
  for (const [field, aliases] of COLUMN_ALIASES) {
    const position = header.findIndex(h => aliases.includes(h));
    if (position >= 0) index.set(field, position);
  }

  const cell = (record: string[], field: CsvField): string | undefined => {
    const position = index.get(field);
    return position === undefined ? undefined : record[position];
  };

  const rows: Contract[] = [];
  let skipped = 0;

  for (const record of table.slice(1)) {
    const optionClass: OptionClass | undefined = OPTION_TYPE_MAP[(cell(record, 'optionType') ?? '').toUpperCase()];
    const symbol = (cell(record, 'symbol') ?? '').trim();
    const strikePrice = parseNumber(cell(record, 'strikePrice'));
    const tradeDate = normalizeDate(cell(record, 'tradeDate'));
    const expiryDate = normalizeDate(cell(record, 'expiryDate'));

    if (!optionClass || !symbol || strikePrice === null || strikePrice <= 0 || !tradeDate || !expiryDate) {
      skipped++;
      continue;
    }

    rows.push({
      symbol,
      strikePrice,
      optionClass,
      expiryDate,
      tradeDate,
      openPrice: parseNumber(cell(record, 'openPrice')),
      highPrice: parseNumber(cell(record, 'highPrice')),
      lowPrice: parseNumber(cell(record, 'lowPrice')),
      closePrice: parseNumber(cell(record, 'closePrice')),
      lastPrice: parseNumber(cell(record, 'lastPrice')),
      settlePrice: parseNumber(cell(record, 'settlePrice')),
      tradedVolume: parseNumber(cell(record, 'tradedVolume')),
      openInterest: parseNumber(cell(record, 'openInterest')),
      changeInOpenInterest: parseNumber(cell(record, 'changeInOpenInterest')),
    });
  }

  return { rows, skipped };
}

// ═══════════════════════════════════════════════════════════════
// ADAPTER
// ═══════════════════════════════════════════════════════════════

export class CsvCatalogAccessor extends MemoryCatalogAccessor {
  public override readonly name: string = 'csv';

  static fromContents(
    contents: readonly string[],
    priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS
  ): CsvCatalogAccessor {
    const all: Contract[] = [];
    let skipped = 0;
    for (const content of contents) {
      const result = parseContractsCsv(content);
      all.push(...result.rows);
      skipped += result.skipped;
    }

    const merged = dedupeContracts(all, priorityFields);
    console.log(
      `[Catalog CSV] Loaded ${merged.length} option rows ` +
      `(${all.length - merged.length} duplicates merged, ${skipped} non-option rows skipped)`
    );
    return new CsvCatalogAccessor(merged, priorityFields);
  }

  static fromFiles(
    paths: readonly string[],
    priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS
  ): CsvCatalogAccessor {
    const contents = paths.map(p => {
      if (!fs.existsSync(p)) {
        throw new Error(`[Catalog CSV] File not found: ${p}`);
      }
      console.log(`[Catalog CSV] Reading ${p}...`);
      return fs.readFileSync(p, 'utf-8');
    });
    return CsvCatalogAccessor.fromContents(contents, priorityFields);
  }
}
