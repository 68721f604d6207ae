/**
 * INSTRUMENT CATALOG CONTRACT
 *
 * Read-only view of daily F&O contract rows:
 * - strikes listed for a symbol on a trade date
 * - one resolved contract per (symbol, strike, option class, date)
 * - ascending close-price series for one (symbol, strike, option class)
 */

// ═══════════════════════════════════════════════════════════════
// CONTRACT ROWS
// ═══════════════════════════════════════════════════════════════

export type OptionClass = 'CALL' | 'PUT';

export const OPTION_CLASSES: readonly OptionClass[] = ['CALL', 'PUT'];

export interface Contract {
  symbol: string;
  strikePrice: number;
  optionClass: OptionClass;
  expiryDate: string;       // YYYY-MM-DD
  tradeDate: string;        // YYYY-MM-DD

  openPrice: number | null;
  highPrice: number | null;
  lowPrice: number | null;
  closePrice: number | null;
  lastPrice: number | null;
  settlePrice: number | null;

  tradedVolume: number | null;    // contracts traded
  openInterest: number | null;
  changeInOpenInterest: number | null;
}

/**
 * Numeric contract fields usable for completeness scoring
 * and max-metric merging.
 */
export type ContractNumericField =
  | 'openPrice'
  | 'highPrice'
  | 'lowPrice'
  | 'closePrice'
  | 'lastPrice'
  | 'settlePrice'
  | 'tradedVolume'
  | 'openInterest'
  | 'changeInOpenInterest';

export const CONTRACT_NUMERIC_FIELDS: readonly ContractNumericField[] = [
  'openPrice',
  'highPrice',
  'lowPrice',
  'closePrice',
  'lastPrice',
  'settlePrice',
  'tradedVolume',
  'openInterest',
  'changeInOpenInterest',
];

export const DEFAULT_PRIORITY_FIELDS: readonly ContractNumericField[] = [
  'closePrice',
  'openPrice',
  'highPrice',
  'lowPrice',
  'lastPrice',
];

// ═══════════════════════════════════════════════════════════════
// PRICE SERIES
// ═══════════════════════════════════════════════════════════════

export interface PricePoint {
  date: string;       // YYYY-MM-DD
  close: number;
  volume?: number | null;
}

export type PriceSeries = PricePoint[];

// ═══════════════════════════════════════════════════════════════
// ACCESSOR
// ═══════════════════════════════════════════════════════════════

export interface CatalogAccessor {
  readonly name: string;

  getStrikes(symbol: string, asOfDate: string): Promise<number[]>;

  getContract(
    symbol: string,
    strikePrice: number,
    optionClass: OptionClass,
    asOfDate: string
  ): Promise<Contract | null>;

  /**
   * Ascending, on/after fromDate, may be empty.
   * expiryDate pins the series to one contract month.
   */
  getPriceSeries(
    symbol: string,
    strikePrice: number,
    optionClass: OptionClass,
    fromDate: string,
    expiryDate?: string
  ): Promise<PriceSeries>;
}

export function isContractNumericField(value: string): value is ContractNumericField {
  return CONTRACT_NUMERIC_FIELDS.some(field => field === value);
}
