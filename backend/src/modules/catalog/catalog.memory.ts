/**
 * In-process catalog over a fixed set of contract rows.
 * Backs the CSV adapter and the route/pipeline tests.
 */

import { buildPriceSeries, pickContract } from '../strike-selector/contract_pick.service.js';
import {
  CatalogAccessor,
  Contract,
  ContractNumericField,
  DEFAULT_PRIORITY_FIELDS,
  OptionClass,
  PriceSeries,
} from './catalog.contract.js';

export class MemoryCatalogAccessor implements CatalogAccessor {
  public readonly name: string = 'memory';

  private readonly rows: Contract[];
  private readonly priorityFields: readonly ContractNumericField[];

  constructor(rows: readonly Contract[], priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS) {
    this.rows = [...rows];
    this.priorityFields = priorityFields;
  }

  get size(): number {
    return this.rows.length;
  }

  async getStrikes(symbol: string, asOfDate: string): Promise<number[]> {
    const strikes = new Set<number>();
    for (const row of this.rows) {
      if (row.symbol === symbol && row.tradeDate === asOfDate) strikes.add(row.strikePrice);
    }
    return [...strikes].sort((a, b) => a - b);
  }

  async getContract(
    symbol: string,
    strikePrice: number,
    optionClass: OptionClass,
    asOfDate: string
  ): Promise<Contract | null> {
    return pickContract(this.rowsFor(symbol, strikePrice, optionClass), asOfDate, this.priorityFields);
  }

  async getPriceSeries(
    symbol: string,
    strikePrice: number,
    optionClass: OptionClass,
    fromDate: string,
    expiryDate?: string
  ): Promise<PriceSeries> {
    return buildPriceSeries(this.rowsFor(symbol, strikePrice, optionClass), fromDate, this.priorityFields, expiryDate);
  }

  private rowsFor(symbol: string, strikePrice: number, optionClass: OptionClass): Contract[] {
    return this.rows.filter(
      r => r.symbol === symbol && r.strikePrice === strikePrice && r.optionClass === optionClass
    );
  }
}
