/**
 * Mongo Catalog Adapter
 *
 * Reads fo_contracts through mongoose. Duplicate rows per date are resolved
 * with the same picking rules as the in-memory catalog.
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
import { FoContractModel } from './catalog.model.js';

const CONTRACT_PROJECTION = {
  _id: 0,
  symbol: 1,
  strikePrice: 1,
  optionClass: 1,
  expiryDate: 1,
  tradeDate: 1,
  openPrice: 1,
  highPrice: 1,
  lowPrice: 1,
  closePrice: 1,
  lastPrice: 1,
  settlePrice: 1,
  tradedVolume: 1,
  openInterest: 1,
  changeInOpenInterest: 1,
};

export class MongoCatalogAccessor implements CatalogAccessor {
  public readonly name = 'mongo';

  constructor(private readonly priorityFields: readonly ContractNumericField[] = DEFAULT_PRIORITY_FIELDS) {}

  async getStrikes(symbol: string, asOfDate: string): Promise<number[]> {
    const strikes = await FoContractModel.distinct('strikePrice', { symbol, tradeDate: asOfDate });
    return strikes
      .filter((s): s is number => typeof s === 'number')
      .sort((a, b) => a - b);
  }

  async getContract(
    symbol: string,
    strikePrice: number,
    optionClass: OptionClass,
    asOfDate: string
  ): Promise<Contract | null> {
    // latest trade date on or before asOf
    const latest = await FoContractModel
      .findOne({ symbol, strikePrice, optionClass, tradeDate: { $lte: asOfDate } }, { tradeDate: 1 })
      .sort({ tradeDate: -1 })
      .lean<{ tradeDate: string }>();

    if (!latest) return null;

    const candidates = await FoContractModel
      .find({ symbol, strikePrice, optionClass, tradeDate: latest.tradeDate }, CONTRACT_PROJECTION)
      .sort({ expiryDate: 1 })
      .lean<Contract[]>();

    return pickContract(candidates, asOfDate, this.priorityFields);
  }

  async getPriceSeries(
    symbol: string,
    strikePrice: number,
    optionClass: OptionClass,
    fromDate: string,
    expiryDate?: string
  ): Promise<PriceSeries> {
    const filter = {
      symbol,
      strikePrice,
      optionClass,
      tradeDate: { $gte: fromDate },
      closePrice: { $gt: 0 },
      ...(expiryDate !== undefined ? { expiryDate } : {}),
    };

    const rows = await FoContractModel
      .find(filter, CONTRACT_PROJECTION)
      .sort({ tradeDate: 1, expiryDate: 1 })
      .lean<Contract[]>();

    return buildPriceSeries(rows, fromDate, this.priorityFields, expiryDate);
  }
}
