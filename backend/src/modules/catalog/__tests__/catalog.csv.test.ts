/**
 * CSV catalog adapter tests
 */

import { describe, it, expect } from 'vitest';
import { CsvCatalogAccessor, parseContractsCsv } from '../catalog.csv.js';

const HEADER = 'TradDt,TckrSymb,XpryDt,StrkPric,OptnTp,OpnPric,HghPric,LwPric,ClsPric,LastPric,SttlmPric,TtlTradgVol,OpnIntrst,ChngInOpnIntrst';

const DAY_ONE = [
  HEADER,
  '2024-01-02,NIFTY,2024-01-25,21500,CE,120,130,110,125.5,125,125.5,"1,200",5000,100',
  '2024-01-02,NIFTY,2024-01-25,21500,PE,80,90,70,75,75,75,900,4000,-50',
  '2024-01-02,NIFTY,2024-01-25,,,10,10,10,10,10,10,1,1,1',
  '20240103,NIFTY,20240125,21500,CE,100,110,90,95,95,95,800,5100,-',
].join('\n');

describe('parseContractsCsv', () => {
  it('keeps option rows and maps bhavcopy columns', () => {
    const { rows, skipped } = parseContractsCsv(DAY_ONE);

    expect(skipped).toBe(1);
    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual({
      symbol: 'NIFTY',
      strikePrice: 21500,
      optionClass: 'CALL',
      expiryDate: '2024-01-25',
      tradeDate: '2024-01-02',
      openPrice: 120,
      highPrice: 130,
      lowPrice: 110,
      closePrice: 125.5,
      lastPrice: 125,
      settlePrice: 125.5,
      tradedVolume: 1200,
      openInterest: 5000,
      changeInOpenInterest: 100,
    });
    expect(rows[1].optionClass).toBe('PUT');
    expect(rows[1].changeInOpenInterest).toBe(-50);
  });

  it('normalizes compact dates and blank markers', () => {
    const { rows } = parseContractsCsv(DAY_ONE);

    expect(rows[2].tradeDate).toBe('2024-01-03');
    expect(rows[2].expiryDate).toBe('2024-01-25');
    expect(rows[2].changeInOpenInterest).toBeNull();
  });

  it('accepts snake_case headers', () => {
    const content = [
      'trade_date,symbol,expiry_date,strike_price,option_type,close_price',
      '2024-01-02,BANKNIFTY,2024-01-25,47000,pe,210',
    ].join('\n');

    const { rows } = parseContractsCsv(content);

    expect(rows).toHaveLength(1);
    expect(rows[0].symbol).toBe('BANKNIFTY');
    expect(rows[0].optionClass).toBe('PUT');
    expect(rows[0].closePrice).toBe(210);
    expect(rows[0].openPrice).toBeNull();
  });

  it('returns nothing for empty content', () => {
    expect(parseContractsCsv('')).toEqual({ rows: [], skipped: 0 });
  });
});

describe('CsvCatalogAccessor', () => {
  it('merges rows repeated across files with the tie-break resolver', async () => {
    const sparse = [
      'TradDt,TckrSymb,XpryDt,StrkPric,OptnTp,ClsPric,OpnPric',
      '2024-01-02,NIFTY,2024-01-25,21500,CE,125.5,-',
    ].join('\n');

    const catalog = CsvCatalogAccessor.fromContents([sparse, DAY_ONE]);

    expect(catalog.name).toBe('csv');
    expect(catalog.size).toBe(3);

    const contract = await catalog.getContract('NIFTY', 21500, 'CALL', '2024-01-02');
    expect(contract?.openPrice).toBe(120);
  });

  it('keeps the higher-volume duplicate over a more complete one', async () => {
    const fullerQuiet = [
      'TradDt,TckrSymb,XpryDt,StrkPric,OptnTp,OpnPric,HghPric,LwPric,ClsPric,TtlTradgVol',
      '2024-01-02,NIFTY,2024-01-25,21500,CE,120,130,110,125,100',
    ].join('\n');
    const sparseBusy = [
      'TradDt,TckrSymb,XpryDt,StrkPric,OptnTp,ClsPric,TtlTradgVol',
      '2024-01-02,NIFTY,2024-01-25,21500,CE,124,500',
    ].join('\n');

    const catalog = CsvCatalogAccessor.fromContents([fullerQuiet, sparseBusy]);
    const contract = await catalog.getContract('NIFTY', 21500, 'CALL', '2024-01-02');

    expect(catalog.size).toBe(1);
    expect(contract?.tradedVolume).toBe(500);
    expect(contract?.closePrice).toBe(124);
    expect(contract?.openPrice).toBeNull();
  });

  it('serves strikes and series from the parsed rows', async () => {
    const catalog = CsvCatalogAccessor.fromContents([DAY_ONE]);

    expect(await catalog.getStrikes('NIFTY', '2024-01-02')).toEqual([21500]);
    expect(await catalog.getPriceSeries('NIFTY', 21500, 'CALL', '2024-01-02')).toEqual([
      { date: '2024-01-02', close: 125.5, volume: 1200 },
      { date: '2024-01-03', close: 95, volume: 800 },
    ]);
  });

  it('fails on a missing file', () => {
    expect(() => CsvCatalogAccessor.fromFiles(['/nonexistent/fo-test.csv']))
      .toThrow('[Catalog CSV] File not found: /nonexistent/fo-test.csv');
  });
});
