/**
 * Reduction Scan Service
 *
 * For a reference point: select the strike neighborhood, pull each selected
 * contract's subsequent price series, analyse drawdown and base reduction,
 * classify, emit plain records to the sink.
 *
 * Catalog and sink are injected; the service holds no other state.
 */

import * as crypto from 'crypto';
import type { CatalogAccessor, Contract } from '../catalog/catalog.contract.js';
import { analyzeBaseReduction } from '../drawdown-engine/base_reduction.service.js';
import type { BaseReductionResult, DrawdownResult } from '../drawdown-engine/drawdown.contract.js';
import { analyzeDrawdown, assertThreshold } from '../drawdown-engine/drawdown.service.js';
import type {
  ReferencePoint,
  SelectedStrike,
} from '../strike-selector/strike_selector.contract.js';
import {
  classifyMoneyness,
  resolveSelectorOptions,
  selectNeighborhood,
} from '../strike-selector/strike_selector.service.js';
import {
  BatchScanResult,
  DEFAULT_SCAN_OPTIONS,
  ReductionRecord,
  ReportingSink,
  ScanOptions,
  ScanOutcome,
  ScanReport,
} from './scan.contract.js';
import { round4, summarizeRecords } from './scan.summary.js';

// ═══════════════════════════════════════════════════════════════
// ROUNDING
// ═══════════════════════════════════════════════════════════════

function r(value: number | null): number | null {
  return value === null ? null : round4(value);
}

function roundDrawdown(d: DrawdownResult): DrawdownResult {
  return {
    ...d,
    maxPrice: r(d.maxPrice),
    minPrice: r(d.minPrice),
    totalReductionPct: r(d.totalReductionPct),
    priceRangeRatio: r(d.priceRangeRatio),
    maxSingleStepDropPct: round4(d.maxSingleStepDropPct),
    maxConsecutiveDeclinePct: round4(d.maxConsecutiveDeclinePct),
    priceVolatility: r(d.priceVolatility),
    avgDailyVolume: r(d.avgDailyVolume),
  };
}

function roundBase(b: BaseReductionResult): BaseReductionResult {
  return {
    ...b,
    reductionPct: r(b.reductionPct),
    maxReductionPct: r(b.maxReductionPct),
  };
}

/**
 * Stable fingerprint of the ordered selection (strikes, positions, ranks,
 * resolved contracts). Identical inputs give identical hashes.
 */
export function hashSelection(strikes: readonly SelectedStrike[]): string {
  const canonical = strikes.map(s => [
    s.strikePrice,
    s.position,
    s.rank,
    s.contracts.CALL ? [s.contracts.CALL.expiryDate, s.contracts.CALL.tradeDate] : null,
    s.contracts.PUT ? [s.contracts.PUT.expiryDate, s.contracts.PUT.tradeDate] : null,
  ]);
  return crypto.createHash('sha256').update(JSON.stringify(canonical)).digest('hex');
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class ReductionScanService {
  private readonly options: ScanOptions;

  constructor(
    private readonly catalog: CatalogAccessor,
    private readonly sink: ReportingSink,
    options: Partial<ScanOptions> = {}
  ) {
    const merged: ScanOptions = { ...DEFAULT_SCAN_OPTIONS, ...options };
    resolveSelectorOptions(merged);
    assertThreshold(merged.thresholdPct);
    this.options = merged;
  }

  getOptions(): ScanOptions {
    return { ...this.options };
  }

  async runScan(reference: ReferencePoint, overrides: Partial<ScanOptions> = {}): Promise<ScanReport> {
    const options: ScanOptions = { ...this.options, ...overrides };
    assertThreshold(options.thresholdPct);

    const selection = await selectNeighborhood(this.catalog, reference, {
      kAbove: options.kAbove,
      kBelow: options.kBelow,
    });

    const records: ReductionRecord[] = [];
    for (const strike of selection.strikes) {
      for (const contract of [strike.contracts.CALL, strike.contracts.PUT]) {
        if (!contract) continue;
        records.push(await this.analyzeContract(reference, strike, contract, options.thresholdPct));
      }
    }

    await this.sink.emit(records);

    const summary = summarizeRecords(records);
    console.log(
      `[Reduction Scan] ${reference.symbol} ${reference.asOfDate}: ` +
      `${records.length} contracts, ${summary.crossingCount} crossed ${options.thresholdPct}% ` +
      `(sink: ${this.sink.name})`
    );

    return {
      ok: true,
      reference: selection.reference,
      options,
      strikes: selection.strikes,
      records,
      missing: selection.missing,
      availableStrikes: selection.availableStrikes,
      strikeShortfall: selection.strikeShortfall,
      selectionHash: hashSelection(selection.strikes),
      summary,
      computedAt: new Date().toISOString(),
    };
  }

  /**
   * Sequential. A failing reference is reported and the batch continues.
   */
  async runBatch(references: readonly ReferencePoint[], overrides: Partial<ScanOptions> = {}): Promise<BatchScanResult> {
    const start = Date.now();
    console.log(`[Reduction Scan] Starting batch for ${references.length} references...`);

    const outcomes: ScanOutcome[] = [];
    const allRecords: ReductionRecord[] = [];

    for (const reference of references) {
      try {
        const report = await this.runScan(reference, overrides);
        outcomes.push({ ok: true, symbol: reference.symbol, asOfDate: reference.asOfDate, report });
        allRecords.push(...report.records);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Reduction Scan] ${reference.symbol} ${reference.asOfDate} failed:`, message);
        outcomes.push({ ok: false, symbol: reference.symbol, asOfDate: reference.asOfDate, error: message });
      }
    }

    const successCount = outcomes.filter(o => o.ok).length;
    const failCount = outcomes.length - successCount;
    console.log(`[Reduction Scan] Batch complete: ${successCount} success, ${failCount} failed`);

    return {
      ok: failCount === 0,
      total: references.length,
      successCount,
      failCount,
      outcomes,
      summary: summarizeRecords(allRecords),
      processingTimeMs: Date.now() - start,
    };
  }

  private async analyzeContract(
    reference: ReferencePoint,
    strike: SelectedStrike,
    contract: Contract,
    thresholdPct: number
  ): Promise<ReductionRecord> {
    const series = await this.catalog.getPriceSeries(
      contract.symbol,
      contract.strikePrice,
      contract.optionClass,
      contract.tradeDate,
      contract.expiryDate
    );

    const drawdown = analyzeDrawdown(series, { thresholdPct });
    if (drawdown.status === 'INSUFFICIENT_DATA') {
      console.warn(
        `[Reduction Scan] ${contract.symbol} ${contract.strikePrice} ${contract.optionClass}: ` +
        `${series.length} price points, short by ${drawdown.shortfall}`
      );
    }

    const baseClose = contract.closePrice;
    const baseReduction = baseClose !== null && baseClose > 0
      ? analyzeBaseReduction(baseClose, contract.tradeDate, series, { thresholdPct })
      : null;

    return {
      symbol: reference.symbol,
      asOfDate: reference.asOfDate,
      referencePrice: reference.referencePrice,
      strikePrice: contract.strikePrice,
      optionClass: contract.optionClass,
      expiryDate: contract.expiryDate,
      position: strike.position,
      strikeRank: strike.rank,
      distance: round4(strike.distance),
      distancePct: round4(strike.distancePct),
      moneyness: classifyMoneyness(contract.strikePrice, reference.referencePrice, contract.optionClass),
      baseClosePrice: baseClose,
      openInterest: contract.openInterest,
      tradedVolume: contract.tradedVolume,
      drawdown: roundDrawdown(drawdown),
      baseReduction: baseReduction ? roundBase(baseReduction) : null,
    };
  }
}
