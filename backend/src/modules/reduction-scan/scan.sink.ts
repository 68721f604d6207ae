/**
 * Reporting sinks
 *
 * The scan hands over plain records; sinks decide where they go.
 */

import type { ReductionRecord, ReportingSink } from './scan.contract.js';
import { ReductionResultModel } from './scan_result.model.js';

export class MemoryReportingSink implements ReportingSink {
  public readonly name = 'memory';
  private readonly batches: ReductionRecord[][] = [];

  async emit(records: ReductionRecord[]): Promise<void> {
    this.batches.push([...records]);
  }

  get batchCount(): number {
    return this.batches.length;
  }

  get records(): ReductionRecord[] {
    return this.batches.flat();
  }

  clear(): void {
    this.batches.length = 0;
  }
}

export class MongoReportingSink implements ReportingSink {
  public readonly name = 'mongo';

  async emit(records: ReductionRecord[]): Promise<void> {
    if (records.length === 0) return;
    await ReductionResultModel.insertMany(records, { ordered: false });
    console.log(`[Reduction Sink] Stored ${records.length} records`);
  }
}
