/**
 * REDUCTION SCAN MODULE
 *
 * Exports:
 * - ReductionScanService (single + batch scans)
 * - Reporting sinks (memory, mongo)
 * - Summary helpers
 * - Route registration
 */

export * from './scan.contract.js';
export * from './scan.service.js';
export * from './scan.summary.js';
export * from './scan.sink.js';
export { ReductionResultModel } from './scan_result.model.js';
export type { IReductionResultDoc } from './scan_result.model.js';
export { registerReductionScanRoutes } from './scan.routes.js';
export type { ReductionScanRouteDeps } from './scan.routes.js';
