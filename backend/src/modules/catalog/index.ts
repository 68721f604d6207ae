/**
 * INSTRUMENT CATALOG MODULE
 *
 * Read-only access to daily option contract rows:
 * - MemoryCatalogAccessor: in-process rows
 * - CsvCatalogAccessor: offline bhavcopy files
 * - MongoCatalogAccessor: fo_contracts collection
 */

export * from './catalog.contract.js';
export * from './catalog.dates.js';
export { MemoryCatalogAccessor } from './catalog.memory.js';
export { CsvCatalogAccessor, parseContractsCsv } from './catalog.csv.js';
export type { CsvParseResult } from './catalog.csv.js';
export { MongoCatalogAccessor } from './catalog.mongo.js';
export { FoContractModel } from './catalog.model.js';
