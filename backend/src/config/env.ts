/**
 * Environment configuration
 *
 * loadEnv() reads a plain key/value source (process.env by default,
 * populated from .env by dotenv in server.ts) and validates it once at boot.
 */

import { InvalidOptionsError } from '../common/errors.js';
import {
  ContractNumericField,
  DEFAULT_PRIORITY_FIELDS,
  isContractNumericField,
} from '../modules/catalog/catalog.contract.js';

export type CatalogSource = 'mongo' | 'csv';
export type ReportSinkKind = 'mongo' | 'memory';

export interface Env {
  NODE_ENV: string;
  PORT: number;
  HOST: string;
  LOG_LEVEL: string;
  MONGO_URL: string;
  CATALOG_SOURCE: CatalogSource;
  CATALOG_CSV_PATHS: string[];
  REPORT_SINK: ReportSinkKind;
  STRIKES_ABOVE: number;
  STRIKES_BELOW: number;
  REDUCTION_THRESHOLD_PCT: number;
  TIE_BREAK_FIELDS: ContractNumericField[];
}

type EnvSource = Record<string, string | undefined>;

function readString(source: EnvSource, key: string, fallback: string): string {
  const value = source[key];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

function readInt(source: EnvSource, key: string, fallback: number, min = 0): number {
  const raw = readString(source, key, String(fallback));
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidOptionsError(`${key} must be an integer ≥ ${min}, got "${raw}"`);
  }
  return value;
}

function readList(source: EnvSource, key: string): string[] {
  return readString(source, key, '')
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

function readChoice<T extends string>(source: EnvSource, key: string, choices: readonly T[], fallback: T): T {
  const raw = readString(source, key, fallback);
  const match = choices.find(c => c === raw);
  if (match === undefined) {
    throw new InvalidOptionsError(`${key} must be one of ${choices.join('|')}, got "${raw}"`);
  }
  return match;
}

export function loadEnv(source: EnvSource = process.env): Env {
  const threshold = Number(readString(source, 'REDUCTION_THRESHOLD_PCT', '50'));
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 100) {
    throw new InvalidOptionsError(`REDUCTION_THRESHOLD_PCT must be in (0, 100], got "${source.REDUCTION_THRESHOLD_PCT}"`);
  }

  const rawFields = readList(source, 'TIE_BREAK_FIELDS');
  const tieBreakFields: ContractNumericField[] = [];
  for (const field of rawFields) {
    if (!isContractNumericField(field)) {
      throw new InvalidOptionsError(`TIE_BREAK_FIELDS: unknown contract field "${field}"`);
    }
    tieBreakFields.push(field);
  }

  const catalogSource = readChoice<CatalogSource>(source, 'CATALOG_SOURCE', ['mongo', 'csv'], 'mongo');
  const csvPaths = readList(source, 'CATALOG_CSV_PATHS');
  if (catalogSource === 'csv' && csvPaths.length === 0) {
    throw new InvalidOptionsError('CATALOG_CSV_PATHS is required when CATALOG_SOURCE=csv');
  }

  return {
    NODE_ENV: readString(source, 'NODE_ENV', 'development'),
    PORT: readInt(source, 'PORT', 8001, 1),
    HOST: readString(source, 'HOST', '0.0.0.0'),
    LOG_LEVEL: readString(source, 'LOG_LEVEL', 'info'),
    MONGO_URL: readString(source, 'MONGO_URL', 'mongodb://localhost:27017/fo_analytics'),
    CATALOG_SOURCE: catalogSource,
    CATALOG_CSV_PATHS: csvPaths,
    REPORT_SINK: readChoice<ReportSinkKind>(source, 'REPORT_SINK', ['mongo', 'memory'], 'mongo'),
    STRIKES_ABOVE: readInt(source, 'STRIKES_ABOVE', 3),
    STRIKES_BELOW: readInt(source, 'STRIKES_BELOW', 3),
    REDUCTION_THRESHOLD_PCT: threshold,
    TIE_BREAK_FIELDS: rawFields.length > 0 ? tieBreakFields : [...DEFAULT_PRIORITY_FIELDS],
  };
}
