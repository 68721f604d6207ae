/**
 * Application errors
 *
 * Thrown by the analytics modules for input that is genuinely invalid.
 * Expected shortfalls (sparse data, missing option class, fewer strikes)
 * are never errors; they show up in result cardinality and flags.
 *
 * The global Fastify error handler maps every AppError to
 *   { ok: false, error: code, message }
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

// Reference price missing, non-finite or ≤ 0
export class InvalidReferenceError extends AppError {
  public readonly referencePrice: unknown;

  constructor(referencePrice: unknown, context = 'reference price') {
    super('INVALID_REFERENCE', `Invalid ${context}: ${String(referencePrice)} (must be a positive number)`, 400);
    this.name = 'InvalidReferenceError';
    this.referencePrice = referencePrice;
  }
}

// Out-of-order / duplicate dates, non-positive prices
export class InvalidSeriesError extends AppError {
  public readonly index: number;

  constructor(message: string, index: number) {
    super('INVALID_SERIES', `${message} (at index ${index})`, 400);
    this.name = 'InvalidSeriesError';
    this.index = index;
  }
}

export class InvalidOptionsError extends AppError {
  constructor(message: string) {
    super('INVALID_OPTIONS', message, 400);
    this.name = 'InvalidOptionsError';
  }
}
