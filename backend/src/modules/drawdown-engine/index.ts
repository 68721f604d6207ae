/**
 * DRAWDOWN ENGINE MODULE
 *
 * Exports:
 * - Drawdown analysis over a price series
 * - Severity / risk classification
 * - Base-price reduction (days to threshold)
 */

export * from './drawdown.contract.js';
export * from './drawdown.service.js';
export * from './drawdown.classifier.js';
export * from './base_reduction.service.js';
