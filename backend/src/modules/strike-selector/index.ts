/**
 * STRIKE SELECTOR MODULE
 *
 * Exports:
 * - Neighborhood selection (pure + catalog-backed)
 * - Tie-break resolver and batch merge
 * - Contract picking / price series building
 * - Moneyness
 */

export * from './strike_selector.contract.js';
export * from './strike_selector.service.js';
export * from './tie_break.service.js';
export * from './contract_pick.service.js';
