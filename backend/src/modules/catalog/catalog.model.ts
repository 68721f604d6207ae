/**
 * F&O Contract Model
 *
 * MongoDB model for the fo_contracts collection.
 * One document per daily bhavcopy option row, written by the loaders
 * upstream; the analytics backend only reads it.
 */

import mongoose, { Schema } from 'mongoose';
import type { Contract } from './catalog.contract.js';

export type IFoContractDoc = Contract;

const FoContractSchema = new Schema<IFoContractDoc>({
  symbol: { type: String, required: true },
  strikePrice: { type: Number, required: true },
  optionClass: { type: String, enum: ['CALL', 'PUT'], required: true },
  expiryDate: { type: String, required: true },
  tradeDate: { type: String, required: true },

  openPrice: { type: Number, default: null },
  highPrice: { type: Number, default: null },
  lowPrice: { type: Number, default: null },
  closePrice: { type: Number, default: null },
  lastPrice: { type: Number, default: null },
  settlePrice: { type: Number, default: null },

  tradedVolume: { type: Number, default: null },
  openInterest: { type: Number, default: null },
  changeInOpenInterest: { type: Number, default: null },
}, {
  timestamps: false,
});

// Strike listing per symbol/day
FoContractSchema.index({ symbol: 1, tradeDate: 1, strikePrice: 1 });
// Series scans per strike/class
FoContractSchema.index({ symbol: 1, strikePrice: 1, optionClass: 1, tradeDate: 1 });

export const FoContractModel = mongoose.model<IFoContractDoc>(
  'FoContract',
  FoContractSchema,
  'fo_contracts'
);
