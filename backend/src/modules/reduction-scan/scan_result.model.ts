/**
 * Reduction Result Model
 *
 * MongoDB model for the reduction_results collection.
 * One document per analysed contract per scan.
 */

import mongoose, { Schema } from 'mongoose';
import type { ReductionRecord } from './scan.contract.js';

export interface IReductionResultDoc extends ReductionRecord {
  createdAt: Date;
}

const ReductionResultSchema = new Schema<IReductionResultDoc>({
  symbol: { type: String, required: true },
  asOfDate: { type: String, required: true },
  referencePrice: { type: Number, required: true },

  strikePrice: { type: Number, required: true },
  optionClass: { type: String, enum: ['CALL', 'PUT'], required: true },
  expiryDate: { type: String, required: true },
  position: { type: String, enum: ['ABOVE', 'BELOW', 'EXACT'], required: true },
  strikeRank: { type: Number, required: true },
  distance: { type: Number, required: true },
  distancePct: { type: Number, required: true },
  moneyness: { type: String, required: true },

  baseClosePrice: { type: Number, default: null },
  openInterest: { type: Number, default: null },
  tradedVolume: { type: Number, default: null },

  drawdown: { type: Schema.Types.Mixed, required: true },
  baseReduction: { type: Schema.Types.Mixed, default: null },

  createdAt: { type: Date, default: Date.now },
}, {
  timestamps: false,
});

ReductionResultSchema.index({ symbol: 1, asOfDate: 1, strikePrice: 1, optionClass: 1 });
ReductionResultSchema.index({ 'drawdown.crossesThreshold': 1 });
ReductionResultSchema.index({ 'drawdown.severity': 1 });

export const ReductionResultModel = mongoose.model<IReductionResultDoc>(
  'ReductionResult',
  ReductionResultSchema,
  'reduction_results'
);
