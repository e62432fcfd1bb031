import { Schema, model, type Document } from 'mongoose';
import type { IQuotaWindow } from '@tubepulse/types';

export interface QuotaWindowDoc extends Document, IQuotaWindow {}

const QuotaWindowSchema = new Schema<QuotaWindowDoc>({
  windowStart: { type: Date, required: true, unique: true },
  windowEnd: { type: Date, required: true },
  callCount: { type: Number, required: true, default: 0 },
  limit: { type: Number, required: true }
}, { collection: 'quotaWindows', versionKey: false });

// Keep roughly a quarter of history for forecasting
QuotaWindowSchema.index({ windowEnd: 1 }, { expireAfterSeconds: 90 * 24 * 60 * 60 });

export const QuotaWindowModel = model<QuotaWindowDoc>('QuotaWindow', QuotaWindowSchema);
