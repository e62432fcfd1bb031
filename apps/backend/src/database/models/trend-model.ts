import { Schema, model, type Document } from 'mongoose';
import type { ITrend } from '@tubepulse/types';

export interface TrendDoc extends Document, ITrend {}

const TrendSchema = new Schema<TrendDoc>({
  entityType: { type: String, required: true, enum: ['channel', 'video'] },
  entityId: { type: String, required: true },
  windowDays: { type: Number, required: true },
  fromDate: { type: String, required: true },
  toDate: { type: String, required: true },
  deltaViewCount: { type: Number, required: true },
  deltaLikeCount: { type: Number, required: true },
  deltaCommentCount: { type: Number, required: true },
  deltaSubscriberCount: { type: Number, default: null },
  viewGrowthPercent: { type: Number, required: true },
  computedAt: { type: Date, required: true }
}, { collection: 'trends', versionKey: false });

TrendSchema.index({ entityId: 1, windowDays: 1 }, { unique: true });

export const TrendModel = model<TrendDoc>('Trend', TrendSchema);
