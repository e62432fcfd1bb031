import { Schema, model, type Document } from 'mongoose';
import type { IDailyAggregate } from '@tubepulse/types';

export interface DailyAggregateDoc extends Document, IDailyAggregate {}

const DailyAggregateSchema = new Schema<DailyAggregateDoc>({
  entityId: { type: String, required: true },
  entityType: { type: String, required: true, enum: ['channel', 'video'] },
  date: { type: String, required: true },
  viewCount: { type: Number, required: true },
  likeCount: { type: Number, required: true },
  commentCount: { type: Number, required: true },
  subscriberCount: { type: Number, default: null },
  deltaViewCount: { type: Number, default: null },
  deltaLikeCount: { type: Number, default: null },
  deltaCommentCount: { type: Number, default: null },
  deltaSubscriberCount: { type: Number, default: null },
  baselineDate: { type: String, default: null },
  snapshotCount: { type: Number, required: true },
  closed: { type: Boolean, required: true },
  computedAt: { type: Date, required: true }
}, { collection: 'dailyAggregates', versionKey: false });

DailyAggregateSchema.index({ entityId: 1, date: 1 }, { unique: true });
DailyAggregateSchema.index({ date: 1 });

export const DailyAggregateModel = model<DailyAggregateDoc>('DailyAggregate', DailyAggregateSchema);
