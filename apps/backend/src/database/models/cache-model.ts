import { Schema, model, type Document } from 'mongoose';
import type { ResourceKind } from '@tubepulse/types';
import { RESOURCE_KINDS } from '../../config/stats.js';

/**
 * Plain field interface for Cache documents.
 * Use this when working with raw collection reads to avoid type mismatches with Mongoose Document types.
 */
export interface CacheFields<T = unknown> {
  key: string;
  value: T;
  kind: ResourceKind;
  expiresAt: Date;
  updatedAt: Date;
}

/**
 * Mongoose document interface for Cache.
 */
export interface CacheDoc<T = unknown> extends Document, CacheFields<T> {}

const CacheSchema = new Schema<CacheDoc>({
  key: { type: String, required: true, unique: true },
  value: { type: Schema.Types.Mixed, required: true },
  kind: { type: String, required: true, enum: [...RESOURCE_KINDS] },
  expiresAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true }
}, { collection: 'caches', versionKey: false });

CacheSchema.index({ kind: 1, expiresAt: 1 });

export const CacheModel = model<CacheDoc>('Cache', CacheSchema);
