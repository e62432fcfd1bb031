import { Schema, model, type Document } from 'mongoose';
import type { ISnapshot } from '@tubepulse/types';

/**
 * Stored snapshot. `sequence` is a per-entity counter assigned at write time;
 * it orders snapshots the same way as `capturedAt` and gives range reads a
 * stable cursor when several snapshots share a timestamp.
 */
export interface SnapshotFields extends ISnapshot {
  sequence: number;
}

export interface SnapshotDoc extends Document, SnapshotFields {}

const SnapshotSchema = new Schema<SnapshotDoc>({
  entityId: { type: String, required: true },
  entityType: { type: String, required: true, enum: ['channel', 'video'] },
  capturedAt: { type: Date, required: true },
  sequence: { type: Number, required: true },
  viewCount: { type: Number, required: true, min: 0 },
  likeCount: { type: Number, required: true, min: 0 },
  commentCount: { type: Number, required: true, min: 0 },
  subscriberCount: { type: Number, min: 0 },
  videoCount: { type: Number, min: 0 }
}, { collection: 'snapshots', versionKey: false });

SnapshotSchema.index({ entityId: 1, sequence: 1 }, { unique: true });
SnapshotSchema.index({ entityId: 1, capturedAt: 1 });
SnapshotSchema.index({ capturedAt: 1 });

export const SnapshotModel = model<SnapshotDoc>('Snapshot', SnapshotSchema);
