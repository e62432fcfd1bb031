import { Schema, model, type Document } from 'mongoose';
import type { ITrackedEntity } from '@tubepulse/types';

export interface TrackedEntityDoc extends Document, ITrackedEntity {}

const TrackedEntitySchema = new Schema<TrackedEntityDoc>({
  entityId: { type: String, required: true, unique: true },
  entityType: { type: String, required: true, enum: ['channel', 'video'] },
  displayName: { type: String, required: true },
  platform: { type: String, required: true, default: 'youtube' },
  handle: { type: String },
  active: { type: Boolean, required: true, default: true },
  createdAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true }
}, { collection: 'trackedEntities', versionKey: false });

TrackedEntitySchema.index({ active: 1 });

export const TrackedEntityModel = model<TrackedEntityDoc>('TrackedEntity', TrackedEntitySchema);
