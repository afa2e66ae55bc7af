/**
 * RISK SNAPSHOT MODULE — MongoDB Model
 *
 * Insert-only: a document is never updated once written.
 */

import mongoose, { Schema } from 'mongoose';
import type { SnapshotRecord } from '../contracts/snapshot.types.js';

const RiskSnapshotSchema = new Schema<SnapshotRecord>({
  snapshot_id: { type: String, required: true, unique: true, index: true },
  schema_version: { type: String, required: true },
  run_timestamp: { type: String, required: true },
  as_of: { type: String, required: true, index: true },
  complete: { type: Boolean, required: true },
  missing: [{ type: String }],
  values: { type: Schema.Types.Mixed, default: {} },
  signals: { type: Schema.Types.Mixed, default: {} },
  history: { type: Schema.Types.Mixed, default: {} },
  alerts: { type: Schema.Types.Mixed, default: [] },
}, {
  collection: 'risk_snapshots',
  versionKey: false,
  minimize: false,
});

RiskSnapshotSchema.index({ run_timestamp: -1 });

export const RiskSnapshotModel = mongoose.model<SnapshotRecord>('RiskSnapshot', RiskSnapshotSchema);
