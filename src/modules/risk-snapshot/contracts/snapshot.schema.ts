/**
 * Runtime schema for stored snapshot records (file dumps, Mongo docs).
 */

import { z } from 'zod';
import { ALERT_TYPES, type SnapshotRecord } from './snapshot.types.js';

export const SnapshotRecordSchema = z.object({
  snapshot_id: z.string(),
  schema_version: z.string(),
  run_timestamp: z.string(),
  as_of: z.string(),
  complete: z.boolean(),
  missing: z.array(z.string()),
  values: z.record(z.number().nullable()),
  signals: z.record(z.union([z.string(), z.boolean()]).nullable()).default({}),
  history: z.record(z.array(z.object({ date: z.string(), value: z.number().nullable() }))).default({}),
  alerts: z.array(z.object({
    type: z.enum(ALERT_TYPES),
    severity: z.enum(['warning', 'critical']),
    message: z.string(),
  })).default([]),
});

export function parseSnapshotRecord(raw: unknown): SnapshotRecord | null {
  const parsed = SnapshotRecordSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
