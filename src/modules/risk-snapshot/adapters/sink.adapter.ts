/**
 * Output Sink Adapter
 *
 * Persists a finished snapshot. A sink never throws into the runner:
 * failures come back as { ok: false } and the computed snapshot stands.
 */

import type { RiskSnapshot, SinkWriteResult, SnapshotRecord } from '../contracts/snapshot.types.js';

export interface OutputSink {
  readonly name: string;
  write(snapshot: RiskSnapshot): Promise<SinkWriteResult>;
}

export interface SnapshotReader {
  /** Most recently written record, or null when nothing has been written */
  latest(): Promise<SnapshotRecord | null>;
}

export type SnapshotStore = OutputSink & SnapshotReader;
