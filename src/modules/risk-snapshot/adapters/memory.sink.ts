import { toOutputRecord } from '../services/snapshot.assembler.js';
import type { RiskSnapshot, SinkWriteResult, SnapshotRecord } from '../contracts/snapshot.types.js';
import type { SnapshotStore } from './sink.adapter.js';

/**
 * Keeps written snapshots in process. Used when no output directory or
 * database is configured, and in tests.
 */
export class MemorySnapshotSink implements SnapshotStore {
  readonly name = 'memory';
  readonly written: RiskSnapshot[] = [];

  async write(snapshot: RiskSnapshot): Promise<SinkWriteResult> {
    this.written.push(snapshot);
    return { ok: true, location: `memory:${snapshot.snapshotId}` };
  }

  async latest(): Promise<SnapshotRecord | null> {
    const last = this.written[this.written.length - 1];
    return last ? toOutputRecord(last) : null;
  }
}
