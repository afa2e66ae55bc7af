import { errorMessage } from '../../../common/errors.js';
import { parseSnapshotRecord } from '../contracts/snapshot.schema.js';
import type { RiskSnapshot, SinkWriteResult, SnapshotRecord } from '../contracts/snapshot.types.js';
import { toOutputRecord } from '../services/snapshot.assembler.js';
import { RiskSnapshotModel } from '../storage/risk_snapshot.model.js';
import type { SnapshotStore } from './sink.adapter.js';

/**
 * Appends each snapshot to the risk_snapshots collection.
 */
export class MongoSnapshotSink implements SnapshotStore {
  readonly name = 'mongo';

  async write(snapshot: RiskSnapshot): Promise<SinkWriteResult> {
    try {
      await RiskSnapshotModel.create(toOutputRecord(snapshot));
      return { ok: true, location: `mongo:risk_snapshots/${snapshot.snapshotId}` };
    } catch (err) {
      return { ok: false, error: `mongo sink: ${errorMessage(err)}` };
    }
  }

  async latest(): Promise<SnapshotRecord | null> {
    const doc = await RiskSnapshotModel.findOne({}, { _id: 0 }).sort({ run_timestamp: -1 }).lean();
    return doc ? parseSnapshotRecord(doc) : null;
  }
}
