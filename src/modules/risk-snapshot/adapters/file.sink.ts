/**
 * File Snapshot Sink
 *
 * Layout under the output directory:
 *   risk_snapshot_latest.json                    (replaced each run)
 *   archive/risk_snapshot_YYYYMMDD_HHMM.json     (one per run, UTC)
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../../../common/errors.js';
import { parseSnapshotRecord } from '../contracts/snapshot.schema.js';
import type { RiskSnapshot, SinkWriteResult, SnapshotRecord } from '../contracts/snapshot.types.js';
import { toOutputRecord } from '../services/snapshot.assembler.js';
import type { SnapshotStore } from './sink.adapter.js';

export const LATEST_FILE = 'risk_snapshot_latest.json';
export const ARCHIVE_DIR = 'archive';

export function archiveFileName(runTimestamp: string): string {
  const stamp = runTimestamp.slice(0, 16).replace(/[-:]/g, '').replace('T', '_');
  return `risk_snapshot_${stamp}.json`;
}

/** Readers see either the previous file or the complete new one */
async function writeAtomic(target: string, body: string, runTag: string): Promise<void> {
  const tmpPath = `${target}.${runTag}.tmp`;
  await fs.writeFile(tmpPath, body, 'utf8');
  await fs.rename(tmpPath, target);
}

export class FileSnapshotSink implements SnapshotStore {
  readonly name = 'file';

  constructor(private readonly outputDir: string) {}

  async write(snapshot: RiskSnapshot): Promise<SinkWriteResult> {
    const body = JSON.stringify(toOutputRecord(snapshot), null, 2);
    const archiveDir = path.join(this.outputDir, ARCHIVE_DIR);
    const latestPath = path.join(this.outputDir, LATEST_FILE);

    try {
      await fs.mkdir(archiveDir, { recursive: true });
      await writeAtomic(path.join(archiveDir, archiveFileName(snapshot.runTimestamp)), body, snapshot.snapshotId);
      await writeAtomic(latestPath, body, snapshot.snapshotId);
      return { ok: true, location: latestPath };
    } catch (err) {
      return { ok: false, error: `file sink: ${errorMessage(err)}` };
    }
  }

  async latest(): Promise<SnapshotRecord | null> {
    let text: string;
    try {
      text = await fs.readFile(path.join(this.outputDir, LATEST_FILE), 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
    return parseSnapshotRecord(JSON.parse(text));
  }
}
