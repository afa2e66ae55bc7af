/**
 * One-shot snapshot run.
 *
 *   tsx scripts/run_snapshot.ts [--as-of YYYY-MM-DD] [--replay dump.json] [--out dir]
 *
 * --replay serves a stored dataset instead of calling the gateway.
 */

import 'dotenv/config';
import path from 'node:path';
import { buildEngineConfig, env } from '../src/config/env.js';
import { errorMessage } from '../src/common/errors.js';
import { createAxiosHttpClient } from '../src/modules/shared/runtime/host.deps.js';
import {
  FileSnapshotSink,
  HttpFetcherAdapter,
  StaticFetcherAdapter,
  createRiskSnapshotModule,
  loadStaticDataset,
  type SnapshotFetcherAdapter,
} from '../src/modules/risk-snapshot/index.js';
import { isIsoDate } from '../src/modules/risk-snapshot/engine/dates.js';

function argValue(name: string): string | undefined {
  const i = process.argv.indexOf(name);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

async function main() {
  const asOf = argValue('--as-of');
  const replay = argValue('--replay');
  const outDir = path.resolve(argValue('--out') ?? env.OUTPUT_DIR);

  if (asOf !== undefined && !isIsoDate(asOf)) {
    throw new Error(`--as-of must be YYYY-MM-DD, got "${asOf}"`);
  }

  const config = buildEngineConfig();
  let fetcher: SnapshotFetcherAdapter;
  if (replay) {
    fetcher = new StaticFetcherAdapter(await loadStaticDataset(path.resolve(replay)));
  } else if (env.MARKET_DATA_URL) {
    fetcher = new HttpFetcherAdapter(createAxiosHttpClient(env.MARKET_DATA_URL, env.MARKET_DATA_TOKEN), {
      timeoutMs: config.fetchTimeoutMs,
    });
  } else {
    throw new Error('Set MARKET_DATA_URL or pass --replay <file>');
  }

  const { runner } = createRiskSnapshotModule({ config, fetcher, store: new FileSnapshotSink(outDir) });
  const outcome = await runner.run({ asOf });

  for (const step of 'steps' in outcome ? outcome.steps : []) {
    console.log(`  ${step.ok ? '✓' : '✗'} ${step.name.padEnd(16)} ${step.ms}ms${step.error ? `  ${step.error}` : ''}`);
  }

  if (outcome.status !== 'PUBLISHED') {
    console.error(`[RiskSnapshot] Run ${outcome.runId}: ${outcome.status}${outcome.status === 'FAILED' ? ` (${outcome.error})` : ''}`);
    process.exit(1);
  }

  const { snapshot, write } = outcome;
  console.log(`[RiskSnapshot] ${snapshot.snapshotId} as of ${snapshot.asOf}: complete=${snapshot.complete}`);
  if (snapshot.missing.length > 0) console.log(`  missing: ${snapshot.missing.join(', ')}`);
  const composite = snapshot.values['leverage_composite'];
  if (composite !== undefined && composite !== null) {
    console.log(`  leverage composite ${composite.toFixed(2)}: ${String(snapshot.signals['leverage_regime'])}`);
  }
  for (const alert of snapshot.alerts) console.log(`  [${alert.severity}] ${alert.message}`);
  console.log(write.ok ? `  written to ${write.location}` : `  write failed: ${write.error}`);
}

main().catch(e => {
  console.error('Error:', errorMessage(e));
  process.exit(1);
});
