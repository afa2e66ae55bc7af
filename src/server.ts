/**
 * Risk Snapshot Engine — Server Entry Point
 */

import 'dotenv/config';
import path from 'node:path';
import { buildApp } from './app.js';
import { buildEngineConfig, env } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { startRiskSnapshotJob, type RiskSnapshotJobHandle } from './jobs/risk_snapshot.job.js';
import { createAxiosHttpClient } from './modules/shared/runtime/host.deps.js';
import {
  FileSnapshotSink,
  HttpFetcherAdapter,
  MongoSnapshotSink,
  createRiskSnapshotModule,
  type SnapshotStore,
} from './modules/risk-snapshot/index.js';
import { errorMessage } from './common/errors.js';

async function main() {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  RISK SNAPSHOT ENGINE');
  console.log('═══════════════════════════════════════════════════════════════');

  if (!env.MARKET_DATA_URL) {
    throw new Error('[Server] MARKET_DATA_URL is required');
  }

  let store: SnapshotStore;
  if (env.MONGO_URL) {
    console.log('[Server] Connecting to MongoDB...');
    await connectMongo(env.MONGO_URL);
    store = new MongoSnapshotSink();
  } else {
    store = new FileSnapshotSink(path.resolve(env.OUTPUT_DIR));
  }

  const config = buildEngineConfig();
  const fetcher = new HttpFetcherAdapter(
    createAxiosHttpClient(env.MARKET_DATA_URL, env.MARKET_DATA_TOKEN),
    { timeoutMs: config.fetchTimeoutMs },
  );
  const riskSnapshot = createRiskSnapshotModule({ config, fetcher, store });
  console.log(`[Server] Catalog validated: ${config.activeMetrics.length} active metrics, sink=${store.name}`);

  const app = buildApp({ riskSnapshot });

  let job: RiskSnapshotJobHandle | null = null;
  if (env.SNAPSHOT_CRON_ENABLED) {
    job = startRiskSnapshotJob(riskSnapshot.runner, { schedule: env.SNAPSHOT_CRON, timezone: env.SNAPSHOT_TZ });
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Server] Received ${signal}, shutting down...`);
    job?.stop();
    riskSnapshot.runner.cancel();
    await app.close();
    await disconnectMongo();
    console.log('[Server] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[Server] ✅ Listening on ${env.HOST}:${env.PORT}`);
  console.log('  GET  /api/health');
  console.log('  GET  /api/risk/snapshot/latest');
  console.log('  POST /api/risk/snapshot/run');
  console.log('  POST /api/risk/snapshot/cancel');
  console.log('  GET  /api/risk/catalog');
}

main().catch(err => {
  console.error('[Server] Fatal:', errorMessage(err));
  process.exit(1);
});
