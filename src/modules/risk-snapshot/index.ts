/**
 * RISK SNAPSHOT MODULE — Index
 */

import type { FastifyInstance } from 'fastify';
import { FieldCatalog } from './catalog/field.catalog.js';
import type { SnapshotFetcherAdapter } from './adapters/fetcher.adapter.js';
import type { SnapshotStore } from './adapters/sink.adapter.js';
import type { EngineConfig } from './contracts/engine.config.js';
import { SnapshotRunnerService } from './services/snapshot.runner.service.js';
import { registerRiskSnapshotRoutes } from './routes/risk_snapshot.routes.js';
import type { Clock, Logger } from '../shared/runtime/host.deps.js';

// Types
export * from './contracts/market.types.js';
export * from './contracts/metric.types.js';
export * from './contracts/snapshot.types.js';
export * from './contracts/engine.config.js';

// Catalog & engine
export { FieldCatalog, mergeRequests } from './catalog/field.catalog.js';
export { METRIC_DEFINITIONS, METRIC_NAMES } from './catalog/metric.registry.js';
export { computeDerivedMetrics } from './engine/derived.engine.js';

// Services
export { SnapshotAssembler, toOutputRecord } from './services/snapshot.assembler.js';
export { SnapshotRunnerService } from './services/snapshot.runner.service.js';

// Adapters
export type { FetchOptions, SnapshotFetcherAdapter } from './adapters/fetcher.adapter.js';
export type { OutputSink, SnapshotReader, SnapshotStore } from './adapters/sink.adapter.js';
export { HttpFetcherAdapter } from './adapters/http.fetcher.adapter.js';
export { StaticFetcherAdapter, loadStaticDataset } from './adapters/static.fetcher.adapter.js';
export { FileSnapshotSink } from './adapters/file.sink.js';
export { MongoSnapshotSink } from './adapters/mongo.sink.js';
export { MemorySnapshotSink } from './adapters/memory.sink.js';

export interface RiskSnapshotModuleDeps {
  config: EngineConfig;
  fetcher: SnapshotFetcherAdapter;
  store: SnapshotStore;
  logger?: Logger;
  clock?: Clock;
}

export interface RiskSnapshotModule {
  catalog: FieldCatalog;
  runner: SnapshotRunnerService;
  store: SnapshotStore;
}

/**
 * Validate the catalog and build the runner. Throws CatalogConflictError
 * before anything is scheduled.
 */
export function createRiskSnapshotModule(deps: RiskSnapshotModuleDeps): RiskSnapshotModule {
  const catalog = new FieldCatalog(deps.config);
  catalog.validate();

  const runner = new SnapshotRunnerService({
    catalog,
    fetcher: deps.fetcher,
    sink: deps.store,
    config: deps.config,
    logger: deps.logger,
    clock: deps.clock,
  });

  return { catalog, runner, store: deps.store };
}

/**
 * Register Risk Snapshot Routes
 */
export async function registerRiskSnapshotModule(app: FastifyInstance, mod: RiskSnapshotModule): Promise<void> {
  await registerRiskSnapshotRoutes(app, { runner: mod.runner, reader: mod.store, catalog: mod.catalog });
}
