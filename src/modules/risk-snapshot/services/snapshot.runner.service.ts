/**
 * SNAPSHOT RUNNER
 * ===============
 *
 * One scheduled run:
 *   RESOLVE_CATALOG → FETCH (fields ∥ chain, barrier) → COMPUTE → ASSEMBLE → WRITE
 *
 * At most one run is in flight; a trigger that arrives meanwhile is
 * skipped. Nothing survives a run except the snapshot handed to the sink.
 */

import { nanoid } from 'nanoid';
import { AppError, errorMessage } from '../../../common/errors.js';
import { createConsoleLogger, defaultClock, type Clock, type Logger } from '../../shared/runtime/host.deps.js';
import type { FieldCatalog, ResolvedMetricSet } from '../catalog/field.catalog.js';
import { mergeRequests } from '../catalog/field.catalog.js';
import type { EngineConfig } from '../contracts/engine.config.js';
import type { ChainSnapshot, ExpirationWindow, FetchResult } from '../contracts/market.types.js';
import type { RunOutcome, RunStepName, RunStepResult, SinkWriteResult } from '../contracts/snapshot.types.js';
import type { SnapshotFetcherAdapter } from '../adapters/fetcher.adapter.js';
import type { OutputSink } from '../adapters/sink.adapter.js';
import { addDays, toIsoDate } from '../engine/dates.js';
import { computeDerivedMetrics } from '../engine/derived.engine.js';
import { ObservationTable } from '../engine/table.js';
import { SnapshotAssembler } from './snapshot.assembler.js';

export interface SnapshotRunnerDeps {
  catalog: FieldCatalog;
  fetcher: SnapshotFetcherAdapter;
  sink: OutputSink;
  config: EngineConfig;
  logger?: Logger;
  clock?: Clock;
}

export interface RunRequest {
  /** Defaults to today's UTC date */
  asOf?: string;
  signal?: AbortSignal;
}

interface FetchedInputs {
  fields: FetchResult;
  chain: ChainSnapshot | null;
}

export class SnapshotRunnerService {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly assembler: SnapshotAssembler;
  private inFlight: { runId: string; controller: AbortController } | null = null;

  constructor(private readonly deps: SnapshotRunnerDeps) {
    this.logger = deps.logger ?? createConsoleLogger('RiskSnapshot');
    this.clock = deps.clock ?? defaultClock;
    this.assembler = new SnapshotAssembler({ catalog: deps.catalog, config: deps.config });
  }

  get runningRunId(): string | null {
    return this.inFlight?.runId ?? null;
  }

  /**
   * Abort the in-flight run. It finishes as CANCELLED and writes nothing.
   */
  cancel(): boolean {
    if (!this.inFlight) return false;
    this.inFlight.controller.abort();
    return true;
  }

  async run(req: RunRequest = {}): Promise<RunOutcome> {
    const runId = `run-${this.clock.now()}-${nanoid(6)}`;

    if (this.inFlight) {
      this.logger.warn({ runId, inFlightRunId: this.inFlight.runId }, 'Run already in flight, skipping');
      return { status: 'SKIPPED_OVERLAP', runId, inFlightRunId: this.inFlight.runId };
    }

    const controller = new AbortController();
    const forward = () => controller.abort();
    if (req.signal?.aborted) controller.abort();
    req.signal?.addEventListener('abort', forward, { once: true });
    this.inFlight = { runId, controller };

    try {
      return await this.execute(runId, req.asOf ?? toIsoDate(this.clock.utcNow()), controller.signal);
    } finally {
      // releases an adapter call left pending when its sibling failed
      controller.abort();
      req.signal?.removeEventListener('abort', forward);
      this.inFlight = null;
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // PIPELINE
  // ═══════════════════════════════════════════════════════════════

  private async execute(runId: string, asOf: string, signal: AbortSignal): Promise<RunOutcome> {
    const { catalog, config, sink } = this.deps;
    const startMs = this.clock.now();
    const runTimestamp = this.clock.utcNow().toISOString();
    const steps: RunStepResult[] = [];
    const elapsed = () => this.clock.now() - startMs;
    const cancelled = (): RunOutcome => {
      this.logger.warn({ runId, asOf }, 'Run cancelled');
      return { status: 'CANCELLED', runId, durationMs: elapsed(), steps };
    };

    this.logger.info({ runId, asOf, fetcher: this.deps.fetcher.name }, 'Snapshot run starting');

    try {
      const resolved = await this.runStep('RESOLVE_CATALOG', steps, () => catalog.resolveAll(config.activeMetrics, asOf), r => ({
        metrics: r.definitions.length,
        requests: r.requests.length,
        unknown: r.failures.map(f => f.metric),
      }));
      for (const failure of resolved.failures) {
        this.logger.warn({ runId, metric: failure.metric }, failure.message);
      }

      const fetched = await this.runStep('FETCH', steps, () => this.fetchInputs(resolved, asOf, signal), f => ({
        observations: f.fields.observations.length,
        unresolved: f.fields.unresolved.length,
        chainRows: f.chain?.rows.length ?? null,
      }));
      for (const u of fetched.fields.unresolved) {
        this.logger.warn({ runId, instrument: u.instrument, field: u.field, reason: u.reason }, 'Field unresolved');
      }

      if (signal.aborted) return cancelled();

      const derived = await this.runStep('COMPUTE', steps, () => computeDerivedMetrics({
        asOf,
        table: new ObservationTable(asOf, resolved.requests, fetched.fields.observations),
        chain: fetched.chain,
        definitions: resolved.definitions,
        requests: resolved.requests,
        config,
      }), d => ({ metrics: d.metrics.length }));

      const snapshot = await this.runStep('ASSEMBLE', steps, () => this.assembler.assemble({
        asOf,
        runTimestamp,
        observations: fetched.fields.observations,
        requests: resolved.requests,
        derived,
        failures: resolved.failures,
      }), s => ({ snapshotId: s.snapshotId, complete: s.complete, missing: s.missing.length }));

      if (signal.aborted) return cancelled();

      const write = await this.writeSnapshot(sink, steps, () => sink.write(snapshot));
      if (!write.ok) {
        this.logger.error({ runId, sink: sink.name, error: write.error }, 'Snapshot write failed');
      }

      const durationMs = elapsed();
      this.logger.info(
        { runId, snapshotId: snapshot.snapshotId, complete: snapshot.complete, missing: snapshot.missing, durationMs },
        'Snapshot published',
      );
      return { status: 'PUBLISHED', runId, durationMs, snapshot, write, steps };
    } catch (err) {
      if (signal.aborted) return cancelled();

      const code = err instanceof AppError ? err.code : 'INTERNAL_ERROR';
      this.logger.error({ runId, code, error: errorMessage(err) }, 'Snapshot run failed');
      return { status: 'FAILED', runId, durationMs: elapsed(), code, error: errorMessage(err), steps };
    }
  }

  /**
   * Field and chain fetches run concurrently; both settle before the
   * engine sees anything.
   */
  private async fetchInputs(resolved: ResolvedMetricSet, asOf: string, signal: AbortSignal): Promise<FetchedInputs> {
    const { fetcher, config } = this.deps;
    const merged = mergeRequests(resolved.requests);
    const underlying = resolved.definitions.find(d => d.chain !== undefined)?.chain?.underlying;
    const window: ExpirationWindow = {
      from: addDays(asOf, config.expirationWindowDays.min),
      to: addDays(asOf, config.expirationWindowDays.max),
    };

    const fieldsCall: Promise<FetchResult> = merged.length === 0
      ? Promise.resolve({ observations: [], unresolved: [] })
      : this.withTimeout('fields', signal, s => fetcher.fetch(merged, { signal: s }), () => ({
          observations: [],
          unresolved: merged.map(r => ({ instrument: r.instrument, field: r.field, params: r.params, reason: 'TIMEOUT' })),
        }));

    const chainCall: Promise<ChainSnapshot | null> = underlying
      ? this.withTimeout('chain', signal, s => fetcher.fetchChain(underlying, window, { signal: s }), () => null)
      : Promise.resolve(null);

    const [fields, chain] = await Promise.all([fieldsCall, chainCall]);
    return { fields, chain };
  }

  /**
   * Race an adapter call against the fetch timeout. On timeout the call
   * is aborted and the fallback stands in for its result.
   */
  private withTimeout<T>(
    label: string,
    parent: AbortSignal,
    fn: (signal: AbortSignal) => Promise<T>,
    onTimeout: () => T,
  ): Promise<T> {
    const timeoutMs = this.deps.config.fetchTimeoutMs;
    const controller = new AbortController();
    const forward = () => controller.abort();
    if (parent.aborted) controller.abort();
    parent.addEventListener('abort', forward, { once: true });

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.logger.warn({ call: label, timeoutMs }, 'Adapter call timed out');
        controller.abort();
        resolve(onTimeout());
      }, timeoutMs);

      const settle = () => {
        clearTimeout(timer);
        parent.removeEventListener('abort', forward);
      };

      fn(controller.signal).then(
        result => {
          settle();
          resolve(result);
        },
        err => {
          settle();
          reject(err);
        },
      );
    });
  }

  /**
   * Run a single step with timing
   */
  private async runStep<T>(
    name: RunStepName,
    steps: RunStepResult[],
    handler: () => T | Promise<T>,
    details?: (result: T) => Record<string, unknown>,
  ): Promise<T> {
    const startMs = this.clock.now();
    try {
      const result = await handler();
      steps.push({ name, ok: true, ms: this.clock.now() - startMs, details: details?.(result) });
      return result;
    } catch (err) {
      steps.push({ name, ok: false, ms: this.clock.now() - startMs, error: errorMessage(err) });
      throw err;
    }
  }

  /** A failed write is recorded but never fails the run */
  private async writeSnapshot(
    sink: OutputSink,
    steps: RunStepResult[],
    write: () => Promise<SinkWriteResult>,
  ): Promise<SinkWriteResult> {
    const startMs = this.clock.now();
    let result: SinkWriteResult;
    try {
      result = await write();
    } catch (err) {
      result = { ok: false, error: errorMessage(err) };
    }
    steps.push({
      name: 'WRITE',
      ok: result.ok,
      ms: this.clock.now() - startMs,
      details: { sink: sink.name, ...(result.ok ? { location: result.location } : {}) },
      ...(result.ok ? {} : { error: result.error }),
    });
    return result;
  }
}
