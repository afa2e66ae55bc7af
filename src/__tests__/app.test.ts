/**
 * HTTP surface tests over Fastify inject
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import {
  AdapterUnavailableError,
} from '../common/errors.js';
import {
  DEFAULT_ENGINE_CONFIG,
  MemorySnapshotSink,
  StaticFetcherAdapter,
  createRiskSnapshotModule,
  type ChainSnapshot,
  type ExpirationWindow,
  type FetchResult,
  type FieldRequest,
  type RiskSnapshotModule,
  type SnapshotFetcherAdapter,
} from '../modules/risk-snapshot/index.js';
import {
  AS_OF,
  buildDataset,
  createMockLogger,
  fixedClock,
} from '../modules/risk-snapshot/__tests__/fixtures.js';

class GatedFetcher implements SnapshotFetcherAdapter {
  readonly name = 'gated';
  private open: () => void = () => undefined;
  private readonly gate = new Promise<void>(resolve => {
    this.open = resolve;
  });
  private readonly inner = new StaticFetcherAdapter(buildDataset());

  release(): void {
    this.open();
  }

  async fetch(requests: readonly FieldRequest[]): Promise<FetchResult> {
    await this.gate;
    return this.inner.fetch(requests);
  }

  fetchChain(underlying: string, window: ExpirationWindow): Promise<ChainSnapshot | null> {
    return this.inner.fetchChain(underlying, window);
  }
}

function createModule(fetcher: SnapshotFetcherAdapter = new StaticFetcherAdapter(buildDataset())): RiskSnapshotModule {
  return createRiskSnapshotModule({
    config: DEFAULT_ENGINE_CONFIG,
    fetcher,
    store: new MemorySnapshotSink(),
    logger: createMockLogger(),
    clock: fixedClock,
  });
}

describe('Risk snapshot routes', () => {
  let app: FastifyInstance;
  let mod: RiskSnapshotModule;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await app.close();
    vi.restoreAllMocks();
  });

  async function start(fetcher?: SnapshotFetcherAdapter): Promise<void> {
    mod = createModule(fetcher);
    app = buildApp({ riskSnapshot: mod, logger: false });
    await app.ready();
  }

  it('should report health with no run in flight', async () => {
    await start();
    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: 'risk-snapshot', runInFlight: null });
  });

  it('should return 404 before any snapshot is written', async () => {
    await start();
    const res = await app.inject({ method: 'GET', url: '/api/risk/snapshot/latest' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'No snapshot has been written yet' });
  });

  it('should run a snapshot on demand and serve it as latest', async () => {
    await start();

    const run = await app.inject({ method: 'POST', url: '/api/risk/snapshot/run', payload: { asOf: AS_OF } });
    expect(run.statusCode).toBe(200);
    const data = run.json().data;
    expect(data.status).toBe('PUBLISHED');
    expect(data.write.ok).toBe(true);
    expect(data.steps).toHaveLength(5);
    expect(data.snapshot.as_of).toBe(AS_OF);
    expect(data.snapshot.complete).toBe(true);
    expect(data.snapshot.values.ivol_rvol_spread).toBe(4);

    const latest = await app.inject({ method: 'GET', url: '/api/risk/snapshot/latest' });
    expect(latest.statusCode).toBe(200);
    expect(latest.json().data.snapshot_id).toBe(data.snapshot.snapshot_id);
  });

  it('should run for the clock date when no body is sent', async () => {
    await start();
    const res = await app.inject({ method: 'POST', url: '/api/risk/snapshot/run' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.snapshot.as_of).toBe(AS_OF);
  });

  it('should reject a malformed as-of date', async () => {
    await start();
    const res = await app.inject({ method: 'POST', url: '/api/risk/snapshot/run', payload: { asOf: '15/03/2024' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ ok: false, error: 'VALIDATION_ERROR', message: 'asOf must be YYYY-MM-DD' });
  });

  it('should answer 503 when the market-data source is down', async () => {
    await start({
      name: 'down',
      fetch: async () => {
        throw new AdapterUnavailableError('market-data-gateway', 'HTTP 502');
      },
      fetchChain: async () => null,
    });
    const res = await app.inject({ method: 'POST', url: '/api/risk/snapshot/run', payload: { asOf: AS_OF } });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ ok: false, error: 'ADAPTER_UNAVAILABLE', message: 'market-data-gateway: HTTP 502' });
  });

  it('should refuse an overlapping trigger and cancel the running one', async () => {
    const fetcher = new GatedFetcher();
    await start(fetcher);

    const first = app.inject({ method: 'POST', url: '/api/risk/snapshot/run', payload: { asOf: AS_OF } });
    await vi.waitFor(() => expect(mod.runner.runningRunId).not.toBeNull());
    const runId = mod.runner.runningRunId;

    const second = await app.inject({ method: 'POST', url: '/api/risk/snapshot/run', payload: { asOf: AS_OF } });
    expect(second.statusCode).toBe(409);
    expect(second.json()).toEqual({ ok: false, error: 'RUN_IN_FLIGHT', message: `Run ${runId} is still in flight` });

    const cancel = await app.inject({ method: 'POST', url: '/api/risk/snapshot/cancel' });
    expect(cancel.json()).toEqual({ ok: true, data: { runId } });

    fetcher.release();
    const res = await first;
    expect(res.statusCode).toBe(409);
    expect(res.json().error).toBe('CANCELLED');
  });

  it('should answer 404 to a cancel with nothing running', async () => {
    await start();
    const res = await app.inject({ method: 'POST', url: '/api/risk/snapshot/cancel' });

    expect(res.statusCode).toBe(404);
    expect(res.json().error).toBe('NO_RUN');
  });

  it('should list the metric catalog', async () => {
    await start();
    const res = await app.inject({ method: 'GET', url: '/api/risk/catalog' });
    const names: string[] = res.json().data.metrics.map((m: { name: string }) => m.name);

    expect(names).toEqual([
      'put_call_ratio',
      'vix_term_structure',
      'vol_spread',
      'vol_surface',
      'gex_profile',
      'margin_debt',
      'crowding',
      'financing',
    ]);
  });

  it('should render unknown routes in the error envelope', async () => {
    await start();
    const res = await app.inject({ method: 'GET', url: '/api/risk/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
