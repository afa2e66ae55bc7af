import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildEngineConfig, loadEnv } from '../config/env.js';
import { parseSchedule, startRiskSnapshotJob } from '../jobs/risk_snapshot.job.js';
import {
  DEFAULT_ENGINE_CONFIG,
  FieldCatalog,
  MemorySnapshotSink,
  SnapshotRunnerService,
  StaticFetcherAdapter,
} from '../modules/risk-snapshot/index.js';
import { buildDataset, createMockLogger, fixedClock } from '../modules/risk-snapshot/__tests__/fixtures.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadEnv', () => {
  it('should apply defaults', () => {
    const e = loadEnv({});

    expect(e.PORT).toBe(8001);
    expect(e.OUTPUT_DIR).toBe('data');
    expect(e.SNAPSHOT_CRON_ENABLED).toBe(true);
    expect(e.SNAPSHOT_TZ).toBe('America/New_York');
    expect(e.MARKET_DATA_URL).toBeUndefined();
  });

  it('should treat blank values as unset', () => {
    const e = loadEnv({ MARKET_DATA_URL: '', FILL_POLICY: '', MONGO_URL: '' });

    expect(e.MARKET_DATA_URL).toBeUndefined();
    expect(e.FILL_POLICY).toBeUndefined();
    expect(e.MONGO_URL).toBeUndefined();
  });

  it('should parse flags and numbers', () => {
    const e = loadEnv({ SNAPSHOT_CRON_ENABLED: '0', FETCH_TIMEOUT_MS: '5000', CROWDING_THRESHOLD_PP: '-3.5' });

    expect(e.SNAPSHOT_CRON_ENABLED).toBe(false);
    expect(e.FETCH_TIMEOUT_MS).toBe(5000);
    expect(e.CROWDING_THRESHOLD_PP).toBe(-3.5);
  });

  it('should name the offending variable', () => {
    expect(() => loadEnv({ PORT: 'eighty' })).toThrow(/Invalid environment: PORT/);
    expect(() => loadEnv({ MARKET_DATA_URL: 'not a url' })).toThrow(/MARKET_DATA_URL/);
  });
});

describe('buildEngineConfig', () => {
  it('should equal the defaults for an empty environment', () => {
    const config = buildEngineConfig(loadEnv({}));

    expect(config.activeMetrics).toEqual(DEFAULT_ENGINE_CONFIG.activeMetrics);
    expect(config.optionalMetrics).toEqual(['financing']);
    expect(config.fillPolicy).toBeUndefined();
    expect(config.crowdingThresholdPp).toBe(-2);
    expect(config.expirationWindowDays).toEqual({ min: 0, max: 14 });
    expect(config.fetchTimeoutMs).toBe(30_000);
  });

  it('should apply overrides', () => {
    const config = buildEngineConfig(loadEnv({
      ACTIVE_METRICS: 'vol_spread, crowding',
      OPTIONAL_METRICS: '',
      FILL_POLICY: 'none',
      NEAR_TERM_MAX_DTE: '7',
    }));

    expect(config.activeMetrics).toEqual(['vol_spread', 'crowding']);
    expect(config.optionalMetrics).toEqual(['financing']);
    expect(config.fillPolicy).toBe('none');
    expect(config.expirationWindowDays).toEqual({ min: 0, max: 7 });
    expect(config.lookbackDays).toEqual(DEFAULT_ENGINE_CONFIG.lookbackDays);
  });
});

describe('snapshot schedule', () => {
  it('should split several expressions', () => {
    expect(parseSchedule('0 6 * * 1-5; 15 16 * * 1-5;')).toEqual(['0 6 * * 1-5', '15 16 * * 1-5']);
  });

  it('should reject an invalid expression', () => {
    expect(() => parseSchedule('0 6 * * 1-5;every morning')).toThrow('Invalid cron expression: "every morning"');
  });

  it('should start and stop one task per expression', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const runner = new SnapshotRunnerService({
      catalog: new FieldCatalog(DEFAULT_ENGINE_CONFIG),
      fetcher: new StaticFetcherAdapter(buildDataset()),
      sink: new MemorySnapshotSink(),
      config: DEFAULT_ENGINE_CONFIG,
      logger: createMockLogger(),
      clock: fixedClock,
    });

    const job = startRiskSnapshotJob(runner, { schedule: '0 6 * * 1-5;0 12 * * 1-5', timezone: 'America/New_York' });

    expect(job.expressions).toHaveLength(2);
    job.stop();
    expect(console.log).toHaveBeenCalledWith('[RiskSnapshot] Cron started (0 6 * * 1-5 | 0 12 * * 1-5, America/New_York)');
  });
});
