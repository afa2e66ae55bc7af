import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { FieldCatalog } from '../catalog/field.catalog.js';
import { DEFAULT_ENGINE_CONFIG } from '../contracts/engine.config.js';
import { StaticFetcherAdapter, loadStaticDataset } from '../adapters/static.fetcher.adapter.js';
import { AS_OF, point, spxChain } from './fixtures.js';

const catalog = new FieldCatalog(DEFAULT_ENGINE_CONFIG);
const volSpread = catalog.resolve('vol_spread', AS_OF);

describe('StaticFetcherAdapter', () => {
  describe('fetch', () => {
    it('should serve only points inside the request window', async () => {
      const adapter = new StaticFetcherAdapter({
        observations: [
          point('SPX Index', 'IVOL_ATM', '2024-02-01', 18, { period: 30 }),
          point('SPX Index', 'IVOL_ATM', AS_OF, 16, { period: 30 }),
          point('SPX Index', 'REALIZED_VOL', AS_OF, 12, { period: 20 }),
        ],
        chains: [],
      });

      const result = await adapter.fetch(volSpread);

      expect(result.observations.map(o => [o.field, o.asOf])).toEqual([
        ['IVOL_ATM', AS_OF],
        ['REALIZED_VOL', AS_OF],
      ]);
      expect(result.unresolved).toEqual([]);
    });

    it('should report a key whose stored points all fall outside the window as NO_DATA', async () => {
      const adapter = new StaticFetcherAdapter({
        observations: [
          point('SPX Index', 'IVOL_ATM', '2020-06-01', 30, { period: 30 }),
          point('SPX Index', 'REALIZED_VOL', AS_OF, 12, { period: 20 }),
        ],
        chains: [],
      });

      const result = await adapter.fetch(volSpread);

      expect(result.observations).toHaveLength(1);
      expect(result.unresolved).toEqual([
        { instrument: 'SPX Index', field: 'IVOL_ATM', params: { period: 30 }, reason: 'NO_DATA' },
      ]);
    });

    it('should report a key the dataset never carries as UNKNOWN_FIELD', async () => {
      const adapter = new StaticFetcherAdapter({ observations: [], chains: [] });
      const result = await adapter.fetch(volSpread);

      expect(result.unresolved.map(u => u.reason)).toEqual(['UNKNOWN_FIELD', 'UNKNOWN_FIELD']);
    });
  });

  describe('fetchChain', () => {
    it('should pick the latest chain on or before the window start and trim expirations', async () => {
      const adapter = new StaticFetcherAdapter({
        observations: [],
        chains: [
          spxChain({ asOf: '2024-03-14', spot: 4990 }),
          spxChain(),
          spxChain({ asOf: '2024-03-18', spot: 5020 }),
        ],
      });

      const chain = await adapter.fetchChain('SPX Index', { from: AS_OF, to: '2024-03-29' });

      expect(chain?.asOf).toBe(AS_OF);
      expect(chain?.spot).toBe(5000);
      expect(chain?.rows.map(r => r.strike)).toEqual([5000, 4950, 5050, 4900]);
    });

    it('should return null for an underlying without chains', async () => {
      const adapter = new StaticFetcherAdapter({ observations: [], chains: [spxChain()] });
      expect(await adapter.fetchChain('NDX Index', { from: AS_OF, to: '2024-03-29' })).toBeNull();
    });
  });
});

describe('loadStaticDataset', () => {
  it('should read a dump and default absent collections', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'risk-replay-'));
    const file = path.join(dir, 'dump.json');
    await fs.writeFile(file, JSON.stringify({
      observations: [{ instrument: 'VIX Index', field: 'PX_LAST', asOf: AS_OF, value: 14 }],
    }), 'utf8');

    try {
      expect(await loadStaticDataset(file)).toEqual({
        observations: [{ instrument: 'VIX Index', field: 'PX_LAST', params: {}, asOf: AS_OF, value: 14 }],
        chains: [],
      });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
