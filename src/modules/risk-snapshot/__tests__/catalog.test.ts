import { describe, it, expect } from 'vitest';
import { FieldCatalog, mergeRequests } from '../catalog/field.catalog.js';
import { METRIC_DEFINITIONS, type MetricDefinition } from '../catalog/metric.registry.js';
import { DEFAULT_ENGINE_CONFIG } from '../contracts/engine.config.js';
import { fieldKey } from '../contracts/market.types.js';
import { CatalogConflictError, UnknownMetricError } from '../../../common/errors.js';

const catalog = new FieldCatalog(DEFAULT_ENGINE_CONFIG);

describe('FieldCatalog', () => {
  describe('resolve', () => {
    it('should return ordered requests with absolute windows', () => {
      const requests = catalog.resolve('vol_surface', '2024-03-15');

      expect(requests.map(r => r.role)).toEqual(['call25', 'put25', 'atm', 'cboeSkew']);
      expect(requests[0]).toEqual({
        metric: 'vol_surface',
        role: 'call25',
        instrument: 'SPX Index',
        field: 'IVOL_DELTA_CALL',
        params: { delta: 25, period: 30 },
        window: { start: '2024-03-08', end: '2024-03-15' },
        fillPolicy: 'forward-fill',
        alias: 'spx_call_25d_iv',
      });
    });

    it('should use the lookback of the metric family', () => {
      const [debt] = catalog.resolve('margin_debt', '2024-03-15');
      expect(debt.window.start).toBe('2022-12-21');
    });

    it('should apply a global fill policy override', () => {
      const strict = new FieldCatalog({ ...DEFAULT_ENGINE_CONFIG, fillPolicy: 'none' });
      const policies = strict.resolve('put_call_ratio', '2024-03-15').map(r => r.fillPolicy);
      expect(policies).toEqual(['none', 'none', 'none']);
    });

    it('should throw UnknownMetricError for an unregistered name', () => {
      expect(() => catalog.resolve('vix_smile', '2024-03-15')).toThrow(UnknownMetricError);
    });
  });

  describe('resolveAll', () => {
    it('should fail only the unknown metric', () => {
      const resolved = catalog.resolveAll(['put_call_ratio', 'vix_smile'], '2024-03-15');

      expect(resolved.definitions.map(d => d.name)).toEqual(['put_call_ratio']);
      expect(resolved.requests).toHaveLength(3);
      expect(resolved.failures.map(f => f.metric)).toEqual(['vix_smile']);
    });
  });

  describe('validate', () => {
    it('should accept the built-in catalog', () => {
      expect(() => catalog.validate()).not.toThrow();
    });

    it('should reject an alias mapped to two different fields', () => {
      const defs: MetricDefinition[] = [
        METRIC_DEFINITIONS[1],
        {
          name: 'crowding',
          family: 'positioning',
          description: 'duplicate alias',
          fields: [{ role: 'x', instrument: 'NDX Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'vix' }],
          outputs: [],
        },
      ];
      const validate = () => new FieldCatalog(DEFAULT_ENGINE_CONFIG, defs).validate();
      expect(validate).toThrow(CatalogConflictError);
      expect(validate).toThrow('alias maps to both VIX Index|PX_LAST and NDX Index|PX_LAST');
    });

    it('should reject a derived output that shadows a raw alias', () => {
      const defs: MetricDefinition[] = [
        METRIC_DEFINITIONS[1],
        {
          name: 'vol_spread',
          family: 'volatility',
          description: 'shadowing output',
          fields: [],
          outputs: [{ name: 'vix_fut_1m', type: 'number' }],
        },
      ];
      expect(() => new FieldCatalog(DEFAULT_ENGINE_CONFIG, defs).validate()).toThrow(/vix_fut_1m/);
    });
  });

  it('should describe metrics with asset classes', () => {
    const listing = catalog.describe();
    const gex = listing.metrics.find(m => m.name === 'gex_profile');

    expect(listing.metrics).toHaveLength(8);
    expect(gex?.chain).toBe('SPX Index');
    expect(gex?.fields).toEqual([
      { alias: 'spx', instrument: 'SPX Index', assetClass: 'index', field: 'PX_LAST', optional: true },
    ]);
  });
});

describe('mergeRequests', () => {
  it('should issue one request per field key', () => {
    const requests = [
      ...catalog.resolve('vol_spread', '2024-03-15'),
      ...catalog.resolve('vol_surface', '2024-03-15'),
    ];
    expect(requests).toHaveLength(6);
    expect(mergeRequests(requests)).toHaveLength(5);
  });

  it('should widen the window to cover every caller', () => {
    const requests = [
      ...catalog.resolve('gex_profile', '2024-03-15'),
      ...catalog.resolve('crowding', '2024-03-15'),
    ];
    const spx = mergeRequests(requests).filter(r => fieldKey(r.instrument, r.field, r.params) === 'SPX Index|PX_LAST');
    expect(spx).toHaveLength(1);
    expect(spx[0].window).toEqual({ start: '2024-02-23', end: '2024-03-15' });
  });

  it('should key parameters independent of their order', () => {
    expect(fieldKey('SPX Index', 'IVOL_DELTA_CALL', { period: 30, delta: 25 }))
      .toBe('SPX Index|IVOL_DELTA_CALL(delta=25,period=30)');
  });
});
