/**
 * Synthetic market data for a run as of Friday 2024-03-15.
 */

import { vi } from 'vitest';
import type { Clock, Logger } from '../../shared/runtime/host.deps.js';
import type {
  ChainSnapshot,
  FieldParams,
  OptionChainRow,
  RawObservation,
} from '../contracts/market.types.js';
import type { StaticDataset } from '../adapters/static.fetcher.adapter.js';
import { eachDay } from '../engine/dates.js';

export const AS_OF = '2024-03-15';
export const RUN_TS = '2024-03-15T14:00:00.000Z';

export const createMockLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

export const fixedClock: Clock = {
  now: () => Date.parse(RUN_TS),
  utcNow: () => new Date(RUN_TS),
};

export function series(
  instrument: string,
  field: string,
  start: string,
  end: string,
  value: (date: string) => number | null,
  params: FieldParams = {},
): RawObservation[] {
  return eachDay(start, end).map(date => ({ instrument, field, params, asOf: date, value: value(date) }));
}

export function point(instrument: string, field: string, asOf: string, value: number | null, params: FieldParams = {}): RawObservation {
  return { instrument, field, params, asOf, value };
}

export function row(
  strike: number,
  optionType: 'call' | 'put',
  gamma: number | null,
  openInterest: number | null,
  extra: Partial<OptionChainRow> = {},
): OptionChainRow {
  return {
    instrument: 'SPX Index',
    expiration: '2024-03-22',
    strike,
    optionType,
    gamma,
    openInterest,
    volume: null,
    lastPrice: null,
    daysToExpiration: 7,
    ...extra,
  };
}

/**
 * Near-term SPX chain, spot 5000.
 *
 *   strike  side  gex
 *   4900    put   -750,000
 *   4950    put   -1,000,000   (0DTE)
 *   5000    call  +1,000,000   (0DTE)
 *   5050    call  +1,500,000
 *
 * Cumulative: -750k, -1.75M, -750k, +750k → flip at 5050, total 750k.
 */
export function spxChain(overrides: Partial<ChainSnapshot> = {}): ChainSnapshot {
  return {
    underlying: 'SPX Index',
    asOf: AS_OF,
    spot: 5000,
    rows: [
      row(5000, 'call', 0.002, 1000, { expiration: AS_OF, daysToExpiration: 0, volume: 6000 }),
      row(4950, 'put', 0.001, 2000, { expiration: AS_OF, daysToExpiration: 0, volume: 3000 }),
      row(5050, 'call', 0.003, 1000, { volume: 4000 }),
      row(4900, 'put', 0.0005, 3000, { volume: 2000 }),
      row(5200, 'call', 0.004, 5000, { expiration: '2024-05-17', daysToExpiration: 63, volume: 9000 }),
    ],
    ...overrides,
  };
}

export interface DatasetOptions {
  withFinancing?: boolean;
  withSkewIndex?: boolean;
  withChain?: boolean;
}

export function buildDataset(options: DatasetOptions = {}): StaticDataset {
  const { withFinancing = true, withSkewIndex = true, withChain = true } = options;
  const observations: RawObservation[] = [
    // sentiment
    ...series('PCUSEQTR Index', 'PX_LAST', '2024-01-20', AS_OF, () => 0.65),
    ...series('PCUSIDXT Index', 'PX_LAST', '2024-01-20', AS_OF, () => 1.1),
    ...series('PCUSTOTT Index', 'PX_LAST', '2024-01-20', AS_OF, () => 0.8),

    // VIX curve
    point('VIX Index', 'PX_LAST', AS_OF, 14),
    point('UX1 Index', 'PX_LAST', AS_OF, 15),
    point('UX2 Index', 'PX_LAST', AS_OF, 16),
    point('UX3 Index', 'PX_LAST', AS_OF, 17),
    point('UX4 Index', 'PX_LAST', AS_OF, 18),

    // SPX vol surface
    point('SPX Index', 'IVOL_ATM', AS_OF, 16, { period: 30 }),
    point('SPX Index', 'REALIZED_VOL', AS_OF, 12, { period: 20 }),
    point('SPX Index', 'IVOL_DELTA_CALL', AS_OF, 13, { delta: 25, period: 30 }),
    point('SPX Index', 'IVOL_DELTA_PUT', AS_OF, 21, { period: 30, delta: 25 }),
    ...(withSkewIndex ? [point('SKEW Index', 'PX_LAST', AS_OF, 140)] : []),

    // positioning: basket drops 6% on the last day, SPX flat
    ...series('SPX Index', 'PX_LAST', '2024-02-20', AS_OF, () => 5000),
    ...series('GSTHHFML Index', 'PX_LAST', '2024-02-20', AS_OF, d => (d === AS_OF ? 94 : 100)),

    // leverage: monthly margin debt, comparator is the Feb 2023 print
    point('FINRMRGD Index', 'PX_LAST', '2023-01-31', 690e9),
    point('FINRMRGD Index', 'PX_LAST', '2023-02-28', 700e9),
    point('FINRMRGD Index', 'PX_LAST', '2023-03-31', 720e9),
    point('FINRMRGD Index', 'PX_LAST', '2024-02-29', 875e9),
    point('SPX Index', 'CUR_MKT_CAP', AS_OF, 45e12),
    point('GDP CUR$ Index', 'PX_LAST', '2023-12-31', 28e12),
  ];

  if (withFinancing) {
    observations.push(
      ...series('BAMLHYSP Index', 'PX_LAST', '2024-01-30', AS_OF, d => (d < '2024-03-02' ? 3.5 : 3.2)),
      ...series('GSUSFCI Index', 'PX_LAST', '2024-01-30', AS_OF, d => (d < '2024-03-02' ? 100 : 100.5)),
    );
  }

  return { observations, chains: withChain ? [spxChain()] : [] };
}
