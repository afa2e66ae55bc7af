/**
 * METRIC REGISTRY
 *
 * Static table: which raw fields each metric needs, from which
 * instruments, and which outputs it produces. Never mutated at runtime.
 */

import type { FieldParams, FillPolicy } from '../contracts/market.types.js';
import type { LookbackFamily } from '../contracts/engine.config.js';

// ═══════════════════════════════════════════════════════════════
// DEFINITION TYPES
// ═══════════════════════════════════════════════════════════════

export const METRIC_NAMES = [
  'put_call_ratio',
  'vix_term_structure',
  'vol_spread',
  'vol_surface',
  'gex_profile',
  'margin_debt',
  'crowding',
  'financing',
] as const;

export type MetricName = typeof METRIC_NAMES[number];

export interface FieldSpec {
  role: string;
  instrument: string;
  field: string;
  params?: FieldParams;
  fillPolicy: FillPolicy;
  alias: string;
  /** A missing optional field does not clear completeness */
  optional?: boolean;
}

export interface OutputSpec {
  name: string;
  type: 'number' | 'signal';
}

export interface MetricDefinition {
  name: MetricName;
  family: LookbackFamily;
  description: string;
  fields: FieldSpec[];
  chain?: { underlying: string };
  outputs: OutputSpec[];
  /** Aliases whose daily forward-filled series go into snapshot history */
  history?: string[];
}

const num = (name: string): OutputSpec => ({ name, type: 'number' });
const sig = (name: string): OutputSpec => ({ name, type: 'signal' });

// ═══════════════════════════════════════════════════════════════
// DEFINITIONS
// ═══════════════════════════════════════════════════════════════

export const METRIC_DEFINITIONS: readonly MetricDefinition[] = [
  {
    name: 'put_call_ratio',
    family: 'sentiment',
    description: 'CBOE put/call ratios, forward-filled history and equity moving averages',
    fields: [
      { role: 'equity', instrument: 'PCUSEQTR Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'pcr_equity' },
      { role: 'index', instrument: 'PCUSIDXT Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'pcr_index' },
      { role: 'total', instrument: 'PCUSTOTT Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'pcr_total' },
    ],
    outputs: [num('pcr_equity_5d_ma'), num('pcr_equity_20d_ma'), sig('pcr_signal')],
    history: ['pcr_equity', 'pcr_index', 'pcr_total'],
  },
  {
    name: 'vix_term_structure',
    family: 'volatility',
    description: 'VIX spot and front four futures: curve shape and front-month contango',
    fields: [
      { role: 'spot', instrument: 'VIX Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'vix' },
      { role: 'm1', instrument: 'UX1 Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'vix_fut_1m' },
      { role: 'm2', instrument: 'UX2 Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'vix_fut_2m' },
      { role: 'm3', instrument: 'UX3 Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'vix_fut_3m' },
      { role: 'm4', instrument: 'UX4 Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'vix_fut_4m' },
    ],
    outputs: [sig('vix_term_structure'), num('vix_contango_pct')],
  },
  {
    name: 'vol_spread',
    family: 'volatility',
    description: '30d ATM implied vol minus 20d realized vol',
    fields: [
      { role: 'ivol', instrument: 'SPX Index', field: 'IVOL_ATM', params: { period: 30 }, fillPolicy: 'forward-fill', alias: 'spx_ivol_atm_30d' },
      { role: 'rvol', instrument: 'SPX Index', field: 'REALIZED_VOL', params: { period: 20 }, fillPolicy: 'forward-fill', alias: 'spx_rvol_20d' },
    ],
    outputs: [num('ivol_rvol_spread')],
  },
  {
    name: 'vol_surface',
    family: 'volatility',
    description: '25-delta risk reversal and put skew over ATM',
    fields: [
      { role: 'call25', instrument: 'SPX Index', field: 'IVOL_DELTA_CALL', params: { delta: 25, period: 30 }, fillPolicy: 'forward-fill', alias: 'spx_call_25d_iv' },
      { role: 'put25', instrument: 'SPX Index', field: 'IVOL_DELTA_PUT', params: { delta: 25, period: 30 }, fillPolicy: 'forward-fill', alias: 'spx_put_25d_iv' },
      { role: 'atm', instrument: 'SPX Index', field: 'IVOL_ATM', params: { period: 30 }, fillPolicy: 'forward-fill', alias: 'spx_ivol_atm_30d' },
      { role: 'cboeSkew', instrument: 'SKEW Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'cboe_skew', optional: true },
    ],
    outputs: [num('risk_reversal_25d'), num('skew_25d'), sig('skew_signal')],
  },
  {
    name: 'gex_profile',
    family: 'volatility',
    description: 'Dealer gamma exposure by strike, walls, flip point and 0DTE share',
    fields: [
      { role: 'spot', instrument: 'SPX Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'spx', optional: true },
    ],
    chain: { underlying: 'SPX Index' },
    outputs: [
      num('gex_total'),
      num('gex_call_wall'),
      num('gex_put_wall'),
      num('gex_flip_point'),
      num('gex_0dte_total'),
      num('zero_dte_call_volume_pct'),
      num('zero_dte_put_volume_pct'),
      num('chain_pc_volume_ratio'),
      sig('gex_signal'),
    ],
  },
  {
    name: 'margin_debt',
    family: 'leverage',
    description: 'FINRA margin debt YoY and relative to market cap and GDP',
    fields: [
      { role: 'debt', instrument: 'FINRMRGD Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'finra_margin_debt' },
      { role: 'mktcap', instrument: 'SPX Index', field: 'CUR_MKT_CAP', fillPolicy: 'forward-fill', alias: 'spx_mktcap' },
      { role: 'gdp', instrument: 'GDP CUR$ Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'us_gdp' },
    ],
    outputs: [num('margin_debt_yoy'), num('margin_debt_to_mktcap'), num('margin_debt_to_gdp')],
  },
  {
    name: 'crowding',
    family: 'positioning',
    description: 'Crowded-longs basket versus SPX over the return window',
    fields: [
      { role: 'basket', instrument: 'GSTHHFML Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'gs_hf_crowded_longs' },
      { role: 'spx', instrument: 'SPX Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'spx' },
    ],
    outputs: [num('basket_return_5d'), num('spx_return_5d'), num('crowding_divergence_pp'), sig('degrossing')],
  },
  {
    name: 'financing',
    family: 'financing',
    description: 'HY spread and financial conditions 30-day change',
    fields: [
      { role: 'hyOas', instrument: 'BAMLHYSP Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'hy_oas' },
      { role: 'fci', instrument: 'GSUSFCI Index', field: 'PX_LAST', fillPolicy: 'forward-fill', alias: 'gs_fci' },
    ],
    outputs: [num('hy_oas_30d_change'), num('fci_30d_change'), sig('hy_spread_direction'), sig('fci_direction')],
  },
];
