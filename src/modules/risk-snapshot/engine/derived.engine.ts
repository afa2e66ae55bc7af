/**
 * DERIVED METRICS ENGINE
 *
 * Composes the per-family computations over one run's observation table
 * and chain snapshot. Pure: the same table, chain and config always give
 * the same metrics in the same order.
 */

import type { EngineConfig } from '../contracts/engine.config.js';
import {
  chainRowId,
  fieldKey,
  type ChainSnapshot,
  type FieldRequest,
} from '../contracts/market.types.js';
import {
  missingInput,
  outcomeValue,
  undefinedOutcome,
  valueOf,
  type DerivedMetric,
  type DerivedResult,
  type MetricOutcome,
  type SeriesPoint,
  type SignalValue,
} from '../contracts/metric.types.js';
import type { MetricDefinition, MetricName } from '../catalog/metric.registry.js';
import { addDays, addMonths } from './dates.js';
import { ObservationTable, type ObservationRef } from './table.js';
import {
  crowdingDivergence,
  onSharedDates,
  periodReturnPct,
  type CrowdingSignal,
} from './crowding.metrics.js';
import { changeOver, conditionsDirection, spreadDirection } from './financing.metrics.js';
import { chainVolume, computeGexProfile, isolateZeroDte } from './gex.metrics.js';
import { marginDebtToGdp, marginDebtToMarketCap, marginDebtYoy } from './leverage.metrics.js';
import { safeRatio } from './numeric.js';
import { movingAverage } from './pcr.metrics.js';
import { classifyGexSignal, classifyPcSignal, classifySkewSignal } from './signals.js';
import {
  classifyTermStructure,
  contangoPct,
  ivolRealizedSpread,
  riskReversal25d,
  skew25d,
} from './vol.metrics.js';

export interface EngineInput {
  asOf: string;
  table: ObservationTable;
  chain: ChainSnapshot | null;
  definitions: readonly MetricDefinition[];
  /** Requests as resolved per metric (before merging) */
  requests: readonly FieldRequest[];
  config: EngineConfig;
}

// ═══════════════════════════════════════════════════════════════
// METRIC CONTEXT
// ═══════════════════════════════════════════════════════════════

class MetricContext {
  readonly history: Record<string, SeriesPoint[]> = {};
  private readonly byRole: Map<string, FieldRequest>;

  constructor(
    readonly def: MetricDefinition,
    readonly asOf: string,
    readonly table: ObservationTable,
    readonly chain: ChainSnapshot | null,
    readonly config: EngineConfig,
    requests: readonly FieldRequest[],
  ) {
    this.byRole = new Map(requests.filter(r => r.metric === def.name).map(r => [r.role, r]));
  }

  latest(role: string, at?: string): ObservationRef | null {
    const req = this.byRole.get(role);
    if (!req) return null;
    return this.table.latest(fieldKey(req.instrument, req.field, req.params), req.fillPolicy, at);
  }

  present(role: string): ObservationRef[] {
    const req = this.byRole.get(role);
    if (!req) return [];
    return this.table.present(fieldKey(req.instrument, req.field, req.params));
  }

  daily(role: string): SeriesPoint[] {
    const req = this.byRole.get(role);
    if (!req) return [];
    return this.table.daily(fieldKey(req.instrument, req.field, req.params), req.fillPolicy);
  }

  alias(role: string): string {
    return this.byRole.get(role)?.alias ?? role;
  }

  aliasRoles(): Array<[string, string]> {
    return Array.from(this.byRole.values()).map(r => [r.alias, r.role]);
  }

  number(name: string, outcome: MetricOutcome<number>, provenance: Array<string | undefined>): DerivedMetric {
    return { ...this.base(name, provenance), type: 'number', outcome };
  }

  signal(name: string, outcome: MetricOutcome<SignalValue>, provenance: Array<string | undefined>): DerivedMetric {
    return { ...this.base(name, provenance), type: 'signal', outcome };
  }

  private base(name: string, provenance: Array<string | undefined>) {
    const instruments = new Set(this.def.fields.map(f => f.instrument));
    if (this.def.chain) instruments.add(this.def.chain.underlying);
    return {
      name,
      metric: this.def.name,
      instruments: Array.from(instruments),
      asOf: this.asOf,
      provenance: provenance.filter((id): id is string => id !== undefined),
    };
  }
}

const ids = (refs: Array<ObservationRef | null>): Array<string | undefined> => refs.map(r => r?.id);

// ═══════════════════════════════════════════════════════════════
// PER-METRIC COMPUTATIONS
// ═══════════════════════════════════════════════════════════════

function putCallRatio(ctx: MetricContext): DerivedMetric[] {
  const equity = ctx.present('equity');
  const values = equity.map(o => o.value);
  const ma5 = movingAverage(values, 5, 'pcr_equity');
  const ma20 = movingAverage(values, 20, 'pcr_equity');

  const current = ctx.latest('equity');
  const signal = classifyPcSignal(outcomeValue(ma5) ?? current?.value ?? null, ctx.config.alerts);

  for (const alias of ctx.def.history ?? []) {
    const role = ctx.aliasRoles().find(([a]) => a === alias)?.[1];
    if (role) ctx.history[alias] = ctx.daily(role);
  }

  return [
    ctx.number('pcr_equity_5d_ma', ma5, equity.slice(-5).map(o => o.id)),
    ctx.number('pcr_equity_20d_ma', ma20, equity.slice(-20).map(o => o.id)),
    ctx.signal('pcr_signal', signal, ma5.kind === 'VALUE' ? equity.slice(-5).map(o => o.id) : ids([current])),
  ];
}

function vixTermStructure(ctx: MetricContext): DerivedMetric[] {
  const roles = ['spot', 'm1', 'm2', 'm3', 'm4'];
  const refs = roles.map(r => ctx.latest(r));
  const curve = roles.map((r, i) => ({ label: ctx.alias(r), value: refs[i]?.value ?? null }));

  return [
    ctx.signal('vix_term_structure', classifyTermStructure(curve), ids(refs)),
    ctx.number('vix_contango_pct', contangoPct(curve[0].value, curve[1].value), ids(refs.slice(0, 2))),
  ];
}

function volSpread(ctx: MetricContext): DerivedMetric[] {
  const ivol = ctx.latest('ivol');
  const rvol = ctx.latest('rvol');
  return [
    ctx.number('ivol_rvol_spread', ivolRealizedSpread(ivol?.value ?? null, rvol?.value ?? null), ids([ivol, rvol])),
  ];
}

function volSurface(ctx: MetricContext): DerivedMetric[] {
  const call25 = ctx.latest('call25');
  const put25 = ctx.latest('put25');
  const atm = ctx.latest('atm');
  const quotes = { call25, put25, atm };
  const cboe = ctx.latest('cboeSkew');

  return [
    ctx.number('risk_reversal_25d', riskReversal25d(quotes), ids([call25, put25, atm])),
    ctx.number('skew_25d', skew25d(quotes), ids([call25, put25, atm])),
    ctx.signal('skew_signal', classifySkewSignal(cboe?.value ?? null, ctx.config.alerts), ids([cboe])),
  ];
}

function gexProfile(ctx: MetricContext): DerivedMetric[] {
  const outputs = ctx.def.outputs;
  const allMissing = (...missing: string[]): DerivedMetric[] =>
    outputs.map(o => (o.type === 'number'
      ? ctx.number(o.name, missingInput(...missing), [])
      : ctx.signal(o.name, missingInput<SignalValue>(...missing), [])));

  const chain = ctx.chain;
  if (!chain) return allMissing('chain');
  if (chain.asOf !== ctx.asOf) return allMissing('chain:stale');

  const spotRef = chain.spot === null ? ctx.latest('spot') : null;
  const spot = chain.spot ?? spotRef?.value ?? null;
  if (spot === null) return allMissing('chain:spot');

  const { min, max } = ctx.config.expirationWindowDays;
  const rows = chain.rows.filter(r => r.daysToExpiration >= min && r.daysToExpiration <= max);
  const zeroDte = isolateZeroDte(rows);

  const profile = computeGexProfile(rows, spot);
  const zeroDteProfile = computeGexProfile(zeroDte, spot);
  const volume = chainVolume(rows);

  const rowIds = [...rows.map(r => chainRowId(r, chain.asOf)), spotRef?.id];
  const zeroDteIds = [...zeroDte.map(r => chainRowId(r, chain.asOf)), spotRef?.id];

  const wall = (strike: number | null, side: string): MetricOutcome<number> =>
    strike === null ? undefinedOutcome(`no ${side} strikes in chain`) : valueOf(strike);

  const pct = (part: number, whole: number, label: string): MetricOutcome<number> => {
    const r = safeRatio(part, whole, { numerator: label, denominator: label });
    return r.kind === 'VALUE' ? valueOf(r.value * 100) : r;
  };

  return [
    ctx.number('gex_total', valueOf(profile.totalGex), rowIds),
    ctx.number('gex_call_wall', wall(profile.callWall, 'call'), rowIds),
    ctx.number('gex_put_wall', wall(profile.putWall, 'put'), rowIds),
    ctx.number(
      'gex_flip_point',
      profile.flipPoint === null ? undefinedOutcome('cumulative GEX never changes sign') : valueOf(profile.flipPoint),
      rowIds,
    ),
    ctx.number('gex_0dte_total', valueOf(zeroDteProfile.totalGex), zeroDteIds),
    ctx.number('zero_dte_call_volume_pct', pct(volume.zeroDteCallVolume, volume.callVolume, 'chain_call_volume'), rowIds),
    ctx.number('zero_dte_put_volume_pct', pct(volume.zeroDtePutVolume, volume.putVolume, 'chain_put_volume'), rowIds),
    ctx.number(
      'chain_pc_volume_ratio',
      safeRatio(volume.putVolume, volume.callVolume, { numerator: 'chain_put_volume', denominator: 'chain_call_volume' }),
      rowIds,
    ),
    ctx.signal('gex_signal', classifyGexSignal(profile.totalGex / 1e9), rowIds),
  ];
}

function marginDebt(ctx: MetricContext): DerivedMetric[] {
  const current = ctx.latest('debt');
  const yearAgo = ctx.latest('debt', addMonths(ctx.asOf, -12));
  const mktcap = ctx.latest('mktcap');
  const gdp = ctx.latest('gdp');
  const debt = current?.value ?? null;

  return [
    ctx.number('margin_debt_yoy', marginDebtYoy(debt, yearAgo?.value ?? null), ids([current, yearAgo])),
    ctx.number('margin_debt_to_mktcap', marginDebtToMarketCap(debt, mktcap?.value ?? null), ids([current, mktcap])),
    ctx.number('margin_debt_to_gdp', marginDebtToGdp(debt, gdp?.value ?? null), ids([current, gdp])),
  ];
}

function crowding(ctx: MetricContext): DerivedMetric[] {
  const periods = ctx.config.returnPeriods;
  const basketAll = ctx.present('basket');
  const spxAll = ctx.present('spx');

  const bothPresent = basketAll.length > 0 && spxAll.length > 0;
  const lagging = bothPresent
    && basketAll[basketAll.length - 1].date !== spxAll[spxAll.length - 1].date;
  const [basket, spx]: [ObservationRef[], ObservationRef[]] = bothPresent && !lagging
    ? onSharedDates(basketAll, spxAll)
    : [basketAll, spxAll];

  const basketIds = basket.slice(-(periods + 1)).map(o => o.id);
  const spxIds = spx.slice(-(periods + 1)).map(o => o.id);

  const basketRet = periodReturnPct(basket.map(o => o.value), periods, ctx.alias('basket'));
  const spxRet = periodReturnPct(spx.map(o => o.value), periods, ctx.alias('spx'));
  const signal: CrowdingSignal = lagging
    ? { divergencePp: missingInput('crowding:as_of_mismatch'), degrossing: missingInput<boolean>('crowding:as_of_mismatch') }
    : crowdingDivergence(basketRet, spxRet, ctx.config.crowdingThresholdPp);

  return [
    ctx.number('basket_return_5d', basketRet, basketIds),
    ctx.number('spx_return_5d', spxRet, spxIds),
    ctx.number('crowding_divergence_pp', signal.divergencePp, [...basketIds, ...spxIds]),
    ctx.signal('degrossing', signal.degrossing, [...basketIds, ...spxIds]),
  ];
}

function financing(ctx: MetricContext): DerivedMetric[] {
  const prior = addDays(ctx.asOf, -30);
  const hyNow = ctx.latest('hyOas');
  const hyPrior = ctx.latest('hyOas', prior);
  const fciNow = ctx.latest('fci');
  const fciPrior = ctx.latest('fci', prior);

  const hyChange = changeOver(hyNow?.value ?? null, hyPrior?.value ?? null, ctx.alias('hyOas'));
  const fciChange = changeOver(fciNow?.value ?? null, fciPrior?.value ?? null, ctx.alias('fci'));

  return [
    ctx.number('hy_oas_30d_change', hyChange, ids([hyNow, hyPrior])),
    ctx.number('fci_30d_change', fciChange, ids([fciNow, fciPrior])),
    ctx.signal('hy_spread_direction', spreadDirection(hyChange), ids([hyNow, hyPrior])),
    ctx.signal('fci_direction', conditionsDirection(fciChange), ids([fciNow, fciPrior])),
  ];
}

const COMPUTATIONS: Record<MetricName, (ctx: MetricContext) => DerivedMetric[]> = {
  put_call_ratio: putCallRatio,
  vix_term_structure: vixTermStructure,
  vol_spread: volSpread,
  vol_surface: volSurface,
  gex_profile: gexProfile,
  margin_debt: marginDebt,
  crowding,
  financing,
};

// ═══════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════

export function computeDerivedMetrics(input: EngineInput): DerivedResult {
  const result: DerivedResult = { metrics: [], history: {} };

  for (const def of input.definitions) {
    const ctx = new MetricContext(def, input.asOf, input.table, input.chain, input.config, input.requests);
    result.metrics.push(...COMPUTATIONS[def.name](ctx));
    Object.assign(result.history, ctx.history);
  }

  return result;
}
