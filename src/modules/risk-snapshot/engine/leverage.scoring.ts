/**
 * LEVERAGE MONITOR SCORING
 *
 * Layered systemic-leverage score over an assembled snapshot's values.
 * Each layer adds points for breached thresholds, capped at its maximum;
 * the composite is their sum and maps to a regime.
 *
 * Hedge-fund gross leverage, SOFR, VIX rate of change and the event
 * calendar have no source in the catalog, so the fed layers top out
 * below the 0-10 scale.
 */

import type { SignalValue } from '../contracts/metric.types.js';
import type { SnapshotAlert } from '../contracts/snapshot.types.js';

export type LeverageRegime =
  | 'LOW_RISK'
  | 'ELEVATED'
  | 'FRAGILE_EQUILIBRIUM'
  | 'ACTIVE_DETERIORATION'
  | 'CASCADE_RISK';

export type CascadeProbability = 'LOW' | 'LOW-MODERATE' | 'MODERATE' | 'MODERATE-HIGH' | 'HIGH';
export type Turbulence = 'NORMAL' | 'MODERATE' | 'ELEVATED';

export const SCORING_THRESHOLDS = {
  marginDebtPeak: 1e12,       // Jan 2021 record
  marginDebtYoy: 0.20,
  marginDebtToGdp: 0.035,
  hyOasPct: 3.5,
  vixElevated: 22,
  ivolPremium: 1.3,
  pcFear: 0.85,
  pcComplacent: 0.45,
} as const;

export type LayerName =
  | 'levels'
  | 'momentum'
  | 'financing'
  | 'crowding'
  | 'vol_structure'
  | 'options_sentiment';

export interface LayerScore {
  layer: LayerName;
  /** null when none of the layer's inputs is present */
  score: number | null;
  max: number;
  /** Snapshot names the layer reads */
  inputs: string[];
}

export interface CascadeAssessment {
  stepsActive: number;
  probability: CascadeProbability;
  blockedAtStep: 3 | 4 | null;
}

export interface LeverageScore {
  layers: LayerScore[];
  composite: number;
  regime: LeverageRegime;
  cascade: CascadeAssessment;
  turbulence: Turbulence | null;
}

type Values = Readonly<Record<string, number | null>>;
type Signals = Readonly<Record<string, SignalValue | null>>;

interface Check {
  hit: boolean;
  points: number;
}

const above = (v: number | null, threshold: number): boolean => v !== null && v > threshold;

function scoreLayer(
  layer: LayerName,
  max: number,
  inputs: string[],
  isPresent: (name: string) => boolean,
  checks: Check[],
): LayerScore {
  if (!inputs.some(isPresent)) return { layer, score: null, max, inputs };
  const total = checks.reduce((sum, c) => (c.hit ? sum + c.points : sum), 0);
  return { layer, score: Math.min(total, max), max, inputs };
}

// ═══════════════════════════════════════════════════════════════
// REGIME
// ═══════════════════════════════════════════════════════════════

/** Nearest integer, ties to even */
function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const frac = x - floor;
  if (frac > 0.5) return floor + 1;
  if (frac < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function classifyRegime(composite: number): LeverageRegime {
  const score = roundHalfEven(composite);
  if (score <= 2) return 'LOW_RISK';
  if (score <= 4) return 'ELEVATED';
  if (score <= 6) return 'FRAGILE_EQUILIBRIUM';
  if (score <= 8) return 'ACTIVE_DETERIORATION';
  return 'CASCADE_RISK';
}

// ═══════════════════════════════════════════════════════════════
// CASCADE
// ═══════════════════════════════════════════════════════════════

/**
 * Steps: record leverage → acceleration → financing tightens → vol
 * regime shift. Only the last two can block the chain.
 */
export function assessCascade(layers: readonly LayerScore[]): CascadeAssessment {
  const of = (name: LayerName): LayerScore | undefined => layers.find(l => l.layer === name);
  const reaches = (name: LayerName, level: (l: LayerScore) => number): boolean => {
    const l = of(name);
    return l !== undefined && l.score !== null && l.score >= level(l);
  };

  const leverageLoaded = reaches('levels', l => l.max);
  const accelerating = reaches('momentum', l => l.max);
  const financingTight = reaches('financing', () => 1);
  const volShift = reaches('vol_structure', () => 0.5);

  const stepsActive = [leverageLoaded, accelerating, financingTight, volShift].filter(Boolean).length;
  const probability: CascadeProbability =
    stepsActive >= 4 ? 'HIGH'
      : stepsActive === 3 ? 'MODERATE-HIGH'
        : stepsActive === 2 ? 'MODERATE'
          : stepsActive === 1 ? 'LOW-MODERATE'
            : 'LOW';

  return {
    stepsActive,
    probability,
    blockedAtStep: !financingTight ? 3 : !volShift ? 4 : null,
  };
}

// ═══════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════

/**
 * Score the layers the snapshot can feed. Returns null when no layer has
 * a single input present.
 */
export function scoreLeverage(values: Values, signals: Signals): LeverageScore | null {
  const t = SCORING_THRESHOLDS;
  const v = (name: string): number | null => values[name] ?? null;
  const s = (name: string): SignalValue | null => signals[name] ?? null;
  const isPresent = (name: string): boolean => v(name) !== null || s(name) !== null;

  const ivol = v('spx_ivol_atm_30d');
  const rvol = v('spx_rvol_20d');
  const pc = v('pcr_equity');
  const gex = s('gex_signal');

  const layers: LayerScore[] = [
    scoreLayer('levels', 1, ['finra_margin_debt'], isPresent, [
      { hit: above(v('finra_margin_debt'), t.marginDebtPeak), points: 1 },
    ]),
    scoreLayer('momentum', 2, ['margin_debt_yoy', 'margin_debt_to_gdp'], isPresent, [
      { hit: above(v('margin_debt_yoy'), t.marginDebtYoy), points: 1 },
      { hit: above(v('margin_debt_to_gdp'), t.marginDebtToGdp), points: 1 },
    ]),
    scoreLayer('financing', 2, ['hy_oas', 'fci_direction'], isPresent, [
      { hit: above(v('hy_oas'), t.hyOasPct), points: 1 },
      { hit: s('fci_direction') === 'tightening', points: 1 },
    ]),
    scoreLayer('crowding', 1, ['degrossing'], isPresent, [
      { hit: s('degrossing') === true, points: 1 },
    ]),
    scoreLayer('vol_structure', 1, ['vix', 'spx_ivol_atm_30d', 'spx_rvol_20d'], isPresent, [
      { hit: above(v('vix'), t.vixElevated), points: 0.5 },
      { hit: ivol !== null && rvol !== null && ivol > rvol * t.ivolPremium, points: 0.5 },
    ]),
    scoreLayer('options_sentiment', 1, ['pcr_equity', 'gex_signal'], isPresent, [
      { hit: pc !== null && (pc > t.pcFear || pc < t.pcComplacent), points: 0.5 },
      { hit: gex === 'NEGATIVE' || gex === 'DEEP_NEGATIVE', points: 0.25 },
    ]),
  ];

  if (layers.every(l => l.score === null)) return null;

  const composite = layers.reduce((sum, l) => sum + (l.score ?? 0), 0);
  const vix = v('vix');

  return {
    layers,
    composite,
    regime: classifyRegime(composite),
    cascade: assessCascade(layers),
    turbulence: vix === null ? null : vix > 25 ? 'ELEVATED' : vix > 20 ? 'MODERATE' : 'NORMAL',
  };
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT ENTRIES
// ═══════════════════════════════════════════════════════════════

export type ScoringEntry =
  | { name: string; type: 'number'; value: number | null; inputs: string[] }
  | { name: string; type: 'signal'; value: SignalValue | null; inputs: string[] };

/** Names and values the score contributes to a snapshot */
export function scoringEntries(score: LeverageScore): ScoringEntry[] {
  const allInputs = score.layers.flatMap(l => l.inputs);
  const cascadeInputs = score.layers
    .filter(l => l.layer !== 'crowding' && l.layer !== 'options_sentiment')
    .flatMap(l => l.inputs);

  return [
    ...score.layers.map((l): ScoringEntry => ({
      name: `leverage_${l.layer}_score`,
      type: 'number',
      value: l.score,
      inputs: l.inputs,
    })),
    { name: 'leverage_composite', type: 'number', value: score.composite, inputs: allInputs },
    { name: 'leverage_regime', type: 'signal', value: score.regime, inputs: allInputs },
    { name: 'cascade_steps_active', type: 'number', value: score.cascade.stepsActive, inputs: cascadeInputs },
    { name: 'cascade_probability', type: 'signal', value: score.cascade.probability, inputs: cascadeInputs },
    { name: 'market_turbulence', type: 'signal', value: score.turbulence, inputs: ['vix'] },
  ];
}

export function scoringAlerts(score: LeverageScore): SnapshotAlert[] {
  const steps = score.cascade.stepsActive;
  if (steps < 3) return [];
  return [{
    type: 'CASCADE_WARNING',
    severity: steps >= 4 ? 'critical' : 'warning',
    message: `Cascade chain: ${steps}/4 steps active`,
  }];
}
