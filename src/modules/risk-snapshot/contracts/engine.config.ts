/**
 * RISK SNAPSHOT — Engine Configuration
 */

import type { FillPolicy } from './market.types.js';

export type LookbackFamily =
  | 'sentiment'
  | 'volatility'
  | 'leverage'
  | 'positioning'
  | 'financing';

export interface AlertThresholds {
  pcExtremeFear: number;
  pcElevated: number;
  pcExtremeGreed: number;
  gexNegativeBn: number;
  gexDeepNegativeBn: number;
  skewElevated: number;
  skewExtreme: number;
  zeroDteSharePct: number;
  marginDebtYoy: number;
}

export interface EngineConfig {
  /** Metric names to compute each run, in catalog order */
  activeMetrics: string[];
  /** Metrics whose absence does not clear the completeness flag */
  optionalMetrics: string[];
  lookbackDays: Record<LookbackFamily, number>;
  /** Overrides every catalog entry's fill policy when set */
  fillPolicy?: FillPolicy;
  /** Crowding divergence below this (percentage points) fires degrossing */
  crowdingThresholdPp: number;
  /** Trading observations per return in the crowding signal */
  returnPeriods: number;
  /** Near-term chain window in days from as-of, inclusive */
  expirationWindowDays: { min: number; max: number };
  fetchTimeoutMs: number;
  alerts: AlertThresholds;
}

export const CROWDING_DIVERGENCE_THRESHOLD_PP = -2.0;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  activeMetrics: [
    'put_call_ratio',
    'vix_term_structure',
    'vol_spread',
    'vol_surface',
    'gex_profile',
    'margin_debt',
    'crowding',
    'financing',
  ],
  optionalMetrics: ['financing'],
  lookbackDays: {
    sentiment: 45,      // 20d moving average + 30d history
    volatility: 7,
    leverage: 450,      // 12-month comparator plus monthly publication lag
    positioning: 21,
    financing: 45,      // 30d change
  },
  crowdingThresholdPp: CROWDING_DIVERGENCE_THRESHOLD_PP,
  returnPeriods: 5,
  expirationWindowDays: { min: 0, max: 14 },
  fetchTimeoutMs: 30_000,
  alerts: {
    pcExtremeFear: 0.90,
    pcElevated: 0.75,
    pcExtremeGreed: 0.40,
    gexNegativeBn: 0,
    gexDeepNegativeBn: -2,
    skewElevated: 145,
    skewExtreme: 155,
    zeroDteSharePct: 55,
    marginDebtYoy: 0.20,
  },
};
