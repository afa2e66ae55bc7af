/**
 * SIGNALS & ALERTS
 *
 * Dashboard labels and threshold alerts over already-computed values.
 * Nothing here feeds back into the metrics.
 */

import type { AlertThresholds } from '../contracts/engine.config.js';
import { missingInput, valueOf, type MetricOutcome, type SignalValue } from '../contracts/metric.types.js';
import type { SnapshotAlert } from '../contracts/snapshot.types.js';

const PC_NEUTRAL_FLOOR = 0.55;
const SKEW_MODERATE_FLOOR = 125;

export type PcSignal = 'EXTREME_FEAR' | 'ELEVATED' | 'NEUTRAL' | 'COMPLACENT' | 'EXTREME_GREED';
export type SkewSignal = 'EXTREME' | 'ELEVATED' | 'MODERATE' | 'LOW';
export type GexSignal = 'STRONG_POSITIVE' | 'POSITIVE' | 'NEGATIVE' | 'DEEP_NEGATIVE';

/** Equity P/C bands; the outer cut-offs are the alert thresholds */
export function classifyPcSignal(value: number | null, t: AlertThresholds): MetricOutcome<PcSignal> {
  if (value === null) return missingInput('pcr_equity');
  if (value > t.pcExtremeFear) return valueOf('EXTREME_FEAR');
  if (value > t.pcElevated) return valueOf('ELEVATED');
  if (value > PC_NEUTRAL_FLOOR) return valueOf('NEUTRAL');
  if (value >= t.pcExtremeGreed) return valueOf('COMPLACENT');
  return valueOf('EXTREME_GREED');
}

/** CBOE SKEW index level */
export function classifySkewSignal(value: number | null, t: AlertThresholds): MetricOutcome<SkewSignal> {
  if (value === null) return missingInput('cboe_skew');
  if (value > t.skewExtreme) return valueOf('EXTREME');
  if (value > t.skewElevated) return valueOf('ELEVATED');
  if (value > SKEW_MODERATE_FLOOR) return valueOf('MODERATE');
  return valueOf('LOW');
}

/** Total GEX in billions of dollars */
export function classifyGexSignal(gexBn: number | null): MetricOutcome<GexSignal> {
  if (gexBn === null) return missingInput('gex_total');
  if (gexBn > 3) return valueOf('STRONG_POSITIVE');
  if (gexBn > 0) return valueOf('POSITIVE');
  if (gexBn > -2) return valueOf('NEGATIVE');
  return valueOf('DEEP_NEGATIVE');
}

// ═══════════════════════════════════════════════════════════════
// ALERTS
// ═══════════════════════════════════════════════════════════════

export function buildAlerts(
  values: Readonly<Record<string, number | null>>,
  signals: Readonly<Record<string, SignalValue | null>>,
  t: AlertThresholds,
): SnapshotAlert[] {
  const alerts: SnapshotAlert[] = [];
  const v = (name: string): number | null => values[name] ?? null;

  const pc = v('pcr_equity');
  if (pc !== null) {
    if (pc > t.pcExtremeFear) {
      alerts.push({ type: 'PC_EXTREME_FEAR', severity: 'critical', message: `Equity P/C at ${pc.toFixed(2)}: extreme fear` });
    } else if (pc > t.pcElevated) {
      alerts.push({ type: 'PC_ELEVATED', severity: 'warning', message: `Equity P/C at ${pc.toFixed(2)}: elevated hedging demand` });
    } else if (pc < t.pcExtremeGreed) {
      alerts.push({ type: 'PC_EXTREME_GREED', severity: 'critical', message: `Equity P/C at ${pc.toFixed(2)}: extreme complacency` });
    }
  }

  const gex = v('gex_total');
  if (gex !== null) {
    const bn = gex / 1e9;
    if (bn < t.gexDeepNegativeBn) {
      alerts.push({ type: 'GEX_DEEP_NEGATIVE', severity: 'critical', message: `GEX at ${bn.toFixed(1)}B: dealers short gamma` });
    } else if (bn < t.gexNegativeBn) {
      alerts.push({ type: 'GEX_NEGATIVE', severity: 'warning', message: `GEX negative at ${bn.toFixed(1)}B` });
    }
  }

  const skew = v('cboe_skew');
  if (skew !== null) {
    if (skew > t.skewExtreme) {
      alerts.push({ type: 'SKEW_EXTREME', severity: 'critical', message: `CBOE SKEW at ${skew.toFixed(0)}: tail hedging demand` });
    } else if (skew > t.skewElevated) {
      alerts.push({ type: 'SKEW_ELEVATED', severity: 'warning', message: `CBOE SKEW at ${skew.toFixed(0)}: above average tail demand` });
    }
  }

  const zeroDte = v('zero_dte_call_volume_pct');
  if (zeroDte !== null && zeroDte > t.zeroDteSharePct) {
    alerts.push({ type: 'ZERO_DTE_HIGH', severity: 'warning', message: `0DTE at ${zeroDte.toFixed(0)}% of call volume` });
  }

  if (signals['degrossing'] === true) {
    const div = v('crowding_divergence_pp');
    const detail = div === null ? '' : ` (${div.toFixed(1)}pp vs SPX)`;
    alerts.push({ type: 'CROWDING_DEGROSSING', severity: 'warning', message: `Crowded longs lagging${detail}` });
  }

  const yoy = v('margin_debt_yoy');
  if (yoy !== null && yoy > t.marginDebtYoy) {
    alerts.push({ type: 'MARGIN_DEBT_SURGE', severity: 'warning', message: `Margin debt +${(yoy * 100).toFixed(1)}% YoY` });
  }

  return alerts;
}
