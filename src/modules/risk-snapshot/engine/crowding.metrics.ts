/**
 * CROWDING DIVERGENCE
 *
 * Crowded-longs basket return minus SPX return over the same trading
 * dates, in percentage points. Below the configured threshold the basket
 * is being de-grossed. Two feeds ending on different dates give no
 * divergence.
 */

import { missingInput, valueOf, type MetricOutcome } from '../contracts/metric.types.js';

/**
 * Return in percent between the last value and the one `periods`
 * observations earlier.
 *
 * @param values present values, oldest first
 */
export function periodReturnPct(values: readonly number[], periods: number, label: string): MetricOutcome<number> {
  if (values.length < periods + 1) return missingInput(label);
  const last = values[values.length - 1];
  const prior = values[values.length - 1 - periods];
  if (prior === 0) return missingInput(label);
  return valueOf((last / prior - 1) * 100);
}

/**
 * Keep only the dates both series carry, so two returns taken over the
 * result span the same sessions.
 */
export function onSharedDates<T extends { date: string }>(left: readonly T[], right: readonly T[]): [T[], T[]] {
  const leftDates = new Set(left.map(p => p.date));
  const rightDates = new Set(right.map(p => p.date));
  return [left.filter(p => rightDates.has(p.date)), right.filter(p => leftDates.has(p.date))];
}

export interface CrowdingSignal {
  divergencePp: MetricOutcome<number>;
  degrossing: MetricOutcome<boolean>;
}

export function crowdingDivergence(
  basketReturnPct: MetricOutcome<number>,
  spxReturnPct: MetricOutcome<number>,
  thresholdPp: number,
): CrowdingSignal {
  if (basketReturnPct.kind !== 'VALUE' || spxReturnPct.kind !== 'VALUE') {
    const missing = [
      ...(basketReturnPct.kind === 'MISSING_INPUT' ? basketReturnPct.missing : []),
      ...(spxReturnPct.kind === 'MISSING_INPUT' ? spxReturnPct.missing : []),
    ];
    return { divergencePp: missingInput(...missing), degrossing: missingInput(...missing) };
  }

  const divergence = basketReturnPct.value - spxReturnPct.value;
  return {
    divergencePp: valueOf(divergence),
    degrossing: valueOf(divergence < thresholdPp),
  };
}
