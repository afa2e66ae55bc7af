/**
 * Financing conditions: change over a calendar lookback and its direction.
 */

import { missingInput, valueOf, type MetricOutcome } from '../contracts/metric.types.js';
import { difference } from './numeric.js';

export type SpreadDirection = 'widening' | 'tightening' | 'unchanged';
export type ConditionsDirection = 'tightening' | 'loosening' | 'unchanged';

export function changeOver(current: number | null, prior: number | null, label: string): MetricOutcome<number> {
  return difference(current, prior, { a: label, b: `${label}_prior` });
}

/** Wider HY spreads mean tighter credit */
export function spreadDirection(change: MetricOutcome<number>): MetricOutcome<SpreadDirection> {
  if (change.kind === 'VALUE') {
    return valueOf(change.value > 0 ? 'widening' : change.value < 0 ? 'tightening' : 'unchanged');
  }
  return change.kind === 'MISSING_INPUT' ? missingInput(...change.missing) : missingInput('change');
}

/** A rising FCI is tighter financial conditions */
export function conditionsDirection(change: MetricOutcome<number>): MetricOutcome<ConditionsDirection> {
  if (change.kind === 'VALUE') {
    return valueOf(change.value > 0 ? 'tightening' : change.value < 0 ? 'loosening' : 'unchanged');
  }
  return change.kind === 'MISSING_INPUT' ? missingInput(...change.missing) : missingInput('change');
}
