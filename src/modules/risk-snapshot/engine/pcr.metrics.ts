/**
 * Put/Call ratio moving averages.
 */

import { missingInput, valueOf, type MetricOutcome } from '../contracts/metric.types.js';

/**
 * Mean of the last `n` present observations.
 *
 * @param values present values, oldest first
 */
export function movingAverage(values: readonly number[], n: number, label: string): MetricOutcome<number> {
  if (n <= 0 || values.length < n) return missingInput(label);
  const tail = values.slice(-n);
  return valueOf(tail.reduce((sum, v) => sum + v, 0) / n);
}
