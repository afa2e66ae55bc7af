/**
 * RISK SNAPSHOT — Derived Metric Types
 */

// ═══════════════════════════════════════════════════════════════
// OUTCOME
// ═══════════════════════════════════════════════════════════════

/**
 * Result of one derived computation.
 *
 * - VALUE:         computed
 * - MISSING_INPUT: an operand was absent, stale or a zero denominator
 * - UNDEFINED:     inputs were complete but the quantity does not exist
 *                  (e.g. flip point on a chain whose cumulative GEX never
 *                  changes sign)
 *
 * MISSING_INPUT degrades completeness; UNDEFINED does not.
 */
export type MetricOutcome<T = number> =
  | { kind: 'VALUE'; value: T }
  | { kind: 'MISSING_INPUT'; missing: string[] }
  | { kind: 'UNDEFINED'; reason: string };

export function valueOf<T>(value: T): MetricOutcome<T> {
  return { kind: 'VALUE', value };
}

export function missingInput<T = number>(...missing: string[]): MetricOutcome<T> {
  return { kind: 'MISSING_INPUT', missing };
}

export function undefinedOutcome<T = number>(reason: string): MetricOutcome<T> {
  return { kind: 'UNDEFINED', reason };
}

export function outcomeValue<T>(outcome: MetricOutcome<T>): T | null {
  return outcome.kind === 'VALUE' ? outcome.value : null;
}

// ═══════════════════════════════════════════════════════════════
// DERIVED METRIC
// ═══════════════════════════════════════════════════════════════

export type SignalValue = string | boolean;

interface DerivedMetricBase {
  name: string;
  metric: string;             // catalog entry that produced it
  instruments: string[];
  asOf: string;
  provenance: string[];       // observation / chain-row ids
}

export type DerivedMetric =
  | (DerivedMetricBase & { type: 'number'; outcome: MetricOutcome<number> })
  | (DerivedMetricBase & { type: 'signal'; outcome: MetricOutcome<SignalValue> });

export interface SeriesPoint {
  date: string;
  value: number | null;
}

export interface DerivedResult {
  metrics: DerivedMetric[];
  history: Record<string, SeriesPoint[]>;
}
