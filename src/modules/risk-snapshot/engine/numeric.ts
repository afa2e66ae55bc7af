import { missingInput, valueOf, type MetricOutcome } from '../contracts/metric.types.js';

/**
 * Floating-point division. An absent operand or a zero denominator is
 * MISSING_INPUT; nothing is substituted.
 */
export function safeRatio(
  numerator: number | null,
  denominator: number | null,
  labels: { numerator: string; denominator: string },
): MetricOutcome<number> {
  const missing: string[] = [];
  if (numerator === null || !Number.isFinite(numerator)) missing.push(labels.numerator);
  if (denominator === null || !Number.isFinite(denominator) || denominator === 0) {
    missing.push(labels.denominator);
  }
  if (missing.length > 0 || numerator === null || denominator === null) return missingInput(...missing);
  return valueOf(numerator / denominator);
}

export function difference(
  a: number | null,
  b: number | null,
  labels: { a: string; b: string },
): MetricOutcome<number> {
  const missing: string[] = [];
  if (a === null) missing.push(labels.a);
  if (b === null) missing.push(labels.b);
  if (a === null || b === null) return missingInput(...missing);
  return valueOf(a - b);
}
