/**
 * VOLATILITY METRICS
 *
 * Term-structure shape, implied-vs-realized spread, 25-delta risk
 * reversal and put skew.
 */

import { missingInput, valueOf, type MetricOutcome } from '../contracts/metric.types.js';
import { difference, safeRatio } from './numeric.js';

// ═══════════════════════════════════════════════════════════════
// TERM STRUCTURE
// ═══════════════════════════════════════════════════════════════

export type TermStructureShape = 'contango' | 'backwardation' | 'mixed';

export interface CurvePoint {
  label: string;
  value: number | null;
}

/**
 * Classify [spot, UX1, ..., UXn].
 *
 * Equal neighbours satisfy both directions, so a flat segment never
 * breaks a run. A completely flat curve is reported as contango.
 */
export function classifyTermStructure(curve: readonly CurvePoint[]): MetricOutcome<TermStructureShape> {
  const absent = curve.filter(p => p.value === null).map(p => p.label);
  if (absent.length > 0) return missingInput(...absent);
  if (curve.length < 2) return missingInput('curve');

  const values = curve.map(p => p.value).filter((v): v is number => v !== null);
  let nonDecreasing = true;
  let nonIncreasing = true;
  for (let i = 1; i < values.length; i++) {
    if (values[i] < values[i - 1]) nonDecreasing = false;
    if (values[i] > values[i - 1]) nonIncreasing = false;
  }

  if (nonDecreasing) return valueOf('contango');
  if (nonIncreasing) return valueOf('backwardation');
  return valueOf('mixed');
}

/** (front / spot − 1) × 100 */
export function contangoPct(spot: number | null, front: number | null): MetricOutcome<number> {
  const ratio = safeRatio(front, spot, { numerator: 'vix_fut_1m', denominator: 'vix' });
  if (ratio.kind !== 'VALUE') return ratio;
  return valueOf((ratio.value - 1) * 100);
}

// ═══════════════════════════════════════════════════════════════
// SPREADS
// ═══════════════════════════════════════════════════════════════

/** Inputs are assumed to share an annualization convention */
export function ivolRealizedSpread(ivolAtm: number | null, realizedVol: number | null): MetricOutcome<number> {
  return difference(ivolAtm, realizedVol, { a: 'spx_ivol_atm_30d', b: 'spx_rvol_20d' });
}

export interface VolQuote {
  value: number;
  date: string;
}

export interface SurfaceQuotes {
  call25: VolQuote | null;
  put25: VolQuote | null;
  atm: VolQuote | null;
}

/**
 * All three quotes must be present and share one as-of date; a stale
 * quote makes the whole surface unusable.
 */
function surfaceCheck(quotes: SurfaceQuotes): string[] {
  const missing: string[] = [];
  if (!quotes.call25) missing.push('spx_call_25d_iv');
  if (!quotes.put25) missing.push('spx_put_25d_iv');
  if (!quotes.atm) missing.push('spx_ivol_atm_30d');
  if (missing.length > 0) return missing;

  const dates = new Set([quotes.call25?.date, quotes.put25?.date, quotes.atm?.date]);
  if (dates.size > 1) return ['vol_surface:as_of_mismatch'];
  return [];
}

/** call_vol(25d) − put_vol(25d) */
export function riskReversal25d(quotes: SurfaceQuotes): MetricOutcome<number> {
  const missing = surfaceCheck(quotes);
  if (missing.length > 0 || !quotes.call25 || !quotes.put25) return missingInput(...missing);
  return valueOf(quotes.call25.value - quotes.put25.value);
}

/** put_vol(25d) − atm_vol(30d) */
export function skew25d(quotes: SurfaceQuotes): MetricOutcome<number> {
  const missing = surfaceCheck(quotes);
  if (missing.length > 0 || !quotes.put25 || !quotes.atm) return missingInput(...missing);
  return valueOf(quotes.put25.value - quotes.atm.value);
}
