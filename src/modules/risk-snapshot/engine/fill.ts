/**
 * Fill policies over dated series.
 *
 * forward-fill carries the last present value across gaps and never
 * looks past the target date. none only accepts a value dated exactly
 * on the target.
 */

import type { DateWindow, FillPolicy } from '../contracts/market.types.js';
import type { SeriesPoint } from '../contracts/metric.types.js';
import { eachDay } from './dates.js';

export interface DatedValue {
  date: string;
  value: number;
}

/**
 * @param points sorted ascending by date
 */
export function valueAtOrBefore(
  points: readonly SeriesPoint[],
  target: string,
  policy: FillPolicy,
): DatedValue | null {
  for (let i = points.length - 1; i >= 0; i--) {
    const p = points[i];
    if (p.date > target) continue;
    if (policy === 'none' && p.date !== target) return null;
    if (p.value !== null) return { date: p.date, value: p.value };
    if (policy === 'none') return null;
  }
  return null;
}

/** Replace nulls with the last present value; leading nulls stay null */
export function forwardFill(points: readonly SeriesPoint[]): SeriesPoint[] {
  let last: number | null = null;
  return points.map(p => {
    if (p.value !== null) last = p.value;
    return { date: p.date, value: p.value ?? last };
  });
}

/**
 * One point per calendar day of the window. A gap at the window's start
 * stays absent.
 *
 * @param points sorted ascending by date
 */
export function toDailySeries(
  points: readonly SeriesPoint[],
  window: DateWindow,
  policy: FillPolicy,
): SeriesPoint[] {
  const byDate = new Map(points.map(p => [p.date, p.value]));
  const raw: SeriesPoint[] = eachDay(window.start, window.end).map(date => ({
    date,
    value: byDate.get(date) ?? null,
  }));

  return policy === 'none' ? raw : forwardFill(raw);
}
