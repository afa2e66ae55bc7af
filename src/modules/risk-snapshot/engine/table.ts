/**
 * OBSERVATION TABLE
 *
 * Normalized instrument × field × date table for one run. Only
 * observations inside a requested window and not after the run's as-of
 * date are admitted, so every lookup is point-in-time consistent.
 */

import {
  fieldKey,
  observationId,
  type DateWindow,
  type FieldRequest,
  type FillPolicy,
  type RawObservation,
} from '../contracts/market.types.js';
import type { SeriesPoint } from '../contracts/metric.types.js';
import { mergeRequests } from '../catalog/field.catalog.js';
import { toDailySeries, valueAtOrBefore } from './fill.js';

export interface ObservationRef {
  date: string;
  value: number;
  id: string;
}

export class ObservationTable {
  private readonly series = new Map<string, RawObservation[]>();
  private readonly windows = new Map<string, DateWindow>();
  private readonly rejected: RawObservation[] = [];

  constructor(
    readonly asOf: string,
    requests: readonly FieldRequest[],
    observations: readonly RawObservation[],
  ) {
    for (const req of mergeRequests(requests)) {
      const end = req.window.end < asOf ? req.window.end : asOf;
      this.windows.set(fieldKey(req.instrument, req.field, req.params), { start: req.window.start, end });
    }

    const byKey = new Map<string, Map<string, RawObservation>>();
    for (const obs of observations) {
      const key = fieldKey(obs.instrument, obs.field, obs.params);
      const window = this.windows.get(key);
      if (!window || obs.asOf < window.start || obs.asOf > window.end) {
        this.rejected.push(obs);
        continue;
      }
      let dates = byKey.get(key);
      if (!dates) {
        dates = new Map();
        byKey.set(key, dates);
      }
      // a later delivery for the same date replaces the earlier one
      dates.set(obs.asOf, obs);
    }

    for (const [key, dates] of byKey) {
      const sorted = Array.from(dates.values()).sort((a, b) => (a.asOf < b.asOf ? -1 : a.asOf > b.asOf ? 1 : 0));
      this.series.set(key, sorted);
    }
  }

  /** Observations dropped for being unrequested or outside the window */
  get rejectedCount(): number {
    return this.rejected.length;
  }

  window(key: string): DateWindow | undefined {
    return this.windows.get(key);
  }

  observations(key: string): readonly RawObservation[] {
    return this.series.get(key) ?? [];
  }

  /**
   * Value in effect at `at` (defaults to as-of) under the fill policy.
   */
  latest(key: string, policy: FillPolicy, at: string = this.asOf): ObservationRef | null {
    const obs = this.observations(key);
    const hit = valueAtOrBefore(this.points(key), at > this.asOf ? this.asOf : at, policy);
    if (!hit) return null;
    const source = obs.find(o => o.asOf === hit.date);
    return source ? { date: hit.date, value: hit.value, id: observationId(source) } : null;
  }

  /** Present (non-null) observations up to as-of, oldest first */
  present(key: string): ObservationRef[] {
    return this.observations(key)
      .filter((o): o is RawObservation & { value: number } => o.value !== null)
      .map(o => ({ date: o.asOf, value: o.value, id: observationId(o) }));
  }

  /** One point per calendar day of the key's window */
  daily(key: string, policy: FillPolicy): SeriesPoint[] {
    const window = this.windows.get(key);
    if (!window) return [];
    return toDailySeries(this.points(key), window, policy);
  }

  private points(key: string): SeriesPoint[] {
    return this.observations(key).map(o => ({ date: o.asOf, value: o.value }));
  }
}
