/**
 * HTTP Fetcher Adapter
 * Source: market-data gateway in front of the terminal
 *
 * Endpoints:
 *   POST /v1/fields   { requests: [{ instrument, field, params, start, end }] }
 *   GET  /v1/chains   ?underlying=&from=&to=
 */

import { z } from 'zod';
import { AdapterUnavailableError, errorMessage } from '../../../common/errors.js';
import type { HttpClient, HttpResponse } from '../../shared/runtime/host.deps.js';
import {
  fieldKey,
  type ChainSnapshot,
  type ExpirationWindow,
  type FetchResult,
  type FieldRequest,
  type RawObservation,
  type UnresolvedField,
} from '../contracts/market.types.js';
import { mergeRequests } from '../catalog/field.catalog.js';
import type { FetchOptions, SnapshotFetcherAdapter } from './fetcher.adapter.js';

const SOURCE = 'market-data-gateway';

// ═══════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const Params = z.record(z.number()).default({});

const FieldSeriesSchema = z.object({
  instrument: z.string(),
  field: z.string(),
  params: Params,
  error: z.string().optional(),
  data: z.array(z.object({ date: IsoDate, value: z.number().nullable() })).default([]),
});

const FieldsResponseSchema = z.object({
  results: z.array(z.unknown()),
});

const ChainRowSchema = z.object({
  instrument: z.string(),
  expiration: IsoDate,
  strike: z.number(),
  optionType: z.enum(['call', 'put']),
  gamma: z.number().nullable(),
  openInterest: z.number().nullable(),
  volume: z.number().nullable().default(null),
  lastPrice: z.number().nullable().default(null),
  daysToExpiration: z.number().int().nonnegative(),
});

const ChainResponseSchema = z.object({
  underlying: z.string(),
  asOf: IsoDate,
  spot: z.number().nullable().default(null),
  rows: z.array(ChainRowSchema),
});

// ═══════════════════════════════════════════════════════════════
// ADAPTER
// ═══════════════════════════════════════════════════════════════

export interface HttpFetcherOptions {
  timeoutMs?: number;
}

export class HttpFetcherAdapter implements SnapshotFetcherAdapter {
  readonly name = SOURCE;

  constructor(
    private readonly http: HttpClient,
    private readonly options: HttpFetcherOptions = {},
  ) {}

  async fetch(requests: readonly FieldRequest[], options: FetchOptions = {}): Promise<FetchResult> {
    const merged = mergeRequests(requests);
    if (merged.length === 0) return { observations: [], unresolved: [] };

    const body = {
      requests: merged.map(r => ({
        instrument: r.instrument,
        field: r.field,
        params: r.params,
        start: r.window.start,
        end: r.window.end,
      })),
    };

    const res = await this.call(() =>
      this.http.post<unknown>('/v1/fields', body, { timeout: this.options.timeoutMs, signal: options.signal }),
    );

    if (!res.ok) {
      return { observations: [], unresolved: merged.map(r => unresolvedOf(r, `HTTP_${res.status}`)) };
    }

    const envelope = FieldsResponseSchema.safeParse(res.data);
    if (!envelope.success) {
      return { observations: [], unresolved: merged.map(r => unresolvedOf(r, 'MALFORMED_RESPONSE')) };
    }

    const wanted = new Map(merged.map(r => [fieldKey(r.instrument, r.field, r.params), r]));
    const observations: RawObservation[] = [];
    const unresolved: UnresolvedField[] = [];
    const answered = new Set<string>();

    for (const entry of envelope.data.results) {
      const parsed = FieldSeriesSchema.safeParse(entry);
      if (!parsed.success) continue;
      const series = parsed.data;
      const key = fieldKey(series.instrument, series.field, series.params);
      if (!wanted.has(key) || answered.has(key)) continue;
      answered.add(key);

      if (series.error) {
        unresolved.push({ instrument: series.instrument, field: series.field, params: series.params, reason: series.error });
        continue;
      }
      if (series.data.length === 0) {
        unresolved.push({ instrument: series.instrument, field: series.field, params: series.params, reason: 'NO_DATA' });
        continue;
      }
      for (const point of series.data) {
        observations.push({
          instrument: series.instrument,
          field: series.field,
          params: series.params,
          asOf: point.date,
          value: point.value,
        });
      }
    }

    for (const [key, req] of wanted) {
      if (!answered.has(key)) unresolved.push(unresolvedOf(req, 'NOT_RETURNED'));
    }

    return { observations, unresolved };
  }

  async fetchChain(
    underlying: string,
    window: ExpirationWindow,
    options: FetchOptions = {},
  ): Promise<ChainSnapshot | null> {
    const res = await this.call(() =>
      this.http.get<unknown>('/v1/chains', {
        params: { underlying, from: window.from, to: window.to },
        timeout: this.options.timeoutMs,
        signal: options.signal,
      }),
    );

    if (!res.ok) {
      console.warn(`[RiskSnapshot] chain ${underlying} unavailable: HTTP ${res.status}`);
      return null;
    }

    const parsed = ChainResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      console.warn(`[RiskSnapshot] chain ${underlying} malformed: ${parsed.error.issues.length} issue(s)`);
      return null;
    }

    const chain = parsed.data;
    return {
      underlying: chain.underlying,
      asOf: chain.asOf,
      spot: chain.spot,
      rows: chain.rows.filter(r => r.expiration >= window.from && r.expiration <= window.to),
    };
  }

  /**
   * Transport failures and 5xx mean the source is down; everything else
   * is returned to the caller.
   */
  private async call<T>(fn: () => Promise<HttpResponse<T>>): Promise<HttpResponse<T>> {
    let res: HttpResponse<T>;
    try {
      res = await fn();
    } catch (err) {
      throw new AdapterUnavailableError(SOURCE, errorMessage(err));
    }
    if (res.status >= 500) {
      throw new AdapterUnavailableError(SOURCE, `HTTP ${res.status}`);
    }
    return res;
  }
}

function unresolvedOf(req: FieldRequest, reason: string): UnresolvedField {
  return { instrument: req.instrument, field: req.field, params: req.params, reason };
}
