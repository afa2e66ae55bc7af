/**
 * Static Fetcher Adapter
 *
 * Serves a fixed dataset: replay of a stored dump, or fixtures in tests.
 * Request and expiration windows are applied exactly as a live source
 * would apply them.
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import {
  fieldKey,
  type ChainSnapshot,
  type ExpirationWindow,
  type FetchResult,
  type FieldRequest,
  type RawObservation,
} from '../contracts/market.types.js';
import { mergeRequests } from '../catalog/field.catalog.js';
import type { FetchOptions, SnapshotFetcherAdapter } from './fetcher.adapter.js';

export interface StaticDataset {
  observations: RawObservation[];
  chains: ChainSnapshot[];
}

export class StaticFetcherAdapter implements SnapshotFetcherAdapter {
  readonly name = 'static';
  private readonly byKey = new Map<string, RawObservation[]>();

  constructor(private readonly dataset: StaticDataset) {
    for (const obs of dataset.observations) {
      const key = fieldKey(obs.instrument, obs.field, obs.params);
      const list = this.byKey.get(key);
      if (list) list.push(obs);
      else this.byKey.set(key, [obs]);
    }
  }

  async fetch(requests: readonly FieldRequest[], _options: FetchOptions = {}): Promise<FetchResult> {
    const result: FetchResult = { observations: [], unresolved: [] };

    for (const req of mergeRequests(requests)) {
      const series = this.byKey.get(fieldKey(req.instrument, req.field, req.params));
      if (!series) {
        result.unresolved.push({ instrument: req.instrument, field: req.field, params: req.params, reason: 'UNKNOWN_FIELD' });
        continue;
      }
      const inWindow = series.filter(obs => obs.asOf >= req.window.start && obs.asOf <= req.window.end);
      if (inWindow.length === 0) {
        result.unresolved.push({ instrument: req.instrument, field: req.field, params: req.params, reason: 'NO_DATA' });
        continue;
      }
      result.observations.push(...inWindow);
    }

    return result;
  }

  async fetchChain(underlying: string, window: ExpirationWindow, _options: FetchOptions = {}): Promise<ChainSnapshot | null> {
    const candidates = this.dataset.chains.filter(c => c.underlying === underlying && c.asOf <= window.from);
    if (candidates.length === 0) return null;

    const chain = candidates.reduce((a, b) => (b.asOf > a.asOf ? b : a));
    return {
      ...chain,
      rows: chain.rows.filter(r => r.expiration >= window.from && r.expiration <= window.to),
    };
  }
}

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

const DatasetSchema = z.object({
  observations: z.array(z.object({
    instrument: z.string(),
    field: z.string(),
    params: z.record(z.number()).default({}),
    asOf: z.string(),
    value: z.number().nullable(),
  })),
  chains: z.array(z.object({
    underlying: z.string(),
    asOf: z.string(),
    spot: z.number().nullable().default(null),
    rows: z.array(z.object({
      instrument: z.string(),
      expiration: z.string(),
      strike: z.number(),
      optionType: z.enum(['call', 'put']),
      gamma: z.number().nullable(),
      openInterest: z.number().nullable(),
      volume: z.number().nullable().default(null),
      lastPrice: z.number().nullable().default(null),
      daysToExpiration: z.number().int().nonnegative(),
    })),
  })).default([]),
});

/** Read a JSON dump in the StaticDataset shape */
export async function loadStaticDataset(path: string): Promise<StaticDataset> {
  const raw: unknown = JSON.parse(await fs.readFile(path, 'utf8'));
  return DatasetSchema.parse(raw);
}
