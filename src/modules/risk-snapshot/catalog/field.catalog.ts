/**
 * FIELD CATALOG
 *
 * Pure lookup from metric name to the ordered field requests it needs,
 * with lookback windows resolved to absolute dates for a given as-of.
 */

import { CatalogConflictError, UnknownMetricError } from '../../../common/errors.js';
import type { EngineConfig } from '../contracts/engine.config.js';
import { fieldKey, type FieldRequest } from '../contracts/market.types.js';
import { addDays } from '../engine/dates.js';
import { findInstrument } from './instruments.js';
import { METRIC_DEFINITIONS, type MetricDefinition } from './metric.registry.js';

export type CatalogOptions = Pick<EngineConfig, 'lookbackDays' | 'fillPolicy'>;

export interface ResolvedMetricSet {
  /** Definitions that resolved, in requested order */
  definitions: MetricDefinition[];
  /** Requests per resolved metric, in catalog order */
  requests: FieldRequest[];
  /** Metrics that failed to resolve */
  failures: UnknownMetricError[];
}

export interface CatalogListing {
  metrics: Array<{
    name: string;
    family: string;
    description: string;
    fields: Array<{ alias: string; instrument: string; assetClass: string | null; field: string; optional: boolean }>;
    chain: string | null;
    outputs: string[];
  }>;
}

export class FieldCatalog {
  private readonly byName: Map<string, MetricDefinition>;

  constructor(
    private readonly options: CatalogOptions,
    private readonly definitions: readonly MetricDefinition[] = METRIC_DEFINITIONS,
  ) {
    this.byName = new Map(definitions.map(d => [d.name, d]));
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  definition(name: string): MetricDefinition {
    const def = this.byName.get(name);
    if (!def) throw new UnknownMetricError(name);
    return def;
  }

  /**
   * Ordered requests for one metric, windows ending at asOf.
   */
  resolve(name: string, asOf: string): FieldRequest[] {
    const def = this.definition(name);
    const lookback = this.options.lookbackDays[def.family];
    const window = { start: addDays(asOf, -lookback), end: asOf };

    return def.fields.map(f => ({
      metric: def.name,
      role: f.role,
      instrument: f.instrument,
      field: f.field,
      params: f.params ?? {},
      window,
      fillPolicy: this.options.fillPolicy ?? f.fillPolicy,
      alias: f.alias,
    }));
  }

  /**
   * Resolve a metric set. An unknown name fails that metric only.
   */
  resolveAll(names: readonly string[], asOf: string): ResolvedMetricSet {
    const result: ResolvedMetricSet = { definitions: [], requests: [], failures: [] };

    for (const name of names) {
      try {
        const requests = this.resolve(name, asOf);
        result.definitions.push(this.definition(name));
        result.requests.push(...requests);
      } catch (err) {
        if (!(err instanceof UnknownMetricError)) throw err;
        result.failures.push(err);
      }
    }

    return result;
  }

  /**
   * Reject any two entries that would write the same output name.
   */
  validate(): void {
    const aliasKeys = new Map<string, string>();
    const outputs = new Map<string, string>();
    const names = new Set<string>();

    for (const def of this.definitions) {
      if (names.has(def.name)) {
        throw new CatalogConflictError([def.name], 'metric registered twice');
      }
      names.add(def.name);

      for (const f of def.fields) {
        const key = fieldKey(f.instrument, f.field, f.params);
        const existing = aliasKeys.get(f.alias);
        if (existing !== undefined && existing !== key) {
          throw new CatalogConflictError([f.alias], `alias maps to both ${existing} and ${key}`);
        }
        aliasKeys.set(f.alias, key);
      }

      for (const out of def.outputs) {
        const owner = outputs.get(out.name);
        if (owner !== undefined) {
          throw new CatalogConflictError([out.name], `output declared by ${owner} and ${def.name}`);
        }
        outputs.set(out.name, def.name);
      }
    }

    for (const [name, owner] of outputs) {
      if (aliasKeys.has(name)) {
        throw new CatalogConflictError([name], `derived output of ${owner} shadows a raw field`);
      }
    }
  }

  describe(): CatalogListing {
    return {
      metrics: this.definitions.map(d => ({
        name: d.name,
        family: d.family,
        description: d.description,
        fields: d.fields.map(f => ({
          alias: f.alias,
          instrument: f.instrument,
          assetClass: findInstrument(f.instrument)?.assetClass ?? null,
          field: f.field,
          optional: f.optional === true,
        })),
        chain: d.chain?.underlying ?? null,
        outputs: d.outputs.map(o => o.name),
      })),
    };
  }
}

/**
 * One request per (instrument, field, parameters) key for the adapter.
 * Windows of duplicate keys are widened to cover every caller.
 */
export function mergeRequests(requests: readonly FieldRequest[]): FieldRequest[] {
  const merged = new Map<string, FieldRequest>();

  for (const req of requests) {
    const key = fieldKey(req.instrument, req.field, req.params);
    const prev = merged.get(key);
    if (!prev) {
      merged.set(key, req);
      continue;
    }
    merged.set(key, {
      ...prev,
      window: {
        start: req.window.start < prev.window.start ? req.window.start : prev.window.start,
        end: req.window.end > prev.window.end ? req.window.end : prev.window.end,
      },
    });
  }

  return Array.from(merged.values());
}
