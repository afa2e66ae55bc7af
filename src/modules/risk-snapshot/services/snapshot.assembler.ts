/**
 * SNAPSHOT ASSEMBLER
 * ==================
 *
 * Merges raw field values, derived outputs and the leverage score into
 * one immutable snapshot. All of them share a single namespace.
 */

import { nanoid } from 'nanoid';
import { CatalogConflictError, type UnknownMetricError } from '../../../common/errors.js';
import type { FieldCatalog } from '../catalog/field.catalog.js';
import type { EngineConfig } from '../contracts/engine.config.js';
import { fieldKey, type FieldRequest, type RawObservation } from '../contracts/market.types.js';
import { outcomeValue, type DerivedResult, type SignalValue } from '../contracts/metric.types.js';
import {
  SNAPSHOT_SCHEMA_VERSION,
  type RiskSnapshot,
  type SnapshotRecord,
} from '../contracts/snapshot.types.js';
import { ObservationTable } from '../engine/table.js';
import { buildAlerts } from '../engine/signals.js';
import { scoreLeverage, scoringAlerts, scoringEntries } from '../engine/leverage.scoring.js';

export interface AssembleInput {
  asOf: string;
  runTimestamp: string;
  observations: readonly RawObservation[];
  requests: readonly FieldRequest[];
  derived: DerivedResult;
  /** Metrics that never resolved in the catalog */
  failures?: readonly UnknownMetricError[];
}

export interface AssemblerDeps {
  catalog: FieldCatalog;
  config: Pick<EngineConfig, 'optionalMetrics' | 'alerts'>;
}

export class SnapshotAssembler {
  constructor(private readonly deps: AssemblerDeps) {}

  assemble(input: AssembleInput): RiskSnapshot {
    const { catalog, config } = this.deps;
    const table = new ObservationTable(input.asOf, input.requests, input.observations);
    const optional = new Set(config.optionalMetrics);

    const values: Record<string, number | null> = {};
    const signals: Record<string, SignalValue | null> = {};
    const provenance: Record<string, string[]> = {};
    const owners = new Map<string, string>();
    const missing: string[] = [];
    let complete = true;

    const claim = (name: string, owner: string): boolean => {
      const prev = owners.get(name);
      if (prev === undefined) {
        owners.set(name, owner);
        return true;
      }
      if (prev === owner) return false;
      throw new CatalogConflictError([name], `written by both ${prev} and ${owner}`);
    };

    // ── unknown metrics ─────────────────────────────────────────
    for (const failure of input.failures ?? []) {
      missing.push(`metric:${failure.metric}`);
      if (!optional.has(failure.metric)) complete = false;
    }

    const isRequired = (req: FieldRequest): boolean =>
      !optional.has(req.metric)
      && catalog.definition(req.metric).fields.find(f => f.role === req.role)?.optional !== true;
    const requiredAliases = new Set(input.requests.filter(isRequired).map(r => r.alias));
    const optionalAliases = new Set(input.requests.map(r => r.alias).filter(a => !requiredAliases.has(a)));

    // ── raw fields ──────────────────────────────────────────────
    for (const req of input.requests) {
      const key = fieldKey(req.instrument, req.field, req.params);
      const required = isRequired(req);

      if (claim(req.alias, key)) {
        const ref = table.latest(key, req.fillPolicy);
        values[req.alias] = ref?.value ?? null;
        provenance[req.alias] = ref ? [ref.id] : [];
      }

      if (values[req.alias] === null) {
        missing.push(req.alias);
        if (required) complete = false;
      }
    }

    // ── derived outputs ─────────────────────────────────────────
    for (const m of input.derived.metrics) {
      claim(m.name, `derived:${m.metric}`);
      if (m.type === 'number') {
        values[m.name] = outcomeValue(m.outcome);
      } else {
        signals[m.name] = outcomeValue(m.outcome);
      }
      provenance[m.name] = [...m.provenance];

      if (m.outcome.kind === 'MISSING_INPUT') {
        missing.push(m.name);
        // an output that only lacks optional fields does not degrade the snapshot
        const onlyOptional = m.outcome.missing.length > 0 && m.outcome.missing.every(x => optionalAliases.has(x));
        if (!optional.has(m.metric) && !onlyOptional) complete = false;
      }
    }

    // ── leverage scoring ────────────────────────────────────────
    // layers with no inputs stay null and are not listed as missing
    const scoring = scoreLeverage(values, signals);
    for (const entry of scoring ? scoringEntries(scoring) : []) {
      claim(entry.name, 'scoring:leverage');
      if (entry.type === 'number') {
        values[entry.name] = entry.value;
      } else {
        signals[entry.name] = entry.value;
      }
      provenance[entry.name] = Array.from(new Set(entry.inputs.flatMap(name => provenance[name] ?? [])));
    }

    const snapshot: RiskSnapshot = {
      snapshotId: nanoid(12),
      schemaVersion: SNAPSHOT_SCHEMA_VERSION,
      runTimestamp: input.runTimestamp,
      asOf: input.asOf,
      complete,
      missing: Array.from(new Set(missing)),
      values,
      signals,
      history: input.derived.history,
      alerts: [...buildAlerts(values, signals, config.alerts), ...(scoring ? scoringAlerts(scoring) : [])],
      provenance,
    };

    return deepFreeze(snapshot);
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
  }
  return value;
}

// ═══════════════════════════════════════════════════════════════
// OUTPUT RECORD
// ═══════════════════════════════════════════════════════════════

/**
 * Wire form. Returns fresh mutable copies; the snapshot stays frozen.
 */
export function toOutputRecord(s: RiskSnapshot): SnapshotRecord {
  const history: SnapshotRecord['history'] = {};
  for (const [alias, points] of Object.entries(s.history)) {
    history[alias] = points.map(p => ({ date: p.date, value: p.value }));
  }

  return {
    snapshot_id: s.snapshotId,
    schema_version: s.schemaVersion,
    run_timestamp: s.runTimestamp,
    as_of: s.asOf,
    complete: s.complete,
    missing: [...s.missing],
    values: { ...s.values },
    signals: { ...s.signals },
    history,
    alerts: s.alerts.map(a => ({ ...a })),
  };
}
