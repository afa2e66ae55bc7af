/**
 * RISK SNAPSHOT — Snapshot Types
 * ==============================
 *
 * One immutable record per scheduled run. A run never updates a
 * previous snapshot; the next run supersedes it.
 */

import type { SeriesPoint, SignalValue } from './metric.types.js';

export const SNAPSHOT_SCHEMA_VERSION = 'risk-snapshot/1.0';

// ═══════════════════════════════════════════════════════════════
// ALERTS
// ═══════════════════════════════════════════════════════════════

export type AlertSeverity = 'warning' | 'critical';

export const ALERT_TYPES = [
  'PC_EXTREME_FEAR',
  'PC_ELEVATED',
  'PC_EXTREME_GREED',
  'GEX_DEEP_NEGATIVE',
  'GEX_NEGATIVE',
  'SKEW_EXTREME',
  'SKEW_ELEVATED',
  'ZERO_DTE_HIGH',
  'CROWDING_DEGROSSING',
  'MARGIN_DEBT_SURGE',
  'CASCADE_WARNING',
] as const;

export type AlertType = typeof ALERT_TYPES[number];

export interface SnapshotAlert {
  type: AlertType;
  severity: AlertSeverity;
  message: string;
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT (IMMUTABLE RECORD)
// ═══════════════════════════════════════════════════════════════

export interface RiskSnapshot {
  readonly snapshotId: string;
  readonly schemaVersion: string;
  readonly runTimestamp: string;   // ISO-8601
  readonly asOf: string;           // YYYY-MM-DD
  readonly complete: boolean;
  readonly missing: readonly string[];
  readonly values: Readonly<Record<string, number | null>>;
  readonly signals: Readonly<Record<string, SignalValue | null>>;
  readonly history: Readonly<Record<string, readonly SeriesPoint[]>>;
  readonly alerts: readonly SnapshotAlert[];
  readonly provenance: Readonly<Record<string, readonly string[]>>;
}

/**
 * Wire form written by sinks and served by the routes.
 */
export interface SnapshotRecord {
  snapshot_id: string;
  schema_version: string;
  run_timestamp: string;
  as_of: string;
  complete: boolean;
  missing: string[];
  values: Record<string, number | null>;
  signals: Record<string, SignalValue | null>;
  history: Record<string, SeriesPoint[]>;
  alerts: SnapshotAlert[];
}

// ═══════════════════════════════════════════════════════════════
// RUN OUTCOME
// ═══════════════════════════════════════════════════════════════

export const RUN_STEP_NAMES = [
  'RESOLVE_CATALOG',
  'FETCH',
  'COMPUTE',
  'ASSEMBLE',
  'WRITE',
] as const;

export type RunStepName = typeof RUN_STEP_NAMES[number];

export interface RunStepResult {
  name: RunStepName;
  ok: boolean;
  ms: number;
  details?: Record<string, unknown>;
  error?: string;
}

export type SinkWriteResult =
  | { ok: true; location: string }
  | { ok: false; error: string };

export type RunOutcome =
  | {
      status: 'PUBLISHED';
      runId: string;
      durationMs: number;
      snapshot: RiskSnapshot;
      write: SinkWriteResult;
      steps: RunStepResult[];
    }
  | {
      status: 'FAILED';
      runId: string;
      durationMs: number;
      code: string;
      error: string;
      steps: RunStepResult[];
    }
  | {
      status: 'CANCELLED';
      runId: string;
      durationMs: number;
      steps: RunStepResult[];
    }
  | {
      status: 'SKIPPED_OVERLAP';
      runId: string;
      inFlightRunId: string;
    };
