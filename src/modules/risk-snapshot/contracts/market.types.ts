/**
 * RISK SNAPSHOT — Market Data Types
 *
 * Raw inputs as delivered by a fetcher adapter. All dates are
 * calendar days in YYYY-MM-DD form.
 */

// ═══════════════════════════════════════════════════════════════
// INSTRUMENTS
// ═══════════════════════════════════════════════════════════════

export type AssetClass = 'index' | 'equity' | 'future' | 'currency' | 'commodity';

export interface Instrument {
  readonly id: string;          // opaque terminal identifier, e.g. "SPX Index"
  readonly assetClass: AssetClass;
  readonly description: string;
}

// ═══════════════════════════════════════════════════════════════
// FIELD REQUESTS
// ═══════════════════════════════════════════════════════════════

export type FillPolicy = 'forward-fill' | 'none';

export type FieldParams = Readonly<Record<string, number>>;

/** Inclusive absolute date range */
export interface DateWindow {
  readonly start: string;
  readonly end: string;
}

export interface FieldRequest {
  readonly metric: string;
  readonly role: string;
  readonly instrument: string;
  readonly field: string;
  readonly params: FieldParams;
  readonly window: DateWindow;
  readonly fillPolicy: FillPolicy;
  readonly alias: string;        // output name in the snapshot
}

// ═══════════════════════════════════════════════════════════════
// OBSERVATIONS
// ═══════════════════════════════════════════════════════════════

export interface RawObservation {
  readonly instrument: string;
  readonly field: string;
  readonly params: FieldParams;
  readonly asOf: string;
  readonly value: number | null;
}

export interface UnresolvedField {
  readonly instrument: string;
  readonly field: string;
  readonly params: FieldParams;
  readonly reason: string;
}

export interface FetchResult {
  observations: RawObservation[];
  unresolved: UnresolvedField[];
}

// ═══════════════════════════════════════════════════════════════
// OPTION CHAINS
// ═══════════════════════════════════════════════════════════════

export type OptionType = 'call' | 'put';

export interface OptionChainRow {
  readonly instrument: string;
  readonly expiration: string;
  readonly strike: number;
  readonly optionType: OptionType;
  readonly gamma: number | null;
  readonly openInterest: number | null;
  readonly volume: number | null;
  readonly lastPrice: number | null;
  readonly daysToExpiration: number;
}

export interface ChainSnapshot {
  readonly underlying: string;
  readonly asOf: string;
  readonly spot: number | null;
  readonly rows: readonly OptionChainRow[];
}

export interface ExpirationWindow {
  readonly from: string;
  readonly to: string;
}

// ═══════════════════════════════════════════════════════════════
// KEYS
// ═══════════════════════════════════════════════════════════════

/**
 * Canonical key for an (instrument, field, parameters) triple.
 * Parameter order does not matter: {delta:25, period:30} and
 * {period:30, delta:25} share a key.
 */
export function fieldKey(instrument: string, field: string, params: FieldParams = {}): string {
  const p = Object.keys(params)
    .sort()
    .map(k => `${k}=${params[k]}`)
    .join(',');
  return p ? `${instrument}|${field}(${p})` : `${instrument}|${field}`;
}

export function observationId(obs: RawObservation): string {
  return `${fieldKey(obs.instrument, obs.field, obs.params)}@${obs.asOf}`;
}

export function chainRowId(row: OptionChainRow, asOf: string): string {
  return `chain:${row.instrument}|${row.expiration}|${row.strike}|${row.optionType}@${asOf}`;
}
