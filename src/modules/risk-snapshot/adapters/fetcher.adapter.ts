/**
 * Snapshot Fetcher Adapter
 *
 * Capability boundary to the market-data source. Implementations accept
 * absolute date ranges only and report per-key failures in `unresolved`
 * instead of throwing. AdapterUnavailableError is reserved for a source
 * that cannot be reached at all.
 */

import type {
  ChainSnapshot,
  ExpirationWindow,
  FetchResult,
  FieldRequest,
} from '../contracts/market.types.js';

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface SnapshotFetcherAdapter {
  readonly name: string;

  /** One observation per requested key and available date */
  fetch(requests: readonly FieldRequest[], options?: FetchOptions): Promise<FetchResult>;

  /**
   * Option chain rows expiring inside the window. null when the source
   * has no chain for the underlying.
   */
  fetchChain(underlying: string, window: ExpirationWindow, options?: FetchOptions): Promise<ChainSnapshot | null>;
}
