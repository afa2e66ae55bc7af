/**
 * Application Errors
 *
 * AppError carries an HTTP status and a stable code; the Fastify error
 * handler in app.ts renders it as { ok: false, error: code, message }.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ═══════════════════════════════════════════════════════════════
// RISK SNAPSHOT TAXONOMY
// ═══════════════════════════════════════════════════════════════

/**
 * Catalog misconfiguration: the metric name is not registered.
 * Fatal to that metric only.
 */
export class UnknownMetricError extends AppError {
  readonly metric: string;

  constructor(metric: string) {
    super('UNKNOWN_METRIC', `Unknown metric: ${metric}`, 404);
    this.metric = metric;
  }
}

/**
 * The whole market-data source is unreachable. Fatal to the run:
 * no snapshot is produced.
 */
export class AdapterUnavailableError extends AppError {
  readonly source: string;

  constructor(source: string, message: string) {
    super('ADAPTER_UNAVAILABLE', `${source}: ${message}`, 503);
    this.source = source;
  }
}

/**
 * Two catalog entries resolve to the same output name.
 * Raised at validation time.
 */
export class CatalogConflictError extends AppError {
  readonly names: string[];

  constructor(names: string[], detail: string) {
    super('CATALOG_CONFLICT', `Catalog conflict on ${names.join(', ')}: ${detail}`, 500);
    this.names = names;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
