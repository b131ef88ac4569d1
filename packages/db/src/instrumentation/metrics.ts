import { performance } from 'node:perf_hooks';

export enum DbErrorCode {
  INPUT_INVALID = 'INPUT_INVALID',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  TRANSIENT = 'TRANSIENT',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

export type DbErrorReason =
  | 'unique_violation'
  | 'foreign_key_violation'
  | 'constraint_violation'
  | 'serialization_failure'
  | 'lock_unavailable'
  | 'connection_failure'
  | 'record_missing'
  | 'unclassified_pg_error'
  | 'unclassified_error';

export interface DbErrorDetail {
  reason?: DbErrorReason;
  context?: Record<string, unknown>;
}

export class DbError extends Error {
  public readonly code: DbErrorCode;

  public readonly detail?: DbErrorDetail;

  constructor(code: DbErrorCode, message: string, options?: { detail?: DbErrorDetail; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.code = code;
    this.detail = options?.detail;
    this.name = 'DbError';
  }

  get retryable(): boolean {
    return this.code === DbErrorCode.TRANSIENT;
  }
}

export const isUniqueViolation = (error: unknown): error is DbError =>
  error instanceof DbError && error.code === DbErrorCode.CONFLICT && error.detail?.reason === 'unique_violation';

export interface MetricsEvent {
  operation: string;
  durationMs: number;
  outcome: 'success' | 'error';
  errorCode?: DbErrorCode;
}

export type MetricsHook = (event: MetricsEvent) => void;

const noop: MetricsHook = () => undefined;

let activeHook: MetricsHook = noop;

export function registerMetricsHook(hook: MetricsHook | null | undefined): void {
  activeHook = hook ?? noop;
}

export function getMetricsHook(): MetricsHook {
  return activeHook;
}

interface PostgresErrorShape {
  code: string;
  message: string;
  constraint?: string;
  table?: string;
}

function isPostgresError(error: unknown): error is PostgresErrorShape {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return typeof error.code === 'string' && /^[0-9A-Z]{5}$/.test(error.code);
}

export function ensureDbError(error: unknown, fallback: DbErrorCode = DbErrorCode.INTERNAL_ERROR): DbError {
  if (error instanceof DbError) {
    return error;
  }

  if (isPostgresError(error)) {
    return mapPostgresError(error);
  }

  const message = error instanceof Error ? error.message : 'Unhandled database error';
  return new DbError(fallback, message, { detail: { reason: 'unclassified_error' }, cause: error });
}

export interface WithMetricsOptions {
  /** Errors accepted here are reported and rethrown as they are instead of being classified. */
  passThrough?: (error: unknown) => boolean;
}

export async function withMetrics<TResult>(
  operation: string,
  runner: () => Promise<TResult>,
  options: WithMetricsOptions = {}
): Promise<TResult> {
  const hook = getMetricsHook();
  const startedAt = performance.now();

  try {
    const result = await runner();
    hook({
      operation,
      outcome: 'success',
      durationMs: performance.now() - startedAt
    });
    return result;
  } catch (error) {
    if (options.passThrough?.(error)) {
      hook({
        operation,
        outcome: 'error',
        durationMs: performance.now() - startedAt,
        ...(error instanceof DbError ? { errorCode: error.code } : {})
      });
      throw error;
    }

    const classified = ensureDbError(error);
    hook({
      operation,
      outcome: 'error',
      durationMs: performance.now() - startedAt,
      errorCode: classified.code
    });
    throw classified;
  }
}

function mapPostgresError(error: PostgresErrorShape): DbError {
  const context = { code: error.code, constraint: error.constraint, table: error.table };
  const classify = (code: DbErrorCode, reason: DbErrorReason): DbError =>
    new DbError(code, error.message, { detail: { reason, context }, cause: error });

  switch (error.code) {
    case '23505': // unique_violation
      return classify(DbErrorCode.CONFLICT, 'unique_violation');
    case '23503': // foreign_key_violation
      return classify(DbErrorCode.NOT_FOUND, 'foreign_key_violation');
    case '23514': // check_violation
    case '23502': // not_null_violation
    case '22001': // string_data_right_truncation
    case '22003': // numeric_value_out_of_range
    case '22P02': // invalid_text_representation
      return classify(DbErrorCode.INPUT_INVALID, 'constraint_violation');
    case '40001': // serialization_failure
    case '40P01': // deadlock_detected
      return classify(DbErrorCode.TRANSIENT, 'serialization_failure');
    case '55P03': // lock_not_available
      return classify(DbErrorCode.TRANSIENT, 'lock_unavailable');
    case '57P01': // admin_shutdown
    case '08006': // connection_failure
    case '08001': // sqlclient_unable_to_establish_sqlconnection
      return classify(DbErrorCode.TRANSIENT, 'connection_failure');
    default:
      return classify(DbErrorCode.INTERNAL_ERROR, 'unclassified_pg_error');
  }
}
