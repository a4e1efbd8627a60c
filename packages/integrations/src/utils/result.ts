/**
 * Result values and the sync error taxonomy
 *
 * Every call across the integration boundary returns a `Result` tagged with an
 * error kind. Retry scheduling reads the kind; nothing upstream relies on
 * exceptions to decide whether to retry.
 */

export type SyncErrorKind =
  | 'validation'
  | 'auth'
  | 'throttle'
  | 'transient'
  | 'conflict'
  | 'bulk_timeout';

export interface ApiError {
  kind: SyncErrorKind;
  message: string;
  /** Server-suggested minimum wait before retrying */
  retryAfterMs?: number;
  statusCode?: number;
  /** Remote error code (GraphQL extension code, bulk errorCode, ...) */
  code?: string;
  details?: unknown;
}

export type Result<T, E = ApiError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = ApiError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function apiError(
  kind: SyncErrorKind,
  message: string,
  extras: Omit<ApiError, 'kind' | 'message'> = {}
): ApiError {
  return { kind, message, ...extras };
}

const RETRYABLE_KINDS: ReadonlySet<SyncErrorKind> = new Set(['throttle', 'transient', 'bulk_timeout']);

export function isRetryableKind(kind: SyncErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/**
 * Render an error for `last_error` columns and logs. Keeps the remote
 * diagnostic intact.
 */
export function describeError(error: ApiError): string {
  const code = error.code ? ` [${error.code}]` : '';
  return `${error.kind}: ${error.message}${code}`;
}

/**
 * Thrown only for programming or configuration mistakes; remote failures are
 * reported as `Result` values instead.
 */
export class CommerceApiError extends Error {
  constructor(
    message: string,
    public readonly kind: SyncErrorKind = 'validation'
  ) {
    super(message);
    this.name = 'CommerceApiError';
  }
}
