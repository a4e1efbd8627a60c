/**
 * Backoff Policy
 * Exponential retry delays with bounded jitter
 */

// ============================================================================
// Types
// ============================================================================

export interface BackoffOptions {
  /** Delay before the first retry in milliseconds */
  baseDelayMs: number;
  /** Upper bound for any single delay in milliseconds */
  maxDelayMs: number;
  /** Number of failed attempts after which a job is terminal */
  maxRetries: number;
  /** Multiplier applied per attempt */
  factor?: number;
  /**
   * Fraction of the exponential delay added as random jitter, 0..1. Values up
   * to `factor - 1` keep delays non-decreasing across attempts.
   */
  jitterRatio?: number;
  /** Random source in [0, 1), injectable for reproducible tests */
  random?: () => number;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_BACKOFF_OPTIONS = {
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  maxRetries: 5,
  factor: 2,
  jitterRatio: 0.5,
} as const;

// ============================================================================
// Backoff Functions
// ============================================================================

/**
 * Delay before retry number `attempt` (1-based).
 *
 * delay = min(maxDelay, base * factor^(attempt-1) * (1 + jitterRatio * r))
 *
 * With jitterRatio <= factor - 1 the next un-jittered delay is at least the
 * largest jittered value of the previous attempt, so the sequence never
 * decreases, and it stays at maxDelay once capped.
 */
export function calculateBackoffDelay(
  attempt: number,
  options: Pick<BackoffOptions, 'baseDelayMs' | 'maxDelayMs' | 'factor' | 'jitterRatio' | 'random'>
): number {
  const factor = options.factor ?? DEFAULT_BACKOFF_OPTIONS.factor;
  const jitterRatio = Math.min(
    Math.max(options.jitterRatio ?? DEFAULT_BACKOFF_OPTIONS.jitterRatio, 0),
    Math.max(factor - 1, 0)
  );
  const random = options.random ?? Math.random;

  const exponent = Math.max(0, attempt - 1);
  const exponential = options.baseDelayMs * Math.pow(factor, exponent);
  const jittered = exponential * (1 + jitterRatio * random());

  return Math.round(Math.min(jittered, options.maxDelayMs));
}

// ============================================================================
// Backoff Controller
// ============================================================================

export class BackoffPolicy {
  readonly options: Required<Omit<BackoffOptions, 'random'>> & Pick<BackoffOptions, 'random'>;

  constructor(options: Partial<BackoffOptions> = {}) {
    this.options = {
      ...DEFAULT_BACKOFF_OPTIONS,
      ...options,
    };
  }

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  /**
   * Delay before retry `attempt`. A server-provided `hintMs` (Retry-After,
   * throttle restore time) acts as a floor but never lifts the delay above
   * the cap.
   */
  delayFor(attempt: number, hintMs?: number): number {
    const computed = calculateBackoffDelay(attempt, this.options);
    if (hintMs === undefined || hintMs <= computed) {
      return computed;
    }
    return Math.min(Math.ceil(hintMs), this.options.maxDelayMs);
  }

  /**
   * Whether a job that has failed `retryCount` times may run again
   */
  shouldRetry(retryCount: number): boolean {
    return retryCount < this.options.maxRetries;
  }
}
