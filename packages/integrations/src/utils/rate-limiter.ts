/**
 * Cost-based Rate Limiter
 * Leaky-bucket accounting of GraphQL query cost, corrected by the throttle
 * status the platform reports on every response.
 */

import { systemClock, type Clock } from './clock.js';
import { apiError, err, ok, type Result } from './result.js';
import type { CostExtension } from '../types.js';

// ============================================================================
// Types
// ============================================================================

export interface RateLimitState {
  availableCost: number;
  maximumCost: number;
  /** Cost units restored per second */
  restoreRate: number;
  lastObservedAt: number;
}

export interface CostRateLimiterOptions {
  /** Bucket size assumed until the server reports one */
  maximumCost: number;
  /** Restore rate assumed until the server reports one */
  restoreRate: number;
  /** Longest `acquire` will block before giving up with a throttle error */
  maxWaitMs: number;
  clock?: Clock;
}

// ============================================================================
// Pre-configured limits (standard Admin API plan)
// ============================================================================

export const DEFAULT_COST_LIMITS = {
  maximumCost: 1000,
  restoreRate: 50,
  maxWaitMs: 30000,
} as const;

// ============================================================================
// Rate Limiter Class
// ============================================================================

/**
 * One instance per API credential, shared by every worker using it. All state
 * changes happen synchronously inside a single method call, so concurrent
 * async callers on the event loop never observe a half-applied update.
 */
export class CostRateLimiter {
  private readonly clock: Clock;
  private readonly maxWaitMs: number;
  private readonly state: RateLimitState;
  private inFlightCost = 0;

  constructor(options: Partial<CostRateLimiterOptions> = {}) {
    this.clock = options.clock ?? systemClock;
    this.maxWaitMs = options.maxWaitMs ?? DEFAULT_COST_LIMITS.maxWaitMs;
    const maximumCost = options.maximumCost ?? DEFAULT_COST_LIMITS.maximumCost;
    this.state = {
      availableCost: maximumCost,
      maximumCost,
      restoreRate: options.restoreRate ?? DEFAULT_COST_LIMITS.restoreRate,
      lastObservedAt: this.clock.now(),
    };
  }

  /**
   * Try to reserve `cost` units now. Returns 0 when reserved, otherwise the
   * number of milliseconds until enough budget will have been restored. A
   * refused reservation leaves the state untouched.
   */
  reserve(cost: number): number {
    this.restore(this.clock.now());
    const needed = this.normalizeCost(cost);

    if (this.state.availableCost >= needed) {
      this.state.availableCost -= needed;
      this.inFlightCost += needed;
      return 0;
    }

    const deficit = needed - this.state.availableCost;
    return Math.ceil((deficit / this.restoreRate()) * 1000);
  }

  /**
   * Reserve `cost`, waiting for budget up to `maxWaitMs`. Resolves with the
   * reserved amount, which must be handed back through `observe`.
   */
  async acquire(cost: number): Promise<Result<number>> {
    let waited = 0;

    for (;;) {
      const waitMs = this.reserve(cost);
      if (waitMs === 0) {
        return ok(this.normalizeCost(cost));
      }

      if (waited + waitMs > this.maxWaitMs) {
        return err(
          apiError('throttle', `Query cost ${cost} exceeds available budget`, {
            retryAfterMs: waitMs,
          })
        );
      }

      await this.clock.sleep(waitMs);
      waited += waitMs;
    }
  }

  /**
   * Settle a reservation once the response (or failure) is known. Server
   * throttle status wins over local estimation whenever it is present.
   */
  observe(cost: CostExtension | undefined, reservedCost: number): void {
    const now = this.clock.now();
    this.restore(now);
    this.inFlightCost = Math.max(0, this.inFlightCost - reservedCost);

    const status = cost?.throttleStatus;
    if (status) {
      this.state.maximumCost = status.maximumAvailable;
      this.state.restoreRate = status.restoreRate;
      this.state.availableCost = clamp(
        status.currentlyAvailable - this.inFlightCost,
        0,
        status.maximumAvailable
      );
      this.state.lastObservedAt = now;
      return;
    }

    const actual = cost?.actualQueryCost;
    if (typeof actual === 'number') {
      this.state.availableCost = clamp(
        this.state.availableCost + (reservedCost - actual),
        0,
        this.state.maximumCost
      );
    }
  }

  /**
   * Snapshot of the bucket, restored up to the current time
   */
  getState(): RateLimitState {
    this.restore(this.clock.now());
    return { ...this.state };
  }

  getInFlightCost(): number {
    return this.inFlightCost;
  }

  private restore(now: number): void {
    const elapsedMs = now - this.state.lastObservedAt;
    if (elapsedMs <= 0) {
      return;
    }
    this.state.availableCost = Math.min(
      this.state.maximumCost,
      this.state.availableCost + (elapsedMs / 1000) * this.restoreRate()
    );
    this.state.lastObservedAt = now;
  }

  private restoreRate(): number {
    return this.state.restoreRate || 1;
  }

  // A single query can never cost more than the whole bucket.
  private normalizeCost(cost: number): number {
    return Math.min(Math.max(0, cost), this.state.maximumCost);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
