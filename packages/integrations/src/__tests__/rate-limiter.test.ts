/**
 * Cost Rate Limiter Tests
 * Budget reservation, bounded waiting and server-reported corrections
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CostRateLimiter } from '../utils/rate-limiter.js';
import { ManualClock } from '../utils/clock.js';

describe('CostRateLimiter', () => {
  let clock: ManualClock;
  let limiter: CostRateLimiter;

  beforeEach(() => {
    clock = new ManualClock(0);
    limiter = new CostRateLimiter({ maximumCost: 100, restoreRate: 10, maxWaitMs: 5000, clock });
  });

  describe('reserve', () => {
    it('reserves immediately while budget is available', () => {
      expect(limiter.reserve(60)).toBe(0);
      expect(limiter.getState().availableCost).toBe(40);
      expect(limiter.getInFlightCost()).toBe(60);
    });

    it('returns the time until the deficit is restored', () => {
      limiter.reserve(60);

      expect(limiter.reserve(60)).toBe(2000);
      expect(limiter.getState().availableCost).toBe(40);
    });

    it('accounts for budget restored since the last observation', () => {
      limiter.reserve(60);
      clock.advance(1000);

      expect(limiter.reserve(60)).toBe(1000);
    });

    it('caps a single reservation at the bucket size', () => {
      expect(limiter.reserve(500)).toBe(0);
      expect(limiter.getState().availableCost).toBe(0);
      expect(limiter.getInFlightCost()).toBe(100);
    });

    it('never restores beyond the maximum', () => {
      limiter.reserve(60);
      clock.advance(100000);

      expect(limiter.getState().availableCost).toBe(100);
    });
  });

  describe('acquire', () => {
    it('waits for the restore interval and then reserves', async () => {
      limiter.reserve(60);

      const result = await limiter.acquire(60);

      expect(result).toEqual({ ok: true, value: 60 });
      expect(clock.sleeps).toEqual([2000]);
      expect(clock.now()).toBe(2000);
      expect(limiter.getInFlightCost()).toBe(120);
    });

    it('returns a throttle error when the wait would exceed maxWaitMs', async () => {
      limiter = new CostRateLimiter({ maximumCost: 100, restoreRate: 10, maxWaitMs: 1000, clock });
      limiter.reserve(60);

      const result = await limiter.acquire(60);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('throttle');
        expect(result.error.retryAfterMs).toBe(2000);
      }
      expect(clock.sleeps).toEqual([]);
    });
  });

  describe('observe', () => {
    it('prefers the server-reported throttle status', () => {
      limiter.reserve(60);

      limiter.observe(
        {
          actualQueryCost: 12,
          throttleStatus: { maximumAvailable: 200, currentlyAvailable: 150, restoreRate: 20 },
        },
        60
      );

      expect(limiter.getState()).toEqual({
        availableCost: 150,
        maximumCost: 200,
        restoreRate: 20,
        lastObservedAt: 0,
      });
      expect(limiter.getInFlightCost()).toBe(0);
    });

    it('subtracts cost still in flight from the reported budget', () => {
      limiter.reserve(30);
      limiter.reserve(30);

      limiter.observe(
        { throttleStatus: { maximumAvailable: 100, currentlyAvailable: 90, restoreRate: 10 } },
        30
      );

      expect(limiter.getState().availableCost).toBe(60);
      expect(limiter.getInFlightCost()).toBe(30);
    });

    it('refunds the unused estimate when only the actual cost is known', () => {
      limiter.reserve(50);

      limiter.observe({ actualQueryCost: 20 }, 50);

      expect(limiter.getState().availableCost).toBe(80);
    });

    it('keeps the local estimate when the response carries no cost', () => {
      limiter.reserve(50);

      limiter.observe(undefined, 50);

      expect(limiter.getState().availableCost).toBe(50);
      expect(limiter.getInFlightCost()).toBe(0);
    });

    it('never drives the available budget below zero', () => {
      limiter.reserve(100);

      limiter.observe(
        { throttleStatus: { maximumAvailable: 100, currentlyAvailable: 40, restoreRate: 10 } },
        0
      );

      expect(limiter.getState().availableCost).toBe(0);
    });
  });
});
