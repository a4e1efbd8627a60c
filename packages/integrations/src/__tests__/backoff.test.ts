/**
 * Backoff Policy Tests
 */

import { describe, it, expect } from 'vitest';
import { BackoffPolicy, calculateBackoffDelay } from '../utils/backoff.js';

describe('calculateBackoffDelay', () => {
  const base = { baseDelayMs: 1000, maxDelayMs: 60000 };

  it('doubles the base delay per attempt without jitter', () => {
    const random = () => 0;

    expect(calculateBackoffDelay(1, { ...base, random })).toBe(1000);
    expect(calculateBackoffDelay(2, { ...base, random })).toBe(2000);
    expect(calculateBackoffDelay(3, { ...base, random })).toBe(4000);
  });

  it('adds jitter proportional to the exponential delay', () => {
    const random = () => 0.5;

    expect(calculateBackoffDelay(1, { ...base, random })).toBe(1250);
    expect(calculateBackoffDelay(2, { ...base, random })).toBe(2500);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(calculateBackoffDelay(10, { ...base, random: () => 0 })).toBe(60000);
  });

  it('clamps a jitter ratio that would break ordering', () => {
    expect(calculateBackoffDelay(1, { ...base, jitterRatio: 3, random: () => 0.5 })).toBe(1500);
  });
});

describe('BackoffPolicy', () => {
  it('never decreases across attempts, whatever the jitter draws', () => {
    const high = new BackoffPolicy({ random: () => 0.9999 });
    const low = new BackoffPolicy({ random: () => 0 });

    for (let attempt = 1; attempt < 12; attempt++) {
      expect(low.delayFor(attempt + 1)).toBeGreaterThanOrEqual(high.delayFor(attempt));
    }
  });

  it('produces a non-decreasing sequence for a single failing job', () => {
    let draw = 0;
    const draws = [0.9, 0.1, 0.7, 0.0, 0.99, 0.3, 0.5, 0.2];
    const policy = new BackoffPolicy({ random: () => draws[draw++ % draws.length] ?? 0 });

    const delays = Array.from({ length: 8 }, (_, index) => policy.delayFor(index + 1));

    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1] ?? 0);
    }
    expect(delays[7]).toBe(60000);
  });

  it('uses a server hint as a floor', () => {
    const policy = new BackoffPolicy({ random: () => 0 });

    expect(policy.delayFor(1, 5000)).toBe(5000);
    expect(policy.delayFor(3, 1000)).toBe(4000);
  });

  it('never lets a hint lift the delay above the cap', () => {
    const policy = new BackoffPolicy({ random: () => 0 });

    expect(policy.delayFor(1, 120000)).toBe(60000);
  });

  it('bounds retries by maxRetries', () => {
    const policy = new BackoffPolicy({ maxRetries: 3 });

    expect(policy.shouldRetry(0)).toBe(true);
    expect(policy.shouldRetry(2)).toBe(true);
    expect(policy.shouldRetry(3)).toBe(false);
    expect(policy.maxRetries).toBe(3);
  });
});
