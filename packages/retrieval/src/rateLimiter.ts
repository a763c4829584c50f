/**
 * Adaptive Rate Limiter
 *
 * Token bucket shared by every worker. The refill rate backs off
 * multiplicatively when upstream throttles and recovers slowly after a run
 * of successes.
 *
 * All mutating methods are synchronous, so on a single event loop a
 * refill-check-deduct sequence can never interleave with another worker's.
 */

import { ValidationError } from '@tg-relay/core';

export interface RateLimiterOptions {
  /** Maximum tokens the bucket holds */
  capacity: number;
  /** Tokens per second at start */
  initialRate: number;
  minRate: number;
  maxRate: number;
  /** Consecutive successes needed before the rate grows */
  successThreshold: number;
  increaseFactor: number;
  decreaseFactor: number;
  /** Tokens at start; defaults to a full bucket */
  initialTokens?: number;
}

export const defaultRateLimiterOptions: RateLimiterOptions = {
  capacity: 3,
  initialRate: 0.5,
  minRate: 0.1,
  maxRate: 10,
  successThreshold: 10,
  increaseFactor: 1.2,
  decreaseFactor: 0.5,
};

export interface RateLimiterSnapshot {
  capacity: number;
  tokens: number;
  rate: number;
  consecutiveSuccesses: number;
  lastWaitHintMs: number;
  throttleCount: number;
}

function validate(options: RateLimiterOptions): void {
  if (!(options.capacity >= 1)) {
    throw new ValidationError('capacity', 'must be at least 1');
  }
  if (!(options.minRate > 0)) {
    throw new ValidationError('minRate', 'must be greater than 0');
  }
  if (options.minRate > options.maxRate) {
    throw new ValidationError('minRate', 'must not exceed maxRate');
  }
  if (options.initialRate < options.minRate || options.initialRate > options.maxRate) {
    throw new ValidationError('initialRate', `must be between ${options.minRate} and ${options.maxRate}`);
  }
  if (!Number.isInteger(options.successThreshold) || options.successThreshold < 1) {
    throw new ValidationError('successThreshold', 'must be a positive integer');
  }
  if (!(options.increaseFactor > 1)) {
    throw new ValidationError('increaseFactor', 'must be greater than 1');
  }
  if (!(options.decreaseFactor > 0 && options.decreaseFactor < 1)) {
    throw new ValidationError('decreaseFactor', 'must be between 0 and 1');
  }
  const initialTokens = options.initialTokens ?? options.capacity;
  if (initialTokens < 0 || initialTokens > options.capacity) {
    throw new ValidationError('initialTokens', `must be between 0 and ${options.capacity}`);
  }
}

export class AdaptiveRateLimiter {
  private readonly options: RateLimiterOptions;
  private tokens: number;
  private rate: number;
  private lastRefill: number;
  private consecutiveSuccesses = 0;
  private lastWaitHintMs = 0;
  private throttleCount = 0;

  constructor(
    options: Partial<RateLimiterOptions> = {},
    private readonly now: () => number = Date.now
  ) {
    this.options = { ...defaultRateLimiterOptions, ...options };
    validate(this.options);

    this.tokens = this.options.initialTokens ?? this.options.capacity;
    this.rate = this.options.initialRate;
    this.lastRefill = this.now();
  }

  private checkCost(cost: number): void {
    if (!Number.isFinite(cost) || cost <= 0) {
      throw new ValidationError('cost', 'must be a positive finite number');
    }
    if (cost > this.options.capacity) {
      throw new ValidationError('cost', `must not exceed bucket capacity ${this.options.capacity}`);
    }
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.options.capacity, this.tokens + elapsedSeconds * this.rate);
    this.lastRefill = now;
  }

  /**
   * Take `cost` tokens if available. Never blocks.
   */
  tryAcquire(cost = 1): boolean {
    this.checkCost(cost);
    this.refill();
    if (this.tokens < cost) {
      return false;
    }
    this.tokens -= cost;
    return true;
  }

  /**
   * Milliseconds until `cost` tokens would be available at the current rate
   */
  msUntilAvailable(cost = 1): number {
    this.checkCost(cost);
    this.refill();
    const deficit = cost - this.tokens;
    if (deficit <= 0) {
      return 0;
    }
    return Math.ceil((deficit / this.rate) * 1000);
  }

  /**
   * Upstream asked us to slow down. Halves the rate (never below the
   * floor) and records the server's wait hint.
   */
  onThrottled(waitHintMs: number): number {
    this.refill();
    this.rate = Math.max(this.options.minRate, this.rate * this.options.decreaseFactor);
    this.consecutiveSuccesses = 0;
    this.lastWaitHintMs = Number.isFinite(waitHintMs) ? Math.max(0, waitHintMs) : 0;
    this.throttleCount += 1;
    return this.lastWaitHintMs;
  }

  onSuccess(): void {
    this.consecutiveSuccesses += 1;
    if (this.consecutiveSuccesses < this.options.successThreshold) {
      return;
    }

    this.refill();
    this.rate = Math.min(this.options.maxRate, this.rate * this.options.increaseFactor);
    this.consecutiveSuccesses = 0;
  }

  getRate(): number {
    return this.rate;
  }

  snapshot(): RateLimiterSnapshot {
    this.refill();
    return {
      capacity: this.options.capacity,
      tokens: this.tokens,
      rate: this.rate,
      consecutiveSuccesses: this.consecutiveSuccesses,
      lastWaitHintMs: this.lastWaitHintMs,
      throttleCount: this.throttleCount,
    };
  }
}
