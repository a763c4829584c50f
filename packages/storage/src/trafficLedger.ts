/**
 * In-Memory Traffic Ledger
 *
 * Per-user byte accounting against per-file, daily and monthly limits.
 * Periods roll over at UTC midnight and on the first of the UTC month.
 *
 * A reservation holds headroom between the check and the delivery so
 * concurrent tasks of one user cannot overshoot a limit together.
 * Neither method awaits anything, which keeps each call atomic.
 */

import {
  ValidationError,
  type LimitKind,
  type ReservationResult,
  type TrafficLedger,
  type TransferOutcome,
} from '@tg-relay/core';

export interface TrafficLimits {
  /** 0 disables the limit */
  perFileBytes: number;
  dailyBytes: number;
  monthlyBytes: number;
}

const GiB = 1024 * 1024 * 1024;

export const defaultTrafficLimits: TrafficLimits = {
  perFileBytes: 100 * 1024 * 1024,
  dailyBytes: GiB,
  monthlyBytes: 10 * GiB,
};

export interface TrafficUsage {
  userId: string;
  dailyBytes: number;
  monthlyBytes: number;
  reservedBytes: number;
  limits: TrafficLimits;
}

interface UsageEntry {
  day: string;
  month: string;
  dailyBytes: number;
  monthlyBytes: number;
  reservedBytes: number;
}

function dayKey(now: Date): string {
  return now.toISOString().slice(0, 10);
}

function monthKey(now: Date): string {
  return now.toISOString().slice(0, 7);
}

function exceeds(limit: number, used: number, requested: number): boolean {
  return limit > 0 && used + requested > limit;
}

export class InMemoryTrafficLedger implements TrafficLedger {
  private readonly limits: TrafficLimits;
  private readonly overrides: Map<string, Partial<TrafficLimits>> = new Map();
  private readonly usage: Map<string, UsageEntry> = new Map();

  constructor(
    limits: Partial<TrafficLimits> = {},
    private readonly now: () => Date = () => new Date()
  ) {
    this.limits = { ...defaultTrafficLimits, ...limits };
  }

  /**
   * Override some limits for one user; the rest keep the defaults
   */
  setUserLimits(userId: string, limits: Partial<TrafficLimits>): void {
    this.overrides.set(userId, { ...this.overrides.get(userId), ...limits });
  }

  clearUserLimits(userId: string): void {
    this.overrides.delete(userId);
  }

  limitsFor(userId: string): TrafficLimits {
    return { ...this.limits, ...this.overrides.get(userId) };
  }

  async checkAndReserve(userId: string, byteSize: number): Promise<ReservationResult> {
    if (!Number.isFinite(byteSize) || byteSize < 0) {
      throw new ValidationError('byteSize', 'must be a non-negative number');
    }

    const limits = this.limitsFor(userId);
    const entry = this.entry(userId);

    const checks: Array<{ kind: LimitKind; limit: number; used: number }> = [
      { kind: 'per_file', limit: limits.perFileBytes, used: 0 },
      { kind: 'daily', limit: limits.dailyBytes, used: entry.dailyBytes + entry.reservedBytes },
      { kind: 'monthly', limit: limits.monthlyBytes, used: entry.monthlyBytes + entry.reservedBytes },
    ];

    for (const check of checks) {
      if (exceeds(check.limit, check.used, byteSize)) {
        return { allowed: false, limitKind: check.kind, limitBytes: check.limit, usedBytes: check.used };
      }
    }

    entry.reservedBytes += byteSize;
    return { allowed: true };
  }

  async record(userId: string, byteSize: number, outcome: TransferOutcome): Promise<void> {
    const entry = this.entry(userId);
    entry.reservedBytes = Math.max(0, entry.reservedBytes - byteSize);

    if (outcome === 'delivered') {
      entry.dailyBytes += byteSize;
      entry.monthlyBytes += byteSize;
    }
  }

  getUsage(userId: string): TrafficUsage {
    const entry = this.entry(userId);
    return {
      userId,
      dailyBytes: entry.dailyBytes,
      monthlyBytes: entry.monthlyBytes,
      reservedBytes: entry.reservedBytes,
      limits: this.limitsFor(userId),
    };
  }

  /**
   * Current-period entry for a user, rolled over when the period changed
   */
  private entry(userId: string): UsageEntry {
    const now = this.now();
    const day = dayKey(now);
    const month = monthKey(now);

    let entry = this.usage.get(userId);
    if (!entry) {
      entry = { day, month, dailyBytes: 0, monthlyBytes: 0, reservedBytes: 0 };
      this.usage.set(userId, entry);
      return entry;
    }

    if (entry.month !== month) {
      entry.month = month;
      entry.monthlyBytes = 0;
    }
    if (entry.day !== day) {
      entry.day = day;
      entry.dailyBytes = 0;
    }
    return entry;
  }
}
