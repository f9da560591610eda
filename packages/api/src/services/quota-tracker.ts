import { DISPATCH_CHANNELS, type DispatchChannel } from '@gasguard/core';
import type { Clock } from '../types.js';

export const QUOTA_PERIODS = ['minute', 'hour', 'day', 'month'] as const;

export type QuotaPeriod = (typeof QUOTA_PERIODS)[number];

export interface QuotaRule {
  /** 0 = unlimited */
  limit: number;
  period: QuotaPeriod;
}

export type QuotaRules = Record<DispatchChannel, QuotaRule>;

/** Whether a multicast costs one unit per call or one per recipient */
export type MulticastCharge = 'per-call' | 'per-target';

export interface QuotaCounter {
  channel: DispatchChannel;
  periodStart: Date;
  periodEnd: Date;
  count: number;
  limit: number;
}

export type ReserveResult =
  | { ok: true; count: number; limit: number; remaining: number | null }
  | { ok: false; reason: 'QUOTA_EXCEEDED'; count: number; limit: number; resetAt: Date };

/** Calendar-aligned UTC window containing `at` */
export function periodBounds(period: QuotaPeriod, at: Date): { start: Date; end: Date } {
  const y = at.getUTCFullYear();
  const mo = at.getUTCMonth();
  const d = at.getUTCDate();
  const h = at.getUTCHours();
  const mi = at.getUTCMinutes();

  switch (period) {
    case 'minute':
      return { start: new Date(Date.UTC(y, mo, d, h, mi)), end: new Date(Date.UTC(y, mo, d, h, mi + 1)) };
    case 'hour':
      return { start: new Date(Date.UTC(y, mo, d, h)), end: new Date(Date.UTC(y, mo, d, h + 1)) };
    case 'day':
      return { start: new Date(Date.UTC(y, mo, d)), end: new Date(Date.UTC(y, mo, d + 1)) };
    case 'month':
      return { start: new Date(Date.UTC(y, mo, 1)), end: new Date(Date.UTC(y, mo + 1, 1)) };
  }
}

/**
 * Per-channel send counters. reserve() checks and increments in one
 * synchronous step; a rejected reservation leaves the counter untouched.
 * There is no release, so counts never go down within a period.
 */
export class QuotaTracker {
  private counters = new Map<DispatchChannel, QuotaCounter>();

  constructor(
    private readonly rules: QuotaRules,
    private readonly now: Clock = () => new Date(),
  ) {}

  reserve(channel: DispatchChannel, units = 1): ReserveResult {
    if (!Number.isInteger(units) || units < 1) {
      throw new RangeError(`Quota units must be a positive integer, got ${units}`);
    }

    const counter = this.current(channel);

    if (counter.limit > 0 && counter.count + units > counter.limit) {
      return {
        ok: false,
        reason: 'QUOTA_EXCEEDED',
        count: counter.count,
        limit: counter.limit,
        resetAt: counter.periodEnd,
      };
    }

    counter.count += units;
    return {
      ok: true,
      count: counter.count,
      limit: counter.limit,
      remaining: counter.limit > 0 ? counter.limit - counter.count : null,
    };
  }

  snapshot(): QuotaCounter[] {
    return DISPATCH_CHANNELS.map((channel) => ({ ...this.current(channel) }));
  }

  private current(channel: DispatchChannel): QuotaCounter {
    const now = this.now();
    const existing = this.counters.get(channel);
    if (existing && now < existing.periodEnd) return existing;

    const rule = this.rules[channel];
    const { start, end } = periodBounds(rule.period, now);
    const counter: QuotaCounter = { channel, periodStart: start, periodEnd: end, count: 0, limit: rule.limit };
    this.counters.set(channel, counter);
    return counter;
  }
}
