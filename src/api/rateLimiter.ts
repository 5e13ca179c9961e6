import { isoNow } from '../utils/time.js';

// ─── Rate limiter types ─────────────────────────────────────────────────────

export interface RateLimiterConfig {
  commandsPerMinute: number;
  /** Clock in ms; injectable for tests. */
  now?: () => number;
}

interface SenderBucket {
  tokens: number;
  lastRefillAt: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  limit: number;
  retryAfterSeconds: number | null;
  checkedAt: string;
}

export interface RateLimitMetrics {
  totalChecks: number;
  totalAllowed: number;
  totalDenied: number;
  deniedBySender: Record<string, number>;
  trackedSenders: number;
}

/** Relative cost of each command; creating a poll weighs more than a vote. */
export const COMMAND_COST = {
  stake: 1,
  unstake: 1,
  claim: 1,
  vote: 1,
  end: 1,
  execute: 1,
  expire: 1,
  income: 1,
  faucet: 2,
  createPoll: 5,
} as const;

export type CommandName = keyof typeof COMMAND_COST;

/** Full buckets are swept at most this often, on the limiter's own clock. */
export const PRUNE_INTERVAL_MS = 60_000;

// ─── Rate limiter (token bucket per sender) ─────────────────────────────────

export class RateLimiter {
  private readonly limit: number;
  private readonly now: () => number;
  private readonly buckets: Map<string, SenderBucket> = new Map();
  private lastPruneAt: number;
  private readonly metrics: Omit<RateLimitMetrics, 'trackedSenders'> = {
    totalChecks: 0,
    totalAllowed: 0,
    totalDenied: 0,
    deniedBySender: {},
  };

  constructor(config: RateLimiterConfig) {
    this.limit = config.commandsPerMinute;
    this.now = config.now ?? Date.now;
    this.lastPruneAt = this.now();
  }

  check(sender: string, command: CommandName = 'vote'): RateLimitResult {
    if (this.now() - this.lastPruneAt >= PRUNE_INTERVAL_MS) this.prune();

    const cost = COMMAND_COST[command];
    const bucket = this.refill(sender);
    this.metrics.totalChecks += 1;

    if (bucket.tokens >= cost) {
      bucket.tokens -= cost;
      this.metrics.totalAllowed += 1;
      return this.result(true, Math.floor(bucket.tokens), null);
    }

    const secondsUntilAffordable = ((cost - bucket.tokens) / this.limit) * 60;
    this.metrics.totalDenied += 1;
    this.metrics.deniedBySender[sender] = (this.metrics.deniedBySender[sender] ?? 0) + 1;
    return this.result(false, 0, Math.ceil(secondsUntilAffordable));
  }

  getMetrics(): RateLimitMetrics {
    return { ...structuredClone(this.metrics), trackedSenders: this.buckets.size };
  }

  /** Drop buckets that have refilled completely; they hold no information. */
  prune(): number {
    this.lastPruneAt = this.now();
    let removed = 0;
    for (const sender of [...this.buckets.keys()]) {
      if (this.refill(sender).tokens >= this.limit) {
        this.buckets.delete(sender);
        removed += 1;
      }
    }
    return removed;
  }

  private refill(sender: string): SenderBucket {
    const now = this.now();
    const bucket = this.buckets.get(sender) ?? { tokens: this.limit, lastRefillAt: now };
    const elapsedMs = now - bucket.lastRefillAt;

    bucket.tokens = Math.min(this.limit, bucket.tokens + (elapsedMs / 60_000) * this.limit);
    bucket.lastRefillAt = now;
    this.buckets.set(sender, bucket);
    return bucket;
  }

  private result(allowed: boolean, remaining: number, retryAfterSeconds: number | null): RateLimitResult {
    return {
      allowed,
      remaining,
      limit: this.limit,
      retryAfterSeconds,
      checkedAt: isoNow(),
    };
  }
}
