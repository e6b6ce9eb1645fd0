import type { AlgorithmName } from '../algorithms/types.js';
import { InvalidConfigurationError } from '../errors.js';
import type { RateLimiter } from '../limiter.js';
import type { Decision } from '../types.js';

/**
 * A named tier. `limiter: null` marks an unlimited tier.
 */
export interface PriorityTier {
  name: string;
  /** Higher numbers are served first when borrowing */
  priority: number;
  limiter: RateLimiter | null;
}

export interface BorrowingPolicy {
  enabled: boolean;
  /**
   * Share of a lender's limit it keeps for itself. A loan is made only if the
   * lender still has at least `ceil(limit * reserveFraction)` units afterwards.
   */
  reserveFraction: number;
}

export interface PriorityLimiterOptions {
  tiers: PriorityTier[];
  /** Tier used when `check` is called without one (default: lowest priority) */
  defaultTier?: string;
  borrowing?: Partial<BorrowingPolicy>;
}

/** Read-only description of a tier. Quota fields are null for an unlimited tier. */
export interface TierConfig {
  name: string;
  priority: number;
  algorithm: AlgorithmName | null;
  limit: number | null;
  windowMs: number | null;
}

export interface UpgradeOptions {
  /** Carry the used share of the source quota over to the target tier */
  preserveState?: boolean;
}

export interface PriorityDecision extends Decision {
  tier: string;
  /** Lower tier whose capacity admitted the request */
  borrowedFrom?: string;
}

const UNLIMITED = Number.MAX_SAFE_INTEGER;

/**
 * Routes keys to per-tier limiters. With borrowing enabled, a denied request
 * may be charged to a lower tier's unused capacity for the same key, nearest
 * tier first. The loan is recorded in the lender's own state, so it is paid
 * back as the lender's window recovers.
 */
export class PriorityLimiter {
  private readonly tiers: PriorityTier[];
  private readonly byName = new Map<string, PriorityTier>();
  private readonly defaultTier: string;
  private readonly borrowing: BorrowingPolicy;

  constructor(options: PriorityLimiterOptions) {
    if (options.tiers.length === 0) {
      throw new InvalidConfigurationError('Priority limiter requires at least one tier');
    }
    const priorities = new Set<number>();
    for (const tier of options.tiers) {
      if (this.byName.has(tier.name)) {
        throw new InvalidConfigurationError(`Duplicate tier name: "${tier.name}"`);
      }
      if (priorities.has(tier.priority)) {
        throw new InvalidConfigurationError(`Duplicate tier priority: ${tier.priority}`);
      }
      this.byName.set(tier.name, tier);
      priorities.add(tier.priority);
    }
    this.tiers = [...options.tiers].sort((a, b) => b.priority - a.priority);

    this.defaultTier = options.defaultTier ?? this.tiers[this.tiers.length - 1].name;
    this.tier(this.defaultTier);

    this.borrowing = {
      enabled: options.borrowing?.enabled ?? false,
      reserveFraction: options.borrowing?.reserveFraction ?? 0.5,
    };
    const { reserveFraction } = this.borrowing;
    if (!(reserveFraction >= 0 && reserveFraction <= 1)) {
      throw new InvalidConfigurationError(
        `reserveFraction must be between 0 and 1, got: ${reserveFraction}`
      );
    }
  }

  /** Tier names, highest priority first. */
  listTiers(): string[] {
    return this.tiers.map((tier) => tier.name);
  }

  isUnlimited(tierName: string): boolean {
    return this.tier(tierName).limiter === null;
  }

  tierConfig(tierName: string): TierConfig {
    const { name, priority, limiter } = this.tier(tierName);
    return {
      name,
      priority,
      algorithm: limiter?.algorithmName ?? null,
      limit: limiter?.limit ?? null,
      windowMs: limiter?.windowMs ?? null,
    };
  }

  /**
   * Move `key` from one tier to another and clear it in the source tier.
   *
   * With `preserveState`, the share of the source quota already used is
   * charged to the target tier, rounded down, so a mid-window move does not
   * start from a full quota. Nothing is carried to or from an unlimited tier.
   */
  async upgradeTier(
    key: string,
    fromTier: string,
    toTier: string,
    options: UpgradeOptions = {}
  ): Promise<void> {
    const from = this.tier(fromTier);
    const to = this.tier(toTier);
    if (from === to || from.limiter === null) {
      return;
    }

    const fromKey = this.tierKey(from, key);
    if (options.preserveState === true && to.limiter !== null) {
      const view = await from.limiter.peek(fromKey);
      if (view.failure === undefined) {
        const used = Math.min(1, (view.limit - view.remaining) / view.limit);
        const consumed = Math.floor(to.limiter.limit * used);
        if (consumed > 0) {
          await to.limiter.check(this.tierKey(to, key), consumed);
        }
      }
    }
    await from.limiter.reset(fromKey);
  }

  async check(key: string, tierName = this.defaultTier, cost = 1): Promise<PriorityDecision> {
    const tier = this.tier(tierName);
    if (tier.limiter === null) {
      return this.unlimited(tier.name);
    }

    const decision = await tier.limiter.check(this.tierKey(tier, key), cost);
    if (decision.allowed || !this.borrowing.enabled || decision.failure !== undefined) {
      return { ...decision, tier: tier.name };
    }

    const lender = await this.borrow(tier, key, cost);
    if (lender === null) {
      return { ...decision, tier: tier.name };
    }
    return {
      allowed: true,
      limit: decision.limit,
      remaining: decision.remaining,
      retryAfterMs: 0,
      resetAt: decision.resetAt,
      tier: tier.name,
      borrowedFrom: lender,
    };
  }

  async peek(key: string, tierName = this.defaultTier, cost = 1): Promise<PriorityDecision> {
    const tier = this.tier(tierName);
    if (tier.limiter === null) {
      return this.unlimited(tier.name);
    }
    const decision = await tier.limiter.peek(this.tierKey(tier, key), cost);
    return { ...decision, tier: tier.name };
  }

  /**
   * Clear `key` in one tier, or in every tier (which also settles loans).
   */
  async reset(key: string, tierName?: string): Promise<void> {
    const tiers = tierName === undefined ? this.tiers : [this.tier(tierName)];
    for (const tier of tiers) {
      if (tier.limiter !== null) {
        await tier.limiter.reset(this.tierKey(tier, key));
      }
    }
  }

  private async borrow(borrower: PriorityTier, key: string, cost: number): Promise<string | null> {
    const lenders = this.tiers.filter((tier) => tier.priority < borrower.priority);
    for (const lender of lenders) {
      if (lender.limiter === null) {
        continue;
      }
      const lenderKey = this.tierKey(lender, key);
      const reserve = Math.ceil(lender.limiter.limit * this.borrowing.reserveFraction);
      const view = await lender.limiter.peek(lenderKey, cost);
      if (!view.allowed || view.remaining - cost < reserve) {
        continue;
      }
      const loan = await lender.limiter.check(lenderKey, cost);
      if (loan.allowed && loan.failure === undefined) {
        return lender.name;
      }
    }
    return null;
  }

  private tier(name: string): PriorityTier {
    const tier = this.byName.get(name);
    if (tier === undefined) {
      throw new InvalidConfigurationError(`Unknown tier: "${name}"`);
    }
    return tier;
  }

  private tierKey(tier: PriorityTier, key: string): string {
    return `${tier.name}:${key}`;
  }

  private unlimited(tier: string): PriorityDecision {
    return {
      allowed: true,
      limit: UNLIMITED,
      remaining: UNLIMITED,
      retryAfterMs: 0,
      resetAt: new Date(),
      tier,
    };
  }
}
