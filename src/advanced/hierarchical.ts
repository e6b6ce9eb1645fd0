import { InvalidConfigurationError } from '../errors.js';
import type { RateLimiter } from '../limiter.js';
import type { Decision } from '../types.js';

/**
 * One level of the hierarchy, e.g. global, tenant or user.
 */
export interface HierarchyScope<C> {
  name: string;
  limiter: RateLimiter;
  /** Key this scope limits for a given request context */
  key: (context: C) => string;
}

export interface ScopeDecision {
  scope: string;
  decision: Decision;
}

export interface HierarchicalDecision extends Decision {
  /** First scope, outermost first, that denied */
  deniedBy?: string;
  scopes: ScopeDecision[];
}

/**
 * Nested limits evaluated outermost first. A request is admitted only if
 * every scope admits it.
 *
 * Checks first look at every scope without recording, stopping at the first
 * denial, then record innermost first. A caller that loses a race between
 * those phases is denied by its own scope before any shared outer scope is
 * charged, so only the requester's inner scopes can carry the cost.
 */
export class HierarchicalLimiter<C = string> {
  private readonly scopes: HierarchyScope<C>[];

  constructor(scopes: HierarchyScope<C>[]) {
    if (scopes.length === 0) {
      throw new InvalidConfigurationError('Hierarchical limiter requires at least one scope');
    }
    const names = new Set<string>();
    for (const scope of scopes) {
      if (names.has(scope.name)) {
        throw new InvalidConfigurationError(`Duplicate scope name: "${scope.name}"`);
      }
      names.add(scope.name);
    }
    this.scopes = [...scopes];
  }

  scopeNames(): string[] {
    return this.scopes.map((scope) => scope.name);
  }

  async check(context: C, cost = 1): Promise<HierarchicalDecision> {
    const preview = await this.peek(context, cost);
    if (!preview.allowed) {
      return preview;
    }

    // Charged innermost first; reported outermost first.
    const results: ScopeDecision[] = [];
    for (const scope of [...this.scopes].reverse()) {
      const decision = await scope.limiter.check(scope.key(context), cost);
      results.unshift({ scope: scope.name, decision });
      if (!decision.allowed) {
        return { ...decision, deniedBy: scope.name, scopes: results };
      }
    }
    return { ...mostRestrictive(results), scopes: results };
  }

  /**
   * Read-only pass over the scopes, stopping at the first that would deny.
   */
  async peek(context: C, cost = 1): Promise<HierarchicalDecision> {
    const results: ScopeDecision[] = [];
    for (const scope of this.scopes) {
      const decision = await scope.limiter.peek(scope.key(context), cost);
      results.push({ scope: scope.name, decision });
      if (!decision.allowed) {
        return { ...decision, deniedBy: scope.name, scopes: results };
      }
    }
    return { ...mostRestrictive(results), scopes: results };
  }

  async reset(context: C): Promise<void> {
    for (const scope of this.scopes) {
      await scope.limiter.reset(scope.key(context));
    }
  }
}

function mostRestrictive(results: ScopeDecision[]): Decision {
  return results.reduce((tightest, current) =>
    current.decision.remaining < tightest.decision.remaining ? current : tightest
  ).decision;
}
