import { HierarchicalLimiter, type HierarchyScope } from '../src/advanced/hierarchical';
import { MemoryBackend } from '../src/backends/memory';
import { InvalidConfigurationError } from '../src/errors';
import { RateLimiter } from '../src/limiter';
import { createTestLogger } from './helpers/logger';
import { createClock } from './helpers/time';

interface RequestContext {
  tenant: string;
  user: string;
}

describe('HierarchicalLimiter', () => {
  let backend: MemoryBackend;
  let limiters: Record<'global' | 'tenant' | 'user', RateLimiter>;
  let hierarchy: HierarchicalLimiter<RequestContext>;

  beforeEach(() => {
    const clock = createClock();
    backend = new MemoryBackend({ cleanupIntervalMs: 0 });
    const create = (scope: string, limit: number): RateLimiter =>
      new RateLimiter({
        algorithm: 'fixed-window',
        backend,
        limit,
        windowMs: 60_000,
        keyPrefix: `${scope}:`,
        getCurrentTime: clock.now,
        logger: createTestLogger(),
      });
    limiters = { global: create('global', 5), tenant: create('tenant', 3), user: create('user', 2) };

    const scopes: HierarchyScope<RequestContext>[] = [
      { name: 'global', limiter: limiters.global, key: () => 'all' },
      { name: 'tenant', limiter: limiters.tenant, key: (ctx) => ctx.tenant },
      { name: 'user', limiter: limiters.user, key: (ctx) => ctx.user },
    ];
    hierarchy = new HierarchicalLimiter(scopes);
  });

  afterEach(async () => {
    await backend.destroy();
  });

  it('should reject an empty or ambiguous hierarchy', () => {
    expect(() => new HierarchicalLimiter<RequestContext>([])).toThrow(InvalidConfigurationError);
    expect(
      () =>
        new HierarchicalLimiter<RequestContext>([
          { name: 'user', limiter: limiters.user, key: (ctx) => ctx.user },
          { name: 'user', limiter: limiters.tenant, key: (ctx) => ctx.tenant },
        ])
    ).toThrow('Duplicate scope name: "user"');
  });

  it('should list scopes outermost first', () => {
    expect(hierarchy.scopeNames()).toEqual(['global', 'tenant', 'user']);
  });

  it('should report the most restrictive scope when admitted', async () => {
    const decision = await hierarchy.check({ tenant: 't1', user: 'u1' });

    expect(decision).toMatchObject({ allowed: true, limit: 2, remaining: 1 });
    expect(decision.deniedBy).toBeUndefined();
    expect(decision.scopes.map((s) => [s.scope, s.decision.remaining])).toEqual([
      ['global', 4],
      ['tenant', 2],
      ['user', 1],
    ]);
  });

  it('should deny at the user scope without charging outer scopes', async () => {
    await hierarchy.check({ tenant: 't1', user: 'u1' });
    await hierarchy.check({ tenant: 't1', user: 'u1' });

    const decision = await hierarchy.check({ tenant: 't1', user: 'u1' });

    expect(decision).toMatchObject({ allowed: false, deniedBy: 'user', limit: 2 });
    expect(decision.scopes).toHaveLength(3);
    expect((await limiters.global.peek('all')).remaining).toBe(3);
    expect((await limiters.tenant.peek('t1')).remaining).toBe(1);
  });

  it('should not charge shared scopes for parallel callers the user scope denies', async () => {
    const decisions = await Promise.all(
      Array.from({ length: 5 }, () => hierarchy.check({ tenant: 't1', user: 'u1' }))
    );

    expect(decisions.filter((d) => d.allowed)).toHaveLength(2);
    expect(decisions.filter((d) => !d.allowed).map((d) => d.deniedBy)).toEqual(['user', 'user', 'user']);
    expect((await limiters.global.peek('all')).remaining).toBe(3);
    expect((await limiters.tenant.peek('t1')).remaining).toBe(1);
  });

  it('should stop at the tenant scope', async () => {
    await hierarchy.check({ tenant: 't1', user: 'u1' });
    await hierarchy.check({ tenant: 't1', user: 'u1' });
    await hierarchy.check({ tenant: 't1', user: 'u2' });

    const decision = await hierarchy.check({ tenant: 't1', user: 'u3' });

    expect(decision).toMatchObject({ allowed: false, deniedBy: 'tenant', limit: 3 });
    expect(decision.scopes.map((s) => s.scope)).toEqual(['global', 'tenant']);
    expect((await limiters.user.peek('u3')).remaining).toBe(2);
  });

  it('should stop at the global scope', async () => {
    for (const user of ['u1', 'u1', 'u2']) {
      await hierarchy.check({ tenant: 't1', user });
    }
    for (const user of ['u3', 'u4']) {
      await hierarchy.check({ tenant: 't2', user });
    }

    const decision = await hierarchy.check({ tenant: 't3', user: 'u5' });

    expect(decision).toMatchObject({ allowed: false, deniedBy: 'global', remaining: 0 });
    expect(decision.scopes).toHaveLength(1);
  });

  it('should peek without recording', async () => {
    const preview = await hierarchy.peek({ tenant: 't1', user: 'u1' });

    expect(preview).toMatchObject({ allowed: true, remaining: 2 });
    expect((await hierarchy.check({ tenant: 't1', user: 'u1' })).remaining).toBe(1);
  });

  it('should reset every scope for a context', async () => {
    await hierarchy.check({ tenant: 't1', user: 'u1' });
    await hierarchy.check({ tenant: 't1', user: 'u1' });

    await hierarchy.reset({ tenant: 't1', user: 'u1' });

    expect((await limiters.global.peek('all')).remaining).toBe(5);
    expect((await limiters.tenant.peek('t1')).remaining).toBe(3);
    expect((await limiters.user.peek('u1')).remaining).toBe(2);
  });
});
