import Redis from 'ioredis-mock';
import { ALGORITHM_NAMES, type AlgorithmName } from '../src/algorithms';
import { MemoryBackend } from '../src/backends/memory';
import { RedisBackend } from '../src/backends/redis';
import type { Backend } from '../src/backends/types';
import { RateLimiter } from '../src/limiter';
import { RacingBackend } from './helpers/backends';
import { createTestLogger } from './helpers/logger';
import { createClock } from './helpers/time';

const LIMIT = 10;

async function admitted(
  backend: Backend,
  algorithm: AlgorithmName,
  callers: number
): Promise<number> {
  const clock = createClock();
  const limiter = new RateLimiter({
    algorithm,
    backend,
    limit: LIMIT,
    windowMs: 60_000,
    // Every round of racing callers has at least one winner
    maxRetries: 100,
    retryTimeoutMs: 10_000,
    getCurrentTime: clock.now,
    logger: createTestLogger(),
  });

  const decisions = await Promise.all(
    Array.from({ length: callers }, () => limiter.check('shared'))
  );
  expect(decisions.every((decision) => decision.failure === undefined)).toBe(true);
  return decisions.filter((decision) => decision.allowed).length;
}

describe.each(ALGORITHM_NAMES)('%s under concurrent callers', (algorithm) => {
  it('should admit exactly the limit from more callers than the limit (memory)', async () => {
    const backend = new MemoryBackend({ cleanupIntervalMs: 0 });

    expect(await admitted(backend, algorithm, 25)).toBe(LIMIT);
    await backend.destroy();
  });

  it('should admit every caller when there are fewer than the limit (memory)', async () => {
    const backend = new MemoryBackend({ cleanupIntervalMs: 0 });

    expect(await admitted(backend, algorithm, 6)).toBe(6);
    await backend.destroy();
  });

  it('should admit exactly the limit despite injected compare-and-set races', async () => {
    const racing = new RacingBackend(new MemoryBackend({ cleanupIntervalMs: 0 }), 3);

    expect(await admitted(racing, algorithm, 25)).toBe(LIMIT);
    expect(racing.injectedConflicts).toBeGreaterThan(0);
    await racing.destroy();
  });

  it('should admit exactly the limit over Redis', async () => {
    const client = new Redis();
    const backend = new RedisBackend({
      client,
      prefix: `race:${algorithm}:`,
      logger: createTestLogger(),
    });

    expect(await admitted(backend, algorithm, 25)).toBe(LIMIT);
    await client.flushall();
  });
});
