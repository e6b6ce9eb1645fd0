import { MemoryBackend } from '../src/backends/memory';
import {
  BackendUnavailableError,
  ConflictExhaustedError,
  InvalidConfigurationError,
} from '../src/errors';
import { RateLimiter, type RateLimiterOptions } from '../src/limiter';
import { AlwaysConflictBackend, FailingBackend } from './helpers/backends';
import { createTestLogger } from './helpers/logger';
import { BASE_TIME, createClock, flushAsync } from './helpers/time';

describe('RateLimiter', () => {
  let clock: ReturnType<typeof createClock>;
  let backend: MemoryBackend;
  let logger: ReturnType<typeof createTestLogger>;

  function createLimiter(overrides: Partial<RateLimiterOptions> = {}): RateLimiter {
    return new RateLimiter({
      algorithm: 'token-bucket',
      backend,
      limit: 5,
      windowMs: 5000,
      getCurrentTime: clock.now,
      logger,
      ...overrides,
    });
  }

  beforeEach(() => {
    clock = createClock();
    logger = createTestLogger();
    backend = new MemoryBackend({ cleanupIntervalMs: 0, getCurrentTime: clock.now, logger });
  });

  afterEach(async () => {
    await backend.destroy();
  });

  describe('constructor validation', () => {
    it.each([
      [{ limit: 0 }, 'limit must be a positive integer, got: 0'],
      [{ limit: 1.5 }, 'limit must be a positive integer, got: 1.5'],
      [{ windowMs: 0 }, 'windowMs must be a positive finite number, got: 0'],
      [{ windowMs: Number.POSITIVE_INFINITY }, 'windowMs must be a positive finite number'],
      [{ maxRetries: -1 }, 'maxRetries must be a non-negative integer, got: -1'],
      [{ retryTimeoutMs: 0 }, 'retryTimeoutMs must be positive, got: 0'],
      [{ failureRetryAfterMs: 0 }, 'failureRetryAfterMs must be at least 1, got: 0'],
    ])('should reject %p', (overrides, message) => {
      expect(() => createLimiter(overrides)).toThrow(InvalidConfigurationError);
      expect(() => createLimiter(overrides)).toThrow(message);
    });
  });

  describe('check', () => {
    it('should admit and record requests', async () => {
      const limiter = createLimiter();

      expect(await limiter.check('user')).toEqual({
        allowed: true,
        limit: 5,
        remaining: 4,
        retryAfterMs: 0,
        resetAt: new Date(BASE_TIME + 1000),
      });
      expect(limiter.algorithmName).toBe('token-bucket');
    });

    it('should deny once the quota is spent', async () => {
      const limiter = createLimiter();
      for (let i = 0; i < 5; i++) await limiter.check('user');

      expect(await limiter.check('user')).toMatchObject({
        allowed: false,
        remaining: 0,
        retryAfterMs: 1000,
      });
    });

    it('should keep keys independent', async () => {
      const limiter = createLimiter();
      await limiter.check('a', 5);

      expect((await limiter.check('b')).remaining).toBe(4);
    });

    it('should store state under the key prefix', async () => {
      const limiter = createLimiter({ keyPrefix: 'api:' });
      await limiter.check('user');

      expect((await backend.load('api:user')).state).toMatchObject({ algorithm: 'token-bucket' });
      expect((await backend.load('user')).state).toBeNull();
    });

    it('should not write when denying', async () => {
      const limiter = createLimiter();
      await limiter.check('user', 5);
      const before = await backend.load('user');

      await limiter.check('user');

      expect((await backend.load('user')).version).toBe(before.version);
    });

    it.each([0, -1, 1.5])('should reject a cost of %p', async (cost) => {
      await expect(createLimiter().check('user', cost)).rejects.toBeInstanceOf(RangeError);
    });

    it('should start over when the key holds another algorithm state', async () => {
      await createLimiter().check('user', 3);
      const fixed = createLimiter({ algorithm: 'fixed-window' });

      expect((await fixed.check('user')).remaining).toBe(4);
      expect((await backend.load('user')).state).toMatchObject({ algorithm: 'fixed-window', count: 1 });
    });

    it('should stop before touching the backend once aborted', async () => {
      const limiter = createLimiter();
      const controller = new AbortController();
      controller.abort(new Error('client went away'));

      await expect(limiter.check('user', 1, { signal: controller.signal })).rejects.toThrow(
        'client went away'
      );
      expect(await backend.load('user')).toEqual({ state: null, version: null });
    });
  });

  describe('peek', () => {
    it('should not consume capacity', async () => {
      const limiter = createLimiter();

      expect((await limiter.peek('user')).remaining).toBe(5);
      expect((await limiter.peek('user')).remaining).toBe(5);
      expect((await limiter.check('user')).remaining).toBe(4);
    });

    it('should say whether a cost would fit', async () => {
      const limiter = createLimiter();
      await limiter.check('user', 3);

      expect(await limiter.peek('user', 3)).toMatchObject({
        allowed: false,
        remaining: 2,
        retryAfterMs: 1000,
      });
      expect((await limiter.peek('user', 6)).retryAfterMs).toBe(Number.POSITIVE_INFINITY);
    });
  });

  describe('reset', () => {
    it('should restore the full quota', async () => {
      const limiter = createLimiter();
      await limiter.check('user', 5);

      await limiter.reset('user');

      expect((await limiter.check('user')).remaining).toBe(4);
    });

    it('should propagate backend errors', async () => {
      const limiter = createLimiter({ backend: new FailingBackend() });

      await expect(limiter.reset('user')).rejects.toBeInstanceOf(BackendUnavailableError);
    });
  });

  describe('reconfigure', () => {
    it('should apply a new limit to existing state', async () => {
      const limiter = createLimiter();
      await limiter.check('user');

      limiter.reconfigure({ limit: 2 });

      expect(limiter.limit).toBe(2);
      expect(await limiter.check('user')).toMatchObject({ allowed: true, limit: 2, remaining: 1 });
    });

    it('should validate the new quota', () => {
      const limiter = createLimiter();

      expect(() => limiter.reconfigure({ limit: 0 })).toThrow(InvalidConfigurationError);
      expect(limiter.limit).toBe(5);
    });
  });

  describe('failure policy', () => {
    it('should fail closed by default when every commit conflicts', async () => {
      const conflicting = new AlwaysConflictBackend();
      const limiter = createLimiter({ backend: conflicting });

      const decision = await limiter.check('user');

      expect(decision).toMatchObject({
        allowed: false,
        limit: 5,
        remaining: 0,
        retryAfterMs: 1000,
        resetAt: new Date(BASE_TIME + 1000),
      });
      expect(decision.failure).toBeInstanceOf(ConflictExhaustedError);
      expect(conflicting.commits).toBe(4);
      expect(logger.warn).toHaveBeenCalledWith(
        'Failing closed',
        expect.objectContaining({ key: 'user', backend: 'always-conflict' })
      );
    });

    it('should bound attempts by maxRetries', async () => {
      const conflicting = new AlwaysConflictBackend();
      await createLimiter({ backend: conflicting, maxRetries: 0 }).check('user');

      expect(conflicting.commits).toBe(1);
    });

    it('should raise ConflictExhaustedError when configured to', async () => {
      const limiter = createLimiter({ backend: new AlwaysConflictBackend(), failureMode: 'raise' });

      await expect(limiter.check('user')).rejects.toMatchObject({
        name: 'ConflictExhaustedError',
        code: 'CONFLICT_EXHAUSTED',
        key: 'user',
        attempts: 4,
      });
    });

    it('should stop retrying slow conflicts once retryTimeoutMs has passed', async () => {
      const conflicting = new AlwaysConflictBackend(10);
      const limiter = createLimiter({
        backend: conflicting,
        maxRetries: 1000,
        retryTimeoutMs: 30,
        failureMode: 'raise',
      });

      const error: unknown = await limiter.check('user').catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(ConflictExhaustedError);
      expect(error).toMatchObject({ attempts: conflicting.commits });
      expect(conflicting.commits).toBeGreaterThanOrEqual(1);
      expect(conflicting.commits).toBeLessThan(10);
    });

    it('should fail open only when configured to', async () => {
      const failing = new FailingBackend();
      const limiter = createLimiter({ backend: failing, failureMode: 'open' });

      const decision = await limiter.check('user');

      expect(decision).toMatchObject({ allowed: true, remaining: 0, retryAfterMs: 0 });
      expect(decision.failure).toBeInstanceOf(BackendUnavailableError);
      expect(failing.calls).toBe(4);
      expect(logger.warn).toHaveBeenCalledWith('Failing open', expect.anything());
    });

    it('should wrap unexpected backend errors', async () => {
      const limiter = createLimiter({
        backend: new FailingBackend(new Error('socket hang up')),
        failureMode: 'raise',
      });

      await expect(limiter.check('user')).rejects.toThrow(
        'Backend "failing" unavailable: Error: socket hang up'
      );
    });

    it('should apply the policy to peek', async () => {
      const limiter = createLimiter({ backend: new FailingBackend() });

      const decision = await limiter.peek('user');

      expect(decision.allowed).toBe(false);
      expect(decision.failure?.code).toBe('BACKEND_UNAVAILABLE');
    });
  });

  describe('hooks', () => {
    it('should emit one event per decision', async () => {
      const hook = jest.fn();
      const limiter = createLimiter({ hooks: [hook] });

      await limiter.check('user', 2);

      expect(hook).toHaveBeenCalledTimes(1);
      expect(hook).toHaveBeenCalledWith({
        key: 'user',
        algorithm: 'token-bucket',
        allowed: true,
        remaining: 3,
        limit: 5,
        cost: 2,
        latencyMs: expect.any(Number),
        timestamp: new Date(BASE_TIME),
      });
    });

    it('should include the failure code for policy decisions', async () => {
      const hook = jest.fn();
      const limiter = createLimiter({ backend: new AlwaysConflictBackend(), hooks: [hook] });

      await limiter.check('user');

      expect(hook).toHaveBeenCalledWith(
        expect.objectContaining({ allowed: false, failure: 'CONFLICT_EXHAUSTED' })
      );
    });

    it('should emit an event when the failure policy raises', async () => {
      const hook = jest.fn();
      const limiter = createLimiter({ backend: new FailingBackend(), failureMode: 'raise', hooks: [hook] });

      await expect(limiter.check('user')).rejects.toBeInstanceOf(BackendUnavailableError);

      expect(hook).toHaveBeenCalledTimes(1);
      expect(hook).toHaveBeenCalledWith({
        key: 'user',
        algorithm: 'token-bucket',
        allowed: false,
        remaining: 0,
        limit: 5,
        cost: 1,
        latencyMs: expect.any(Number),
        timestamp: new Date(BASE_TIME),
        failure: 'BACKEND_UNAVAILABLE',
        error: 'BackendUnavailableError: Backend "failing" unavailable: connection refused',
      });
    });

    it('should emit an event when a non-retryable error propagates', async () => {
      const hook = jest.fn();
      const failing = new FailingBackend(new TypeError('state is corrupt'));
      const limiter = createLimiter({ backend: failing, hooks: [hook] });

      await expect(limiter.check('user')).rejects.toThrow('state is corrupt');

      expect(failing.calls).toBe(1);
      expect(hook).toHaveBeenCalledTimes(1);
      expect(hook).toHaveBeenCalledWith(
        expect.objectContaining({ allowed: false, error: 'TypeError: state is corrupt' })
      );
      expect(hook.mock.calls[0][0]).not.toHaveProperty('failure');
    });

    it('should isolate a throwing hook', async () => {
      const limiter = createLimiter();
      limiter.addHook(() => {
        throw new Error('metrics down');
      });

      expect((await limiter.check('user')).allowed).toBe(true);
      expect(logger.error).toHaveBeenCalledWith('Decision hook failed', {
        key: 'user',
        algorithm: 'token-bucket',
        error: 'Error: metrics down',
      });
    });

    it('should isolate a rejecting hook', async () => {
      const limiter = createLimiter();
      limiter.addHook(() => Promise.reject(new Error('exporter down')));

      expect((await limiter.check('user')).allowed).toBe(true);
      await flushAsync();
      expect(logger.error).toHaveBeenCalledWith(
        'Decision hook failed',
        expect.objectContaining({ error: 'Error: exporter down' })
      );
    });

    it('should stop calling a removed hook', async () => {
      const hook = jest.fn();
      const limiter = createLimiter();
      limiter.addHook(hook);

      expect(limiter.removeHook(hook)).toBe(true);
      await limiter.check('user');

      expect(hook).not.toHaveBeenCalled();
      expect(limiter.removeHook(hook)).toBe(false);
    });
  });
});
