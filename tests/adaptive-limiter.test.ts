import { AdaptiveLimiter, type AdaptiveLimiterOptions } from '../src/advanced/adaptive';
import { MemoryBackend } from '../src/backends/memory';
import type { ManualClock } from '../src/clock';
import { InvalidConfigurationError } from '../src/errors';
import { RateLimiter } from '../src/limiter';
import { createTestLogger } from './helpers/logger';
import { createClock } from './helpers/time';

describe('AdaptiveLimiter', () => {
  let clock: ManualClock;
  let backend: MemoryBackend;
  let logger: ReturnType<typeof createTestLogger>;

  function createAdaptive(
    limit = 100,
    overrides: Partial<AdaptiveLimiterOptions> = {}
  ): AdaptiveLimiter {
    const limiter = new RateLimiter({
      algorithm: 'token-bucket',
      backend,
      limit,
      windowMs: 1000,
      getCurrentTime: clock.now,
      logger,
    });
    return new AdaptiveLimiter({
      limiter,
      minLimit: 10,
      maxLimit: 200,
      maxStep: 20,
      evaluationIntervalMs: 1000,
      getCurrentTime: clock.now,
      logger,
      ...overrides,
    });
  }

  function record(adaptive: AdaptiveLimiter, successes: number, errors: number): void {
    for (let i = 0; i < successes; i++) adaptive.recordSuccess();
    for (let i = 0; i < errors; i++) adaptive.recordError();
  }

  beforeEach(() => {
    clock = createClock();
    backend = new MemoryBackend({ cleanupIntervalMs: 0 });
    logger = createTestLogger();
  });

  afterEach(async () => {
    await backend.destroy();
  });

  describe('evaluate', () => {
    it('should step the limit down on a high error rate', () => {
      const adaptive = createAdaptive();
      record(adaptive, 0, 10);

      // target is 50, but one step moves at most 20
      expect(adaptive.evaluate()).toEqual({
        previousLimit: 100,
        limit: 80,
        errorRate: 1,
        samples: 10,
      });
      expect(adaptive.currentLimit).toBe(80);
      expect(logger.info).toHaveBeenCalledWith('Adjusted rate limit', {
        previousLimit: 100,
        limit: 80,
        errorRate: 1,
        samples: 10,
      });
    });

    it('should grow the limit on a low error rate', () => {
      const adaptive = createAdaptive();
      record(adaptive, 10, 0);

      expect(adaptive.evaluate()).toMatchObject({ previousLimit: 100, limit: 110 });
    });

    it('should hold the limit between the two thresholds', () => {
      const adaptive = createAdaptive();
      record(adaptive, 14, 1);

      const adaptation = adaptive.evaluate();
      expect(adaptation).toMatchObject({ previousLimit: 100, limit: 100, samples: 15 });
      expect(adaptation?.errorRate).toBeCloseTo(1 / 15);
      expect(adaptive.metrics().adaptations).toBe(0);
      expect(logger.info).not.toHaveBeenCalled();
    });

    it('should keep outcomes until there are enough of them', () => {
      const adaptive = createAdaptive();
      record(adaptive, 5, 0);

      expect(adaptive.evaluate()).toBeNull();
      expect(adaptive.metrics()).toMatchObject({ successes: 5, errors: 0 });

      record(adaptive, 5, 0);
      expect(adaptive.evaluate()).toMatchObject({ limit: 110, samples: 10 });
      expect(adaptive.metrics()).toMatchObject({ successes: 0, errors: 0, adaptations: 1 });
    });

    it('should stop at the minimum', () => {
      const adaptive = createAdaptive(12);

      record(adaptive, 0, 10);
      expect(adaptive.evaluate()).toMatchObject({ limit: 10 });

      record(adaptive, 0, 10);
      expect(adaptive.evaluate()).toMatchObject({ previousLimit: 10, limit: 10 });
      expect(adaptive.metrics().adaptations).toBe(1);
    });

    it('should stop at the maximum', () => {
      const adaptive = createAdaptive(195);
      record(adaptive, 10, 0);

      expect(adaptive.evaluate()).toMatchObject({ limit: 200 });
    });

    it('should apply recorded outcomes', () => {
      const adaptive = createAdaptive();
      for (let i = 0; i < 10; i++) adaptive.recordOutcome(false);

      expect(adaptive.evaluate()).toMatchObject({ limit: 80 });
    });
  });

  describe('latency', () => {
    it('should step the limit down when average latency is above the threshold', () => {
      const adaptive = createAdaptive(100, { latencyThresholdMs: 200 });
      for (let i = 0; i < 10; i++) adaptive.recordSuccess(500);

      expect(adaptive.evaluate()).toEqual({
        previousLimit: 100,
        limit: 80,
        errorRate: 0,
        samples: 10,
        averageLatencyMs: 500,
      });
      expect(logger.info).toHaveBeenCalledWith('Adjusted rate limit', {
        previousLimit: 100,
        limit: 80,
        errorRate: 0,
        samples: 10,
        averageLatencyMs: 500,
      });
    });

    it('should grow the limit on low latency when the error rate alone would hold', () => {
      const adaptive = createAdaptive(100, { latencyThresholdMs: 200 });
      for (let i = 0; i < 14; i++) adaptive.recordSuccess(50);
      adaptive.recordOutcome(false, 50);

      expect(adaptive.evaluate()).toMatchObject({ previousLimit: 100, limit: 110, averageLatencyMs: 50 });
    });

    it('should ignore latencies without a threshold', () => {
      const adaptive = createAdaptive();
      for (let i = 0; i < 10; i++) adaptive.recordSuccess(5000);

      expect(adaptive.evaluate()).toEqual({ previousLimit: 100, limit: 110, errorRate: 0, samples: 10 });
    });

    it('should ignore latency until minSamples latencies were recorded', () => {
      const adaptive = createAdaptive(100, { latencyThresholdMs: 200 });
      for (let i = 0; i < 5; i++) adaptive.recordSuccess(900);
      for (let i = 0; i < 5; i++) adaptive.recordSuccess();

      expect(adaptive.evaluate()).toEqual({ previousLimit: 100, limit: 110, errorRate: 0, samples: 10 });
    });

    it('should start each interval with fresh latencies', () => {
      const adaptive = createAdaptive(100, { latencyThresholdMs: 200 });
      for (let i = 0; i < 10; i++) adaptive.recordSuccess(500);
      adaptive.evaluate();

      for (let i = 0; i < 10; i++) adaptive.recordSuccess(20);
      expect(adaptive.evaluate()).toMatchObject({ previousLimit: 80, limit: 88, averageLatencyMs: 20 });
    });
  });

  describe('check', () => {
    it('should evaluate once the interval has passed', async () => {
      const adaptive = createAdaptive();
      record(adaptive, 0, 10);

      expect((await adaptive.check('client')).limit).toBe(100);

      clock.advance(1000);
      const decision = await adaptive.check('client');
      expect(decision.limit).toBe(80);
      expect(adaptive.metrics().lastEvaluatedAt).toBe(clock.now());
    });

    it('should share peek and reset with the wrapped limiter', async () => {
      const adaptive = createAdaptive();
      await adaptive.check('client', 40);

      expect((await adaptive.peek('client')).remaining).toBe(60);
      await adaptive.reset('client');
      expect((await adaptive.peek('client')).remaining).toBe(100);
    });
  });

  describe('configuration', () => {
    it('should reject an initial limit outside the bounds', () => {
      expect(() => createAdaptive(100, { minLimit: 150 })).toThrow(
        'Initial limit 100 is outside [150, 200]'
      );
    });

    it.each<[string, Partial<AdaptiveLimiterOptions>]>([
      ['minLimit', { minLimit: 0 }],
      ['maxLimit', { maxLimit: 5 }],
      ['maxStep', { maxStep: 0 }],
      ['evaluationIntervalMs', { evaluationIntervalMs: 0 }],
      ['errorThreshold', { errorThreshold: 1 }],
      ['decreaseFactor', { decreaseFactor: 1.5 }],
      ['increaseFactor', { increaseFactor: 1 }],
      ['latencyThresholdMs', { latencyThresholdMs: 0 }],
    ])('should reject an invalid %s', (_name, overrides) => {
      expect(() => createAdaptive(100, overrides)).toThrow(InvalidConfigurationError);
    });
  });
});
