/**
 * Example: Redis Backend
 *
 * Several server instances sharing one quota through Redis. Commits are a
 * compare-and-set on the server, so concurrent instances never admit more
 * than the limit between them.
 *
 * Requires: Redis running on localhost:6379
 *
 * Run:   npx tsx examples/redis.ts
 * Test:  curl http://localhost:3001/api/data
 */

import express from 'express';
import { Redis } from 'ioredis';
import {
  RateLimiter,
  RedisBackend,
  createLoggingHook,
  createLogger,
  rateLimit,
} from '../src/index.js';

async function main(): Promise<void> {
  const app = express();
  const logger = createLogger({ logLevel: 'INFO' });

  const redisClient = new Redis({
    host: 'localhost',
    port: 6379,
  });

  redisClient.on('error', (err: Error) => {
    logger.error('Redis client error', { error: err.message });
  });

  const limiter = new RateLimiter({
    algorithm: 'sliding-window', // Smooth limiting without a per-request log
    backend: new RedisBackend({ client: redisClient, prefix: 'myapp:ratelimit:', logger }),
    limit: 50,
    windowMs: 60_000,
    failureMode: 'open', // Keep serving if Redis goes away
    logger,
    hooks: [createLoggingHook(logger)],
  });

  app.use(rateLimit({ limiter, logger }));

  app.get('/api/data', (_req, res) => {
    res.json({
      data: { id: 1, name: 'Sample Data' },
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', redis: redisClient.status });
  });

  const PORT = 3001;
  const server = app.listen(PORT, () => {
    console.log(`Server running on http://localhost:${PORT}`);
    console.log('');
    console.log('Try these commands:');
    console.log(`  curl http://localhost:${PORT}/api/data`);
    console.log(`  curl -i http://localhost:${PORT}/api/data  # See rate limit headers`);
    console.log('');
    console.log('Rate limit: 50 requests per minute per IP (sliding window)');
    console.log('Backend: Redis with prefix "myapp:ratelimit:"');
  });

  process.on('SIGINT', () => {
    console.log('\nShutting down...');
    server.close();
    // The backend was handed a client, so the client is closed here
    limiter
      .destroy()
      .then(() => redisClient.quit())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(error);
        process.exit(1);
      });
  });
}

main().catch(console.error);
