/**
 * Example: Smoothing Traffic and Reading the Quota
 *
 * One leaky-bucket limiter guards the API: 30 requests per minute per IP,
 * drained evenly at one every two seconds. The same limiter answers a quota
 * endpoint through `peek`, which reports without charging the caller.
 *
 * Run:   npx tsx examples/basic.ts
 * Test:  curl -i http://localhost:3000/api/hello
 *        curl http://localhost:3000/api/quota
 */

import express from 'express';
import { MemoryBackend, RateLimiter, formatDuration, rateLimit } from '../src/index.js';

const app = express();

const limiter = new RateLimiter({
  algorithm: 'leaky-bucket',
  backend: new MemoryBackend(),
  limit: 30,
  windowMs: 60_000,
});

// Not limited itself, so clients can always see where they stand
app.get('/api/quota', async (req, res, next) => {
  try {
    const view = await limiter.peek(req.ip ?? 'unknown');
    res.json({
      limit: view.limit,
      remaining: view.remaining,
      resetsIn: formatDuration(Math.max(0, view.resetAt.getTime() - Date.now())),
    });
  } catch (error) {
    next(error);
  }
});

app.use('/api', rateLimit({ limiter }));

app.get('/api/hello', (_req, res) => {
  res.json({ message: 'Hello!', remaining: res.locals.rateLimit.remaining });
});

const PORT = 3000;
app.listen(PORT, () => {
  console.log(`Server running on http://localhost:${PORT}`);
  console.log(`  curl -i http://localhost:${PORT}/api/hello`);
  console.log(`  curl http://localhost:${PORT}/api/quota   # does not use up the quota`);
});
