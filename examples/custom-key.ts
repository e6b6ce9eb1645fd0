/**
 * Example: API Keys, Request Cost and Metrics
 *
 * Rate limits by API key instead of IP address. Batch requests cost one unit
 * per item, and every decision is counted by an in-process collector.
 *
 * Run:   npx tsx examples/custom-key.ts
 * Test:  curl -H "X-API-Key: key-a" http://localhost:3003/api/data
 *        curl -H "X-API-Key: key-a" -H "X-Batch-Size: 5" http://localhost:3003/api/batch
 *        curl http://localhost:3003/metrics
 */

import express from 'express';
import { MemoryBackend, MetricsCollector, RateLimiter, rateLimit } from '../src/index.js';

const app = express();
const metrics = new MetricsCollector();

// GCRA spaces requests evenly: 20 per minute is one every 3 seconds, with bursts up to 20
const limiter = new RateLimiter({
  algorithm: 'gcra',
  backend: new MemoryBackend(),
  limit: 20,
  windowMs: 60_000,
  hooks: [metrics.hook],
});

const byApiKey = (req: express.Request): string => req.get('x-api-key') ?? 'anonymous';

const requireApiKey = (
  req: express.Request,
  res: express.Response,
  next: express.NextFunction
): void => {
  if (req.get('x-api-key') === undefined) {
    res.status(401).json({
      error: 'Unauthorized',
      message: 'X-API-Key header is required',
    });
    return;
  }
  next();
};

app.get(
  '/api/data',
  requireApiKey,
  rateLimit({
    limiter,
    keyExtractor: byApiKey,
    message: 'API rate limit exceeded. Please wait before making more requests.',
  }),
  (_req, res) => {
    res.json({ data: 'ok', rateLimit: res.locals.rateLimit });
  }
);

app.post(
  '/api/batch',
  requireApiKey,
  rateLimit({
    limiter,
    keyExtractor: byApiKey,
    cost: (req) => {
      const size = Number(req.get('x-batch-size') ?? '1');
      return Number.isInteger(size) && size > 0 ? size : 1;
    },
  }),
  (req, res) => {
    res.json({ accepted: req.get('x-batch-size') ?? '1' });
  }
);

app.get('/metrics', (_req, res) => {
  res.json(metrics.snapshot());
});

const PORT = 3003;
app.listen(PORT, () => {
  console.log(`Server running on http://localhost:${PORT}`);
  console.log('');
  console.log('Rate limit: 20 units per minute per API key (GCRA)');
});
