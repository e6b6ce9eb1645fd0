/**
 * Example: Multi-Tier Rate Limiting
 *
 * - /api/search: plan tiers. Enterprise is unlimited, pro may borrow unused
 *   capacity from the free tier of the same account.
 * - /api/orders: nested limits. A request must fit the global, tenant and
 *   user quotas at once.
 *
 * Run:   npx tsx examples/multi-tier.ts
 * Test:  curl -H "X-Account: acme" -H "X-Plan: pro" http://localhost:3002/api/search
 *        curl -H "X-Tenant: acme" -H "X-User: alice" http://localhost:3002/api/orders
 */

import express from 'express';
import {
  HierarchicalLimiter,
  MemoryBackend,
  PriorityLimiter,
  RateLimiter,
  type Decision,
} from '../src/index.js';

const app = express();
const backend = new MemoryBackend();

const perMinute = (limit: number, keyPrefix: string): RateLimiter =>
  new RateLimiter({ algorithm: 'fixed-window', backend, limit, windowMs: 60_000, keyPrefix });

const plans = new PriorityLimiter({
  tiers: [
    { name: 'enterprise', priority: 3, limiter: null },
    { name: 'pro', priority: 2, limiter: perMinute(100, 'plan:') },
    { name: 'free', priority: 1, limiter: perMinute(10, 'plan:') },
  ],
  borrowing: { enabled: true, reserveFraction: 0.5 },
});

interface OrderContext {
  tenant: string;
  user: string;
}

const orders = new HierarchicalLimiter<OrderContext>([
  { name: 'global', limiter: perMinute(1000, 'orders:global:'), key: () => 'all' },
  { name: 'tenant', limiter: perMinute(100, 'orders:tenant:'), key: (ctx) => ctx.tenant },
  { name: 'user', limiter: perMinute(10, 'orders:user:'), key: (ctx) => ctx.user },
]);

function reject(res: express.Response, decision: Decision, detail: Record<string, unknown>): void {
  if (Number.isFinite(decision.retryAfterMs)) {
    res.setHeader('Retry-After', Math.ceil(decision.retryAfterMs / 1000));
  }
  res.status(429).json({ error: 'Too Many Requests', ...detail });
}

app.get('/api/search', (req, res, next) => {
  const account = req.get('x-account') ?? 'anonymous';
  const plan = req.get('x-plan') ?? 'free';
  if (!plans.listTiers().includes(plan)) {
    res.status(400).json({ error: `Unknown plan "${plan}"` });
    return;
  }

  plans
    .check(account, plan)
    .then((decision) => {
      if (!decision.allowed) {
        reject(res, decision, { plan });
        return;
      }
      res.json({ results: [], plan, borrowedFrom: decision.borrowedFrom ?? null });
    })
    .catch(next);
});

app.get('/api/orders', (req, res, next) => {
  const context: OrderContext = {
    tenant: req.get('x-tenant') ?? 'default',
    user: req.get('x-user') ?? 'anonymous',
  };

  orders
    .check(context)
    .then((decision) => {
      if (!decision.allowed) {
        reject(res, decision, { deniedBy: decision.deniedBy });
        return;
      }
      res.json({ orders: [], remaining: decision.remaining });
    })
    .catch(next);
});

app.get('/health', (_req, res) => {
  res.json({ status: 'ok' });
});

const PORT = 3002;
app.listen(PORT, () => {
  console.log(`Server running on http://localhost:${PORT}`);
  console.log('');
  console.log('Plans: free 10/min, pro 100/min (borrows from free), enterprise unlimited');
  console.log('Orders: 1000/min global, 100/min per tenant, 10/min per user');
});
