export {
  PriorityLimiter,
  type BorrowingPolicy,
  type PriorityDecision,
  type PriorityLimiterOptions,
  type PriorityTier,
  type TierConfig,
  type UpgradeOptions,
} from './priority.js';
export { QuotaPool, type QuotaPoolOptions } from './quota-pool.js';
export {
  AdaptiveLimiter,
  type Adaptation,
  type AdaptiveLimiterOptions,
  type AdaptiveMetrics,
} from './adaptive.js';
export {
  HierarchicalLimiter,
  type HierarchicalDecision,
  type HierarchyScope,
  type ScopeDecision,
} from './hierarchical.js';
