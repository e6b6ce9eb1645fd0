export type { Backend, CommitResult, MemoryBackendOptions, Snapshot } from './types.js';
export { MemoryBackend } from './memory.js';
export { RedisBackend, type RedisBackendOptions } from './redis.js';
export {
  MultiRegionBackend,
  hashHomeRegion,
  type HomeRegionResolver,
  type MultiRegionBackendOptions,
  type Region,
} from './multi-region.js';
