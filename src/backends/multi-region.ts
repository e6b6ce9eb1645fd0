import type { LimiterState } from '../algorithms/types.js';
import { InvalidConfigurationError, describeError } from '../errors.js';
import { defaultLogger, type LimiterLogger } from '../logger.js';
import type { Backend, CommitResult, Snapshot } from './types.js';

export interface Region {
  name: string;
  backend: Backend;
}

/**
 * Picks the authoritative region for a key. Must be deterministic.
 */
export type HomeRegionResolver = (key: string, regions: readonly string[]) => string;

export interface MultiRegionBackendOptions {
  regions: Region[];
  /** Default: FNV-1a hash of the key over the region list */
  homeRegion?: HomeRegionResolver;
  logger?: LimiterLogger;
}

/**
 * 32-bit FNV-1a, stable across processes.
 */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export const hashHomeRegion: HomeRegionResolver = (key, regions) =>
  regions[fnv1a(key) % regions.length];

/**
 * Backend spanning several regions under a home-region policy.
 *
 * Every key has one authoritative region. Loads and compare-and-set commits go
 * there only, so a key keeps single-store semantics. After a successful commit
 * the state is copied to the other regions in the background; replicas are
 * never read for decisions and their counts are never merged.
 */
export class MultiRegionBackend implements Backend {
  readonly name = 'multi-region';

  private readonly regions = new Map<string, Backend>();
  private readonly regionNames: readonly string[];
  private readonly resolveHome: HomeRegionResolver;
  private readonly logger: LimiterLogger;
  private readonly pending = new Set<Promise<void>>();

  constructor(options: MultiRegionBackendOptions) {
    if (options.regions.length === 0) {
      throw new InvalidConfigurationError('Multi-region backend requires at least one region');
    }
    for (const region of options.regions) {
      if (this.regions.has(region.name)) {
        throw new InvalidConfigurationError(`Duplicate region name: "${region.name}"`);
      }
      this.regions.set(region.name, region.backend);
    }
    this.regionNames = options.regions.map((region) => region.name);
    this.resolveHome = options.homeRegion ?? hashHomeRegion;
    this.logger = options.logger ?? defaultLogger();
  }

  /**
   * Name of the region that owns `key`.
   */
  homeRegionOf(key: string): string {
    const name = this.resolveHome(key, this.regionNames);
    if (!this.regions.has(name)) {
      throw new InvalidConfigurationError(`Home region resolver returned unknown region "${name}"`);
    }
    return name;
  }

  private home(key: string): Backend {
    const backend = this.regions.get(this.homeRegionOf(key));
    if (backend === undefined) {
      throw new InvalidConfigurationError(`No backend for key "${key}"`);
    }
    return backend;
  }

  /** Backend of a named region, for inspection. */
  region(name: string): Backend | undefined {
    return this.regions.get(name);
  }

  async load(key: string): Promise<Snapshot> {
    return this.home(key).load(key);
  }

  async commit(
    key: string,
    state: LimiterState,
    expectedVersion: string | null,
    ttlMs: number
  ): Promise<CommitResult> {
    const homeName = this.homeRegionOf(key);
    const result = await this.home(key).commit(key, state, expectedVersion, ttlMs);
    if (result === 'committed') {
      this.replicate(homeName, key, state, ttlMs);
    }
    return result;
  }

  private replicate(homeName: string, key: string, state: LimiterState, ttlMs: number): void {
    for (const [name, backend] of this.regions) {
      if (name === homeName) {
        continue;
      }
      const task: Promise<void> = this.copyTo(name, backend, key, state, ttlMs)
        .catch((error: unknown) => {
          this.logger.warn('Replication failed', { key, region: name, error: describeError(error) });
        })
        .finally(() => {
          this.pending.delete(task);
        });
      this.pending.add(task);
    }
  }

  private async copyTo(
    name: string,
    backend: Backend,
    key: string,
    state: LimiterState,
    ttlMs: number
  ): Promise<void> {
    const { version } = await backend.load(key);
    const result = await backend.commit(key, state, version, ttlMs);
    if (result === 'conflict') {
      this.logger.debug('Replica changed during copy, skipped', { key, region: name });
    }
  }

  /**
   * Wait for in-flight replication.
   */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /**
   * Deletes from the home region, then from every replica (best effort).
   */
  async delete(key: string): Promise<void> {
    const homeName = this.homeRegionOf(key);
    await this.home(key).delete(key);

    const replicas = [...this.regions].filter(([name]) => name !== homeName);
    const results = await Promise.allSettled(replicas.map(([, backend]) => backend.delete(key)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.warn('Replica delete failed', {
          key,
          region: replicas[i][0],
          error: describeError(result.reason),
        });
      }
    });
  }

  async destroy(): Promise<void> {
    await this.flush();
    await Promise.all([...this.regions.values()].map((backend) => backend.destroy()));
  }
}
