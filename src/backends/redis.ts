import { randomUUID } from 'node:crypto';
import { Redis } from 'ioredis';
import { LimiterStateSchema, type LimiterState } from '../algorithms/types.js';
import { DEFAULT_REDIS_PREFIX } from '../constants.js';
import { BackendUnavailableError, InvalidConfigurationError, describeError } from '../errors.js';
import { defaultLogger, type LimiterLogger } from '../logger.js';
import type { Backend, CommitResult, Snapshot } from './types.js';

/**
 * Compare-and-set in one round trip. KEYS[1] = state hash; ARGV = expected
 * version ('' when absent), state JSON, new version, TTL ms.
 */
const COMMIT_SCRIPT = `
local current = redis.call('HGET', KEYS[1], 'v')
if not current then current = '' end
if current ~= ARGV[1] then return 0 end
redis.call('HSET', KEYS[1], 's', ARGV[2], 'v', ARGV[3])
redis.call('PEXPIRE', KEYS[1], ARGV[4])
return 1
`;

export interface RedisBackendOptions {
  /** Existing ioredis client. Its lifecycle stays with the caller. */
  client?: Redis;
  /** Connection URL; the backend creates and owns the client. Ignored when `client` is given. */
  url?: string;
  /** Key prefix (default: 'rw:') */
  prefix?: string;
  logger?: LimiterLogger;
}

/**
 * Redis-backed state store.
 *
 * Each key is a hash holding the JSON state (`s`) and its version (`v`).
 * Reads are one HMGET; commits are one Lua script, so the version check, the
 * write and the TTL refresh happen atomically on the server.
 */
export class RedisBackend implements Backend {
  readonly name = 'redis';

  private readonly client: Redis;
  private readonly ownsClient: boolean;
  private readonly prefix: string;
  private readonly logger: LimiterLogger;

  constructor(options: RedisBackendOptions) {
    if (options.client !== undefined) {
      this.client = options.client;
      this.ownsClient = false;
    } else if (options.url !== undefined) {
      this.client = new Redis(options.url);
      this.ownsClient = true;
    } else {
      throw new InvalidConfigurationError('Redis backend requires a client instance or a url');
    }
    this.prefix = options.prefix ?? DEFAULT_REDIS_PREFIX;
    this.logger = options.logger ?? defaultLogger();
  }

  private getKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async load(key: string): Promise<Snapshot> {
    let raw: string | null;
    let version: string | null;
    try {
      [raw, version] = await this.client.hmget(this.getKey(key), 's', 'v');
    } catch (error) {
      throw this.unavailable('load', error);
    }

    if (raw === null || version === null) {
      return { state: null, version };
    }
    return { state: this.parseState(key, raw), version };
  }

  /**
   * Unreadable state counts as absent; the version is kept so the next
   * commit replaces it.
   */
  private parseState(key: string, raw: string): LimiterState | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn('Discarding unparseable rate limit state', { key });
      return null;
    }
    const result = LimiterStateSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('Discarding invalid rate limit state', { key, issues: result.error.issues });
      return null;
    }
    return result.data;
  }

  async commit(
    key: string,
    state: LimiterState,
    expectedVersion: string | null,
    ttlMs: number
  ): Promise<CommitResult> {
    let result: unknown;
    try {
      result = await this.client.eval(
        COMMIT_SCRIPT,
        1,
        this.getKey(key),
        expectedVersion ?? '',
        JSON.stringify(state),
        randomUUID(),
        Math.max(1, Math.ceil(ttlMs))
      );
    } catch (error) {
      throw this.unavailable('commit', error);
    }
    return Number(result) === 1 ? 'committed' : 'conflict';
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.del(this.getKey(key));
    } catch (error) {
      throw this.unavailable('delete', error);
    }
  }

  /**
   * Closes the connection only when this backend created it.
   */
  async destroy(): Promise<void> {
    if (this.ownsClient) {
      await this.client.quit();
    }
  }

  private unavailable(operation: string, error: unknown): BackendUnavailableError {
    return new BackendUnavailableError(this.name, `${operation} failed (${describeError(error)})`, {
      cause: error,
    });
  }
}
