import { promises as fs } from 'fs';
import path from 'path';
import NodeCache from 'node-cache';

export type CacheBackendKind = 'file' | 'memory' | 'redis';

/**
 * Raw string storage for cache envelopes. Implementations may throw on I/O
 * failure; TtlCache turns those into misses and warnings.
 *
 * `ttlMs` on write is an eviction hint only. Whether an entry is still valid
 * is always decided from the envelope's `cached_at`.
 */
export interface CacheBackend {
  readonly kind: CacheBackendKind;
  read(key: string): Promise<string | null>;
  write(key: string, value: string, ttlMs?: number): Promise<void>;
  remove(key: string): Promise<void>;
}

/** One `<key>.cache` file per entry. The directory is created on first write. */
export class FileCacheBackend implements CacheBackend {
  readonly kind = 'file';

  constructor(readonly directory: string) {}

  filePath(key: string): string {
    return path.join(this.directory, `${key}.cache`);
  }

  async read(key: string): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath(key), 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async write(key: string, value: string): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    await fs.writeFile(this.filePath(key), value, 'utf-8');
  }

  async remove(key: string): Promise<void> {
    await fs.rm(this.filePath(key), { force: true });
  }
}

/**
 * node-cache without its own TTL: expiry is decided from the envelope's
 * `cached_at`, same as the other backends.
 */
export class MemoryCacheBackend implements CacheBackend {
  readonly kind = 'memory';

  constructor(
    private readonly store: NodeCache = new NodeCache({ useClones: false, stdTTL: 0, checkperiod: 0 }),
    private readonly prefix = '',
  ) {}

  async read(key: string): Promise<string | null> {
    return this.store.get<string>(this.prefix + key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.store.set(this.prefix + key, value);
  }

  async remove(key: string): Promise<void> {
    this.store.del(this.prefix + key);
  }
}

/** The subset of an ioredis client the cache needs. */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, mode: 'PX', milliseconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

/** Redis keeps entries a little past their TTL so `cached_at` stays the deciding check. */
export const REDIS_EVICTION_GRACE_MS = 60_000;

export class RedisCacheBackend implements CacheBackend {
  readonly kind = 'redis';

  constructor(
    private readonly client: RedisClientLike,
    private readonly prefix = '',
  ) {}

  async read(key: string): Promise<string | null> {
    return this.client.get(this.prefix + key);
  }

  async write(key: string, value: string, ttlMs?: number): Promise<void> {
    if (ttlMs !== undefined && Number.isFinite(ttlMs) && ttlMs > 0) {
      await this.client.set(this.prefix + key, value, 'PX', Math.ceil(ttlMs) + REDIS_EVICTION_GRACE_MS);
      return;
    }
    await this.client.set(this.prefix + key, value);
  }

  async remove(key: string): Promise<void> {
    await this.client.del(this.prefix + key);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
