import path from 'path';
import NodeCache from 'node-cache';
import { env } from '../config/env';
import {
  CacheBackend,
  CacheBackendKind,
  FileCacheBackend,
  MemoryCacheBackend,
  RedisCacheBackend,
  RedisClientLike,
} from '../cache/backends';
import { createLogger, Logger, silentLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

/** The parts of an ioredis client the service drives. */
export interface RedisConnection extends RedisClientLike {
  connect(): Promise<unknown>;
  disconnect(): void;
  quit(): Promise<unknown>;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type RedisClientFactory = (url: string) => RedisConnection | Promise<RedisConnection>;

export interface CacheServiceOptions {
  backend?: CacheBackendKind;
  cacheDir?: string;
  logger?: Logger;
  /** Builds the Redis client; defaults to ioredis. */
  createRedis?: RedisClientFactory;
  /** Stay on the in-memory store without contacting Redis. Defaults to true under NODE_ENV=test. */
  skipConnect?: boolean;
}

async function createIoredisClient(url: string): Promise<RedisConnection> {
  const { default: Redis } = await import('ioredis');
  return new Redis(url, {
    lazyConnect: true,
    enableOfflineQueue: false,
    connectTimeout: 3000,
    maxRetriesPerRequest: 1,
  });
}

/**
 * Hands out namespaced cache backends (one per retailer and cache flavor)
 * over whichever storage is configured. A Redis that cannot be reached falls
 * back to the in-memory store.
 */
export class CacheService {
  private kind: CacheBackendKind;
  private readonly cacheDir: string;
  private readonly memory = new NodeCache({ useClones: false, stdTTL: 0, checkperiod: 0 });
  private readonly logger: Logger;
  private readonly wantsRedis: boolean;
  private readonly createRedis: RedisClientFactory;
  private readonly skipConnect: boolean;
  private client: RedisConnection | null = null;

  constructor(options: CacheServiceOptions = {}) {
    const kind = options.backend ?? env.CACHE_BACKEND;
    this.wantsRedis = kind === 'redis';
    // Redis only takes over once connect() succeeds
    this.kind = kind === 'redis' ? 'memory' : kind;
    this.cacheDir = path.resolve(process.cwd(), options.cacheDir ?? env.CACHE_DIR);
    this.logger = options.logger ?? silentLogger;
    this.createRedis = options.createRedis ?? createIoredisClient;
    this.skipConnect = options.skipConnect ?? env.NODE_ENV === 'test';
  }

  async connect(redisUrl = env.REDIS_URL): Promise<void> {
    if (!this.wantsRedis || this.skipConnect) return;

    const client = await this.createRedis(redisUrl);
    client.on('error', (err: Error) => {
      this.logger.warn(`CacheService: Redis error: ${err.message}`);
    });

    try {
      await client.connect();
      this.client = client;
      this.kind = 'redis';
      this.logger.info('CacheService: connected to Redis');
    } catch (err) {
      client.disconnect();
      this.logger.warn(`CacheService: Redis unavailable (${errorMessage(err)}), falling back to in-memory cache`);
    }
  }

  get backendKind(): CacheBackendKind {
    return this.kind;
  }

  get isRedis(): boolean {
    return this.kind === 'redis';
  }

  /** `namespace` is a path-like scope such as `cricket/response_cache`. */
  backend(namespace: string): CacheBackend {
    switch (this.kind) {
      case 'file':
        return new FileCacheBackend(path.join(this.cacheDir, namespace));
      case 'redis':
        if (this.client) {
          return new RedisCacheBackend(this.client, `${namespace.replace(/\//g, ':')}:`);
        }
        return new MemoryCacheBackend(this.memory, `${namespace}/`);
      case 'memory':
        return new MemoryCacheBackend(this.memory, `${namespace}/`);
    }
  }

  async quit(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
    this.memory.close();
  }
}

export const cacheService = new CacheService({ logger: createLogger(env.LOG_LEVEL, 'cache') });
