import { z } from 'zod';
import { CacheBackend } from './backends';
import { Logger, silentLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const MS_PER_DAY = 86_400_000;

/** Key derivation and (de)serialization for one kind of cached payload. */
export interface CacheFlavor<T> {
  readonly name: string;
  keyFor(identifier: string): string;
  serialize(value: T): string;
  deserialize(raw: string): T;
}

export interface CacheMetadata {
  /** ISO-8601 time the entry was written. */
  cachedAt: string;
  ageMs: number;
  /** Whole days, for display only; expiry never uses it. */
  ageDays: number;
  expired: boolean;
}

export interface TtlCacheOptions<T> {
  backend: CacheBackend;
  flavor: CacheFlavor<T>;
  ttlDays: number;
  logger?: Logger;
  now?: () => Date;
}

const envelopeSchema = z.object({
  cached_at: z.string(),
  identifier: z.string().optional(),
  data: z.string().nullable().optional(),
});

type Envelope = z.infer<typeof envelopeSchema>;

interface StoredEntry {
  envelope: Envelope;
  ageMs: number;
}

/**
 * Key/value cache with time-based expiry. Reads never throw: missing,
 * malformed and expired entries all come back as `null`. Writes are best
 * effort and only log on failure.
 *
 * An entry is valid while `now - cached_at <= ttl`, compared in
 * milliseconds, so a zero-day TTL expires as soon as any time has passed.
 */
export class TtlCache<T> {
  private readonly backend: CacheBackend;
  private readonly flavor: CacheFlavor<T>;
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TtlCacheOptions<T>) {
    this.backend = options.backend;
    this.flavor = options.flavor;
    this.ttlMs = options.ttlDays * MS_PER_DAY;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  get ttlDays(): number {
    return this.ttlMs / MS_PER_DAY;
  }

  async get(identifier: string, forceRefresh = false): Promise<T | null> {
    if (forceRefresh) return null;

    const stored = await this.readEntry(identifier);
    if (!stored) return null;

    if (stored.ageMs > this.ttlMs) {
      this.logger.debug(`Cache for ${identifier} has expired`);
      return null;
    }

    const { data } = stored.envelope;
    if (data === null || data === undefined) {
      this.logger.warn(`Cache for ${identifier} has no data`);
      return null;
    }

    try {
      return this.flavor.deserialize(data);
    } catch (err) {
      this.logger.warn(`Error reading ${this.flavor.name} cache for ${identifier}: ${errorMessage(err)}`);
      return null;
    }
  }

  async set(identifier: string, value: T): Promise<void> {
    try {
      const envelope: Envelope = {
        cached_at: this.now().toISOString(),
        identifier,
        data: this.flavor.serialize(value),
      };
      await this.backend.write(this.flavor.keyFor(identifier), JSON.stringify(envelope, null, 2), this.ttlMs);
    } catch (err) {
      this.logger.warn(`Failed to save ${this.flavor.name} cache for ${identifier}: ${errorMessage(err)}`);
    }
  }

  async clear(identifier: string): Promise<void> {
    try {
      await this.backend.remove(this.flavor.keyFor(identifier));
    } catch (err) {
      this.logger.warn(`Failed to clear ${this.flavor.name} cache for ${identifier}: ${errorMessage(err)}`);
    }
  }

  /** Same answer as `get(identifier) !== null`. */
  async isValid(identifier: string): Promise<boolean> {
    return (await this.get(identifier)) !== null;
  }

  async metadata(identifier: string): Promise<CacheMetadata | null> {
    const stored = await this.readEntry(identifier);
    if (!stored) return null;

    return {
      cachedAt: stored.envelope.cached_at,
      ageMs: stored.ageMs,
      ageDays: Math.floor(stored.ageMs / MS_PER_DAY),
      expired: stored.ageMs > this.ttlMs,
    };
  }

  private async readEntry(identifier: string): Promise<StoredEntry | null> {
    let raw: string | null;
    try {
      raw = await this.backend.read(this.flavor.keyFor(identifier));
    } catch (err) {
      this.logger.warn(`Error reading ${this.flavor.name} cache for ${identifier}: ${errorMessage(err)}`);
      return null;
    }
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`Corrupt ${this.flavor.name} cache entry for ${identifier}: ${errorMessage(err)}`);
      return null;
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`Cache for ${identifier} missing 'cached_at' timestamp`);
      return null;
    }

    const cachedAt = Date.parse(parsed.data.cached_at);
    if (Number.isNaN(cachedAt)) {
      this.logger.warn(`Cache for ${identifier} has an invalid 'cached_at': ${parsed.data.cached_at}`);
      return null;
    }

    return { envelope: parsed.data, ageMs: this.now().getTime() - cachedAt };
  }
}
