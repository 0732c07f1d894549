import { createHash } from 'crypto';
import { z } from 'zod';
import { CONFIG } from '../config/constants';
import { CacheBackend } from './backends';
import { CacheFlavor, TtlCache } from './TtlCache';
import { Logger } from '../utils/logger';

export type RichUrlEntry = Record<string, unknown>;

const urlListSchema = z.array(z.string());
const richUrlListSchema = z.array(z.record(z.unknown()));

export const urlListFlavor: CacheFlavor<string[]> = {
  name: 'url list',
  keyFor: (identifier) => `${identifier}_urls`,
  serialize: (urls) => JSON.stringify(urls),
  deserialize: (raw) => urlListSchema.parse(JSON.parse(raw)),
};

export const richUrlFlavor: CacheFlavor<RichUrlEntry[]> = {
  name: 'rich url',
  keyFor: (identifier) => `${identifier}_rich_urls`,
  serialize: (entries) => JSON.stringify(entries),
  deserialize: (raw) => richUrlListSchema.parse(JSON.parse(raw)),
};

/** Response bodies keyed by the SHA-256 of the request URL. */
export const responseFlavor: CacheFlavor<string> = {
  name: 'response',
  keyFor: (url) => createHash('sha256').update(url).digest('hex'),
  serialize: (body) => body,
  deserialize: (raw) => raw,
};

export interface CacheFactoryOptions {
  ttlDays?: number;
  logger?: Logger;
  now?: () => Date;
}

export function createUrlListCache(backend: CacheBackend, options: CacheFactoryOptions = {}): TtlCache<string[]> {
  return new TtlCache({
    backend,
    flavor: urlListFlavor,
    ttlDays: options.ttlDays ?? CONFIG.CACHE.URL_CACHE_TTL_DAYS,
    logger: options.logger,
    now: options.now,
  });
}

export function createRichUrlCache(
  backend: CacheBackend,
  options: CacheFactoryOptions = {},
): TtlCache<RichUrlEntry[]> {
  return new TtlCache({
    backend,
    flavor: richUrlFlavor,
    ttlDays: options.ttlDays ?? CONFIG.CACHE.URL_CACHE_TTL_DAYS,
    logger: options.logger,
    now: options.now,
  });
}

export function createResponseCache(backend: CacheBackend, options: CacheFactoryOptions = {}): TtlCache<string> {
  return new TtlCache({
    backend,
    flavor: responseFlavor,
    ttlDays: options.ttlDays ?? CONFIG.CACHE.RESPONSE_CACHE_TTL_DAYS,
    logger: options.logger,
    now: options.now,
  });
}
