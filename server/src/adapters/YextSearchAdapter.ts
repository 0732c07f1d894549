import { z } from 'zod';
import { LocationSearchAdapter, PointFetchOptions, RawStoreResult } from './LocationSearchAdapter';
import { METERS_PER_MILE } from '../config/constants';
import { env } from '../config/env';
import { RetailerConfig } from '../config/retailers';
import { TtlCache } from '../cache/TtlCache';
import { formatGridPoint, GridPoint } from '../geo/gridGenerator';
import { defaultHeaders, getWithRetry } from '../services/http';
import { ScanSession } from '../services/session';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { Logger, silentLogger } from '../utils/logger';

/**
 * Raw shape of a search response:
 * `{ "response": { "modules": [ { "results": [ { "data": {...} }, ... ] } ] } }`
 */
const searchResponseSchema = z.object({
  response: z
    .object({
      modules: z
        .array(
          z.object({
            results: z.array(z.unknown()).default([]),
          }),
        )
        .default([]),
    })
    .default({}),
});

export function extractResults(body: string): RawStoreResult[] {
  const parsed = searchResponseSchema.parse(JSON.parse(body));
  const [first] = parsed.response.modules;
  return first ? first.results : [];
}

export function radiusInMeters(radiusMiles: number): number {
  if (!Number.isFinite(radiusMiles) || radiusMiles <= 0) {
    throw new ConfigurationError(`Search radius must be a positive number of miles, got ${radiusMiles}`);
  }
  return Math.trunc(radiusMiles * METERS_PER_MILE);
}

export interface YextSearchAdapterOptions {
  retailer: RetailerConfig;
  apiUrl?: string;
  apiKey?: string;
  responseCache?: TtlCache<string>;
  logger?: Logger;
}

/**
 * Yext "search/query" locator API. The API takes no result-count limit; it
 * returns everything within `locationRadius` up to its own cap.
 */
export class YextSearchAdapter implements LocationSearchAdapter {
  readonly providerId = 'yext';
  private readonly retailer: RetailerConfig;
  private readonly apiUrl: string;
  private readonly apiKey: string;
  private readonly radiusMeters: number;
  private readonly responseCache?: TtlCache<string>;
  private readonly logger: Logger;

  constructor(options: YextSearchAdapterOptions) {
    this.retailer = options.retailer;
    this.apiUrl = options.apiUrl ?? env.LOCATOR_API_URL;
    this.apiKey = options.apiKey ?? env.LOCATOR_API_KEY;
    this.radiusMeters = radiusInMeters(options.retailer.searchRadiusMiles);
    this.responseCache = options.responseCache;
    this.logger = options.logger ?? silentLogger;
  }

  buildSearchUrl(point: GridPoint): string {
    const { api } = this.retailer;
    return (
      `${this.apiUrl}` +
      `?api_key=${encodeURIComponent(this.apiKey)}` +
      `&experienceKey=${encodeURIComponent(api.experienceKey)}` +
      `&v=${encodeURIComponent(api.apiVersion)}` +
      `&locale=${encodeURIComponent(api.locale)}` +
      `&input=` +
      `&location=${point.latitude},${point.longitude}` +
      `&locationRadius=${this.radiusMeters}`
    );
  }

  async fetchStoresAtPoint(
    session: ScanSession,
    point: GridPoint,
    options: PointFetchOptions = {},
  ): Promise<RawStoreResult[]> {
    const retailer = this.retailer.name;
    const url = this.buildSearchUrl(point);

    let body = this.responseCache ? await this.responseCache.get(url, options.forceRefresh ?? false) : null;
    const fromCache = body !== null;

    if (body === null) {
      const response = await getWithRetry(session, url, { headers: defaultHeaders(this.retailer.api.referer) }, this.logger);
      if (!response) {
        this.logger.debug(`[${retailer}] No response for point ${formatGridPoint(point)}`);
        return [];
      }
      body = response.data;
    }

    let results: RawStoreResult[];
    try {
      results = extractResults(body);
    } catch (err) {
      this.logger.warn(`[${retailer}] Failed to parse response for ${formatGridPoint(point)}: ${errorMessage(err)}`);
      return [];
    }

    if (!fromCache && this.responseCache) {
      await this.responseCache.set(url, body);
    }

    if (results.length > 0) {
      this.logger.debug(
        `[${retailer}] Found ${results.length} stores at ${formatGridPoint(point)}${fromCache ? ' (cached)' : ''}`,
      );
    }
    return results;
  }
}
