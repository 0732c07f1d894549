import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { CONFIG } from './constants';
import { ConfigurationError, errorMessage } from '../utils/errors';

export const proxyModeSchema = z.enum(['direct', 'residential', 'web_scraper_api']);
export type ProxyMode = z.infer<typeof proxyModeSchema>;

const boundsSchema = z
  .object({
    latMin: z.number().min(-90).max(90),
    latMax: z.number().min(-90).max(90),
    lngMin: z.number().min(-180).max(180),
    lngMax: z.number().min(-180).max(180),
  })
  .refine((b) => b.latMin <= b.latMax && b.lngMin <= b.lngMax, {
    message: 'bounds must satisfy latMin <= latMax and lngMin <= lngMax',
  });

const delayRangeSchema = z
  .object({
    minMs: z.number().min(0),
    maxMs: z.number().min(0),
  })
  .refine((d) => d.minMs <= d.maxMs, { message: 'minMs must not exceed maxMs' });

export type DelayRange = z.infer<typeof delayRangeSchema>;

export const retailerConfigSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().min(1),
  gridSpacingMiles: z.number().positive(),
  searchRadiusMiles: z.number().positive(),
  parallelWorkers: z.number().int().positive().optional(),
  bounds: boundsSchema,
  proxy: z.object({ mode: proxyModeSchema }).default({ mode: 'direct' }),
  /** Pause before each request; proxied modes rotate IPs and can go faster. */
  delays: z
    .object({
      direct: delayRangeSchema.optional(),
      proxied: delayRangeSchema.optional(),
    })
    .default({}),
  api: z.object({
    experienceKey: z.string().min(1),
    apiVersion: z.string().min(1),
    locale: z.string().default('en'),
    referer: z.string().url().optional(),
  }),
  /** Locator filter tag → store type. */
  storeTypes: z.record(z.string()).default({}),
});

export type RetailerConfig = z.infer<typeof retailerConfigSchema>;
export type RetailerConfigInput = z.input<typeof retailerConfigSchema>;

const catalogueSchema = z.object({
  retailers: z.array(retailerConfigSchema),
});

export class RetailerCatalogue {
  private readonly byName: Map<string, RetailerConfig>;

  constructor(retailers: RetailerConfig[]) {
    this.byName = new Map(retailers.map((r) => [r.name, r]));
  }

  list(): RetailerConfig[] {
    return [...this.byName.values()];
  }

  get(name: string): RetailerConfig | undefined {
    return this.byName.get(name);
  }
}

export const DEFAULT_DELAY_RANGE: DelayRange = {
  minMs: CONFIG.HTTP.MIN_DELAY_MS,
  maxMs: CONFIG.HTTP.MAX_DELAY_MS,
};

/** Any proxy mode uses the proxied range when one is set, else the direct range. */
export function selectDelays(retailer: RetailerConfig, mode: ProxyMode = retailer.proxy.mode): DelayRange {
  const { direct, proxied } = retailer.delays;
  if (mode !== 'direct' && proxied) return proxied;
  return direct ?? DEFAULT_DELAY_RANGE;
}

export function parseRetailerConfig(input: unknown): RetailerConfig {
  const parsed = retailerConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid retailer configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function loadRetailerCatalogue(filePath: string): RetailerCatalogue {
  const resolved = path.resolve(process.cwd(), filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read retailer catalogue at ${resolved}: ${errorMessage(err)}`,
    );
  }

  const parsed = catalogueSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid retailer catalogue ${resolved}: ${issues.join('; ')}`);
  }

  return new RetailerCatalogue(parsed.data.retailers);
}
