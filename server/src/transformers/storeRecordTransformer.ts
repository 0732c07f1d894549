import { z } from 'zod';
import { RawStoreResult } from '../adapters/LocationSearchAdapter';
import { StoreRecord, Weekday } from '../types/store';
import { Logger, silentLogger } from '../utils/logger';

const coordinateSchema = z.object({
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
});

const addressSchema = z.object({
  line1: z.string().nullish(),
  city: z.string().nullish(),
  region: z.string().nullish(),
  postalCode: z.string().nullish(),
  countryCode: z.string().nullish(),
  coordinate: z.unknown().optional(),
});

/**
 * Provider entity fields the normalizer reads. Everything is optional; the
 * shapes that matter (coordinates, hours, website) are probed separately so a
 * quirk in one of them cannot sink the whole record.
 */
const rawEntitySchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  name: z.string().nullish(),
  address: addressSchema.nullish(),
  geocodedCoordinate: z.unknown().optional(),
  yextDisplayCoordinate: z.unknown().optional(),
  hours: z.unknown().optional(),
  c_locatorFilters: z.array(z.string()).nullish(),
  websiteUrl: z.union([z.string(), z.object({ url: z.string().nullish() })]).nullish(),
  mainPhone: z.string().nullish(),
  closed: z.boolean().nullish(),
});

type RawEntity = z.infer<typeof rawEntitySchema>;

const dayHoursSchema = z.object({
  openIntervals: z
    .array(
      z.object({
        start: z.string().optional(),
        end: z.string().optional(),
      }),
    )
    .optional(),
});

const CLOCK_TIME = /^\d{2}:\d{2}$/;

export interface NormalizeOptions {
  /** Locator filter tag → store type. */
  storeTypes: Readonly<Record<string, string>>;
  retailer?: string;
  logger?: Logger;
  now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Results arrive either as `{ data: {...} }` or as the bare entity. */
function unwrapEntity(raw: RawStoreResult): unknown {
  if (isRecord(raw) && 'data' in raw) return raw.data;
  return raw;
}

function bestEffortId(raw: RawStoreResult): string {
  const entity = unwrapEntity(raw);
  if (isRecord(entity) && (typeof entity.id === 'string' || typeof entity.id === 'number')) {
    return String(entity.id);
  }
  if (isRecord(raw) && (typeof raw.id === 'string' || typeof raw.id === 'number')) {
    return String(raw.id);
  }
  return 'unknown';
}

/**
 * First non-empty coordinate object among geocoded, display and
 * address-embedded coordinates.
 */
function pickCoordinates(entity: RawEntity): { latitude: number | null; longitude: number | null } {
  const candidates = [entity.geocodedCoordinate, entity.yextDisplayCoordinate, entity.address?.coordinate];
  const chosen = candidates.find((c) => isRecord(c) && Object.keys(c).length > 0);
  const parsed = coordinateSchema.safeParse(chosen);
  if (!parsed.success) return { latitude: null, longitude: null };
  return {
    latitude: parsed.data.latitude ?? null,
    longitude: parsed.data.longitude ?? null,
  };
}

/** `"HH:MM-HH:MM"` from the day's first open interval, or `""`. */
export function formatHours(hours: unknown, day: Weekday): string {
  if (!isRecord(hours)) return '';

  const parsed = dayHoursSchema.safeParse(hours[day]);
  if (!parsed.success) return '';

  const first = parsed.data.openIntervals?.[0];
  if (!first?.start || !first.end) return '';
  if (!CLOCK_TIME.test(first.start) || !CLOCK_TIME.test(first.end)) return '';

  return `${first.start}-${first.end}`;
}

/**
 * First filter tag found in the lookup table wins; otherwise the first tag,
 * lowercased with spaces as underscores; `"unknown"` when there are no tags.
 */
export function categorizeStore(
  locatorFilters: readonly string[] | null | undefined,
  storeTypes: Readonly<Record<string, string>>,
): string {
  if (!locatorFilters || locatorFilters.length === 0) return 'unknown';

  for (const tag of locatorFilters) {
    if (Object.prototype.hasOwnProperty.call(storeTypes, tag)) {
      return storeTypes[tag];
    }
  }

  return locatorFilters[0].toLowerCase().replace(/ /g, '_');
}

function websiteUrl(value: RawEntity['websiteUrl']): string | null {
  if (typeof value === 'string') return value || null;
  return value?.url || null;
}

/**
 * Maps one raw provider result to a StoreRecord. Returns `null` (and logs a
 * warning) for results that cannot be read or carry no id.
 */
export function normalizeStore(raw: RawStoreResult, options: NormalizeOptions): StoreRecord | null {
  const logger = options.logger ?? silentLogger;
  const retailer = options.retailer ?? 'scan';

  const parsed = rawEntitySchema.safeParse(unwrapEntity(raw));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid entity';
    logger.warn(`[${retailer}] Failed to parse store ${bestEffortId(raw)}: ${where}`);
    return null;
  }

  const entity = parsed.data;
  const storeId = entity.id === null || entity.id === undefined ? '' : String(entity.id);
  if (!storeId) {
    logger.warn(`[${retailer}] Skipping store without an id`);
    return null;
  }

  const address = entity.address;
  const { latitude, longitude } = pickCoordinates(entity);

  const hours = (day: Weekday) => formatHours(entity.hours, day);

  return {
    store_id: storeId,
    name: entity.name ?? '',
    store_type: categorizeStore(entity.c_locatorFilters, options.storeTypes),
    street_address: address?.line1 ?? '',
    city: address?.city ?? '',
    state: address?.region ?? '',
    postal_code: address?.postalCode ?? '',
    country: address?.countryCode ?? 'US',
    latitude,
    longitude,
    phone: entity.mainPhone ?? '',
    url: websiteUrl(entity.websiteUrl),
    hours_monday: hours('monday'),
    hours_tuesday: hours('tuesday'),
    hours_wednesday: hours('wednesday'),
    hours_thursday: hours('thursday'),
    hours_friday: hours('friday'),
    hours_saturday: hours('saturday'),
    hours_sunday: hours('sunday'),
    closed: entity.closed ?? false,
    scraped_at: (options.now ?? (() => new Date()))().toISOString(),
  };
}

export function normalizeStores(raws: readonly RawStoreResult[], options: NormalizeOptions): StoreRecord[] {
  const records: StoreRecord[] = [];
  for (const raw of raws) {
    const record = normalizeStore(raw, options);
    if (record) records.push(record);
  }
  return records;
}
