export const MILES_PER_DEGREE_LAT = 69.0;
/** Miles per degree of longitude at ~37°N; not geodesically exact away from mid-US latitudes. */
export const MILES_PER_DEGREE_LNG = 54.6;
export const METERS_PER_MILE = 1609.34;

export const CONFIG = {
  HTTP: {
    MAX_RETRIES: 3,
    TIMEOUT_MS: 30_000,
    RATE_LIMIT_BASE_WAIT_MS: 30_000,
    SERVER_ERROR_WAIT_MS: 10_000,
    JITTER_MS: 500,
    /** Pause before each request when a retailer sets no delay range. */
    MIN_DELAY_MS: 2_000,
    MAX_DELAY_MS: 5_000,
  },
  CACHE: {
    URL_CACHE_TTL_DAYS: 7,
    RESPONSE_CACHE_TTL_DAYS: 30,
  },
  WORKERS: {
    PROXIED: 10,
    DIRECT: 5,
  },
  PROGRESS: {
    POINT_INTERVAL: 100,
  },
  TEST_MODE: {
    GRID_SPACING_MILES: 200,
  },
  VALIDATION: {
    LAT_MIN: -90,
    LAT_MAX: 90,
    LNG_MIN: -180,
    LNG_MAX: 180,
    ZIP_LENGTH_SHORT: 5,
    ZIP_LENGTH_LONG: 10,
    ERROR_LOG_LIMIT: 10,
  },
} as const;
