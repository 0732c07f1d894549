import { parseRetailerConfig, RetailerConfig, RetailerConfigInput } from '../config/retailers';
import { Logger } from '../utils/logger';

export function testRetailer(overrides: Partial<RetailerConfigInput> = {}): RetailerConfig {
  return parseRetailerConfig({
    name: 'cricket',
    displayName: 'Cricket Wireless',
    gridSpacingMiles: 50,
    searchRadiusMiles: 50,
    bounds: { latMin: 40, latMax: 41, lngMin: -75, lngMax: -74 },
    api: {
      experienceKey: 'cricket-locator',
      apiVersion: '20220511',
      referer: 'https://www.cricketwireless.com/',
    },
    storeTypes: { 'Cricket Wireless Store': 'cricket_store' },
    ...overrides,
  });
}

export interface RecordingLogger extends Logger {
  debugs: string[];
  infos: string[];
  warnings: string[];
  errors: string[];
}

/** Logger that keeps every message for assertions. */
export function recordingLogger(): RecordingLogger {
  const logger: RecordingLogger = {
    debugs: [],
    infos: [],
    warnings: [],
    errors: [],
    debug: (message: string) => {
      logger.debugs.push(message);
    },
    info: (message: string) => {
      logger.infos.push(message);
    },
    warn: (message: string) => {
      logger.warnings.push(message);
    },
    error: (message: string) => {
      logger.errors.push(message);
    },
    child: () => logger,
  };
  return logger;
}
