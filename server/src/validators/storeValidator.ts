import { CONFIG } from '../config/constants';
import { StoreRecord } from '../types/store';
import { Logger, silentLogger } from '../utils/logger';

const { VALIDATION } = CONFIG;

export const REQUIRED_STORE_FIELDS = ['store_id', 'name', 'street_address', 'city', 'state'] as const;
export const RECOMMENDED_STORE_FIELDS = ['latitude', 'longitude', 'phone', 'url'] as const;

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface BatchValidationSummary {
  total: number;
  valid: number;
  invalid: number;
  invalidStoreIds: string[];
  errorCount: number;
  warningCount: number;
  results: ValidationResult[];
}

export interface BatchValidationOptions {
  /** Missing recommended fields become errors instead of warnings. */
  strict?: boolean;
  logIssues?: boolean;
  logger?: Logger;
}

export function validateStore(record: StoreRecord, strict = false): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const field of REQUIRED_STORE_FIELDS) {
    if (!record[field].trim()) {
      errors.push(`Missing required field: ${field}`);
    }
  }

  for (const field of RECOMMENDED_STORE_FIELDS) {
    if (record[field] === null) {
      (strict ? errors : warnings).push(`Missing recommended field: ${field}`);
    }
  }

  const { latitude, longitude } = record;
  if (latitude !== null && longitude !== null) {
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      errors.push(`Invalid coordinate format: lat=${latitude}, lng=${longitude}`);
    } else {
      if (latitude < VALIDATION.LAT_MIN || latitude > VALIDATION.LAT_MAX) {
        errors.push(`Invalid latitude: ${latitude} (must be between ${VALIDATION.LAT_MIN} and ${VALIDATION.LAT_MAX})`);
      }
      if (longitude < VALIDATION.LNG_MIN || longitude > VALIDATION.LNG_MAX) {
        errors.push(
          `Invalid longitude: ${longitude} (must be between ${VALIDATION.LNG_MIN} and ${VALIDATION.LNG_MAX})`,
        );
      }
    }
  }

  // US ZIP or ZIP+4 ("12345-6789")
  const postalCode = record.postal_code.trim();
  if (postalCode && postalCode.length !== VALIDATION.ZIP_LENGTH_SHORT && postalCode.length !== VALIDATION.ZIP_LENGTH_LONG) {
    warnings.push(`Unusual postal code format: ${record.postal_code}`);
  }

  return { isValid: errors.length === 0, errors, warnings };
}

export function validateStoresBatch(
  records: readonly StoreRecord[],
  options: BatchValidationOptions = {},
): BatchValidationSummary {
  const { strict = false, logIssues = true } = options;
  const logger = options.logger ?? silentLogger;

  const results: ValidationResult[] = [];
  const invalidStoreIds: string[] = [];
  const errors: string[] = [];
  let warningCount = 0;

  records.forEach((record, index) => {
    const result = validateStore(record, strict);
    results.push(result);
    warningCount += result.warnings.length;

    if (!result.isValid) {
      const storeId = record.store_id || `index_${index}`;
      invalidStoreIds.push(storeId);
      errors.push(...result.errors.map((e) => `Store ${storeId}: ${e}`));
    }
  });

  if (logIssues && errors.length > 0) {
    errors.slice(0, VALIDATION.ERROR_LOG_LIMIT).forEach((e) => logger.warn(e));
    if (errors.length > VALIDATION.ERROR_LOG_LIMIT) {
      logger.warn(`... and ${errors.length - VALIDATION.ERROR_LOG_LIMIT} more validation errors`);
    }
  }

  return {
    total: records.length,
    valid: records.length - invalidStoreIds.length,
    invalid: invalidStoreIds.length,
    invalidStoreIds,
    errorCount: errors.length,
    warningCount,
    results,
  };
}
