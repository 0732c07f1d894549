import { validateStore, validateStoresBatch } from './storeValidator';
import { StoreRecord } from '../types/store';
import { recordingLogger } from '../testing/fixtures';

function store(overrides: Partial<StoreRecord> = {}): StoreRecord {
  return {
    store_id: 'S-1',
    name: 'Test Store',
    store_type: 'cricket_store',
    street_address: '1 Test Way',
    city: 'Testville',
    state: 'TX',
    postal_code: '75001',
    country: 'US',
    latitude: 32.9,
    longitude: -96.8,
    phone: '+15555550100',
    url: 'https://example.com/s-1',
    hours_monday: '10:00-19:00',
    hours_tuesday: '',
    hours_wednesday: '',
    hours_thursday: '',
    hours_friday: '',
    hours_saturday: '',
    hours_sunday: '',
    closed: false,
    scraped_at: '2026-03-01T12:00:00.000Z',
    ...overrides,
  };
}

describe('storeValidator', () => {
  describe('validateStore', () => {
    it('passes a complete record', () => {
      expect(validateStore(store())).toEqual({ isValid: true, errors: [], warnings: [] });
    });

    it('flags blank required fields', () => {
      const result = validateStore(store({ name: '   ', city: '' }));
      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(['Missing required field: name', 'Missing required field: city']);
    });

    it('warns about missing recommended fields', () => {
      const result = validateStore(store({ url: null, latitude: null }));
      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual(['Missing recommended field: latitude', 'Missing recommended field: url']);
    });

    it('treats missing recommended fields as errors in strict mode', () => {
      const result = validateStore(store({ url: null }), true);
      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(['Missing recommended field: url']);
      expect(result.warnings).toEqual([]);
    });

    it('rejects out-of-range coordinates', () => {
      const result = validateStore(store({ latitude: 91, longitude: -181 }));
      expect(result.errors).toEqual([
        'Invalid latitude: 91 (must be between -90 and 90)',
        'Invalid longitude: -181 (must be between -180 and 180)',
      ]);
    });

    it('accepts coordinates on the boundary', () => {
      expect(validateStore(store({ latitude: -90, longitude: 180 })).isValid).toBe(true);
    });

    it('rejects non-finite coordinates', () => {
      const result = validateStore(store({ latitude: Number.NaN, longitude: 10 }));
      expect(result.errors).toEqual(['Invalid coordinate format: lat=NaN, lng=10']);
    });

    it.each(['75001', '75001-1234'])('accepts postal code %s', (postal_code) => {
      expect(validateStore(store({ postal_code })).warnings).toEqual([]);
    });

    it('warns about unusual postal codes', () => {
      expect(validateStore(store({ postal_code: '7500' })).warnings).toEqual(['Unusual postal code format: 7500']);
    });

    it('ignores an empty postal code', () => {
      expect(validateStore(store({ postal_code: '' })).warnings).toEqual([]);
    });
  });

  describe('validateStoresBatch', () => {
    it('summarizes a mixed batch', () => {
      const summary = validateStoresBatch(
        [store(), store({ store_id: 'S-2', name: '' }), store({ store_id: 'S-3', url: null })],
        { logIssues: false },
      );

      expect(summary).toMatchObject({
        total: 3,
        valid: 2,
        invalid: 1,
        invalidStoreIds: ['S-2'],
        errorCount: 1,
        warningCount: 1,
      });
      expect(summary.results).toHaveLength(3);
    });

    it('labels records without an id by index', () => {
      const summary = validateStoresBatch([store(), store({ store_id: '' })], { logIssues: false });
      expect(summary.invalidStoreIds).toEqual(['index_1']);
    });

    it('logs the first ten errors and a truncation note', () => {
      const logger = recordingLogger();
      const records = Array.from({ length: 12 }, (_, i) => store({ store_id: `S-${i}`, name: '' }));

      validateStoresBatch(records, { logger });

      expect(logger.warnings).toHaveLength(11);
      expect(logger.warnings[0]).toBe('Store S-0: Missing required field: name');
      expect(logger.warnings[9]).toBe('Store S-9: Missing required field: name');
      expect(logger.warnings[10]).toBe('... and 2 more validation errors');
    });

    it('stays quiet when logging is off', () => {
      const logger = recordingLogger();
      validateStoresBatch([store({ name: '' })], { logger, logIssues: false });
      expect(logger.warnings).toEqual([]);
    });

    it('handles an empty batch', () => {
      expect(validateStoresBatch([])).toEqual({
        total: 0,
        valid: 0,
        invalid: 0,
        invalidStoreIds: [],
        errorCount: 0,
        warningCount: 0,
        results: [],
      });
    });
  });
});
