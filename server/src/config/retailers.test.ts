import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  DEFAULT_DELAY_RANGE,
  loadRetailerCatalogue,
  parseRetailerConfig,
  RetailerCatalogue,
  selectDelays,
} from './retailers';
import { ConfigurationError } from '../utils/errors';

const minimal = {
  name: 'cricket',
  displayName: 'Cricket Wireless',
  gridSpacingMiles: 50,
  searchRadiusMiles: 50,
  bounds: { latMin: 24.5, latMax: 49.4, lngMin: -125, lngMax: -66.9 },
  api: { experienceKey: 'cricket-locator', apiVersion: '20220511' },
};

describe('parseRetailerConfig', () => {
  it('fills defaults', () => {
    const config = parseRetailerConfig(minimal);
    expect(config.proxy).toEqual({ mode: 'direct' });
    expect(config.api.locale).toBe('en');
    expect(config.storeTypes).toEqual({});
    expect(config.parallelWorkers).toBeUndefined();
  });

  it.each([
    ['zero spacing', { gridSpacingMiles: 0 }, 'gridSpacingMiles'],
    ['negative radius', { searchRadiusMiles: -1 }, 'searchRadiusMiles'],
    ['fractional workers', { parallelWorkers: 2.5 }, 'parallelWorkers'],
    ['unknown proxy mode', { proxy: { mode: 'carrier-pigeon' } }, 'proxy.mode'],
    ['inverted bounds', { bounds: { latMin: 50, latMax: 40, lngMin: -80, lngMax: -70 } }, 'bounds'],
    ['inverted delay range', { delays: { direct: { minMs: 500, maxMs: 300 } } }, 'delays.direct'],
  ])('rejects %s', (_label, override, field) => {
    expect(() => parseRetailerConfig({ ...minimal, ...override })).toThrow(ConfigurationError);
    expect(() => parseRetailerConfig({ ...minimal, ...override })).toThrow(field);
  });
});

describe('loadRetailerCatalogue', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'retailers-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads retailers by name', async () => {
    const file = path.join(dir, 'retailers.json');
    await fs.writeFile(file, JSON.stringify({ retailers: [minimal, { ...minimal, name: 'other' }] }));

    const catalogue = loadRetailerCatalogue(file);

    expect(catalogue.list().map((r) => r.name)).toEqual(['cricket', 'other']);
    expect(catalogue.get('other')?.displayName).toBe('Cricket Wireless');
    expect(catalogue.get('missing')).toBeUndefined();
  });

  it('loads the bundled catalogue', () => {
    const catalogue = loadRetailerCatalogue('server/config/retailers.json');
    expect(catalogue.get('cricket')?.parallelWorkers).toBe(10);
    expect(catalogue.get('cricket')?.delays.direct).toEqual({ minMs: 300, maxMs: 500 });
  });

  it('fails on a missing file', () => {
    expect(() => loadRetailerCatalogue(path.join(dir, 'absent.json'))).toThrow(ConfigurationError);
  });

  it('fails on an invalid entry', async () => {
    const file = path.join(dir, 'retailers.json');
    await fs.writeFile(file, JSON.stringify({ retailers: [{ ...minimal, gridSpacingMiles: -5 }] }));

    expect(() => loadRetailerCatalogue(file)).toThrow('retailers.0.gridSpacingMiles');
  });
});

describe('RetailerCatalogue', () => {
  it('keeps the last entry for a duplicated name', () => {
    const catalogue = new RetailerCatalogue([
      parseRetailerConfig(minimal),
      parseRetailerConfig({ ...minimal, displayName: 'Second' }),
    ]);
    expect(catalogue.list()).toHaveLength(1);
    expect(catalogue.get('cricket')?.displayName).toBe('Second');
  });
});

describe('selectDelays', () => {
  const delays = { direct: { minMs: 2_000, maxMs: 4_000 }, proxied: { minMs: 200, maxMs: 500 } };

  it('uses the proxied range for any proxy mode', () => {
    const retailer = parseRetailerConfig({ ...minimal, delays });
    expect(selectDelays(retailer, 'residential')).toEqual({ minMs: 200, maxMs: 500 });
    expect(selectDelays(retailer, 'web_scraper_api')).toEqual({ minMs: 200, maxMs: 500 });
    expect(selectDelays(retailer, 'direct')).toEqual({ minMs: 2_000, maxMs: 4_000 });
  });

  it('follows the configured proxy mode by default', () => {
    const retailer = parseRetailerConfig({ ...minimal, delays, proxy: { mode: 'residential' } });
    expect(selectDelays(retailer)).toEqual({ minMs: 200, maxMs: 500 });
  });

  it('falls back to the direct range, then the defaults', () => {
    const directOnly = parseRetailerConfig({ ...minimal, delays: { direct: delays.direct } });
    expect(selectDelays(directOnly, 'residential')).toEqual({ minMs: 2_000, maxMs: 4_000 });
    expect(selectDelays(parseRetailerConfig(minimal), 'direct')).toEqual(DEFAULT_DELAY_RANGE);
    expect(DEFAULT_DELAY_RANGE).toEqual({ minMs: 2_000, maxMs: 5_000 });
  });
});
