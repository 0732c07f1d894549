import { MILES_PER_DEGREE_LAT, MILES_PER_DEGREE_LNG } from '../config/constants';
import { ConfigurationError } from '../utils/errors';

export interface GridPoint {
  readonly latitude: number;
  readonly longitude: number;
}

export interface GridBounds {
  latMin: number;
  latMax: number;
  lngMin: number;
  lngMax: number;
}

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

export function gridPoint(latitude: number, longitude: number): GridPoint {
  return Object.freeze({ latitude, longitude });
}

export function sameGridPoint(a: GridPoint, b: GridPoint): boolean {
  return a.latitude === b.latitude && a.longitude === b.longitude;
}

export function formatGridPoint(point: GridPoint): string {
  return `(${point.latitude}, ${point.longitude})`;
}

/**
 * Lattice of sample points covering `bounds`, starting at (latMin, lngMin).
 *
 * Steps are `spacing / 69` degrees of latitude and `spacing / 54.6` degrees of
 * longitude. The last row/column is the final step that stays within the max
 * bound. Points are rounded to 4 decimals and returned row-major: latitude
 * ascending, then longitude ascending.
 *
 * @throws ConfigurationError for non-positive spacing or inverted bounds
 */
export function generateGrid(bounds: GridBounds, spacingMiles: number): GridPoint[] {
  if (!Number.isFinite(spacingMiles) || spacingMiles <= 0) {
    throw new ConfigurationError(`Grid spacing must be a positive number of miles, got ${spacingMiles}`);
  }
  if (bounds.latMin > bounds.latMax || bounds.lngMin > bounds.lngMax) {
    throw new ConfigurationError(
      `Invalid grid bounds: lat [${bounds.latMin}, ${bounds.latMax}], lng [${bounds.lngMin}, ${bounds.lngMax}]`,
    );
  }

  const latStep = spacingMiles / MILES_PER_DEGREE_LAT;
  const lngStep = spacingMiles / MILES_PER_DEGREE_LNG;

  const points: GridPoint[] = [];
  for (let i = 0; bounds.latMin + i * latStep <= bounds.latMax; i++) {
    const lat = round4(bounds.latMin + i * latStep);
    for (let j = 0; bounds.lngMin + j * lngStep <= bounds.lngMax; j++) {
      points.push(gridPoint(lat, round4(bounds.lngMin + j * lngStep)));
    }
  }

  return points;
}
