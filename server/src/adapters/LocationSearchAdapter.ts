/**
 * LocationSearchAdapter — one provider's "stores near this point" search.
 *
 * The grid scan only depends on this interface; a provider integration
 * builds its own request and pulls the raw result list out of the response.
 */

import { GridPoint } from '../geo/gridGenerator';
import { ScanSession } from '../services/session';

/** Provider-defined result object, as received. The normalizer validates it. */
export type RawStoreResult = unknown;

export interface PointFetchOptions {
  /** Skip the response cache read; a fresh response is still written back. */
  forceRefresh?: boolean;
}

export interface LocationSearchAdapter {
  /** Human-readable identifier, e.g. "yext" */
  readonly providerId: string;

  buildSearchUrl(point: GridPoint): string;

  /**
   * Raw results near `point`, or an empty list on any failure. Never rejects.
   */
  fetchStoresAtPoint(session: ScanSession, point: GridPoint, options?: PointFetchOptions): Promise<RawStoreResult[]>;
}
