import { LocationSearchAdapter } from '../adapters/LocationSearchAdapter';
import { CONFIG } from '../config/constants';
import { RetailerConfig } from '../config/retailers';
import { formatGridPoint, generateGrid, GridPoint } from '../geo/gridGenerator';
import { normalizeStores } from '../transformers/storeRecordTransformer';
import { StoreRecord } from '../types/store';
import { errorMessage } from '../utils/errors';
import { Logger, silentLogger } from '../utils/logger';
import { BatchValidationSummary, validateStoresBatch } from '../validators/storeValidator';
import { createSessionFactory, ScanSession, SessionFactory, SessionOptions } from './session';

export type ScanPhase = 'idle' | 'generating' | 'scanning' | 'finalizing' | 'done';

export interface ScanProgress {
  pointsCompleted: number;
  totalPoints: number;
  uniqueStores: number;
}

export interface ScanOptions {
  /** Stop once this many unique stores are collected. */
  limit?: number;
  /** Coarse grid for quick end-to-end checks. */
  test?: boolean;
  /** Ignore cached responses; fresh ones are still written back. */
  refresh?: boolean;
  onPhase?: (phase: ScanPhase) => void;
  onProgress?: (progress: ScanProgress) => void;
}

export interface ScanResult {
  stores: StoreRecord[];
  count: number;
  /** Grid scans run in one pass and never resume from a checkpoint. */
  checkpointsUsed: false;
  validation: BatchValidationSummary;
}

export interface GridScanOrchestratorOptions {
  /** Search integration for a retailer. */
  createAdapter: (retailer: RetailerConfig) => LocationSearchAdapter;
  /** Defaults to one fresh HTTP session per task. */
  createSessionFactory?: (options: SessionOptions) => SessionFactory;
  logger?: Logger;
  now?: () => Date;
}

export function poolSizeFor(retailer: RetailerConfig, session: ScanSession): number {
  if (retailer.parallelWorkers) return retailer.parallelWorkers;
  return session.proxyMode === 'direct' ? CONFIG.WORKERS.DIRECT : CONFIG.WORKERS.PROXIED;
}

/**
 * Covers a retailer's bounding box with a grid of search points and queries
 * them through a bounded worker pool, merging results by store_id.
 *
 * Workers pull points from a shared cursor. Merging and progress accounting
 * run synchronously between awaits, so no two workers interleave there.
 * Reaching `limit` stops workers from taking new points; results still in
 * flight are dropped.
 */
export class GridScanOrchestrator {
  private readonly createAdapter: GridScanOrchestratorOptions['createAdapter'];
  private readonly createSessionFactory: (options: SessionOptions) => SessionFactory;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: GridScanOrchestratorOptions) {
    this.createAdapter = options.createAdapter;
    this.createSessionFactory = options.createSessionFactory ?? createSessionFactory;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async run(
    session: ScanSession,
    retailerConfig: RetailerConfig,
    retailer: string,
    options: ScanOptions = {},
  ): Promise<ScanResult> {
    const log = this.logger;
    const limit = options.limit !== undefined && options.limit > 0 ? options.limit : undefined;
    const onProgress = options.onProgress ?? (() => undefined);
    const setPhase = options.onPhase ?? (() => undefined);

    setPhase('generating');
    const spacing = options.test ? CONFIG.TEST_MODE.GRID_SPACING_MILES : retailerConfig.gridSpacingMiles;
    const points = generateGrid(retailerConfig.bounds, spacing);
    log.info(
      `[${retailer}] Generated ${points.length} grid points at ${spacing} mi spacing` +
        `${options.test ? ' (test mode)' : ''}`,
    );

    const adapter = this.createAdapter(retailerConfig);
    const sessionFactory = this.createSessionFactory(session.options);
    const poolSize = Math.min(poolSizeFor(retailerConfig, session), Math.max(points.length, 1));

    setPhase('scanning');
    log.info(`[${retailer}] Scanning ${points.length} points with ${poolSize} workers`);

    const storesById = new Map<string, StoreRecord>();
    let cursor = 0;
    let completed = 0;
    let limitReached = false;

    const scanPoint = async (point: GridPoint): Promise<StoreRecord[]> => {
      let worker: ScanSession | undefined;
      try {
        worker = sessionFactory();
        const raws = await adapter.fetchStoresAtPoint(worker, point, { forceRefresh: options.refresh ?? false });
        return normalizeStores(raws, {
          storeTypes: retailerConfig.storeTypes,
          retailer,
          logger: log,
          now: this.now,
        });
      } catch (err) {
        log.error(`[${retailer}] Failed to scan point ${formatGridPoint(point)}: ${errorMessage(err)}`);
        return [];
      } finally {
        worker?.close();
      }
    };

    const merge = (records: StoreRecord[]): void => {
      for (const record of records) {
        if (limitReached) return;
        if (!storesById.has(record.store_id)) {
          storesById.set(record.store_id, record);
        }
        if (limit !== undefined && storesById.size >= limit) {
          limitReached = true;
          log.info(`[${retailer}] Reached limit of ${limit} stores, cancelling remaining points`);
        }
      }
    };

    let lastLogged = 0;
    const logProgress = (): void => {
      lastLogged = completed;
      const pct = ((completed / points.length) * 100).toFixed(1);
      log.info(
        `[${retailer}] Progress: ${completed}/${points.length} points (${pct}%), ${storesById.size} unique stores`,
      );
    };

    const reportProgress = (): void => {
      completed += 1;
      const progress = { pointsCompleted: completed, totalPoints: points.length, uniqueStores: storesById.size };
      onProgress(progress);

      if (completed % CONFIG.PROGRESS.POINT_INTERVAL === 0 || completed === points.length) {
        logProgress();
      }
    };

    const runWorker = async (): Promise<void> => {
      while (!limitReached && cursor < points.length) {
        const point = points[cursor];
        cursor += 1;
        const records = await scanPoint(point);
        merge(records);
        reportProgress();
      }
    };

    await Promise.all(Array.from({ length: poolSize }, runWorker));

    setPhase('finalizing');
    // A scan cut short by the limit never reaches the last point
    if (completed > lastLogged) logProgress();
    let stores = [...storesById.values()];
    if (limit !== undefined && stores.length > limit) {
      stores = stores.slice(0, limit);
    }

    const validation = validateStoresBatch(stores, { strict: false, logIssues: true, logger: log });
    if (validation.invalid > 0) {
      log.warn(`[${retailer}] ${validation.invalid}/${validation.total} stores failed validation`);
    }
    log.info(`[${retailer}] Completed: ${stores.length} unique stores from ${completed} points`);

    setPhase('done');
    return { stores, count: stores.length, checkpointsUsed: false, validation };
  }
}
