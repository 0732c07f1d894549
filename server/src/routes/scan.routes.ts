import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { YextSearchAdapter } from '../adapters/YextSearchAdapter';
import { createResponseCache } from '../cache/flavors';
import { env } from '../config/env';
import { loadRetailerCatalogue, RetailerConfig } from '../config/retailers';
import { requireJwt, requireRole } from '../middleware/jwtAuth.middleware';
import { cacheService } from '../services/CacheService';
import { GridScanOrchestrator } from '../services/GridScanOrchestrator';
import { ScanRegistry, ScanRun } from '../services/ScanRegistry';
import { ScanService } from '../services/ScanService';
import { NotFoundError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger(env.LOG_LEVEL, 'scan');
const catalogue = loadRetailerCatalogue(env.RETAILERS_FILE);

export const scanRegistry = new ScanRegistry();

const orchestrator = new GridScanOrchestrator({
  createAdapter: (retailer) =>
    new YextSearchAdapter({
      retailer,
      responseCache: createResponseCache(cacheService.backend(`${retailer.name}/response_cache`), {
        ttlDays: env.RESPONSE_CACHE_TTL_DAYS,
        logger,
      }),
      logger,
    }),
  logger,
});

const scanService = new ScanService({ catalogue, registry: scanRegistry, orchestrator, logger });

const router = Router();

const startScanSchema = z.object({
  retailer: z.string().min(1),
  limit: z.number().int().positive().optional(),
  test: z.boolean().default(false),
  refresh: z.boolean().default(false),
});

function toRetailerView(retailer: RetailerConfig) {
  return {
    name: retailer.name,
    displayName: retailer.displayName,
    gridSpacingMiles: retailer.gridSpacingMiles,
    searchRadiusMiles: retailer.searchRadiusMiles,
    proxyMode: retailer.proxy.mode,
    bounds: retailer.bounds,
  };
}

/** Run status without the store list; per-record validation detail is dropped. */
function toScanView(run: ScanRun) {
  const { result } = run;
  return {
    id: run.id,
    retailer: run.retailer,
    status: run.status,
    phase: run.phase,
    request: run.request,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    progress: run.progress,
    error: run.error,
    result: result && {
      count: result.count,
      checkpointsUsed: result.checkpointsUsed,
      validation: {
        total: result.validation.total,
        valid: result.validation.valid,
        invalid: result.validation.invalid,
        invalidStoreIds: result.validation.invalidStoreIds,
        errorCount: result.validation.errorCount,
        warningCount: result.validation.warningCount,
      },
    },
  };
}

function findRun(id: string): ScanRun {
  const run = scanRegistry.get(id);
  if (!run) throw new NotFoundError(`Scan ${id} not found`);
  return run;
}

/**
 * GET /api/v1/retailers
 * Configured retailers that can be scanned.
 */
router.get('/retailers', (_req: Request, res: Response): void => {
  res.json({ retailers: catalogue.list().map(toRetailerView) });
});

/**
 * POST /api/v1/scans
 * Starts a background grid scan. Responds 202 with the run id.
 */
router.post('/scans', requireJwt, requireRole('operator'), (req: Request, res: Response): void => {
  const parsed = startScanSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten() });
    return;
  }

  const { retailer, ...request } = parsed.data;
  const { run, completion } = scanService.start(retailer, request);
  // Outcome is recorded in the registry
  void completion;

  res.status(202).location(`/api/v1/scans/${run.id}`).json({ id: run.id, status: run.status });
});

/**
 * GET /api/v1/scans
 * Recent runs, newest first.
 */
router.get('/scans', (_req: Request, res: Response): void => {
  res.json({ scans: scanRegistry.list().map(toScanView) });
});

/**
 * GET /api/v1/scans/:id
 */
router.get('/scans/:id', (req: Request, res: Response): void => {
  res.json(toScanView(findRun(req.params.id)));
});

/**
 * GET /api/v1/scans/:id/stores
 * Store records of a completed run.
 */
router.get('/scans/:id/stores', (req: Request, res: Response): void => {
  const run = findRun(req.params.id);
  if (!run.result) {
    res.status(409).json({ error: `Scan ${run.id} is ${run.status}`, status: run.status });
    return;
  }
  res.json({ id: run.id, retailer: run.retailer, count: run.result.count, stores: run.result.stores });
});

export default router;
