import { RetailerCatalogue, RetailerConfig } from '../config/retailers';
import { ConflictError, errorMessage, NotFoundError } from '../utils/errors';
import { Logger, silentLogger } from '../utils/logger';
import { GridScanOrchestrator } from './GridScanOrchestrator';
import { ScanRegistry, ScanRequest, ScanRun } from './ScanRegistry';
import { createSession, ScanSession, SessionOptions, sessionOptionsFor } from './session';

export interface ScanServiceOptions {
  catalogue: RetailerCatalogue;
  registry: ScanRegistry;
  orchestrator: GridScanOrchestrator;
  sessionOptions?: (retailer: RetailerConfig, logger: Logger) => SessionOptions;
  logger?: Logger;
}

export interface StartedScan {
  run: ScanRun;
  /** Settles with the finished run; never rejects. */
  completion: Promise<ScanRun>;
}

/** Starts background scans and records their outcome in the registry. */
export class ScanService {
  private readonly catalogue: RetailerCatalogue;
  private readonly registry: ScanRegistry;
  private readonly orchestrator: GridScanOrchestrator;
  private readonly sessionOptions: (retailer: RetailerConfig, logger: Logger) => SessionOptions;
  private readonly logger: Logger;

  constructor(options: ScanServiceOptions) {
    this.catalogue = options.catalogue;
    this.registry = options.registry;
    this.orchestrator = options.orchestrator;
    this.sessionOptions = options.sessionOptions ?? sessionOptionsFor;
    this.logger = options.logger ?? silentLogger;
  }

  start(retailer: string, request: ScanRequest): StartedScan {
    const config = this.catalogue.get(retailer);
    if (!config) {
      throw new NotFoundError(`Unknown retailer: ${retailer}`);
    }
    if (this.registry.isRunning(config.name)) {
      throw new ConflictError(`A scan for ${config.name} is already running`);
    }

    const run = this.registry.start(config.name, request);
    this.logger.info(`[${config.name}] Scan ${run.id} started`);
    return { run, completion: this.execute(run.id, config, request) };
  }

  private async execute(id: string, config: RetailerConfig, request: ScanRequest): Promise<ScanRun> {
    let session: ScanSession | undefined;
    try {
      session = createSession(this.sessionOptions(config, this.logger));
      const result = await this.orchestrator.run(session, config, config.name, {
        ...request,
        onPhase: (phase) => this.registry.setPhase(id, phase),
        onProgress: (progress) => this.registry.progress(id, progress),
      });
      this.logger.info(`[${config.name}] Scan ${id} completed with ${result.count} stores`);
      return this.registry.complete(id, result);
    } catch (err) {
      this.logger.error(`[${config.name}] Scan ${id} failed: ${errorMessage(err)}`);
      return this.registry.fail(id, errorMessage(err));
    } finally {
      session?.close();
    }
  }
}
