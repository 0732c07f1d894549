import { randomUUID } from 'crypto';
import { ScanPhase, ScanProgress, ScanResult } from './GridScanOrchestrator';
import { NotFoundError } from '../utils/errors';

export type ScanStatus = 'running' | 'completed' | 'failed';

export interface ScanRequest {
  limit?: number;
  test: boolean;
  refresh: boolean;
}

export interface ScanRun {
  id: string;
  retailer: string;
  status: ScanStatus;
  phase: ScanPhase;
  request: ScanRequest;
  startedAt: string;
  finishedAt: string | null;
  progress: ScanProgress;
  result: ScanResult | null;
  error: string | null;
}

export interface ScanRegistryOptions {
  /** Finished runs beyond this count are forgotten, oldest first. */
  maxRuns?: number;
  now?: () => Date;
  newId?: () => string;
}

const DEFAULT_MAX_RUNS = 50;

/** In-memory record of scans started through the API. */
export class ScanRegistry {
  private readonly runs = new Map<string, ScanRun>();
  private readonly maxRuns: number;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: ScanRegistryOptions = {}) {
    this.maxRuns = options.maxRuns ?? DEFAULT_MAX_RUNS;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  start(retailer: string, request: ScanRequest): ScanRun {
    const run: ScanRun = {
      id: this.newId(),
      retailer,
      status: 'running',
      phase: 'idle',
      request,
      startedAt: this.now().toISOString(),
      finishedAt: null,
      progress: { pointsCompleted: 0, totalPoints: 0, uniqueStores: 0 },
      result: null,
      error: null,
    };
    this.runs.set(run.id, run);
    this.evict();
    return run;
  }

  setPhase(id: string, phase: ScanPhase): void {
    this.require(id).phase = phase;
  }

  progress(id: string, progress: ScanProgress): void {
    this.require(id).progress = { ...progress };
  }

  complete(id: string, result: ScanResult): ScanRun {
    const run = this.require(id);
    run.status = 'completed';
    run.phase = 'done';
    run.result = result;
    run.finishedAt = this.now().toISOString();
    return run;
  }

  fail(id: string, error: string): ScanRun {
    const run = this.require(id);
    run.status = 'failed';
    run.error = error;
    run.finishedAt = this.now().toISOString();
    return run;
  }

  get(id: string): ScanRun | undefined {
    return this.runs.get(id);
  }

  /** Newest first. */
  list(): ScanRun[] {
    return [...this.runs.values()].reverse();
  }

  isRunning(retailer: string): boolean {
    for (const run of this.runs.values()) {
      if (run.retailer === retailer && run.status === 'running') return true;
    }
    return false;
  }

  private require(id: string): ScanRun {
    const run = this.runs.get(id);
    if (!run) throw new NotFoundError(`Scan ${id} not found`);
    return run;
  }

  private evict(): void {
    for (const [id, run] of this.runs) {
      if (this.runs.size <= this.maxRuns) return;
      if (run.status !== 'running') this.runs.delete(id);
    }
  }
}
