/**
 * Training Worker
 *
 * Polls the queue on an interval. Each tick runs `concurrency` claim
 * loops; a loop keeps claiming until the queue is empty, so one slow run
 * never blocks another. Coordination is entirely through the atomic
 * claim in the run repository.
 */

import { errorMessage } from '../../../common/errors.js';
import type { Clock, Logger } from '../../../common/host.deps.js';
import { defaultClock, defaultLogger } from '../../../common/host.deps.js';
import type { TrainingRun } from '../contracts/training.types.js';

export interface TrainingWorkerConfig {
  intervalMs: number;
  concurrency: number;
}

export const DEFAULT_TRAINING_WORKER_CONFIG: TrainingWorkerConfig = {
  intervalMs: 2000,
  concurrency: 1,
};

export interface TrainingWorkerStats {
  running: boolean;
  lastRunAt: Date | null;
  runsProcessed: number;
  runsReady: number;
  runsFailed: number;
  runsCancelled: number;
  avgProcessingTimeMs: number;
  lastError: string | null;
}

/** The slice of the orchestrator the worker drives. */
export interface RunProcessor {
  processNext(): Promise<TrainingRun | null>;
}

export class TrainingWorker {
  private readonly config: TrainingWorkerConfig;
  private intervalId: NodeJS.Timeout | null = null;
  private isRunning = false;
  private stopping = false;
  private currentTick: Promise<void> | null = null;
  private totalProcessingMs = 0;

  private stats: TrainingWorkerStats = {
    running: false,
    lastRunAt: null,
    runsProcessed: 0,
    runsReady: 0,
    runsFailed: 0,
    runsCancelled: 0,
    avgProcessingTimeMs: 0,
    lastError: null,
  };

  constructor(
    private readonly processor: RunProcessor,
    config: Partial<TrainingWorkerConfig> = {},
    private readonly clock: Clock = defaultClock,
    private readonly logger: Logger = defaultLogger
  ) {
    this.config = { ...DEFAULT_TRAINING_WORKER_CONFIG, ...config };
  }

  // ═══════════════════════════════════════════════════════════════
  // START/STOP
  // ═══════════════════════════════════════════════════════════════

  start(): void {
    if (this.intervalId) {
      this.logger.info({}, '[TrainingWorker] Already running');
      return;
    }

    this.logger.info(
      { intervalMs: this.config.intervalMs, concurrency: this.config.concurrency },
      '[TrainingWorker] Starting'
    );
    this.stats.running = true;
    this.stopping = false;

    void this.tick();
    this.intervalId = setInterval(() => {
      void this.tick();
    }, this.config.intervalMs);
  }

  /** Stops polling and waits for every run in flight to finish. */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.logger.info({}, '[TrainingWorker] Stopped');
    }
    this.stats.running = false;
    if (this.currentTick) await this.currentTick;
  }

  getStats(): TrainingWorkerStats {
    return { ...this.stats };
  }

  // ═══════════════════════════════════════════════════════════════
  // MAIN LOOP
  // ═══════════════════════════════════════════════════════════════

  /** One polling cycle. Returns the number of runs processed. */
  tick(): Promise<number> {
    if (this.isRunning) {
      this.logger.debug?.({}, '[TrainingWorker] Skipping tick, previous tick still in progress');
      return Promise.resolve(0);
    }

    this.isRunning = true;
    const cycle = this.runCycle();
    this.currentTick = cycle.then(() => undefined);
    return cycle;
  }

  /** Settles only when every loop has finished; a failing loop stops alone. */
  private async runCycle(): Promise<number> {
    const counts = await Promise.all(
      Array.from({ length: this.config.concurrency }, () => this.drain())
    );
    const processed = counts.reduce((sum, n) => sum + n, 0);
    if (processed > 0) {
      this.logger.info({ processed }, '[TrainingWorker] Tick complete');
    }

    this.stats.lastRunAt = this.clock.utcNow();
    this.isRunning = false;
    this.currentTick = null;
    return processed;
  }

  private async drain(): Promise<number> {
    let count = 0;
    try {
      while (!this.stopping) {
        const started = this.clock.now();
        const run = await this.processor.processNext();
        if (!run) break;

        count++;
        this.record(run, this.clock.now() - started);
      }
    } catch (err) {
      this.stats.lastError = errorMessage(err);
      this.logger.error({ error: this.stats.lastError }, '[TrainingWorker] Error in worker tick');
    }
    return count;
  }

  private record(run: TrainingRun, elapsedMs: number): void {
    this.stats.runsProcessed++;
    if (run.state === 'READY') this.stats.runsReady++;
    else if (run.state === 'FAILED') this.stats.runsFailed++;
    else if (run.state === 'CANCELLED') this.stats.runsCancelled++;

    this.totalProcessingMs += elapsedMs;
    this.stats.avgProcessingTimeMs = Math.round(this.totalProcessingMs / this.stats.runsProcessed);
  }
}
