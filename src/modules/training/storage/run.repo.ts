/**
 * Training Run Repository (contract)
 *
 * All state writes are conditional on the expected prior state. A write
 * that finds the run in a different state does nothing and returns null;
 * the caller decides whether that is a lost race or a cancellation.
 */

import type { RunEvent, RunPatch, RunState, TrainingRun } from '../contracts/training.types.js';

export interface ClaimOptions {
  workerId: string;
  now: Date;
  tenantId?: string;          // restrict the visible pool
}

export interface TransitionOptions {
  now: Date;
  patch?: RunPatch;
}

export interface RunRepository {
  insert(run: TrainingRun): Promise<void>;
  findById(runId: string): Promise<TrainingRun | null>;
  listByProject(tenantId: string, projectId: string, limit?: number): Promise<TrainingRun[]>;
  countSubmittedSince(tenantId: string, since: Date): Promise<number>;

  /** Oldest QUEUED run → PREFLIGHT in one conditional write. */
  claimOldestQueued(options: ClaimOptions): Promise<TrainingRun | null>;

  /**
   * from → to if the stored state still equals `from`. Allocates the next
   * event seq in the same write. A move to READY also requires a stored
   * evalReportId.
   */
  transition(runId: string, from: RunState, to: RunState, options: TransitionOptions): Promise<TrainingRun | null>;

  /** Field update without a state change, conditional on `state`. */
  patch(runId: string, state: RunState, patch: RunPatch, now: Date): Promise<TrainingRun | null>;

  /** progress = max(progress, value) while TRAINING. False once not TRAINING. */
  raiseProgress(runId: string, value: number, now: Date): Promise<boolean>;
}

export interface RunEventRepository {
  append(event: RunEvent): Promise<void>;
  listByRun(runId: string): Promise<RunEvent[]>;
}
