/**
 * In-memory run and event repositories.
 *
 * Same conditional-write contract as the Mongo implementation: every
 * check-and-set happens synchronously, so no await can interleave
 * between the compare and the write.
 */

import type { RunEvent, RunPatch, RunState, TrainingRun } from '../contracts/training.types.js';
import type {
  ClaimOptions,
  RunEventRepository,
  RunRepository,
  TransitionOptions,
} from './run.repo.js';

function clone<T>(value: T): T {
  return structuredClone(value);
}

export class InMemoryRunRepository implements RunRepository {
  private runs = new Map<string, TrainingRun>();
  private insertOrder: string[] = [];

  async insert(run: TrainingRun): Promise<void> {
    if (this.runs.has(run.runId)) {
      throw new Error(`Duplicate runId ${run.runId}`);
    }
    this.runs.set(run.runId, clone(run));
    this.insertOrder.push(run.runId);
  }

  async findById(runId: string): Promise<TrainingRun | null> {
    const run = this.runs.get(runId);
    return run ? clone(run) : null;
  }

  async listByProject(tenantId: string, projectId: string, limit = 100): Promise<TrainingRun[]> {
    return this.ordered()
      .filter((r) => r.tenantId === tenantId && r.projectId === projectId)
      .reverse()
      .slice(0, limit)
      .map(clone);
  }

  async countSubmittedSince(tenantId: string, since: Date): Promise<number> {
    return this.ordered().filter((r) => r.tenantId === tenantId && r.createdAt >= since).length;
  }

  async claimOldestQueued(options: ClaimOptions): Promise<TrainingRun | null> {
    const candidate = this.ordered()
      .filter((r) => r.state === 'QUEUED' && (!options.tenantId || r.tenantId === options.tenantId))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())[0];
    if (!candidate) return null;

    candidate.state = 'PREFLIGHT';
    candidate.claimedBy = options.workerId;
    candidate.startedAt = options.now;
    candidate.updatedAt = options.now;
    candidate.eventSeq += 1;
    return clone(candidate);
  }

  async transition(
    runId: string,
    from: RunState,
    to: RunState,
    options: TransitionOptions
  ): Promise<TrainingRun | null> {
    const run = this.runs.get(runId);
    if (!run || run.state !== from) return null;
    if (to === 'READY' && !run.evalReportId && !options.patch?.evalReportId) return null;

    Object.assign(run, options.patch ?? {});
    run.state = to;
    run.updatedAt = options.now;
    run.eventSeq += 1;
    return clone(run);
  }

  async patch(runId: string, state: RunState, patch: RunPatch, now: Date): Promise<TrainingRun | null> {
    const run = this.runs.get(runId);
    if (!run || run.state !== state) return null;
    Object.assign(run, patch);
    run.updatedAt = now;
    return clone(run);
  }

  async raiseProgress(runId: string, value: number, now: Date): Promise<boolean> {
    const run = this.runs.get(runId);
    if (!run || run.state !== 'TRAINING') return false;
    run.progress = Math.max(run.progress, value);
    run.updatedAt = now;
    return true;
  }

  private ordered(): TrainingRun[] {
    return this.insertOrder.flatMap((id) => {
      const run = this.runs.get(id);
      return run ? [run] : [];
    });
  }
}

export class InMemoryRunEventRepository implements RunEventRepository {
  private events: RunEvent[] = [];

  async append(event: RunEvent): Promise<void> {
    if (this.events.some((e) => e.runId === event.runId && e.seq === event.seq)) {
      throw new Error(`Duplicate event seq ${event.seq} for run ${event.runId}`);
    }
    this.events.push(clone(event));
  }

  async listByRun(runId: string): Promise<RunEvent[]> {
    return this.events
      .filter((e) => e.runId === runId)
      .sort((a, b) => a.seq - b.seq)
      .map(clone);
  }
}
