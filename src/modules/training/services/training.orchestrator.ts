/**
 * TRAINING ORCHESTRATOR
 *
 * Owns the run state machine:
 * - submit: validate, reserve quota, insert QUEUED
 * - claimNext: atomic QUEUED → PREFLIGHT for exactly one caller
 * - advance: drive a claimed run to READY or FAILED
 * - cancel / resubmit / read accessors
 *
 * Lifecycle failures are written to the run, never thrown from advance.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  InvalidStateTransitionError,
  NotFoundError,
  QuotaExceededError,
  ValidationError,
  errorMessage,
} from '../../../common/errors.js';
import type { Clock, Logger } from '../../../common/host.deps.js';
import { defaultClock, defaultLogger, sleep } from '../../../common/host.deps.js';
import type { AuditAction, AuditRecorder } from '../../audit/contracts/audit.types.js';
import { SYSTEM_ACTOR } from '../../audit/contracts/audit.types.js';
import type { EvaluationReport } from '../../evaluation/contracts/evaluation.types.js';
import type { ExecutionBackend, ExecutionResult } from '../backends/execution.backend.js';
import { cancelled } from '../backends/execution.backend.js';
import type { BaseModelRegistry } from '../config/base_models.registry.js';
import type {
  ActiveReportLookup,
  DatasetCatalog,
  QuotaService,
  RunEvaluator,
} from '../contracts/collaborators.js';
import { isUsableDataset } from '../contracts/collaborators.js';
import { resolveTrainingConfig } from '../contracts/training.schemas.js';
import type {
  RunEvent,
  RunFailureCode,
  RunPatch,
  RunState,
  RunTimeline,
  SubmitRunRequest,
  TrainingConfig,
  TrainingRun,
} from '../contracts/training.types.js';
import { estimateVram, type CapacityConfig, type VramEstimate } from '../runtime/preflight.estimator.js';
import {
  DEFAULT_RETRY_POLICY,
  ExecutionTimeoutError,
  backoffDelay,
  executeWithTimeout,
  type RetryPolicy,
} from '../runtime/retry.policy.js';
import { assertTransition, isCancellable, isTerminal, isValidPath } from '../runtime/run.state.machine.js';
import type { RunEventRepository, RunRepository } from '../storage/run.repo.js';
import type { DeploymentPackager } from './deployment.packager.js';
import type { RunStager } from './run.stager.js';

// ═══════════════════════════════════════════════════════════════
// INTERNAL SIGNALS
// ═══════════════════════════════════════════════════════════════

/** Carries a failure code from a stage to the single catch in advance(). */
export class RunFailure extends Error {
  constructor(public readonly code: RunFailureCode, message: string) {
    super(message);
    this.name = 'RunFailure';
  }
}

/** A conditional write found the run in another state (cancelled meanwhile). */
class RunInterrupted extends Error {
  constructor(public readonly runId: string, public readonly expected: RunState) {
    super(`Run ${runId} left ${expected} concurrently`);
    this.name = 'RunInterrupted';
  }
}

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;
const CANCEL_ATTEMPTS = 5;

function assertSafeId(field: string, value: string): void {
  if (!SAFE_ID.test(value) || value.includes('..')) {
    throw new ValidationError(`Invalid ${field}: ${value}`);
  }
}

// ═══════════════════════════════════════════════════════════════
// DEPENDENCIES
// ═══════════════════════════════════════════════════════════════

export interface TrainingOrchestratorDeps {
  runs: RunRepository;
  events: RunEventRepository;
  datasets: DatasetCatalog;
  quota: QuotaService;
  models: BaseModelRegistry;
  backend: ExecutionBackend;
  evaluator: RunEvaluator;
  activeReports: ActiveReportLookup;
  stager: RunStager;
  packager: DeploymentPackager;
  audit: AuditRecorder;
  capacity: CapacityConfig;
  retry?: RetryPolicy;
  executionTimeoutMs: number;
  workerId?: string;
  clock?: Clock;
  logger?: Logger;
}

export interface SubmitOptions {
  resubmittedFrom?: string;
}

// ═══════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════

export class TrainingOrchestrator {
  private readonly runs: RunRepository;
  private readonly events: RunEventRepository;
  private readonly retry: RetryPolicy;
  private readonly clock: Clock;
  private readonly logger: Logger;
  readonly workerId: string;

  constructor(private readonly deps: TrainingOrchestratorDeps) {
    this.runs = deps.runs;
    this.events = deps.events;
    this.retry = deps.retry ?? DEFAULT_RETRY_POLICY;
    this.clock = deps.clock ?? defaultClock;
    this.logger = deps.logger ?? defaultLogger;
    this.workerId = deps.workerId ?? `worker_${uuidv4().slice(0, 8)}`;
  }

  // ─────────────────────────────────────────────────────────────
  // SUBMISSION
  // ─────────────────────────────────────────────────────────────

  async submit(request: SubmitRunRequest, options: SubmitOptions = {}): Promise<TrainingRun> {
    if (!request.dataRightsConfirmed) {
      throw new ValidationError('Data rights must be confirmed before training');
    }
    assertSafeId('tenantId', request.tenantId);
    assertSafeId('projectId', request.projectId);

    if (!this.deps.models.isApproved(request.baseModelId)) {
      throw new ValidationError(`Base model is not approved: ${request.baseModelId}`);
    }

    const resolved = resolveTrainingConfig(request.config);
    if (!resolved.ok) {
      throw new ValidationError('Invalid training config', { issues: resolved.issues });
    }

    const dataset = await this.deps.datasets.getVersion(request.datasetVersionId);
    if (!dataset || dataset.tenantId !== request.tenantId || dataset.projectId !== request.projectId) {
      throw new ValidationError(`Dataset version not found in project: ${request.datasetVersionId}`);
    }
    if (!isUsableDataset(dataset)) {
      throw new ValidationError(`Dataset version ${dataset.id} is ${dataset.status}, expected ready or needs_review`);
    }

    const allowed = await this.deps.quota.checkAndReserve(request.tenantId, 'training_runs', 1);
    if (!allowed) {
      throw new QuotaExceededError(`Monthly training run quota exhausted for tenant ${request.tenantId}`);
    }

    const now = this.clock.utcNow();
    const run: TrainingRun = {
      runId: `run_${uuidv4()}`,
      tenantId: request.tenantId,
      projectId: request.projectId,
      datasetVersionId: request.datasetVersionId,
      baseModelId: request.baseModelId,
      requestedBy: request.requestedBy,
      config: resolved.config,
      state: 'QUEUED',
      progress: 0,
      vramEstimateGb: null,
      errorCode: null,
      errorMessage: null,
      evalReportId: null,
      goNoGo: null,
      checkpointPath: null,
      packagePath: null,
      retryCount: 0,
      eventSeq: 1,
      claimedBy: null,
      resubmittedFrom: options.resubmittedFrom ?? null,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: null,
    };

    try {
      await this.runs.insert(run);
    } catch (err) {
      await this.deps.quota.release(request.tenantId, 'training_runs', 1);
      throw err;
    }
    await this.recordEvent(run, null, options.resubmittedFrom ? `Resubmitted from ${options.resubmittedFrom}` : 'Run submitted');
    await this.audit(
      run,
      options.resubmittedFrom ? 'training_run_resubmitted' : 'training_run_created',
      request.requestedBy,
      { baseModelId: run.baseModelId, datasetVersionId: run.datasetVersionId, resubmittedFrom: run.resubmittedFrom }
    );

    this.logger.info({ runId: run.runId, tenantId: run.tenantId, projectId: run.projectId }, '[Training] Run queued');
    return run;
  }

  /** New run with the inputs of a FAILED or CANCELLED one. */
  async resubmit(runId: string, requestedBy: string): Promise<TrainingRun> {
    const previous = await this.requireRun(runId);
    if (previous.state !== 'FAILED' && previous.state !== 'CANCELLED') {
      throw new InvalidStateTransitionError(previous.state, 'QUEUED');
    }
    return this.submit(
      {
        tenantId: previous.tenantId,
        projectId: previous.projectId,
        datasetVersionId: previous.datasetVersionId,
        baseModelId: previous.baseModelId,
        requestedBy,
        config: previous.config,
        dataRightsConfirmed: true,
      },
      { resubmittedFrom: previous.runId }
    );
  }

  estimate(config: Partial<TrainingConfig>, baseModelId: string): VramEstimate {
    const model = this.deps.models.get(baseModelId);
    if (!model) throw new ValidationError(`Unknown base model: ${baseModelId}`);

    const resolved = resolveTrainingConfig(config);
    if (!resolved.ok) {
      throw new ValidationError('Invalid training config', { issues: resolved.issues });
    }
    return estimateVram(resolved.config, model.id, model.paramsBillions, this.deps.capacity);
  }

  // ─────────────────────────────────────────────────────────────
  // CLAIM + ADVANCE
  // ─────────────────────────────────────────────────────────────

  async claimNext(options: { tenantId?: string } = {}): Promise<TrainingRun | null> {
    const run = await this.runs.claimOldestQueued({
      workerId: this.workerId,
      now: this.clock.utcNow(),
      tenantId: options.tenantId,
    });
    if (!run) return null;

    await this.recordEvent(run, 'QUEUED', `Claimed by ${this.workerId}`);
    this.logger.info({ runId: run.runId, workerId: this.workerId }, '[Training] Run claimed');
    return run;
  }

  /**
   * Drives a claimed (PREFLIGHT) run to a terminal state. Returns the run
   * as stored afterwards.
   */
  async advance(runId: string): Promise<TrainingRun> {
    const claimed = await this.requireRun(runId);
    if (claimed.state !== 'PREFLIGHT') {
      throw new InvalidStateTransitionError(claimed.state, 'STAGING');
    }

    try {
      await this.runPipeline(claimed);
    } catch (err) {
      if (err instanceof RunInterrupted) {
        this.logger.info({ runId, expected: err.expected }, '[Training] Run left pipeline concurrently');
      } else if (err instanceof RunFailure) {
        await this.fail(runId, err.code, err.message);
      } else {
        this.logger.error({ runId, error: errorMessage(err) }, '[Training] Unexpected error');
        await this.fail(runId, 'INTERNAL_ERROR', `Internal error: ${errorMessage(err)}`);
      }
    }

    return this.requireRun(runId);
  }

  /** claimNext + advance. Null when the queue is empty. */
  async processNext(options: { tenantId?: string } = {}): Promise<TrainingRun | null> {
    const claimed = await this.claimNext(options);
    if (!claimed) return null;
    return this.advance(claimed.runId);
  }

  private async runPipeline(claimed: TrainingRun): Promise<void> {
    // PREFLIGHT
    const model = this.deps.models.get(claimed.baseModelId);
    if (!model) {
      throw new RunFailure('RESOURCE_EXCEEDED', `Base model ${claimed.baseModelId} has no size entry`);
    }
    const estimate = estimateVram(claimed.config, model.id, model.paramsBillions, this.deps.capacity);
    let run = await this.patch(claimed, { vramEstimateGb: estimate.estimatedGb });
    if (!estimate.willFit) {
      throw new RunFailure(
        'RESOURCE_EXCEEDED',
        `Estimated ${estimate.estimatedGb} GB exceeds safe limit ${estimate.safeLimitGb} GB. ${estimate.recommendation}`
      );
    }
    run = await this.move(run, 'STAGING', `VRAM estimate ${estimate.estimatedGb} GB within ${estimate.safeLimitGb} GB`);

    // STAGING
    let runDir: string;
    try {
      runDir = (await this.deps.stager.stage(run)).runDir;
    } catch (err) {
      throw new RunFailure('STAGING_ERROR', errorMessage(err));
    }
    run = await this.move(run, 'TRAINING', 'Dataset staged', { progress: 0 });

    // TRAINING
    const result = await this.execute(run, runDir);
    if (result.cancelled) throw new RunInterrupted(run.runId, 'TRAINING');
    if (!result.success || !result.checkpointPath) {
      throw new RunFailure('BACKEND_ERROR', result.error ?? 'Execution backend reported failure');
    }
    const checkpointPath = result.checkpointPath;
    run = await this.move(
      run,
      'EVALUATING',
      `Training finished after ${result.metrics.steps} steps`,
      { checkpointPath, progress: 1 },
      { loss: result.metrics.loss, steps: result.metrics.steps }
    );

    // EVALUATING
    let report: EvaluationReport;
    try {
      const heldOut = await this.deps.datasets.getHeldOutExamples(run.datasetVersionId);
      const prior = await this.deps.activeReports.findActiveReport(run.tenantId, run.projectId);
      report = await this.deps.evaluator.evaluate({
        runId: run.runId,
        tenantId: run.tenantId,
        projectId: run.projectId,
        checkpointPath,
        heldOutExamples: heldOut,
        priorActiveReport: prior,
      });
    } catch (err) {
      throw new RunFailure('EVALUATION_ERROR', errorMessage(err));
    }
    run = await this.move(
      run,
      'PACKAGING',
      report.goNoGo ? 'Evaluation GO' : `Evaluation NO-GO: ${report.blockers.join('; ')}`,
      { evalReportId: report.reportId, goNoGo: report.goNoGo },
      { reportId: report.reportId }
    );

    // PACKAGING
    let packagePath: string;
    try {
      packagePath = await this.deps.packager.build({ run, runDir, checkpointPath, report });
    } catch (err) {
      throw new RunFailure('PACKAGING_ERROR', errorMessage(err));
    }
    run = await this.move(run, 'READY', 'Package built', { packagePath, finishedAt: this.clock.utcNow() });

    await this.audit(run, 'training_run_ready', SYSTEM_ACTOR, { reportId: report.reportId, goNoGo: report.goNoGo });
  }

  /** Backend call with timeout and bounded retries of retryable failures. */
  private async execute(run: TrainingRun, runDir: string): Promise<ExecutionResult> {
    for (let attempt = 1; ; attempt++) {
      let result: ExecutionResult;
      try {
        result = await executeWithTimeout(
          (signal) =>
            this.deps.backend.run(
              {
                runId: run.runId,
                tenantId: run.tenantId,
                projectId: run.projectId,
                datasetVersionId: run.datasetVersionId,
                baseModelId: run.baseModelId,
                config: run.config,
                runDir,
                attempt,
              },
              {
                signal,
                reportProgress: (progress) =>
                  this.runs.raiseProgress(run.runId, Math.min(Math.max(progress, 0), 1), this.clock.utcNow()),
              }
            ),
          this.deps.executionTimeoutMs
        );
      } catch (err) {
        if (err instanceof ExecutionTimeoutError) {
          throw new RunFailure('TIMEOUT', `Execution exceeded ${err.timeoutMs}ms`);
        }
        throw err;
      }

      if (result.success || result.cancelled || !result.retryable || attempt > this.retry.maxRetries) {
        return result;
      }

      const delay = backoffDelay(this.retry, attempt);
      this.logger.warn(
        { runId: run.runId, attempt, delayMs: delay, error: result.error },
        '[Training] Retryable backend failure'
      );
      const stillTraining = await this.runs.patch(run.runId, 'TRAINING', { retryCount: attempt }, this.clock.utcNow());
      if (!stillTraining) return cancelled(result.metrics);
      await sleep(delay);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // CANCEL
  // ─────────────────────────────────────────────────────────────

  async cancel(runId: string, actorId: string = SYSTEM_ACTOR): Promise<TrainingRun> {
    for (let attempt = 0; attempt < CANCEL_ATTEMPTS; attempt++) {
      const run = await this.requireRun(runId);
      if (!isCancellable(run.state)) {
        throw new InvalidStateTransitionError(run.state, 'CANCELLED');
      }

      const now = this.clock.utcNow();
      const next = await this.runs.transition(runId, run.state, 'CANCELLED', { now, patch: { finishedAt: now } });
      if (!next) continue; // advanced meanwhile, re-read

      await this.recordEvent(next, run.state, `Cancelled by ${actorId}`);
      await this.audit(next, 'training_run_cancelled', actorId, { fromState: run.state });
      this.logger.info({ runId, fromState: run.state }, '[Training] Run cancelled');
      return next;
    }
    const latest = await this.requireRun(runId);
    throw new InvalidStateTransitionError(latest.state, 'CANCELLED');
  }

  // ─────────────────────────────────────────────────────────────
  // READS
  // ─────────────────────────────────────────────────────────────

  getRun(runId: string): Promise<TrainingRun | null> {
    return this.runs.findById(runId);
  }

  listRuns(tenantId: string, projectId: string, limit?: number): Promise<TrainingRun[]> {
    return this.runs.listByProject(tenantId, projectId, limit);
  }

  listEvents(runId: string): Promise<RunEvent[]> {
    return this.events.listByRun(runId);
  }

  /** consistent = contiguous seqs and a legal path through the graph. */
  async getTimeline(runId: string): Promise<RunTimeline> {
    const run = await this.requireRun(runId);
    const events = await this.events.listByRun(runId);
    const contiguous = events.every((e, i) => e.seq === i + 1);
    return {
      run,
      events,
      consistent: contiguous && isValidPath(events.map((e) => e.toState)),
    };
  }

  // ─────────────────────────────────────────────────────────────
  // HELPERS
  // ─────────────────────────────────────────────────────────────

  private async requireRun(runId: string): Promise<TrainingRun> {
    const run = await this.runs.findById(runId);
    if (!run) throw new NotFoundError('TrainingRun', runId);
    return run;
  }

  private async move(
    run: TrainingRun,
    to: RunState,
    detail: string,
    patch?: RunPatch,
    meta?: Record<string, unknown>
  ): Promise<TrainingRun> {
    const from = run.state;
    assertTransition(from, to);

    const next = await this.runs.transition(run.runId, from, to, { now: this.clock.utcNow(), patch });
    if (!next) throw new RunInterrupted(run.runId, from);

    await this.recordEvent(next, from, detail, meta);
    this.logger.info({ runId: run.runId, from, to }, '[Training] Transition');
    return next;
  }

  private async patch(run: TrainingRun, patch: RunPatch): Promise<TrainingRun> {
    const next = await this.runs.patch(run.runId, run.state, patch, this.clock.utcNow());
    if (!next) throw new RunInterrupted(run.runId, run.state);
    return next;
  }

  /** Terminal FAILED unless the run already ended (e.g. cancelled). */
  private async fail(runId: string, code: RunFailureCode, message: string): Promise<void> {
    const current = await this.runs.findById(runId);
    if (!current || isTerminal(current.state)) return;

    const now = this.clock.utcNow();
    const failedRun = await this.runs.transition(runId, current.state, 'FAILED', {
      now,
      patch: { errorCode: code, errorMessage: message, finishedAt: now },
    });
    if (!failedRun) {
      this.logger.warn({ runId, code }, '[Training] Run ended before failure was recorded');
      return;
    }

    await this.recordEvent(failedRun, current.state, `${code}: ${message}`, { errorCode: code });
    await this.audit(failedRun, 'training_run_failed', SYSTEM_ACTOR, { errorCode: code, fromState: current.state });
    this.logger.warn({ runId, fromState: current.state, code, message }, '[Training] Run failed');
  }

  /** Uses the seq the state write allocated. */
  private async recordEvent(
    run: TrainingRun,
    fromState: RunState | null,
    detail: string,
    meta?: Record<string, unknown>
  ): Promise<void> {
    await this.events.append({
      runId: run.runId,
      seq: run.eventSeq,
      fromState,
      toState: run.state,
      timestamp: run.updatedAt,
      detail,
      ...(meta ? { meta } : {}),
    });
  }

  private async audit(
    run: TrainingRun,
    action: AuditAction,
    actorId: string,
    details: Record<string, unknown>
  ): Promise<void> {
    try {
      await this.deps.audit.record({
        tenantId: run.tenantId,
        projectId: run.projectId,
        actorId,
        action,
        entityType: 'training_run',
        entityId: run.runId,
        details,
      });
    } catch (err) {
      this.logger.error({ runId: run.runId, action, error: errorMessage(err) }, '[Training] Audit write failed');
    }
  }
}
