/**
 * DEPLOYMENT ROUTER
 *
 * - activate: READY run → new deployment, then CAS the project pointer
 * - rollback: CAS the pointer back to the previous deployment
 * - resolveActive / infer: always scoped by tenant + project
 *
 * There is no global "current model": every read goes through the
 * project's own pointer, and status is derived from it.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AppError,
  DuplicateVersionError,
  NoActiveDeploymentError,
  NotFoundError,
  RunNotReadyError,
  ValidationError,
  errorMessage,
} from '../../../common/errors.js';
import type { Clock, Logger } from '../../../common/host.deps.js';
import { defaultClock, defaultLogger } from '../../../common/host.deps.js';
import type { AuditAction, AuditRecorder } from '../../audit/contracts/audit.types.js';
import type { TrainingRun } from '../../training/contracts/training.types.js';
import type {
  ActivateRequest,
  Deployment,
  DeploymentPointer,
  DeploymentRecord,
  DeploymentStatus,
  InferenceBackend,
  InferRequest,
  InferResponse,
} from '../contracts/deployment.types.js';
import { retrieveSnippets } from '../runtime/grounding.retriever.js';
import type { DeploymentRepository, PointerTarget } from '../storage/deployment.repo.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const GROUNDING_REFUSAL =
  'I do not have grounded evidence in the current knowledge set. Please provide more context or escalate.';

const MAX_SWAP_ATTEMPTS = 5;
const VERSION_LABEL = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

export class ActivationConflictError extends AppError {
  constructor(projectId: string) {
    super(409, 'ACTIVATION_CONFLICT', `Deployment pointer for ${projectId} kept changing, retry`);
  }
}

export class NoPreviousDeploymentError extends AppError {
  constructor(projectId: string) {
    super(409, 'NO_PREVIOUS_DEPLOYMENT', `No previous deployment to roll back to for project ${projectId}`);
  }
}

/** The run fields activation needs. */
export interface RunLookup {
  findById(runId: string): Promise<TrainingRun | null>;
}

export function deriveStatus(record: DeploymentRecord, pointer: DeploymentPointer | null): DeploymentStatus {
  if (pointer?.activeDeploymentId === record.deploymentId) return 'active';
  return record.activatedAt ? 'retired' : 'pending';
}

// ═══════════════════════════════════════════════════════════════
// ROUTER
// ═══════════════════════════════════════════════════════════════

export interface DeploymentRouterDeps {
  deployments: DeploymentRepository;
  runs: RunLookup;
  inference: InferenceBackend;
  audit: AuditRecorder;
  requireGrounding: boolean;
  groundingTopK: number;
  clock?: Clock;
  logger?: Logger;
}

export class DeploymentRouter {
  private readonly deployments: DeploymentRepository;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: DeploymentRouterDeps) {
    this.deployments = deps.deployments;
    this.clock = deps.clock ?? defaultClock;
    this.logger = deps.logger ?? defaultLogger;
  }

  // ─────────────────────────────────────────────────────────────
  // ACTIVATION
  // ─────────────────────────────────────────────────────────────

  /**
   * READY is the only precondition; a NO-GO report does not block
   * activation. The new deployment becomes active and the previous one
   * retires in the same pointer write.
   */
  async activate(request: ActivateRequest): Promise<Deployment> {
    const { tenantId, projectId, versionLabel } = request;
    if (!VERSION_LABEL.test(versionLabel)) {
      throw new ValidationError(`Invalid version label: ${versionLabel}`);
    }

    const run = await this.deps.runs.findById(request.trainingRunId);
    if (!run || run.tenantId !== tenantId || run.projectId !== projectId) {
      throw new NotFoundError('TrainingRun', request.trainingRunId);
    }
    if (run.state !== 'READY' || !run.packagePath || !run.evalReportId || run.goNoGo === null) {
      throw new RunNotReadyError(run.runId, run.state);
    }
    if (await this.deployments.findByVersion(tenantId, projectId, versionLabel)) {
      throw new DuplicateVersionError(projectId, versionLabel);
    }

    const now = this.clock.utcNow();
    const record: DeploymentRecord = {
      deploymentId: `dep_${uuidv4()}`,
      tenantId,
      projectId,
      trainingRunId: run.runId,
      versionLabel,
      artifactPath: run.packagePath,
      endpointRef: request.endpointRef ?? `/api/pipeline/projects/${projectId}/infer`,
      evalReportId: run.evalReportId,
      goNoGo: run.goNoGo,
      activatedBy: request.actorId,
      createdAt: now,
      activatedAt: null,
    };
    await this.deployments.insert(record);

    let pointer: DeploymentPointer;
    try {
      pointer = await this.swap(tenantId, projectId, (current) => ({
        activeDeploymentId: record.deploymentId,
        previousDeploymentId: current?.activeDeploymentId ?? null,
      }));
    } catch (err) {
      // frees the version label for a retry
      await this.deployments.discardPending(record.deploymentId);
      throw err;
    }
    await this.deployments.markActivated(record.deploymentId, now);

    await this.audit(record, 'deployment_activated', request.actorId, {
      trainingRunId: run.runId,
      versionLabel,
      goNoGo: run.goNoGo,
      retired: pointer.previousDeploymentId,
    });
    this.logger.info(
      { deploymentId: record.deploymentId, projectId, versionLabel, retired: pointer.previousDeploymentId },
      '[Deployment] Activated'
    );

    return { ...record, activatedAt: now, status: 'active' };
  }

  async rollback(tenantId: string, projectId: string, actorId: string): Promise<Deployment> {
    const pointer = await this.swap(tenantId, projectId, (current) => {
      if (!current?.activeDeploymentId) throw new NoActiveDeploymentError(projectId);
      if (!current.previousDeploymentId) throw new NoPreviousDeploymentError(projectId);
      return {
        activeDeploymentId: current.previousDeploymentId,
        previousDeploymentId: current.activeDeploymentId,
      };
    });

    const restored = pointer.activeDeploymentId
      ? await this.deployments.findById(pointer.activeDeploymentId)
      : null;
    if (!restored) throw new NoActiveDeploymentError(projectId);

    await this.audit(restored, 'deployment_rolled_back', actorId, {
      versionLabel: restored.versionLabel,
      retired: pointer.previousDeploymentId,
    });
    this.logger.info(
      { deploymentId: restored.deploymentId, projectId, retired: pointer.previousDeploymentId },
      '[Deployment] Rolled back'
    );
    return { ...restored, status: 'active' };
  }

  // ─────────────────────────────────────────────────────────────
  // READS
  // ─────────────────────────────────────────────────────────────

  async findActive(tenantId: string, projectId: string): Promise<Deployment | null> {
    const pointer = await this.deployments.getPointer(tenantId, projectId);
    if (!pointer?.activeDeploymentId) return null;
    const record = await this.deployments.findById(pointer.activeDeploymentId);
    return record ? { ...record, status: 'active' } : null;
  }

  async resolveActive(tenantId: string, projectId: string): Promise<Deployment> {
    const active = await this.findActive(tenantId, projectId);
    if (!active) throw new NoActiveDeploymentError(projectId);
    return active;
  }

  async listDeployments(tenantId: string, projectId: string): Promise<Deployment[]> {
    const [records, pointer] = await Promise.all([
      this.deployments.listByProject(tenantId, projectId),
      this.deployments.getPointer(tenantId, projectId),
    ]);
    return records.map((r) => ({ ...r, status: deriveStatus(r, pointer) }));
  }

  // ─────────────────────────────────────────────────────────────
  // INFERENCE
  // ─────────────────────────────────────────────────────────────

  async infer(request: InferRequest): Promise<InferResponse> {
    const deployment = await this.resolveActive(request.tenantId, request.projectId);
    const citations = retrieveSnippets(request.prompt, request.sources, this.deps.groundingTopK);

    if (this.deps.requireGrounding && citations.length === 0) {
      return {
        answer: GROUNDING_REFUSAL,
        refused: true,
        deploymentId: deployment.deploymentId,
        versionLabel: deployment.versionLabel,
        citations: [],
        model: 'none',
      };
    }

    const generated = await this.deps.inference.generate({
      prompt: request.prompt,
      snippets: citations,
      artifactPath: deployment.artifactPath,
      versionLabel: deployment.versionLabel,
    });

    return {
      answer: generated.text,
      refused: false,
      deploymentId: deployment.deploymentId,
      versionLabel: deployment.versionLabel,
      citations,
      model: generated.model,
    };
  }

  // ─────────────────────────────────────────────────────────────
  // HELPERS
  // ─────────────────────────────────────────────────────────────

  /** Read-compute-CAS, re-reading on a lost race. */
  private async swap(
    tenantId: string,
    projectId: string,
    compute: (current: DeploymentPointer | null) => PointerTarget
  ): Promise<DeploymentPointer> {
    for (let attempt = 1; attempt <= MAX_SWAP_ATTEMPTS; attempt++) {
      const current = await this.deployments.getPointer(tenantId, projectId);
      const swapped = await this.deployments.swapPointer(
        tenantId,
        projectId,
        current?.revision ?? 0,
        compute(current),
        this.clock.utcNow()
      );
      if (swapped) return swapped;
      this.logger.warn({ projectId, attempt }, '[Deployment] Pointer changed concurrently, retrying');
    }
    throw new ActivationConflictError(projectId);
  }

  private async audit(
    record: DeploymentRecord,
    action: AuditAction,
    actorId: string,
    details: Record<string, unknown>
  ): Promise<void> {
    try {
      await this.deps.audit.record({
        tenantId: record.tenantId,
        projectId: record.projectId,
        actorId,
        action,
        entityType: 'deployment',
        entityId: record.deploymentId,
        details,
      });
    } catch (err) {
      this.logger.error(
        { deploymentId: record.deploymentId, action, error: errorMessage(err) },
        '[Deployment] Audit write failed'
      );
    }
  }
}
