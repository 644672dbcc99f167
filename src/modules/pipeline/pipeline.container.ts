/**
 * PIPELINE CONTAINER
 *
 * Composition root. Picks storage (mongo | memory), the execution and
 * inference backends and the evaluation predictor from env, and wires
 * the three core services together. Tests pass overrides.
 */

import type { Env } from '../../config/env.js';
import type { Clock, Logger } from '../../common/host.deps.js';
import { defaultClock, defaultLogger } from '../../common/host.deps.js';
import { AuditService } from '../audit/services/audit.service.js';
import { InMemoryAuditRepository, MongoAuditRepository } from '../audit/storage/audit.repo.js';
import { createInferenceBackend } from '../deployment/backends/index.js';
import type { InferenceBackend } from '../deployment/contracts/deployment.types.js';
import { DeploymentRouter } from '../deployment/services/deployment.router.js';
import { InMemoryDeploymentRepository } from '../deployment/storage/deployment.memory.repo.js';
import { MongoDeploymentRepository } from '../deployment/storage/deployment.mongo.repo.js';
import type { CheckpointPredictor } from '../evaluation/contracts/evaluation.types.js';
import {
  InferenceCheckpointPredictor,
  SimulatedCheckpointPredictor,
} from '../evaluation/services/checkpoint.predictor.js';
import { EvaluationEngine } from '../evaluation/services/evaluation.engine.js';
import { InMemoryEvaluationReportRepository } from '../evaluation/storage/report.memory.repo.js';
import { MongoEvaluationReportRepository } from '../evaluation/storage/report.mongo.repo.js';
import { createExecutionBackend, type ExecutionBackend } from '../training/backends/index.js';
import { BaseModelRegistry } from '../training/config/base_models.registry.js';
import type { DatasetCatalog, QuotaService } from '../training/contracts/collaborators.js';
import { TrainingWorker } from '../training/jobs/training.worker.js';
import { DeploymentPackager } from '../training/services/deployment.packager.js';
import { PlanQuotaService } from '../training/services/plan.quota.service.js';
import { RunStager } from '../training/services/run.stager.js';
import { TrainingOrchestrator } from '../training/services/training.orchestrator.js';
import { InMemoryDatasetCatalog, MongoDatasetCatalog } from '../training/storage/dataset.catalog.js';
import { InMemoryQuotaLedger, MongoQuotaLedger } from '../training/storage/quota.ledger.js';
import { InMemoryRunEventRepository, InMemoryRunRepository } from '../training/storage/run.memory.repo.js';
import { MongoRunEventRepository, MongoRunRepository } from '../training/storage/run.mongo.repo.js';
import { ActiveDeploymentReportLookup } from './active.report.lookup.js';

export interface PipelineContainer {
  env: Env;
  models: BaseModelRegistry;
  datasets: DatasetCatalog;
  orchestrator: TrainingOrchestrator;
  worker: TrainingWorker;
  evaluation: EvaluationEngine;
  router: DeploymentRouter;
  audit: AuditService;
}

export interface ContainerOverrides {
  datasets?: DatasetCatalog;
  quota?: QuotaService;
  backend?: ExecutionBackend;
  inference?: InferenceBackend;
  predictor?: CheckpointPredictor;
  models?: BaseModelRegistry;
  clock?: Clock;
  logger?: Logger;
}

function executionBackendFrom(env: Env): ExecutionBackend {
  if (env.TRAINER_BACKEND === 'command' && env.TRAINER_COMMAND_TEMPLATE) {
    return createExecutionBackend({ kind: 'command', template: env.TRAINER_COMMAND_TEMPLATE });
  }
  return createExecutionBackend({ kind: 'simulator', simulator: { steps: env.SIMULATOR_STEPS } });
}

function inferenceBackendFrom(env: Env): InferenceBackend {
  if (env.INFERENCE_BACKEND === 'ollama') {
    return createInferenceBackend({
      kind: 'ollama',
      baseUrl: env.OLLAMA_BASE_URL,
      model: env.OLLAMA_CHAT_MODEL,
      timeoutMs: env.INFERENCE_TIMEOUT_MS,
    });
  }
  return createInferenceBackend({ kind: 'mock' });
}

export function createPipelineContainer(env: Env, overrides: ContainerOverrides = {}): PipelineContainer {
  const clock = overrides.clock ?? defaultClock;
  const logger = overrides.logger ?? defaultLogger;
  const mongo = env.STORAGE_DRIVER === 'mongo';

  // ═══════════════════════════════════════════════════════════════
  // STORAGE
  // ═══════════════════════════════════════════════════════════════

  const runs = mongo ? new MongoRunRepository() : new InMemoryRunRepository();
  const events = mongo ? new MongoRunEventRepository() : new InMemoryRunEventRepository();
  const reports = mongo ? new MongoEvaluationReportRepository() : new InMemoryEvaluationReportRepository();
  const deployments = mongo ? new MongoDeploymentRepository() : new InMemoryDeploymentRepository();
  const quotaLedger = mongo ? new MongoQuotaLedger() : new InMemoryQuotaLedger();
  const auditRepo = mongo ? new MongoAuditRepository() : new InMemoryAuditRepository();
  const datasets = overrides.datasets ?? (mongo ? new MongoDatasetCatalog() : new InMemoryDatasetCatalog());

  // ═══════════════════════════════════════════════════════════════
  // SERVICES
  // ═══════════════════════════════════════════════════════════════

  const models = overrides.models ?? new BaseModelRegistry();
  const audit = new AuditService(auditRepo, clock, logger);
  const inference = overrides.inference ?? inferenceBackendFrom(env);

  const predictor =
    overrides.predictor ??
    (env.EVAL_PREDICTOR === 'inference'
      ? new InferenceCheckpointPredictor(inference)
      : new SimulatedCheckpointPredictor());

  const evaluation = new EvaluationEngine({
    reports,
    predictor,
    thresholds: {
      minSemanticSimilarity: env.EVAL_MIN_SEMANTIC,
      maxUnsupportedClaimRate: env.EVAL_MAX_UNSUPPORTED,
      minRefusalAccuracy: env.EVAL_MIN_REFUSAL,
      regressionTolerance: env.EVAL_REGRESSION_TOLERANCE,
      fuzzyMatchThreshold: env.EVAL_FUZZY_THRESHOLD,
      maxFailures: env.EVAL_MAX_FAILURES,
    },
    clock,
    logger,
  });

  const router = new DeploymentRouter({
    deployments,
    runs,
    inference,
    audit,
    requireGrounding: env.REQUIRE_GROUNDING,
    groundingTopK: env.GROUNDING_TOP_K,
    clock,
    logger,
  });

  const orchestrator = new TrainingOrchestrator({
    runs,
    events,
    datasets,
    quota: overrides.quota ?? new PlanQuotaService(runs, quotaLedger, {}, clock),
    models,
    backend: overrides.backend ?? executionBackendFrom(env),
    evaluator: evaluation,
    activeReports: new ActiveDeploymentReportLookup(router, evaluation),
    stager: new RunStager(env.ARTIFACTS_PATH, datasets, models),
    packager: new DeploymentPackager({ requireGrounding: env.REQUIRE_GROUNDING }),
    audit,
    capacity: { maxGpuVramGb: env.MAX_GPU_VRAM_GB, vramSafetyFactor: env.VRAM_SAFETY_FACTOR },
    retry: {
      maxRetries: env.TRAINER_MAX_RETRIES,
      baseDelayMs: env.TRAINER_RETRY_BASE_MS,
      maxDelayMs: Math.max(env.TRAINER_RETRY_BASE_MS * 16, 1),
    },
    executionTimeoutMs: env.TRAINER_TIMEOUT_MS,
    clock,
    logger,
  });

  const worker = new TrainingWorker(
    orchestrator,
    { intervalMs: env.WORKER_INTERVAL_MS, concurrency: env.WORKER_CONCURRENCY },
    clock,
    logger
  );

  return { env, models, datasets, orchestrator, worker, evaluation, router, audit };
}
