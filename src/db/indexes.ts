/**
 * Database Indexes
 *
 * Models are declared with autoIndex off; this syncs the indexes the
 * pipeline relies on (unique claim/event/version keys) at startup.
 */

import type { Logger } from '../common/host.deps.js';
import { defaultLogger } from '../common/host.deps.js';
import { AuditEventModel } from '../modules/audit/storage/audit.repo.js';
import { DeploymentModel, DeploymentPointerModel } from '../modules/deployment/storage/deployment.model.js';
import { EvaluationReportModel } from '../modules/evaluation/storage/report.model.js';
import { datasetModels } from '../modules/training/storage/dataset.catalog.js';
import { QuotaCounterModel } from '../modules/training/storage/quota.ledger.js';
import { RunEventModel, TrainingRunModel } from '../modules/training/storage/run.model.js';

interface IndexedModel {
  createIndexes(): Promise<unknown>;
  collection: { collectionName: string };
}

const OWNED_MODELS: readonly IndexedModel[] = [
  TrainingRunModel,
  RunEventModel,
  EvaluationReportModel,
  DeploymentModel,
  DeploymentPointerModel,
  AuditEventModel,
  QuotaCounterModel,
];

export async function ensureIndexes(logger: Logger = defaultLogger): Promise<void> {
  for (const model of OWNED_MODELS) {
    await model.createIndexes();
    logger.info({ collection: model.collection.collectionName }, '[DB] Indexes ensured');
  }

  // Dataset collections belong to the upstream builder; only make sure our read paths are indexed.
  const upstream: readonly IndexedModel[] = datasetModels;
  for (const model of upstream) {
    await model.createIndexes();
  }
}
