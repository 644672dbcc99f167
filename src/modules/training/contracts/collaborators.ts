/**
 * Ports to upstream collaborators.
 *
 * The dataset builder, the quota service and the deployment side are
 * reached only through these interfaces.
 */

import type {
  EvaluateRequest,
  EvaluationReport,
  HeldOutExample,
} from '../../evaluation/contracts/evaluation.types.js';

export type DatasetStatus = 'building' | 'ready' | 'needs_review' | 'failed';

export const USABLE_DATASET_STATUSES: readonly DatasetStatus[] = ['ready', 'needs_review'];

export interface DatasetStats {
  exampleCount: number;
  trainCount: number;
  validationCount: number;
  heldOutCount: number;
  [key: string]: number;
}

export interface DatasetVersion {
  id: string;
  tenantId: string;
  projectId: string;
  status: DatasetStatus;
  stats: DatasetStats;
}

export interface DatasetCatalog {
  getVersion(datasetVersionId: string): Promise<DatasetVersion | null>;
  getHeldOutExamples(datasetVersionId: string): Promise<HeldOutExample[]>;
}

export type QuotaResource = 'training_runs';

export interface QuotaService {
  /** Reserves `amount` atomically; false when the plan limit would be exceeded. */
  checkAndReserve(tenantId: string, resource: QuotaResource, amount: number): Promise<boolean>;
  release(tenantId: string, resource: QuotaResource, amount: number): Promise<void>;
}

/** Report of the version currently serving traffic for a project, if any. */
export interface ActiveReportLookup {
  findActiveReport(tenantId: string, projectId: string): Promise<EvaluationReport | null>;
}

/** Evaluation step as seen by the orchestrator. */
export interface RunEvaluator {
  evaluate(request: EvaluateRequest): Promise<EvaluationReport>;
}

export function isUsableDataset(dataset: DatasetVersion): boolean {
  return USABLE_DATASET_STATUSES.includes(dataset.status);
}
