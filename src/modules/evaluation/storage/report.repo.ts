/**
 * Evaluation report store. Insert-only: at most one report per run.
 */

import type { EvaluationReport } from '../contracts/evaluation.types.js';

export interface EvaluationReportRepository {
  /** Returns false when the run already has a report. */
  insert(report: EvaluationReport): Promise<boolean>;
  findById(reportId: string): Promise<EvaluationReport | null>;
  findByRunId(trainingRunId: string): Promise<EvaluationReport | null>;
  listByProject(tenantId: string, projectId: string, limit?: number): Promise<EvaluationReport[]>;
}
