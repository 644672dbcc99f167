import { isDuplicateKeyError } from '../../../db/mongoose.js';
import type { EvaluationReport } from '../contracts/evaluation.types.js';
import { EvaluationReportModel } from './report.model.js';
import type { EvaluationReportRepository } from './report.repo.js';

function toReport(doc: EvaluationReport): EvaluationReport {
  return {
    reportId: doc.reportId,
    trainingRunId: doc.trainingRunId,
    tenantId: doc.tenantId,
    projectId: doc.projectId,
    checkpointPath: doc.checkpointPath,
    metrics: doc.metrics,
    goNoGo: doc.goNoGo,
    blockers: doc.blockers ?? [],
    failures: doc.failures ?? [],
    thresholds: doc.thresholds,
    priorReportId: doc.priorReportId ?? null,
    createdAt: doc.createdAt,
  };
}

export class MongoEvaluationReportRepository implements EvaluationReportRepository {
  async insert(report: EvaluationReport): Promise<boolean> {
    try {
      await EvaluationReportModel.create(report);
      return true;
    } catch (err) {
      if (isDuplicateKeyError(err)) return false;
      throw err;
    }
  }

  async findById(reportId: string): Promise<EvaluationReport | null> {
    const doc = await EvaluationReportModel.findOne({ reportId }).lean<EvaluationReport>();
    return doc ? toReport(doc) : null;
  }

  async findByRunId(trainingRunId: string): Promise<EvaluationReport | null> {
    const doc = await EvaluationReportModel.findOne({ trainingRunId }).lean<EvaluationReport>();
    return doc ? toReport(doc) : null;
  }

  async listByProject(tenantId: string, projectId: string, limit = 50): Promise<EvaluationReport[]> {
    const docs = await EvaluationReportModel.find({ tenantId, projectId })
      .sort({ createdAt: -1 })
      .limit(limit)
      .lean<EvaluationReport[]>();
    return docs.map(toReport);
  }
}
