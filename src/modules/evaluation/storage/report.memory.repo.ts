import type { EvaluationReport } from '../contracts/evaluation.types.js';
import type { EvaluationReportRepository } from './report.repo.js';

export class InMemoryEvaluationReportRepository implements EvaluationReportRepository {
  private readonly reports = new Map<string, EvaluationReport>();
  private readonly byRun = new Map<string, string>();

  async insert(report: EvaluationReport): Promise<boolean> {
    if (this.byRun.has(report.trainingRunId) || this.reports.has(report.reportId)) return false;
    this.reports.set(report.reportId, structuredClone(report));
    this.byRun.set(report.trainingRunId, report.reportId);
    return true;
  }

  async findById(reportId: string): Promise<EvaluationReport | null> {
    const report = this.reports.get(reportId);
    return report ? structuredClone(report) : null;
  }

  async findByRunId(trainingRunId: string): Promise<EvaluationReport | null> {
    const reportId = this.byRun.get(trainingRunId);
    return reportId ? this.findById(reportId) : null;
  }

  async listByProject(tenantId: string, projectId: string, limit = 50): Promise<EvaluationReport[]> {
    return Array.from(this.reports.values())
      .filter((r) => r.tenantId === tenantId && r.projectId === projectId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((r) => structuredClone(r));
  }
}
