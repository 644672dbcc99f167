import type { EvaluationReport } from '../evaluation/contracts/evaluation.types.js';
import type { EvaluationEngine } from '../evaluation/services/evaluation.engine.js';
import type { DeploymentRouter } from '../deployment/services/deployment.router.js';
import type { ActiveReportLookup } from '../training/contracts/collaborators.js';

/** Prior report = report of the run behind the project's active deployment. */
export class ActiveDeploymentReportLookup implements ActiveReportLookup {
  constructor(
    private readonly router: DeploymentRouter,
    private readonly evaluation: EvaluationEngine
  ) {}

  async findActiveReport(tenantId: string, projectId: string): Promise<EvaluationReport | null> {
    const active = await this.router.findActive(tenantId, projectId);
    if (!active) return null;
    return this.evaluation.getReport(active.evalReportId);
  }
}
