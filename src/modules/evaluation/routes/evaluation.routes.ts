import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../../../common/errors.js';
import { actorFrom, requireReader } from '../../../core/auth/actor.context.js';
import type { EvaluationEngine } from '../services/evaluation.engine.js';

const RunParams = z.object({ runId: z.string().min(1) });
const ProjectParams = z.object({ projectId: z.string().min(1) });
const ListQuery = z.object({ limit: z.coerce.number().int().min(1).max(200).optional() });

export async function registerEvaluationRoutes(
  app: FastifyInstance,
  deps: { evaluation: EvaluationEngine }
): Promise<void> {
  const { evaluation } = deps;

  app.get('/runs/:runId/evaluation', { preHandler: requireReader }, async (req) => {
    const actor = actorFrom(req);
    const { runId } = RunParams.parse(req.params);
    const report = await evaluation.getReportForRun(runId);
    if (!report || report.tenantId !== actor.tenantId) {
      throw new NotFoundError('EvaluationReport', runId);
    }
    return { ok: true, data: report };
  });

  app.get('/projects/:projectId/evaluations', { preHandler: requireReader }, async (req) => {
    const actor = actorFrom(req);
    const { projectId } = ProjectParams.parse(req.params);
    const { limit } = ListQuery.parse(req.query);
    return { ok: true, data: await evaluation.listReports(actor.tenantId, projectId, limit) };
  });
}
