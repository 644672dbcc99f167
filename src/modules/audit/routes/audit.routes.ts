import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { actorFrom, requireReader } from '../../../core/auth/actor.context.js';
import type { AuditService } from '../services/audit.service.js';

const ProjectParams = z.object({ projectId: z.string().min(1) });
const ListQuery = z.object({ limit: z.coerce.number().int().min(1).max(500).optional() });

export async function registerAuditRoutes(app: FastifyInstance, deps: { audit: AuditService }): Promise<void> {
  app.get('/projects/:projectId/audit', { preHandler: requireReader }, async (req) => {
    const actor = actorFrom(req);
    const { projectId } = ProjectParams.parse(req.params);
    const { limit } = ListQuery.parse(req.query);
    return { ok: true, data: await deps.audit.list(actor.tenantId, projectId, limit) };
  });
}
