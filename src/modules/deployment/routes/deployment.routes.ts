/**
 * DEPLOYMENT ROUTES
 *
 * /api/pipeline/projects/:projectId/{deployments,infer}
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { actorFrom, requireReader, requireWriter } from '../../../core/auth/actor.context.js';
import type { DeploymentRouter } from '../services/deployment.router.js';

const ProjectParams = z.object({ projectId: z.string().min(1) });

const ActivateBody = z.object({
  trainingRunId: z.string().min(1),
  versionLabel: z.string().min(1).max(64),
  endpointRef: z.string().min(1).optional(),
});

const InferBody = z.object({
  prompt: z.string().min(1).max(8000),
  sources: z
    .array(z.object({ id: z.string().min(1), text: z.string() }))
    .max(200)
    .default([]),
});

export async function registerDeploymentRoutes(
  app: FastifyInstance,
  deps: { router: DeploymentRouter }
): Promise<void> {
  const { router } = deps;

  app.post('/projects/:projectId/deployments', { preHandler: requireWriter }, async (req, reply) => {
    const actor = actorFrom(req);
    const { projectId } = ProjectParams.parse(req.params);
    const body = ActivateBody.parse(req.body);
    const deployment = await router.activate({
      tenantId: actor.tenantId,
      projectId,
      actorId: actor.userId,
      ...body,
    });
    return reply.code(201).send({ ok: true, data: deployment });
  });

  app.get('/projects/:projectId/deployments', { preHandler: requireReader }, async (req) => {
    const actor = actorFrom(req);
    const { projectId } = ProjectParams.parse(req.params);
    return { ok: true, data: await router.listDeployments(actor.tenantId, projectId) };
  });

  app.get('/projects/:projectId/deployments/active', { preHandler: requireReader }, async (req) => {
    const actor = actorFrom(req);
    const { projectId } = ProjectParams.parse(req.params);
    return { ok: true, data: await router.resolveActive(actor.tenantId, projectId) };
  });

  app.post('/projects/:projectId/deployments/rollback', { preHandler: requireWriter }, async (req) => {
    const actor = actorFrom(req);
    const { projectId } = ProjectParams.parse(req.params);
    return { ok: true, data: await router.rollback(actor.tenantId, projectId, actor.userId) };
  });

  app.post('/projects/:projectId/infer', { preHandler: requireReader }, async (req) => {
    const actor = actorFrom(req);
    const { projectId } = ProjectParams.parse(req.params);
    const body = InferBody.parse(req.body);
    const result = await router.infer({ tenantId: actor.tenantId, projectId, ...body });
    return { ok: true, data: result };
  });
}
