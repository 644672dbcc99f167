/**
 * Pipeline module: registers every route group under /api/pipeline.
 */

import type { FastifyInstance } from 'fastify';
import { registerAuditRoutes } from '../audit/routes/audit.routes.js';
import { registerDeploymentRoutes } from '../deployment/routes/deployment.routes.js';
import { registerEvaluationRoutes } from '../evaluation/routes/evaluation.routes.js';
import { registerTrainingRoutes } from '../training/routes/training.routes.js';
import type { PipelineContainer } from './pipeline.container.js';

export const PIPELINE_PREFIX = '/api/pipeline';

export async function registerPipelineModule(app: FastifyInstance, container: PipelineContainer): Promise<void> {
  await app.register(
    async (scope) => {
      await registerTrainingRoutes(scope, { orchestrator: container.orchestrator, worker: container.worker });
      await registerEvaluationRoutes(scope, { evaluation: container.evaluation });
      await registerDeploymentRoutes(scope, { router: container.router });
      await registerAuditRoutes(scope, { audit: container.audit });
    },
    { prefix: PIPELINE_PREFIX }
  );
}

export { createPipelineContainer, type PipelineContainer, type ContainerOverrides } from './pipeline.container.js';
