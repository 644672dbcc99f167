/**
 * TRAINING ROUTES
 *
 * /api/pipeline/runs/*, /preflight/*, /worker/*
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../../../common/errors.js';
import { actorFrom, requireReader, requireWriter, type Actor } from '../../../core/auth/actor.context.js';
import type { TrainingWorker } from '../jobs/training.worker.js';
import type { TrainingOrchestrator } from '../services/training.orchestrator.js';
import type { TrainingRun } from '../contracts/training.types.js';

// Shape only; ranges are checked by resolveTrainingConfig.
const ConfigBody = z
  .object({
    loraRank: z.number(),
    loraAlpha: z.number(),
    loraDropout: z.number(),
    sequenceLength: z.number(),
    perDeviceBatchSize: z.number(),
    gradientAccumulationSteps: z.number(),
    precision: z.enum(['fp32', 'fp16', 'bf16']),
    epochs: z.number(),
    maxSteps: z.number(),
    saveEverySteps: z.number(),
    use4bit: z.boolean(),
  })
  .partial()
  .strict();

const SubmitBody = z.object({
  projectId: z.string().min(1),
  datasetVersionId: z.string().min(1),
  baseModelId: z.string().min(1),
  config: ConfigBody.default({}),
  dataRightsConfirmed: z.boolean(),
});

const EstimateBody = z.object({
  baseModelId: z.string().min(1),
  config: ConfigBody.default({}),
});

const RunParams = z.object({ runId: z.string().min(1) });
const ProjectParams = z.object({ projectId: z.string().min(1) });
const ListQuery = z.object({ limit: z.coerce.number().int().min(1).max(500).optional() });

export interface TrainingRouteDeps {
  orchestrator: TrainingOrchestrator;
  worker: TrainingWorker;
}

export async function registerTrainingRoutes(app: FastifyInstance, deps: TrainingRouteDeps): Promise<void> {
  const { orchestrator, worker } = deps;

  async function scopedRun(actor: Actor, runId: string): Promise<TrainingRun> {
    const run = await orchestrator.getRun(runId);
    if (!run || run.tenantId !== actor.tenantId) throw new NotFoundError('TrainingRun', runId);
    return run;
  }

  // ═══════════════════════════════════════════════════════════════
  // RUNS
  // ═══════════════════════════════════════════════════════════════

  app.post('/runs', { preHandler: requireWriter }, async (req, reply) => {
    const actor = actorFrom(req);
    const body = SubmitBody.parse(req.body);
    const run = await orchestrator.submit({
      tenantId: actor.tenantId,
      requestedBy: actor.userId,
      ...body,
    });
    return reply.code(201).send({ ok: true, data: run });
  });

  app.get('/runs/:runId', { preHandler: requireReader }, async (req) => {
    const { runId } = RunParams.parse(req.params);
    const run = await scopedRun(actorFrom(req), runId);
    return { ok: true, data: run };
  });

  app.get('/runs/:runId/events', { preHandler: requireReader }, async (req) => {
    const { runId } = RunParams.parse(req.params);
    await scopedRun(actorFrom(req), runId);
    const timeline = await orchestrator.getTimeline(runId);
    return { ok: true, data: { events: timeline.events, consistent: timeline.consistent } };
  });

  app.post('/runs/:runId/cancel', { preHandler: requireWriter }, async (req) => {
    const actor = actorFrom(req);
    const { runId } = RunParams.parse(req.params);
    await scopedRun(actor, runId);
    const run = await orchestrator.cancel(runId, actor.userId);
    return { ok: true, data: run };
  });

  app.post('/runs/:runId/resubmit', { preHandler: requireWriter }, async (req, reply) => {
    const actor = actorFrom(req);
    const { runId } = RunParams.parse(req.params);
    await scopedRun(actor, runId);
    const run = await orchestrator.resubmit(runId, actor.userId);
    return reply.code(201).send({ ok: true, data: run });
  });

  app.get('/projects/:projectId/runs', { preHandler: requireReader }, async (req) => {
    const actor = actorFrom(req);
    const { projectId } = ProjectParams.parse(req.params);
    const { limit } = ListQuery.parse(req.query);
    const runs = await orchestrator.listRuns(actor.tenantId, projectId, limit);
    return { ok: true, data: runs };
  });

  // ═══════════════════════════════════════════════════════════════
  // PREFLIGHT
  // ═══════════════════════════════════════════════════════════════

  app.post('/preflight/estimate', { preHandler: requireReader }, async (req) => {
    const body = EstimateBody.parse(req.body);
    return { ok: true, data: orchestrator.estimate(body.config, body.baseModelId) };
  });

  // ═══════════════════════════════════════════════════════════════
  // WORKER
  // ═══════════════════════════════════════════════════════════════

  app.post('/worker/process-next', { preHandler: requireWriter }, async (req) => {
    const actor = actorFrom(req);
    const run = await orchestrator.processNext({ tenantId: actor.tenantId });
    return { ok: true, data: run };
  });

  app.get('/worker/stats', { preHandler: requireReader }, async () => {
    return { ok: true, data: worker.getStats() };
  });
}
