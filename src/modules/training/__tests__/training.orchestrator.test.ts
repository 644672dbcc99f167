/**
 * Orchestrator lifecycle tests against memory storage and the simulator.
 */

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  InvalidStateTransitionError,
  NotFoundError,
  QuotaExceededError,
  ValidationError,
} from '../../../common/errors.js';
import type { CheckpointPredictor } from '../../evaluation/contracts/evaluation.types.js';
import {
  PROJECT,
  TENANT,
  createTestPipeline,
  datasetVersion,
  submitRequest,
  type TestPipeline,
} from '../../pipeline/__tests__/pipeline.fixtures.js';
import { cancelled, succeeded, type ExecutionBackend } from '../backends/execution.backend.js';
import { SimulatorExecutionBackend } from '../backends/simulator.backend.js';
import type { TrainingOrchestrator } from '../services/training.orchestrator.js';

describe('TrainingOrchestrator', () => {
  let pipeline: TestPipeline | null = null;

  const setup = (...args: Parameters<typeof createTestPipeline>): TestPipeline => {
    pipeline = createTestPipeline(...args);
    return pipeline;
  };

  afterEach(() => {
    pipeline?.cleanup();
    pipeline = null;
  });

  // ═══════════════════════════════════════════════════════════════
  // SUBMISSION
  // ═══════════════════════════════════════════════════════════════

  describe('submit', () => {
    it('queues a run with resolved config and a first event', async () => {
      const { container } = setup();
      const run = await container.orchestrator.submit(submitRequest());

      expect(run.state).toBe('QUEUED');
      expect(run.runId).toMatch(/^run_/);
      expect(run.config.maxSteps).toBe(4);
      expect(run.config.loraRank).toBe(16);
      expect(run.eventSeq).toBe(1);

      const events = await container.orchestrator.listEvents(run.runId);
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ seq: 1, fromState: null, toState: 'QUEUED', detail: 'Run submitted' });
    });

    it('refuses without confirmed data rights and creates nothing', async () => {
      const { container } = setup();
      await expect(
        container.orchestrator.submit(submitRequest({ dataRightsConfirmed: false }))
      ).rejects.toBeInstanceOf(ValidationError);
      expect(await container.orchestrator.listRuns(TENANT, PROJECT)).toEqual([]);
    });

    it('refuses an unapproved base model', async () => {
      const { container } = setup();
      await expect(
        container.orchestrator.submit(submitRequest({ baseModelId: 'someone/unlisted-13b' }))
      ).rejects.toThrow('Base model is not approved: someone/unlisted-13b');
    });

    it('refuses an invalid config with the offending fields', async () => {
      const { container } = setup();
      const attempt = container.orchestrator.submit(submitRequest({ config: { loraRank: -1 } }));
      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toThrow('Invalid training config');
    });

    it('refuses a dataset that is still building or belongs to another project', async () => {
      const { container, catalog } = setup();
      catalog.setStatus('dsv_1', 'building');
      await expect(container.orchestrator.submit(submitRequest())).rejects.toThrow(
        'Dataset version dsv_1 is building, expected ready or needs_review'
      );

      catalog.put(datasetVersion({ id: 'dsv_other', projectId: 'other-project' }));
      await expect(
        container.orchestrator.submit(submitRequest({ datasetVersionId: 'dsv_other' }))
      ).rejects.toThrow('Dataset version not found in project: dsv_other');
    });

    it('accepts a dataset that needs review', async () => {
      const { container, catalog } = setup();
      catalog.setStatus('dsv_1', 'needs_review');
      const run = await container.orchestrator.submit(submitRequest());
      expect(run.state).toBe('QUEUED');
    });

    it('refuses path-like tenant ids', async () => {
      const { container } = setup();
      await expect(
        container.orchestrator.submit(submitRequest({ tenantId: '../escape' }))
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('refuses when the quota is exhausted', async () => {
      const { container } = setup({ quota: { checkAndReserve: async () => false, release: async () => undefined } });
      await expect(container.orchestrator.submit(submitRequest())).rejects.toBeInstanceOf(QuotaExceededError);
      expect(await container.orchestrator.listRuns(TENANT, PROJECT)).toEqual([]);
    });

    it('admits only one of two concurrent submits at the plan limit', async () => {
      const { container } = setup();
      for (let i = 0; i < 9; i++) {
        await container.orchestrator.submit(submitRequest());
      }

      const results = await Promise.allSettled([
        container.orchestrator.submit(submitRequest()),
        container.orchestrator.submit(submitRequest()),
      ]);

      expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
      const rejected = results.find((r) => r.status === 'rejected');
      expect(rejected?.status === 'rejected' ? rejected.reason : null).toBeInstanceOf(QuotaExceededError);
      expect(await container.orchestrator.listRuns(TENANT, PROJECT)).toHaveLength(10);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // CLAIM
  // ═══════════════════════════════════════════════════════════════

  describe('claimNext', () => {
    it('hands a queued run to exactly one of several concurrent callers', async () => {
      const { container } = setup();
      const run = await container.orchestrator.submit(submitRequest());

      const claims = await Promise.all([
        container.orchestrator.claimNext(),
        container.orchestrator.claimNext(),
        container.orchestrator.claimNext(),
      ]);

      const winners = claims.filter((c) => c !== null);
      expect(winners).toHaveLength(1);
      expect(winners[0]?.runId).toBe(run.runId);
      expect(winners[0]?.state).toBe('PREFLIGHT');
      expect(winners[0]?.claimedBy).toBe(container.orchestrator.workerId);
    });

    it('claims the oldest run first and honours the tenant filter', async () => {
      const { container } = setup();
      const first = await container.orchestrator.submit(submitRequest());
      await container.orchestrator.submit(submitRequest());

      expect(await container.orchestrator.claimNext({ tenantId: 'tenant-b' })).toBeNull();
      const claimed = await container.orchestrator.claimNext({ tenantId: TENANT });
      expect(claimed?.runId).toBe(first.runId);
    });

    it('returns null on an empty queue', async () => {
      const { container } = setup();
      expect(await container.orchestrator.processNext()).toBeNull();
    });

    it('refuses to advance a run that was never claimed', async () => {
      const { container } = setup();
      const run = await container.orchestrator.submit(submitRequest());
      await expect(container.orchestrator.advance(run.runId)).rejects.toBeInstanceOf(InvalidStateTransitionError);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  describe('processNext', () => {
    it('drives a run to READY with a report, a package and a consistent timeline', async () => {
      const { container, artifactsDir } = setup();
      const submitted = await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('READY');
      expect(run?.progress).toBe(1);
      expect(run?.vramEstimateGb).toBe(2.36);
      expect(run?.goNoGo).toBe(true);
      expect(run?.finishedAt).toBeInstanceOf(Date);

      const runDir = path.resolve(artifactsDir, TENANT, PROJECT, submitted.runId);
      expect(run?.checkpointPath).toBe(path.join(runDir, 'checkpoints', 'step-4'));
      expect(run?.packagePath).toBe(path.join(runDir, 'package'));
      expect(existsSync(path.join(runDir, 'run_config_snapshot.json'))).toBe(true);

      const manifest = JSON.parse(readFileSync(path.join(runDir, 'package', 'run_manifest.json'), 'utf8'));
      expect(manifest.run_id).toBe(submitted.runId);
      expect(manifest.eval_report_id).toBe(run?.evalReportId);
      expect(manifest.go_no_go).toBe(true);

      const report = await container.evaluation.getReportForRun(submitted.runId);
      expect(report?.reportId).toBe(run?.evalReportId);
      expect(report?.metrics.semanticSimilarity).toBe(0.8763);
      expect(report?.metrics.refusalAccuracy).toBe(1);

      const timeline = await container.orchestrator.getTimeline(submitted.runId);
      expect(timeline.consistent).toBe(true);
      expect(timeline.events.map((e) => e.toState)).toEqual([
        'QUEUED',
        'PREFLIGHT',
        'STAGING',
        'TRAINING',
        'EVALUATING',
        'PACKAGING',
        'READY',
      ]);
      expect(timeline.events.map((e) => e.seq)).toEqual([1, 2, 3, 4, 5, 6, 7]);
      expect(timeline.events[5].detail).toBe('Evaluation GO');
    });

    it('still reaches READY on a NO-GO evaluation', async () => {
      const offTopic: CheckpointPredictor = {
        name: 'off-topic',
        predict: async () => 'Bananas orbit purple moons nightly.',
      };
      const { container } = setup({ predictor: offTopic });
      await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('READY');
      expect(run?.goNoGo).toBe(false);
      const events = await container.orchestrator.listEvents(run?.runId ?? '');
      expect(events[5].detail).toMatch(/^Evaluation NO-GO: semantic_similarity 0 < 0.72/);
    });

    it('fails with RESOURCE_EXCEEDED when the estimate does not fit', async () => {
      const { container } = setup({}, { MAX_GPU_VRAM_GB: '2' });
      await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('FAILED');
      expect(run?.errorCode).toBe('RESOURCE_EXCEEDED');
      expect(run?.vramEstimateGb).toBe(2.36);
      expect(run?.errorMessage).toContain('Estimated 2.36 GB exceeds safe limit 1.7 GB');
    });

    it('fails with STAGING_ERROR when the dataset disappears after submit', async () => {
      const { container, catalog } = setup();
      await container.orchestrator.submit(submitRequest());
      catalog.setStatus('dsv_1', 'failed');

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('FAILED');
      expect(run?.errorCode).toBe('STAGING_ERROR');
      expect(run?.errorMessage).toBe('Dataset version dsv_1 is failed');
    });

    it('fails with BACKEND_ERROR on a non-retryable failure and writes no report', async () => {
      const { container } = setup({
        backend: new SimulatorExecutionBackend({ steps: 4, failure: { atStep: 2, retryable: false } }),
      });
      const submitted = await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('FAILED');
      expect(run?.errorCode).toBe('BACKEND_ERROR');
      expect(run?.errorMessage).toBe('Simulated failure at step 2');
      expect(run?.retryCount).toBe(0);
      expect(run?.evalReportId).toBeNull();
      expect(await container.evaluation.getReportForRun(submitted.runId)).toBeNull();

      const timeline = await container.orchestrator.getTimeline(submitted.runId);
      expect(timeline.consistent).toBe(true);
      expect(timeline.events.at(-1)).toMatchObject({
        fromState: 'TRAINING',
        toState: 'FAILED',
        detail: 'BACKEND_ERROR: Simulated failure at step 2',
      });
    });

    it('retries a retryable failure and succeeds', async () => {
      const { container } = setup({
        backend: new SimulatorExecutionBackend({ steps: 4, failure: { atStep: 2, retryable: true, attempts: 1 } }),
      });
      await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('READY');
      expect(run?.retryCount).toBe(1);
    });

    it('keeps stored progress monotonic across a retried attempt', async () => {
      let orchestrator: TrainingOrchestrator | null = null;
      const stored: number[] = [];
      const reported: number[] = [];
      const simulator = new SimulatorExecutionBackend({
        steps: 4,
        failure: { atStep: 3, retryable: true, attempts: 1 },
      });
      const tracing: ExecutionBackend = {
        name: 'simulator',
        run: async (request, context) => {
          const entered = await orchestrator?.getRun(request.runId);
          stored.push(entered?.progress ?? -1);
          return simulator.run(request, {
            signal: context.signal,
            reportProgress: async (progress) => {
              reported.push(progress);
              const keepGoing = await context.reportProgress(progress);
              const current = await orchestrator?.getRun(request.runId);
              stored.push(current?.progress ?? -1);
              return keepGoing;
            },
          });
        },
      };
      const { container } = setup({ backend: tracing });
      orchestrator = container.orchestrator;
      await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('READY');
      expect(run?.retryCount).toBe(1);
      expect(reported).toEqual([0.25, 0.5, 0.25, 0.5, 0.75, 1]);
      expect(stored).toEqual([0, 0.25, 0.5, 0.5, 0.5, 0.5, 0.75, 1]);
      expect(stored.every((value, i) => i === 0 || value >= stored[i - 1])).toBe(true);
    });

    it('gives up after the retry budget', async () => {
      const { container } = setup(
        { backend: new SimulatorExecutionBackend({ steps: 4, failure: { atStep: 1, retryable: true } }) },
        { TRAINER_MAX_RETRIES: '2' }
      );
      await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('FAILED');
      expect(run?.errorCode).toBe('BACKEND_ERROR');
      expect(run?.retryCount).toBe(2);
    });

    it('fails with TIMEOUT when execution exceeds the ceiling', async () => {
      const { container } = setup(
        { backend: new SimulatorExecutionBackend({ steps: 4, stepDelayMs: 40 }) },
        { TRAINER_TIMEOUT_MS: '10' }
      );
      await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('FAILED');
      expect(run?.errorCode).toBe('TIMEOUT');
      expect(run?.errorMessage).toBe('Execution exceeded 10ms');
    });

    it('fails with EVALUATION_ERROR when the dataset has no held-out examples', async () => {
      const { container, catalog } = setup();
      catalog.put(datasetVersion(), []);
      await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('FAILED');
      expect(run?.errorCode).toBe('EVALUATION_ERROR');
      expect(run?.checkpointPath).not.toBeNull();
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // CANCEL / RESUBMIT
  // ═══════════════════════════════════════════════════════════════

  describe('cancel', () => {
    it('cancels a queued run and then rejects a second cancel', async () => {
      const { container } = setup();
      const run = await container.orchestrator.submit(submitRequest());

      const cancelledRun = await container.orchestrator.cancel(run.runId, 'user-2');
      expect(cancelledRun.state).toBe('CANCELLED');
      expect(cancelledRun.finishedAt).toBeInstanceOf(Date);

      await expect(container.orchestrator.cancel(run.runId, 'user-2')).rejects.toBeInstanceOf(
        InvalidStateTransitionError
      );
      expect(await container.orchestrator.processNext()).toBeNull();

      const events = await container.orchestrator.listEvents(run.runId);
      expect(events.map((e) => e.detail)).toEqual(['Run submitted', 'Cancelled by user-2']);
    });

    it('stops a run in TRAINING at its next progress report', async () => {
      let orchestrator: TrainingOrchestrator | null = null;
      const interrupting: ExecutionBackend = {
        name: 'simulator',
        run: async (request, context) => {
          await orchestrator?.cancel(request.runId, 'user-2');
          const keepGoing = await context.reportProgress(0.5);
          return keepGoing ? succeeded(request.runDir, { loss: 1, steps: 1 }) : cancelled({ loss: null, steps: 1 });
        },
      };
      const { container } = setup({ backend: interrupting });
      orchestrator = container.orchestrator;
      const submitted = await container.orchestrator.submit(submitRequest());

      const run = await container.orchestrator.processNext();

      expect(run?.state).toBe('CANCELLED');
      expect(run?.errorCode).toBeNull();
      const timeline = await container.orchestrator.getTimeline(submitted.runId);
      expect(timeline.consistent).toBe(true);
      expect(timeline.events.at(-1)).toMatchObject({ fromState: 'TRAINING', toState: 'CANCELLED' });
    });

    it('rejects cancelling a READY run', async () => {
      const { container } = setup();
      await container.orchestrator.submit(submitRequest());
      const run = await container.orchestrator.processNext();

      await expect(container.orchestrator.cancel(run?.runId ?? '', 'user-2')).rejects.toThrow(
        'Invalid transition from READY to CANCELLED'
      );
    });

    it('throws NotFoundError for an unknown run', async () => {
      const { container } = setup();
      await expect(container.orchestrator.cancel('run_missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('resubmit', () => {
    it('creates a fresh run from a failed one', async () => {
      const { container } = setup({
        backend: new SimulatorExecutionBackend({ steps: 4, failure: { atStep: 1, retryable: false, attempts: 1 } }),
      });
      await container.orchestrator.submit(submitRequest());
      const failedRun = await container.orchestrator.processNext();
      expect(failedRun?.state).toBe('FAILED');

      const again = await container.orchestrator.resubmit(failedRun?.runId ?? '', 'user-3');
      expect(again.state).toBe('QUEUED');
      expect(again.runId).not.toBe(failedRun?.runId);
      expect(again.resubmittedFrom).toBe(failedRun?.runId);
      expect(again.requestedBy).toBe('user-3');
      expect(again.config).toEqual(failedRun?.config);

      const events = await container.orchestrator.listEvents(again.runId);
      expect(events[0].detail).toBe(`Resubmitted from ${failedRun?.runId}`);
    });

    it('refuses to resubmit a run that has not ended in failure', async () => {
      const { container } = setup();
      const run = await container.orchestrator.submit(submitRequest());
      await expect(container.orchestrator.resubmit(run.runId, 'user-3')).rejects.toBeInstanceOf(
        InvalidStateTransitionError
      );
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // AUDIT / ESTIMATE
  // ═══════════════════════════════════════════════════════════════

  it('records audit entries for creation and completion', async () => {
    const { container } = setup();
    const submitted = await container.orchestrator.submit(submitRequest());
    await container.orchestrator.processNext();

    const entries = await container.audit.list(TENANT, PROJECT);
    expect(entries.map((e) => e.action)).toEqual(['training_run_ready', 'training_run_created']);
    expect(entries[1]).toMatchObject({ actorId: 'user-1', entityType: 'training_run', entityId: submitted.runId });
    expect(entries[0].actorId).toBe('system');
  });

  it('estimates VRAM for a partial config', () => {
    const { container } = setup();
    const estimate = container.orchestrator.estimate({ sequenceLength: 2048 }, 'mistralai/Mistral-7B-Instruct-v0.3');
    expect(estimate.estimatedGb).toBe(4.72);
    expect(estimate.willFit).toBe(true);
    expect(() => container.orchestrator.estimate({}, 'unknown/model')).toThrow('Unknown base model: unknown/model');
  });
});
