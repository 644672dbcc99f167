import { mkdtempSync, readFileSync, rmSync, existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_TRAINING_CONFIG } from '../contracts/training.schemas.js';
import type { ExecutionContext, ExecutionRequest } from '../backends/execution.backend.js';
import { SimulatorExecutionBackend } from '../backends/simulator.backend.js';

describe('SimulatorExecutionBackend', () => {
  let runDir: string;

  beforeEach(() => {
    runDir = mkdtempSync(path.join(os.tmpdir(), 'sim-backend-'));
  });

  afterEach(() => {
    rmSync(runDir, { recursive: true, force: true });
  });

  const request = (attempt = 1): ExecutionRequest => ({
    runId: 'run_1',
    tenantId: 'tenant-a',
    projectId: 'support-bot',
    datasetVersionId: 'dsv_1',
    baseModelId: 'base-7b',
    config: { ...DEFAULT_TRAINING_CONFIG, maxSteps: 4, saveEverySteps: 2 },
    runDir,
    attempt,
  });

  const context = (reportProgress: ExecutionContext['reportProgress'] = async () => true): ExecutionContext => ({
    reportProgress,
    signal: new AbortController().signal,
  });

  it('writes periodic checkpoints and returns the last one', async () => {
    const progress = vi.fn<ExecutionContext['reportProgress']>(async () => true);
    const backend = new SimulatorExecutionBackend({ steps: 10 });

    const result = await backend.run(request(), context(progress));

    expect(result.success).toBe(true);
    expect(result.checkpointPath).toBe(path.join(runDir, 'checkpoints', 'step-4'));
    expect(result.metrics).toEqual({ loss: 0.2245, steps: 4 });
    expect(existsSync(path.join(runDir, 'checkpoints', 'step-2', 'checkpoint.json'))).toBe(true);

    const checkpoint = JSON.parse(readFileSync(path.join(runDir, 'checkpoints', 'step-4', 'checkpoint.json'), 'utf8'));
    expect(checkpoint.step).toBe(4);
    expect(checkpoint.lora).toEqual({ rank: 16, alpha: 32, dropout: 0.05 });

    expect(progress.mock.calls.map((c) => c[0])).toEqual([0.25, 0.5, 0.75, 1]);
  });

  it('stops when progress reporting says the run left TRAINING', async () => {
    let calls = 0;
    const backend = new SimulatorExecutionBackend({ steps: 4 });

    const result = await backend.run(request(), context(async () => ++calls < 2));

    expect(result.cancelled).toBe(true);
    expect(result.success).toBe(false);
    expect(result.metrics.steps).toBe(2);
  });

  it('fails at the injected step and recovers on a later attempt', async () => {
    const backend = new SimulatorExecutionBackend({
      steps: 4,
      failure: { atStep: 2, retryable: true, attempts: 1 },
    });

    const first = await backend.run(request(1), context());
    expect(first.success).toBe(false);
    expect(first.retryable).toBe(true);
    expect(first.error).toBe('Simulated failure at step 2');

    const second = await backend.run(request(2), context());
    expect(second.success).toBe(true);
  });

  it('returns a failure when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const backend = new SimulatorExecutionBackend({ steps: 4 });

    const result = await backend.run(request(), { reportProgress: async () => true, signal: controller.signal });

    expect(result).toMatchObject({ success: false, error: 'Execution aborted', retryable: false });
    expect(result.metrics.steps).toBe(0);
  });
});
