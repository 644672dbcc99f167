import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CommandExecutionBackend, parseTrainerLine, renderCommand } from '../backends/command.backend.js';
import type { ExecutionContext, ExecutionRequest } from '../backends/execution.backend.js';
import { DEFAULT_TRAINING_CONFIG } from '../contracts/training.schemas.js';

describe('renderCommand', () => {
  it('substitutes known placeholders and leaves unknown ones', () => {
    const rendered = renderCommand('train --out {output_dir} --model {base_model_id} --x {unknown}', {
      output_dir: '/tmp/run',
      base_model_id: 'base-7b',
    });
    expect(rendered).toBe('train --out /tmp/run --model base-7b --x {unknown}');
  });
});

describe('parseTrainerLine', () => {
  it('parses progress, step and loss markers', () => {
    expect(parseTrainerLine('PROGRESS 0.42')).toEqual({ kind: 'progress', value: 0.42 });
    expect(parseTrainerLine('  STEP 120  ')).toEqual({ kind: 'step', value: 120 });
    expect(parseTrainerLine('LOSS .913')).toEqual({ kind: 'loss', value: 0.913 });
  });

  it('ignores anything else', () => {
    expect(parseTrainerLine('epoch 1 done')).toBeNull();
    expect(parseTrainerLine('PROGRESS')).toBeNull();
    expect(parseTrainerLine('PROGRESS abc')).toBeNull();
  });
});

describe('CommandExecutionBackend', () => {
  let runDir: string;

  beforeEach(() => {
    runDir = mkdtempSync(path.join(os.tmpdir(), 'cmd-backend-'));
  });

  afterEach(() => {
    rmSync(runDir, { recursive: true, force: true });
  });

  const checkpointDir = () => path.join(runDir, 'checkpoints', 'external');

  const request = (attempt = 1): ExecutionRequest => ({
    runId: 'run_1',
    tenantId: 'tenant-a',
    projectId: 'support-bot',
    datasetVersionId: 'dsv_1',
    baseModelId: 'base-7b',
    config: { ...DEFAULT_TRAINING_CONFIG, maxSteps: 4 },
    runDir,
    attempt,
  });

  function context(keepGoing = true, signal: AbortSignal = new AbortController().signal) {
    const reported: number[] = [];
    const ctx: ExecutionContext = {
      signal,
      reportProgress: async (progress) => {
        reported.push(progress);
        return keepGoing;
      },
    };
    return { ctx, reported };
  }

  it('succeeds with the checkpoint directory, parsed metrics and progress', async () => {
    const backend = new CommandExecutionBackend({
      template:
        'echo "STEP $ADAPTER_ATTEMPT"; echo "LOSS 0.5"; echo "PROGRESS 0.5"; echo "PROGRESS 1.5"; ' +
        'echo weights > {checkpoint_dir}/adapter.bin',
    });
    const { ctx, reported } = context();

    const result = await backend.run(request(2), ctx);

    expect(result).toEqual({
      success: true,
      checkpointPath: checkpointDir(),
      metrics: { loss: 0.5, steps: 2 },
      error: null,
      retryable: false,
      cancelled: false,
    });
    expect(reported).toEqual([0.5, 1]);
  });

  it('marks exit code 75 as retryable with the stderr tail', async () => {
    const backend = new CommandExecutionBackend({ template: 'echo "disk busy" >&2; exit 75' });

    const result = await backend.run(request(), context().ctx);

    expect(result.success).toBe(false);
    expect(result.retryable).toBe(true);
    expect(result.error).toBe('Trainer exited with code 75: disk busy');
  });

  it('treats any other non-zero exit as final', async () => {
    const backend = new CommandExecutionBackend({ template: 'echo "bad args" >&2; exit 3' });

    const result = await backend.run(request(), context().ctx);

    expect(result.retryable).toBe(false);
    expect(result.cancelled).toBe(false);
    expect(result.error).toBe('Trainer exited with code 3: bad args');
  });

  it('fails a clean exit that left no checkpoint', async () => {
    const backend = new CommandExecutionBackend({ template: 'echo "PROGRESS 1"' });

    const result = await backend.run(request(), context().ctx);

    expect(result.success).toBe(false);
    expect(result.retryable).toBe(false);
    expect(result.error).toBe('Trainer did not produce a checkpoint');
  });

  it('kills the trainer when progress reporting asks it to stop', async () => {
    const backend = new CommandExecutionBackend({
      template: 'echo "PROGRESS 0.1"; sleep 5; touch {checkpoint_dir}/late',
    });
    const { ctx, reported } = context(false);
    const started = Date.now();

    const result = await backend.run(request(), ctx);

    expect(result.cancelled).toBe(true);
    expect(result.success).toBe(false);
    expect(reported).toEqual([0.1]);
    expect(Date.now() - started).toBeLessThan(4000);
    expect(existsSync(path.join(checkpointDir(), 'late'))).toBe(false);
  });

  it('kills the trainer when the execution signal aborts', async () => {
    const backend = new CommandExecutionBackend({ template: 'sleep 5; touch {checkpoint_dir}/late' });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);
    const started = Date.now();

    const result = await backend.run(request(), context(true, controller.signal).ctx);

    expect(result).toMatchObject({ success: false, cancelled: false, retryable: false, error: 'Execution aborted' });
    expect(Date.now() - started).toBeLessThan(4000);
    expect(existsSync(path.join(checkpointDir(), 'late'))).toBe(false);
  });
});
