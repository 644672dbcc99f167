/**
 * Deterministic training simulator.
 *
 * Steps through a fixed loss curve, checkpoints every saveEverySteps and
 * at the end. Failures can be injected per attempt for local runs and CI.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { sleep } from '../../../common/host.deps.js';
import {
  cancelled,
  failed,
  succeeded,
  type ExecutionBackend,
  type ExecutionContext,
  type ExecutionRequest,
  type ExecutionResult,
} from './execution.backend.js';

export interface SimulatedFailure {
  atStep: number;
  retryable: boolean;
  /** Fail only the first N attempts; omitted = every attempt. */
  attempts?: number;
  message?: string;
}

export interface SimulatorOptions {
  steps: number;
  stepDelayMs?: number;
  failure?: SimulatedFailure;
}

function lossAt(step: number, total: number): number {
  const loss = 2.5 * Math.exp((-3 * step) / total) + 0.1;
  return Math.round(loss * 10_000) / 10_000;
}

export class SimulatorExecutionBackend implements ExecutionBackend {
  readonly name = 'simulator';

  constructor(private readonly options: SimulatorOptions) {}

  async run(request: ExecutionRequest, context: ExecutionContext): Promise<ExecutionResult> {
    const total = request.config.maxSteps > 0 ? Math.min(request.config.maxSteps, this.options.steps) : this.options.steps;
    const failure = this.options.failure;
    const failThisAttempt =
      failure !== undefined && (failure.attempts === undefined || request.attempt <= failure.attempts);

    let lastCheckpoint: string | null = null;
    let loss: number | null = null;

    for (let step = 1; step <= total; step++) {
      if (context.signal.aborted) {
        return failed('Execution aborted', false, { loss, steps: step - 1 });
      }

      if (this.options.stepDelayMs && this.options.stepDelayMs > 0) {
        await sleep(this.options.stepDelayMs);
      } else {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }

      if (failThisAttempt && failure && step === failure.atStep) {
        return failed(failure.message ?? `Simulated failure at step ${step}`, failure.retryable, {
          loss,
          steps: step,
        });
      }

      loss = lossAt(step, total);

      if (step % request.config.saveEverySteps === 0 || step === total) {
        lastCheckpoint = await this.writeCheckpoint(request, step, loss);
      }

      const keepGoing = await context.reportProgress(step / total);
      if (!keepGoing) {
        return cancelled({ loss, steps: step });
      }
    }

    if (!lastCheckpoint) {
      return failed('Simulator produced no checkpoint', false, { loss, steps: total });
    }
    return succeeded(lastCheckpoint, { loss, steps: total });
  }

  private async writeCheckpoint(request: ExecutionRequest, step: number, loss: number): Promise<string> {
    const dir = path.join(request.runDir, 'checkpoints', `step-${step}`);
    await mkdir(dir, { recursive: true });
    await writeFile(
      path.join(dir, 'checkpoint.json'),
      JSON.stringify(
        {
          backend: this.name,
          runId: request.runId,
          baseModelId: request.baseModelId,
          datasetVersionId: request.datasetVersionId,
          step,
          loss,
          lora: {
            rank: request.config.loraRank,
            alpha: request.config.loraAlpha,
            dropout: request.config.loraDropout,
          },
        },
        null,
        2
      )
    );
    return dir;
  }
}
