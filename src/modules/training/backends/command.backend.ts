/**
 * External-process execution backend.
 *
 * Runs TRAINER_COMMAND_TEMPLATE in a shell. The trainer talks back on
 * stdout with line-oriented markers:
 *
 *   PROGRESS 0.42
 *   STEP 120
 *   LOSS 0.913
 *
 * Exit 0 = success, exit 75 (EX_TEMPFAIL) = retryable, anything else is
 * final. The checkpoint directory must be non-empty on success. A stop
 * sends SIGTERM to the whole process group of the shell.
 */

import { spawn } from 'node:child_process';
import { mkdir, readdir } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline';
import { errorMessage } from '../../../common/errors.js';
import {
  cancelled,
  failed,
  succeeded,
  type ExecutionBackend,
  type ExecutionContext,
  type ExecutionMetrics,
  type ExecutionRequest,
  type ExecutionResult,
} from './execution.backend.js';

export const RETRYABLE_EXIT_CODE = 75;
const STDERR_TAIL_CHARS = 4000;

export interface CommandBackendOptions {
  template: string;
}

export function renderCommand(template: string, values: Record<string, string>): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, key: string) => values[key] ?? match);
}

export function parseTrainerLine(line: string): { kind: 'progress' | 'step' | 'loss'; value: number } | null {
  const m = /^(PROGRESS|STEP|LOSS)\s+(-?[0-9]*\.?[0-9]+)\s*$/.exec(line.trim());
  if (!m) return null;
  const value = Number(m[2]);
  if (!Number.isFinite(value)) return null;
  const kind = m[1] === 'PROGRESS' ? 'progress' : m[1] === 'STEP' ? 'step' : 'loss';
  return { kind, value };
}

export class CommandExecutionBackend implements ExecutionBackend {
  readonly name = 'command';

  constructor(private readonly options: CommandBackendOptions) {}

  async run(request: ExecutionRequest, context: ExecutionContext): Promise<ExecutionResult> {
    const checkpointDir = path.join(request.runDir, 'checkpoints', 'external');
    await mkdir(checkpointDir, { recursive: true });

    const command = renderCommand(this.options.template, {
      output_dir: request.runDir,
      checkpoint_dir: checkpointDir,
      base_model_id: request.baseModelId,
      dataset_version_id: request.datasetVersionId,
      run_id: request.runId,
    });

    const metrics: ExecutionMetrics = { loss: null, steps: 0 };

    return new Promise<ExecutionResult>((resolve) => {
      let stopReason: 'cancelled' | 'aborted' | 'progress_error' | null = null;
      let progressError: string | null = null;
      let stderrTail = '';

      // own process group, so a stop reaches the trainer's children too
      const child = spawn(command, {
        shell: true,
        detached: true,
        cwd: request.runDir,
        env: {
          ...process.env,
          ADAPTER_RUN_ID: request.runId,
          ADAPTER_BASE_MODEL_ID: request.baseModelId,
          ADAPTER_DATASET_VERSION_ID: request.datasetVersionId,
          ADAPTER_CHECKPOINT_DIR: checkpointDir,
          ADAPTER_CONFIG_JSON: JSON.stringify(request.config),
          ADAPTER_ATTEMPT: String(request.attempt),
        },
      });

      const terminate = () => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, 'SIGTERM');
        } catch (err) {
          // group already gone; fall back to the shell itself
          if (!child.kill('SIGTERM')) stderrTail += `\n[kill] ${errorMessage(err)}`;
        }
      };

      const stop = (reason: 'cancelled' | 'aborted' | 'progress_error') => {
        if (stopReason) return;
        stopReason = reason;
        terminate();
      };

      const onAbort = () => stop('aborted');
      context.signal.addEventListener('abort', onAbort, { once: true });

      child.stderr.on('data', (chunk: Buffer) => {
        stderrTail = (stderrTail + chunk.toString('utf8')).slice(-STDERR_TAIL_CHARS);
      });

      createInterface({ input: child.stdout }).on('line', (line) => {
        const parsed = parseTrainerLine(line);
        if (!parsed) return;
        if (parsed.kind === 'step') metrics.steps = parsed.value;
        if (parsed.kind === 'loss') metrics.loss = parsed.value;
        if (parsed.kind === 'progress') {
          context
            .reportProgress(Math.min(Math.max(parsed.value, 0), 1))
            .then((keepGoing) => {
              if (!keepGoing) stop('cancelled');
            })
            .catch((err: unknown) => {
              progressError = errorMessage(err);
              stop('progress_error');
            });
        }
      });

      child.on('error', (err) => {
        context.signal.removeEventListener('abort', onAbort);
        resolve(failed(`Trainer could not start: ${err.message}`, false, metrics));
      });

      child.on('close', (code) => {
        context.signal.removeEventListener('abort', onAbort);

        if (stopReason === 'cancelled') return resolve(cancelled(metrics));
        if (stopReason === 'aborted') return resolve(failed('Execution aborted', false, metrics));
        if (stopReason === 'progress_error') {
          return resolve(failed(`Progress reporting failed: ${progressError}`, false, metrics));
        }

        if (code === RETRYABLE_EXIT_CODE) {
          return resolve(failed(`Trainer exited with code ${code}: ${stderrTail.trim()}`, true, metrics));
        }
        if (code !== 0) {
          return resolve(failed(`Trainer exited with code ${code}: ${stderrTail.trim()}`, false, metrics));
        }

        readdir(checkpointDir)
          .then((entries) => {
            resolve(
              entries.length > 0
                ? succeeded(checkpointDir, metrics)
                : failed('Trainer did not produce a checkpoint', false, metrics)
            );
          })
          .catch((err: unknown) => {
            resolve(failed(`Checkpoint directory unreadable: ${errorMessage(err)}`, false, metrics));
          });
      });
    });
  }
}
