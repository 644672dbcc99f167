/**
 * EXECUTION BACKEND CONTRACT
 *
 * The unit that actually trains. The orchestrator owns state; the
 * backend only reports progress and returns a result value.
 */

import type { TrainingConfig } from '../contracts/training.types.js';

export interface ExecutionRequest {
  runId: string;
  tenantId: string;
  projectId: string;
  datasetVersionId: string;
  baseModelId: string;
  config: TrainingConfig;
  runDir: string;
  attempt: number;             // 1-based
}

export interface ExecutionContext {
  /**
   * Persist progress (0..1). Resolves false once the run is no longer
   * TRAINING, which the backend treats as a cancellation request.
   */
  reportProgress(progress: number): Promise<boolean>;
  /** Aborted when the orchestrator's execution ceiling fires. */
  signal: AbortSignal;
}

export interface ExecutionMetrics {
  loss: number | null;
  steps: number;
}

export interface ExecutionResult {
  success: boolean;
  checkpointPath: string | null;
  metrics: ExecutionMetrics;
  error: string | null;
  retryable: boolean;
  cancelled: boolean;
}

export interface ExecutionBackend {
  readonly name: 'simulator' | 'command';
  run(request: ExecutionRequest, context: ExecutionContext): Promise<ExecutionResult>;
}

export function succeeded(checkpointPath: string, metrics: ExecutionMetrics): ExecutionResult {
  return { success: true, checkpointPath, metrics, error: null, retryable: false, cancelled: false };
}

export function failed(error: string, retryable: boolean, metrics: ExecutionMetrics): ExecutionResult {
  return { success: false, checkpointPath: null, metrics, error, retryable, cancelled: false };
}

export function cancelled(metrics: ExecutionMetrics): ExecutionResult {
  return {
    success: false,
    checkpointPath: null,
    metrics,
    error: 'Cancelled at progress checkpoint',
    retryable: false,
    cancelled: true,
  };
}
