/**
 * TRAINING RUN CONTRACTS
 *
 * A run moves QUEUED → PREFLIGHT → STAGING → TRAINING → EVALUATING
 * → PACKAGING → READY, with FAILED reachable from any non-terminal
 * state and CANCELLED from any state before PACKAGING.
 */

// ═══════════════════════════════════════════════════════════════
// STATES
// ═══════════════════════════════════════════════════════════════

export type RunState =
  | 'QUEUED'
  | 'PREFLIGHT'
  | 'STAGING'
  | 'TRAINING'
  | 'EVALUATING'
  | 'PACKAGING'
  | 'READY'
  | 'FAILED'
  | 'CANCELLED';

export type RunFailureCode =
  | 'RESOURCE_EXCEEDED'
  | 'STAGING_ERROR'
  | 'BACKEND_ERROR'
  | 'TIMEOUT'
  | 'EVALUATION_ERROR'
  | 'PACKAGING_ERROR'
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════

export type Precision = 'fp32' | 'fp16' | 'bf16';

export interface TrainingConfig {
  loraRank: number;
  loraAlpha: number;
  loraDropout: number;
  sequenceLength: number;
  perDeviceBatchSize: number;
  gradientAccumulationSteps: number;
  precision: Precision;
  epochs: number;
  maxSteps: number;          // 0 = derive from epochs
  saveEverySteps: number;
  use4bit: boolean;
}

// ═══════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════

export interface TrainingRun {
  runId: string;
  tenantId: string;
  projectId: string;
  datasetVersionId: string;
  baseModelId: string;
  requestedBy: string;
  config: TrainingConfig;

  state: RunState;
  progress: number;                  // 0..1, non-decreasing inside TRAINING
  vramEstimateGb: number | null;
  errorCode: RunFailureCode | null;
  errorMessage: string | null;
  evalReportId: string | null;
  goNoGo: boolean | null;
  checkpointPath: string | null;
  packagePath: string | null;

  retryCount: number;
  eventSeq: number;                  // last RunEvent seq written for this run
  claimedBy: string | null;
  resubmittedFrom: string | null;

  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
}

/** Fields a transition may set alongside the new state. */
export type RunPatch = Partial<
  Pick<
    TrainingRun,
    | 'progress'
    | 'vramEstimateGb'
    | 'errorCode'
    | 'errorMessage'
    | 'evalReportId'
    | 'goNoGo'
    | 'checkpointPath'
    | 'packagePath'
    | 'retryCount'
    | 'startedAt'
    | 'finishedAt'
  >
>;

export interface RunEvent {
  runId: string;
  seq: number;
  fromState: RunState | null;
  toState: RunState;
  timestamp: Date;
  detail: string;
  meta?: Record<string, unknown>;
}

export interface SubmitRunRequest {
  tenantId: string;
  projectId: string;
  datasetVersionId: string;
  baseModelId: string;
  requestedBy: string;
  config: Partial<TrainingConfig>;
  dataRightsConfirmed: boolean;
}

export interface RunTimeline {
  run: TrainingRun;
  events: RunEvent[];
  consistent: boolean;
}
