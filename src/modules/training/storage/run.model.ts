/**
 * TRAINING RUN MONGO MODELS
 *
 * training_runs: one document per run, never deleted.
 * training_run_events: insert-only timeline, unique (runId, seq).
 */

import { Schema, model } from 'mongoose';
import type { RunEvent, RunState, TrainingRun } from '../contracts/training.types.js';

const RUN_STATES: RunState[] = [
  'QUEUED',
  'PREFLIGHT',
  'STAGING',
  'TRAINING',
  'EVALUATING',
  'PACKAGING',
  'READY',
  'FAILED',
  'CANCELLED',
];

const TrainingRunSchema = new Schema<TrainingRun>(
  {
    runId: { type: String, required: true, unique: true },
    tenantId: { type: String, required: true },
    projectId: { type: String, required: true },
    datasetVersionId: { type: String, required: true },
    baseModelId: { type: String, required: true },
    requestedBy: { type: String, required: true },
    config: { type: Schema.Types.Mixed, required: true },

    state: { type: String, required: true, enum: RUN_STATES, default: 'QUEUED' },
    progress: { type: Number, required: true, default: 0 },
    vramEstimateGb: { type: Number, default: null },
    errorCode: { type: String, default: null },
    errorMessage: { type: String, default: null },
    evalReportId: { type: String, default: null },
    goNoGo: { type: Boolean, default: null },
    checkpointPath: { type: String, default: null },
    packagePath: { type: String, default: null },

    retryCount: { type: Number, required: true, default: 0 },
    eventSeq: { type: Number, required: true, default: 0 },
    claimedBy: { type: String, default: null },
    resubmittedFrom: { type: String, default: null },

    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
    startedAt: { type: Date, default: null },
    finishedAt: { type: Date, default: null },
  },
  { collection: 'training_runs', timestamps: false, versionKey: false }
);

// claim scan: oldest QUEUED first
TrainingRunSchema.index({ state: 1, createdAt: 1 });
TrainingRunSchema.index({ tenantId: 1, projectId: 1, createdAt: -1 });
TrainingRunSchema.index({ tenantId: 1, createdAt: 1 });

const RunEventSchema = new Schema<RunEvent>(
  {
    runId: { type: String, required: true },
    seq: { type: Number, required: true },
    fromState: { type: String, enum: RUN_STATES, default: null },
    toState: { type: String, required: true, enum: RUN_STATES },
    timestamp: { type: Date, required: true },
    detail: { type: String, required: true },
    meta: { type: Schema.Types.Mixed, default: undefined },
  },
  { collection: 'training_run_events', timestamps: false, versionKey: false }
);

RunEventSchema.index({ runId: 1, seq: 1 }, { unique: true });

export const TrainingRunModel = model<TrainingRun>('TrainingRun', TrainingRunSchema);
export const RunEventModel = model<RunEvent>('RunEvent', RunEventSchema);
