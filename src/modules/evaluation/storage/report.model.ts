/**
 * evaluation_reports: immutable, unique per training run.
 */

import { Schema, model } from 'mongoose';
import type { EvaluationReport } from '../contracts/evaluation.types.js';

const EvaluationReportSchema = new Schema<EvaluationReport>(
  {
    reportId: { type: String, required: true, unique: true },
    trainingRunId: { type: String, required: true, unique: true },
    tenantId: { type: String, required: true },
    projectId: { type: String, required: true },
    checkpointPath: { type: String, required: true },
    metrics: { type: Schema.Types.Mixed, required: true },
    goNoGo: { type: Boolean, required: true },
    blockers: { type: [String], default: [] },
    failures: { type: Schema.Types.Mixed, default: [] },
    thresholds: { type: Schema.Types.Mixed, required: true },
    priorReportId: { type: String, default: null },
    createdAt: { type: Date, required: true },
  },
  { collection: 'evaluation_reports', timestamps: false, versionKey: false }
);

EvaluationReportSchema.index({ tenantId: 1, projectId: 1, createdAt: -1 });

export const EvaluationReportModel = model<EvaluationReport>('EvaluationReport', EvaluationReportSchema);
