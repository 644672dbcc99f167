/**
 * deployments: one record per (tenant, project, versionLabel).
 * deployment_pointers: one document per project, CAS on revision.
 */

import { Schema, model } from 'mongoose';
import type { DeploymentPointer, DeploymentRecord } from '../contracts/deployment.types.js';

const DeploymentSchema = new Schema<DeploymentRecord>(
  {
    deploymentId: { type: String, required: true, unique: true },
    tenantId: { type: String, required: true },
    projectId: { type: String, required: true },
    trainingRunId: { type: String, required: true },
    versionLabel: { type: String, required: true },
    artifactPath: { type: String, required: true },
    endpointRef: { type: String, required: true },
    evalReportId: { type: String, required: true },
    goNoGo: { type: Boolean, required: true },
    activatedBy: { type: String, required: true },
    createdAt: { type: Date, required: true },
    activatedAt: { type: Date, default: null },
  },
  { collection: 'deployments', timestamps: false, versionKey: false }
);

DeploymentSchema.index({ tenantId: 1, projectId: 1, versionLabel: 1 }, { unique: true });
DeploymentSchema.index({ tenantId: 1, projectId: 1, createdAt: -1 });

const DeploymentPointerSchema = new Schema<DeploymentPointer>(
  {
    tenantId: { type: String, required: true },
    projectId: { type: String, required: true },
    activeDeploymentId: { type: String, default: null },
    previousDeploymentId: { type: String, default: null },
    revision: { type: Number, required: true },
    updatedAt: { type: Date, required: true },
  },
  { collection: 'deployment_pointers', timestamps: false, versionKey: false }
);

DeploymentPointerSchema.index({ tenantId: 1, projectId: 1 }, { unique: true });

export const DeploymentModel = model<DeploymentRecord>('Deployment', DeploymentSchema);
export const DeploymentPointerModel = model<DeploymentPointer>('DeploymentPointer', DeploymentPointerSchema);
