import { DuplicateVersionError } from '../../../common/errors.js';
import { isDuplicateKeyError } from '../../../db/mongoose.js';
import type { DeploymentPointer, DeploymentRecord } from '../contracts/deployment.types.js';
import { DeploymentModel, DeploymentPointerModel } from './deployment.model.js';
import type { DeploymentRepository, PointerTarget } from './deployment.repo.js';

function toRecord(doc: DeploymentRecord): DeploymentRecord {
  return {
    deploymentId: doc.deploymentId,
    tenantId: doc.tenantId,
    projectId: doc.projectId,
    trainingRunId: doc.trainingRunId,
    versionLabel: doc.versionLabel,
    artifactPath: doc.artifactPath,
    endpointRef: doc.endpointRef,
    evalReportId: doc.evalReportId,
    goNoGo: doc.goNoGo,
    activatedBy: doc.activatedBy,
    createdAt: doc.createdAt,
    activatedAt: doc.activatedAt ?? null,
  };
}

function toPointer(doc: DeploymentPointer): DeploymentPointer {
  return {
    tenantId: doc.tenantId,
    projectId: doc.projectId,
    activeDeploymentId: doc.activeDeploymentId ?? null,
    previousDeploymentId: doc.previousDeploymentId ?? null,
    revision: doc.revision,
    updatedAt: doc.updatedAt,
  };
}

export class MongoDeploymentRepository implements DeploymentRepository {
  async insert(record: DeploymentRecord): Promise<void> {
    try {
      await DeploymentModel.create(record);
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new DuplicateVersionError(record.projectId, record.versionLabel);
      throw err;
    }
  }

  async findById(deploymentId: string): Promise<DeploymentRecord | null> {
    const doc = await DeploymentModel.findOne({ deploymentId }).lean<DeploymentRecord>();
    return doc ? toRecord(doc) : null;
  }

  async findByVersion(tenantId: string, projectId: string, versionLabel: string): Promise<DeploymentRecord | null> {
    const doc = await DeploymentModel.findOne({ tenantId, projectId, versionLabel }).lean<DeploymentRecord>();
    return doc ? toRecord(doc) : null;
  }

  async listByProject(tenantId: string, projectId: string): Promise<DeploymentRecord[]> {
    const docs = await DeploymentModel.find({ tenantId, projectId })
      .sort({ createdAt: -1 })
      .lean<DeploymentRecord[]>();
    return docs.map(toRecord);
  }

  async markActivated(deploymentId: string, at: Date): Promise<void> {
    await DeploymentModel.updateOne({ deploymentId, activatedAt: null }, { $set: { activatedAt: at } });
  }

  async discardPending(deploymentId: string): Promise<void> {
    await DeploymentModel.deleteOne({ deploymentId, activatedAt: null });
  }

  async getPointer(tenantId: string, projectId: string): Promise<DeploymentPointer | null> {
    const doc = await DeploymentPointerModel.findOne({ tenantId, projectId }).lean<DeploymentPointer>();
    return doc ? toPointer(doc) : null;
  }

  async swapPointer(
    tenantId: string,
    projectId: string,
    expectedRevision: number,
    target: PointerTarget,
    now: Date
  ): Promise<DeploymentPointer | null> {
    if (expectedRevision === 0) {
      try {
        const created = await DeploymentPointerModel.create({
          tenantId,
          projectId,
          ...target,
          revision: 1,
          updatedAt: now,
        });
        return toPointer(created.toObject());
      } catch (err) {
        if (isDuplicateKeyError(err)) return null;
        throw err;
      }
    }

    const doc = await DeploymentPointerModel.findOneAndUpdate(
      { tenantId, projectId, revision: expectedRevision },
      { $set: { ...target, updatedAt: now }, $inc: { revision: 1 } },
      { new: true }
    ).lean<DeploymentPointer>();
    return doc ? toPointer(doc) : null;
  }
}
