import { DuplicateVersionError } from '../../../common/errors.js';
import type { DeploymentPointer, DeploymentRecord } from '../contracts/deployment.types.js';
import type { DeploymentRepository, PointerTarget } from './deployment.repo.js';

const key = (tenantId: string, projectId: string) => `${tenantId}/${projectId}`;

export class InMemoryDeploymentRepository implements DeploymentRepository {
  private readonly records = new Map<string, DeploymentRecord>();
  private readonly pointers = new Map<string, DeploymentPointer>();

  async insert(record: DeploymentRecord): Promise<void> {
    const clash = Array.from(this.records.values()).some(
      (r) =>
        r.tenantId === record.tenantId &&
        r.projectId === record.projectId &&
        r.versionLabel === record.versionLabel
    );
    if (clash) throw new DuplicateVersionError(record.projectId, record.versionLabel);
    this.records.set(record.deploymentId, structuredClone(record));
  }

  async findById(deploymentId: string): Promise<DeploymentRecord | null> {
    const record = this.records.get(deploymentId);
    return record ? structuredClone(record) : null;
  }

  async findByVersion(tenantId: string, projectId: string, versionLabel: string): Promise<DeploymentRecord | null> {
    for (const r of this.records.values()) {
      if (r.tenantId === tenantId && r.projectId === projectId && r.versionLabel === versionLabel) {
        return structuredClone(r);
      }
    }
    return null;
  }

  async listByProject(tenantId: string, projectId: string): Promise<DeploymentRecord[]> {
    return Array.from(this.records.values())
      .filter((r) => r.tenantId === tenantId && r.projectId === projectId)
      .reverse()
      .map((r) => structuredClone(r));
  }

  async markActivated(deploymentId: string, at: Date): Promise<void> {
    const record = this.records.get(deploymentId);
    if (record && record.activatedAt === null) record.activatedAt = at;
  }

  async discardPending(deploymentId: string): Promise<void> {
    if (this.records.get(deploymentId)?.activatedAt === null) this.records.delete(deploymentId);
  }

  async getPointer(tenantId: string, projectId: string): Promise<DeploymentPointer | null> {
    const pointer = this.pointers.get(key(tenantId, projectId));
    return pointer ? structuredClone(pointer) : null;
  }

  async swapPointer(
    tenantId: string,
    projectId: string,
    expectedRevision: number,
    target: PointerTarget,
    now: Date
  ): Promise<DeploymentPointer | null> {
    const current = this.pointers.get(key(tenantId, projectId));
    if ((current?.revision ?? 0) !== expectedRevision) return null;

    const next: DeploymentPointer = {
      tenantId,
      projectId,
      activeDeploymentId: target.activeDeploymentId,
      previousDeploymentId: target.previousDeploymentId,
      revision: expectedRevision + 1,
      updatedAt: now,
    };
    this.pointers.set(key(tenantId, projectId), next);
    return structuredClone(next);
  }
}
