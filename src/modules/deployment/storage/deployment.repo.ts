/**
 * Deployment store (contract)
 *
 * Records are insert-only apart from the first-activation timestamp. A
 * record whose activation never reached the pointer can be discarded.
 * The per-project pointer changes only through swapPointer, a
 * compare-and-swap on its revision.
 */

import type { DeploymentPointer, DeploymentRecord } from '../contracts/deployment.types.js';

export interface PointerTarget {
  activeDeploymentId: string | null;
  previousDeploymentId: string | null;
}

export interface DeploymentRepository {
  /** Throws DuplicateVersionError when the label exists in the project. */
  insert(record: DeploymentRecord): Promise<void>;
  findById(deploymentId: string): Promise<DeploymentRecord | null>;
  findByVersion(tenantId: string, projectId: string, versionLabel: string): Promise<DeploymentRecord | null>;
  listByProject(tenantId: string, projectId: string): Promise<DeploymentRecord[]>;
  markActivated(deploymentId: string, at: Date): Promise<void>;
  /** Deletes the record if it was never activated. */
  discardPending(deploymentId: string): Promise<void>;

  getPointer(tenantId: string, projectId: string): Promise<DeploymentPointer | null>;

  /**
   * Applies `target` only if the stored revision equals
   * `expectedRevision` (0 = no pointer yet). Returns the new pointer, or
   * null when another writer got there first.
   */
  swapPointer(
    tenantId: string,
    projectId: string,
    expectedRevision: number,
    target: PointerTarget,
    now: Date
  ): Promise<DeploymentPointer | null>;
}
