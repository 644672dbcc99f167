/**
 * Append-only audit trail of pipeline actions.
 */

export type AuditAction =
  | 'training_run_created'
  | 'training_run_resubmitted'
  | 'training_run_cancelled'
  | 'training_run_ready'
  | 'training_run_failed'
  | 'deployment_activated'
  | 'deployment_rolled_back';

export type AuditEntityType = 'training_run' | 'deployment';

export interface AuditEvent {
  eventId: string;
  tenantId: string;
  projectId: string;
  actorId: string;
  action: AuditAction;
  entityType: AuditEntityType;
  entityId: string;
  details: Record<string, unknown>;
  createdAt: Date;
}

export type AuditEntry = Omit<AuditEvent, 'eventId' | 'createdAt'>;

export interface AuditRecorder {
  record(entry: AuditEntry): Promise<void>;
}

/** Actor id used for transitions the worker makes on its own. */
export const SYSTEM_ACTOR = 'system';
