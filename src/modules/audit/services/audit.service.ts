import { v4 as uuidv4 } from 'uuid';
import type { Clock, Logger } from '../../../common/host.deps.js';
import { defaultClock, defaultLogger } from '../../../common/host.deps.js';
import type { AuditEntry, AuditEvent, AuditRecorder } from '../contracts/audit.types.js';
import type { AuditRepository } from '../storage/audit.repo.js';

export class AuditService implements AuditRecorder {
  constructor(
    private readonly repo: AuditRepository,
    private readonly clock: Clock = defaultClock,
    private readonly logger: Logger = defaultLogger
  ) {}

  async record(entry: AuditEntry): Promise<void> {
    const event: AuditEvent = {
      ...entry,
      eventId: `aud_${uuidv4()}`,
      createdAt: this.clock.utcNow(),
    };
    await this.repo.append(event);
    this.logger.debug?.(
      { action: entry.action, entityId: entry.entityId, actorId: entry.actorId },
      '[Audit] Recorded'
    );
  }

  list(tenantId: string, projectId: string, limit?: number): Promise<AuditEvent[]> {
    return this.repo.listByProject(tenantId, projectId, limit);
  }
}
