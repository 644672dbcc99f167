import { Schema, model } from 'mongoose';
import type { AuditEvent } from '../contracts/audit.types.js';

export interface AuditRepository {
  append(event: AuditEvent): Promise<void>;
  listByProject(tenantId: string, projectId: string, limit?: number): Promise<AuditEvent[]>;
}

// ═══════════════════════════════════════════════════════════════
// MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryAuditRepository implements AuditRepository {
  private readonly events: AuditEvent[] = [];

  async append(event: AuditEvent): Promise<void> {
    this.events.push(structuredClone(event));
  }

  async listByProject(tenantId: string, projectId: string, limit = 100): Promise<AuditEvent[]> {
    return this.events
      .filter((e) => e.tenantId === tenantId && e.projectId === projectId)
      .reverse()
      .slice(0, limit)
      .map((e) => structuredClone(e));
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

const AuditEventSchema = new Schema<AuditEvent>(
  {
    eventId: { type: String, required: true, unique: true },
    tenantId: { type: String, required: true },
    projectId: { type: String, required: true },
    actorId: { type: String, required: true },
    action: { type: String, required: true },
    entityType: { type: String, required: true },
    entityId: { type: String, required: true },
    details: { type: Schema.Types.Mixed, default: {} },
    createdAt: { type: Date, required: true },
  },
  { collection: 'audit_events', timestamps: false, versionKey: false }
);

AuditEventSchema.index({ tenantId: 1, projectId: 1, createdAt: -1 });

export const AuditEventModel = model<AuditEvent>('AuditEvent', AuditEventSchema);

export class MongoAuditRepository implements AuditRepository {
  async append(event: AuditEvent): Promise<void> {
    await AuditEventModel.create(event);
  }

  async listByProject(tenantId: string, projectId: string, limit = 100): Promise<AuditEvent[]> {
    const docs = await AuditEventModel.find({ tenantId, projectId })
      .sort({ createdAt: -1 })
      .limit(limit)
      .lean<AuditEvent[]>();
    return docs.map((doc) => ({
      eventId: doc.eventId,
      tenantId: doc.tenantId,
      projectId: doc.projectId,
      actorId: doc.actorId,
      action: doc.action,
      entityType: doc.entityType,
      entityId: doc.entityId,
      details: doc.details ?? {},
      createdAt: doc.createdAt,
    }));
  }
}
