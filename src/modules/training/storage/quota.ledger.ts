/**
 * Quota counters, one document per tenant, resource and UTC month.
 *
 * A reservation is a single conditional increment: it applies only while
 * `used + amount <= limit`, so two submits racing at the limit cannot
 * both succeed.
 */

import { Schema, model } from 'mongoose';
import { isDuplicateKeyError } from '../../../db/mongoose.js';
import type { QuotaResource } from '../contracts/collaborators.js';

export interface QuotaCounterKey {
  tenantId: string;
  resource: QuotaResource;
  period: string;             // YYYY-MM (UTC)
}

export interface QuotaCounter extends QuotaCounterKey {
  used: number;
  updatedAt: Date;
}

export interface QuotaLedger {
  /**
   * Adds `amount` if the counter stays within `limit`. A counter touched
   * for the first time starts from `baseline()`.
   */
  tryConsume(
    key: QuotaCounterKey,
    amount: number,
    limit: number,
    baseline: () => Promise<number>,
    now: Date
  ): Promise<boolean>;
  release(key: QuotaCounterKey, amount: number, now: Date): Promise<void>;
  get(key: QuotaCounterKey): Promise<number | null>;
}

function keyOf(key: QuotaCounterKey): string {
  return `${key.tenantId}|${key.resource}|${key.period}`;
}

// ═══════════════════════════════════════════════════════════════
// MEMORY
// ═══════════════════════════════════════════════════════════════

export class InMemoryQuotaLedger implements QuotaLedger {
  private readonly counters = new Map<string, number>();

  async tryConsume(
    key: QuotaCounterKey,
    amount: number,
    limit: number,
    baseline: () => Promise<number>
  ): Promise<boolean> {
    const id = keyOf(key);
    if (!this.counters.has(id)) {
      const seeded = await baseline();
      if (!this.counters.has(id)) this.counters.set(id, seeded);
    }

    // check-and-increment with no await in between
    const used = this.counters.get(id) ?? 0;
    if (used + amount > limit) return false;
    this.counters.set(id, used + amount);
    return true;
  }

  async release(key: QuotaCounterKey, amount: number): Promise<void> {
    const id = keyOf(key);
    const used = this.counters.get(id);
    if (used === undefined) return;
    this.counters.set(id, Math.max(0, used - amount));
  }

  async get(key: QuotaCounterKey): Promise<number | null> {
    return this.counters.get(keyOf(key)) ?? null;
  }
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

const QuotaCounterSchema = new Schema<QuotaCounter>(
  {
    tenantId: { type: String, required: true },
    resource: { type: String, required: true },
    period: { type: String, required: true },
    used: { type: Number, required: true, default: 0 },
    updatedAt: { type: Date, required: true },
  },
  { collection: 'quota_counters', timestamps: false, versionKey: false }
);

QuotaCounterSchema.index({ tenantId: 1, resource: 1, period: 1 }, { unique: true });

export const QuotaCounterModel = model<QuotaCounter>('QuotaCounter', QuotaCounterSchema);

export class MongoQuotaLedger implements QuotaLedger {
  async tryConsume(
    key: QuotaCounterKey,
    amount: number,
    limit: number,
    baseline: () => Promise<number>,
    now: Date
  ): Promise<boolean> {
    const filter = { tenantId: key.tenantId, resource: key.resource, period: key.period };

    if (!(await QuotaCounterModel.exists(filter))) {
      const seeded = await baseline();
      try {
        await QuotaCounterModel.updateOne(
          filter,
          { $setOnInsert: { ...filter, used: seeded, updatedAt: now } },
          { upsert: true }
        );
      } catch (err) {
        // a concurrent first reservation created the counter
        if (!isDuplicateKeyError(err)) throw err;
      }
    }

    const doc = await QuotaCounterModel.findOneAndUpdate(
      { ...filter, used: { $lte: limit - amount } },
      { $inc: { used: amount }, $set: { updatedAt: now } },
      { new: true }
    ).lean<QuotaCounter>();
    return doc !== null;
  }

  async release(key: QuotaCounterKey, amount: number, now: Date): Promise<void> {
    await QuotaCounterModel.updateOne(
      { tenantId: key.tenantId, resource: key.resource, period: key.period, used: { $gte: amount } },
      { $inc: { used: -amount }, $set: { updatedAt: now } }
    );
  }

  async get(key: QuotaCounterKey): Promise<number | null> {
    const doc = await QuotaCounterModel.findOne({
      tenantId: key.tenantId,
      resource: key.resource,
      period: key.period,
    }).lean<QuotaCounter>();
    return doc ? doc.used : null;
  }
}
