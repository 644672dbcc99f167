/**
 * Plan-based monthly run quota.
 *
 * Reservations go through a per-tenant monthly counter. The first
 * reservation of a month seeds the counter with the runs the tenant has
 * already submitted since the start of that UTC month.
 */

import type { Clock } from '../../../common/host.deps.js';
import { defaultClock } from '../../../common/host.deps.js';
import type { QuotaResource, QuotaService } from '../contracts/collaborators.js';
import type { QuotaCounterKey, QuotaLedger } from '../storage/quota.ledger.js';
import type { RunRepository } from '../storage/run.repo.js';

export type PlanTier = 'starter' | 'standard' | 'pro' | 'enterprise';

export const PLAN_LIMITS: Readonly<Record<PlanTier, Record<QuotaResource, number>>> = {
  starter: { training_runs: 10 },
  standard: { training_runs: 50 },
  pro: { training_runs: 200 },
  enterprise: { training_runs: 5000 },
};

export interface PlanQuotaOptions {
  defaultTier?: PlanTier;
  tenantTiers?: Record<string, PlanTier>;
}

export function startOfUtcMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

export function utcMonthKey(date: Date): string {
  return `${date.getUTCFullYear()}-${String(date.getUTCMonth() + 1).padStart(2, '0')}`;
}

export class PlanQuotaService implements QuotaService {
  private readonly defaultTier: PlanTier;
  private readonly tenantTiers: Map<string, PlanTier>;

  constructor(
    private readonly runs: RunRepository,
    private readonly ledger: QuotaLedger,
    options: PlanQuotaOptions = {},
    private readonly clock: Clock = defaultClock
  ) {
    this.defaultTier = options.defaultTier ?? 'starter';
    this.tenantTiers = new Map(Object.entries(options.tenantTiers ?? {}));
  }

  tierOf(tenantId: string): PlanTier {
    return this.tenantTiers.get(tenantId) ?? this.defaultTier;
  }

  async checkAndReserve(tenantId: string, resource: QuotaResource, amount: number): Promise<boolean> {
    const now = this.clock.utcNow();
    const limit = PLAN_LIMITS[this.tierOf(tenantId)][resource];
    return this.ledger.tryConsume(
      this.keyFor(tenantId, resource, now),
      amount,
      limit,
      () => this.runs.countSubmittedSince(tenantId, startOfUtcMonth(now)),
      now
    );
  }

  async release(tenantId: string, resource: QuotaResource, amount: number): Promise<void> {
    const now = this.clock.utcNow();
    await this.ledger.release(this.keyFor(tenantId, resource, now), amount, now);
  }

  private keyFor(tenantId: string, resource: QuotaResource, now: Date): QuotaCounterKey {
    return { tenantId, resource, period: utcMonthKey(now) };
  }
}
