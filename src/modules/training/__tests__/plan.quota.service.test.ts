import { describe, expect, it } from 'vitest';
import { trainingRun } from '../../pipeline/__tests__/pipeline.fixtures.js';
import { PLAN_LIMITS, PlanQuotaService, startOfUtcMonth, utcMonthKey } from '../services/plan.quota.service.js';
import { InMemoryQuotaLedger } from '../storage/quota.ledger.js';
import { InMemoryRunRepository } from '../storage/run.memory.repo.js';

const NOW = new Date('2026-03-15T12:00:00Z');
const clock = { now: () => NOW.getTime(), utcNow: () => NOW };

function run(runId: string, tenantId: string, createdAt: Date) {
  return trainingRun({ runId, tenantId, createdAt });
}

describe('PlanQuotaService', () => {
  it('computes the start and key of the UTC month', () => {
    expect(startOfUtcMonth(NOW).toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(utcMonthKey(NOW)).toBe('2026-03');
  });

  it('resolves per-tenant tiers with a default', () => {
    const quota = new PlanQuotaService(
      new InMemoryRunRepository(),
      new InMemoryQuotaLedger(),
      { tenantTiers: { big: 'pro' } },
      clock
    );
    expect(quota.tierOf('big')).toBe('pro');
    expect(quota.tierOf('other')).toBe('starter');
  });

  it('seeds the counter from this month and this tenant only', async () => {
    const runs = new InMemoryRunRepository();
    const limit = PLAN_LIMITS.starter.training_runs;
    for (let i = 0; i < limit - 1; i++) {
      await runs.insert(run(`run_${i}`, 'tenant-a', new Date('2026-03-02T00:00:00Z')));
    }
    await runs.insert(run('run_old', 'tenant-a', new Date('2026-02-27T00:00:00Z')));
    await runs.insert(run('run_other', 'tenant-b', new Date('2026-03-03T00:00:00Z')));

    const ledger = new InMemoryQuotaLedger();
    const quota = new PlanQuotaService(runs, ledger, {}, clock);

    expect(await quota.checkAndReserve('tenant-a', 'training_runs', 1)).toBe(true);
    expect(await ledger.get({ tenantId: 'tenant-a', resource: 'training_runs', period: '2026-03' })).toBe(10);
    expect(await quota.checkAndReserve('tenant-a', 'training_runs', 1)).toBe(false);
    expect(await quota.checkAndReserve('tenant-b', 'training_runs', 1)).toBe(true);
    expect(await ledger.get({ tenantId: 'tenant-b', resource: 'training_runs', period: '2026-03' })).toBe(2);
  });

  it('grants exactly one of two concurrent reservations for the last slot', async () => {
    const runs = new InMemoryRunRepository();
    for (let i = 0; i < PLAN_LIMITS.starter.training_runs - 1; i++) {
      await runs.insert(run(`run_${i}`, 'tenant-a', new Date('2026-03-02T00:00:00Z')));
    }
    const quota = new PlanQuotaService(runs, new InMemoryQuotaLedger(), {}, clock);

    const granted = await Promise.all([
      quota.checkAndReserve('tenant-a', 'training_runs', 1),
      quota.checkAndReserve('tenant-a', 'training_runs', 1),
    ]);

    expect(granted.filter(Boolean)).toHaveLength(1);
  });

  it('gives a released slot back', async () => {
    const ledger = new InMemoryQuotaLedger();
    const quota = new PlanQuotaService(new InMemoryRunRepository(), ledger, { defaultTier: 'starter' }, clock);
    for (let i = 0; i < PLAN_LIMITS.starter.training_runs; i++) {
      expect(await quota.checkAndReserve('tenant-a', 'training_runs', 1)).toBe(true);
    }
    expect(await quota.checkAndReserve('tenant-a', 'training_runs', 1)).toBe(false);

    await quota.release('tenant-a', 'training_runs', 1);

    expect(await quota.checkAndReserve('tenant-a', 'training_runs', 1)).toBe(true);
  });
});
