import { afterEach, describe, expect, it, vi } from 'vitest';
import { createMemoryContext } from '../appContext';
import { MemoryAuditFeed } from '../domains/lots';
import { REDISTRIBUTION_SCAN_JOB, registerRedistributionScanJob, runRedistributionScan } from './redistributionScan.job';
import { getJobDefinitions, registerJob, stopScheduler, triggerJob } from './scheduler';

const clock = () => new Date('2025-01-01T09:00:00.000Z');

async function setup() {
  const auditFeed = new MemoryAuditFeed();
  const ctx = createMemoryContext({ clock, auditFeed });
  const item = await ctx.catalog.createItem({ sku: 'MET-850', name: 'Metformin 850mg', category: 'endocrine' });
  await ctx.catalog.createItem({ sku: 'ZZZ-1', name: 'Unstocked', category: 'misc' });
  const source = await ctx.catalog.createBranch({ code: 'SRC', name: 'Source' });
  const sink = await ctx.catalog.createBranch({ code: 'DST', name: 'Destination' });
  await ctx.ledger.receive({ itemId: item.id, branchId: source.id, quantity: 20, expiryDate: '2025-01-15', unitCost: 1 });
  await ctx.forecaster.upsert({ itemId: item.id, branchId: sink.id, windowDays: 30, dailyRate: 0.5 });
  return { ctx, auditFeed };
}

describe('runRedistributionScan', () => {
  afterEach(() => {
    stopScheduler();
  });

  it('runs the advisor for every item and skips overlapping runs', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { ctx, auditFeed } = await setup();

    const [summary, overlapping] = await Promise.all([runRedistributionScan(ctx), runRedistributionScan(ctx)]);

    expect(summary).toEqual({ itemsScanned: 2, itemsWithSuggestions: 1, suggestionCount: 1, failedItems: [] });
    expect(overlapping).toBeNull();
    expect(warn).toHaveBeenCalledWith('⚠️  Redistribution scan already running, skipping');
    expect(auditFeed.events.map((event) => event.type)).toEqual(['redistribution.suggested']);
  });

  it('can be triggered by hand while its schedule is disabled', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const { ctx, auditFeed } = await setup();

    registerRedistributionScanJob(ctx, '0 3 * * *', false);
    expect(getJobDefinitions().map((job) => [job.name, job.enabled])).toEqual([[REDISTRIBUTION_SCAN_JOB, false]]);

    await triggerJob(REDISTRIBUTION_SCAN_JOB);
    expect(auditFeed.events).toHaveLength(1);
  });

  it('rejects invalid cron expressions', () => {
    expect(() => registerJob('broken', 'not a cron', async () => undefined)).toThrow(
      'Invalid cron expression for job "broken": not a cron'
    );
  });
});
