import { describe, expect, it } from 'vitest';
import { createMemoryContext } from '../appContext';
import { MemoryAuditFeed } from '../domains/lots';
import { consolidatedDashboard } from './dashboard.service';

const clock = () => new Date('2025-01-01T09:00:00.000Z');

async function setup() {
  const auditFeed = new MemoryAuditFeed();
  const ctx = createMemoryContext({ clock, auditFeed });
  const para = await ctx.catalog.createItem({ sku: 'P-1', name: 'Paracetamol 500mg', category: 'analgesic', reorderThreshold: 10 });
  const omep = await ctx.catalog.createItem({ sku: 'Q-1', name: 'Omeprazole 20mg', category: 'gastro', reorderThreshold: 20 });
  const lora = await ctx.catalog.createItem({ sku: 'R-1', name: 'Loratadine 10mg', category: 'antihistamine', reorderThreshold: 4 });
  const north = await ctx.catalog.createBranch({ code: 'N', name: 'North' });
  const south = await ctx.catalog.createBranch({ code: 'S', name: 'South' });

  await ctx.ledger.receive({ itemId: para.id, branchId: north.id, quantity: 4, expiryDate: '2025-06-01', unitCost: 2 });
  await ctx.ledger.receive({ itemId: omep.id, branchId: north.id, quantity: 25, expiryDate: '2025-06-01', unitCost: 1 });
  await ctx.ledger.receive({ itemId: lora.id, branchId: north.id, quantity: 10, expiryDate: '2025-06-01', unitCost: 1 });
  const expiring = await ctx.ledger.receive({
    itemId: para.id,
    branchId: south.id,
    quantity: 30,
    expiryDate: '2025-01-05',
    unitCost: 3,
    receivedAt: new Date('2025-01-01T10:00:00.000Z')
  });
  await ctx.forecaster.upsert({ itemId: para.id, branchId: north.id, windowDays: 30, dailyRate: 2 });

  return { ctx, auditFeed, para, omep, lora, north, south, expiring };
}

describe('consolidatedDashboard', () => {
  it('rolls branch stock, purchase needs, expiry exposure and transfers into one view', async () => {
    const { ctx, para, omep, lora, north, south, expiring } = await setup();

    const dashboard = await consolidatedDashboard(ctx);

    expect(dashboard.asOf).toBe('2025-01-01');
    expect(dashboard.totals).toEqual({
      branchCount: 2,
      inventoryValue: 133,
      recommendedPurchaseCost: 111,
      valueAtRisk: 90,
      redistributionOpportunities: 1,
      unitsToRedistribute: 30
    });

    const byCode = new Map(dashboard.branches.map((branch) => [branch.code, branch]));
    expect(byCode.get('N')).toMatchObject({
      branchId: north.id,
      itemCount: 3,
      inventoryValue: 43,
      lowStockCount: 1,
      recommendedPurchaseCost: 63,
      valueAtRisk: 0,
      urgentExpiries: []
    });
    expect(byCode.get('N')?.criticalReorders.map((r) => r.itemId)).toEqual([para.id]);
    expect(byCode.get('S')).toMatchObject({
      branchId: south.id,
      itemCount: 1,
      inventoryValue: 90,
      lowStockCount: 2,
      recommendedPurchaseCost: 48,
      valueAtRisk: 90
    });
    expect(byCode.get('S')?.criticalReorders.map((r) => [r.itemId, r.recommendedQuantity])).toEqual([
      [omep.id, 40],
      [lora.id, 8]
    ]);
    expect(byCode.get('S')?.urgentExpiries.map((alert) => [alert.lotId, alert.daysToExpiry])).toEqual([[expiring.id, 4]]);

    expect(dashboard.topTransfers).toEqual([
      expect.objectContaining({
        itemId: para.id,
        sourceBranchId: south.id,
        destinationBranchId: north.id,
        suggestedQuantity: 30,
        rationale: 'expiry_risk'
      })
    ]);
  });

  it('does not publish the transfers it reports', async () => {
    const { ctx, auditFeed } = await setup();

    await consolidatedDashboard(ctx);

    expect(auditFeed.events).toEqual([]);
  });
});
