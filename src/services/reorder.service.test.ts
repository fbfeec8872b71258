import { describe, expect, it } from 'vitest';
import { createMemoryContext } from '../appContext';
import { reorderPriority, reorderRecommendations } from './reorder.service';

const clock = () => new Date('2025-01-01T09:00:00.000Z');

async function setup() {
  const ctx = createMemoryContext({ clock });
  const para = await ctx.catalog.createItem({ sku: 'P-1', name: 'Paracetamol 500mg', category: 'analgesic', reorderThreshold: 10 });
  const omep = await ctx.catalog.createItem({ sku: 'Q-1', name: 'Omeprazole 20mg', category: 'gastro', reorderThreshold: 20 });
  const lora = await ctx.catalog.createItem({ sku: 'R-1', name: 'Loratadine 10mg', category: 'antihistamine', reorderThreshold: 4 });
  await ctx.catalog.createItem({ sku: 'U-1', name: 'Gauze pads', category: 'supplies' });
  const north = await ctx.catalog.createBranch({ code: 'N', name: 'North' });
  const south = await ctx.catalog.createBranch({ code: 'S', name: 'South' });

  await ctx.ledger.receive({ itemId: para.id, branchId: north.id, quantity: 4, expiryDate: '2025-06-01', unitCost: 2 });
  await ctx.ledger.receive({ itemId: omep.id, branchId: north.id, quantity: 25, expiryDate: '2025-06-01', unitCost: 1 });
  await ctx.ledger.receive({ itemId: lora.id, branchId: north.id, quantity: 10, expiryDate: '2025-06-01', unitCost: 1 });
  await ctx.ledger.receive({
    itemId: para.id,
    branchId: south.id,
    quantity: 30,
    expiryDate: '2025-01-05',
    unitCost: 3,
    receivedAt: new Date('2025-01-01T10:00:00.000Z')
  });
  await ctx.forecaster.upsert({ itemId: para.id, branchId: north.id, windowDays: 30, dailyRate: 2 });

  return { ctx, para, omep, lora, north, south };
}

describe('reorderPriority', () => {
  it('bands stock against the threshold', () => {
    expect([reorderPriority(5, 10), reorderPriority(10, 10), reorderPriority(15, 10)]).toEqual([
      'critical',
      'high',
      'medium'
    ]);
  });
});

describe('reorderRecommendations', () => {
  it('tops tracked items up to twice their threshold using the latest unit cost', async () => {
    const { ctx, para, omep, north } = await setup();

    const plan = await reorderRecommendations(ctx, north.id);

    expect(plan.asOf).toBe('2025-01-01');
    expect(plan.recommendations).toEqual([
      {
        itemId: para.id,
        sku: 'P-1',
        itemName: 'Paracetamol 500mg',
        category: 'analgesic',
        availableQuantity: 4,
        reorderThreshold: 10,
        recommendedQuantity: 16,
        unitCost: 3,
        purchaseCost: 48,
        priority: 'critical',
        dailyDemand: 2,
        coverageDays: 2,
        reason: 'Available 4 units against a reorder threshold of 10'
      },
      expect.objectContaining({
        itemId: omep.id,
        recommendedQuantity: 15,
        purchaseCost: 15,
        priority: 'medium',
        dailyDemand: null,
        coverageDays: null
      })
    ]);
    expect(plan.summary).toEqual({ count: 2, critical: 1, high: 0, medium: 1, totalPurchaseCost: 63 });
  });

  it('trims the list but summarizes every recommendation', async () => {
    const { ctx, para, north } = await setup();

    const plan = await reorderRecommendations(ctx, north.id, { limit: 1 });

    expect(plan.recommendations.map((r) => r.itemId)).toEqual([para.id]);
    expect(plan.summary.count).toBe(2);
  });

  it('fails for an unknown branch', async () => {
    const { ctx } = await setup();
    await expect(reorderRecommendations(ctx, '00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      code: 'BRANCH_NOT_FOUND'
    });
  });
});
