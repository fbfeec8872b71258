import { describe, expect, it, vi } from 'vitest';
import { createMemoryContext, type AppContext } from '../appContext';
import { StaticDemandForecaster } from '../domains/forecasting';
import { MemoryAuditFeed, type Lot } from '../domains/lots';
import { planTransfers, suggestTransfers, type BranchPosition } from './redistribution.service';

const clock = () => new Date('2025-01-01T09:00:00.000Z');
const options = { today: '2025-01-01', expiryRiskDays: 30, minTransferQuantity: 1 };

let sequence = 0;
function makeLot(branchId: string, quantity: number, expiryDate: string, id = `${branchId}-${expiryDate}`): Lot {
  sequence++;
  return {
    id,
    itemId: 'item',
    branchId,
    lotNumber: null,
    quantityReceived: quantity,
    quantityRemaining: quantity,
    expiryDate,
    receivedAt: '2024-12-01T00:00:00.000Z',
    receiptSequence: sequence,
    unitCost: 1
  };
}

function position(branchId: string, lots: Lot[], expectedDemand: number): BranchPosition {
  return { branchId, lots, expectedDemand };
}

describe('planTransfers', () => {
  it('labels transfers from lots far from expiry as demand imbalance', () => {
    const suggestions = planTransfers(
      'item',
      [position('A', [makeLot('A', 40, '2025-06-01')], 0), position('B', [], 10)],
      options
    );

    expect(suggestions).toEqual([
      {
        itemId: 'item',
        sourceBranchId: 'A',
        destinationBranchId: 'B',
        suggestedQuantity: 10,
        rationale: 'demand_imbalance',
        sourceLotId: 'A-2025-06-01',
        sourceLotExpiryDate: '2025-06-01',
        sourceExcess: 40,
        destinationDeficit: 10
      }
    ]);
  });

  it('moves to the next lot once the head lot is used up', () => {
    const suggestions = planTransfers(
      'item',
      [position('A', [makeLot('A', 20, '2025-03-01'), makeLot('A', 3, '2025-01-05')], 0), position('B', [], 10)],
      options
    );

    expect(suggestions.map((s) => [s.sourceLotId, s.suggestedQuantity, s.rationale])).toEqual([
      ['A-2025-01-05', 3, 'expiry_risk'],
      ['A-2025-03-01', 7, 'demand_imbalance']
    ]);
  });

  it('serves the soonest-expiring surplus first', () => {
    const suggestions = planTransfers(
      'item',
      [
        position('A', [makeLot('A', 5, '2025-01-10')], 0),
        position('C', [makeLot('C', 5, '2025-01-03')], 0),
        position('B', [], 5)
      ],
      options
    );

    expect(suggestions.map((s) => [s.sourceBranchId, s.destinationBranchId, s.suggestedQuantity])).toEqual([
      ['C', 'B', 5]
    ]);
  });

  it('fills the largest deficit first', () => {
    const suggestions = planTransfers(
      'item',
      [position('A', [makeLot('A', 5, '2025-06-01')], 0), position('D', [], 3), position('B', [], 8)],
      options
    );

    expect(suggestions.map((s) => [s.destinationBranchId, s.suggestedQuantity])).toEqual([['B', 5]]);
  });

  it('re-ranks a partly filled deficit against the other short branches', () => {
    const suggestions = planTransfers(
      'item',
      [
        position('A', [makeLot('A', 3, '2025-01-05'), makeLot('A', 20, '2025-06-01')], 14),
        position('B', [], 8),
        position('C', [], 6)
      ],
      options
    );

    expect(suggestions.map((s) => [s.destinationBranchId, s.sourceLotId, s.suggestedQuantity])).toEqual([
      ['B', 'A-2025-01-05', 3],
      ['C', 'A-2025-06-01', 6]
    ]);
  });

  it('uses whole units only', () => {
    const suggestions = planTransfers(
      'item',
      [position('A', [makeLot('A', 10.5, '2025-06-01')], 0.2), position('B', [], 12.3)],
      options
    );

    expect(suggestions.map((s) => [s.suggestedQuantity, s.sourceExcess, s.destinationDeficit])).toEqual([[10, 10, 13]]);
  });

  it('drops suggestions below the minimum transfer quantity', () => {
    const suggestions = planTransfers(
      'item',
      [position('A', [makeLot('A', 2, '2025-01-05'), makeLot('A', 10, '2025-04-01')], 0), position('B', [], 8)],
      { ...options, minTransferQuantity: 5 }
    );

    expect(suggestions.map((s) => [s.sourceLotId, s.suggestedQuantity])).toEqual([['A-2025-04-01', 6]]);
  });

  it('suggests nothing when no branch is short', () => {
    expect(planTransfers('item', [position('A', [makeLot('A', 5, '2025-06-01')], 0), position('B', [], 0)], options)).toEqual(
      []
    );
  });
});

async function setup(forecaster = new StaticDemandForecaster(clock)) {
  const auditFeed = new MemoryAuditFeed();
  const ctx = createMemoryContext({ clock, auditFeed, forecaster });
  const item = await ctx.catalog.createItem({ sku: 'INS-100', name: 'Insulin 100IU', category: 'endocrine' });
  const branchA = await ctx.catalog.createBranch({ code: 'A', name: 'Branch A' });
  const branchB = await ctx.catalog.createBranch({ code: 'B', name: 'Branch B' });
  return { ctx, auditFeed, forecaster, item, branchA, branchB };
}

function receive(ctx: AppContext, itemId: string, branchId: string, quantity: number, expiryDate: string) {
  return ctx.ledger.receive({ itemId, branchId, quantity, expiryDate, unitCost: 4 });
}

describe('suggestTransfers', () => {
  it('moves stock about to expire toward the branch that will use it', async () => {
    const { ctx, auditFeed, forecaster, item, branchA, branchB } = await setup();
    const lot = await receive(ctx, item.id, branchA.id, 50, '2025-01-04');
    await forecaster.upsert({ itemId: item.id, branchId: branchA.id, windowDays: 30, dailyRate: 0 });
    await forecaster.upsert({ itemId: item.id, branchId: branchB.id, windowDays: 30, dailyRate: 1 });

    const suggestions = await suggestTransfers(ctx, item.id);

    expect(suggestions).toEqual([
      {
        itemId: item.id,
        sourceBranchId: branchA.id,
        destinationBranchId: branchB.id,
        suggestedQuantity: 30,
        rationale: 'expiry_risk',
        sourceLotId: lot.id,
        sourceLotExpiryDate: '2025-01-04',
        sourceExcess: 50,
        destinationDeficit: 30
      }
    ]);
    expect(auditFeed.events).toEqual([
      {
        type: 'redistribution.suggested',
        data: { itemId: item.id, suggestions },
        occurredAt: '2025-01-01T09:00:00.000Z'
      }
    ]);
    expect((await ctx.ledger.getLot(lot.id))?.quantityRemaining).toBe(50);
  });

  it('returns nothing when no branch has an estimate', async () => {
    const { ctx, auditFeed, item, branchA } = await setup();
    await receive(ctx, item.id, branchA.id, 50, '2025-01-04');

    expect(await suggestTransfers(ctx, item.id)).toEqual([]);
    expect(auditFeed.events).toEqual([]);
  });

  it('treats a failing estimate as the default demand', async () => {
    class FailingForBranch extends StaticDemandForecaster {
      failingBranchId = '';

      async demandEstimate(itemId: string, branchId: string, windowDays: number) {
        if (branchId === this.failingBranchId) throw new Error('model offline');
        return super.demandEstimate(itemId, branchId, windowDays);
      }
    }
    const forecaster = new FailingForBranch(clock);
    const { ctx, item, branchA, branchB } = await setup(forecaster);
    forecaster.failingBranchId = branchA.id;
    await receive(ctx, item.id, branchA.id, 12, '2025-05-01');
    await forecaster.upsert({ itemId: item.id, branchId: branchB.id, windowDays: 30, dailyRate: 0.25 });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const suggestions = await suggestTransfers(ctx, item.id);

    expect(suggestions.map((s) => [s.sourceBranchId, s.destinationBranchId, s.suggestedQuantity, s.rationale])).toEqual([
      [branchA.id, branchB.id, 8, 'demand_imbalance']
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('fails for an unknown item', async () => {
    const { ctx } = await setup();
    await expect(suggestTransfers(ctx, '00000000-0000-4000-8000-000000000000')).rejects.toMatchObject({
      code: 'ITEM_NOT_FOUND'
    });
  });
});
