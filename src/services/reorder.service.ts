import type { AppContext } from '../appContext';
import type { Item } from '../domains/catalog';
import type { Lot } from '../domains/lots';
import { toDateOnly } from '../lib/dates';
import { ceilUnits, roundQuantity } from '../lib/numbers';
import { requireBranch } from './catalog.service';

export type ReorderPriority = 'critical' | 'high' | 'medium';

export type ReorderRecommendation = {
  itemId: string;
  sku: string;
  itemName: string;
  category: string;
  availableQuantity: number;
  reorderThreshold: number;
  recommendedQuantity: number;
  unitCost: number;
  purchaseCost: number;
  priority: ReorderPriority;
  dailyDemand: number | null;
  coverageDays: number | null;
  reason: string;
};

export type ReorderSummary = {
  count: number;
  critical: number;
  high: number;
  medium: number;
  totalPurchaseCost: number;
};

export type ReorderPlan = {
  branchId: string;
  asOf: string;
  recommendations: ReorderRecommendation[];
  summary: ReorderSummary;
};

// Stock at or below 1.5x the threshold is worth topping up to 2x.
const REVIEW_FACTOR = 1.5;
const TARGET_FACTOR = 2;

const PRIORITY_RANK: Record<ReorderPriority, number> = { critical: 0, high: 1, medium: 2 };

export function reorderPriority(available: number, threshold: number): ReorderPriority {
  if (available <= threshold * 0.5) return 'critical';
  if (available <= threshold) return 'high';
  return 'medium';
}

/** Unit cost of the most recently received lot of each item, across every branch. */
function latestUnitCosts(lots: Lot[]): Map<string, number> {
  const latest = new Map<string, Lot>();
  for (const lot of lots) {
    const current = latest.get(lot.itemId);
    if (
      !current ||
      lot.receivedAt > current.receivedAt ||
      (lot.receivedAt === current.receivedAt && lot.receiptSequence > current.receiptSequence)
    ) {
      latest.set(lot.itemId, lot);
    }
  }
  return new Map([...latest].map(([itemId, lot]) => [itemId, lot.unitCost]));
}

async function dailyDemandOrNull(ctx: AppContext, itemId: string, branchId: string): Promise<number | null> {
  try {
    const estimate = await ctx.forecaster.demandEstimate(itemId, branchId, ctx.redistributionPolicy.lookaheadDays);
    return estimate !== null && Number.isFinite(estimate) && estimate >= 0 ? estimate : null;
  } catch (error) {
    console.warn(`Demand estimate unavailable for item ${itemId} at branch ${branchId}`, error);
    return null;
  }
}

function summarize(recommendations: ReorderRecommendation[]): ReorderSummary {
  const countOf = (priority: ReorderPriority) => recommendations.filter((r) => r.priority === priority).length;
  return {
    count: recommendations.length,
    critical: countOf('critical'),
    high: countOf('high'),
    medium: countOf('medium'),
    totalPurchaseCost: roundQuantity(recommendations.reduce((sum, r) => sum + r.purchaseCost, 0))
  };
}

async function recommend(
  ctx: AppContext,
  item: Item,
  branchId: string,
  available: number,
  unitCost: number
): Promise<ReorderRecommendation | null> {
  const threshold = item.reorderThreshold;
  if (available > threshold * REVIEW_FACTOR) return null;
  const recommendedQuantity = ceilUnits(threshold * TARGET_FACTOR - available);
  if (recommendedQuantity <= 0) return null;

  const dailyDemand = await dailyDemandOrNull(ctx, item.id, branchId);
  const priority = reorderPriority(available, threshold);
  return {
    itemId: item.id,
    sku: item.sku,
    itemName: item.name,
    category: item.category,
    availableQuantity: available,
    reorderThreshold: threshold,
    recommendedQuantity,
    unitCost,
    purchaseCost: roundQuantity(recommendedQuantity * unitCost),
    priority,
    dailyDemand,
    coverageDays: dailyDemand ? Math.round((available / dailyDemand) * 10) / 10 : null,
    reason: `Available ${available} units against a reorder threshold of ${threshold}`
  };
}

/**
 * Purchase recommendations for one branch: every tracked item (non-zero reorder threshold)
 * whose usable stock has fallen to 1.5x its threshold or below, topped up to twice the
 * threshold. Unit cost comes from the item's most recent receipt anywhere in the network.
 * `limit` trims the list; the summary always covers every recommendation.
 */
export async function reorderRecommendations(
  ctx: AppContext,
  branchId: string,
  options: { limit?: number } = {}
): Promise<ReorderPlan> {
  await requireBranch(ctx.catalog, branchId);
  const [items, branchLots, allLots] = await Promise.all([
    ctx.catalog.listItems(),
    ctx.ledger.listLots({ branchId }),
    ctx.ledger.listLots({ includeRetired: true })
  ]);
  const unitCosts = latestUnitCosts(allLots);

  const stockByItem = new Map<string, number>();
  for (const lot of branchLots) {
    stockByItem.set(lot.itemId, roundQuantity((stockByItem.get(lot.itemId) ?? 0) + lot.quantityRemaining));
  }

  const candidates = await Promise.all(
    items
      .filter((item) => item.reorderThreshold > 0)
      .map((item) => recommend(ctx, item, branchId, stockByItem.get(item.id) ?? 0, unitCosts.get(item.id) ?? 0))
  );
  const recommendations = candidates
    .filter((candidate): candidate is ReorderRecommendation => candidate !== null)
    .sort(
      (a, b) =>
        PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
        b.recommendedQuantity - a.recommendedQuantity ||
        a.sku.localeCompare(b.sku)
    );

  return {
    branchId,
    asOf: toDateOnly(ctx.clock()),
    recommendations: options.limit === undefined ? recommendations : recommendations.slice(0, options.limit),
    summary: summarize(recommendations)
  };
}
