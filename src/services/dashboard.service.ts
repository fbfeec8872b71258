import type { AppContext } from '../appContext';
import type { TransferSuggestion } from '../domains/lots';
import { toDateOnly } from '../lib/dates';
import { roundQuantity } from '../lib/numbers';
import { branchMetrics, expiryAlerts, type ExpiryAlert } from './alerts.service';
import { computeTransfers } from './redistribution.service';
import { reorderRecommendations, type ReorderRecommendation } from './reorder.service';

export type BranchOverview = {
  branchId: string;
  code: string;
  name: string;
  itemCount: number;
  inventoryValue: number;
  lowStockCount: number;
  recommendedPurchaseCost: number;
  criticalReorders: ReorderRecommendation[];
  valueAtRisk: number;
  urgentExpiries: ExpiryAlert[];
};

export type ConsolidatedDashboard = {
  asOf: string;
  totals: {
    branchCount: number;
    inventoryValue: number;
    recommendedPurchaseCost: number;
    valueAtRisk: number;
    redistributionOpportunities: number;
    unitsToRedistribute: number;
  };
  branches: BranchOverview[];
  topTransfers: TransferSuggestion[];
};

const EXPIRY_WINDOW_DAYS = 30;
const URGENT_EXPIRY_DAYS = 14;
const TOP_TRANSFERS = 5;

function sum(values: number[]): number {
  return roundQuantity(values.reduce((total, value) => total + value, 0));
}

// Expiry-driven moves first, soonest lot first, then the largest move.
function compareTransfers(a: TransferSuggestion, b: TransferSuggestion): number {
  if (a.rationale !== b.rationale) return a.rationale === 'expiry_risk' ? -1 : 1;
  if (a.sourceLotExpiryDate !== b.sourceLotExpiryDate) return a.sourceLotExpiryDate < b.sourceLotExpiryDate ? -1 : 1;
  return b.suggestedQuantity - a.suggestedQuantity;
}

async function branchOverview(ctx: AppContext, branch: { id: string; code: string; name: string }): Promise<BranchOverview> {
  const [metrics, reorders, expiring] = await Promise.all([
    branchMetrics(ctx, branch.id),
    reorderRecommendations(ctx, branch.id),
    expiryAlerts(ctx, { branchId: branch.id, days: EXPIRY_WINDOW_DAYS })
  ]);
  return {
    branchId: branch.id,
    code: branch.code,
    name: branch.name,
    itemCount: metrics.itemCount,
    inventoryValue: metrics.inventoryValue,
    lowStockCount: metrics.lowStockCount,
    recommendedPurchaseCost: reorders.summary.totalPurchaseCost,
    criticalReorders: reorders.recommendations.filter((r) => r.priority === 'critical'),
    valueAtRisk: sum(expiring.map((alert) => alert.valueAtRisk)),
    urgentExpiries: expiring.filter((alert) => alert.daysToExpiry <= URGENT_EXPIRY_DAYS)
  };
}

/**
 * Network-wide view: per-branch stock value, purchase needs and expiry exposure, plus the
 * redistribution opportunities across every item. Suggestions computed here are not
 * published to the audit feed.
 */
export async function consolidatedDashboard(ctx: AppContext): Promise<ConsolidatedDashboard> {
  const [branches, items] = await Promise.all([ctx.catalog.listBranches(), ctx.catalog.listItems()]);
  const [overviews, transfersByItem] = await Promise.all([
    Promise.all(branches.map((branch) => branchOverview(ctx, branch))),
    Promise.all(items.map((item) => computeTransfers(ctx, item.id)))
  ]);
  const transfers = transfersByItem.flat();

  return {
    asOf: toDateOnly(ctx.clock()),
    totals: {
      branchCount: branches.length,
      inventoryValue: sum(overviews.map((overview) => overview.inventoryValue)),
      recommendedPurchaseCost: sum(overviews.map((overview) => overview.recommendedPurchaseCost)),
      valueAtRisk: sum(overviews.map((overview) => overview.valueAtRisk)),
      redistributionOpportunities: transfers.length,
      unitsToRedistribute: sum(transfers.map((transfer) => transfer.suggestedQuantity))
    },
    branches: overviews,
    topTransfers: [...transfers].sort(compareTransfers).slice(0, TOP_TRANSFERS)
  };
}
