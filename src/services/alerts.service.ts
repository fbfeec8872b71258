import type { AppContext } from '../appContext';
import type { Item } from '../domains/catalog';
import type { Lot } from '../domains/lots';
import { addDays, daysBetween, toDateOnly } from '../lib/dates';
import { roundQuantity } from '../lib/numbers';
import { requireBranch } from './catalog.service';

export type ExpiryPriority = 'critical' | 'high' | 'medium' | 'low';

export type ExpiryAlert = {
  lotId: string;
  lotNumber: string | null;
  itemId: string;
  sku: string | null;
  itemName: string | null;
  branchId: string;
  expiryDate: string;
  daysToExpiry: number;
  quantityRemaining: number;
  valueAtRisk: number;
  priority: ExpiryPriority;
};

export type LowStockAlert = {
  itemId: string;
  sku: string;
  itemName: string;
  branchId: string;
  availableQuantity: number;
  reorderThreshold: number;
  shortfall: number;
};

export type BranchMetrics = {
  branchId: string;
  asOf: string;
  itemCount: number;
  lotCount: number;
  totalQuantity: number;
  inventoryValue: number;
  lowStockCount: number;
  expiringWithin30Days: number;
};

const EXPIRING_SOON_DAYS = 30;

export function expiryPriority(daysToExpiry: number): ExpiryPriority {
  if (daysToExpiry <= 7) return 'critical';
  if (daysToExpiry <= 14) return 'high';
  if (daysToExpiry <= 21) return 'medium';
  return 'low';
}

function indexItems(items: Item[]): Map<string, Item> {
  return new Map(items.map((item) => [item.id, item]));
}

function sumQuantity(lots: Lot[]): number {
  return roundQuantity(lots.reduce((sum, lot) => sum + lot.quantityRemaining, 0));
}

/**
 * Usable lots that expire within `days` (inclusive), soonest first. Lots already past
 * expiry are retired and never appear here.
 */
export async function expiryAlerts(
  ctx: AppContext,
  options: { branchId?: string; days: number }
): Promise<ExpiryAlert[]> {
  if (options.branchId) await requireBranch(ctx.catalog, options.branchId);
  const today = toDateOnly(ctx.clock());
  const horizon = addDays(today, options.days);
  const [lots, items] = await Promise.all([
    ctx.ledger.listLots({ branchId: options.branchId }),
    ctx.catalog.listItems()
  ]);
  const itemsById = indexItems(items);

  return lots
    .filter((lot) => lot.expiryDate <= horizon)
    .map((lot) => {
      const item = itemsById.get(lot.itemId);
      const daysToExpiry = daysBetween(today, lot.expiryDate);
      return {
        lotId: lot.id,
        lotNumber: lot.lotNumber,
        itemId: lot.itemId,
        sku: item?.sku ?? null,
        itemName: item?.name ?? null,
        branchId: lot.branchId,
        expiryDate: lot.expiryDate,
        daysToExpiry,
        quantityRemaining: lot.quantityRemaining,
        valueAtRisk: roundQuantity(lot.quantityRemaining * lot.unitCost),
        priority: expiryPriority(daysToExpiry)
      };
    });
}

/**
 * (item, branch) pairs whose usable stock is at or below the item's reorder threshold.
 * Items with a zero threshold are not tracked.
 */
export async function lowStockAlerts(ctx: AppContext, options: { branchId?: string } = {}): Promise<LowStockAlert[]> {
  const [items, branches, lots] = await Promise.all([
    ctx.catalog.listItems(),
    options.branchId
      ? requireBranch(ctx.catalog, options.branchId).then((branch) => [branch])
      : ctx.catalog.listBranches(),
    ctx.ledger.listLots({ branchId: options.branchId })
  ]);

  const stockByKey = new Map<string, number>();
  for (const lot of lots) {
    const key = `${lot.itemId}:${lot.branchId}`;
    stockByKey.set(key, roundQuantity((stockByKey.get(key) ?? 0) + lot.quantityRemaining));
  }

  const alerts: LowStockAlert[] = [];
  for (const item of items) {
    if (item.reorderThreshold <= 0) continue;
    for (const branch of branches) {
      const available = stockByKey.get(`${item.id}:${branch.id}`) ?? 0;
      if (available > item.reorderThreshold) continue;
      alerts.push({
        itemId: item.id,
        sku: item.sku,
        itemName: item.name,
        branchId: branch.id,
        availableQuantity: available,
        reorderThreshold: item.reorderThreshold,
        shortfall: roundQuantity(item.reorderThreshold - available)
      });
    }
  }
  return alerts;
}

export async function branchMetrics(ctx: AppContext, branchId: string): Promise<BranchMetrics> {
  await requireBranch(ctx.catalog, branchId);
  const today = toDateOnly(ctx.clock());
  const soon = addDays(today, EXPIRING_SOON_DAYS);
  const [lots, lowStock] = await Promise.all([
    ctx.ledger.listLots({ branchId }),
    lowStockAlerts(ctx, { branchId })
  ]);

  return {
    branchId,
    asOf: today,
    itemCount: new Set(lots.map((lot) => lot.itemId)).size,
    lotCount: lots.length,
    totalQuantity: sumQuantity(lots),
    inventoryValue: roundQuantity(lots.reduce((sum, lot) => sum + lot.quantityRemaining * lot.unitCost, 0)),
    lowStockCount: lowStock.length,
    expiringWithin30Days: lots.filter((lot) => lot.expiryDate <= soon).length
  };
}
