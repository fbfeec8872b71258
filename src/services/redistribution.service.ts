import type { AppContext } from '../appContext';
import type { RedistributionPolicy } from '../config/redistributionPolicy';
import { compareFefo, type Lot, type TransferSuggestion } from '../domains/lots';
import { daysBetween, toDateOnly } from '../lib/dates';
import { ceilUnits, floorUnits, roundQuantity } from '../lib/numbers';
import { requireItem } from './catalog.service';

export type BranchPosition = {
  branchId: string;
  /** Available (non-retired) lots of the item at this branch. */
  lots: Lot[];
  /** Units the branch is expected to dispense over the lookahead window. */
  expectedDemand: number;
};

export type PlanOptions = {
  today: string;
  expiryRiskDays: number;
  minTransferQuantity: number;
};

type SourceLot = {
  lot: Lot;
  transferable: number;
};

type Source = {
  branchId: string;
  initialExcess: number;
  excess: number;
  lots: SourceLot[];
  cursor: number;
};

type Sink = {
  branchId: string;
  initialDeficit: number;
  deficit: number;
};

function stockOf(position: BranchPosition): number {
  return roundQuantity(position.lots.reduce((sum, lot) => sum + lot.quantityRemaining, 0));
}

function headLot(source: Source): SourceLot | undefined {
  return source.lots[source.cursor];
}

function advancePastEmptyLots(source: Source) {
  while (source.cursor < source.lots.length && source.lots[source.cursor].transferable <= 0) {
    source.cursor++;
  }
}

// Highest risk first: the soonest-expiring head lot, then the bigger surplus.
function compareSources(a: Source, b: Source): number {
  const lotA = headLot(a);
  const lotB = headLot(b);
  if (lotA && lotB && lotA.lot.expiryDate !== lotB.lot.expiryDate) {
    return lotA.lot.expiryDate < lotB.lot.expiryDate ? -1 : 1;
  }
  if (a.excess !== b.excess) return b.excess - a.excess;
  return a.branchId.localeCompare(b.branchId);
}

function compareSinks(a: Sink, b: Sink): number {
  if (a.deficit !== b.deficit) return b.deficit - a.deficit;
  return a.branchId.localeCompare(b.branchId);
}

/**
 * Greedy pairing of surplus branches with short branches for one item.
 *
 * Each step pairs the highest-risk source with the largest remaining deficit and moves
 * `min(excess, deficit, head lot)` units. Both sides are re-ranked before every step, so
 * a partly filled branch yields to one that is now shorter, and once a source's head lot
 * is used up the next lot in FEFO order becomes its head. Quantities are whole
 * units. The result is advisory; nothing here touches the ledger.
 */
export function planTransfers(itemId: string, positions: BranchPosition[], options: PlanOptions): TransferSuggestion[] {
  const sources: Source[] = [];
  const sinks: Sink[] = [];

  for (const position of positions) {
    const stock = stockOf(position);
    const excess = floorUnits(stock - position.expectedDemand);
    const deficit = ceilUnits(position.expectedDemand - stock);
    if (excess > 0) {
      const source: Source = {
        branchId: position.branchId,
        initialExcess: excess,
        excess,
        lots: [...position.lots]
          .sort(compareFefo)
          .map((lot) => ({ lot, transferable: floorUnits(lot.quantityRemaining) })),
        cursor: 0
      };
      advancePastEmptyLots(source);
      if (headLot(source)) sources.push(source);
    } else if (deficit > 0) {
      sinks.push({ branchId: position.branchId, initialDeficit: deficit, deficit });
    }
  }

  const merged = new Map<string, TransferSuggestion>();

  while (sources.length > 0 && sinks.length > 0) {
    sources.sort(compareSources);
    sinks.sort(compareSinks);
    const source = sources[0];
    const sink = sinks[0];
    const head = headLot(source);
    if (!head) {
      sources.shift();
      continue;
    }

    const quantity = Math.min(source.excess, sink.deficit, head.transferable);
    const daysToExpiry = daysBetween(options.today, head.lot.expiryDate);
    const key = `${source.branchId}|${sink.branchId}|${head.lot.id}`;
    const existing = merged.get(key);
    if (existing) {
      existing.suggestedQuantity += quantity;
    } else {
      merged.set(key, {
        itemId,
        sourceBranchId: source.branchId,
        destinationBranchId: sink.branchId,
        suggestedQuantity: quantity,
        rationale: daysToExpiry <= options.expiryRiskDays ? 'expiry_risk' : 'demand_imbalance',
        sourceLotId: head.lot.id,
        sourceLotExpiryDate: head.lot.expiryDate,
        sourceExcess: source.initialExcess,
        destinationDeficit: sink.initialDeficit
      });
    }

    source.excess -= quantity;
    sink.deficit -= quantity;
    head.transferable -= quantity;
    advancePastEmptyLots(source);

    if (source.excess <= 0 || !headLot(source)) sources.shift();
    if (sink.deficit <= 0) sinks.shift();
  }

  return [...merged.values()].filter((suggestion) => suggestion.suggestedQuantity >= options.minTransferQuantity);
}

async function resolveDailyDemand(
  ctx: AppContext,
  itemId: string,
  branchId: string,
  windowDays: number
): Promise<number | null> {
  try {
    const estimate = await ctx.forecaster.demandEstimate(itemId, branchId, windowDays);
    return estimate !== null && Number.isFinite(estimate) && estimate >= 0 ? estimate : null;
  } catch (error) {
    console.warn(`Demand estimate unavailable for item ${itemId} at branch ${branchId}`, error);
    return null;
  }
}

function groupByBranch(lots: Lot[]): Map<string, Lot[]> {
  const grouped = new Map<string, Lot[]>();
  for (const lot of lots) {
    const list = grouped.get(lot.branchId) ?? [];
    list.push(lot);
    grouped.set(lot.branchId, list);
  }
  return grouped;
}

/**
 * Transfer suggestions for one item across every catalog branch, without publishing them.
 *
 * Reads an unlocked snapshot of the ledger, so suggestions may lag concurrent dispensing.
 * When the forecaster has no estimate for any branch the item yields nothing; otherwise
 * branches without one fall back to the policy default.
 */
export async function computeTransfers(
  ctx: AppContext,
  itemId: string,
  policy: RedistributionPolicy = ctx.redistributionPolicy
): Promise<TransferSuggestion[]> {
  await requireItem(ctx.catalog, itemId);
  const [branches, lots] = await Promise.all([ctx.catalog.listBranches(), ctx.ledger.snapshot(itemId)]);
  const lotsByBranch = groupByBranch(lots);
  const branchIds = new Set([...branches.map((branch) => branch.id), ...lotsByBranch.keys()]);

  const estimates = await Promise.all(
    [...branchIds].map(async (branchId) => ({
      branchId,
      dailyDemand: await resolveDailyDemand(ctx, itemId, branchId, policy.lookaheadDays)
    }))
  );
  if (estimates.every((estimate) => estimate.dailyDemand === null)) {
    return [];
  }

  const positions: BranchPosition[] = estimates.map(({ branchId, dailyDemand }) => ({
    branchId,
    lots: lotsByBranch.get(branchId) ?? [],
    expectedDemand: roundQuantity((dailyDemand ?? policy.defaultDailyDemand) * policy.lookaheadDays)
  }));

  return planTransfers(itemId, positions, {
    today: toDateOnly(ctx.clock()),
    expiryRiskDays: policy.expiryRiskDays,
    minTransferQuantity: policy.minTransferQuantity
  });
}

/** Computes the item's suggestions and publishes them to the audit feed when there are any. */
export async function suggestTransfers(
  ctx: AppContext,
  itemId: string,
  policy: RedistributionPolicy = ctx.redistributionPolicy
): Promise<TransferSuggestion[]> {
  const suggestions = await computeTransfers(ctx, itemId, policy);
  if (suggestions.length > 0) {
    await ctx.auditFeed.publish({ type: 'redistribution.suggested', data: { itemId, suggestions } }, ctx.clock());
  }
  return suggestions;
}
