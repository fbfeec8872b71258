import type { AppContext } from '../appContext';
import {
  invalidInput,
  isLotLedgerError,
  type DispenseLine,
  type DispenseRecord,
  type DispenseRecordFilter,
  type LotLedgerErrorCode
} from '../domains/lots';
import { isPositiveQuantity, MAX_QUANTITY, roundQuantity, toNumber } from '../lib/numbers';
import { requireItemAndBranch } from './catalog.service';

export type DispenseRequest = {
  itemId: string;
  branchId: string;
  quantity: number;
  reference?: string | null;
};

export type BatchDispenseOutcome =
  | { index: number; status: 'fulfilled' | 'partial'; record: DispenseRecord }
  | {
      index: number;
      status: 'rejected';
      error: { code: LotLedgerErrorCode | 'INTERNAL_ERROR'; message: string; details?: Record<string, unknown> };
    };

export type BatchDispenseResult = {
  fulfilled: number;
  partial: number;
  rejected: number;
  results: BatchDispenseOutcome[];
};

/**
 * Draws the requested quantity from the branch's lots in FEFO order.
 *
 * The whole scan-and-deduct runs inside the ledger's exclusive section for the
 * (item, branch) key, and the record is appended in that same section. Running out of
 * lots is reported through `unfulfilledQuantity`, never thrown.
 */
export async function allocate(ctx: AppContext, request: DispenseRequest): Promise<DispenseRecord> {
  const requested = roundQuantity(toNumber(request.quantity));
  if (!isPositiveQuantity(requested)) {
    throw invalidInput('Requested quantity must be greater than zero.', { field: 'quantity' });
  }
  if (requested > MAX_QUANTITY) {
    throw invalidInput('Requested quantity exceeds the storable range.', { field: 'quantity', max: MAX_QUANTITY });
  }
  await requireItemAndBranch(ctx.catalog, request.itemId, request.branchId);

  const record = await ctx.ledger.runExclusive(request.itemId, request.branchId, async (session) => {
    const lots = await session.availableLots(request.itemId, request.branchId);
    const lines: DispenseLine[] = [];
    let remaining = requested;
    let totalCost = 0;

    for (const lot of lots) {
      if (!isPositiveQuantity(remaining)) break;
      const draw = roundQuantity(Math.min(remaining, lot.quantityRemaining));
      if (!isPositiveQuantity(draw)) continue;

      try {
        await session.deduct(lot.id, draw);
      } catch (error) {
        if (isLotLedgerError(error) && error.code === 'INSUFFICIENT_STOCK') {
          continue;
        }
        throw error;
      }

      lines.push({
        lotId: lot.id,
        lotNumber: lot.lotNumber,
        expiryDate: lot.expiryDate,
        quantityDrawn: draw,
        unitCost: lot.unitCost
      });
      totalCost = roundQuantity(totalCost + draw * lot.unitCost);
      remaining = roundQuantity(remaining - draw);
    }

    return session.appendDispenseRecord({
      itemId: request.itemId,
      branchId: request.branchId,
      requestedQuantity: requested,
      lines,
      unfulfilledQuantity: isPositiveQuantity(remaining) ? remaining : 0,
      totalCost,
      reference: request.reference ?? null,
      dispensedAt: ctx.clock()
    });
  });

  await ctx.auditFeed.publish({ type: 'dispense.recorded', data: record }, ctx.clock());
  return record;
}

/**
 * Processes independent requests concurrently. Requests for the same (item, branch) key
 * still serialize through the ledger; a failed request never aborts the others.
 */
export async function allocateBatch(ctx: AppContext, requests: DispenseRequest[]): Promise<BatchDispenseResult> {
  const results = await Promise.all(
    requests.map(async (request, index): Promise<BatchDispenseOutcome> => {
      try {
        const record = await allocate(ctx, request);
        return { index, status: record.unfulfilledQuantity > 0 ? 'partial' : 'fulfilled', record };
      } catch (error) {
        if (isLotLedgerError(error)) {
          return {
            index,
            status: 'rejected',
            error: { code: error.code, message: error.details.message, details: error.details }
          };
        }
        console.error(`Batch dispense request ${index} failed`, error);
        return {
          index,
          status: 'rejected',
          error: { code: 'INTERNAL_ERROR', message: 'Failed to dispense this request.' }
        };
      }
    })
  );

  return {
    fulfilled: results.filter((result) => result.status === 'fulfilled').length,
    partial: results.filter((result) => result.status === 'partial').length,
    rejected: results.filter((result) => result.status === 'rejected').length,
    results
  };
}

export function listDispenseRecords(ctx: AppContext, filter: DispenseRecordFilter): Promise<DispenseRecord[]> {
  return ctx.ledger.listDispenseRecords(filter);
}
