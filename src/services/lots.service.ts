import type { AppContext } from '../appContext';
import type { Lot, LotCorrection, LotFilter } from '../domains/lots';
import { lotNotFound } from '../domains/lots';
import { requireItemAndBranch } from './catalog.service';

export type ReceiveLotRequest = {
  itemId: string;
  branchId: string;
  quantity: number;
  expiryDate: string;
  unitCost: number;
  lotNumber?: string | null;
  receivedAt?: Date;
};

/**
 * Receiving workflow entry point: validates the catalog references before the ledger
 * checks quantity, cost and expiry.
 */
export async function receiveLot(ctx: AppContext, request: ReceiveLotRequest): Promise<Lot> {
  await requireItemAndBranch(ctx.catalog, request.itemId, request.branchId);
  return ctx.ledger.receive(request);
}

export async function getLotOrThrow(ctx: AppContext, lotId: string): Promise<Lot> {
  const lot = await ctx.ledger.getLot(lotId);
  if (!lot) throw lotNotFound(lotId);
  return lot;
}

export function listLots(ctx: AppContext, filter: LotFilter): Promise<Lot[]> {
  return ctx.ledger.listLots(filter);
}

export async function listAvailableLots(ctx: AppContext, itemId: string, branchId: string): Promise<Lot[]> {
  await requireItemAndBranch(ctx.catalog, itemId, branchId);
  return ctx.ledger.availableLots(itemId, branchId);
}

export function deductFromLot(ctx: AppContext, lotId: string, quantity: number): Promise<Lot> {
  return ctx.ledger.deduct(lotId, quantity);
}

export function correctLot(ctx: AppContext, lotId: string, quantityRemaining: number, reason: string): Promise<Lot> {
  return ctx.ledger.correct(lotId, quantityRemaining, reason);
}

export async function listLotCorrections(ctx: AppContext, lotId: string): Promise<LotCorrection[]> {
  await getLotOrThrow(ctx, lotId);
  return ctx.ledger.listCorrections(lotId);
}
