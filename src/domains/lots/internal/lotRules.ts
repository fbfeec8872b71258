import { isDateOnly, toDateOnly } from '../../../lib/dates';
import { isPositiveQuantity, MAX_QUANTITY, roundQuantity } from '../../../lib/numbers';
import { invalidInput } from './errors';
import type { Lot, ReceiveLotInput } from './types';

export function lotKey(itemId: string, branchId: string): string {
  return `${itemId}:${branchId}`;
}

/**
 * FEFO order: soonest expiry first, then oldest receipt, then receipt sequence.
 */
export function compareFefo(a: Lot, b: Lot): number {
  if (a.expiryDate !== b.expiryDate) return a.expiryDate < b.expiryDate ? -1 : 1;
  if (a.receivedAt !== b.receivedAt) return a.receivedAt < b.receivedAt ? -1 : 1;
  return a.receiptSequence - b.receiptSequence;
}

export function isRetired(lot: Lot, today: string): boolean {
  return !isPositiveQuantity(lot.quantityRemaining) || lot.expiryDate < today;
}

export function assertReceivable(input: ReceiveLotInput, now: Date): void {
  if (!isPositiveQuantity(input.quantity)) {
    throw invalidInput('Received quantity must be greater than zero.', { field: 'quantity' });
  }
  if (input.quantity > MAX_QUANTITY) {
    throw invalidInput('Received quantity exceeds the storable range.', { field: 'quantity', max: MAX_QUANTITY });
  }
  if (!Number.isFinite(input.unitCost) || input.unitCost < 0 || input.unitCost > MAX_QUANTITY) {
    throw invalidInput('Unit cost must be between zero and the storable maximum.', { field: 'unitCost' });
  }
  if (!isDateOnly(input.expiryDate)) {
    throw invalidInput('Expiry date must be a calendar date (YYYY-MM-DD).', { field: 'expiryDate' });
  }
  const today = toDateOnly(now);
  if (input.expiryDate < today) {
    throw invalidInput('Cannot receive a lot that has already expired.', {
      field: 'expiryDate',
      expiryDate: input.expiryDate,
      today
    });
  }
}

export function assertDeductQuantity(quantity: number): number {
  if (!isPositiveQuantity(quantity)) {
    throw invalidInput('Deduction quantity must be greater than zero.', { field: 'quantity' });
  }
  if (quantity > MAX_QUANTITY) {
    throw invalidInput('Deduction quantity exceeds the storable range.', { field: 'quantity', max: MAX_QUANTITY });
  }
  return roundQuantity(quantity);
}

export function assertCorrection(lot: Lot, quantityRemaining: number, reason: string): string {
  const trimmed = reason.trim();
  if (!trimmed) {
    throw invalidInput('A correction reason is required.', { field: 'reason' });
  }
  if (!Number.isFinite(quantityRemaining) || quantityRemaining < 0 || quantityRemaining > lot.quantityReceived) {
    throw invalidInput('Corrected quantity must be between zero and the quantity received.', {
      field: 'quantityRemaining',
      quantityReceived: lot.quantityReceived
    });
  }
  return trimmed;
}
