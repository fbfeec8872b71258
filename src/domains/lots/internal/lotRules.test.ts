import { describe, expect, it } from 'vitest';
import { assertCorrection, assertDeductQuantity, assertReceivable, compareFefo, isRetired } from './lotRules';
import type { Lot } from './types';

function makeLot(overrides: Partial<Lot>): Lot {
  return {
    id: 'lot',
    itemId: 'item',
    branchId: 'branch',
    lotNumber: null,
    quantityReceived: 10,
    quantityRemaining: 10,
    expiryDate: '2025-03-01',
    receivedAt: '2025-01-01T08:00:00.000Z',
    receiptSequence: 1,
    unitCost: 1,
    ...overrides
  };
}

describe('compareFefo', () => {
  it('orders by expiry, then receipt time, then receipt sequence', () => {
    const lots = [
      makeLot({ id: 'late-expiry', expiryDate: '2025-04-01' }),
      makeLot({ id: 'second-seq', receiptSequence: 3 }),
      makeLot({ id: 'later-receipt', receivedAt: '2025-01-02T08:00:00.000Z', receiptSequence: 0 }),
      makeLot({ id: 'first-seq', receiptSequence: 2 }),
      makeLot({ id: 'early-expiry', expiryDate: '2025-02-01', receiptSequence: 9 })
    ];

    expect([...lots].sort(compareFefo).map((lot) => lot.id)).toEqual([
      'early-expiry',
      'first-seq',
      'second-seq',
      'later-receipt',
      'late-expiry'
    ]);
  });
});

describe('isRetired', () => {
  it('keeps a lot usable on its expiry date', () => {
    expect(isRetired(makeLot({ expiryDate: '2025-01-10' }), '2025-01-10')).toBe(false);
  });

  it('retires expired and empty lots', () => {
    expect(isRetired(makeLot({ expiryDate: '2025-01-09' }), '2025-01-10')).toBe(true);
    expect(isRetired(makeLot({ quantityRemaining: 0 }), '2025-01-10')).toBe(true);
  });

  it('keeps a lot holding a single stored unit of quantity', () => {
    expect(isRetired(makeLot({ quantityRemaining: 0.000001 }), '2025-01-10')).toBe(false);
  });
});

describe('lot input checks', () => {
  const now = new Date('2025-01-10T12:00:00.000Z');
  const input = { itemId: 'item', branchId: 'branch', quantity: 5, expiryDate: '2025-02-01', unitCost: 2 };

  it('accepts a lot expiring today', () => {
    expect(() => assertReceivable({ ...input, expiryDate: '2025-01-10' }, now)).not.toThrow();
  });

  it('rejects non-positive quantities, negative costs and past expiry', () => {
    expect(() => assertReceivable({ ...input, quantity: 0 }, now)).toThrow(
      expect.objectContaining({ code: 'INVALID_INPUT', details: expect.objectContaining({ field: 'quantity' }) })
    );
    expect(() => assertReceivable({ ...input, unitCost: -1 }, now)).toThrow(
      expect.objectContaining({ details: expect.objectContaining({ field: 'unitCost' }) })
    );
    expect(() => assertReceivable({ ...input, expiryDate: '2025-01-09' }, now)).toThrow(
      expect.objectContaining({ details: expect.objectContaining({ field: 'expiryDate', today: '2025-01-10' }) })
    );
  });

  it('rejects quantities and costs beyond numeric(18,6)', () => {
    expect(() => assertReceivable({ ...input, quantity: 1e13 }, now)).toThrow(
      expect.objectContaining({ code: 'INVALID_INPUT', details: expect.objectContaining({ field: 'quantity' }) })
    );
    expect(() => assertReceivable({ ...input, unitCost: 1e13 }, now)).toThrow(
      expect.objectContaining({ details: expect.objectContaining({ field: 'unitCost' }) })
    );
    expect(() => assertReceivable({ ...input, quantity: 999_999_999_999 }, now)).not.toThrow();
    expect(() => assertDeductQuantity(1e13)).toThrow('INVALID_INPUT');
  });

  it('rounds deduction quantities', () => {
    expect(assertDeductQuantity(1.23456789)).toBe(1.234568);
    expect(() => assertDeductQuantity(-1)).toThrow('INVALID_INPUT');
  });

  it('requires a reason and a quantity within the received amount', () => {
    const lot = makeLot({ quantityReceived: 10 });
    expect(assertCorrection(lot, 4, '  recount  ')).toBe('recount');
    expect(() => assertCorrection(lot, 4, ' ')).toThrow('INVALID_INPUT');
    expect(() => assertCorrection(lot, 11, 'recount')).toThrow('INVALID_INPUT');
  });
});
