import { v4 as uuidv4 } from 'uuid';
import { systemClock, toDateOnly, type Clock } from '../../../lib/dates';
import { KeyedMutex } from '../../../lib/keyedMutex';
import { roundQuantity } from '../../../lib/numbers';
import { insufficientStock, invalidInput, lotNotFound } from './errors';
import { assertCorrection, assertDeductQuantity, assertReceivable, compareFefo, isRetired, lotKey } from './lotRules';
import type {
  DispenseRecord,
  DispenseRecordFilter,
  Lot,
  LotCorrection,
  LotFilter,
  LotLedger,
  LotLedgerSession,
  NewDispenseRecord,
  ReceiveLotInput
} from './types';

type UndoStep = () => void;

/**
 * Process-local lot ledger used when no DATABASE_URL is configured and in tests.
 *
 * Exclusive sections keep an undo log so a failure part-way through leaves every lot
 * exactly as it was before the section started.
 */
export class MemoryLotLedger implements LotLedger {
  private lots = new Map<string, Lot>();
  private corrections: LotCorrection[] = [];
  private records: DispenseRecord[] = [];
  private nextSequence = 1;
  private mutex = new KeyedMutex();

  constructor(private clock: Clock = systemClock) {}

  async receive(input: ReceiveLotInput): Promise<Lot> {
    const now = this.clock();
    assertReceivable(input, now);
    const quantity = roundQuantity(input.quantity);
    const lot: Lot = {
      id: uuidv4(),
      itemId: input.itemId,
      branchId: input.branchId,
      lotNumber: input.lotNumber ?? null,
      quantityReceived: quantity,
      quantityRemaining: quantity,
      expiryDate: input.expiryDate,
      receivedAt: (input.receivedAt ?? now).toISOString(),
      receiptSequence: this.nextSequence++,
      unitCost: input.unitCost
    };
    this.lots.set(lot.id, lot);
    return { ...lot };
  }

  async availableLots(itemId: string, branchId: string): Promise<Lot[]> {
    return this.selectAvailable(itemId, branchId);
  }

  async deduct(lotId: string, quantity: number): Promise<Lot> {
    const lot = this.lots.get(lotId);
    if (!lot) throw lotNotFound(lotId);
    return this.runExclusive(lot.itemId, lot.branchId, (session) => session.deduct(lotId, quantity));
  }

  async correct(lotId: string, quantityRemaining: number, reason: string): Promise<Lot> {
    const lot = this.lots.get(lotId);
    if (!lot) throw lotNotFound(lotId);
    return this.mutex.withLock(lotKey(lot.itemId, lot.branchId), async () => {
      const trimmed = assertCorrection(lot, quantityRemaining, reason);
      const corrected = roundQuantity(quantityRemaining);
      this.corrections.push({
        id: uuidv4(),
        lotId,
        previousQuantity: lot.quantityRemaining,
        correctedQuantity: corrected,
        reason: trimmed,
        correctedAt: this.clock().toISOString()
      });
      lot.quantityRemaining = corrected;
      return { ...lot };
    });
  }

  async getLot(lotId: string): Promise<Lot | null> {
    const lot = this.lots.get(lotId);
    return lot ? { ...lot } : null;
  }

  async listLots(filter: LotFilter): Promise<Lot[]> {
    const today = toDateOnly(this.clock());
    return [...this.lots.values()]
      .filter((lot) => !filter.itemId || lot.itemId === filter.itemId)
      .filter((lot) => !filter.branchId || lot.branchId === filter.branchId)
      .filter((lot) => filter.includeRetired || !isRetired(lot, today))
      .sort(compareFefo)
      .map((lot) => ({ ...lot }));
  }

  async listCorrections(lotId: string): Promise<LotCorrection[]> {
    return this.corrections.filter((entry) => entry.lotId === lotId).map((entry) => ({ ...entry }));
  }

  async snapshot(itemId: string): Promise<Lot[]> {
    return this.listLots({ itemId });
  }

  async listDispenseRecords(filter: DispenseRecordFilter): Promise<DispenseRecord[]> {
    const matches: DispenseRecord[] = [];
    for (let i = this.records.length - 1; i >= 0 && matches.length < filter.limit; i--) {
      const record = this.records[i];
      if (filter.itemId && record.itemId !== filter.itemId) continue;
      if (filter.branchId && record.branchId !== filter.branchId) continue;
      matches.push(cloneRecord(record));
    }
    return matches;
  }

  async runExclusive<T>(
    itemId: string,
    branchId: string,
    work: (session: LotLedgerSession) => Promise<T>
  ): Promise<T> {
    return this.mutex.withLock(lotKey(itemId, branchId), async () => {
      const undo: UndoStep[] = [];
      const session: LotLedgerSession = {
        availableLots: async (sessionItemId, sessionBranchId) => {
          this.assertSameKey(itemId, branchId, sessionItemId, sessionBranchId);
          return this.selectAvailable(sessionItemId, sessionBranchId);
        },
        deduct: async (lotId, quantity) => {
          const lot = this.lots.get(lotId);
          if (!lot) throw lotNotFound(lotId);
          this.assertSameKey(itemId, branchId, lot.itemId, lot.branchId);
          const amount = assertDeductQuantity(quantity);
          if (amount > lot.quantityRemaining) {
            throw insufficientStock(lotId, amount, lot.quantityRemaining);
          }
          const previous = lot.quantityRemaining;
          lot.quantityRemaining = roundQuantity(previous - amount);
          undo.push(() => {
            lot.quantityRemaining = previous;
          });
          return { ...lot };
        },
        appendDispenseRecord: async (input: NewDispenseRecord) => {
          const record: DispenseRecord = {
            ...input,
            id: uuidv4(),
            lines: input.lines.map((line) => ({ ...line })),
            dispensedAt: input.dispensedAt.toISOString()
          };
          this.records.push(record);
          undo.push(() => {
            const index = this.records.indexOf(record);
            if (index >= 0) this.records.splice(index, 1);
          });
          return cloneRecord(record);
        }
      };

      try {
        return await work(session);
      } catch (error) {
        for (const step of undo.reverse()) step();
        throw error;
      }
    });
  }

  private selectAvailable(itemId: string, branchId: string): Lot[] {
    const today = toDateOnly(this.clock());
    return [...this.lots.values()]
      .filter((lot) => lot.itemId === itemId && lot.branchId === branchId && !isRetired(lot, today))
      .sort(compareFefo)
      .map((lot) => ({ ...lot }));
  }

  private assertSameKey(itemId: string, branchId: string, otherItemId: string, otherBranchId: string) {
    if (itemId !== otherItemId || branchId !== otherBranchId) {
      throw invalidInput('Lot belongs to a different item or branch than the exclusive section.', {
        expected: lotKey(itemId, branchId),
        actual: lotKey(otherItemId, otherBranchId)
      });
    }
  }
}

function cloneRecord(record: DispenseRecord): DispenseRecord {
  return { ...record, lines: record.lines.map((line) => ({ ...line })) };
}
