import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { withTransaction } from '../../../db';
import { systemClock, toDateOnly, type Clock } from '../../../lib/dates';
import { KeyedMutex } from '../../../lib/keyedMutex';
import { roundQuantity, toNumber } from '../../../lib/numbers';
import { PG_ERROR, translatePgError } from '../../../lib/pgErrors';
import { insufficientStock, invalidInput, lotNotFound } from './errors';
import { assertCorrection, assertDeductQuantity, assertReceivable, lotKey } from './lotRules';
import type {
  DispenseLine,
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

function rejectOutOfRange<T>(pending: Promise<T>): Promise<T> {
  return translatePgError(pending, PG_ERROR.NUMERIC_VALUE_OUT_OF_RANGE, () =>
    invalidInput('Quantity or cost exceeds the storable range.')
  );
}

type Executor = {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
};

type LotRow = {
  id: string;
  item_id: string;
  branch_id: string;
  lot_number: string | null;
  quantity_received: string | number;
  quantity_remaining: string | number;
  expiry_date: string;
  received_at: Date;
  receipt_sequence: string | number;
  unit_cost: string | number;
};

type CorrectionRow = {
  id: string;
  lot_id: string;
  previous_quantity: string | number;
  corrected_quantity: string | number;
  reason: string;
  corrected_at: Date;
};

type DispenseRecordRow = {
  id: string;
  item_id: string;
  branch_id: string;
  requested_quantity: string | number;
  unfulfilled_quantity: string | number;
  total_cost: string | number;
  reference: string | null;
  dispensed_at: Date;
};

type DispenseLineRow = {
  dispense_record_id: string;
  lot_id: string;
  lot_number: string | null;
  expiry_date: string;
  quantity_drawn: string | number;
  unit_cost: string | number;
};

// FEFO: expiry, then receipt time, then receipt sequence.
const FEFO_ORDER = 'ORDER BY expiry_date ASC, received_at ASC, receipt_sequence ASC';

function mapLot(row: LotRow): Lot {
  return {
    id: row.id,
    itemId: row.item_id,
    branchId: row.branch_id,
    lotNumber: row.lot_number,
    quantityReceived: roundQuantity(toNumber(row.quantity_received)),
    quantityRemaining: roundQuantity(toNumber(row.quantity_remaining)),
    expiryDate: row.expiry_date,
    receivedAt: new Date(row.received_at).toISOString(),
    receiptSequence: toNumber(row.receipt_sequence),
    unitCost: toNumber(row.unit_cost)
  };
}

function mapCorrection(row: CorrectionRow): LotCorrection {
  return {
    id: row.id,
    lotId: row.lot_id,
    previousQuantity: roundQuantity(toNumber(row.previous_quantity)),
    correctedQuantity: roundQuantity(toNumber(row.corrected_quantity)),
    reason: row.reason,
    correctedAt: new Date(row.corrected_at).toISOString()
  };
}

function mapRecord(row: DispenseRecordRow, lines: DispenseLine[]): DispenseRecord {
  return {
    id: row.id,
    itemId: row.item_id,
    branchId: row.branch_id,
    requestedQuantity: roundQuantity(toNumber(row.requested_quantity)),
    lines,
    unfulfilledQuantity: roundQuantity(toNumber(row.unfulfilled_quantity)),
    totalCost: roundQuantity(toNumber(row.total_cost)),
    reference: row.reference,
    dispensedAt: new Date(row.dispensed_at).toISOString()
  };
}

function mapLine(row: DispenseLineRow): DispenseLine {
  return {
    lotId: row.lot_id,
    lotNumber: row.lot_number,
    expiryDate: row.expiry_date,
    quantityDrawn: roundQuantity(toNumber(row.quantity_drawn)),
    unitCost: toNumber(row.unit_cost)
  };
}

/**
 * Lot ledger persisted in Postgres.
 *
 * Allocation for one (item, branch) key runs in a single transaction that locks the key's
 * available lots with FOR UPDATE, so a concurrent allocation in another process waits and
 * then re-reads the committed quantities. The in-process mutex keeps requests from the
 * same instance from queueing on row locks.
 */
export class PgLotLedger implements LotLedger {
  private mutex = new KeyedMutex();

  constructor(
    private pool: Pool,
    private clock: Clock = systemClock
  ) {}

  async receive(input: ReceiveLotInput): Promise<Lot> {
    const now = this.clock();
    assertReceivable(input, now);
    const quantity = roundQuantity(input.quantity);
    const res = await rejectOutOfRange(
      this.pool.query<LotRow>(
        `INSERT INTO lots (
            id, item_id, branch_id, lot_number, quantity_received, quantity_remaining,
            expiry_date, received_at, unit_cost, created_at, updated_at
         ) VALUES ($1,$2,$3,$4,$5,$5,$6,$7,$8,$9,$9)
         RETURNING *`,
        [
          uuidv4(),
          input.itemId,
          input.branchId,
          input.lotNumber ?? null,
          quantity,
          input.expiryDate,
          input.receivedAt ?? now,
          input.unitCost,
          now
        ]
      )
    );
    return mapLot(res.rows[0]);
  }

  async availableLots(itemId: string, branchId: string): Promise<Lot[]> {
    return this.selectAvailable(this.pool, itemId, branchId, false);
  }

  async deduct(lotId: string, quantity: number): Promise<Lot> {
    const amount = assertDeductQuantity(quantity);
    return this.deductWith(this.pool, lotId, amount);
  }

  async correct(lotId: string, quantityRemaining: number, reason: string): Promise<Lot> {
    return withTransaction(async (client) => {
      const res = await client.query<LotRow>('SELECT * FROM lots WHERE id = $1 FOR UPDATE', [lotId]);
      if (res.rowCount === 0) throw lotNotFound(lotId);
      const lot = mapLot(res.rows[0]);
      const trimmed = assertCorrection(lot, quantityRemaining, reason);
      const corrected = roundQuantity(quantityRemaining);
      const now = this.clock();
      await client.query(
        `INSERT INTO lot_corrections (id, lot_id, previous_quantity, corrected_quantity, reason, corrected_at)
         VALUES ($1,$2,$3,$4,$5,$6)`,
        [uuidv4(), lotId, lot.quantityRemaining, corrected, trimmed, now]
      );
      const updated = await client.query<LotRow>(
        'UPDATE lots SET quantity_remaining = $1, updated_at = $2 WHERE id = $3 RETURNING *',
        [corrected, now, lotId]
      );
      return mapLot(updated.rows[0]);
    }, this.pool);
  }

  async getLot(lotId: string): Promise<Lot | null> {
    const res = await this.pool.query<LotRow>('SELECT * FROM lots WHERE id = $1', [lotId]);
    if (res.rowCount === 0) return null;
    return mapLot(res.rows[0]);
  }

  async listLots(filter: LotFilter): Promise<Lot[]> {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.itemId) {
      params.push(filter.itemId);
      clauses.push(`item_id = $${params.length}`);
    }
    if (filter.branchId) {
      params.push(filter.branchId);
      clauses.push(`branch_id = $${params.length}`);
    }
    if (!filter.includeRetired) {
      params.push(toDateOnly(this.clock()));
      clauses.push(`quantity_remaining > 0 AND expiry_date >= $${params.length}`);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const res = await this.pool.query<LotRow>(`SELECT * FROM lots ${where} ${FEFO_ORDER}`, params);
    return res.rows.map(mapLot);
  }

  async listCorrections(lotId: string): Promise<LotCorrection[]> {
    const res = await this.pool.query<CorrectionRow>(
      'SELECT * FROM lot_corrections WHERE lot_id = $1 ORDER BY corrected_at ASC',
      [lotId]
    );
    return res.rows.map(mapCorrection);
  }

  async snapshot(itemId: string): Promise<Lot[]> {
    return this.listLots({ itemId });
  }

  async listDispenseRecords(filter: DispenseRecordFilter): Promise<DispenseRecord[]> {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.itemId) {
      params.push(filter.itemId);
      clauses.push(`item_id = $${params.length}`);
    }
    if (filter.branchId) {
      params.push(filter.branchId);
      clauses.push(`branch_id = $${params.length}`);
    }
    params.push(filter.limit);
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const res = await this.pool.query<DispenseRecordRow>(
      `SELECT * FROM dispense_records ${where}
        ORDER BY dispensed_at DESC, created_sequence DESC
        LIMIT $${params.length}`,
      params
    );
    if (res.rowCount === 0) return [];

    const lineRes = await this.pool.query<DispenseLineRow>(
      `SELECT * FROM dispense_record_lines
        WHERE dispense_record_id = ANY($1::uuid[])
        ORDER BY dispense_record_id, line_number ASC`,
      [res.rows.map((row) => row.id)]
    );
    const linesByRecord = new Map<string, DispenseLine[]>();
    for (const row of lineRes.rows) {
      const lines = linesByRecord.get(row.dispense_record_id) ?? [];
      lines.push(mapLine(row));
      linesByRecord.set(row.dispense_record_id, lines);
    }
    return res.rows.map((row) => mapRecord(row, linesByRecord.get(row.id) ?? []));
  }

  async runExclusive<T>(
    itemId: string,
    branchId: string,
    work: (session: LotLedgerSession) => Promise<T>
  ): Promise<T> {
    return this.mutex.withLock(lotKey(itemId, branchId), () =>
      withTransaction(async (client) => {
        const session: LotLedgerSession = {
          availableLots: async (sessionItemId, sessionBranchId) => {
            if (sessionItemId !== itemId || sessionBranchId !== branchId) {
              throw invalidInput('Lots requested for a different item or branch than the exclusive section.', {
                expected: lotKey(itemId, branchId),
                actual: lotKey(sessionItemId, sessionBranchId)
              });
            }
            return this.selectAvailable(client, itemId, branchId, true);
          },
          deduct: async (lotId, quantity) => {
            const amount = assertDeductQuantity(quantity);
            const lot = await this.deductWith(client, lotId, amount);
            if (lot.itemId !== itemId || lot.branchId !== branchId) {
              throw invalidInput('Lot belongs to a different item or branch than the exclusive section.', {
                expected: lotKey(itemId, branchId),
                actual: lotKey(lot.itemId, lot.branchId)
              });
            }
            return lot;
          },
          appendDispenseRecord: (record) => this.insertDispenseRecord(client, record)
        };
        return work(session);
      }, this.pool)
    );
  }

  private async selectAvailable(executor: Executor, itemId: string, branchId: string, lock: boolean) {
    const res = await executor.query<LotRow>(
      `SELECT * FROM lots
        WHERE item_id = $1
          AND branch_id = $2
          AND quantity_remaining > 0
          AND expiry_date >= $3
        ${FEFO_ORDER}
        ${lock ? 'FOR UPDATE' : ''}`,
      [itemId, branchId, toDateOnly(this.clock())]
    );
    return res.rows.map(mapLot);
  }

  private async deductWith(executor: Executor, lotId: string, amount: number): Promise<Lot> {
    const res = await executor.query<LotRow>(
      `UPDATE lots
          SET quantity_remaining = quantity_remaining - $2,
              updated_at = now()
        WHERE id = $1
          AND quantity_remaining >= $2
        RETURNING *`,
      [lotId, amount]
    );
    if (res.rowCount && res.rowCount > 0) {
      return mapLot(res.rows[0]);
    }
    const existing = await executor.query<LotRow>('SELECT * FROM lots WHERE id = $1', [lotId]);
    if (existing.rowCount === 0) throw lotNotFound(lotId);
    throw insufficientStock(lotId, amount, mapLot(existing.rows[0]).quantityRemaining);
  }

  private async insertDispenseRecord(client: PoolClient, record: NewDispenseRecord): Promise<DispenseRecord> {
    const id = uuidv4();
    const res = await rejectOutOfRange(
      client.query<DispenseRecordRow>(
        `INSERT INTO dispense_records (
            id, item_id, branch_id, requested_quantity, unfulfilled_quantity, total_cost, reference, dispensed_at
         ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
         RETURNING *`,
        [
          id,
          record.itemId,
          record.branchId,
          record.requestedQuantity,
          record.unfulfilledQuantity,
          record.totalCost,
          record.reference,
          record.dispensedAt
        ]
      )
    );
    for (const [index, line] of record.lines.entries()) {
      await client.query(
        `INSERT INTO dispense_record_lines (
            id, dispense_record_id, line_number, lot_id, lot_number, expiry_date, quantity_drawn, unit_cost
         ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8)`,
        [uuidv4(), id, index + 1, line.lotId, line.lotNumber, line.expiryDate, line.quantityDrawn, line.unitCost]
      );
    }
    return mapRecord(res.rows[0], record.lines.map((line) => ({ ...line })));
  }
}
