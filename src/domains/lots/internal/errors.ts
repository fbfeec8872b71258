export type LotLedgerErrorCode =
  | 'INVALID_INPUT'
  | 'INSUFFICIENT_STOCK'
  | 'LOT_NOT_FOUND'
  | 'ITEM_NOT_FOUND'
  | 'BRANCH_NOT_FOUND';

const STATUS_BY_CODE: Record<LotLedgerErrorCode, number> = {
  INVALID_INPUT: 400,
  INSUFFICIENT_STOCK: 409,
  LOT_NOT_FOUND: 404,
  ITEM_NOT_FOUND: 404,
  BRANCH_NOT_FOUND: 404
};

export class LotLedgerError extends Error {
  code: LotLedgerErrorCode;
  status: number;
  details: Record<string, unknown> & { message: string };

  constructor(code: LotLedgerErrorCode, message: string, details?: Record<string, unknown>) {
    super(code);
    this.name = 'LotLedgerError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
    this.details = { message, ...details };
  }
}

export function isLotLedgerError(error: unknown): error is LotLedgerError {
  return error instanceof LotLedgerError;
}

export function invalidInput(message: string, details?: Record<string, unknown>): LotLedgerError {
  return new LotLedgerError('INVALID_INPUT', message, details);
}

export function lotNotFound(lotId: string): LotLedgerError {
  return new LotLedgerError('LOT_NOT_FOUND', 'Lot not found.', { lotId });
}

export function insufficientStock(lotId: string, requested: number, available: number): LotLedgerError {
  return new LotLedgerError('INSUFFICIENT_STOCK', 'Lot does not hold enough stock for this deduction.', {
    lotId,
    requested,
    available
  });
}
