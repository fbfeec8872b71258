import type { Request, Response, NextFunction } from 'express';
import { isLotLedgerError, type LotLedgerErrorCode } from '../../domains/lots';
import { CatalogConflictError } from '../../domains/catalog';
import { getRequestContext } from '../../lib/requestContext';

export type MappedError = { status: number; body: unknown };

/**
 * Route error mappings keyed by the error message. Domain errors use their code as the
 * message, so a map entry per code is enough.
 */
export type ErrorHandlerMap = Record<string, (error: Error) => MappedError>;

/**
 * Wraps an async route handler: errors whose message is in the map become the mapped
 * response, anything else is logged and answered with 500.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap?: ErrorHandlerMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      const message = error instanceof Error ? error.message : undefined;
      const mapper = error instanceof Error && message && errorMap ? errorMap[message] : undefined;
      if (mapper && error instanceof Error) {
        const mapped = mapper(error);
        return res.status(mapped.status).json(mapped.body);
      }

      console.error(`Unhandled route error (requestId=${getRequestContext()?.requestId ?? 'none'})`, error);
      return res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && message ? { details: message } : {})
      });
    }
  };
}

export function createErrorResponse(status: number, message: string, details?: unknown): MappedError {
  return { status, body: { error: message, ...(details !== undefined ? { details } : {}) } };
}

function mapLotLedgerError(error: Error): MappedError {
  if (!isLotLedgerError(error)) {
    return createErrorResponse(500, 'An internal server error occurred.');
  }
  return {
    status: error.status,
    body: { error: { code: error.code, message: error.details.message, details: error.details } }
  };
}

const LOT_LEDGER_CODES: LotLedgerErrorCode[] = [
  'INVALID_INPUT',
  'INSUFFICIENT_STOCK',
  'LOT_NOT_FOUND',
  'ITEM_NOT_FOUND',
  'BRANCH_NOT_FOUND'
];

export const lotLedgerErrorMap: ErrorHandlerMap = Object.fromEntries(
  LOT_LEDGER_CODES.map((code) => [code, mapLotLedgerError])
);

export const catalogErrorMap: ErrorHandlerMap = {
  CATALOG_DUPLICATE: (error) =>
    error instanceof CatalogConflictError
      ? { status: 409, body: { error: { code: error.code, message: error.details.message, details: error.details } } }
      : createErrorResponse(409, 'Catalog entry already exists.')
};
