export {
  type DispenseLine,
  type DispenseRecord,
  type DispenseRecordFilter,
  type Lot,
  type LotCorrection,
  type LotFilter,
  type LotLedger,
  type LotLedgerSession,
  type NewDispenseRecord,
  type ReceiveLotInput,
  type TransferRationale,
  type TransferSuggestion
} from './internal/types';

export {
  LotLedgerError,
  insufficientStock,
  invalidInput,
  isLotLedgerError,
  lotNotFound,
  type LotLedgerErrorCode
} from './internal/errors';

export { compareFefo, isRetired, lotKey } from './internal/lotRules';
export { MemoryLotLedger } from './internal/memoryLotLedger';
export { PgLotLedger } from './internal/pgLotLedger';
export {
  MemoryAuditFeed,
  RedisAuditFeed,
  SilentAuditFeed,
  createAuditFeed,
  type AuditEvent,
  type AuditFeed
} from './feed';
