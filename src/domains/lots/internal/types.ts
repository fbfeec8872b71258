export type Lot = {
  id: string;
  itemId: string;
  branchId: string;
  lotNumber: string | null;
  quantityReceived: number;
  quantityRemaining: number;
  /** Date-only `YYYY-MM-DD`; the lot is usable through the end of this day. */
  expiryDate: string;
  receivedAt: string;
  /** Monotonic across the ledger; breaks ties between receipts sharing a timestamp. */
  receiptSequence: number;
  unitCost: number;
};

export type ReceiveLotInput = {
  itemId: string;
  branchId: string;
  quantity: number;
  expiryDate: string;
  unitCost: number;
  lotNumber?: string | null;
  receivedAt?: Date;
};

export type LotFilter = {
  itemId?: string;
  branchId?: string;
  includeRetired?: boolean;
};

export type LotCorrection = {
  id: string;
  lotId: string;
  previousQuantity: number;
  correctedQuantity: number;
  reason: string;
  correctedAt: string;
};

export type DispenseLine = {
  lotId: string;
  lotNumber: string | null;
  expiryDate: string;
  quantityDrawn: number;
  unitCost: number;
};

export type DispenseRecord = {
  id: string;
  itemId: string;
  branchId: string;
  requestedQuantity: number;
  lines: DispenseLine[];
  unfulfilledQuantity: number;
  totalCost: number;
  reference: string | null;
  dispensedAt: string;
};

export type NewDispenseRecord = Omit<DispenseRecord, 'id' | 'dispensedAt'> & { dispensedAt: Date };

export type DispenseRecordFilter = {
  itemId?: string;
  branchId?: string;
  limit: number;
};

/**
 * Operations available while holding the exclusive section of one (item, branch) key.
 * Everything done through a session is applied together or not at all.
 */
export interface LotLedgerSession {
  availableLots(itemId: string, branchId: string): Promise<Lot[]>;
  deduct(lotId: string, quantity: number): Promise<Lot>;
  appendDispenseRecord(record: NewDispenseRecord): Promise<DispenseRecord>;
}

export interface LotLedger {
  receive(input: ReceiveLotInput): Promise<Lot>;
  availableLots(itemId: string, branchId: string): Promise<Lot[]>;
  deduct(lotId: string, quantity: number): Promise<Lot>;
  correct(lotId: string, quantityRemaining: number, reason: string): Promise<Lot>;
  getLot(lotId: string): Promise<Lot | null>;
  listLots(filter: LotFilter): Promise<Lot[]>;
  listCorrections(lotId: string): Promise<LotCorrection[]>;
  /** Non-retired lots of an item across all branches, read without taking any lock. */
  snapshot(itemId: string): Promise<Lot[]>;
  listDispenseRecords(filter: DispenseRecordFilter): Promise<DispenseRecord[]>;
  runExclusive<T>(itemId: string, branchId: string, work: (session: LotLedgerSession) => Promise<T>): Promise<T>;
}

export type TransferRationale = 'expiry_risk' | 'demand_imbalance';

/** Advisory only: applying it is a deduct at the source and a receive at the destination. */
export type TransferSuggestion = {
  itemId: string;
  sourceBranchId: string;
  destinationBranchId: string;
  suggestedQuantity: number;
  rationale: TransferRationale;
  sourceLotId: string;
  sourceLotExpiryDate: string;
  sourceExcess: number;
  destinationDeficit: number;
};
