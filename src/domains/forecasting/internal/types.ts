export type DemandEstimate = {
  itemId: string;
  branchId: string;
  /** Horizon the estimate was produced for. */
  windowDays: number;
  /** Expected units dispensed per day over that horizon. */
  dailyRate: number;
  estimatedAt: string;
};

export type DemandEstimateInput = {
  itemId: string;
  branchId: string;
  windowDays: number;
  dailyRate: number;
  estimatedAt?: Date;
};

/**
 * Opaque demand predictor. Returns the expected daily demand for the item at the branch
 * over the next `windowDays`, or null when it has nothing for that pair.
 */
export interface DemandForecaster {
  demandEstimate(itemId: string, branchId: string, windowDays: number): Promise<number | null>;
}

/** Forecaster fed by an external model that pushes its estimates in. */
export interface DemandEstimateStore extends DemandForecaster {
  upsert(input: DemandEstimateInput): Promise<DemandEstimate>;
  list(itemId?: string): Promise<DemandEstimate[]>;
}
