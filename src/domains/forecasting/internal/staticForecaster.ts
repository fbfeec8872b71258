import { systemClock, type Clock } from '../../../lib/dates';
import type { DemandEstimate, DemandEstimateInput, DemandEstimateStore } from './types';
import { pickEstimateForWindow } from './windowSelection';

export class StaticDemandForecaster implements DemandEstimateStore {
  private estimates = new Map<string, DemandEstimate>();

  constructor(private clock: Clock = systemClock) {}

  async upsert(input: DemandEstimateInput): Promise<DemandEstimate> {
    const estimate: DemandEstimate = {
      itemId: input.itemId,
      branchId: input.branchId,
      windowDays: input.windowDays,
      dailyRate: input.dailyRate,
      estimatedAt: (input.estimatedAt ?? this.clock()).toISOString()
    };
    this.estimates.set(`${input.itemId}:${input.branchId}:${input.windowDays}`, estimate);
    return { ...estimate };
  }

  async list(itemId?: string): Promise<DemandEstimate[]> {
    return [...this.estimates.values()]
      .filter((estimate) => !itemId || estimate.itemId === itemId)
      .map((estimate) => ({ ...estimate }));
  }

  async demandEstimate(itemId: string, branchId: string, windowDays: number): Promise<number | null> {
    const candidates = [...this.estimates.values()].filter(
      (estimate) => estimate.itemId === itemId && estimate.branchId === branchId
    );
    return pickEstimateForWindow(candidates, windowDays)?.dailyRate ?? null;
  }
}
