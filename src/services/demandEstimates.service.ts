import type { AppContext } from '../appContext';
import type { DemandEstimate, DemandEstimateInput } from '../domains/forecasting';
import { requireItemAndBranch } from './catalog.service';

/** Entry point for the external forecasting model to push its daily-rate estimates. */
export async function recordDemandEstimate(ctx: AppContext, input: DemandEstimateInput): Promise<DemandEstimate> {
  await requireItemAndBranch(ctx.catalog, input.itemId, input.branchId);
  return ctx.forecaster.upsert({ ...input, estimatedAt: input.estimatedAt ?? ctx.clock() });
}

export function listDemandEstimates(ctx: AppContext, itemId?: string): Promise<DemandEstimate[]> {
  return ctx.forecaster.list(itemId);
}
