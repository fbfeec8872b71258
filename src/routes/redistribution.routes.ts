import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { asyncErrorHandler, lotLedgerErrorMap } from '../middleware/validation/errors';
import {
  demandEstimateListQuerySchema,
  demandEstimateSchema,
  suggestionQuerySchema
} from '../schemas/redistribution.schema';
import { listDemandEstimates, recordDemandEstimate } from '../services/demandEstimates.service';
import { suggestTransfers } from '../services/redistribution.service';

export function createRedistributionRouter(ctx: AppContext) {
  const router = Router();

  router.get(
    '/redistribution/suggestions',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = suggestionQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const suggestions = await suggestTransfers(ctx, parsed.data.itemId);
      return res.json({ data: suggestions, policy: ctx.redistributionPolicy });
    }, lotLedgerErrorMap)
  );

  router.put(
    '/demand-estimates',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = demandEstimateSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json(await recordDemandEstimate(ctx, parsed.data));
    }, lotLedgerErrorMap)
  );

  router.get(
    '/demand-estimates',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = demandEstimateListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json({ data: await listDemandEstimates(ctx, parsed.data.itemId) });
    })
  );

  return router;
}
