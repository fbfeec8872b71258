import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { asyncErrorHandler, lotLedgerErrorMap } from '../middleware/validation/errors';
import { validateUuidParam } from '../middleware/validation/schema';
import { reorderQuerySchema } from '../schemas/alerts.schema';
import { consolidatedDashboard } from '../services/dashboard.service';
import { reorderRecommendations } from '../services/reorder.service';

export function createPlanningRouter(ctx: AppContext) {
  const router = Router();

  router.get(
    '/branches/:id/reorder-recommendations',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = reorderQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json({ data: await reorderRecommendations(ctx, req.params.id, parsed.data) });
    }, lotLedgerErrorMap)
  );

  router.get(
    '/dashboard/consolidated',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      return res.json({ data: await consolidatedDashboard(ctx) });
    }, lotLedgerErrorMap)
  );

  return router;
}
