import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { asyncErrorHandler, lotLedgerErrorMap } from '../middleware/validation/errors';
import { expiryAlertQuerySchema, lowStockQuerySchema } from '../schemas/alerts.schema';
import { roundQuantity } from '../lib/numbers';
import { expiryAlerts, lowStockAlerts } from '../services/alerts.service';

export function createAlertsRouter(ctx: AppContext) {
  const router = Router();

  router.get(
    '/alerts/expiry',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = expiryAlertQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const alerts = await expiryAlerts(ctx, parsed.data);
      const valueAtRisk = roundQuantity(alerts.reduce((sum, alert) => sum + alert.valueAtRisk, 0));
      return res.json({ data: alerts, summary: { count: alerts.length, valueAtRisk } });
    }, lotLedgerErrorMap)
  );

  router.get(
    '/alerts/low-stock',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = lowStockQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json({ data: await lowStockAlerts(ctx, parsed.data) });
    }, lotLedgerErrorMap)
  );

  return router;
}
