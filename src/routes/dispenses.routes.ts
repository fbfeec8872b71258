import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { asyncErrorHandler, lotLedgerErrorMap } from '../middleware/validation/errors';
import { dispenseBatchSchema, dispenseListQuerySchema, dispenseSchema } from '../schemas/dispense.schema';
import { allocate, allocateBatch, listDispenseRecords } from '../services/dispense.service';

export function createDispensesRouter(ctx: AppContext) {
  const router = Router();

  router.post(
    '/dispenses',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = dispenseSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const record = await allocate(ctx, parsed.data);
      return res.status(201).json(record);
    }, lotLedgerErrorMap)
  );

  router.post(
    '/dispenses/batch',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = dispenseBatchSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const result = await allocateBatch(ctx, parsed.data.requests);
      // 207 when at least one request did not go through.
      return res.status(result.rejected > 0 ? 207 : 200).json(result);
    }, lotLedgerErrorMap)
  );

  router.get(
    '/dispenses',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = dispenseListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json({ data: await listDispenseRecords(ctx, parsed.data) });
    }, lotLedgerErrorMap)
  );

  return router;
}
