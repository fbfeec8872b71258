import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { asyncErrorHandler, lotLedgerErrorMap } from '../middleware/validation/errors';
import { validateUuidParam } from '../middleware/validation/schema';
import {
  availableLotsQuerySchema,
  lotCorrectionSchema,
  lotDeductionSchema,
  lotListQuerySchema,
  receiveLotSchema
} from '../schemas/lots.schema';
import {
  correctLot,
  deductFromLot,
  getLotOrThrow,
  listAvailableLots,
  listLotCorrections,
  listLots,
  receiveLot
} from '../services/lots.service';

export function createLotsRouter(ctx: AppContext) {
  const router = Router();

  router.post(
    '/lots',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = receiveLotSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const lot = await receiveLot(ctx, parsed.data);
      return res.status(201).json(lot);
    }, lotLedgerErrorMap)
  );

  router.get(
    '/lots',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = lotListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json({ data: await listLots(ctx, parsed.data) });
    }, lotLedgerErrorMap)
  );

  router.get(
    '/lots/available',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = availableLotsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const { itemId, branchId } = parsed.data;
      return res.json({ data: await listAvailableLots(ctx, itemId, branchId) });
    }, lotLedgerErrorMap)
  );

  router.get(
    '/lots/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getLotOrThrow(ctx, req.params.id));
    }, lotLedgerErrorMap)
  );

  router.post(
    '/lots/:id/deductions',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = lotDeductionSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json(await deductFromLot(ctx, req.params.id, parsed.data.quantity));
    }, lotLedgerErrorMap)
  );

  router.get(
    '/lots/:id/corrections',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json({ data: await listLotCorrections(ctx, req.params.id) });
    }, lotLedgerErrorMap)
  );

  router.post(
    '/lots/:id/corrections',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = lotCorrectionSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const { quantityRemaining, reason } = parsed.data;
      return res.json(await correctLot(ctx, req.params.id, quantityRemaining, reason));
    }, lotLedgerErrorMap)
  );

  return router;
}
