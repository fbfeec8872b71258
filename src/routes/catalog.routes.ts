import { Router, type Request, type Response } from 'express';
import type { AppContext } from '../appContext';
import { asyncErrorHandler, catalogErrorMap, lotLedgerErrorMap } from '../middleware/validation/errors';
import { validateUuidParam } from '../middleware/validation/schema';
import { branchSchema, itemSchema } from '../schemas/catalog.schema';
import {
  createBranch,
  createItem,
  listBranches,
  listItems,
  requireBranch,
  requireItem
} from '../services/catalog.service';
import { branchMetrics } from '../services/alerts.service';

const errorMap = { ...lotLedgerErrorMap, ...catalogErrorMap };

export function createCatalogRouter(ctx: AppContext) {
  const router = Router();

  router.post(
    '/items',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = itemSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const item = await createItem(ctx, parsed.data);
      return res.status(201).json(item);
    }, errorMap)
  );

  router.get(
    '/items',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      return res.json({ data: await listItems(ctx) });
    })
  );

  router.get(
    '/items/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await requireItem(ctx.catalog, req.params.id));
    }, errorMap)
  );

  router.post(
    '/branches',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = branchSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const branch = await createBranch(ctx, parsed.data);
      return res.status(201).json(branch);
    }, errorMap)
  );

  router.get(
    '/branches',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      return res.json({ data: await listBranches(ctx) });
    })
  );

  router.get(
    '/branches/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await requireBranch(ctx.catalog, req.params.id));
    }, errorMap)
  );

  router.get(
    '/branches/:id/metrics',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json({ data: await branchMetrics(ctx, req.params.id) });
    }, errorMap)
  );

  return router;
}
