import { z } from 'zod';
import { MAX_QUANTITY } from '../lib/numbers';

export const dispenseSchema = z.object({
  itemId: z.string().uuid(),
  branchId: z.string().uuid(),
  quantity: z.number().positive().max(MAX_QUANTITY),
  reference: z.string().trim().min(1).max(255).nullable().optional()
});

export const dispenseBatchSchema = z.object({
  requests: z.array(dispenseSchema).min(1).max(200)
});

export const dispenseListQuerySchema = z.object({
  itemId: z.string().uuid().optional(),
  branchId: z.string().uuid().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50)
});
