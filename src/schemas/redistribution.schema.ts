import { z } from 'zod';
import { MAX_QUANTITY } from '../lib/numbers';

export const suggestionQuerySchema = z.object({
  itemId: z.string().uuid()
});

export const demandEstimateSchema = z.object({
  itemId: z.string().uuid(),
  branchId: z.string().uuid(),
  windowDays: z.number().int().positive().max(365),
  dailyRate: z.number().min(0).max(MAX_QUANTITY),
  estimatedAt: z.coerce.date().optional()
});

export const demandEstimateListQuerySchema = z.object({
  itemId: z.string().uuid().optional()
});
