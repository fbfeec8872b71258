import { z } from 'zod';

export const expiryAlertQuerySchema = z.object({
  branchId: z.string().uuid().optional(),
  days: z.coerce.number().int().min(0).max(365).default(30)
});

export const lowStockQuerySchema = z.object({
  branchId: z.string().uuid().optional()
});

export const reorderQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10)
});
