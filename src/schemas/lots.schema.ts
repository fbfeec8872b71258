import { z } from 'zod';
import { MAX_QUANTITY } from '../lib/numbers';

const dateOnly = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date.');

const booleanQuery = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const receiveLotSchema = z.object({
  itemId: z.string().uuid(),
  branchId: z.string().uuid(),
  quantity: z.number().positive().max(MAX_QUANTITY),
  expiryDate: dateOnly,
  unitCost: z.number().min(0).max(MAX_QUANTITY),
  lotNumber: z.string().trim().min(1).max(64).nullable().optional(),
  receivedAt: z.coerce.date().optional()
});

export const lotDeductionSchema = z.object({
  quantity: z.number().positive().max(MAX_QUANTITY)
});

export const lotCorrectionSchema = z.object({
  quantityRemaining: z.number().min(0).max(MAX_QUANTITY),
  reason: z.string().trim().min(1).max(500)
});

export const lotListQuerySchema = z.object({
  itemId: z.string().uuid().optional(),
  branchId: z.string().uuid().optional(),
  includeRetired: booleanQuery.optional()
});

export const availableLotsQuerySchema = z.object({
  itemId: z.string().uuid(),
  branchId: z.string().uuid()
});
