import { z } from 'zod';
import { MAX_QUANTITY } from '../lib/numbers';

export const itemSchema = z.object({
  sku: z.string().trim().min(1).max(64),
  name: z.string().trim().min(1).max(255),
  category: z.string().trim().min(1).max(120),
  reorderThreshold: z.number().min(0).max(MAX_QUANTITY).optional()
});

export const branchSchema = z.object({
  code: z.string().trim().min(1).max(32),
  name: z.string().trim().min(1).max(255)
});
