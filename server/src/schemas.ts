/**
 * Request payload and query schemas (wire format: snake_case).
 */
import { z } from 'zod';
import { parseIsoDate } from '../../src/domain/computations.js';

const IsoDate = z.string().refine((value) => parseIsoDate(value) !== null, {
  message: 'must be a valid date in YYYY-MM-DD format',
});

const Color = z.string().regex(/^#[0-9A-Fa-f]{6}$/, 'must be a hex color like #A1B2C3');
const Budget = z.number().finite().nonnegative();
const Id = z.string().min(1);

export const CategoryCreateSchema = z.object({
  name: z.string().min(1).max(100),
  color: Color.nullish(),
  monthly_budget: Budget.nullish(),
});

export const CategoryUpdateSchema = CategoryCreateSchema.partial();

export const TransactionCreateSchema = z.object({
  date: IsoDate,
  description: z.string().trim().min(1).max(255),
  amount: z.number().finite(),
  category_id: Id.nullish(),
});

export const TransactionUpdateSchema = TransactionCreateSchema.partial();

export const SettingsUpdateSchema = z.object({
  global_monthly_budget: Budget.nullable().optional(),
});

export const MonthQuerySchema = z.object({
  year: z.coerce.number().int().min(2000).max(2100),
  month: z.coerce.number().int().min(1).max(12),
});

export const MonthlyTotalQuerySchema = MonthQuerySchema.extend({
  category_id: Id.optional(),
});

export const TransactionListQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).default(100),
  from_date: IsoDate.optional(),
  to_date: IsoDate.optional(),
  category_id: Id.optional(),
  search: z.string().min(1).optional(),
});
