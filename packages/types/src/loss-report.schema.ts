import { z } from 'zod';
import { ItemTypeSchema, TextFilterSchema } from './inventory.schema.js';

/**
 * Loss Report Schemas
 *
 * Written-off stock grouped by (date, item code, loss category).
 *
 * @module @medstock/types/loss-report
 */

/**
 * Filters of one loss report run; every field is optional
 */
export const LossFiltersSchema = z.object({
  scenario: TextFilterSchema,
  kit: TextFilterSchema,
  module: TextFilterSchema,
  type: TextFilterSchema,
  lossCategory: TextFilterSchema,
  itemSearch: TextFilterSchema,
  docSearch: TextFilterSchema.describe('Substring of the document number'),
  dateFrom: TextFilterSchema.describe('Free-form date; month or year resolves to its first day'),
  dateTo: TextFilterSchema.describe('Free-form date; month or year resolves to its last day'),
});

/**
 * One aggregated loss line
 *
 * Multi-valued attributes are sorted, de-duplicated and joined with ", ".
 */
export const LossRecordSchema = z.object({
  date: z.string().describe('YYYY-MM-DD'),
  code: z.string().min(1),
  description: z.string(),
  type: ItemTypeSchema,
  lossCategory: z.string(),
  quantity: z.number().int(),
  scenarios: z.string(),
  kits: z.string(),
  modules: z.string(),
  expiryDates: z.string(),
  documents: z.string(),
  remarks: z.string(),
});

export type LossFilters = z.input<typeof LossFiltersSchema>;
export type LossRecord = z.infer<typeof LossRecordSchema>;
