import { z } from 'zod';

/**
 * Inventory Schemas
 *
 * Shared vocabulary of the order-needs and loss engines: item taxonomy,
 * transaction categories, filters and planning horizon.
 *
 * @module @medstock/types/inventory
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/** Filter value that disables a filter (compared case-insensitively) */
export const ALL_FILTER = 'All';

export const HORIZON_MONTHS_MIN = 0;
export const HORIZON_MONTHS_MAX = 24;

/** Outbound categories that lend stock out (increase the loan balance) */
export const LOAN_OUT_TYPES = ['Loan', 'Return of Borrowing'] as const;

/** Inbound categories that bring lent stock back (decrease the loan balance) */
export const LOAN_IN_TYPES = ['In Borrowing', 'In Return of Loan'] as const;

/** Outbound categories that write stock off */
export const LOSS_CATEGORIES = [
  'Expired Items',
  'Damaged Items',
  'Cold Chain Break',
  'Batch Recall',
  'Theft',
  'Other Losses',
] as const;

// ============================================================================
// ENUMS
// ============================================================================

/**
 * Three-way item taxonomy
 */
export const ItemTypeSchema = z.enum(['Kit', 'Module', 'Item']);

/**
 * Write-off reason
 */
export const LossCategorySchema = z.enum(LOSS_CATEGORIES);

/**
 * Catalog description language
 */
export const CatalogLanguageSchema = z.enum(['en', 'fr', 'es']);

// ============================================================================
// FILTERS
// ============================================================================

/**
 * Optional text filter; blank or "All" disables it
 */
export const TextFilterSchema = z
  .string()
  .nullish()
  .describe('Filter value, blank or "All" to match everything');

/**
 * Whole months of planning horizon; invalid input counts as zero
 */
export const HorizonMonthsSchema = z
  .number()
  .int()
  .min(HORIZON_MONTHS_MIN)
  .max(HORIZON_MONTHS_MAX)
  .describe('Months, clamped to 0..24');

/**
 * Lead, cover and buffer months that make up the expiry horizon
 */
export const ProjectHorizonSchema = z.object({
  leadMonths: HorizonMonthsSchema,
  coverMonths: HorizonMonthsSchema,
  bufferMonths: HorizonMonthsSchema,
});

/**
 * Kit and module values offered as filter choices
 */
export const FilterOptionsSchema = z.object({
  kits: z.array(z.string()),
  modules: z.array(z.string()),
});

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type ItemType = z.infer<typeof ItemTypeSchema>;
export type LossCategory = z.infer<typeof LossCategorySchema>;
export type CatalogLanguage = z.infer<typeof CatalogLanguageSchema>;
export type TextFilter = z.infer<typeof TextFilterSchema>;
export type ProjectHorizon = z.infer<typeof ProjectHorizonSchema>;
export type FilterOptions = z.infer<typeof FilterOptionsSchema>;
