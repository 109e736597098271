import { z } from 'zod';
import { ItemTypeSchema, TextFilterSchema } from './inventory.schema.js';

/**
 * Order Needs Schemas
 *
 * One OrderRow per item code, reconciling standing quantity, stock on hand,
 * expiring lots, loans and donations into a quantity to order.
 *
 * @module @medstock/types/order-needs
 */

// ============================================================================
// ORDER ROW
// ============================================================================

/**
 * Projected order line for one item code
 */
export const OrderRowSchema = z.object({
  code: z.string().min(1),
  description: z.string(),
  type: ItemTypeSchema,

  // Source quantities
  standardQty: z.number().int(),
  currentStock: z.number().int(),
  qtyExpiring: z.number().int().nonnegative(),

  // User-editable balances
  backOrders: z.number().int(),
  loanBalance: z.number().int().describe('Positive means net stock lent out'),
  plannedDonsGive: z.number().int(),
  donsReceive: z.number().int(),

  // Commercial attributes
  packSize: z.number().int().nonnegative().describe('0 disables packing conversion'),
  pricePerPack: z.number(),
  weightPerPack: z.number(),
  volumePerPackDm3: z.number(),
  accountCode: z.string(),

  // Derived quantities
  qtyNeeded: z.number().int().nonnegative(),
  qtyToOrderOverride: z
    .number()
    .int()
    .nullable()
    .describe('Quantity typed by the user; null re-defaults to qtyNeeded'),
  qtyToOrder: z.number().int(),
  qtyToOrderRounded: z.number().int(),
  amount: z.number(),
  weightKg: z.number(),
  volumeM3: z.number(),

  remarks: z.string(),
});

/**
 * Fields a user may edit on a row
 */
export const EditableOrderFieldSchema = z.enum([
  'backOrders',
  'loanBalance',
  'plannedDonsGive',
  'donsReceive',
  'qtyToOrder',
  'remarks',
]);

/**
 * Commercial catalog attributes joined onto a row
 */
export const CommercialDataSchema = z.object({
  packSize: z.number().int().nonnegative(),
  pricePerPack: z.number(),
  weightPerPack: z.number(),
  volumePerPackDm3: z.number(),
  accountCode: z.string(),
});

// ============================================================================
// FILTERS AND TOTALS
// ============================================================================

/**
 * Raw horizon input: a number or the text typed into a months field
 */
export const HorizonInputSchema = z.union([z.number(), z.string()]).nullish();

/**
 * Filters of one order-needs refresh
 */
export const OrderNeedsFiltersSchema = z.object({
  kit: TextFilterSchema,
  module: TextFilterSchema,
  type: TextFilterSchema,
  itemSearch: TextFilterSchema,
  leadMonths: HorizonInputSchema,
  coverMonths: HorizonInputSchema,
  bufferMonths: HorizonInputSchema,
});

/**
 * Totals over a set of rows
 */
export const OrderTotalsSchema = z.object({
  rowCount: z.number().int().nonnegative(),
  totalAmount: z.number(),
  totalWeightKg: z.number(),
  totalVolumeM3: z.number(),
  missingPriceCount: z.number().int().nonnegative(),
});

/**
 * Presentation granularity of an order-needs report
 */
export const OrderReportModeSchema = z.enum(['simple', 'detailed']);

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type OrderRow = z.infer<typeof OrderRowSchema>;
export type EditableOrderField = z.infer<typeof EditableOrderFieldSchema>;
export type CommercialData = z.infer<typeof CommercialDataSchema>;
export type HorizonInput = z.infer<typeof HorizonInputSchema>;
export type OrderNeedsFilters = z.input<typeof OrderNeedsFiltersSchema>;
export type OrderTotals = z.infer<typeof OrderTotalsSchema>;
export type OrderReportMode = z.infer<typeof OrderReportModeSchema>;
