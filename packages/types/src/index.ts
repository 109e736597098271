/**
 * Medstock Types Package
 *
 * Zod schemas and inferred types shared by the inventory engines and their
 * adapters.
 *
 * @module @medstock/types
 */

// =============================================================================
// Result
// =============================================================================
export { Ok, Err, isOk, isErr, type Result } from './lib/result.js';

// =============================================================================
// Inventory vocabulary
// =============================================================================
export {
  ALL_FILTER,
  HORIZON_MONTHS_MIN,
  HORIZON_MONTHS_MAX,
  LOAN_OUT_TYPES,
  LOAN_IN_TYPES,
  LOSS_CATEGORIES,
  ItemTypeSchema,
  LossCategorySchema,
  CatalogLanguageSchema,
  TextFilterSchema,
  HorizonMonthsSchema,
  ProjectHorizonSchema,
  FilterOptionsSchema,
  type ItemType,
  type LossCategory,
  type CatalogLanguage,
  type TextFilter,
  type ProjectHorizon,
  type FilterOptions,
} from './inventory.schema.js';

// =============================================================================
// Order needs
// =============================================================================
export {
  OrderRowSchema,
  EditableOrderFieldSchema,
  CommercialDataSchema,
  HorizonInputSchema,
  OrderNeedsFiltersSchema,
  OrderTotalsSchema,
  OrderReportModeSchema,
  type OrderRow,
  type EditableOrderField,
  type CommercialData,
  type HorizonInput,
  type OrderNeedsFilters,
  type OrderTotals,
  type OrderReportMode,
} from './order-needs.schema.js';

// =============================================================================
// Loss report
// =============================================================================
export {
  LossFiltersSchema,
  LossRecordSchema,
  type LossFilters,
  type LossRecord,
} from './loss-report.schema.js';
