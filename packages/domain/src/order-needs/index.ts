/**
 * @fileoverview Order Needs Module
 *
 * Per-item projection of the quantity to order, reconciled from standing
 * quantities, stock on hand, expiring lots, loans and donations.
 *
 * @module domain/order-needs
 *
 * @example
 * ```typescript
 * import { createOrderNeedsService } from '@medstock/domain';
 *
 * const service = createOrderNeedsService({ repository, classifier });
 * const rows = await service.fetchOrderRows({ kit: 'KMEDKIT1', leadMonths: 3 });
 * ```
 */

export {
  DEFAULT_COMMERCIAL_DATA,
  DEFAULT_ORDER_NEEDS_CONFIG,
  type StockScope,
  type QuantityMap,
  type SourceQuantities,
  type OrderSources,
  type IOrderSourceRepository,
  type OrderNeedsServiceConfig,
  type OrderNeedsServiceDeps,
} from './interfaces.js';

export { computeQtyNeeded, recomputeOrderRow } from './recompute.js';

export {
  INTEGER_INPUT_MESSAGE,
  isValidIntegerInput,
  applyOrderRowEdit,
} from './order-row-editor.js';

export {
  normalizeHorizonMonths,
  normalizeProjectHorizon,
  totalHorizonMonths,
  horizonEndDate,
} from './horizon.js';

export { summarizeOrderRows } from './totals.js';

export {
  collectCodes,
  createOrderRow,
  synthesizeOrderRows,
  type RowFilters,
} from './row-synthesizer.js';

export { OrderNeedsService, createOrderNeedsService } from './order-needs-service.js';
