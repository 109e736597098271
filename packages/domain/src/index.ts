/**
 * @fileoverview Domain Package Exports
 *
 * Central export point for the inventory engines.
 *
 * @module @medstock/domain
 *
 * ## Modules
 *
 * - **Order needs**: per-item quantity to order, recompute engine, edit command
 * - **Losses**: write-offs grouped by (date, item, category)
 * - **Reports**: spreadsheet-ready sheets for both engines
 * - **Shared**: identifier parsing, date input, filters, item classification rule
 *
 * @example
 * ```typescript
 * import { createOrderNeedsService, createLossReportService } from '@medstock/domain';
 *
 * const orderNeeds = createOrderNeedsService({ repository, classifier });
 * const rows = await orderNeeds.fetchOrderRows({ type: 'Item', leadMonths: 2 });
 * ```
 */

export * from './shared/index.js';
export * from './order-needs/index.js';
export * from './losses/index.js';
export * from './reports/index.js';
