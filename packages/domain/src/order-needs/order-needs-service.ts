/**
 * @fileoverview Order Needs Service
 *
 * Reconciles standing quantities, stock on hand, expiring lots and loan
 * balances into one projected order line per item.
 *
 * The four sources are read concurrently, each on its own connection, and
 * joined in memory; the result is not a point-in-time snapshot if the store
 * changes between reads. A source that fails is logged and counted as empty
 * so the rest of the refresh still completes.
 *
 * @module domain/order-needs/order-needs-service
 */

import { createLogger, toError, type ValidationError } from '@medstock/core';
import {
  isErr,
  OrderNeedsFiltersSchema,
  type CommercialData,
  type FilterOptions,
  type HorizonInput,
  type OrderNeedsFilters,
  type OrderRow,
  type OrderTotals,
  type ProjectHorizon,
  type Result,
} from '@medstock/types';
import { activeFilter } from '../shared/filters.js';
import type { IItemClassifier } from '../shared/item-classifier.js';
import {
  DEFAULT_ORDER_NEEDS_CONFIG,
  type IOrderSourceRepository,
  type OrderNeedsServiceConfig,
  type OrderNeedsServiceDeps,
  type SourceQuantities,
  type StockScope,
} from './interfaces.js';
import {
  horizonEndDate,
  normalizeHorizonMonths,
  normalizeProjectHorizon,
  totalHorizonMonths,
} from './horizon.js';
import { applyOrderRowEdit } from './order-row-editor.js';
import { recomputeOrderRow } from './recompute.js';
import { collectCodes, synthesizeOrderRows } from './row-synthesizer.js';
import { summarizeOrderRows } from './totals.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const logger = createLogger({ name: 'order-needs-service' });

const EMPTY_HORIZON: ProjectHorizon = { leadMonths: 0, coverMonths: 0, bufferMonths: 0 };

// ============================================================================
// ORDER NEEDS SERVICE
// ============================================================================

/**
 * Order Needs Service
 *
 * @example
 * ```typescript
 * const service = createOrderNeedsService({ repository, classifier });
 *
 * const horizon = await service.loadDefaultHorizon();
 * const rows = await service.fetchOrderRows({ kit: 'All', ...horizon });
 * const totals = service.summarize(rows);
 * ```
 */
export class OrderNeedsService {
  private readonly config: OrderNeedsServiceConfig;
  private readonly repository: IOrderSourceRepository;
  private readonly classifier: IItemClassifier;

  constructor(deps: OrderNeedsServiceDeps, config?: Partial<OrderNeedsServiceConfig>) {
    this.config = { ...DEFAULT_ORDER_NEEDS_CONFIG, ...config };
    this.repository = deps.repository;
    this.classifier = deps.classifier;
  }

  // ==========================================================================
  // REFRESH
  // ==========================================================================

  /**
   * Fetch, join and recompute the order rows for a filter set
   *
   * Rows come back in ascending code order. Kit and module filters scope the
   * source reads; type and item-search filters apply after classification.
   */
  async fetchOrderRows(filters: OrderNeedsFilters = {}): Promise<OrderRow[]> {
    const parsed = OrderNeedsFiltersSchema.parse(filters);
    const scope: StockScope = {
      kit: activeFilter(parsed.kit),
      module: activeFilter(parsed.module),
    };
    const horizon = normalizeProjectHorizon(parsed);

    const quantities = await this.fetchSourceQuantities(scope, horizon);
    const codes = collectCodes(quantities);
    const commercialData = await this.fetchCommercialData(codes);

    const rows = await synthesizeOrderRows({ ...quantities, commercialData }, this.classifier, {
      type: parsed.type,
      itemSearch: parsed.itemSearch,
    });

    logger.info(
      {
        kit: scope.kit,
        module: scope.module,
        horizonMonths: totalHorizonMonths(horizon),
        codeCount: codes.length,
        rowCount: rows.length,
      },
      'Order needs computed'
    );

    return rows;
  }

  private async fetchSourceQuantities(
    scope: StockScope,
    horizon: ProjectHorizon
  ): Promise<SourceQuantities> {
    const horizonMonths = totalHorizonMonths(horizon);
    const horizonEnd = horizonEndDate(this.config.now(), horizon);

    const [standardQuantities, currentStock, expiringQuantities, loanBalances] = await Promise.all([
      this.readSource('standardQuantities', () =>
        this.repository.fetchStandardQuantities(scope)
      ),
      this.readSource('currentStock', () => this.repository.fetchCurrentStock(scope)),
      horizonMonths > 0
        ? this.readSource('expiringQuantities', () =>
            this.repository.fetchExpiringQuantities(scope, horizonEnd)
          )
        : Promise.resolve(new Map<string, number>()),
      this.readSource('loanBalances', () => this.repository.fetchLoanBalances(scope)),
    ]);

    return { standardQuantities, currentStock, expiringQuantities, loanBalances };
  }

  private async readSource(
    source: keyof SourceQuantities,
    read: () => Promise<Map<string, number>>
  ): Promise<Map<string, number>> {
    try {
      return await read();
    } catch (error) {
      logger.warn({ err: toError(error), source }, 'Order source unavailable, counted as empty');
      return new Map();
    }
  }

  private async fetchCommercialData(codes: readonly string[]): Promise<Map<string, CommercialData>> {
    if (codes.length === 0) {
      return new Map();
    }
    try {
      return await this.repository.fetchCommercialData(codes);
    } catch (error) {
      logger.warn(
        { err: toError(error), codeCount: codes.length },
        'Commercial data unavailable, catalog defaults used'
      );
      return new Map();
    }
  }

  // ==========================================================================
  // ROW OPERATIONS
  // ==========================================================================

  /**
   * Recalculate the derived fields of one row
   */
  recompute(row: OrderRow): OrderRow {
    return recomputeOrderRow(row);
  }

  /**
   * Validate and apply one user edit, returning the recomputed row
   */
  applyEdit(row: OrderRow, field: string, rawValue: string): Result<OrderRow, ValidationError> {
    const result = applyOrderRowEdit(row, field, rawValue);
    if (isErr(result)) {
      logger.debug({ code: row.code, field }, 'Order row edit rejected');
    }
    return result;
  }

  /**
   * Amount, weight and volume totals with the count of unpriced rows
   */
  summarize(rows: readonly OrderRow[]): OrderTotals {
    return summarizeOrderRows(rows);
  }

  // ==========================================================================
  // SETTINGS AND FILTER CHOICES
  // ==========================================================================

  /**
   * Horizon months stored with the project, each clamped to 0..24
   */
  async loadDefaultHorizon(): Promise<ProjectHorizon> {
    try {
      return normalizeProjectHorizon(await this.repository.fetchProjectHorizon());
    } catch (error) {
      logger.warn({ err: toError(error) }, 'Project horizon unavailable, using zero months');
      return EMPTY_HORIZON;
    }
  }

  /**
   * Kit and module numbers offered as filter choices
   */
  async getFilterOptions(): Promise<FilterOptions> {
    try {
      return await this.repository.fetchFilterOptions();
    } catch (error) {
      logger.warn({ err: toError(error) }, 'Filter options unavailable');
      return { kits: [], modules: [] };
    }
  }

  /**
   * Months typed into a horizon field: digits only, clamped to 0..24
   */
  normalizeHorizonMonths(value: HorizonInput): number {
    return normalizeHorizonMonths(value);
  }
}

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Create an Order Needs Service instance.
 *
 * @param deps - Source repository and item classifier
 * @param config - Optional configuration overrides
 */
export function createOrderNeedsService(
  deps: OrderNeedsServiceDeps,
  config?: Partial<OrderNeedsServiceConfig>
): OrderNeedsService {
  return new OrderNeedsService(deps, config);
}
