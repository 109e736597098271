/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters implementing the domain ports against the PostgreSQL stock
 * store, plus the spreadsheet export of report sheets.
 *
 * @module @medstock/infrastructure
 *
 * ## Architecture Overview
 *
 * ```
 *    DOMAIN LAYER                          INFRASTRUCTURE LAYER
 *   ┌────────────────────────┐            ┌──────────────────────────────────┐
 *   │ IOrderSourceRepository │─implements▶│ PostgresOrderSourceRepository    │
 *   │ ILossTransactionRepo.  │─implements▶│ PostgresLossTransactionRepository│
 *   │ IItemClassifier        │─implements▶│ PostgresItemCatalog              │
 *   │ ReportSheet            │───written─▶│ XlsxReportWriter                 │
 *   └────────────────────────┘            └──────────────────────────────────┘
 *                                                   │ one descriptor per pool
 *                                                   ▼
 *                                         StoreSchemaCache (information_schema)
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * import { createInventoryServicesFromEnv } from '@medstock/infrastructure';
 *
 * const services = createInventoryServicesFromEnv();
 * const horizon = await services.orderNeeds.loadDefaultHorizon();
 * const rows = await services.orderNeeds.fetchOrderRows({ ...horizon, type: 'Item' });
 * ```
 */

import {
  createIsolatedDatabaseClient,
  DatabaseConfigError,
  getEnv,
  type AppEnv,
  type DatabasePool,
} from '@medstock/core';
import type { CatalogLanguage } from '@medstock/types';
import {
  createLossReportService,
  createOrderNeedsService,
  type LossReportService,
  type OrderNeedsService,
} from '@medstock/domain';
import { introspectStoreSchema, StoreSchemaCache } from './database/schema-introspector.js';
import { PostgresOrderSourceRepository } from './repositories/PostgresOrderSourceRepository.js';
import { PostgresLossTransactionRepository } from './repositories/PostgresLossTransactionRepository.js';
import { PostgresItemCatalog } from './repositories/PostgresItemCatalog.js';
import { XlsxReportWriter } from './export/XlsxReportWriter.js';

// ============================================================================
// ADAPTER EXPORTS
// ============================================================================

export {
  STORE_TABLES,
  DESCRIPTION_COLUMNS,
  describeStoreSchema,
  introspectStoreSchema,
  StoreSchemaCache,
  type StoreTable,
  type ColumnsByTable,
  type StoreSchema,
  type StandardQuantitiesCapabilities,
  type StockDataCapabilities,
  type TransactionCapabilities,
  type CatalogCapabilities,
  type ProjectSettingsCapabilities,
  type DescriptionColumn,
} from './database/schema-introspector.js';

export { WhereClause } from './database/where-clause.js';
export { PostgresOrderSourceRepository } from './repositories/PostgresOrderSourceRepository.js';
export { PostgresLossTransactionRepository } from './repositories/PostgresLossTransactionRepository.js';
export {
  PostgresItemCatalog,
  NO_DESCRIPTION,
  type ItemCatalogConfig,
} from './repositories/PostgresItemCatalog.js';
export { XlsxReportWriter, XLSX_MIME_TYPE } from './export/XlsxReportWriter.js';

// ============================================================================
// SERVICE WIRING
// ============================================================================

export interface InventoryServicesOptions {
  /** Preferred catalog description language */
  readonly language?: CatalogLanguage;
  /** Clock for horizon and date-range resolution */
  readonly now?: () => Date;
}

export interface InventoryServices {
  readonly pool: DatabasePool;
  readonly orderNeeds: OrderNeedsService;
  readonly losses: LossReportService;
  readonly catalog: PostgresItemCatalog;
  readonly reportWriter: XlsxReportWriter;
  /** Re-read the store schema and drop memoised descriptions */
  invalidateSchema(): void;
}

/**
 * Wire both engines to one store pool, sharing the schema descriptor and
 * the item catalog
 */
export function createInventoryServices(
  pool: DatabasePool,
  options: InventoryServicesOptions = {}
): InventoryServices {
  const schema = new StoreSchemaCache(() => introspectStoreSchema(pool));
  const catalog = new PostgresItemCatalog(pool, { language: options.language ?? 'en' }, schema);
  const clock = options.now ? { now: options.now } : {};

  const orderNeeds = createOrderNeedsService(
    { repository: new PostgresOrderSourceRepository(pool, schema), classifier: catalog },
    clock
  );
  const losses = createLossReportService(
    { repository: new PostgresLossTransactionRepository(pool, schema), classifier: catalog },
    clock
  );

  return {
    pool,
    orderNeeds,
    losses,
    catalog,
    reportWriter: new XlsxReportWriter(),
    invalidateSchema: () => {
      schema.invalidate();
      catalog.clear();
    },
  };
}

/**
 * Wire the services from the validated environment
 *
 * @throws DatabaseConfigError when DATABASE_URL is not set
 */
export function createInventoryServicesFromEnv(env: AppEnv = getEnv()): InventoryServices {
  if (!env.DATABASE_URL) {
    throw new DatabaseConfigError('inventory', 'DATABASE_URL must be configured');
  }

  const pool = createIsolatedDatabaseClient({
    connectionString: env.DATABASE_URL,
    maxConnections: env.DATABASE_MAX_CONNECTIONS,
    ssl: env.DATABASE_SSL,
  });

  return createInventoryServices(pool, { language: env.CATALOG_LANGUAGE });
}
