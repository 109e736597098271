/**
 * @fileoverview PostgreSQL Order Source Repository (Infrastructure Layer)
 *
 * Reads the four order-needs sources (standing quantities, stock on hand,
 * expiring stock, loan balances), the commercial catalog, the project
 * horizon and the kit/module filter choices from the stock store.
 *
 * ## Hexagonal Architecture
 *
 * This is an **ADAPTER** - it implements the IOrderSourceRepository port
 * defined in the domain layer. The domain depends only on the interface.
 *
 * Every call runs on its own pooled connection. A table or column the store
 * does not have makes that read empty (debug log); driver failures are
 * raised as DatabaseOperationError for the service to degrade.
 *
 * @module @medstock/infrastructure/repositories/postgres-order-source-repository
 */

import {
  createLogger,
  DatabaseOperationError,
  isBlank,
  safeParseFloat,
  safeParseInt,
  SchemaUnavailableError,
  toError,
  toText,
  withConnection,
  type DatabasePool,
  type PoolClient,
} from '@medstock/core';
import {
  LOAN_IN_TYPES,
  LOAN_OUT_TYPES,
  type CommercialData,
  type FilterOptions,
  type ProjectHorizon,
} from '@medstock/types';
import {
  extractCodeFromUniqueId,
  type IOrderSourceRepository,
  type StockScope,
} from '@medstock/domain';
import {
  introspectStoreSchema,
  StoreSchemaCache,
  type StockDataCapabilities,
  type StoreSchema,
} from '../database/schema-introspector.js';
import { WhereClause } from '../database/where-clause.js';

const logger = createLogger({ name: 'order-source-repository' });

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

interface QuantityRow {
  code: unknown;
  qty: unknown;
}

interface LoanRow {
  code: unknown;
  qty_in: unknown;
  in_type: unknown;
  qty_out: unknown;
  out_type: unknown;
}

interface CommercialRow {
  code: unknown;
  pack_size?: unknown;
  price_per_pack?: unknown;
  weight_per_pack?: unknown;
  volume_per_pack?: unknown;
  account_code?: unknown;
}

interface ProjectSettingsRow {
  lead_months?: unknown;
  cover_months?: unknown;
  buffer_months?: unknown;
}

interface DistinctRow {
  value: unknown;
}

// ============================================================================
// QUANTITY ACCUMULATION
// ============================================================================

const LOAN_OUT: ReadonlySet<string> = new Set(LOAN_OUT_TYPES);
const LOAN_IN: ReadonlySet<string> = new Set(LOAN_IN_TYPES);

/**
 * Add `delta` to a code's total, registering the code even when the delta
 * could not be parsed
 */
function accumulate(totals: Map<string, number>, code: string, delta: number | null): void {
  if (code === '') return;
  totals.set(code, (totals.get(code) ?? 0) + (delta ?? 0));
}

function quantityOf(value: unknown): number | null {
  return isBlank(value) ? 0 : safeParseInt(value);
}

// ============================================================================
// REPOSITORY IMPLEMENTATION
// ============================================================================

/**
 * PostgreSQL implementation of the order source repository
 */
export class PostgresOrderSourceRepository implements IOrderSourceRepository {
  private readonly schema: StoreSchemaCache;

  constructor(
    private readonly pool: DatabasePool,
    schema?: StoreSchemaCache
  ) {
    this.schema = schema ?? new StoreSchemaCache(() => introspectStoreSchema(pool));
  }

  /**
   * Forget the cached store descriptor; the next read introspects again
   */
  invalidateSchema(): void {
    this.schema.invalidate();
  }

  // ============================================================================
  // SOURCE QUANTITIES
  // ============================================================================

  async fetchStandardQuantities(scope: StockScope): Promise<Map<string, number>> {
    return this.read('standardQuantities', () => new Map<string, number>(), async (client, schema) => {
      const capabilities = schema.standardQuantities;
      if (!capabilities) {
        throw new SchemaUnavailableError('std_qty_helper', ['code', 'std_qty']);
      }

      const where = new WhereClause();
      if (scope.kit !== null && capabilities.kit) where.equals('kit', scope.kit);
      if (scope.module !== null && capabilities.module) where.equals('module', scope.module);

      const { rows } = await client.query<QuantityRow>(
        `SELECT code, std_qty AS qty FROM std_qty_helper ${where.toSql()}`,
        where.params
      );

      const totals = new Map<string, number>();
      for (const row of rows) {
        accumulate(totals, toText(row.code), quantityOf(row.qty));
      }
      return totals;
    });
  }

  async fetchCurrentStock(scope: StockScope): Promise<Map<string, number>> {
    return this.read('currentStock', () => new Map<string, number>(), async (client, schema) => {
      const stock = this.requireStockData(schema);
      const where = this.stockWhere(stock, scope);
      return this.sumStock(client, stock, where);
    });
  }

  async fetchExpiringQuantities(
    scope: StockScope,
    horizonEnd: string
  ): Promise<Map<string, number>> {
    return this.read('expiringQuantities', () => new Map<string, number>(), async (client, schema) => {
      const stock = this.requireStockData(schema);
      if (!stock.expDate) {
        throw new SchemaUnavailableError('stock_data', ['exp_date']);
      }

      const where = new WhereClause()
        .and('final_qty IS NOT NULL')
        .and('exp_date IS NOT NULL')
        .and(`exp_date::text <> ''`);
      where.and(`exp_date::text <= ${where.param(horizonEnd)}`);
      this.scopeStock(where, stock, scope);

      return this.sumStock(client, stock, where);
    });
  }

  async fetchLoanBalances(scope: StockScope): Promise<Map<string, number>> {
    return this.read('loanBalances', () => new Map<string, number>(), async (client, schema) => {
      const transactions = schema.transactions;
      if (!transactions?.loans) {
        throw new SchemaUnavailableError('stock_transactions', [
          'code',
          'qty_in',
          'qty_out',
          'in_type',
          'out_type',
        ]);
      }

      const where = new WhereClause();
      where.and(
        `(out_type = ANY(${where.param([...LOAN_OUT_TYPES])}::text[]) OR in_type = ANY(${where.param([...LOAN_IN_TYPES])}::text[]))`
      );
      if (scope.kit !== null && transactions.kit) where.equals('kit', scope.kit);
      if (scope.module !== null && transactions.module) where.equals('module', scope.module);

      const { rows } = await client.query<LoanRow>(
        `SELECT code, qty_in, in_type, qty_out, out_type FROM stock_transactions ${where.toSql()}`,
        where.params
      );

      const balances = new Map<string, number>();
      for (const row of rows) {
        const code = toText(row.code);
        // Zero, blank or unparsable movements leave the code unregistered
        const lent = safeParseInt(row.qty_out);
        if (LOAN_OUT.has(toText(row.out_type)) && lent !== null && lent !== 0) {
          accumulate(balances, code, lent);
        }
        const returned = safeParseInt(row.qty_in);
        if (LOAN_IN.has(toText(row.in_type)) && returned !== null && returned !== 0) {
          accumulate(balances, code, -returned);
        }
      }
      return balances;
    });
  }

  // ============================================================================
  // COMMERCIAL CATALOG
  // ============================================================================

  async fetchCommercialData(codes: readonly string[]): Promise<Map<string, CommercialData>> {
    if (codes.length === 0) {
      return new Map();
    }

    return this.read('commercialData', () => new Map<string, CommercialData>(), async (client, schema) => {
      const catalog = schema.catalog;
      if (!catalog) {
        throw new SchemaUnavailableError('items_list', ['code']);
      }

      const columns = ['code'];
      if (catalog.pack) columns.push('pack AS pack_size');
      if (catalog.pricePerPack) columns.push('price_per_pack_euros AS price_per_pack');
      if (catalog.weightPerPack) columns.push('weight_per_pack_kg AS weight_per_pack');
      if (catalog.volumePerPack) columns.push('volume_per_pack_dm3 AS volume_per_pack');
      if (catalog.accountCode) columns.push('account_code');

      const { rows } = await client.query<CommercialRow>(
        `SELECT ${columns.join(', ')} FROM items_list WHERE code = ANY($1::text[])`,
        [[...codes]]
      );

      const data = new Map<string, CommercialData>();
      for (const row of rows) {
        const code = toText(row.code);
        if (code === '') continue;
        data.set(code, this.rowToCommercialData(row));
      }
      return data;
    });
  }

  private rowToCommercialData(row: CommercialRow): CommercialData {
    return {
      packSize: safeParseInt(row.pack_size) ?? 0,
      pricePerPack: safeParseFloat(row.price_per_pack),
      weightPerPack: safeParseFloat(row.weight_per_pack),
      volumePerPackDm3: safeParseFloat(row.volume_per_pack),
      accountCode: toText(row.account_code),
    };
  }

  // ============================================================================
  // SETTINGS AND FILTER CHOICES
  // ============================================================================

  async fetchProjectHorizon(): Promise<ProjectHorizon> {
    const none: ProjectHorizon = { leadMonths: 0, coverMonths: 0, bufferMonths: 0 };

    return this.read('projectHorizon', () => none, async (client, schema) => {
      const settings = schema.projectSettings;
      if (!settings) {
        throw new SchemaUnavailableError('project_details', []);
      }

      const columns: string[] = [];
      if (settings.leadMonths) columns.push('lead_time_months AS lead_months');
      if (settings.coverMonths) columns.push('cover_period_months AS cover_months');
      if (settings.bufferMonths) columns.push('buffer_months');
      if (columns.length === 0) {
        return none;
      }

      const { rows } = await client.query<ProjectSettingsRow>(
        `SELECT ${columns.join(', ')} FROM project_details LIMIT 1`
      );
      const row = rows[0];
      if (!row) {
        return none;
      }

      return {
        leadMonths: safeParseInt(row.lead_months) ?? 0,
        coverMonths: safeParseInt(row.cover_months) ?? 0,
        bufferMonths: safeParseInt(row.buffer_months) ?? 0,
      };
    });
  }

  async fetchFilterOptions(): Promise<FilterOptions> {
    return this.read('filterOptions', () => ({ kits: [], modules: [] }), async (client, schema) => {
      const stock = this.requireStockData(schema);

      return {
        kits: stock.kitNumber ? await this.distinctValues(client, 'kit_number') : [],
        modules: stock.moduleNumber ? await this.distinctValues(client, 'module_number') : [],
      };
    });
  }

  private async distinctValues(
    client: PoolClient,
    column: 'kit_number' | 'module_number'
  ): Promise<string[]> {
    const { rows } = await client.query<DistinctRow>(
      `SELECT DISTINCT ${column} AS value FROM stock_data
       WHERE ${column} IS NOT NULL AND ${column} <> '' AND ${column} <> 'None'
       ORDER BY ${column}`
    );
    return rows.map((row) => toText(row.value));
  }

  // ============================================================================
  // STOCK LEDGER HELPERS
  // ============================================================================

  private requireStockData(schema: StoreSchema): StockDataCapabilities {
    if (!schema.stockData) {
      throw new SchemaUnavailableError('stock_data', ['final_qty', 'code']);
    }
    return schema.stockData;
  }

  private stockWhere(stock: StockDataCapabilities, scope: StockScope): WhereClause {
    const where = new WhereClause().and('final_qty IS NOT NULL');
    this.scopeStock(where, stock, scope);
    return where;
  }

  private scopeStock(where: WhereClause, stock: StockDataCapabilities, scope: StockScope): void {
    if (scope.kit !== null && stock.kitNumber) where.equals('kit_number', scope.kit);
    if (scope.module !== null && stock.moduleNumber) where.equals('module_number', scope.module);
  }

  private async sumStock(
    client: PoolClient,
    stock: StockDataCapabilities,
    where: WhereClause
  ): Promise<Map<string, number>> {
    const { rows } = await client.query<QuantityRow>(
      `SELECT ${stock.codeColumn} AS code, final_qty AS qty FROM stock_data ${where.toSql()}`,
      where.params
    );

    const totals = new Map<string, number>();
    for (const row of rows) {
      const raw = toText(row.code);
      const code = stock.codeColumn === 'code' ? raw : extractCodeFromUniqueId(raw);
      accumulate(totals, code, quantityOf(row.qty));
    }
    return totals;
  }

  // ============================================================================
  // CONNECTION SCOPE
  // ============================================================================

  /**
   * Run one read on its own connection. A store without the needed table or
   * columns yields `empty()`; a driver error is raised.
   */
  private async read<T>(
    source: string,
    empty: () => T,
    query: (client: PoolClient, schema: StoreSchema) => Promise<T>
  ): Promise<T> {
    try {
      const schema = await this.schema.get();
      return await withConnection(this.pool, (client) => query(client, schema));
    } catch (error) {
      if (error instanceof SchemaUnavailableError) {
        logger.debug(
          { source, table: error.table, missingColumns: error.missingColumns },
          'Source not present in this store, counted as empty'
        );
        return empty();
      }
      const err = toError(error);
      throw new DatabaseOperationError(source, err.message, err);
    }
  }
}
