/**
 * @fileoverview PostgreSQL Loss Transaction Repository (Infrastructure Layer)
 *
 * Outbound write-offs from the transaction ledger, filtered in SQL by loss
 * category, scenario, kit, module, date range and document number.
 *
 * Implements the ILossTransactionRepository port of the domain layer.
 *
 * @module @medstock/infrastructure/repositories/postgres-loss-transaction-repository
 */

import {
  createLogger,
  DatabaseOperationError,
  toError,
  toText,
  withConnection,
  type DatabasePool,
} from '@medstock/core';
import {
  normalizeDateValue,
  type ILossTransactionRepository,
  type LossQuery,
  type LossTransaction,
} from '@medstock/domain';
import {
  introspectStoreSchema,
  StoreSchemaCache,
  type TransactionCapabilities,
} from '../database/schema-introspector.js';
import { WhereClause } from '../database/where-clause.js';

const logger = createLogger({ name: 'loss-transaction-repository' });

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

interface LossTransactionRow {
  date: unknown;
  code: unknown;
  out_type: unknown;
  qty_out: unknown;
  scenario: unknown;
  kit: unknown;
  module: unknown;
  expiry_date: unknown;
  document_number: unknown;
  remarks: unknown;
}

function optionalText(value: unknown): string | null {
  return value === null || value === undefined ? null : toText(value);
}

function rawQuantity(value: unknown): string | number | null {
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return Number(value);
  return null;
}

// ============================================================================
// REPOSITORY IMPLEMENTATION
// ============================================================================

/**
 * PostgreSQL implementation of the loss transaction repository
 */
export class PostgresLossTransactionRepository implements ILossTransactionRepository {
  private readonly schema: StoreSchemaCache;

  constructor(
    private readonly pool: DatabasePool,
    schema?: StoreSchemaCache
  ) {
    this.schema = schema ?? new StoreSchemaCache(() => introspectStoreSchema(pool));
  }

  invalidateSchema(): void {
    this.schema.invalidate();
  }

  async findLossTransactions(query: LossQuery): Promise<LossTransaction[]> {
    try {
      const schema = await this.schema.get();
      const transactions = schema.transactions;

      if (!transactions?.losses) {
        logger.debug('Transaction ledger lacks loss columns, no losses reported');
        return [];
      }
      if (this.filtersAbsentColumn(query, transactions)) {
        logger.debug('Loss filter names a column the ledger lacks, no losses reported');
        return [];
      }

      const { sql, params } = this.buildSelect(query, transactions);
      const { rows } = await withConnection(this.pool, (client) =>
        client.query<LossTransactionRow>(sql, params)
      );

      return rows.map((row) => this.rowToLossTransaction(row));
    } catch (error) {
      const err = toError(error);
      throw new DatabaseOperationError('findLossTransactions', err.message, err);
    }
  }

  /**
   * SELECT for one report run; absent optional columns are selected as NULL
   */
  buildSelect(
    query: LossQuery,
    columns: TransactionCapabilities
  ): { sql: string; params: unknown[] } {
    const optional = (present: boolean, column: string) =>
      present ? column : `NULL AS ${column}`;

    const where = new WhereClause();
    where.and(`out_type = ANY(${where.param([...query.categories])}::text[])`);
    if (query.scenario !== null) where.equals('scenario', query.scenario);
    if (query.kit !== null) where.equals('kit', query.kit);
    if (query.module !== null) where.equals('module', query.module);
    if (query.dateFrom !== null) where.and(`date >= ${where.param(query.dateFrom)}`);
    if (query.dateTo !== null) where.and(`date <= ${where.param(query.dateTo)}`);
    if (query.docSearch !== null) {
      where.and(`document_number ILIKE ${where.param(`%${query.docSearch}%`)}`);
    }

    const select = [
      'date',
      'code',
      'out_type',
      'qty_out',
      optional(columns.scenario, 'scenario'),
      optional(columns.kit, 'kit'),
      optional(columns.module, 'module'),
      optional(columns.expiryDate, 'expiry_date'),
      optional(columns.documentNumber, 'document_number'),
      optional(columns.remarks, 'remarks'),
    ];

    return {
      sql: `SELECT ${select.join(', ')} FROM stock_transactions ${where.toSql()}`,
      params: where.params,
    };
  }

  private filtersAbsentColumn(query: LossQuery, columns: TransactionCapabilities): boolean {
    return (
      (query.scenario !== null && !columns.scenario) ||
      (query.kit !== null && !columns.kit) ||
      (query.module !== null && !columns.module) ||
      (query.docSearch !== null && !columns.documentNumber)
    );
  }

  private rowToLossTransaction(row: LossTransactionRow): LossTransaction {
    return {
      date: normalizeDateValue(row.date),
      code: toText(row.code),
      lossCategory: toText(row.out_type),
      qtyOut: rawQuantity(row.qty_out),
      scenario: optionalText(row.scenario),
      kit: optionalText(row.kit),
      module: optionalText(row.module),
      expiryDate:
        row.expiry_date instanceof Date
          ? normalizeDateValue(row.expiry_date)
          : optionalText(row.expiry_date),
      documentNumber: optionalText(row.document_number),
      remarks: optionalText(row.remarks),
    };
  }
}
