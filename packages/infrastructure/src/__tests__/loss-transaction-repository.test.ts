import { describe, it, expect, vi } from 'vitest';
import { DatabaseOperationError } from '@medstock/core';
import { LOSS_CATEGORIES } from '@medstock/types';
import type { LossQuery } from '@medstock/domain';
import { describeStoreSchema, type TransactionCapabilities } from '../database/schema-introspector.js';
import { PostgresLossTransactionRepository } from '../repositories/PostgresLossTransactionRepository.js';
import { createMockStorePool, FULL_LAYOUT } from './mock-store-pool.js';

const ALL_CATEGORIES: LossQuery = {
  categories: LOSS_CATEGORIES,
  scenario: null,
  kit: null,
  module: null,
  dateFrom: null,
  dateTo: null,
  docSearch: null,
};

const MINIMAL_LEDGER: TransactionCapabilities = {
  loans: false,
  losses: true,
  scenario: false,
  kit: false,
  module: false,
  expiryDate: false,
  documentNumber: false,
  remarks: false,
};

function fullLedger(): TransactionCapabilities {
  const columns = new Map([['stock_transactions', new Set(FULL_LAYOUT.stock_transactions)]]);
  const transactions = describeStoreSchema(columns).transactions;
  if (!transactions) {
    throw new Error('full layout must describe the ledger');
  }
  return transactions;
}

describe('PostgresLossTransactionRepository', () => {
  const repository = new PostgresLossTransactionRepository(createMockStorePool(FULL_LAYOUT));

  describe('buildSelect', () => {
    it('filters on loss categories alone by default', () => {
      const { sql, params } = repository.buildSelect(ALL_CATEGORIES, fullLedger());

      expect(sql).toBe(
        'SELECT date, code, out_type, qty_out, scenario, kit, module, expiry_date, document_number, remarks ' +
          'FROM stock_transactions WHERE out_type = ANY($1::text[])'
      );
      expect(params).toEqual([[...LOSS_CATEGORIES]]);
    });

    it('binds every filter in order', () => {
      const { sql, params } = repository.buildSelect(
        {
          categories: ['Expired Items'],
          scenario: 'S1',
          kit: 'KIT01',
          module: 'MOD02',
          dateFrom: '2024-01-01',
          dateTo: '2024-03-31',
          docSearch: 'INV',
        },
        fullLedger()
      );

      expect(sql).toBe(
        'SELECT date, code, out_type, qty_out, scenario, kit, module, expiry_date, document_number, remarks ' +
          'FROM stock_transactions WHERE out_type = ANY($1::text[]) AND scenario = $2 AND kit = $3 ' +
          'AND module = $4 AND date >= $5 AND date <= $6 AND document_number ILIKE $7'
      );
      expect(params).toEqual([
        ['Expired Items'],
        'S1',
        'KIT01',
        'MOD02',
        '2024-01-01',
        '2024-03-31',
        '%INV%',
      ]);
    });

    it('selects absent optional columns as NULL', () => {
      const { sql } = repository.buildSelect(ALL_CATEGORIES, MINIMAL_LEDGER);

      expect(sql).toBe(
        'SELECT date, code, out_type, qty_out, NULL AS scenario, NULL AS kit, NULL AS module, ' +
          'NULL AS expiry_date, NULL AS document_number, NULL AS remarks ' +
          'FROM stock_transactions WHERE out_type = ANY($1::text[])'
      );
    });
  });

  describe('findLossTransactions', () => {
    it('maps ledger rows to loss transactions', async () => {
      const pool = createMockStorePool(FULL_LAYOUT, () => [
        {
          date: new Date(2024, 2, 5),
          code: ' ABCDTABL1 ',
          out_type: 'Expired Items',
          qty_out: '3',
          scenario: 'S1',
          kit: null,
          module: null,
          expiry_date: new Date(2024, 1, 29),
          document_number: 'INV-7',
          remarks: null,
        },
      ]);

      const transactions = await new PostgresLossTransactionRepository(pool).findLossTransactions(
        ALL_CATEGORIES
      );

      expect(transactions).toEqual([
        {
          date: '2024-03-05',
          code: 'ABCDTABL1',
          lossCategory: 'Expired Items',
          qtyOut: '3',
          scenario: 'S1',
          kit: null,
          module: null,
          expiryDate: '2024-02-29',
          documentNumber: 'INV-7',
          remarks: null,
        },
      ]);
    });

    it('reports nothing when a filter names a column the ledger lacks', async () => {
      const pool = createMockStorePool({
        stock_transactions: ['date', 'code', 'qty_out', 'out_type'],
      });

      const transactions = await new PostgresLossTransactionRepository(pool).findLossTransactions({
        ...ALL_CATEGORIES,
        kit: 'KIT01',
      });

      expect(transactions).toEqual([]);
      expect(pool.connect).not.toHaveBeenCalled();
    });

    it('reports nothing without loss columns', async () => {
      const pool = createMockStorePool({ stock_transactions: ['code', 'qty_in', 'in_type'] });

      await expect(
        new PostgresLossTransactionRepository(pool).findLossTransactions(ALL_CATEGORIES)
      ).resolves.toEqual([]);
    });

    it('raises driver failures', async () => {
      const pool = createMockStorePool(FULL_LAYOUT);
      vi.mocked(pool.client.query).mockRejectedValueOnce(new Error('statement timeout'));

      await expect(
        new PostgresLossTransactionRepository(pool).findLossTransactions(ALL_CATEGORIES)
      ).rejects.toThrow('Database findLossTransactions failed: statement timeout');
      await expect(
        new PostgresLossTransactionRepository(pool).findLossTransactions(ALL_CATEGORIES)
      ).resolves.toEqual([]);
    });

    it('wraps failures in DatabaseOperationError', async () => {
      const pool = createMockStorePool(FULL_LAYOUT);
      vi.mocked(pool.query).mockRejectedValueOnce(new Error('connection refused'));

      await expect(
        new PostgresLossTransactionRepository(pool).findLossTransactions(ALL_CATEGORIES)
      ).rejects.toBeInstanceOf(DatabaseOperationError);
    });
  });
});
