/**
 * @fileoverview Loss Report Interfaces
 *
 * @module domain/losses/interfaces
 */

import type { LossCategory } from '@medstock/types';
import type { IItemClassifier } from '../shared/item-classifier.js';

// ============================================================================
// VALUE TYPES
// ============================================================================

/**
 * One outbound write-off transaction as read from the ledger
 */
export interface LossTransaction {
  /** YYYY-MM-DD */
  readonly date: string;
  readonly code: string;
  readonly lossCategory: string;
  /** Raw outbound quantity; unparsable values are ignored when summing */
  readonly qtyOut: string | number | null;
  readonly scenario: string | null;
  readonly kit: string | null;
  readonly module: string | null;
  readonly expiryDate: string | null;
  readonly documentNumber: string | null;
  readonly remarks: string | null;
}

/**
 * Store-side selection of a loss report run
 *
 * `null` fields are unfiltered. Dates are inclusive YYYY-MM-DD bounds.
 */
export interface LossQuery {
  readonly categories: readonly LossCategory[];
  readonly scenario: string | null;
  readonly kit: string | null;
  readonly module: string | null;
  readonly dateFrom: string | null;
  readonly dateTo: string | null;
  readonly docSearch: string | null;
}

// ============================================================================
// REPOSITORY INTERFACE
// ============================================================================

/**
 * Repository interface for loss transactions
 */
export interface ILossTransactionRepository {
  /**
   * Transactions matching the query; empty when the ledger lacks a required
   * column. Throws on driver errors.
   */
  findLossTransactions(query: LossQuery): Promise<LossTransaction[]>;
}

// ============================================================================
// SERVICE CONFIGURATION
// ============================================================================

export interface LossReportServiceConfig {
  /** Clock used to clamp the end of the date range */
  readonly now: () => Date;
}

export const DEFAULT_LOSS_REPORT_CONFIG: LossReportServiceConfig = {
  now: () => new Date(),
};

export interface LossReportServiceDeps {
  readonly repository: ILossTransactionRepository;
  readonly classifier: IItemClassifier;
}
