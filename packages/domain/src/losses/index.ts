/**
 * @fileoverview Loss Report Module
 *
 * @module domain/losses
 */

export {
  DEFAULT_LOSS_REPORT_CONFIG,
  type LossTransaction,
  type LossQuery,
  type ILossTransactionRepository,
  type LossReportServiceConfig,
  type LossReportServiceDeps,
} from './interfaces.js';

export {
  resolveLossCategories,
  groupLossTransactions,
  joinSorted,
  toLossRecord,
  sortLossRecords,
  type LossGroup,
} from './loss-aggregator.js';

export { LossReportService, createLossReportService } from './loss-report-service.js';
