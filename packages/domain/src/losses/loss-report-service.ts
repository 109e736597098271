/**
 * @fileoverview Loss Report Service
 *
 * Write-off report grouped by (date, item code, loss category). The store
 * query applies the category, scenario, kit, module, date and document
 * filters; item type and item search are applied after classification.
 *
 * A driver error aborts the whole report: it is logged and the report is
 * empty.
 *
 * @module domain/losses/loss-report-service
 */

import { createLogger, toError } from '@medstock/core';
import { LossFiltersSchema, type LossFilters, type LossRecord } from '@medstock/types';
import { resolveDateRange, formatIsoDate } from '../shared/dates.js';
import { activeFilter, matchesItemSearch, matchesTypeFilter } from '../shared/filters.js';
import type { IItemClassifier } from '../shared/item-classifier.js';
import {
  DEFAULT_LOSS_REPORT_CONFIG,
  type ILossTransactionRepository,
  type LossQuery,
  type LossReportServiceConfig,
  type LossReportServiceDeps,
} from './interfaces.js';
import {
  groupLossTransactions,
  resolveLossCategories,
  sortLossRecords,
  toLossRecord,
  type LossGroup,
} from './loss-aggregator.js';

const logger = createLogger({ name: 'loss-report-service' });

/**
 * Loss Report Service
 *
 * @example
 * ```typescript
 * const service = createLossReportService({ repository, classifier });
 * const records = await service.aggregateLosses({
 *   lossCategory: 'Expired Items',
 *   dateFrom: '01/2024',
 *   dateTo: '2024',
 * });
 * ```
 */
export class LossReportService {
  private readonly config: LossReportServiceConfig;
  private readonly repository: ILossTransactionRepository;
  private readonly classifier: IItemClassifier;

  constructor(deps: LossReportServiceDeps, config?: Partial<LossReportServiceConfig>) {
    this.config = { ...DEFAULT_LOSS_REPORT_CONFIG, ...config };
    this.repository = deps.repository;
    this.classifier = deps.classifier;
  }

  /**
   * Build the store query for a filter set, or `null` when the category
   * filter names no known loss category
   */
  buildQuery(filters: LossFilters = {}): LossQuery | null {
    const parsed = LossFiltersSchema.parse(filters);

    const categories = resolveLossCategories(parsed.lossCategory);
    if (categories.length === 0) {
      return null;
    }

    const range = resolveDateRange(parsed.dateFrom, parsed.dateTo, this.config.now());

    return {
      categories,
      scenario: activeFilter(parsed.scenario),
      kit: activeFilter(parsed.kit),
      module: activeFilter(parsed.module),
      dateFrom: range.from ? formatIsoDate(range.from) : null,
      dateTo: range.to ? formatIsoDate(range.to) : null,
      docSearch: parsed.docSearch?.trim() || null,
    };
  }

  /**
   * Aggregate write-offs into records sorted by (date, type, code, category)
   */
  async aggregateLosses(filters: LossFilters = {}): Promise<LossRecord[]> {
    const query = this.buildQuery(filters);
    if (!query) {
      logger.debug({ lossCategory: filters.lossCategory }, 'Unknown loss category, empty report');
      return [];
    }

    try {
      const transactions = await this.repository.findLossTransactions(query);
      const groups = groupLossTransactions(transactions);
      const records = await this.classifyGroups(groups, filters);

      logger.info(
        { transactionCount: transactions.length, recordCount: records.length },
        'Loss report aggregated'
      );
      return sortLossRecords(records);
    } catch (error) {
      logger.error({ err: toError(error) }, 'Loss aggregation failed, empty report');
      return [];
    }
  }

  private async classifyGroups(
    groups: readonly LossGroup[],
    filters: LossFilters
  ): Promise<LossRecord[]> {
    await this.classifier.prefetch?.([...new Set(groups.map((group) => group.code))]);

    const records: LossRecord[] = [];
    for (const group of groups) {
      const description = await this.classifier.describe(group.code);
      const type = this.classifier.classify(group.code, description);

      if (!matchesTypeFilter(type, filters.type)) continue;
      if (!matchesItemSearch({ code: group.code, description, type }, filters.itemSearch)) continue;

      records.push(toLossRecord(group, description, type));
    }
    return records;
  }
}

/**
 * Create a Loss Report Service instance.
 */
export function createLossReportService(
  deps: LossReportServiceDeps,
  config?: Partial<LossReportServiceConfig>
): LossReportService {
  return new LossReportService(deps, config);
}
