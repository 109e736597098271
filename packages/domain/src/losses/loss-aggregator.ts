/**
 * @fileoverview Loss aggregator
 *
 * Groups write-off transactions by (date, code, category), summing outbound
 * quantities and folding the one-to-many side attributes into
 * de-duplicated sets. Pure; classification and filtering by item happen in
 * the service.
 *
 * @module domain/losses/loss-aggregator
 */

import { compareOrdinal, isPlaceholder, safeParseInt } from '@medstock/core';
import {
  LOSS_CATEGORIES,
  type ItemType,
  type LossCategory,
  type LossRecord,
} from '@medstock/types';
import { activeFilter } from '../shared/filters.js';
import type { LossTransaction } from './interfaces.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Aggregate of the transactions sharing one (date, code, category) key
 */
export interface LossGroup {
  readonly date: string;
  readonly code: string;
  readonly lossCategory: string;
  readonly quantity: number;
  readonly scenarios: ReadonlySet<string>;
  readonly kits: ReadonlySet<string>;
  readonly modules: ReadonlySet<string>;
  readonly expiryDates: ReadonlySet<string>;
  readonly documents: ReadonlySet<string>;
  readonly remarks: ReadonlySet<string>;
}

interface MutableLossGroup {
  date: string;
  code: string;
  lossCategory: string;
  quantity: number;
  scenarios: Set<string>;
  kits: Set<string>;
  modules: Set<string>;
  expiryDates: Set<string>;
  documents: Set<string>;
  remarks: Set<string>;
}

// ============================================================================
// CATEGORY RESOLUTION
// ============================================================================

/**
 * Categories selected by a category filter
 *
 * An inactive filter selects the whole taxonomy; a value outside the
 * taxonomy selects nothing.
 */
export function resolveLossCategories(filter: string | null | undefined): LossCategory[] {
  const active = activeFilter(filter);
  if (active === null) {
    return [...LOSS_CATEGORIES];
  }
  const match = LOSS_CATEGORIES.find((category) => category.toLowerCase() === active.toLowerCase());
  return match ? [match] : [];
}

// ============================================================================
// GROUPING
// ============================================================================

function addSideValue(target: Set<string>, value: string | null): void {
  if (value === null || isPlaceholder(value)) return;
  target.add(value.trim());
}

function groupKey(date: string, code: string, lossCategory: string): string {
  return JSON.stringify([date, code, lossCategory]);
}

/**
 * Fold transactions into groups, in order of first appearance
 *
 * Transactions without a code are skipped. Null or unparsable quantities
 * add nothing but the group is still reported.
 */
export function groupLossTransactions(transactions: readonly LossTransaction[]): LossGroup[] {
  const groups = new Map<string, MutableLossGroup>();

  for (const transaction of transactions) {
    const code = transaction.code.trim();
    if (code === '') continue;

    const key = groupKey(transaction.date, code, transaction.lossCategory);
    let group = groups.get(key);
    if (!group) {
      group = {
        date: transaction.date,
        code,
        lossCategory: transaction.lossCategory,
        quantity: 0,
        scenarios: new Set(),
        kits: new Set(),
        modules: new Set(),
        expiryDates: new Set(),
        documents: new Set(),
        remarks: new Set(),
      };
      groups.set(key, group);
    }

    group.quantity += safeParseInt(transaction.qtyOut) ?? 0;
    addSideValue(group.scenarios, transaction.scenario);
    addSideValue(group.kits, transaction.kit);
    addSideValue(group.modules, transaction.module);
    addSideValue(group.expiryDates, transaction.expiryDate);
    addSideValue(group.documents, transaction.documentNumber);
    addSideValue(group.remarks, transaction.remarks);
  }

  return [...groups.values()];
}

// ============================================================================
// RENDERING
// ============================================================================

/**
 * Sorted, comma-joined rendering of a side-attribute set
 */
export function joinSorted(values: ReadonlySet<string>): string {
  return [...values].sort(compareOrdinal).join(', ');
}

export function toLossRecord(group: LossGroup, description: string, type: ItemType): LossRecord {
  return {
    date: group.date,
    code: group.code,
    description,
    type,
    lossCategory: group.lossCategory,
    quantity: group.quantity,
    scenarios: joinSorted(group.scenarios),
    kits: joinSorted(group.kits),
    modules: joinSorted(group.modules),
    expiryDates: joinSorted(group.expiryDates),
    documents: joinSorted(group.documents),
    remarks: joinSorted(group.remarks),
  };
}

/**
 * Order by (date, type, code, category) ascending
 */
export function sortLossRecords(records: readonly LossRecord[]): LossRecord[] {
  return [...records].sort(
    (a, b) =>
      compareOrdinal(a.date, b.date) ||
      compareOrdinal(a.type, b.type) ||
      compareOrdinal(a.code, b.code) ||
      compareOrdinal(a.lossCategory, b.lossCategory)
  );
}
