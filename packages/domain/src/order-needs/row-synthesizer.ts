/**
 * @fileoverview Row synthesizer
 *
 * Merges the four source maps and the commercial join into one recomputed
 * OrderRow per item code, in ascending code order.
 *
 * @module domain/order-needs/row-synthesizer
 */

import { compareOrdinal } from '@medstock/core';
import type { ItemType, OrderRow, TextFilter } from '@medstock/types';
import type { IItemClassifier } from '../shared/item-classifier.js';
import { matchesItemSearch, matchesTypeFilter } from '../shared/filters.js';
import { DEFAULT_COMMERCIAL_DATA, type OrderSources, type SourceQuantities } from './interfaces.js';
import { recomputeOrderRow } from './recompute.js';

export interface RowFilters {
  readonly type?: TextFilter;
  readonly itemSearch?: TextFilter;
}

/**
 * Sorted union of every code seen by the four fetchers
 */
export function collectCodes(sources: SourceQuantities): string[] {
  const codes = new Set<string>([
    ...sources.standardQuantities.keys(),
    ...sources.currentStock.keys(),
    ...sources.expiringQuantities.keys(),
    ...sources.loanBalances.keys(),
  ]);
  return [...codes].sort(compareOrdinal);
}

/**
 * Fresh row for one code: editable fields at 0, no quantity override,
 * empty remarks. Derived fields are filled by the recompute engine.
 */
export function createOrderRow(
  code: string,
  description: string,
  type: ItemType,
  sources: OrderSources
): OrderRow {
  const commercial = sources.commercialData.get(code) ?? DEFAULT_COMMERCIAL_DATA;

  return recomputeOrderRow({
    code,
    description,
    type,
    standardQty: sources.standardQuantities.get(code) ?? 0,
    currentStock: sources.currentStock.get(code) ?? 0,
    qtyExpiring: sources.expiringQuantities.get(code) ?? 0,
    backOrders: 0,
    loanBalance: sources.loanBalances.get(code) ?? 0,
    plannedDonsGive: 0,
    donsReceive: 0,
    packSize: commercial.packSize,
    pricePerPack: commercial.pricePerPack,
    weightPerPack: commercial.weightPerPack,
    volumePerPackDm3: commercial.volumePerPackDm3,
    accountCode: commercial.accountCode,
    qtyNeeded: 0,
    qtyToOrderOverride: null,
    qtyToOrder: 0,
    qtyToOrderRounded: 0,
    amount: 0,
    weightKg: 0,
    volumeM3: 0,
    remarks: '',
  });
}

/**
 * Build the filtered, recomputed rows of one refresh
 */
export async function synthesizeOrderRows(
  sources: OrderSources,
  classifier: IItemClassifier,
  filters: RowFilters = {}
): Promise<OrderRow[]> {
  const codes = collectCodes(sources);
  const rows: OrderRow[] = [];

  await classifier.prefetch?.(codes);

  for (const code of codes) {
    const description = await classifier.describe(code);
    const type = classifier.classify(code, description);

    if (!matchesTypeFilter(type, filters.type)) continue;
    if (!matchesItemSearch({ code, description, type }, filters.itemSearch)) continue;

    rows.push(createOrderRow(code, description, type, sources));
  }

  return rows;
}
