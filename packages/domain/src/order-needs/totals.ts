/**
 * @fileoverview Order totals
 *
 * @module domain/order-needs/totals
 */

import type { OrderRow, OrderTotals } from '@medstock/types';

/**
 * Sum amount, weight and volume; count rows priced at zero
 */
export function summarizeOrderRows(rows: readonly OrderRow[]): OrderTotals {
  return rows.reduce<OrderTotals>(
    (totals, row) => ({
      rowCount: totals.rowCount + 1,
      totalAmount: totals.totalAmount + row.amount,
      totalWeightKg: totals.totalWeightKg + row.weightKg,
      totalVolumeM3: totals.totalVolumeM3 + row.volumeM3,
      missingPriceCount: totals.missingPriceCount + (row.pricePerPack === 0 ? 1 : 0),
    }),
    { rowCount: 0, totalAmount: 0, totalWeightKg: 0, totalVolumeM3: 0, missingPriceCount: 0 }
  );
}
