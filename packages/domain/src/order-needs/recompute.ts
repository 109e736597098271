/**
 * @fileoverview Order row recompute engine
 *
 * Single source of truth for "how much to order". Pure: returns a new row
 * with every derived field recalculated from the row's current inputs.
 *
 * @module domain/order-needs/recompute
 */

import type { OrderRow } from '@medstock/types';

/**
 * Standing quantity minus what is on hand or otherwise covered, plus what
 * will leave, clamped at zero.
 */
export function computeQtyNeeded(row: OrderRow): number {
  const balance =
    row.standardQty -
    row.currentStock +
    row.qtyExpiring -
    row.backOrders -
    row.loanBalance +
    row.plannedDonsGive -
    row.donsReceive;
  return Math.max(balance, 0);
}

/**
 * Recalculate qtyNeeded, qtyToOrder, the rounded order quantity and the
 * amount, weight and volume of the order.
 *
 * With `packSize > 0` the order is rounded up to whole packs and the totals
 * are per pack; with `packSize === 0` no conversion applies and the totals
 * are zero.
 */
export function recomputeOrderRow(row: OrderRow): OrderRow {
  const qtyNeeded = computeQtyNeeded(row);
  const qtyToOrder = row.qtyToOrderOverride ?? qtyNeeded;

  if (row.packSize > 0) {
    // `|| 0` folds -0 from ceil of a small negative override
    const qtyToOrderRounded = (Math.ceil(qtyToOrder / row.packSize) || 0) * row.packSize;
    const packs = qtyToOrderRounded / row.packSize;

    return {
      ...row,
      qtyNeeded,
      qtyToOrder,
      qtyToOrderRounded,
      amount: packs * row.pricePerPack,
      weightKg: packs * row.weightPerPack,
      volumeM3: (packs * row.volumePerPackDm3) / 1000,
    };
  }

  return {
    ...row,
    qtyNeeded,
    qtyToOrder,
    qtyToOrderRounded: qtyToOrder,
    amount: 0,
    weightKg: 0,
    volumeM3: 0,
  };
}
