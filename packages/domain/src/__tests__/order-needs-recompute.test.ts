import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { isErr, isOk } from '@medstock/types';
import { computeQtyNeeded, recomputeOrderRow } from '../order-needs/recompute.js';
import {
  applyOrderRowEdit,
  INTEGER_INPUT_MESSAGE,
  isValidIntegerInput,
} from '../order-needs/order-row-editor.js';
import { summarizeOrderRows } from '../order-needs/totals.js';
import { makeOrderRow } from './inventory-fixtures.js';

describe('recomputeOrderRow', () => {
  describe('quantity needed', () => {
    it('rounds the shortfall up to whole packs', () => {
      const row = makeOrderRow({ standardQty: 10, currentStock: 4, packSize: 3 });

      expect(row.qtyNeeded).toBe(6);
      expect(row.qtyToOrder).toBe(6);
      expect(row.qtyToOrderRounded).toBe(6);
    });

    it('rounds past the shortfall when the pack does not divide it', () => {
      const row = makeOrderRow({ standardQty: 10, currentStock: 4, packSize: 4 });

      expect(row.qtyNeeded).toBe(6);
      expect(row.qtyToOrderRounded).toBe(8);
    });

    it('never goes below zero when stock exceeds the standing quantity', () => {
      const row = makeOrderRow({ standardQty: 2, currentStock: 10, packSize: 5 });

      expect(row.qtyNeeded).toBe(0);
      expect(row.qtyToOrder).toBe(0);
      expect(row.qtyToOrderRounded).toBe(0);
    });

    it('combines every balance term', () => {
      const row = makeOrderRow({
        standardQty: 20,
        currentStock: 5,
        qtyExpiring: 3,
        backOrders: 2,
        loanBalance: 4,
        plannedDonsGive: 6,
        donsReceive: 1,
      });

      // 20 - 5 + 3 - 2 - 4 + 6 - 1
      expect(computeQtyNeeded(row)).toBe(17);
      expect(row.qtyNeeded).toBe(17);
    });
  });

  describe('pack conversion', () => {
    it('prices, weighs and measures whole packs', () => {
      const row = makeOrderRow({
        standardQty: 6,
        packSize: 4,
        pricePerPack: 2.5,
        weightPerPack: 0.5,
        volumePerPackDm3: 1.2,
      });

      expect(row.qtyToOrderRounded).toBe(8);
      expect(row.amount).toBe(5);
      expect(row.weightKg).toBe(1);
      expect(row.volumeM3).toBeCloseTo(0.0024, 10);
    });

    it('orders units as-is with zero totals when the pack size is unknown', () => {
      const row = makeOrderRow({ standardQty: 7, packSize: 0, pricePerPack: 3, weightPerPack: 1 });

      expect(row.qtyToOrderRounded).toBe(7);
      expect(row.amount).toBe(0);
      expect(row.weightKg).toBe(0);
      expect(row.volumeM3).toBe(0);
    });
  });

  describe('quantity override', () => {
    it('rounds the override instead of the computed need', () => {
      const row = makeOrderRow({ standardQty: 10, currentStock: 4, packSize: 4, qtyToOrderOverride: 5 });

      expect(row.qtyNeeded).toBe(6);
      expect(row.qtyToOrder).toBe(5);
      expect(row.qtyToOrderRounded).toBe(8);
    });

    it('keeps an explicit zero override', () => {
      const row = makeOrderRow({ standardQty: 10, qtyToOrderOverride: 0, packSize: 3 });

      expect(row.qtyToOrder).toBe(0);
      expect(row.qtyToOrderRounded).toBe(0);
    });

    it('rounds a negative override to a plain zero', () => {
      const row = makeOrderRow({ qtyToOrderOverride: -1, packSize: 3 });

      expect(row.qtyToOrderRounded).toBe(0);
      expect(Object.is(row.qtyToOrderRounded, -0)).toBe(false);
    });
  });

  it('returns a new row without touching the input', () => {
    const input = makeOrderRow({ standardQty: 3 });
    const changed = { ...input, currentStock: 1 };

    const result = recomputeOrderRow(changed);

    expect(result).not.toBe(changed);
    expect(changed.qtyNeeded).toBe(3);
    expect(result.qtyNeeded).toBe(2);
  });

  describe('properties', () => {
    const quantity = fc.integer({ min: -1000, max: 1000 });

    it('qtyNeeded is the clamped balance', () => {
      fc.assert(
        fc.property(quantity, quantity, quantity, quantity, quantity, quantity, quantity, (s, c, e, b, l, g, r) => {
          const row = makeOrderRow({
            standardQty: s,
            currentStock: c,
            qtyExpiring: e,
            backOrders: b,
            loanBalance: l,
            plannedDonsGive: g,
            donsReceive: r,
          });
          expect(row.qtyNeeded).toBe(Math.max(s - c + e - b - l + g - r, 0));
        })
      );
    });

    it('the rounded quantity is the smallest pack multiple covering the order', () => {
      fc.assert(
        fc.property(quantity, quantity, fc.integer({ min: 1, max: 50 }), (s, c, packSize) => {
          const row = makeOrderRow({ standardQty: s, currentStock: c, packSize });

          expect(row.qtyToOrderRounded % packSize).toBe(0);
          expect(row.qtyToOrderRounded).toBeGreaterThanOrEqual(row.qtyToOrder);
          expect(row.qtyToOrderRounded - packSize).toBeLessThan(row.qtyToOrder);
        })
      );
    });

    it('without a pack size the order is not converted', () => {
      fc.assert(
        fc.property(quantity, fc.option(quantity, { nil: null }), (s, override) => {
          const row = makeOrderRow({ standardQty: s, qtyToOrderOverride: override, pricePerPack: 9 });

          expect(row.qtyToOrderRounded).toBe(row.qtyToOrder);
          expect(row.amount).toBe(0);
        })
      );
    });

    it('recompute is idempotent', () => {
      fc.assert(
        fc.property(quantity, quantity, fc.integer({ min: 0, max: 12 }), (s, c, packSize) => {
          const row = makeOrderRow({ standardQty: s, currentStock: c, packSize, pricePerPack: 1.5 });
          expect(recomputeOrderRow(row)).toEqual(row);
        })
      );
    });
  });
});

describe('applyOrderRowEdit', () => {
  const base = makeOrderRow({ standardQty: 10, currentStock: 4, packSize: 4 });

  it('applies an integer balance and recomputes', () => {
    const result = applyOrderRowEdit(base, 'backOrders', '2');

    expect(isOk(result)).toBe(true);
    if (isOk(result)) {
      expect(result.value.backOrders).toBe(2);
      expect(result.value.qtyNeeded).toBe(4);
      expect(result.value.qtyToOrderRounded).toBe(4);
    }
  });

  it('accepts a signed value with surrounding whitespace', () => {
    const result = applyOrderRowEdit(base, 'loanBalance', ' -3 ');

    expect(isOk(result) && result.value.loanBalance).toBe(-3);
    expect(isOk(result) && result.value.qtyNeeded).toBe(9);
  });

  it('treats a blank balance as zero', () => {
    const edited = makeOrderRow({ ...base, donsReceive: 5 });
    const result = applyOrderRowEdit(edited, 'donsReceive', '   ');

    expect(isOk(result) && result.value.donsReceive).toBe(0);
    expect(isOk(result) && result.value.qtyNeeded).toBe(6);
  });

  it.each(['1.5', 'abc', '+2', '1 2', '2e3'])('rejects %j', (raw) => {
    const result = applyOrderRowEdit(base, 'plannedDonsGive', raw);

    expect(isErr(result)).toBe(true);
    if (isErr(result)) {
      expect(result.error.message).toBe(INTEGER_INPUT_MESSAGE);
      expect(result.error.details).toEqual({ field: 'plannedDonsGive', value: raw });
    }
  });

  it('sets and clears the order override', () => {
    const overridden = applyOrderRowEdit(base, 'qtyToOrder', '10');
    expect(isOk(overridden)).toBe(true);
    if (!isOk(overridden)) return;

    expect(overridden.value.qtyToOrderOverride).toBe(10);
    expect(overridden.value.qtyToOrder).toBe(10);
    expect(overridden.value.qtyToOrderRounded).toBe(12);

    const cleared = applyOrderRowEdit(overridden.value, 'qtyToOrder', '');
    expect(isOk(cleared)).toBe(true);
    if (!isOk(cleared)) return;

    expect(cleared.value.qtyToOrderOverride).toBeNull();
    expect(cleared.value.qtyToOrder).toBe(6);
    expect(cleared.value.qtyToOrderRounded).toBe(8);
  });

  it('rejects a non-integer order quantity', () => {
    const result = applyOrderRowEdit(base, 'qtyToOrder', 'lots');

    expect(isErr(result) && result.error.message).toBe(INTEGER_INPUT_MESSAGE);
  });

  it('stores remarks verbatim', () => {
    const result = applyOrderRowEdit(base, 'remarks', '  urgent, call supplier ');

    expect(isOk(result) && result.value.remarks).toBe('  urgent, call supplier ');
  });

  it('refuses fields that are not editable', () => {
    const result = applyOrderRowEdit(base, 'qtyNeeded', '3');

    expect(isErr(result) && result.error.message).toBe('Field qtyNeeded is not editable');
  });

  it('leaves the original row untouched', () => {
    applyOrderRowEdit(base, 'backOrders', '5');

    expect(base.backOrders).toBe(0);
    expect(base.qtyNeeded).toBe(6);
  });
});

describe('isValidIntegerInput', () => {
  it.each([
    ['12', true],
    ['-12', true],
    [' 7 ', true],
    ['0', true],
    ['', false],
    ['+12', false],
    ['1 2', false],
    ['12.0', false],
    ['-', false],
  ])('%j → %s', (input, expected) => {
    expect(isValidIntegerInput(input)).toBe(expected);
  });
});

describe('summarizeOrderRows', () => {
  it('sums totals and counts unpriced rows', () => {
    const rows = [
      makeOrderRow({ standardQty: 6, packSize: 4, pricePerPack: 2.5, weightPerPack: 0.5 }),
      makeOrderRow({ code: 'ABCDSYRP1', standardQty: 3, packSize: 1, pricePerPack: 4 }),
      makeOrderRow({ code: 'ABCDGAUZ1', standardQty: 9 }),
    ];

    expect(summarizeOrderRows(rows)).toEqual({
      rowCount: 3,
      totalAmount: 17,
      totalWeightKg: 1,
      totalVolumeM3: 0,
      missingPriceCount: 1,
    });
  });

  it('is all zeros for no rows', () => {
    expect(summarizeOrderRows([])).toEqual({
      rowCount: 0,
      totalAmount: 0,
      totalWeightKg: 0,
      totalVolumeM3: 0,
      missingPriceCount: 0,
    });
  });
});
