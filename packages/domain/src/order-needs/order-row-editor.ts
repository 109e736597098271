/**
 * @fileoverview Order row edit command
 *
 * apply-edit → validate → recompute. A rejected edit returns `Err` and the
 * caller keeps its current row; an accepted edit returns a new recomputed
 * row. Rows are never mutated.
 *
 * @module domain/order-needs/order-row-editor
 */

import { ValidationError } from '@medstock/core';
import {
  EditableOrderFieldSchema,
  Err,
  Ok,
  type EditableOrderField,
  type OrderRow,
  type Result,
} from '@medstock/types';
import { recomputeOrderRow } from './recompute.js';

/** Message shown when an integer cell receives anything else */
export const INTEGER_INPUT_MESSAGE = 'Enter whole integer.';

const INTEGER_INPUT = /^-?\d+$/;

type IntegerField = Exclude<EditableOrderField, 'qtyToOrder' | 'remarks'>;

/**
 * Optional minus sign followed by digits, surrounding whitespace ignored
 */
export function isValidIntegerInput(text: string): boolean {
  return INTEGER_INPUT.test(text.trim());
}

function setIntegerField(row: OrderRow, field: IntegerField, value: number): OrderRow {
  switch (field) {
    case 'backOrders':
      return { ...row, backOrders: value };
    case 'loanBalance':
      return { ...row, loanBalance: value };
    case 'plannedDonsGive':
      return { ...row, plannedDonsGive: value };
    case 'donsReceive':
      return { ...row, donsReceive: value };
  }
}

function rejectInteger(field: EditableOrderField, rawValue: string): Err<ValidationError> {
  return Err(new ValidationError(INTEGER_INPUT_MESSAGE, { field, value: rawValue }));
}

/**
 * Apply one user edit to a row
 *
 * - integer balances: blank → 0, otherwise must be a whole integer
 * - qtyToOrder: blank → unset (re-defaults to qtyNeeded), otherwise a whole integer
 * - remarks: stored verbatim
 *
 * @example
 * ```typescript
 * const result = applyOrderRowEdit(row, 'backOrders', '2');
 * if (isOk(result)) rows[i] = result.value;
 * ```
 */
export function applyOrderRowEdit(
  row: OrderRow,
  field: string,
  rawValue: string
): Result<OrderRow, ValidationError> {
  const parsedField = EditableOrderFieldSchema.safeParse(field);
  if (!parsedField.success) {
    return Err(new ValidationError(`Field ${field} is not editable`, { field, value: rawValue }));
  }

  const editable = parsedField.data;
  const text = rawValue.trim();

  switch (editable) {
    case 'remarks':
      return Ok(recomputeOrderRow({ ...row, remarks: rawValue }));

    case 'qtyToOrder':
      if (text === '') {
        return Ok(recomputeOrderRow({ ...row, qtyToOrderOverride: null }));
      }
      if (!isValidIntegerInput(text)) {
        return rejectInteger(editable, rawValue);
      }
      return Ok(recomputeOrderRow({ ...row, qtyToOrderOverride: parseInt(text, 10) }));

    default:
      if (text === '') {
        return Ok(recomputeOrderRow(setIntegerField(row, editable, 0)));
      }
      if (!isValidIntegerInput(text)) {
        return rejectInteger(editable, rawValue);
      }
      return Ok(recomputeOrderRow(setIntegerField(row, editable, parseInt(text, 10))));
  }
}
