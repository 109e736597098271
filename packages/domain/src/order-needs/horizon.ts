/**
 * @fileoverview Planning horizon normalization
 *
 * @module domain/order-needs/horizon
 */

import { clamp } from '@medstock/core';
import {
  HORIZON_MONTHS_MAX,
  HORIZON_MONTHS_MIN,
  type HorizonInput,
  type ProjectHorizon,
} from '@medstock/types';
import { addHorizonMonths, formatIsoDate } from '../shared/dates.js';

/**
 * Months field value: digits only, clamped to 0..24; anything else is 0
 */
export function normalizeHorizonMonths(value: HorizonInput): number {
  if (typeof value === 'number') {
    return Number.isFinite(value)
      ? clamp(Math.trunc(value), HORIZON_MONTHS_MIN, HORIZON_MONTHS_MAX)
      : HORIZON_MONTHS_MIN;
  }

  const text = value?.trim() ?? '';
  if (!/^\d+$/.test(text)) {
    return HORIZON_MONTHS_MIN;
  }
  return clamp(parseInt(text, 10), HORIZON_MONTHS_MIN, HORIZON_MONTHS_MAX);
}

export function normalizeProjectHorizon(input: {
  leadMonths?: HorizonInput;
  coverMonths?: HorizonInput;
  bufferMonths?: HorizonInput;
}): ProjectHorizon {
  return {
    leadMonths: normalizeHorizonMonths(input.leadMonths),
    coverMonths: normalizeHorizonMonths(input.coverMonths),
    bufferMonths: normalizeHorizonMonths(input.bufferMonths),
  };
}

export function totalHorizonMonths(horizon: ProjectHorizon): number {
  return horizon.leadMonths + horizon.coverMonths + horizon.bufferMonths;
}

/**
 * Last expiry date (YYYY-MM-DD) counted as expiring within the horizon
 */
export function horizonEndDate(today: Date, horizon: ProjectHorizon): string {
  return formatIsoDate(addHorizonMonths(today, totalHorizonMonths(horizon)));
}
