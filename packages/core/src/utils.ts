/**
 * Utility functions for the application
 *
 * Numeric coercions never throw: they return `null` (skip the value) or
 * the caller's default so a malformed cell cannot corrupt an aggregate.
 */

import { createLogger } from './logger.js';

const logger = createLogger({ name: 'utils' });

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Literal text some ledgers store in place of a missing value */
export const NONE_MARKER = 'None';

/**
 * Null, undefined or a whitespace-only string
 */
export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * A value that stands for "nothing": blank or the literal `None` marker
 */
export function isPlaceholder(value: unknown): boolean {
  return isBlank(value) || (typeof value === 'string' && value.trim() === NONE_MARKER);
}

/**
 * Parse an integer quantity from a driver value
 *
 * Integers and integer-looking text parse exactly; decimals truncate toward
 * zero. Blank and unparsable values yield `null`.
 *
 * @example
 * ```typescript
 * safeParseInt('12');   // 12
 * safeParseInt(' -3 '); // -3
 * safeParseInt('7.9');  // 7
 * safeParseInt('abc');  // null
 * ```
 */
export function safeParseInt(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (INTEGER_PATTERN.test(text)) {
    return parseInt(text, 10);
  }
  if (DECIMAL_PATTERN.test(text)) {
    return Math.trunc(parseFloat(text));
  }

  if (text !== '') {
    logger.trace({ length: text.length }, 'Unparsable integer value skipped');
  }
  return null;
}

/**
 * Parse a floating-point attribute, falling back to `defaultValue`
 */
export function safeParseFloat(value: unknown, defaultValue = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : defaultValue;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string') {
    const text = value.trim();
    if (DECIMAL_PATTERN.test(text)) {
      return parseFloat(text);
    }
  }
  return defaultValue;
}

/**
 * Render a driver value as trimmed text, or `''` when it is blank
 */
export function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

/**
 * Clamp a number into an inclusive range
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Ordinal string comparison (by UTF-16 code unit), independent of locale
 */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
