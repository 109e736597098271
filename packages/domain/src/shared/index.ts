/**
 * @fileoverview Shared Domain Utilities
 *
 * Pure helpers used by both inventory engines.
 *
 * @module domain/shared
 */

export { extractCodeFromUniqueId } from './unique-id.js';
export { activeFilter, matchesTypeFilter, matchesItemSearch } from './filters.js';
export { detectItemType, type IItemClassifier } from './item-classifier.js';
export {
  ISO_DATE_FORMAT,
  parseUserDate,
  resolveDateRange,
  addHorizonMonths,
  formatIsoDate,
  normalizeDateValue,
  type DateRole,
  type DateRange,
} from './dates.js';
