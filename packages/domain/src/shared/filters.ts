/**
 * @fileoverview Filter predicates shared by the order-needs and loss engines
 *
 * @module domain/shared/filters
 */

import { ALL_FILTER, type ItemType } from '@medstock/types';

/**
 * Normalize a filter value: blank or "All" (any case) becomes `null`
 */
export function activeFilter(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '' || trimmed.toLowerCase() === ALL_FILTER.toLowerCase()) return null;
  return trimmed;
}

/**
 * Case-insensitive exact match of the item type; an inactive filter matches all
 */
export function matchesTypeFilter(type: ItemType, filter: string | null | undefined): boolean {
  const active = activeFilter(filter);
  return active === null || type.toLowerCase() === active.toLowerCase();
}

/**
 * Item search: when a search term is given, only Items whose code or
 * description contains it (case-insensitive) are kept. Kits and modules are
 * excluded by an active search.
 */
export function matchesItemSearch(
  item: { code: string; description: string; type: ItemType },
  search: string | null | undefined
): boolean {
  const term = search?.trim().toLowerCase() ?? '';
  if (term === '') return true;
  if (item.type !== 'Item') return false;
  return item.code.toLowerCase().includes(term) || item.description.toLowerCase().includes(term);
}
