/**
 * @fileoverview Item classifier collaborator
 *
 * Resolves the description and three-way type of an item code. The store
 * adapter supplies descriptions; the type rule below is shared.
 *
 * @module domain/shared/item-classifier
 */

import type { ItemType } from '@medstock/types';

/**
 * Port for item description and type resolution
 */
export interface IItemClassifier {
  /**
   * Description of the item, or a placeholder when the catalog has none
   */
  describe(code: string): Promise<string>;

  /**
   * Type of the item given its code and description
   */
  classify(code: string, description: string): ItemType;

  /**
   * Optionally load descriptions for many codes in one round trip before
   * they are described one by one
   */
  prefetch?(codes: readonly string[]): Promise<void>;
}

/**
 * Kit/module/item rule used by the stock catalog
 *
 * Codes starting with `K` are kits when the description starts with "kit" or
 * mentions "modules", and modules when it mentions "module". Everything else,
 * including a blank code, is an Item.
 */
export function detectItemType(code: string, description: string): ItemType {
  const normalizedCode = code.trim().toUpperCase();
  if (!normalizedCode.startsWith('K')) {
    return 'Item';
  }

  const text = description.toLowerCase();
  if (text.startsWith('kit') || text.includes('modules')) {
    return 'Kit';
  }
  if (text.includes('module')) {
    return 'Module';
  }
  return 'Item';
}
