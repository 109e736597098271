/**
 * @fileoverview PostgreSQL Item Catalog (Infrastructure Layer)
 *
 * Describes and classifies item codes from `items_list`. The description is
 * taken from the configured language column, then English, French, Spanish
 * and the untranslated designation, whichever is filled first.
 *
 * Descriptions are memoised per instance. `prefetch` loads a whole refresh's
 * codes in one query so that `describe` rarely reaches the store.
 *
 * @module @medstock/infrastructure/repositories/postgres-item-catalog
 */

import {
  createLogger,
  isBlank,
  toError,
  toText,
  withConnection,
  type DatabasePool,
} from '@medstock/core';
import type { CatalogLanguage, ItemType } from '@medstock/types';
import { detectItemType, type IItemClassifier } from '@medstock/domain';
import {
  DESCRIPTION_COLUMNS,
  introspectStoreSchema,
  StoreSchemaCache,
  type DescriptionColumn,
} from '../database/schema-introspector.js';

const logger = createLogger({ name: 'item-catalog' });

// ============================================================================
// CONSTANTS
// ============================================================================

export const NO_DESCRIPTION = 'No Description';

const LANGUAGE_COLUMN: Record<CatalogLanguage, DescriptionColumn> = {
  en: 'designation_en',
  fr: 'designation_fr',
  es: 'designation_sp',
};

export interface ItemCatalogConfig {
  /** Preferred description language */
  readonly language: CatalogLanguage;
}

const DEFAULT_CONFIG: ItemCatalogConfig = {
  language: 'en',
};

type DescriptionRow = { code: unknown } & Partial<Record<DescriptionColumn, unknown>>;

// ============================================================================
// CATALOG IMPLEMENTATION
// ============================================================================

/**
 * Store-backed implementation of the item classifier port
 */
export class PostgresItemCatalog implements IItemClassifier {
  private readonly config: ItemCatalogConfig;
  private readonly schema: StoreSchemaCache;
  private readonly descriptions = new Map<string, string>();

  constructor(
    private readonly pool: DatabasePool,
    config: Partial<ItemCatalogConfig> = {},
    schema?: StoreSchemaCache
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.schema = schema ?? new StoreSchemaCache(() => introspectStoreSchema(pool));
  }

  async describe(code: string): Promise<string> {
    const cached = this.descriptions.get(code);
    if (cached !== undefined) {
      return cached;
    }

    await this.load([code]);
    return this.descriptions.get(code) ?? NO_DESCRIPTION;
  }

  classify(code: string, description: string): ItemType {
    return detectItemType(code, description);
  }

  async prefetch(codes: readonly string[]): Promise<void> {
    const missing = [...new Set(codes)].filter((code) => !this.descriptions.has(code));
    if (missing.length > 0) {
      await this.load(missing);
    }
  }

  /**
   * Drop memoised descriptions, e.g. after the catalog was edited
   */
  clear(): void {
    this.descriptions.clear();
  }

  /**
   * Description columns in lookup order
   */
  descriptionOrder(available: readonly DescriptionColumn[]): DescriptionColumn[] {
    const preferred = [LANGUAGE_COLUMN[this.config.language], ...DESCRIPTION_COLUMNS];
    return [...new Set(preferred)].filter((column) => available.includes(column));
  }

  private async load(codes: readonly string[]): Promise<void> {
    try {
      const schema = await this.schema.get();
      const columns = schema.catalog ? this.descriptionOrder(schema.catalog.descriptionColumns) : [];

      if (columns.length > 0) {
        const { rows } = await withConnection(this.pool, (client) =>
          client.query<DescriptionRow>(
            `SELECT code, ${columns.join(', ')} FROM items_list WHERE code = ANY($1::text[])`,
            [[...codes]]
          )
        );

        for (const row of rows) {
          const text = columns.map((column) => row[column]).find((value) => !isBlank(value));
          this.descriptions.set(toText(row.code), text === undefined ? NO_DESCRIPTION : toText(text));
        }
      }

      for (const code of codes) {
        if (!this.descriptions.has(code)) {
          this.descriptions.set(code, NO_DESCRIPTION);
        }
      }
    } catch (error) {
      logger.warn(
        { err: toError(error), codeCount: codes.length },
        'Item catalog unavailable, descriptions left as placeholder'
      );
    }
  }
}
