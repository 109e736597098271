/**
 * Store Schema Introspector
 *
 * The stock store is an external schema whose optional columns vary between
 * deployments. One `information_schema` query is turned into a typed
 * descriptor of what each adapter may select or filter on; column names are
 * looked up here and nowhere else.
 *
 * @module infrastructure/database/schema-introspector
 */

import { createLogger, type DatabaseClient } from '@medstock/core';

const logger = createLogger({ name: 'schema-introspector' });

// ============================================================================
// TABLES
// ============================================================================

export const STORE_TABLES = [
  'std_qty_helper',
  'stock_data',
  'stock_transactions',
  'items_list',
  'project_details',
] as const;

export type StoreTable = (typeof STORE_TABLES)[number];

/**
 * Lower-cased column names present per table; absent tables have no entry
 */
export type ColumnsByTable = ReadonlyMap<string, ReadonlySet<string>>;

// ============================================================================
// DESCRIPTOR TYPES
// ============================================================================

export interface StandardQuantitiesCapabilities {
  readonly kit: boolean;
  readonly module: boolean;
}

export interface StockDataCapabilities {
  /** `code` when present, else the composite `unique_id` */
  readonly codeColumn: 'code' | 'unique_id';
  readonly kitNumber: boolean;
  readonly moduleNumber: boolean;
  readonly expDate: boolean;
}

export interface TransactionCapabilities {
  /** code, qty_in, qty_out, in_type, out_type */
  readonly loans: boolean;
  /** date, code, qty_out, out_type */
  readonly losses: boolean;
  readonly scenario: boolean;
  readonly kit: boolean;
  readonly module: boolean;
  readonly expiryDate: boolean;
  readonly documentNumber: boolean;
  readonly remarks: boolean;
}

export interface CatalogCapabilities {
  readonly pack: boolean;
  readonly pricePerPack: boolean;
  readonly weightPerPack: boolean;
  readonly volumePerPack: boolean;
  readonly accountCode: boolean;
  /** Description columns present, among designation_en/fr/sp and designation */
  readonly descriptionColumns: readonly DescriptionColumn[];
}

export interface ProjectSettingsCapabilities {
  readonly leadMonths: boolean;
  readonly coverMonths: boolean;
  readonly bufferMonths: boolean;
}

/**
 * What the store can answer; `null` marks a table unusable for its purpose
 */
export interface StoreSchema {
  readonly standardQuantities: StandardQuantitiesCapabilities | null;
  readonly stockData: StockDataCapabilities | null;
  readonly transactions: TransactionCapabilities | null;
  readonly catalog: CatalogCapabilities | null;
  readonly projectSettings: ProjectSettingsCapabilities | null;
}

export const DESCRIPTION_COLUMNS = [
  'designation_en',
  'designation_fr',
  'designation_sp',
  'designation',
] as const;

export type DescriptionColumn = (typeof DESCRIPTION_COLUMNS)[number];

// ============================================================================
// DESCRIPTOR BUILDER
// ============================================================================

const EMPTY_COLUMNS: ReadonlySet<string> = new Set();

/**
 * Build the descriptor from the columns found per table
 */
export function describeStoreSchema(columnsByTable: ColumnsByTable): StoreSchema {
  const columnsOf = (table: StoreTable) => columnsByTable.get(table) ?? EMPTY_COLUMNS;
  const hasAll = (columns: ReadonlySet<string>, names: readonly string[]) =>
    names.every((name) => columns.has(name));

  const std = columnsOf('std_qty_helper');
  const stock = columnsOf('stock_data');
  const tx = columnsOf('stock_transactions');
  const items = columnsOf('items_list');
  const project = columnsOf('project_details');

  const loans = hasAll(tx, ['code', 'qty_in', 'qty_out', 'in_type', 'out_type']);
  const losses = hasAll(tx, ['date', 'code', 'qty_out', 'out_type']);

  return {
    standardQuantities: hasAll(std, ['code', 'std_qty'])
      ? { kit: std.has('kit'), module: std.has('module') }
      : null,

    stockData:
      stock.has('final_qty') && (stock.has('code') || stock.has('unique_id'))
        ? {
            codeColumn: stock.has('code') ? 'code' : 'unique_id',
            kitNumber: stock.has('kit_number'),
            moduleNumber: stock.has('module_number'),
            expDate: stock.has('exp_date'),
          }
        : null,

    transactions:
      loans || losses
        ? {
            loans,
            losses,
            scenario: tx.has('scenario'),
            kit: tx.has('kit'),
            module: tx.has('module'),
            expiryDate: tx.has('expiry_date'),
            documentNumber: tx.has('document_number'),
            remarks: tx.has('remarks'),
          }
        : null,

    catalog: items.has('code')
      ? {
          pack: items.has('pack'),
          pricePerPack: items.has('price_per_pack_euros'),
          weightPerPack: items.has('weight_per_pack_kg'),
          volumePerPack: items.has('volume_per_pack_dm3'),
          accountCode: items.has('account_code'),
          descriptionColumns: DESCRIPTION_COLUMNS.filter((column) => items.has(column)),
        }
      : null,

    projectSettings:
      project.size > 0
        ? {
            leadMonths: project.has('lead_time_months'),
            coverMonths: project.has('cover_period_months'),
            bufferMonths: project.has('buffer_months'),
          }
        : null,
  };
}

// ============================================================================
// INTROSPECTION
// ============================================================================

interface ColumnRow {
  table_name: string;
  column_name: string;
}

/**
 * Read the columns of the known tables in the current schema
 */
export async function introspectStoreSchema(client: DatabaseClient): Promise<StoreSchema> {
  const result = await client.query<ColumnRow>(
    `SELECT table_name, column_name
     FROM information_schema.columns
     WHERE table_schema = current_schema()
       AND table_name = ANY($1::text[])`,
    [[...STORE_TABLES]]
  );

  const columnsByTable = new Map<string, Set<string>>();
  for (const row of result.rows) {
    const table = row.table_name.toLowerCase();
    const columns = columnsByTable.get(table) ?? new Set<string>();
    columns.add(row.column_name.toLowerCase());
    columnsByTable.set(table, columns);
  }

  const schema = describeStoreSchema(columnsByTable);
  logger.debug(
    {
      tables: [...columnsByTable.keys()],
      standardQuantities: schema.standardQuantities !== null,
      stockData: schema.stockData !== null,
      transactions: schema.transactions !== null,
      catalog: schema.catalog !== null,
      projectSettings: schema.projectSettings !== null,
    },
    'Store schema introspected'
  );

  return schema;
}

// ============================================================================
// CACHE
// ============================================================================

/**
 * Lazily loaded descriptor shared by the adapters of one store pool
 *
 * Concurrent callers share one pending load; a failed load is forgotten so
 * the next call retries.
 */
export class StoreSchemaCache {
  private pending: Promise<StoreSchema> | null = null;

  constructor(private readonly load: () => Promise<StoreSchema>) {}

  get(): Promise<StoreSchema> {
    if (!this.pending) {
      this.pending = this.load().catch((error: unknown) => {
        this.pending = null;
        throw error;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.pending = null;
  }
}
