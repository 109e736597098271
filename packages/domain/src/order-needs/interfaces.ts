/**
 * @fileoverview Order Needs Interfaces
 *
 * Ports and configuration of the order-needs engine. The repository reads
 * the stock store; the classifier resolves item descriptions and types.
 *
 * @module domain/order-needs/interfaces
 */

import type { CommercialData, FilterOptions, ProjectHorizon } from '@medstock/types';
import type { IItemClassifier } from '../shared/item-classifier.js';

// ============================================================================
// VALUE TYPES
// ============================================================================

/**
 * Kit and module scope of a fetch; `null` means unfiltered
 */
export interface StockScope {
  readonly kit: string | null;
  readonly module: string | null;
}

/**
 * Item code to signed integer quantity
 */
export type QuantityMap = ReadonlyMap<string, number>;

/**
 * Results of the four source fetchers
 */
export interface SourceQuantities {
  readonly standardQuantities: QuantityMap;
  readonly currentStock: QuantityMap;
  readonly expiringQuantities: QuantityMap;
  readonly loanBalances: QuantityMap;
}

/**
 * Everything a refresh reads before rows are synthesized
 */
export interface OrderSources extends SourceQuantities {
  readonly commercialData: ReadonlyMap<string, CommercialData>;
}

/**
 * Commercial attributes of a code missing from the catalog
 */
export const DEFAULT_COMMERCIAL_DATA: CommercialData = {
  packSize: 0,
  pricePerPack: 0,
  weightPerPack: 0,
  volumePerPackDm3: 0,
  accountCode: '',
} as const;

// ============================================================================
// REPOSITORY INTERFACE
// ============================================================================

/**
 * Repository interface for the order-needs sources
 *
 * Each fetch uses its own connection. Fetchers return an empty map when the
 * table or a required column is absent; they throw only on driver errors.
 */
export interface IOrderSourceRepository {
  /**
   * Standing quantity per code
   */
  fetchStandardQuantities(scope: StockScope): Promise<Map<string, number>>;

  /**
   * Final recorded stock per code
   */
  fetchCurrentStock(scope: StockScope): Promise<Map<string, number>>;

  /**
   * Stock expiring on or before `horizonEnd` (YYYY-MM-DD) per code
   */
  fetchExpiringQuantities(scope: StockScope, horizonEnd: string): Promise<Map<string, number>>;

  /**
   * Net quantity lent out per code (loans out minus returns in)
   */
  fetchLoanBalances(scope: StockScope): Promise<Map<string, number>>;

  /**
   * Commercial catalog attributes; codes absent from the catalog are absent
   */
  fetchCommercialData(codes: readonly string[]): Promise<Map<string, CommercialData>>;

  /**
   * Lead, cover and buffer months stored with the project settings
   */
  fetchProjectHorizon(): Promise<ProjectHorizon>;

  /**
   * Distinct kit and module numbers present in the stock ledger
   */
  fetchFilterOptions(): Promise<FilterOptions>;
}

// ============================================================================
// SERVICE CONFIGURATION
// ============================================================================

/**
 * Configuration for the order needs service
 */
export interface OrderNeedsServiceConfig {
  /** Clock used to compute the expiry horizon */
  readonly now: () => Date;
}

/**
 * Default configuration values
 */
export const DEFAULT_ORDER_NEEDS_CONFIG: OrderNeedsServiceConfig = {
  now: () => new Date(),
};

// ============================================================================
// SERVICE DEPENDENCIES
// ============================================================================

/**
 * Dependencies for the order needs service
 */
export interface OrderNeedsServiceDeps {
  /** Store reader for the four sources and the commercial catalog */
  readonly repository: IOrderSourceRepository;
  /** Description and type resolution */
  readonly classifier: IItemClassifier;
}
