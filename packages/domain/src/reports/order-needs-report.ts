/**
 * @fileoverview Order needs report sheet
 *
 * @module domain/reports/order-needs-report
 */

import type { OrderNeedsFilters, OrderReportMode, OrderRow } from '@medstock/types';
import { normalizeHorizonMonths } from '../order-needs/horizon.js';
import { summarizeOrderRows } from '../order-needs/totals.js';
import {
  computeColumnWidths,
  dataRows,
  DEFAULT_PRESENTATION,
  formatGeneratedAt,
  headerRow,
  roundTo,
  type ReportColumn,
  type ReportPresentation,
  type ReportSheet,
  type SheetRow,
} from './report-sheet.js';

const COLUMN_BY_KEY = {
  code: { key: 'code', header: 'Code', value: (r) => r.code },
  description: { key: 'description', header: 'Description', value: (r) => r.description },
  type: { key: 'type', header: 'Type', value: (r) => r.type },
  standardQty: { key: 'standardQty', header: 'Standard Qty', value: (r) => r.standardQty },
  currentStock: { key: 'currentStock', header: 'Current Stock', value: (r) => r.currentStock },
  qtyExpiring: { key: 'qtyExpiring', header: 'Qty Expiring', value: (r) => r.qtyExpiring },
  backOrders: { key: 'backOrders', header: 'Back Orders', value: (r) => r.backOrders },
  loanBalance: { key: 'loanBalance', header: 'Loan Balance', value: (r) => r.loanBalance },
  plannedDonsGive: {
    key: 'plannedDonsGive',
    header: 'Planned Dons Give',
    value: (r) => r.plannedDonsGive,
  },
  donsReceive: { key: 'donsReceive', header: 'Dons Receive', value: (r) => r.donsReceive },
  packSize: { key: 'packSize', header: 'Pack Size', value: (r) => r.packSize },
  qtyNeeded: { key: 'qtyNeeded', header: 'Qty Needed', value: (r) => r.qtyNeeded },
  qtyToOrder: { key: 'qtyToOrder', header: 'Qty To Order', value: (r) => r.qtyToOrder },
  qtyToOrderRounded: {
    key: 'qtyToOrderRounded',
    header: 'Qty To Order Rounded',
    value: (r) => r.qtyToOrderRounded,
  },
  pricePerPack: {
    key: 'pricePerPack',
    header: 'Price Per Pack',
    value: (r) => roundTo(r.pricePerPack, 2),
  },
  weightPerPack: {
    key: 'weightPerPack',
    header: 'Weight Per Pack',
    value: (r) => roundTo(r.weightPerPack, 3),
  },
  volumePerPackDm3: {
    key: 'volumePerPackDm3',
    header: 'Volume Per Pack Dm3',
    value: (r) => roundTo(r.volumePerPackDm3, 3),
  },
  amount: { key: 'amount', header: 'Amount', value: (r) => roundTo(r.amount, 2) },
  weightKg: { key: 'weightKg', header: 'Weight Kg', value: (r) => roundTo(r.weightKg, 3) },
  volumeM3: { key: 'volumeM3', header: 'Volume M3', value: (r) => roundTo(r.volumeM3, 4) },
  accountCode: { key: 'accountCode', header: 'Account Code', value: (r) => r.accountCode },
  remarks: { key: 'remarks', header: 'Remarks', value: (r) => r.remarks },
} satisfies Record<string, ReportColumn<OrderRow>>;

/**
 * Columns of the two presentation granularities
 */
export const ORDER_NEEDS_COLUMNS: Record<OrderReportMode, readonly ReportColumn<OrderRow>[]> = {
  simple: [
    COLUMN_BY_KEY.code,
    COLUMN_BY_KEY.description,
    COLUMN_BY_KEY.standardQty,
    COLUMN_BY_KEY.currentStock,
    COLUMN_BY_KEY.qtyNeeded,
    COLUMN_BY_KEY.qtyToOrderRounded,
    COLUMN_BY_KEY.amount,
    COLUMN_BY_KEY.weightKg,
    COLUMN_BY_KEY.volumeM3,
  ],
  detailed: [
    COLUMN_BY_KEY.code,
    COLUMN_BY_KEY.description,
    COLUMN_BY_KEY.type,
    COLUMN_BY_KEY.standardQty,
    COLUMN_BY_KEY.currentStock,
    COLUMN_BY_KEY.qtyExpiring,
    COLUMN_BY_KEY.backOrders,
    COLUMN_BY_KEY.loanBalance,
    COLUMN_BY_KEY.plannedDonsGive,
    COLUMN_BY_KEY.donsReceive,
    COLUMN_BY_KEY.packSize,
    COLUMN_BY_KEY.qtyNeeded,
    COLUMN_BY_KEY.qtyToOrder,
    COLUMN_BY_KEY.qtyToOrderRounded,
    COLUMN_BY_KEY.pricePerPack,
    COLUMN_BY_KEY.weightPerPack,
    COLUMN_BY_KEY.volumePerPackDm3,
    COLUMN_BY_KEY.amount,
    COLUMN_BY_KEY.weightKg,
    COLUMN_BY_KEY.volumeM3,
    COLUMN_BY_KEY.accountCode,
    COLUMN_BY_KEY.remarks,
  ],
};

export interface OrderNeedsSheetOptions {
  readonly mode: OrderReportMode;
  readonly filters: OrderNeedsFilters;
  readonly generatedAt: Date;
  readonly presentation?: ReportPresentation;
}

/**
 * Header block (timestamp, filters, totals) followed by the row table
 */
export function buildOrderNeedsSheet(
  rows: readonly OrderRow[],
  options: OrderNeedsSheetOptions
): ReportSheet {
  const { mode, filters, generatedAt, presentation = DEFAULT_PRESENTATION } = options;
  const t = (key: string, fallback: string) => presentation.translate(key, fallback);
  const totals = summarizeOrderRows(rows);
  const columns = ORDER_NEEDS_COLUMNS[mode];

  const header: SheetRow[] = [
    [t('generic.generated', 'Generated'), formatGeneratedAt(generatedAt)],
    [t('generic.filters_used', 'Filters Used')],
    [
      t('order_needs.kit', 'Kit'),
      filters.kit ?? '',
      t('order_needs.module', 'Module'),
      filters.module ?? '',
      t('order_needs.type', 'Type'),
      filters.type ?? '',
    ],
    [
      t('order_needs.item_search', 'Item Search'),
      filters.itemSearch ?? '',
      t('order_needs.lead', 'Lead'),
      normalizeHorizonMonths(filters.leadMonths),
      t('order_needs.cover', 'Cover'),
      normalizeHorizonMonths(filters.coverMonths),
    ],
    [
      t('order_needs.buffer', 'Buffer'),
      normalizeHorizonMonths(filters.bufferMonths),
      t('order_needs.mode', 'Mode'),
      mode === 'simple' ? t('order_needs.simple', 'Simple') : t('order_needs.detailed', 'Detailed'),
    ],
    [],
    [
      t('order_needs.total_amount', 'Total Amount (€)'),
      roundTo(totals.totalAmount, 2),
      t('order_needs.total_weight', 'Total Weight (kg)'),
      roundTo(totals.totalWeightKg, 2),
      t('order_needs.total_volume', 'Total Volume (m3)'),
      roundTo(totals.totalVolumeM3, 3),
      t('order_needs.missing_prices', 'Missing Price Rows'),
      totals.missingPriceCount,
    ],
    [],
    headerRow(columns, presentation, 'order_needs'),
  ];

  const sheetRows = [...header, ...dataRows(columns, rows)];

  return {
    name: 'OrderNeeds',
    rows: sheetRows,
    columnWidths: computeColumnWidths(sheetRows),
    tableHeaderRow: header.length - 1,
  };
}
