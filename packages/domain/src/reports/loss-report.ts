/**
 * @fileoverview Loss report sheet
 *
 * @module domain/reports/loss-report
 */

import type { LossFilters, LossRecord } from '@medstock/types';
import {
  computeColumnWidths,
  dataRows,
  DEFAULT_PRESENTATION,
  formatGeneratedAt,
  headerRow,
  type ReportColumn,
  type ReportPresentation,
  type ReportSheet,
  type SheetRow,
} from './report-sheet.js';

export const LOSS_REPORT_COLUMNS: readonly ReportColumn<LossRecord>[] = [
  { key: 'date', header: 'Date', value: (r) => r.date },
  { key: 'code', header: 'Code', value: (r) => r.code },
  { key: 'description', header: 'Description', value: (r) => r.description },
  { key: 'type', header: 'Type', value: (r) => r.type },
  { key: 'lossCategory', header: 'Loss Category', value: (r) => r.lossCategory },
  { key: 'quantity', header: 'Quantity', value: (r) => r.quantity },
  { key: 'scenarios', header: 'Scenarios', value: (r) => r.scenarios },
  { key: 'kits', header: 'Kits', value: (r) => r.kits },
  { key: 'modules', header: 'Modules', value: (r) => r.modules },
  { key: 'expiryDates', header: 'Expiry Dates', value: (r) => r.expiryDates },
  { key: 'documents', header: 'Documents', value: (r) => r.documents },
  { key: 'remarks', header: 'Remarks', value: (r) => r.remarks },
];

export interface LossReportSheetOptions {
  readonly filters: LossFilters;
  readonly generatedAt: Date;
  readonly presentation?: ReportPresentation;
}

export function buildLossReportSheet(
  records: readonly LossRecord[],
  options: LossReportSheetOptions
): ReportSheet {
  const { filters, generatedAt, presentation = DEFAULT_PRESENTATION } = options;
  const t = (key: string, fallback: string) => presentation.translate(key, fallback);
  const totalQuantity = records.reduce((sum, record) => sum + record.quantity, 0);

  const header: SheetRow[] = [
    [t('generic.generated', 'Generated'), formatGeneratedAt(generatedAt)],
    [t('generic.filters_used', 'Filters Used')],
    [
      t('losses.scenario', 'Scenario'),
      filters.scenario ?? '',
      t('losses.kit', 'Kit'),
      filters.kit ?? '',
      t('losses.module', 'Module'),
      filters.module ?? '',
    ],
    [
      t('losses.type', 'Type'),
      filters.type ?? '',
      t('losses.loss_category', 'Loss Category'),
      filters.lossCategory ?? '',
      t('losses.item_search', 'Item Search'),
      filters.itemSearch ?? '',
    ],
    [
      t('losses.document', 'Document'),
      filters.docSearch ?? '',
      t('losses.date_from', 'From'),
      filters.dateFrom ?? '',
      t('losses.date_to', 'To'),
      filters.dateTo ?? '',
    ],
    [
      t('losses.total_quantity', 'Total Quantity'),
      totalQuantity,
      t('losses.records', 'Records'),
      records.length,
    ],
    [],
    headerRow(LOSS_REPORT_COLUMNS, presentation, 'losses'),
  ];

  const sheetRows = [...header, ...dataRows(LOSS_REPORT_COLUMNS, records)];

  return {
    name: 'Losses',
    rows: sheetRows,
    columnWidths: computeColumnWidths(sheetRows),
    tableHeaderRow: header.length - 1,
  };
}
