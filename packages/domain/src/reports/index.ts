/**
 * @fileoverview Report sheets for the order-needs and loss engines
 *
 * @module domain/reports
 */

export {
  DEFAULT_PRESENTATION,
  computeColumnWidths,
  roundTo,
  formatGeneratedAt,
  reportFileName,
  headerRow,
  dataRows,
  type CellValue,
  type SheetRow,
  type ReportSheet,
  type ReportColumn,
  type ReportPresentation,
} from './report-sheet.js';

export {
  ORDER_NEEDS_COLUMNS,
  buildOrderNeedsSheet,
  type OrderNeedsSheetOptions,
} from './order-needs-report.js';

export {
  LOSS_REPORT_COLUMNS,
  buildLossReportSheet,
  type LossReportSheetOptions,
} from './loss-report.js';
