/**
 * @fileoverview Report sheet model
 *
 * A report is a grid of cells plus layout hints, independent of the
 * spreadsheet library that writes it. Labels go through an injected
 * presentation object; the engines never see it.
 *
 * @module domain/reports/report-sheet
 */

import { format } from 'date-fns';

// ============================================================================
// TYPES
// ============================================================================

export type CellValue = string | number;

export type SheetRow = readonly CellValue[];

/**
 * One worksheet ready to be written
 */
export interface ReportSheet {
  readonly name: string;
  readonly rows: readonly SheetRow[];
  /** Character width per column */
  readonly columnWidths: readonly number[];
  /** Zero-based index of the column titles row; the table runs from here to the end */
  readonly tableHeaderRow: number;
}

/**
 * Column of a tabular report section
 */
export interface ReportColumn<T> {
  readonly key: string;
  readonly header: string;
  readonly value: (row: T) => CellValue;
}

/**
 * Label lookup supplied by the caller
 */
export interface ReportPresentation {
  translate(key: string, fallback: string): string;
}

export const DEFAULT_PRESENTATION: ReportPresentation = {
  translate: (_key, fallback) => fallback,
};

// ============================================================================
// LAYOUT HELPERS
// ============================================================================

const MAX_COLUMN_WIDTH = 60;
const COLUMN_PADDING = 2;

/**
 * Width of each column: longest rendered cell plus padding, capped at 60
 */
export function computeColumnWidths(rows: readonly SheetRow[]): number[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      const length = String(cell).length;
      widths[index] = Math.max(widths[index] ?? 0, length);
    });
  }
  return widths.map((length) => Math.min(length + COLUMN_PADDING, MAX_COLUMN_WIDTH));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function formatGeneratedAt(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}

/**
 * Suggested export file name, e.g. `OrderNeeds_20240305_142501.xlsx`
 */
export function reportFileName(prefix: string, generatedAt: Date): string {
  return `${prefix}_${format(generatedAt, 'yyyyMMdd_HHmmss')}.xlsx`;
}

/**
 * Column titles row, translated under `<namespace>.col.<key>`
 */
export function headerRow<T>(
  columns: readonly ReportColumn<T>[],
  presentation: ReportPresentation,
  namespace: string
): SheetRow {
  return columns.map((column) =>
    presentation.translate(`${namespace}.col.${column.key}`, column.header)
  );
}

export function dataRows<T>(columns: readonly ReportColumn<T>[], rows: readonly T[]): SheetRow[] {
  return rows.map((row) => columns.map((column) => column.value(row)));
}
