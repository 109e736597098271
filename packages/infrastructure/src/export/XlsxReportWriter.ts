/**
 * Spreadsheet export of report sheets
 *
 * One report sheet becomes one worksheet: column widths from the sheet
 * model and an auto-filter over the row table.
 *
 * @module infrastructure/export/xlsx-report-writer
 */

import { writeFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { AppError, createLogger } from '@medstock/core';
import type { ReportSheet } from '@medstock/domain';

const logger = createLogger({ name: 'xlsx-report-writer' });

export const XLSX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/**
 * Writes report sheets as .xlsx workbooks
 */
export class XlsxReportWriter {
  /**
   * Build the worksheet for one report sheet
   */
  toWorksheet(sheet: ReportSheet): XLSX.WorkSheet {
    const worksheet = XLSX.utils.aoa_to_sheet(sheet.rows.map((row) => [...row]));
    worksheet['!cols'] = sheet.columnWidths.map((wch) => ({ wch }));

    const header = sheet.rows[sheet.tableHeaderRow];
    if (header && header.length > 0) {
      worksheet['!autofilter'] = {
        ref: XLSX.utils.encode_range({
          s: { r: sheet.tableHeaderRow, c: 0 },
          e: { r: sheet.rows.length - 1, c: header.length - 1 },
        }),
      };
    }

    return worksheet;
  }

  /**
   * Workbook bytes holding the sheet
   */
  toBuffer(sheet: ReportSheet): Buffer {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, this.toWorksheet(sheet), sheet.name);

    const content: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(content)) {
      throw new AppError('Spreadsheet library returned no buffer', 'REPORT_EXPORT_ERROR');
    }
    return content;
  }

  /**
   * Write the sheet to `filePath`, replacing any existing file
   */
  async write(sheet: ReportSheet, filePath: string): Promise<void> {
    const content = this.toBuffer(sheet);
    await writeFile(filePath, content);
    logger.info({ sheet: sheet.name, rows: sheet.rows.length, bytes: content.length }, 'Report exported');
  }
}
