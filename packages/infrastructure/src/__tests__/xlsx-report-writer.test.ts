import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import type { ReportSheet } from '@medstock/domain';
import { XlsxReportWriter } from '../export/XlsxReportWriter.js';

const SHEET: ReportSheet = {
  name: 'Losses',
  rows: [
    ['Generated', '2024-03-05 14:25:01'],
    [],
    ['Code', 'Quantity'],
    ['ABCDTABL1', 8],
    ['ABCDSYRP1', 2],
  ],
  columnWidths: [12, 18],
  tableHeaderRow: 2,
};

describe('XlsxReportWriter', () => {
  const writer = new XlsxReportWriter();

  it('sets column widths and filters the row table', () => {
    const worksheet = writer.toWorksheet(SHEET);

    expect(worksheet['!cols']).toEqual([{ wch: 12 }, { wch: 18 }]);
    expect(worksheet['!autofilter']).toEqual({ ref: 'A3:B5' });
  });

  it('leaves the filter off when the header row is empty', () => {
    const worksheet = writer.toWorksheet({ ...SHEET, tableHeaderRow: 1 });

    expect(worksheet['!autofilter']).toBeUndefined();
  });

  it('produces a workbook holding the sheet', () => {
    const workbook = XLSX.read(writer.toBuffer(SHEET), { type: 'buffer' });
    const worksheet = workbook.Sheets['Losses'];

    expect(workbook.SheetNames).toEqual(['Losses']);
    expect(worksheet?.['A1']?.v).toBe('Generated');
    expect(worksheet?.['A4']?.v).toBe('ABCDTABL1');
    expect(worksheet?.['B4']?.v).toBe(8);
    expect(worksheet?.['B5']?.v).toBe(2);
  });

  describe('write', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'medstock-export-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('writes the workbook to disk', async () => {
      const filePath = join(directory, 'Losses_20240305_142501.xlsx');

      await writer.write(SHEET, filePath);

      const workbook = XLSX.read(await readFile(filePath), { type: 'buffer' });
      expect(workbook.SheetNames).toEqual(['Losses']);
      expect(workbook.Sheets['Losses']?.['A3']?.v).toBe('Code');
    });
  });
});
