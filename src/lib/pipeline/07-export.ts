import fs from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { WorkOrder } from './types';

export type CsvRow = {
  location: string;
  frameRange: string;
};

export type WorkbookRow = {
  location: string;
  frameRange: string;
  timeRange: string;
  /** Path of the thumbnail image, relative to the workbook. */
  thumbnail: string;
};

/**
 * Work-order header row, two blank rows, then one `location,range` row per
 * reconciled range.
 */
export function toCsvString(workOrder: WorkOrder, rows: readonly CsvRow[], delimiter = ','): string {
  const options = { delimiter, newline: '\n' };
  const header = Papa.unparse([[workOrder.producer, workOrder.operator, workOrder.job, workOrder.notes]], options);
  const body = rows.length > 0 ? `${Papa.unparse(rows.map((row) => [row.location, row.frameRange]), options)}\n` : '';
  return `${header}\n\n\n${body}`;
}

export async function writeCsv(filePath: string, contents: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, 'utf8');
}

const COLUMN_WIDTHS = [80, 15, 25, 15];
const ROW_HEIGHT_PT = 60;

export function buildWorkbook(rows: readonly WorkbookRow[]): XLSX.WorkBook {
  const sheet = XLSX.utils.aoa_to_sheet(
    rows.map((row) => [row.location, row.frameRange, row.timeRange, row.thumbnail])
  );

  // SheetJS cannot embed pictures; the thumbnail cell links to the image file.
  rows.forEach((row, index) => {
    const cell: XLSX.CellObject = { t: 's', v: row.thumbnail, l: { Target: row.thumbnail } };
    sheet[XLSX.utils.encode_cell({ r: index, c: 3 })] = cell;
  });

  sheet['!cols'] = COLUMN_WIDTHS.map((wch) => ({ wch }));
  sheet['!rows'] = rows.map(() => ({ hpt: ROW_HEIGHT_PT }));

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'frames');
  return workbook;
}

export async function writeWorkbook(filePath: string, workbook: XLSX.WorkBook) {
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, buffer);
}
