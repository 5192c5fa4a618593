import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import ExcelJS from 'exceljs';
import type { Cell, Workbook, Worksheet } from 'exceljs';
import { BODY_COLUMN, HEADER_ROW, SUPPORTED_EXTENSIONS, TITLE_COLUMN } from '../constants.js';
import type { IssueRow } from '../types/import.js';

function isSupportedExtension(ext: string): boolean {
  return SUPPORTED_EXTENSIONS.some(supported => supported === ext);
}

/**
 * Calendar dates as YYYY-MM-DD, anything with a time of day as full ISO.
 */
export function formatDate(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}

function formulaResultText(result: unknown): string {
  if (result === null || result === undefined) return '';
  if (result instanceof Date) return formatDate(result);
  if (typeof result === 'object' && 'error' in result) return String(result.error);
  return String(result);
}

/**
 * Text shown for a cell: numbers in their textual form, empty cells as "",
 * formulas as their cached result, rich text flattened.
 */
export function cellText(cell: Cell): string {
  if (cell.type === ExcelJS.ValueType.Formula) return formulaResultText(cell.result);
  if (cell.value instanceof Date) return formatDate(cell.value);
  return cell.text;
}

/**
 * Number of the last row holding any value, or 0 for an empty sheet.
 */
export function lastUsedRow(worksheet: Worksheet): number {
  let last = 0;
  worksheet.eachRow((_row, rowNumber) => {
    if (rowNumber > last) last = rowNumber;
  });
  return last;
}

async function loadWorkbook(path: string): Promise<Workbook> {
  const ext = extname(path).toLowerCase();
  if (!isSupportedExtension(ext)) {
    throw new Error(`Unsupported spreadsheet format "${ext || path}" (expected ${SUPPORTED_EXTENSIONS.join(' or ')})`);
  }
  if (!existsSync(path)) {
    throw new Error(`Spreadsheet not found: ${path}`);
  }

  const workbook = new ExcelJS.Workbook();
  if (ext === '.csv') {
    await workbook.csv.readFile(path);
  } else {
    await workbook.xlsx.readFile(path);
  }
  return workbook;
}

/**
 * Read issue rows from the first worksheet: row 1 is the header,
 * column A the title and column B the body. Blank rows before the
 * last used row are kept so every row index is reported.
 */
export async function readIssueRows(path: string): Promise<IssueRow[]> {
  const workbook = await loadWorkbook(path);
  const worksheet = workbook.worksheets[0];
  if (!worksheet) return [];

  const rows: IssueRow[] = [];
  const last = lastUsedRow(worksheet);
  for (let rowNumber = HEADER_ROW + 1; rowNumber <= last; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    rows.push({
      title: cellText(row.getCell(TITLE_COLUMN)),
      body: cellText(row.getCell(BODY_COLUMN)),
      sourceRowIndex: rowNumber,
    });
  }
  return rows;
}
