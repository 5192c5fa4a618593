import ExcelJS from 'exceljs';
import type { CellValue } from 'exceljs';
import type { CreatedIssue } from '../src/types/github.js';

export type CellInput = CellValue;

/**
 * Write an .xlsx file whose first worksheet holds `rows`, starting at row 1.
 */
export async function writeWorkbook(path: string, rows: CellInput[][], extraSheets: Record<string, CellInput[][]> = {}): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Issues');
  for (const row of rows) {
    sheet.addRow(row);
  }
  for (const [name, sheetRows] of Object.entries(extraSheets)) {
    const extra = workbook.addWorksheet(name);
    for (const row of sheetRows) {
      extra.addRow(row);
    }
  }
  await workbook.xlsx.writeFile(path);
}

export function makeIssue(n: number): CreatedIssue {
  return {
    id: `I_${n}`,
    number: n,
    url: `https://github.com/octo/widgets/issues/${n}`,
  };
}
