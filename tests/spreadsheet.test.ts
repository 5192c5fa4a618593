import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { formatDate, readIssueRows } from '../src/core/spreadsheet.js';
import { writeWorkbook } from './helpers.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'issue-sheet-xlsx-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('readIssueRows', () => {
  it('should skip the header and read title and body from columns A and B', async () => {
    const path = join(tempDir, 'issues.xlsx');
    await writeWorkbook(path, [
      ['Title', 'Body'],
      ['Bug A', 'desc A'],
      ['Bug B', 'desc B'],
    ]);

    expect(await readIssueRows(path)).toEqual([
      { title: 'Bug A', body: 'desc A', sourceRowIndex: 2 },
      { title: 'Bug B', body: 'desc B', sourceRowIndex: 3 },
    ]);
  });

  it('should return no rows for a header-only sheet', async () => {
    const path = join(tempDir, 'header.xlsx');
    await writeWorkbook(path, [['Title', 'Body']]);

    expect(await readIssueRows(path)).toEqual([]);
  });

  it('should return no rows for an empty sheet', async () => {
    const path = join(tempDir, 'empty.xlsx');
    await writeWorkbook(path, []);

    expect(await readIssueRows(path)).toEqual([]);
  });

  it('should coerce numbers to text and empty cells to an empty string', async () => {
    const path = join(tempDir, 'mixed.xlsx');
    await writeWorkbook(path, [
      ['Title', 'Body'],
      [42, 3.5],
      ['Only a title'],
    ]);

    expect(await readIssueRows(path)).toEqual([
      { title: '42', body: '3.5', sourceRowIndex: 2 },
      { title: 'Only a title', body: '', sourceRowIndex: 3 },
    ]);
  });

  it('should use the cached result of a formula, falsy results included', async () => {
    const path = join(tempDir, 'formulas.xlsx');
    await writeWorkbook(path, [
      ['Title', 'Body'],
      [{ formula: 'A3-A3', result: 0, date1904: false }, { formula: '1=2', result: false, date1904: false }],
      [7, 'seven'],
    ]);

    expect((await readIssueRows(path))[0]).toEqual({ title: '0', body: 'false', sourceRowIndex: 2 });
  });

  it('should flatten rich text', async () => {
    const path = join(tempDir, 'rich.xlsx');
    await writeWorkbook(path, [
      ['Title', 'Body'],
      [{ richText: [{ text: 'Login ' }, { font: { bold: true }, text: 'fails' }] }, 'on Safari'],
    ]);

    expect(await readIssueRows(path)).toEqual([{ title: 'Login fails', body: 'on Safari', sourceRowIndex: 2 }]);
  });

  it('should write dates as YYYY-MM-DD', async () => {
    const path = join(tempDir, 'dates.xlsx');
    await writeWorkbook(path, [
      ['Title', 'Body'],
      [new Date(Date.UTC(2024, 0, 2)), 'release checklist'],
    ]);

    expect(await readIssueRows(path)).toEqual([{ title: '2024-01-02', body: 'release checklist', sourceRowIndex: 2 }]);
  });

  it('should keep blank rows that sit before the last used row', async () => {
    const path = join(tempDir, 'gap.xlsx');
    await writeWorkbook(path, [
      ['Title', 'Body'],
      ['First', 'one'],
      [],
      ['Third', 'three'],
    ]);

    const rows = await readIssueRows(path);
    expect(rows.map(r => r.sourceRowIndex)).toEqual([2, 3, 4]);
    expect(rows[1]).toEqual({ title: '', body: '', sourceRowIndex: 3 });
  });

  it('should ignore columns after B', async () => {
    const path = join(tempDir, 'wide.xlsx');
    await writeWorkbook(path, [
      ['Title', 'Body', 'Notes'],
      ['Bug A', 'desc A', 'ignored'],
    ]);

    expect(await readIssueRows(path)).toEqual([{ title: 'Bug A', body: 'desc A', sourceRowIndex: 2 }]);
  });

  it('should read only the first worksheet', async () => {
    const path = join(tempDir, 'sheets.xlsx');
    await writeWorkbook(path, [['Title', 'Body'], ['Bug A', 'desc A']], {
      Archive: [['Title', 'Body'], ['Old 1', 'x'], ['Old 2', 'y']],
    });

    expect(await readIssueRows(path)).toEqual([{ title: 'Bug A', body: 'desc A', sourceRowIndex: 2 }]);
  });

  it('should read a CSV file the same way', async () => {
    const path = join(tempDir, 'issues.csv');
    await writeFile(path, 'Title,Body\nBug A,desc A\n42,\n', 'utf-8');

    expect(await readIssueRows(path)).toEqual([
      { title: 'Bug A', body: 'desc A', sourceRowIndex: 2 },
      { title: '42', body: '', sourceRowIndex: 3 },
    ]);
  });

  it('should reject a file that does not exist', async () => {
    const path = join(tempDir, 'missing.xlsx');
    await expect(readIssueRows(path)).rejects.toThrow(`Spreadsheet not found: ${path}`);
  });

  it('should reject an unsupported extension', async () => {
    const path = join(tempDir, 'issues.txt');
    await writeFile(path, 'Title\n', 'utf-8');
    await expect(readIssueRows(path)).rejects.toThrow('Unsupported spreadsheet format ".txt" (expected .xlsx or .csv)');
  });
});

describe('formatDate', () => {
  it('should keep the time of day when there is one', () => {
    expect(formatDate(new Date(Date.UTC(2024, 0, 2, 9, 30)))).toBe('2024-01-02T09:30:00.000Z');
  });
});
