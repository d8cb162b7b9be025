import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import { WorkbookError, detectFormat, normalizeHeaders, readWorkbook } from '../workbook.js';

function xlsxBuffer(rows: unknown[][]): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Sheet1');
  return Buffer.from(XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
}

describe('detectFormat', () => {
  it('should map extensions case-insensitively', () => {
    expect(detectFormat('estimate.CSV')).toBe('csv');
    expect(detectFormat('estimate.xlsx')).toBe('xlsx');
    expect(detectFormat('legacy.xls')).toBe('xlsx');
  });

  it('should reject other files', () => {
    expect(() => detectFormat('notes.txt')).toThrow(WorkbookError);
    expect(() => detectFormat('README')).toThrow(WorkbookError);
  });
});

describe('normalizeHeaders', () => {
  it('should trim, name blanks and number repeats', () => {
    expect(normalizeHeaders([' Name ', '', 'Name', 42])).toEqual(['Name', 'Column 2', 'Name (2)', '42']);
  });
});

describe('readWorkbook', () => {
  it('should keep CSV values as text', () => {
    const csv = 'Name,Databuild Code,Unit Price\r\nTimber stud,00120,4.50\r\n';

    const table = readWorkbook(Buffer.from(csv, 'utf8'), 'estimate.csv');

    expect(table.sourceName).toBe('estimate.csv');
    expect(table.columns).toEqual(['Name', 'Databuild Code', 'Unit Price']);
    expect(table.rows).toEqual([{ 'Name': 'Timber stud', 'Databuild Code': '00120', 'Unit Price': '4.50' }]);
  });

  it('should drop blank rows and fill missing cells', () => {
    const csv = 'Name,Units\r\nDoor,EA\r\n,\r\nSkirting\r\n';

    const table = readWorkbook(Buffer.from(csv, 'utf8'), 'estimate.csv');

    expect(table.rows).toEqual([
      { Name: 'Door', Units: 'EA' },
      { Name: 'Skirting', Units: '' },
    ]);
  });

  it('should ignore a byte order mark', () => {
    const table = readWorkbook(Buffer.from('\uFEFFName,Units\r\nDoor,EA\r\n', 'utf8'), 'estimate.csv');

    expect(table.columns).toEqual(['Name', 'Units']);
  });

  it('should read the first sheet of an XLSX file with typed cells', () => {
    const buffer = xlsxBuffer([
      ['Name', 'Unit Price', 'Units'],
      ['Door', 250, 'EA'],
    ]);

    const table = readWorkbook(buffer, 'estimate.xlsx');

    expect(table.rows).toEqual([{ 'Name': 'Door', 'Unit Price': 250, 'Units': 'EA' }]);
  });

  it('should reject an empty upload', () => {
    expect(() => readWorkbook(Buffer.alloc(0), 'empty.csv')).toThrow(WorkbookError);
  });
});
