import { describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import { getFileExtension, normalizeHeader, parseFile } from './fileParser.js';

describe('parseFile', () => {
  it('parses CSV into string cells keyed by trimmed header', () => {
    const csv = '\uFEFF BUKRS ,DMBTR,BLART\n1000,"1,250.00",K1\n1000,,S1\n';
    const table = parseFile(Buffer.from(csv, 'utf-8'), 'export.CSV');

    expect(table.columns).toEqual(['BUKRS', 'DMBTR', 'BLART']);
    expect(table.rows).toEqual([
      { BUKRS: '1000', DMBTR: '1,250.00', BLART: 'K1' },
      { BUKRS: '1000', DMBTR: '', BLART: 'S1' },
    ]);
  });

  it('keeps the header of a file without data rows', () => {
    const table = parseFile(Buffer.from('LIFNR,NAME1\n'), 'vendors.csv');
    expect(table).toEqual({ columns: ['LIFNR', 'NAME1'], rows: [] });
  });

  it('parses the first worksheet of an Excel workbook', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['KUNNR', 'NAME1', 'CREDIT'],
      ['C001', 'Global Corp', 5000],
      ['C002', null, 1200.5],
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Customers');
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

    const table = parseFile(buffer, 'customers.xlsx');

    expect(table.columns).toEqual(['KUNNR', 'NAME1', 'CREDIT']);
    expect(table.rows).toEqual([
      { KUNNR: 'C001', NAME1: 'Global Corp', CREDIT: 5000 },
      { KUNNR: 'C002', NAME1: null, CREDIT: 1200.5 },
    ]);
  });

  it('rejects unsupported extensions and empty files', () => {
    expect(() => parseFile(Buffer.from('a'), 'notes.txt')).toThrow('Unsupported file format. Please upload CSV or Excel files.');
    expect(() => parseFile(Buffer.from(''), 'empty.csv')).toThrow('No data found in file');
  });
});

describe('helpers', () => {
  it('names blank headers and suffixes duplicates', () => {
    expect(normalizeHeader(['A', '', 'A', null, 'A'])).toEqual(['A', 'Column_2', 'A_1', 'Column_4', 'A_2']);
  });

  it('keeps names unique when a header matches a generated suffix', () => {
    expect(normalizeHeader(['A', 'A', 'A_1'])).toEqual(['A', 'A_1', 'A_1_1']);
    expect(normalizeHeader(['A_1', 'A', 'A'])).toEqual(['A_1', 'A', 'A_2']);
    expect(normalizeHeader(['', 'Column_1'])).toEqual(['Column_1', 'Column_1_1']);
  });

  it('parses every column of a file whose headers collide after suffixing', () => {
    const table = parseFile(Buffer.from('A,A,A_1\n1,2,3\n'), 'clash.csv');

    expect(table.columns).toEqual(['A', 'A_1', 'A_1_1']);
    expect(table.rows).toEqual([{ A: '1', A_1: '2', A_1_1: '3' }]);
  });

  it('extracts lowercase extensions', () => {
    expect(getFileExtension('Ledger.XLSX')).toBe('xlsx');
  });
});
