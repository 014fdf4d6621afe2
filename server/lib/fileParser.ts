import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import type { CellValue, DataRow, DataTable } from '../shared/queryTypes.js';

export const SUPPORTED_EXTENSIONS = ['csv', 'xls', 'xlsx'];

export function getFileExtension(filename: string): string {
  return filename.split('.').pop()?.toLowerCase() ?? '';
}

export async function readTableFile(filePath: string, originalName: string = filePath): Promise<DataTable> {
  const buffer = await readFile(filePath);
  return parseFile(buffer, originalName);
}

export function parseFile(buffer: Buffer, filename: string): DataTable {
  const ext = getFileExtension(filename);

  if (ext === 'csv') {
    return parseCsv(buffer);
  } else if (ext === 'xlsx' || ext === 'xls') {
    return parseExcel(buffer);
  } else {
    throw new Error('Unsupported file format. Please upload CSV or Excel files.');
  }
}

function parseCsv(buffer: Buffer): DataTable {
  const content = buffer.toString('utf-8');
  // Values stay as strings; type inference happens during schema analysis
  const records: string[][] = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  return buildTable(records);
}

function parseExcel(buffer: Buffer): DataTable {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) {
    throw new Error('Workbook has no sheets');
  }
  const worksheet = workbook.Sheets[sheetName];
  const records = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: true, defval: null });

  return buildTable(records);
}

function toCellValue(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value;
  }
  return null;
}

/**
 * Normalizes header names (trimmed, blanks named, duplicates suffixed)
 * so every row can be keyed by a unique column name.
 */
export function normalizeHeader(header: unknown[]): string[] {
  const used = new Set<string>();
  const nextSuffix = new Map<string, number>();
  return header.map((raw, index) => {
    const trimmed = raw === null || raw === undefined ? '' : String(raw).trim();
    const base = trimmed || `Column_${index + 1}`;
    let name = base;
    // A suffixed name may already be taken by a literal header
    let suffix = nextSuffix.get(base) ?? 1;
    while (used.has(name)) {
      name = `${base}_${suffix}`;
      suffix++;
    }
    nextSuffix.set(base, suffix);
    used.add(name);
    return name;
  });
}

function buildTable(records: unknown[][]): DataTable {
  if (records.length === 0) {
    throw new Error('No data found in file');
  }

  const columns = normalizeHeader(records[0]);
  const rows: DataRow[] = records.slice(1).map(record => {
    const row: DataRow = {};
    columns.forEach((column, index) => {
      row[column] = toCellValue(record[index]);
    });
    return row;
  });

  return { columns, rows };
}
