import { mkdtemp, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AnalysisCache } from './cache.js';
import { analyzeTable, inferCategory, profileColumn, SchemaAnalyzer } from './schemaAnalyzer.js';
import type { DataTable } from '../shared/queryTypes.js';

const bkpfTable: DataTable = {
  columns: ['BUKRS', 'BELNR', 'GJAHR', 'BLART', 'BUDAT'],
  rows: [
    { BUKRS: '1000', BELNR: '1000000001', GJAHR: '2024', BLART: 'K1', BUDAT: '2024-01-15' },
    { BUKRS: '1000', BELNR: '1000000002', GJAHR: '2024', BLART: 'S1', BUDAT: '2024-01-16' },
    { BUKRS: '1000', BELNR: '1000000003', GJAHR: '2024', BLART: 'K2', BUDAT: '2024-01-25' },
    { BUKRS: '1000', BELNR: '1000000004', GJAHR: '2024', BLART: '', BUDAT: '2024-02-18' },
  ],
};

describe('inferCategory', () => {
  it('treats a column as numeric when at least 80% coerce', () => {
    expect(inferCategory(['1', '2', '3', '4', 'x'])).toBe('numeric');
    expect(inferCategory(['1', '2', '3', 'y', 'x'])).not.toBe('numeric');
  });

  it('detects dates, empty columns and text', () => {
    expect(inferCategory(['2024-01-01', '2024-02-01', null])).toBe('date');
    expect(inferCategory([null, '', undefined])).toBe('empty');
    expect(inferCategory(['alpha', 'beta', 'gamma'])).toBe('text');
  });

  it('flags low-cardinality columns as categorical', () => {
    const values = Array.from({ length: 30 }, (_, i) => (i % 2 === 0 ? 'A' : 'B'));
    expect(inferCategory(values)).toBe('categorical');
  });
});

describe('profileColumn', () => {
  it('computes ratios over the values given and attaches numeric statistics', () => {
    const profile = profileColumn('dmbtr', ['100', '400', null, '100']);

    expect(profile).toEqual({
      name: 'dmbtr',
      category: 'numeric',
      nullCount: 1,
      nullRatio: 0.25,
      uniqueCount: 2,
      uniqueRatio: 0.5,
      statistics: { kind: 'numeric', min: 100, max: 400, mean: 200, sum: 600 },
      semanticPatterns: ['local_amount'],
    });
  });

  it('attaches date statistics', () => {
    const profile = profileColumn('BUDAT', ['2024-01-15', '2024-02-18']);

    expect(profile.statistics).toEqual({
      kind: 'date',
      minDate: '2024-01-15T00:00:00.000Z',
      maxDate: '2024-02-18T00:00:00.000Z',
      spanDays: 34,
    });
    expect(profile.semanticPatterns).toEqual(['posting_date']);
  });
});

describe('analyzeTable', () => {
  it('identifies the BKPF column set with full confidence', () => {
    const analysis = analyzeTable(bkpfTable);

    expect(analysis.tableType).toBe('BKPF');
    expect(analysis.confidence).toBe(1);
    expect(analysis.confidence).toBeGreaterThanOrEqual(0.8);
    expect(analysis.reportIdentification?.tableType).toBe('UNKNOWN');
    expect(analysis.columns.map(col => col.name)).toEqual(bkpfTable.columns);
    expect(analysis.schemaSummary).toBe('This appears to be a BKPF table with 5 columns.');
    expect(analysis.querySuggestions[0]).toBe('Show documents posted in the last 30 days');
    expect(analysis.dataQuality.nullPercentage).toBe(5);
    expect(analysis.schemaMapping.BLART).toContain('Document Type');
  });

  it('uses the identifier confidence when both detectors agree', () => {
    const table: DataTable = {
      columns: [...bkpfTable.columns, 'WAERS', 'BKTXT', 'USNAM', 'TCODE', 'CPUDT'],
      rows: [],
    };
    const analysis = analyzeTable(table);

    expect(analysis.tableType).toBe('BKPF');
    expect(analysis.confidence).toBeCloseTo(1, 10);
    expect(analysis.columns.every(col => col.category === 'empty')).toBe(true);
    expect(analysis.dataQuality.nullPercentage).toBe(0);
  });

  it('profiles only the sample but counts every row', () => {
    const analysis = analyzeTable(bkpfTable, { sampleSize: 2 });

    expect(analysis.fileInfo).toEqual({ totalRows: 4, totalColumns: 5, fileSizeMb: 0, analyzedRows: 2 });
  });

  it('reports unknown tables with zero confidence', () => {
    const analysis = analyzeTable({ columns: ['Region', 'Sales'], rows: [{ Region: 'North', Sales: '10' }] });

    expect(analysis.tableType).toBe('UNKNOWN');
    expect(analysis.confidence).toBe(0);
    expect(analysis.schemaMapping).toEqual({});
  });
});

describe('SchemaAnalyzer.analyzeFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-analyzer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('caches by path and modification time', async () => {
    const filePath = join(dir, 'bkpf.csv');
    await writeFile(filePath, 'BUKRS,BELNR,GJAHR,BLART\n1000,1,2024,K1\n');
    await utimes(filePath, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:00:00Z'));

    const cache = new AnalysisCache();
    const analyzer = new SchemaAnalyzer({ cache });

    const first = await analyzer.analyzeFile(filePath);
    const second = await analyzer.analyzeFile(filePath);
    expect(second).toBe(first);
    expect(first.fileInfo.totalRows).toBe(1);

    await writeFile(filePath, 'BUKRS,BELNR,GJAHR,BLART\n1000,1,2024,K1\n1000,2,2024,S1\n');
    await utimes(filePath, new Date('2024-02-01T00:00:00Z'), new Date('2024-02-01T00:00:00Z'));

    const third = await analyzer.analyzeFile(filePath);
    expect(third).not.toBe(first);
    expect(third.fileInfo.totalRows).toBe(2);
    expect(cache.getStats().size).toBe(1);
  });

  it('forgets the cached analysis of a released file', async () => {
    const filePath = join(dir, 'bkpf.csv');
    await writeFile(filePath, 'BUKRS,BELNR,GJAHR,BLART\n1000,1,2024,K1\n');

    const cache = new AnalysisCache();
    const analyzer = new SchemaAnalyzer({ cache });
    const first = await analyzer.analyzeFile(filePath);

    analyzer.forget(filePath);
    expect(cache.getStats().size).toBe(0);

    const second = await analyzer.analyzeFile(filePath);
    expect(second).not.toBe(first);
    expect(cache.getStats().size).toBe(1);
  });

  it('propagates read failures', async () => {
    const analyzer = new SchemaAnalyzer();
    await expect(analyzer.analyzeFile(join(dir, 'missing.csv'))).rejects.toThrow();
  });

  it('propagates parse failures', async () => {
    const filePath = join(dir, 'notes.txt');
    await writeFile(filePath, 'hello');
    const analyzer = new SchemaAnalyzer();
    await expect(analyzer.analyzeFile(filePath)).rejects.toThrow('Unsupported file format');
  });
});
