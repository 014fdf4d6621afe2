import { describe, expect, it } from 'vitest';
import {
  calculateConfidence,
  detectTableTypeFast,
  getSuggestedQueries,
  getTableDescription,
  identifyReportType,
  scoreTableType,
  validateTableStructure,
} from './reportIdentifier.js';

describe('identifyReportType', () => {
  it('selects BKPF when required and most optional columns are present', () => {
    const result = identifyReportType(['BUKRS', 'BELNR', 'GJAHR', 'BLART', 'BUDAT', 'WAERS', 'BKTXT', 'USNAM', 'TCODE']);

    expect(result.tableType).toBe('BKPF');
    expect(result.confidence).toBeCloseTo(0.94, 10);
    expect(result.description).toBe('Accounting Document Header');
    expect(result.missingColumns).toEqual([]);
    expect(result.extraColumns).toEqual([]);
    expect(result.matchedColumns).toHaveLength(9);
  });

  it('normalizes case and whitespace before matching', () => {
    const result = identifyReportType([' lifnr ', 'name1', 'Extra']);

    expect(result.tableType).toBe('LFA1');
    expect(result.confidence).toBeCloseTo(0.7, 10);
    expect(result.matchedColumns).toEqual(['LIFNR', 'NAME1']);
    expect(result.extraColumns).toEqual(['EXTRA']);
  });

  it('keeps the first signature in table order on a tie', () => {
    const result = identifyReportType(['LIFNR', 'KUNNR', 'NAME1']);

    expect(result.tableType).toBe('LFA1');
  });

  it('identifies a near-complete table when the required share still clears the threshold', () => {
    // BSEG without KONTO: 0.7 * 5/6 + 0.3 * 6/6
    const result = identifyReportType(['BUKRS', 'BELNR', 'GJAHR', 'BUZEI', 'KOART', 'SHKZG', 'DMBTR', 'WRBTR', 'LIFNR', 'KUNNR', 'KOSTL']);

    expect(result.tableType).toBe('BSEG');
    expect(result.confidence).toBeCloseTo(0.7 * 5 / 6 + 0.3, 10);
    expect(result.missingColumns).toEqual(['KONTO']);
    expect(result.extraColumns).toEqual([]);
  });

  it('does not let optional columns make up for a missing required column', () => {
    // Every optional LFA1 column plus NAME1, but no LIFNR: 0.7 * 1/2 + 0.3 = 0.65
    const columns = ['NAME1', 'ORT01', 'LAND1', 'SPERR', 'LOEVM', 'STRAS', 'PSTLZ'];
    const result = identifyReportType(columns);

    expect(result.tableType).toBe('UNKNOWN');
    expect(result.confidence).toBe(0);
    expect(result.extraColumns).toEqual(columns);
  });

  it('returns UNKNOWN when required columns alone fall short of the threshold', () => {
    const result = identifyReportType(['BUKRS', 'BELNR', 'GJAHR', 'BLART', 'BUDAT']);

    expect(result.tableType).toBe('UNKNOWN');
    expect(result.matchedColumns).toEqual([]);
    expect(result.extraColumns).toEqual(['BUKRS', 'BELNR', 'GJAHR', 'BLART', 'BUDAT']);
  });

  it('converts internal failures into the ERROR sentinel', () => {
    const malformed: string[] = JSON.parse('[null]');
    const result = identifyReportType(malformed);

    expect(result).toEqual({
      tableType: 'ERROR',
      confidence: 0,
      description: 'Error during identification',
      matchedColumns: [],
      missingColumns: [],
      extraColumns: [],
    });
  });
});

describe('calculateConfidence', () => {
  it('weights required columns at 0.7 and optional at 0.3', () => {
    const confidence = calculateConfidence(['A', 'C'], { requiredColumns: ['A', 'B'], optionalColumns: ['C', 'D'] });
    expect(confidence).toBeCloseTo(0.5, 10);
  });

  it('uses the required score alone when there are no optional columns', () => {
    expect(calculateConfidence(['A'], { requiredColumns: ['A', 'B'], optionalColumns: [] })).toBe(0.5);
  });

  it('halves optional-only scores', () => {
    expect(calculateConfidence(['C', 'D'], { requiredColumns: [], optionalColumns: ['C', 'D'] })).toBe(0.5);
  });

  it('ignores duplicate signature entries', () => {
    expect(calculateConfidence(['A'], { requiredColumns: ['A', 'A'], optionalColumns: [] })).toBe(1);
  });
});

describe('fast detection helpers', () => {
  it('detects BKPF from its four key columns', () => {
    expect(detectTableTypeFast(['budat', 'BUKRS', 'BELNR', 'GJAHR', 'BLART'])).toBe('BKPF');
  });

  it('prefers the first rule in declaration order', () => {
    // Satisfies both BKPF and BSEG subsets
    expect(detectTableTypeFast(['BUKRS', 'BELNR', 'GJAHR', 'BLART', 'BUZEI', 'KOART'])).toBe('BKPF');
  });

  it('falls back to UNKNOWN', () => {
    expect(detectTableTypeFast(['Amount', 'Date'])).toBe('UNKNOWN');
  });

  it('scores required coverage', () => {
    expect(scoreTableType('BSEG', ['BUKRS', 'BELNR', 'GJAHR'])).toBe(0.5);
    expect(scoreTableType('NOPE', ['BUKRS'])).toBe(0);
  });
});

describe('lookups', () => {
  it('describes known and unknown types', () => {
    expect(getTableDescription('KNA1')).toBe('Customer Master Data');
    expect(getTableDescription('ZZZ')).toBe('Unknown table type');
  });

  it('returns default suggestions for unlisted types', () => {
    expect(getSuggestedQueries('CSKS')).toEqual([
      'Show all records',
      'Find records with specific criteria',
      'Analyze data patterns',
      'Generate summary statistics',
    ]);
    expect(getSuggestedQueries('BSEG')[0]).toBe('Show line items with amounts over $10,000');
  });

  it('validates table structure', () => {
    const result = validateTableStructure('LFA1', ['LIFNR', 'ORT01', 'COLOR']);

    expect(result.isValid).toBe(false);
    expect(result.missingRequired).toEqual(['NAME1']);
    expect(result.issues).toEqual(['Missing required columns: NAME1', 'Unexpected columns: COLOR']);
    expect(validateTableStructure('XYZ', []).message).toBe('Unknown table type: XYZ');
  });
});
