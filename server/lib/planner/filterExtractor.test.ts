import { describe, expect, it } from 'vitest';
import { analyzeTable } from '../schemaAnalyzer.js';
import { extractFilters } from './filterExtractor.js';
import { extractGrouping, extractLimit, extractSorting, extractTimeWindow } from './clauseExtractors.js';

const schema = analyzeTable({
  columns: ['BUKRS', 'BLART', 'BUDAT', 'LIFNR', 'KUNNR', 'DMBTR', 'KOSTL'],
  rows: [],
});
const bareSchema = analyzeTable({ columns: ['Region', 'Sales'], rows: [] });

describe('extractFilters', () => {
  it('extracts amount, relative date and document type filters', () => {
    expect(extractFilters('show invoices over 10,000 in the last 30 days', schema)).toEqual([
      { column: 'DMBTR', operator: '>', value: 10000, description: 'Amount over $10,000.00' },
      { column: 'BUDAT', operator: 'relative_date', value: { number: 30, unit: 'day' }, description: 'Last 30 days' },
      { column: 'BLART', operator: 'in', value: ['KR', 'DR', 'RE'], description: 'Document type: invoice (KR, DR, RE)' },
    ]);
  });

  it('does not read day counts as amounts', () => {
    expect(extractFilters('items over 30 days old below $99.50', schema)).toEqual([
      { column: 'DMBTR', operator: '<', value: 99.5, description: 'Amount under $99.50' },
    ]);
  });

  it('orders year ranges and reads quarters with an optional year', () => {
    expect(extractFilters('postings 2024-2022 in q2 2024 and q4', schema)).toEqual([
      { column: 'BUDAT', operator: 'year_range', value: { start: 2022, end: 2024 }, description: 'Years 2022-2024' },
      { column: 'BUDAT', operator: 'quarter', value: { quarter: 2, year: 2024 }, description: 'Q2 2024' },
      { column: 'BUDAT', operator: 'quarter', value: { quarter: 4, year: null }, description: 'Q4' },
    ]);
  });

  it('reads explicit document type codes', () => {
    expect(extractFilters('entries with document type sa', schema)).toEqual([
      { column: 'BLART', operator: '==', value: 'SA', description: 'Document type: SA' },
    ]);
  });

  it('keeps unresolved columns as null', () => {
    expect(extractFilters('overdue items above 500 with blart: kr', bareSchema)).toEqual([
      { column: null, operator: '>', value: 500, description: 'Amount over $500.00' },
      { column: null, operator: '==', value: 'KR', description: 'Document type: KR' },
      { column: null, operator: 'overdue', value: null, description: 'Overdue items' },
    ]);
  });

  it('skips document type keywords without a document type column', () => {
    expect(extractFilters('payments and invoices', bareSchema)).toEqual([]);
  });
});

describe('extractGrouping', () => {
  it('combines explicit, plain and keyword grouping without duplicates', () => {
    expect(extractGrouping('total per vendor by company code for each customer', schema)).toEqual({
      grouping: ['LIFNR', 'KUNNR', 'BUKRS'],
      unresolved: [],
    });
  });

  it('ignores "by" after sorting words and drops unresolved plain terms', () => {
    expect(extractGrouping('postings sorted by amount by weather', schema)).toEqual({ grouping: [], unresolved: [] });
  });

  it('resolves cost centers through the synonym table', () => {
    expect(extractGrouping('spend per cost center', schema)).toEqual({ grouping: ['KOSTL'], unresolved: [] });
  });
});

describe('extractSorting and extractLimit', () => {
  it('sorts by the amount column', () => {
    expect(extractSorting('largest postings', schema)).toEqual([{ column: 'DMBTR', ascending: false }]);
    expect(extractSorting('smallest postings', schema)).toEqual([{ column: 'DMBTR', ascending: true }]);
    expect(extractSorting('largest postings', bareSchema)).toEqual([]);
  });

  it('reads limits but not relative periods', () => {
    expect(extractLimit('first 10 rows')).toBe(10);
    expect(extractLimit('last 7 entries')).toBe(7);
    expect(extractLimit('last 30 days')).toBeNull();
    expect(extractLimit('limit to 25')).toBe(25);
  });
});

describe('extractTimeWindow', () => {
  const now = new Date('2024-02-20T00:00:00Z');

  it('reads ordinal, previous and current quarters', () => {
    expect(extractTimeWindow('second quarter of 2023', now)).toEqual({ quarter: 2, year: 2023 });
    expect(extractTimeWindow('the 4th quarter', now)).toEqual({ quarter: 4, year: null });
    expect(extractTimeWindow('previous quarter', now)).toEqual({ quarter: 4, year: 2023 });
    expect(extractTimeWindow('this quarter', now)).toEqual({ quarter: 1, year: 2024 });
    expect(extractTimeWindow('last month', now)).toBeNull();
  });
});
