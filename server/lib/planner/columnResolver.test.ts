import { describe, expect, it } from 'vitest';
import { analyzeTable } from '../schemaAnalyzer.js';
import { resolveColumn, resolveLeadingTerm } from './columnResolver.js';

const sapSchema = analyzeTable({ columns: ['BUKRS', 'BELNR', 'BLART', 'BUDAT', 'TCODE', 'WRBTR'], rows: [] });
const friendlySchema = analyzeTable({ columns: ['Posting Date', 'document_type', 'Vendor Name', 'Net Amount'], rows: [] });

describe('resolveColumn', () => {
  it('maps synonyms to the canonical column, including plurals', () => {
    expect(resolveColumn(sapSchema, 'transaction codes')).toBe('TCODE');
    expect(resolveColumn(sapSchema, 'doc type')).toBe('BLART');
    expect(resolveColumn(sapSchema, 'Company Code')).toBe('BUKRS');
  });

  it('falls back to the next canonical code for amounts', () => {
    expect(resolveColumn(sapSchema, 'amount')).toBe('WRBTR');
  });

  it('matches normalized names when no synonym column exists', () => {
    expect(resolveColumn(friendlySchema, 'document types')).toBe('document_type');
    expect(resolveColumn(friendlySchema, 'posting date')).toBe('Posting Date');
    expect(resolveColumn(friendlySchema, 'vendor name')).toBe('Vendor Name');
    expect(resolveColumn(friendlySchema, 'net')).toBe('Net Amount');
  });

  it('matches semantic pattern names', () => {
    expect(resolveColumn(sapSchema, 'document number')).toBe('BELNR');
  });

  it('returns null when nothing matches', () => {
    expect(resolveColumn(sapSchema, 'region')).toBeNull();
    expect(resolveColumn(sapSchema, '   ')).toBeNull();
  });
});

describe('resolveLeadingTerm', () => {
  it('prefers the longest resolvable prefix', () => {
    expect(resolveLeadingTerm(sapSchema, ['posting', 'date', 'desc'])).toBe('BUDAT');
    expect(resolveLeadingTerm(sapSchema, ['region', 'code'])).toBeNull();
  });
});
