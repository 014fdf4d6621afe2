import { describe, expect, it } from 'vitest';
import {
  createSchemaSummary,
  describeColumns,
  getAvailableColumns,
  getColumnCategories,
  getColumnDescription,
  getCommonColumns,
  getSchema,
  suggestRelatedColumns,
  validateSchemaCompleteness,
} from './schemaMapper.js';

describe('schemaMapper', () => {
  it('looks up column descriptions case-insensitively', () => {
    expect(getColumnDescription('BSEG', 'shkzg')).toBe('Debit/Credit Indicator - S=Debit, H=Credit');
    expect(getColumnDescription('BSEG', 'NOPE')).toBe('');
    expect(getSchema('UNKNOWN')).toEqual({});
  });

  it('lists available columns in declaration order', () => {
    expect(getAvailableColumns('CSKA')).toEqual(['KOKRS', 'KOSAR', 'DATBI', 'VERAK', 'VERAK_USER', 'SPERR']);
  });

  it('builds a schema summary for known types', () => {
    expect(createSchemaSummary('LFA1', ['LIFNR', 'Color'])).toBe(
      [
        'The uploaded file contains 2 columns from a LFA1 table.',
        'Columns:',
        '    LIFNR: Vendor Number - Unique vendor identifier',
        '    Color: Unknown column: Color',
      ].join('\n'),
    );
    expect(createSchemaSummary('UNKNOWN', ['A'])).toBe('Unknown report type: UNKNOWN');
  });

  it('groups common columns by table type', () => {
    const common = getCommonColumns(['LFA1', 'KNA1']);
    expect(common.NAME1).toEqual(['LFA1', 'KNA1']);
    expect(common.LIFNR).toEqual(['LFA1']);
  });

  it('suggests related columns and categories', () => {
    expect(suggestRelatedColumns('BSEG', 'konto')).toEqual(['KOART', 'SHKZG', 'DMBTR', 'WRBTR']);
    expect(suggestRelatedColumns('SKAT', 'SAKNR')).toEqual([]);
    expect(getColumnCategories('BKPF')['Document Identification']).toEqual(['BUKRS', 'BELNR', 'GJAHR']);
  });

  it('validates schema completeness', () => {
    const skat = validateSchemaCompleteness('SKAT', ['KTOPL', 'SAKNR', 'TXT50', 'XLOEV', 'OTHER']);
    expect(skat.coverage).toBeCloseTo(4 / 7, 10);
    expect(skat.isValid).toBe(true);
    expect(skat.extraColumns).toEqual(['OTHER']);

    const bkpf = validateSchemaCompleteness('BKPF', ['BUKRS', 'BELNR']);
    expect(bkpf.isValid).toBe(false);
    expect(bkpf.missingImportant).toEqual(['GJAHR', 'BLART', 'BUDAT']);
  });

  it('describes only the columns present in the file', () => {
    expect(describeColumns('BKPF', ['bukrs', 'Notes'])).toEqual({
      bukrs: 'Company Code - 4-digit code representing legal entity or department',
    });
  });
});
