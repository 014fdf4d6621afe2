import { describe, expect, it, vi } from 'vitest';
import { createEmptyPlan, type DataTable } from '../shared/queryTypes.js';
import {
  createInsightGenerator,
  INSIGHTS_UNAVAILABLE_MESSAGE,
  isQuotaError,
  QUOTA_EXCEEDED_MESSAGE,
  type CompletionFn,
} from './insightGenerator.js';
import { buildSchemaContext } from './promptTemplates.js';
import { QueryExecutor } from './queryExecutor.js';
import { analyzeTable } from './schemaAnalyzer.js';

const table: DataTable = {
  columns: ['BELNR', 'LIFNR', 'DMBTR'],
  rows: [
    { BELNR: '1', LIFNR: 'V100', DMBTR: '100' },
    { BELNR: '2', LIFNR: 'V100', DMBTR: '250' },
    { BELNR: '3', LIFNR: 'V200', DMBTR: '75' },
  ],
};
const schema = analyzeTable(table);
const result = new QueryExecutor(table, schema).execute({
  ...createEmptyPlan('Total by vendor', 'sum'),
  grouping: ['LIFNR'],
  aggregation: { DMBTR: 'sum' },
});

describe('createInsightGenerator', () => {
  it('sends the question with schema and result context', async () => {
    const complete = vi.fn<CompletionFn>().mockResolvedValue('  Vendor V100 accounts for most spend.  ');
    const generate = createInsightGenerator(complete);

    const answer = await generate('Total by vendor', schema, result);

    expect(answer).toBe('Vendor V100 accounts for most spend.');
    expect(complete).toHaveBeenCalledTimes(1);
    const messages = complete.mock.calls[0][0];
    expect(messages).toHaveLength(4);
    expect(messages[1]).toEqual({ role: 'system', content: buildSchemaContext(schema) });
    expect(messages[3]).toEqual({ role: 'user', content: 'Total by vendor' });
  });

  it('returns the quota message when the service reports exhausted quota', async () => {
    const generate = createInsightGenerator(async () => {
      throw new Error('429 You exceeded your current quota, please check your plan');
    });

    await expect(generate('Total by vendor', schema, result)).resolves.toBe(QUOTA_EXCEEDED_MESSAGE);
  });

  it('returns a fixed apology for other failures and empty replies', async () => {
    const failing = createInsightGenerator(async () => {
      throw new Error('connect ECONNREFUSED');
    });
    const empty = createInsightGenerator(async () => '   ');

    await expect(failing('Total by vendor', schema, result)).resolves.toBe(INSIGHTS_UNAVAILABLE_MESSAGE);
    await expect(empty('Total by vendor', schema, result)).resolves.toBe(INSIGHTS_UNAVAILABLE_MESSAGE);
  });
});

describe('isQuotaError', () => {
  it('recognizes quota failures only', () => {
    expect(isQuotaError(new Error('insufficient_quota'))).toBe(true);
    expect(isQuotaError(new Error('timeout'))).toBe(false);
    expect(isQuotaError('quota')).toBe(false);
  });
});

describe('buildSchemaContext', () => {
  it('lists tagged columns with their patterns', () => {
    expect(buildSchemaContext(schema)).toBe([
      'Data Schema Context:',
      '- Table Type: UNKNOWN',
      '- Total Records: 3',
      '- Data Quality: 0% null values',
      '',
      'Key Columns Available:',
      '- BELNR: document_number',
      '- LIFNR: vendor_number',
      '- DMBTR: local_amount',
    ].join('\n'));
  });
});
