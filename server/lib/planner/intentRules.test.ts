import { describe, expect, it } from 'vitest';
import { analyzeTable } from '../schemaAnalyzer.js';
import { matchIntent } from './intentRules.js';

const schema = analyzeTable({ columns: ['BUKRS', 'BLART', 'BUDAT', 'DMBTR', 'USNAM'], rows: [] });

function intentFor(question: string) {
  return matchIntent({ question, text: question.toLowerCase(), schema });
}

function actionFor(question: string): string {
  const { outcome } = intentFor(question);
  return outcome.kind === 'action' ? outcome.action : `plan:${outcome.plan.action}`;
}

describe('matchIntent', () => {
  it('builds a frequency plan for "which X are used most"', () => {
    const { rule, outcome } = intentFor('Which users were used most frequently?');

    expect(rule).toBe('most_frequent');
    expect(outcome.kind).toBe('plan');
    if (outcome.kind === 'plan') {
      expect(outcome.plan.grouping).toEqual(['USNAM']);
      expect(outcome.plan.limit).toBe(5);
    }
  });

  it('applies rules in priority order', () => {
    expect(actionFor('What does this table contain?')).toBe('explain_schema');
    expect(actionFor('Show overdue items')).toBe('business_analysis');
    expect(actionFor('Display every posting from company 1000')).toBe('show');
    expect(actionFor('How many postings happened in 2024 overall')).toBe('count');
    expect(actionFor('Total and average amount per company code')).toBe('sum');
    expect(actionFor('Average amount per company code this year')).toBe('average');
  });

  it('matches keywords as whole words', () => {
    // "summary" must not trigger "sum", "whatever" must not trigger "what"
    expect(actionFor('whatever summary of postings from the ledger export')).toBe('show');
  });

  it('falls back on question length', () => {
    expect(intentFor('amounts please').rule).toBe('fallback');
    expect(actionFor('amounts please')).toBe('explain_schema');
    expect(actionFor('postings from company 1000 during the spring months')).toBe('show');
  });
});
