/**
 * Plan-shape validation. Reads the schema for column lookups, never the table.
 */
import type { SchemaAnalysis } from '../../shared/schema.js';
import type { QueryPlan } from '../../shared/queryTypes.js';
import { findDateColumn } from '../schemaLookup.js';
import { isDateFilter } from './filterExtractor.js';

export interface PlanValidation {
  isValid: boolean;
  message: string;
  issues: string[];
  clarificationQuestions: string[];
}

export const TIME_PERIOD_QUESTION = 'What time period are you interested in? (e.g., last 30 days, Q2 2024)';

export function validatePlan(plan: QueryPlan, schema: SchemaAnalysis): PlanValidation {
  const issues: string[] = [];
  const clarificationQuestions: string[] = [];
  const dateColumn = findDateColumn(schema);

  for (const filter of plan.filters) {
    if (!filter.column) {
      issues.push(`Could not identify column for filter: ${filter.description}`);
      clarificationQuestions.push(`Which column should I use for ${filter.description}?`);
    }
  }

  for (const term of plan.unresolvedGrouping) {
    issues.push(`Could not identify grouping column for "${term}"`);
    clarificationQuestions.push(`Which column should I group by for "${term}"?`);
  }

  if (plan.timeWindow && !dateColumn) {
    issues.push('No date column available for the requested quarter');
    clarificationQuestions.push('Which date column should I use for the requested quarter?');
  }

  if (plan.action === 'sum' || plan.action === 'average') {
    const func = plan.action === 'sum' ? 'sum' : 'mean';
    const hasAmount = Object.entries(plan.aggregation).some(([column, fn]) => column !== '*' && fn === func);
    if (!hasAmount) {
      issues.push(`Could not identify an amount column to ${plan.action === 'sum' ? 'total' : 'average'}`);
      clarificationQuestions.push(`Which column should I ${plan.action === 'sum' ? 'total' : 'average'}?`);
    }
  }

  if (issues.length > 0 && plan.filters.length > 0 && !plan.filters.some(isDateFilter) && dateColumn) {
    clarificationQuestions.push(TIME_PERIOD_QUESTION);
  }

  return {
    isValid: issues.length === 0,
    message: issues.length > 0 ? issues.join('; ') : 'Query plan is valid',
    issues,
    clarificationQuestions,
  };
}
