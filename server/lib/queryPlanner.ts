/**
 * Query Planner
 * Translates a free-text question into a Query Plan against an analyzed schema.
 * Never throws: failures come back as an `error` result.
 */
import type { SchemaAnalysis } from '../shared/schema.js';
import type { PlanResult, FilterOperator, QueryPlan, ResultSizeEstimate } from '../shared/queryTypes.js';
import { createEmptyPlan } from '../shared/queryTypes.js';
import {
  extractAggregation,
  extractGrouping,
  extractLimit,
  extractSorting,
  extractTimeWindow,
} from './planner/clauseExtractors.js';
import { extractFilters } from './planner/filterExtractor.js';
import { INTENT_RULES, matchIntent, type IntentRule } from './planner/intentRules.js';
import { validatePlan } from './planner/planValidator.js';

export interface PlanOptions {
  now?: Date;
  rules?: IntentRule[];
}

export const PLANNING_ERROR_MESSAGE = 'Sorry, I could not understand that question. Please try rephrasing it.';

// Share of rows assumed to survive each filter operator when sizing a result
export const FILTER_SELECTIVITY: Partial<Record<FilterOperator, number>> = {
  '>': 0.3,
  '<': 0.3,
  '==': 0.1,
};

function buildPlan(question: string, schema: SchemaAnalysis, options: PlanOptions): QueryPlan {
  const text = question.toLowerCase().trim();
  const now = options.now ?? new Date();
  const { rule, outcome } = matchIntent({ question, text, schema }, options.rules ?? INTENT_RULES);
  console.log(`🧭 Intent rule "${rule}" matched`);

  if (outcome.kind === 'plan') {
    return outcome.plan;
  }

  if (outcome.action === 'explain_schema') {
    return { ...createEmptyPlan(question, 'explain_schema'), schemaInfo: schema };
  }

  const { grouping, unresolved } = extractGrouping(text, schema);
  return {
    ...createEmptyPlan(question, outcome.action),
    filters: extractFilters(text, schema),
    grouping,
    unresolvedGrouping: unresolved,
    aggregation: extractAggregation(text, schema),
    sorting: extractSorting(text, schema),
    limit: extractLimit(text),
    timeWindow: extractTimeWindow(text, now),
  };
}

export function describeExecutionSteps(plan: QueryPlan): string[] {
  const steps: string[] = [];
  if (plan.filters.length > 0) {
    steps.push(`Apply ${plan.filters.length} filter(s)`);
  }
  if (plan.timeWindow) {
    steps.push(`Restrict to Q${plan.timeWindow.quarter}${plan.timeWindow.year === null ? '' : ` ${plan.timeWindow.year}`}`);
  }
  if (plan.grouping.length > 0) {
    steps.push(`Group by ${plan.grouping.join(', ')}`);
  }
  const functions = Object.values(plan.aggregation);
  if (functions.length > 0) {
    steps.push(`Calculate ${functions.join(', ')}`);
  }
  if (plan.sorting.length > 0) {
    steps.push(`Sort by ${plan.sorting.map(sort => sort.column).join(', ')}`);
  }
  if (plan.limit !== null) {
    steps.push(`Limit to ${plan.limit} results`);
  }
  return steps;
}

export function estimateResultSize(plan: QueryPlan, schema: SchemaAnalysis): ResultSizeEstimate {
  const reduction = plan.filters.reduce((acc, filter) => acc * (FILTER_SELECTIVITY[filter.operator] ?? 1), 1);
  return {
    estimatedRows: Math.floor(schema.fileInfo.totalRows * reduction),
    confidence: 'medium',
  };
}

export function explainPlan(plan: QueryPlan): string {
  const parts: string[] = [];
  if (plan.filters.length > 0) {
    parts.push(`Filter by: ${plan.filters.map(filter => filter.description).join(', ')}`);
  }
  if (plan.grouping.length > 0) {
    parts.push(`Group by: ${plan.grouping.join(', ')}`);
  }
  const aggregations = Object.entries(plan.aggregation).map(([column, func]) => `${func}(${column})`);
  if (aggregations.length > 0) {
    parts.push(`Calculate: ${aggregations.join(', ')}`);
  }
  if (plan.sorting.length > 0) {
    const sorts = plan.sorting.map(sort => `${sort.column} (${sort.ascending ? 'ascending' : 'descending'})`);
    parts.push(`Sort by: ${sorts.join(', ')}`);
  }
  if (plan.limit !== null) {
    parts.push(`Limit to ${plan.limit} results`);
  }
  return parts.length > 0 ? parts.join('; ') : 'Show all data';
}

export function planQuery(question: string, schema: SchemaAnalysis, options: PlanOptions = {}): PlanResult {
  try {
    const plan = buildPlan(question, schema, options);
    const validation = validatePlan(plan, schema);

    if (!validation.isValid) {
      console.log(`❓ Query needs clarification: ${validation.message}`);
      return {
        status: 'ambiguous',
        message: validation.message,
        clarificationQuestions: validation.clarificationQuestions,
      };
    }

    console.log(`✅ Query plan ready: action=${plan.action}, filters=${plan.filters.length}, grouping=${plan.grouping.length}`);
    return {
      status: 'success',
      queryPlan: plan,
      executionSteps: describeExecutionSteps(plan),
      estimatedResultSize: estimateResultSize(plan, schema),
      explanation: explainPlan(plan),
    };
  } catch (error) {
    console.error('❌ Query planning failed:', error);
    return { status: 'error', message: PLANNING_ERROR_MESSAGE };
  }
}
