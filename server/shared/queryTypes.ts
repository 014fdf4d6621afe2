import type { SchemaAnalysis } from './schema.js';

export type CellValue = string | number | boolean | Date | null;

export type DataRow = Record<string, CellValue | undefined>;

export interface DataTable {
  columns: string[];
  rows: DataRow[];
}

export type QueryAction = 'show' | 'count' | 'sum' | 'average' | 'explain_schema' | 'business_analysis';

export type ComparisonOperator = '>' | '<' | '>=' | '<=' | '==' | '!=';

export type TimeUnit = 'day' | 'week' | 'month' | 'quarter' | 'year';

interface FilterBase {
  column: string | null;
  description: string;
}

export interface ComparisonFilter extends FilterBase {
  operator: ComparisonOperator;
  value: number | string;
}

export interface InFilter extends FilterBase {
  operator: 'in';
  value: Array<string | number>;
}

export interface ContainsFilter extends FilterBase {
  operator: 'contains';
  value: string;
}

export interface OverdueFilter extends FilterBase {
  operator: 'overdue';
  value: null;
}

export interface RelativeDateFilter extends FilterBase {
  operator: 'relative_date';
  value: { number: number; unit: TimeUnit };
}

export interface YearRangeFilter extends FilterBase {
  operator: 'year_range';
  value: { start: number; end: number };
}

export interface QuarterFilter extends FilterBase {
  operator: 'quarter';
  value: { quarter: number; year: number | null };
}

export type FilterOperator = QueryFilter['operator'];

export type QueryFilter =
  | ComparisonFilter
  | InFilter
  | ContainsFilter
  | OverdueFilter
  | RelativeDateFilter
  | YearRangeFilter
  | QuarterFilter;

export type AggregationFunction = 'count' | 'sum' | 'mean' | 'min' | 'max';

// Key '*' always means row count
export type AggregationMap = Record<string, AggregationFunction>;

export interface SortSpec {
  column: string;
  ascending: boolean;
}

export interface TimeWindow {
  quarter: number;
  year: number | null;
}

export interface QueryPlan {
  action: QueryAction;
  filters: QueryFilter[];
  grouping: string[];
  unresolvedGrouping: string[];
  aggregation: AggregationMap;
  sorting: SortSpec[];
  limit: number | null;
  timeWindow: TimeWindow | null;
  originalQuestion: string;
  schemaInfo: SchemaAnalysis | null;
}

export interface ResultSizeEstimate {
  estimatedRows: number;
  confidence: 'low' | 'medium' | 'high';
}

export type PlanResult =
  | {
      status: 'success';
      queryPlan: QueryPlan;
      executionSteps: string[];
      estimatedResultSize: ResultSizeEstimate;
      explanation: string;
    }
  | { status: 'ambiguous'; message: string; clarificationQuestions: string[] }
  | { status: 'error'; message: string };

export function createEmptyPlan(question: string, action: QueryAction = 'show'): QueryPlan {
  return {
    action,
    filters: [],
    grouping: [],
    unresolvedGrouping: [],
    aggregation: {},
    sorting: [],
    limit: null,
    timeWindow: null,
    originalQuestion: question,
    schemaInfo: null,
  };
}
