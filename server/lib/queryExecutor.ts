/**
 * Query Executor
 * Runs a Query Plan against an in-memory table:
 * filters → time window → grouping/aggregation → sorting → limit → guards.
 * Never throws: failures come back as an `error` Execution Result.
 */
import type { ExecutionResult, ExecutionStep, QueryType, SchemaAnalysis } from '../shared/schema.js';
import type { DataRow, DataTable, QueryPlan } from '../shared/queryTypes.js';
import { DEFAULT_ORG_CONTEXT_KEYWORDS } from './config.js';
import { parseFlexibleDate } from './dateUtils.js';
import { applyGrouping, applyLimit, applySorting } from './executor/aggregation.js';
import { applyFilters, applyTimeWindow } from './executor/filters.js';
import {
  buildBusinessAnswer,
  buildBusinessFindings,
  buildDataNarrative,
  buildSchemaAnswer,
  buildSchemaMarkdown,
} from './executor/narratives.js';
import { findDateColumn } from './schemaLookup.js';
import { createSummaryStats, generateResultInsights } from './statisticalSummary.js';
import { cellKey, toJsonCell, toNumber } from './valueUtils.js';

export const FULL_TABLE_MESSAGE =
  'Sorry, I am unable to answer your question with the current data. Please try a more specific or different question.';
export const NO_ANSWER_MESSAGE = 'Sorry, I am unable to answer this question with the current data.';
export const EXECUTION_ERROR_MESSAGE = 'Sorry, something went wrong while running this query. Please try again.';

// Rows inspected by the header-echo guard
const HEADER_ECHO_ROWS = 5;

export interface ExecutorOptions {
  now?: () => Date;
  orgContextKeywords?: readonly string[];
}

function elapsedSeconds(start: number): number {
  return (performance.now() - start) / 1000;
}

function rowsEqual(a: DataRow, b: DataRow, columns: string[]): boolean {
  return columns.every(column => cellKey(a[column]) === cellKey(b[column]));
}

export class QueryExecutor {
  private readonly table: DataTable;
  private readonly schema: SchemaAnalysis;
  private readonly now: () => Date;
  private readonly orgContextKeywords: readonly string[];

  constructor(table: DataTable, schema: SchemaAnalysis, options: ExecutorOptions = {}) {
    this.schema = schema;
    this.now = options.now ?? (() => new Date());
    this.orgContextKeywords = options.orgContextKeywords ?? DEFAULT_ORG_CONTEXT_KEYWORDS;
    this.table = QueryExecutor.prepareTable(table, schema);
  }

  /**
   * Copy the source table and coerce date and numeric columns. A column that
   * fails coercion keeps its original values.
   */
  private static prepareTable(source: DataTable, schema: SchemaAnalysis): DataTable {
    const rows = source.rows.map(row => ({ ...row }));

    for (const profile of schema.columns) {
      if (!source.columns.includes(profile.name)) continue;
      if (profile.category !== 'date' && profile.category !== 'numeric') continue;

      try {
        const coerce = profile.category === 'date' ? parseFlexibleDate : toNumber;
        const coerced = rows.map(row => coerce(row[profile.name]));
        rows.forEach((row, index) => {
          row[profile.name] = coerced[index];
        });
      } catch (error) {
        console.warn(`⚠️ Could not coerce column ${profile.name}:`, error instanceof Error ? error.message : error);
      }
    }

    return { columns: [...source.columns], rows };
  }

  get rowCount(): number {
    return this.table.rows.length;
  }

  execute(plan: QueryPlan): ExecutionResult {
    const start = performance.now();
    try {
      if (plan.action === 'explain_schema') {
        return this.explainSchema(plan, start);
      }
      if (plan.action === 'business_analysis') {
        return this.analyzeBusiness(plan, start);
      }
      return this.runPipeline(plan, start);
    } catch (error) {
      console.error('❌ Query execution failed:', error);
      return {
        ...this.errorResult(EXECUTION_ERROR_MESSAGE, start, []),
        traceback: error instanceof Error ? error.stack ?? error.message : String(error),
      };
    }
  }

  private runPipeline(plan: QueryPlan, start: number): ExecutionResult {
    const now = this.now();
    const log: ExecutionStep[] = [];
    let working = this.table;

    if (plan.filters.length > 0) {
      const filtered = applyFilters(working, plan.filters, now);
      working = filtered.table;
      log.push(...filtered.steps);
    }

    if (plan.timeWindow) {
      const windowed = applyTimeWindow(working, plan.timeWindow, findDateColumn(this.schema));
      working = windowed.table;
      log.push(windowed.step);
    }

    const filteredRowCount = working.rows.length;

    if (plan.grouping.length > 0 || Object.keys(plan.aggregation).length > 0) {
      const grouped = applyGrouping(working, plan.grouping, plan.aggregation, plan.limit);
      working = grouped.table;
      log.push(grouped.step);
    }

    if (plan.sorting.length > 0) {
      const sorted = applySorting(working, plan.sorting);
      working = sorted.table;
      if (sorted.step) log.push(sorted.step);
    }

    if (plan.limit !== null) {
      const limited = applyLimit(working, plan.limit);
      working = limited.table;
      log.push(limited.step);
    }

    const guardMessage = this.checkGuards(working);
    if (guardMessage) {
      console.log(`🛑 Result rejected by guard: ${guardMessage}`);
      return this.errorResult(guardMessage, start, log);
    }

    const summaryStats = createSummaryStats(working, this.schema);
    const result: ExecutionResult = {
      status: 'success',
      message: `Query returned ${working.rows.length} rows`,
      data: working.rows.map(row => working.columns.map(column => toJsonCell(row[column]))),
      columns: working.columns,
      rowCount: working.rows.length,
      executionTime: elapsedSeconds(start),
      executionLog: log,
      summaryStats,
      insights: generateResultInsights(working, plan, summaryStats),
      narrative: buildDataNarrative(plan, working, filteredRowCount),
      analysisText: null,
      queryType: 'data',
      traceback: null,
    };
    console.log(`✅ Query executed: ${result.rowCount} rows in ${result.executionTime.toFixed(3)}s`);
    return result;
  }

  /**
   * Guards run in order and the first failure wins:
   * full-table echo, then empty result, then header echo
   */
  private checkGuards(result: DataTable): string | null {
    if (this.isFullTable(result)) {
      return FULL_TABLE_MESSAGE;
    }
    if (result.rows.length === 0 || result.columns.length === 0) {
      return NO_ANSWER_MESSAGE;
    }
    const head = result.rows.slice(0, HEADER_ECHO_ROWS);
    if (head.every(row => result.columns.every(column => cellKey(row[column]) === column))) {
      return NO_ANSWER_MESSAGE;
    }
    return null;
  }

  private isFullTable(result: DataTable): boolean {
    const source = this.table;
    if (result.rows.length === 0 || result.rows.length !== source.rows.length) return false;
    if (result.columns.length !== source.columns.length) return false;
    if (!result.columns.every(column => source.columns.includes(column))) return false;
    return result.rows.every((row, index) => rowsEqual(row, source.rows[index], source.columns));
  }

  private explainSchema(plan: QueryPlan, start: number): ExecutionResult {
    const schema = plan.schemaInfo ?? this.schema;
    const markdown = buildSchemaMarkdown(schema);
    const answer = buildSchemaAnswer(plan.originalQuestion, schema, this.orgContextKeywords);
    console.log(`📖 Schema explanation generated for ${schema.tableType}`);
    return this.narrativeResult('schema_explanation', markdown, answer, start);
  }

  private analyzeBusiness(plan: QueryPlan, start: number): ExecutionResult {
    const findings = buildBusinessFindings(plan.originalQuestion, this.table, this.schema, this.now());
    const answer = buildBusinessAnswer(plan.originalQuestion, findings, this.orgContextKeywords);
    console.log('💼 Business analysis generated');
    return this.narrativeResult('business_analysis', findings, answer, start);
  }

  private narrativeResult(queryType: QueryType, analysisText: string, narrative: string, start: number): ExecutionResult {
    return {
      status: 'success',
      message: 'Analysis complete',
      data: [[analysisText, narrative]],
      columns: [queryType === 'schema_explanation' ? 'explanation' : 'analysis', 'answer'],
      rowCount: 1,
      executionTime: elapsedSeconds(start),
      executionLog: [],
      summaryStats: {},
      insights: [narrative],
      narrative,
      analysisText,
      queryType,
      traceback: null,
    };
  }

  private errorResult(message: string, start: number, log: ExecutionStep[]): ExecutionResult {
    return {
      status: 'error',
      message,
      data: [],
      columns: [],
      rowCount: 0,
      executionTime: elapsedSeconds(start),
      executionLog: log,
      summaryStats: {},
      insights: [],
      narrative: message,
      analysisText: null,
      queryType: 'data',
      traceback: null,
    };
  }
}
