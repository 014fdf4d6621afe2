import type { ColumnCategory, ColumnSummary, SchemaAnalysis } from '../shared/schema.js';
import type { CellValue, DataTable, QueryPlan } from '../shared/queryTypes.js';
import { daysBetween, parseFlexibleDate } from './dateUtils.js';
import { inferCategory } from './schemaAnalyzer.js';
import { getColumnProfile } from './schemaLookup.js';
import { cellKey, formatNumber, toNumber } from './valueUtils.js';

const TOP_VALUE_COUNT = 5;
// A numeric column is flagged when its max exceeds this multiple of its mean
const HIGH_VARIANCE_FACTOR = 3;

/**
 * Category of a result column: the analyzed category for source columns,
 * inferred from the result values for derived ones (e.g. "count")
 */
export function resultColumnCategory(table: DataTable, column: string, schema: SchemaAnalysis): ColumnCategory {
  const profile = getColumnProfile(schema, column);
  if (profile) return profile.category;
  return inferCategory(table.rows.map(row => row[column]));
}

/**
 * Calculate statistics for a numeric column
 */
function numericSummary(values: Array<CellValue | undefined>): ColumnSummary | null {
  const numbers = values.map(value => toNumber(value)).filter((num): num is number => num !== null);
  if (numbers.length === 0) return null;

  let min = numbers[0];
  let max = numbers[0];
  let sum = 0;
  for (const num of numbers) {
    if (num < min) min = num;
    if (num > max) max = num;
    sum += num;
  }
  return {
    type: 'numeric',
    count: numbers.length,
    nullCount: values.length - numbers.length,
    min,
    max,
    mean: sum / numbers.length,
    sum,
  };
}

/**
 * Calculate statistics for a date column
 */
function dateSummary(values: Array<CellValue | undefined>): ColumnSummary | null {
  const dates = values
    .map(value => parseFlexibleDate(value))
    .filter((date): date is Date => date !== null)
    .sort((a, b) => a.getTime() - b.getTime());
  if (dates.length === 0) return null;

  const min = dates[0];
  const max = dates[dates.length - 1];
  return {
    type: 'date',
    count: dates.length,
    nullCount: values.length - dates.length,
    minDate: min.toISOString(),
    maxDate: max.toISOString(),
    spanDays: daysBetween(min, max),
  };
}

/**
 * Calculate statistics for a categorical column
 */
function categoricalSummary(values: Array<CellValue | undefined>): ColumnSummary | null {
  const valueCounts = new Map<string, number>();
  let nullCount = 0;
  for (const value of values) {
    const key = cellKey(value);
    if (key === null) {
      nullCount++;
      continue;
    }
    valueCounts.set(key, (valueCounts.get(key) ?? 0) + 1);
  }
  if (valueCounts.size === 0) return null;

  const topValues = Array.from(valueCounts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, TOP_VALUE_COUNT)
    .map(([value, count]) => ({ value, count }));

  return {
    type: 'categorical',
    count: values.length - nullCount,
    nullCount,
    uniqueValues: valueCounts.size,
    topValues,
  };
}

/**
 * Per-column summary statistics of a result table. Text and empty columns
 * carry no summary.
 */
export function createSummaryStats(table: DataTable, schema: SchemaAnalysis): Record<string, ColumnSummary> {
  const stats: Record<string, ColumnSummary> = {};
  if (table.rows.length === 0) return stats;

  for (const column of table.columns) {
    const values = table.rows.map(row => row[column]);
    const category = resultColumnCategory(table, column, schema);

    let summary: ColumnSummary | null = null;
    if (category === 'numeric') {
      summary = numericSummary(values);
    } else if (category === 'date') {
      summary = dateSummary(values);
    } else if (category === 'categorical') {
      summary = categoricalSummary(values);
    }

    if (summary) {
      stats[column] = summary;
    }
  }
  return stats;
}

/**
 * Short textual findings about a result table
 */
export function generateResultInsights(
  table: DataTable,
  plan: QueryPlan,
  stats: Record<string, ColumnSummary>,
): string[] {
  const insights: string[] = [];

  if (plan.action === 'count') {
    const countValue = table.rows.length === 1 && table.columns.includes('count') ? toNumber(table.rows[0].count) : null;
    insights.push(`Found ${countValue ?? table.rows.length} records matching the criteria`);
  }

  for (const [column, func] of Object.entries(plan.aggregation)) {
    if (column === '*' || (func !== 'sum' && func !== 'mean') || !table.columns.includes(column)) continue;
    const values = table.rows.map(row => toNumber(row[column])).filter((num): num is number => num !== null);
    if (values.length === 0) continue;
    const value = values.length === 1 ? values[0] : values.reduce((acc, num) => acc + num, 0);
    insights.push(`Total ${func} of ${column}: ${formatNumber(value)}`);
  }

  for (const [column, summary] of Object.entries(stats)) {
    if (summary.type === 'numeric' && summary.max > summary.mean * HIGH_VARIANCE_FACTOR) {
      insights.push(`High variance detected in ${column} - some values are significantly above average`);
    }
  }

  return insights;
}

/**
 * Format summary statistics as a compact string for AI prompts
 */
export function formatSummaryStats(rowCount: number, stats: Record<string, ColumnSummary>): string {
  const columns = Object.entries(stats);
  const parts: string[] = [`Result: ${rowCount} rows, ${columns.length} summarized columns`];

  for (const [column, summary] of columns) {
    if (summary.type === 'numeric') {
      parts.push(
        `${column} (numeric): count=${summary.count}, nulls=${summary.nullCount}, ` +
        `min=${summary.min.toFixed(2)}, max=${summary.max.toFixed(2)}, mean=${summary.mean.toFixed(2)}, sum=${summary.sum.toFixed(2)}`
      );
    } else if (summary.type === 'categorical') {
      const top = summary.topValues.map(tv => `${tv.value}(${tv.count})`).join(', ');
      parts.push(`${column} (categorical): count=${summary.count}, unique=${summary.uniqueValues}, top=[${top}]`);
    } else {
      parts.push(`${column} (date): range=[${summary.minDate} to ${summary.maxDate}], span=${summary.spanDays} days`);
    }
  }

  return parts.join('\n');
}
