/**
 * Grouping, aggregation, sorting and limit stages
 */
import type { ExecutionStep } from '../../shared/schema.js';
import type { AggregationFunction, AggregationMap, CellValue, DataRow, DataTable, SortSpec } from '../../shared/queryTypes.js';
import { cellKey, compareCells, isMissing, toNumber } from '../valueUtils.js';

export const COUNT_COLUMN = 'count';

interface Group {
  values: Array<CellValue | undefined>;
  rows: DataRow[];
}

export function isValueCountPlan(grouping: string[], aggregation: AggregationMap): boolean {
  const keys = Object.keys(aggregation);
  return grouping.length === 1 && keys.length === 1 && keys[0] === '*' && aggregation['*'] === 'count';
}

/**
 * Frequency of each value of `column`, most frequent first. Missing values
 * form their own group; ties keep first-appearance order.
 */
export function valueCounts(table: DataTable, column: string, limit: number | null): DataTable {
  const counts = new Map<string | null, { value: CellValue | null; count: number }>();
  for (const row of table.rows) {
    const key = cellKey(row[column]);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { value: key === null ? null : row[column] ?? null, count: 1 });
    }
  }

  const sorted = [...counts.values()].sort((a, b) => b.count - a.count);
  const top = limit !== null ? sorted.slice(0, limit) : sorted;
  return {
    columns: [column, COUNT_COLUMN],
    rows: top.map(entry => ({ [column]: entry.value, [COUNT_COLUMN]: entry.count })),
  };
}

export function aggregateValues(values: Array<CellValue | undefined>, func: AggregationFunction): number | null {
  const numbers: number[] = [];
  for (const value of values) {
    const num = toNumber(value);
    if (num !== null) numbers.push(num);
  }

  switch (func) {
    case 'count':
      return numbers.length;
    case 'sum':
      return numbers.reduce((acc, num) => acc + num, 0);
    case 'mean':
      return numbers.length > 0 ? numbers.reduce((acc, num) => acc + num, 0) / numbers.length : null;
    case 'min':
      return numbers.length > 0 ? numbers.reduce((acc, num) => (num < acc ? num : acc)) : null;
    case 'max':
      return numbers.length > 0 ? numbers.reduce((acc, num) => (num > acc ? num : acc)) : null;
  }
}

function outputColumn(column: string): string {
  return column === '*' ? COUNT_COLUMN : column;
}

function summarize(rows: DataRow[], aggregation: AggregationMap): DataRow {
  const result: DataRow = {};
  for (const [column, func] of Object.entries(aggregation)) {
    // '*' is always a row count whatever function it names
    result[outputColumn(column)] = column === '*' ? rows.length : aggregateValues(rows.map(row => row[column]), func);
  }
  return result;
}

function compareGroupValues(a: Array<CellValue | undefined>, b: Array<CellValue | undefined>): number {
  for (let i = 0; i < a.length; i++) {
    const leftMissing = isMissing(a[i]);
    const rightMissing = isMissing(b[i]);
    if (leftMissing !== rightMissing) return leftMissing ? 1 : -1;
    if (leftMissing) continue;
    const order = compareCells(a[i], b[i]);
    if (order !== 0) return order;
  }
  return 0;
}

function groupRows(rows: DataRow[], grouping: string[]): Group[] {
  const groups = new Map<string, Group>();
  for (const row of rows) {
    const values = grouping.map(column => (isMissing(row[column]) ? null : row[column]));
    const key = JSON.stringify(values.map(value => cellKey(value)));
    const group = groups.get(key);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(key, { values, rows: [row] });
    }
  }
  return [...groups.values()].sort((a, b) => compareGroupValues(a.values, b.values));
}

/**
 * General grouping path: groups sorted by key, missing keys last
 */
export function groupAndAggregate(table: DataTable, grouping: string[], aggregation: AggregationMap): DataTable {
  const hasAggregation = Object.keys(aggregation).length > 0;

  if (grouping.length === 0) {
    const row = summarize(table.rows, aggregation);
    return { columns: Object.keys(aggregation).map(outputColumn), rows: [row] };
  }

  const effective: AggregationMap = hasAggregation ? aggregation : { '*': 'count' };
  const aggregateColumns = Object.keys(effective).map(outputColumn);
  const columns = [...grouping, ...aggregateColumns.filter(column => !grouping.includes(column))];

  const rows = groupRows(table.rows, grouping).map(group => {
    const row: DataRow = summarize(group.rows, effective);
    grouping.forEach((column, index) => {
      row[column] = group.values[index] ?? null;
    });
    return row;
  });

  return { columns, rows };
}

export function applyGrouping(
  table: DataTable,
  grouping: string[],
  aggregation: AggregationMap,
  limit: number | null,
): { table: DataTable; step: ExecutionStep } {
  const before = table.rows.length;
  const referenced = [...grouping, ...Object.keys(aggregation).filter(column => column !== '*')];
  const missing = referenced.filter(column => !table.columns.includes(column));

  if (missing.length > 0) {
    return {
      table,
      step: {
        step: 'grouping_aggregation',
        status: 'error',
        message: `Column(s) not found: ${missing.join(', ')}`,
        rowsBefore: before,
        rowsAfter: before,
      },
    };
  }

  if (isValueCountPlan(grouping, aggregation)) {
    const counted = valueCounts(table, grouping[0], limit);
    return {
      table: counted,
      step: {
        step: 'grouping_aggregation',
        status: 'success',
        message: `Counted values of ${grouping[0]}`,
        rowsBefore: before,
        rowsAfter: counted.rows.length,
      },
    };
  }

  const result = groupAndAggregate(table, grouping, aggregation);
  const functions = Object.values(aggregation);
  let message: string;
  if (grouping.length === 0) {
    message = `Calculated ${functions.join(', ')}`;
  } else if (functions.length === 0) {
    message = `Grouped by ${grouping.join(', ')}`;
  } else {
    message = `Grouped by ${grouping.join(', ')} and calculated ${functions.join(', ')}`;
  }

  return {
    table: result,
    step: { step: 'grouping_aggregation', status: 'success', message, rowsBefore: before, rowsAfter: result.rows.length },
  };
}

/**
 * Multi-column sort with per-column direction. Unknown columns are dropped
 * and missing values always sort last.
 */
export function applySorting(table: DataTable, sorting: SortSpec[]): { table: DataTable; step: ExecutionStep | null } {
  const usable = sorting.filter(sort => table.columns.includes(sort.column));
  if (usable.length === 0) {
    return { table, step: null };
  }

  const rows = [...table.rows].sort((a, b) => {
    for (const { column, ascending } of usable) {
      const leftMissing = isMissing(a[column]);
      const rightMissing = isMissing(b[column]);
      if (leftMissing !== rightMissing) return leftMissing ? 1 : -1;
      if (leftMissing) continue;
      const order = compareCells(a[column], b[column]);
      if (order !== 0) return ascending ? order : -order;
    }
    return 0;
  });

  return {
    table: { columns: table.columns, rows },
    step: {
      step: 'sorting',
      status: 'success',
      message: `Sorted by ${usable.map(sort => sort.column).join(', ')}`,
      rowsBefore: table.rows.length,
      rowsAfter: rows.length,
    },
  };
}

export function applyLimit(table: DataTable, limit: number): { table: DataTable; step: ExecutionStep } {
  const rows = table.rows.slice(0, limit);
  return {
    table: { columns: table.columns, rows },
    step: { step: 'limit', status: 'success', message: `Limited to ${limit} results`, rowsBefore: table.rows.length, rowsAfter: rows.length },
  };
}
