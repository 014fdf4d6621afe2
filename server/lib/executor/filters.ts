/**
 * Row filters for the execution pipeline. Every filter yields a step record;
 * a filter that cannot be applied is logged as an error and skipped.
 */
import type { ExecutionStep } from '../../shared/schema.js';
import type { DataRow, DataTable, QueryFilter, TimeWindow } from '../../shared/queryTypes.js';
import { isInQuarter, parseFlexibleDate, subtractUnits } from '../dateUtils.js';
import { cellKey, isMissing, toNumber } from '../valueUtils.js';

type RowPredicate = (row: DataRow) => boolean;

function compare(cell: DataRow[string], value: number | string): number | null {
  if (isMissing(cell)) return null;
  if (typeof value === 'number') {
    const num = toNumber(cell);
    return num === null ? null : num - value;
  }
  const key = cellKey(cell) ?? '';
  if (key === value) return 0;
  return key < value ? -1 : 1;
}

function dateOf(row: DataRow, column: string): Date | null {
  return parseFlexibleDate(row[column]);
}

/**
 * Predicate for one filter, or an error message when it cannot be applied
 */
export function buildPredicate(filter: QueryFilter, column: string, now: Date): RowPredicate | string {
  switch (filter.operator) {
    case '>':
    case '<':
    case '>=':
    case '<=':
    case '==':
    case '!=': {
      const { operator, value } = filter;
      return row => {
        const result = compare(row[column], value);
        if (result === null) return false;
        switch (operator) {
          case '>': return result > 0;
          case '<': return result < 0;
          case '>=': return result >= 0;
          case '<=': return result <= 0;
          case '==': return result === 0;
          case '!=': return result !== 0;
        }
      };
    }
    case 'in': {
      const allowed = new Set(filter.value.map(item => String(item)));
      return row => {
        const key = cellKey(row[column]);
        return key !== null && allowed.has(key);
      };
    }
    case 'contains': {
      const needle = filter.value.toLowerCase();
      return row => (cellKey(row[column]) ?? '').toLowerCase().includes(needle);
    }
    case 'overdue':
      return row => {
        const date = dateOf(row, column);
        return date !== null && date.getTime() < now.getTime();
      };
    case 'relative_date': {
      const cutoff = subtractUnits(now, filter.value.number, filter.value.unit).getTime();
      return row => {
        const date = dateOf(row, column);
        return date !== null && date.getTime() >= cutoff;
      };
    }
    case 'year_range': {
      const { start, end } = filter.value;
      return row => {
        const date = dateOf(row, column);
        if (!date) return false;
        const year = date.getUTCFullYear();
        return year >= start && year <= end;
      };
    }
    case 'quarter': {
      const window = filter.value;
      return row => {
        const date = dateOf(row, column);
        return date !== null && isInQuarter(date, window);
      };
    }
    default: {
      const unknown: { operator?: unknown } = filter;
      return `Unknown operator: ${String(unknown.operator)}`;
    }
  }
}

export function applyFilters(table: DataTable, filters: QueryFilter[], now: Date): { table: DataTable; steps: ExecutionStep[] } {
  let rows = table.rows;
  const steps: ExecutionStep[] = [];

  filters.forEach((filter, index) => {
    const step = `filter_${index + 1}`;
    const before = rows.length;

    if (!filter.column || !table.columns.includes(filter.column)) {
      steps.push({ step, status: 'error', message: `Column '${filter.column ?? 'unknown'}' not found`, rowsBefore: before, rowsAfter: before });
      return;
    }

    const predicate = buildPredicate(filter, filter.column, now);
    if (typeof predicate === 'string') {
      steps.push({ step, status: 'error', message: predicate, rowsBefore: before, rowsAfter: before });
      return;
    }

    rows = rows.filter(predicate);
    steps.push({ step, status: 'success', message: `Applied ${filter.description}`, rowsBefore: before, rowsAfter: rows.length });
  });

  return { table: { columns: table.columns, rows }, steps };
}

export function applyTimeWindow(table: DataTable, window: TimeWindow, dateColumn: string | null): { table: DataTable; step: ExecutionStep } {
  const before = table.rows.length;
  const label = window.year === null ? `Q${window.quarter}` : `Q${window.quarter} ${window.year}`;

  if (!dateColumn || !table.columns.includes(dateColumn)) {
    return {
      table,
      step: { step: 'time_period_filter', status: 'error', message: `No date column available for ${label}`, rowsBefore: before, rowsAfter: before },
    };
  }

  const rows = table.rows.filter(row => {
    const date = dateOf(row, dateColumn);
    return date !== null && isInQuarter(date, window);
  });
  return {
    table: { columns: table.columns, rows },
    step: { step: 'time_period_filter', status: 'success', message: `Filtered to ${label}`, rowsBefore: before, rowsAfter: rows.length },
  };
}
