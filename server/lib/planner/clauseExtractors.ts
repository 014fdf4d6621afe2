/**
 * Grouping, aggregation, sorting, limit and time-window extraction
 */
import type { SchemaAnalysis } from '../../shared/schema.js';
import type { AggregationMap, SortSpec, TimeWindow } from '../../shared/queryTypes.js';
import { currentQuarter, previousQuarter } from '../dateUtils.js';
import { findAmountColumn, findColumnByPattern } from '../schemaLookup.js';
import { resolveColumn, resolveLeadingTerm } from './columnResolver.js';
import { hasAnyKeyword } from '../textMatch.js';

export interface GroupingResult {
  grouping: string[];
  unresolved: string[];
}

const TERM = '([a-z0-9_]+(?:\\s+[a-z0-9_]+){0,2})';
const EXPLICIT_GROUPING = new RegExp(`\\b(?:group\\s+by|per|for\\s+each)\\s+${TERM}`, 'gi');
const PLAIN_GROUPING = new RegExp(`\\bby\\s+${TERM}`, 'gi');
const NOT_GROUPING_BEFORE_BY = new Set(['group', 'sort', 'sorted', 'order', 'ordered', 'rank', 'ranked']);

function previousWord(text: string, index: number): string {
  const words = text.slice(0, index).trim().split(/\s+/);
  return (words[words.length - 1] ?? '').toLowerCase();
}

export function extractGrouping(text: string, schema: SchemaAnalysis): GroupingResult {
  const grouping: string[] = [];
  const unresolved: string[] = [];

  for (const match of text.matchAll(EXPLICIT_GROUPING)) {
    const words = match[1].split(/\s+/);
    const column = resolveLeadingTerm(schema, words);
    if (column) {
      grouping.push(column);
    } else {
      unresolved.push(words[0]);
    }
  }

  // "by X" is only a grouping hint: unresolved terms are dropped
  for (const match of text.matchAll(PLAIN_GROUPING)) {
    if (NOT_GROUPING_BEFORE_BY.has(previousWord(text, match.index ?? 0))) continue;
    const column = resolveLeadingTerm(schema, match[1].split(/\s+/));
    if (column) grouping.push(column);
  }

  if (hasAnyKeyword(text, ['vendor', 'supplier'])) {
    const column = findColumnByPattern(schema, 'vendor_number');
    if (column) grouping.push(column);
  }
  if (hasAnyKeyword(text, ['customer', 'client'])) {
    const column = findColumnByPattern(schema, 'customer_number');
    if (column) grouping.push(column);
  }
  if (hasAnyKeyword(text, ['account'])) {
    const column = findColumnByPattern(schema, 'gl_account');
    if (column) grouping.push(column);
  }
  if (hasAnyKeyword(text, ['cost center'])) {
    const column = resolveColumn(schema, 'cost center');
    if (column) grouping.push(column);
  }

  return {
    grouping: [...new Set(grouping)],
    unresolved: [...new Set(unresolved)],
  };
}

export function extractAggregation(text: string, schema: SchemaAnalysis): AggregationMap {
  const aggregation: AggregationMap = {};
  const amountColumn = findAmountColumn(schema);

  if (amountColumn && hasAnyKeyword(text, ['sum', 'total', 'summarize'])) {
    aggregation[amountColumn] = 'sum';
  }
  if (hasAnyKeyword(text, ['count', 'how many'])) {
    aggregation['*'] = 'count';
  }
  if (amountColumn && hasAnyKeyword(text, ['average', 'mean', 'avg'])) {
    aggregation[amountColumn] = 'mean';
  }

  return aggregation;
}

export function extractSorting(text: string, schema: SchemaAnalysis): SortSpec[] {
  const amountColumn = findAmountColumn(schema);
  if (!amountColumn) return [];

  if (hasAnyKeyword(text, ['top', 'highest', 'largest', 'biggest'])) {
    return [{ column: amountColumn, ascending: false }];
  }
  if (hasAnyKeyword(text, ['lowest', 'bottom', 'smallest'])) {
    return [{ column: amountColumn, ascending: true }];
  }
  return [];
}

const LIMIT_PATTERNS: RegExp[] = [
  /\bfirst\s+(\d+)\b/i,
  /\blast\s+(\d+)\b(?!\s*(?:day|week|month|quarter|year)s?\b)/i,
  /\blimit\s+(?:to\s+)?(\d+)\b/i,
  /\bonly\s+(\d+)\b/i,
  /\btop\s+(\d+)\b/i,
];

export function extractLimit(text: string): number | null {
  for (const pattern of LIMIT_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const limit = Number(match[1]);
      if (limit > 0) return limit;
    }
  }
  return null;
}

const ORDINAL_QUARTERS: Record<string, number> = {
  first: 1,
  '1st': 1,
  second: 2,
  '2nd': 2,
  third: 3,
  '3rd': 3,
  fourth: 4,
  '4th': 4,
};

/**
 * Spoken quarter references, resolved against `now` for relative phrasing
 */
export function extractTimeWindow(text: string, now: Date): TimeWindow | null {
  const ordinal = /\b(first|second|third|fourth|1st|2nd|3rd|4th)\s+quarter\b(?:\s+(?:of\s+)?(\d{4})\b)?/i.exec(text);
  if (ordinal) {
    const quarter = ORDINAL_QUARTERS[ordinal[1].toLowerCase()];
    const yearMatch = ordinal[2] ?? /\b((?:19|20)\d{2})\b/.exec(text)?.[1];
    return { quarter, year: yearMatch ? Number(yearMatch) : null };
  }

  if (/\b(?:last|previous|prior)\s+quarter\b/i.test(text)) {
    return previousQuarter(now);
  }
  if (/\b(?:this|current)\s+quarter\b/i.test(text)) {
    return currentQuarter(now);
  }
  return null;
}
