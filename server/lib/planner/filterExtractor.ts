/**
 * Filter Extraction
 * Runs on every question regardless of the detected action. Filters whose
 * column cannot be found keep `column: null` so validation can ask about them.
 */
import type { SchemaAnalysis } from '../../shared/schema.js';
import type { QueryFilter, TimeUnit } from '../../shared/queryTypes.js';
import { findAmountColumn, findColumnByPattern, findDateColumn } from '../schemaLookup.js';
import { formatNumber } from '../valueUtils.js';
import { resolveColumn } from './columnResolver.js';
import { hasAnyKeyword, hasKeyword } from '../textMatch.js';

const UNIT_PATTERN = '(?:day|week|month|quarter|year)s?';
const AMOUNT_PATTERN = `\\$?(\\d{1,3}(?:,\\d{3})+|\\d+)(\\.\\d+)?(?![,.]?\\d)(?!\\s*${UNIT_PATTERN}\\b)`;

const AMOUNT_RULES: Array<{ operator: '>' | '<'; words: string; label: string }> = [
  { operator: '>', words: 'over|above|greater than|more than|exceeding', label: 'over' },
  { operator: '<', words: 'under|below|less than', label: 'under' },
];

// Document-type keywords → accounting document type codes
export const DOCUMENT_TYPE_KEYWORDS: Record<string, string[]> = {
  invoice: ['KR', 'DR', 'RE'],
  payment: ['KZ', 'DZ', 'ZP'],
  credit: ['KG', 'DG'],
  debit: ['DA'],
  journal: ['SA', 'AB'],
};

// Words that follow "document type" without being a code
const DOCUMENT_TYPE_STOPWORDS = new Set(['is', 'of', 'in', 'for', 'and', 'or', 'the', 'with', 'code', 'by', 'are', 'was']);

const TIME_UNITS: TimeUnit[] = ['day', 'week', 'month', 'quarter', 'year'];

function toTimeUnit(value: string): TimeUnit | null {
  const singular = value.replace(/s$/, '');
  return TIME_UNITS.find(unit => unit === singular) ?? null;
}

function extractAmountFilters(text: string, schema: SchemaAnalysis): QueryFilter[] {
  const filters: QueryFilter[] = [];
  const column = findAmountColumn(schema);

  for (const rule of AMOUNT_RULES) {
    const pattern = new RegExp(`\\b(?:${rule.words.replace(/ /g, '\\s+')})\\s+${AMOUNT_PATTERN}`, 'gi');
    for (const match of text.matchAll(pattern)) {
      const amount = Number(`${match[1].replace(/,/g, '')}${match[2] ?? ''}`);
      filters.push({
        column,
        operator: rule.operator,
        value: amount,
        description: `Amount ${rule.label} $${formatNumber(amount)}`,
      });
    }
  }
  return filters;
}

function extractDateFilters(text: string, schema: SchemaAnalysis): QueryFilter[] {
  const filters: QueryFilter[] = [];
  const column = findDateColumn(schema);

  for (const match of text.matchAll(/\b(?:last|past)\s+(\d+)\s+(day|week|month|quarter|year)s?\b/gi)) {
    const unit = toTimeUnit(match[2].toLowerCase());
    if (!unit) continue;
    const number = Number(match[1]);
    filters.push({
      column,
      operator: 'relative_date',
      value: { number, unit },
      description: `Last ${number} ${unit}s`,
    });
  }

  for (const match of text.matchAll(/\b(\d{4})\s*-\s*(\d{4})\b/g)) {
    const first = Number(match[1]);
    const second = Number(match[2]);
    const start = Math.min(first, second);
    const end = Math.max(first, second);
    filters.push({
      column,
      operator: 'year_range',
      value: { start, end },
      description: `Years ${start}-${end}`,
    });
  }

  for (const match of text.matchAll(/\bq([1-4])(?:\s+(\d{4}))?\b/gi)) {
    const quarter = Number(match[1]);
    const year = match[2] ? Number(match[2]) : null;
    filters.push({
      column,
      operator: 'quarter',
      value: { quarter, year },
      description: year === null ? `Q${quarter}` : `Q${quarter} ${year}`,
    });
  }

  return filters;
}

function extractDocumentTypeFilters(text: string, schema: SchemaAnalysis): QueryFilter[] {
  const filters: QueryFilter[] = [];
  const column = findColumnByPattern(schema, 'document_type') ?? resolveColumn(schema, 'document type');

  // Keyword families only narrow tables that actually carry a document type
  if (column) {
    for (const [keyword, codes] of Object.entries(DOCUMENT_TYPE_KEYWORDS)) {
      if (hasKeyword(text, keyword)) {
        filters.push({
          column,
          operator: 'in',
          value: codes,
          description: `Document type: ${keyword} (${codes.join(', ')})`,
        });
      }
    }
  }

  const explicit = /\b(?:document\s+type|doc\s+type|blart)(?:\s*[=:]\s*|\s+)([a-z0-9]{1,4})\b/gi;
  for (const match of text.matchAll(explicit)) {
    const code = match[1];
    if (DOCUMENT_TYPE_STOPWORDS.has(code.toLowerCase())) continue;
    const value = code.toUpperCase();
    filters.push({
      column,
      operator: '==',
      value,
      description: `Document type: ${value}`,
    });
  }

  return filters;
}

export function extractFilters(text: string, schema: SchemaAnalysis): QueryFilter[] {
  const filters = [
    ...extractAmountFilters(text, schema),
    ...extractDateFilters(text, schema),
    ...extractDocumentTypeFilters(text, schema),
  ];

  if (hasAnyKeyword(text, ['overdue', 'past due'])) {
    filters.push({
      column: findDateColumn(schema),
      operator: 'overdue',
      value: null,
      description: 'Overdue items',
    });
  }

  return filters;
}

const DATE_OPERATORS = new Set<QueryFilter['operator']>(['relative_date', 'year_range', 'quarter', 'overdue']);

export function isDateFilter(filter: QueryFilter): boolean {
  return DATE_OPERATORS.has(filter.operator);
}
