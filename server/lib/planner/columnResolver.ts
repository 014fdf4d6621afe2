/**
 * Column Resolution
 * Maps a free-text term from a question to a concrete column of the schema.
 *
 * Precedence (first hit wins):
 *   1. synonym table → the column carrying the canonical code, or the column
 *      tagged with that code's semantic pattern
 *   2. normalized name match: exact, then term inside column name, then
 *      column name inside term (both sides at least 3 characters)
 *   3. semantic pattern name match ("document number" → document_number)
 */
import type { SchemaAnalysis } from '../../shared/schema.js';
import { patternForColumnCode } from '../schemaAnalyzer.js';
import { findColumnByPattern, getColumnNames } from '../schemaLookup.js';

// Normalized term → canonical column codes, tried in order
export const COLUMN_SYNONYMS: Record<string, string[]> = {
  transactioncode: ['TCODE'],
  tcode: ['TCODE'],
  doctype: ['BLART'],
  documenttype: ['BLART'],
  user: ['USNAM'],
  username: ['USNAM'],
  companycode: ['BUKRS'],
  company: ['BUKRS'],
  postingdate: ['BUDAT'],
  amount: ['DMBTR', 'WRBTR'],
  vendor: ['LIFNR'],
  supplier: ['LIFNR'],
  customer: ['KUNNR'],
  client: ['KUNNR'],
  costcenter: ['KOSTL'],
  account: ['KONTO', 'SAKNR'],
  glaccount: ['KONTO', 'SAKNR'],
  currency: ['WAERS'],
  fiscalyear: ['GJAHR'],
};

const MIN_PARTIAL_LENGTH = 3;

export function normalizeTerm(term: string): string {
  return term.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function lookupSynonym(normalized: string): string[] | null {
  if (COLUMN_SYNONYMS[normalized]) {
    return COLUMN_SYNONYMS[normalized];
  }
  // Plural forms: "documenttypes", "vendors"
  if (normalized.endsWith('s')) {
    const singular = normalized.slice(0, -1);
    if (COLUMN_SYNONYMS[singular]) {
      return COLUMN_SYNONYMS[singular];
    }
  }
  return null;
}

function columnForCode(schema: SchemaAnalysis, code: string): string | null {
  const direct = getColumnNames(schema).find(name => name.trim().toUpperCase() === code);
  if (direct) return direct;
  const pattern = patternForColumnCode(code);
  return pattern ? findColumnByPattern(schema, pattern) : null;
}

function matchByName(schema: SchemaAnalysis, normalized: string): string | null {
  const columns = getColumnNames(schema).map(name => ({ name, norm: normalizeTerm(name) }));

  const exact = columns.find(col => col.norm === normalized);
  if (exact) return exact.name;

  if (normalized.length >= MIN_PARTIAL_LENGTH) {
    const containing = columns.find(col => col.norm.includes(normalized));
    if (containing) return containing.name;
  }

  const contained = columns.find(col => col.norm.length >= MIN_PARTIAL_LENGTH && normalized.includes(col.norm));
  return contained ? contained.name : null;
}

function matchByPattern(schema: SchemaAnalysis, normalized: string): string | null {
  for (const column of schema.columns) {
    if (column.semanticPatterns.some(pattern => normalizeTerm(pattern) === normalized)) {
      return column.name;
    }
  }
  return null;
}

/**
 * Resolve a term to a column name, or null when nothing matches
 */
export function resolveColumn(schema: SchemaAnalysis, term: string): string | null {
  const normalized = normalizeTerm(term);
  if (!normalized) return null;

  const codes = lookupSynonym(normalized);
  if (codes) {
    for (const code of codes) {
      const column = columnForCode(schema, code);
      if (column) return column;
    }
  }

  return matchByName(schema, normalized) ?? matchByPattern(schema, normalized);
}

/**
 * Resolve the longest leading run of `words` that names a column
 */
export function resolveLeadingTerm(schema: SchemaAnalysis, words: string[]): string | null {
  for (let length = words.length; length > 0; length--) {
    const column = resolveColumn(schema, words.slice(0, length).join(' '));
    if (column) return column;
  }
  return null;
}
