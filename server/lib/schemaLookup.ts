/**
 * Read-only helpers over a Schema Analysis shared by the planner and executor
 */
import type { ColumnCategory, ColumnProfile, SchemaAnalysis, SemanticPattern } from '../shared/schema.js';

export function getColumnNames(schema: SchemaAnalysis): string[] {
  return schema.columns.map(col => col.name);
}

export function getColumnProfile(schema: SchemaAnalysis, name: string): ColumnProfile | undefined {
  return schema.columns.find(col => col.name === name);
}

/**
 * First column (in file order) tagged with any of the given patterns,
 * trying the patterns in the order given
 */
export function findColumnByPattern(schema: SchemaAnalysis, ...patterns: SemanticPattern[]): string | null {
  for (const pattern of patterns) {
    const match = schema.columns.find(col => col.semanticPatterns.includes(pattern));
    if (match) return match.name;
  }
  return null;
}

export function getColumnsByCategory(schema: SchemaAnalysis, category: ColumnCategory): string[] {
  return schema.columns.filter(col => col.category === category).map(col => col.name);
}

export function findAmountColumn(schema: SchemaAnalysis): string | null {
  return findColumnByPattern(schema, 'local_amount', 'document_amount');
}

/**
 * Posting-date column when tagged, otherwise the first date-category column
 */
export function findDateColumn(schema: SchemaAnalysis): string | null {
  return findColumnByPattern(schema, 'posting_date') ?? getColumnsByCategory(schema, 'date')[0] ?? null;
}
