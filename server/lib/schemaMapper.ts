/**
 * Schema Mapper
 * Static lookup from ledger column codes to plain-language descriptions,
 * grouped by table type.
 */
import { z } from 'zod';
import { loadDataFile } from './dataFiles.js';

const columnListSchema = z.array(z.string());

const schemaMappingsSchema = z.object({
  descriptions: z.record(z.string(), z.record(z.string(), z.string())),
  relationships: z.record(z.string(), z.record(z.string(), columnListSchema)),
  categories: z.record(z.string(), z.record(z.string(), columnListSchema)),
  importantColumns: z.record(z.string(), columnListSchema),
});

type SchemaMappings = z.infer<typeof schemaMappingsSchema>;

let mappings: SchemaMappings | null = null;

function getMappings(): SchemaMappings {
  if (!mappings) {
    mappings = loadDataFile('schemaMappings.json', schemaMappingsSchema);
  }
  return mappings;
}

export interface SchemaCompleteness {
  isValid: boolean;
  message: string;
  coverage: number;
  missingImportant: string[];
  coveredColumns: string[];
  extraColumns: string[];
}

/**
 * Column code → description for a table type; empty for unknown types
 */
export function getSchema(tableType: string): Record<string, string> {
  return getMappings().descriptions[tableType] ?? {};
}

export function getColumnDescription(tableType: string, columnCode: string): string {
  return getSchema(tableType)[columnCode.trim().toUpperCase()] ?? '';
}

export function getAvailableColumns(tableType: string): string[] {
  return Object.keys(getSchema(tableType));
}

/**
 * Human-readable summary of the uploaded columns, used in prompts and the schema endpoint
 */
export function createSchemaSummary(tableType: string, columns: string[]): string {
  const schema = getSchema(tableType);
  if (Object.keys(schema).length === 0) {
    return `Unknown report type: ${tableType}`;
  }

  const lines = [`The uploaded file contains ${columns.length} columns from a ${tableType} table.`, 'Columns:'];
  for (const column of columns) {
    const description = schema[column.trim().toUpperCase()] ?? `Unknown column: ${column}`;
    lines.push(`    ${column}: ${description}`);
  }
  return lines.join('\n');
}

/**
 * Map each column code to the table types that define it
 */
export function getCommonColumns(tableTypes: string[]): Record<string, string[]> {
  const common: Record<string, string[]> = {};
  for (const tableType of tableTypes) {
    for (const column of getAvailableColumns(tableType)) {
      if (!common[column]) {
        common[column] = [];
      }
      common[column].push(tableType);
    }
  }
  return common;
}

export function suggestRelatedColumns(tableType: string, columnCode: string): string[] {
  return getMappings().relationships[tableType]?.[columnCode.trim().toUpperCase()] ?? [];
}

export function getColumnCategories(tableType: string): Record<string, string[]> {
  return getMappings().categories[tableType] ?? {};
}

export function validateSchemaCompleteness(tableType: string, columns: string[]): SchemaCompleteness {
  const schema = getSchema(tableType);
  const available = Object.keys(schema);
  if (available.length === 0) {
    return {
      isValid: false,
      message: `Unknown report type: ${tableType}`,
      coverage: 0,
      missingImportant: [],
      coveredColumns: [],
      extraColumns: [],
    };
  }

  const actual = new Set(columns.map(col => col.trim().toUpperCase()));
  const coveredColumns = available.filter(col => actual.has(col));
  const coverage = coveredColumns.length / available.length;
  const important = getMappings().importantColumns[tableType] ?? [];
  const missingImportant = important.filter(col => !actual.has(col));
  const extraColumns = Array.from(actual).filter(col => !(col in schema));

  return {
    isValid: coverage >= 0.5 && missingImportant.length === 0,
    message: `Schema coverage: ${(coverage * 100).toFixed(1)}%`,
    coverage,
    missingImportant,
    coveredColumns,
    extraColumns,
  };
}

/**
 * Descriptions for the columns actually present, keyed by the file's column name
 */
export function describeColumns(tableType: string, columns: string[]): Record<string, string> {
  const schema = getSchema(tableType);
  const described: Record<string, string> = {};
  for (const column of columns) {
    const description = schema[column.trim().toUpperCase()];
    if (description) {
      described[column] = description;
    }
  }
  return described;
}
