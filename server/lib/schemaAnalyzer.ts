/**
 * Schema Analyzer
 * Profiles each column of an uploaded ledger table and detects its table type.
 */
import { stat } from 'fs/promises';
import type {
  ColumnCategory,
  ColumnProfile,
  ColumnStatistics,
  SchemaAnalysis,
  SemanticPattern,
} from '../shared/schema.js';
import type { CellValue, DataTable } from '../shared/queryTypes.js';
import { AnalysisCache } from './cache.js';
import { daysBetween, parseFlexibleDate } from './dateUtils.js';
import { readTableFile } from './fileParser.js';
import {
  detectTableTypeFast,
  getSuggestedQueries,
  identifyReportType,
  scoreTableType,
  UNKNOWN_TABLE_TYPE,
} from './reportIdentifier.js';
import { createSchemaSummary, describeColumns } from './schemaMapper.js';
import { cellKey, isMissing, roundTo, toNumber } from './valueUtils.js';

export const DEFAULT_SAMPLE_SIZE = 5000;

// Share of non-missing values that must coerce for a numeric/date category
const COERCION_THRESHOLD = 0.8;
// Distinct/non-missing ratio below which a column counts as categorical
const CATEGORICAL_RATIO = 0.1;

const SEMANTIC_PATTERNS: Record<string, SemanticPattern> = {
  BUKRS: 'company_code',
  BELNR: 'document_number',
  GJAHR: 'fiscal_year',
  BLART: 'document_type',
  BUDAT: 'posting_date',
  WAERS: 'currency',
  LIFNR: 'vendor_number',
  KUNNR: 'customer_number',
  KONTO: 'gl_account',
  SHKZG: 'debit_credit_indicator',
  DMBTR: 'local_amount',
  WRBTR: 'document_amount',
};

export interface AnalyzeOptions {
  sampleSize?: number;
  fileSizeBytes?: number;
}

export function patternForColumnCode(code: string): SemanticPattern | null {
  return SEMANTIC_PATTERNS[code.trim().toUpperCase()] ?? null;
}

export function detectSemanticPatterns(columnName: string): SemanticPattern[] {
  const pattern = patternForColumnCode(columnName);
  return pattern ? [pattern] : [];
}

/**
 * Trial coercion in fixed priority: numeric, date, categorical, text
 */
export function inferCategory(values: Array<CellValue | undefined>): ColumnCategory {
  const present = values.filter(value => !isMissing(value));
  if (present.length === 0) {
    return 'empty';
  }

  const numericCount = present.filter(value => toNumber(value) !== null).length;
  if (numericCount / present.length >= COERCION_THRESHOLD) {
    return 'numeric';
  }

  const dateCount = present.filter(value => parseFlexibleDate(value) !== null).length;
  if (dateCount / present.length >= COERCION_THRESHOLD) {
    return 'date';
  }

  const distinct = new Set(present.map(value => cellKey(value)));
  if (distinct.size / present.length < CATEGORICAL_RATIO) {
    return 'categorical';
  }

  return 'text';
}

function numericStatistics(values: Array<CellValue | undefined>): ColumnStatistics | null {
  const numbers: number[] = [];
  for (const value of values) {
    const num = toNumber(value);
    if (num !== null) numbers.push(num);
  }
  if (numbers.length === 0) return null;

  let min = numbers[0];
  let max = numbers[0];
  let sum = 0;
  for (const num of numbers) {
    if (num < min) min = num;
    if (num > max) max = num;
    sum += num;
  }
  return { kind: 'numeric', min, max, mean: sum / numbers.length, sum };
}

function dateStatistics(values: Array<CellValue | undefined>): ColumnStatistics | null {
  let min: Date | null = null;
  let max: Date | null = null;
  for (const value of values) {
    const date = parseFlexibleDate(value);
    if (!date) continue;
    if (!min || date.getTime() < min.getTime()) min = date;
    if (!max || date.getTime() > max.getTime()) max = date;
  }
  if (!min || !max) return null;
  return {
    kind: 'date',
    minDate: min.toISOString(),
    maxDate: max.toISOString(),
    spanDays: daysBetween(min, max),
  };
}

export function profileColumn(name: string, values: Array<CellValue | undefined>): ColumnProfile {
  const total = values.length;
  const present = values.filter(value => !isMissing(value));
  const nullCount = total - present.length;
  const uniqueCount = new Set(present.map(value => cellKey(value))).size;
  const category = inferCategory(values);

  let statistics: ColumnStatistics | null = null;
  if (category === 'numeric') {
    statistics = numericStatistics(present);
  } else if (category === 'date') {
    statistics = dateStatistics(present);
  }

  return {
    name,
    category,
    nullCount,
    nullRatio: total > 0 ? nullCount / total : 0,
    uniqueCount,
    uniqueRatio: total > 0 ? uniqueCount / total : 0,
    statistics,
    semanticPatterns: detectSemanticPatterns(name),
  };
}

/**
 * Confidence reported for the inline-detected type: the identifier's score
 * when it agrees, otherwise the detected type's required-column coverage
 */
function resolveConfidence(tableType: string, columns: string[], identifiedType: string, identifiedConfidence: number): number {
  if (tableType === UNKNOWN_TABLE_TYPE) return 0;
  if (identifiedType === tableType) return identifiedConfidence;
  return scoreTableType(tableType, columns);
}

/**
 * Analyze an in-memory table. Ratios and statistics are computed over the
 * first `sampleSize` rows; the row count covers the whole table.
 */
export function analyzeTable(table: DataTable, options: AnalyzeOptions = {}): SchemaAnalysis {
  const sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
  const sample = table.rows.slice(0, sampleSize);
  const columns = table.columns;

  if (table.rows.length > sample.length) {
    console.log(`📊 Analyzing sample of ${sample.length} rows from ${table.rows.length} total rows`);
  }

  const profiles = columns.map(column => profileColumn(column, sample.map(row => row[column])));

  const tableType = detectTableTypeFast(columns);
  const identification = identifyReportType(columns);
  const confidence = resolveConfidence(tableType, columns, identification.tableType, identification.confidence);

  const totalCells = sample.length * columns.length;
  const nullCells = profiles.reduce((acc, profile) => acc + profile.nullCount, 0);

  return {
    tableType,
    confidence,
    columns: profiles,
    fileInfo: {
      totalRows: table.rows.length,
      totalColumns: columns.length,
      fileSizeMb: roundTo((options.fileSizeBytes ?? 0) / 1024 / 1024, 2),
      analyzedRows: sample.length,
    },
    schemaSummary: `This appears to be a ${tableType} table with ${columns.length} columns.`,
    schemaDescription: createSchemaSummary(tableType, columns),
    querySuggestions: getSuggestedQueries(tableType),
    dataQuality: {
      nullPercentage: totalCells > 0 ? roundTo((nullCells / totalCells) * 100, 2) : 0,
    },
    reportIdentification: identification,
    schemaMapping: describeColumns(tableType, columns),
  };
}

/**
 * File-backed analyzer with a (path, modification time) cache.
 * Read and parse errors propagate to the caller.
 */
export class SchemaAnalyzer {
  private readonly cache: AnalysisCache;
  private readonly sampleSize: number;

  constructor(options: { sampleSize?: number; cache?: AnalysisCache } = {}) {
    this.sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
    this.cache = options.cache ?? new AnalysisCache();
  }

  /**
   * `table` may be supplied when the caller has already parsed the file
   */
  async analyzeFile(filePath: string, table?: DataTable): Promise<SchemaAnalysis> {
    const fileStat = await stat(filePath);
    const cached = this.cache.get(filePath, fileStat.mtimeMs);
    if (cached) {
      return cached;
    }

    const data = table ?? await readTableFile(filePath);
    const analysis = analyzeTable(data, { sampleSize: this.sampleSize, fileSizeBytes: fileStat.size });
    this.cache.set(filePath, fileStat.mtimeMs, analysis);
    console.log(`✅ Schema analysis completed for ${filePath}: ${analysis.tableType} (${analysis.confidence.toFixed(2)})`);
    return analysis;
  }

  /** Drops the cached analysis of a file that is going away */
  forget(filePath: string): void {
    this.cache.invalidate(filePath);
  }
}
