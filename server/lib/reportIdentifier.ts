/**
 * Report Identifier
 * Scores a set of column names against known ledger table signatures.
 */
import { z } from 'zod';
import type { ReportIdentification } from '../shared/schema.js';
import { loadDataFile } from './dataFiles.js';

const signatureSchema = z.object({
  tableType: z.string(),
  requiredColumns: z.array(z.string()),
  optionalColumns: z.array(z.string()),
  description: z.string(),
  confidenceThreshold: z.number().min(0).max(1),
});

const reportSignaturesSchema = z.object({
  signatures: z.array(signatureSchema),
  fastDetection: z.array(z.object({
    tableType: z.string(),
    requiredColumns: z.array(z.string()),
  })),
  suggestedQueries: z.record(z.string(), z.array(z.string())),
  defaultQueries: z.array(z.string()),
});

export type TableSignature = z.infer<typeof signatureSchema>;
type ReportSignatures = z.infer<typeof reportSignaturesSchema>;

export const UNKNOWN_TABLE_TYPE = 'UNKNOWN';
export const ERROR_TABLE_TYPE = 'ERROR';

const REQUIRED_WEIGHT = 0.7;
const OPTIONAL_WEIGHT = 0.3;
const OPTIONAL_ONLY_WEIGHT = 0.5;

let signatures: ReportSignatures | null = null;

function getSignatures(): ReportSignatures {
  if (!signatures) {
    signatures = loadDataFile('reportSignatures.json', reportSignaturesSchema);
  }
  return signatures;
}

export function normalizeColumnNames(columns: string[]): string[] {
  return columns.map(col => col.trim().toUpperCase());
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Weighted fraction of a signature's columns present in `columns` (already normalized)
 */
export function calculateConfidence(columns: string[], signature: Pick<TableSignature, 'requiredColumns' | 'optionalColumns'>): number {
  const present = new Set(columns);
  const required = unique(signature.requiredColumns);
  const optional = unique(signature.optionalColumns);

  const requiredScore = required.length > 0
    ? required.filter(col => present.has(col)).length / required.length
    : 0;
  const optionalScore = optional.length > 0
    ? optional.filter(col => present.has(col)).length / optional.length
    : 0;

  if (required.length > 0 && optional.length > 0) {
    return requiredScore * REQUIRED_WEIGHT + optionalScore * OPTIONAL_WEIGHT;
  }
  if (required.length > 0) {
    return requiredScore;
  }
  if (optional.length > 0) {
    return optionalScore * OPTIONAL_ONLY_WEIGHT;
  }
  return 0;
}

function buildIdentification(columns: string[], signature: TableSignature, confidence: number): ReportIdentification {
  const patternColumns = new Set([...signature.requiredColumns, ...signature.optionalColumns]);
  const present = new Set(columns);
  return {
    tableType: signature.tableType,
    confidence,
    description: signature.description,
    matchedColumns: columns.filter(col => patternColumns.has(col)),
    missingColumns: unique(signature.requiredColumns).filter(col => !present.has(col)),
    extraColumns: columns.filter(col => !patternColumns.has(col)),
  };
}

/**
 * Identify the table type behind a column set.
 * A signature is eligible when its weighted confidence reaches the signature's
 * own threshold; a missing required column only lowers the required share.
 * Never throws.
 */
export function identifyReportType(columns: string[]): ReportIdentification {
  try {
    const normalized = normalizeColumnNames(columns);

    let best: ReportIdentification | null = null;
    for (const signature of getSignatures().signatures) {
      const confidence = calculateConfidence(normalized, signature);
      if (confidence < signature.confidenceThreshold) continue;

      // Strictly greater keeps the first signature on ties
      if (!best || confidence > best.confidence) {
        best = buildIdentification(normalized, signature, confidence);
      }
    }

    if (best) {
      console.log(`🔎 Identified report type: ${best.tableType} (confidence: ${best.confidence.toFixed(2)})`);
      return best;
    }

    console.warn(`⚠️ Could not identify report type for columns: ${columns.join(', ')}`);
    return {
      tableType: UNKNOWN_TABLE_TYPE,
      confidence: 0,
      description: 'Unknown ledger table',
      matchedColumns: [],
      missingColumns: [],
      extraColumns: normalized,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error('❌ Error identifying report type:', errorMessage);
    return {
      tableType: ERROR_TABLE_TYPE,
      confidence: 0,
      description: 'Error during identification',
      matchedColumns: [],
      missingColumns: [],
      extraColumns: [],
    };
  }
}

/**
 * Inline detection used by schema analysis: the first entry whose required
 * subset is fully present wins, in declaration order.
 */
export function detectTableTypeFast(columns: string[]): string {
  const present = new Set(normalizeColumnNames(columns));
  for (const rule of getSignatures().fastDetection) {
    if (rule.requiredColumns.every(col => present.has(col))) {
      return rule.tableType;
    }
  }
  return UNKNOWN_TABLE_TYPE;
}

/**
 * Fraction of a table type's required columns present; 0 for unknown types
 */
export function scoreTableType(tableType: string, columns: string[]): number {
  const signature = getSignatures().signatures.find(sig => sig.tableType === tableType);
  if (!signature) return 0;
  const present = new Set(normalizeColumnNames(columns));
  const required = unique(signature.requiredColumns);
  if (required.length === 0) return 0;
  return required.filter(col => present.has(col)).length / required.length;
}

export function getTableDescription(tableType: string): string {
  return getSignatures().signatures.find(sig => sig.tableType === tableType)?.description ?? 'Unknown table type';
}

export function getSuggestedQueries(tableType: string): string[] {
  const { suggestedQueries, defaultQueries } = getSignatures();
  return suggestedQueries[tableType] ?? defaultQueries;
}

export interface TableStructureValidation {
  isValid: boolean;
  message: string;
  issues: string[];
  missingRequired: string[];
  extraColumns: string[];
}

export function validateTableStructure(tableType: string, columns: string[]): TableStructureValidation {
  const signature = getSignatures().signatures.find(sig => sig.tableType === tableType);
  if (!signature) {
    return {
      isValid: false,
      message: `Unknown table type: ${tableType}`,
      issues: [],
      missingRequired: [],
      extraColumns: [],
    };
  }

  const normalized = normalizeColumnNames(columns);
  const { missingColumns, extraColumns } = buildIdentification(normalized, signature, 0);
  const issues: string[] = [];
  if (missingColumns.length > 0) {
    issues.push(`Missing required columns: ${missingColumns.join(', ')}`);
  }
  if (extraColumns.length > 0) {
    issues.push(`Unexpected columns: ${extraColumns.join(', ')}`);
  }

  const isValid = missingColumns.length === 0;
  return {
    isValid,
    message: isValid ? 'Valid table structure' : 'Table structure issues found',
    issues,
    missingRequired: missingColumns,
    extraColumns,
  };
}
