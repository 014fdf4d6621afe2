import { z } from "zod";

// Column categories assigned during schema analysis
export const columnCategorySchema = z.enum(["numeric", "date", "categorical", "text", "empty"]);

export type ColumnCategory = z.infer<typeof columnCategorySchema>;

// Closed vocabulary shared by the analyzer, planner and executor
export const semanticPatternSchema = z.enum([
  "company_code",
  "document_number",
  "fiscal_year",
  "document_type",
  "posting_date",
  "currency",
  "vendor_number",
  "customer_number",
  "gl_account",
  "debit_credit_indicator",
  "local_amount",
  "document_amount",
]);

export type SemanticPattern = z.infer<typeof semanticPatternSchema>;

export const numericStatisticsSchema = z.object({
  kind: z.literal("numeric"),
  min: z.number(),
  max: z.number(),
  mean: z.number(),
  sum: z.number(),
});

export const dateStatisticsSchema = z.object({
  kind: z.literal("date"),
  minDate: z.string(),
  maxDate: z.string(),
  spanDays: z.number(),
});

export const columnStatisticsSchema = z.discriminatedUnion("kind", [
  numericStatisticsSchema,
  dateStatisticsSchema,
]);

export type NumericStatistics = z.infer<typeof numericStatisticsSchema>;
export type DateStatistics = z.infer<typeof dateStatisticsSchema>;
export type ColumnStatistics = z.infer<typeof columnStatisticsSchema>;

// Column Profile
export const columnProfileSchema = z.object({
  name: z.string(),
  category: columnCategorySchema,
  nullCount: z.number(),
  nullRatio: z.number(),
  uniqueCount: z.number(),
  uniqueRatio: z.number(),
  statistics: columnStatisticsSchema.nullable(),
  semanticPatterns: z.array(semanticPatternSchema),
});

export type ColumnProfile = z.infer<typeof columnProfileSchema>;

// Report identification detail
export const reportIdentificationSchema = z.object({
  tableType: z.string(),
  confidence: z.number().min(0).max(1),
  description: z.string(),
  matchedColumns: z.array(z.string()),
  missingColumns: z.array(z.string()),
  extraColumns: z.array(z.string()),
});

export type ReportIdentification = z.infer<typeof reportIdentificationSchema>;

export const fileInfoSchema = z.object({
  totalRows: z.number(),
  totalColumns: z.number(),
  fileSizeMb: z.number(),
  analyzedRows: z.number(),
});

export type FileInfo = z.infer<typeof fileInfoSchema>;

// Schema Analysis
export const schemaAnalysisSchema = z.object({
  tableType: z.string(),
  confidence: z.number().min(0).max(1),
  columns: z.array(columnProfileSchema),
  fileInfo: fileInfoSchema,
  schemaSummary: z.string(),
  schemaDescription: z.string(),
  querySuggestions: z.array(z.string()),
  dataQuality: z.object({
    nullPercentage: z.number(),
  }),
  reportIdentification: reportIdentificationSchema.nullable(),
  schemaMapping: z.record(z.string(), z.string()),
});

export type SchemaAnalysis = z.infer<typeof schemaAnalysisSchema>;

// Execution Result
export const jsonCellSchema = z.union([z.string(), z.number(), z.null()]);

export type JsonCell = z.infer<typeof jsonCellSchema>;

export const executionStepSchema = z.object({
  step: z.string(),
  status: z.enum(["success", "error"]),
  message: z.string(),
  rowsBefore: z.number(),
  rowsAfter: z.number(),
});

export type ExecutionStep = z.infer<typeof executionStepSchema>;

export const columnSummarySchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("numeric"),
    count: z.number(),
    nullCount: z.number(),
    min: z.number(),
    max: z.number(),
    mean: z.number(),
    sum: z.number(),
  }),
  z.object({
    type: z.literal("date"),
    count: z.number(),
    nullCount: z.number(),
    minDate: z.string(),
    maxDate: z.string(),
    spanDays: z.number(),
  }),
  z.object({
    type: z.literal("categorical"),
    count: z.number(),
    nullCount: z.number(),
    uniqueValues: z.number(),
    topValues: z.array(z.object({ value: z.string(), count: z.number() })),
  }),
]);

export type ColumnSummary = z.infer<typeof columnSummarySchema>;

export const queryTypeSchema = z.enum(["data", "schema_explanation", "business_analysis"]);

export type QueryType = z.infer<typeof queryTypeSchema>;

export const executionResultSchema = z.object({
  status: z.enum(["success", "error"]),
  message: z.string(),
  data: z.array(z.array(jsonCellSchema)),
  columns: z.array(z.string()),
  rowCount: z.number(),
  executionTime: z.number(),
  executionLog: z.array(executionStepSchema),
  summaryStats: z.record(z.string(), columnSummarySchema),
  insights: z.array(z.string()),
  narrative: z.string().nullable(),
  analysisText: z.string().nullable(),
  queryType: queryTypeSchema,
  traceback: z.string().nullable(),
});

export type ExecutionResult = z.infer<typeof executionResultSchema>;

// API Request/Response Types
export const queryRequestSchema = z.object({
  sessionId: z.string().min(1),
  question: z.string(),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

export const uploadResponseSchema = z.object({
  sessionId: z.string(),
  fileName: z.string(),
  schemaAnalysis: schemaAnalysisSchema,
});

export type UploadResponse = z.infer<typeof uploadResponseSchema>;

export const queryResponseSchema = z.object({
  status: z.enum(["success", "ambiguous", "error"]),
  message: z.string(),
  queryType: queryTypeSchema.nullable(),
  data: z.array(z.array(jsonCellSchema)),
  columns: z.array(z.string()),
  totalRows: z.number(),
  narrative: z.string().nullable(),
  analysisText: z.string().nullable(),
  insights: z.array(z.string()),
  summaryStats: z.record(z.string(), columnSummarySchema),
  executionLog: z.array(executionStepSchema),
  clarificationQuestions: z.array(z.string()),
  explanation: z.string().nullable(),
  aiResponse: z.string().nullable(),
});

export type QueryResponse = z.infer<typeof queryResponseSchema>;
