/**
 * Prompt construction for AI insights layered over a computed query result
 */
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ExecutionResult, SchemaAnalysis } from "../shared/schema.js";
import { formatSummaryStats } from "./statisticalSummary.js";

export const ANALYST_SYSTEM_PROMPT = `You are an expert financial data analyst assistant for government and enterprise finance teams. You help users understand accounting ledger exports (document headers, line items, vendor and customer master data, G/L accounts) through plain-language questions.

Ledger tables you may see:
- BKPF (Accounting Document Header): document metadata, posting dates, document types, company codes, fiscal years
- BSEG (Accounting Document Segment): line items, account assignments, amounts, posting keys, vendor/customer references
- LFA1 (Vendor Master) and KNA1 (Customer Master): names, addresses, payment terms, blocking status
- SKAT (G/L Account Master): chart of accounts and account descriptions

Guidelines:
- Base every statement on the query results provided; never invent figures
- Point out trends, anomalies and data quality issues worth a closer look
- Keep the answer under 200 words and use plain business language
- Mention audit and compliance implications where the results suggest them`;

export function buildSchemaContext(schema: SchemaAnalysis): string {
  const lines = [
    'Data Schema Context:',
    `- Table Type: ${schema.tableType}`,
    `- Total Records: ${schema.fileInfo.totalRows.toLocaleString('en-US')}`,
    `- Data Quality: ${schema.dataQuality.nullPercentage}% null values`,
  ];

  const tagged = schema.columns.filter(col => col.semanticPatterns.length > 0);
  if (tagged.length > 0) {
    lines.push('', 'Key Columns Available:');
    for (const col of tagged) {
      lines.push(`- ${col.name}: ${col.semanticPatterns.join(', ')}`);
    }
  }
  return lines.join('\n');
}

export function buildResultContext(result: ExecutionResult): string {
  const lines = [
    'Query Execution Results:',
    `- Records Returned: ${result.rowCount.toLocaleString('en-US')}`,
    `- Processing Time: ${result.executionTime.toFixed(2)} seconds`,
    `- Query Type: ${result.queryType}`,
    '',
    formatSummaryStats(result.rowCount, result.summaryStats),
  ];

  if (result.insights.length > 0) {
    lines.push('', 'Analysis Summary:');
    for (const insight of result.insights) {
      lines.push(`- ${insight}`);
    }
  }
  lines.push('', 'Please provide business insights and recommendations based on these results.');
  return lines.join('\n');
}

export function buildInsightMessages(
  question: string,
  schema: SchemaAnalysis,
  result: ExecutionResult,
): ChatCompletionMessageParam[] {
  return [
    { role: 'system', content: ANALYST_SYSTEM_PROMPT },
    { role: 'system', content: buildSchemaContext(schema) },
    { role: 'system', content: buildResultContext(result) },
    { role: 'user', content: question },
  ];
}
