/**
 * Templated narratives for schema explanations, business analysis and
 * standard data results
 */
import type { SchemaAnalysis } from '../../shared/schema.js';
import type { DataTable, QueryPlan } from '../../shared/queryTypes.js';
import { parseFlexibleDate } from '../dateUtils.js';
import { findAmountColumn, findColumnByPattern, findDateColumn, getColumnsByCategory } from '../schemaLookup.js';
import { hasAnyKeyword, hasKeyword } from '../textMatch.js';
import { cellKey, formatNumber, toNumber } from '../valueUtils.js';
import { COUNT_COLUMN, isValueCountPlan } from './aggregation.js';

const KEY_COLUMN_LIMIT = 10;

export const EXAMPLE_QUERIES = [
  'Show me all records',
  'Count total transactions',
  'Find overdue invoices',
  'Show vendor payments',
];

interface BusinessContext {
  purpose: string;
  use: string;
  keyQueries: string;
}

const BUSINESS_CONTEXT: Record<string, BusinessContext> = {
  BSEG: {
    purpose: 'Accounting line items',
    use: 'Financial analysis, transaction tracking',
    keyQueries: 'Show by vendor, analyze payments, find overdue',
  },
  BKPF: {
    purpose: 'Accounting document headers',
    use: 'Document analysis, approval workflows',
    keyQueries: 'Show by type, analyze posting patterns',
  },
};

const GENERAL_CONTEXT: BusinessContext = {
  purpose: 'General ledger data',
  use: 'Data analysis, reporting',
  keyQueries: 'Explore patterns, generate reports',
};

const TABLE_TITLES: Record<string, string> = {
  BSEG: 'BSEG (Accounting Document Segment)',
  BKPF: 'BKPF (Accounting Document Header)',
};

type Phrasing = 'what' | 'explain' | 'generic';

export function detectPhrasing(question: string): Phrasing {
  const text = question.toLowerCase();
  if (/\bwhat\s+(?:is|does)\b/.test(text)) return 'what';
  if (hasAnyKeyword(text, ['explain', 'describe'])) return 'explain';
  return 'generic';
}

export function mentionsOrgContext(question: string, keywords: readonly string[]): boolean {
  return hasAnyKeyword(question.toLowerCase(), keywords);
}

function titleCase(value: string): string {
  return value.replace(/_/g, ' ').replace(/\b\w/g, char => char.toUpperCase());
}

/**
 * Markdown description of the analyzed table
 */
export function buildSchemaMarkdown(schema: SchemaAnalysis): string {
  const parts: string[] = [];
  const { totalRows, totalColumns } = schema.fileInfo;

  parts.push(`# 📊 ${schema.tableType} Table`);
  parts.push(`**Records:** ${totalRows} | **Columns:** ${totalColumns}`);
  parts.push(`**Confidence:** ${(schema.confidence * 100).toFixed(1)}%`);
  if (schema.schemaSummary) {
    parts.push(`**Description:** ${schema.schemaSummary}`);
  }

  if (schema.columns.length > 0) {
    parts.push('\n## 📋 Key Columns');
    parts.push('| Column | Type | Purpose |');
    parts.push('|--------|------|---------|');
    for (const column of schema.columns.slice(0, KEY_COLUMN_LIMIT)) {
      const type = titleCase(column.category);
      const purpose = column.semanticPatterns.length > 0
        ? titleCase(column.semanticPatterns.join(', '))
        : schema.schemaMapping[column.name] ?? `${type} data`;
      parts.push(`| ${column.name} | ${type} | ${purpose} |`);
    }
  }

  parts.push('\n## 📈 Data Insights');
  parts.push(`- **Numeric columns:** ${getColumnsByCategory(schema, 'numeric').length} (for calculations)`);
  parts.push(`- **Date columns:** ${getColumnsByCategory(schema, 'date').length} (for time analysis)`);
  parts.push(`- **Categorical columns:** ${getColumnsByCategory(schema, 'categorical').length} (for grouping)`);

  const context = BUSINESS_CONTEXT[schema.tableType] ?? GENERAL_CONTEXT;
  parts.push('\n## 💼 Business Context');
  parts.push(`- **Purpose:** ${context.purpose}`);
  parts.push(`- **Use:** ${context.use}`);
  parts.push(`- **Key queries:** ${context.keyQueries}`);

  parts.push('\n## 🔍 Try asking:');
  for (const query of EXAMPLE_QUERIES) {
    parts.push(`- "${query}"`);
  }

  return parts.join('\n');
}

/**
 * Short natural-language answer to a question about the table itself
 */
export function buildSchemaAnswer(question: string, schema: SchemaAnalysis, orgKeywords: readonly string[]): string {
  const { tableType, schemaSummary } = schema;
  const rows = schema.fileInfo.totalRows.toLocaleString('en-US');
  const columns = schema.fileInfo.totalColumns;
  const orgContext = mentionsOrgContext(question, orgKeywords);

  switch (detectPhrasing(question)) {
    case 'what': {
      const title = TABLE_TITLES[tableType];
      if (orgContext) {
        return `This is a **${title ?? tableType}** table with ${rows} records and ${columns} columns. ` +
          'For government and defense finance teams, this data supports:\n' +
          '• Tracking procurement and vendor payments\n' +
          '• Monitoring budget execution across organizational units\n' +
          '• Auditing financial transactions for compliance\n' +
          '• Supporting mandated financial reporting\n\n' +
          schemaSummary;
      }
      if (tableType === 'BSEG') {
        return `This is a **${title}** table that contains ${rows} individual line items from accounting documents. ` +
          `Each row represents a single financial transaction entry with ${columns} different data fields. ` +
          `This table is used for detailed financial analysis, transaction tracking, and audit purposes. ${schemaSummary}`;
      }
      if (tableType === 'BKPF') {
        return `This is a **${title}** table that contains ${rows} complete accounting documents. ` +
          `Each row represents a full financial document with ${columns} different data fields. ` +
          `This table is used for document-level analysis, approval workflows, and compliance reporting. ${schemaSummary}`;
      }
      return `This is a **${tableType}** table containing ${rows} records with ${columns} columns of data. ${schemaSummary}`;
    }
    case 'explain': {
      const usage = orgContext
        ? 'You can use this data for public-sector financial analysis, compliance reporting and budget execution monitoring.'
        : 'You can use this data for financial analysis, reporting, and business intelligence purposes.';
      return `Let me explain this ${tableType} table: It contains ${rows} records with ${columns} columns. ${schemaSummary} ${usage}`;
    }
    case 'generic':
      return `This ${tableType} table has ${rows} records and ${columns} columns. ${schemaSummary}`;
  }
}

function uniqueCount(table: DataTable, column: string): number {
  const values = new Set<string>();
  for (const row of table.rows) {
    const key = cellKey(row[column]);
    if (key !== null) values.add(key);
  }
  return values.size;
}

function overdueFinding(table: DataTable, schema: SchemaAnalysis, now: Date): string {
  const dateColumn = findDateColumn(schema);
  if (!dateColumn || !table.columns.includes(dateColumn)) {
    return '**Overdue Analysis:** No date column found';
  }
  const total = table.rows.length;
  const overdue = table.rows.filter(row => {
    const date = parseFlexibleDate(row[dateColumn]);
    return date !== null && date.getTime() < now.getTime();
  }).length;
  const percent = total > 0 ? (overdue / total) * 100 : 0;
  return `**Overdue Analysis:** ${overdue}/${total} items overdue (${percent.toFixed(1)}%)`;
}

function partyFinding(table: DataTable, column: string | null, label: 'Vendor' | 'Customer'): string {
  if (!column || !table.columns.includes(column)) {
    return `**${label} Analysis:** No ${label.toLowerCase()} data found`;
  }
  return `**${label} Analysis:** ${uniqueCount(table, column)} unique ${label.toLowerCase()}s found`;
}

function financialFinding(table: DataTable, schema: SchemaAnalysis): string {
  const amountColumn = findAmountColumn(schema);
  const amounts = amountColumn && table.columns.includes(amountColumn)
    ? table.rows.map(row => toNumber(row[amountColumn])).filter((num): num is number => num !== null)
    : [];
  if (amounts.length === 0) {
    return '**Financial Analysis:** No amount data found';
  }
  const total = amounts.reduce((acc, num) => acc + num, 0);
  return `**Financial Analysis:** Total: $${formatNumber(total)}, Average: $${formatNumber(total / amounts.length)}`;
}

function generalFinding(table: DataTable, schema: SchemaAnalysis): string {
  const lines = ['**General Insights:**', `- ${table.rows.length} records in ${schema.tableType} table`];
  if (schema.tableType === 'BSEG') {
    lines.push('- Use for financial transaction analysis', "- Try: 'Show vendor payments' or 'Find overdue invoices'");
  } else if (schema.tableType === 'BKPF') {
    lines.push('- Use for document-level analysis', "- Try: 'Show documents by type' or 'Analyze posting patterns'");
  } else {
    lines.push('- Use for general data exploration', "- Try: 'Show all records' or 'Count transactions'");
  }
  return lines.join('\n');
}

/**
 * Independent findings for each business topic the question mentions
 */
export function buildBusinessFindings(question: string, table: DataTable, schema: SchemaAnalysis, now: Date): string {
  const text = question.toLowerCase();
  const findings: string[] = [];

  if (hasAnyKeyword(text, ['overdue', 'past due'])) {
    findings.push(overdueFinding(table, schema, now));
  }
  if (hasKeyword(text, 'vendor')) {
    findings.push(partyFinding(table, findColumnByPattern(schema, 'vendor_number'), 'Vendor'));
  }
  if (hasKeyword(text, 'customer')) {
    findings.push(partyFinding(table, findColumnByPattern(schema, 'customer_number'), 'Customer'));
  }
  if (hasAnyKeyword(text, ['invoice', 'payment'])) {
    findings.push(financialFinding(table, schema));
  }
  if (findings.length === 0) {
    findings.push(generalFinding(table, schema));
  }

  return findings.join('\n\n');
}

export function buildBusinessAnswer(question: string, findings: string, orgKeywords: readonly string[]): string {
  const text = question.toLowerCase();
  const orgContext = mentionsOrgContext(question, orgKeywords);

  if (hasAnyKeyword(text, ['overdue', 'past due'])) {
    return orgContext
      ? `Based on your question about overdue items: ${findings} This analysis helps identify items that need attention for payment processing, vendor management, and cash flow management across your organization.`
      : `Based on your question about overdue items, here's what I found: ${findings} This analysis helps identify items that need attention for payment processing and cash flow management.`;
  }
  if (hasKeyword(text, 'vendor')) {
    return orgContext
      ? `Regarding your vendor-related question: ${findings} This information helps you understand vendor relationships, procurement patterns, and acquisition compliance.`
      : `Regarding your vendor-related question: ${findings} This information can help you understand vendor relationships and payment patterns.`;
  }
  if (hasKeyword(text, 'customer')) {
    return orgContext
      ? `About your customer inquiry: ${findings} This data provides insights into customer relationships, inter-agency transactions, and financial patterns.`
      : `About your customer inquiry: ${findings} This data provides insights into customer relationships and transaction patterns.`;
  }
  if (hasAnyKeyword(text, ['invoice', 'payment'])) {
    return orgContext
      ? `For your financial question: ${findings} This analysis helps understand payment patterns, budget execution, and program financial performance.`
      : `For your financial question: ${findings} This analysis helps understand payment patterns and financial performance.`;
  }
  return orgContext
    ? `Here's what I found based on your question: ${findings} This information supports decision-making, budget management, and compliance.`
    : `Here's what I found based on your question: ${findings} This information provides valuable business insights for decision-making.`;
}

/**
 * One-paragraph description of a standard data result
 */
export function buildDataNarrative(plan: QueryPlan, result: DataTable, filteredRowCount: number): string {
  const rowCount = result.rows.length;

  if (isValueCountPlan(plan.grouping, plan.aggregation)) {
    const column = plan.grouping[0];
    const top = result.rows
      .slice(0, 3)
      .map(row => `${cellKey(row[column]) ?? '(blank)'} (${cellKey(row[COUNT_COLUMN]) ?? '0'})`)
      .join(', ');
    return `Across ${filteredRowCount} records, the most frequent ${column} values are: ${top}.`;
  }

  const aggregations = Object.entries(plan.aggregation);
  if (plan.grouping.length === 0 && aggregations.length > 0) {
    const row = result.rows[0];
    const parts = aggregations.map(([column, func]) => {
      const name = column === '*' ? COUNT_COLUMN : column;
      const value = toNumber(row[name]);
      const label = column === '*' ? 'record count' : `${func} of ${column}`;
      return `${label} is ${value === null ? 'not available' : formatNumber(value, column === '*' ? 0 : 2)}`;
    });
    return `Across ${filteredRowCount} records, the ${parts.join(' and the ')}.`;
  }

  if (plan.grouping.length > 0) {
    return `Grouped ${filteredRowCount} records by ${plan.grouping.join(', ')} into ${rowCount} groups.`;
  }

  const criteria = plan.filters.map(filter => filter.description);
  if (plan.timeWindow) {
    criteria.push(plan.timeWindow.year === null ? `Q${plan.timeWindow.quarter}` : `Q${plan.timeWindow.quarter} ${plan.timeWindow.year}`);
  }
  return criteria.length > 0
    ? `Found ${rowCount} records matching ${criteria.join(', ')}.`
    : `Found ${rowCount} records.`;
}
