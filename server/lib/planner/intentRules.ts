/**
 * Intent Rules
 * Ordered (predicate → outcome) list evaluated first-match-wins. A rule either
 * names the plan's action or, for frequency questions, builds the whole plan.
 */
import type { SchemaAnalysis } from '../../shared/schema.js';
import { createEmptyPlan, type QueryAction, type QueryPlan } from '../../shared/queryTypes.js';
import { resolveColumn } from './columnResolver.js';
import { countWords, hasAnyKeyword } from '../textMatch.js';

export interface IntentContext {
  question: string;
  text: string;
  schema: SchemaAnalysis;
}

export type IntentOutcome =
  | { kind: 'action'; action: QueryAction }
  | { kind: 'plan'; plan: QueryPlan };

export interface IntentRule {
  name: string;
  match(context: IntentContext): IntentOutcome | null;
}

export const DEFAULT_TOP_N = 5;
const SHORT_QUESTION_WORDS = 5;

export const EXPLAIN_WORDS = ['explain', 'what', 'describe', 'tell me about'];
export const EXPLAIN_SUBJECTS = ['report', 'table', 'data', 'schema', 'structure', 'columns', 'fields', 'file', 'this', 'does'];
export const BUSINESS_WORDS = ['overdue', 'past due', 'vendor', 'customer', 'invoice', 'payment', 'business'];
export const SHOW_WORDS = ['show', 'display', 'list', 'find', 'get', 'see', 'view'];
export const COUNT_WORDS = ['count', 'how many', 'number of', 'total records'];
export const SUM_WORDS = ['sum', 'total'];
export const AVERAGE_WORDS = ['average', 'mean', 'avg'];

// Frequency phrasings; the last capture group is the term, an optional
// numeric first group is N
const FREQUENCY_PATTERNS: RegExp[] = [
  /what are the most (?:frequent|common) ([\w\s]+?)[\s?.!]*$/,
  /most (?:frequent|common) ([\w\s]+?)[\s?.!]*$/,
  /\btop (\d+) ([\w\s]+?)[\s?.!]*$/,
  /\btop ([\w\s]+?)[\s?.!]*$/,
  /(?:which|what) ([\w\s]+?) (?:are|were) used most(?: frequently| commonly)?[\s?.!]*$/,
];

function action(value: QueryAction): IntentOutcome {
  return { kind: 'action', action: value };
}

function matchFrequency(context: IntentContext): IntentOutcome | null {
  for (const pattern of FREQUENCY_PATTERNS) {
    const match = pattern.exec(context.text);
    if (!match) continue;

    const hasCount = match.length === 3;
    const limit = hasCount ? Number(match[1]) : DEFAULT_TOP_N;
    const term = (hasCount ? match[2] : match[1]).trim();
    const column = resolveColumn(context.schema, term);
    if (!column) continue;

    return {
      kind: 'plan',
      plan: {
        ...createEmptyPlan(context.question, 'show'),
        grouping: [column],
        aggregation: { '*': 'count' },
        sorting: [{ column: 'count', ascending: false }],
        limit,
      },
    };
  }
  return null;
}

export const INTENT_RULES: IntentRule[] = [
  { name: 'most_frequent', match: matchFrequency },
  {
    name: 'explain_schema',
    match: ({ text }) =>
      hasAnyKeyword(text, EXPLAIN_WORDS) && hasAnyKeyword(text, EXPLAIN_SUBJECTS) ? action('explain_schema') : null,
  },
  {
    name: 'business_analysis',
    match: ({ text }) => (hasAnyKeyword(text, BUSINESS_WORDS) ? action('business_analysis') : null),
  },
  {
    name: 'show',
    match: ({ text }) => (hasAnyKeyword(text, SHOW_WORDS) ? action('show') : null),
  },
  {
    name: 'count',
    match: ({ text }) => (hasAnyKeyword(text, COUNT_WORDS) ? action('count') : null),
  },
  {
    name: 'aggregate',
    match: ({ text }) => {
      if (hasAnyKeyword(text, SUM_WORDS)) return action('sum');
      return hasAnyKeyword(text, AVERAGE_WORDS) ? action('average') : null;
    },
  },
  {
    name: 'fallback',
    match: ({ text }) => action(countWords(text) <= SHORT_QUESTION_WORDS ? 'explain_schema' : 'show'),
  },
];

/**
 * Evaluate `rules` in order; the fallback rule guarantees an outcome
 */
export function matchIntent(context: IntentContext, rules: IntentRule[] = INTENT_RULES): { rule: string; outcome: IntentOutcome } {
  for (const rule of rules) {
    const outcome = rule.match(context);
    if (outcome) {
      return { rule: rule.name, outcome };
    }
  }
  return { rule: 'default', outcome: action('show') };
}
