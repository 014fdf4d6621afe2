/**
 * Rejects questions too short or too generic to plan against a ledger table
 */

const MIN_QUESTION_LENGTH = 3;
const BLOCKED_QUESTIONS = new Set(['dog', 'cat', 'hello', 'hi', 'test']);

export const UNCLEAR_QUESTION_MESSAGE =
  "Sorry, I couldn't understand your question. Please ask a specific question about your ledger data " +
  "(e.g., 'Show vendor payments for Q1', 'Analyze overdue invoices').";

export type GuardResult = { accepted: true; question: string } | { accepted: false; message: string };

export function checkQuestion(raw: string): GuardResult {
  const question = raw.trim();
  if (question.length < MIN_QUESTION_LENGTH || BLOCKED_QUESTIONS.has(question.toLowerCase())) {
    return { accepted: false, message: UNCLEAR_QUESTION_MESSAGE };
  }
  return { accepted: true, question };
}
