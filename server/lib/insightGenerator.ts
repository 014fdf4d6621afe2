/**
 * AI Insight Generator
 * Adds free-text commentary on top of a computed Execution Result. The
 * tabular result never depends on it: every failure degrades to a fixed string.
 */
import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ExecutionResult, SchemaAnalysis } from "../shared/schema.js";
import { getOpenAIClient, MODELS } from "./openai.js";
import { buildInsightMessages } from "./promptTemplates.js";

export const QUOTA_EXCEEDED_MESSAGE =
  'AI insights are temporarily unavailable due to API quota limits. The data analysis results are still available below.';
export const INSIGHTS_UNAVAILABLE_MESSAGE =
  'AI insights are currently unavailable. The data analysis results are still available below.';

const MAX_TOKENS = 500;
const TEMPERATURE = 0.3;

export type InsightGenerator = (question: string, schema: SchemaAnalysis, result: ExecutionResult) => Promise<string>;

/**
 * Sends chat messages to a text-generation service and returns its reply
 */
export type CompletionFn = (messages: ChatCompletionMessageParam[]) => Promise<string | null>;

export async function openAICompletion(messages: ChatCompletionMessageParam[]): Promise<string | null> {
  const response = await getOpenAIClient().chat.completions.create({
    model: MODELS.generation,
    messages,
    max_tokens: MAX_TOKENS,
    temperature: TEMPERATURE,
  });
  return response.choices[0]?.message.content ?? null;
}

export function isQuotaError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError && error.code === 'insufficient_quota') {
    return true;
  }
  return error instanceof Error && error.message.toLowerCase().includes('quota');
}

export function createInsightGenerator(complete: CompletionFn = openAICompletion): InsightGenerator {
  return async (question, schema, result) => {
    try {
      const messages = buildInsightMessages(question, schema, result);
      const answer = (await complete(messages))?.trim();
      if (!answer) {
        console.warn('⚠️ Empty AI insight response');
        return INSIGHTS_UNAVAILABLE_MESSAGE;
      }
      console.log(`🤖 AI insights generated (${answer.length} chars)`);
      return answer;
    } catch (error) {
      if (isQuotaError(error)) {
        console.error('❌ OpenAI quota exceeded:', error instanceof Error ? error.message : error);
        return QUOTA_EXCEEDED_MESSAGE;
      }
      console.error('❌ AI insight generation failed:', error instanceof Error ? error.message : error);
      return INSIGHTS_UNAVAILABLE_MESSAGE;
    }
  };
}

export const generateInsights: InsightGenerator = createInsightGenerator();
