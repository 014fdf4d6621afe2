/**
 * Query Service
 * Guard → plan → execute → AI insights for one question against a session's table
 */
import { checkQuestion } from "../../lib/inputGuard.js";
import { planQuery } from "../../lib/queryPlanner.js";
import { QueryExecutor } from "../../lib/queryExecutor.js";
import type { ExecutionResult, QueryRequest, QueryResponse } from "../../shared/schema.js";
import type { AppContext, ServiceResult } from "../context.js";

export const SESSION_NOT_FOUND_MESSAGE = 'Session not found. Please upload a file first.';

function emptyResponse(status: QueryResponse['status'], message: string): QueryResponse {
  return {
    status,
    message,
    queryType: null,
    data: [],
    columns: [],
    totalRows: 0,
    narrative: null,
    analysisText: null,
    insights: [],
    summaryStats: {},
    executionLog: [],
    clarificationQuestions: [],
    explanation: null,
    aiResponse: null,
  };
}

function toResponse(result: ExecutionResult, explanation: string, aiResponse: string | null, maxRows: number): QueryResponse {
  return {
    status: result.status,
    message: result.message,
    queryType: result.queryType,
    data: result.data.slice(0, maxRows),
    columns: result.columns,
    totalRows: result.rowCount,
    narrative: result.narrative,
    analysisText: result.analysisText,
    insights: result.insights,
    summaryStats: result.summaryStats,
    executionLog: result.executionLog,
    clarificationQuestions: [],
    explanation,
    aiResponse,
  };
}

export async function processQuery(request: QueryRequest, context: AppContext): Promise<ServiceResult<QueryResponse>> {
  const session = context.storage.getSession(request.sessionId);
  if (!session) {
    return { ok: false, statusCode: 404, error: SESSION_NOT_FOUND_MESSAGE };
  }

  const guard = checkQuestion(request.question);
  if (!guard.accepted) {
    console.log(`🚫 Question rejected: "${request.question}"`);
    return { ok: true, value: emptyResponse('error', guard.message) };
  }

  const question = guard.question;
  console.log(`❓ Query for session ${request.sessionId}: "${question}"`);

  const planResult = planQuery(question, session.schemaAnalysis, { now: context.now() });
  if (planResult.status === 'ambiguous') {
    return {
      ok: true,
      value: { ...emptyResponse('ambiguous', planResult.message), clarificationQuestions: planResult.clarificationQuestions },
    };
  }
  if (planResult.status === 'error') {
    return { ok: true, value: emptyResponse('error', planResult.message) };
  }

  const executor = new QueryExecutor(session.table, session.schemaAnalysis, {
    now: context.now,
    orgContextKeywords: context.config.orgContextKeywords,
  });
  const result = executor.execute(planResult.queryPlan);

  const aiResponse = result.status === 'success'
    ? await context.generateInsights(question, session.schemaAnalysis, result)
    : null;

  return {
    ok: true,
    value: toResponse(result, planResult.explanation, aiResponse, context.config.maxResponseRows),
  };
}
