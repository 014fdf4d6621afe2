import { Request, Response } from "express";
import { queryRequestSchema } from "../shared/schema.js";
import { processQuery } from "../services/query/query.service.js";
import type { AppContext } from "../services/context.js";
import { sendError, sendServiceResult, sendValidationError } from "../utils/index.js";

export function createQueryController(context: AppContext) {
  const runQuery = async (req: Request, res: Response) => {
    const parsed = queryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const details = parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
      return sendValidationError(res, `Invalid query request: ${details}`);
    }

    try {
      const result = await processQuery(parsed.data, context);
      sendServiceResult(res, result);
    } catch (error) {
      console.error('❌ Query request failed:', error);
      sendError(res, 'Failed to process query');
    }
  };

  return { runQuery };
}
