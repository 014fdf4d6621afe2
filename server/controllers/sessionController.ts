import { Request, Response } from "express";
import type { AppContext } from "../services/context.js";
import { SESSION_NOT_FOUND_MESSAGE } from "../services/query/query.service.js";
import { sendNotFound, sendSuccess } from "../utils/index.js";

export function createSessionController(context: AppContext) {
  // Get the schema analysis of an uploaded file
  const getSchema = (req: Request, res: Response) => {
    const session = context.storage.getSession(req.params.sessionId);
    if (!session) {
      return sendNotFound(res, SESSION_NOT_FOUND_MESSAGE);
    }
    sendSuccess(res, { sessionId: req.params.sessionId, fileName: session.fileName, schemaAnalysis: session.schemaAnalysis });
  };

  const deleteSession = (req: Request, res: Response) => {
    if (!context.storage.deleteSession(req.params.sessionId)) {
      return sendNotFound(res, SESSION_NOT_FOUND_MESSAGE);
    }
    console.log(`🗑️ Session deleted: ${req.params.sessionId}`);
    sendSuccess(res, { success: true });
  };

  return { getSchema, deleteSession };
}
