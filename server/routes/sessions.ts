import { Router } from "express";
import { createSessionController } from "../controllers/sessionController.js";
import type { AppContext } from "../services/context.js";

export function createSessionRoutes(context: AppContext): Router {
  const { getSchema, deleteSession } = createSessionController(context);
  const router = Router();

  router.get('/schema/:sessionId', getSchema);
  router.delete('/session/:sessionId', deleteSession);

  return router;
}
