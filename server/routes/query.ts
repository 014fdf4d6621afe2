import { Router } from "express";
import { createQueryController } from "../controllers/queryController.js";
import type { AppContext } from "../services/context.js";

export function createQueryRoutes(context: AppContext): Router {
  const { runQuery } = createQueryController(context);
  const router = Router();

  router.post('/query', runQuery);

  return router;
}
