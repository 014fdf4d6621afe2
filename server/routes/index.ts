import { Express } from "express";
import type { AppContext } from "../services/context.js";
import { createQueryRoutes } from "./query.js";
import { createSessionRoutes } from "./sessions.js";
import { createUploadRoutes } from "./upload.js";

export function registerRoutes(app: Express, context: AppContext): void {
  // Health check endpoint
  app.get('/api/health', (req, res) => {
    res.json({ status: 'OK', message: 'Server is running' });
  });

  // Register route modules
  app.use('/api', createUploadRoutes(context));
  app.use('/api', createQueryRoutes(context));
  app.use('/api', createSessionRoutes(context));
}
