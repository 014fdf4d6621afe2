import express, { type Express } from "express";
import { loadConfig } from "./lib/config.js";
import { generateInsights } from "./lib/insightGenerator.js";
import { SchemaAnalyzer } from "./lib/schemaAnalyzer.js";
import { corsConfig } from "./middleware/index.js";
import { registerRoutes } from "./routes/index.js";
import type { AppContext } from "./services/context.js";
import { releaseUpload } from "./services/upload/upload.service.js";
import { MemStorage } from "./storage.js";

export function createContext(overrides: Partial<AppContext> = {}): AppContext {
  const config = overrides.config ?? loadConfig();
  const analyzer = overrides.analyzer ?? new SchemaAnalyzer({ sampleSize: config.analysisSampleSize });
  return {
    config,
    storage: overrides.storage ?? new MemStorage({
      ttlMs: config.sessionTtlMinutes * 60 * 1000,
      // releaseUpload logs its own failures
      onRelease: data => void releaseUpload(data.filePath, analyzer),
    }),
    analyzer,
    generateInsights: overrides.generateInsights ?? generateInsights,
    now: overrides.now ?? (() => new Date()),
  };
}

export function createApp(context: AppContext = createContext()): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));

  // Handle preflight requests explicitly
  app.options('*', corsConfig);
  app.use(corsConfig);

  registerRoutes(app, context);
  return app;
}
