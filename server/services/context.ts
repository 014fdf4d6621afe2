/**
 * Collaborators shared by the HTTP services. Built once by createApp();
 * tests pass their own.
 */
import type { AppConfig } from "../lib/config.js";
import type { InsightGenerator } from "../lib/insightGenerator.js";
import type { SchemaAnalyzer } from "../lib/schemaAnalyzer.js";
import type { IStorage } from "../storage.js";

export interface AppContext {
  config: AppConfig;
  storage: IStorage;
  analyzer: SchemaAnalyzer;
  generateInsights: InsightGenerator;
  now: () => Date;
}

/**
 * Outcome of a service call; controllers map failures onto HTTP statuses
 */
export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; statusCode: number; error: string };
