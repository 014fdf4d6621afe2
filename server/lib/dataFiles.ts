import { readFileSync } from 'fs';
import { z } from 'zod';

/**
 * Load and validate a JSON lookup table from server/data.
 * Callers keep the parsed result; this reads the file every time.
 */
export function loadDataFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const url = new URL(`../data/${fileName}`, import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  const parsed = schema.parse(raw);
  console.log(`📚 Loaded lookup data: ${fileName}`);
  return parsed;
}
