/**
 * Runtime configuration read from the environment (.env is loaded by the entry point).
 */

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    console.warn(`⚠️ Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function readList(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw.split(',').map(item => item.trim().toLowerCase()).filter(item => item.length > 0);
}

export const DEFAULT_ORG_CONTEXT_KEYWORDS = [
  'navy',
  'military',
  'dod',
  'defense',
  'department of defense',
  'government',
  'federal',
];

export interface AppConfig {
  port: number;
  uploadDir: string;
  maxUploadMb: number;
  sessionTtlMinutes: number;
  analysisSampleSize: number;
  maxResponseRows: number;
  orgContextKeywords: string[];
}

export function loadConfig(): AppConfig {
  return {
    port: readInt('PORT', 3003),
    uploadDir: process.env.UPLOAD_DIR || 'uploads',
    maxUploadMb: readInt('MAX_UPLOAD_MB', 200),
    sessionTtlMinutes: readInt('SESSION_TTL_MINUTES', 60),
    analysisSampleSize: readInt('ANALYSIS_SAMPLE_SIZE', 5000),
    maxResponseRows: readInt('MAX_RESPONSE_ROWS', 100),
    orgContextKeywords: readList('ORG_CONTEXT_KEYWORDS', DEFAULT_ORG_CONTEXT_KEYWORDS),
  };
}
