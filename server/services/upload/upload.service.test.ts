import { access, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../../lib/config.js';
import type { InsightGenerator } from '../../lib/insightGenerator.js';
import { SchemaAnalyzer } from '../../lib/schemaAnalyzer.js';
import { MemStorage } from '../../storage.js';
import type { AppContext } from '../context.js';
import { ANALYSIS_FAILED_MESSAGE, processUpload, releaseUpload } from './upload.service.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'upload-service-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function createContext(): AppContext {
  return {
    config: loadConfig(),
    storage: new MemStorage({ ttlMs: 60_000 }),
    analyzer: new SchemaAnalyzer(),
    generateInsights: vi.fn<InsightGenerator>(),
    now: () => new Date('2024-05-10T00:00:00Z'),
  };
}

describe('processUpload', () => {
  it('analyzes the file and opens a session holding the parsed table', async () => {
    const path = join(dir, 'headers.csv');
    await writeFile(path, 'BUKRS,BELNR,GJAHR,BLART,BUDAT\n1000,1,2024,KR,2024-01-15\n1000,2,2024,SA,2024-02-15\n');
    const context = createContext();

    const result = await processUpload({ path, originalName: 'headers.csv' }, context);

    if (!result.ok) throw new Error(result.error);
    expect(result.value.fileName).toBe('headers.csv');
    expect(result.value.schemaAnalysis.tableType).toBe('BKPF');
    expect(result.value.schemaAnalysis.confidence).toBe(1);

    const session = context.storage.getSession(result.value.sessionId);
    expect(session?.filePath).toBe(path);
    expect(session?.table.rows).toHaveLength(2);
    expect(session?.schemaAnalysis).toBe(result.value.schemaAnalysis);
  });

  it('reports files that cannot be parsed', async () => {
    const path = join(dir, 'notes.txt');
    await writeFile(path, 'not a table');
    const context = createContext();

    await expect(processUpload({ path, originalName: 'notes.txt' }, context)).resolves.toEqual({
      ok: false,
      statusCode: 400,
      error: ANALYSIS_FAILED_MESSAGE,
    });
    await expect(access(path)).rejects.toThrow();
  });
});

describe('releaseUpload', () => {
  it('removes the file and its cached analysis', async () => {
    const path = join(dir, 'vendors.csv');
    await writeFile(path, 'LIFNR,NAME1\nV100,Acme\n');
    const analyzer = new SchemaAnalyzer();
    const forget = vi.spyOn(analyzer, 'forget');

    await releaseUpload(path, analyzer);

    expect(forget).toHaveBeenCalledWith(path);
    await expect(access(path)).rejects.toThrow();
  });

  it('resolves when the file is already gone', async () => {
    await expect(releaseUpload(join(dir, 'gone.csv'), new SchemaAnalyzer())).resolves.toBeUndefined();
  });
});
