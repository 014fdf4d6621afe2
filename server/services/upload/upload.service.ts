/**
 * Upload Service
 * Parses an uploaded file, analyzes its schema and opens a session for it
 */
import { unlink } from "fs/promises";
import { readTableFile } from "../../lib/fileParser.js";
import type { SchemaAnalyzer } from "../../lib/schemaAnalyzer.js";
import type { UploadResponse } from "../../shared/schema.js";
import type { AppContext, ServiceResult } from "../context.js";

export const ANALYSIS_FAILED_MESSAGE = 'Could not analyze file';

export interface UploadedFile {
  path: string;
  originalName: string;
}

/**
 * Deletes an uploaded file from disk. Failures are logged, never thrown.
 */
export async function removeUploadedFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
    console.log(`🗑️ Removed uploaded file ${filePath}`);
  } catch (error) {
    console.error(`⚠️ Could not remove uploaded file ${filePath}:`, error instanceof Error ? error.message : error);
  }
}

/**
 * Frees what an upload holds outside the session store: its cached analysis and its file
 */
export async function releaseUpload(filePath: string, analyzer: SchemaAnalyzer): Promise<void> {
  analyzer.forget(filePath);
  await removeUploadedFile(filePath);
}

export async function processUpload(file: UploadedFile, context: AppContext): Promise<ServiceResult<UploadResponse>> {
  const startTime = Date.now();
  console.log(`📤 Processing upload: ${file.originalName}`);

  try {
    const table = await readTableFile(file.path, file.originalName);
    console.log(`📄 Parsed ${table.rows.length} rows, ${table.columns.length} columns`);

    const schemaAnalysis = await context.analyzer.analyzeFile(file.path, table);
    const sessionId = context.storage.createSession({
      fileName: file.originalName,
      filePath: file.path,
      table,
      schemaAnalysis,
    });

    console.log(`✅ Upload ready in ${Date.now() - startTime}ms (session ${sessionId}, type ${schemaAnalysis.tableType})`);
    return { ok: true, value: { sessionId, fileName: file.originalName, schemaAnalysis } };
  } catch (error) {
    console.error(`❌ Could not analyze ${file.originalName}:`, error instanceof Error ? error.message : error);
    await releaseUpload(file.path, context.analyzer);
    return { ok: false, statusCode: 400, error: ANALYSIS_FAILED_MESSAGE };
  }
}
