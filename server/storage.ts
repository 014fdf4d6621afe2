import { randomUUID } from "crypto";
import type { SchemaAnalysis } from "./shared/schema.js";
import type { DataTable } from "./shared/queryTypes.js";

export interface SessionData {
  fileName: string;
  filePath: string;
  table: DataTable;
  schemaAnalysis: SchemaAnalysis;
}

interface StoredSession {
  data: SessionData;
  lastAccessed: number;
}

export interface IStorage {
  createSession(data: SessionData): string;
  getSession(sessionId: string): SessionData | undefined;
  deleteSession(sessionId: string): boolean;
  cleanupExpired(): number;
}

export interface MemStorageOptions {
  ttlMs: number;
  now?: () => number;
  /** Called once for every session that is deleted or expires */
  onRelease?: (data: SessionData) => void;
}

/**
 * In-memory session store. A session expires `ttlMs` after it was last read;
 * expired sessions are invisible immediately and removed by cleanupExpired().
 */
export class MemStorage implements IStorage {
  private sessions: Map<string, StoredSession>;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly onRelease: (data: SessionData) => void;

  constructor(options: MemStorageOptions) {
    this.sessions = new Map();
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.onRelease = options.onRelease ?? (() => undefined);
  }

  createSession(data: SessionData): string {
    const sessionId = randomUUID();
    this.sessions.set(sessionId, { data, lastAccessed: this.now() });
    return sessionId;
  }

  getSession(sessionId: string): SessionData | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;
    if (this.isExpired(session)) {
      this.release(sessionId, session);
      return undefined;
    }
    session.lastAccessed = this.now();
    return session.data;
  }

  deleteSession(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.release(sessionId, session);
    return true;
  }

  cleanupExpired(): number {
    let removed = 0;
    for (const [sessionId, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.release(sessionId, session);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`🧹 Removed ${removed} expired session(s)`);
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private release(sessionId: string, session: StoredSession): void {
    this.sessions.delete(sessionId);
    this.onRelease(session.data);
  }

  private isExpired(session: StoredSession): boolean {
    return this.now() - session.lastAccessed > this.ttlMs;
  }
}
