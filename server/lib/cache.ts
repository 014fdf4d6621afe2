import type { SchemaAnalysis } from '../shared/schema.js';

/**
 * Cache entry interface
 */
interface CacheEntry {
  modifiedAt: number;
  value: SchemaAnalysis;
  createdAt: number;
}

/**
 * In-memory cache for schema analyses.
 * Key format: filePath_modifiedAt. At most one entry is kept per path;
 * a lookup with a newer modification marker evicts the stale entry.
 */
export class AnalysisCache {
  private cache: Map<string, CacheEntry> = new Map();

  /**
   * Generate cache key from components
   */
  generateCacheKey(filePath: string, modifiedAt: number): string {
    return `${filePath}_${modifiedAt}`;
  }

  get(filePath: string, modifiedAt: number): SchemaAnalysis | null {
    const entry = this.cache.get(filePath);
    if (!entry) {
      return null;
    }

    if (entry.modifiedAt !== modifiedAt) {
      this.cache.delete(filePath);
      console.log(`🗑️ File changed, dropped cached analysis: ${this.generateCacheKey(filePath, entry.modifiedAt)}`);
      return null;
    }

    console.log(`✅ Using cached schema analysis: ${this.generateCacheKey(filePath, modifiedAt)}`);
    return entry.value;
  }

  set(filePath: string, modifiedAt: number, value: SchemaAnalysis): void {
    this.cache.set(filePath, {
      modifiedAt,
      value,
      createdAt: Date.now(),
    });
    console.log(`💾 Cached schema analysis: ${this.generateCacheKey(filePath, modifiedAt)}`);
  }

  invalidate(filePath: string): void {
    this.cache.delete(filePath);
  }

  /**
   * Clear all cache entries
   */
  clear(): void {
    const size = this.cache.size;
    this.cache.clear();
    console.log(`🗑️ Cleared ${size} cache entries`);
  }

  /**
   * Get cache statistics
   */
  getStats(): { size: number; keys: string[] } {
    return {
      size: this.cache.size,
      keys: Array.from(this.cache.entries()).map(([filePath, entry]) => this.generateCacheKey(filePath, entry.modifiedAt)),
    };
  }
}
