/**
 * Whole-word keyword matching for question text
 */

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `keyword` (optionally pluralized with a trailing "s") appears as
 * whole words in `text`. Multi-word keywords tolerate any whitespace run.
 */
export function hasKeyword(text: string, keyword: string): boolean {
  const pattern = keyword.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`\\b${pattern}s?\\b`, 'i').test(text);
}

export function hasAnyKeyword(text: string, keywords: readonly string[]): boolean {
  return keywords.some(keyword => hasKeyword(text, keyword));
}

export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(word => word.length > 0).length;
}
