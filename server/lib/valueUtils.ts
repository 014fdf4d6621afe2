import type { CellValue } from '../shared/queryTypes.js';
import type { JsonCell } from '../shared/schema.js';

/**
 * Missing means null, undefined, empty/blank string, NaN or an invalid Date
 */
export function isMissing(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  if (value instanceof Date) return Number.isNaN(value.getTime());
  return false;
}

/**
 * Best-effort numeric coercion. Thousands separators and a leading currency
 * symbol are stripped; anything else that is not a plain number yields null.
 */
export function toNumber(value: CellValue | undefined): number | null {
  if (isMissing(value)) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const cleaned = value.trim().replace(/^\$/, '').replace(/,/g, '');
  if (cleaned === '' || !/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(cleaned)) {
    return null;
  }
  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
}

/**
 * Stable string key for grouping, uniqueness and equality checks
 */
export function cellKey(value: CellValue | undefined): string | null {
  if (isMissing(value)) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Ordering used by sorting and group ordering. Missing values are the
 * caller's concern; here numbers compare numerically, dates by time and
 * everything else by code-unit order.
 */
export function compareCells(a: CellValue | undefined, b: CellValue | undefined): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  const left = cellKey(a) ?? '';
  const right = cellKey(b) ?? '';
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function toJsonCell(value: CellValue | undefined): JsonCell {
  if (isMissing(value)) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'number') return value;
  return String(value);
}

export function formatNumber(value: number, fractionDigits = 2): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
  });
}

export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
