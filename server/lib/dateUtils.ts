/**
 * Date normalization utilities for ledger exports.
 * All dates are built in UTC so that parsing and quarter math do not
 * depend on the server's timezone.
 */
import type { CellValue, TimeUnit, TimeWindow } from '../shared/queryTypes.js';

const MONTH_NAMES: { [key: string]: number } = {
  'jan': 0, 'january': 0,
  'feb': 1, 'february': 1,
  'mar': 2, 'march': 2,
  'apr': 3, 'april': 3,
  'may': 4,
  'jun': 5, 'june': 5,
  'jul': 6, 'july': 6,
  'aug': 7, 'august': 7,
  'sep': 8, 'september': 8, 'sept': 8,
  'oct': 9, 'october': 9,
  'nov': 10, 'november': 10,
  'dec': 11, 'december': 11
};

// Approximate unit lengths used by relative-date filters
export const UNIT_DAYS: Record<TimeUnit, number> = {
  day: 1,
  week: 7,
  month: 30,
  quarter: 90,
  year: 365,
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function expandYear(year: number): number {
  if (year >= 100) return year;
  // Common convention: 00-30 = 2000-2030, 31-99 = 1931-1999
  return year <= 30 ? 2000 + year : 1900 + year;
}

function buildUtcDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | null {
  if (year < 1900 || year > 2100 || month < 0 || month > 11 || day < 1 || day > 31) {
    return null;
  }
  const date = new Date(Date.UTC(year, month, day, hours, minutes, seconds));
  // Rejects rollovers such as 31 April
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parses the date shapes found in accounting exports:
 * - ISO "2024-01-15", "2024-01-15T10:30:00", "2024/01/15"
 * - "15.01.2024" (day first), "20240115"
 * - "15-01-2024" / "01/15/2024" (day or month first, decided by which part exceeds 12)
 * - "Jan 15, 2024", "15 January 2024", "Jan-24", "January 2024"
 * Numbers are never treated as dates.
 */
export function parseFlexibleDate(value: CellValue | undefined): Date | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') return null;

  const str = value.trim();
  if (!str) return null;

  const isoMatch = str.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T\s](\d{1,2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)?$/);
  if (isoMatch) {
    return buildUtcDate(
      parseInt(isoMatch[1], 10),
      parseInt(isoMatch[2], 10) - 1,
      parseInt(isoMatch[3], 10),
      isoMatch[4] ? parseInt(isoMatch[4], 10) : 0,
      isoMatch[5] ? parseInt(isoMatch[5], 10) : 0,
      isoMatch[6] ? parseInt(isoMatch[6], 10) : 0,
    );
  }

  const compactMatch = str.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (compactMatch) {
    return buildUtcDate(
      parseInt(compactMatch[1], 10),
      parseInt(compactMatch[2], 10) - 1,
      parseInt(compactMatch[3], 10),
    );
  }

  const dotMatch = str.match(/^(\d{1,2})\.(\d{1,2})\.(\d{2,4})$/);
  if (dotMatch) {
    return buildUtcDate(
      expandYear(parseInt(dotMatch[3], 10)),
      parseInt(dotMatch[2], 10) - 1,
      parseInt(dotMatch[1], 10),
    );
  }

  const separatedMatch = str.match(/^(\d{1,2})[-/](\d{1,2})[-/](\d{2,4})$/);
  if (separatedMatch) {
    const part1 = parseInt(separatedMatch[1], 10);
    const part2 = parseInt(separatedMatch[2], 10);
    const year = expandYear(parseInt(separatedMatch[3], 10));
    if (part2 > 12) {
      // MM-DD-YYYY (second part > 12, so it must be day)
      return buildUtcDate(year, part1 - 1, part2);
    }
    // DD-MM-YYYY, also the default when ambiguous
    return buildUtcDate(year, part2 - 1, part1);
  }

  const monthDayYear = str.match(/^([A-Za-z]{3,})\.?\s+(\d{1,2}),?\s+(\d{4})$/);
  if (monthDayYear) {
    const month = MONTH_NAMES[monthDayYear[1].toLowerCase()];
    if (month === undefined) return null;
    return buildUtcDate(parseInt(monthDayYear[3], 10), month, parseInt(monthDayYear[2], 10));
  }

  const dayMonthYear = str.match(/^(\d{1,2})[\s-]([A-Za-z]{3,})[\s-](\d{4})$/);
  if (dayMonthYear) {
    const month = MONTH_NAMES[dayMonthYear[2].toLowerCase()];
    if (month === undefined) return null;
    return buildUtcDate(parseInt(dayMonthYear[3], 10), month, parseInt(dayMonthYear[1], 10));
  }

  const monthYear = str.match(/^([A-Za-z]{3,})[-\s/]?(\d{2,4})$/);
  if (monthYear) {
    const month = MONTH_NAMES[monthYear[1].toLowerCase()];
    if (month === undefined) return null;
    return buildUtcDate(expandYear(parseInt(monthYear[2], 10)), month, 1);
  }

  return null;
}

export function getQuarter(date: Date): number {
  return Math.floor(date.getUTCMonth() / 3) + 1;
}

export function daysBetween(start: Date, end: Date): number {
  return Math.floor((end.getTime() - start.getTime()) / MS_PER_DAY);
}

export function subtractUnits(now: Date, amount: number, unit: TimeUnit): Date {
  return new Date(now.getTime() - amount * UNIT_DAYS[unit] * MS_PER_DAY);
}

/**
 * The calendar quarter that ended before the one containing `now`
 */
export function previousQuarter(now: Date): TimeWindow {
  const current = getQuarter(now);
  const year = now.getUTCFullYear();
  return current === 1 ? { quarter: 4, year: year - 1 } : { quarter: current - 1, year };
}

export function currentQuarter(now: Date): TimeWindow {
  return { quarter: getQuarter(now), year: now.getUTCFullYear() };
}

export function isInQuarter(date: Date, window: TimeWindow): boolean {
  if (getQuarter(date) !== window.quarter) return false;
  return window.year === null || date.getUTCFullYear() === window.year;
}
