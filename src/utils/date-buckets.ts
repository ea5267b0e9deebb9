import { CONSTANTS, TrendPeriod } from '../config/constants';

export interface TimeBucket {
  key: string;
  label: string;
  start: Date;
}

const NAIVE_TIMESTAMP = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Parse a timestamp, reading values without a zone designator as UTC.
 */
export function parseTimestamp(value: string | Date): Date {
  if (value instanceof Date) return new Date(value.getTime());

  const trimmed = value.trim();
  if (NAIVE_TIMESTAMP.test(trimmed)) {
    return new Date(`${trimmed.replace(' ', 'T')}Z`);
  }
  // Date-only ISO strings are already parsed as UTC midnight
  return new Date(trimmed);
}

export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function toMonthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * CONSTANTS.MS_PER_DAY);
}

/**
 * Monday of the ISO week containing `date`.
 */
export function startOfIsoWeek(date: Date): Date {
  const day = startOfUtcDay(date);
  const offset = (day.getUTCDay() + 6) % 7;
  return addUtcDays(day, -offset);
}

export function startOfUtcMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

/**
 * Whole days elapsed from `earlier` to `later`, floored.
 */
export function wholeDaysBetween(later: Date, earlier: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / CONSTANTS.MS_PER_DAY);
}

export function bucketFor(date: Date, period: TrendPeriod): TimeBucket {
  switch (period) {
    case 'daily': {
      const start = startOfUtcDay(date);
      const key = toDateKey(start);
      return { key, label: key, start };
    }
    case 'weekly': {
      const start = startOfIsoWeek(date);
      const key = toDateKey(start);
      return { key, label: `${key}/${toDateKey(addUtcDays(start, 6))}`, start };
    }
    case 'monthly': {
      const start = startOfUtcMonth(date);
      const key = toMonthKey(start);
      return { key, label: key, start };
    }
  }
}
