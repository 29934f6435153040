import { InvalidQueryError } from '../models/Errors';

export interface DateRange {
  /** Inclusive, YYYY-MM-DD */
  startDate: string;
  /** Inclusive, YYYY-MM-DD */
  endDate: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parse YYYY-MM-DD as a UTC midnight timestamp. Rejects impossible dates
 * such as 2024-02-30.
 */
export function parseIsoDate(value: string): number {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new InvalidQueryError(`Expected a YYYY-MM-DD date, got "${value}"`);
  }
  const [, y, m, d] = match;
  const year = parseInt(y, 10);
  const month = parseInt(m, 10);
  const day = parseInt(d, 10);
  const ts = Date.UTC(year, month - 1, day);
  const check = new Date(ts);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new InvalidQueryError(`Not a calendar date: "${value}"`);
  }
  return ts;
}

export function formatIsoDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

export function validateDateRange(range: DateRange): DateRange {
  const start = parseIsoDate(range.startDate);
  const end = parseIsoDate(range.endDate);
  if (start > end) {
    throw new InvalidQueryError(`Start date ${range.startDate} is after end date ${range.endDate}`);
  }
  return range;
}

/**
 * Split an inclusive range into consecutive inclusive chunks of at most
 * `chunkDays` days.
 */
export function splitDateRange(range: DateRange, chunkDays: number): DateRange[] {
  if (!Number.isInteger(chunkDays) || chunkDays < 1) {
    throw new InvalidQueryError(`Chunk size must be a positive whole number of days, got ${chunkDays}`);
  }
  validateDateRange(range);

  const end = parseIsoDate(range.endDate);
  const chunks: DateRange[] = [];
  let cursor = parseIsoDate(range.startDate);

  while (cursor <= end) {
    const chunkEnd = Math.min(cursor + (chunkDays - 1) * MS_PER_DAY, end);
    chunks.push({ startDate: formatIsoDate(cursor), endDate: formatIsoDate(chunkEnd) });
    cursor = chunkEnd + MS_PER_DAY;
  }

  return chunks;
}
