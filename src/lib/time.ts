import { format, isValid, parseISO } from 'date-fns';

/**
 * The run's "now". Created once at startup and passed to every
 * stage so all rows of a run share the same timestamp and the same reference date.
 */
export interface RunClock {
  /** UTC instant truncated to whole seconds, e.g. `2024-03-15T09:30:00Z`. */
  processedAt: string;
  /** UTC calendar date of {@link processedAt}, `yyyy-MM-dd`. */
  processingDate: string;
}

export function createRunClock(now: Date = new Date()): RunClock {
  const iso = now.toISOString();
  return {
    processedAt: `${iso.slice(0, 19)}Z`,
    processingDate: iso.slice(0, 10)
  };
}

const DATE_PATTERN =
  /^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parses a calendar date (`yyyy-M-d`, zero padding optional, `-`, `/` or `.` between the parts)
 * and returns it as `yyyy-MM-dd`, or null when the text is not a real date. A trailing time of
 * day is dropped.
 */
export function toIsoDate(value: string): string | null {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, , month, day] = match;
  const padded = `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
  const parsed = parseISO(padded);
  if (!isValid(parsed) || format(parsed, 'yyyy-MM-dd') !== padded) {
    return null;
  }
  return padded;
}

export function monthStart(isoDate: string): string {
  return `${isoDate.slice(0, 7)}-01`;
}
