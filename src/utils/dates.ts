import { ValidationError } from '../errors';

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2}))?$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    // en-CA formats as YYYY-MM-DD
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/** Calendar date (YYYY-MM-DD) of an instant as seen in the given zone. */
export function calendarDate(instant: Date, timeZone: string): string {
  return formatterFor(timeZone).format(instant);
}

export function isCalendarDate(value: string): boolean {
  const match = DATE_ONLY.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const probe = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return probe.getUTCFullYear() === Number(y) &&
    probe.getUTCMonth() === Number(m) - 1 &&
    probe.getUTCDate() === Number(d);
}

export function assertCalendarDate(value: string, field: string = 'date'): string {
  if (!isCalendarDate(value)) {
    throw new ValidationError(`Invalid ${field}: expected YYYY-MM-DD`, { field, value });
  }
  return value;
}

/**
 * Parses an ISO 8601 timestamp or the compact YYYYMMDD / YYYYMMDDTHHMM form
 * (compact forms are read as UTC).
 */
export function parseTimestamp(value: string, field: string = 'time'): Date {
  const compact = COMPACT.exec(value);
  if (compact) {
    const [, y, mo, d, h, mi] = compact;
    const parsed = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h ?? 0), Number(mi ?? 0)));
    if (parsed.getUTCMonth() === Number(mo) - 1 && parsed.getUTCDate() === Number(d)) {
      return parsed;
    }
  } else {
    const ms = Date.parse(value);
    if (!Number.isNaN(ms)) return new Date(ms);
  }
  throw new ValidationError(`Invalid ${field}: ${value}`, { field, value });
}

export interface TimeRange {
  from: Date;
  to: Date;
}

/**
 * Resolves optional range bounds. A missing `to` is now, a missing `from`
 * is `defaultDays` before `to`.
 */
export function resolveTimeRange(
  from: string | undefined,
  to: string | undefined,
  defaultDays: number,
  now: Date = new Date(),
): TimeRange {
  const end = to ? parseTimestamp(to, 'to') : now;
  const start = from ? parseTimestamp(from, 'from') : new Date(end.getTime() - defaultDays * 86_400_000);
  if (start.getTime() > end.getTime()) {
    throw new ValidationError('Invalid time range: from is after to', {
      from: start.toISOString(),
      to: end.toISOString(),
    });
  }
  return { from: start, to: end };
}
