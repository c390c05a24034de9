import { format, isValid, parse } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

const ISO_DATE = 'yyyy-MM-dd';

/** Returns today's date as YYYY-MM-DD in the local timezone. */
export function todayDateString(now: Date = new Date()): string {
  return format(now, ISO_DATE);
}

export function isIsoDate(raw: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(raw) && isValid(parse(raw, ISO_DATE, new Date()));
}

/** Formats an ISO timestamp as an Eastern wall-clock time, e.g. "7:05 PM". Empty in, empty out. */
export function toEasternTime(isoTimestamp: string | null | undefined): string {
  if (!isoTimestamp) return '';
  const instant = new Date(isoTimestamp);
  if (!isValid(instant)) return '';
  return formatInTimeZone(instant, 'America/New_York', 'h:mm a');
}
