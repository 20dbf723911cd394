/**
 * Calendar helpers bound to an IANA time zone (partitions and display timestamps).
 */

export interface Period {
  /** 4-digit year */
  year: string;
  /** 2-digit month, 01–12 */
  month: string;
  /** 2-digit day */
  day: string;
}

const partFormatters = new Map<string, Intl.DateTimeFormat>();
const displayFormatters = new Map<string, Intl.DateTimeFormat>();

function partsFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = partFormatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' });
    partFormatters.set(timeZone, fmt);
  }
  return fmt;
}

function displayFormatter(timeZone: string): Intl.DateTimeFormat {
  let fmt = displayFormatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: 'short',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hour12: true
    });
    displayFormatters.set(timeZone, fmt);
  }
  return fmt;
}

function pick(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): string {
  return parts.find((p) => p.type === type)?.value ?? '';
}

export function periodOf(date: Date, timeZone: string): Period {
  const parts = partsFormatter(timeZone).formatToParts(date);
  return { year: pick(parts, 'year'), month: pick(parts, 'month'), day: pick(parts, 'day') };
}

/** YYYY-MM-DD in the given zone */
export function dayKey(date: Date, timeZone: string): string {
  const { year, month, day } = periodOf(date, timeZone);
  return `${year}-${month}-${day}`;
}

/** "15 Jan 2025, 03:30 PM" */
export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = displayFormatter(timeZone).formatToParts(date);
  return `${pick(parts, 'day')} ${pick(parts, 'month')} ${pick(parts, 'year')}, ${pick(parts, 'hour')}:${pick(parts, 'minute')} ${pick(parts, 'dayPeriod')}`;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
