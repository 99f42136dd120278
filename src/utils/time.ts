/**
 * Time zone aware date helpers
 * All timestamps are epoch milliseconds.
 */

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function wallClockParts(epochMs: number, timeZone: string): Record<string, number> {
  const parts: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(new Date(epochMs))) {
    if (part.type !== 'literal') {
      parts[part.type] = parseInt(part.value, 10);
    }
  }
  return parts;
}

/**
 * Offset of the zone from UTC at the given instant, in minutes
 */
export function getTimezoneOffset(epochMs: number, timeZone: string): number {
  const wholeSeconds = Math.floor(epochMs / 1000) * 1000;
  const p = wallClockParts(wholeSeconds, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return Math.round((asUtc - wholeSeconds) / 60000);
}

/**
 * Format a timestamp in XMLTV format: YYYYMMDDHHmmss +ZZZZ
 * Example: 20260219000000 +0330
 */
export function formatXMLTVTime(epochMs: number, timeZone: string): string {
  const offset = getTimezoneOffset(epochMs, timeZone);
  const local = new Date(epochMs + offset * 60000);

  const year = local.getUTCFullYear();
  const month = String(local.getUTCMonth() + 1).padStart(2, '0');
  const day = String(local.getUTCDate()).padStart(2, '0');
  const hours = String(local.getUTCHours()).padStart(2, '0');
  const minutes = String(local.getUTCMinutes()).padStart(2, '0');
  const seconds = String(local.getUTCSeconds()).padStart(2, '0');

  const sign = offset >= 0 ? '+' : '-';
  const tzHours = String(Math.floor(Math.abs(offset) / 60)).padStart(2, '0');
  const tzMinutes = String(Math.abs(offset) % 60).padStart(2, '0');

  return `${year}${month}${day}${hours}${minutes}${seconds} ${sign}${tzHours}${tzMinutes}`;
}

export function calendarDateIn(epochMs: number, timeZone: string): CalendarDate {
  const p = wallClockParts(epochMs, timeZone);
  return { year: p.year, month: p.month, day: p.day };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/** YYYY-MM-DD */
export function formatCalendarDate(date: CalendarDate): string {
  return [
    String(date.year),
    String(date.month).padStart(2, '0'),
    String(date.day).padStart(2, '0'),
  ].join('-');
}

/**
 * Instant at which the zone's wall clock shows the given date and time
 */
export function zonedTimeToEpoch(
  date: CalendarDate,
  hour: number,
  minute: number,
  timeZone: string
): number {
  const guess = Date.UTC(date.year, date.month - 1, date.day, hour, minute);
  const first = guess - getTimezoneOffset(guess, timeZone) * 60000;
  // Second pass settles instants near an offset change
  return guess - getTimezoneOffset(first, timeZone) * 60000;
}
