/**
 * Wall-clock helpers for strategic slots. Slots are defined in a local
 * timezone but stored and sent to SocialBu as UTC instants.
 */

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface ZonedParts extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
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

/**
 * Throws a RangeError for unknown zones
 */
export function assertTimeZone(timeZone: string): void {
  formatterFor(timeZone);
}

/**
 * Wall-clock reading of `date` in `timeZone`
 */
export function zonedParts(date: Date, timeZone: string): ZonedParts {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      values[part.type] = parseInt(part.value, 10);
    }
  }

  return {
    year: values.year,
    month: values.month,
    day: values.day,
    hour: values.hour,
    minute: values.minute,
    second: values.second,
  };
}

function offsetMs(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(date.getTime() / 1000) * 1000;
}

/**
 * UTC instant of a wall-clock time in `timeZone`
 */
export function zonedTimeToUtc(
  date: CalendarDate,
  hour: number,
  minute: number,
  timeZone: string
): Date {
  const guess = Date.UTC(date.year, date.month - 1, date.day, hour, minute);
  const offset = offsetMs(new Date(guess), timeZone);
  const candidate = guess - offset;

  // Offset can differ on the far side of a DST change
  const corrected = offsetMs(new Date(candidate), timeZone);
  return new Date(corrected === offset ? candidate : guess - corrected);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

export function parseTimeOfDay(value: string): { hour: number; minute: number } {
  const [hour, minute] = value.split(':').map((n) => parseInt(n, 10));
  return { hour, minute };
}

/**
 * SocialBu publish_at format: YYYY-MM-DD HH:MM:SS in UTC
 */
export function formatPublishAt(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function parsePublishAt(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?/.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s] = match;
  const date = new Date(Date.UTC(+y, +mo - 1, +d, +h, +mi, s ? +s : 0));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Local wall-clock label for logs and CLI output
 */
export function formatLocal(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${p.year}-${pad(p.month)}-${pad(p.day)} ${pad(p.hour)}:${pad(p.minute)}`;
}
