/**
 * A snapshot time: an absolute instant plus the UTC offset (in minutes) of the
 * time zone it was recorded in.
 *
 * The offset only decides where calendar days, months and years are split.
 * Snapshots are always ordered by their instant.
 */
export interface Timestamp {
  readonly instant: Date;
  readonly offset: number;
}

/** A bare Date is taken as UTC. */
export type TimeInput = Date | Timestamp;

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function toTimestamp(time: TimeInput): Timestamp {
  return time instanceof Date ? { instant: time, offset: 0 } : time;
}

export function timestampInOffset(instant: Date, offset: number): Timestamp {
  return { instant, offset };
}

/**
 * Place an instant in the host time zone, using the offset in effect at that
 * instant (so DST is honoured per snapshot).
 */
export function localTimestamp(instant: Date): Timestamp {
  return { instant, offset: 0 - instant.getTimezoneOffset() };
}

/**
 * The wall clock time of a timestamp, expressed as a Date whose UTC fields are
 * the local fields.
 */
export function wallClock(time: Timestamp): Date {
  return new Date(time.instant.getTime() + time.offset * MINUTE_MS);
}

function fromWallClock(wall: Date, offset: number): Timestamp {
  return { instant: new Date(wall.getTime() - offset * MINUTE_MS), offset };
}

export function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month + 1, 0);
  return date.getUTCDate();
}

export function subtractMilliseconds(time: Timestamp, ms: number): Timestamp {
  return { instant: new Date(time.instant.getTime() - ms), offset: time.offset };
}

export function subtractDays(time: Timestamp, days: number): Timestamp {
  // the offset is fixed, so a calendar day is always 24h of wall clock
  return fromWallClock(new Date(wallClock(time).getTime() - days * DAY_MS), time.offset);
}

/**
 * Subtract calendar months. A day of month the target month lacks rolls over
 * into the following month (Jan 31 minus two months is Dec 1).
 */
export function subtractMonths(time: Timestamp, months: number): Timestamp {
  const wall = wallClock(time);
  const shifted = new Date(wall.getTime());
  shifted.setUTCFullYear(wall.getUTCFullYear(), wall.getUTCMonth() - months, wall.getUTCDate());
  return fromWallClock(shifted, time.offset);
}

export function subtractYears(time: Timestamp, years: number): Timestamp {
  return subtractMonths(time, years * 12);
}

/**
 * Formats a timestamp in its own offset, e.g. "Sun 2013 Sep  8 23:33:14".
 */
export function formatTimestamp(time: Timestamp): string {
  const wall = wallClock(time);
  const pad = (n: number) => String(n).padStart(2, '0');
  return [
    WEEKDAYS[wall.getUTCDay()],
    wall.getUTCFullYear(),
    MONTHS[wall.getUTCMonth()],
    String(wall.getUTCDate()).padStart(2, ' '),
    `${pad(wall.getUTCHours())}:${pad(wall.getUTCMinutes())}:${pad(wall.getUTCSeconds())}`
  ].join(' ');
}
