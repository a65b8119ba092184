/**
 * Calendar date utilities. Single source of truth for all date arithmetic.
 *
 * Birthdays are plain calendar dates with no time of day and no zone, so
 * they are modelled as { year, month, day } and all arithmetic goes through
 * a UTC day number. Only "today" depends on a timezone; it comes from
 * config and falls back to the system zone when not set.
 */

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Validity
// ---------------------------------------------------------------------------

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidDate(year: number, month: number, day: number): boolean {
  if (![year, month, day].every(Number.isInteger)) return false;
  if (year < 1 || month < 1 || month > 12 || day < 1) return false;
  return day <= daysInMonth(year, month);
}

// ---------------------------------------------------------------------------
// Arithmetic
// ---------------------------------------------------------------------------

/**
 * Days since 1970-01-01. setUTCFullYear is used instead of Date.UTC because
 * Date.UTC maps years 0-99 onto 1900-1999.
 */
function toDayNumber(date: CalendarDate): number {
  const d = new Date(0);
  d.setUTCFullYear(date.year, date.month - 1, date.day);
  return Math.round(d.getTime() / MS_PER_DAY);
}

function fromDayNumber(dayNumber: number): CalendarDate {
  const d = new Date(dayNumber * MS_PER_DAY);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromDayNumber(toDayNumber(date) + days);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function diffInDays(to: CalendarDate, from: CalendarDate): number {
  return toDayNumber(to) - toDayNumber(from);
}

/** Day of week with Monday = 0 and Sunday = 6. */
export function weekday(date: CalendarDate): number {
  const sundayFirst = new Date(toDayNumber(date) * MS_PER_DAY).getUTCDay();
  return (sundayFirst + 6) % 7;
}

/**
 * Move a date into another year. 29 February lands on 28 February when the
 * target year is not a leap year.
 */
export function withYear(date: CalendarDate, year: number): CalendarDate {
  const day = Math.min(date.day, daysInMonth(year, date.month));
  return { year, month: date.month, day };
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Format as "DD.MM.YYYY", the only date format the console speaks.
 */
export function formatDate(date: CalendarDate): string {
  const dd = String(date.day).padStart(2, "0");
  const mm = String(date.month).padStart(2, "0");
  const yyyy = String(date.year).padStart(4, "0");
  return `${dd}.${mm}.${yyyy}`;
}

// ---------------------------------------------------------------------------
// Today
// ---------------------------------------------------------------------------

/**
 * Return the system's IANA timezone, e.g. "Europe/Kyiv".
 */
export function systemTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * The calendar date it is in `timezone` at the instant `now`.
 *
 * The 'sv-SE' locale formats dates as "YYYY-MM-DD", which splits cleanly
 * without locale-dependent part ordering.
 */
export function todayIn(timezone: string, now: Date = new Date()): CalendarDate {
  const ymd = now.toLocaleDateString("sv-SE", { timeZone: timezone });
  const [year, month, day] = ymd.split("-").map((part) => parseInt(part, 10));
  return { year, month, day };
}
