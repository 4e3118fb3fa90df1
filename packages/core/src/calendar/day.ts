/**
 * Calendar-day identity. A Day is the number of days since 1970-01-01 in the
 * local calendar, so timestamps on the same local day map to the same value
 * and day arithmetic is plain integer arithmetic.
 */

const MS_PER_DAY = 86_400_000;

/** yyyy-MM-dd pattern */
const ISO_DAY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export type Day = number;

export const Weekday = {
  Sunday: 1,
  Monday: 2,
  Tuesday: 3,
  Wednesday: 4,
  Thursday: 5,
  Friday: 6,
  Saturday: 7,
} as const;

export type Weekday = (typeof Weekday)[keyof typeof Weekday];

export const WeekdayName: Record<Weekday, string> = {
  [Weekday.Sunday]: 'Sun',
  [Weekday.Monday]: 'Mon',
  [Weekday.Tuesday]: 'Tue',
  [Weekday.Wednesday]: 'Wed',
  [Weekday.Thursday]: 'Thu',
  [Weekday.Friday]: 'Fri',
  [Weekday.Saturday]: 'Sat',
};

/** Lowercase names and abbreviations accepted wherever a weekday is typed */
const WEEKDAY_NAMES: Readonly<Record<string, Weekday>> = {
  sun: Weekday.Sunday, sunday: Weekday.Sunday,
  mon: Weekday.Monday, monday: Weekday.Monday,
  tue: Weekday.Tuesday, tues: Weekday.Tuesday, tuesday: Weekday.Tuesday,
  wed: Weekday.Wednesday, wednesday: Weekday.Wednesday,
  thu: Weekday.Thursday, thur: Weekday.Thursday, thurs: Weekday.Thursday, thursday: Weekday.Thursday,
  fri: Weekday.Friday, friday: Weekday.Friday,
  sat: Weekday.Saturday, saturday: Weekday.Saturday,
};

/** "mon", "Monday", "thurs", ... or null */
export function weekdayFromName(name: string): Weekday | null {
  return WEEKDAY_NAMES[name.trim().toLowerCase()] ?? null;
}

export function isWeekday(n: number): n is Weekday {
  return Number.isInteger(n) && n >= 1 && n <= 7;
}

/** Build a Day from calendar parts (month is 1-based) */
export function dayFromParts(year: number, month: number, dayOfMonth: number): Day {
  return Math.round(Date.UTC(year, month - 1, dayOfMonth) / MS_PER_DAY);
}

/** Project a timestamp onto its local calendar day */
export function dayOf(timestamp: Date | string | number): Day {
  const d = timestamp instanceof Date ? timestamp : new Date(timestamp);
  return dayFromParts(d.getFullYear(), d.getMonth() + 1, d.getDate());
}

/** Parse yyyy-MM-dd into a Day. Rejects impossible dates like 2026-02-30. */
export function dayFromIso(input: string): Day | null {
  const m = ISO_DAY_RE.exec(input.trim());
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const date = Number(m[3]);
  if (month < 1 || month > 12 || date < 1 || date > daysInMonth(year, month)) return null;
  return dayFromParts(year, month, date);
}

function utc(day: Day): Date {
  return new Date(day * MS_PER_DAY);
}

/** Format a Day as yyyy-MM-dd */
export function formatDay(day: Day): string {
  const d = utc(day);
  const y = d.getUTCFullYear();
  const m = String(d.getUTCMonth() + 1).padStart(2, '0');
  const date = String(d.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${date}`;
}

/** Local midnight of the given day */
export function toDate(day: Day): Date {
  return new Date(yearOf(day), monthOf(day) - 1, dayOfMonth(day));
}

export function addDays(day: Day, n: number): Day {
  return day + n;
}

/** Signed number of days from `from` to `through` */
export function daysBetween(from: Day, through: Day): number {
  return through - from;
}

/** Weekdays in order starting from day 0 (1970-01-01, a Thursday) */
const EPOCH_WEEK: readonly Weekday[] = [
  Weekday.Thursday, Weekday.Friday, Weekday.Saturday, Weekday.Sunday,
  Weekday.Monday, Weekday.Tuesday, Weekday.Wednesday,
];

/** 1 = Sunday ... 7 = Saturday */
export function weekdayOf(day: Day): Weekday {
  return EPOCH_WEEK[((day % 7) + 7) % 7]!;
}

export function dayOfMonth(day: Day): number {
  return utc(day).getUTCDate();
}

/** 1..12 */
export function monthOf(day: Day): number {
  return utc(day).getUTCMonth() + 1;
}

export function yearOf(day: Day): number {
  return utc(day).getUTCFullYear();
}

export function startOfMonth(day: Day): Day {
  return dayFromParts(yearOf(day), monthOf(day), 1);
}

/** First day of the month `n` months away from the month containing `day` */
export function addMonths(day: Day, n: number): Day {
  return dayFromParts(yearOf(day), monthOf(day) + n, 1);
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Inclusive range of days, empty when through < from */
export function dayRange(from: Day, through: Day): Day[] {
  const days: Day[] = [];
  for (let d = from; d <= through; d++) days.push(d);
  return days;
}
