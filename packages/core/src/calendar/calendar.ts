import { dayOf, Weekday } from './day.js';
import type { Day } from './day.js';

/**
 * The calendar/locale collaborator: what "today" is and where the week
 * starts. Injected everywhere so results are reproducible against fixed dates.
 */
export interface CalendarContext {
  today(): Day;
  readonly firstWeekday: Weekday;
}

/** Calendar backed by the process clock and local time zone */
export function systemCalendar(firstWeekday: Weekday = Weekday.Monday): CalendarContext {
  return {
    today: () => dayOf(new Date()),
    firstWeekday,
  };
}

/** Calendar pinned to a single day */
export function fixedCalendar(today: Day, firstWeekday: Weekday = Weekday.Monday): CalendarContext {
  return {
    today: () => today,
    firstWeekday,
  };
}

/** The seven weekdays in display order, starting from `firstWeekday` */
export function orderedWeekdays(firstWeekday: Weekday): Weekday[] {
  const order: Weekday[] = [];
  let w: Weekday = firstWeekday;
  for (let i = 0; i < 7; i++) {
    order.push(w);
    w = nextWeekday(w);
  }
  return order;
}

function nextWeekday(w: Weekday): Weekday {
  switch (w) {
    case Weekday.Sunday: return Weekday.Monday;
    case Weekday.Monday: return Weekday.Tuesday;
    case Weekday.Tuesday: return Weekday.Wednesday;
    case Weekday.Wednesday: return Weekday.Thursday;
    case Weekday.Thursday: return Weekday.Friday;
    case Weekday.Friday: return Weekday.Saturday;
    case Weekday.Saturday: return Weekday.Sunday;
  }
}
