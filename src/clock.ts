import { addDays, dateInTimeZone, isCalendarDate } from "./dates.js";
import type { CalendarDate } from "./types.js";

export interface Clock {
  /** The current calendar day in the user's reckoning. */
  today(): CalendarDate;
  /** The current instant, used for audit timestamps only. */
  now(): Date;
}

export class SystemClock implements Clock {
  constructor(private readonly timeZone: string = "UTC") {}

  today(): CalendarDate {
    return dateInTimeZone(new Date(), this.timeZone);
  }

  now(): Date {
    return new Date();
  }
}

/** A clock that stays on one day until told otherwise. */
export class FixedClock implements Clock {
  private current: CalendarDate;

  constructor(start: CalendarDate) {
    this.current = FixedClock.check(start);
  }

  today(): CalendarDate {
    return this.current;
  }

  now(): Date {
    return new Date(`${this.current}T12:00:00.000Z`);
  }

  set(date: CalendarDate): void {
    this.current = FixedClock.check(date);
  }

  advance(days = 1): CalendarDate {
    this.current = addDays(this.current, days);
    return this.current;
  }

  private static check(date: CalendarDate): CalendarDate {
    if (!isCalendarDate(date)) throw new Error(`Invalid calendar date: "${date}"`);
    return date;
  }
}
