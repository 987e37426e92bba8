/**
 * Time source and calendar helpers for transaction records
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that always returns the same instant; advance() moves it forward
 */
export class FixedClock implements Clock {
  private current: Date;

  constructor(start: Date | string) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  set(instant: Date | string): void {
    this.current = new Date(instant);
  }

  advance(milliseconds: number): void {
    this.current = new Date(this.current.getTime() + milliseconds);
  }
}

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some((weekday) => weekday === value);
}

export interface CalendarParts {
  /** YYYY-MM-DD in the given zone */
  date: string;
  weekday: Weekday;
  /** 1-12 */
  month: number;
}

/**
 * Split an instant into the calendar fields reports group by
 */
export function calendarParts(instant: Date, timeZone: string): CalendarParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    weekday: 'long',
  }).formatToParts(instant);

  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((entry) => entry.type === type)?.value ?? '';

  const weekday = part('weekday');
  if (!isWeekday(weekday)) {
    throw new Error(`Unexpected weekday name: ${weekday}`);
  }

  const month = part('month');

  return {
    date: `${part('year')}-${month}-${part('day')}`,
    weekday,
    month: Number(month),
  };
}
