import { type MonthDay } from './contact';

export const UPCOMING_BIRTHDAY_WINDOW_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Month/day pairs for every calendar date from `today` through
 * `today + windowDays`, both inclusive, computed in UTC.
 * In a non-leap year 28 February also stands in for 29 February.
 */
export function upcomingBirthdayDates(
  today: Date,
  windowDays: number = UPCOMING_BIRTHDAY_WINDOW_DAYS,
): MonthDay[] {
  const start = Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate());
  const dates: MonthDay[] = [];

  for (let offset = 0; offset <= windowDays; offset++) {
    const date = new Date(start + offset * DAY_MS);
    const month = date.getUTCMonth() + 1;
    const day = date.getUTCDate();
    dates.push({ month, day });
    if (month === 2 && day === 28 && !isLeapYear(date.getUTCFullYear())) {
      dates.push({ month: 2, day: 29 });
    }
  }

  return dates;
}
