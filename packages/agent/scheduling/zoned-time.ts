import { addDays, setHours, startOfDay } from 'date-fns';
import { fromZonedTime, toZonedTime } from 'date-fns-tz';

/** Wall-clock hour (0-23) of `at` in `timeZone`. */
export function hourInZone(at: Date, timeZone: string): number {
  return toZonedTime(at, timeZone).getHours();
}

/**
 * The instant at `hour`:00 on the calendar day of `at` in `timeZone`,
 * shifted by `dayOffset` days. Hour 24 is midnight of the following day.
 */
export function atHourOfDay(at: Date, hour: number, timeZone: string, dayOffset = 0): Date {
  const day = addDays(startOfDay(toZonedTime(at, timeZone)), dayOffset);
  return fromZonedTime(setHours(day, hour), timeZone);
}
