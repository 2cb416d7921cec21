import { addHours, getDaysInMonth } from 'date-fns';
import { fromZonedTime, toZonedTime } from 'date-fns-tz';
import { ParseError, ValidationError } from '@timekeeper/types';

export const RECURRENCE_FREQUENCIES = ['none', 'daily', 'weekly', 'monthly'] as const;
export type RecurrenceFrequency = (typeof RECURRENCE_FREQUENCIES)[number];

export interface Occurrence {
  start: Date;
  end: Date;
}

const ALIASES = new Map<string, RecurrenceFrequency>([
  ['day', 'daily'],
  ['daily', 'daily'],
  ['every day', 'daily'],
  ['each day', 'daily'],
  ['week', 'weekly'],
  ['weekly', 'weekly'],
  ['every week', 'weekly'],
  ['each week', 'weekly'],
  ['month', 'monthly'],
  ['monthly', 'monthly'],
  ['every month', 'monthly'],
  ['each month', 'monthly'],
  ['none', 'none'],
  ['no', 'none'],
  ['never', 'none'],
]);

/**
 * Normalizes the usual spellings ("day", "every week", "never", ...) to a frequency.
 *
 * @throws ParseError for anything else
 */
export function parseRecurrenceFrequency(value: string): RecurrenceFrequency {
  const key = value.trim().toLowerCase();
  const frequency = ALIASES.get(key);
  if (!frequency) {
    throw new ParseError(
      value,
      `Invalid recurrence frequency: '${value}'. Valid values are: ${RECURRENCE_FREQUENCIES.map((f) => `'${f}'`).join(', ')}`,
    );
  }
  return frequency;
}

/**
 * Same wall-clock time one month later in `timeZone`. A day-of-month the
 * target month lacks is clamped to its last day.
 */
function nextMonthStart(previous: Date, timeZone: string): Date {
  const wall = toZonedTime(previous, timeZone);
  const month = wall.getMonth();
  const year = month === 11 ? wall.getFullYear() + 1 : wall.getFullYear();
  const targetMonth = (month + 1) % 12;
  const lastDay = getDaysInMonth(new Date(year, targetMonth, 1));
  const day = wall.getDate() <= lastDay ? wall.getDate() : lastDay;
  const next = new Date(
    year,
    targetMonth,
    day,
    wall.getHours(),
    wall.getMinutes(),
    wall.getSeconds(),
    wall.getMilliseconds(),
  );
  return fromZonedTime(next, timeZone);
}

function successor(previous: Occurrence, frequency: Exclude<RecurrenceFrequency, 'none'>, timeZone: string): Occurrence {
  switch (frequency) {
    case 'daily':
      return { start: addHours(previous.start, 24), end: addHours(previous.end, 24) };
    case 'weekly':
      return { start: addHours(previous.start, 7 * 24), end: addHours(previous.end, 7 * 24) };
    case 'monthly': {
      // Each month clamps from the previous occurrence's day, so a clamp carries forward.
      const start = nextMonthStart(previous.start, timeZone);
      const duration = previous.end.getTime() - previous.start.getTime();
      return { start, end: new Date(start.getTime() + duration) };
    }
  }
}

/**
 * Exactly `count` occurrences, the first one included, in occurrence order.
 *
 * Daily and weekly steps are fixed 24h / 168h offsets. Monthly steps keep the
 * wall-clock time in `timeZone` and the preceding occurrence's duration.
 *
 * @throws ValidationError when frequency is 'none', count is not a positive integer or the first occurrence is empty
 */
export function expandRecurrence(
  firstStart: Date,
  firstEnd: Date,
  frequency: RecurrenceFrequency,
  count: number,
  timeZone = 'UTC',
): Occurrence[] {
  if (frequency === 'none') {
    throw new ValidationError('Invalid recurrence parameters: frequency must not be none', { frequency });
  }
  if (!Number.isInteger(count) || count <= 0) {
    throw new ValidationError(`Invalid recurrence parameters: count must be positive, got ${count}`, { count });
  }
  if (!(firstEnd.getTime() > firstStart.getTime())) {
    throw new ValidationError('Invalid recurrence parameters: first occurrence must end after it starts');
  }

  let previous: Occurrence = { start: new Date(firstStart), end: new Date(firstEnd) };
  const occurrences = [previous];
  while (occurrences.length < count) {
    previous = successor(previous, frequency, timeZone);
    occurrences.push(previous);
  }
  return occurrences;
}
