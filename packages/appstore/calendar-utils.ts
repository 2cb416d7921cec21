/**
 * Base calendar utilities shared by the calendar providers.
 */
import { ValidationError } from '@timekeeper/types';
import type { CalendarEvent, EventRange } from './calendar/calendar.types.js';

const isValidDate = (d: Date) => d instanceof Date && !Number.isNaN(d.getTime());

/**
 * Validate that both bounds are real dates and end is after start
 */
export function assertValidRange(start: Date, end: Date, label = 'event'): void {
  if (!isValidDate(start) || !isValidDate(end)) {
    throw new ValidationError(`Invalid ${label} time: start and end must be valid dates`);
  }
  if (end.getTime() <= start.getTime()) {
    throw new ValidationError(`Invalid ${label} time: end must be after start`, {
      start: start.toISOString(),
      end: end.toISOString(),
    });
  }
}

/** Half-open overlap test against [range.start, range.end). */
export function overlapsRange(event: Pick<CalendarEvent, 'start' | 'end'>, range: EventRange) {
  return event.start.getTime() < range.end.getTime() && event.end.getTime() > range.start.getTime();
}

export function sortByStart<T extends Pick<CalendarEvent, 'start'>>(events: T[]): T[] {
  return [...events].sort((a, b) => a.start.getTime() - b.start.getTime());
}

export function cloneEvent(event: CalendarEvent): CalendarEvent {
  return { ...event, start: new Date(event.start), end: new Date(event.end) };
}
