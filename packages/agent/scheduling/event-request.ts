import { ValidationError } from '@timekeeper/types';
import type { RecurrenceFrequency } from './recurrence.js';

export const DEFAULT_DURATION_MINUTES = 60;

/** Draft of what to put on the calendar; built for one turn and consumed once. */
export interface EventRequest {
  summary: string;
  durationMinutes: number;
  start?: Date;
  end?: Date;
  description?: string;
  location?: string;
  recurrence: RecurrenceFrequency;
  recurrenceCount: number;
}

export type EventRequestInput = Partial<Omit<EventRequest, 'summary'>> & { summary: string };

/**
 * Fills defaults (60 minutes, no recurrence) and checks the request. A
 * recurrence with a zero count collapses to a single event.
 *
 * @throws ValidationError on an empty summary, a non-positive duration, a negative count or an end before the start
 */
export function createEventRequest(input: EventRequestInput): EventRequest {
  const summary = input.summary.trim();
  if (!summary) {
    throw new ValidationError('Event summary must not be empty');
  }
  const durationMinutes = input.durationMinutes ?? DEFAULT_DURATION_MINUTES;
  if (!Number.isFinite(durationMinutes) || durationMinutes <= 0) {
    throw new ValidationError(`Invalid duration: ${durationMinutes} minutes (must be positive)`, {
      durationMinutes,
    });
  }
  const recurrenceCount = input.recurrenceCount ?? 0;
  if (!Number.isInteger(recurrenceCount) || recurrenceCount < 0) {
    throw new ValidationError(`Invalid recurrence count: ${recurrenceCount}`, { recurrenceCount });
  }
  if (input.start && input.end && input.end.getTime() <= input.start.getTime()) {
    throw new ValidationError('Invalid event time: end must be after start');
  }
  const recurrence = recurrenceCount > 0 ? (input.recurrence ?? 'none') : 'none';

  return {
    summary,
    durationMinutes,
    start: input.start,
    end: input.end,
    description: input.description,
    location: input.location,
    recurrence,
    recurrenceCount: recurrence === 'none' ? 0 : recurrenceCount,
  };
}

export const isRecurring = (request: EventRequest) =>
  request.recurrence !== 'none' && request.recurrenceCount > 0;
