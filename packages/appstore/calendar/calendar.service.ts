import type {
  CalendarEvent,
  CalendarEventDraft,
  CalendarEventId,
  CalendarProviderId,
  CreatedEvent,
  EventRange,
} from './calendar.types.js';

/**
 * Port to the calendar backend. Implementations raise `ExternalServiceError`
 * on transport or auth failures; callers never retry.
 */
export interface CalendarService {
  readonly provider: CalendarProviderId;

  /** Events overlapping the range, ordered by start. */
  listEvents(range: EventRange): Promise<CalendarEvent[]>;

  createEvent(draft: CalendarEventDraft): Promise<CreatedEvent>;

  /** Replaces title, times, description and location of an existing event. */
  updateEvent(event: CalendarEvent): Promise<void>;

  deleteEvent(id: CalendarEventId): Promise<void>;
}
