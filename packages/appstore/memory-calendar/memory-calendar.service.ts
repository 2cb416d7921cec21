import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '@timekeeper/types';
import type { CalendarService } from '../calendar/calendar.service.js';
import type { CalendarProviderOptions } from '../calendar/calendar.factory.js';
import type {
  CalendarEvent,
  CalendarEventDraft,
  CreatedEvent,
  EventRange,
} from '../calendar/calendar.types.js';
import { assertValidRange, cloneEvent, overlapsRange, sortByStart } from '../calendar-utils.js';

/**
 * Process-local calendar. Hands out copies so callers can edit what they
 * receive without touching the stored events.
 */
@Injectable()
export class MemoryCalendarService implements CalendarService {
  readonly provider = 'memory' as const;
  private readonly logger = new Logger(MemoryCalendarService.name);
  private readonly events = new Map<string, CalendarEvent>();
  private seq = 0;
  private readonly timeZone: string;

  constructor(options: CalendarProviderOptions = { timeZone: 'UTC' }) {
    this.timeZone = options.timeZone;
  }

  async listEvents(range: EventRange): Promise<CalendarEvent[]> {
    const items = sortByStart(
      [...this.events.values()].filter((event) => overlapsRange(event, range)),
    );
    this.logger.debug({ msg: 'listEvents', start: range.start, end: range.end, count: items.length });
    return items.map(cloneEvent);
  }

  async createEvent(draft: CalendarEventDraft): Promise<CreatedEvent> {
    assertValidRange(draft.start, draft.end);
    this.seq += 1;
    const id = `evt_${this.seq}`;
    this.events.set(id, cloneEvent({ ...draft, id, timezone: draft.timezone ?? this.timeZone }));
    this.logger.log(`Event created: ${id}`);
    return { id };
  }

  async updateEvent(event: CalendarEvent): Promise<void> {
    if (!this.events.has(event.id)) {
      throw new NotFoundError(`Event ${event.id} not found`, { id: event.id });
    }
    assertValidRange(event.start, event.end);
    this.events.set(event.id, cloneEvent(event));
    this.logger.log(`Event updated: ${event.id}`);
  }

  async deleteEvent(id: string): Promise<void> {
    if (!this.events.delete(id)) {
      throw new NotFoundError(`Event ${id} not found`, { id });
    }
    this.logger.log(`Event deleted: ${id}`);
  }

  get size(): number {
    return this.events.size;
  }
}
