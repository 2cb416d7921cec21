import { Inject, Injectable, Logger } from '@nestjs/common';
import { addDays, addMinutes } from 'date-fns';
import {
  CALENDAR_SERVICE,
  type CalendarEvent,
  type CalendarEventDraft,
  type CalendarService,
} from '@timekeeper/appstore';
import { NoAvailabilityError, ValidationError } from '@timekeeper/types';
import type { Clock } from '../clock.js';
import { ASSISTANT_CLOCK, SCHEDULING_OPTIONS, type SchedulingOptions } from '../nest/assistant.tokens.js';
import { BusyIndex } from './busy-index.js';
import { isRecurring, type EventRequest } from './event-request.js';
import { assertFreeSlotQuery, findFreeSlots, firstFreeSlot } from './free-slots.js';
import { expandRecurrence, type Occurrence } from './recurrence.js';
import type { WorkingHours } from './working-hours.js';

/** How far ahead a request without a start time looks for a slot. */
export const SCHEDULING_LOOKAHEAD_DAYS = 7;

@Injectable()
export class TimeSlotManager {
  private readonly logger = new Logger(TimeSlotManager.name);

  constructor(
    @Inject(CALENDAR_SERVICE) private readonly calendar: CalendarService,
    @Inject(ASSISTANT_CLOCK) private readonly clock: Clock,
    @Inject(SCHEDULING_OPTIONS) private readonly options: SchedulingOptions,
  ) {}

  get timeZone(): string {
    return this.options.timeZone;
  }

  get workingHours(): WorkingHours {
    return this.options.workingHours;
  }

  /**
   * Free slot starts within `[rangeStart, rangeEnd)`, busy time read from the calendar.
   */
  async findFreeSlots(
    rangeStart: Date,
    rangeEnd: Date,
    durationMinutes: number,
    workingHours: WorkingHours = this.workingHours,
  ): Promise<Date[]> {
    const slots = await this.slotSequence(rangeStart, rangeEnd, durationMinutes, workingHours);
    return Array.from(slots);
  }

  /**
   * Creates one event and returns its id. Without a start the first free slot
   * of the next seven days is used.
   *
   * @throws NoAvailabilityError when no start was given and no slot fits
   */
  async scheduleEvent(request: EventRequest, workingHours: WorkingHours = this.workingHours): Promise<string> {
    const event = await this.bookEvent(request, workingHours);
    return event.id;
  }

  /** `scheduleEvent`, returning the event as it was stored. */
  async bookEvent(request: EventRequest, workingHours: WorkingHours = this.workingHours): Promise<CalendarEvent> {
    const occurrence = await this.resolveFirstOccurrence(request, workingHours);
    const draft = this.draftFor(request, occurrence);
    const { id, htmlLink } = await this.calendar.createEvent(draft);
    this.logger.log(`Scheduled "${request.summary}" at ${occurrence.start.toISOString()} as ${id}`);
    return { ...draft, id, htmlLink };
  }

  /**
   * Places the first occurrence like `scheduleEvent`, then creates every
   * expanded occurrence in order. Returns the ids in occurrence order.
   *
   * @throws ValidationError when the request does not recur
   */
  async scheduleRecurringEvent(
    request: EventRequest,
    workingHours: WorkingHours = this.workingHours,
  ): Promise<string[]> {
    if (!isRecurring(request)) {
      throw new ValidationError('Invalid recurrence parameters', {
        recurrence: request.recurrence,
        recurrenceCount: request.recurrenceCount,
      });
    }
    const first = await this.resolveFirstOccurrence(request, workingHours);
    const occurrences = expandRecurrence(
      first.start,
      first.end,
      request.recurrence,
      request.recurrenceCount,
      this.timeZone,
    );

    const ids: string[] = [];
    for (const occurrence of occurrences) {
      const { id } = await this.calendar.createEvent(this.draftFor(request, occurrence));
      ids.push(id);
    }
    this.logger.log(
      `Scheduled ${ids.length} ${request.recurrence} occurrences of "${request.summary}" from ${first.start.toISOString()}`,
    );
    return ids;
  }

  private async resolveFirstOccurrence(
    request: EventRequest,
    workingHours: WorkingHours,
  ): Promise<Occurrence> {
    if (request.start) {
      return {
        start: request.start,
        end: request.end ?? addMinutes(request.start, request.durationMinutes),
      };
    }

    const rangeStart = this.clock.now();
    const rangeEnd = addDays(rangeStart, SCHEDULING_LOOKAHEAD_DAYS);
    const slots = await this.slotSequence(rangeStart, rangeEnd, request.durationMinutes, workingHours);
    const start = firstFreeSlot(slots);
    if (!start) {
      this.logger.warn(
        `No ${request.durationMinutes} minute slot between ${rangeStart.toISOString()} and ${rangeEnd.toISOString()}`,
      );
      throw new NoAvailabilityError(rangeStart, rangeEnd, request.durationMinutes);
    }
    return { start, end: addMinutes(start, request.durationMinutes) };
  }

  private async slotSequence(
    rangeStart: Date,
    rangeEnd: Date,
    durationMinutes: number,
    workingHours: WorkingHours,
  ): Promise<Iterable<Date>> {
    assertFreeSlotQuery({ rangeStart, rangeEnd, durationMinutes, workingHours });
    const events = await this.calendar.listEvents({ start: rangeStart, end: rangeEnd });
    return findFreeSlots({
      rangeStart,
      rangeEnd,
      durationMinutes,
      workingHours,
      busy: BusyIndex.fromEvents(events),
      timeZone: this.timeZone,
    });
  }

  private draftFor(request: EventRequest, occurrence: Occurrence): CalendarEventDraft {
    return {
      title: request.summary,
      description: request.description,
      location: request.location,
      start: occurrence.start,
      end: occurrence.end,
      timezone: this.timeZone,
    };
  }
}
