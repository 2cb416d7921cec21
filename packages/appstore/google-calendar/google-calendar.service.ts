import { Injectable, Logger } from '@nestjs/common';
import { ExternalServiceError, ValidationError } from '@timekeeper/types';
import { google, type calendar_v3 } from 'googleapis';
import type { CalendarService } from '../calendar/calendar.service.js';
import type { CalendarProviderOptions } from '../calendar/calendar.factory.js';
import type {
  CalendarEvent,
  CalendarEventDraft,
  CreatedEvent,
  EventRange,
} from '../calendar/calendar.types.js';
import { assertValidRange } from '../calendar-utils.js';

/**
 * The slice of `calendar.events` this adapter talks to. Resolves with the
 * response payload rather than the full gaxios response.
 */
export interface GoogleEventsApi {
  list(params: calendar_v3.Params$Resource$Events$List): Promise<calendar_v3.Schema$Events>;
  insert(params: calendar_v3.Params$Resource$Events$Insert): Promise<calendar_v3.Schema$Event>;
  update(params: calendar_v3.Params$Resource$Events$Update): Promise<calendar_v3.Schema$Event>;
  delete(params: calendar_v3.Params$Resource$Events$Delete): Promise<void>;
}

@Injectable()
export class GoogleCalendarProviderService implements CalendarService {
  readonly provider = 'google' as const;
  private readonly logger = new Logger('GoogleCalendarProviderService');
  private readonly events: GoogleEventsApi;
  private readonly calendarId: string;
  private readonly timeZone: string;

  constructor(options: CalendarProviderOptions, events?: GoogleEventsApi) {
    this.timeZone = options.timeZone;
    this.calendarId = options.google?.calendarId ?? 'primary';
    this.events = events ?? this.createEventsApi(options);
  }

  async listEvents(range: EventRange): Promise<CalendarEvent[]> {
    this.logger.log(this.format({ op: 'listEvents', start: range.start, end: range.end }));
    try {
      const data = await this.events.list({
        calendarId: this.calendarId,
        timeMin: range.start.toISOString(),
        timeMax: range.end.toISOString(),
        singleEvents: true,
        orderBy: 'startTime',
      });
      const items = data.items ?? [];
      const events = items
        .map((item) => this.toCalendarEvent(item))
        .filter((e): e is CalendarEvent => e !== null);
      if (events.length < items.length) {
        this.logger.debug(
          this.format({ op: 'listEvents.skipped', count: items.length - events.length }),
        );
      }
      return events;
    } catch (error) {
      throw this.fail('listEvents', error);
    }
  }

  async createEvent(draft: CalendarEventDraft): Promise<CreatedEvent> {
    assertValidRange(draft.start, draft.end);
    this.logger.log(this.format({ op: 'createEvent', title: draft.title }));
    try {
      const ev = await this.events.insert({
        calendarId: this.calendarId,
        requestBody: this.toRequestBody(draft),
      });
      if (typeof ev.id !== 'string' || !ev.id) {
        throw new Error('Google Calendar returned an event without id');
      }
      const htmlLink = typeof ev.htmlLink === 'string' ? ev.htmlLink : undefined;
      this.logger.log(this.format({ op: 'createEvent.done', id: ev.id, htmlLink }));
      return { id: ev.id, htmlLink };
    } catch (error) {
      throw this.fail('createEvent', error);
    }
  }

  async updateEvent(event: CalendarEvent): Promise<void> {
    assertValidRange(event.start, event.end);
    this.logger.log(this.format({ op: 'updateEvent', id: event.id }));
    try {
      await this.events.update({
        calendarId: this.calendarId,
        eventId: event.id,
        requestBody: this.toRequestBody(event),
      });
    } catch (error) {
      throw this.fail('updateEvent', error);
    }
  }

  async deleteEvent(id: string): Promise<void> {
    this.logger.log(this.format({ op: 'deleteEvent', id }));
    try {
      await this.events.delete({ calendarId: this.calendarId, eventId: id });
    } catch (error) {
      throw this.fail('deleteEvent', error);
    }
  }

  // ===== Helpers =====
  private createEventsApi(options: CalendarProviderOptions): GoogleEventsApi {
    const creds = options.google;
    if (!creds?.clientId || !creds.clientSecret || !creds.refreshToken) {
      throw new ValidationError('Google Calendar OAuth configuration not found.');
    }
    const oauth2Client = new google.auth.OAuth2(creds.clientId, creds.clientSecret);
    oauth2Client.setCredentials({ refresh_token: creds.refreshToken });
    const calendar = google.calendar({ version: 'v3', auth: oauth2Client });
    return {
      list: async (params) => (await calendar.events.list(params)).data,
      insert: async (params) => (await calendar.events.insert(params)).data,
      update: async (params) => (await calendar.events.update(params)).data,
      delete: async (params) => {
        await calendar.events.delete(params);
      },
    };
  }

  private toRequestBody(event: CalendarEventDraft): calendar_v3.Schema$Event {
    const timeZone = event.timezone ?? this.timeZone;
    return {
      summary: event.title,
      description: event.description,
      location: event.location,
      start: { dateTime: event.start.toISOString(), timeZone },
      end: { dateTime: event.end.toISOString(), timeZone },
    };
  }

  /** All-day entries carry `date` instead of `dateTime` and are left out. */
  private toCalendarEvent(data: calendar_v3.Schema$Event): CalendarEvent | null {
    const startIso = data.start?.dateTime;
    const endIso = data.end?.dateTime;
    if (!data.id || !startIso || !endIso) return null;
    return {
      id: data.id,
      title: data.summary || '(no title)',
      description: data.description || undefined,
      start: new Date(startIso),
      end: new Date(endIso),
      timezone: data.start?.timeZone || data.end?.timeZone || undefined,
      location: data.location || undefined,
      htmlLink: data.htmlLink || undefined,
    };
  }

  private fail(op: string, error: unknown): ExternalServiceError {
    this.logger.error(this.format({ op: `${op}.error`, error: this.renderError(error) }));
    return ExternalServiceError.wrap('calendar', op, error);
  }

  private renderError(error: unknown): string {
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    if (typeof error === 'string') return error;
    return 'Unknown error';
  }

  private format(meta: Record<string, unknown>): string {
    try {
      return JSON.stringify(meta);
    } catch {
      return '[unserializable-meta]';
    }
  }
}
