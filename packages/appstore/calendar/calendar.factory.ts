import { Inject, Injectable, Logger } from '@nestjs/common';
import { ValidationError } from '@timekeeper/types';
import { CALENDAR_REGISTRY } from './calendar.tokens.js';
import type { CalendarService } from './calendar.service.js';
import type { CalendarProviderId } from './calendar.types.js';

export interface GoogleCalendarCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  calendarId?: string;
}

export interface CalendarProviderOptions {
  /** IANA zone attached to created and updated events. */
  timeZone: string;
  google?: GoogleCalendarCredentials;
}

export type CalendarCtor = new (options: CalendarProviderOptions) => CalendarService;

export type CalendarRegistry = Map<CalendarProviderId, CalendarCtor>;

@Injectable()
export class CalendarFactory {
  private logger = new Logger(CalendarFactory.name);
  constructor(@Inject(CALENDAR_REGISTRY) private readonly registry: CalendarRegistry) {}

  create(provider: CalendarProviderId, options: CalendarProviderOptions): CalendarService {
    const Ctor = this.registry.get(provider);
    if (!Ctor) {
      this.logger.error(`No CalendarService registered for provider=${provider}`);
      throw new ValidationError(`Unsupported calendar provider: ${provider}`);
    }
    this.logger.log(`Using calendar provider=${provider} timeZone=${options.timeZone}`);
    return new Ctor(options);
  }
}
