import type { CalendarRegistry } from './calendar.factory.js';
import { GoogleCalendarProviderService } from '../google-calendar/google-calendar.service.js';
import { MemoryCalendarService } from '../memory-calendar/memory-calendar.service.js';

export function createCalendarRegistry(): CalendarRegistry {
  const registry: CalendarRegistry = new Map();
  registry.set('google', GoogleCalendarProviderService);
  registry.set('memory', MemoryCalendarService);
  return registry;
}
