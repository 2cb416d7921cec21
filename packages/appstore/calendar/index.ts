export * from './calendar.types.js';
export type { CalendarService } from './calendar.service.js';
export * from './calendar.tokens.js';
export {
  CalendarFactory,
  type CalendarCtor,
  type CalendarProviderOptions,
  type CalendarRegistry,
  type GoogleCalendarCredentials,
} from './calendar.factory.js';
export {
  CalendarModule,
  type CalendarModuleAsyncOptions,
  type CalendarModuleOptions,
} from './calendar.module.js';
export { createCalendarRegistry } from './registry.js';
