export {
  GoogleCalendarProviderService,
  type GoogleEventsApi,
} from './google-calendar.service.js';
