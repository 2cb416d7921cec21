export { MemoryCalendarService } from './memory-calendar.service.js';
