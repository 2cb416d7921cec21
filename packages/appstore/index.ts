export * from './calendar/index.js';
export * from './calendar-utils.js';
export * from './google-calendar/index.js';
export * from './memory-calendar/index.js';
