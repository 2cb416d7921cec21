import type { CalendarEvent } from '@timekeeper/appstore';
import { formatWorkingHours, type WorkingHours } from '../scheduling/working-hours.js';
import { formatChoices } from './format.js';

export const WELCOME =
  '👋 Welcome to Timekeeper!\n\n' +
  "I can help you manage your calendar events. Here's what you can do:\n\n" +
  '- Create an event: Just tell me what you want to schedule\n' +
  '- Update an event: Use /update command\n' +
  '- Delete an event: Use /delete command\n' +
  '- View your schedule: Use /schedule command\n' +
  '- Find free time slots: Use /freeslots command\n\n' +
  'Try saying something like:\n' +
  '"Schedule a meeting with John tomorrow at 2pm for 1 hour"';

export const HELP =
  '🔍 Timekeeper Help\n\n' +
  'Here are some examples of what you can say:\n\n' +
  '- "Schedule a meeting with John tomorrow at 2pm for 1 hour"\n' +
  '- "Create a dentist appointment next week"\n' +
  '- "Set up a weekly team meeting every Monday at 10am for 4 weeks"\n\n' +
  'Commands:\n' +
  '/start - Start over\n' +
  '/help - Show this help message\n' +
  '/schedule - View your upcoming events\n' +
  '/update - Update an existing event\n' +
  '/delete - Delete an event\n' +
  '/freeslots - Find free time slots\n' +
  '/hours <start> <end> - Set your working hours, e.g. /hours 9 17\n' +
  '/cancel - Cancel the current operation';

export const CANCELED = 'Operation canceled. What would you like to do next?';
export const INVALID_SELECTION = 'Please select a valid event number.';
export const NOT_A_NUMBER = 'Please enter a valid number.';

export const NO_UPCOMING_EVENTS = "You don't have any upcoming events in the next 7 days.";
export const NO_EVENTS_TO_UPDATE = "You don't have any upcoming events to update.";
export const NO_EVENTS_TO_DELETE = "You don't have any upcoming events to delete.";

export const UPCOMING_HEADER = '📅 Your upcoming events:\n\n';
export const SELECT_FOR_UPDATE_HEADER = '📝 Select an event to update by replying with its number:\n\n';
export const SELECT_FOR_DELETE_HEADER = '🗑️ Select an event to delete by replying with its number:\n\n';
export const EVENT_CREATED_HEADER = '✅ Event created:\n\n';

export const FREE_SLOTS_REFINE_HINT =
  'You can refine the search by saying something like:\n' +
  '- "Find 30 minute slots"\n' +
  '- "Look for slots in the next 3 days"';

export const UPDATE_NOT_UNDERSTOOD =
  "I'm not sure how to update the event with that information. " +
  'Please be more specific about what you want to change.';

export const LOST_SELECTION = 'Sorry, I lost track of the event you were updating. Please start again.';

export const Apology = {
  generic: 'Sorry, I encountered an error processing your request. Please try again.',
  fetch: "Sorry, I couldn't fetch your events. Please try again later.",
  create: "Sorry, I couldn't create that event. Please try again.",
  update: "Sorry, I couldn't update that event. Please try again.",
  delete: "Sorry, I couldn't delete that event. Please try again.",
  list: "Sorry, I couldn't retrieve your schedule. Please try again later.",
  freeSlots: "Sorry, I couldn't look up your free time. Please try again later.",
  noAvailability: "Sorry, I couldn't find a free slot in the next 7 days. Please tell me when it should start.",
} as const;

export type ApologyKind = keyof typeof Apology;

export const validationReply = (message: string) => `Error: ${message}`;

export const unknownCommand = (name: string) =>
  `Unknown command: /${name}. Send /help to see what I can do.`;

export const updatePrompt = (event: CalendarEvent) =>
  `Updating: ${event.title}\n` +
  "Please tell me what you'd like to change. For example:\n" +
  '- Change title to Team Meeting\n' +
  '- Move to tomorrow at 3pm\n' +
  '- Change location to Conference Room B\n' +
  '- Make it 90 minutes long';

export const chooseEvent = (candidates: readonly CalendarEvent[]) =>
  `I couldn't find the event you mentioned. Please select one:${formatChoices(candidates)}`;

export const updated = (event: CalendarEvent) =>
  `✅ Updated: ${event.title}\nEvent has been successfully updated!`;

export const deleted = (event: CalendarEvent) => `✅ Deleted: ${event.title}`;

export const recurringCreated = (count: number, summary: string) =>
  `✅ Created ${count} recurring events: ${summary}`;

export const scheduleHeader = (from: string, to: string) => `📅 Your schedule from ${from} to ${to}:\n\n`;

export const nothingScheduled = (from: string, to: string) =>
  `You don't have any events scheduled between ${from} and ${to}.`;

export const noFreeSlots = (days: number, durationMinutes: number) =>
  `No free slots found in the next ${days} days for ${durationMinutes} minute events.`;

export const workingHoursSet = (hours: WorkingHours) => `✅ Working hours set to ${formatWorkingHours(hours)}.`;

export const workingHoursShown = (hours: WorkingHours) =>
  `Your working hours are ${formatWorkingHours(hours)}.`;
