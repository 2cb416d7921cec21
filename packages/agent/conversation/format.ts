import { formatInTimeZone } from 'date-fns-tz';
import type { CalendarEvent } from '@timekeeper/appstore';

const DESCRIPTION_PREVIEW_LENGTH = 50;

const truncate = (text: string, max: number) =>
  text.length > max ? `${text.slice(0, max - 3)}...` : text;

/**
 * One event as a reply block. With an index the block is numbered for
 * selection.
 */
export function formatEvent(event: CalendarEvent, timeZone: string, index?: number): string {
  const heading = index === undefined ? event.title : `${index}. ${event.title}`;
  const from = formatInTimeZone(event.start, timeZone, "EEEE, MMMM dd 'at' hh:mm a");
  const to = formatInTimeZone(event.end, timeZone, 'hh:mm a');

  let text = `${heading}\n   📅 ${from} - ${to}\n`;
  if (event.location) {
    text += `   📍 ${event.location}\n`;
  }
  if (event.description) {
    text += `   📝 ${truncate(event.description, DESCRIPTION_PREVIEW_LENGTH)}\n`;
  }
  return `${text}\n`;
}

export function formatEventList(events: readonly CalendarEvent[], timeZone: string): string {
  return events.map((event, i) => formatEvent(event, timeZone, i + 1)).join('');
}

/** Short numbered titles, one per line, each preceded by a newline. */
export function formatChoices(events: readonly CalendarEvent[]): string {
  return events.map((event, i) => `\n${i + 1}. ${event.title}`).join('');
}

export const formatDay = (at: Date, timeZone: string) => formatInTimeZone(at, timeZone, 'yyyy-MM-dd');

/** Slot starts grouped by local day. */
export function formatSlots(slots: readonly Date[], durationMinutes: number, timeZone: string): string {
  const days = new Map<string, Date[]>();
  for (const slot of slots) {
    const key = formatDay(slot, timeZone);
    const group = days.get(key);
    if (group) group.push(slot);
    else days.set(key, [slot]);
  }

  let text = `Available time slots for ${durationMinutes} minute events:\n\n`;
  for (const group of days.values()) {
    const [first] = group;
    if (!first) continue;
    text += `${formatInTimeZone(first, timeZone, 'EEEE, MMMM dd')}:\n`;
    for (const slot of group) {
      text += `  • ${formatInTimeZone(slot, timeZone, 'hh:mm a')}\n`;
    }
    text += '\n';
  }
  return text;
}
