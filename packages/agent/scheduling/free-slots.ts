import { addMinutes } from 'date-fns';
import { ValidationError } from '@timekeeper/types';
import { BusyIndex, type BusyInterval } from './busy-index.js';
import { assertWorkingHours, type WorkingHours } from './working-hours.js';
import { atHourOfDay, hourInZone } from './zoned-time.js';

export interface FreeSlotQuery {
  rangeStart: Date;
  rangeEnd: Date;
  durationMinutes: number;
  workingHours: WorkingHours;
  busy: BusyIndex | Iterable<BusyInterval>;
  /** IANA zone the working hours are read in. Defaults to UTC. */
  timeZone?: string;
}

const isValidDate = (d: Date) => d instanceof Date && !Number.isNaN(d.getTime());

export function assertDuration(durationMinutes: number): number {
  if (!Number.isFinite(durationMinutes) || durationMinutes <= 0) {
    throw new ValidationError(`Invalid duration: ${durationMinutes} minutes (must be positive)`, {
      durationMinutes,
    });
  }
  return durationMinutes;
}

export function assertFreeSlotQuery(
  query: Pick<FreeSlotQuery, 'rangeStart' | 'rangeEnd' | 'durationMinutes' | 'workingHours'>,
): { hours: WorkingHours; duration: number } {
  const hours = assertWorkingHours(query.workingHours);
  const duration = assertDuration(query.durationMinutes);
  if (!isValidDate(query.rangeStart) || !isValidDate(query.rangeEnd)) {
    throw new ValidationError('Invalid free-slot range: start and end must be valid dates');
  }
  return { hours, duration };
}

/**
 * First-fit walk over working hours. Returns a lazy sequence of slot starts,
 * earliest first; every iteration replays the walk from `rangeStart`.
 *
 * A slot never crosses the working-day end and never overlaps a busy
 * interval. Starts are always before `rangeEnd`.
 *
 * @throws ValidationError for bad working hours, a non-positive duration or unparseable range bounds
 */
export function findFreeSlots(query: FreeSlotQuery): Iterable<Date> {
  const { hours, duration } = assertFreeSlotQuery(query);
  const busy = query.busy instanceof BusyIndex ? query.busy : new BusyIndex(query.busy);
  const timeZone = query.timeZone ?? 'UTC';
  const rangeStart = new Date(query.rangeStart);
  const rangeEnd = new Date(query.rangeEnd);

  function* walk(): Generator<Date, void, undefined> {
    let cursor = rangeStart;
    while (cursor.getTime() < rangeEnd.getTime()) {
      const hour = hourInZone(cursor, timeZone);
      if (hour < hours.startHour) {
        cursor = atHourOfDay(cursor, hours.startHour, timeZone);
        continue;
      }
      if (hour >= hours.endHour) {
        cursor = atHourOfDay(cursor, hours.startHour, timeZone, 1);
        continue;
      }

      const blocking = busy.containing(cursor);
      if (blocking) {
        cursor = new Date(blocking.end);
        continue;
      }

      const candidateEnd = addMinutes(cursor, duration);
      const nextBusyStart = busy.nextStartAfter(cursor);
      if (nextBusyStart && candidateEnd.getTime() > nextBusyStart.getTime()) {
        cursor = new Date(nextBusyStart);
        continue;
      }

      const dayEnd = atHourOfDay(cursor, hours.endHour, timeZone);
      if (candidateEnd.getTime() <= dayEnd.getTime()) {
        yield new Date(cursor);
        cursor = candidateEnd;
      } else {
        cursor = atHourOfDay(cursor, hours.startHour, timeZone, 1);
      }
    }
  }

  return { [Symbol.iterator]: walk };
}

/** First slot of the sequence, if any. */
export function firstFreeSlot(slots: Iterable<Date>): Date | undefined {
  for (const slot of slots) return slot;
  return undefined;
}
