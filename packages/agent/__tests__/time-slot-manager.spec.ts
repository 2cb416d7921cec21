import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCalendarService } from '@timekeeper/appstore';
import { NoAvailabilityError, ValidationError } from '@timekeeper/types';
import { FixedClock } from '../clock.js';
import { createEventRequest } from '../scheduling/event-request.js';
import { TimeSlotManager } from '../scheduling/time-slot-manager.js';

const at = (iso: string) => new Date(iso);
const range = { start: at('2025-06-01T00:00:00Z'), end: at('2025-08-01T00:00:00Z') };

describe('TimeSlotManager', () => {
  let calendar: MemoryCalendarService;
  let clock: FixedClock;
  let manager: TimeSlotManager;

  beforeEach(() => {
    calendar = new MemoryCalendarService();
    clock = new FixedClock('2025-06-10T08:00:00Z');
    manager = new TimeSlotManager(calendar, clock, {
      timeZone: 'UTC',
      workingHours: { startHour: 9, endHour: 17 },
    });
  });

  describe('findFreeSlots', () => {
    it('reads busy time from the calendar', async () => {
      await calendar.createEvent({ title: 'Busy', start: at('2025-06-10T10:00:00Z'), end: at('2025-06-10T11:00:00Z') });

      const slots = await manager.findFreeSlots(at('2025-06-10T09:00:00Z'), at('2025-06-11T09:00:00Z'), 60);

      expect(slots.map((s) => s.toISOString())).toEqual([
        '2025-06-10T09:00:00.000Z',
        '2025-06-10T11:00:00.000Z',
        '2025-06-10T12:00:00.000Z',
        '2025-06-10T13:00:00.000Z',
        '2025-06-10T14:00:00.000Z',
        '2025-06-10T15:00:00.000Z',
        '2025-06-10T16:00:00.000Z',
      ]);
    });

    it('validates before reading the calendar', async () => {
      await expect(
        manager.findFreeSlots(at('2025-06-10T09:00:00Z'), at('2025-06-11T09:00:00Z'), 60, { startHour: 9, endHour: 25 }),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('scheduleEvent', () => {
    it('uses the requested start and duration', async () => {
      const id = await manager.scheduleEvent(
        createEventRequest({ summary: 'Dentist', start: at('2025-06-12T15:00:00Z'), durationMinutes: 30 }),
      );

      const [stored] = await calendar.listEvents(range);
      expect(id).toBe('evt_1');
      expect(stored).toMatchObject({
        id: 'evt_1',
        title: 'Dentist',
        start: at('2025-06-12T15:00:00Z'),
        end: at('2025-06-12T15:30:00Z'),
        timezone: 'UTC',
      });
    });

    it('takes the first free slot when no start is given', async () => {
      await calendar.createEvent({ title: 'Busy', start: at('2025-06-10T09:00:00Z'), end: at('2025-06-10T10:30:00Z') });

      const event = await manager.bookEvent(createEventRequest({ summary: 'Focus time' }));

      expect(event.id).toBe('evt_2');
      expect(event.start.toISOString()).toBe('2025-06-10T10:30:00.000Z');
      expect(event.end.toISOString()).toBe('2025-06-10T11:30:00.000Z');
    });

    it('honours per-call working hours', async () => {
      const event = await manager.bookEvent(createEventRequest({ summary: 'Walk' }), { startHour: 13, endHour: 17 });

      expect(event.start.toISOString()).toBe('2025-06-10T13:00:00.000Z');
    });

    it('fails without availability in the next seven days', async () => {
      await calendar.createEvent({ title: 'Away', start: at('2025-06-10T00:00:00Z'), end: at('2025-06-18T00:00:00Z') });

      const failure = manager.scheduleEvent(createEventRequest({ summary: 'Sync' }));

      await expect(failure).rejects.toBeInstanceOf(NoAvailabilityError);
      await expect(failure).rejects.toMatchObject({
        rangeStart: at('2025-06-10T08:00:00Z'),
        rangeEnd: at('2025-06-17T08:00:00Z'),
        durationMinutes: 60,
      });
      expect(calendar.size).toBe(1);
    });
  });

  describe('scheduleRecurringEvent', () => {
    it('creates every occurrence in order', async () => {
      const ids = await manager.scheduleRecurringEvent(
        createEventRequest({
          summary: 'Team sync',
          start: at('2025-06-10T10:00:00Z'),
          recurrence: 'weekly',
          recurrenceCount: 3,
          location: 'Room 4',
        }),
      );

      const stored = await calendar.listEvents(range);
      expect(ids).toEqual(['evt_1', 'evt_2', 'evt_3']);
      expect(stored.map((e) => e.start.toISOString())).toEqual([
        '2025-06-10T10:00:00.000Z',
        '2025-06-17T10:00:00.000Z',
        '2025-06-24T10:00:00.000Z',
      ]);
      expect(stored.every((e) => e.title === 'Team sync' && e.location === 'Room 4')).toBe(true);
    });

    it('places the first occurrence in a free slot', async () => {
      const ids = await manager.scheduleRecurringEvent(
        createEventRequest({ summary: 'Stretch', recurrence: 'daily', recurrenceCount: 2, durationMinutes: 15 }),
      );

      const stored = await calendar.listEvents(range);
      expect(ids).toHaveLength(2);
      expect(stored.map((e) => `${e.start.toISOString()} ${e.end.toISOString()}`)).toEqual([
        '2025-06-10T09:00:00.000Z 2025-06-10T09:15:00.000Z',
        '2025-06-11T09:00:00.000Z 2025-06-11T09:15:00.000Z',
      ]);
    });

    it('rejects a request that does not recur', async () => {
      await expect(
        manager.scheduleRecurringEvent(createEventRequest({ summary: 'Once', recurrence: 'daily', recurrenceCount: 0 })),
      ).rejects.toThrow('Invalid recurrence parameters');
      expect(calendar.size).toBe(0);
    });
  });
});

describe('createEventRequest', () => {
  it('fills defaults', () => {
    expect(createEventRequest({ summary: '  Call  ' })).toEqual({
      summary: 'Call',
      durationMinutes: 60,
      start: undefined,
      end: undefined,
      description: undefined,
      location: undefined,
      recurrence: 'none',
      recurrenceCount: 0,
    });
  });

  it('rejects bad input', () => {
    expect(() => createEventRequest({ summary: ' ' })).toThrow('Event summary must not be empty');
    expect(() => createEventRequest({ summary: 'x', durationMinutes: 0 })).toThrow(
      'Invalid duration: 0 minutes (must be positive)',
    );
    expect(() => createEventRequest({ summary: 'x', recurrenceCount: -1 })).toThrow('Invalid recurrence count: -1');
    expect(() =>
      createEventRequest({ summary: 'x', start: at('2025-06-10T10:00:00Z'), end: at('2025-06-10T09:00:00Z') }),
    ).toThrow(ValidationError);
  });
});
