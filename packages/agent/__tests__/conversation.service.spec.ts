import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { MemoryCalendarService } from '@timekeeper/appstore';
import { ExternalServiceError } from '@timekeeper/types';
import { FixedClock } from '../clock.js';
import { ConversationService, applyUpdate, parseCommand, parseSelectionNumber } from '../conversation/conversation.service.js';
import * as Reply from '../conversation/messages.js';
import { SessionState } from '../conversation/session.js';
import { InMemorySessionStore } from '../conversation/session-store.js';
import type { IntentParser } from '../intents/intent-parser.js';
import type { Intent } from '../intents/intents.js';
import { TimeSlotManager } from '../scheduling/time-slot-manager.js';
import type { SimilarityOracle } from '../similarity/types.js';

const at = (iso: string) => new Date(iso);
const everything = { start: at('2025-01-01T00:00:00Z'), end: at('2026-01-01T00:00:00Z') };

const STANDUP = '1. Standup\n   📅 Tuesday, June 10 at 09:00 AM - 09:15 AM\n\n';
const LUNCH = '2. Lunch with Ana\n   📅 Wednesday, June 11 at 12:00 PM - 01:00 PM\n   📍 Cafe\n\n';
const REVIEW = '3. Review\n   📅 Thursday, June 12 at 03:00 PM - 04:00 PM\n   📝 Quarterly numbers\n\n';

describe('ConversationService', () => {
  let calendar: MemoryCalendarService;
  let parse: Mock<IntentParser['parse']>;
  let bestMatch: Mock<SimilarityOracle['bestMatch']>;
  let service: ConversationService;

  const seed = async () => {
    await calendar.createEvent({ title: 'Standup', start: at('2025-06-10T09:00:00Z'), end: at('2025-06-10T09:15:00Z') });
    await calendar.createEvent({
      title: 'Lunch with Ana',
      start: at('2025-06-11T12:00:00Z'),
      end: at('2025-06-11T13:00:00Z'),
      location: 'Cafe',
    });
    await calendar.createEvent({
      title: 'Review',
      start: at('2025-06-12T15:00:00Z'),
      end: at('2025-06-12T16:00:00Z'),
      description: 'Quarterly numbers',
    });
  };

  const answer = (intent: Intent) => parse.mockResolvedValueOnce(intent);
  const stateOf = async (userId = 'u1') => (await service.session(userId)).state;

  beforeEach(() => {
    calendar = new MemoryCalendarService();
    const clock = new FixedClock('2025-06-10T08:00:00Z');
    const slots = new TimeSlotManager(calendar, clock, {
      timeZone: 'UTC',
      workingHours: { startHour: 9, endHour: 17 },
    });
    parse = vi.fn<IntentParser['parse']>();
    bestMatch = vi.fn<SimilarityOracle['bestMatch']>().mockResolvedValue({ event: null, score: 0 });
    service = new ConversationService(
      calendar,
      slots,
      { parse },
      { threshold: 0.6, bestMatch },
      new InMemorySessionStore({ startHour: 9, endHour: 17 }),
      clock,
    );
  });

  describe('commands', () => {
    it('greets and resets on /start', async () => {
      await seed();
      await service.dispatch('u1', '/delete');

      expect(await service.dispatch('u1', '/start')).toBe(Reply.WELCOME);
      expect(await stateOf()).toBe(SessionState.IDLE);
    });

    it('shows help without touching the state', async () => {
      await seed();
      await service.dispatch('u1', '/update');

      expect(await service.dispatch('u1', '/help')).toBe(Reply.HELP);
      expect(await stateOf()).toBe(SessionState.SELECTING_FOR_UPDATE);
    });

    it('lists the coming week on /schedule', async () => {
      await seed();

      const reply = await service.dispatch('u1', '/schedule');

      expect(reply).toBe(`📅 Your upcoming events:\n\n${STANDUP}${LUNCH}${REVIEW}`);
      const session = await service.session('u1');
      expect(session.state).toBe(SessionState.VIEWING_EVENTS);
      expect(session.candidateEvents.map((e) => e.id)).toEqual(['evt_1', 'evt_2', 'evt_3']);
    });

    it('says so when the week is empty', async () => {
      expect(await service.dispatch('u1', '/schedule')).toBe("You don't have any upcoming events in the next 7 days.");
      expect(await service.dispatch('u1', '/update')).toBe("You don't have any upcoming events to update.");
      expect(await service.dispatch('u1', '/delete')).toBe("You don't have any upcoming events to delete.");
      expect(await stateOf()).toBe(SessionState.IDLE);
    });

    it('clears everything on /cancel', async () => {
      await seed();
      answer({ kind: 'update', eventName: 'nonexistent meeting' });
      await service.dispatch('u1', 'move the offsite');

      expect(await service.dispatch('u1', '/cancel')).toBe('Operation canceled. What would you like to do next?');
      const session = await service.session('u1');
      expect(session.state).toBe(SessionState.IDLE);
      expect(session.candidateEvents).toEqual([]);
      expect(session.pendingIntent).toBeUndefined();
      expect(session.selectedEvent).toBeUndefined();
    });

    it('answers unknown commands', async () => {
      expect(await service.dispatch('u1', '/dance now')).toBe('Unknown command: /dance. Send /help to see what I can do.');
      expect(parse).not.toHaveBeenCalled();
    });

    it('sets, shows and validates working hours', async () => {
      expect(await service.dispatch('u1', '/hours')).toBe('Your working hours are 09:00-17:00.');
      expect(await service.dispatch('u1', '/hours 8 18')).toBe('✅ Working hours set to 08:00-18:00.');
      expect((await service.session('u1')).workingHours).toEqual({ startHour: 8, endHour: 18 });
      expect(await service.dispatch('u1', '/hours 18 9')).toBe(
        'Error: Invalid working hours: 18-9 (expected whole hours with 0 <= start < end <= 24)',
      );
      expect(await service.dispatch('u1', '/hours nine five')).toBe(
        'Error: Invalid working hours: usage is /hours <start> <end>, e.g. /hours 9 17',
      );
      expect((await service.session('u1')).workingHours).toEqual({ startHour: 8, endHour: 18 });
      expect((await service.session('u2')).workingHours).toEqual({ startHour: 9, endHour: 17 });
    });

    it('offers free slots and refines them on the next message', async () => {
      await service.dispatch('u1', '/hours 9 10');

      const reply = await service.dispatch('u1', '/freeslots');

      const days = [
        'Tuesday, June 10',
        'Wednesday, June 11',
        'Thursday, June 12',
        'Friday, June 13',
        'Saturday, June 14',
        'Sunday, June 15',
        'Monday, June 16',
      ];
      expect(reply).toBe(
        'Available time slots for 60 minute events:\n\n' +
          days.map((day) => `${day}:\n  • 09:00 AM`).join('\n\n') +
          '\n\n' +
          Reply.FREE_SLOTS_REFINE_HINT,
      );
      expect(await stateOf()).toBe(SessionState.FINDING_FREE_SLOTS_CUSTOM);

      answer({ kind: 'create', summary: 'slot', durationMinutes: 90, recurrence: 'none', recurrenceCount: 0 });
      expect(await service.dispatch('u1', 'find 90 minute slots')).toBe(
        'No free slots found in the next 7 days for 90 minute events.',
      );
      expect(await stateOf()).toBe(SessionState.IDLE);
    });
  });

  describe('selection', () => {
    beforeEach(seed);

    it('guards the number a user picks', async () => {
      await service.dispatch('u1', '/delete');

      expect(await service.dispatch('u1', '5')).toBe('Please select a valid event number.');
      expect(await service.dispatch('u1', '0')).toBe('Please select a valid event number.');
      expect(await service.dispatch('u1', 'the second one')).toBe('Please enter a valid number.');
      const session = await service.session('u1');
      expect(session.state).toBe(SessionState.SELECTING_FOR_DELETE);
      expect(session.candidateEvents).toHaveLength(3);
      expect(calendar.size).toBe(3);
    });

    it('deletes the picked event', async () => {
      await service.dispatch('u1', '/delete');

      expect(await service.dispatch('u1', ' 2 ')).toBe('✅ Deleted: Lunch with Ana');
      expect((await calendar.listEvents(everything)).map((e) => e.title)).toEqual(['Standup', 'Review']);
      expect(await stateOf()).toBe(SessionState.IDLE);
    });

    it('walks an unresolved update through selection and details', async () => {
      const intent: Intent = { kind: 'update', eventName: 'nonexistent meeting' };
      answer(intent);

      expect(await service.dispatch('u1', 'move the nonexistent meeting')).toBe(
        "I couldn't find the event you mentioned. Please select one:\n1. Standup\n2. Lunch with Ana\n3. Review",
      );
      let session = await service.session('u1');
      expect(session.state).toBe(SessionState.SELECTING_FOR_UPDATE);
      expect(session.pendingIntent).toEqual(intent);
      expect(bestMatch).toHaveBeenCalledWith('nonexistent meeting', session.candidateEvents);

      expect(await service.dispatch('u1', '3')).toBe(
        'Updating: Review\n' +
          "Please tell me what you'd like to change. For example:\n" +
          '- Change title to Team Meeting\n' +
          '- Move to tomorrow at 3pm\n' +
          '- Change location to Conference Room B\n' +
          '- Make it 90 minutes long',
      );
      session = await service.session('u1');
      expect(session.state).toBe(SessionState.UPDATING_EVENT);
      expect(session.selectedEvent?.id).toBe('evt_3');

      answer({ kind: 'list', timeRangeDays: 7 });
      expect(await service.dispatch('u1', 'what is on today')).toBe(Reply.UPDATE_NOT_UNDERSTOOD);
      expect(await stateOf()).toBe(SessionState.UPDATING_EVENT);

      answer({ kind: 'update', start: at('2025-06-13T10:00:00Z') });
      expect(await service.dispatch('u1', 'move it to friday 10am')).toBe(
        '✅ Updated: Review\nEvent has been successfully updated!',
      );
      const [, , review] = await calendar.listEvents(everything);
      expect(review).toMatchObject({
        id: 'evt_3',
        start: at('2025-06-13T10:00:00Z'),
        end: at('2025-06-13T11:00:00Z'),
        description: 'Quarterly numbers',
      });
      expect(await stateOf()).toBe(SessionState.IDLE);
    });
  });

  describe('intents', () => {
    it('updates an event it can resolve right away', async () => {
      await seed();
      answer({ kind: 'update', eventSelection: 1, summary: 'Daily standup', durationMinutes: 30 });

      expect(await service.dispatch('u1', 'rename the first one')).toBe(
        '✅ Updated: Daily standup\nEvent has been successfully updated!',
      );
      const [standup] = await calendar.listEvents(everything);
      expect(standup).toMatchObject({
        title: 'Daily standup',
        start: at('2025-06-10T09:00:00Z'),
        end: at('2025-06-10T09:30:00Z'),
      });
    });

    it('deletes by id, or asks which event is meant', async () => {
      await seed();
      answer({ kind: 'delete', eventId: 'evt_2' });
      expect(await service.dispatch('u1', 'drop evt_2')).toBe('✅ Deleted: Lunch with Ana');

      answer({ kind: 'delete' });
      expect(await service.dispatch('u1', 'delete it')).toBe(
        "I couldn't find the event you mentioned. Please select one:\n1. Standup\n2. Review",
      );
      expect(await stateOf()).toBe(SessionState.SELECTING_FOR_DELETE);
    });

    it('creates a single event', async () => {
      answer({
        kind: 'create',
        summary: 'Dentist',
        start: at('2025-06-12T10:00:00Z'),
        durationMinutes: 45,
        location: 'Clinic',
        recurrence: 'none',
        recurrenceCount: 0,
      });

      expect(await service.dispatch('u1', 'dentist thursday 10am')).toBe(
        '✅ Event created:\n\nDentist\n   📅 Thursday, June 12 at 10:00 AM - 10:45 AM\n   📍 Clinic\n\n',
      );
      expect(calendar.size).toBe(1);
    });

    it('creates a recurring series', async () => {
      answer({
        kind: 'create',
        summary: 'Gym',
        start: at('2025-06-16T07:00:00Z'),
        recurrence: 'weekly',
        recurrenceCount: 3,
      });

      expect(await service.dispatch('u1', 'gym every monday for three weeks')).toBe(
        '✅ Created 3 recurring events: Gym',
      );
      expect((await calendar.listEvents(everything)).map((e) => e.start.toISOString())).toEqual([
        '2025-06-16T07:00:00.000Z',
        '2025-06-23T07:00:00.000Z',
        '2025-06-30T07:00:00.000Z',
      ]);
    });

    it('aborts a create that fails validation', async () => {
      await seed();
      await service.dispatch('u1', '/schedule');
      answer({ kind: 'create', summary: 'Nap', durationMinutes: 0, recurrence: 'none', recurrenceCount: 0 });

      expect(await service.dispatch('u1', 'nap')).toBe('Error: Invalid duration: 0 minutes (must be positive)');
      expect(await stateOf()).toBe(SessionState.IDLE);
      expect(calendar.size).toBe(3);
    });

    it('lists a window of days', async () => {
      await seed();
      answer({ kind: 'list', timeRangeDays: 2 });

      expect(await service.dispatch('u1', 'next two days')).toBe(
        `📅 Your schedule from 2025-06-10 to 2025-06-12:\n\n${STANDUP}${LUNCH}`,
      );
      expect(await stateOf()).toBe(SessionState.IDLE);
    });

    it('lists an explicit empty range', async () => {
      answer({
        kind: 'list',
        timeRangeDays: 7,
        startDate: at('2025-07-01T00:00:00Z'),
        endDate: at('2025-07-02T00:00:00Z'),
      });

      expect(await service.dispatch('u1', 'first of july')).toBe(
        "You don't have any events scheduled between 2025-07-01 and 2025-07-02.",
      );
    });

    it('echoes a fallback reply', async () => {
      answer({ kind: 'fallback', responseText: 'Hi there!' });

      expect(await service.dispatch('u1', 'hello')).toBe('Hi there!');
      expect(parse).toHaveBeenCalledWith('hello', { userId: 'u1' });
    });

    it('refines free slots with a list window', async () => {
      await seed();
      await service.dispatch('u1', '/freeslots');
      answer({ kind: 'list', timeRangeDays: 1 });

      expect(await service.dispatch('u1', 'just today')).toBe(
        'Available time slots for 60 minute events:\n\n' +
          'Tuesday, June 10:\n' +
          '  • 09:15 AM\n' +
          '  • 10:15 AM\n' +
          '  • 11:15 AM\n' +
          '  • 12:15 PM\n' +
          '  • 01:15 PM\n' +
          '  • 02:15 PM\n' +
          '  • 03:15 PM',
      );
      expect(await stateOf()).toBe(SessionState.IDLE);
    });
  });

  describe('failures', () => {
    it('apologizes and resets when the calendar fails', async () => {
      await seed();
      await service.dispatch('u1', '/delete');
      vi.spyOn(calendar, 'deleteEvent').mockRejectedValueOnce(new ExternalServiceError('calendar', 'calendar.deleteEvent failed: 503'));

      expect(await service.dispatch('u1', '1')).toBe("Sorry, I couldn't delete that event. Please try again.");
      expect(await stateOf()).toBe(SessionState.IDLE);
      expect(calendar.size).toBe(3);
    });

    it('apologizes when listing fails', async () => {
      vi.spyOn(calendar, 'listEvents').mockRejectedValueOnce(new Error('offline'));

      expect(await service.dispatch('u1', '/schedule')).toBe("Sorry, I couldn't fetch your events. Please try again later.");
    });

    it('resets when the intent extractor fails', async () => {
      await seed();
      await service.dispatch('u1', '/schedule');
      parse.mockRejectedValueOnce(new ExternalServiceError('intent', 'intent.parse failed: timeout'));

      expect(await service.dispatch('u1', 'anything')).toBe(
        'Sorry, I encountered an error processing your request. Please try again.',
      );
      expect(await stateOf()).toBe(SessionState.IDLE);
    });

    it('apologizes when no slot is free for a create without a start', async () => {
      await calendar.createEvent({ title: 'Away', start: at('2025-06-10T00:00:00Z'), end: at('2025-06-18T00:00:00Z') });
      answer({ kind: 'create', summary: 'Sync', recurrence: 'none', recurrenceCount: 0 });

      expect(await service.dispatch('u1', 'find time for a sync')).toBe(Reply.Apology.noAvailability);
      expect(calendar.size).toBe(1);
    });
  });

  describe('ordering', () => {
    it('handles one message per user at a time, in arrival order', async () => {
      let release: (intent: Intent) => void = () => undefined;
      parse.mockImplementationOnce(
        () =>
          new Promise<Intent>((resolve) => {
            release = resolve;
          }),
      );
      const replies: string[] = [];

      const first = service.dispatch('u1', 'slow question').then((r) => replies.push(r));
      const second = service.dispatch('u1', '/help').then((r) => replies.push(r));
      await vi.waitFor(() => expect(parse).toHaveBeenCalledTimes(1));

      expect(await service.dispatch('u2', '/help')).toBe(Reply.HELP);
      expect(replies).toEqual([]);

      release({ kind: 'fallback', responseText: 'done' });
      await Promise.all([first, second]);
      expect(replies).toEqual(['done', Reply.HELP]);
    });
  });
});

describe('conversation helpers', () => {
  it('parses commands with arguments and a bot suffix', () => {
    expect(parseCommand('/hours 9 17')).toEqual({ name: 'hours', args: ['9', '17'] });
    expect(parseCommand('/Start@timekeeper_bot')).toEqual({ name: 'start', args: [] });
    expect(parseCommand('schedule lunch')).toBeNull();
  });

  it('accepts only whole numbers as a selection', () => {
    expect(parseSelectionNumber(' +3 ')).toBe(3);
    expect(parseSelectionNumber('-1')).toBe(-1);
    expect(() => parseSelectionNumber('2.5')).toThrow('Not a number: "2.5"');
  });

  it('keeps the duration when only the start moves', () => {
    const event = {
      id: 'evt_1',
      title: 'Call',
      start: at('2025-06-10T09:00:00Z'),
      end: at('2025-06-10T09:45:00Z'),
      location: 'Phone',
    };

    expect(applyUpdate(event, { kind: 'update', start: at('2025-06-11T14:00:00Z') })).toEqual({
      ...event,
      start: at('2025-06-11T14:00:00Z'),
      end: at('2025-06-11T14:45:00Z'),
    });
    expect(applyUpdate(event, { kind: 'update', description: 'Bring notes' })).toEqual({
      ...event,
      description: 'Bring notes',
    });
  });
});
