import { Inject, Injectable, Logger } from '@nestjs/common';
import { addDays, addMinutes } from 'date-fns';
import { CALENDAR_SERVICE, type CalendarEvent, type CalendarService } from '@timekeeper/appstore';
import { KeyedSerialQueue } from '@timekeeper/libs';
import { NoAvailabilityError, ParseError, ValidationError } from '@timekeeper/types';
import type { Clock } from '../clock.js';
import {
  DEFAULT_LIST_DAYS,
  type CreateIntent,
  type DeleteIntent,
  type Intent,
  type ListIntent,
  type UpdateIntent,
} from '../intents/intents.js';
import type { IntentParser } from '../intents/intent-parser.js';
import {
  ASSISTANT_CLOCK,
  INTENT_PARSER,
  SESSION_STORE,
  SIMILARITY_ORACLE,
} from '../nest/assistant.tokens.js';
import { createEventRequest, DEFAULT_DURATION_MINUTES, isRecurring } from '../scheduling/event-request.js';
import { TimeSlotManager } from '../scheduling/time-slot-manager.js';
import { assertWorkingHours } from '../scheduling/working-hours.js';
import { resolveEvent } from '../selection/event-selector.js';
import type { SimilarityOracle } from '../similarity/types.js';
import { formatDay, formatEvent, formatEventList, formatSlots } from './format.js';
import * as Reply from './messages.js';
import { resetSession, SessionState, type UserSession } from './session.js';
import type { SessionStore } from './session-store.js';

/** Look-ahead for commands that list or search upcoming time. */
export const COMMAND_WINDOW_DAYS = 7;
/** Look-ahead when an update or delete names its event in free text. */
export const SELECTION_WINDOW_DAYS = 30;

interface Outcome {
  reply: string;
  session: UserSession;
}

interface Command {
  name: string;
  args: string[];
}

const COMMAND_PATTERN = /^\/([A-Za-z]+)(?:@\S+)?(?:\s+([\s\S]*))?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

export function parseCommand(text: string): Command | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match?.[1]) return null;
  const rest = match[2]?.trim() ?? '';
  return { name: match[1].toLowerCase(), args: rest ? rest.split(/\s+/) : [] };
}

/**
 * @throws ParseError unless the whole text is an integer
 */
export function parseSelectionNumber(text: string): number {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ParseError(trimmed, `Not a number: "${trimmed}"`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Applies the non-empty fields of an update. A new start keeps the event's
 * duration unless a duration is given as well.
 */
export function applyUpdate(event: CalendarEvent, intent: UpdateIntent): CalendarEvent {
  const durationMs = event.end.getTime() - event.start.getTime();
  const start = intent.start ?? event.start;
  const end = intent.durationMinutes
    ? addMinutes(start, intent.durationMinutes)
    : intent.start
      ? new Date(start.getTime() + durationMs)
      : event.end;

  return {
    ...event,
    title: intent.summary ?? event.title,
    start,
    end,
    description: intent.description ?? event.description,
    location: intent.location ?? event.location,
  };
}

const hasChanges = (intent: UpdateIntent) =>
  intent.summary !== undefined ||
  intent.start !== undefined ||
  intent.durationMinutes !== undefined ||
  intent.description !== undefined ||
  intent.location !== undefined;

/**
 * Per-user dialog over the calendar. Each user's messages are handled one at
 * a time, in arrival order; the session is stored once the turn is done.
 */
@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);
  private readonly queue = new KeyedSerialQueue<string>();

  constructor(
    @Inject(CALENDAR_SERVICE) private readonly calendar: CalendarService,
    @Inject(TimeSlotManager) private readonly slots: TimeSlotManager,
    @Inject(INTENT_PARSER) private readonly intents: IntentParser,
    @Inject(SIMILARITY_ORACLE) private readonly similarity: SimilarityOracle,
    @Inject(SESSION_STORE) private readonly sessions: SessionStore,
    @Inject(ASSISTANT_CLOCK) private readonly clock: Clock,
  ) {}

  dispatch(userId: string, text: string): Promise<string> {
    return this.queue.run(userId, () => this.turn(userId, text));
  }

  /** Current session of a user, created on first access. */
  session(userId: string): Promise<UserSession> {
    return this.sessions.getOrCreate(userId);
  }

  private get timeZone(): string {
    return this.slots.timeZone;
  }

  private async turn(userId: string, text: string): Promise<string> {
    const session = await this.sessions.getOrCreate(userId);
    const outcome = await this.transition(session, text);
    await this.sessions.put(userId, outcome.session);
    if (outcome.session.state !== session.state) {
      this.logger.debug(`${userId}: ${session.state} -> ${outcome.session.state}`);
    }
    return outcome.reply;
  }

  private async transition(session: UserSession, text: string): Promise<Outcome> {
    try {
      const command = parseCommand(text);
      if (command) {
        return await this.handleCommand(session, command);
      }

      switch (session.state) {
        case SessionState.IDLE:
        case SessionState.VIEWING_EVENTS:
          return await this.handleMessage(session, text);
        case SessionState.SELECTING_FOR_UPDATE:
          return this.handleUpdateSelection(session, text);
        case SessionState.SELECTING_FOR_DELETE:
          return await this.handleDeleteSelection(session, text);
        case SessionState.UPDATING_EVENT:
          return await this.handleUpdateDetails(session, text);
        case SessionState.FINDING_FREE_SLOTS_CUSTOM:
          return await this.handleFreeSlotRefinement(session, text);
      }
    } catch (error) {
      return this.recover(session, error, 'generic');
    }
  }

  /**
   * Turns a failure into a reply. Validation problems keep the session unless
   * `abortOnValidation` is set; everything else ends the dialog.
   */
  private recover(
    session: UserSession,
    error: unknown,
    apology: Reply.ApologyKind,
    abortOnValidation = false,
  ): Outcome {
    if (error instanceof ValidationError) {
      this.logger.warn(`⚠️ ${session.userId}: ${error.message}`);
      return {
        reply: Reply.validationReply(error.message),
        session: abortOnValidation ? resetSession(session) : session,
      };
    }
    if (error instanceof NoAvailabilityError) {
      this.logger.warn(`⚠️ ${session.userId}: ${error.message}`);
      return { reply: Reply.Apology.noAvailability, session: resetSession(session) };
    }
    this.logger.error(
      `❌ ${session.userId}: turn failed in ${session.state}`,
      error instanceof Error ? error.stack : String(error),
    );
    return { reply: Reply.Apology[apology], session: resetSession(session) };
  }

  // Commands

  private async handleCommand(session: UserSession, command: Command): Promise<Outcome> {
    switch (command.name) {
      case 'start':
        return { reply: Reply.WELCOME, session: resetSession(session) };
      case 'help':
        return { reply: Reply.HELP, session };
      case 'cancel':
        return { reply: Reply.CANCELED, session: resetSession(session) };
      case 'schedule':
        return this.showUpcoming(session);
      case 'update':
        return this.offerSelection(session, SessionState.SELECTING_FOR_UPDATE);
      case 'delete':
        return this.offerSelection(session, SessionState.SELECTING_FOR_DELETE);
      case 'freeslots':
        return this.showDefaultFreeSlots(session);
      case 'hours':
        return this.setWorkingHours(session, command.args);
      default:
        return { reply: Reply.unknownCommand(command.name), session };
    }
  }

  private upcoming(days: number): Promise<CalendarEvent[]> {
    const now = this.clock.now();
    return this.calendar.listEvents({ start: now, end: addDays(now, days) });
  }

  private async showUpcoming(session: UserSession): Promise<Outcome> {
    try {
      const events = await this.upcoming(COMMAND_WINDOW_DAYS);
      if (events.length === 0) {
        return { reply: Reply.NO_UPCOMING_EVENTS, session };
      }
      return {
        reply: Reply.UPCOMING_HEADER + formatEventList(events, this.timeZone),
        session: { ...resetSession(session), state: SessionState.VIEWING_EVENTS, candidateEvents: events },
      };
    } catch (error) {
      return this.recover(session, error, 'fetch');
    }
  }

  private async offerSelection(
    session: UserSession,
    state: SessionState.SELECTING_FOR_UPDATE | SessionState.SELECTING_FOR_DELETE,
  ): Promise<Outcome> {
    const forUpdate = state === SessionState.SELECTING_FOR_UPDATE;
    try {
      const events = await this.upcoming(COMMAND_WINDOW_DAYS);
      if (events.length === 0) {
        return { reply: forUpdate ? Reply.NO_EVENTS_TO_UPDATE : Reply.NO_EVENTS_TO_DELETE, session };
      }
      const header = forUpdate ? Reply.SELECT_FOR_UPDATE_HEADER : Reply.SELECT_FOR_DELETE_HEADER;
      return {
        reply: header + formatEventList(events, this.timeZone),
        session: { ...resetSession(session), state, candidateEvents: events },
      };
    } catch (error) {
      return this.recover(session, error, 'fetch');
    }
  }

  private async showDefaultFreeSlots(session: UserSession): Promise<Outcome> {
    try {
      const text = await this.describeFreeSlots(session, DEFAULT_DURATION_MINUTES, COMMAND_WINDOW_DAYS);
      return {
        reply: `${text}\n\n${Reply.FREE_SLOTS_REFINE_HINT}`,
        session: { ...resetSession(session), state: SessionState.FINDING_FREE_SLOTS_CUSTOM },
      };
    } catch (error) {
      return this.recover(session, error, 'freeSlots', true);
    }
  }

  private setWorkingHours(session: UserSession, args: string[]): Outcome {
    if (args.length === 0) {
      return { reply: Reply.workingHoursShown(session.workingHours), session };
    }
    const [start, end] = args;
    if (args.length !== 2 || !start || !end || !INTEGER_PATTERN.test(start) || !INTEGER_PATTERN.test(end)) {
      return {
        reply: Reply.validationReply('Invalid working hours: usage is /hours <start> <end>, e.g. /hours 9 17'),
        session,
      };
    }
    try {
      const workingHours = assertWorkingHours({
        startHour: Number.parseInt(start, 10),
        endHour: Number.parseInt(end, 10),
      });
      this.logger.log(`${session.userId}: working hours set to ${workingHours.startHour}-${workingHours.endHour}`);
      return { reply: Reply.workingHoursSet(workingHours), session: { ...session, workingHours } };
    } catch (error) {
      return this.recover(session, error, 'generic');
    }
  }

  // Free text in IDLE / VIEWING_EVENTS

  private async handleMessage(session: UserSession, text: string): Promise<Outcome> {
    const intent = await this.intents.parse(text, { userId: session.userId });
    return this.dispatchIntent(session, intent);
  }

  private dispatchIntent(session: UserSession, intent: Intent): Promise<Outcome> | Outcome {
    switch (intent.kind) {
      case 'create':
        return this.createEvent(session, intent);
      case 'update':
        return this.updateByReference(session, intent);
      case 'delete':
        return this.deleteByReference(session, intent);
      case 'list':
        return this.listEvents(session, intent);
      case 'fallback':
        return { reply: intent.responseText, session };
      default: {
        const unreachable: never = intent;
        throw new Error(`Unhandled intent: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async createEvent(session: UserSession, intent: CreateIntent): Promise<Outcome> {
    try {
      const request = createEventRequest({
        summary: intent.summary,
        start: intent.start,
        durationMinutes: intent.durationMinutes,
        description: intent.description,
        location: intent.location,
        recurrence: intent.recurrence,
        recurrenceCount: intent.recurrenceCount,
      });

      if (isRecurring(request)) {
        const ids = await this.slots.scheduleRecurringEvent(request, session.workingHours);
        return { reply: Reply.recurringCreated(ids.length, request.summary), session: resetSession(session) };
      }

      const event = await this.slots.bookEvent(request, session.workingHours);
      return {
        reply: Reply.EVENT_CREATED_HEADER + formatEvent(event, this.timeZone),
        session: resetSession(session),
      };
    } catch (error) {
      return this.recover(session, error, 'create', true);
    }
  }

  private async updateByReference(session: UserSession, intent: UpdateIntent): Promise<Outcome> {
    try {
      const events = await this.upcoming(SELECTION_WINDOW_DAYS);
      if (events.length === 0) {
        return { reply: Reply.NO_EVENTS_TO_UPDATE, session };
      }
      const event = await resolveEvent(
        { index: intent.eventSelection, id: intent.eventId, name: intent.eventName },
        events,
        this.similarity,
      );
      if (!event) {
        return {
          reply: Reply.chooseEvent(events),
          session: {
            ...resetSession(session),
            state: SessionState.SELECTING_FOR_UPDATE,
            candidateEvents: events,
            pendingIntent: intent,
          },
        };
      }
      const changed = applyUpdate(event, intent);
      await this.calendar.updateEvent(changed);
      this.logger.log(`${session.userId}: updated ${changed.id}`);
      return { reply: Reply.updated(changed), session: resetSession(session) };
    } catch (error) {
      return this.recover(session, error, 'update');
    }
  }

  private async deleteByReference(session: UserSession, intent: DeleteIntent): Promise<Outcome> {
    try {
      const events = await this.upcoming(SELECTION_WINDOW_DAYS);
      if (events.length === 0) {
        return { reply: Reply.NO_EVENTS_TO_DELETE, session };
      }
      const event = await resolveEvent(
        { index: intent.eventSelection, id: intent.eventId },
        events,
        this.similarity,
      );
      if (!event) {
        return {
          reply: Reply.chooseEvent(events),
          session: {
            ...resetSession(session),
            state: SessionState.SELECTING_FOR_DELETE,
            candidateEvents: events,
            pendingIntent: intent,
          },
        };
      }
      await this.calendar.deleteEvent(event.id);
      this.logger.log(`${session.userId}: deleted ${event.id}`);
      return { reply: Reply.deleted(event), session: resetSession(session) };
    } catch (error) {
      return this.recover(session, error, 'delete');
    }
  }

  private async listEvents(session: UserSession, intent: ListIntent): Promise<Outcome> {
    const start = intent.startDate ?? this.clock.now();
    const end = intent.endDate ?? addDays(start, intent.timeRangeDays);
    try {
      const events = await this.calendar.listEvents({ start, end });
      const from = formatDay(start, this.timeZone);
      const to = formatDay(end, this.timeZone);
      if (events.length === 0) {
        return { reply: Reply.nothingScheduled(from, to), session };
      }
      return { reply: Reply.scheduleHeader(from, to) + formatEventList(events, this.timeZone), session };
    } catch (error) {
      return this.recover(session, error, 'list');
    }
  }

  // Selection states

  private handleUpdateSelection(session: UserSession, text: string): Outcome {
    const event = this.pickCandidate(session, text);
    if (typeof event === 'string') {
      return { reply: event, session };
    }
    return {
      reply: Reply.updatePrompt(event),
      session: {
        ...session,
        state: SessionState.UPDATING_EVENT,
        candidateEvents: [],
        selectedEvent: event,
      },
    };
  }

  private async handleDeleteSelection(session: UserSession, text: string): Promise<Outcome> {
    const event = this.pickCandidate(session, text);
    if (typeof event === 'string') {
      return { reply: event, session };
    }
    try {
      await this.calendar.deleteEvent(event.id);
      this.logger.log(`${session.userId}: deleted ${event.id}`);
      return { reply: Reply.deleted(event), session: resetSession(session) };
    } catch (error) {
      return this.recover(session, error, 'delete');
    }
  }

  /** The chosen candidate, or the corrective prompt to send back. */
  private pickCandidate(session: UserSession, text: string): CalendarEvent | string {
    let index: number;
    try {
      index = parseSelectionNumber(text);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      this.logger.warn(`⚠️ ${session.userId}: ${error.message}`);
      return Reply.NOT_A_NUMBER;
    }
    const event = index >= 1 ? session.candidateEvents[index - 1] : undefined;
    if (!event) {
      this.logger.warn(`⚠️ ${session.userId}: selection ${index} out of ${session.candidateEvents.length}`);
      return Reply.INVALID_SELECTION;
    }
    return event;
  }

  private async handleUpdateDetails(session: UserSession, text: string): Promise<Outcome> {
    const selected = session.selectedEvent;
    if (!selected) {
      this.logger.warn(`⚠️ ${session.userId}: no event selected for update`);
      return { reply: Reply.LOST_SELECTION, session: resetSession(session) };
    }

    const intent = await this.intents.parse(text, { userId: session.userId });
    if (intent.kind !== 'update' || !hasChanges(intent)) {
      return { reply: Reply.UPDATE_NOT_UNDERSTOOD, session };
    }

    try {
      const changed = applyUpdate(selected, intent);
      await this.calendar.updateEvent(changed);
      this.logger.log(`${session.userId}: updated ${changed.id}`);
      return { reply: Reply.updated(changed), session: resetSession(session) };
    } catch (error) {
      return this.recover(session, error, 'update');
    }
  }

  private async handleFreeSlotRefinement(session: UserSession, text: string): Promise<Outcome> {
    try {
      const intent = await this.intents.parse(text, { userId: session.userId });
      const durationMinutes =
        intent.kind === 'create' ? (intent.durationMinutes ?? DEFAULT_DURATION_MINUTES) : DEFAULT_DURATION_MINUTES;
      const days = intent.kind === 'list' ? intent.timeRangeDays : DEFAULT_LIST_DAYS;
      const reply = await this.describeFreeSlots(session, durationMinutes, days);
      return { reply, session: resetSession(session) };
    } catch (error) {
      return this.recover(session, error, 'freeSlots', true);
    }
  }

  private async describeFreeSlots(session: UserSession, durationMinutes: number, days: number): Promise<string> {
    const now = this.clock.now();
    const found = await this.slots.findFreeSlots(now, addDays(now, days), durationMinutes, session.workingHours);
    this.logger.log(`${session.userId}: ${found.length} free ${durationMinutes}m slots in ${days} days`);
    if (found.length === 0) {
      return Reply.noFreeSlots(days, durationMinutes);
    }
    return formatSlots(found, durationMinutes, this.timeZone).trimEnd();
  }
}
