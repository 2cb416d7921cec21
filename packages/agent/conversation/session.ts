import type { CalendarEvent } from '@timekeeper/appstore';
import type { Intent } from '../intents/intents.js';
import type { WorkingHours } from '../scheduling/working-hours.js';

export enum SessionState {
  IDLE = 'IDLE',
  VIEWING_EVENTS = 'VIEWING_EVENTS',
  SELECTING_FOR_UPDATE = 'SELECTING_FOR_UPDATE',
  SELECTING_FOR_DELETE = 'SELECTING_FOR_DELETE',
  UPDATING_EVENT = 'UPDATING_EVENT',
  FINDING_FREE_SLOTS_CUSTOM = 'FINDING_FREE_SLOTS_CUSTOM',
}

/**
 * Dialog state of one user. Sessions are replaced, never mutated: every turn
 * produces a new value which is stored once the turn has finished.
 */
export interface UserSession {
  readonly userId: string;
  readonly state: SessionState;
  /** Events the user picks from, shown to them 1-based. */
  readonly candidateEvents: readonly CalendarEvent[];
  readonly pendingIntent?: Intent;
  readonly selectedEvent?: CalendarEvent;
  readonly workingHours: WorkingHours;
}

export function createSession(userId: string, workingHours: WorkingHours): UserSession {
  return {
    userId,
    state: SessionState.IDLE,
    candidateEvents: [],
    workingHours: { ...workingHours },
  };
}

/** Back to IDLE with the dialog context dropped; per-user settings survive. */
export function resetSession(session: UserSession): UserSession {
  return createSession(session.userId, session.workingHours);
}
