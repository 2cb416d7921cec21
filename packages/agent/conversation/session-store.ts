import { Injectable } from '@nestjs/common';
import { DEFAULT_WORKING_HOURS, type WorkingHours } from '../scheduling/working-hours.js';
import { createSession, type UserSession } from './session.js';

export interface SessionStore {
  /** The user's session, created in IDLE on first contact. */
  getOrCreate(userId: string): Promise<UserSession>;
  put(userId: string, session: UserSession): Promise<void>;
}

/** Process-local sessions; lost on restart. */
@Injectable()
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, UserSession>();

  constructor(private readonly defaultWorkingHours: WorkingHours = DEFAULT_WORKING_HOURS) {}

  async getOrCreate(userId: string): Promise<UserSession> {
    const existing = this.sessions.get(userId);
    if (existing) return existing;
    const session = createSession(userId, this.defaultWorkingHours);
    this.sessions.set(userId, session);
    return session;
  }

  async put(userId: string, session: UserSession): Promise<void> {
    this.sessions.set(userId, session);
  }

  get size(): number {
    return this.sessions.size;
  }
}
