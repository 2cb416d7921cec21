import { Injectable } from '@nestjs/common';
import type { LogLevel } from '@nestjs/common';
import { z } from 'zod';
import type { CalendarModuleOptions } from '@timekeeper/appstore';
import { assertWorkingHours, type WorkingHours } from '@timekeeper/agent';
import { ValidationError } from '@timekeeper/types';

const isTimeZone = (zone: string) => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
};

const LOG_LEVELS = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'] as const;

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  TIMEZONE: z.string().default('UTC').refine(isTimeZone, { message: 'TIMEZONE must be an IANA time zone' }),
  WORKING_HOURS_START: z.coerce.number().default(9),
  WORKING_HOURS_END: z.coerce.number().default(17),

  CALENDAR_PROVIDER: z.enum(['google', 'memory']).default('memory'),
  GOOGLE_CALENDAR_CLIENT_ID: z.string().optional(),
  GOOGLE_CALENDAR_CLIENT_SECRET: z.string().optional(),
  GOOGLE_CALENDAR_REFRESH_TOKEN: z.string().optional(),
  GOOGLE_CALENDAR_ID: z.string().default('primary'),

  SIMILARITY_PROVIDER: z.enum(['lexical', 'openai']).default('lexical'),
  SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  LOG_LEVEL: z.string().optional(),
  LOG_FILE: z.string().default('logs/timekeeper.log'),
  LOG_TO_CONSOLE: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

@Injectable()
export class ConfigService {
  readonly env: Env;

  constructor(source: NodeJS.ProcessEnv = process.env) {
    const parsed = EnvSchema.safeParse(source);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ValidationError(`Invalid configuration: ${problems}`);
    }
    this.env = parsed.data;
  }

  get port(): number {
    return this.env.PORT;
  }

  get timeZone(): string {
    return this.env.TIMEZONE;
  }

  get workingHours(): WorkingHours {
    return assertWorkingHours({
      startHour: this.env.WORKING_HOURS_START,
      endHour: this.env.WORKING_HOURS_END,
    });
  }

  get calendar(): CalendarModuleOptions {
    const { CALENDAR_PROVIDER: provider, TIMEZONE: timeZone } = this.env;
    if (provider === 'memory') return { provider, timeZone };

    const clientId = this.env.GOOGLE_CALENDAR_CLIENT_ID;
    const clientSecret = this.env.GOOGLE_CALENDAR_CLIENT_SECRET;
    const refreshToken = this.env.GOOGLE_CALENDAR_REFRESH_TOKEN;
    if (!clientId || !clientSecret || !refreshToken) {
      throw new ValidationError(
        'CALENDAR_PROVIDER=google needs GOOGLE_CALENDAR_CLIENT_ID, GOOGLE_CALENDAR_CLIENT_SECRET and GOOGLE_CALENDAR_REFRESH_TOKEN',
      );
    }
    return {
      provider,
      timeZone,
      google: { clientId, clientSecret, refreshToken, calendarId: this.env.GOOGLE_CALENDAR_ID },
    };
  }

  get similarity(): { provider: Env['SIMILARITY_PROVIDER']; threshold?: number; model: string } {
    return {
      provider: this.env.SIMILARITY_PROVIDER,
      threshold: this.env.SIMILARITY_THRESHOLD,
      model: this.env.OPENAI_EMBEDDING_MODEL,
    };
  }

  get logLevels(): LogLevel[] {
    const raw = this.env.LOG_LEVEL;
    if (!raw) return ['log', 'error', 'warn'];
    return raw
      .split(',')
      .map((level) => level.trim())
      .filter((level): level is LogLevel => LOG_LEVELS.some((known) => known === level));
  }

  get logFile(): string {
    return this.env.LOG_FILE;
  }

  get logToConsole(): boolean {
    return this.env.LOG_TO_CONSOLE !== 'false';
  }
}
