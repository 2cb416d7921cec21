import { Logger } from '@nestjs/common';
import { parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { ExternalServiceError, ParseError } from '@timekeeper/types';
import type { LLM } from '../llm/types.js';
import { systemClock, type Clock } from '../clock.js';
import { buildIntentSystemPrompt, buildIntentUserPrompt } from '../prompts/index.js';
import { parseRecurrenceFrequency } from '../scheduling/recurrence.js';
import { describeExtractionFields, IntentExtraction } from './extraction.schema.js';
import type { IntentContext, IntentParser } from './intent-parser.js';
import { DEFAULT_LIST_DAYS, type FallbackIntent, type Intent } from './intents.js';

export const REPHRASE_REPLY =
  "I'm sorry, I couldn't understand your request. Could you try rephrasing it?";
export const CAPABILITIES_REPLY =
  'I can create, update, delete and list your calendar events, and find free time slots. ' +
  'Try something like "Schedule a meeting with John tomorrow at 2pm for 1 hour".';

const UNTITLED_EVENT = 'Untitled Event';

export interface LlmIntentParserOptions {
  /** Zone that offset-less date-times from the model are read in. */
  timeZone: string;
  clock?: Clock;
}

/** Slice between the first '{' and the last '}' of a model reply. */
export function extractJsonObject(raw: string): string {
  const first = raw.indexOf('{');
  const last = raw.lastIndexOf('}');
  return first >= 0 && last > first ? raw.slice(first, last + 1) : raw;
}

// time part followed by Z or +hh[:mm]
const EXPLICIT_OFFSET = /T[\d:.]+(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Reads an ISO date or date-time; without an offset it is wall-clock time in `timeZone`.
 *
 * @throws ParseError when the value is not a date
 */
export function parseLocalDateTime(value: string, timeZone: string): Date {
  const trimmed = value.trim();
  const date = EXPLICIT_OFFSET.test(trimmed) ? parseISO(trimmed) : fromZonedTime(trimmed, timeZone);
  if (Number.isNaN(date.getTime())) {
    throw new ParseError(value, `Invalid date-time: "${value}"`);
  }
  return date;
}

const text = (value: string | null | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const fallback = (responseText: string): FallbackIntent => ({ kind: 'fallback', responseText });

/**
 * Intent extraction with a single JSON completion.
 */
export class LlmIntentParser implements IntentParser {
  private readonly logger = new Logger(LlmIntentParser.name);
  private readonly systemPrompt = buildIntentSystemPrompt(describeExtractionFields());
  private readonly timeZone: string;
  private readonly clock: Clock;

  constructor(
    private readonly llm: LLM,
    options: LlmIntentParserOptions,
  ) {
    this.timeZone = options.timeZone;
    this.clock = options.clock ?? systemClock;
  }

  async parse(message: string, context: IntentContext = {}): Promise<Intent> {
    const now = this.clock.now();
    const user = buildIntentUserPrompt(message, {
      timezone: this.timeZone,
      nowLocal: formatInTimeZone(now, this.timeZone, "yyyy-MM-dd'T'HH:mm:ss"),
      weekday: formatInTimeZone(now, this.timeZone, 'EEEE'),
    });

    let raw: string;
    try {
      raw = await this.llm.text({
        system: this.systemPrompt,
        user,
        temperature: 0,
        maxTokens: 500,
        timeoutMs: 12_000,
        json: true,
        metadata: { userId: context.userId, requestType: 'intent_extraction' },
      });
    } catch (error) {
      this.logger.error(
        `Intent extraction call failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw ExternalServiceError.wrap('intent', 'parse', error);
    }

    let extraction: IntentExtraction;
    try {
      extraction = IntentExtraction.parse(JSON.parse(extractJsonObject(raw)));
    } catch (error) {
      this.logger.warn(
        `Unusable intent output (${error instanceof Error ? error.message : String(error)}): ${raw.slice(0, 200)}`,
      );
      return fallback(REPHRASE_REPLY);
    }

    try {
      const intent = this.toIntent(extraction);
      this.logger.log(`Classified intent: ${intent.kind}`);
      return intent;
    } catch (error) {
      if (error instanceof ParseError) {
        this.logger.warn(`Intent output rejected: ${error.message}`);
        return fallback(REPHRASE_REPLY);
      }
      throw error;
    }
  }

  private toIntent(x: IntentExtraction): Intent {
    const date = (value: string | null | undefined) => {
      const iso = text(value);
      return iso === undefined ? undefined : parseLocalDateTime(iso, this.timeZone);
    };

    switch (x.intent) {
      case 'create': {
        const start = date(x.start);
        const end = date(x.end);
        const recurrence = text(x.recurrence);
        const spanMinutes =
          start && end && end.getTime() > start.getTime()
            ? Math.round((end.getTime() - start.getTime()) / 60_000)
            : undefined;
        return {
          kind: 'create',
          summary: text(x.summary) ?? UNTITLED_EVENT,
          start,
          durationMinutes: x.durationMinutes ?? spanMinutes,
          description: text(x.description),
          location: text(x.location),
          recurrence: recurrence ? parseRecurrenceFrequency(recurrence) : 'none',
          recurrenceCount: x.recurrenceCount ?? 0,
        };
      }
      case 'update':
        return {
          kind: 'update',
          eventSelection: x.eventSelection ?? undefined,
          eventId: text(x.eventId),
          eventName: text(x.eventName),
          summary: text(x.summary),
          start: date(x.start),
          durationMinutes: x.durationMinutes ?? undefined,
          description: text(x.description),
          location: text(x.location),
        };
      case 'delete':
        return {
          kind: 'delete',
          eventSelection: x.eventSelection ?? undefined,
          eventId: text(x.eventId),
        };
      case 'list':
        return {
          kind: 'list',
          timeRangeDays: x.timeRangeDays ?? DEFAULT_LIST_DAYS,
          startDate: date(x.startDate),
          endDate: date(x.endDate),
        };
      case 'fallback':
        return fallback(text(x.responseText) ?? CAPABILITIES_REPLY);
    }
  }
}
