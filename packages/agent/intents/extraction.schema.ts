import { z } from 'zod';

/**
 * JSON contract the model answers with. Dates are ISO 8601 strings; without
 * an offset they are wall-clock times of the user's time zone.
 */
export const IntentExtraction = z.object({
  intent: z
    .enum(['create', 'update', 'delete', 'list', 'fallback'])
    .describe('What the user wants to do with their calendar'),

  summary: z.string().nullish().describe('create: event title; update: new title'),
  start: z.string().nullish().describe('create/update: start date-time'),
  end: z.string().nullish().describe('create: end date-time, when the user gave one'),
  durationMinutes: z.number().int().positive().nullish().describe('create/update: length in minutes'),
  description: z.string().nullish(),
  location: z.string().nullish(),
  recurrence: z.string().nullish().describe('create: daily, weekly, monthly or none'),
  recurrenceCount: z.number().int().min(0).nullish().describe('create: number of occurrences'),

  eventSelection: z.number().int().nullish().describe('update/delete: 1-based number from a shown list'),
  eventId: z.string().nullish().describe('update/delete: explicit event id'),
  eventName: z.string().nullish().describe('update: how the user refers to the event'),

  timeRangeDays: z.number().int().positive().nullish().describe('list: number of days to show'),
  startDate: z.string().nullish().describe('list: first day'),
  endDate: z.string().nullish().describe('list: last day'),

  responseText: z.string().nullish().describe('fallback: reply to send back to the user'),
});

export type IntentExtraction = z.infer<typeof IntentExtraction>;

/** One line per field, for the system prompt. */
export function describeExtractionFields(): string {
  return Object.entries(IntentExtraction.shape)
    .map(([key, schema]) => (schema.description ? `- ${key}: ${schema.description}` : `- ${key}`))
    .join('\n');
}
