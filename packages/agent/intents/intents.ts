import { z } from 'zod';
import { RECURRENCE_FREQUENCIES } from '../scheduling/recurrence.js';

/**
 * Structured intents the conversation acts on. The union is closed: the
 * conversation service switches on `kind` exhaustively.
 */
export const CreateIntent = z.object({
  kind: z.literal('create'),
  summary: z.string().min(1),
  start: z.date().optional(),
  durationMinutes: z.number().int().positive().optional(),
  description: z.string().optional(),
  location: z.string().optional(),
  recurrence: z.enum(RECURRENCE_FREQUENCIES).default('none'),
  recurrenceCount: z.number().int().min(0).default(0),
});

export const UpdateIntent = z.object({
  kind: z.literal('update'),
  // reference to the event
  eventSelection: z.number().int().optional(),
  eventId: z.string().optional(),
  eventName: z.string().optional(),
  // changes
  summary: z.string().min(1).optional(),
  start: z.date().optional(),
  durationMinutes: z.number().int().positive().optional(),
  description: z.string().optional(),
  location: z.string().optional(),
});

export const DeleteIntent = z.object({
  kind: z.literal('delete'),
  eventSelection: z.number().int().optional(),
  eventId: z.string().optional(),
});

export const ListIntent = z.object({
  kind: z.literal('list'),
  timeRangeDays: z.number().int().positive().default(7),
  startDate: z.date().optional(),
  endDate: z.date().optional(),
});

export const FallbackIntent = z.object({
  kind: z.literal('fallback'),
  responseText: z.string(),
});

export const Intent = z.discriminatedUnion('kind', [
  CreateIntent,
  UpdateIntent,
  DeleteIntent,
  ListIntent,
  FallbackIntent,
]);

export type CreateIntent = z.infer<typeof CreateIntent>;
export type UpdateIntent = z.infer<typeof UpdateIntent>;
export type DeleteIntent = z.infer<typeof DeleteIntent>;
export type ListIntent = z.infer<typeof ListIntent>;
export type FallbackIntent = z.infer<typeof FallbackIntent>;
export type Intent = z.infer<typeof Intent>;
export type IntentKind = Intent['kind'];

export const DEFAULT_LIST_DAYS = 7;
