import { describe, it, expect } from 'vitest';
import { ParseError, ValidationError } from '@timekeeper/types';
import { expandRecurrence, parseRecurrenceFrequency, type Occurrence } from '../scheduling/recurrence.js';

const at = (iso: string) => new Date(iso);
const spans = (occurrences: Occurrence[]) =>
  occurrences.map((o) => `${o.start.toISOString()} ${o.end.toISOString()}`);

describe('expandRecurrence', () => {
  it('clamps monthly occurrences to the end of short months', () => {
    const occurrences = expandRecurrence(at('2025-01-31T10:00:00Z'), at('2025-01-31T11:00:00Z'), 'monthly', 3);

    expect(spans(occurrences)).toEqual([
      '2025-01-31T10:00:00.000Z 2025-01-31T11:00:00.000Z',
      '2025-02-28T10:00:00.000Z 2025-02-28T11:00:00.000Z',
      '2025-03-28T10:00:00.000Z 2025-03-28T11:00:00.000Z',
    ]);
  });

  it('rolls a monthly series over the year end', () => {
    const occurrences = expandRecurrence(at('2025-11-15T08:00:00Z'), at('2025-11-15T08:30:00Z'), 'monthly', 3);

    expect(occurrences.map((o) => o.start.toISOString())).toEqual([
      '2025-11-15T08:00:00.000Z',
      '2025-12-15T08:00:00.000Z',
      '2026-01-15T08:00:00.000Z',
    ]);
  });

  it('keeps the local wall-clock time of monthly occurrences across a DST change', () => {
    // 09:00 in Berlin is 08:00Z in winter and 07:00Z in summer.
    const occurrences = expandRecurrence(
      at('2025-02-10T08:00:00Z'),
      at('2025-02-10T09:00:00Z'),
      'monthly',
      3,
      'Europe/Berlin',
    );

    expect(occurrences.map((o) => o.start.toISOString())).toEqual([
      '2025-02-10T08:00:00.000Z',
      '2025-03-10T08:00:00.000Z',
      '2025-04-10T07:00:00.000Z',
    ]);
  });

  it('adds exactly 24 hours per daily step', () => {
    const occurrences = expandRecurrence(at('2025-06-10T14:00:00Z'), at('2025-06-10T14:45:00Z'), 'daily', 3);

    expect(spans(occurrences)).toEqual([
      '2025-06-10T14:00:00.000Z 2025-06-10T14:45:00.000Z',
      '2025-06-11T14:00:00.000Z 2025-06-11T14:45:00.000Z',
      '2025-06-12T14:00:00.000Z 2025-06-12T14:45:00.000Z',
    ]);
  });

  it('adds exactly seven days per weekly step', () => {
    const occurrences = expandRecurrence(at('2025-06-30T10:00:00Z'), at('2025-06-30T11:00:00Z'), 'weekly', 2);

    expect(spans(occurrences)).toEqual([
      '2025-06-30T10:00:00.000Z 2025-06-30T11:00:00.000Z',
      '2025-07-07T10:00:00.000Z 2025-07-07T11:00:00.000Z',
    ]);
  });

  it('returns just the first occurrence for a count of one', () => {
    const start = at('2025-06-10T10:00:00Z');
    const [only, ...rest] = expandRecurrence(start, at('2025-06-10T11:00:00Z'), 'weekly', 1);

    expect(only?.start.toISOString()).toBe('2025-06-10T10:00:00.000Z');
    expect(only?.start).not.toBe(start);
    expect(rest).toEqual([]);
  });

  it('rejects non-recurring rules, bad counts and empty occurrences', () => {
    const start = at('2025-06-10T10:00:00Z');
    const end = at('2025-06-10T11:00:00Z');

    expect(() => expandRecurrence(start, end, 'none', 3)).toThrow(ValidationError);
    expect(() => expandRecurrence(start, end, 'daily', 0)).toThrow(
      'Invalid recurrence parameters: count must be positive, got 0',
    );
    expect(() => expandRecurrence(start, end, 'daily', 1.5)).toThrow(ValidationError);
    expect(() => expandRecurrence(end, start, 'daily', 2)).toThrow(ValidationError);
  });
});

describe('parseRecurrenceFrequency', () => {
  it('normalizes common spellings', () => {
    expect(parseRecurrenceFrequency('day')).toBe('daily');
    expect(parseRecurrenceFrequency(' Every Week ')).toBe('weekly');
    expect(parseRecurrenceFrequency('MONTHLY')).toBe('monthly');
    expect(parseRecurrenceFrequency('never')).toBe('none');
  });

  it('rejects unknown values with the accepted list', () => {
    expect(() => parseRecurrenceFrequency('fortnightly')).toThrow(
      "Invalid recurrence frequency: 'fortnightly'. Valid values are: 'none', 'daily', 'weekly', 'monthly'",
    );
    expect(() => parseRecurrenceFrequency('constructor')).toThrow(ParseError);
  });
});
