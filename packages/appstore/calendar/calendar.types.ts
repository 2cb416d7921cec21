export type CalendarProviderId = 'google' | 'memory';

export type CalendarEventId = string;

export type CalendarEvent = {
  id: CalendarEventId;
  /** Event summary shown to the user; never empty. */
  title: string;
  description?: string;
  start: Date;
  end: Date;
  timezone?: string;
  location?: string;
  htmlLink?: string;
};

/** An event that has not been persisted yet, so it has no id. */
export type CalendarEventDraft = Omit<CalendarEvent, 'id' | 'htmlLink'>;

/** Half-open query window [start, end). */
export type EventRange = {
  start: Date;
  end: Date;
};

export type CreatedEvent = {
  id: CalendarEventId;
  htmlLink?: string;
};
