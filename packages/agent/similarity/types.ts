import type { CalendarEvent } from '@timekeeper/appstore';

export interface SimilarityMatch {
  /** Highest-scoring candidate, or null when there were none. */
  event: CalendarEvent | null;
  score: number;
}

/**
 * Fuzzy matcher for free-text event references. Returns its best candidate
 * unconditionally; callers compare `score` against `threshold`.
 */
export interface SimilarityOracle {
  readonly threshold: number;
  bestMatch(query: string, candidates: readonly CalendarEvent[]): Promise<SimilarityMatch>;
}

/** Text an event is matched on: title, then description when present. */
export const eventSearchText = (event: Pick<CalendarEvent, 'title' | 'description'>) =>
  event.description ? `${event.title} ${event.description}` : event.title;
