import { Logger } from '@nestjs/common';
import type { CalendarEvent } from '@timekeeper/appstore';
import type { SimilarityOracle } from '../similarity/types.js';

/** How the user pointed at an event. Any combination of fields may be set. */
export interface EventReference {
  /** 1-based position in the candidate list. */
  index?: number;
  id?: string;
  name?: string;
}

export type SelectionMethod = 'index' | 'id' | 'name';

export interface Selection {
  event: CalendarEvent;
  method: SelectionMethod;
  score?: number;
}

const logger = new Logger('EventSelector');

/**
 * Resolves a reference against `candidates`, in priority order index, then
 * id, then name. An index outside the list is ignored; a present id is final
 * even when unknown, so the name is only consulted without one. A name match
 * is accepted only when its score is strictly above the oracle's threshold.
 */
export async function selectEvent(
  reference: EventReference,
  candidates: readonly CalendarEvent[],
  oracle: SimilarityOracle,
): Promise<Selection | null> {
  const { index, id, name } = reference;

  if (index !== undefined && Number.isInteger(index) && index >= 1 && index <= candidates.length) {
    const event = candidates[index - 1];
    if (event) {
      logger.log(`Selected event by index ${index}: ${event.title}`);
      return { event, method: 'index' };
    }
  } else if (id !== undefined) {
    const event = candidates.find((e) => e.id === id);
    if (event) {
      logger.log(`Selected event by id ${id}: ${event.title}`);
      return { event, method: 'id' };
    }
  } else if (name !== undefined && name.trim()) {
    const match = await oracle.bestMatch(name, candidates);
    if (match.event && match.score > oracle.threshold) {
      logger.log(
        `Selected event by similarity: ${match.event.title} (similarity: ${match.score.toFixed(2)})`,
      );
      return { event: match.event, method: 'name', score: match.score };
    }
    logger.log(
      `No event above threshold ${oracle.threshold} for "${name}" (best: ${match.score.toFixed(2)})`,
    );
  }

  return null;
}

/** `selectEvent` returning just the matched event. */
export async function resolveEvent(
  reference: EventReference,
  candidates: readonly CalendarEvent[],
  oracle: SimilarityOracle,
): Promise<CalendarEvent | null> {
  const selection = await selectEvent(reference, candidates, oracle);
  return selection?.event ?? null;
}
