import { Injectable, Logger } from '@nestjs/common';
import type { CalendarEvent } from '@timekeeper/appstore';
import { argMax, sparseCosine } from './cosine.js';
import { eventSearchText, type SimilarityMatch, type SimilarityOracle } from './types.js';

export const DEFAULT_LEXICAL_THRESHOLD = 0.5;

const TOKEN = /[\p{L}\p{N}]+/gu;

export function termCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of text.toLowerCase().match(TOKEN) ?? []) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Token-overlap matcher: cosine similarity of lower-cased word counts. Needs
 * no network access, so it is the default oracle.
 */
@Injectable()
export class LexicalSimilarityOracle implements SimilarityOracle {
  private readonly logger = new Logger(LexicalSimilarityOracle.name);

  constructor(readonly threshold: number = DEFAULT_LEXICAL_THRESHOLD) {}

  async bestMatch(query: string, candidates: readonly CalendarEvent[]): Promise<SimilarityMatch> {
    if (candidates.length === 0) return { event: null, score: 0 };
    const queryTerms = termCounts(query);
    const scores = candidates.map((event) => sparseCosine(queryTerms, termCounts(eventSearchText(event))));
    const best = argMax(scores);
    const event = candidates[best.index] ?? null;
    this.logger.debug(`Best lexical match for "${query}": "${event?.title ?? '-'}" (${best.score.toFixed(2)})`);
    return { event, score: best.score };
  }
}
