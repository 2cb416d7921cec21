import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import type { CalendarEvent } from '@timekeeper/appstore';
import { ExternalServiceError } from '@timekeeper/types';
import { argMax, cosineSimilarity } from './cosine.js';
import { eventSearchText, type SimilarityMatch, type SimilarityOracle } from './types.js';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_EMBEDDING_THRESHOLD = 0.6;

/** The embeddings call this oracle makes; `OpenAI['embeddings']` satisfies it. */
export interface EmbeddingsApi {
  create(body: { model: string; input: string[] }): PromiseLike<{
    data: Array<{ index: number; embedding: number[] }>;
  }>;
}

export interface OpenAiEmbeddingOracleOptions {
  model?: string;
  threshold?: number;
}

/**
 * Semantic matcher: embeds the query together with every candidate's text in
 * one request and scores by cosine similarity.
 */
export class OpenAiEmbeddingOracle implements SimilarityOracle {
  private readonly logger = new Logger(OpenAiEmbeddingOracle.name);
  readonly threshold: number;
  private readonly model: string;

  constructor(
    private readonly embeddings: EmbeddingsApi = new OpenAI().embeddings,
    options: OpenAiEmbeddingOracleOptions = {},
  ) {
    this.threshold = options.threshold ?? DEFAULT_EMBEDDING_THRESHOLD;
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
  }

  async bestMatch(query: string, candidates: readonly CalendarEvent[]): Promise<SimilarityMatch> {
    if (candidates.length === 0) return { event: null, score: 0 };

    let vectors: number[][];
    try {
      const res = await this.embeddings.create({
        model: this.model,
        input: [query, ...candidates.map(eventSearchText)],
      });
      vectors = [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (error) {
      this.logger.error(
        `Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw ExternalServiceError.wrap('similarity', 'bestMatch', error);
    }

    const [queryVector, ...eventVectors] = vectors;
    if (!queryVector || eventVectors.length !== candidates.length) {
      throw new ExternalServiceError(
        'similarity',
        `similarity.bestMatch failed: expected ${candidates.length + 1} embeddings, got ${vectors.length}`,
      );
    }

    const best = argMax(eventVectors.map((v) => cosineSimilarity(queryVector, v)));
    const event = candidates[best.index] ?? null;
    this.logger.log(
      `Best semantic match for "${query}": "${event?.title ?? '-'}" (similarity ${best.score.toFixed(2)})`,
    );
    return { event, score: best.score };
  }
}
