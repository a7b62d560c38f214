/**
 * Ranking engine
 * Scores every chunk against every query intent and selects a
 * deduplicated, per-document-capped top-K list.
 */

import { Chunk, QueryIntent, RankingConfig, ScoredChunk, Selection } from './types';
import { EmbeddingScorer, toRelevanceScore } from './embeddings';
import { buildFallbackIntent } from './queryFormulation';
import { logger } from './logger';

export const DEFAULT_RANKING_CONFIG: RankingConfig = {
  topK: 10,
  maxPerDocument: 3
};

export interface RankOptions {
  /**
   * Per-document cap; null disables it. Defaults to the engine's configuration.
   */
  maxPerDocument?: number | null;
  /**
   * Used to build the fallback intent when `intents` is empty
   */
  persona?: string;
  task?: string;
  /**
   * Asked between chunk embedding batches; returning false ranks only what was embedded
   */
  shouldContinue?: () => boolean;
}

/**
 * Score descending, then document id, page and offset ascending
 */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.chunk.documentId !== b.chunk.documentId) {
    return a.chunk.documentId < b.chunk.documentId ? -1 : 1;
  }
  if (a.chunk.pageNumber !== b.chunk.pageNumber) {
    return a.chunk.pageNumber - b.chunk.pageNumber;
  }
  return a.chunk.startOffset - b.chunk.startOffset;
}

/**
 * Keep at most `maxPerDocument` entries per document and stop at `topK`.
 * Expects `candidates` already sorted.
 */
export function selectTopK(
  candidates: readonly ScoredChunk[],
  topK: number,
  maxPerDocument: number | null
): ScoredChunk[] {
  const perDocument = new Map<string, number>();
  const selected: ScoredChunk[] = [];

  for (const candidate of candidates) {
    if (selected.length >= topK) {
      break;
    }
    const count = perDocument.get(candidate.chunk.documentId) ?? 0;
    if (maxPerDocument !== null && count >= maxPerDocument) {
      continue;
    }
    perDocument.set(candidate.chunk.documentId, count + 1);
    selected.push(candidate);
  }

  return selected;
}

export class RankingEngine {
  constructor(
    private readonly scorer: EmbeddingScorer,
    private readonly config: RankingConfig = DEFAULT_RANKING_CONFIG
  ) {}

  async rank(
    chunks: readonly Chunk[],
    intents: readonly QueryIntent[],
    topK: number = this.config.topK,
    options: RankOptions = {}
  ): Promise<Selection> {
    const maxPerDocument = options.maxPerDocument === undefined ? this.config.maxPerDocument : options.maxPerDocument;
    const limit = Math.max(0, Math.floor(topK));

    if (chunks.length === 0 || limit === 0) {
      logger.info('Nothing to rank');
      return { entries: [], candidateCount: 0, partial: false };
    }

    const effectiveIntents = [...intents].sort((a, b) => a.rank - b.rank);
    if (effectiveIntents.length === 0) {
      logger.warn('No query intents supplied; ranking against the persona/task fallback');
      effectiveIntents.push(buildFallbackIntent(options.persona ?? '', options.task ?? ''));
    }

    logger.info(`Ranking ${chunks.length} chunks against ${effectiveIntents.length} intents (topK=${limit}, cap=${maxPerDocument ?? 'none'})`);

    const intentVectors = await this.scorer.embed(effectiveIntents.map(intent => intent.text));
    const { vectors: chunkVectors, complete } = await this.scorer.embedWhile(
      chunks.map(chunk => chunk.text),
      options.shouldContinue
    );

    const best = new Map<string, ScoredChunk>();

    for (let i = 0; i < chunkVectors.length; i++) {
      const chunk = chunks[i];
      let top: ScoredChunk | null = null;

      for (let j = 0; j < effectiveIntents.length; j++) {
        const score = toRelevanceScore(this.scorer.similarity(chunkVectors[i], intentVectors[j]));
        // strict comparison keeps the lowest-rank intent on ties
        if (top === null || score > top.score) {
          top = { chunk, score, intent: effectiveIntents[j] };
        }
      }

      if (top === null) {
        continue;
      }

      const existing = best.get(chunk.id);
      if (!existing || compareScoredChunks(top, existing) < 0) {
        best.set(chunk.id, top);
      }
    }

    const candidates = Array.from(best.values()).sort(compareScoredChunks);
    const entries = selectTopK(candidates, limit, maxPerDocument);

    if (!complete) {
      logger.warn(`Partial ranking: ${chunkVectors.length}/${chunks.length} chunks scored before the deadline`);
    }
    logger.success(`Selected ${entries.length} of ${candidates.length} candidates`);

    return { entries, candidateCount: candidates.length, partial: !complete };
  }
}
