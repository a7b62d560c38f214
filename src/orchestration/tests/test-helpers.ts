/**
 * Helper utilities for tests
 */

import { Chunk, DocumentRef, PageText } from '../src/types';
import { EmbeddingModel } from '../src/embeddings';
import { DocumentExtractor, ExtractOptions } from '../src/extractors';
import { RequestInput } from '../src/request';
import { ErrorCode, ExtractionError } from '../src/errors';
import { sleep } from '../src/async';

/**
 * Embeds text as counts of each vocabulary word, so similarities are easy to work out by hand
 */
export class KeywordEmbeddingModel implements EmbeddingModel {
  readonly name = 'keyword-test-model';
  readonly dimension: number;
  readonly batches: number[] = [];

  constructor(private readonly vocabulary: readonly string[]) {
    this.dimension = vocabulary.length;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    this.batches.push(texts.length);
    return texts.map(text => {
      const tokens = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
      return this.vocabulary.map(word => tokens.filter(token => token === word).length);
    });
  }
}

export type FakeBehavior =
  | { pages: PageText[]; delayMs?: number; onStart?: () => void }
  | { error: Error; delayMs?: number }
  | { hang: true };

/**
 * Extractor returning canned pages per document id. Unknown ids fail with E404.
 */
export class FakeExtractor implements DocumentExtractor {
  readonly calls: string[] = [];
  readonly signals = new Map<string, AbortSignal>();

  constructor(private readonly behaviors: Record<string, FakeBehavior>) {}

  async extract(document: DocumentRef, options: ExtractOptions = {}): Promise<PageText[]> {
    this.calls.push(document.id);
    if (options.signal) {
      this.signals.set(document.id, options.signal);
    }

    const behavior = this.behaviors[document.id];
    if (!behavior) {
      throw new ExtractionError(document.id, `File not found: ${document.id}`, ErrorCode.FILE_NOT_FOUND);
    }

    if ('hang' in behavior) {
      return new Promise<PageText[]>((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }

    if (behavior.delayMs) {
      await sleep(behavior.delayMs);
    }
    if ('error' in behavior) {
      throw behavior.error;
    }
    behavior.onStart?.();
    return behavior.pages;
  }
}

/**
 * Clock the tests move by hand
 */
export class ManualClock {
  private current = 0;

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export function buildRequest(
  filenames: string[],
  persona: string = 'Travel Planner',
  task: string = 'Plan a three day lakeside weekend for a small group.'
): RequestInput {
  return {
    documents: filenames.map(filename => ({ filename, title: filename.replace(/\.[^.]+$/, '') })),
    persona: { role: persona },
    job_to_be_done: { task }
  };
}

/**
 * Create a test chunk; offsets default to the start of page 1
 */
export function createTestChunk(id: string, documentId: string, text: string, overrides: Partial<Chunk> = {}): Chunk {
  return {
    id,
    documentId,
    pageNumber: 1,
    startOffset: 0,
    endOffset: text.length,
    text,
    sectionTitle: null,
    ...overrides
  };
}
