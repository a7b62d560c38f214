/**
 * Unit tests for ranking engine
 */

import { RankingEngine, compareScoredChunks, selectTopK } from '../src/ranking';
import { EmbeddingScorer } from '../src/embeddings';
import { ScoredChunk } from '../src/types';
import { KeywordEmbeddingModel, createTestChunk } from './test-helpers';

const VOCABULARY = ['hotel', 'beach', 'museum', 'revenue', 'nightlife'];

// against "hotel beach": c1 ~1.0, c2 and c4 tie at (1 + 1/sqrt(2)) / 2, c3 0.5
const c1 = createTestChunk('c1', 'a.pdf', 'hotel beach');
const c2 = createTestChunk('c2', 'a.pdf', 'hotel');
const c3 = createTestChunk('c3', 'b.pdf', 'museum');
const c4 = createTestChunk('c4', 'b.pdf', 'beach');
const chunks = [c1, c2, c3, c4];

function createEngine(batchSize: number = 128): RankingEngine {
  const scorer = new EmbeddingScorer(new KeywordEmbeddingModel(VOCABULARY), batchSize);
  return new RankingEngine(scorer, { topK: 10, maxPerDocument: null });
}

function ids(entries: readonly ScoredChunk[]): string[] {
  return entries.map(entry => entry.chunk.id);
}

describe('RankingEngine', () => {
  it('should order by score with ties broken by document id', async () => {
    const selection = await createEngine().rank(chunks, [{ text: 'hotel beach', rank: 0 }], 3);

    expect(ids(selection.entries)).toEqual(['c1', 'c2', 'c4']);
    expect(selection.entries[0].score).toBeCloseTo(1, 10);
    expect(selection.entries[1].score).toBeCloseTo((1 + Math.SQRT1_2) / 2, 10);
    expect(selection.entries[1].score).toBe(selection.entries[2].score);
    expect(selection.candidateCount).toBe(4);
    expect(selection.partial).toBe(false);
  });

  it('should cap entries per document', async () => {
    const selection = await createEngine().rank(chunks, [{ text: 'hotel beach', rank: 0 }], 10, {
      maxPerDocument: 1
    });

    expect(ids(selection.entries)).toEqual(['c1', 'c4']);
  });

  it('should keep each chunk best score across intents', async () => {
    const selection = await createEngine().rank(chunks, [
      { text: 'museum', rank: 0 },
      { text: 'hotel', rank: 1 }
    ]);

    expect(ids(selection.entries)).toEqual(['c2', 'c3', 'c1', 'c4']);
    expect(selection.entries.map(entry => entry.intent.text)).toEqual(['hotel', 'museum', 'hotel', 'museum']);
    expect(selection.entries[0].score).toBe(1);
    expect(selection.entries[1].score).toBe(1);
  });

  it('should keep one entry per chunk id, with the better score', async () => {
    const weak = createTestChunk('dup', 'a.pdf', 'hotel');
    const strong = createTestChunk('dup', 'a.pdf', 'hotel beach');
    const intents = [{ text: 'hotel beach', rank: 0 }];

    for (const input of [[weak, strong, c3], [strong, weak, c3]]) {
      const selection = await createEngine().rank(input, intents);

      expect(ids(selection.entries)).toEqual(['dup', 'c3']);
      expect(selection.entries[0].chunk.text).toBe('hotel beach');
      expect(selection.entries[0].score).toBeCloseTo(1, 10);
      expect(selection.candidateCount).toBe(2);
    }
  });

  it('should credit the lowest-rank intent when intents tie', async () => {
    const selection = await createEngine().rank([c1], [
      { text: 'hotel beach', rank: 1 },
      { text: 'beach hotel', rank: 0 }
    ]);

    expect(selection.entries[0].intent).toEqual({ text: 'beach hotel', rank: 0 });
  });

  it('should fall back to the persona and task without intents', async () => {
    const selection = await createEngine().rank([c1], [], 5, { persona: 'Travel Planner', task: 'hotel beach' });

    expect(selection.entries[0].intent).toEqual({ text: 'Travel Planner: hotel beach', rank: 0 });
    expect(selection.entries[0].score).toBeCloseTo(1, 10);
  });

  it('should return an empty selection for no chunks or topK 0', async () => {
    const engine = createEngine();
    const empty = { entries: [], candidateCount: 0, partial: false };

    await expect(engine.rank([], [{ text: 'hotel', rank: 0 }])).resolves.toEqual(empty);
    await expect(engine.rank(chunks, [{ text: 'hotel', rank: 0 }], 0)).resolves.toEqual(empty);
  });

  it('should rank only what was embedded when told to stop', async () => {
    const selection = await createEngine(2).rank(chunks, [{ text: 'hotel beach', rank: 0 }], 10, {
      shouldContinue: () => false
    });

    expect(selection.partial).toBe(true);
    expect(selection.candidateCount).toBe(2);
    expect(ids(selection.entries)).toEqual(['c1', 'c2']);
  });

  it('should give chunks without vocabulary the neutral score', async () => {
    const blank = createTestChunk('c5', 'c.pdf', 'nothing in common');
    const selection = await createEngine().rank([blank], [{ text: 'hotel', rank: 0 }]);

    expect(selection.entries[0].score).toBe(0.5);
  });

  it('should be deterministic across runs', async () => {
    const engine = createEngine();
    const intents = [{ text: 'beach nightlife', rank: 0 }];

    const first = await engine.rank(chunks, intents);
    const second = await engine.rank([...chunks].reverse(), intents);

    expect(ids(second.entries)).toEqual(ids(first.entries));
  });
});

describe('compareScoredChunks', () => {
  const intent = { text: 'hotel', rank: 0 };

  it('should order equal scores by page then offset', () => {
    const page2 = { chunk: createTestChunk('p2', 'a.pdf', 'x', { pageNumber: 2 }), score: 0.7, intent };
    const page1Late = { chunk: createTestChunk('p1b', 'a.pdf', 'x', { startOffset: 50 }), score: 0.7, intent };
    const page1Early = { chunk: createTestChunk('p1a', 'a.pdf', 'x', { startOffset: 0 }), score: 0.7, intent };

    const sorted = [page2, page1Late, page1Early].sort(compareScoredChunks);

    expect(ids(sorted)).toEqual(['p1a', 'p1b', 'p2']);
  });
});

describe('selectTopK', () => {
  it('should stop at topK', () => {
    const intent = { text: 'hotel', rank: 0 };
    const candidates = ['x1', 'x2', 'x3'].map((id, index) => ({
      chunk: createTestChunk(id, `${id}.pdf`, id),
      score: 0.9 - index * 0.1,
      intent
    }));

    expect(ids(selectTopK(candidates, 2, null))).toEqual(['x1', 'x2']);
  });
});
