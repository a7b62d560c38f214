/**
 * Integration tests for the complete ranking pipeline
 * Extraction, query formulation and embeddings run on in-process stand-ins.
 */

import { PipelineOrchestrator, PipelineDependencies, PipelineOutcome, DEFAULT_PIPELINE_CONFIG } from '../src/pipeline';
import { EmbeddingModel, EmbeddingScorer } from '../src/embeddings';
import { FormulateOptions, QueryFormulator } from '../src/queryFormulation';
import { WorkerPool } from '../src/workerPool';
import { formatFailure, formatResult } from '../src/formatter';
import {
  EmbeddingError,
  ErrorCode,
  ExtractionError,
  ModelLoadError,
  NoUsableInputError,
  ValidationError
} from '../src/errors';
import { PageText, PipelineConfig, PipelineResult } from '../src/types';
import { FakeBehavior, FakeExtractor, KeywordEmbeddingModel, ManualClock, buildRequest } from './test-helpers';

const CITIES = 'Alpine Lakes - Cities.pdf';
const CUISINE = 'Alpine Lakes - Dining.pdf';
const THINGS = 'Alpine Lakes - Outings.pdf';

const VOCABULARY = ['beach', 'nightlife', 'hotel', 'budget', 'restaurant', 'group', 'museum', 'history'];

const CITY_PAGES: PageText[] = [
  { pageNumber: 1, text: '# Nice\nNice offers a beach promenade and nightlife.' },
  { pageNumber: 2, text: '# History\nThe old town museum covers local history.' }
];

const TRAVEL_DOCUMENTS: Record<string, FakeBehavior> = {
  [CITIES]: { pages: CITY_PAGES },
  [CUISINE]: {
    pages: [{ pageNumber: 1, text: '# Restaurants\nA group restaurant with budget menus.' }]
  },
  [THINGS]: {
    pages: [
      { pageNumber: 1, text: '# Beaches\nThe beach is great for a group.' },
      { pageNumber: 2, text: '# Stay\nA budget hotel near the beach.' }
    ]
  }
};

const TEST_CONFIG: PipelineConfig = {
  ...DEFAULT_PIPELINE_CONFIG,
  timeBudgetMs: 10_000,
  perDocumentTimeoutMs: 1_000,
  formulationTimeoutMs: 1_000,
  maxWorkers: 2,
  ranking: { topK: 10, maxPerDocument: 3 }
};

class FixedFormulator implements QueryFormulator {
  readonly name = 'fixed';
  constructor(private readonly queries: string[]) {}

  async formulate(): Promise<string[]> {
    return this.queries;
  }
}

class FailingFormulator implements QueryFormulator {
  readonly name = 'failing';

  async formulate(): Promise<string[]> {
    throw new Error('service unavailable');
  }
}

class StalledFormulator implements QueryFormulator {
  readonly name = 'stalled';
  readonly signals: (AbortSignal | undefined)[] = [];

  formulate(_persona: string, _task: string, options: FormulateOptions = {}): Promise<string[]> {
    this.signals.push(options.signal);
    return new Promise(() => undefined);
  }
}

function createOrchestrator(
  overrides: Partial<PipelineDependencies> = {},
  config: PipelineConfig = TEST_CONFIG
): PipelineOrchestrator {
  return new PipelineOrchestrator(
    {
      extractor: new FakeExtractor(TRAVEL_DOCUMENTS),
      formulator: new FixedFormulator(['beach nightlife', 'budget hotel', 'group restaurant']),
      scorer: new EmbeddingScorer(new KeywordEmbeddingModel(VOCABULARY)),
      ...overrides
    },
    config
  );
}

function expectDone(outcome: PipelineOutcome): PipelineResult {
  if (outcome.status !== 'done') {
    throw new Error(`Expected a completed run, got ${outcome.error.name}: ${outcome.error.message}`);
  }
  return outcome.result;
}

function placements(result: PipelineResult): string[] {
  return result.selection.entries.map(entry => `${entry.chunk.documentId}#${entry.chunk.pageNumber}`);
}

describe('Pipeline Integration Tests', () => {
  describe('Travel planner collection', () => {
    it('should rank sections across all documents', async () => {
      const outcome = await createOrchestrator().run(buildRequest([CITIES, CUISINE, THINGS]));
      const result = expectDone(outcome);

      expect(outcome.transitions).toEqual(['validating', 'formulating_queries', 'extracting', 'ranking', 'assembling', 'done']);
      expect(result.intents.map(intent => intent.text)).toEqual(['beach nightlife', 'budget hotel', 'group restaurant']);
      expect(placements(result)).toEqual([`${CITIES}#1`, `${CUISINE}#1`, `${THINGS}#2`, `${THINGS}#1`, `${CITIES}#2`]);
      expect(result.selection.entries.map(entry => entry.intent.text)).toEqual([
        'beach nightlife',
        'group restaurant',
        'budget hotel',
        'beach nightlife',
        'beach nightlife'
      ]);
      expect(result.totalChunks).toBe(5);
      expect(result.issues).toEqual([]);
      expect(result.partial).toBe(false);
    });

    it('should format the result as the output document', async () => {
      const result = expectDone(await createOrchestrator().run(buildRequest([CITIES, CUISINE, THINGS])));

      const output = formatResult(result, { processingTimestamp: new Date('2024-01-01T00:00:00.000Z') });

      expect(output.metadata.input_documents).toEqual([CITIES, CUISINE, THINGS]);
      expect(output.metadata.persona).toBe('Travel Planner');
      expect(output.metadata.total_documents_processed).toBe(3);
      expect(output.metadata.total_chunks_extracted).toBe(5);
      expect(output.metadata.errors).toEqual([]);
      expect(output.extracted_sections[0]).toEqual({
        document: CITIES,
        section_title: 'Nice',
        page_number: 1,
        text_preview: '# Nice Nice offers a beach promenade and nightlife.',
        relevance_score: 1,
        importance_rank: 1
      });
      expect(output.extracted_sections[1].relevance_score).toBe(0.9082);
      expect(output.extracted_sections.map(section => section.section_title)).toEqual([
        'Nice',
        'Restaurants',
        'Stay',
        'Beaches',
        'History'
      ]);
    });

    it('should apply the per-document cap', async () => {
      const config = { ...TEST_CONFIG, ranking: { topK: 10, maxPerDocument: 1 } };
      const result = expectDone(await createOrchestrator({}, config).run(buildRequest([CITIES, CUISINE, THINGS])));

      expect(placements(result)).toEqual([`${CITIES}#1`, `${CUISINE}#1`, `${THINGS}#2`]);
    });

    it('should produce identical rankings for identical input', async () => {
      const orchestrator = createOrchestrator();
      const request = buildRequest([CITIES, CUISINE, THINGS]);

      const first = expectDone(await orchestrator.run(request));
      const second = expectDone(await orchestrator.run(request));

      expect(second.selection.entries.map(entry => entry.chunk.id)).toEqual(
        first.selection.entries.map(entry => entry.chunk.id)
      );
      expect(second.selection.entries.map(entry => entry.score)).toEqual(first.selection.entries.map(entry => entry.score));
    });

    it('should keep concurrent runs independent', async () => {
      const orchestrator = createOrchestrator();

      const [travel, food] = await Promise.all([
        orchestrator.run(buildRequest([CITIES, THINGS])),
        orchestrator.run(buildRequest([CUISINE, 'missing.pdf'], 'Food Critic', 'Review restaurants'))
      ]);

      expect(expectDone(travel).issues).toEqual([]);
      const foodResult = expectDone(food);
      expect(foodResult.request.persona).toBe('Food Critic');
      expect(foodResult.issues.map(issue => issue.source)).toEqual(['missing.pdf']);
    });
  });

  describe('Failure handling', () => {
    it('should fail validation for an empty document list', async () => {
      const outcome = await createOrchestrator().run(buildRequest([]));

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') {
        return;
      }
      expect(outcome.error).toBeInstanceOf(ValidationError);
      expect(outcome.failedIn).toBe('validating');
      expect(outcome.transitions).toEqual(['validating', 'failed']);
      expect(formatFailure(outcome).error.code).toBe('E400_INVALID_INPUT');
    });

    it('should fail with no usable input when every document times out', async () => {
      const extractor = new FakeExtractor({ [CITIES]: { hang: true }, [CUISINE]: { hang: true } });
      const config = { ...TEST_CONFIG, perDocumentTimeoutMs: 20 };

      const outcome = await createOrchestrator({ extractor }, config).run(buildRequest([CITIES, CUISINE]));

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') {
        return;
      }
      expect(outcome.error).toBeInstanceOf(NoUsableInputError);
      expect(outcome.error.code).toBe(ErrorCode.NO_USABLE_INPUT);
      expect(outcome.failedIn).toBe('extracting');
      expect(outcome.transitions).toEqual(['validating', 'formulating_queries', 'extracting', 'failed']);
    });

    it('should rank the remaining documents when one fails', async () => {
      const extractor = new FakeExtractor({
        ...TRAVEL_DOCUMENTS,
        [CUISINE]: { error: new ExtractionError(CUISINE, 'Password-protected PDF', ErrorCode.FILE_ENCRYPTED) }
      });

      const result = expectDone(await createOrchestrator({ extractor }).run(buildRequest([CITIES, CUISINE, THINGS])));

      expect(result.documents.map(document => document.status)).toEqual(['succeeded', 'failed', 'succeeded']);
      expect(result.issues).toEqual([
        expect.objectContaining({
          source: CUISINE,
          kind: 'extraction',
          severity: 'error',
          code: ErrorCode.FILE_ENCRYPTED,
          reason: 'Password-protected PDF'
        })
      ]);
      expect(result.selection.entries.some(entry => entry.chunk.documentId === CUISINE)).toBe(false);
      expect(placements(result)).toEqual([`${CITIES}#1`, `${THINGS}#2`, `${THINGS}#1`, `${CITIES}#2`]);
    });

    it('should fall back to the persona and task when formulation fails', async () => {
      const result = expectDone(
        await createOrchestrator({ formulator: new FailingFormulator() }).run(buildRequest([CITIES, CUISINE, THINGS]))
      );

      expect(result.intents).toEqual([
        { text: 'Travel Planner: Plan a three day lakeside weekend for a small group.', rank: 0 }
      ]);
      const warnings = result.issues.filter(issue => issue.kind === 'formulation');
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatchObject({
        source: 'query_formulation',
        severity: 'warning',
        code: ErrorCode.SERVICE_UNAVAILABLE,
        reason: 'Query formulation failed, fallback query used: service unavailable'
      });
      expect(result.selection.entries.length).toBeGreaterThan(0);
    });

    it('should time-box query formulation', async () => {
      const config = { ...TEST_CONFIG, formulationTimeoutMs: 20 };
      const formulator = new StalledFormulator();

      const result = expectDone(await createOrchestrator({ formulator }, config).run(buildRequest([CITIES])));

      expect(formulator.signals).toHaveLength(1);
      expect(formulator.signals[0]?.aborted).toBe(true);

      expect(result.issues.map(issue => issue.reason)).toEqual([
        'Query formulation failed, fallback query used: Timeout after 20ms: query formulation via stalled'
      ]);
    });

    it('should return partial results once the time budget is spent', async () => {
      const clock = new ManualClock();
      const extractor = new FakeExtractor({
        [CITIES]: { pages: CITY_PAGES, onStart: () => clock.advance(500) },
        [THINGS]: TRAVEL_DOCUMENTS[THINGS]
      });
      const config = { ...TEST_CONFIG, timeBudgetMs: 100 };

      const result = expectDone(
        await createOrchestrator({ extractor, pool: new WorkerPool(1), clock: clock.now }, config).run(
          buildRequest([CITIES, THINGS])
        )
      );

      expect(extractor.calls).toEqual([CITIES]);
      expect(result.partial).toBe(true);
      expect(result.documents[1]).toMatchObject({
        documentId: THINGS,
        status: 'timed-out',
        failure: { code: ErrorCode.DEADLINE_EXCEEDED }
      });
      expect(result.issues.map(issue => issue.kind)).toEqual(['timeout', 'deadline']);
      expect(placements(result)).toEqual([`${CITIES}#1`, `${CITIES}#2`]);
      expect(result.telemetry.elapsedSeconds).toBe(0.5);
    });

    it('should report a failing embedding model as a failed ranking stage', async () => {
      const brokenModel: EmbeddingModel = {
        name: 'broken',
        dimension: 2,
        embedBatch: async () => []
      };

      const outcome = await createOrchestrator({ scorer: new EmbeddingScorer(brokenModel) }).run(buildRequest([CITIES]));

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') {
        return;
      }
      expect(outcome.error).toBeInstanceOf(EmbeddingError);
      expect(outcome.failedIn).toBe('ranking');
    });

    it('should rethrow when the embedding model cannot be loaded', async () => {
      const unloadable: EmbeddingModel = {
        name: 'unloadable',
        dimension: 2,
        embedBatch: async () => {
          throw new ModelLoadError('weights missing');
        }
      };

      await expect(
        createOrchestrator({ scorer: new EmbeddingScorer(unloadable) }).run(buildRequest([CITIES]))
      ).rejects.toBeInstanceOf(ModelLoadError);
    });
  });
});
