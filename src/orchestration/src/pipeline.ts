/**
 * Pipeline orchestrator
 * Drives one ranking run through its states:
 * validating -> formulating_queries -> extracting -> ranking -> assembling -> done
 * with `failed` reachable from every non-terminal state.
 *
 * The overall time budget is soft: once spent, no new documents are started and
 * ranking stops embedding, but whatever has been scored is still returned.
 */

import {
  Chunk,
  DocumentStatus,
  ExtractionOutcome,
  PipelineConfig,
  PipelineRequest,
  PipelineResult,
  PipelineStage,
  PipelineState,
  ProcessingIssue,
  QueryIntent,
  Selection
} from './types';
import { DocumentExtractor } from './extractors';
import { DocumentCoordinator } from './documentCoordinator';
import { EmbeddingScorer } from './embeddings';
import { DEFAULT_RANKING_CONFIG, RankingEngine } from './ranking';
import { QueryFormulator, buildFallbackIntent, toQueryIntents, DEFAULT_MAX_INTENTS } from './queryFormulation';
import { parseRequest } from './request';
import { TaskPool, WorkerPool, defaultPoolSize } from './workerPool';
import { Clock, Deadline, toSeconds, withTimeout } from './async';
import { DEFAULT_CHUNKING_CONFIG } from './chunking';
import {
  ErrorCode,
  FormulationError,
  ModelLoadError,
  NoUsableInputError,
  OperationTimeoutError,
  PipelineError,
  UnexpectedError,
  toErrorMessage
} from './errors';
import { logger } from './logger';

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  timeBudgetMs: 10_000,
  perDocumentTimeoutMs: 8_000,
  formulationTimeoutMs: 3_000,
  maxWorkers: defaultPoolSize(),
  maxIntents: DEFAULT_MAX_INTENTS,
  chunking: DEFAULT_CHUNKING_CONFIG,
  ranking: DEFAULT_RANKING_CONFIG
};

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  validating: ['formulating_queries', 'failed'],
  formulating_queries: ['extracting', 'failed'],
  extracting: ['ranking', 'failed'],
  ranking: ['assembling', 'failed'],
  assembling: ['done', 'failed'],
  done: [],
  failed: []
};

export interface PipelineDependencies {
  extractor: DocumentExtractor;
  formulator: QueryFormulator;
  scorer: EmbeddingScorer;
  pool?: TaskPool;
  clock?: Clock;
}

export type PipelineOutcome =
  | {
      status: 'done';
      result: PipelineResult;
      transitions: PipelineState[];
    }
  | {
      status: 'failed';
      error: PipelineError;
      failedIn: PipelineStage;
      transitions: PipelineState[];
      elapsedSeconds: number;
    };

/**
 * Per-run state. The orchestrator itself holds none, so runs may overlap.
 */
class RunContext {
  state: PipelineState = 'validating';
  readonly transitions: PipelineState[] = ['validating'];
  readonly issues: ProcessingIssue[] = [];
  readonly stages: Partial<Record<PipelineStage, number>> = {};
  readonly startedAt: string;
  private stageStartedAt: number;
  private deadlineReported = false;

  constructor(
    readonly deadline: Deadline,
    private readonly now: Clock
  ) {
    this.startedAt = new Date().toISOString();
    this.stageStartedAt = now();
  }

  transition(to: PipelineState): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new Error(`Illegal pipeline transition ${this.state} -> ${to}`);
    }
    if (this.state !== 'done' && this.state !== 'failed') {
      this.stages[this.state] = toSeconds(this.now() - this.stageStartedAt);
    }
    logger.debug(`Pipeline state: ${this.state} -> ${to}`);
    this.state = to;
    this.transitions.push(to);
    this.stageStartedAt = this.now();
  }

  addIssue(issue: Omit<ProcessingIssue, 'timestamp'>): void {
    this.issues.push({ ...issue, timestamp: new Date().toISOString() });
  }

  /**
   * Record a single deadline warning the first time the budget is found spent
   */
  checkDeadline(stage: PipelineStage): boolean {
    if (!this.deadline.expired()) {
      return false;
    }
    if (!this.deadlineReported) {
      this.deadlineReported = true;
      logger.warn(`Time budget of ${this.deadline.budgetMs}ms exceeded during ${stage}; continuing with partial results`);
      this.addIssue({
        source: 'pipeline',
        kind: 'deadline',
        severity: 'warning',
        code: ErrorCode.DEADLINE_EXCEEDED,
        reason: `Time budget of ${this.deadline.budgetMs}ms exceeded during ${stage}`
      });
    }
    return true;
  }
}

function isStage(state: PipelineState): state is PipelineStage {
  return state !== 'done' && state !== 'failed';
}

export class PipelineOrchestrator {
  private readonly coordinator: DocumentCoordinator;
  private readonly rankingEngine: RankingEngine;
  private readonly formulator: QueryFormulator;
  private readonly now: Clock;

  constructor(
    dependencies: PipelineDependencies,
    private readonly config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
  ) {
    this.now = dependencies.clock ?? Date.now;
    this.formulator = dependencies.formulator;
    this.coordinator = new DocumentCoordinator(
      dependencies.extractor,
      dependencies.pool ?? new WorkerPool(config.maxWorkers),
      this.now
    );
    this.rankingEngine = new RankingEngine(dependencies.scorer, config.ranking);
  }

  /**
   * Run the pipeline for one raw request. Terminal failures come back as a
   * `failed` outcome; a ModelLoadError is rethrown because no later run can succeed either.
   */
  async run(input: unknown): Promise<PipelineOutcome> {
    const context = new RunContext(new Deadline(this.config.timeBudgetMs, this.now), this.now);
    logger.section('Persona Ranking Pipeline Started');

    try {
      const request = parseRequest(input);
      logger.info(`Request: ${request.documents.length} documents, persona "${request.persona}"`);

      context.transition('formulating_queries');
      const intents = await this.formulateIntents(request, context);

      context.transition('extracting');
      const outcomes = await this.coordinator.extractAll(request.documents, {
        perDocumentTimeoutMs: this.config.perDocumentTimeoutMs,
        chunking: this.config.chunking,
        deadline: context.deadline
      });
      this.recordDocumentIssues(outcomes, context);
      context.checkDeadline('extracting');

      const usable = outcomes.filter(outcome => outcome.status === 'succeeded');
      if (usable.length === 0) {
        throw new NoUsableInputError(`None of the ${outcomes.length} documents produced usable text`);
      }
      // ranking takes the chunks; the outcomes only keep counts from here on
      const chunks: Chunk[] = usable.flatMap(outcome => outcome.chunks);
      const documents = outcomes.map(toDocumentStatus);

      context.transition('ranking');
      const selection = await this.rankingEngine.rank(chunks, intents, this.config.ranking.topK, {
        maxPerDocument: this.config.ranking.maxPerDocument,
        persona: request.persona,
        task: request.task,
        shouldContinue: () => !context.checkDeadline('ranking')
      });

      context.transition('assembling');
      const result = this.assemble(request, intents, selection, documents, chunks.length, context);

      context.transition('done');
      logger.section('Pipeline Complete');
      logger.success(`Total execution time: ${result.telemetry.elapsedSeconds}s`);

      return { status: 'done', result, transitions: context.transitions };
    } catch (error) {
      const failedIn = isStage(context.state) ? context.state : 'assembling';
      const pipelineError = error instanceof PipelineError ? error : new UnexpectedError(error);

      if (isStage(context.state)) {
        context.transition('failed');
      }
      logger.error(`Pipeline failed during ${failedIn}: ${pipelineError.message}`, pipelineError);

      if (pipelineError instanceof ModelLoadError) {
        throw pipelineError;
      }

      return {
        status: 'failed',
        error: pipelineError,
        failedIn,
        transitions: context.transitions,
        elapsedSeconds: toSeconds(context.deadline.elapsedMs())
      };
    }
  }

  private async formulateIntents(request: PipelineRequest, context: RunContext): Promise<QueryIntent[]> {
    const timeoutMs = Math.max(1, Math.min(this.config.formulationTimeoutMs, context.deadline.remainingMs()));
    const controller = new AbortController();

    try {
      const queries = await withTimeout(
        this.formulator.formulate(request.persona, request.task, { signal: controller.signal }),
        timeoutMs,
        `query formulation via ${this.formulator.name}`
      );
      const intents = toQueryIntents(queries, this.config.maxIntents);
      if (intents.length === 0) {
        throw new FormulationError(`${this.formulator.name} returned no usable queries`);
      }
      logger.info(`Formulated ${intents.length} intents`, intents.map(intent => intent.text));
      return intents;
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        controller.abort();
      }
      const fallback = buildFallbackIntent(request.persona, request.task);
      logger.warn(`Query formulation failed (${toErrorMessage(error)}); using fallback "${fallback.text}"`);
      context.addIssue({
        source: 'query_formulation',
        kind: 'formulation',
        severity: 'warning',
        code: ErrorCode.SERVICE_UNAVAILABLE,
        reason: `Query formulation failed, fallback query used: ${toErrorMessage(error)}`
      });
      return [fallback];
    }
  }

  private recordDocumentIssues(outcomes: readonly ExtractionOutcome[], context: RunContext): void {
    for (const outcome of outcomes) {
      if (outcome.status === 'succeeded' || !outcome.failure) {
        continue;
      }
      context.addIssue({
        source: outcome.documentId,
        kind: outcome.status === 'timed-out' ? 'timeout' : 'extraction',
        severity: 'error',
        code: outcome.failure.code,
        reason: outcome.failure.reason
      });
    }
  }

  private assemble(
    request: PipelineRequest,
    intents: readonly QueryIntent[],
    selection: Selection,
    documents: readonly DocumentStatus[],
    totalChunks: number,
    context: RunContext
  ): PipelineResult {
    const result: PipelineResult = {
      request,
      intents: Object.freeze([...intents]),
      selection: Object.freeze({ ...selection, entries: Object.freeze([...selection.entries]) }),
      documents: Object.freeze([...documents]),
      issues: Object.freeze([...context.issues]),
      totalChunks,
      partial: selection.partial || context.issues.some(issue => issue.kind === 'deadline'),
      telemetry: {
        startedAt: context.startedAt,
        elapsedSeconds: toSeconds(context.deadline.elapsedMs()),
        stages: { ...context.stages }
      }
    };
    return Object.freeze(result);
  }
}

function toDocumentStatus(outcome: ExtractionOutcome): DocumentStatus {
  const { chunks, ...rest } = outcome;
  return { ...rest, chunkCount: chunks.length };
}

