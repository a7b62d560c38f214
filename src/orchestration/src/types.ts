/**
 * Type definitions for the persona-driven ranking pipeline
 */

import type { ErrorCode } from './errors';

export interface DocumentRef {
  id: string;
  title: string;
}

export interface PipelineRequest {
  readonly persona: string;
  readonly task: string;
  readonly documents: readonly DocumentRef[];
  readonly challengeInfo?: Record<string, unknown>;
}

export interface QueryIntent {
  text: string;
  rank: number;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface Chunk {
  readonly id: string;
  readonly documentId: string;
  readonly pageNumber: number;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly text: string;
  readonly sectionTitle: string | null;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
  intent: QueryIntent;
}

export interface Selection {
  entries: readonly ScoredChunk[];
  candidateCount: number;
  partial: boolean;
}

export type DocumentStatusKind = 'succeeded' | 'failed' | 'timed-out';

export interface DocumentFailure {
  code: ErrorCode;
  reason: string;
}

export interface ExtractionOutcome {
  documentId: string;
  title: string;
  status: DocumentStatusKind;
  chunks: readonly Chunk[];
  pageCount: number;
  elapsedSeconds: number;
  failure?: DocumentFailure;
}

export type DocumentStatus = Omit<ExtractionOutcome, 'chunks'> & { chunkCount: number };

export type IssueKind = 'formulation' | 'extraction' | 'timeout' | 'deadline';

export interface ProcessingIssue {
  source: string;
  kind: IssueKind;
  severity: 'warning' | 'error';
  code: ErrorCode;
  reason: string;
  timestamp: string;
}

export type PipelineState =
  | 'validating'
  | 'formulating_queries'
  | 'extracting'
  | 'ranking'
  | 'assembling'
  | 'done'
  | 'failed';

export type PipelineStage = Exclude<PipelineState, 'done' | 'failed'>;

export interface PipelineTelemetry {
  startedAt: string;
  elapsedSeconds: number;
  stages: Partial<Record<PipelineStage, number>>;
}

export interface PipelineResult {
  readonly request: PipelineRequest;
  readonly intents: readonly QueryIntent[];
  readonly selection: Selection;
  readonly documents: readonly DocumentStatus[];
  readonly issues: readonly ProcessingIssue[];
  readonly totalChunks: number;
  readonly partial: boolean;
  readonly telemetry: PipelineTelemetry;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export interface RankingConfig {
  topK: number;
  maxPerDocument: number | null;
}

export interface PipelineConfig {
  timeBudgetMs: number;
  perDocumentTimeoutMs: number;
  formulationTimeoutMs: number;
  maxWorkers: number;
  maxIntents: number;
  chunking: ChunkingConfig;
  ranking: RankingConfig;
}

export interface GroqConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens?: number;
}
