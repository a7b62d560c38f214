export * from './types';
export * from './errors';
export { chunkPages, createChunkId, splitWithOverlap, DEFAULT_CHUNKING_CONFIG } from './chunking';
export {
  EmbeddingScorer,
  HashedNgramEmbeddingModel,
  loadEmbeddingModel,
  cosineSimilarity,
  toRelevanceScore,
  DEFAULT_MODEL_PATH
} from './embeddings';
export type { EmbeddingModel } from './embeddings';
export { DocumentCoordinator } from './documentCoordinator';
export type { ExtractAllOptions } from './documentCoordinator';
export { RankingEngine, compareScoredChunks, selectTopK, DEFAULT_RANKING_CONFIG } from './ranking';
export type { RankOptions } from './ranking';
export { PipelineOrchestrator, DEFAULT_PIPELINE_CONFIG } from './pipeline';
export type { PipelineDependencies, PipelineOutcome } from './pipeline';
export {
  GroqQueryFormulator,
  HeuristicQueryFormulator,
  buildFallbackIntent,
  buildFallbackQuery,
  parseQueryList
} from './queryFormulation';
export type { FormulateOptions, QueryFormulator } from './queryFormulation';
export { DoclingExtractor, LocalTextExtractor, RoutingExtractor, createDefaultExtractor } from './extractors';
export type { DocumentExtractor, ExtractOptions } from './extractors';
export { WorkerPool } from './workerPool';
export type { TaskPool, PoolResult } from './workerPool';
export { parseRequest } from './request';
export type { RequestInput } from './request';
export { formatResult, formatFailure, saveOutput, truncateText } from './formatter';
export type { OutputDocument, FailureDocument } from './formatter';
export { loadConfig, parseConfig } from './config';
export type { AppConfig } from './config';
export { logger, Logger, LogLevel } from './logger';
