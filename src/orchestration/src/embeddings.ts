/**
 * Embedding module
 * Loads the embedding model once per process and scores text by cosine similarity.
 *
 * The bundled model hashes word tokens and character n-grams into a fixed-length
 * signed vector. Every text is embedded on its own, so the vector for a text never
 * depends on which batch it was sent in.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { EmbeddingError, ModelLoadError, toErrorMessage } from './errors';
import { logger } from './logger';

export interface EmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  embedBatch(texts: readonly string[]): Promise<number[][]>;
}

export const DEFAULT_MODEL_PATH = path.resolve(__dirname, '..', 'models', 'hashed-ngram-v1.json');

export const DEFAULT_BATCH_SIZE = 128;

const modelArtifactSchema = z.object({
  name: z.string().min(1),
  dimension: z.number().int().min(8).max(8192),
  tokenWeight: z.number().nonnegative(),
  ngramWeight: z.number().nonnegative(),
  ngramRange: z
    .tuple([z.number().int().min(1), z.number().int().min(1)])
    .refine(([min, max]) => min <= max, 'ngramRange must be [min, max] with min <= max'),
  minTokenLength: z.number().int().min(1),
  stopWords: z.array(z.string())
});

export type ModelArtifact = z.infer<typeof modelArtifactSchema>;

function fnv1a(input: string, seed: number = 2166136261): number {
  let hash = seed;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

// second seed decides the sign, so colliding features tend to cancel instead of pile up
const SIGN_SEED = 0x9747b28c;

export function tokenize(text: string): string[] {
  return text.toLowerCase().normalize('NFKC').match(/[\p{L}\p{N}]+/gu) ?? [];
}

function stem(token: string): string {
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')) {
    return token.slice(0, -1);
  }
  return token;
}

export class HashedNgramEmbeddingModel implements EmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  private readonly stopWords: Set<string>;

  constructor(private readonly artifact: ModelArtifact) {
    this.name = artifact.name;
    this.dimension = artifact.dimension;
    this.stopWords = new Set(artifact.stopWords.map(word => word.toLowerCase()));
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    return texts.map(text => this.embedText(text));
  }

  embedText(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const { tokenWeight, ngramWeight, ngramRange, minTokenLength } = this.artifact;

    const addFeature = (feature: string, weight: number): void => {
      const index = fnv1a(feature) % this.dimension;
      const sign = (fnv1a(feature, SIGN_SEED) & 1) === 0 ? 1 : -1;
      vector[index] += sign * weight;
    };

    for (const token of tokenize(text)) {
      if (token.length < minTokenLength || this.stopWords.has(token)) {
        continue;
      }
      const term = stem(token);
      addFeature(`w:${term}`, tokenWeight);

      if (ngramWeight > 0) {
        const padded = `#${term}#`;
        for (let n = ngramRange[0]; n <= ngramRange[1]; n++) {
          for (let i = 0; i + n <= padded.length; i++) {
            addFeature(`g:${padded.slice(i, i + n)}`, ngramWeight);
          }
        }
      }
    }

    const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return magnitude === 0 ? vector : vector.map(value => value / magnitude);
  }
}

const loadedModels = new Map<string, Promise<EmbeddingModel>>();

async function readModelArtifact(artifactPath: string): Promise<EmbeddingModel> {
  logger.info(`Loading embedding model from ${artifactPath}`);

  let raw: string;
  try {
    raw = await fs.promises.readFile(artifactPath, 'utf-8');
  } catch (error) {
    throw new ModelLoadError(`Cannot read embedding model artifact at ${artifactPath}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ModelLoadError(`Embedding model artifact is not valid JSON: ${toErrorMessage(error)}`, { cause: error });
  }

  const parsed = modelArtifactSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ModelLoadError(`Invalid embedding model artifact: ${issues.join('; ')}`);
  }

  const model = new HashedNgramEmbeddingModel(parsed.data);
  const probe = await model.embedBatch(['model self-check']);
  if (probe.length !== 1 || probe[0].length !== model.dimension) {
    throw new ModelLoadError(`Embedding model ${model.name} failed its self-check`);
  }

  logger.success(`Embedding model ${model.name} loaded (dimension ${model.dimension})`);
  return model;
}

/**
 * Load the embedding model once per artifact path. Concurrent callers share
 * one load; a failed load is forgotten so the process can report it again.
 */
export function loadEmbeddingModel(artifactPath: string = DEFAULT_MODEL_PATH): Promise<EmbeddingModel> {
  const key = path.resolve(artifactPath);
  const cached = loadedModels.get(key);
  if (cached) {
    return cached;
  }

  const loading = readModelArtifact(key);
  loadedModels.set(key, loading);
  loading.catch(() => {
    loadedModels.delete(key);
  });
  return loading;
}

export function clearModelCache(): void {
  loadedModels.clear();
}

/**
 * Cosine similarity in [-1, 1]. Zero vectors are similar to nothing.
 */
export function cosineSimilarity(vec1: readonly number[], vec2: readonly number[]): number {
  if (vec1.length !== vec2.length) {
    throw new EmbeddingError(`Vectors must have same length (${vec1.length} vs ${vec2.length})`);
  }

  let dotProduct = 0;
  let norm1 = 0;
  let norm2 = 0;

  for (let i = 0; i < vec1.length; i++) {
    dotProduct += vec1[i] * vec2[i];
    norm1 += vec1[i] * vec1[i];
    norm2 += vec2[i] * vec2[i];
  }

  if (norm1 === 0 || norm2 === 0) {
    return 0;
  }

  const similarity = dotProduct / (Math.sqrt(norm1) * Math.sqrt(norm2));
  return Math.min(1, Math.max(-1, similarity));
}

/**
 * Map cosine similarity onto a [0, 1] relevance score
 */
export function toRelevanceScore(similarity: number): number {
  if (!Number.isFinite(similarity)) {
    return 0;
  }
  return Math.min(1, Math.max(0, (similarity + 1) / 2));
}

export interface EmbedProgress {
  vectors: number[][];
  complete: boolean;
}

export class EmbeddingScorer {
  readonly batchSize: number;

  constructor(
    readonly model: EmbeddingModel,
    batchSize: number = DEFAULT_BATCH_SIZE
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Embedding batch size must be a positive integer, got ${batchSize}`);
    }
    this.batchSize = batchSize;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const { vectors } = await this.embedWhile(texts);
    return vectors;
  }

  /**
   * Embed in batches, asking `shouldContinue` before every batch after the first.
   * Returns the vectors for the prefix of `texts` that was embedded.
   */
  async embedWhile(texts: readonly string[], shouldContinue: () => boolean = () => true): Promise<EmbedProgress> {
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      if (start > 0 && !shouldContinue()) {
        logger.warn(`Embedding stopped after ${vectors.length}/${texts.length} texts`);
        return { vectors, complete: false };
      }

      const batch = texts.slice(start, start + this.batchSize);
      let output: number[][];
      try {
        output = await this.model.embedBatch(batch);
      } catch (error) {
        if (error instanceof ModelLoadError) {
          throw error;
        }
        throw new EmbeddingError(`Embedding batch failed: ${toErrorMessage(error)}`, { cause: error });
      }

      if (output.length !== batch.length) {
        throw new EmbeddingError(
          `Embedding model ${this.model.name} returned ${output.length} vectors for ${batch.length} texts`
        );
      }
      vectors.push(...output);
    }

    return { vectors, complete: true };
  }

  similarity(vectorA: readonly number[], vectorB: readonly number[]): number {
    return cosineSimilarity(vectorA, vectorB);
  }
}
