/**
 * Configuration loading
 * Reads environment variables (optionally from .env) and validates them into
 * the typed settings the pipeline, extractors and logger use.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { GroqConfig, PipelineConfig } from './types';
import { ConfigurationError } from './errors';
import { DEFAULT_MODEL_PATH, DEFAULT_BATCH_SIZE } from './embeddings';
import { defaultPoolSize } from './workerPool';
import { LogLevel, parseLogLevel } from './logger';
import { formatIssues } from './request';

const integer = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z
  .object({
    GROQ_API_KEY: z.string().optional(),
    GROQ_MODEL: z.string().min(1).default('llama-3.1-8b-instant'),
    GROQ_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    DOCLING_API_URL: z.string().url('DOCLING_API_URL must be a valid URL').default('http://localhost:8000'),
    TIME_BUDGET_MS: integer(10_000, 1),
    PER_DOCUMENT_TIMEOUT_MS: integer(8_000, 1),
    FORMULATION_TIMEOUT_MS: integer(3_000, 1),
    MAX_WORKERS: integer(defaultPoolSize(), 1),
    MAX_INTENTS: integer(5, 1),
    EMBEDDING_BATCH_SIZE: integer(DEFAULT_BATCH_SIZE, 1),
    EMBEDDING_MODEL_PATH: z.string().min(1).default(DEFAULT_MODEL_PATH),
    TOP_K: integer(10, 1),
    MAX_PER_DOCUMENT: z
      .string()
      .default('3')
      .transform((value, ctx) => {
        const trimmed = value.trim().toLowerCase();
        if (trimmed === 'none' || trimmed === '0' || trimmed === '') {
          return null;
        }
        const parsed = Number(trimmed);
        if (!Number.isInteger(parsed) || parsed < 0) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'MAX_PER_DOCUMENT must be a non-negative integer or "none"' });
          return z.NEVER;
        }
        return parsed;
      }),
    CHUNK_SIZE: integer(800, 50),
    CHUNK_OVERLAP: integer(120, 0),
    PREVIEW_LENGTH: integer(150, 10),
    LOG_LEVEL: z.string().optional(),
    LOG_DIR: z.string().min(1).default('./logs'),
    LOG_TO_FILE: booleanFlag(true)
  })
  .refine(env => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP']
  });

export interface AppConfig {
  pipeline: PipelineConfig;
  groq: GroqConfig | null;
  doclingApiUrl: string;
  embedding: {
    modelPath: string;
    batchSize: number;
  };
  previewLength: number;
  logging: {
    level: LogLevel;
    directory: string;
    toFile: boolean;
  };
}

/**
 * Build the configuration from an environment map. Blank values count as unset.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const values = parsed.data;

  return {
    pipeline: {
      timeBudgetMs: values.TIME_BUDGET_MS,
      perDocumentTimeoutMs: values.PER_DOCUMENT_TIMEOUT_MS,
      formulationTimeoutMs: values.FORMULATION_TIMEOUT_MS,
      maxWorkers: values.MAX_WORKERS,
      maxIntents: values.MAX_INTENTS,
      chunking: {
        chunkSize: values.CHUNK_SIZE,
        chunkOverlap: values.CHUNK_OVERLAP
      },
      ranking: {
        topK: values.TOP_K,
        maxPerDocument: values.MAX_PER_DOCUMENT
      }
    },
    groq: values.GROQ_API_KEY
      ? {
          apiKey: values.GROQ_API_KEY,
          model: values.GROQ_MODEL,
          temperature: values.GROQ_TEMPERATURE,
          maxTokens: 300
        }
      : null,
    doclingApiUrl: values.DOCLING_API_URL.replace(/\/+$/, ''),
    embedding: {
      modelPath: values.EMBEDDING_MODEL_PATH,
      batchSize: values.EMBEDDING_BATCH_SIZE
    },
    previewLength: values.PREVIEW_LENGTH,
    logging: {
      level: parseLogLevel(values.LOG_LEVEL, LogLevel.INFO),
      directory: values.LOG_DIR,
      toFile: values.LOG_TO_FILE
    }
  };
}

/**
 * Load .env into process.env (existing variables win) and parse it
 */
export function loadConfig(envFile?: string): AppConfig {
  dotenvConfig(envFile ? { path: envFile } : {});
  return parseConfig(process.env);
}
