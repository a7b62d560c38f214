#!/usr/bin/env node
/**
 * Main entry point for the persona ranking CLI
 * Reads a challenge request, ranks its documents and writes the output JSON
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from './config';
import { EmbeddingScorer, loadEmbeddingModel } from './embeddings';
import { createDefaultExtractor } from './extractors';
import { GroqQueryFormulator, HeuristicQueryFormulator, QueryFormulator } from './queryFormulation';
import { PipelineOrchestrator } from './pipeline';
import { WorkerPool } from './workerPool';
import { formatFailure, formatResult, saveOutput } from './formatter';
import { ModelLoadError, toErrorMessage } from './errors';
import { logger } from './logger';

interface CliArgs {
  requestPath: string;
  documentsDir?: string;
  outputPath?: string;
  topK?: number;
  budgetMs?: number;
}

function printHelp(): void {
  console.log(`
Persona-Driven Document Ranking

Usage:
  npm start -- <request-json> [options]

Arguments:
  <request-json>            Challenge request with persona, job_to_be_done and documents (required)

Options:
  --documents <dir>         Directory holding the documents (default: <request dir>/PDFs, else <request dir>)
  --output <path>           Output JSON file (default: <request dir>/challenge1b_output.json)
  --top-k <n>               Number of sections to return (overrides TOP_K)
  --budget-ms <n>           Overall time budget in milliseconds (overrides TIME_BUDGET_MS)
  --help, -h                Show this help message

Environment Variables:
  GROQ_API_KEY              Enables LLM query formulation (heuristic query otherwise)
  DOCLING_API_URL           Docling API base URL for PDF extraction (default: http://localhost:8000)

Examples:
  npm start -- collection/challenge1b_input.json
  npm start -- input.json --documents ./pdfs --output out/result.json --top-k 5
`);
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer, got "${value ?? ''}"`);
  }
  return parsed;
}

function parseArgs(argv: string[]): CliArgs | null {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return null;
  }

  const args: CliArgs = { requestPath: argv[0] };

  for (let i = 1; i < argv.length; i += 2) {
    const key = argv[i];
    const value = argv[i + 1];

    switch (key) {
      case '--documents':
        args.documentsDir = value;
        break;
      case '--output':
        args.outputPath = value;
        break;
      case '--top-k':
        args.topK = parsePositiveInt(key, value);
        break;
      case '--budget-ms':
        args.budgetMs = parsePositiveInt(key, value);
        break;
      default:
        throw new Error(`Unknown option: ${key}`);
    }
  }

  return args;
}

function defaultDocumentsDir(requestPath: string): string {
  const requestDir = path.dirname(path.resolve(requestPath));
  const pdfDir = path.join(requestDir, 'PDFs');
  return fs.existsSync(pdfDir) ? pdfDir : requestDir;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    printHelp();
    return 0;
  }

  const config = loadConfig();
  logger.configure({
    level: config.logging.level,
    logDirectory: config.logging.directory,
    toFile: config.logging.toFile
  });

  const pipelineConfig = {
    ...config.pipeline,
    timeBudgetMs: args.budgetMs ?? config.pipeline.timeBudgetMs,
    ranking: { ...config.pipeline.ranking, topK: args.topK ?? config.pipeline.ranking.topK }
  };

  const requestPath = path.resolve(args.requestPath);
  const documentsDir = path.resolve(args.documentsDir ?? defaultDocumentsDir(requestPath));
  const outputPath = path.resolve(args.outputPath ?? path.join(path.dirname(requestPath), 'challenge1b_output.json'));

  logger.info(`Loading request from ${requestPath}`);
  const request: unknown = JSON.parse(fs.readFileSync(requestPath, 'utf-8'));

  // loaded once for the process and shared by every run
  const model = await loadEmbeddingModel(config.embedding.modelPath);
  const scorer = new EmbeddingScorer(model, config.embedding.batchSize);

  const formulator: QueryFormulator = config.groq
    ? GroqQueryFormulator.fromConfig(config.groq, pipelineConfig.maxIntents)
    : new HeuristicQueryFormulator();

  const orchestrator = new PipelineOrchestrator(
    {
      extractor: createDefaultExtractor({ apiUrl: config.doclingApiUrl, documentsDir }),
      formulator,
      scorer,
      pool: new WorkerPool(pipelineConfig.maxWorkers)
    },
    pipelineConfig
  );

  const outcome = await orchestrator.run(request);

  if (outcome.status === 'failed') {
    saveOutput(formatFailure(outcome), outputPath);
    return 1;
  }

  saveOutput(formatResult(outcome.result, { previewLength: config.previewLength }), outputPath);
  logger.success(
    `Ranked ${outcome.result.selection.entries.length} sections from ${outcome.result.totalChunks} chunks in ${outcome.result.telemetry.elapsedSeconds}s`
  );
  return 0;
}

main()
  .then(code => {
    logger.close();
    process.exitCode = code;
  })
  .catch(error => {
    if (error instanceof ModelLoadError) {
      logger.error(`Embedding model unavailable: ${error.message}`, error);
    } else {
      logger.error(`Run failed: ${toErrorMessage(error)}`, error);
    }
    logger.close();
    process.exitCode = 1;
  });
