/**
 * Output formatting
 * Renders a PipelineResult as the challenge output JSON and validates it
 * against the output schema before anything is written.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PipelineResult } from './types';
import type { PipelineOutcome } from './pipeline';
import { SchemaError } from './errors';
import { formatIssues } from './request';
import { logger } from './logger';

export const DEFAULT_PREVIEW_LENGTH = 150;
export const UNTITLED_SECTION = 'Untitled Section';

export interface FormatOptions {
  previewLength?: number;
  processingTimestamp?: Date;
}

const outputErrorSchema = z.object({
  document: z.string().min(1),
  error_code: z.string().min(1),
  reason: z.string(),
  severity: z.enum(['warning', 'error']),
  timestamp: z.string().datetime()
});

const extractedSectionSchema = z.object({
  document: z.string().min(1),
  section_title: z.string().min(1),
  page_number: z.number().int().min(1),
  text_preview: z.string(),
  relevance_score: z.number().min(0).max(1),
  importance_rank: z.number().int().min(1)
});

export const outputDocumentSchema = z.object({
  metadata: z.object({
    input_documents: z.array(z.string()),
    persona: z.string().min(1),
    job_to_be_done: z.string().min(1),
    challenge_info: z.record(z.unknown()).optional(),
    processing_timestamp: z.string().datetime(),
    total_documents_processed: z.number().int().min(0),
    total_chunks_extracted: z.number().int().min(0),
    processing_time_seconds: z.number().min(0),
    partial_result: z.boolean(),
    query_intents: z.array(z.string()).min(1),
    errors: z.array(outputErrorSchema)
  }),
  extracted_sections: z.array(extractedSectionSchema)
});

export type OutputDocument = z.infer<typeof outputDocumentSchema>;

export interface FailureDocument {
  status: 'failed';
  error: {
    type: string;
    code: string;
    message: string;
    issues?: string[];
  };
  failed_in: string;
  processing_time_seconds: number;
}

/**
 * Collapse whitespace and cut to `maxLength`, ending in "..." when cut
 */
export function truncateText(text: string, maxLength: number = DEFAULT_PREVIEW_LENGTH): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= maxLength) {
    return collapsed;
  }
  return collapsed.slice(0, Math.max(0, maxLength - 3)) + '...';
}

function roundScore(score: number): number {
  return Math.round(score * 10000) / 10000;
}

export function formatResult(result: PipelineResult, options: FormatOptions = {}): OutputDocument {
  const previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;
  const { request } = result;

  const candidate = {
    metadata: {
      input_documents: request.documents.map(document => document.id),
      persona: request.persona,
      job_to_be_done: request.task,
      ...(request.challengeInfo ? { challenge_info: request.challengeInfo } : {}),
      processing_timestamp: (options.processingTimestamp ?? new Date()).toISOString(),
      total_documents_processed: result.documents.filter(document => document.status === 'succeeded').length,
      total_chunks_extracted: result.totalChunks,
      processing_time_seconds: result.telemetry.elapsedSeconds,
      partial_result: result.partial,
      query_intents: result.intents.map(intent => intent.text),
      errors: result.issues.map(issue => ({
        document: issue.source,
        error_code: issue.code,
        reason: issue.reason,
        severity: issue.severity,
        timestamp: issue.timestamp
      }))
    },
    extracted_sections: result.selection.entries.map((entry, index) => ({
      document: entry.chunk.documentId,
      section_title: entry.chunk.sectionTitle || UNTITLED_SECTION,
      page_number: entry.chunk.pageNumber,
      text_preview: truncateText(entry.chunk.text, previewLength),
      relevance_score: roundScore(entry.score),
      importance_rank: index + 1
    }))
  };

  const parsed = outputDocumentSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new SchemaError(`Output does not match the schema: ${issues.join('; ')}`, issues);
  }

  const oversized = parsed.data.extracted_sections.findIndex(section => section.text_preview.length > previewLength);
  if (oversized >= 0) {
    throw new SchemaError(`Section ${oversized} text_preview exceeds ${previewLength} characters`);
  }

  logger.info(`Formatted ${parsed.data.extracted_sections.length} extracted sections`);
  return parsed.data;
}

export function formatFailure(outcome: Extract<PipelineOutcome, { status: 'failed' }>): FailureDocument {
  const { error } = outcome;
  const issues = 'issues' in error && Array.isArray(error.issues) ? error.issues.map(String) : undefined;
  return {
    status: 'failed',
    error: {
      type: error.name,
      code: error.code,
      message: error.message,
      ...(issues && issues.length > 0 ? { issues } : {})
    },
    failed_in: outcome.failedIn,
    processing_time_seconds: outcome.elapsedSeconds
  };
}

/**
 * Write a formatted document as pretty JSON, creating parent directories
 */
export function saveOutput(output: OutputDocument | FailureDocument, outputPath: string): void {
  logger.info(`Saving output to: ${outputPath}`);

  const outputDir = path.dirname(outputPath);
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  fs.writeFileSync(outputPath, JSON.stringify(output, null, 2), 'utf-8');
  logger.success(`Output saved to: ${outputPath}`);
}
