/**
 * Document extraction coordinator
 * Runs the extractor for every document on a bounded worker pool.
 * Each document is time-boxed on its own; a failure or timeout is recorded
 * against that document and never aborts its siblings.
 */

import { ChunkingConfig, DocumentFailure, DocumentRef, ExtractionOutcome } from './types';
import { DocumentExtractor } from './extractors';
import { chunkPages, DEFAULT_CHUNKING_CONFIG } from './chunking';
import { TaskPool, WorkerPool } from './workerPool';
import { Clock, Deadline, toSeconds, withTimeout } from './async';
import { OperationTimeoutError, ErrorCode, ERROR_MESSAGES, ExtractionError, toErrorMessage } from './errors';
import { logger } from './logger';

export interface ExtractAllOptions {
  perDocumentTimeoutMs: number;
  chunking?: ChunkingConfig;
  /**
   * Once expired, documents not yet started are marked timed-out
   */
  deadline?: Deadline;
}

export class DocumentCoordinator {
  constructor(
    private readonly extractor: DocumentExtractor,
    private readonly pool: TaskPool = new WorkerPool(),
    private readonly now: Clock = Date.now
  ) {}

  async extractAll(documents: readonly DocumentRef[], options: ExtractAllOptions): Promise<ExtractionOutcome[]> {
    logger.section('Document Extraction');
    logger.info(`Extracting ${documents.length} documents on ${this.pool.size} workers (timeout ${options.perDocumentTimeoutMs}ms each)`);

    const deadline = options.deadline;
    const results = await this.pool.run(documents, document => this.extractOne(document, options), {
      canDispatch: deadline ? () => !deadline.expired() : undefined
    });

    const outcomes = results.map((result, index): ExtractionOutcome => {
      const document = documents[index];
      if (result.status === 'fulfilled') {
        return result.value;
      }
      if (result.status === 'skipped') {
        logger.warn(`Not started before the deadline: ${document.id}`);
        return this.failed(document, 'timed-out', 0, {
          code: ErrorCode.DEADLINE_EXCEEDED,
          reason: 'Not started before the overall time budget expired'
        });
      }
      // extractOne records its own failures; this only catches bugs in it
      logger.error(`Extraction task for ${document.id} crashed`, result.reason);
      return this.failed(document, 'failed', 0, {
        code: ErrorCode.PROCESSING_FAILED,
        reason: `Task execution failed: ${toErrorMessage(result.reason)}`
      });
    });

    const succeeded = outcomes.filter(outcome => outcome.status === 'succeeded').length;
    logger.success(`Extraction complete: ${succeeded}/${documents.length} documents usable`);
    return outcomes;
  }

  private async extractOne(document: DocumentRef, options: ExtractAllOptions): Promise<ExtractionOutcome> {
    const startedAt = this.now();
    const elapsed = (): number => toSeconds(this.now() - startedAt);
    const controller = new AbortController();

    try {
      const pages = await withTimeout(
        this.extractor.extract(document, { signal: controller.signal }),
        options.perDocumentTimeoutMs,
        `extracting ${document.id}`
      );

      const chunks = chunkPages(document.id, pages, options.chunking ?? DEFAULT_CHUNKING_CONFIG);
      if (chunks.length === 0) {
        logger.warn(`No extractable text in ${document.id}`);
        return this.failed(document, 'failed', elapsed(), {
          code: ErrorCode.NO_EXTRACTABLE_TEXT,
          reason: ERROR_MESSAGES[ErrorCode.NO_EXTRACTABLE_TEXT]
        }, pages.length);
      }

      logger.info(`Processed ${document.id}: ${pages.length} pages, ${chunks.length} chunks in ${elapsed()}s`);
      return {
        documentId: document.id,
        title: document.title,
        status: 'succeeded',
        chunks,
        pageCount: pages.length,
        elapsedSeconds: elapsed()
      };
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        controller.abort();
        logger.error(`Document processing timeout for ${document.id}`);
        return this.failed(document, 'timed-out', elapsed(), {
          code: ErrorCode.TIMEOUT,
          reason: `Document processing timed out after ${error.timeoutMs}ms`
        });
      }

      const failure: DocumentFailure =
        error instanceof ExtractionError
          ? { code: error.code, reason: error.message }
          : { code: ErrorCode.PROCESSING_FAILED, reason: `Unexpected error: ${toErrorMessage(error)}` };

      logger.warn(`Document processing failed for ${document.id}: ${failure.reason}`);
      return this.failed(document, 'failed', elapsed(), failure);
    }
  }

  private failed(
    document: DocumentRef,
    status: 'failed' | 'timed-out',
    elapsedSeconds: number,
    failure: DocumentFailure,
    pageCount: number = 0
  ): ExtractionOutcome {
    return {
      documentId: document.id,
      title: document.title,
      status,
      chunks: [],
      pageCount,
      elapsedSeconds,
      failure
    };
  }
}
