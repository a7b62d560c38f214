/**
 * Document extractors
 * Turn one document into page texts. PDFs go through the Docling API,
 * plain-text and markdown files are read from disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import FormData from 'form-data';
import axios from 'axios';
import { z } from 'zod';
import { DocumentRef, PageText } from './types';
import { ErrorCode, ExtractionError, toErrorMessage } from './errors';
import { logger } from './logger';

export interface ExtractOptions {
  signal?: AbortSignal;
}

export interface DocumentExtractor {
  extract(document: DocumentRef, options?: ExtractOptions): Promise<PageText[]>;
}

const PAGE_BREAK = /<!--\s*page break\s*-->|\f/i;

const doclingResponseSchema = z.object({
  status: z.string(),
  filename: z.string().optional(),
  content: z.string(),
  pages: z
    .array(z.object({ page_number: z.number().int(), content: z.string() }))
    .optional(),
  metadata: z
    .object({ num_pages: z.number().int().nullable().optional() })
    .optional()
});

export type DoclingResponse = z.infer<typeof doclingResponseSchema>;

/**
 * Split text on form feeds or Docling page-break markers into 1-based pages
 */
export function splitPages(content: string): PageText[] {
  return content.split(new RegExp(PAGE_BREAK.source, 'gi')).map((text, index) => ({
    pageNumber: index + 1,
    text
  }));
}

/**
 * Resolve a document id against the documents directory, refusing ids that escape it
 */
export function resolveDocumentPath(baseDir: string, document: DocumentRef): string {
  const root = path.resolve(baseDir);
  const filePath = path.resolve(root, document.id);
  if (filePath !== root && !filePath.startsWith(root + path.sep)) {
    throw new ExtractionError(document.id, `Document path escapes ${root}`, ErrorCode.FILE_NOT_FOUND);
  }
  return filePath;
}

async function assertReadable(filePath: string, document: DocumentRef): Promise<void> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    throw new ExtractionError(document.id, `File not found: ${filePath}`, ErrorCode.FILE_NOT_FOUND, { cause: error });
  }
}

export interface DoclingExtractorOptions {
  apiUrl: string;
  documentsDir: string;
}

/**
 * Uploads a PDF to the Docling service's `/process-pdf/` endpoint.
 *
 * Page numbers come from the response's `pages` array when present, otherwise
 * from page-break markers in `content`. A plain `/process-pdf/` deployment
 * returns neither, so every section of such a PDF reports page 1.
 */
export class DoclingExtractor implements DocumentExtractor {
  constructor(private readonly options: DoclingExtractorOptions) {}

  async extract(document: DocumentRef, options: ExtractOptions = {}): Promise<PageText[]> {
    const filePath = resolveDocumentPath(this.options.documentsDir, document);

    if (!filePath.toLowerCase().endsWith('.pdf')) {
      throw new ExtractionError(document.id, 'File must be a PDF', ErrorCode.UNSUPPORTED_FORMAT);
    }
    await assertReadable(filePath, document);

    const form = new FormData();
    form.append('file', fs.createReadStream(filePath));

    logger.debug(`Uploading ${document.id} to ${this.options.apiUrl}`);

    let data: unknown;
    try {
      const response = await axios.post<unknown>(`${this.options.apiUrl}/process-pdf/`, form, {
        headers: {
          ...form.getHeaders()
        },
        maxContentLength: Infinity,
        maxBodyLength: Infinity,
        signal: options.signal
      });
      data = response.data;
    } catch (error) {
      throw this.toExtractionError(document, error);
    }

    const parsed = doclingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExtractionError(document.id, 'Docling API returned an unexpected payload', ErrorCode.PROCESSING_FAILED);
    }
    if (parsed.data.status !== 'success') {
      throw new ExtractionError(document.id, `Docling API reported status "${parsed.data.status}"`, ErrorCode.PROCESSING_FAILED);
    }

    const pages = parsed.data.pages
      ? parsed.data.pages.map(page => ({ pageNumber: page.page_number, text: page.content }))
      : splitPages(parsed.data.content);

    logger.debug(`Docling returned ${pages.length} pages for ${document.id}`);
    return pages;
  }

  private toExtractionError(document: DocumentRef, error: unknown): ExtractionError {
    if (axios.isCancel(error)) {
      return new ExtractionError(document.id, 'Extraction aborted', ErrorCode.PROCESSING_FAILED, { cause: error });
    }
    if (axios.isAxiosError(error)) {
      if (!error.response) {
        return new ExtractionError(
          document.id,
          `Docling API unreachable at ${this.options.apiUrl}: ${error.message}`,
          ErrorCode.SERVICE_UNAVAILABLE,
          { cause: error }
        );
      }
      const status = error.response.status;
      const detail = JSON.stringify(error.response.data ?? '');
      if (status === 423 || /encrypt|password/i.test(detail)) {
        return new ExtractionError(document.id, 'Password-protected PDF', ErrorCode.FILE_ENCRYPTED, { cause: error });
      }
      if (status === 415 || status === 422) {
        return new ExtractionError(document.id, `Invalid PDF format: ${detail}`, ErrorCode.UNSUPPORTED_FORMAT, { cause: error });
      }
      return new ExtractionError(document.id, `Docling API error ${status}: ${detail}`, ErrorCode.PROCESSING_FAILED, { cause: error });
    }
    return new ExtractionError(document.id, `Unexpected error during PDF conversion: ${toErrorMessage(error)}`, ErrorCode.PROCESSING_FAILED, {
      cause: error
    });
  }
}

/**
 * Reads .txt and .md files; form feeds separate pages
 */
export class LocalTextExtractor implements DocumentExtractor {
  constructor(private readonly documentsDir: string) {}

  async extract(document: DocumentRef, options: ExtractOptions = {}): Promise<PageText[]> {
    const filePath = resolveDocumentPath(this.documentsDir, document);
    await assertReadable(filePath, document);

    let content: string;
    try {
      content = await fs.promises.readFile(filePath, { encoding: 'utf-8', signal: options.signal });
    } catch (error) {
      throw new ExtractionError(document.id, `Cannot read ${filePath}: ${toErrorMessage(error)}`, ErrorCode.PROCESSING_FAILED, {
        cause: error
      });
    }
    return splitPages(content);
  }
}

/**
 * Picks an extractor by file extension
 */
export class RoutingExtractor implements DocumentExtractor {
  private readonly routes: Map<string, DocumentExtractor>;

  constructor(routes: Record<string, DocumentExtractor>) {
    this.routes = new Map(Object.entries(routes).map(([extension, extractor]) => [extension.toLowerCase(), extractor]));
  }

  async extract(document: DocumentRef, options: ExtractOptions = {}): Promise<PageText[]> {
    const extension = path.extname(document.id).toLowerCase();
    const extractor = this.routes.get(extension);
    if (!extractor) {
      throw new ExtractionError(document.id, `Unsupported document type "${extension || '(none)'}"`, ErrorCode.UNSUPPORTED_FORMAT);
    }
    return extractor.extract(document, options);
  }
}

export function createDefaultExtractor(options: DoclingExtractorOptions): DocumentExtractor {
  const text = new LocalTextExtractor(options.documentsDir);
  return new RoutingExtractor({
    '.pdf': new DoclingExtractor(options),
    '.txt': text,
    '.md': text
  });
}
