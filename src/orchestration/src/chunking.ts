/**
 * Page-aware chunking module
 * Splits each page into overlapping windows with stable provenance:
 * - Windows end at a paragraph break, then a sentence end, then whitespace
 * - Consecutive windows overlap, starting on a word boundary
 * - Chunk ids are content-addressed over document, page and offsets
 */

import { createHash } from 'crypto';
import { Chunk, ChunkingConfig, PageText } from './types';
import { logger } from './logger';

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 800,
  chunkOverlap: 120
};

interface Span {
  start: number;
  end: number;
}

interface Heading {
  index: number;
  title: string;
}

export function createChunkId(documentId: string, pageNumber: number, start: number, end: number): string {
  return createHash('sha256')
    .update(`${documentId}\u0000${pageNumber}\u0000${start}\u0000${end}`)
    .digest('hex')
    .slice(0, 16);
}

/**
 * Pick where a window starting at `start` should end.
 * Breaks earlier than half the window are ignored so windows stay near the target size.
 * The result is always past `start`.
 */
function findBreak(text: string, start: number, hardEnd: number, size: number): number {
  const minEnd = start + Math.max(1, Math.floor(size / 2));
  const window = text.slice(start, hardEnd);

  const paragraph = window.lastIndexOf('\n\n');
  if (paragraph >= 0 && start + paragraph >= minEnd) {
    return start + paragraph;
  }

  let sentenceEnd = -1;
  for (const match of window.matchAll(/[.!?]["')\]]?\s/g)) {
    sentenceEnd = (match.index ?? 0) + match[0].length - 1;
  }
  if (sentenceEnd >= 0 && start + sentenceEnd >= minEnd) {
    return start + sentenceEnd;
  }

  let space = -1;
  for (const match of window.matchAll(/\s/g)) {
    space = match.index ?? space;
  }
  if (space >= 0 && start + space >= minEnd) {
    return start + space;
  }

  return hardEnd;
}

/**
 * Move a window start forward to the beginning of a word, unless that
 * would reach `limit`
 */
function snapToWordStart(text: string, position: number, limit: number): number {
  if (position === 0 || /\s/.test(text[position - 1])) {
    return position;
  }
  let cursor = position;
  while (cursor < limit && !/\s/.test(text[cursor])) {
    cursor++;
  }
  while (cursor < limit && /\s/.test(text[cursor])) {
    cursor++;
  }
  return cursor < limit ? cursor : position;
}

export function splitWithOverlap(text: string, size: number, overlap: number): Span[] {
  const spans: Span[] = [];
  let start = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + size, text.length);
    const end = hardEnd < text.length ? findBreak(text, start, hardEnd, size) : hardEnd;
    spans.push({ start, end });

    if (end >= text.length) {
      break;
    }

    let next = snapToWordStart(text, Math.max(0, end - overlap), end);
    if (next <= start) {
      next = end;
    }
    start = next;
  }

  return spans;
}

function findHeadings(text: string): Heading[] {
  const headings: Heading[] = [];
  for (const match of text.matchAll(/^#{1,6}[ \t]+(.+?)[ \t#]*$/gm)) {
    headings.push({ index: match.index ?? 0, title: match[1].trim() });
  }
  return headings;
}

function sectionTitleFor(headings: Heading[], span: Span): string | null {
  let title: string | null = null;
  for (const heading of headings) {
    if (heading.index <= span.start) {
      title = heading.title;
    } else if (title === null && heading.index < span.end) {
      return heading.title;
    } else {
      break;
    }
  }
  return title;
}

/**
 * Split extracted pages into chunks. Never throws: malformed pages
 * simply produce fewer chunks.
 */
export function chunkPages(
  documentId: string,
  pages: readonly PageText[],
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): Chunk[] {
  const size = Math.max(1, Math.floor(config.chunkSize));
  let overlap = Math.max(0, Math.floor(config.chunkOverlap));
  if (overlap >= size) {
    logger.warn(`Chunk overlap ${overlap} >= chunk size ${size}; clamping to ${Math.floor(size / 2)}`);
    overlap = Math.floor(size / 2);
  }

  const chunks: Chunk[] = [];

  for (const page of pages) {
    if (!Number.isInteger(page.pageNumber) || page.pageNumber < 1) {
      logger.debug(`Skipping page with invalid number ${page.pageNumber} in ${documentId}`);
      continue;
    }
    const text = typeof page.text === 'string' ? page.text : '';
    if (text.trim().length === 0) {
      continue;
    }

    const headings = findHeadings(text);

    for (const span of splitWithOverlap(text, size, overlap)) {
      const content = text.slice(span.start, span.end).trim();
      if (content.replace(/\s+/g, '').length === 0) {
        continue;
      }
      chunks.push({
        id: createChunkId(documentId, page.pageNumber, span.start, span.end),
        documentId,
        pageNumber: page.pageNumber,
        startOffset: span.start,
        endOffset: span.end,
        text: content,
        sectionTitle: sectionTitleFor(headings, span)
      });
    }
  }

  logger.debug(`Chunked ${documentId}: ${pages.length} pages -> ${chunks.length} chunks`);
  return chunks;
}
