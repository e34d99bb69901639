/**
 * Document Segmenter
 *
 * Splits a cleaned document into ordered, bounded chunks.
 *
 * Two passes:
 * 1. Structural: the text is cut at headers (Markdown headings and
 *    TÍTULO / CAPÍTULO / Artículo style markers). Each cut is a "unit"
 *    carrying the header stack it sits under. Units too small to stand on
 *    their own are merged into a neighbour.
 * 2. Windowing: a unit longer than chunkSize becomes a sequence of sliding
 *    windows, consecutive windows sharing exactly chunkOverlap characters.
 *
 * Chunk text is always an exact slice of the joined document text, so the
 * offsets can be used to reconstruct it.
 */

import { v5 as uuidv5 } from 'uuid';
import { DocumentPage, SegmentedChunk, SourceDocument } from '../../shared/types';
import { SegmentationError } from '../errors';
import { CleaningOptions, cleanPages, Heading, parseHeading } from './textCleaner';

export interface SegmenterConfig {
  /** Maximum chunk length in characters */
  chunkSize: number;
  /** Characters shared by consecutive windows of one unit */
  chunkOverlap: number;
  /** Units with less non-whitespace text than this are merged */
  minChunkSize: number;
  /** Documents shorter than this after cleaning are rejected */
  minDocumentLength: number;
}

export const DEFAULT_SEGMENTER_CONFIG: SegmenterConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  minChunkSize: 100,
  minDocumentLength: 20,
};

/** Namespace for deriving chunk ids from documentId + sequence. */
export const CHUNK_ID_NAMESPACE = '6f1c2e4a-9b3d-4c8e-a5f7-2d0b1e3c4a5f';

const PAGE_SEPARATOR = '\n\n';

/**
 * A contiguous span of the document under one header stack.
 */
export interface StructuralUnit {
  start: number;
  end: number;
  headingPath: string[];
}

export interface JoinedText {
  text: string;
  /** Offset of each page's first character, parallel to pageNumbers */
  pageStarts: number[];
  pageNumbers: number[];
}

export interface SegmentedDocument {
  documentId: string;
  text: string;
  chunks: SegmentedChunk[];
}

/**
 * Stable chunk id. Re-segmenting the same document gives the same ids,
 * which makes upserts idempotent.
 */
export function chunkIdFor(documentId: string, sequence: number): string {
  return uuidv5(`${documentId}:${sequence}`, CHUNK_ID_NAMESPACE);
}

/**
 * Joins non-empty pages with a blank line and records where each begins.
 */
export function joinPages(pages: DocumentPage[]): JoinedText {
  let text = '';
  const pageStarts: number[] = [];
  const pageNumbers: number[] = [];

  for (const page of pages) {
    if (page.text.trim().length === 0) {
      continue;
    }
    if (text.length > 0) {
      text += PAGE_SEPARATOR;
    }
    pageStarts.push(text.length);
    pageNumbers.push(page.pageNumber);
    text += page.text;
  }

  return { text, pageStarts, pageNumbers };
}

/**
 * Page holding the given offset.
 */
export function pageAt(joined: JoinedText, offset: number): number {
  let page = joined.pageNumbers[0] ?? 1;
  for (let i = 0; i < joined.pageStarts.length; i++) {
    const start = joined.pageStarts[i];
    const pageNumber = joined.pageNumbers[i];
    if (start === undefined || pageNumber === undefined || start > offset) {
      break;
    }
    page = pageNumber;
  }
  return page;
}

/**
 * Cuts the text at header lines. Units are contiguous and cover the text.
 */
export function splitIntoUnits(text: string): StructuralUnit[] {
  const units: StructuralUnit[] = [];
  const stack: Heading[] = [];
  let unitStart = 0;
  let unitPath: string[] = [];
  let lineStart = 0;

  while (lineStart < text.length) {
    const newline = text.indexOf('\n', lineStart);
    const lineEnd = newline === -1 ? text.length : newline;
    const heading = parseHeading(text.slice(lineStart, lineEnd));

    if (heading) {
      if (lineStart > unitStart) {
        units.push({ start: unitStart, end: lineStart, headingPath: unitPath });
      }
      while (stack.length > 0 && (stack[stack.length - 1]?.level ?? 0) >= heading.level) {
        stack.pop();
      }
      stack.push(heading);
      unitStart = lineStart;
      unitPath = stack.map((entry) => entry.title);
    }

    lineStart = lineEnd + 1;
  }

  if (text.length > unitStart) {
    units.push({ start: unitStart, end: text.length, headingPath: unitPath });
  }
  return units;
}

/**
 * Merges units whose trimmed text is shorter than minChunkSize into the
 * following unit, or into the preceding one when it is the last.
 */
export function mergeSmallUnits(
  text: string,
  units: StructuralUnit[],
  minChunkSize: number
): StructuralUnit[] {
  const merged: StructuralUnit[] = [];
  let carry: StructuralUnit | undefined;

  for (const unit of units) {
    const current: StructuralUnit = carry
      ? { start: carry.start, end: unit.end, headingPath: unit.headingPath }
      : unit;
    carry = undefined;

    if (text.slice(current.start, current.end).trim().length < minChunkSize) {
      carry = current;
      continue;
    }
    merged.push(current);
  }

  if (carry) {
    const previous = merged.pop();
    merged.push(
      previous
        ? { start: previous.start, end: carry.end, headingPath: previous.headingPath }
        : carry
    );
  }
  return merged;
}

/**
 * Sliding windows over [start, end). Returns [windowStart, windowEnd] pairs.
 *
 * Consecutive windows share exactly `overlap` characters. A natural break is
 * only taken when the window still ends past start + overlap, so every step
 * makes progress.
 */
export function windowSpan(
  text: string,
  start: number,
  end: number,
  chunkSize: number,
  overlap: number
): Array<[number, number]> {
  if (end - start <= chunkSize) {
    return [[start, end]];
  }

  const windows: Array<[number, number]> = [];
  let position = start;

  for (;;) {
    let windowEnd = Math.min(position + chunkSize, end);
    if (windowEnd < end) {
      windowEnd = findNaturalBreak(text, position, windowEnd, position + overlap + 1);
    }
    windows.push([position, windowEnd]);

    if (windowEnd >= end) {
      return windows;
    }
    position = windowEnd - overlap;
  }
}

/**
 * Find a natural break point near the target position.
 *
 * Preference order:
 * 1. Paragraph break (double newline)
 * 2. Sentence end (. ! ? followed by an uppercase letter or opening ¿ ¡)
 * 3. Word boundary (space)
 * 4. Original position
 *
 * A break before minEnd is never returned.
 */
function findNaturalBreak(text: string, start: number, targetEnd: number, minEnd: number): number {
  const searchWindow = text.slice(start, targetEnd);
  const accept = (offset: number, fraction: number): boolean =>
    offset > searchWindow.length * fraction && start + offset >= minEnd;

  const paragraphBreak = searchWindow.lastIndexOf('\n\n');
  if (paragraphBreak !== -1 && accept(paragraphBreak + 2, 0.5)) {
    return start + paragraphBreak + 2;
  }

  let lastSentenceEnd = -1;
  for (const match of searchWindow.matchAll(/[.!?]\s+(?=[\p{Lu}¿¡])/gu)) {
    lastSentenceEnd = (match.index ?? 0) + match[0].length;
  }
  if (lastSentenceEnd !== -1 && accept(lastSentenceEnd, 0.5)) {
    return start + lastSentenceEnd;
  }

  const lastSpace = searchWindow.lastIndexOf(' ');
  if (lastSpace !== -1 && accept(lastSpace + 1, 0.7)) {
    return start + lastSpace + 1;
  }

  return targetEnd;
}

/**
 * Document Segmenter
 *
 * Cleans pages, joins them, and produces SegmentedChunks with heading
 * path and page number.
 */
export class DocumentSegmenter {
  private readonly config: SegmenterConfig;
  private readonly cleaning: Partial<CleaningOptions>;

  constructor(config: Partial<SegmenterConfig> = {}, cleaning: Partial<CleaningOptions> = {}) {
    this.config = { ...DEFAULT_SEGMENTER_CONFIG, ...config };
    this.cleaning = cleaning;
  }

  /**
   * @throws SegmentationError on invalid config, empty or too-short text
   */
  segment(document: SourceDocument): SegmentedDocument {
    this.validateConfig(document.id);

    const cleaned = cleanPages(
      document.pages.map((page) => page.text),
      this.cleaning
    );
    const pages = document.pages.map((page, index) => ({
      pageNumber: page.pageNumber,
      text: cleaned[index] ?? '',
    }));
    const joined = joinPages(pages);

    const trimmedLength = joined.text.trim().length;
    if (trimmedLength === 0) {
      throw new SegmentationError('Document has no text', { documentId: document.id });
    }
    if (trimmedLength < this.config.minDocumentLength) {
      throw new SegmentationError(
        `Document text is too short (${trimmedLength} < ${this.config.minDocumentLength} characters)`,
        { documentId: document.id }
      );
    }

    const units = mergeSmallUnits(
      joined.text,
      splitIntoUnits(joined.text),
      this.config.minChunkSize
    );

    const chunks: SegmentedChunk[] = [];
    for (const unit of units) {
      const windows = windowSpan(
        joined.text,
        unit.start,
        unit.end,
        this.config.chunkSize,
        this.config.chunkOverlap
      );

      for (const [startOffset, endOffset] of windows) {
        const rawText = joined.text.slice(startOffset, endOffset);
        const firstVisible = startOffset + (rawText.length - rawText.trimStart().length);
        const sequence = chunks.length;

        chunks.push({
          chunkId: chunkIdFor(document.id, sequence),
          documentId: document.id,
          sequence,
          rawText,
          startOffset,
          endOffset,
          pageNumber: pageAt(joined, firstVisible),
          headingPath: unit.headingPath,
        });
      }
    }

    return { documentId: document.id, text: joined.text, chunks };
  }

  private validateConfig(documentId: string): void {
    const { chunkSize, chunkOverlap, minChunkSize, minDocumentLength } = this.config;

    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new SegmentationError(`chunkSize must be a positive integer, got ${chunkSize}`, { documentId });
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new SegmentationError(
        `chunkOverlap must be a non-negative integer below chunkSize, got ${chunkOverlap}`,
        { documentId }
      );
    }
    if (minChunkSize < 0 || minDocumentLength < 0) {
      throw new SegmentationError('minChunkSize and minDocumentLength must not be negative', { documentId });
    }
  }
}

/**
 * Factory function to create a DocumentSegmenter.
 */
export function createDocumentSegmenter(
  config?: Partial<SegmenterConfig>,
  cleaning?: Partial<CleaningOptions>
): DocumentSegmenter {
  return new DocumentSegmenter(config, cleaning);
}
