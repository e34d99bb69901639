/**
 * Document Parser Service
 *
 * Extracts page-by-page text from uploaded files. Pages matter here:
 * every answer cites "document, page", so the page structure of a PDF is
 * kept all the way to the vector payload.
 *
 * - PDF: pdf-parse, one entry per page
 * - Markdown / plain text: form feeds split pages, otherwise one page
 */

import { DocumentPage } from '../../shared/types';
import { PipelineError } from '../errors';

export type DocumentType = 'markdown' | 'text' | 'pdf';

/**
 * Result of extracting a document.
 * errors lists per-page problems that did not stop extraction.
 */
export interface ExtractionResult {
  pages: DocumentPage[];
  title?: string;
  errors: string[];
}

/**
 * Extraction collaborator used by the ingestion pipeline.
 */
export interface TextExtractor {
  extract(input: Buffer, fileName: string): Promise<ExtractionResult>;
}

/**
 * Interface for format-specific parsers.
 */
export interface DocumentParser {
  parse(input: Buffer): Promise<ExtractionResult>;
}

interface PdfTextItem {
  str: string;
  y: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reads pdf.js text content into items. Unknown shapes yield no items.
 */
function readTextItems(content: unknown): PdfTextItem[] {
  if (!isRecord(content) || !Array.isArray(content.items)) {
    return [];
  }

  const items: PdfTextItem[] = [];
  for (const item of content.items) {
    if (!isRecord(item) || typeof item.str !== 'string' || !Array.isArray(item.transform)) {
      continue;
    }
    const y = item.transform[5];
    items.push({ str: item.str, y: typeof y === 'number' ? y : 0 });
  }
  return items;
}

/**
 * Joins items on the same baseline; a new baseline starts a new line.
 */
export function joinTextItems(items: PdfTextItem[]): string {
  let text = '';
  let lastY: number | undefined;

  for (const item of items) {
    if (lastY === undefined || item.y === lastY) {
      text += item.str;
    } else {
      text += `\n${item.str}`;
    }
    lastY = item.y;
  }
  return text;
}

/**
 * Splits on form feeds, the page separator plain-text exports use.
 */
function splitPages(text: string): DocumentPage[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\f')
    .map((pageText, index) => ({ pageNumber: index + 1, text: pageText }));
}

/**
 * Parses Markdown documents.
 *
 * Headings are kept; the segmenter uses them as structure. Images are
 * reduced to their alt text and horizontal rules dropped.
 */
export class MarkdownParser implements DocumentParser {
  async parse(input: Buffer): Promise<ExtractionResult> {
    const text = input.toString('utf-8');

    // Extract title from first H1 if present
    const titleMatch = text.match(/^#\s+(.+)$/m);
    const title = titleMatch && titleMatch[1] ? titleMatch[1].trim() : undefined;

    return {
      pages: splitPages(this.cleanMarkdown(text)),
      title,
      errors: [],
    };
  }

  private cleanMarkdown(text: string): string {
    return (
      text
        // Remove image syntax but keep alt text (it's often descriptive)
        .replace(/!\[([^\]]*)\]\([^)]+\)/g, '$1')
        // Remove horizontal rules
        .replace(/^[-*_]{3,}\s*$/gm, '')
    );
  }
}

/**
 * Parses plain text documents.
 */
export class PlainTextParser implements DocumentParser {
  async parse(input: Buffer): Promise<ExtractionResult> {
    return {
      pages: splitPages(input.toString('utf-8')),
      errors: [],
    };
  }
}

/**
 * Parses PDF documents using pdf-parse library, one page at a time.
 *
 * pdf-parse renders pages in order and awaits each page renderer, so the
 * texts collected by the renderer line up with page numbers.
 */
export class PdfParser implements DocumentParser {
  async parse(input: Buffer): Promise<ExtractionResult> {
    const pageTexts: string[] = [];

    try {
      // Dynamic import to handle the CommonJS module
      const pdfParse = await import('pdf-parse');
      const pdf = await pdfParse.default(input, {
        // pdf-parse types the page as any; the text content is narrowed right away.
        pagerender: (pageData) =>
          pageData
            .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
            .then((content: unknown) => {
              const text = joinTextItems(readTextItems(content));
              pageTexts.push(text);
              return text;
            }),
      });

      const info: unknown = pdf.info;
      const title = isRecord(info) && typeof info.Title === 'string' && info.Title.trim()
        ? info.Title.trim()
        : undefined;

      const pages = pageTexts.map((text, index) => ({ pageNumber: index + 1, text }));
      const errors = pages
        .filter((page) => page.text.trim().length === 0)
        .map((page) => `Page ${page.pageNumber} has no extractable text (scanned image?)`);

      return { pages, title, errors };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new PipelineError(
        `Failed to parse PDF: ${message}. The file may be corrupted, password-protected, or contain only scanned images.`,
        'extraction',
        { cause: error }
      );
    }
  }
}

const parsers: Record<DocumentType, DocumentParser> = {
  markdown: new MarkdownParser(),
  text: new PlainTextParser(),
  pdf: new PdfParser(),
};

export function getParser(type: DocumentType): DocumentParser {
  return parsers[type];
}

/**
 * Detects document type from filename extension.
 * Returns undefined if the extension is not supported.
 */
export function detectDocumentType(filename: string): DocumentType | undefined {
  const ext = filename.toLowerCase().split('.').pop();

  switch (ext) {
    case 'md':
    case 'markdown':
      return 'markdown';
    case 'txt':
      return 'text';
    case 'pdf':
      return 'pdf';
    default:
      return undefined;
  }
}

/**
 * TextExtractor picking the parser from the file extension.
 */
export class FileExtractor implements TextExtractor {
  async extract(input: Buffer, fileName: string): Promise<ExtractionResult> {
    const type = detectDocumentType(fileName);
    if (!type) {
      throw new PipelineError(
        `Unsupported file type: ${fileName}. Supported: .pdf, .md, .markdown, .txt`,
        'extraction'
      );
    }
    return getParser(type).parse(input);
  }
}
