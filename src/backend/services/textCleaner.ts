/**
 * Text Cleaner
 *
 * Normalizes text coming out of extraction before it is segmented.
 * PDF extraction in particular leaves behind page numbers, separator rules,
 * running headers repeated on every page and hard-wrapped lines; all of
 * these hurt both chunk boundaries and embeddings.
 */

/**
 * A structural header recognized at the start of a line.
 * Level 1 is the outermost.
 */
export interface Heading {
  level: number;
  title: string;
}

export interface CleaningOptions {
  /** Lines kept only on their first occurrence across the document */
  repeatedHeaders: string[];
  /** Also treat lines opening most pages as running headers */
  detectRunningHeaders: boolean;
}

export const DEFAULT_CLEANING_OPTIONS: CleaningOptions = {
  repeatedHeaders: [],
  detectRunningHeaders: true,
};

const MARKDOWN_HEADING = /^(#{1,6})\s+(.+)$/;
const TITLE_HEADING = /^(T[ÍI]TULO|TITLE)\s+[IVXLC]+\b/i;
const CHAPTER_HEADING = /^(CAP[ÍI]TULO|CHAPTER)\s+([IVXLC]+|\d+)\b/i;
const ARTICLE_HEADING = /^(ART[ÍI]CULO|ARTICLE|SECTION)\s+\d+/i;

const SEPARATOR_LINE = /^[_\-=─]{3,}$/;
const PAGE_NUMBER_LINE = /^\d+$/;
const ENDS_STATEMENT = /[.?!:]$/;
const HYPHENATED_END = /\p{L}-$/u;
const STARTS_LOWERCASE = /^\p{Ll}/u;

/**
 * Recognizes Markdown headings and regulatory markers
 * (TÍTULO/TITLE, CAPÍTULO/CHAPTER, Artículo/Article/Section).
 */
export function parseHeading(line: string): Heading | undefined {
  const trimmed = line.trim();

  const markdown = trimmed.match(MARKDOWN_HEADING);
  if (markdown && markdown[1] && markdown[2]) {
    return { level: markdown[1].length, title: markdown[2].trim() };
  }
  if (TITLE_HEADING.test(trimmed)) {
    return { level: 1, title: trimmed };
  }
  if (CHAPTER_HEADING.test(trimmed)) {
    return { level: 2, title: trimmed };
  }
  if (ARTICLE_HEADING.test(trimmed)) {
    return { level: 3, title: trimmed };
  }
  return undefined;
}

/**
 * Lines that open at least three pages and at least half of all pages.
 */
export function findRunningHeaders(pages: string[]): string[] {
  if (pages.length < 3) {
    return [];
  }

  const counts = new Map<string, number>();
  for (const page of pages) {
    const firstLine = page
      .split('\n')
      .map((line) => collapseSpaces(line).trim())
      .find((line) => line.length > 0 && !PAGE_NUMBER_LINE.test(line));
    if (firstLine) {
      counts.set(firstLine, (counts.get(firstLine) ?? 0) + 1);
    }
  }

  const threshold = Math.max(3, Math.ceil(pages.length / 2));
  return [...counts.entries()]
    .filter(([, count]) => count >= threshold)
    .map(([line]) => line);
}

/**
 * Cleans one page.
 *
 * @param seen - header lines already emitted on earlier pages; updated in place
 */
export function cleanPageText(
  raw: string,
  repeatedHeaders: ReadonlySet<string> = new Set(),
  seen: Set<string> = new Set()
): string {
  const out: string[] = [];

  for (const line of raw.replace(/\r\n?/g, '\n').split('\n')) {
    const text = collapseSpaces(line).trim();

    if (text === '') {
      // Blank lines separate paragraphs; keep at most one in a row.
      if (out.length > 0 && out[out.length - 1] !== '') {
        out.push('');
      }
      continue;
    }
    if (PAGE_NUMBER_LINE.test(text) || SEPARATOR_LINE.test(text)) {
      continue;
    }
    if (repeatedHeaders.has(text)) {
      if (seen.has(text)) {
        continue;
      }
      seen.add(text);
    }

    const previous = out[out.length - 1];
    if (
      previous !== undefined &&
      previous !== '' &&
      !ENDS_STATEMENT.test(previous) &&
      !parseHeading(previous) &&
      !parseHeading(text)
    ) {
      out[out.length - 1] = joinWrapped(previous, text);
    } else {
      out.push(text);
    }
  }

  return out.join('\n').trim();
}

/**
 * Cleans every page of a document, sharing header state across pages.
 * Page count and order are preserved; a page may come back empty.
 */
export function cleanPages(pages: string[], options: Partial<CleaningOptions> = {}): string[] {
  const { repeatedHeaders, detectRunningHeaders } = { ...DEFAULT_CLEANING_OPTIONS, ...options };

  const headers = new Set(repeatedHeaders);
  if (detectRunningHeaders) {
    for (const header of findRunningHeaders(pages)) {
      headers.add(header);
    }
  }

  const seen = new Set<string>();
  return pages.map((page) => cleanPageText(page, headers, seen));
}

function collapseSpaces(line: string): string {
  return line.replace(/[ \t\f\v\u00a0]+/g, ' ');
}

function joinWrapped(previous: string, next: string): string {
  // "regula-" + "ción" -> "regulación"
  if (HYPHENATED_END.test(previous) && STARTS_LOWERCASE.test(next)) {
    return previous.slice(0, -1) + next;
  }
  return `${previous} ${next}`;
}
