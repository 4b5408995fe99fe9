import { InvalidInputError } from './errors.js';
import { buildMatchIndex, type MatchIndex } from './matcher.js';
import type { NormalizedText } from './types.js';

/**
 * An immutable contract text plus the indexes derived from it once per run.
 */
export interface Document {
  readonly text: string;
  /** Offsets at which each line starts; `lineStarts[0]` is always 0. */
  readonly lineStarts: readonly number[];
  /** `[Page N]` markers in order of appearance. */
  readonly pages: readonly PageMarker[];
  readonly normalized: NormalizedText;
  readonly index: MatchIndex;
}

export interface PageMarker {
  page: number;
  /** Offset just past the marker; the page's text starts here. */
  offset: number;
}

const PAGE_MARKER = /\[Page (\d+)\]/g;

export function createDocument(text: unknown): Document {
  if (text === null || text === undefined) {
    throw new InvalidInputError('Document text is required');
  }
  if (typeof text !== 'string') {
    throw new InvalidInputError(`Document text must be a string, got ${typeof text}`);
  }

  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') lineStarts.push(i + 1);
  }

  const pages: PageMarker[] = [];
  for (const match of text.matchAll(PAGE_MARKER)) {
    pages.push({
      page: Number(match[1]),
      offset: (match.index ?? 0) + match[0].length,
    });
  }

  const index = buildMatchIndex(text);

  return Object.freeze({
    text,
    lineStarts: Object.freeze(lineStarts),
    pages: Object.freeze(pages),
    normalized: index.normalized,
    index,
  });
}

/** 1-based line number of an offset. Offsets past the end land on the last line. */
export function lineAt(document: Document, offset: number): number {
  const { lineStarts } = document;
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo + 1;
}

/** Page containing an offset, or undefined when the text has no page markers before it. */
export function pageAt(document: Document, offset: number): number | undefined {
  let page: number | undefined;
  for (const marker of document.pages) {
    if (marker.offset > offset) break;
    page = marker.page;
  }
  return page;
}
