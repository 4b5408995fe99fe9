/**
 * Fuzzy matcher. Finds where in a document a claimed quote best aligns.
 *
 * Matching runs in two passes so per-quote work stays bounded on long
 * contracts:
 *
 * 1. A coarse pass slides a window of the quote's token count over the
 *    document's token index, tracking weighted token overlap incrementally,
 *    and keeps the few best window starts.
 * 2. Each candidate window (and its one-token-shorter and -longer variants)
 *    is scored precisely: the mean of an LCS character ratio and the
 *    weighted recall of the quote's tokens inside the window.
 *
 * Numeric tokens weigh double in the recall so an invented amount drags a
 * quote down harder than a reworded verb; stop words do not count at all.
 */

import { normalize, toOriginalSpan, tokenize } from './normalizer.js';
import type { MatchResult, NormalizedText, Token } from './types.js';

export interface MatchIndex {
  readonly source: string;
  readonly normalized: NormalizedText;
  readonly tokens: readonly Token[];
}

export interface MatcherOptions {
  /** Number of coarse-pass windows scored precisely (default 5). */
  candidateLimit?: number;
}

export const DEFAULT_CANDIDATE_LIMIT = 5;

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'nor', 'but', 'of', 'to', 'in', 'on', 'at',
  'by', 'for', 'from', 'with', 'as', 'into', 'is', 'are', 'was', 'were', 'be',
  'been', 'being', 'shall', 'will', 'would', 'should', 'may', 'might', 'must',
  'can', 'could', 'do', 'does', 'did', 'has', 'have', 'had', 'this', 'that',
  'these', 'those', 'it', 'its', 'such', 'any', 'each',
]);

const NUMERIC_TOKEN = /^[$€£]?\d[\d.,]*%?$/;

/** Coarse-pass weight of a stop word, so all-stop-word quotes still find their place. */
const STOP_WORD_OVERLAP = 0.5;

export function tokenWeight(token: string): number {
  if (NUMERIC_TOKEN.test(token)) return 2;
  if (STOP_WORDS.has(token)) return 0;
  return 1;
}

export function buildMatchIndex(source: string): MatchIndex {
  const normalized = normalize(source);
  return { source, normalized, tokens: tokenize(normalized.text) };
}

/**
 * Find the best-aligned span of the document for a normalized quote.
 *
 * Returns null only for an empty quote. Anything else yields a result, with
 * a low similarity when nothing plausible exists. Ties go to the earliest
 * span.
 */
export function findBestMatch(
  index: MatchIndex,
  quote: NormalizedText,
  options: MatcherOptions = {},
): MatchResult | null {
  const needle = quote.text;
  if (needle.length === 0) return null;

  const haystack = index.normalized.text;
  const exactAt = haystack.indexOf(needle);
  if (exactAt !== -1) {
    return toMatchResult(index, exactAt, exactAt + needle.length, 1);
  }

  const docTokens = index.tokens;
  if (docTokens.length === 0) {
    const end = Math.min(haystack.length, needle.length);
    return toMatchResult(index, 0, end, lcsRatio(needle, haystack.slice(0, end)));
  }

  const quoteTokens = tokenize(needle).map(t => t.value);
  const width = Math.max(1, quoteTokens.length);
  const limit = Math.max(1, options.candidateLimit ?? DEFAULT_CANDIDATE_LIMIT);

  let best: { start: number; end: number; similarity: number } | undefined;

  for (const first of selectCandidates(docTokens, quoteTokens, width, limit)) {
    for (const span of [width - 1, width, width + 1]) {
      if (span < 1) continue;
      const last = Math.min(docTokens.length, first + span) - 1;
      const start = docTokens[first].start;
      const end = docTokens[last].end;
      const similarity = scoreWindow(needle, quoteTokens, haystack.slice(start, end), docTokens, first, last);

      if (!best || similarity > best.similarity || (similarity === best.similarity && start < best.start)) {
        best = { start, end, similarity };
      }
    }
  }

  if (!best) return toMatchResult(index, 0, 0, 0);
  return toMatchResult(index, best.start, best.end, best.similarity);
}

/**
 * LCS similarity of two raw texts after normalization, in [0, 1].
 * Empty input on either side scores 0.
 */
export function textSimilarity(a: string, b: string): number {
  return lcsRatio(normalize(a).text, normalize(b).text);
}

/** `2 * LCS(a, b) / (|a| + |b|)`; 0 when either side is empty. */
export function lcsRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  if (a === b) return 1;

  let prev = new Uint32Array(b.length + 1);
  let curr = new Uint32Array(b.length + 1);
  for (let i = 1; i <= a.length; i++) {
    const ca = a.charCodeAt(i - 1);
    for (let j = 1; j <= b.length; j++) {
      curr[j] = ca === b.charCodeAt(j - 1)
        ? prev[j - 1] + 1
        : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return (2 * prev[b.length]) / (a.length + b.length);
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function toMatchResult(index: MatchIndex, start: number, end: number, similarity: number): MatchResult {
  const span = toOriginalSpan(index.normalized, start, end, index.source.length);
  return {
    start: span.start,
    end: span.end,
    similarity,
    matchedText: index.source.slice(span.start, span.end),
  };
}

interface Candidate {
  first: number;
  overlap: number;
}

/**
 * Slide a `width`-token window over the document and keep the `limit`
 * window starts with the highest weighted overlap, earliest first on ties.
 */
function selectCandidates(
  docTokens: readonly Token[],
  quoteTokens: readonly string[],
  width: number,
  limit: number,
): number[] {
  const quoteWeight = new Map<string, number>();
  for (const token of quoteTokens) {
    const weight = tokenWeight(token) || STOP_WORD_OVERLAP;
    quoteWeight.set(token, (quoteWeight.get(token) ?? 0) + weight);
  }

  const inWindow = new Map<string, number>();
  let overlap = 0;

  const enter = (value: string) => {
    const count = inWindow.get(value) ?? 0;
    if (count === 0) overlap += quoteWeight.get(value) ?? 0;
    inWindow.set(value, count + 1);
  };
  const leave = (value: string) => {
    const count = inWindow.get(value) ?? 0;
    if (count === 1) overlap -= quoteWeight.get(value) ?? 0;
    inWindow.set(value, count - 1);
  };

  const initial = Math.min(width, docTokens.length);
  for (let i = 0; i < initial; i++) enter(docTokens[i].value);

  const top: Candidate[] = [];
  const lastFirst = Math.max(0, docTokens.length - width);
  for (let first = 0; first <= lastFirst; first++) {
    if (first > 0) {
      leave(docTokens[first - 1].value);
      enter(docTokens[first + width - 1].value);
    }
    insertCandidate(top, { first, overlap }, limit);
  }

  return top.map(c => c.first);
}

function insertCandidate(top: Candidate[], candidate: Candidate, limit: number): void {
  // Starts arrive in ascending order, so a strict comparison keeps the earliest on ties
  let at = top.length;
  while (at > 0 && top[at - 1].overlap < candidate.overlap) at--;
  if (at >= limit) return;
  top.splice(at, 0, candidate);
  if (top.length > limit) top.pop();
}

function scoreWindow(
  needle: string,
  quoteTokens: readonly string[],
  windowText: string,
  docTokens: readonly Token[],
  first: number,
  last: number,
): number {
  const charRatio = lcsRatio(needle, windowText);

  const windowValues = new Set<string>();
  for (let i = first; i <= last; i++) windowValues.add(docTokens[i].value);

  let total = 0;
  let found = 0;
  for (const token of quoteTokens) {
    const weight = tokenWeight(token);
    total += weight;
    if (windowValues.has(token)) found += weight;
  }

  const recall = total > 0 ? found / total : charRatio;
  return (charRatio + recall) / 2;
}
