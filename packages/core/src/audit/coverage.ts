/**
 * Coverage scan. Finds sentences that read like obligations but that no record
 * quotes. Used by audits to spot clauses the extraction missed.
 */

import { normalize } from '../verification/normalizer.js';
import { lcsRatio } from '../verification/matcher.js';
import type { Document } from '../verification/document.js';

export const OBLIGATION_KEYWORDS: ReadonlyArray<readonly [keyword: string, pattern: RegExp]> = [
  ['SHALL', /\bshall\b/i],
  ['MUST', /\bmust\b/i],
  ['AGREES', /\bagrees?\b/i],
  ['WARRANTS', /\bwarrants?\b/i],
  ['COVENANTS', /\bcovenants?\b/i],
  ['WILL NOT', /\bwill\s+not\b/i],
  ['MAY NOT', /\bmay\s+not\b/i],
  ['IS RESPONSIBLE', /\bis\s+responsible\b/i],
  ['IS REQUIRED', /\bis\s+required\b/i],
  ['UNDERTAKES', /\bundertakes?\b/i],
  ['COMMITS', /\bcommits?\b/i],
  ['OBLIGATED', /\bobligated\b/i],
  ['PROHIBITED', /\bprohibited\b/i],
];

export interface PotentialMiss {
  keyword: string;
  /** 1-based line of the sentence. */
  line: number;
  sentence: string;
  /** Best similarity to any claimed source text. */
  similarity: number;
}

export interface CoverageOptions {
  /** Sentences at least this similar to a claimed text count as covered (default 0.7). */
  threshold?: number;
  /** Sentences shorter than this are skipped (default 10). */
  minSentenceLength?: number;
}

export interface KeywordSentence {
  keyword: string;
  line: number;
  sentence: string;
}

/** Sentences containing an obligation keyword; a sentence is reported once, under its first keyword. */
export function findKeywordSentences(document: Document, minSentenceLength = 10): KeywordSentence[] {
  const results: KeywordSentence[] = [];
  const lines = document.text.split('\n');

  lines.forEach((lineText, i) => {
    for (const raw of lineText.split(/(?<=[.;])\s+/)) {
      const sentence = raw.trim();
      if (sentence.length < minSentenceLength) continue;
      const hit = OBLIGATION_KEYWORDS.find(([, pattern]) => pattern.test(sentence));
      if (hit) {
        results.push({ keyword: hit[0], line: i + 1, sentence });
      }
    }
  });

  return results;
}

export function findPotentialMisses(
  document: Document,
  claimedTexts: readonly string[],
  options: CoverageOptions = {},
): PotentialMiss[] {
  const { threshold = 0.7, minSentenceLength = 10 } = options;
  const existing = claimedTexts
    .map(text => normalize(text).text)
    .filter(text => text.length > 0);

  const misses: PotentialMiss[] = [];
  for (const { keyword, line, sentence } of findKeywordSentences(document, minSentenceLength)) {
    const normalized = normalize(sentence).text;
    let similarity = 0;
    for (const text of existing) {
      similarity = Math.max(similarity, lcsRatio(normalized, text));
    }
    if (similarity < threshold) {
      misses.push({ keyword, line, sentence, similarity });
    }
  }
  return misses;
}
