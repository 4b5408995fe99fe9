/**
 * Text normalizer. Produces the canonical comparison form of contract text.
 *
 * Lowercases, collapses whitespace runs to one space, trims, and folds
 * typographic punctuation to ASCII. Every normalized code unit remembers the
 * original character it came from so matches can be reported against the
 * untouched document.
 */

import type { NormalizedText, Token } from './types.js';

const PUNCTUATION_FOLDS: Record<string, string> = {
  '‘': "'", // left single quote
  '’': "'", // right single quote
  '‚': "'",
  '‛': "'",
  '′': "'", // prime
  '`': "'",
  '“': '"', // left double quote
  '”': '"', // right double quote
  '„': '"',
  '‟': '"',
  '″': '"', // double prime
  '‐': '-',
  '‑': '-',
  '‒': '-', // figure dash
  '–': '-', // en dash
  '—': '-', // em dash
  '―': '-',
  '−': '-', // minus sign
  '…': '...',
};

const WHITESPACE = /\s/u;

export function normalize(source: string): NormalizedText {
  let text = '';
  const starts: number[] = [];
  const ends: number[] = [];

  // Start/end of the whitespace run waiting to be emitted as a single space
  let spaceStart = -1;
  let spaceEnd = -1;
  let offset = 0;

  for (const ch of source) {
    const from = offset;
    offset += ch.length;

    if (WHITESPACE.test(ch)) {
      if (spaceStart < 0) spaceStart = from;
      spaceEnd = offset;
      continue;
    }

    if (spaceStart >= 0) {
      if (text.length > 0) {
        text += ' ';
        starts.push(spaceStart);
        ends.push(spaceEnd);
      }
      spaceStart = -1;
    }

    const folded = (PUNCTUATION_FOLDS[ch] ?? ch).toLowerCase();
    for (let k = 0; k < folded.length; k++) {
      starts.push(from);
      ends.push(offset);
    }
    text += folded;
  }

  return { text, starts, ends };
}

/**
 * Map a span of normalized offsets back to the original text.
 * An empty span maps to an empty span at the corresponding position.
 */
export function toOriginalSpan(
  normalized: NormalizedText,
  start: number,
  end: number,
  originalLength: number,
): { start: number; end: number } {
  if (end <= start) {
    const at = start < normalized.starts.length ? normalized.starts[start] : originalLength;
    return { start: at, end: at };
  }
  return { start: normalized.starts[start], end: normalized.ends[end - 1] };
}

const TOKEN_PATTERN = /[\p{L}\p{N}$€£%]+(?:[.,'\-/][\p{L}\p{N}%]+)*/gu;

/** Split normalized text into word-like tokens, keeping amounts such as `$2,300` whole. */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    tokens.push({ value: match[0], start, end: start + match[0].length });
  }
  return tokens;
}
