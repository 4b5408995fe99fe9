import { describe, it, expect } from 'vitest';
import { buildMatchIndex, findBestMatch, lcsRatio, textSimilarity, tokenWeight } from './matcher.js';
import { normalize } from './normalizer.js';

const RENT_CLAUSE = 'Tenant shall pay Base Rent of $2,300 on the first day of each calendar month.';

const LEASE = [
  'LEASE AGREEMENT',
  '',
  '1. Rent. Tenant shall pay Base Rent of $2,300 on the first day of each calendar month.',
  '2. Late Fee. If rent is not received within five days after it is due, Tenant shall pay a late fee of $75.',
  '3. Term. This Lease renews automatically for successive one-year terms unless either party gives sixty days written notice.',
  '',
].join('\n');

const LATE_FEE = 'If rent is not received within five days after it is due, Tenant shall pay a late fee of $75.';

function match(source: string, quote: string) {
  return findBestMatch(buildMatchIndex(source), normalize(quote));
}

/** Overwrite every third non-space character, starting at index 1, until `count` edits are made. */
function corrupt(text: string, count: number): string {
  const chars = [...text];
  let made = 0;
  for (let i = 1; made < count && i < chars.length; i += 3) {
    if (chars[i] !== ' ') {
      chars[i] = '#';
      made++;
    }
  }
  return chars.join('');
}

describe('findBestMatch', () => {
  it('returns null for an empty quote', () => {
    expect(match(RENT_CLAUSE, '')).toBeNull();
    expect(match(RENT_CLAUSE, '  \n ')).toBeNull();
  });

  it('finds a verbatim quote with similarity 1', () => {
    expect(match(RENT_CLAUSE, RENT_CLAUSE)).toEqual({
      start: 0,
      end: 77,
      similarity: 1,
      matchedText: RENT_CLAUSE,
    });
  });

  it('matches through case and whitespace differences and reports the original text', () => {
    const result = match(RENT_CLAUSE, '  tenant SHALL   pay base rent ');
    expect(result).toEqual({ start: 0, end: 26, similarity: 1, matchedText: 'Tenant shall pay Base Rent' });
  });

  it('locates a verbatim quote in a longer document', () => {
    const result = match(LEASE, LATE_FEE);
    expect(result?.start).toBe(117);
    expect(result?.end).toBe(210);
    expect(result?.matchedText).toBe(LATE_FEE);
  });

  it('scores a paraphrase as a partial match', () => {
    const result = match(RENT_CLAUSE, 'Tenant must pay rent by the 1st');
    expect(result?.start).toBe(0);
    expect(result?.matchedText).toBe('Tenant shall pay Base Rent of');
    expect(result?.similarity).toBeCloseTo(0.675, 6);
  });

  it('scores an invented amount below the accept threshold', () => {
    const result = match(RENT_CLAUSE, 'Tenant shall pay a $50,000 penalty');
    expect(result?.matchedText).toBe('Tenant shall pay Base Rent');
    expect(result?.similarity).toBeCloseTo(0.5667, 4);
  });

  it('always yields a span, even for unrelated text', () => {
    const result = match(RENT_CLAUSE, 'xyz');
    expect(result).toMatchObject({ start: 13, end: 16, matchedText: 'pay' });
    expect(result?.similarity).toBeCloseTo(1 / 6, 6);
  });

  it('places a quote of only stop words', () => {
    const result = match(RENT_CLAUSE, 'the of');
    expect(result).toMatchObject({ start: 40, end: 43, matchedText: 'the' });
    expect(result?.similarity).toBeCloseTo(2 / 3, 6);
  });

  it('scores a punctuation-only quote as 0', () => {
    expect(match(RENT_CLAUSE, '...')).toEqual({ start: 0, end: 6, similarity: 0, matchedText: 'Tenant' });
  });

  it('handles a document without word tokens', () => {
    expect(match('---', 'abc')).toEqual({ start: 0, end: 3, similarity: 0, matchedText: '---' });
  });

  it('never scores more corrupted quotes higher', () => {
    const similarities = Array.from({ length: 13 }, (_, k) => match(LEASE, corrupt(LATE_FEE, k))?.similarity ?? 0);
    expect(similarities[0]).toBe(1);
    for (let k = 1; k < similarities.length; k++) {
      expect(similarities[k]).toBeLessThan(similarities[k - 1]);
    }
    expect(similarities[1]).toBeCloseTo(0.9586, 4);
    expect(similarities[10]).toBeCloseTo(0.6379, 4);
    expect(similarities[12]).toBeCloseTo(0.5394, 4);
  });

  it('is deterministic', () => {
    const index = buildMatchIndex(LEASE);
    const quote = normalize(corrupt(LATE_FEE, 6));
    expect(findBestMatch(index, quote)).toEqual(findBestMatch(index, quote));
  });
});

describe('tokenWeight', () => {
  it('weighs numbers double and ignores stop words', () => {
    expect(tokenWeight('$2,300')).toBe(2);
    expect(tokenWeight('15%')).toBe(2);
    expect(tokenWeight('the')).toBe(0);
    expect(tokenWeight('rent')).toBe(1);
  });
});

describe('lcsRatio', () => {
  it('returns 1 for identical strings and 0 for an empty side', () => {
    expect(lcsRatio('rent', 'rent')).toBe(1);
    expect(lcsRatio('', 'rent')).toBe(0);
    expect(lcsRatio('', '')).toBe(0);
  });

  it('computes 2 * LCS / total length', () => {
    expect(lcsRatio('abc', 'abd')).toBeCloseTo(2 / 3, 10);
    expect(lcsRatio('abcd', 'xyz')).toBe(0);
  });
});

describe('textSimilarity', () => {
  it('compares texts after normalization', () => {
    expect(textSimilarity('Same  Text', 'same text')).toBe(1);
    expect(textSimilarity('', 'anything')).toBe(0);
  });
});
