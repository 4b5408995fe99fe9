import { describe, it, expect } from 'vitest';
import { normalize, toOriginalSpan, tokenize } from './normalizer.js';

describe('normalize', () => {
  it('lowercases, collapses whitespace and trims', () => {
    expect(normalize('  Tenant\n\tSHALL  pay ').text).toBe('tenant shall pay');
  });

  it('maps every normalized character back to the original', () => {
    const n = normalize('  Tenant\n\tSHALL  pay ');
    expect(n.starts).toHaveLength(n.text.length);
    expect(n.ends).toHaveLength(n.text.length);
    expect(n.starts[0]).toBe(2);
    // the single space stands for the "\n\t" run
    expect(n.starts[6]).toBe(8);
    expect(n.ends[6]).toBe(10);
    expect(n.ends[n.text.length - 1]).toBe(20);
  });

  it('folds typographic quotes and dashes', () => {
    expect(normalize('“Rent” – due').text).toBe('"rent" - due');
    expect(normalize('Tenant’s `deposit`').text).toBe("tenant's 'deposit'");
  });

  it('expands an ellipsis to three points of one original character', () => {
    const n = normalize('a…');
    expect(n.text).toBe('a...');
    expect(n.starts).toEqual([0, 1, 1, 1]);
    expect(n.ends).toEqual([1, 2, 2, 2]);
  });

  it('returns empty text for whitespace-only input', () => {
    expect(normalize(' \n\t ')).toEqual({ text: '', starts: [], ends: [] });
  });
});

describe('toOriginalSpan', () => {
  const n = normalize('  Tenant\n\tSHALL  pay ');

  it('maps a normalized span to original offsets', () => {
    expect(toOriginalSpan(n, 0, n.text.length, 21)).toEqual({ start: 2, end: 20 });
  });

  it('maps an empty span to an empty span', () => {
    expect(toOriginalSpan(n, 3, 3, 21)).toEqual({ start: 5, end: 5 });
    expect(toOriginalSpan(n, n.text.length, n.text.length, 21)).toEqual({ start: 21, end: 21 });
  });
});

describe('tokenize', () => {
  it('keeps amounts and percentages whole', () => {
    expect(tokenize('pay $2,300 on 1.5% rate.').map(t => t.value))
      .toEqual(['pay', '$2,300', 'on', '1.5%', 'rate']);
  });

  it('records token offsets', () => {
    expect(tokenize('pay $2,300').map(t => [t.start, t.end])).toEqual([[0, 3], [4, 10]]);
  });

  it('skips punctuation-only text', () => {
    expect(tokenize('... --- !!')).toEqual([]);
  });
});
