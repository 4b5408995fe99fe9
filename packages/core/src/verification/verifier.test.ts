import { describe, it, expect } from 'vitest';
import { verify, classify } from './verifier.js';
import { createDocument } from './document.js';
import { DEFAULT_VERIFICATION_CONFIG, resolveVerificationConfig } from './config.js';
import type { ObligationRecord } from './types.js';

const RENT_CLAUSE = 'Tenant shall pay Base Rent of $2,300 on the first day of each calendar month.';

function makeRecord(overrides: Partial<ObligationRecord> = {}): ObligationRecord {
  return {
    kind: 'obligation',
    id: 'OBL-001',
    party: 'Tenant',
    claimedSourceText: RENT_CLAUSE,
    ...overrides,
  };
}

describe('verify', () => {
  const doc = createDocument(RENT_CLAUSE);

  it('verifies a verbatim quote as exact without issues', () => {
    const outcome = verify(makeRecord(), doc);
    expect(outcome.status).toBe('exact');
    expect(outcome.match?.similarity).toBe(1);
    expect(outcome.location).toEqual({ line: 1 });
    expect(outcome.issues).toEqual([]);
  });

  it('notes a quote that only matches after normalization', () => {
    const outcome = verify(makeRecord({ claimedSourceText: '  tenant SHALL   pay base rent ' }), doc);
    expect(outcome.status).toBe('exact');
    expect(outcome.match?.matchedText).toBe('Tenant shall pay Base Rent');
    expect(outcome.issues).toEqual(['Matched after normalization']);
  });

  it('classifies a paraphrase as likely', () => {
    const outcome = verify(makeRecord({ claimedSourceText: 'Tenant must pay rent by the 1st' }), doc);
    expect(outcome.status).toBe('likely');
    expect(outcome.issues).toEqual(['Partial match only (similarity: 67.5%)']);
  });

  it('flags an invented quote as a possible hallucination', () => {
    const outcome = verify(makeRecord({ claimedSourceText: 'Tenant shall pay a $50,000 penalty' }), doc);
    expect(outcome.status).toBe('flagged');
    expect(outcome.match?.matchedText).toBe('Tenant shall pay Base Rent');
    expect(outcome.issues).toEqual([
      'Possible hallucination: source text not found in document',
      'Best similarity found: 56.7%',
    ]);
  });

  it('notes very short quotes', () => {
    const outcome = verify(makeRecord({ claimedSourceText: 'xyz' }), doc);
    expect(outcome.status).toBe('flagged');
    expect(outcome.issues).toEqual([
      'Source text very short (3 chars)',
      'Possible hallucination: source text not found in document',
      'Best similarity found: 16.7%',
    ]);
  });

  it('flags an empty claim without a match', () => {
    expect(verify(makeRecord({ claimedSourceText: '' }), doc)).toEqual({
      status: 'flagged',
      issues: ['No source text provided'],
    });
  });

  it('reports near-exact matches under a lower exact threshold', () => {
    const lease = createDocument(
      'Rent.\nIf rent is not received within five days after it is due, Tenant shall pay a late fee of $75.\n',
    );
    const config = resolveVerificationConfig({ exactThreshold: 0.95 });
    const outcome = verify(
      makeRecord({ claimedSourceText: 'I# rent is not received within five days after it is due, Tenant shall pay a late fee of $75.' }),
      lease,
      config,
    );
    expect(outcome.status).toBe('exact');
    expect(outcome.location?.line).toBe(2);
    expect(outcome.issues).toEqual(['Near-exact match (similarity: 95.9%)']);
  });

  describe('page locations', () => {
    const paged = createDocument(
      '[Page 1]\nLandlord shall maintain the roof.\n[Page 2]\nTenant shall pay Base Rent of $2,300 monthly.\n',
    );
    const quote = 'Tenant shall pay Base Rent of $2,300 monthly.';

    it('reports line and page of the match', () => {
      const outcome = verify(makeRecord({ claimedSourceText: quote, claimedLocation: 'Page 2, Section 4' }), paged);
      expect(outcome.location).toEqual({ line: 4, page: 2, hint: 'Page 2, Section 4' });
      expect(outcome.issues).toEqual([]);
    });

    it('notes a location hint naming a different page', () => {
      const outcome = verify(makeRecord({ claimedSourceText: quote, claimedLocation: 'Page 1' }), paged);
      expect(outcome.status).toBe('exact');
      expect(outcome.issues).toEqual(['Location hint "Page 1" does not match page 2']);
    });

    it('ignores hints without a page number', () => {
      const outcome = verify(makeRecord({ claimedSourceText: quote, claimedLocation: 'Section 4.1' }), paged);
      expect(outcome.issues).toEqual([]);
    });
  });

  it('does not depend on other records', () => {
    const a = makeRecord({ id: 'OBL-1', claimedSourceText: 'Tenant must pay rent by the 1st' });
    const b = makeRecord({ id: 'OBL-2' });
    const first = verify(a, doc);
    verify(b, doc);
    expect(verify(a, doc)).toEqual(first);
  });
});

describe('classify', () => {
  const config = DEFAULT_VERIFICATION_CONFIG;

  it('uses inclusive thresholds', () => {
    expect(classify(1, config)).toBe('exact');
    expect(classify(0.98, config)).toBe('exact');
    expect(classify(0.979, config)).toBe('likely');
    expect(classify(0.6, config)).toBe('likely');
    expect(classify(0.599, config)).toBe('flagged');
    expect(classify(0, config)).toBe('flagged');
  });
});
