import { describe, it, expect } from 'vitest';
import { summarize, type ScoredRecord, type VerificationRun } from '@clausecheck/core';
import { buildJsonOutput, formatJson } from './json.js';

function makeScored(overrides: Partial<ScoredRecord> = {}): ScoredRecord {
  return {
    record: {
      kind: 'obligation',
      id: 'OBL-001',
      party: 'Tenant',
      claimedSourceText: 'Tenant shall pay rent.',
    },
    outcome: {
      status: 'likely',
      match: { start: 4, end: 26, similarity: 0.123456, matchedText: 'Tenant shall pay the rent.' },
      location: { line: 2, hint: 'Section 3' },
      issues: ['Partial match only (similarity: 12.3%)'],
    },
    confidence: 0.123456,
    routing: 'tag_verify',
    autoIncludeThreshold: 0.98,
    ...overrides,
  };
}

function makeRun(records: ScoredRecord[]): VerificationRun {
  return { records, failures: [], summary: summarize(records), durationMs: 40 };
}

const DATE = new Date('2026-01-15T10:00:00Z');

describe('buildJsonOutput', () => {
  it('flattens scored records', () => {
    const output = buildJsonOutput({ run: makeRun([makeScored()]), documentName: 'lease.txt', date: DATE });

    expect(output.metadata).toEqual({ document: 'lease.txt', date: '2026-01-15', durationMs: 40 });
    expect(output.records).toEqual([{
      id: 'OBL-001',
      kind: 'obligation',
      status: 'likely',
      routing: 'tag_verify',
      confidence: 0.1235,
      autoIncludeThreshold: 0.98,
      location: { line: 2, hint: 'Section 3' },
      matchedText: 'Tenant shall pay the rent.',
      issues: ['Partial match only (similarity: 12.3%)'],
    }]);
    expect(output.failures).toEqual([]);
  });

  it('leaves out location and match when there is none', () => {
    const scored = makeScored({
      outcome: { status: 'flagged', issues: ['No source text provided'] },
      confidence: 0,
      routing: 'human_review',
    });
    const [record] = buildJsonOutput({ run: makeRun([scored]), documentName: 'lease.txt', date: DATE }).records;
    expect(record).not.toHaveProperty('location');
    expect(record).not.toHaveProperty('matchedText');
  });

  it('carries the run summary', () => {
    const output = buildJsonOutput({ run: makeRun([makeScored()]), documentName: 'lease.txt', date: DATE });
    expect(output.summary.byRouting).toEqual({ auto_include: 0, tag_verify: 1, human_review: 0 });
  });
});

describe('formatJson', () => {
  it('produces parseable indented JSON', () => {
    const text = formatJson({ run: makeRun([makeScored()]), documentName: 'lease.txt', date: DATE });
    expect(text.split('\n')[1]).toBe('  "metadata": {');
    expect(JSON.parse(text).records[0].id).toBe('OBL-001');
  });
});
