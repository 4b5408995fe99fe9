import { describe, it, expect, vi } from 'vitest';
import { VerificationEngine } from './engine.js';
import { createDocument } from './document.js';
import { InvalidInputError } from './errors.js';

const CONTRACT = [
  'Tenant shall pay Base Rent of $2,300 on the first day of each calendar month.',
  'Landlord shall maintain the roof in good repair.',
  '',
].join('\n');

function makeBatch(): unknown[] {
  return [
    {
      kind: 'obligation',
      id: 'OBL-1',
      party: 'Tenant',
      claimedSourceText: 'Tenant shall pay Base Rent of $2,300 on the first day of each calendar month.',
    },
    {
      kind: 'risk_flag',
      id: 'FLAG-1',
      category: 'penalty',
      severity: 'high',
      claimedSourceText: 'Tenant shall pay a $50,000 penalty',
    },
    { kind: 'obligation', id: 'OBL-3', claimedSourceText: 'x' },
    { kind: 'obligation', id: 'OBL-1', party: 'Tenant', claimedSourceText: 'Tenant shall pay' },
    {
      kind: 'obligation',
      id: 'OBL-2',
      party: 'Landlord',
      severity: 'High',
      claimedSourceText: 'Landlord shall maintain the roof in good repair.',
    },
  ];
}

describe('VerificationEngine', () => {
  it('scores valid records in input order', () => {
    const engine = new VerificationEngine({ document: CONTRACT });
    const run = engine.run(makeBatch());

    expect(run.records.map(r => r.record.id)).toEqual(['OBL-1', 'FLAG-1', 'OBL-2']);
    expect(run.records.map(r => r.routing)).toEqual(['auto_include', 'human_review', 'tag_verify']);
    expect(run.records[2].outcome.location).toEqual({ line: 2 });
  });

  it('reports malformed and duplicate records without stopping the batch', () => {
    const run = new VerificationEngine({ document: CONTRACT }).run(makeBatch());
    expect(run.failures).toEqual([
      { index: 2, recordId: 'OBL-3', message: 'Invalid record "OBL-3": party: Required' },
      { index: 3, recordId: 'OBL-1', message: 'Duplicate record id "OBL-1"' },
    ]);
  });

  it('summarizes the scored records', () => {
    const { summary } = new VerificationEngine({ document: CONTRACT }).run(makeBatch());
    expect(summary.total).toBe(3);
    expect(summary.byStatus).toEqual({ exact: 2, likely: 0, flagged: 1 });
    expect(summary.exactMatchPct).toBe(66.7);
    expect(summary.possibleHallucinations).toBe(0);
    expect(summary.humanReview).toEqual(['FLAG-1']);
  });

  it('emits an event per record and one on completion', () => {
    const engine = new VerificationEngine({ document: CONTRACT });
    const scored = vi.fn();
    const failed = vi.fn();
    const complete = vi.fn();
    engine.on('record:scored', scored);
    engine.on('record:error', failed);
    engine.on('run:complete', complete);

    engine.run(makeBatch());

    expect(scored).toHaveBeenCalledTimes(3);
    expect(scored.mock.calls[1][0]).toMatchObject({ index: 1, total: 5 });
    expect(failed).toHaveBeenCalledTimes(2);
    expect(failed.mock.calls[0][0]).toMatchObject({ index: 2, recordId: 'OBL-3' });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0][0].summary.total).toBe(3);
  });

  it('applies config overrides', () => {
    const engine = new VerificationEngine({ document: CONTRACT, config: { acceptThreshold: 0.5 } });
    const run = engine.run(makeBatch());
    expect(engine.config.exactThreshold).toBe(0.98);
    expect(run.records[1].outcome.status).toBe('likely');
    expect(run.records[1].routing).toBe('tag_verify');
  });

  it('accepts a prepared document', () => {
    const document = createDocument(CONTRACT);
    const engine = new VerificationEngine({ document });
    expect(engine.document).toBe(document);
  });

  it('rejects an invalid config', () => {
    expect(() => new VerificationEngine({ document: CONTRACT, config: { exactThreshold: 2 } }))
      .toThrow(InvalidInputError);
  });

  it('gives the same result for the same input', () => {
    const a = new VerificationEngine({ document: CONTRACT }).run(makeBatch());
    const b = new VerificationEngine({ document: CONTRACT }).run(makeBatch());
    expect(b.records).toEqual(a.records);
    expect(b.summary).toEqual(a.summary);
  });

  it('returns an empty summary for an empty batch', () => {
    const run = new VerificationEngine({ document: CONTRACT }).run([]);
    expect(run.records).toEqual([]);
    expect(run.failures).toEqual([]);
    expect(run.summary.total).toBe(0);
  });
});
