import { describe, it, expect } from 'vitest';
import { prepareGroundTruth } from './audit-fields.js';

describe('prepareGroundTruth', () => {
  it('adds file and entry audit fields', () => {
    const prepared = prepareGroundTruth({
      contract: 'lease.txt',
      obligations: [{ id: 'OBL-001' }],
      risk_flags: [{ id: 'FLAG-001' }],
    });

    expect(prepared).toEqual({
      contract: 'lease.txt',
      obligations: [{ id: 'OBL-001', _audit_status: 'pending', _audit_notes: '' }],
      risk_flags: [{ id: 'FLAG-001', _audit_status: 'pending', _audit_notes: '' }],
      _audited: false,
      _audit_date: null,
      _audit_notes: '',
      _missed_obligations: [],
      _false_positives: [],
    });
  });

  it('keeps existing values and key order', () => {
    const prepared = prepareGroundTruth({
      _audited: true,
      obligations: [{ id: 'OBL-001', _audit_status: 'verified' }],
    });

    expect(prepared._audited).toBe(true);
    expect(prepared.obligations).toEqual([{ id: 'OBL-001', _audit_status: 'verified', _audit_notes: '' }]);
    expect(Object.keys(prepared)).toEqual([
      '_audited',
      'obligations',
      '_audit_date',
      '_audit_notes',
      '_missed_obligations',
      '_false_positives',
    ]);
  });

  it('does not modify its input', () => {
    const input = { obligations: [{ id: 'OBL-001' }] };
    prepareGroundTruth(input);
    expect(input).toEqual({ obligations: [{ id: 'OBL-001' }] });
  });
});
