/**
 * Bookkeeping fields an auditor fills in by hand on a ground-truth file.
 * Existing values are never overwritten and key order is kept.
 */

const FILE_FIELDS: ReadonlyArray<readonly [string, () => unknown]> = [
  ['_audited', () => false],
  ['_audit_date', () => null],
  ['_audit_notes', () => ''],
  ['_missed_obligations', () => []],
  ['_false_positives', () => []],
];

const ENTRY_FIELDS: ReadonlyArray<readonly [string, () => unknown]> = [
  ['_audit_status', () => 'pending'],
  ['_audit_notes', () => ''],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withFields(
  value: Record<string, unknown>,
  fields: ReadonlyArray<readonly [string, () => unknown]>,
): Record<string, unknown> {
  const result = { ...value };
  for (const [key, initial] of fields) {
    if (!(key in result)) result[key] = initial();
  }
  return result;
}

function prepareEntries(value: unknown): unknown {
  if (!Array.isArray(value)) return value;
  return value.map(entry => (isRecord(entry) ? withFields(entry, ENTRY_FIELDS) : entry));
}

/** Return a copy of a parsed ground-truth file with the audit fields added where missing. */
export function prepareGroundTruth(truth: Record<string, unknown>): Record<string, unknown> {
  const prepared = withFields(truth, FILE_FIELDS);
  if ('obligations' in prepared) prepared.obligations = prepareEntries(prepared.obligations);
  if ('risk_flags' in prepared) prepared.risk_flags = prepareEntries(prepared.risk_flags);
  return prepared;
}

export { isRecord };
