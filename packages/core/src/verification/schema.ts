import { z } from 'zod';
import { InvalidRecordError, formatIssues } from './errors.js';

const recordFields = {
  id: z.string().trim().min(1, 'id must be a non-empty string'),
  /** Null is accepted and read as an empty claim, which always verifies as flagged. */
  claimedSourceText: z.string().nullable().transform(text => text ?? ''),
  claimedLocation: z.string().optional(),
  description: z.string().optional(),
};

export const ObligationRecordSchema = z.object({
  kind: z.literal('obligation'),
  ...recordFields,
  party: z.string(),
  category: z.string().optional(),
  severity: z.string().optional(),
});

export const RiskFlagRecordSchema = z.object({
  kind: z.literal('risk_flag'),
  ...recordFields,
  category: z.string(),
  severity: z.string(),
  party: z.string().optional(),
  title: z.string().optional(),
});

export const CandidateRecordSchema = z.discriminatedUnion('kind', [
  ObligationRecordSchema,
  RiskFlagRecordSchema,
]);

export type ObligationRecord = z.infer<typeof ObligationRecordSchema>;
export type RiskFlagRecord = z.infer<typeof RiskFlagRecordSchema>;
export type CandidateRecord = z.infer<typeof CandidateRecordSchema>;
export type RecordKind = CandidateRecord['kind'];

function peekId(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('id' in value)) return undefined;
  const id = value.id;
  return typeof id === 'string' && id.trim().length > 0 ? id.trim() : undefined;
}

/**
 * Validate one record at the core boundary.
 * Throws InvalidRecordError instead of guessing missing fields.
 */
export function parseCandidateRecord(value: unknown, index?: number): CandidateRecord {
  const result = CandidateRecordSchema.safeParse(value);
  if (!result.success) {
    const id = peekId(value);
    const label = id ? ` "${id}"` : index !== undefined ? ` at index ${index}` : '';
    throw new InvalidRecordError(
      `Invalid record${label}: ${formatIssues(result.error.issues)}`,
      result.error.issues,
      index,
      id,
    );
  }
  return result.data;
}

/**
 * Validate a whole batch, rejecting the first malformed record or repeated id.
 */
export function parseCandidateRecords(values: readonly unknown[]): CandidateRecord[] {
  const seen = new Set<string>();
  return values.map((value, index) => {
    const record = parseCandidateRecord(value, index);
    assertUniqueId(record, seen, index);
    return record;
  });
}

export function assertUniqueId(record: CandidateRecord, seen: Set<string>, index?: number): void {
  if (seen.has(record.id)) {
    throw new InvalidRecordError(
      `Duplicate record id "${record.id}"`,
      [{ code: z.ZodIssueCode.custom, path: ['id'], message: 'id must be unique within a run' }],
      index,
      record.id,
    );
  }
  seen.add(record.id);
}
