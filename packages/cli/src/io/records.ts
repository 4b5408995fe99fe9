/**
 * Record files on disk.
 *
 * Two layouts are accepted:
 * - a JSON array of candidate records in the core's shape;
 * - a ground-truth file, an object with `obligations` and `risk_flags`
 *   arrays in snake_case (`source_text`, `source_location`, `type`, ...).
 *
 * Entries are mapped to plain objects and left for the core to validate, so
 * one malformed entry is reported without losing the rest of the file.
 */

import { z } from 'zod';
import { InputFileError, readJsonFile } from './files.js';

const groundTruthEntrySchema = z.object({
  id: z.string().optional(),
  party: z.string().optional(),
  type: z.string().optional(),
  category: z.string().optional(),
  severity: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  source_text: z.string().nullable().optional(),
  source_location: z.string().optional(),
}).passthrough();

export const GroundTruthSchema = z.object({
  obligations: z.array(groundTruthEntrySchema).optional(),
  risk_flags: z.array(groundTruthEntrySchema).optional(),
}).passthrough();

export type GroundTruthEntry = z.infer<typeof groundTruthEntrySchema>;
export type GroundTruth = z.infer<typeof GroundTruthSchema>;

function sequenceId(prefix: string, index: number): string {
  return `${prefix}-${String(index + 1).padStart(3, '0')}`;
}

/** Map a ground-truth file onto raw candidate records, obligations first. */
export function groundTruthToRecords(truth: GroundTruth): Record<string, unknown>[] {
  const obligations = (truth.obligations ?? []).map((entry, i) => ({
    kind: 'obligation',
    id: entry.id ?? sequenceId('OBL', i),
    party: entry.party,
    category: entry.type ?? entry.category,
    severity: entry.severity,
    description: entry.description,
    claimedSourceText: entry.source_text ?? null,
    claimedLocation: entry.source_location,
  }));

  const riskFlags = (truth.risk_flags ?? []).map((entry, i) => ({
    kind: 'risk_flag',
    id: entry.id ?? sequenceId('FLAG', i),
    category: entry.category,
    severity: entry.severity,
    title: entry.title,
    description: entry.description,
    party: entry.party,
    claimedSourceText: entry.source_text ?? null,
    claimedLocation: entry.source_location,
  }));

  return [...obligations, ...riskFlags].map(dropUndefined);
}

export function parseGroundTruth(value: unknown, path: string): GroundTruth {
  const result = GroundTruthSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new InputFileError(`Invalid ground-truth file ${path}: ${issues}`, path);
  }
  return result.data;
}

/** Read a records file in either layout as raw candidate records. */
export function readRecordsFile(path: string): unknown[] {
  const value = readJsonFile(path);
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === 'object' && value !== null && ('obligations' in value || 'risk_flags' in value)) {
    return groundTruthToRecords(parseGroundTruth(value, path));
  }
  throw new InputFileError(
    `Records file ${path} must hold a JSON array of records or an object with "obligations" / "risk_flags" arrays`,
    path,
  );
}

function dropUndefined(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}
