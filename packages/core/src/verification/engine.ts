import { EventEmitter } from 'eventemitter3';
import { summarize } from './aggregator.js';
import { resolveVerificationConfig, type VerificationConfig } from './config.js';
import { createDocument, type Document } from './document.js';
import { InvalidRecordError } from './errors.js';
import { assertUniqueId, parseCandidateRecord } from './schema.js';
import { score } from './scorer.js';
import { verify } from './verifier.js';
import type { RunSummary, ScoredRecord } from './types.js';

// ---------------------------------------------------------------------------
// Engine event types
// ---------------------------------------------------------------------------

export interface RecordScoredEvent {
  scored: ScoredRecord;
  /** Position of the record in the input batch. */
  index: number;
  total: number;
}

export interface RecordErrorEvent {
  index: number;
  recordId?: string;
  error: InvalidRecordError;
}

export interface RunCompleteEvent {
  summary: RunSummary;
  failures: RecordFailure[];
  durationMs: number;
}

export interface VerificationEvents {
  'record:scored': (event: RecordScoredEvent) => void;
  'record:error': (event: RecordErrorEvent) => void;
  'run:complete': (event: RunCompleteEvent) => void;
}

// ---------------------------------------------------------------------------
// Run context and result
// ---------------------------------------------------------------------------

export interface VerificationContext {
  /** The contract text, or a document built from it earlier. */
  document: string | Document;
  config?: Partial<VerificationConfig>;
}

export interface RecordFailure {
  index: number;
  recordId?: string;
  message: string;
}

export interface VerificationRun {
  /** Scored records in input order; records that failed validation are left out. */
  records: ScoredRecord[];
  failures: RecordFailure[];
  summary: RunSummary;
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Verification engine
// ---------------------------------------------------------------------------

/**
 * Runs the verify → score → summarize chain over a batch of candidate
 * records. Each record is validated on its own; a malformed record is
 * reported and skipped without stopping the batch.
 */
export class VerificationEngine extends EventEmitter<VerificationEvents> {
  readonly document: Document;
  readonly config: VerificationConfig;

  constructor(context: VerificationContext) {
    super();
    const { document } = context;
    this.document = typeof document === 'object' && document !== null ? document : createDocument(document);
    this.config = resolveVerificationConfig(context.config);
  }

  run(records: readonly unknown[]): VerificationRun {
    const startTime = Date.now();
    const scoredRecords: ScoredRecord[] = [];
    const failures: RecordFailure[] = [];
    const seen = new Set<string>();

    records.forEach((raw, index) => {
      try {
        const record = parseCandidateRecord(raw, index);
        assertUniqueId(record, seen, index);
        const scored = score(record, verify(record, this.document, this.config), this.config);
        scoredRecords.push(scored);
        this.emit('record:scored', { scored, index, total: records.length });
      } catch (error) {
        if (!(error instanceof InvalidRecordError)) throw error;
        failures.push({ index, recordId: error.recordId, message: error.message });
        this.emit('record:error', { index, recordId: error.recordId, error });
      }
    });

    const summary = summarize(scoredRecords);
    const durationMs = Date.now() - startTime;
    this.emit('run:complete', { summary, failures, durationMs });

    return { records: scoredRecords, failures, summary, durationMs };
  }
}
