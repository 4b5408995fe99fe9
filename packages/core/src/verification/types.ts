/**
 * Verification core types.
 *
 * The verification module checks that the source quotes attached to
 * extracted obligations and risk flags really occur in the contract text,
 * scores each record's confidence, and routes it to auto-include,
 * tag-for-verification or human review.
 */

import type { CandidateRecord } from './schema.js';

export type { CandidateRecord, ObligationRecord, RiskFlagRecord, RecordKind } from './schema.js';

// ---------------------------------------------------------------------------
// Normalized text
// ---------------------------------------------------------------------------

/** Comparison form of a text, with a map back to the original offsets. */
export interface NormalizedText {
  /** The normalized string. */
  readonly text: string;
  /** Original offset of the character that produced each normalized code unit. */
  readonly starts: readonly number[];
  /** Original offset just past that character. */
  readonly ends: readonly number[];
}

/** A word-like token of a normalized text. Offsets index the normalized string. */
export interface Token {
  readonly value: string;
  readonly start: number;
  readonly end: number;
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/** Best-aligned span of the document for one claimed quote. */
export interface MatchResult {
  /** Start offset in the original document text. */
  start: number;
  /** End offset (exclusive) in the original document text. */
  end: number;
  /** Similarity ratio in [0, 1]. */
  similarity: number;
  /** The original document text covered by the span. */
  matchedText: string;
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

export type VerificationStatus = 'exact' | 'likely' | 'flagged';

export interface MatchLocation {
  /** 1-based line of the match start. */
  line: number;
  /** Page number, when the document carries `[Page N]` markers. */
  page?: number;
  /** The record's own location hint, passed through untouched. */
  hint?: string;
}

export interface VerificationOutcome {
  status: VerificationStatus;
  /** Absent only when the claimed source text is empty. */
  match?: MatchResult;
  location?: MatchLocation;
  /** Notes for the reviewer (short quotes, normalization, hallucination warnings). */
  issues: string[];
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

export type RoutingDecision = 'auto_include' | 'tag_verify' | 'human_review';

export interface ScoredRecord {
  record: CandidateRecord;
  outcome: VerificationOutcome;
  /** Confidence in [0, 1]; the match similarity, or 0 without a match. */
  confidence: number;
  routing: RoutingDecision;
  /** The confidence a record of this severity needs to be auto-included. */
  autoIncludeThreshold: number;
}

// ---------------------------------------------------------------------------
// Run summary
// ---------------------------------------------------------------------------

export interface RunSummary {
  total: number;
  byKind: Record<'obligation' | 'risk_flag', number>;
  byStatus: Record<VerificationStatus, number>;
  byRouting: Record<RoutingDecision, number>;
  /** Share of records verified as exact, as a percentage (one decimal). */
  exactMatchPct: number;
  /** Share of records verified as exact or likely, as a percentage (one decimal). */
  verifiedPct: number;
  /** Mean confidence over all records (two decimals). */
  meanSimilarity: number;
  /** Flagged records whose best similarity is under 0.5. */
  possibleHallucinations: number;
  /** Ids of records routed to human review, sorted. */
  humanReview: string[];
}
