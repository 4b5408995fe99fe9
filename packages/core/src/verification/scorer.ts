/**
 * Confidence scorer. Turns a verification outcome into a routing decision.
 *
 * Two rules hold whatever the thresholds are tuned to: a flagged record is
 * always sent to human review, and a high-severity record is never
 * auto-included.
 */

import { DEFAULT_VERIFICATION_CONFIG, type VerificationConfig } from './config.js';
import type { CandidateRecord, RoutingDecision, ScoredRecord, VerificationOutcome } from './types.js';

export function isHighSeverity(severity: string | undefined): boolean {
  return severity !== undefined && severity.trim().toLowerCase() === 'high';
}

/** Confidence a record needs for auto-include; high severity raises the bar. */
export function autoIncludeThreshold(record: CandidateRecord, config: VerificationConfig): number {
  return isHighSeverity(record.severity)
    ? config.exactThreshold + config.severityPenalty
    : config.exactThreshold;
}

export function route(
  outcome: VerificationOutcome,
  highSeverity: boolean,
  confidence: number,
  threshold: number,
): RoutingDecision {
  switch (outcome.status) {
    case 'flagged':
      return 'human_review';
    case 'likely':
      return 'tag_verify';
    case 'exact':
      return !highSeverity && confidence >= threshold ? 'auto_include' : 'tag_verify';
  }
}

export function score(
  record: CandidateRecord,
  outcome: VerificationOutcome,
  config: VerificationConfig = DEFAULT_VERIFICATION_CONFIG,
): ScoredRecord {
  const confidence = outcome.match?.similarity ?? 0;
  const threshold = autoIncludeThreshold(record, config);
  return {
    record,
    outcome,
    confidence,
    routing: route(outcome, isHighSeverity(record.severity), confidence, threshold),
    autoIncludeThreshold: threshold,
  };
}
