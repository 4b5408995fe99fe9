/**
 * Ground-truth evaluation: precision, recall and F1 of a set of extracted
 * records against a hand-audited reference set.
 *
 * Matching is greedy and one-to-one: each system record, in order, takes the
 * best-scoring reference record of the same kind that is still unmatched.
 */

import { textSimilarity } from '../verification/matcher.js';
import type { CandidateRecord, ObligationRecord, RiskFlagRecord } from '../verification/types.js';

export interface EvaluationMetrics {
  truePositives: number;
  falsePositives: number;
  falseNegatives: number;
  precision: number;
  recall: number;
  f1: number;
}

export type RecordMatchType = 'exact' | 'partial' | 'none';

export interface RecordMatch {
  kind: CandidateRecord['kind'];
  systemId: string;
  truthId?: string;
  matchType: RecordMatchType;
  score: number;
}

export interface EvaluationReport {
  obligations: EvaluationMetrics;
  riskFlags: EvaluationMetrics;
  matches: RecordMatch[];
}

export interface EvaluationOptions {
  /** Minimum weighted score for an obligation match (default 0.6). */
  obligationThreshold?: number;
  /** Minimum weighted score for a risk-flag match (default 0.5). */
  riskThreshold?: number;
}

const OBLIGATION_EXACT = 0.85;
const RISK_EXACT = 0.8;

export function evaluateRecords(
  system: readonly CandidateRecord[],
  truth: readonly CandidateRecord[],
  options: EvaluationOptions = {},
): EvaluationReport {
  const { obligationThreshold = 0.6, riskThreshold = 0.5 } = options;

  const obligations = matchKind(
    system.filter(isObligation),
    truth.filter(isObligation),
    scoreObligation,
    obligationThreshold,
    OBLIGATION_EXACT,
  );
  const riskFlags = matchKind(
    system.filter(isRiskFlag),
    truth.filter(isRiskFlag),
    scoreRiskFlag,
    riskThreshold,
    RISK_EXACT,
  );

  return {
    obligations: obligations.metrics,
    riskFlags: riskFlags.metrics,
    matches: [...obligations.matches, ...riskFlags.matches],
  };
}

export function scoreObligation(a: ObligationRecord, b: ObligationRecord): number {
  const source = textSimilarity(a.claimedSourceText, b.claimedSourceText);
  const description = textSimilarity(a.description ?? '', b.description ?? '');
  const party = sameLabel(a.party, b.party) ? 1 : 0;
  const category = sameLabel(a.category, b.category) ? 1 : 0.5;
  return source * 0.5 + description * 0.25 + party * 0.15 + category * 0.1;
}

export function scoreRiskFlag(a: RiskFlagRecord, b: RiskFlagRecord): number {
  const category = sameLabel(a.category, b.category) ? 1 : 0;
  const source = textSimilarity(a.claimedSourceText, b.claimedSourceText);
  const title = textSimilarity(a.title ?? a.description ?? '', b.title ?? b.description ?? '');
  const severity = sameLabel(a.severity, b.severity) ? 1 : 0.5;
  return category * 0.3 + source * 0.3 + title * 0.25 + severity * 0.15;
}

export function computeMetrics(systemCount: number, truthCount: number, truePositives: number): EvaluationMetrics {
  const precision = systemCount > 0 ? truePositives / systemCount : 0;
  const recall = truthCount > 0 ? truePositives / truthCount : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  return {
    truePositives,
    falsePositives: systemCount - truePositives,
    falseNegatives: truthCount - truePositives,
    precision,
    recall,
    f1,
  };
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function matchKind<T extends CandidateRecord>(
  system: readonly T[],
  truth: readonly T[],
  scorer: (a: T, b: T) => number,
  threshold: number,
  exactAt: number,
): { metrics: EvaluationMetrics; matches: RecordMatch[] } {
  const matched = new Set<number>();
  const matches: RecordMatch[] = [];

  for (const candidate of system) {
    let bestIndex = -1;
    let bestScore = 0;
    truth.forEach((reference, i) => {
      if (matched.has(i)) return;
      const s = scorer(candidate, reference);
      if (s > bestScore) {
        bestScore = s;
        bestIndex = i;
      }
    });

    if (bestIndex !== -1 && bestScore >= threshold) {
      matched.add(bestIndex);
      matches.push({
        kind: candidate.kind,
        systemId: candidate.id,
        truthId: truth[bestIndex].id,
        matchType: bestScore >= exactAt ? 'exact' : 'partial',
        score: bestScore,
      });
    } else {
      matches.push({ kind: candidate.kind, systemId: candidate.id, matchType: 'none', score: bestScore });
    }
  }

  return {
    metrics: computeMetrics(system.length, truth.length, matched.size),
    matches,
  };
}

function sameLabel(a: string | undefined, b: string | undefined): boolean {
  return (a ?? '').trim().toLowerCase() === (b ?? '').trim().toLowerCase();
}

function isObligation(record: CandidateRecord): record is ObligationRecord {
  return record.kind === 'obligation';
}

function isRiskFlag(record: CandidateRecord): record is RiskFlagRecord {
  return record.kind === 'risk_flag';
}
