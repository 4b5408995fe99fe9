/**
 * Verifier. Decides whether a record's claimed quote is really in the document.
 */

import { DEFAULT_VERIFICATION_CONFIG, type VerificationConfig } from './config.js';
import { lineAt, pageAt, type Document } from './document.js';
import { findBestMatch } from './matcher.js';
import { normalize } from './normalizer.js';
import type { CandidateRecord, MatchLocation, MatchResult, VerificationOutcome, VerificationStatus } from './types.js';

const PAGE_HINT = /\bpage\s+(\d+)\b/i;

/**
 * Verify one record against the document. Pure: safe to run for many
 * records over the same document in any order.
 */
export function verify(
  record: CandidateRecord,
  document: Document,
  config: VerificationConfig = DEFAULT_VERIFICATION_CONFIG,
): VerificationOutcome {
  const claimed = record.claimedSourceText;
  const match = findBestMatch(document.index, normalize(claimed));

  if (!match) {
    return { status: 'flagged', issues: ['No source text provided'] };
  }

  const issues: string[] = [];
  const trimmed = claimed.trim();
  if (trimmed.length < config.minSourceLength) {
    issues.push(`Source text very short (${trimmed.length} chars)`);
  }

  const status = classify(match.similarity, config);
  const pct = formatPct(match.similarity);

  switch (status) {
    case 'exact':
      if (match.similarity === 1 && match.matchedText !== trimmed) {
        issues.push('Matched after normalization');
      } else if (match.similarity < 1) {
        issues.push(`Near-exact match (similarity: ${pct})`);
      }
      break;
    case 'likely':
      issues.push(`Partial match only (similarity: ${pct})`);
      break;
    case 'flagged':
      issues.push('Possible hallucination: source text not found in document');
      issues.push(`Best similarity found: ${pct}`);
      break;
  }

  const location = locate(document, match, record.claimedLocation);
  const hintIssue = checkPageHint(location);
  if (hintIssue) issues.push(hintIssue);

  return { status, match, location, issues };
}

export function classify(similarity: number, config: VerificationConfig): VerificationStatus {
  if (similarity >= config.exactThreshold) return 'exact';
  if (similarity >= config.acceptThreshold) return 'likely';
  return 'flagged';
}

function locate(document: Document, match: MatchResult, hint?: string): MatchLocation {
  const location: MatchLocation = { line: lineAt(document, match.start) };
  const page = pageAt(document, match.start);
  if (page !== undefined) location.page = page;
  if (hint) location.hint = hint;
  return location;
}

function checkPageHint(location: MatchLocation): string | undefined {
  if (!location.hint || location.page === undefined) return undefined;
  const hinted = PAGE_HINT.exec(location.hint);
  if (!hinted) return undefined;
  const page = Number(hinted[1]);
  if (page === location.page) return undefined;
  return `Location hint "${location.hint}" does not match page ${location.page}`;
}

function formatPct(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}
