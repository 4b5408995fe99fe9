/**
 * Markdown verification report.
 *
 * Produces a reviewer-facing document with:
 * - YAML frontmatter (document, date, record count, exact-match rate)
 * - A summary table and the human-review queue
 * - Per-record details with status badges: ✓ exact, ⚠ likely, ✗ flagged
 * - Records that failed validation
 */

import type { RecordFailure, ScoredRecord, VerificationRun, VerificationStatus } from '@clausecheck/core';

export interface MarkdownFormatOptions {
  run: VerificationRun;
  /** Display name of the verified document. */
  documentName: string;
  date?: Date;
}

export function formatMarkdown(options: MarkdownFormatOptions): string {
  const { run, documentName } = options;
  const date = formatDate(options.date ?? new Date());
  const { summary } = run;

  const lines: string[] = [];
  lines.push('---');
  lines.push(`document: ${documentName}`);
  lines.push(`date: ${date}`);
  lines.push(`records: ${summary.total}`);
  lines.push(`exact_match_pct: ${summary.exactMatchPct}`);
  lines.push('---');
  lines.push('');
  lines.push(`# Source-Text Verification: ${documentName}`);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Records verified | ${summary.total} |`);
  lines.push(`| Obligations / risk flags | ${summary.byKind.obligation} / ${summary.byKind.risk_flag} |`);
  lines.push(`| Exact matches | ${summary.byStatus.exact} (${summary.exactMatchPct}%) |`);
  lines.push(`| Verified (exact or likely) | ${summary.verifiedPct}% |`);
  lines.push(`| Flagged | ${summary.byStatus.flagged} |`);
  lines.push(`| Possible hallucinations | ${summary.possibleHallucinations} |`);
  lines.push(`| Mean similarity | ${summary.meanSimilarity.toFixed(2)} |`);
  lines.push(`| Auto-include / tag & verify / human review | ${summary.byRouting.auto_include} / ${summary.byRouting.tag_verify} / ${summary.byRouting.human_review} |`);
  lines.push('');

  lines.push('## Human Review');
  lines.push('');
  if (summary.humanReview.length === 0) {
    lines.push('_No records need human review._');
  } else {
    for (const id of summary.humanReview) lines.push(`- ${id}`);
  }
  lines.push('');

  if (run.records.length > 0) {
    lines.push('## Records');
    lines.push('');
    for (const scored of run.records) {
      lines.push(...formatRecord(scored));
      lines.push('');
    }
  }

  if (run.failures.length > 0) {
    lines.push('## Invalid Records');
    lines.push('');
    for (const failure of run.failures) lines.push(formatFailure(failure));
    lines.push('');
  }

  return lines.join('\n');
}

export function getStatusBadge(status: VerificationStatus): string {
  switch (status) {
    case 'exact': return '✓';
    case 'likely': return '⚠';
    case 'flagged': return '✗';
  }
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

function formatRecord(scored: ScoredRecord): string[] {
  const { record, outcome } = scored;
  const lines: string[] = [];
  lines.push(`### ${getStatusBadge(outcome.status)} ${record.id} (${record.kind.replace('_', ' ')})`);
  lines.push('');
  lines.push(`- Status: ${outcome.status}`);
  lines.push(`- Routing: ${scored.routing}`);
  lines.push(`- Confidence: ${formatPercent(scored.confidence)} (auto-include at ${formatPercent(scored.autoIncludeThreshold)})`);
  if (outcome.location) {
    const page = outcome.location.page !== undefined ? `, page ${outcome.location.page}` : '';
    lines.push(`- Location: line ${outcome.location.line}${page}`);
  }
  lines.push(`- Claimed: ${quote(record.claimedSourceText)}`);
  if (outcome.match) {
    lines.push(`- Best match: ${quote(outcome.match.matchedText)}`);
  }
  if (outcome.issues.length > 0) {
    lines.push('- Issues:');
    for (const issue of outcome.issues) lines.push(`  - ${issue}`);
  }
  return lines;
}

function formatFailure(failure: RecordFailure): string {
  const label = failure.recordId ? `${failure.recordId} (index ${failure.index})` : `index ${failure.index}`;
  return `- ${label}: ${failure.message}`;
}

function quote(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > 0 ? `"${flat}"` : '_(empty)_';
}
