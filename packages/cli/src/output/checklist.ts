/**
 * Audit checklist: the markdown file an auditor works through when reviewing
 * a ground-truth annotation against its contract.
 */

import { isHighSeverity, type PotentialMiss, type ScoredRecord, type VerificationStatus } from '@clausecheck/core';
import { formatDate } from './markdown.js';

export interface ChecklistFormatOptions {
  documentName: string;
  records: readonly ScoredRecord[];
  misses: readonly PotentialMiss[];
  /** Rows in the "Missed by AI" table (default 10). */
  maxMisses?: number;
  date?: Date;
}

/** Keywords whose sentences are listed as possible misses, in priority order. */
const PRIORITY_KEYWORDS = ['SHALL', 'MUST', 'AGREES', 'WARRANTS', 'COVENANTS'];

const EMPTY_ROW_3 = '| - | - | - |';

export function formatAuditChecklist(options: ChecklistFormatOptions): string {
  const { documentName, records, misses } = options;
  const maxMisses = options.maxMisses ?? 10;
  const obligations = records.filter(r => r.record.kind === 'obligation');
  const riskFlags = records.filter(r => r.record.kind === 'risk_flag');

  const lines: string[] = [];
  lines.push(`# Audit: ${documentName}`);
  lines.push('');
  lines.push('**Audited:** Not yet');
  lines.push('**Audit Date:** -');
  lines.push('**Time Spent:** -');
  lines.push('**Auditor:** -');
  lines.push('');
  lines.push('---');
  lines.push('');

  lines.push('## Verified');
  lines.push('');
  lines.push('_Mark each obligation/risk as you verify it against the source contract_');
  lines.push('');
  lines.push('### Obligations');
  for (const scored of obligations) {
    lines.push(`- ${checkbox(scored.outcome.status)} ${scored.record.id}: ${scored.record.description ?? ''}`);
  }
  lines.push('');
  lines.push('### Risk Flags');
  for (const scored of riskFlags) {
    const { record } = scored;
    const label = record.kind === 'risk_flag' ? record.title ?? record.description ?? '' : '';
    const severity = isHighSeverity(record.severity) ? ' (HIGH)' : '';
    lines.push(`- ${checkbox(scored.outcome.status)} ${record.id}: ${label}${severity}`);
  }
  lines.push('');
  lines.push('---');
  lines.push('');

  lines.push('## Issues Found');
  lines.push('');
  lines.push('_Document any problems with the ground truth annotations_');
  lines.push('');
  lines.push('| ID | Issue | Resolution |');
  lines.push('|----|-------|------------|');
  lines.push(EMPTY_ROW_3);
  lines.push('');
  lines.push('---');
  lines.push('');

  lines.push('## Missed by AI');
  lines.push('');
  lines.push('_Obligations or risks present in contract but not captured by system_');
  lines.push('');
  lines.push('| Section | Description | Suggested Obligation/Risk |');
  lines.push('|---------|-------------|---------------------------|');
  const missRows = prioritizedMisses(misses, maxMisses).map(miss =>
    `| Line ${miss.line} | ${truncate(miss.sentence, 60)} | Review: contains '${miss.keyword.toLowerCase()}' |`,
  );
  lines.push(...(missRows.length > 0 ? missRows : [EMPTY_ROW_3]));
  lines.push('');
  lines.push('---');
  lines.push('');

  lines.push('## Hallucinated (Remove)');
  lines.push('');
  lines.push("_Items AI extracted that don't exist or are incorrect_");
  lines.push('');
  lines.push('| System ID | Issue | Action |');
  lines.push('|-----------|-------|--------|');
  const flagged = records.filter(r => r.outcome.status === 'flagged');
  if (flagged.length === 0) {
    lines.push(EMPTY_ROW_3);
  } else {
    for (const scored of flagged) {
      const pct = `${(scored.confidence * 100).toFixed(0)}%`;
      lines.push(`| ${scored.record.id} | Only ${pct} match - verify source text | Review |`);
    }
  }
  lines.push('');
  lines.push('---');
  lines.push('');

  lines.push('## Risk Flag Adjustments');
  lines.push('');
  lines.push('_Changes to severity or category_');
  lines.push('');
  lines.push('| Risk ID | Current | Recommended | Reason |');
  lines.push('|---------|---------|-------------|--------|');
  lines.push('| - | - | - | - |');
  lines.push('');
  lines.push('---');
  lines.push('');

  lines.push('## Notes');
  lines.push('');
  lines.push('_Additional observations for lessons learned_');
  lines.push('');
  lines.push(`- Auto-generated on ${formatDate(options.date ?? new Date())}`);
  lines.push(`- ${obligations.length} obligations verified: ${statusCounts(obligations)}`);
  lines.push(`- ${riskFlags.length} risk flags verified: ${statusCounts(riskFlags)}`);
  lines.push(`- ${misses.length} potential missed clauses found for review`);
  lines.push('');

  return lines.join('\n');
}

export function checkbox(status: VerificationStatus): string {
  switch (status) {
    case 'exact': return '[X]';
    case 'likely': return '[LIKELY]';
    case 'flagged': return '[FLAG]';
  }
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

function prioritizedMisses(misses: readonly PotentialMiss[], limit: number): PotentialMiss[] {
  const selected: PotentialMiss[] = [];
  for (const keyword of PRIORITY_KEYWORDS) {
    for (const miss of misses) {
      if (selected.length >= limit) return selected;
      if (miss.keyword === keyword) selected.push(miss);
    }
  }
  return selected;
}

function statusCounts(records: readonly ScoredRecord[]): string {
  const count = (status: VerificationStatus) => records.filter(r => r.outcome.status === status).length;
  return `${count('exact')} exact, ${count('likely')} likely, ${count('flagged')} flagged`;
}
