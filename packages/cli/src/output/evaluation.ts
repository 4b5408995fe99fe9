/**
 * Markdown report of a ground-truth evaluation.
 */

import type { EvaluationMetrics, EvaluationReport, RecordMatch } from '@clausecheck/core';
import { formatDate, formatPercent } from './markdown.js';

export interface EvaluationFormatOptions {
  report: EvaluationReport;
  /** Display names of the two inputs. */
  systemName: string;
  truthName: string;
  date?: Date;
}

export function formatEvaluation(options: EvaluationFormatOptions): string {
  const { report, systemName, truthName } = options;

  const lines: string[] = [];
  lines.push(`# Evaluation: ${systemName}`);
  lines.push('');
  lines.push(`- Ground truth: ${truthName}`);
  lines.push(`- Date: ${formatDate(options.date ?? new Date())}`);
  lines.push('');

  lines.push('## Metrics');
  lines.push('');
  lines.push('| Kind | TP | FP | FN | Precision | Recall | F1 |');
  lines.push('|------|----|----|----|-----------|--------|----|');
  lines.push(metricsRow('Obligations', report.obligations));
  lines.push(metricsRow('Risk flags', report.riskFlags));
  lines.push('');

  const unmatched = report.matches.filter(m => m.matchType === 'none');
  lines.push('## Unmatched System Records');
  lines.push('');
  if (unmatched.length === 0) {
    lines.push('_Every system record matched a ground-truth record._');
  } else {
    for (const match of unmatched) lines.push(`- ${match.systemId} (${match.kind.replace('_', ' ')})`);
  }
  lines.push('');

  const partial = report.matches.filter(m => m.matchType === 'partial');
  if (partial.length > 0) {
    lines.push('## Partial Matches');
    lines.push('');
    for (const match of partial) lines.push(formatPartial(match));
    lines.push('');
  }

  return lines.join('\n');
}

function metricsRow(label: string, metrics: EvaluationMetrics): string {
  return `| ${label} | ${metrics.truePositives} | ${metrics.falsePositives} | ${metrics.falseNegatives} | ` +
    `${formatPercent(metrics.precision)} | ${formatPercent(metrics.recall)} | ${formatPercent(metrics.f1)} |`;
}

function formatPartial(match: RecordMatch): string {
  return `- ${match.systemId} → ${match.truthId ?? '-'} (score ${match.score.toFixed(2)})`;
}
