import type { RunSummary, ScoredRecord } from './types.js';

/** Similarity under which a flagged record is counted as a likely hallucination. */
const HALLUCINATION_CEILING = 0.5;

/**
 * Reduce scored records to run statistics. Counts and sums only, so the
 * result does not depend on record order.
 */
export function summarize(scored: readonly ScoredRecord[]): RunSummary {
  const summary: RunSummary = {
    total: scored.length,
    byKind: { obligation: 0, risk_flag: 0 },
    byStatus: { exact: 0, likely: 0, flagged: 0 },
    byRouting: { auto_include: 0, tag_verify: 0, human_review: 0 },
    exactMatchPct: 0,
    verifiedPct: 0,
    meanSimilarity: 0,
    possibleHallucinations: 0,
    humanReview: [],
  };

  for (const item of scored) {
    summary.byKind[item.record.kind]++;
    summary.byStatus[item.outcome.status]++;
    summary.byRouting[item.routing]++;
    if (item.outcome.status === 'flagged' && item.confidence < HALLUCINATION_CEILING) {
      summary.possibleHallucinations++;
    }
    if (item.routing === 'human_review') {
      summary.humanReview.push(item.record.id);
    }
  }

  summary.humanReview.sort();

  if (scored.length > 0) {
    const total = scored.length;
    summary.exactMatchPct = roundTo((summary.byStatus.exact / total) * 100, 1);
    summary.verifiedPct = roundTo(((summary.byStatus.exact + summary.byStatus.likely) / total) * 100, 1);
    // Summed in sorted order so floating-point rounding is the same for any input order
    const confidences = scored.map(s => s.confidence).sort((a, b) => a - b);
    summary.meanSimilarity = roundTo(confidences.reduce((sum, c) => sum + c, 0) / total, 2);
  }

  return summary;
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
