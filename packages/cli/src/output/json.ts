/**
 * Machine-readable JSON verification report.
 */

import type { MatchLocation, RecordFailure, RunSummary, VerificationRun } from '@clausecheck/core';
import { formatDate } from './markdown.js';

export interface JsonFormatOptions {
  run: VerificationRun;
  documentName: string;
  date?: Date;
}

export interface JsonRecordOutput {
  id: string;
  kind: string;
  status: string;
  routing: string;
  confidence: number;
  autoIncludeThreshold: number;
  location?: MatchLocation;
  matchedText?: string;
  issues: string[];
}

export interface JsonOutput {
  metadata: {
    document: string;
    date: string;
    durationMs: number;
  };
  summary: RunSummary;
  records: JsonRecordOutput[];
  failures: RecordFailure[];
}

export function buildJsonOutput(options: JsonFormatOptions): JsonOutput {
  const { run, documentName } = options;

  const records = run.records.map((scored): JsonRecordOutput => {
    const output: JsonRecordOutput = {
      id: scored.record.id,
      kind: scored.record.kind,
      status: scored.outcome.status,
      routing: scored.routing,
      confidence: round4(scored.confidence),
      autoIncludeThreshold: round4(scored.autoIncludeThreshold),
      issues: scored.outcome.issues,
    };
    if (scored.outcome.location) output.location = scored.outcome.location;
    if (scored.outcome.match) output.matchedText = scored.outcome.match.matchedText;
    return output;
  });

  return {
    metadata: {
      document: documentName,
      date: formatDate(options.date ?? new Date()),
      durationMs: run.durationMs,
    },
    summary: run.summary,
    records,
    failures: run.failures,
  };
}

export function formatJson(options: JsonFormatOptions): string {
  return JSON.stringify(buildJsonOutput(options), null, 2);
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}
