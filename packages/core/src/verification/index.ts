// Types
export type {
  CandidateRecord,
  ObligationRecord,
  RiskFlagRecord,
  RecordKind,
  NormalizedText,
  Token,
  MatchResult,
  MatchLocation,
  VerificationStatus,
  VerificationOutcome,
  RoutingDecision,
  ScoredRecord,
  RunSummary,
} from './types.js';

// Records and errors
export {
  CandidateRecordSchema,
  ObligationRecordSchema,
  RiskFlagRecordSchema,
  parseCandidateRecord,
  parseCandidateRecords,
} from './schema.js';
export { InvalidRecordError, InvalidInputError, formatIssues } from './errors.js';

// Config
export {
  DEFAULT_VERIFICATION_CONFIG,
  VerificationConfigSchema,
  resolveVerificationConfig,
  type VerificationConfig,
} from './config.js';

// Document and normalizer
export { createDocument, lineAt, pageAt, type Document, type PageMarker } from './document.js';
export { normalize, tokenize, toOriginalSpan } from './normalizer.js';

// Matcher
export {
  findBestMatch,
  buildMatchIndex,
  textSimilarity,
  lcsRatio,
  tokenWeight,
  DEFAULT_CANDIDATE_LIMIT,
  type MatchIndex,
  type MatcherOptions,
} from './matcher.js';

// Verifier, scorer, aggregator
export { verify, classify } from './verifier.js';
export { score, route, isHighSeverity, autoIncludeThreshold } from './scorer.js';
export { summarize } from './aggregator.js';

// Engine
export {
  VerificationEngine,
  type VerificationContext,
  type VerificationEvents,
  type VerificationRun,
  type RecordFailure,
  type RecordScoredEvent,
  type RecordErrorEvent,
  type RunCompleteEvent,
} from './engine.js';
