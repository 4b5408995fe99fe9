export {
  findPotentialMisses,
  findKeywordSentences,
  OBLIGATION_KEYWORDS,
  type PotentialMiss,
  type CoverageOptions,
  type KeywordSentence,
} from './coverage.js';

export {
  evaluateRecords,
  scoreObligation,
  scoreRiskFlag,
  computeMetrics,
  type EvaluationMetrics,
  type EvaluationReport,
  type EvaluationOptions,
  type RecordMatch,
  type RecordMatchType,
} from './evaluation.js';
