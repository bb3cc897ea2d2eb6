export {
  MIN_QUOTES_DEFAULT,
  isScoredStage,
  type StageLevel,
  type ScoredStage,
  type Rubric,
  type RubricTheme,
  type RubricStage,
  type RubricSignal,
  type EvidenceQuote,
  type StageScore,
  type StageAudit,
} from './types.js';
export { RubricSchema, RubricThemeSchema, RubricStageSchema, type RawRubric, type RawRubricTheme } from './schema.js';
export {
  loadRubric,
  parseRubric,
  findTheme,
  keywordRegex,
  defaultRubricPath,
  getBuiltInRubricsDir,
  DEFAULT_RUBRIC_FILE,
} from './loader.js';
export { extractEvidence, normalizeQuote, type EvidenceExtractionOptions } from './evidence.js';
export {
  DEFAULT_FRESHNESS_POLICY,
  ageInMonths,
  freshnessPenalty,
  type FreshnessPolicy,
  type FreshnessThreshold,
} from './freshness.js';
export { RubricScorer, type RubricScorerOptions } from './scorer.js';
