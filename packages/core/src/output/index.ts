export {
  ArtifactWriter,
  DEFAULT_FILENAME_TEMPLATE,
  resolveFilename,
  substituteVariables,
  type ArtifactWriterOptions,
  type OutputFormat,
  type WriteOutputResult,
} from './writer.js';

export {
  formatMarkdown,
  type MarkdownFormatOptions,
} from './markdown.js';

export {
  formatUnitJson,
  formatBatchJson,
  unitToJson,
  stageScoreToJson,
  parityReportToJson,
  type UnitJson,
  type BatchJson,
  type StageScoreJson,
  type ParityReportJson,
  type EvidenceJson,
  type ErrorRecordJson,
} from './json.js';
