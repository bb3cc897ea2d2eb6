export {
  check,
  assertParity,
  summarize,
  type ParityReport,
  type ParitySummary,
  type ParityVerdict,
} from './validator.js';
