export {
  ScoringEngine,
  unitKey,
  type ScoringEngineOptions,
  type EngineEvents,
  type UnitStartEvent,
  type UnitStageEvent,
  type ThemeScoredEvent,
  type ParityViolationEvent,
  type UnitCompleteEvent,
} from './engine.js';
export {
  BatchRunner,
  compareUnits,
  toErrorRecord,
  type BatchRunnerOptions,
  type BatchEvents,
  type BatchStartEvent,
  type UnitDoneEvent,
} from './batch.js';
export { Semaphore } from './semaphore.js';
export type {
  UnitRequest,
  UnitResult,
  UnitErrorRecord,
  UnitStage,
  ThemeResult,
  ResolvedSource,
  BatchOutcome,
} from './types.js';
