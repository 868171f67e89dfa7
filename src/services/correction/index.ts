export {
  CorrectionEngineService,
  correctionEngine,
  formatChangeMarker,
  type CorrectionEngineOptions,
  type MatchSource,
  type RetrievalResult,
} from './correction-engine.service';

export {
  DETERMINISTIC_CORRECTIONS,
  POST_FORMAT_CORRECTIONS,
  applyRecords,
  type CorrectionPassResult,
  type CorrectionRecord,
  type Substitution,
} from './deterministic-corrections';

export { createPrecedenceRecord } from './clinical-term-precedence';
