export {
  StyleCorrectionPipeline,
  createDefaultEmbedder,
  RULE_SET_VERSION,
  type CorrectionOptions,
  type ImportResult,
  type IngestionOptions,
  type IngestionSummary,
  type PipelineDependencies,
  type PipelineSource,
  type RuleSetExport,
  type TextSource,
} from './style-correction-pipeline.service';

export { StyleGuideSession, type PublishedStyleGuide } from './style-guide-session';
