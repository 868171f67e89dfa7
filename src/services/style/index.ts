/**
 * Style Services Index
 *
 * Exports the style-guide segmentation and rule extraction services
 */

export {
  extractSections,
  extractExamples,
  identifyChunkRuleType,
} from './section-extractor';

export {
  IntlSentenceTokenizer,
  joinWrappedLines,
  sentenceTokenizer,
  type SentenceTokenizer,
} from './sentence-tokenizer';

export { RuleExtractorService, ruleExtractor } from './rule-extractor.service';

export {
  EXTRACTION_STRATEGIES,
  applyCase,
  type CaseTarget,
  type ExtractionStrategy,
  type RuleCandidate,
} from './rules/extraction-patterns';

export { CATEGORY_KEYWORDS } from './rules/category-keywords';
