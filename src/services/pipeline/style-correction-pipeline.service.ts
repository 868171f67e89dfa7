/**
 * Style Correction Pipeline
 *
 * Orchestrates the two stages of a session:
 * - Style-guide ingestion into a fresh embedding index (rules, chunks or both)
 * - Document correction, paragraph by paragraph, against the published index
 */

import { v4 as uuidv4 } from 'uuid';
import { config, type IngestionMode } from '../../config';
import { logger } from '../../lib/logger';
import { importedRuleSchema, ruleSetDocumentSchema } from '../../schemas/style.schemas';
import type {
  CorrectedParagraph,
  DocumentCorrectionResult,
  StyleChunk,
  StyleRule,
} from '../../types/style-guide.types';
import { AppError, StyleGuideMissingError } from '../../utils/app-error';
import { mapWithConcurrency } from '../../utils/concurrency';
import { compileRulePattern } from '../../utils/regex-safety';
import { segmentIntoChunks, splitIntoParagraphs } from '../../utils/text-chunker';
import { CorrectionEngineService } from '../correction/correction-engine.service';
import { documentExtractor, sourceName, type DocumentSource } from '../document/document-extractor.service';
import { HashingEmbedder, type Embedder } from '../embedding/embedder';
import { StyleEmbeddingIndex } from '../embedding/embedding-index.service';
import { geminiEmbedder } from '../embedding/gemini-embedder.service';
import type { VectorStore } from '../embedding/vector-store';
import type { ProgressPhase, ProgressSink, ProgressStage } from '../progress/progress-channel';
import { extractExamples, extractSections, identifyChunkRuleType } from '../style/section-extractor';
import { RuleExtractorService } from '../style/rule-extractor.service';
import { StyleGuideSession } from './style-guide-session';

export type TextSource = { text: string; name?: string };

export type PipelineSource = TextSource | DocumentSource;

export interface PipelineDependencies {
  embedder?: Embedder;
  /** Fresh store per index; defaults to a FlatL2VectorStore */
  createStore?: (dimension: number) => VectorStore;
  engine?: CorrectionEngineService;
  ruleExtractor?: RuleExtractorService;
  session?: StyleGuideSession;
}

export interface IngestionOptions {
  mode?: IngestionMode;
  onProgress?: ProgressSink;
}

export interface IngestionSummary {
  sourceName: string;
  mode: IngestionMode;
  sections: number;
  rules: number;
  chunks: number;
  indexSize: number;
}

export interface CorrectionOptions {
  onProgress?: ProgressSink;
  concurrency?: number;
}

export interface RuleSetExport {
  version: string;
  exportedAt: string;
  rules: StyleRule[];
}

export interface ImportResult {
  imported: number;
  skipped: number;
  errors: string[];
}

export const RULE_SET_VERSION = '1.0';

export function createDefaultEmbedder(): Embedder {
  return config.embedding.provider === 'gemini'
    ? geminiEmbedder
    : new HashingEmbedder({ dimension: config.embedding.dimension });
}

type ProgressEmitter = (phase: ProgressPhase, current: number, total: number, message: string) => void;

const isTextSource = (source: PipelineSource): source is TextSource => 'text' in source;

export class StyleCorrectionPipeline {
  readonly session: StyleGuideSession;
  private readonly embedder: Embedder;
  private readonly createStore?: (dimension: number) => VectorStore;
  private readonly engine: CorrectionEngineService;
  private readonly ruleExtractor: RuleExtractorService;

  constructor(deps: PipelineDependencies = {}) {
    this.embedder = deps.embedder ?? createDefaultEmbedder();
    this.createStore = deps.createStore;
    this.engine = deps.engine ?? new CorrectionEngineService();
    this.ruleExtractor = deps.ruleExtractor ?? new RuleExtractorService();
    this.session = deps.session ?? new StyleGuideSession();
  }

  /**
   * Build a new index from a style guide and publish it to the session.
   * The previous guide stays active until the new index is complete.
   */
  async ingestStyleGuide(source: PipelineSource, options: IngestionOptions = {}): Promise<IngestionSummary> {
    const mode = options.mode ?? config.ingestion.mode;
    const emit = this.emitter('style-guide', options.onProgress);

    const { text, name } = await this.readSource(source, 'style-guide', options.onProgress);
    const sections = extractSections(text);
    const chunks: StyleChunk[] = [];
    let rules: StyleRule[] = [];

    emit('processing', 0, sections.length, `Processing ${sections.length} sections`);

    sections.forEach((section, sectionIndex) => {
      if (mode !== 'rules') {
        chunks.push(...this.buildChunks(section.body, section.title, name, sectionIndex));
      }
      if (mode !== 'chunks') {
        // Numbered guide entries are detected as headings, so titles are read too
        const ruleText = section.title ? `${section.title}\n${section.body}` : section.body;
        rules.push(...this.ruleExtractor.extractRules(ruleText));
      }
      emit('processing', sectionIndex + 1, sections.length, `Processed section "${section.title || 'untitled'}"`);
    });

    rules = this.ruleExtractor.deduplicateRules(rules);

    const total = rules.length + chunks.length;
    emit('indexing', 0, total, `Indexing ${rules.length} rules and ${chunks.length} chunks`);

    const index = this.createIndex();
    await index.addRules(rules);
    emit('indexing', rules.length, total, `Indexed ${rules.length} rules`);
    await index.addChunks(chunks);
    emit('indexing', total, total, `Indexed ${chunks.length} chunks`);

    this.session.publish(index, name);
    logger.info(
      `[Style Pipeline] Ingested "${name}" (${mode}): ${sections.length} sections, ${rules.length} rules, ${chunks.length} chunks`
    );

    return {
      sourceName: name,
      mode,
      sections: sections.length,
      rules: rules.length,
      chunks: chunks.length,
      indexSize: index.size,
    };
  }

  /**
   * Publish an index built from already-extracted rules.
   */
  async loadRules(rules: readonly StyleRule[], name = 'rule set'): Promise<number> {
    const index = this.createIndex();
    await index.addRules(rules);
    this.session.publish(index, name);
    logger.info(`[Style Pipeline] Loaded ${rules.length} rules from ${name}`);
    return rules.length;
  }

  /**
   * Import an exported rule set. Invalid rules, and PATTERN rules whose regex
   * is invalid or unsafe, are skipped and reported.
   */
  async importRuleSet(input: unknown, name = 'imported rule set'): Promise<ImportResult> {
    const document = ruleSetDocumentSchema.safeParse(typeof input === 'string' ? this.parseJson(input) : input);
    if (!document.success) {
      throw AppError.badRequest(
        `Invalid rule set: ${document.error.issues.map((issue) => issue.message).join('; ')}`,
        'INVALID_RULE_SET'
      );
    }

    const result: ImportResult = { imported: 0, skipped: 0, errors: [] };
    const rules: StyleRule[] = [];

    document.data.rules.forEach((raw, i) => {
      const parsed = importedRuleSchema.safeParse(raw);
      if (!parsed.success) {
        result.skipped++;
        result.errors.push(`Rule ${i + 1}: ${parsed.error.issues.map((issue) => issue.message).join('; ')} - skipped`);
        return;
      }

      const rule = parsed.data;
      if (rule.type === 'PATTERN') {
        const compiled = compileRulePattern(rule.pattern);
        if (!compiled.ok) {
          result.skipped++;
          result.errors.push(`Rule ${i + 1}: "${rule.pattern}" has ${compiled.reason} regex pattern - skipped`);
          return;
        }
      }

      rules.push({ ...rule, id: rule.id ?? uuidv4() });
    });

    result.imported = await this.loadRules(rules, name);
    logger.info(`[Style Pipeline] Imported ${result.imported} rules, skipped ${result.skipped}`);
    return result;
  }

  exportRuleSet(): RuleSetExport {
    const index = this.requireIndex();
    return {
      version: RULE_SET_VERSION,
      exportedAt: new Date().toISOString(),
      rules: index.getRules(),
    };
  }

  /**
   * Correct a document against the published style guide.
   */
  async correctDocument(source: PipelineSource, options: CorrectionOptions = {}): Promise<DocumentCorrectionResult> {
    const index = this.requireIndex();
    const emit = this.emitter('document', options.onProgress);
    const concurrency = options.concurrency ?? config.correction.concurrency;

    const { text, name } = await this.readSource(source, 'document', options.onProgress);
    const paragraphTexts = splitIntoParagraphs(text);
    const paragraphs: CorrectedParagraph[] = [];

    emit('correcting', 0, paragraphTexts.length, `Correcting ${paragraphTexts.length} paragraphs`);

    for (const [i, paragraphText] of paragraphTexts.entries()) {
      const chunks = segmentIntoChunks(paragraphText, config.segmentation.maxChunkSize);
      const results = await mapWithConcurrency(chunks, concurrency, (chunk) =>
        this.engine.correctChunk(chunk, index)
      );

      paragraphs.push({
        index: i,
        originalText: paragraphText,
        correctedText: results.map((result) => result.correctedText).join(' '),
        chunks: results,
      });
      emit('correcting', i + 1, paragraphTexts.length, `Corrected paragraph ${i + 1}`);
    }

    const allResults = paragraphs.flatMap((paragraph) => paragraph.chunks);
    const changed = allResults.filter((result) => result.correctedText !== result.originalText);

    return {
      sourceName: name,
      correctedText: paragraphs.map((paragraph) => paragraph.correctedText).join('\n'),
      paragraphs,
      results: changed,
      stats: {
        totalParagraphs: paragraphs.length,
        totalChunks: allResults.length,
        changedChunks: changed.length,
        totalRulesApplied: sum(allResults, (result) => result.appliedRules.length),
        totalChanges: sum(allResults, (result) => result.changes.length),
      },
    };
  }

  private buildChunks(body: string, section: string, source: string, sectionIndex: number): StyleChunk[] {
    return segmentIntoChunks(body, config.segmentation.maxChunkSize)
      .filter((content) => content.length >= config.segmentation.minStyleChunkLength)
      .map((content, chunkIndex) => ({
        content,
        ruleType: identifyChunkRuleType(content, section),
        section,
        examples: extractExamples(content),
        metadata: { source, sectionIndex, chunkIndex },
      }));
  }

  private createIndex(): StyleEmbeddingIndex {
    return new StyleEmbeddingIndex(this.embedder, this.createStore?.(this.embedder.dimension));
  }

  private requireIndex(): StyleEmbeddingIndex {
    const index = this.session.index;
    if (!index) {
      throw new StyleGuideMissingError();
    }
    return index;
  }

  private async readSource(
    source: PipelineSource,
    stage: ProgressStage,
    onProgress?: ProgressSink
  ): Promise<{ text: string; name: string }> {
    const emit = this.emitter(stage, onProgress);

    if (isTextSource(source)) {
      const name = source.name ?? 'inline text';
      emit('reading', 1, 1, `Read ${name}`);
      return { text: source.text, name };
    }

    const name = sourceName(source);
    const extracted = await documentExtractor.extract(source, (current, total, message) =>
      emit('reading', current, total, message)
    );

    if (!extracted.text.trim()) {
      logger.warn(`[Style Pipeline] No text extracted from ${name}`);
    }
    return { text: extracted.text, name };
  }

  /**
   * Progress is best effort: a failing sink is logged and never stops the run.
   */
  private emitter(stage: ProgressStage, sink?: ProgressSink): ProgressEmitter {
    return (phase, current, total, message) => {
      if (!sink) return;
      try {
        sink(stage, { phase, current, total, message });
      } catch (error) {
        logger.warn(`[Style Pipeline] Progress sink failed on ${stage} ${phase} ${current}/${total}`, error);
      }
    };
  }

  private parseJson(input: string): unknown {
    try {
      return JSON.parse(input);
    } catch (error) {
      throw AppError.badRequest(
        `Rule set is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_RULE_SET'
      );
    }
  }
}

function sum<T>(items: readonly T[], value: (item: T) => number): number {
  return items.reduce((total, item) => total + value(item), 0);
}
