/**
 * Correct a clinical study report against a style guide.
 *
 * Usage:
 *   npm run correct -- <style-guide.pdf|docx|json> <report.pdf|docx> [options]
 *
 * Options:
 *   --out <dir>            Output directory (default: ./output)
 *   --mode <mode>          rules | chunks | hybrid (default: INGESTION_MODE or hybrid)
 *   --export-rules <file>  Write the extracted rule set as JSON
 *   --save-index <file>    Write the embedding index snapshot as JSON
 *
 * A .json style guide is imported as an exported rule set.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { IngestionMode } from '../src/config';
import { docxWriter } from '../src/services/document/docx-writer.service';
import { StyleCorrectionPipeline } from '../src/services/pipeline/style-correction-pipeline.service';
import { ProgressChannel } from '../src/services/progress/progress-channel';

interface CliOptions {
  styleGuide: string;
  document: string;
  outDir: string;
  mode?: IngestionMode;
  exportRules?: string;
  saveIndex?: string;
}

function optionValue(args: string[], flag: string): string | undefined {
  const position = args.indexOf(flag);
  return position >= 0 ? args[position + 1] : undefined;
}

function parseMode(value: string | undefined): IngestionMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'rules' || value === 'chunks' || value === 'hybrid') return value;
  throw new Error(`Unknown mode "${value}", expected rules, chunks or hybrid`);
}

function parseArgs(args: string[]): CliOptions {
  const positional = args.filter((arg, i) => !arg.startsWith('--') && !args[i - 1]?.startsWith('--'));
  const [styleGuide, document] = positional;
  if (!styleGuide || !document) {
    throw new Error('Usage: correct-document <style-guide> <document> [--out dir] [--mode mode]');
  }

  return {
    styleGuide,
    document,
    outDir: optionValue(args, '--out') ?? 'output',
    mode: parseMode(optionValue(args, '--mode')),
    exportRules: optionValue(args, '--export-rules'),
    saveIndex: optionValue(args, '--save-index'),
  };
}

async function run(options: CliOptions): Promise<void> {
  const pipeline = new StyleCorrectionPipeline();
  const progress = new ProgressChannel();
  const printer = (async () => {
    for await (const event of progress) {
      console.log(`[${event.stage}] ${event.phase} ${event.current}/${event.total} ${event.message}`);
    }
  })();

  try {
    if (path.extname(options.styleGuide).toLowerCase() === '.json') {
      const imported = await pipeline.importRuleSet(await fs.readFile(options.styleGuide, 'utf-8'));
      console.log(`Imported ${imported.imported} rules, skipped ${imported.skipped}`);
      imported.errors.forEach((error) => console.log(`  ${error}`));
    } else {
      const summary = await pipeline.ingestStyleGuide(
        { path: options.styleGuide },
        { mode: options.mode, onProgress: progress.asSink() }
      );
      console.log(`Indexed ${summary.rules} rules and ${summary.chunks} chunks from ${summary.sourceName}`);
    }

    const result = await pipeline.correctDocument({ path: options.document }, { onProgress: progress.asSink() });
    const baseName = path.basename(options.document, path.extname(options.document));

    await docxWriter.saveBuffer(
      await docxWriter.buildCorrectedDocument(result),
      path.join(options.outDir, `${baseName}_corrected.docx`)
    );
    await docxWriter.saveBuffer(
      await docxWriter.buildAnalysisDocument(result),
      path.join(options.outDir, `${baseName}_analysis.docx`)
    );

    if (options.exportRules) {
      await fs.writeFile(options.exportRules, JSON.stringify(pipeline.exportRuleSet(), null, 2), 'utf-8');
    }
    if (options.saveIndex) {
      await pipeline.session.index?.saveIndex(options.saveIndex);
    }

    console.log('\n=== Correction Summary ===');
    console.log(`Paragraphs: ${result.stats.totalParagraphs}`);
    console.log(`Chunks: ${result.stats.totalChunks} (${result.stats.changedChunks} changed)`);
    console.log(`Deterministic changes: ${result.stats.totalChanges}`);
    console.log(`Style-guide rules applied: ${result.stats.totalRulesApplied}`);
  } finally {
    progress.close();
    await printer;
  }
}

async function main(): Promise<void> {
  try {
    await run(parseArgs(process.argv.slice(2)));
  } catch (error) {
    console.error('Correction failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void main();
