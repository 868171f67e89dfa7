/**
 * DOCX Writer Service
 *
 * Writes corrected text and correction reports as Word documents.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { Document, HeadingLevel, Packer, Paragraph, TextRun } from 'docx';
import { logger } from '../../lib/logger';
import type {
  CorrectionMatch,
  CorrectionResult,
  DocumentCorrectionResult,
} from '../../types/style-guide.types';

const CHANGE_MARKER = /<change confidence=[^>]*>([\s\S]*?)<\/change>/g;

export function stripChangeMarkers(text: string): string {
  return text.replace(CHANGE_MARKER, '$1');
}

function describeMatch(match: CorrectionMatch): string {
  const confidence = match.confidence.toFixed(2);
  if (match.rule.kind === 'chunk') {
    const section = match.rule.chunk.section || 'untitled section';
    return `Style guide excerpt (${section}), confidence ${confidence}`;
  }
  const { rule } = match.rule;
  const target = rule.replacement || '(remove)';
  return `${rule.category}/${rule.type}: "${rule.pattern}" → "${target}", confidence ${confidence}`;
}

function labelled(label: string, value: string): Paragraph {
  return new Paragraph({
    children: [new TextRun({ text: `${label}: `, bold: true }), new TextRun({ text: value })],
  });
}

function resultParagraphs(result: CorrectionResult, position: number): Paragraph[] {
  const paragraphs = [
    new Paragraph({ text: `Change ${position}`, heading: HeadingLevel.HEADING_2 }),
    labelled('Original', result.originalText),
    labelled('Corrected', stripChangeMarkers(result.correctedText)),
  ];

  for (const change of result.changes) {
    paragraphs.push(new Paragraph({ text: `• ${change}` }));
  }
  for (const match of result.appliedRules) {
    paragraphs.push(new Paragraph({ text: `• ${describeMatch(match)}` }));
  }

  return paragraphs;
}

class DocxWriterService {
  /**
   * One Word paragraph per input paragraph, change markers removed.
   */
  async writeParagraphs(paragraphs: readonly string[], title?: string): Promise<Buffer> {
    const children: Paragraph[] = [];
    if (title) {
      children.push(new Paragraph({ text: title, heading: HeadingLevel.TITLE }));
    }
    for (const text of paragraphs) {
      children.push(new Paragraph({ text: stripChangeMarkers(text) }));
    }

    const doc = new Document({ sections: [{ properties: {}, children }] });
    return Packer.toBuffer(doc);
  }

  async buildCorrectedDocument(result: DocumentCorrectionResult): Promise<Buffer> {
    return this.writeParagraphs(result.paragraphs.map((paragraph) => paragraph.correctedText));
  }

  /**
   * Report listing every changed chunk with its deterministic changes and
   * applied style-guide rules.
   */
  async buildAnalysisDocument(result: DocumentCorrectionResult): Promise<Buffer> {
    const { stats } = result;
    const children: Paragraph[] = [
      new Paragraph({ text: `Style Correction Report: ${result.sourceName}`, heading: HeadingLevel.TITLE }),
      new Paragraph({ text: 'Summary', heading: HeadingLevel.HEADING_1 }),
      labelled('Paragraphs', String(stats.totalParagraphs)),
      labelled('Chunks', String(stats.totalChunks)),
      labelled('Changed chunks', String(stats.changedChunks)),
      labelled('Deterministic changes', String(stats.totalChanges)),
      labelled('Style-guide rules applied', String(stats.totalRulesApplied)),
      new Paragraph({ text: 'Changes', heading: HeadingLevel.HEADING_1 }),
    ];

    if (result.results.length === 0) {
      children.push(new Paragraph({ text: 'No changes were made.' }));
    }
    result.results.forEach((chunkResult, i) => {
      children.push(...resultParagraphs(chunkResult, i + 1));
    });

    const doc = new Document({ sections: [{ properties: {}, children }] });
    return Packer.toBuffer(doc);
  }

  async saveBuffer(buffer: Buffer, filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, buffer);
    logger.info(`[DocxWriter] Wrote ${filePath}`);
  }
}

export const docxWriter = new DocxWriterService();
