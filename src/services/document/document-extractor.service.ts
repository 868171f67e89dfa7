/**
 * Document Extractor Service
 *
 * Extracts plain text from PDF and Word documents, given a path or an
 * in-memory buffer. Content that cannot be parsed yields empty text.
 */

import { promises as fsPromises } from 'fs';
import * as path from 'path';
import { logger } from '../../lib/logger';
import { AppError, InputFormatError } from '../../utils/app-error';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export type DocumentSource = { path: string } | { fileName: string; buffer: Buffer };

export interface ExtractedDocument {
  text: string;
  metadata: {
    title?: string;
    author?: string;
    pageCount?: number;
  };
}

/** `total` is 0 while the page count is not yet known */
export type ExtractionProgress = (current: number, total: number, message: string) => void;

interface PdfTextItem {
  str: string;
  transform: number[];
}

/** The part of a pdf.js page that text rendering reads */
export interface PdfPage {
  getTextContent(): Promise<{ items: PdfTextItem[] }>;
}

/**
 * Page text with a line break wherever the baseline moves, matching
 * pdf-parse's own page renderer.
 */
export async function renderPdfPage(page: PdfPage): Promise<string> {
  const { items } = await page.getTextContent();
  let text = '';
  let lastY: number | undefined;

  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }

  return text;
}

const isSupported = (ext: string): ext is SupportedExtension =>
  SUPPORTED_EXTENSIONS.some((supported) => supported === ext);

export const sourceName = (source: DocumentSource): string =>
  'path' in source ? path.basename(source.path) : source.fileName;

class DocumentExtractorService {
  /**
   * Resolve and validate the extension before anything is read.
   */
  detectFormat(source: DocumentSource): SupportedExtension {
    const ext = path.extname(sourceName(source)).toLowerCase();
    if (!isSupported(ext)) {
      throw new InputFormatError(ext, SUPPORTED_EXTENSIONS);
    }
    return ext;
  }

  /**
   * Extract text from a PDF file, reporting each page as it is read.
   * The page count is only known once parsing finishes, so per-page events
   * carry a total of 0.
   */
  async extractFromPdf(source: DocumentSource, onProgress?: ExtractionProgress): Promise<ExtractedDocument> {
    const dataBuffer = await this.readSource(source);
    onProgress?.(0, 1, `Reading ${sourceName(source)}`);

    try {
      // Dynamic import keeps pdf-parse's load-time self test out of module init
      const { default: pdfParse } = await import('pdf-parse');
      let pagesRead = 0;
      const data = await pdfParse(dataBuffer, {
        pagerender: async (page: PdfPage) => {
          const text = await renderPdfPage(page);
          pagesRead++;
          onProgress?.(pagesRead, 0, `Read page ${pagesRead}`);
          return text;
        },
      });
      onProgress?.(data.numpages, data.numpages, `Read ${data.numpages} pages`);

      return {
        text: data.text,
        metadata: {
          title: typeof data.info?.Title === 'string' ? data.info.Title : undefined,
          author: typeof data.info?.Author === 'string' ? data.info.Author : undefined,
          pageCount: data.numpages,
        },
      };
    } catch (error) {
      logger.warn(`[DocumentExtractor] PDF extraction failed for ${sourceName(source)}`, error);
      return { text: '', metadata: {} };
    }
  }

  /**
   * Extract text from a Word document
   */
  async extractFromDocx(source: DocumentSource, onProgress?: ExtractionProgress): Promise<ExtractedDocument> {
    const buffer = await this.readSource(source);
    onProgress?.(0, 1, `Reading ${sourceName(source)}`);

    try {
      const mammoth = await import('mammoth');
      const result = await mammoth.extractRawText({ buffer });
      onProgress?.(1, 1, `Read ${sourceName(source)}`);

      return {
        text: result.value,
        metadata: {
          title: path.basename(sourceName(source), '.docx'),
        },
      };
    } catch (error) {
      logger.warn(`[DocumentExtractor] DOCX extraction failed for ${sourceName(source)}`, error);
      return { text: '', metadata: {} };
    }
  }

  /**
   * Extract from any supported document type
   */
  async extract(source: DocumentSource, onProgress?: ExtractionProgress): Promise<ExtractedDocument> {
    switch (this.detectFormat(source)) {
      case '.pdf':
        return this.extractFromPdf(source, onProgress);
      case '.docx':
        return this.extractFromDocx(source, onProgress);
    }
  }

  private async readSource(source: DocumentSource): Promise<Buffer> {
    if ('buffer' in source) return source.buffer;

    try {
      return await fsPromises.readFile(source.path);
    } catch (error) {
      logger.error(`[DocumentExtractor] Cannot read ${source.path}`, error);
      throw AppError.notFound(`Cannot read document: ${source.path}`, 'FILE_NOT_FOUND');
    }
  }
}

export const documentExtractor = new DocumentExtractorService();
