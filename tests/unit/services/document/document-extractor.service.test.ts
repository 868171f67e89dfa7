import { describe, it, expect, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as mammoth from 'mammoth';
import pdfParse from 'pdf-parse';
import {
  documentExtractor,
  renderPdfPage,
  sourceName,
  type PdfPage,
} from '../../../../src/services/document/document-extractor.service';
import { logger } from '../../../../src/lib/logger';
import { InputFormatError } from '../../../../src/utils/app-error';

vi.mock('mammoth', () => ({
  extractRawText: vi.fn(),
}));

vi.mock('pdf-parse', () => ({
  default: vi.fn(),
}));

vi.mock('../../../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const pageOf = (lines: Array<[string, number]>): PdfPage => ({
  getTextContent: async () => ({
    items: lines.map(([str, y]) => ({ str, transform: [1, 0, 0, 1, 72, y] })),
  }),
});

const captureError = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
};

describe('DocumentExtractorService', () => {
  describe('detectFormat', () => {
    it('should accept pdf and docx in any case', () => {
      expect(documentExtractor.detectFormat({ path: '/tmp/report.PDF' })).toBe('.pdf');
      expect(documentExtractor.detectFormat({ fileName: 'guide.docx', buffer: Buffer.alloc(0) })).toBe('.docx');
    });

    it('should reject other extensions before reading', async () => {
      const error = await captureError(
        documentExtractor.extract({ fileName: 'notes.txt', buffer: Buffer.from('text') })
      );

      expect(error).toBeInstanceOf(InputFormatError);
      expect(error).toMatchObject({ code: 'UNSUPPORTED_FORMAT', extension: '.txt', statusCode: 400 });
      expect(mammoth.extractRawText).not.toHaveBeenCalled();
    });
  });

  describe('extractFromDocx', () => {
    it('should extract raw text from a buffer', async () => {
      vi.mocked(mammoth.extractRawText).mockResolvedValue({ value: 'Hello', messages: [] });
      const onProgress = vi.fn();
      const buffer = Buffer.from('docx-bytes');

      const result = await documentExtractor.extract({ fileName: 'guide.docx', buffer }, onProgress);

      expect(result).toEqual({ text: 'Hello', metadata: { title: 'guide' } });
      expect(mammoth.extractRawText).toHaveBeenCalledWith({ buffer });
      expect(onProgress.mock.calls).toEqual([
        [0, 1, 'Reading guide.docx'],
        [1, 1, 'Read guide.docx'],
      ]);
    });

    it('should return empty text when the document cannot be parsed', async () => {
      vi.mocked(mammoth.extractRawText).mockRejectedValue(new Error('corrupt zip'));

      const result = await documentExtractor.extract({ fileName: 'broken.docx', buffer: Buffer.from('x') });

      expect(result).toEqual({ text: '', metadata: {} });
      expect(logger.warn).toHaveBeenCalledWith(
        '[DocumentExtractor] DOCX extraction failed for broken.docx',
        expect.any(Error)
      );
    });

    it('should read documents from disk', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'extractor-'));
      const filePath = path.join(dir, 'report.docx');
      await fs.writeFile(filePath, 'on-disk');
      vi.mocked(mammoth.extractRawText).mockResolvedValue({ value: 'From disk', messages: [] });

      try {
        const result = await documentExtractor.extract({ path: filePath });

        expect(result.text).toBe('From disk');
        expect(mammoth.extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from('on-disk') });
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    it('should raise FILE_NOT_FOUND for missing paths', async () => {
      const missing = path.join(os.tmpdir(), 'does-not-exist', 'missing.docx');

      const error = await captureError(documentExtractor.extract({ path: missing }));

      expect(error).toMatchObject({ statusCode: 404, code: 'FILE_NOT_FOUND' });
    });
  });

  describe('extractFromPdf', () => {
    it('should extract text and metadata, reporting each page', async () => {
      vi.mocked(pdfParse).mockImplementation(async (_buffer, options) => {
        const pages = [pageOf([['Page one', 700]]), pageOf([['Page two', 700]])];
        const texts: string[] = [];
        for (const page of pages) {
          texts.push((await options?.pagerender?.(page)) ?? '');
        }
        return {
          numpages: 2,
          numrender: 2,
          info: { Title: 'Guide' },
          metadata: null,
          version: 'default',
          text: texts.join('\n\n'),
        };
      });
      const onProgress = vi.fn();

      const result = await documentExtractor.extract({ fileName: 'guide.pdf', buffer: Buffer.from('%PDF') }, onProgress);

      expect(result).toEqual({
        text: 'Page one\n\nPage two',
        metadata: { title: 'Guide', author: undefined, pageCount: 2 },
      });
      expect(onProgress.mock.calls).toEqual([
        [0, 1, 'Reading guide.pdf'],
        [1, 0, 'Read page 1'],
        [2, 0, 'Read page 2'],
        [2, 2, 'Read 2 pages'],
      ]);
    });

    it('should break page text where the baseline moves', async () => {
      const page = pageOf([
        ['Adverse', 700],
        [' events', 700],
        ['Table 2', 680],
      ]);

      expect(await renderPdfPage(page)).toBe('Adverse events\nTable 2');
    });

    it('should return empty text when parsing fails', async () => {
      vi.mocked(pdfParse).mockRejectedValue(new Error('bad xref'));

      const result = await documentExtractor.extract({ fileName: 'bad.pdf', buffer: Buffer.from('x') });

      expect(result).toEqual({ text: '', metadata: {} });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  it('should name sources by file name', () => {
    expect(sourceName({ path: '/data/in/csr.docx' })).toBe('csr.docx');
    expect(sourceName({ fileName: 'upload.pdf', buffer: Buffer.alloc(0) })).toBe('upload.pdf');
  });
});
