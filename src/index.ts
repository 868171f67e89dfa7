export { config } from './config';
export type { IngestionMode, EmbeddingProvider } from './config';
export { logger } from './lib/logger';
export { AppError, InputFormatError, StyleGuideMissingError } from './utils/app-error';
export { segmentIntoChunks, splitIntoParagraphs, splitIntoSentences } from './utils/text-chunker';

export * from './types/style-guide.types';
export * from './schemas/style.schemas';

export * from './services/style';
export * from './services/embedding';
export * from './services/correction';
export * from './services/document';
export * from './services/progress/progress-channel';
export * from './services/pipeline';
