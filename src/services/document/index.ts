export {
  documentExtractor,
  SUPPORTED_EXTENSIONS,
  type DocumentSource,
  type ExtractedDocument,
  type ExtractionProgress,
} from './document-extractor.service';

export { docxWriter, stripChangeMarkers } from './docx-writer.service';
