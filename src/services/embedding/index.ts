export { HashingEmbedder, DEFAULT_HASHING_DIMENSION, type Embedder, type HashingEmbedderOptions } from './embedder';
export { GeminiEmbedderService, geminiEmbedder } from './gemini-embedder.service';
export { FlatL2VectorStore, type VectorHit, type VectorStore } from './vector-store';
export { StyleEmbeddingIndex, ruleEmbeddingText } from './embedding-index.service';
export { confidenceFor, isWithinThreshold, type MatchThresholds } from './match-scoring';
