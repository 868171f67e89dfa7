import dotenv from 'dotenv';
dotenv.config();

export type IngestionMode = 'rules' | 'chunks' | 'hybrid';
export type EmbeddingProvider = 'hashing' | 'gemini';

interface Config {
  segmentation: {
    maxChunkSize: number;
    minStyleChunkLength: number;
  };
  retrieval: {
    topK: number;
    ruleDistanceThreshold: number;
    chunkDistanceThreshold: number;
    minConfidence: number;
  };
  correction: {
    concurrency: number;
    layerRetrieval: boolean;
  };
  ingestion: {
    mode: IngestionMode;
  };
  embedding: {
    provider: EmbeddingProvider;
    dimension: number;
  };
}

const parseMode = (value: string | undefined): IngestionMode =>
  value === 'rules' || value === 'chunks' ? value : 'hybrid';

const parseProvider = (value: string | undefined): EmbeddingProvider =>
  value === 'gemini' ? 'gemini' : 'hashing';

export const config: Config = {
  segmentation: {
    maxChunkSize: parseInt(process.env.CHUNK_SIZE || '500', 10),
    minStyleChunkLength: parseInt(process.env.MIN_STYLE_CHUNK_LENGTH || '50', 10),
  },
  retrieval: {
    topK: parseInt(process.env.RETRIEVAL_TOP_K || '3', 10),
    ruleDistanceThreshold: parseFloat(process.env.RULE_DISTANCE_THRESHOLD || '100'),
    chunkDistanceThreshold: parseFloat(process.env.CHUNK_DISTANCE_THRESHOLD || '1.5'),
    minConfidence: parseFloat(process.env.MIN_CONFIDENCE || '0.1'),
  },
  correction: {
    concurrency: parseInt(process.env.CORRECTION_CONCURRENCY || '4', 10),
    layerRetrieval: process.env.LAYER_RETRIEVAL !== 'false',
  },
  ingestion: {
    mode: parseMode(process.env.INGESTION_MODE),
  },
  embedding: {
    provider: parseProvider(process.env.EMBEDDING_PROVIDER),
    dimension: parseInt(process.env.EMBEDDING_DIMENSION || '256', 10),
  },
};

export default config;
