export const aiConfig = {
  gemini: {
    apiKey: process.env.GEMINI_API_KEY || '',
    embeddingModel: process.env.GEMINI_EMBEDDING_MODEL || 'text-embedding-004',
    embeddingDimensions: 768,
    maxRetries: 3,
    retryDelay: 1000,
  },
};
