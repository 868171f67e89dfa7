/**
 * Gemini Embedder
 *
 * Remote embedder backed by the Gemini embedding model.
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { aiConfig } from '../../config/ai.config';
import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import type { Embedder } from './embedder';

const NON_RETRYABLE = ['api key', 'api_key', 'not configured', 'invalid', 'not found', 'quota', 'exceeded'];

export class GeminiEmbedderService implements Embedder {
  readonly dimension = aiConfig.gemini.embeddingDimensions;
  private model: GenerativeModel | null = null;

  private getModel(): GenerativeModel {
    if (!this.model) {
      if (!aiConfig.gemini.apiKey) {
        throw AppError.internal('GEMINI_API_KEY is not configured');
      }
      const client = new GoogleGenerativeAI(aiConfig.gemini.apiKey);
      this.model = client.getGenerativeModel({ model: aiConfig.gemini.embeddingModel });
    }
    return this.model;
  }

  private async retryWithBackoff<T>(
    operation: () => Promise<T>,
    retries = aiConfig.gemini.maxRetries
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        if (error instanceof AppError) {
          throw error;
        }
        if (error instanceof Error) {
          const msg = error.message.toLowerCase();
          if (NON_RETRYABLE.some((fragment) => msg.includes(fragment))) {
            throw error;
          }
        }

        if (attempt < retries) {
          const delay = aiConfig.gemini.retryDelay * Math.pow(2, attempt);
          logger.warn(`[Gemini Embedder] Embedding failed, retrying in ${delay}ms (attempt ${attempt + 1}/${retries})`);
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    throw lastError instanceof Error ? lastError : new Error('Unknown error in Gemini embedding call');
  }

  async embed(text: string): Promise<number[]> {
    return this.retryWithBackoff(async () => {
      const result = await this.getModel().embedContent(text);
      const values = result.embedding.values;

      if (values.length !== this.dimension) {
        throw AppError.internal(
          `Gemini returned ${values.length} dimensions, expected ${this.dimension}`,
          'EMBEDDING_DIMENSION_MISMATCH'
        );
      }
      return values;
    });
  }
}

export const geminiEmbedder = new GeminiEmbedderService();
