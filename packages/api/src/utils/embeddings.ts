import { cacheEmbedding, getCachedEmbedding, type EmbeddingCacheBackend } from './redis';
import { logger } from './logger';
import type { AppConfig } from '../config';

/**
 * Embeddings Utility (API Service)
 *
 * CRITICAL: Must use the same model as the ingestion worker
 * (document embeddings), otherwise similarities are meaningless.
 *
 * Strategy:
 * 1. Check Redis cache first (24h TTL)
 * 2. If miss → call embedding service
 * 3. Store result in Redis for future hits
 */

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export class EmbeddingClient implements Embedder {
  constructor(
    private readonly settings: AppConfig['embeddings'],
    private readonly cache?: EmbeddingCacheBackend
  ) {}

  async embed(text: string): Promise<number[]> {
    // Normalize (lowercase + trim) for better cache hits
    const normalizedText = text.toLowerCase().trim();

    if (this.cache) {
      try {
        const cached = await getCachedEmbedding(this.cache, normalizedText);
        if (cached) {
          return cached;
        }
      } catch (error) {
        logger.warn({ error }, 'Embedding cache read failed, calling embedding service');
      }
    }

    const embedding = await this.callEmbeddingService(text);

    if (this.cache) {
      try {
        await cacheEmbedding(this.cache, normalizedText, embedding, this.settings.cacheTtl);
      } catch (error) {
        logger.warn({ error }, 'Embedding cache write failed');
      }
    }

    return embedding;
  }

  /**
   * Call embedding service (sentence-transformers worker).
   *
   * Expected response: { embedding: number[] }
   */
  private async callEmbeddingService(text: string): Promise<number[]> {
    const startTime = Date.now();
    const url = `${this.settings.workerUrl}/embed`;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text, model: this.settings.model }),
      });

      if (!response.ok) {
        throw new Error(`Embedding service returned ${response.status}`);
      }

      const data: unknown = await response.json();
      const embedding = parseEmbedding(data);

      logger.debug({ latency: Date.now() - startTime, dimension: embedding.length }, 'Query embedded');
      return embedding;
    } catch (error) {
      logger.error({ error, url }, 'Embedding service call failed');
      throw error;
    }
  }
}

function parseEmbedding(data: unknown): number[] {
  if (
    typeof data === 'object' &&
    data !== null &&
    'embedding' in data &&
    Array.isArray(data.embedding) &&
    data.embedding.length > 0 &&
    data.embedding.every((v: unknown) => typeof v === 'number')
  ) {
    return data.embedding;
  }
  throw new Error('Embedding service returned malformed payload');
}
