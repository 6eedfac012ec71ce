import { ensureFileDiversity, rankChunks, type RetrievedChunk } from '@smart-rag/shared';
import type { Sql } from '../utils/db';
import type { Embedder } from '../utils/embeddings';
import { logger } from '../utils/logger';
import { describeError, RetrievalFailure } from '../errors';

/**
 * Retrieval Service
 *
 * Vector similarity search (pgvector, cosine) over ingested chunks.
 * Candidates are spread across source files, then the survivors are
 * ranked 1..k by similarity with chunk-ID tie break.
 *
 * "No results" is an empty list. Any fault (embedding worker, database)
 * is a RetrievalFailure: a degraded index must not look like an empty one.
 */

export interface VectorRetrievalPort {
  search(question: string, k: number): Promise<RetrievedChunk[]>;
}

interface ChunkRow {
  chunk_id: string;
  document_id: string;
  file_name: string | null;
  content: string;
  score: string | number;
}

/**
 * Turn raw rows into ranked chunks. The per-file diversity cap only picks
 * which of the over-fetched rows survive; the picked set is re-ranked by
 * similarity. Rows without a finite similarity (zero-vector embeddings) are dropped.
 */
export function toRankedChunks(rows: readonly ChunkRow[], k: number, maxPerFile: number): RetrievedChunk[] {
  const candidates = rows
    .map((row) => ({
      chunkId: row.chunk_id,
      documentId: row.document_id,
      file: row.file_name || 'unknown',
      content: row.content,
      score: typeof row.score === 'number' ? row.score : parseFloat(row.score),
    }))
    .filter((chunk) => Number.isFinite(chunk.score));

  const picked = ensureFileDiversity(rankChunks(candidates), k, maxPerFile);
  return rankChunks(picked);
}

export class PgVectorRetrieval implements VectorRetrievalPort {
  constructor(
    private readonly sql: Sql,
    private readonly embedder: Embedder,
    private readonly maxPerFile: number
  ) {}

  async search(question: string, k: number): Promise<RetrievedChunk[]> {
    const startTime = Date.now();

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embedder.embed(question);
    } catch (error) {
      throw new RetrievalFailure(`Query embedding failed: ${describeError(error)}`, { cause: error });
    }

    // Format embedding as pgvector literal
    const vectorString = `[${queryEmbedding.join(',')}]`;
    // Over-fetch so the diversity cap still has k candidates to pick from
    const candidates = k * 2;

    let rows: ChunkRow[];
    try {
      rows = await this.sql<ChunkRow[]>`
        SELECT
          c.id::text AS chunk_id,
          c.document_id::text AS document_id,
          d.filename AS file_name,
          c.content,
          1 - (c.embedding <=> ${vectorString}::vector) AS score
        FROM chunks c
        LEFT JOIN documents d ON d.id = c.document_id
        WHERE c.deleted_at IS NULL
        ORDER BY c.embedding <=> ${vectorString}::vector, c.id
        LIMIT ${candidates}
      `;
    } catch (error) {
      logger.error({ error }, 'Vector search failed');
      throw new RetrievalFailure(`Vector search failed: ${describeError(error)}`, { cause: error });
    }

    const ranked = toRankedChunks(rows, k, this.maxPerFile);

    logger.info(
      { latency: Date.now() - startTime, candidates: rows.length, resultsCount: ranked.length },
      'Vector retrieval completed'
    );

    return ranked;
  }
}
