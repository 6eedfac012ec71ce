/**
 * Core types for Smart RAG.
 * Shared between the API service and its callers.
 */

/**
 * Where an answer came from.
 * - learned: replayed from the learned-answer store
 * - local_db: generated from retrieved document chunks
 * - internet: generated from general knowledge (fallback path)
 */
export type AnswerSource = 'learned' | 'local_db' | 'internet';

export type GenerationMode = 'grounded' | 'ungrounded';

export interface RetrievedChunk {
  chunkId: string;
  documentId: string;
  file: string;
  content: string;
  score: number; // cosine similarity (0-1)
  rank: number; // 1-based, stable for a fixed index
}

export interface SourceRef {
  chunkId: string;
  documentId: string;
  file: string;
  score: number;
  rank: number;
  snippet: string;
}

export interface AnswerResult {
  readonly question: string;
  readonly answer: string;
  readonly confidenceScore: number;
  readonly source: AnswerSource;
  readonly sources: readonly SourceRef[];
  readonly offerFallback: boolean;
  readonly savedToStore: boolean;
}

export interface LearnedEntry {
  questionKey: string;
  question: string;
  answer: string;
  confidenceScore: number;
  source: AnswerSource;
  createdAt: Date;
  updatedAt: Date;
}

export interface LearnedStats {
  total: number;
  avgConfidence: number;
}

export interface Thresholds {
  offerThreshold: number;
  returnThreshold: number;
  learnThreshold: number;
}

export type QuestionType =
  | 'definition'
  | 'how_to'
  | 'comparison'
  | 'example'
  | 'list'
  | 'explanation'
  | 'other';

export interface LocalQueryResponse {
  requestId: string;
  question: string;
  answer: string;
  confidence_score: number;
  source: AnswerSource;
  offer_internet: boolean;
  sources: SourceRef[];
  latencyMs: number;
}

export interface FallbackQueryResponse {
  requestId: string;
  question: string;
  answer: string;
  confidence_score: number;
  source: AnswerSource;
  saved_to_store: boolean;
  latencyMs: number;
}
