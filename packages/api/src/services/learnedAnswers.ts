import {
  normalizeQuestion,
  type AnswerSource,
  type LearnedEntry,
  type LearnedStats,
} from '@smart-rag/shared';
import type { Sql } from '../utils/db';
import { describeError, StoreFailure } from '../errors';

/**
 * Learned Answer Store
 *
 * Question → answer pairs promoted from confident fallback answers.
 * Keyed by normalized question text; exact-key lookup only, never
 * fuzzy or semantic (semantic reuse is the vector path's job).
 *
 * One entry per key: upsert replaces, last committed write wins.
 */
export interface LearnedAnswerStore {
  lookup(question: string): Promise<LearnedEntry | null>;
  upsert(question: string, answer: string, score: number, source: AnswerSource): Promise<LearnedEntry>;
}

/**
 * Administrative surface, used by the admin routes only.
 */
export interface LearnedAnswerAdmin {
  list(limit?: number): Promise<LearnedEntry[]>;
  remove(question: string): Promise<boolean>;
  stats(): Promise<LearnedStats>;
}

export type ManagedLearnedAnswerStore = LearnedAnswerStore & LearnedAnswerAdmin;

function roundAverage(value: number): number {
  return Math.round(value * 10) / 10;
}

// ============================================================================
// POSTGRES
// ============================================================================

interface LearnedRow {
  question_key: string;
  question: string;
  answer: string;
  confidence_score: number;
  source: AnswerSource;
  created_at: Date;
  updated_at: Date;
}

function fromRow(row: LearnedRow): LearnedEntry {
  return {
    questionKey: row.question_key,
    question: row.question,
    answer: row.answer,
    confidenceScore: row.confidence_score,
    source: row.source,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Postgres-backed store. `question_key` is UNIQUE, so
 * INSERT ... ON CONFLICT DO UPDATE is a single atomic statement and
 * concurrent writers for one key can never produce duplicates.
 */
export class PostgresLearnedAnswerStore implements ManagedLearnedAnswerStore {
  constructor(private readonly sql: Sql) {}

  async lookup(question: string): Promise<LearnedEntry | null> {
    const key = normalizeQuestion(question);
    try {
      const rows = await this.sql<LearnedRow[]>`
        SELECT question_key, question, answer, confidence_score, source,
               created_at, updated_at
        FROM learned_answers
        WHERE question_key = ${key}
        LIMIT 1
      `;
      return rows.length > 0 ? fromRow(rows[0]) : null;
    } catch (error) {
      throw new StoreFailure(`Learned answer lookup failed: ${describeError(error)}`, { cause: error });
    }
  }

  async upsert(
    question: string,
    answer: string,
    score: number,
    source: AnswerSource
  ): Promise<LearnedEntry> {
    const key = normalizeQuestion(question);
    try {
      // created_at survives replacement; updated_at moves only when the entry changes
      const rows = await this.sql<LearnedRow[]>`
        INSERT INTO learned_answers (question_key, question, answer, confidence_score, source)
        VALUES (${key}, ${question}, ${answer}, ${score}, ${source})
        ON CONFLICT (question_key) DO UPDATE SET
          question = EXCLUDED.question,
          answer = EXCLUDED.answer,
          confidence_score = EXCLUDED.confidence_score,
          source = EXCLUDED.source,
          updated_at = CASE
            WHEN (learned_answers.question, learned_answers.answer,
                  learned_answers.confidence_score, learned_answers.source)
                 IS DISTINCT FROM
                 (EXCLUDED.question, EXCLUDED.answer, EXCLUDED.confidence_score, EXCLUDED.source)
            THEN now()
            ELSE learned_answers.updated_at
          END
        RETURNING question_key, question, answer, confidence_score, source,
                  created_at, updated_at
      `;
      if (rows.length === 0) {
        throw new Error('upsert returned no row');
      }
      return fromRow(rows[0]);
    } catch (error) {
      throw new StoreFailure(`Learned answer upsert failed: ${describeError(error)}`, { cause: error });
    }
  }

  async list(limit: number = 100): Promise<LearnedEntry[]> {
    try {
      const rows = await this.sql<LearnedRow[]>`
        SELECT question_key, question, answer, confidence_score, source,
               created_at, updated_at
        FROM learned_answers
        ORDER BY created_at DESC, question_key
        LIMIT ${limit}
      `;
      return rows.map(fromRow);
    } catch (error) {
      throw new StoreFailure(`Listing learned answers failed: ${describeError(error)}`, { cause: error });
    }
  }

  async remove(question: string): Promise<boolean> {
    try {
      const result = await this.sql`
        DELETE FROM learned_answers WHERE question_key = ${normalizeQuestion(question)}
      `;
      return result.count > 0;
    } catch (error) {
      throw new StoreFailure(`Deleting learned answer failed: ${describeError(error)}`, { cause: error });
    }
  }

  async stats(): Promise<LearnedStats> {
    try {
      const rows = await this.sql<{ total: string; avg_confidence: string | null }[]>`
        SELECT COUNT(*)::text AS total, AVG(confidence_score)::text AS avg_confidence
        FROM learned_answers
      `;
      const total = rows.length > 0 ? parseInt(rows[0].total, 10) : 0;
      const avg = rows.length > 0 && rows[0].avg_confidence !== null ? parseFloat(rows[0].avg_confidence) : 0;
      return { total, avgConfidence: roundAverage(avg) };
    } catch (error) {
      throw new StoreFailure(`Learned answer stats failed: ${describeError(error)}`, { cause: error });
    }
  }
}

// ============================================================================
// IN-MEMORY
// ============================================================================

/**
 * Process-local store (LEARNED_STORE=memory). Single-threaded event loop
 * makes each Map write atomic, so last write wins per key.
 */
export class InMemoryLearnedAnswerStore implements ManagedLearnedAnswerStore {
  private readonly entries = new Map<string, LearnedEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async lookup(question: string): Promise<LearnedEntry | null> {
    const entry = this.entries.get(normalizeQuestion(question));
    return entry ? { ...entry } : null;
  }

  async upsert(
    question: string,
    answer: string,
    score: number,
    source: AnswerSource
  ): Promise<LearnedEntry> {
    const key = normalizeQuestion(question);
    const existing = this.entries.get(key);
    if (
      existing &&
      existing.question === question &&
      existing.answer === answer &&
      existing.confidenceScore === score &&
      existing.source === source
    ) {
      return { ...existing };
    }
    const timestamp = this.now();

    const entry: LearnedEntry = {
      questionKey: key,
      question,
      answer,
      confidenceScore: score,
      source,
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };
    this.entries.set(key, entry);
    return { ...entry };
  }

  async list(limit: number = 100): Promise<LearnedEntry[]> {
    return Array.from(this.entries.values())
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() ||
          (a.questionKey < b.questionKey ? -1 : a.questionKey > b.questionKey ? 1 : 0)
      )
      .slice(0, limit)
      .map((entry) => ({ ...entry }));
  }

  async remove(question: string): Promise<boolean> {
    return this.entries.delete(normalizeQuestion(question));
  }

  async stats(): Promise<LearnedStats> {
    const total = this.entries.size;
    if (total === 0) {
      return { total: 0, avgConfidence: 0 };
    }
    let sum = 0;
    for (const entry of this.entries.values()) {
      sum += entry.confidenceScore;
    }
    return { total, avgConfidence: roundAverage(sum / total) };
  }
}
