/**
 * Shared utility functions for Smart RAG.
 */
import type { QuestionType, RetrievedChunk } from './types';

/**
 * Generate a unique request ID for tracing.
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Check if a latency exceeds its budget.
 */
export function checkLatencyBudget(
  actual: number,
  budget: number,
  stage: string
): { exceeded: boolean; violation?: string } {
  if (actual > budget) {
    return {
      exceeded: true,
      violation: `${stage}: ${actual}ms exceeded budget of ${budget}ms`,
    };
  }
  return { exceeded: false };
}

/**
 * Normalize a question into its learned-answer key.
 *
 * Case-folds, drops punctuation and collapses whitespace, so
 * "What is ML?" and "what is   ml" share a key.
 */
export function normalizeQuestion(question: string): string {
  return question
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// NaN similarities sort last
const sortableScore = (score: number) => (Number.isNaN(score) ? -Infinity : score);

/**
 * Order chunks by similarity (descending) and assign 1-based ranks.
 * Ties are broken by chunk ID so prompts stay deterministic.
 */
export function rankChunks<T extends Omit<RetrievedChunk, 'rank'>>(
  chunks: T[]
): Array<T & { rank: number }> {
  return [...chunks]
    .sort((a, b) => {
      const sa = sortableScore(a.score);
      const sb = sortableScore(b.score);
      if (sa !== sb) return sb > sa ? 1 : -1;
      return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
    })
    .map((chunk, idx) => ({ ...chunk, rank: idx + 1 }));
}

/**
 * Spread chunks across source files with round-robin selection.
 *
 * Input must already be ordered by relevance; order within a file is kept.
 * A single file simply yields its top `maxChunks`.
 */
export function ensureFileDiversity<T extends { file: string }>(
  chunks: T[],
  maxChunks: number,
  maxPerFile: number
): T[] {
  const groups = new Map<string, T[]>();
  for (const chunk of chunks) {
    const group = groups.get(chunk.file);
    if (group) {
      group.push(chunk);
    } else {
      groups.set(chunk.file, [chunk]);
    }
  }

  if (groups.size <= 1) {
    return chunks.slice(0, maxChunks);
  }

  const result: T[] = [];
  const files = Array.from(groups.keys());
  const positions = new Map<string, number>(files.map((f) => [f, 0]));

  while (result.length < maxChunks) {
    let added = false;

    for (const file of files) {
      if (result.length >= maxChunks) break;

      const group = groups.get(file) ?? [];
      const pos = positions.get(file) ?? 0;
      if (pos < maxPerFile && pos < group.length) {
        result.push(group[pos]);
        positions.set(file, pos + 1);
        added = true;
      }
    }

    if (!added) break;
  }

  return result;
}

const QUESTION_PATTERNS: Array<[QuestionType, string[]]> = [
  ['definition', ['what is', 'what are', 'define', 'meaning of', 'definition of']],
  ['how_to', ['how to', 'how do', 'how does', 'how can', 'steps to', 'process of', 'way to']],
  ['comparison', ['difference between', 'compare', ' vs ', 'versus', 'differ from', 'contrast']],
  ['example', ['example', 'give me', 'show me', 'demonstrate', 'instance of']],
  ['list', ['list', 'types of', 'kinds of', 'categories']],
  ['explanation', ['explain', 'why', 'describe', 'tell me about', 'elaborate']],
];

/**
 * Classify a question so the prompt can ask for a matching answer shape.
 * First matching pattern group wins.
 */
export function analyzeQuestionType(question: string): QuestionType {
  const lower = ` ${question.toLowerCase().trim()} `;
  for (const [type, patterns] of QUESTION_PATTERNS) {
    if (patterns.some((p) => lower.includes(p))) {
      return type;
    }
  }
  return 'other';
}
