/**
 * Shared constants for Smart RAG.
 */

export const LATENCY_BUDGETS = {
  RETRIEVAL: 500, // ms (includes query embedding)
  GENERATION: 8000, // ms
  TOTAL: 10000, // ms
} as const;

export const RAG_CONFIG = {
  TOP_K: 5,
  MAX_PER_FILE: 5,
  SNIPPET_LENGTH: 200,
  MAX_ANSWER_TOKENS: 800,
} as const;

/**
 * Deployed thresholds: answers at or above 60 are shown as-is,
 * only answers at or above 90 are memorized.
 */
export const DEFAULT_THRESHOLDS = {
  OFFER: 60,
  RETURN: 60,
  LEARN: 90,
} as const;

export const CONFIDENCE_WEIGHTS = {
  GROUNDED_PRIOR: 35,
  UNGROUNDED_PRIOR: 30,
  SIMILARITY: 35,
  PER_CHUNK: 2,
  MAX_CHUNKS_COUNTED: 5,
  STRONG_REFERENCE: 10,
  WEAK_REFERENCE: 5,
  STRONG_REFERENCE_MIN_TERMS: 3,
  SUBSTANCE: 50,
  SUBSTANCE_FULL_WORDS: 100,
  HEDGE_PENALTY: 25,
  MAX_HEDGE_PENALTY: 50,
  DIRECTNESS: 5,
  DIRECTNESS_MIN_WORDS: 20,
  CERTAINTY: 30,
} as const;

export const HEDGING_PHRASES = [
  'not sure',
  "don't have enough information",
  "don't have information",
  'do not have enough information',
  "couldn't find",
  'could not find',
  'cannot answer',
  'unable to answer',
  'insufficient information',
  'not enough context',
  "i don't know",
  'no information',
] as const;

export const STOPWORDS = new Set([
  'about',
  'after',
  'also',
  'been',
  'before',
  'being',
  'from',
  'have',
  'into',
  'more',
  'most',
  'only',
  'other',
  'over',
  'some',
  'such',
  'than',
  'that',
  'their',
  'them',
  'then',
  'there',
  'these',
  'they',
  'this',
  'those',
  'very',
  'were',
  'what',
  'when',
  'where',
  'which',
  'while',
  'will',
  'with',
  'would',
  'your',
]);
