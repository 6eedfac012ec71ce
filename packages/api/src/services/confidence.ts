import {
  CONFIDENCE_WEIGHTS as W,
  HEDGING_PHRASES,
  STOPWORDS,
  type GenerationMode,
  type RetrievedChunk,
} from '@smart-rag/shared';

/**
 * Confidence Scorer
 *
 * Heuristic 0-100 score for a generated answer. Pure and deterministic:
 * no model calls, so identical inputs always score identically.
 *
 * Terms:
 * - Source prior: grounded answers with evidence start higher than
 *   general-knowledge ones
 * - Retrieval support: top similarity + number of chunks used (grounded only)
 * - Content reference: answer reuses words from the retrieved chunks
 * - Substance: answer length, standing in for evidence on the ungrounded path
 * - Hedging: "I'm not sure", "I don't have information", ... are penalized
 * - Self-reported certainty: optional model signal, centered on 0.5
 */

export interface ConfidenceInput {
  answer: string;
  chunks: readonly RetrievedChunk[];
  mode: GenerationMode;
  selfReportedCertainty?: number;
}

export type ConfidenceScorer = (input: ConfidenceInput) => number;

export interface ConfidenceBreakdown {
  prior: number;
  retrievalSupport: number;
  contentReference: number;
  substance: number;
  hedgingPenalty: number;
  directness: number;
  certainty: number;
  score: number;
}

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

// A similarity that is not a number counts as no support
const similarity = (score: number) => (Number.isNaN(score) ? 0 : clamp(score, 0, 1));

export function countWords(text: string): number {
  const words = text.trim().split(/\s+/);
  return words[0] === '' ? 0 : words.length;
}

function foldApostrophes(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'");
}

export function findHedgingPhrases(answer: string): string[] {
  const lower = foldApostrophes(answer);
  return HEDGING_PHRASES.filter((phrase) => lower.includes(phrase));
}

function contentTerms(text: string): Set<string> {
  const terms = new Set<string>();
  for (const token of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (token.length >= 4 && !STOPWORDS.has(token)) {
      terms.add(token);
    }
  }
  return terms;
}

/**
 * Distinct content words the answer shares with the retrieved chunks.
 */
export function sharedTermCount(answer: string, chunks: readonly RetrievedChunk[]): number {
  const evidence = contentTerms(chunks.map((c) => c.content).join(' '));
  let shared = 0;
  for (const term of contentTerms(answer)) {
    if (evidence.has(term)) shared++;
  }
  return shared;
}

export function explainConfidence(input: ConfidenceInput): ConfidenceBreakdown {
  const { answer, chunks, mode } = input;
  const grounded = mode === 'grounded';
  const hasEvidence = grounded && chunks.length > 0;
  const words = countWords(answer);
  const hedges = findHedgingPhrases(answer);

  const prior = hasEvidence ? W.GROUNDED_PRIOR : W.UNGROUNDED_PRIOR;

  let retrievalSupport = 0;
  let contentReference = 0;
  if (hasEvidence) {
    const topSimilarity = Math.max(...chunks.map((c) => similarity(c.score)));
    retrievalSupport =
      topSimilarity * W.SIMILARITY + Math.min(chunks.length, W.MAX_CHUNKS_COUNTED) * W.PER_CHUNK;

    const shared = sharedTermCount(answer, chunks);
    if (shared >= W.STRONG_REFERENCE_MIN_TERMS) {
      contentReference = W.STRONG_REFERENCE;
    } else if (shared > 0) {
      contentReference = W.WEAK_REFERENCE;
    }
  }

  const substance = grounded
    ? 0
    : (Math.min(words, W.SUBSTANCE_FULL_WORDS) / W.SUBSTANCE_FULL_WORDS) * W.SUBSTANCE;

  const hedgingPenalty = Math.min(hedges.length * W.HEDGE_PENALTY, W.MAX_HEDGE_PENALTY);
  const directness = hedges.length === 0 && words >= W.DIRECTNESS_MIN_WORDS ? W.DIRECTNESS : 0;

  const certainty =
    input.selfReportedCertainty === undefined || Number.isNaN(input.selfReportedCertainty)
      ? 0
      : (clamp(input.selfReportedCertainty, 0, 1) - 0.5) * W.CERTAINTY;

  const raw =
    prior + retrievalSupport + contentReference + substance - hedgingPenalty + directness + certainty;

  return {
    prior,
    retrievalSupport,
    contentReference,
    substance,
    hedgingPenalty,
    directness,
    certainty,
    score: clamp(Math.round(raw), 0, 100),
  };
}

export const scoreConfidence: ConfidenceScorer = (input) => explainConfidence(input).score;
