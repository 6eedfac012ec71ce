import {
  checkLatencyBudget,
  LATENCY_BUDGETS,
  normalizeQuestion,
  RAG_CONFIG,
  type AnswerResult,
  type AnswerSource,
  type GenerationMode,
  type LearnedEntry,
  type RetrievedChunk,
  type SourceRef,
  type Thresholds,
} from '@smart-rag/shared';
import { logger } from '../utils/logger';
import { describeError, GenerationFailure, RetrievalFailure } from '../errors';
import { scoreConfidence, type ConfidenceScorer } from './confidence';
import type { Generation, GenerationPort } from './generation';
import type { LearnedAnswerStore } from './learnedAnswers';
import type { VectorRetrievalPort } from './retrieval';

/**
 * Query Orchestration Engine
 *
 * answerLocally:
 *   learned-answer lookup → vector retrieval → grounded generation → score
 *   → return, flagging whether a general-knowledge fallback is worth offering
 *
 * answerWithFallback (explicit second call, never chained automatically):
 *   ungrounded generation → score → upsert into the learned store when
 *   asked to and the score clears learnThreshold
 *
 * The store is read only at the start of answerLocally and written only at
 * the end of answerWithFallback; a learned hit touches nothing else. Each operation makes at most one retrieval
 * and one generation call. RetrievalFailure / GenerationFailure propagate;
 * store faults never fail a query.
 */

export interface OrchestratorDeps {
  store: LearnedAnswerStore;
  retrieval: VectorRetrievalPort;
  generator: GenerationPort;
  thresholds: Thresholds;
  topK: number;
  scorer?: ConfidenceScorer;
}

function toSourceRef(chunk: RetrievedChunk): SourceRef {
  return {
    chunkId: chunk.chunkId,
    documentId: chunk.documentId,
    file: chunk.file,
    score: chunk.score,
    rank: chunk.rank,
    snippet: chunk.content.slice(0, RAG_CONFIG.SNIPPET_LENGTH),
  };
}

function freezeResult(result: {
  question: string;
  answer: string;
  confidenceScore: number;
  source: AnswerSource;
  sources: SourceRef[];
  offerFallback: boolean;
  savedToStore: boolean;
}): AnswerResult {
  return Object.freeze({
    ...result,
    sources: Object.freeze(result.sources.map((s) => Object.freeze(s))),
  });
}

export class QueryOrchestrator {
  private readonly scorer: ConfidenceScorer;

  constructor(private readonly deps: OrchestratorDeps) {
    this.scorer = deps.scorer ?? scoreConfidence;
  }

  get thresholds(): Thresholds {
    return this.deps.thresholds;
  }

  /**
   * Only scores below offerThreshold are offered the fallback.
   */
  shouldOfferFallback(score: number): boolean {
    return score < this.deps.thresholds.offerThreshold;
  }

  async answerLocally(question: string, topK: number = this.deps.topK): Promise<AnswerResult> {
    const { store } = this.deps;
    const startTime = Date.now();
    const questionKey = normalizeQuestion(question);

    // ===== STAGE 1: LEARNED ANSWER LOOKUP =====
    let learned: LearnedEntry | null = null;
    try {
      learned = await store.lookup(question);
    } catch (error) {
      // Degrade to the full retrieval path; the cache is an optimization
      logger.warn({ error: describeError(error), questionKey }, 'Learned answer lookup failed, treating as miss');
    }

    if (learned) {
      logger.info(
        { questionKey, confidenceScore: learned.confidenceScore, latency: Date.now() - startTime },
        'Learned answer hit'
      );
      return freezeResult({
        question,
        answer: learned.answer,
        confidenceScore: learned.confidenceScore,
        source: 'learned',
        sources: [],
        offerFallback: false,
        savedToStore: false,
      });
    }

    // ===== STAGE 2: RETRIEVAL =====
    const retrievalStart = Date.now();
    const chunks = await this.retrieve(question, topK);
    this.checkBudget('retrieval', Date.now() - retrievalStart, LATENCY_BUDGETS.RETRIEVAL);

    // ===== STAGE 3: GROUNDED GENERATION + SCORING =====
    const generationStart = Date.now();
    const generation = await this.generate(question, chunks, 'grounded');
    this.checkBudget('generation', Date.now() - generationStart, LATENCY_BUDGETS.GENERATION);

    const score = this.scorer({
      answer: generation.text,
      chunks,
      mode: 'grounded',
      selfReportedCertainty: generation.certainty,
    });

    // ===== STAGE 4: THRESHOLD DECISION =====
    const offerFallback = this.shouldOfferFallback(score);
    const totalLatency = Date.now() - startTime;
    this.checkBudget('total', totalLatency, LATENCY_BUDGETS.TOTAL);

    logger.info(
      { questionKey, score, chunksUsed: chunks.length, offerFallback, latency: totalLatency },
      'Local answer produced'
    );

    return freezeResult({
      question,
      answer: generation.text,
      confidenceScore: score,
      source: 'local_db',
      sources: chunks.map(toSourceRef),
      offerFallback,
      savedToStore: false,
    });
  }

  async answerWithFallback(question: string, saveIfConfident: boolean): Promise<AnswerResult> {
    const { store, thresholds } = this.deps;
    const startTime = Date.now();
    const questionKey = normalizeQuestion(question);

    // ===== STAGE 1: UNGROUNDED GENERATION + SCORING =====
    const generation = await this.generate(question, [], 'ungrounded');
    this.checkBudget('generation', Date.now() - startTime, LATENCY_BUDGETS.GENERATION);

    const score = this.scorer({
      answer: generation.text,
      chunks: [],
      mode: 'ungrounded',
      selfReportedCertainty: generation.certainty,
    });

    // ===== STAGE 2: CONDITIONAL LEARNING =====
    let savedToStore = false;
    if (saveIfConfident && score >= thresholds.learnThreshold) {
      try {
        await store.upsert(question, generation.text, score, 'internet');
        savedToStore = true;
      } catch (error) {
        // Failing to cache is not failing to answer
        logger.error({ error: describeError(error), questionKey, score }, 'Saving learned answer failed');
      }
    }

    logger.info(
      { questionKey, score, saveIfConfident, savedToStore, latency: Date.now() - startTime },
      'Fallback answer produced'
    );

    return freezeResult({
      question,
      answer: generation.text,
      confidenceScore: score,
      source: 'internet',
      sources: [],
      offerFallback: false,
      savedToStore,
    });
  }

  private async retrieve(question: string, topK: number): Promise<RetrievedChunk[]> {
    try {
      return await this.deps.retrieval.search(question, topK);
    } catch (error) {
      logger.error({ error: describeError(error) }, 'Retrieval failed');
      if (error instanceof RetrievalFailure) throw error;
      throw new RetrievalFailure(`Retrieval failed: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Empty text counts as a generation failure: the scorer never sees it.
   */
  private async generate(
    question: string,
    context: RetrievedChunk[],
    mode: GenerationMode
  ): Promise<Generation> {
    let generation: Generation;
    try {
      generation = await this.deps.generator.generate({ question, context, mode });
    } catch (error) {
      logger.error({ error: describeError(error), mode }, 'Generation failed');
      if (error instanceof GenerationFailure) throw error;
      throw new GenerationFailure(`Generation failed: ${describeError(error)}`, { cause: error });
    }

    if (generation.text.trim() === '') {
      logger.error({ mode }, 'Generation returned empty text');
      throw new GenerationFailure('Generation returned an empty answer');
    }
    return generation;
  }

  private checkBudget(stage: string, latency: number, budget: number): void {
    const { exceeded, violation } = checkLatencyBudget(latency, budget, stage);
    if (exceeded) {
      logger.warn({ stage, latency, budget }, violation ?? `${stage} exceeded latency budget`);
    }
  }
}
