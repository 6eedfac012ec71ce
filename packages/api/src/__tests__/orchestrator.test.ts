import { describe, expect, it, vi } from 'vitest';
import type { Thresholds } from '@smart-rag/shared';
import { GenerationFailure, RetrievalFailure, StoreFailure } from '../errors';
import type { ConfidenceScorer } from '../services/confidence';
import { InMemoryLearnedAnswerStore, type LearnedAnswerStore } from '../services/learnedAnswers';
import { QueryOrchestrator } from '../services/orchestrator';
import {
  FakeGenerator,
  FakeRetrieval,
  LECTURE_ANSWER,
  LECTURE_CHUNKS,
  REFUSAL_ANSWER,
} from './fakes';

const THRESHOLDS: Thresholds = { offerThreshold: 60, returnThreshold: 60, learnThreshold: 90 };

function setup(options: {
  retrieval?: FakeRetrieval;
  generator?: FakeGenerator;
  store?: LearnedAnswerStore;
  scorer?: ConfidenceScorer;
  thresholds?: Thresholds;
} = {}) {
  const retrieval = options.retrieval ?? new FakeRetrieval();
  const generator =
    options.generator ??
    new FakeGenerator({
      grounded: { text: REFUSAL_ANSWER },
      ungrounded: { text: 'Quantum computing uses qubits.' },
    });
  const store = options.store ?? new InMemoryLearnedAnswerStore();
  const orchestrator = new QueryOrchestrator({
    store,
    retrieval,
    generator,
    thresholds: options.thresholds ?? THRESHOLDS,
    topK: 5,
    scorer: options.scorer,
  });
  return { orchestrator, retrieval, generator, store };
}

const fixedScore = (score: number): ConfidenceScorer => () => score;

describe('QueryOrchestrator.answerLocally', () => {
  it('answers from an empty index with low confidence and offers the fallback', async () => {
    const { orchestrator, retrieval, generator } = setup();

    const result = await orchestrator.answerLocally('What is quantum computing?');

    expect(result.source).toBe('local_db');
    expect(result.sources).toEqual([]);
    expect(result.confidenceScore).toBe(5);
    expect(result.offerFallback).toBe(true);
    expect(result.savedToStore).toBe(false);
    expect(retrieval.calls).toEqual([{ question: 'What is quantum computing?', k: 5 }]);
    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0].mode).toBe('grounded');
    expect(generator.calls[0].context).toEqual([]);
  });

  it('returns a well-supported local answer without offering the fallback', async () => {
    const { orchestrator } = setup({
      retrieval: new FakeRetrieval(LECTURE_CHUNKS),
      generator: new FakeGenerator({ grounded: { text: LECTURE_ANSWER } }),
    });

    const result = await orchestrator.answerLocally('What is gradient descent?');

    expect(result.source).toBe('local_db');
    expect(result.confidenceScore).toBeGreaterThanOrEqual(80);
    expect(result.offerFallback).toBe(false);
    expect(result.sources.map((s) => s.file)).toEqual(['lecture.pdf', 'lecture.pdf', 'lecture.pdf']);
    expect(result.sources.map((s) => s.chunkId)).toEqual(['c1', 'c2', 'c3']);
    expect(result.sources[1]).toEqual({
      chunkId: 'c2',
      documentId: 'doc-lecture.pdf',
      file: 'lecture.pdf',
      score: 0.88,
      rank: 2,
      snippet: LECTURE_CHUNKS[1].content,
    });
  });

  it('passes retrieved chunks to grounded generation', async () => {
    const { orchestrator, generator } = setup({
      retrieval: new FakeRetrieval(LECTURE_CHUNKS),
      generator: new FakeGenerator({ grounded: { text: LECTURE_ANSWER } }),
    });

    await orchestrator.answerLocally('What is gradient descent?');

    expect(generator.calls[0]).toEqual({
      question: 'What is gradient descent?',
      context: LECTURE_CHUNKS,
      mode: 'grounded',
    });
  });

  it('offers the fallback below the offer threshold only', async () => {
    const below = setup({ scorer: fixedScore(59) });
    const at = setup({ scorer: fixedScore(60) });

    expect((await below.orchestrator.answerLocally('q')).offerFallback).toBe(true);
    expect((await at.orchestrator.answerLocally('q')).offerFallback).toBe(false);
  });

  it('decides the offer from the offer threshold alone', async () => {
    const thresholds = { offerThreshold: 60, returnThreshold: 80, learnThreshold: 90 };

    const below = setup({ scorer: fixedScore(59), thresholds });
    const at = setup({ scorer: fixedScore(60), thresholds });
    const returned = setup({ scorer: fixedScore(80), thresholds });

    expect((await below.orchestrator.answerLocally('q')).offerFallback).toBe(true);
    expect((await at.orchestrator.answerLocally('q')).offerFallback).toBe(false);
    expect((await returned.orchestrator.answerLocally('q')).offerFallback).toBe(false);
  });

  it('never writes to the store from the local path', async () => {
    const store = new InMemoryLearnedAnswerStore();
    const upsert = vi.spyOn(store, 'upsert');
    const { orchestrator } = setup({ store, scorer: fixedScore(30) });

    const result = await orchestrator.answerLocally('What is quantum computing?');

    expect(result.offerFallback).toBe(true);
    expect(upsert).not.toHaveBeenCalled();
    expect(await store.lookup('What is quantum computing?')).toBeNull();
  });

  it('answers a learned question without retrieval or generation', async () => {
    const store = new InMemoryLearnedAnswerStore();
    await store.upsert('What is ML?', 'Machine learning is ...', 93, 'internet');
    const { orchestrator, retrieval, generator } = setup({ store });

    const result = await orchestrator.answerLocally('what is ml');

    expect(result).toEqual({
      question: 'what is ml',
      answer: 'Machine learning is ...',
      confidenceScore: 93,
      source: 'learned',
      sources: [],
      offerFallback: false,
      savedToStore: false,
    });
    expect(retrieval.calls).toHaveLength(0);
    expect(generator.calls).toHaveLength(0);
  });

  it('leaves the store untouched on a learned hit', async () => {
    const store = new InMemoryLearnedAnswerStore();
    await store.upsert('What is ML?', 'Machine learning is ...', 93, 'internet');
    const before = await store.lookup('What is ML?');
    const upsert = vi.spyOn(store, 'upsert');
    const { orchestrator } = setup({ store });

    const result = await orchestrator.answerLocally('What is ML?');

    expect(result.source).toBe('learned');
    expect(upsert).not.toHaveBeenCalled();
    expect(await store.lookup('What is ML?')).toEqual(before);
  });

  it('treats a failing lookup as a miss', async () => {
    const store = new InMemoryLearnedAnswerStore();
    vi.spyOn(store, 'lookup').mockRejectedValue(new StoreFailure('db down'));
    const { orchestrator, retrieval } = setup({ store });

    const result = await orchestrator.answerLocally('What is quantum computing?');

    expect(result.source).toBe('local_db');
    expect(retrieval.calls).toHaveLength(1);
  });

  it('surfaces retrieval faults instead of answering without context', async () => {
    const { orchestrator, generator } = setup({
      retrieval: new FakeRetrieval([], new Error('connection refused')),
    });

    await expect(orchestrator.answerLocally('q')).rejects.toBeInstanceOf(RetrievalFailure);
    expect(generator.calls).toHaveLength(0);
  });

  it('surfaces generation faults', async () => {
    const { orchestrator } = setup({
      generator: new FakeGenerator().failWith(new Error('rate limited')),
    });

    await expect(orchestrator.answerLocally('q')).rejects.toBeInstanceOf(GenerationFailure);
  });

  it('treats empty generated text as a generation failure without scoring it', async () => {
    const scorer = vi.fn(fixedScore(50));
    const { orchestrator } = setup({
      generator: new FakeGenerator({ grounded: { text: '   ' } }),
      scorer,
    });

    await expect(orchestrator.answerLocally('q')).rejects.toBeInstanceOf(GenerationFailure);
    expect(scorer).not.toHaveBeenCalled();
  });

  it('returns a frozen result', async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.answerLocally('q');

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.sources)).toBe(true);
  });
});

describe('QueryOrchestrator.answerWithFallback', () => {
  it('generates without context and never re-offers the fallback', async () => {
    const { orchestrator, generator, retrieval } = setup({ scorer: fixedScore(75) });

    const result = await orchestrator.answerWithFallback('What is quantum computing?', true);

    expect(result).toEqual({
      question: 'What is quantum computing?',
      answer: 'Quantum computing uses qubits.',
      confidenceScore: 75,
      source: 'internet',
      sources: [],
      offerFallback: false,
      savedToStore: false,
    });
    expect(generator.calls).toEqual([
      { question: 'What is quantum computing?', context: [], mode: 'ungrounded' },
    ]);
    expect(retrieval.calls).toHaveLength(0);
  });

  it('leaves the store unchanged just below the learn threshold', async () => {
    const { orchestrator, store } = setup({ scorer: fixedScore(89) });

    const result = await orchestrator.answerWithFallback('What is quantum computing?', true);

    expect(result.savedToStore).toBe(false);
    expect(await store.lookup('What is quantum computing?')).toBeNull();
  });

  it('learns the answer at the learn threshold', async () => {
    const { orchestrator, store } = setup({ scorer: fixedScore(90) });

    const result = await orchestrator.answerWithFallback('What is quantum computing?', true);

    expect(result.savedToStore).toBe(true);
    const entry = await store.lookup('what is quantum computing');
    expect(entry?.answer).toBe('Quantum computing uses qubits.');
    expect(entry?.confidenceScore).toBe(90);
    expect(entry?.source).toBe('internet');
  });

  it('skips learning when not asked to save, whatever the score', async () => {
    const store = new InMemoryLearnedAnswerStore();
    const upsert = vi.spyOn(store, 'upsert');
    const { orchestrator } = setup({ store, scorer: fixedScore(100) });

    const result = await orchestrator.answerWithFallback('What is quantum computing?', false);

    expect(result.savedToStore).toBe(false);
    expect(upsert).not.toHaveBeenCalled();
  });

  it('still returns the answer when saving fails', async () => {
    const store = new InMemoryLearnedAnswerStore();
    vi.spyOn(store, 'upsert').mockRejectedValue(new StoreFailure('disk full'));
    const { orchestrator } = setup({ store, scorer: fixedScore(95) });

    const result = await orchestrator.answerWithFallback('What is quantum computing?', true);

    expect(result.answer).toBe('Quantum computing uses qubits.');
    expect(result.confidenceScore).toBe(95);
    expect(result.savedToStore).toBe(false);
  });

  it('surfaces generation faults', async () => {
    const { orchestrator, store } = setup({
      generator: new FakeGenerator().failWith(new GenerationFailure('timeout')),
      scorer: fixedScore(95),
    });

    await expect(orchestrator.answerWithFallback('q', true)).rejects.toThrow('timeout');
    expect(await store.lookup('q')).toBeNull();
  });

  it('replays a learned fallback answer on the next local query', async () => {
    const scorer: ConfidenceScorer = (input) => (input.mode === 'ungrounded' ? 92 : 5);
    const { orchestrator, retrieval, generator } = setup({ scorer });

    const local = await orchestrator.answerLocally('What is quantum computing?');
    expect(local.offerFallback).toBe(true);

    const fallback = await orchestrator.answerWithFallback('What is quantum computing?', true);
    expect(fallback.source).toBe('internet');
    expect(fallback.savedToStore).toBe(true);

    const retrievalCalls = retrieval.calls.length;
    const generationCalls = generator.calls.length;

    const replay = await orchestrator.answerLocally('  what is QUANTUM computing ');
    expect(replay.source).toBe('learned');
    expect(replay.confidenceScore).toBe(92);
    expect(replay.answer).toBe('Quantum computing uses qubits.');
    expect(retrieval.calls).toHaveLength(retrievalCalls);
    expect(generator.calls).toHaveLength(generationCalls);
  });
});
