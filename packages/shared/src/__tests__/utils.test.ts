import { describe, expect, it } from 'vitest';
import {
  analyzeQuestionType,
  checkLatencyBudget,
  ensureFileDiversity,
  generateRequestId,
  normalizeQuestion,
  rankChunks,
} from '../utils';

describe('normalizeQuestion', () => {
  it('folds case, punctuation and whitespace', () => {
    expect(normalizeQuestion('What is ML?')).toBe('what is ml');
    expect(normalizeQuestion('  what   is\tml  ')).toBe('what is ml');
    expect(normalizeQuestion('What is ML?')).toBe(normalizeQuestion('what is ml'));
  });

  it('treats apostrophes and dashes as separators', () => {
    expect(normalizeQuestion('What’s new—today?')).toBe('what s new today');
    expect(normalizeQuestion("What's new - today")).toBe('what s new today');
  });

  it('keeps non-latin letters and digits', () => {
    expect(normalizeQuestion('Qu’est-ce que l’IA en 2024 ?')).toBe('qu est ce que l ia en 2024');
  });
});

describe('rankChunks', () => {
  it('orders by score and breaks ties by chunk id', () => {
    const ranked = rankChunks([
      { chunkId: 'b', documentId: 'd', file: 'f', content: '', score: 0.5 },
      { chunkId: 'a', documentId: 'd', file: 'f', content: '', score: 0.5 },
      { chunkId: 'c', documentId: 'd', file: 'f', content: '', score: 0.9 },
    ]);

    expect(ranked.map((c) => [c.chunkId, c.rank])).toEqual([
      ['c', 1],
      ['a', 2],
      ['b', 3],
    ]);
  });
});

describe('rankChunks with missing similarities', () => {
  it('sorts NaN scores after every number', () => {
    const ranked = rankChunks([
      { chunkId: 'n', documentId: 'd', file: 'f', content: '', score: Number.NaN },
      { chunkId: 'low', documentId: 'd', file: 'f', content: '', score: -0.2 },
      { chunkId: 'high', documentId: 'd', file: 'f', content: '', score: 0.7 },
    ]);

    expect(ranked.map((c) => [c.chunkId, c.rank])).toEqual([
      ['high', 1],
      ['low', 2],
      ['n', 3],
    ]);
  });
});

describe('ensureFileDiversity', () => {
  const chunks = [
    { id: 'a1', file: 'A' },
    { id: 'a2', file: 'A' },
    { id: 'a3', file: 'A' },
    { id: 'b1', file: 'B' },
  ];

  it('alternates between files', () => {
    expect(ensureFileDiversity(chunks, 3, 5).map((c) => c.id)).toEqual(['a1', 'b1', 'a2']);
  });

  it('caps chunks per file', () => {
    expect(ensureFileDiversity(chunks, 4, 1).map((c) => c.id)).toEqual(['a1', 'b1']);
  });

  it('keeps a single file in order', () => {
    expect(ensureFileDiversity(chunks.slice(0, 3), 2, 1).map((c) => c.id)).toEqual(['a1', 'a2']);
  });

  it('handles no chunks', () => {
    expect(ensureFileDiversity([], 5, 5)).toEqual([]);
  });
});

describe('analyzeQuestionType', () => {
  it.each([
    ['What is ML?', 'definition'],
    ['How do I reset my password?', 'how_to'],
    ['Compare TCP and UDP', 'comparison'],
    ['Give me a sample query', 'example'],
    ['List the sorting algorithms', 'list'],
    ['Why is the sky blue', 'explanation'],
    ['Hello there', 'other'],
  ])('classifies %s as %s', (question, type) => {
    expect(analyzeQuestionType(question)).toBe(type);
  });
});

describe('checkLatencyBudget', () => {
  it('reports violations only above the budget', () => {
    expect(checkLatencyBudget(200, 200, 'retrieval')).toEqual({ exceeded: false });
    expect(checkLatencyBudget(250, 200, 'retrieval')).toEqual({
      exceeded: true,
      violation: 'retrieval: 250ms exceeded budget of 200ms',
    });
  });
});

describe('generateRequestId', () => {
  it('produces distinct prefixed ids', () => {
    const a = generateRequestId();
    const b = generateRequestId();

    expect(a).toMatch(/^req_\d+_[a-z0-9]+$/);
    expect(a).not.toBe(b);
  });
});
