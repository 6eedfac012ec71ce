import {
  analyzeQuestionType,
  type GenerationMode,
  type QuestionType,
  type RetrievedChunk,
} from '@smart-rag/shared';
import type { LLMClient } from '../utils/llm';
import { logger } from '../utils/logger';
import { describeError, GenerationFailure } from '../errors';

/**
 * Answer Generation Service
 *
 * Two modes:
 * - grounded: answer from retrieved chunks, say so when they fall short
 * - ungrounded: answer from general knowledge (fallback path)
 *
 * Both prompts ask the model to end with a "CONFIDENCE: NN" line; it is
 * parsed into a self-reported certainty and stripped from the answer.
 */

export interface GenerationRequest {
  question: string;
  context: readonly RetrievedChunk[];
  mode: GenerationMode;
}

export interface Generation {
  text: string;
  certainty?: number; // 0-1, model self-report
}

export interface GenerationPort {
  generate(request: GenerationRequest): Promise<Generation>;
}

const ANSWER_GUIDANCE: Record<QuestionType, string> = {
  definition:
    'Provide a clear, concise definition followed by an explanation. Use simple language and examples where available.',
  how_to:
    'Explain the process step by step. Break complex procedures into numbered steps and mention prerequisites.',
  comparison:
    'Highlight key similarities and differences in a structured way (e.g. "X does... while Y does...").',
  example:
    'Give concrete, specific examples and explain why each one illustrates the concept.',
  list: 'Provide a clear, organized list with a brief explanation for each item.',
  explanation:
    'Explain the concept thoroughly with reasoning. Break complex ideas into digestible parts.',
  other: 'Answer the question clearly and completely.',
};

// Final line only; earlier lines belong to the answer
const CONFIDENCE_LINE = /(?:^|\n)[ \t]*confidence[ \t]*[:=][ \t]*(\d{1,3})[ \t]*%?\s*$/i;

const CONFIDENCE_INSTRUCTION =
  'On the final line, rate how confident you are in this answer as "CONFIDENCE: <0-100>".';

/**
 * Split the trailing self-reported confidence line from the answer body.
 */
export function extractSelfReportedConfidence(raw: string): Generation {
  const match = CONFIDENCE_LINE.exec(raw);
  if (!match) {
    return { text: raw.trim() };
  }

  const value = Math.min(100, parseInt(match[1], 10));
  const text = (raw.slice(0, match.index) + raw.slice(match.index + match[0].length)).trim();
  return { text, certainty: value / 100 };
}

export function buildGroundedSystemPrompt(): string {
  return `You are a knowledgeable and precise assistant answering questions about the user's own documents.

RULES:
1. Answer ONLY from the provided context
2. If the context contains partial information, share what you can find
3. If the answer is NOT in the context, say "Based on the provided documents, I don't have enough information to answer this question."
4. Cite the context sections you used (e.g. "According to [1]...")
5. Be specific and avoid vague generalizations`;
}

export function buildUngroundedSystemPrompt(): string {
  return `You are a knowledgeable assistant answering from general knowledge.

RULES:
1. Give an accurate, self-contained answer
2. If you are not sure, say so plainly instead of guessing
3. Be specific and avoid vague generalizations`;
}

export function buildGroundedPrompt(question: string, chunks: readonly RetrievedChunk[]): string {
  const context =
    chunks.length > 0
      ? chunks.map((chunk) => `[${chunk.rank}] (${chunk.file}) ${chunk.content}`).join('\n\n')
      : '(no matching documents)';

  return `CONTEXT FROM UPLOADED DOCUMENTS:
---
${context}
---

GUIDANCE: ${ANSWER_GUIDANCE[analyzeQuestionType(question)]}

QUESTION: ${question}

${CONFIDENCE_INSTRUCTION}

ANSWER:`;
}

export function buildUngroundedPrompt(question: string): string {
  return `GUIDANCE: ${ANSWER_GUIDANCE[analyzeQuestionType(question)]}

QUESTION: ${question}

${CONFIDENCE_INSTRUCTION}

ANSWER:`;
}

export class LlmGenerator implements GenerationPort {
  constructor(
    private readonly llm: LLMClient,
    private readonly maxTokens: number
  ) {}

  async generate({ question, context, mode }: GenerationRequest): Promise<Generation> {
    const startTime = Date.now();
    const grounded = mode === 'grounded';

    let raw: string;
    try {
      raw = await this.llm.generate(
        grounded ? buildGroundedPrompt(question, context) : buildUngroundedPrompt(question),
        {
          system: grounded ? buildGroundedSystemPrompt() : buildUngroundedSystemPrompt(),
          temperature: grounded ? 0.1 : 0.3,
          maxTokens: this.maxTokens,
        }
      );
    } catch (error) {
      throw new GenerationFailure(`LLM call failed: ${describeError(error)}`, { cause: error });
    }

    const generation = extractSelfReportedConfidence(raw);
    if (generation.text === '') {
      throw new GenerationFailure('LLM returned an empty answer');
    }

    logger.info(
      {
        latency: Date.now() - startTime,
        mode,
        chunksUsed: context.length,
        certainty: generation.certainty,
      },
      'Answer generation completed'
    );

    return generation;
  }
}
