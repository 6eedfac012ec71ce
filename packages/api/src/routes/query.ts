import type { FastifyBaseLogger, FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { FallbackQueryResponse, LocalQueryResponse } from '@smart-rag/shared';
import { GenerationFailure, RetrievalFailure } from '../errors';
import type { QueryOrchestrator } from '../services/orchestrator';

const LocalQuerySchema = z.object({
  question: z.string().trim().min(1).max(1000),
  topK: z.number().int().positive().max(50).optional(),
});

const FallbackQuerySchema = z.object({
  question: z.string().trim().min(1).max(1000),
  save_if_confident: z.boolean().optional().default(true),
});

export interface QueryRoutesOptions {
  orchestrator: QueryOrchestrator;
}

/**
 * Translate pipeline failures into client-facing errors.
 */
function replyWithFailure(
  reply: FastifyReply,
  log: FastifyBaseLogger,
  requestId: string,
  error: unknown
): FastifyReply {
  if (error instanceof RetrievalFailure) {
    log.error({ requestId, error: error.message }, 'Retrieval failed');
    return reply.code(503).send({ error: 'Retrieval service failed', code: error.code, requestId });
  }
  if (error instanceof GenerationFailure) {
    log.error({ requestId, error: error.message }, 'Generation failed');
    return reply.code(503).send({ error: 'Generation service failed', code: error.code, requestId });
  }
  log.error({ requestId, error }, 'Query processing failed');
  return reply.code(500).send({ error: 'Internal server error', requestId });
}

export const queryRoutes: FastifyPluginAsync<QueryRoutesOptions> = async (fastify, { orchestrator }) => {
  /**
   * POST /api/v1/query
   * Answer from learned answers or local documents.
   * `offer_internet` tells the client a general-knowledge fallback is worth offering.
   */
  fastify.post('/', async (request, reply) => {
    const startTime = Date.now();
    const requestId = request.id;

    const validation = LocalQuerySchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
        requestId,
      });
    }

    const { question, topK } = validation.data;
    fastify.log.info({ requestId, question }, 'Processing local query');

    try {
      const result = await orchestrator.answerLocally(question, topK);

      const response: LocalQueryResponse = {
        requestId,
        question,
        answer: result.answer,
        confidence_score: result.confidenceScore,
        source: result.source,
        offer_internet: result.offerFallback,
        sources: [...result.sources],
        latencyMs: Date.now() - startTime,
      };
      return response;
    } catch (error) {
      return replyWithFailure(reply, fastify.log, requestId, error);
    }
  });

  /**
   * POST /api/v1/query/internet
   * Explicit general-knowledge fallback; confident answers are memorized
   * unless `save_if_confident` is false.
   */
  fastify.post('/internet', async (request, reply) => {
    const startTime = Date.now();
    const requestId = request.id;

    const validation = FallbackQuerySchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
        requestId,
      });
    }

    const { question, save_if_confident } = validation.data;
    fastify.log.info({ requestId, question, save_if_confident }, 'Processing fallback query');

    try {
      const result = await orchestrator.answerWithFallback(question, save_if_confident);

      const response: FallbackQueryResponse = {
        requestId,
        question,
        answer: result.answer,
        confidence_score: result.confidenceScore,
        source: result.source,
        saved_to_store: result.savedToStore,
        latencyMs: Date.now() - startTime,
      };
      return response;
    } catch (error) {
      return replyWithFailure(reply, fastify.log, requestId, error);
    }
  });
};
