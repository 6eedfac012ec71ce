import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { LearnedAnswerAdmin } from '../services/learnedAnswers';

/**
 * Learned Answer Routes (admin)
 *
 * Endpoints:
 * - GET /api/v1/learned        - Most recent learned answers
 * - GET /api/v1/learned/stats  - Count and average confidence
 * - DELETE /api/v1/learned     - Forget the answer for a question
 */

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).optional().default(100),
});

const DeleteBodySchema = z.object({
  question: z.string().trim().min(1).max(1000),
});

export interface LearnedRoutesOptions {
  learned: LearnedAnswerAdmin;
}

export const learnedRoutes: FastifyPluginAsync<LearnedRoutesOptions> = async (fastify, { learned }) => {
  fastify.get('/', async (request, reply) => {
    const validation = ListQuerySchema.safeParse(request.query);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid query parameters',
        details: validation.error.issues,
      });
    }

    try {
      const entries = await learned.list(validation.data.limit);
      return { count: entries.length, entries };
    } catch (error) {
      fastify.log.error({ error }, 'Failed to list learned answers');
      return reply.code(500).send({ error: 'Failed to list learned answers' });
    }
  });

  fastify.get('/stats', async (request, reply) => {
    try {
      return await learned.stats();
    } catch (error) {
      fastify.log.error({ error }, 'Failed to fetch learned answer stats');
      return reply.code(500).send({ error: 'Failed to fetch learned answer stats' });
    }
  });

  fastify.delete('/', async (request, reply) => {
    const validation = DeleteBodySchema.safeParse(request.body);
    if (!validation.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        details: validation.error.issues,
      });
    }

    try {
      const deleted = await learned.remove(validation.data.question);
      if (!deleted) {
        return reply.code(404).send({ error: 'Learned answer not found' });
      }
      return { deleted: true };
    } catch (error) {
      fastify.log.error({ error }, 'Failed to delete learned answer');
      return reply.code(500).send({ error: 'Failed to delete learned answer' });
    }
  });
};
