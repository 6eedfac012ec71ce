import type { FastifyPluginAsync } from 'fastify';

export type HealthCheck = () => Promise<boolean>;

export interface HealthRoutesOptions {
  checks: Record<string, HealthCheck>;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { checks }) => {
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'smart-rag-api',
      version: '0.1.0',
    };
  });

  fastify.get('/ready', async (request, reply) => {
    const names = Object.keys(checks);
    const outcomes = await Promise.all(names.map((name) => checks[name]().catch(() => false)));

    const results: Record<string, 'ok' | 'failing'> = {};
    names.forEach((name, idx) => {
      results[name] = outcomes[idx] ? 'ok' : 'failing';
    });

    const ready = outcomes.every(Boolean);
    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'not_ready',
      checks: results,
    });
  });
};
