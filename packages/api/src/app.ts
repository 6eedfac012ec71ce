import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { generateRequestId } from '@smart-rag/shared';
import { healthRoutes, type HealthCheck } from './routes/health';
import { learnedRoutes } from './routes/learned';
import { queryRoutes } from './routes/query';
import type { LearnedAnswerAdmin } from './services/learnedAnswers';
import type { QueryOrchestrator } from './services/orchestrator';

export interface AppDeps {
  orchestrator: QueryOrchestrator;
  learned: LearnedAnswerAdmin;
  logger: FastifyBaseLogger;
  corsOrigins: string[];
  healthChecks?: Record<string, HealthCheck>;
}

/**
 * Assemble the HTTP service from already-built dependencies.
 * Nothing here opens connections, so tests can drive it with inject().
 */
export async function buildApp(deps: AppDeps) {
  const fastify = Fastify({
    logger: deps.logger,
    requestIdLogLabel: 'reqId',
    requestIdHeader: 'x-request-id',
    genReqId: () => generateRequestId(),
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: deps.corsOrigins,
    credentials: true,
  });

  await fastify.register(healthRoutes, { prefix: '/health', checks: deps.healthChecks ?? {} });
  await fastify.register(queryRoutes, { prefix: '/api/v1/query', orchestrator: deps.orchestrator });
  await fastify.register(learnedRoutes, { prefix: '/api/v1/learned', learned: deps.learned });

  return fastify;
}
