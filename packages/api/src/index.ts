import type { FastifyInstance } from 'fastify';
import { buildApp } from './app';
import { loadConfig, type AppConfig } from './config';
import { ConfigurationError } from './errors';
import {
  InMemoryLearnedAnswerStore,
  PostgresLearnedAnswerStore,
  type ManagedLearnedAnswerStore,
} from './services/learnedAnswers';
import { LlmGenerator } from './services/generation';
import { QueryOrchestrator } from './services/orchestrator';
import { PgVectorRetrieval } from './services/retrieval';
import { checkDatabaseHealth, createSql, type Sql } from './utils/db';
import { EmbeddingClient } from './utils/embeddings';
import { createLLMClient } from './utils/llm';
import { logger } from './utils/logger';
import { checkRedisHealth, createRedis } from './utils/redis';

let app: FastifyInstance | undefined;
let closeResources: (() => Promise<void>) | undefined;

function createLearnedStore(config: AppConfig, sql: Sql): ManagedLearnedAnswerStore {
  if (config.learnedStore === 'memory') {
    logger.warn('Using in-memory learned answer store; learned answers are lost on restart');
    return new InMemoryLearnedAnswerStore();
  }
  return new PostgresLearnedAnswerStore(sql);
}

async function start() {
  try {
    // Fatal on bad thresholds or missing credentials, before anything listens
    const config = loadConfig();
    logger.info({ thresholds: config.thresholds, topK: config.rag.topK }, 'Configuration loaded');

    const llm = createLLMClient(config.llm);
    logger.info({ provider: config.llm.provider, model: llm.model }, 'LLM configured');

    const sql = createSql(config.database);
    const redis = createRedis(config.redis);
    const store = createLearnedStore(config, sql);

    const orchestrator = new QueryOrchestrator({
      store,
      retrieval: new PgVectorRetrieval(sql, new EmbeddingClient(config.embeddings, redis), config.rag.maxPerFile),
      generator: new LlmGenerator(llm, config.rag.maxAnswerTokens),
      thresholds: config.thresholds,
      topK: config.rag.topK,
    });

    app = await buildApp({
      orchestrator,
      learned: store,
      logger,
      corsOrigins: config.corsOrigins,
      healthChecks: {
        database: () => checkDatabaseHealth(sql),
        redis: () => checkRedisHealth(redis),
      },
    });

    closeResources = async () => {
      await sql.end({ timeout: 5 });
      redis.disconnect();
    };

    await app.listen({ port: config.port, host: config.host });

    logger.info(`API server running at http://${config.host}:${config.port}`);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.fatal({ err }, 'Invalid configuration');
    } else {
      logger.error({ err }, 'Failed to start server');
    }
    process.exit(1);
  }
}

// Graceful shutdown
const shutdown = async (signal: string) => {
  logger.info(`${signal} received, shutting down gracefully...`);
  try {
    await app?.close();
    await closeResources?.();
  } catch (err) {
    logger.error({ err }, 'Error during shutdown');
  }
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

void start();
