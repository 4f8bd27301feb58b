import { buildApp, createOrchestrator } from './app';
import { loadConfigFromEnv } from './config';
import { PgVectorStore } from './services/vectorStore';
import { checkDatabaseHealth, createSql } from './utils/db';
import { createEmbeddingGateway } from './utils/embeddings';
import { createLLMClient } from './utils/llm';
import { createLogger } from './utils/logger';
import { RedisEmbeddingCache, checkRedisHealth, createRedisClient } from './utils/redis';

async function start() {
  // Configuration faults are fatal before anything connects.
  const config = loadConfigFromEnv();
  const logger = createLogger(config.logging);

  const sql = createSql(config.database.url, Math.ceil(config.upstreamTimeoutMs / 1000));
  const redis = config.redis.url ? createRedisClient(config.redis.url, config.redis.timeoutMs, logger) : null;
  const cache = redis ? new RedisEmbeddingCache(redis, logger) : undefined;

  const orchestrator = createOrchestrator(config, {
    store: new PgVectorStore(sql, config.retrieval.timeoutMs),
    embedder: createEmbeddingGateway(config, logger, cache),
    llm: createLLMClient(config, logger),
    logger,
  });

  const fastify = await buildApp({
    config,
    orchestrator,
    readinessChecks: {
      database: () => checkDatabaseHealth(sql),
      redis: redis ? () => checkRedisHealth(redis) : null,
    },
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      await fastify.close();
      await sql.end({ timeout: 5 });
      await redis?.quit();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await fastify.listen({
    port: config.port,
    host: config.host,
  });

  logger.info(
    { env: config.env, docVersion: config.retrieval.requiredVersion, model: config.llm.model, auth: Boolean(config.gateway.apiKey) },
    `API server running at http://${config.host}:${config.port}`
  );
}

start().catch((err: unknown) => {
  createLogger({ level: 'error', pretty: false }).fatal({ err }, 'Failed to start server');
  process.exit(1);
});
