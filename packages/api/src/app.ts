import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import type { ErrorResponse } from '@grounded-qa/shared';
import type { AppConfig } from './config';
import { askRoutes } from './routes/ask';
import { healthRoutes, type ReadinessChecks } from './routes/health';
import { ContextAssembler } from './services/context';
import { GroundedAnswerOrchestrator } from './services/orchestrator';
import { Retriever } from './services/retrieval';
import { EvidenceSanitizer } from './services/sanitizer';
import type { VectorStore } from './services/vectorStore';
import type { EmbeddingGateway } from './utils/embeddings';
import type { LLMClient } from './utils/llm';
import { loggerOptions, type Logger } from './utils/logger';

export interface PipelineParts {
  store: VectorStore;
  embedder: EmbeddingGateway;
  llm: LLMClient;
  logger: Logger;
  now?: () => number;
}

/**
 * Wire the grounding pipeline from config and its three upstreams.
 */
export function createOrchestrator(config: AppConfig, parts: PipelineParts): GroundedAnswerOrchestrator {
  const sanitizer = new EvidenceSanitizer(config.context.instructionSignatures);

  return new GroundedAnswerOrchestrator(
    {
      embedder: parts.embedder,
      retriever: new Retriever(parts.store, config.retrieval, parts.logger.child({ component: 'retriever' })),
      assembler: new ContextAssembler(sanitizer, config.context.maxContextChars),
      llm: parts.llm,
      logger: parts.logger,
      now: parts.now,
    },
    {
      apiKey: config.gateway.apiKey,
      maxQuestionChars: config.gateway.maxQuestionChars,
      requiredVersion: config.retrieval.requiredVersion,
      retrieval: {
        topK: config.retrieval.topK,
        minScore: config.retrieval.minScore,
        candidatePool: config.retrieval.candidatePool,
      },
    }
  );
}

export interface BuildAppOptions {
  config: AppConfig;
  orchestrator: GroundedAnswerOrchestrator;
  readinessChecks: ReadinessChecks;
}

export async function buildApp({ config, orchestrator, readinessChecks }: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerOptions(config.logging),
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (statusCode < 500) {
      const body: ErrorResponse = {
        error: statusCode === 413 ? 'TOO_LARGE' : 'BAD_REQUEST',
        message: error.message,
      };
      return reply.code(statusCode).send(body);
    }

    request.log.error({ err: error }, 'Unhandled error');
    const body: ErrorResponse = {
      error: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    return reply.code(500).send(body);
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: [...config.corsOrigins],
    credentials: true,
  });

  await fastify.register(healthRoutes, { prefix: '/health', checks: readinessChecks });
  await fastify.register(askRoutes, { prefix: '/api/v1/ask', orchestrator });

  return fastify;
}
