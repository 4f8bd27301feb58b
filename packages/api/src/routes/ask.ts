import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { z } from 'zod';
import {
  REFUSAL_MESSAGE,
  type AskRequest,
  type ErrorResponse,
  type FailureKind,
  type RefusalResponse,
  type RejectionKind,
} from '@grounded-qa/shared';
import type { GroundedAnswerOrchestrator } from '../services/orchestrator';

const AskRequestSchema: z.ZodType<AskRequest> = z.object({
  question: z.string(),
});

const REJECTION_STATUS: Record<RejectionKind, number> = {
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  TOO_LARGE: 413,
};

const FAILURE_STATUS: Record<FailureKind, number> = {
  UPSTREAM_TIMEOUT: 504,
  UPSTREAM_ERROR: 502,
  CONFIGURATION_ERROR: 500,
};

export interface AskRouteOptions {
  orchestrator: GroundedAnswerOrchestrator;
}

/**
 * Credential from x-api-key, or Authorization: Bearer <key>.
 */
export function extractCredential(request: FastifyRequest): string | undefined {
  const headerKey = request.headers['x-api-key'];
  const apiKey = Array.isArray(headerKey) ? headerKey[0] : headerKey;
  if (apiKey?.trim()) {
    return apiKey.trim();
  }

  const authHeader = request.headers.authorization;
  if (authHeader?.toLowerCase().startsWith('bearer ')) {
    return authHeader.slice(7).trim();
  }

  return undefined;
}

export const askRoutes: FastifyPluginAsync<AskRouteOptions> = async (fastify, { orchestrator }) => {
  /**
   * POST /api/v1/ask
   * Grounded question answering
   *
   * 200 answer + citations, 422 refusal, 4xx rejected input,
   * 502/504 upstream failure, 500 misconfiguration.
   */
  fastify.post('/', async (request, reply) => {
    const validation = AskRequestSchema.safeParse(request.body);

    if (!validation.success) {
      const body: ErrorResponse = {
        error: 'BAD_REQUEST',
        message: 'Body must be {"question": string}',
      };
      return reply.code(400).send(body);
    }

    const outcome = await orchestrator.answer({
      question: validation.data.question,
      credential: extractCredential(request),
    });

    switch (outcome.status) {
      case 'success':
        return reply.code(200).send(outcome.response);

      case 'refused': {
        const body: RefusalResponse = {
          error: 'REFUSED',
          reason: outcome.reason,
          message: REFUSAL_MESSAGE,
          requestId: outcome.requestId,
        };
        return reply.code(422).send(body);
      }

      case 'rejected': {
        const body: ErrorResponse = {
          error: outcome.kind,
          message: outcome.message,
          requestId: outcome.requestId,
        };
        return reply.code(REJECTION_STATUS[outcome.kind]).send(body);
      }

      case 'failed': {
        const body: ErrorResponse = {
          error: outcome.kind,
          message: outcome.message,
          requestId: outcome.requestId,
        };
        return reply.code(FAILURE_STATUS[outcome.kind]).send(body);
      }
    }
  });
};
