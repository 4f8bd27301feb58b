import type { FastifyPluginAsync } from 'fastify';
import type { HealthResponse, ReadinessResponse } from '@grounded-qa/shared';

/**
 * A null check means the dependency is not configured (reported as disabled).
 */
export type ReadinessChecks = Record<string, (() => Promise<boolean>) | null>;

export interface HealthRouteOptions {
  checks: ReadinessChecks;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, { checks }) => {
  // Liveness: unconditional.
  fastify.get('/', async () => {
    const body: HealthResponse = {
      ok: true,
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'grounded-qa-api',
      version: '0.1.0',
    };
    return body;
  });

  fastify.get('/ready', async (request, reply) => {
    const entries = await Promise.all(
      Object.entries(checks).map(async ([name, check]) => {
        if (!check) {
          return [name, 'disabled'] as const;
        }
        const healthy = await check();
        return [name, healthy ? 'ok' : 'down'] as const;
      })
    );

    const body: ReadinessResponse = {
      status: entries.some(([, state]) => state === 'down') ? 'degraded' : 'ready',
      checks: Object.fromEntries(entries),
    };

    if (body.status === 'degraded') {
      request.log.warn({ checks: body.checks }, 'Readiness check failed');
    }

    return reply.code(body.status === 'ready' ? 200 : 503).send(body);
  });
};
