import { createHash } from 'node:crypto';
import OpenAI from 'openai';
import { z } from 'zod';
import type { AppConfig } from '../config';
import { UpstreamError, describeError, isTimeoutError, withTimeout } from './errors';
import type { Logger } from './logger';
import type { EmbeddingCache } from './redis';

/**
 * Embedding Gateway
 *
 * Turns text into a fixed-dimension vector through an external provider.
 * CRITICAL: must use the same model as ingestion, or similarity scores
 * against stored chunk vectors are meaningless.
 *
 * Failures are raised as UpstreamError('embedding', kind) where kind
 * separates timeouts from a missing/malformed vector and other faults.
 */

export interface EmbeddingGateway {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

const OllamaEmbeddingSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

/**
 * Ollama /api/embeddings client.
 */
export class OllamaEmbeddingGateway implements EmbeddingGateway {
  constructor(
    private readonly baseUrl: string,
    readonly model: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async embed(text: string): Promise<number[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/embeddings`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, prompt: text }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new UpstreamError('embedding', 'timeout', 'Embedding timeout', error);
      }
      throw new UpstreamError('embedding', 'unavailable', `Embedding error: ${describeError(error)}`, error);
    }

    if (!response.ok) {
      throw new UpstreamError('embedding', 'unavailable', `Embedding service returned ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new UpstreamError('embedding', 'timeout', 'Embedding timeout', error);
      }
      throw new UpstreamError('embedding', 'malformed', 'Embedding response is not JSON', error);
    }

    const parsed = OllamaEmbeddingSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError('embedding', 'malformed', 'Missing/invalid embedding in provider response');
    }
    return parsed.data.embedding;
  }
}

/**
 * OpenAI embeddings client. SDK retries are disabled; retry policy is
 * not this service's concern.
 */
export class OpenAIEmbeddingGateway implements EmbeddingGateway {
  constructor(
    private readonly client: OpenAI,
    readonly model: string
  ) {}

  async embed(text: string): Promise<number[]> {
    try {
      const response = await this.client.embeddings.create({ model: this.model, input: text });
      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new UpstreamError('embedding', 'malformed', 'Missing/invalid embedding in provider response');
      }
      return embedding;
    } catch (error) {
      if (error instanceof UpstreamError) {
        throw error;
      }
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new UpstreamError('embedding', 'timeout', 'Embedding timeout', error);
      }
      throw new UpstreamError('embedding', 'unavailable', `Embedding error: ${describeError(error)}`, error);
    }
  }
}

/**
 * Read-through cache in front of another gateway.
 *
 * Each cache call is bounded by timeoutMs. Cache faults and expiries never
 * fail a request: they are logged and the provider is called as if the
 * cache were empty.
 */
export class CachedEmbeddingGateway implements EmbeddingGateway {
  constructor(
    private readonly inner: EmbeddingGateway,
    private readonly cache: EmbeddingCache,
    private readonly ttlSeconds: number,
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {}

  get model(): string {
    return this.inner.model;
  }

  async embed(text: string): Promise<number[]> {
    const key = embeddingCacheKey(this.inner.model, text);

    try {
      const cached = await withTimeout(this.cache.get(key), this.timeoutMs);
      if (cached) {
        this.logger.debug({ key }, 'Embedding cache hit');
        return cached;
      }
    } catch (error) {
      this.logger.warn({ err: error }, 'Embedding cache read failed');
    }

    const embedding = await this.inner.embed(text);

    try {
      await withTimeout(this.cache.set(key, embedding, this.ttlSeconds), this.timeoutMs);
    } catch (error) {
      this.logger.warn({ err: error }, 'Embedding cache write failed');
    }

    return embedding;
  }
}

/**
 * Cache key scoped by model, so switching models never serves stale vectors.
 */
export function embeddingCacheKey(model: string, text: string): string {
  const digest = createHash('sha256').update(`${model}\u0000${text}`, 'utf8').digest('hex');
  return `embed:${digest}`;
}

export function createEmbeddingGateway(
  config: AppConfig,
  logger: Logger,
  cache?: EmbeddingCache
): EmbeddingGateway {
  const { embedding } = config;

  let gateway: EmbeddingGateway;
  if (embedding.provider === 'openai') {
    const client = new OpenAI({
      apiKey: embedding.openaiApiKey,
      timeout: config.upstreamTimeoutMs,
      maxRetries: 0,
    });
    gateway = new OpenAIEmbeddingGateway(client, embedding.model);
  } else {
    gateway = new OllamaEmbeddingGateway(embedding.ollamaBaseUrl, embedding.model, config.upstreamTimeoutMs);
  }

  logger.info({ provider: embedding.provider, model: embedding.model, cached: Boolean(cache) }, 'Embedding gateway configured');

  return cache ? new CachedEmbeddingGateway(gateway, cache, config.redis.ttlSeconds, config.redis.timeoutMs, logger) : gateway;
}
