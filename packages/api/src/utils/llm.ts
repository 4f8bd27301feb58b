import Groq from 'groq-sdk';
import { z } from 'zod';
import type { AppConfig } from '../config';
import { UpstreamError, describeError, isTimeoutError } from './errors';
import type { Logger } from './logger';

/**
 * LLMClient Interface
 *
 * Vendor-agnostic abstraction for answer generation.
 * Allows swapping implementations without touching pipeline logic.
 *
 * Implementations: OllamaClient (default), GroqClient.
 */

export interface GenerationPrompt {
  system: string;
  user: string;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface LLMClient {
  readonly model: string;
  generate(prompt: GenerationPrompt, options?: LLMOptions): Promise<string>;
}

/**
 * Single-string rendering for completion endpoints that take one prompt.
 */
export function composePrompt(prompt: GenerationPrompt): string {
  return `${prompt.system}\n\n${prompt.user}`;
}

const OllamaGenerateSchema = z.object({
  response: z.string(),
});

/**
 * OllamaClient Implementation
 *
 * POST /api/generate with streaming disabled.
 */
export class OllamaClient implements LLMClient {
  constructor(
    private readonly baseUrl: string,
    readonly model: string,
    private readonly timeoutMs: number,
    private readonly logger: Logger,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async generate(prompt: GenerationPrompt, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          prompt: composePrompt(prompt),
          stream: false,
          options: {
            temperature: options.temperature ?? 0,
            ...(options.maxTokens !== undefined && { num_predict: options.maxTokens }),
          },
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new UpstreamError('generation', 'timeout', 'LLM timeout', error);
      }
      throw new UpstreamError('generation', 'unavailable', `LLM error: ${describeError(error)}`, error);
    }

    if (!response.ok) {
      throw new UpstreamError('generation', 'unavailable', `LLM service returned ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new UpstreamError('generation', 'timeout', 'LLM timeout', error);
      }
      throw new UpstreamError('generation', 'malformed', 'LLM response is not JSON', error);
    }

    const parsed = OllamaGenerateSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError('generation', 'malformed', 'Missing response text from LLM');
    }

    this.logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');

    return parsed.data.response.trim();
  }
}

/**
 * GroqClient Implementation
 *
 * Uses Groq chat completions, with the grounding rules as the system
 * message and context + question as the user message.
 */
export class GroqClient implements LLMClient {
  constructor(
    private readonly client: Groq,
    readonly model: string,
    private readonly logger: Logger
  ) {}

  async generate(prompt: GenerationPrompt, options: LLMOptions = {}): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: options.temperature ?? 0,
        max_tokens: options.maxTokens ?? 500,
        stream: false,
      });

      const result = response.choices[0]?.message?.content?.trim() ?? '';

      this.logger.info({ latency: Date.now() - startTime, model: this.model }, 'LLM generation completed');

      return result;
    } catch (error) {
      if (error instanceof Groq.APIConnectionTimeoutError) {
        throw new UpstreamError('generation', 'timeout', 'LLM timeout', error);
      }
      throw new UpstreamError('generation', 'unavailable', `LLM error: ${describeError(error)}`, error);
    }
  }
}

export function createLLMClient(config: AppConfig, logger: Logger): LLMClient {
  const { llm } = config;

  if (llm.provider === 'groq') {
    const client = new Groq({
      apiKey: llm.groqApiKey,
      timeout: config.upstreamTimeoutMs,
      maxRetries: 0,
    });
    logger.info({ provider: 'groq', model: llm.model }, 'LLM client configured');
    return new GroqClient(client, llm.model, logger);
  }

  logger.info({ provider: 'ollama', model: llm.model }, 'LLM client configured');
  return new OllamaClient(llm.ollamaBaseUrl, llm.model, config.upstreamTimeoutMs, logger);
}
