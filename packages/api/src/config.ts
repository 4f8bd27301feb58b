import dotenv from 'dotenv';
import { z } from 'zod';
import {
  CONTEXT_DEFAULTS,
  DEFAULT_INSTRUCTION_SIGNATURES,
  EMBEDDING_DEFAULTS,
  REQUEST_DEFAULTS,
  RETRIEVAL_DEFAULTS,
  defaultCandidatePool,
} from '@grounded-qa/shared';

/**
 * Process-wide configuration, read once at startup.
 *
 * Components never read process.env themselves; they receive the slice
 * of AppConfig they need through their constructor.
 */

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const csv = (fallback: readonly string[]) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? [...fallback]
        : value
            .split(',')
            .map((entry) => entry.trim())
            .filter((entry) => entry.length > 0)
    );

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().default(3000),
    CORS_ORIGINS: csv(['http://localhost:3001']),

    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LOG_PRETTY: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true'),

    // Gateway policy
    API_KEY: optionalString,
    MAX_QUERY_CHARS: z.coerce.number().int().positive().default(REQUEST_DEFAULTS.MAX_QUESTION_CHARS),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(REQUEST_DEFAULTS.UPSTREAM_TIMEOUT_MS),

    // Authority constraint: never defaulted
    DOC_VERSION: z.string({ required_error: 'DOC_VERSION is required' }).trim().min(1, 'DOC_VERSION must not be empty'),

    // Vector store
    DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).trim().min(1, 'DATABASE_URL must not be empty'),
    REDIS_URL: optionalString,
    REDIS_TIMEOUT_MS: z.coerce.number().int().positive().default(EMBEDDING_DEFAULTS.CACHE_TIMEOUT_MS),

    // Providers
    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    EMBEDDING_PROVIDER: z.enum(['ollama', 'openai']).default('ollama'),
    EMBEDDING_MODEL: z.string().min(1).default(EMBEDDING_DEFAULTS.MODEL),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(EMBEDDING_DEFAULTS.DIMENSIONS),
    OPENAI_API_KEY: optionalString,
    LLM_PROVIDER: z.enum(['ollama', 'groq']).default('ollama'),
    LLM_MODEL: z.string().min(1).default('llama3.1:8b'),
    GROQ_API_KEY: optionalString,

    // Retrieval / context policy
    TOP_K: z.coerce.number().int().positive().default(RETRIEVAL_DEFAULTS.TOP_K),
    MIN_SCORE: z.coerce.number().default(RETRIEVAL_DEFAULTS.MIN_SCORE),
    CANDIDATE_POOL: z.coerce.number().int().positive().optional(),
    MAX_CONTEXT_CHARS: z.coerce.number().int().positive().default(CONTEXT_DEFAULTS.MAX_CONTEXT_CHARS),
    INSTRUCTION_SIGNATURES: csv(DEFAULT_INSTRUCTION_SIGNATURES),
  })
  .superRefine((env, ctx) => {
    const pool = env.CANDIDATE_POOL ?? defaultCandidatePool(env.TOP_K);
    if (pool <= env.TOP_K) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CANDIDATE_POOL'],
        message: `CANDIDATE_POOL (${pool}) must be larger than TOP_K (${env.TOP_K})`,
      });
    }
    if (env.EMBEDDING_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when EMBEDDING_PROVIDER=openai',
      });
    }
    if (env.LLM_PROVIDER === 'groq' && !env.GROQ_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GROQ_API_KEY'],
        message: 'GROQ_API_KEY is required when LLM_PROVIDER=groq',
      });
    }
  });

export interface RetrievalConfig {
  requiredVersion: string;
  topK: number;
  minScore: number;
  candidatePool: number;
  dimensions: number;
  timeoutMs: number;
}

export interface ContextConfig {
  maxContextChars: number;
  instructionSignatures: readonly string[];
}

export interface AppConfig {
  env: string;
  host: string;
  port: number;
  corsOrigins: readonly string[];
  logging: {
    level: string;
    pretty: boolean;
  };
  gateway: {
    apiKey?: string;
    maxQuestionChars: number;
  };
  upstreamTimeoutMs: number;
  database: {
    url: string;
  };
  redis: {
    url?: string;
    ttlSeconds: number;
    timeoutMs: number;
  };
  embedding: {
    provider: 'ollama' | 'openai';
    model: string;
    dimensions: number;
    ollamaBaseUrl: string;
    openaiApiKey?: string;
  };
  llm: {
    provider: 'ollama' | 'groq';
    model: string;
    ollamaBaseUrl: string;
    groqApiKey?: string;
  };
  retrieval: RetrievalConfig;
  context: ContextConfig;
}

/**
 * Validate an environment map into a frozen AppConfig.
 * Throws with every offending variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;

  const config: AppConfig = {
    env: e.NODE_ENV,
    host: e.HOST,
    port: e.PORT,
    corsOrigins: Object.freeze(e.CORS_ORIGINS),
    logging: {
      level: e.LOG_LEVEL,
      pretty: e.LOG_PRETTY,
    },
    gateway: {
      apiKey: e.API_KEY,
      maxQuestionChars: e.MAX_QUERY_CHARS,
    },
    upstreamTimeoutMs: e.REQUEST_TIMEOUT_MS,
    database: {
      url: e.DATABASE_URL,
    },
    redis: {
      url: e.REDIS_URL,
      ttlSeconds: EMBEDDING_DEFAULTS.CACHE_TTL,
      timeoutMs: e.REDIS_TIMEOUT_MS,
    },
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
      openaiApiKey: e.OPENAI_API_KEY,
    },
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
      groqApiKey: e.GROQ_API_KEY,
    },
    retrieval: {
      requiredVersion: e.DOC_VERSION,
      topK: e.TOP_K,
      minScore: e.MIN_SCORE,
      candidatePool: e.CANDIDATE_POOL ?? defaultCandidatePool(e.TOP_K),
      dimensions: e.EMBEDDING_DIMENSIONS,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    context: {
      maxContextChars: e.MAX_CONTEXT_CHARS,
      instructionSignatures: Object.freeze(e.INSTRUCTION_SIGNATURES.map((s) => s.toLowerCase())),
    },
  };

  return deepFreeze(config);
}

/**
 * Load .env into process.env, then validate it.
 */
export function loadConfigFromEnv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
