/**
 * Shared constants for Grounded QA.
 */

export const RETRIEVAL_DEFAULTS = {
  TOP_K: 5,
  MIN_SCORE: 0.35,
  MIN_CANDIDATE_POOL: 25,
  POOL_MULTIPLIER: 10,
} as const;

export const CONTEXT_DEFAULTS = {
  MAX_CONTEXT_CHARS: 6000,
  UNKNOWN_SECTION: 'Unknown section',
  UNKNOWN_PAGE: '?',
} as const;

export const REQUEST_DEFAULTS = {
  MAX_QUESTION_CHARS: 2000,
  UPSTREAM_TIMEOUT_MS: 20000,
} as const;

export const EMBEDDING_DEFAULTS = {
  MODEL: 'nomic-embed-text',
  DIMENSIONS: 768,
  CACHE_TTL: 86400, // 24 hours
  CACHE_TIMEOUT_MS: 500,
} as const;

// Matched case-insensitively anywhere in a chunk's text.
export const DEFAULT_INSTRUCTION_SIGNATURES: readonly string[] = [
  'ignore previous',
  'system:',
  'assistant:',
  'you are an ai',
];

export const REFUSAL_MESSAGE =
  'The corpus does not contain enough trustworthy evidence to answer this question.';

/**
 * Candidate pool fetched from the store before thresholding, so weak top hits
 * do not starve the final result count.
 */
export function defaultCandidatePool(topK: number): number {
  return Math.max(RETRIEVAL_DEFAULTS.MIN_CANDIDATE_POOL, topK * RETRIEVAL_DEFAULTS.POOL_MULTIPLIER);
}
