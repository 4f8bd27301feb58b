import { createHash } from 'node:crypto';

/**
 * Shared utility functions for Grounded QA.
 */

/**
 * Request trace id: derived from submission time and question text,
 * so the same submission always maps to the same id.
 */
export function makeRequestId(submittedAt: number, question: string): string {
  return createHash('sha256').update(`${submittedAt}:${question}`, 'utf8').digest('hex').slice(0, 12);
}

/**
 * Format an embedding as a pgvector literal, e.g. "[0.1,0.2]".
 */
export function toVectorLiteral(embedding: readonly number[]): string {
  return `[${embedding.join(',')}]`;
}
