/**
 * Core types for Grounded QA.
 * Shared between the API service and any client of it.
 */

/**
 * One retrievable span of a source document.
 * Written once by ingestion; the query path only ever reads it.
 */
export interface Chunk {
  id: string;
  documentId: string;
  source: string;               // Human-readable document name
  section: string | null;
  pageStart: number | null;
  pageEnd: number | null;
  text: string;
  version: string;              // Corpus version / authority tag
}

/**
 * A chunk plus its similarity to the query (1 - cosine distance).
 * Nominally 0..1, but unbounded below.
 */
export interface ScoredCandidate extends Chunk {
  score: number;
}

/**
 * Provenance header for an included chunk, e.g. "[manual.pdf | Safety | p12]".
 */
export type Citation = string;

export type RefusalReason = 'EMPTY_RETRIEVAL' | 'CONTEXT_BLOCKED';

export type RejectionKind = 'BAD_REQUEST' | 'UNAUTHORIZED' | 'TOO_LARGE';

export type FailureKind = 'UPSTREAM_TIMEOUT' | 'UPSTREAM_ERROR' | 'CONFIGURATION_ERROR';

export type PipelineStage = 'embedding' | 'retrieval' | 'generation';

export interface AskRequest {
  question: string;
}

export interface AskResponse {
  requestId: string;
  latencyMs: number;
  model: string;
  docVersion: string;
  answer: string;
  citations: Citation[];
  retrievalCount: number;       // Observability only, not a stable contract
}

export interface RefusalResponse {
  error: 'REFUSED';
  reason: RefusalReason;
  message: string;
  requestId: string;
}

export interface ErrorResponse {
  error: RejectionKind | FailureKind | 'INTERNAL_ERROR';
  message: string;
  requestId?: string;
}

export interface HealthResponse {
  ok: true;
  status: 'ok';
  timestamp: string;
  service: string;
  version: string;
}

export interface ReadinessResponse {
  status: 'ready' | 'degraded';
  checks: Record<string, 'ok' | 'down' | 'disabled'>;
}
