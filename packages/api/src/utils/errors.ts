import type { PipelineStage } from '@grounded-qa/shared';

/**
 * Typed failures raised below the orchestrator.
 * Only the orchestrator turns these into caller-visible outcomes.
 */

export type UpstreamFailureKind = 'timeout' | 'unavailable' | 'malformed';

export class UpstreamError extends Error {
  constructor(
    public readonly stage: PipelineStage,
    public readonly kind: UpstreamFailureKind,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'UpstreamError';
  }

  get timedOut(): boolean {
    return this.kind === 'timeout';
  }
}

/**
 * The vector store could not be reached, timed out, or returned rows
 * that do not describe a chunk.
 */
export class StoreUnavailableError extends UpstreamError {
  constructor(kind: UpstreamFailureKind, message: string, cause?: unknown) {
    super('retrieval', kind, message, cause);
    this.name = 'StoreUnavailableError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer. The underlying work is not cancelled;
 * its late result is discarded.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * True for withTimeout() expiry and for fetch rejected by AbortSignal.timeout().
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
