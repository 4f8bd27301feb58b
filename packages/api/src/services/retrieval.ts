import type { ScoredCandidate } from '@grounded-qa/shared';
import type { RetrievalConfig } from '../config';
import { ConfigurationError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import type { VectorStore } from './vectorStore';

/**
 * Retrieval Service
 *
 * Authority-scoped vector retrieval:
 * 1. Version filter: only chunks tagged with the required corpus version are eligible
 * 2. Candidate pool: fetch more than topK so thresholding doesn't starve the result
 * 3. Confidence guardrail: drop candidates scoring below minScore
 * 4. Hard cap: keep at most topK (context window protection)
 *
 * An empty result is not an error; the context assembler turns it into a refusal.
 */

export interface RetrievalOptions {
  topK: number;
  minScore: number;
  candidatePool: number;
}

export interface RetrievalResult {
  candidates: ScoredCandidate[];
  poolCount: number;            // Rows the store returned before filtering
}

export class Retriever {
  constructor(
    private readonly store: VectorStore,
    private readonly config: Pick<RetrievalConfig, 'dimensions'>,
    private readonly logger: Logger
  ) {}

  async retrieve(
    queryVector: readonly number[],
    requiredVersion: string,
    options: RetrievalOptions
  ): Promise<RetrievalResult> {
    if (requiredVersion.trim() === '') {
      throw new ConfigurationError('Required corpus version is empty');
    }
    if (queryVector.length !== this.config.dimensions) {
      throw new ConfigurationError(
        `Query vector has ${queryVector.length} dimensions, corpus expects ${this.config.dimensions}`
      );
    }
    if (options.candidatePool <= options.topK) {
      throw new ConfigurationError(
        `Candidate pool (${options.candidatePool}) must be larger than topK (${options.topK})`
      );
    }

    const startTime = Date.now();

    const pool = await this.store.search({
      vector: queryVector,
      version: requiredVersion,
      poolSize: options.candidatePool,
    });

    const candidates = rankCandidates(pool, requiredVersion, options);

    this.logger.info(
      {
        latency: Date.now() - startTime,
        poolCount: pool.length,
        resultsCount: candidates.length,
        topScores: candidates.map((c) => Math.round(c.score * 10000) / 10000),
      },
      'Vector retrieval completed'
    );

    return { candidates, poolCount: pool.length };
  }
}

/**
 * Version check, stable descending sort, threshold, cap.
 *
 * The version is re-checked here so the authority boundary holds even
 * if a store implementation filters loosely. Array.prototype.sort is
 * stable, so equal scores keep the store's order.
 */
export function rankCandidates(
  pool: readonly ScoredCandidate[],
  requiredVersion: string,
  { topK, minScore }: Pick<RetrievalOptions, 'topK' | 'minScore'>
): ScoredCandidate[] {
  return pool
    .filter((candidate) => candidate.version === requiredVersion)
    .filter((candidate) => candidate.score >= minScore)
    .sort((a, b) => b.score - a.score)
    .slice(0, topK);
}
