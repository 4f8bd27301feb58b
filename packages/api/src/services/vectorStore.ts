import { z } from 'zod';
import { toVectorLiteral, type ScoredCandidate } from '@grounded-qa/shared';
import type { Sql } from '../utils/db';
import { StoreUnavailableError, describeError, isTimeoutError, withTimeout } from '../utils/errors';

/**
 * Vector store boundary.
 *
 * The store owns persistence and indexing; this module only issues the
 * similarity query and turns rows into validated ScoredCandidates.
 */

export interface VectorQuery {
  vector: readonly number[];
  version: string;
  poolSize: number;
}

export interface VectorStore {
  /**
   * Rows for chunks whose version equals `version` exactly and that have a
   * stored vector, best match first, at most `poolSize` of them.
   */
  search(query: VectorQuery): Promise<ScoredCandidate[]>;
}

const CandidateRowSchema = z
  .object({
    id: z.string().min(1),
    document_id: z.string().min(1),
    text: z.string().min(1),
    section: z.string().nullable(),
    page_start: z.number().int().nullable(),
    page_end: z.number().int().nullable(),
    source: z.string().min(1),
    version: z.string().min(1),
    // pgvector yields NaN for a zero vector; rank it below any threshold
    score: z
      .union([z.nan(), z.coerce.number().finite()])
      .transform((score) => (Number.isNaN(score) ? Number.NEGATIVE_INFINITY : score)),
  })
  .refine((row) => row.page_start === null || row.page_end === null || row.page_start <= row.page_end, {
    message: 'page_start must not exceed page_end',
  });

/**
 * Validate one store row into a ScoredCandidate.
 * A row that does not describe a chunk is a store fault, not a miss.
 */
export function parseCandidateRow(row: unknown): ScoredCandidate {
  const parsed = CandidateRowSchema.safeParse(row);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new StoreUnavailableError('malformed', `Vector store returned a malformed row (${detail})`);
  }

  const r = parsed.data;
  return {
    id: r.id,
    documentId: r.document_id,
    source: r.source,
    section: r.section,
    pageStart: r.page_start,
    pageEnd: r.page_end,
    text: r.text,
    version: r.version,
    score: r.score,
  };
}

/**
 * pgvector-backed store.
 *
 * Uses <=> (cosine distance, lower = more similar) and reports
 * score = 1 - distance.
 */
export class PgVectorStore implements VectorStore {
  constructor(
    private readonly sql: Sql,
    private readonly timeoutMs: number
  ) {}

  async search({ vector, version, poolSize }: VectorQuery): Promise<ScoredCandidate[]> {
    const vectorString = toVectorLiteral(vector);

    const query = this.sql`
      SELECT
        c.id::text AS id,
        c.document_id::text AS document_id,
        c.text,
        c.section,
        c.page_start,
        c.page_end,
        d.source,
        d.version,
        1 - (c.embedding <=> ${vectorString}::vector) AS score
      FROM chunks c
      JOIN documents d ON d.id = c.document_id
      WHERE d.version = ${version}
        AND c.embedding IS NOT NULL
      ORDER BY c.embedding <=> ${vectorString}::vector
      LIMIT ${poolSize}
    `;

    let rows: readonly unknown[];
    try {
      rows = await withTimeout(query, this.timeoutMs);
    } catch (error) {
      if (isTimeoutError(error)) {
        query.cancel();
        throw new StoreUnavailableError('timeout', 'Vector store timeout', error);
      }
      throw new StoreUnavailableError('unavailable', `Vector store error: ${describeError(error)}`, error);
    }

    return rows.map(parseCandidateRow);
  }
}
