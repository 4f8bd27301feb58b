import { createHash, timingSafeEqual } from 'node:crypto';
import {
  makeRequestId,
  type AskResponse,
  type FailureKind,
  type PipelineStage,
  type RefusalReason,
  type RejectionKind,
} from '@grounded-qa/shared';
import { ConfigurationError, UpstreamError } from '../utils/errors';
import type { EmbeddingGateway } from '../utils/embeddings';
import type { LLMClient } from '../utils/llm';
import type { Logger } from '../utils/logger';
import type { ContextAssembler } from './context';
import { buildGroundedPrompt } from './prompt';
import type { RetrievalOptions, RetrievalResult, Retriever } from './retrieval';

/**
 * Grounded-Answer Orchestrator
 *
 * Strictly linear, one pass per request:
 *   validate → embed → retrieve → assemble → prompt → generate → respond
 * Every stage can exit early with a typed outcome. Nothing is retried here.
 *
 * This is the only place where component failures become caller-visible
 * outcomes. Callers get short fixed messages; causes go to the log.
 */

export interface AskInput {
  question: string;
  credential?: string;
}

export type AskOutcome =
  | { status: 'success'; response: AskResponse }
  | { status: 'refused'; requestId: string; reason: RefusalReason }
  | { status: 'rejected'; requestId: string; kind: RejectionKind; message: string }
  | { status: 'failed'; requestId: string; kind: FailureKind; stage: PipelineStage; message: string };

export interface OrchestratorDeps {
  embedder: EmbeddingGateway;
  retriever: Retriever;
  assembler: ContextAssembler;
  llm: LLMClient;
  logger: Logger;
  now?: () => number;
}

export interface OrchestratorSettings {
  apiKey?: string;
  maxQuestionChars: number;
  requiredVersion: string;
  retrieval: RetrievalOptions;
}

type StageFailure = Extract<AskOutcome, { status: 'failed' }>;

export class GroundedAnswerOrchestrator {
  private readonly now: () => number;
  private readonly apiKeyDigest?: Buffer;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings
  ) {
    this.now = deps.now ?? Date.now;
    this.apiKeyDigest = settings.apiKey ? digest(settings.apiKey) : undefined;
  }

  async answer(input: AskInput): Promise<AskOutcome> {
    const submittedAt = this.now();
    const question = input.question.trim();
    const requestId = makeRequestId(submittedAt, question);
    const log = this.deps.logger.child({ requestId });

    // ===== STAGE 1: VALIDATE =====
    const rejection = this.validate(question, input.credential);
    if (rejection) {
      log.warn({ kind: rejection.kind }, 'Request rejected');
      return { status: 'rejected', requestId, ...rejection };
    }

    // ===== STAGE 2: EMBED =====
    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.deps.embedder.embed(question);
    } catch (error) {
      return this.fail(log, requestId, 'embedding', error);
    }

    // ===== STAGE 3: RETRIEVE =====
    let retrieval: RetrievalResult;
    try {
      retrieval = await this.deps.retriever.retrieve(
        queryEmbedding,
        this.settings.requiredVersion,
        this.settings.retrieval
      );
    } catch (error) {
      return this.fail(log, requestId, 'retrieval', error);
    }

    const { candidates } = retrieval;
    log.info(
      {
        retrievalCount: candidates.length,
        poolCount: retrieval.poolCount,
        topScores: candidates.map((c) => Math.round(c.score * 10000) / 10000),
      },
      'Retrieval summary'
    );

    // ===== STAGE 4: ASSEMBLE =====
    const assembled = this.deps.assembler.assemble(candidates);
    if (!assembled.ok) {
      log.warn(
        { reason: assembled.reason, blockedIds: assembled.blockedIds, truncated: assembled.truncated },
        'Refused'
      );
      return { status: 'refused', requestId, reason: assembled.reason };
    }

    log.info(
      {
        contextChars: assembled.totalChars,
        citations: assembled.citations.length,
        blockedIds: assembled.blockedIds,
        truncated: assembled.truncated,
      },
      'Context assembled'
    );

    // ===== STAGE 5: BUILD PROMPT =====
    const prompt = buildGroundedPrompt(assembled.context, question);

    // ===== STAGE 6: GENERATE =====
    let answer: string;
    try {
      answer = await this.deps.llm.generate(prompt);
    } catch (error) {
      return this.fail(log, requestId, 'generation', error);
    }

    // ===== STAGE 7: RESPOND =====
    const latencyMs = this.now() - submittedAt;
    log.info({ latencyMs, citations: assembled.citations.length }, 'Query answered');

    return {
      status: 'success',
      response: {
        requestId,
        latencyMs,
        model: this.deps.llm.model,
        docVersion: this.settings.requiredVersion,
        answer,
        citations: assembled.citations,
        retrievalCount: candidates.length,
      },
    };
  }

  /**
   * Credential is checked before input limits.
   */
  private validate(question: string, credential?: string): { kind: RejectionKind; message: string } | null {
    if (this.apiKeyDigest && !this.credentialMatches(credential)) {
      return { kind: 'UNAUTHORIZED', message: 'Unauthorized' };
    }
    if (!question) {
      return { kind: 'BAD_REQUEST', message: 'Empty question' };
    }
    // Limit counts code points, not UTF-16 units
    if ([...question].length > this.settings.maxQuestionChars) {
      return {
        kind: 'TOO_LARGE',
        message: `Question too long (>${this.settings.maxQuestionChars} chars)`,
      };
    }
    return null;
  }

  private credentialMatches(credential?: string): boolean {
    if (!this.apiKeyDigest || credential === undefined) {
      return false;
    }
    return timingSafeEqual(digest(credential), this.apiKeyDigest);
  }

  private fail(log: Logger, requestId: string, stage: PipelineStage, error: unknown): StageFailure {
    const failure = classifyFailure(stage, error);
    log.error({ err: error, stage, kind: failure.kind }, 'Pipeline stage failed');
    return { status: 'failed', requestId, stage, ...failure };
  }
}

const STAGE_LABELS: Record<PipelineStage, string> = {
  embedding: 'Embedding',
  retrieval: 'Vector store',
  generation: 'LLM',
};

/**
 * Map a stage error onto the caller taxonomy. Anything unclassified that
 * escapes an outbound call counts as an upstream error for that stage.
 */
export function classifyFailure(
  stage: PipelineStage,
  error: unknown
): { kind: FailureKind; message: string } {
  if (error instanceof ConfigurationError) {
    return { kind: 'CONFIGURATION_ERROR', message: 'Service misconfigured' };
  }
  if (error instanceof UpstreamError && error.timedOut) {
    return { kind: 'UPSTREAM_TIMEOUT', message: `${STAGE_LABELS[stage]} timeout` };
  }
  return { kind: 'UPSTREAM_ERROR', message: `${STAGE_LABELS[stage]} unavailable` };
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}
