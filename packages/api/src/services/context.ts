import { CONTEXT_DEFAULTS, type Citation, type RefusalReason, type ScoredCandidate } from '@grounded-qa/shared';
import type { EvidenceSanitizer } from './sanitizer';

/**
 * Context Assembler
 *
 * Packs sanitized candidates, in retrieval order, into one bounded text
 * block plus a parallel citation list.
 *
 * Each block is "<header>\n<text>\n" and blocks are joined with "\n".
 * The separator counts toward the budget, so context.length never
 * exceeds maxContextChars.
 *
 * Budget policy: the first block that does not fit ends assembly. Smaller,
 * less relevant blocks further down are not used to fill the gap.
 */

const BLOCK_SEPARATOR = '\n';

export interface AssembledContext {
  ok: true;
  context: string;
  citations: Citation[];
  totalChars: number;
  blockedIds: string[];         // Discarded by the sanitizer
  truncated: boolean;           // Stopped by the budget
}

export interface BlockedContext {
  ok: false;
  reason: RefusalReason;
  blockedIds: string[];
  truncated: boolean;
}

export type AssemblyResult = AssembledContext | BlockedContext;

export function formatCitation(candidate: ScoredCandidate): Citation {
  const section = candidate.section ?? CONTEXT_DEFAULTS.UNKNOWN_SECTION;
  const page = candidate.pageStart ?? CONTEXT_DEFAULTS.UNKNOWN_PAGE;
  return `[${candidate.source} | ${section} | p${page}]`;
}

export class ContextAssembler {
  constructor(
    private readonly sanitizer: EvidenceSanitizer,
    private readonly maxContextChars: number
  ) {}

  assemble(candidates: readonly ScoredCandidate[]): AssemblyResult {
    if (candidates.length === 0) {
      return { ok: false, reason: 'EMPTY_RETRIEVAL', blockedIds: [], truncated: false };
    }

    const parts: string[] = [];
    const citations: Citation[] = [];
    const blockedIds: string[] = [];
    let totalChars = 0;
    let truncated = false;

    for (const candidate of candidates) {
      const clean = this.sanitizer.sanitize(candidate.text);
      if (!clean) {
        // Blocked evidence is skipped; it does not use up the budget.
        blockedIds.push(candidate.id);
        continue;
      }

      const header = formatCitation(candidate);
      const block = `${header}\n${clean}\n`;
      const cost = block.length + (parts.length > 0 ? BLOCK_SEPARATOR.length : 0);

      if (totalChars + cost > this.maxContextChars) {
        truncated = true;
        break;
      }

      parts.push(block);
      citations.push(header);
      totalChars += cost;
    }

    if (parts.length === 0) {
      return { ok: false, reason: 'CONTEXT_BLOCKED', blockedIds, truncated };
    }

    return {
      ok: true,
      context: parts.join(BLOCK_SEPARATOR),
      citations,
      totalChars,
      blockedIds,
      truncated,
    };
  }
}
