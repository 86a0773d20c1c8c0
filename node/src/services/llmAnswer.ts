// node/src/services/llmAnswer.ts — render the short prose answer from the final candidates
import type { Candidate, ParsedFilters } from '@/types/core';
import type { SimpleModelRouter } from './model-router';
import {
  ANSWER_CANDIDATE_FIELDS,
  ANSWER_MAX_CANDIDATES,
  buildAnswerPrompt,
  type AnswerCandidate,
} from './prompt-templates';
import { logger } from './logger';
import { withTimeout } from '@/utils/withTimeout';
import { errorMessage } from '@/utils/errors';

export interface AnswerOutcome {
  summary: string;
  fallback: boolean;
}

/** Deterministic answer used whenever the answer model fails, times out or returns nothing. */
export function fallbackSummary(query: string, count: number): string {
  if (count === 0) return `No matching products found for "${query}".`;
  return `Found ${count} matching ${count === 1 ? 'product' : 'products'} for "${query}".`;
}

/** Trim candidates to what the answer model may see. */
export function toAnswerCandidates(candidates: readonly Candidate[]): AnswerCandidate[] {
  return candidates.slice(0, ANSWER_MAX_CANDIDATES).map((c) => {
    const slim: AnswerCandidate = { id: c.id };
    for (const field of ANSWER_CANDIDATE_FIELDS) {
      if (field === 'id') continue;
      const value = c.metadata?.[field];
      if (value !== undefined && value !== null) slim[field] = value;
    }
    return slim;
  });
}

export class AnswerGenerator {
  constructor(
    private readonly router: SimpleModelRouter,
    private readonly timeoutMs: number,
  ) {}

  async generate(
    query: string,
    filters: ParsedFilters,
    candidates: readonly Candidate[],
    signal?: AbortSignal,
  ): Promise<AnswerOutcome> {
    if (candidates.length === 0) {
      return { summary: fallbackSummary(query, 0), fallback: true };
    }
    try {
      const prompt = buildAnswerPrompt({ query, filters, candidates: toAnswerCandidates(candidates) });
      const text = await withTimeout(
        'summarize',
        this.timeoutMs,
        (stageSignal) => this.router.summarize(prompt, stageSignal),
        signal,
      );
      const summary = text.trim();
      if (summary.length > 0) return { summary, fallback: false };
      logger.warn('answer:empty_response');
    } catch (err) {
      logger.warn('answer:fallback', { error: errorMessage(err) });
    }
    return { summary: fallbackSummary(query, candidates.length), fallback: true };
  }
}
