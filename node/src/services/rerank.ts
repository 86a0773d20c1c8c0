// node/src/services/rerank.ts — cross-encoder reranking of an already similarity-sorted pool

import type { Candidate, CandidateSet } from '@/types/core';
import type { ModelRegistry } from '@/models/registry';
import { logger } from './logger';
import { withTimeout } from '@/utils/withTimeout';
import { errorMessage } from '@/utils/errors';

/** Bound on the text scored per candidate; keeps per-pair latency flat. */
export const RERANK_TEXT_MAX_CHARS = 500;

export interface RerankOutcome {
  candidates: Candidate[];
  /** True when scoring failed or ran out of time and the input order was kept. */
  degraded: boolean;
}

/** Text the scorer sees: the descriptive blob, else the description, else the title. */
export function rerankText(candidate: Candidate): string {
  const meta = candidate.metadata;
  const text = meta?.text || meta?.description || meta?.title || '';
  return String(text).slice(0, RERANK_TEXT_MAX_CHARS);
}

/**
 * Stable descending sort of `items` by `scores`; equal scores keep their input order.
 */
export function orderByScore<T>(items: readonly T[], scores: readonly number[]): T[] {
  return items
    .map((item, idx) => ({ item, idx, score: Number.isFinite(scores[idx]) ? scores[idx] : -Infinity }))
    .sort((a, b) => b.score - a.score || a.idx - b.idx)
    .map((s) => s.item);
}

export class Reranker {
  constructor(
    private readonly models: ModelRegistry,
    private readonly timeoutMs: number,
  ) {}

  /**
   * Rerank exactly the first `topN` candidates and drop the rest. On timeout or scorer failure,
   * return those first `topN` in their incoming order.
   */
  async rerank(query: string, candidates: CandidateSet, topN: number, signal?: AbortSignal): Promise<RerankOutcome> {
    const pool = candidates.slice(0, Math.max(0, topN));
    if (pool.length <= 1) return { candidates: pool, degraded: false };

    try {
      const scores = await withTimeout(
        'rerank',
        this.timeoutMs,
        async (stageSignal) => {
          const scorer = await this.models.getReranker();
          return scorer.score(query, pool.map(rerankText), stageSignal);
        },
        signal,
      );
      if (scores.length !== pool.length) {
        throw new Error(`scorer returned ${scores.length} scores for ${pool.length} candidates`);
      }
      return { candidates: orderByScore(pool, scores), degraded: false };
    } catch (err) {
      logger.warn('rerank:skipped', { error: errorMessage(err), poolSize: pool.length });
      return { candidates: pool, degraded: true };
    }
  }
}
