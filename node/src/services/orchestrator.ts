// src/services/orchestrator.ts — parse → embed → retrieve → filter (→ relax) → rerank → truncate → summarize
//
// One request is a single sequence of awaited stages. Each stage that calls out owns its own
// failure containment and sub-budget; only the request-level budget surfaces as an error.
import type { Candidate, Embedding, ParsedFilters, PipelineWarning, RetrievalResult, ScoredCandidate } from '@/types/core';
import type { VectorStore } from './providers/vector/vector-store';
import type { QueryParser } from './filter-extraction';
import type { Reranker } from './rerank';
import type { AnswerGenerator } from './llmAnswer';
import type { AnswerCache } from './cache';
import { applyFilters, relaxCategory } from '@/filters/productFilters';
import { addSpan, createTrace, finishTrace, type QueryProcessingTrace } from './query-processing-trace';
import { logger } from './logger';
import { RequestTimeoutError, errorMessage } from '@/utils/errors';

export interface OrchestratorDeps {
  parser: QueryParser;
  vectorStore: VectorStore;
  reranker: Reranker;
  answerer: AnswerGenerator;
  cache?: AnswerCache;
}

export interface OrchestratorOptions {
  requestTimeoutMs: number;
}

export interface PipelineResult extends RetrievalResult {
  trace: QueryProcessingTrace;
  cached: boolean;
}

/** Results produced in degraded mode are not cached. */
const DEGRADED_WARNINGS: ReadonlySet<PipelineWarning> = new Set<PipelineWarning>([
  'parse_degraded',
  'rerank_skipped',
  'summary_fallback',
]);

/** Retrieval pool: room for filtering and reranking losses. */
export function retrievalPoolSize(k: number): number {
  return Math.max(2 * k, 100);
}

export function rerankPoolSize(k: number): number {
  return Math.min(50, 3 * k);
}

/** Similarity proxy for display: 1 - distance, floored at 0. Not a probability. */
export function distanceToScore(distance: number): number {
  return Math.max(0, 1 - distance);
}

export function toScoredCandidate(candidate: Candidate): ScoredCandidate {
  return { ...candidate.metadata, id: candidate.id, score: distanceToScore(candidate.distance) };
}

async function retrievePool(
  rewrite: string,
  k: number,
  deps: OrchestratorDeps,
  trace: QueryProcessingTrace,
  signal: AbortSignal,
): Promise<Candidate[]> {
  let startedAt = Date.now();
  let vector: Embedding | null = null;
  try {
    vector = await deps.vectorStore.embedQuery(rewrite, signal);
    addSpan(trace, 'embed', startedAt);
  } catch (err) {
    signal.throwIfAborted();
    addSpan(trace, 'embed', startedAt, { degraded: true });
    logger.error('orchestrator:embed_failed', { traceId: trace.traceId, error: errorMessage(err) });
  }
  if (!vector) return [];
  signal.throwIfAborted();

  startedAt = Date.now();
  const pool = await deps.vectorStore.query(vector, retrievalPoolSize(k), true);
  addSpan(trace, 'retrieve', startedAt, { count: pool.length });
  return pool;
}

function filterWithRelaxation(
  pool: readonly Candidate[],
  filters: ParsedFilters,
  trace: QueryProcessingTrace,
): { candidates: Candidate[]; filters: ParsedFilters; relaxed: boolean } {
  let startedAt = Date.now();
  const filtered = applyFilters(pool, filters);
  addSpan(trace, 'filter', startedAt, { count: filtered.length });
  if (filtered.length > 0 || filters.category === null || pool.length === 0) {
    return { candidates: filtered, filters, relaxed: false };
  }

  startedAt = Date.now();
  const relaxedFilters = relaxCategory(filters);
  const relaxed = applyFilters(pool, relaxedFilters);
  addSpan(trace, 'filter_relaxed', startedAt, { count: relaxed.length });
  logger.info('orchestrator:category_relaxed', {
    traceId: trace.traceId,
    category: filters.category,
    count: relaxed.length,
  });
  return { candidates: relaxed, filters: relaxedFilters, relaxed: true };
}

async function runStages(
  query: string,
  k: number,
  deps: OrchestratorDeps,
  trace: QueryProcessingTrace,
  signal: AbortSignal,
): Promise<RetrievalResult> {
  const warnings: PipelineWarning[] = [];

  // 1) Parse
  let startedAt = Date.now();
  const parsed = await deps.parser.parse(query, signal);
  addSpan(trace, 'parse', startedAt, { degraded: parsed.warning !== undefined });
  if (parsed.warning) {
    warnings.push('parse_degraded');
    logger.warn('orchestrator:parse_degraded', { traceId: trace.traceId, warning: parsed.warning });
  }
  signal.throwIfAborted();

  // 2) Embed + retrieve
  const pool = await retrievePool(parsed.filters.rewrite, k, deps, trace, signal);
  if (pool.length === 0) warnings.push('retrieval_empty');
  signal.throwIfAborted();

  // 3) Filter, relaxing category once when nothing survives
  const filtered = filterWithRelaxation(pool, parsed.filters, trace);
  if (filtered.relaxed) warnings.push('category_relaxed');

  // 4) Rerank a bounded head of the filtered pool
  startedAt = Date.now();
  const reranked = await deps.reranker.rerank(
    parsed.filters.rewrite,
    filtered.candidates,
    rerankPoolSize(k),
    signal,
  );
  addSpan(trace, 'rerank', startedAt, { count: reranked.candidates.length, degraded: reranked.degraded });
  if (reranked.degraded) warnings.push('rerank_skipped');
  signal.throwIfAborted();

  // 5) Truncate
  const top = reranked.candidates.slice(0, k);

  // 6) Summarize
  startedAt = Date.now();
  const answer = await deps.answerer.generate(query, filtered.filters, top, signal);
  addSpan(trace, 'summarize', startedAt, { degraded: answer.fallback });
  if (answer.fallback) warnings.push('summary_fallback');
  signal.throwIfAborted();

  // 7) Assemble
  return {
    summary: answer.summary,
    rewrittenQuery: parsed.filters.rewrite,
    filters: filtered.filters,
    candidates: top.map(toScoredCandidate),
    warnings,
  };
}

/** Cache lookup, then the stages on a miss. Both count against the request budget. */
async function lookupOrRun(
  query: string,
  k: number,
  deps: OrchestratorDeps,
  trace: QueryProcessingTrace,
  signal: AbortSignal,
): Promise<{ result: RetrievalResult; cached: boolean }> {
  const startedAt = Date.now();
  const hit = await deps.cache?.get(query, k);
  if (deps.cache) addSpan(trace, 'cache_lookup', startedAt);
  if (hit) return { result: hit, cached: true };
  signal.throwIfAborted();
  return { result: await runStages(query, k, deps, trace, signal), cached: false };
}

/**
 * Run the whole pipeline for one query under the request budget. Exceeding the budget aborts
 * every in-flight stage and rejects with RequestTimeoutError; no partial result is returned.
 */
export async function runRetrieval(
  query: string,
  k: number,
  deps: OrchestratorDeps,
  options: OrchestratorOptions,
): Promise<PipelineResult> {
  const trace = createTrace();
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new RequestTimeoutError(options.requestTimeoutMs);
      controller.abort(err);
      reject(err);
    }, options.requestTimeoutMs);
  });

  try {
    const { result, cached } = await Promise.race([
      lookupOrRun(query, k, deps, trace, controller.signal),
      timeout,
    ]);
    const totalMs = finishTrace(trace);
    if (cached) {
      logger.info('orchestrator:cache_hit', { traceId: trace.traceId, totalMs });
      return { ...result, trace, cached: true };
    }
    logger.info('orchestrator:done', {
      traceId: trace.traceId,
      totalMs,
      results: result.candidates.length,
      warnings: result.warnings,
    });
    logger.debug('orchestrator:trace', { traceId: trace.traceId, spans: trace.spans });
    if (!result.warnings.some((w) => DEGRADED_WARNINGS.has(w))) {
      await deps.cache?.set(query, k, result);
    }
    return { ...result, trace, cached: false };
  } catch (err) {
    finishTrace(trace);
    logger.error('orchestrator:failed', { traceId: trace.traceId, error: errorMessage(err), spans: trace.spans });
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
