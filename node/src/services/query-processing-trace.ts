// src/services/query-processing-trace.ts
// Per-request stage timings (parse, retrieve, filter, rerank, summarize) for logs and /debug.
import crypto from 'crypto';

export type StageName = 'cache_lookup' | 'parse' | 'embed' | 'retrieve' | 'filter' | 'filter_relaxed' | 'rerank' | 'summarize';

export interface Span {
  name: StageName;
  durationMs: number;
  /** Items coming out of the stage, where that is meaningful. */
  count?: number;
  degraded?: boolean;
}

export interface QueryProcessingTrace {
  traceId: string;
  startTime: number;
  endTime?: number;
  spans: Span[];
}

export function createTrace(): QueryProcessingTrace {
  return {
    traceId: 'qp_' + crypto.randomBytes(8).toString('hex'),
    startTime: Date.now(),
    spans: [],
  };
}

export function addSpan(
  trace: QueryProcessingTrace,
  name: StageName,
  startTime: number,
  extra?: Omit<Span, 'name' | 'durationMs'>,
): void {
  trace.spans.push({ name, durationMs: Date.now() - startTime, ...extra });
}

export function finishTrace(trace: QueryProcessingTrace): number {
  trace.endTime = Date.now();
  return trace.endTime - trace.startTime;
}
