/**
 * RelevanceScorer: scores (query, document) pairs jointly. Higher = more relevant.
 * Returned scores are index-aligned with `documents`.
 */
export interface RelevanceScorer {
  readonly modelId: string;
  load(): Promise<void>;
  score(query: string, documents: string[], signal?: AbortSignal): Promise<number[]>;
}
