// src/types/core.ts

/** Scalar values a vector store can hold in product metadata. */
export type MetadataValue = string | number | boolean | null;

/**
 * Product metadata as stored next to each vector. Well-known keys are typed;
 * backends may carry extra scalar fields.
 */
export interface CandidateMetadata {
  title?: string;
  url?: string;
  /** Numeric, or a display string such as "$80.00". */
  price?: number | string | null;
  color?: string | null;
  brand?: string | null;
  gender?: string | null;
  category?: string | null;
  /** Long descriptive blob used for full-text fallback matching. */
  text?: string | null;
  description?: string | null;
  [key: string]: MetadataValue | undefined;
}

/** One retrieved product. Lower distance = more similar. */
export interface Candidate {
  id: string;
  metadata: CandidateMetadata | null;
  distance: number;
}

/** Ordered retrieval output. Stages return new arrays; never mutate across stages. */
export type CandidateSet = readonly Candidate[];

export interface ParsedFilters {
  category: string | null;
  color: string | null;
  brand: string | null;
  gender: string | null;
  price_max: number | null;
  must_have: string[];
  /** Carried for compatibility with the extraction contract; not enforced by filtering. */
  exclude: string[];
  /** Search-optimized restatement; never empty. */
  rewrite: string;
}

export interface ParseOutcome {
  filters: ParsedFilters;
  /** Set when extraction failed and filters are a pass-through of the raw query. */
  warning?: string;
}

export type Embedding = number[];

/** Candidate as surfaced to callers: metadata flattened next to id and a clamped similarity score. */
export type ScoredCandidate = CandidateMetadata & {
  id: string;
  score: number;
};

export type PipelineWarning =
  | 'parse_degraded'
  | 'retrieval_empty'
  | 'category_relaxed'
  | 'rerank_skipped'
  | 'summary_fallback';

export interface RetrievalResult {
  summary: string;
  rewrittenQuery: string;
  filters: ParsedFilters;
  candidates: ScoredCandidate[];
  warnings: PipelineWarning[];
}

export type VectorBackend = 'sqlite' | 'supabase';
