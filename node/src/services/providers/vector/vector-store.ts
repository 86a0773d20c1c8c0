// src/services/providers/vector/vector-store.ts
// Canonical vector-store contract. Every backend translates its native rows into Candidate[]
// and is chosen once at startup; callers never branch on which one they hold.
import type { Candidate, CandidateMetadata, Embedding, MetadataValue, VectorBackend } from '@/types/core';
import type { ModelRegistry } from '@/models/registry';
import { l2Normalize, l2Norm } from '@/services/providers/retrieval-vector-utils';
import { logger } from '@/services/logger';
import { AppError, errorMessage } from '@/utils/errors';
import { isRateLimitError, retryWithBackoff } from '@/utils/retryWithBackoff';

export interface VectorStore {
  readonly backend: VectorBackend;
  /** Embed a search query with the query-role prefix. Result is unit-normalized. */
  embedQuery(text: string, signal?: AbortSignal): Promise<Embedding>;
  /** Embed product texts with the passage-role prefix. Results are unit-normalized. */
  embedDocuments(texts: string[], signal?: AbortSignal): Promise<Embedding[]>;
  /** Nearest neighbours, closest first. Returns [] when the backend is unavailable. */
  query(vector: Embedding, topN: number, includeMetadata?: boolean): Promise<Candidate[]>;
  count(): Promise<number>;
  upsert(ids: string[], vectors: Embedding[], metadatas: CandidateMetadata[]): Promise<void>;
  /** Release background resources held by the backend. */
  close(): Promise<void>;
}

const NORM_TOLERANCE = 1e-3;

function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Keep the scalar entries of a backend's metadata object. Anything that is not an object yields null.
 */
export function toCandidateMetadata(raw: unknown): CandidateMetadata | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return null;
  const out: CandidateMetadata = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isMetadataValue(value)) out[key] = value;
  }
  return out;
}

/** Re-normalize only when the norm has drifted, so already-unit vectors pass through untouched. */
export function ensureUnitNorm(vector: Embedding): Embedding {
  const norm = l2Norm(vector);
  if (norm === 0 || Math.abs(norm - 1) <= NORM_TOLERANCE) return vector;
  return l2Normalize(vector);
}

/**
 * Shared embedding, normalization and failure containment. Backends implement the native calls.
 */
export abstract class BaseVectorStore implements VectorStore {
  abstract readonly backend: VectorBackend;

  constructor(
    protected readonly models: ModelRegistry,
    protected readonly upsertBatchSize = 500,
  ) {}

  protected abstract queryNative(vector: Embedding, topN: number, includeMetadata: boolean): Promise<Candidate[]>;
  protected abstract countNative(): Promise<number>;
  protected abstract upsertNative(
    rows: Array<{ id: string; embedding: Embedding; metadata: CandidateMetadata }>,
  ): Promise<void>;

  async embedQuery(text: string, signal?: AbortSignal): Promise<Embedding> {
    const embedder = await this.models.getEmbedder();
    const [vector] = await retryWithBackoff(() => embedder.embedQueries([text], signal), {
      maxAttempts: 3,
      initialDelay: 1000,
      shouldRetry: isRateLimitError,
      signal,
      label: 'embed:query',
    });
    if (!vector) throw new Error('embedder returned no vector for query');
    return ensureUnitNorm(vector);
  }

  async embedDocuments(texts: string[], signal?: AbortSignal): Promise<Embedding[]> {
    if (texts.length === 0) return [];
    const embedder = await this.models.getEmbedder();
    const vectors = await retryWithBackoff(() => embedder.embedPassages(texts, signal), {
      maxAttempts: 3,
      initialDelay: 1000,
      shouldRetry: isRateLimitError,
      signal,
      label: 'embed:passages',
    });
    return vectors.map(ensureUnitNorm);
  }

  async query(vector: Embedding, topN: number, includeMetadata = true): Promise<Candidate[]> {
    if (topN <= 0 || vector.length === 0) return [];
    try {
      return await this.queryNative(ensureUnitNorm(vector), topN, includeMetadata);
    } catch (err) {
      logger.error('vector_store:query_failed', { backend: this.backend, error: errorMessage(err) });
      return [];
    }
  }

  async close(): Promise<void> {}

  async count(): Promise<number> {
    try {
      return await this.countNative();
    } catch (err) {
      logger.error('vector_store:count_failed', { backend: this.backend, error: errorMessage(err) });
      return 0;
    }
  }

  async upsert(ids: string[], vectors: Embedding[], metadatas: CandidateMetadata[]): Promise<void> {
    if (ids.length !== vectors.length || ids.length !== metadatas.length) {
      throw new AppError({
        statusCode: 400,
        code: 'BAD_REQUEST',
        message: `upsert length mismatch: ${ids.length} ids, ${vectors.length} vectors, ${metadatas.length} metadatas`,
      });
    }
    const rows = ids.map((id, i) => ({
      id,
      embedding: ensureUnitNorm(vectors[i]),
      metadata: metadatas[i],
    }));
    for (let start = 0; start < rows.length; start += this.upsertBatchSize) {
      const batch = rows.slice(start, start + this.upsertBatchSize);
      await this.upsertNative(batch);
      logger.debug('vector_store:upserted', {
        backend: this.backend,
        done: start + batch.length,
        total: rows.length,
      });
    }
  }
}
