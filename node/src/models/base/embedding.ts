/**
 * BaseEmbedding: abstract base class for embedding models.
 *
 * Asymmetric retrieval models (the e5 family) are trained with paired
 * "query: " / "passage: " prefixes. Subclasses embed raw text; callers pick the
 * prefix through `embedQueries` / `embedPassages` so the two roles never mix.
 */

import type { Embedding } from '@/types/core';

export interface EmbeddingConfig {
  model: string;
  queryPrefix?: string;
  passagePrefix?: string;
}

abstract class BaseEmbedding<CONFIG extends EmbeddingConfig = EmbeddingConfig> {
  constructor(protected config: CONFIG) {}

  get modelId(): string {
    return this.config.model;
  }

  /** Verify the model is reachable and serving. Throws when it is not. */
  abstract load(): Promise<void>;

  /** Embed already-prefixed texts. */
  abstract embedText(texts: string[], signal?: AbortSignal): Promise<Embedding[]>;

  embedQueries(texts: string[], signal?: AbortSignal): Promise<Embedding[]> {
    const prefix = this.config.queryPrefix ?? '';
    return this.embedText(texts.map((t) => `${prefix}${t}`), signal);
  }

  embedPassages(texts: string[], signal?: AbortSignal): Promise<Embedding[]> {
    const prefix = this.config.passagePrefix ?? '';
    return this.embedText(texts.map((t) => `${prefix}${t}`), signal);
  }
}

export default BaseEmbedding;
