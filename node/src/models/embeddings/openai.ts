/**
 * OpenAIEmbedding: OpenAI (or compatible) /embeddings implementation of BaseEmbedding.
 * Symmetric model, so no role prefixes by default.
 */

import OpenAI from 'openai';
import BaseEmbedding, { type EmbeddingConfig } from '../base/embedding';
import type { Embedding } from '@/types/core';

export interface OpenAIEmbeddingConfig extends EmbeddingConfig {
  apiKey?: string;
  baseURL?: string;
}

class OpenAIEmbedding extends BaseEmbedding<OpenAIEmbeddingConfig> {
  private readonly client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig, client?: OpenAI) {
    super({ queryPrefix: '', passagePrefix: '', ...config });
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
  }

  async load(): Promise<void> {
    await this.client.models.retrieve(this.config.model);
  }

  async embedText(texts: string[], signal?: AbortSignal): Promise<Embedding[]> {
    if (texts.length === 0) return [];
    const res = await this.client.embeddings.create(
      { model: this.config.model, input: texts },
      { signal },
    );
    return [...res.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}

export default OpenAIEmbedding;
