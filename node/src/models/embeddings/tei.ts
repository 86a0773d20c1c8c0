/**
 * TeiEmbedding: embeddings served by a Text Embeddings Inference endpoint
 * (POST /embed, GET /info).
 */

import axios, { type AxiosInstance } from 'axios';
import BaseEmbedding, { type EmbeddingConfig } from '../base/embedding';
import type { Embedding } from '@/types/core';

export interface TeiEmbeddingConfig extends EmbeddingConfig {
  baseUrl: string;
  timeoutMs?: number;
}

interface TeiInfo {
  model_id?: string;
}

function isEmbeddingMatrix(value: unknown): value is Embedding[] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((x) => typeof x === 'number'))
  );
}

class TeiEmbedding extends BaseEmbedding<TeiEmbeddingConfig> {
  private readonly http: AxiosInstance;

  constructor(config: TeiEmbeddingConfig, http?: AxiosInstance) {
    super({ queryPrefix: 'query: ', passagePrefix: 'passage: ', ...config });
    this.http = http ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs ?? 10_000 });
  }

  async load(): Promise<void> {
    const res = await this.http.get<TeiInfo>('/info');
    const served = res.data?.model_id;
    if (served && served !== this.config.model) {
      throw new Error(`embedding endpoint serves ${served}, expected ${this.config.model}`);
    }
  }

  async embedText(texts: string[], signal?: AbortSignal): Promise<Embedding[]> {
    if (texts.length === 0) return [];
    const res = await this.http.post<unknown>(
      '/embed',
      { inputs: texts, normalize: true, truncate: true },
      { signal },
    );
    if (!isEmbeddingMatrix(res.data) || res.data.length !== texts.length) {
      throw new Error('embedding endpoint returned an unexpected payload');
    }
    return res.data;
  }
}

export default TeiEmbedding;
