// Cross-encoder scorer served by a Text Embeddings Inference endpoint (POST /rerank).
import axios, { type AxiosInstance } from 'axios';
import type { RelevanceScorer } from '../base/reranker';

export interface TeiCrossEncoderConfig {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
}

interface RerankHit {
  index: number;
  score: number;
}

function isRerankHits(value: unknown): value is RerankHit[] {
  return (
    Array.isArray(value) &&
    value.every(
      (h) =>
        typeof h === 'object' &&
        h !== null &&
        'index' in h &&
        typeof h.index === 'number' &&
        'score' in h &&
        typeof h.score === 'number',
    )
  );
}

export class TeiCrossEncoder implements RelevanceScorer {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: TeiCrossEncoderConfig,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs ?? 10_000 });
  }

  get modelId(): string {
    return this.config.model;
  }

  async load(): Promise<void> {
    await this.http.get('/info');
  }

  async score(query: string, documents: string[], signal?: AbortSignal): Promise<number[]> {
    if (documents.length === 0) return [];
    const res = await this.http.post<unknown>(
      '/rerank',
      { query, texts: documents, raw_scores: false, truncate: true },
      { signal },
    );
    if (!isRerankHits(res.data)) {
      throw new Error('rerank endpoint returned an unexpected payload');
    }
    const scores = new Array<number>(documents.length).fill(0);
    for (const hit of res.data) {
      if (hit.index >= 0 && hit.index < documents.length) scores[hit.index] = hit.score;
    }
    return scores;
  }
}
