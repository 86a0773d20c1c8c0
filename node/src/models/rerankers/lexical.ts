// In-process fallback scorer: BM25-like term overlap. Used when no cross-encoder is reachable.
import type { RelevanceScorer } from '../base/reranker';
import { bm25LikeScore, tokenize } from '@/services/providers/retrieval-vector-utils';

export class LexicalScorer implements RelevanceScorer {
  readonly modelId = 'lexical-bm25';

  async load(): Promise<void> {
    // nothing to load
  }

  async score(query: string, documents: string[]): Promise<number[]> {
    const queryTokens = tokenize(query);
    const docTokens = documents.map((d) => tokenize(d));
    const avgDocLength = docTokens.reduce((s, t) => s + t.length, 0) / Math.max(docTokens.length, 1);
    return docTokens.map((tokens) => bm25LikeScore(queryTokens, tokens, avgDocLength));
  }
}
