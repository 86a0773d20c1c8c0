// node/src/services/providers/retrieval-vector-utils.ts — shared lexical + vector helpers for retrieval

import type { Embedding } from '@/types/core';

export function dot(a: Embedding, b: Embedding): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

export function l2Norm(v: Embedding): number {
  return Math.sqrt(dot(v, v));
}

/** Unit-length copy of `v`; the zero vector is returned unchanged. */
export function l2Normalize(v: Embedding): Embedding {
  const norm = l2Norm(v);
  if (norm === 0) return [...v];
  return v.map((x) => x / norm);
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}

/** Very simple BM25-like scorer (not full BM25: constant idf). */
export function bm25LikeScore(
  queryTokens: string[],
  docTokens: string[],
  avgDocLength: number,
  k1 = 1.5,
  b = 0.75,
): number {
  if (docTokens.length === 0 || queryTokens.length === 0) return 0;

  const docLength = docTokens.length;
  const termFreq = new Map<string, number>();
  for (const t of docTokens) {
    termFreq.set(t, (termFreq.get(t) ?? 0) + 1);
  }

  let score = 0;
  const uniqueQueryTokens = Array.from(new Set(queryTokens));
  for (const qt of uniqueQueryTokens) {
    const tf = termFreq.get(qt) ?? 0;
    if (tf === 0) continue;

    const idf = 1.5;
    const numerator = tf * (k1 + 1);
    const denominator = tf + k1 * (1 - b + (b * docLength) / Math.max(avgDocLength, 1));

    score += idf * (numerator / denominator);
  }

  return score;
}
