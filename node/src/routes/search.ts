// node/src/routes/search.ts — GET /search: raw vector search, no LLM stages
import express, { type Request, type Response, type NextFunction } from 'express';
import type { VectorStore } from '@/services/providers/vector/vector-store';
import type { MetadataValue } from '@/types/core';
import { distanceToScore } from '@/services/orchestrator';
import { createErrorResponse } from '@/utils/errorResponse';
import { formatIssues, searchParamsSchema } from './query-params';

const searchParams = searchParamsSchema(10);

export interface SearchHit {
  id: string;
  title: MetadataValue | null;
  url: MetadataValue | null;
  price: MetadataValue | null;
  score: number;
}

export async function searchProducts(store: VectorStore, query: string, k: number): Promise<SearchHit[]> {
  const vector = await store.embedQuery(query);
  const rows = await store.query(vector, k, true);
  return rows.map((row) => ({
    id: row.id,
    title: row.metadata?.title ?? null,
    url: row.metadata?.url ?? null,
    price: row.metadata?.price ?? null,
    score: distanceToScore(row.distance),
  }));
}

export function createSearchRouter(store: VectorStore) {
  const router = express.Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = searchParams.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json(createErrorResponse('BAD_REQUEST', 'q is required', formatIssues(parsed.error)));
      return;
    }
    try {
      const results = await searchProducts(store, parsed.data.q, parsed.data.k);
      res.json({ query: parsed.data.q, results });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
