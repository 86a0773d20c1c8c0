// node/src/routes/debug.ts — GET /debug: backend, index size, loaded models and a smoke query
import express, { type Request, type Response, type NextFunction } from 'express';
import type { VectorStore } from '@/services/providers/vector/vector-store';
import type { ModelRegistry } from '@/models/registry';
import { searchProducts } from './search';

export const SMOKE_TEST_QUERY = 'running shoes';
const SMOKE_TEST_K = 3;

export function createDebugRouter(store: VectorStore, models: ModelRegistry) {
  const router = express.Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [count, results] = await Promise.all([
        store.count(),
        searchProducts(store, SMOKE_TEST_QUERY, SMOKE_TEST_K),
      ]);
      res.json({
        backend: store.backend,
        count,
        smoke_test: { query: SMOKE_TEST_QUERY, results },
        models: models.describe(),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
