import express from 'express';
import type { VectorStore } from '@/services/providers/vector/vector-store';

export function createHealthRouter(store: VectorStore) {
  const router = express.Router();

  router.get('/', async (_req, res) => {
    // count() never throws; an unreachable backend reports 0
    const count = await store.count();
    res.status(200).json({ ok: true, count, backend: store.backend });
  });

  return router;
}
