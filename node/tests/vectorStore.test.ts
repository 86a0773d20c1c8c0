import { describe, it, expect, afterAll } from 'vitest';
import { openVectorDatabase } from '@/db';
import { SqliteVectorStore } from '@/services/providers/vector/sqlite-vector-store';
import { CosineScanPool } from '@/services/providers/vector/cosine-scan-pool';
import { SupabaseVectorStore, type SupabaseVectorGateway } from '@/services/providers/vector/supabase-vector-store';
import { ensureUnitNorm, toCandidateMetadata } from '@/services/providers/vector/vector-store';
import { AppError } from '@/utils/errors';
import type { CandidateMetadata, Embedding } from '@/types/core';
import { KeywordEmbedding, TableScorer, registryWith } from './helpers/fakes';

const VOCAB = ['tent', 'stove', 'lamp'];

// One worker pool shared by every store in this file
const scanPool = new CosineScanPool(2);
afterAll(() => scanPool.close());

function sqliteStore(embedder = new KeywordEmbedding(VOCAB), batchSize?: number) {
  return new SqliteVectorStore(
    openVectorDatabase(':memory:'),
    registryWith(embedder, new TableScorer({})),
    batchSize,
    scanPool,
  );
}

describe('vector helpers', () => {
  it('normalizes only vectors off unit length', () => {
    const unit = [0.6, 0.8];
    expect(ensureUnitNorm(unit)).toBe(unit);
    expect(ensureUnitNorm([3, 4])).toEqual([0.6, 0.8]);
    expect(ensureUnitNorm([0, 0])).toEqual([0, 0]);
  });

  it('keeps scalar metadata entries only', () => {
    expect(toCandidateMetadata({ title: 'Lamp', price: 12, tags: ['a'], nested: { a: 1 }, sale: false })).toEqual({
      title: 'Lamp',
      price: 12,
      sale: false,
    });
    expect(toCandidateMetadata('nope')).toBeNull();
    expect(toCandidateMetadata(null)).toBeNull();
  });
});

describe('SqliteVectorStore', () => {
  it('embeds queries and passages with their role prefixes', async () => {
    const embedder = new KeywordEmbedding(VOCAB);
    const store = sqliteStore(embedder);
    await store.embedQuery('camp stove');
    await store.embedDocuments(['two person tent']);
    expect(embedder.seen).toEqual(['query: camp stove', 'passage: two person tent']);
  });

  it('returns nearest neighbours closest first with metadata', async () => {
    const store = sqliteStore();
    await store.upsert(
      ['t1', 's1', 'l1'],
      [
        [1, 0, 0],
        [0, 2, 0],
        [1, 1, 0],
      ],
      [{ title: 'Tent' }, { title: 'Stove' }, { title: 'Tent lamp' }],
    );

    const hits = await store.query([1, 0, 0], 2);
    expect(hits.map((h) => h.id)).toEqual(['t1', 'l1']);
    expect(hits[0].distance).toBeCloseTo(0, 9);
    expect(hits[1].distance).toBeCloseTo(1 - Math.SQRT1_2, 9);
    expect(hits[0].metadata).toEqual({ title: 'Tent' });
    expect(await store.count()).toBe(3);
  });

  it('omits metadata when not requested', async () => {
    const store = sqliteStore();
    await store.upsert(['t1'], [[1, 0, 0]], [{ title: 'Tent' }]);
    const [hit] = await store.query([1, 0, 0], 1, false);
    expect(hit.metadata).toBeNull();
  });

  it('overwrites an existing id on upsert', async () => {
    const store = sqliteStore();
    await store.upsert(['t1'], [[1, 0, 0]], [{ title: 'Old' }]);
    await store.upsert(['t1'], [[0, 0, 1]], [{ title: 'New' }]);

    expect(await store.count()).toBe(1);
    const [hit] = await store.query([0, 0, 1], 1);
    expect(hit.metadata).toEqual({ title: 'New' });
    expect(hit.distance).toBeCloseTo(0, 9);
  });

  it('skips rows of a different dimension', async () => {
    const store = sqliteStore();
    await store.upsert(['a', 'b'], [[1, 0, 0], [1, 0]], [{}, {}]);
    const hits = await store.query([1, 0, 0], 10);
    expect(hits.map((h) => h.id)).toEqual(['a']);
  });

  it('rejects mismatched upsert lengths', async () => {
    const store = sqliteStore();
    await expect(store.upsert(['a', 'b'], [[1, 0, 0]], [{}, {}])).rejects.toBeInstanceOf(AppError);
    expect(await store.count()).toBe(0);
  });

  it('returns nothing for a non-positive topN', async () => {
    const store = sqliteStore();
    await store.upsert(['a'], [[1, 0, 0]], [{}]);
    expect(await store.query([1, 0, 0], 0)).toEqual([]);
  });
});

describe('CosineScanPool', () => {
  it('decodes JSON or array rows, skips other dimensions and breaks ties by position', async () => {
    const pool = new CosineScanPool(1);
    try {
      const hits = await pool.scan(
        [1, 0],
        ['[0,1]', [1, 0], '[1,0,0]', 'not json', [2, 0], '[0,0]'],
        10,
      );
      expect(hits).toEqual([
        { index: 1, distance: 0 },
        { index: 4, distance: 0 },
        { index: 0, distance: 1 },
        { index: 5, distance: 1 },
      ]);
    } finally {
      await pool.close();
    }
  });

  it('serves concurrent scans across workers', async () => {
    const pool = new CosineScanPool(2);
    try {
      const rows = [[1, 0], [0, 1]];
      const [forX, forY] = await Promise.all([pool.scan([1, 0], rows, 1), pool.scan([0, 1], rows, 1)]);
      expect(forX).toEqual([{ index: 0, distance: 0 }]);
      expect(forY).toEqual([{ index: 1, distance: 0 }]);
    } finally {
      await pool.close();
    }
  });

  it('rejects scans once closed', async () => {
    const pool = new CosineScanPool(1);
    await pool.close();
    await expect(pool.scan([1, 0], [[1, 0]], 1)).rejects.toThrow('scan pool is closed');
  });

  it('leaves a closed store answering with no candidates', async () => {
    const store = new SqliteVectorStore(
      openVectorDatabase(':memory:'),
      registryWith(new KeywordEmbedding(VOCAB), new TableScorer({})),
      undefined,
      new CosineScanPool(1),
    );
    await store.upsert(['a'], [[1, 0, 0]], [{}]);
    await store.close();
    expect(await store.query([1, 0, 0], 1)).toEqual([]);
  });
});

class FakeGateway implements SupabaseVectorGateway {
  readonly upserts: Array<Array<{ id: string; embedding: Embedding; metadata: CandidateMetadata }>> = [];
  matchArgs: Array<{ queryEmbedding: Embedding; matchCount: number }> = [];

  constructor(
    private readonly rows: unknown,
    private readonly failWith?: Error,
  ) {}

  async match(queryEmbedding: Embedding, matchCount: number): Promise<unknown> {
    this.matchArgs.push({ queryEmbedding, matchCount });
    if (this.failWith) throw this.failWith;
    return this.rows;
  }

  async count(): Promise<number> {
    if (this.failWith) throw this.failWith;
    return 42;
  }

  async upsert(rows: Array<{ id: string; embedding: Embedding; metadata: CandidateMetadata }>): Promise<void> {
    this.upserts.push(rows);
  }
}

function supabaseStore(gateway: FakeGateway, batchSize?: number) {
  return new SupabaseVectorStore(gateway, registryWith(new KeywordEmbedding(VOCAB), new TableScorer({})), batchSize);
}

describe('SupabaseVectorStore', () => {
  it('translates RPC rows into candidates, closest first', async () => {
    const gateway = new FakeGateway([
      { id: 7, metadata: { title: 'Lamp', extra: [1] }, distance: '0.4' },
      { id: 'x1', metadata: null, distance: 0.1 },
    ]);
    const hits = await supabaseStore(gateway).query([3, 4], 5);

    expect(gateway.matchArgs).toEqual([{ queryEmbedding: [0.6, 0.8], matchCount: 5 }]);
    expect(hits).toEqual([
      { id: 'x1', metadata: null, distance: 0.1 },
      { id: '7', metadata: { title: 'Lamp' }, distance: 0.4 },
    ]);
  });

  it('returns [] and 0 when the backend fails', async () => {
    const store = supabaseStore(new FakeGateway([], new Error('connection refused')));
    expect(await store.query([1, 0], 5)).toEqual([]);
    expect(await store.count()).toBe(0);
  });

  it('returns [] when the RPC payload has the wrong shape', async () => {
    const store = supabaseStore(new FakeGateway([{ name: 'no id' }]));
    expect(await store.query([1, 0], 5)).toEqual([]);
  });

  it('drops rows whose distance is missing or not a number and keeps the rest', async () => {
    const withNull = supabaseStore(
      new FakeGateway([
        { id: 'good', metadata: null, distance: 0.1 },
        { id: 'bad', metadata: null, distance: null },
      ]),
    );
    const withNaN = supabaseStore(
      new FakeGateway([
        { id: 'bad', metadata: null, distance: 'NaN' },
        { id: 'good', metadata: null, distance: '0.1' },
      ]),
    );

    expect(await withNull.query([1, 0], 5)).toEqual([{ id: 'good', metadata: null, distance: 0.1 }]);
    expect(await withNaN.query([1, 0], 5)).toEqual([{ id: 'good', metadata: null, distance: 0.1 }]);
  });

  it('writes upserts in batches', async () => {
    const gateway = new FakeGateway([]);
    await supabaseStore(gateway, 2).upsert(['a', 'b', 'c'], [[1, 0], [0, 1], [2, 0]], [{}, {}, {}]);

    expect(gateway.upserts.map((batch) => batch.map((r) => r.id))).toEqual([['a', 'b'], ['c']]);
    expect(gateway.upserts[1][0].embedding).toEqual([1, 0]);
  });

  it('reports its count', async () => {
    expect(await supabaseStore(new FakeGateway([])).count()).toBe(42);
  });
});
