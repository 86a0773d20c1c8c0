// Local embedded backend: vectors in SQLite (better-sqlite3 + drizzle), exact cosine search.
// Brute force over every row; the scan runs on a worker pool so the event loop keeps serving.
import { inArray, sql } from 'drizzle-orm';
import type { Candidate, CandidateMetadata, Embedding } from '@/types/core';
import type { ModelRegistry } from '@/models/registry';
import type { VectorDatabase } from '@/db';
import { productVectors } from '@/db/schema';
import { BaseVectorStore, toCandidateMetadata } from './vector-store';
import { CosineScanPool } from './cosine-scan-pool';

export class SqliteVectorStore extends BaseVectorStore {
  readonly backend = 'sqlite' as const;

  constructor(
    private readonly db: VectorDatabase,
    models: ModelRegistry,
    upsertBatchSize?: number,
    private readonly scanPool = new CosineScanPool(),
  ) {
    super(models, upsertBatchSize);
  }

  protected async queryNative(vector: Embedding, topN: number, includeMetadata: boolean): Promise<Candidate[]> {
    // Embeddings leave SQLite as JSON text; workers decode them
    const rows = this.db
      .select({ id: productVectors.id, embedding: sql<unknown>`${productVectors.embedding}` })
      .from(productVectors)
      .all();
    const hits = await this.scanPool.scan(
      vector,
      rows.map((row) => row.embedding),
      topN,
    );
    const ids = hits.map((hit) => rows[hit.index].id);

    const metadataById = new Map<string, CandidateMetadata | null>();
    if (includeMetadata && ids.length > 0) {
      const metaRows = this.db
        .select({ id: productVectors.id, metadata: productVectors.metadata })
        .from(productVectors)
        .where(inArray(productVectors.id, ids))
        .all();
      for (const row of metaRows) metadataById.set(row.id, toCandidateMetadata(row.metadata));
    }

    return hits.map((hit, i) => ({
      id: ids[i],
      metadata: includeMetadata ? (metadataById.get(ids[i]) ?? null) : null,
      distance: hit.distance,
    }));
  }

  override async close(): Promise<void> {
    await this.scanPool.close();
  }

  protected async countNative(): Promise<number> {
    const row = this.db
      .select({ n: sql<number>`count(*)` })
      .from(productVectors)
      .get();
    return row?.n ?? 0;
  }

  protected async upsertNative(
    rows: Array<{ id: string; embedding: Embedding; metadata: CandidateMetadata }>,
  ): Promise<void> {
    if (rows.length === 0) return;
    this.db
      .insert(productVectors)
      .values(rows)
      .onConflictDoUpdate({
        target: productVectors.id,
        set: {
          embedding: sql`excluded.embedding`,
          metadata: sql`excluded.metadata`,
        },
      })
      .run();
  }
}
