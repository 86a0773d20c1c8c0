// Managed cloud backend: Supabase Postgres + pgvector. Similarity search goes through the
// `match_products` RPC (see node/sql/supabase_vector_store.sql), which returns cosine distance.
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Candidate, CandidateMetadata, Embedding } from '@/types/core';
import type { ModelRegistry } from '@/models/registry';
import { logger } from '@/services/logger';
import { BaseVectorStore, toCandidateMetadata } from './vector-store';

/** The three native calls this backend needs; `createSupabaseGateway` binds them to supabase-js. */
export interface SupabaseVectorGateway {
  match(queryEmbedding: Embedding, matchCount: number): Promise<unknown>;
  count(): Promise<number>;
  upsert(rows: Array<{ id: string; embedding: Embedding; metadata: CandidateMetadata }>): Promise<void>;
}

const matchRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  metadata: z.unknown().optional(),
  // pgvector's `<=>` yields NaN for zero vectors; null, blank and non-finite distances are rejected
  distance: z
    .union([z.number(), z.string().trim().min(1).transform(Number)])
    .pipe(z.number().finite()),
});

export function createSupabaseGateway(
  client: SupabaseClient,
  options: { table: string; matchFunction: string },
): SupabaseVectorGateway {
  return {
    async match(queryEmbedding, matchCount) {
      const { data, error } = await client.rpc(options.matchFunction, {
        query_embedding: queryEmbedding,
        match_count: matchCount,
      });
      if (error) throw new Error(`supabase rpc ${options.matchFunction}: ${error.message}`);
      return data;
    },
    async count() {
      const { count, error } = await client
        .from(options.table)
        .select('id', { count: 'exact', head: true });
      if (error) throw new Error(`supabase count ${options.table}: ${error.message}`);
      return count ?? 0;
    },
    async upsert(rows) {
      const { error } = await client.from(options.table).upsert(rows, { onConflict: 'id' });
      if (error) throw new Error(`supabase upsert ${options.table}: ${error.message}`);
    },
  };
}

export class SupabaseVectorStore extends BaseVectorStore {
  readonly backend = 'supabase' as const;

  constructor(
    private readonly gateway: SupabaseVectorGateway,
    models: ModelRegistry,
    upsertBatchSize?: number,
  ) {
    super(models, upsertBatchSize);
  }

  protected async queryNative(vector: Embedding, topN: number, includeMetadata: boolean): Promise<Candidate[]> {
    const data = await this.gateway.match(vector, topN);
    if (data === null || data === undefined) return [];
    if (!Array.isArray(data)) throw new Error('match rpc returned a non-array payload');

    const rows: Array<z.infer<typeof matchRowSchema>> = [];
    for (const raw of data) {
      const parsed = matchRowSchema.safeParse(raw);
      if (parsed.success) {
        rows.push(parsed.data);
      } else {
        logger.warn('vector_store:row_skipped', {
          backend: this.backend,
          error: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '),
        });
      }
    }
    return rows
      .map((row) => ({
        id: row.id,
        metadata: includeMetadata ? toCandidateMetadata(row.metadata) : null,
        distance: Math.max(0, row.distance),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, topN);
  }

  protected countNative(): Promise<number> {
    return this.gateway.count();
  }

  protected upsertNative(
    rows: Array<{ id: string; embedding: Embedding; metadata: CandidateMetadata }>,
  ): Promise<void> {
    return this.gateway.upsert(rows);
  }
}
