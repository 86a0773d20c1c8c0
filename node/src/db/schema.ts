/**
 * Drizzle Schema
 * Local vector table for the embedded SQLite backend.
 */

import { text, sqliteTable } from 'drizzle-orm/sqlite-core';
import type { CandidateMetadata, Embedding } from '@/types/core';

export const productVectors = sqliteTable('product_vectors', {
  id: text('id').primaryKey(),
  embedding: text('embedding', { mode: 'json' }).$type<Embedding>().notNull(),
  metadata: text('metadata', { mode: 'json' }).$type<CandidateMetadata>(),
});

export type ProductVectorRow = typeof productVectors.$inferSelect;
