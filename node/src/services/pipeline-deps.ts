// src/services/pipeline-deps.ts — build the pipeline's long-lived collaborators once at startup
import { createClient } from '@supabase/supabase-js';
import type { AppConfig } from '@/config/app.config';
import type { OrchestratorDeps } from '@/services/orchestrator';
import type { VectorStore } from '@/services/providers/vector/vector-store';
import { ModelRegistry, type ModelCandidate } from '@/models/registry';
import type BaseEmbedding from '@/models/base/embedding';
import type { RelevanceScorer } from '@/models/base/reranker';
import { OpenAIEmbedding, TeiEmbedding } from '@/models/embeddings';
import { LexicalScorer, TeiCrossEncoder } from '@/models/rerankers';
import { openVectorDatabase } from '@/db';
import { SqliteVectorStore } from '@/services/providers/vector/sqlite-vector-store';
import { SupabaseVectorStore, createSupabaseGateway } from '@/services/providers/vector/supabase-vector-store';
import { ProviderLlmClient } from '@/services/llm-client';
import { SimpleModelRouter } from '@/services/model-router';
import { QueryParser } from '@/services/filter-extraction';
import { Reranker } from '@/services/rerank';
import { AnswerGenerator } from '@/services/llmAnswer';
import { AnswerCache, initRedis } from '@/services/cache';
import { logger } from '@/services/logger';

export interface PipelineDeps extends OrchestratorDeps {
  models: ModelRegistry;
  close(): Promise<void>;
}

export function createModelRegistry(config: AppConfig): ModelRegistry {
  const embedders: ModelCandidate<BaseEmbedding>[] = [
    {
      create: () =>
        config.EMBEDDING_PROVIDER === 'openai'
          ? new OpenAIEmbedding({
              model: config.EMBEDDING_MODEL,
              apiKey: config.OPENAI_API_KEY,
              baseURL: config.OPENAI_BASE_URL,
            })
          : new TeiEmbedding({ baseUrl: config.EMBEDDING_URL, model: config.EMBEDDING_MODEL }),
    },
  ];
  const fallbackModel = config.EMBEDDING_FALLBACK_MODEL;
  if (fallbackModel) {
    embedders.push({
      create: () =>
        new TeiEmbedding({
          baseUrl: config.EMBEDDING_FALLBACK_URL ?? config.EMBEDDING_URL,
          model: fallbackModel,
        }),
    });
  }

  const rerankers: ModelCandidate<RelevanceScorer>[] = [];
  const rerankerUrl = config.RERANKER_URL;
  if (rerankerUrl) {
    rerankers.push({ create: () => new TeiCrossEncoder({ baseUrl: rerankerUrl, model: config.RERANKER_MODEL }) });
  }
  rerankers.push({ create: () => new LexicalScorer() });

  return new ModelRegistry({ embedders, rerankers });
}

function createVectorStore(config: AppConfig, models: ModelRegistry): VectorStore {
  if (config.VECTOR_BACKEND === 'supabase') {
    const url = config.SUPABASE_URL;
    const key = config.SUPABASE_SERVICE_ROLE_KEY;
    if (!url || !key) {
      throw new Error('VECTOR_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
    }
    const client = createClient(url, key, { auth: { persistSession: false } });
    const gateway = createSupabaseGateway(client, {
      table: config.SUPABASE_TABLE,
      matchFunction: config.SUPABASE_MATCH_FUNCTION,
    });
    return new SupabaseVectorStore(gateway, models);
  }
  return new SqliteVectorStore(openVectorDatabase(config.SQLITE_PATH), models);
}

/**
 * Construct every pipeline collaborator. Called once by the server; the result is passed
 * explicitly to routes. Models are warmed before the server starts taking traffic.
 */
export async function createPipelineDeps(config: AppConfig): Promise<PipelineDeps> {
  const models = createModelRegistry(config);
  await models.warmUp();

  const vectorStore = createVectorStore(config, models);
  logger.info('pipeline:vector_store', { backend: vectorStore.backend });

  const router = new SimpleModelRouter(
    new ProviderLlmClient({
      apiKey: config.OPENAI_API_KEY,
      baseURL: config.OPENAI_BASE_URL,
      parseModel: config.PARSE_MODEL,
      nlgModel: config.NLG_MODEL,
    }),
  );

  const redis = await initRedis(config.REDIS_URL);
  const cache = redis ? new AnswerCache(redis, config.ANSWER_CACHE_TTL_SECONDS) : undefined;

  return {
    models,
    vectorStore,
    parser: new QueryParser(router, config.PARSE_TIMEOUT_MS),
    reranker: new Reranker(models, config.RERANK_TIMEOUT_MS),
    answerer: new AnswerGenerator(router, config.SUMMARIZE_TIMEOUT_MS),
    cache,
    async close() {
      await vectorStore.close();
      await cache?.close();
    },
  };
}
