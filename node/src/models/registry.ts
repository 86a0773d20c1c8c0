/**
 * Model Registry: process-wide cache of loaded embedding and reranking model handles.
 *
 * Constructed once during startup (see `services/pipeline-deps.ts`) and passed to the
 * components that need it. Each slot is get-or-create: concurrent callers share the
 * in-flight load instead of loading twice. A slot holds an ordered list of candidates;
 * when the primary fails to load, the next one is loaded and recorded as a fallback.
 * After a slot resolves, its value never changes.
 */

import BaseEmbedding from './base/embedding';
import type { RelevanceScorer } from './base/reranker';
import { logger } from '@/services/logger';
import { isRateLimitError, retryWithBackoff, type RetryOptions } from '@/utils/retryWithBackoff';
import { errorMessage } from '@/utils/errors';

interface LoadableModel {
  readonly modelId: string;
  load(): Promise<void>;
}

export interface ModelCandidate<T extends LoadableModel> {
  create: () => T;
}

export type ModelSlotName = 'embedder' | 'reranker';

export interface LoadedModelInfo {
  slot: ModelSlotName;
  modelId: string;
  fallback: boolean;
}

class ModelSlot<T extends LoadableModel> {
  private value: T | null = null;
  private pending: Promise<T> | null = null;
  private info: LoadedModelInfo | null = null;

  constructor(
    private readonly name: ModelSlotName,
    private readonly candidates: ModelCandidate<T>[],
    private readonly retry: RetryOptions,
  ) {
    if (candidates.length === 0) {
      throw new Error(`model slot "${name}" needs at least one candidate`);
    }
  }

  get loadedInfo(): LoadedModelInfo | null {
    return this.info;
  }

  get(): Promise<T> {
    if (this.value) return Promise.resolve(this.value);
    if (!this.pending) {
      this.pending = this.loadFirstAvailable().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async loadFirstAvailable(): Promise<T> {
    let lastError: unknown = null;
    for (let i = 0; i < this.candidates.length; i++) {
      let model: T | null = null;
      const startedAt = Date.now();
      try {
        const created = this.candidates[i].create();
        model = created;
        await retryWithBackoff(() => created.load(), {
          ...this.retry,
          shouldRetry: isRateLimitError,
          label: `${this.name}:${created.modelId}`,
        });
        this.value = created;
        this.info = { slot: this.name, modelId: created.modelId, fallback: i > 0 };
        logger.info('models:loaded', {
          slot: this.name,
          modelId: created.modelId,
          fallback: i > 0,
          ms: Date.now() - startedAt,
        });
        return created;
      } catch (err) {
        lastError = err;
        logger.warn('models:load_failed', {
          slot: this.name,
          modelId: model?.modelId ?? `candidate #${i}`,
          error: errorMessage(err),
          willFallback: i < this.candidates.length - 1,
        });
      }
    }
    throw new Error(`no ${this.name} model could be loaded: ${errorMessage(lastError)}`);
  }
}

export interface ModelRegistryOptions {
  embedders: ModelCandidate<BaseEmbedding>[];
  rerankers: ModelCandidate<RelevanceScorer>[];
  retry?: RetryOptions;
}

export class ModelRegistry {
  private readonly embedder: ModelSlot<BaseEmbedding>;
  private readonly reranker: ModelSlot<RelevanceScorer>;

  constructor(options: ModelRegistryOptions) {
    const retry: RetryOptions = { maxAttempts: 3, initialDelay: 1000, ...options.retry };
    this.embedder = new ModelSlot('embedder', options.embedders, retry);
    this.reranker = new ModelSlot('reranker', options.rerankers, retry);
  }

  getEmbedder(): Promise<BaseEmbedding> {
    return this.embedder.get();
  }

  getReranker(): Promise<RelevanceScorer> {
    return this.reranker.get();
  }

  /** Load every slot up front so the first request does not pay for it. */
  async warmUp(): Promise<void> {
    await Promise.all([this.getEmbedder(), this.getReranker()]);
  }

  describe(): LoadedModelInfo[] {
    return [this.embedder.loadedInfo, this.reranker.loadedInfo].filter(
      (info): info is LoadedModelInfo => info !== null,
    );
  }
}
