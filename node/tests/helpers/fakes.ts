// In-process stand-ins for the embedding server, relevance scorer and chat model.
import BaseEmbedding from '@/models/base/embedding';
import type { RelevanceScorer } from '@/models/base/reranker';
import { ModelRegistry } from '@/models/registry';
import { BaseVectorStore } from '@/services/providers/vector/vector-store';
import type { ChatPrompt, LlmCallOptions, LlmClient, ModelName } from '@/services/model-router';
import type { Candidate, CandidateMetadata, Embedding, ParsedFilters } from '@/types/core';
import { sleep } from '@/utils/withTimeout';

/**
 * Deterministic bag-of-words embedder over a fixed vocabulary. Prefixes are stripped so
 * queries and passages land in the same space.
 */
export class KeywordEmbedding extends BaseEmbedding {
  readonly seen: string[] = [];
  loads = 0;

  constructor(
    private readonly vocabulary: string[],
    model = 'fake-keyword-embedder',
  ) {
    super({ model, queryPrefix: 'query: ', passagePrefix: 'passage: ' });
  }

  async load(): Promise<void> {
    this.loads += 1;
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    this.seen.push(...texts);
    return texts.map((text) => {
      const words = text.toLowerCase().replace(/^(query|passage): /, '').split(/\W+/);
      return this.vocabulary.map((v) => (words.includes(v) ? 1 : 0));
    });
  }
}

export class FailingEmbedding extends BaseEmbedding {
  constructor(private readonly error: Error = new Error('embedding server down')) {
    super({ model: 'failing-embedder' });
  }

  async load(): Promise<void> {}

  async embedText(): Promise<Embedding[]> {
    throw this.error;
  }
}

/** Scores each document by a fixed lookup; unknown documents score 0. */
export class TableScorer implements RelevanceScorer {
  readonly modelId = 'fake-table-scorer';
  calls = 0;

  constructor(
    private readonly table: Record<string, number>,
    private readonly delayMs = 0,
  ) {}

  async load(): Promise<void> {}

  async score(_query: string, documents: string[], signal?: AbortSignal): Promise<number[]> {
    this.calls += 1;
    if (this.delayMs > 0) await sleep(this.delayMs, signal);
    return documents.map((d) => this.table[d] ?? 0);
  }
}

export function registryWith(embedder: BaseEmbedding, scorer: RelevanceScorer): ModelRegistry {
  return new ModelRegistry({
    embedders: [{ create: () => embedder }],
    rerankers: [{ create: () => scorer }],
    retry: { maxAttempts: 1 },
  });
}

type Reply = string | Error | ((prompt: ChatPrompt, signal?: AbortSignal) => Promise<string>);

/** Chat model stand-in: one scripted reply per task. */
export class ScriptedLlm implements LlmClient {
  readonly calls: Array<{ model: ModelName; prompt: ChatPrompt; options: LlmCallOptions }> = [];

  constructor(private readonly replies: { parse?: Reply; nlg?: Reply }) {}

  async call(model: ModelName, prompt: ChatPrompt, options: LlmCallOptions): Promise<string> {
    this.calls.push({ model, prompt, options });
    const reply = this.replies[model];
    if (reply === undefined) throw new Error(`no scripted reply for ${model}`);
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(prompt, options.signal);
    return reply;
  }

  callsFor(model: ModelName) {
    return this.calls.filter((c) => c.model === model);
  }
}

/** Resolves only when the signal aborts. */
export function hangUntilAborted(_prompt: ChatPrompt, signal?: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    if (!signal) return;
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export function candidate(id: string, metadata: CandidateMetadata | null, distance = 0.2): Candidate {
  return { id, metadata, distance };
}

export function filters(overrides: Partial<ParsedFilters> = {}): ParsedFilters {
  return {
    category: null,
    color: null,
    brand: null,
    gender: null,
    price_max: null,
    must_have: [],
    exclude: [],
    rewrite: 'query',
    ...overrides,
  };
}

/** Vector store that returns a fixed, already-ordered candidate list for any query. */
export class FixedVectorStore extends BaseVectorStore {
  readonly backend = 'sqlite' as const;

  constructor(
    models: ModelRegistry,
    private readonly candidates: Candidate[],
  ) {
    super(models);
  }

  protected async queryNative(_vector: Embedding, topN: number): Promise<Candidate[]> {
    return this.candidates.slice(0, topN);
  }

  protected async countNative(): Promise<number> {
    return this.candidates.length;
  }

  protected async upsertNative(): Promise<void> {
    throw new Error('fixed store is read-only');
  }
}
