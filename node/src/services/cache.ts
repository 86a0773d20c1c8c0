// node/src/services/cache.ts — Redis cache-aside for final answers; optional when Redis is unavailable
//
// Keyed by (k, normalized query). Only complete, non-degraded results are written (see orchestrator).
import crypto from 'crypto';
import Redis from 'ioredis';
import { z } from 'zod';
import type { RetrievalResult } from '@/types/core';
import { toCandidateMetadata } from './providers/vector/vector-store';
import { logger } from './logger';
import { errorMessage } from '@/utils/errors';

const cachedResultSchema = z.object({
  summary: z.string(),
  rewrittenQuery: z.string(),
  filters: z.object({
    category: z.string().nullable(),
    color: z.string().nullable(),
    brand: z.string().nullable(),
    gender: z.string().nullable(),
    price_max: z.number().nullable(),
    must_have: z.array(z.string()),
    exclude: z.array(z.string()),
    rewrite: z.string(),
  }),
  candidates: z.array(z.object({ id: z.string(), score: z.number() }).passthrough()),
  warnings: z.array(
    z.enum(['parse_degraded', 'retrieval_empty', 'category_relaxed', 'rerank_skipped', 'summary_fallback']),
  ),
});

/**
 * Decode a cached entry. Returns null for anything that is not a well-formed result
 * (older key versions, truncated writes, hand-edited keys).
 */
export function parseCachedResult(raw: string): RetrievalResult | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = cachedResultSchema.safeParse(json);
  if (!parsed.success) return null;
  return {
    ...parsed.data,
    candidates: parsed.data.candidates.map((c) => ({ ...toCandidateMetadata(c), id: c.id, score: c.score })),
  };
}

/** The slice of the Redis client the answer cache uses. */
export interface CacheClient {
  readonly status: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  quit(): Promise<unknown>;
}

export function answerCacheKey(query: string, k: number): string {
  const digest = crypto.createHash('sha1').update(query.trim().toLowerCase()).digest('hex');
  return `answer:v1:${k}:${digest}`;
}

/**
 * Connect to Redis. Returns null (cache disabled) when REDIS_URL is unset or unreachable.
 */
export async function initRedis(redisUrl: string | undefined): Promise<Redis | null> {
  if (!redisUrl) {
    logger.info('redis:skipped', { reason: 'REDIS_URL not set' });
    return null;
  }

  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    retryStrategy(times) {
      if (times > 3) return null; // stop after 3 retries
      return Math.min(times * 200, 2000);
    },
  });

  client.on('error', (err: Error) => {
    logger.warn('redis:error', { error: err.message });
  });

  try {
    await client.connect();
    await client.ping();
    logger.info('redis:connected');
    return client;
  } catch (err) {
    logger.warn('redis:connect_failed', { error: errorMessage(err) });
    client.disconnect();
    return null;
  }
}

export class AnswerCache {
  constructor(
    private readonly redis: CacheClient,
    private readonly ttlSeconds: number,
  ) {}

  async get(query: string, k: number): Promise<RetrievalResult | null> {
    if (this.redis.status !== 'ready') return null;
    try {
      const raw = await this.redis.get(answerCacheKey(query, k));
      if (!raw) return null;
      const parsed = parseCachedResult(raw);
      if (!parsed) logger.warn('redis:invalid_entry', { key: answerCacheKey(query, k) });
      return parsed;
    } catch (err) {
      logger.warn('redis:get_error', { error: errorMessage(err) });
      return null;
    }
  }

  async set(query: string, k: number, value: RetrievalResult): Promise<void> {
    if (this.redis.status !== 'ready' || this.ttlSeconds <= 0) return;
    try {
      await this.redis.set(answerCacheKey(query, k), JSON.stringify(value), 'EX', this.ttlSeconds);
    } catch (err) {
      logger.warn('redis:set_error', { error: errorMessage(err) });
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
