import { describe, it, expect } from 'vitest';
import { loadAppConfig } from '@/config/app.config';
import { answerCacheKey, parseCachedResult } from '@/services/cache';
import { fallbackSummary, toAnswerCandidates } from '@/services/llmAnswer';
import { candidate } from './helpers/fakes';

describe('loadAppConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadAppConfig({});
    expect(config.PORT).toBe(4000);
    expect(config.VECTOR_BACKEND).toBe('sqlite');
    expect(config.EMBEDDING_PROVIDER).toBe('tei');
    expect(config.EMBEDDING_MODEL).toBe('intfloat/e5-base-v2');
    expect(config.PARSE_TIMEOUT_MS).toBe(10_000);
    expect(config.RERANK_TIMEOUT_MS).toBe(5_000);
    expect(config.SUMMARIZE_TIMEOUT_MS).toBe(15_000);
    expect(config.REQUEST_TIMEOUT_MS).toBe(30_000);
    expect(config.REDIS_URL).toBeUndefined();
  });

  it('coerces numeric settings and treats blank strings as unset', () => {
    const config = loadAppConfig({ PORT: '8081', RERANK_TIMEOUT_MS: '250', RERANKER_URL: '  ' });
    expect(config.PORT).toBe(8081);
    expect(config.RERANK_TIMEOUT_MS).toBe(250);
    expect(config.RERANKER_URL).toBeUndefined();
  });

  it('lists every invalid key', () => {
    expect(() => loadAppConfig({ PORT: 'abc', VECTOR_BACKEND: 'chroma' })).toThrow(/^Invalid configuration: .*PORT.*VECTOR_BACKEND/);
  });

  it('requires Supabase credentials for the supabase backend', () => {
    expect(() => loadAppConfig({ VECTOR_BACKEND: 'supabase' })).toThrow(
      'Invalid configuration: VECTOR_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY',
    );
    const config = loadAppConfig({
      VECTOR_BACKEND: 'supabase',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    });
    expect(config.SUPABASE_MATCH_FUNCTION).toBe('match_products');
  });
});

describe('answerCacheKey', () => {
  it('normalizes case and surrounding whitespace, and separates k', () => {
    expect(answerCacheKey('  Red Shoes ', 5)).toBe(answerCacheKey('red shoes', 5));
    expect(answerCacheKey('red shoes', 5)).not.toBe(answerCacheKey('red shoes', 6));
    expect(answerCacheKey('red shoes', 5)).toMatch(/^answer:v1:5:[0-9a-f]{40}$/);
  });
});

describe('parseCachedResult', () => {
  const stored = {
    summary: 'One tent.',
    rewrittenQuery: 'tent',
    filters: {
      category: null,
      color: null,
      brand: null,
      gender: null,
      price_max: 300,
      must_have: [],
      exclude: [],
      rewrite: 'tent',
    },
    candidates: [{ id: 't1', score: 0.8, title: 'Tent', price: '$250.00', tags: ['dropped'] }],
    warnings: [],
  };

  it('restores a stored result, keeping scalar candidate fields', () => {
    expect(parseCachedResult(JSON.stringify(stored))).toEqual({
      ...stored,
      candidates: [{ id: 't1', score: 0.8, title: 'Tent', price: '$250.00' }],
    });
  });

  it('returns null for malformed or mis-shaped entries', () => {
    expect(parseCachedResult('{"summary":')).toBeNull();
    expect(parseCachedResult(JSON.stringify({ ...stored, warnings: ['unknown_warning'] }))).toBeNull();
    expect(parseCachedResult(JSON.stringify({ ...stored, candidates: [{ id: 't1' }] }))).toBeNull();
  });
});

describe('answer helpers', () => {
  it('renders the templated summary', () => {
    expect(fallbackSummary('tents', 0)).toBe('No matching products found for "tents".');
    expect(fallbackSummary('tents', 1)).toBe('Found 1 matching product for "tents".');
    expect(fallbackSummary('tents', 3)).toBe('Found 3 matching products for "tents".');
  });

  it('shows the answer model at most six candidates and only display fields', () => {
    const many = Array.from({ length: 8 }, (_, i) =>
      candidate(`id${i}`, { title: `T${i}`, url: `https://shop.test/${i}`, price: i, text: 'long internal blob' }),
    );
    const slim = toAnswerCandidates(many);
    expect(slim).toHaveLength(6);
    expect(slim[0]).toEqual({ id: 'id0', title: 'T0', url: 'https://shop.test/0', price: 0 });
  });
});
