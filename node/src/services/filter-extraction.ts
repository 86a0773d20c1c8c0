// src/services/filter-extraction.ts
// Query Parser: turn a free-text shopping query into ParsedFilters via the extraction model.
// Never throws; any failure degrades to pass-through filters (rewrite = raw query).
import { z } from 'zod';
import type { ParsedFilters, ParseOutcome } from '@/types/core';
import type { SimpleModelRouter } from './model-router';
import { buildParsePrompt } from './prompt-templates';
import { safeParseJson } from './safe-parse-json';
import { logger } from './logger';
import { withTimeout } from '@/utils/withTimeout';
import { errorMessage } from '@/utils/errors';

const labelField = z
  .unknown()
  .transform((v) => (typeof v === 'string' && v.trim().length > 0 ? v.trim() : null));

const tokenListField = z
  .unknown()
  .transform((v) =>
    Array.isArray(v)
      ? v.filter((t): t is string => typeof t === 'string' && t.trim().length > 0).map((t) => t.trim())
      : [],
  );

const priceField = z.unknown().transform((v): number | null => {
  let n: number | null = null;
  if (typeof v === 'number') n = v;
  else if (typeof v === 'string' && v.trim().length > 0) n = Number(v.trim());
  return n !== null && Number.isFinite(n) && n >= 0 ? n : null;
});

/** Unknown keys are stripped; every field is coerced rather than rejected. */
const extractedFiltersSchema = z.object({
  category: labelField,
  color: labelField,
  brand: labelField,
  gender: labelField,
  price_max: priceField,
  must_have: tokenListField,
  exclude: tokenListField,
  rewrite: labelField,
});

export function passThroughFilters(rawQuery: string): ParsedFilters {
  return {
    category: null,
    color: null,
    brand: null,
    gender: null,
    price_max: null,
    must_have: [],
    exclude: [],
    rewrite: rawQuery.trim() || rawQuery,
  };
}

/**
 * Validate an extraction payload against the ParsedFilters contract.
 * Returns null when the payload is not an object at all.
 */
export function coerceParsedFilters(payload: unknown, rawQuery: string): ParsedFilters | null {
  const result = extractedFiltersSchema.safeParse(payload);
  if (!result.success) return null;
  const { rewrite, ...rest } = result.data;
  return { ...rest, rewrite: rewrite ?? passThroughFilters(rawQuery).rewrite };
}

export class QueryParser {
  constructor(
    private readonly router: SimpleModelRouter,
    private readonly timeoutMs: number,
  ) {}

  async parse(rawQuery: string, signal?: AbortSignal): Promise<ParseOutcome> {
    try {
      const raw = await withTimeout(
        'parse',
        this.timeoutMs,
        (stageSignal) => this.router.extract(buildParsePrompt(rawQuery), stageSignal),
        signal,
      );
      const payload = safeParseJson(raw, 'query-parser');
      const filters = payload ? coerceParsedFilters(payload, rawQuery) : null;
      if (!filters) {
        return this.degrade(rawQuery, 'extraction returned no JSON object');
      }
      return { filters };
    } catch (err) {
      return this.degrade(rawQuery, errorMessage(err));
    }
  }

  private degrade(rawQuery: string, reason: string): ParseOutcome {
    logger.warn('query_parser:fallback', { reason });
    return { filters: passThroughFilters(rawQuery), warning: `parse_fallback: ${reason}` };
  }
}
