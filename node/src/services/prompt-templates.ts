// node/src/services/prompt-templates.ts — extraction and answer prompts

import type { ChatPrompt } from './model-router';
import type { CandidateMetadata, ParsedFilters } from '@/types/core';

const PARSE_SYSTEM = `You are a shopping query parser.
Extract constraints from the user's query and rewrite it for product search.
Return STRICT JSON with exactly these keys:
{ "category": string|null, "color": string|null, "brand": string|null, "gender": string|null,
  "price_max": number|null, "must_have": string[], "exclude": string[], "rewrite": string }`;

export function buildParsePrompt(query: string): ChatPrompt {
  return {
    system: PARSE_SYSTEM,
    user: `User query: "${query}"

Guidelines:
- If no value for a field, use null (or [] for arrays). Do not guess.
- Keep the user's own words for category, color, brand and gender.
- price_max must be numeric (e.g., 120).
- must_have lists words every result must mention; exclude lists words results must not mention.
- 'rewrite' should be a short, search-friendly version of the query.`,
  };
}

/** Fields the answer model may see; internal fields (text blobs, distances) stay out. */
export const ANSWER_CANDIDATE_FIELDS = ['title', 'url', 'price', 'category', 'brand', 'color', 'id'] as const;

/** At most this many candidates are shown to the answer model. */
export const ANSWER_MAX_CANDIDATES = 6;

export type AnswerCandidate = Partial<Record<(typeof ANSWER_CANDIDATE_FIELDS)[number], CandidateMetadata[string]>>;

const ANSWER_SYSTEM = `You are a concise shopping assistant.
You will receive a user query, parsed filters, and candidate products.
Only mention facts present in the candidates. Do NOT invent price, color, or availability.
Return a short recommendation with at most 3-6 items; include titles and URLs.`;

export function buildAnswerPrompt(params: {
  query: string;
  filters: ParsedFilters;
  candidates: AnswerCandidate[];
}): ChatPrompt {
  return {
    system: ANSWER_SYSTEM,
    user: `User query: ${params.query}
Parsed filters: ${JSON.stringify(params.filters)}
Candidates (JSON list of objects with title, url, price, category, brand, color, id):
${JSON.stringify(params.candidates)}`,
  };
}
