// src/filters/productFilters.ts
//
// Structured + full-text filtering over retrieved candidates. A constraint matches on a
// substring of the field or anywhere in the product's text blob. No synonym or taxonomy tables.
import type { Candidate, CandidateMetadata, CandidateSet, ParsedFilters } from '@/types/core';

function norm(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim().toLowerCase();
}

/**
 * Extract a numeric price from a number or a display string ("$1,299.00", "80").
 * Returns null when nothing numeric is present.
 */
export function parsePrice(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const match = value.replace(/,/g, '').match(/-?\d+(\.\d+)?/);
  if (!match) return null;
  const parsed = parseFloat(match[0]);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Lower-cased title + descriptive text; what fallback matching searches. */
export function buildTextBlob(metadata: CandidateMetadata): string {
  const body = metadata.text ?? metadata.description ?? '';
  return `${norm(metadata.title)} ${norm(body)}`.trim();
}

function matchesPrice(metadata: CandidateMetadata, priceMax: number | null): boolean {
  if (priceMax === null) return true;
  const price = parsePrice(metadata.price);
  if (price === null) return true;
  return price <= priceMax;
}

function matchesCategory(metadata: CandidateMetadata, category: string | null, blob: string): boolean {
  const wanted = norm(category);
  if (!wanted) return true;
  const actual = norm(metadata.category);
  if (actual) {
    if (actual === wanted) return true;
    if (actual.includes(wanted)) return true;
    if (wanted.includes(actual)) return true;
  }
  return blob.includes(wanted);
}

function matchesAttribute(fieldValue: unknown, filterValue: string | null, blob: string): boolean {
  const wanted = norm(filterValue);
  if (!wanted) return true;
  return norm(fieldValue).includes(wanted) || blob.includes(wanted);
}

function matchesMustHave(mustHave: readonly string[], blob: string): boolean {
  return mustHave.every((token) => {
    const t = norm(token);
    return !t || blob.includes(t);
  });
}

/**
 * Per-candidate predicate; every condition must hold. `exclude` is not enforced.
 */
export function matchesFilters(candidate: Candidate, filters: ParsedFilters): boolean {
  const { metadata } = candidate;
  if (!metadata) return false;
  const blob = buildTextBlob(metadata);

  return (
    matchesPrice(metadata, filters.price_max) &&
    matchesCategory(metadata, filters.category, blob) &&
    matchesAttribute(metadata.color, filters.color, blob) &&
    matchesAttribute(metadata.brand, filters.brand, blob) &&
    matchesAttribute(metadata.gender, filters.gender, blob) &&
    matchesMustHave(filters.must_have, blob)
  );
}

/**
 * Order-preserving subset of `candidates` that passes `filters`.
 */
export function applyFilters(candidates: CandidateSet, filters: ParsedFilters): Candidate[] {
  return candidates.filter((c) => matchesFilters(c, filters));
}

/** Copy of `filters` with the category constraint removed; everything else intact. */
export function relaxCategory(filters: ParsedFilters): ParsedFilters {
  return { ...filters, category: null, must_have: [...filters.must_have], exclude: [...filters.exclude] };
}
