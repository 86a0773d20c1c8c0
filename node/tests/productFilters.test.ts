import { describe, it, expect } from 'vitest';
import { applyFilters, buildTextBlob, matchesFilters, parsePrice, relaxCategory } from '@/filters/productFilters';
import { candidate, filters } from './helpers/fakes';

describe('parsePrice', () => {
  it('reads numbers and display strings', () => {
    expect(parsePrice(80)).toBe(80);
    expect(parsePrice('$1,299.50')).toBe(1299.5);
    expect(parsePrice('80')).toBe(80);
  });

  it('returns null when nothing numeric is present', () => {
    expect(parsePrice('call for price')).toBeNull();
    expect(parsePrice(undefined)).toBeNull();
    expect(parsePrice(Number.NaN)).toBeNull();
  });
});

describe('buildTextBlob', () => {
  it('joins title and text, lower-cased', () => {
    expect(buildTextBlob({ title: 'Trail Runner', text: 'Waterproof SHOE' })).toBe('trail runner waterproof shoe');
  });

  it('falls back to description', () => {
    expect(buildTextBlob({ title: 'Cap', description: 'Cotton' })).toBe('cap cotton');
  });
});

describe('applyFilters', () => {
  const pool = [
    candidate('a', { title: 'Road shoe', price: 80, category: 'running shoes', color: 'red' }),
    candidate('b', { title: 'Trail shoe', price: '$120.00', category: 'shoes', color: 'Red' }),
    candidate('c', { title: 'Helmet', price: 60, category: 'helmets', text: 'bike helmet, MIPS' }),
    candidate('d', null),
  ];

  it('keeps a price equal to price_max and drops one above it', () => {
    const kept = applyFilters(pool, filters({ price_max: 80 }));
    expect(kept.map((c) => c.id)).toEqual(['a', 'c']);
  });

  it('treats price_max as an inclusive bound down to the cent', () => {
    const edge = [
      candidate('at', { title: 'At the limit', price: 100 }),
      candidate('over', { title: 'Just over', price: 100.01 }),
      candidate('over-display', { title: 'Just over, display price', price: '$100.01' }),
    ];
    expect(applyFilters(edge, filters({ price_max: 100 })).map((c) => c.id)).toEqual(['at']);
  });

  it('passes candidates whose price cannot be parsed', () => {
    const kept = applyFilters([candidate('x', { title: 'Mystery', price: 'TBD' })], filters({ price_max: 10 }));
    expect(kept.map((c) => c.id)).toEqual(['x']);
  });

  it('matches category in either substring direction', () => {
    expect(applyFilters(pool, filters({ category: 'shoes' })).map((c) => c.id)).toEqual(['a', 'b']);
    expect(applyFilters(pool, filters({ category: 'trail running shoes' })).map((c) => c.id)).toEqual(['a', 'b']);
  });

  it('matches category through the text blob', () => {
    const kept = applyFilters(
      [candidate('y', { title: 'Road bike helmet', category: 'safety' })],
      filters({ category: 'helmet' }),
    );
    expect(kept.map((c) => c.id)).toEqual(['y']);
  });

  it('matches color case-insensitively on the field', () => {
    expect(applyFilters(pool, filters({ color: 'RED' })).map((c) => c.id)).toEqual(['a', 'b']);
  });

  it('requires every must_have token in the blob', () => {
    expect(applyFilters(pool, filters({ must_have: ['bike', 'mips'] })).map((c) => c.id)).toEqual(['c']);
    expect(applyFilters(pool, filters({ must_have: ['bike', 'carbon'] }))).toEqual([]);
  });

  it('does not enforce exclude', () => {
    expect(applyFilters(pool, filters({ exclude: ['helmet'] })).map((c) => c.id)).toEqual(['a', 'b', 'c']);
  });

  it('drops candidates without metadata', () => {
    expect(matchesFilters(candidate('d', null), filters())).toBe(false);
  });

  it('preserves input order and never grows when a constraint is added', () => {
    const loose = applyFilters(pool, filters({ category: 'shoes' }));
    const tight = applyFilters(pool, filters({ category: 'shoes', price_max: 100 }));
    expect(tight.map((c) => c.id)).toEqual(['a']);
    expect(tight.every((c) => loose.includes(c))).toBe(true);
  });
});

describe('relaxCategory', () => {
  it('clears only the category', () => {
    const original = filters({ category: 'drone', color: 'black', must_have: ['gps'] });
    const relaxed = relaxCategory(original);
    expect(relaxed).toEqual({ ...original, category: null });
    expect(original.category).toBe('drone');
    expect(relaxed.must_have).not.toBe(original.must_have);
  });
});
