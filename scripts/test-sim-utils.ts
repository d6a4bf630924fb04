import { describe, expect, it } from 'vitest';
import {
  facetSeed,
  fnv1a32,
  makeRng,
  normalizeSeed,
  normalizeWeights,
  roundTo,
  seededHexId,
  seededUuid,
  sumWeights,
  weightedPick,
  weightedPickKUnique,
  weightsFromRecord,
  weightsSumTo,
  zipWeights,
} from '../src/sim';
import { sequenceRng } from './fixtures';

describe('fnv1a32', () => {
  it('matches the reference offsets', () => {
    expect(fnv1a32('')).toBe(0x811c9dc5);
    expect(fnv1a32('a')).toBe(0xe40c292c);
  });

  it('gives each facet its own seed', () => {
    expect(facetSeed('seed', 'streets')).toBe(fnv1a32('seed::streets'));
    expect(facetSeed('seed', 'streets')).not.toBe(facetSeed('seed', 'parks'));
  });
});

describe('makeRng', () => {
  it('replays the same sequence for the same seed', () => {
    const a = makeRng(42);
    const b = makeRng(42);
    const seqA = Array.from({ length: 5 }, () => a.next01());
    const seqB = Array.from({ length: 5 }, () => b.next01());
    expect(seqA).toEqual(seqB);
  });

  it('keeps int draws inside the inclusive range', () => {
    const rng = makeRng(7);
    for (let i = 0; i < 500; i++) {
      const n = rng.int(3, 6);
      expect(n).toBeGreaterThanOrEqual(3);
      expect(n).toBeLessThanOrEqual(6);
      expect(Number.isInteger(n)).toBe(true);
    }
  });

  it('samples pickK without replacement and caps at the list size', () => {
    const rng = makeRng(99);
    const items = ['a', 'b', 'c', 'd', 'e'];
    const picked = rng.pickK(items, 3);
    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
    expect(rng.pickK(items, 10).sort()).toEqual(items);
    expect(rng.pickK(items, 0)).toEqual([]);
  });

  it('refuses to pick from an empty list', () => {
    expect(() => makeRng(1).pick([])).toThrow('Cannot pick from an empty list');
  });
});

describe('weightedPick', () => {
  it('walks the cumulative weights', () => {
    const items = [
      { item: 'a', weight: 1 },
      { item: 'b', weight: 3 },
    ];
    expect(weightedPick(sequenceRng([0.2]), items)).toBe('a');
    expect(weightedPick(sequenceRng([0.25]), items)).toBe('b');
    expect(weightedPick(sequenceRng([0.99]), items)).toBe('b');
  });

  it('treats negative and non-finite weights as zero', () => {
    const items = [
      { item: 'neg', weight: -5 },
      { item: 'nan', weight: Number.NaN },
      { item: 'ok', weight: 2 },
    ];
    expect(weightedPick(sequenceRng([0]), items)).toBe('ok');
  });

  it('falls back to a uniform pick when every weight is zero', () => {
    const items = [
      { item: 'x', weight: 0 },
      { item: 'y', weight: 0 },
      { item: 'z', weight: 0 },
    ];
    expect(weightedPick(sequenceRng([0.5]), items)).toBe('y');
  });

  it('throws on an empty list', () => {
    expect(() => weightedPick(makeRng(1), [])).toThrow('weightedPick called with no items');
  });
});

describe('weightedPickKUnique', () => {
  it('returns distinct items and skips zero weights', () => {
    const items = [
      { item: 'a', weight: 1 },
      { item: 'b', weight: 0 },
      { item: 'c', weight: 1 },
    ];
    const picked = weightedPickKUnique(makeRng(5), items, 3);
    expect(picked.sort()).toEqual(['a', 'c']);
  });
});

describe('weight tables', () => {
  it('zips aligned weights and rejects length mismatches', () => {
    expect(zipWeights(['a', 'b'], [0.3, 0.7])).toEqual([
      { item: 'a', weight: 0.3 },
      { item: 'b', weight: 0.7 },
    ]);
    expect(() => zipWeights(['a'], [0.5, 0.5])).toThrow('Weight count 2 does not match item count 1');
  });

  it('turns a mapping into weighted entries', () => {
    expect(weightsFromRecord({ light: 0.6, serious: 0.4 })).toEqual([
      { item: 'light', weight: 0.6 },
      { item: 'serious', weight: 0.4 },
    ]);
  });

  it('normalizes and sums weights', () => {
    expect(normalizeWeights({ a: 1, b: 3 })).toEqual({ a: 0.25, b: 0.75 });
    expect(normalizeWeights({ a: 0 })).toEqual({});
    expect(sumWeights({ a: 0.5, b: -1, c: 0.25 })).toBe(0.75);
    expect(weightsSumTo({ a: 0.3333, b: 0.3333, c: 0.3334 })).toBe(true);
    expect(weightsSumTo({ a: 0.5, b: 0.4 })).toBe(false);
  });
});

describe('helpers', () => {
  it('rounds to the given digits', () => {
    expect(roundTo(1.23456, 2)).toBe(1.23);
    expect(roundTo(2.5, 0)).toBe(3);
  });

  it('collapses whitespace in seeds', () => {
    expect(normalizeSeed('  my   town seed ')).toBe('my town seed');
    expect(normalizeSeed(12345)).toBe('12345');
  });

  it('draws UUID-shaped and hex ids from the rng', () => {
    expect(seededUuid(makeRng(3))).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(seededHexId(sequenceRng([0.5]), 8)).toBe('80000000');
    expect(seededHexId(makeRng(3), 12)).toMatch(/^[0-9a-f]{12}$/);
  });
});
