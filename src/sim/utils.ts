/**
 * Simulation utility functions
 *
 * Pure helpers shared by the town, people and article-seed generators:
 * - Seeded RNG
 * - Weighted selection
 * - Weight table checks
 * - Rounding and id helpers
 */

// ============================================================================
// RNG Type
// ============================================================================

export type Rng = {
  nextU32: () => number;
  next01: () => number;
  int: (min: number, max: number) => number;
  float: (min: number, max: number) => number;
  chance: (p: number) => boolean;
  pick: <T>(items: readonly T[]) => T;
  pickK: <T>(items: readonly T[], k: number) => T[];
};

export type Weighted<T> = { item: T; weight: number };

// ============================================================================
// RNG Functions
// ============================================================================

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function makeRng(seed: number): Rng {
  const next = mulberry32(seed);
  return {
    nextU32: () => (next() * 0x1_0000_0000) >>> 0,
    next01: () => next(),
    int: (min, max) => {
      const a = Math.ceil(min);
      const b = Math.floor(max);
      return a + Math.floor(next() * (b - a + 1));
    },
    float: (min, max) => min + next() * (max - min),
    chance: (p) => next() < p,
    pick: (items) => {
      if (!items.length) throw new Error('Cannot pick from an empty list');
      return items[Math.floor(next() * items.length)]!;
    },
    pickK: (items, k) => {
      // Partial Fisher-Yates: only the first k slots are shuffled.
      const copy = [...items];
      const n = Math.max(0, Math.min(k, copy.length));
      for (let i = 0; i < n; i++) {
        const j = i + Math.floor(next() * (copy.length - i));
        [copy[i], copy[j]] = [copy[j]!, copy[i]!];
      }
      return copy.slice(0, n);
    },
  };
}

export function facetSeed(seed: string, facet: string): number {
  return fnv1a32(`${seed}::${facet}`);
}

export function facetRng(seed: string, facet: string): Rng {
  return makeRng(facetSeed(seed, facet));
}

export function normalizeSeed(seed: string | number): string {
  return String(seed).trim().replace(/\s+/g, ' ').slice(0, 200);
}

export function randomSeedString(): string {
  const cryptoObj = globalThis.crypto;
  if (cryptoObj && typeof cryptoObj.getRandomValues === 'function') {
    const bytes = new Uint8Array(8);
    cryptoObj.getRandomValues(bytes);
    let n = 0n;
    for (const b of bytes) n = (n << 8n) | BigInt(b);
    return n.toString(36);
  }

  const out: string[] = [];
  for (let i = 0; i < 14; i++) out.push(Math.floor(Math.random() * 36).toString(36));
  return out.join('');
}

// ============================================================================
// Weighted Selection Functions
// ============================================================================

function cleanWeight(weight: number): number {
  return Number.isFinite(weight) ? Math.max(0, weight) : 0;
}

export function weightedPick<T>(rng: Rng, items: ReadonlyArray<Weighted<T>>): T {
  if (!items.length) throw new Error('weightedPick called with no items');
  const cleaned = items
    .map(({ item, weight }) => ({ item, weight: cleanWeight(weight) }))
    .filter(x => x.weight > 0);
  if (!cleaned.length) {
    // Every weight is zero: fall back to a uniform pick.
    return rng.pick(items).item;
  }
  const total = cleaned.reduce((s, x) => s + x.weight, 0);
  let r = rng.next01() * total;
  for (const x of cleaned) {
    r -= x.weight;
    if (r < 0) return x.item;
  }
  return cleaned[cleaned.length - 1]!.item;
}

export function weightedPickKUnique<T>(rng: Rng, items: ReadonlyArray<Weighted<T>>, k: number): T[] {
  const out: T[] = [];
  const remaining = items
    .map(({ item, weight }) => ({ item, weight: cleanWeight(weight) }))
    .filter(x => x.weight > 0);
  while (out.length < k && remaining.length > 0) {
    const picked = weightedPick(rng, remaining.map((x, index) => ({ item: index, weight: x.weight })));
    out.push(remaining[picked]!.item);
    remaining.splice(picked, 1);
  }
  return out;
}

/** Pairs values with an aligned weight array (e.g. a YAML age-band row). */
export function zipWeights<T>(items: readonly T[], weights: readonly number[]): Array<Weighted<T>> {
  if (items.length !== weights.length) {
    throw new Error(`Weight count ${weights.length} does not match item count ${items.length}`);
  }
  return items.map((item, i) => ({ item, weight: weights[i] ?? 0 }));
}

export function weightsFromRecord(record: Readonly<Record<string, number>>): Array<Weighted<string>> {
  return Object.entries(record).map(([item, weight]) => ({ item, weight }));
}

// ============================================================================
// Weight Table Checks
// ============================================================================

export function normalizeWeights(raw: Readonly<Record<string, number>>): Record<string, number> {
  const entries = Object.entries(raw).map(([k, v]) => [k, cleanWeight(v)] as const);
  const total = entries.reduce((s, [, v]) => s + v, 0);
  if (total <= 0) return {};
  const out: Record<string, number> = {};
  for (const [k, v] of entries) out[k] = v / total;
  return out;
}

export function sumWeights(raw: Readonly<Record<string, number>>): number {
  return Object.values(raw).reduce((s, v) => s + cleanWeight(v), 0);
}

export function weightsSumTo(raw: Readonly<Record<string, number>>, target = 1, tolerance = 0.001): boolean {
  return Math.abs(sumWeights(raw) - target) <= tolerance;
}

// ============================================================================
// Formatting helpers
// ============================================================================

export function roundTo(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function hex32(n: number): string {
  return (n >>> 0).toString(16).padStart(8, '0');
}

/** UUID-shaped id drawn from the RNG, so ids replay with the seed. */
export function seededUuid(rng: Rng): string {
  const h = `${hex32(rng.nextU32())}${hex32(rng.nextU32())}${hex32(rng.nextU32())}${hex32(rng.nextU32())}`;
  const variant = ((parseInt(h[16] ?? '0', 16) & 0x3) | 0x8).toString(16);
  return `${h.slice(0, 8)}-${h.slice(8, 12)}-4${h.slice(13, 16)}-${variant}${h.slice(17, 20)}-${h.slice(20, 32)}`;
}

export function seededHexId(rng: Rng, length = 8): string {
  let out = '';
  while (out.length < length) out += hex32(rng.nextU32());
  return out.slice(0, length);
}
