/**
 * Article seed sampling.
 *
 * An article seed is everything the prompt needs before the LLM call:
 * category, author, tone, a story-status hint and a bounded sample of town
 * features and residents. Each choice draws from its own facet RNG, so the
 * same seed string over the same inputs yields the same seed record.
 */

import type {
  AgeGroup,
  ArticleSeed,
  ArticleTables,
  Author,
  DailyArticleSettings,
  Person,
  Town,
  TownFacts,
  TownFeature,
} from './types';
import { facetRng, weightedPick, weightsFromRecord, type Rng } from './utils';

export type ArticleSeedSettings = Pick<DailyArticleSettings, 'priorityCategories' | 'seriousnessWeights' | 'storyStatusWeights'>;

export type ArticleSeedInput = {
  tables: ArticleTables;
  settings: ArticleSeedSettings;
  town: Town | null;
  people: readonly Person[];
  seed: string;
};

/** Parses `18-30` or `71+` into an inclusive age group. */
export function parseAgeGroup(label: string): AgeGroup {
  const open = /^(\d+)\s*\+$/.exec(label.trim());
  if (open) return { label, min: Number(open[1]), max: Number.POSITIVE_INFINITY };
  const closed = /^(\d+)\s*-\s*(\d+)$/.exec(label.trim());
  if (closed) return { label, min: Number(closed[1]), max: Number(closed[2]) };
  throw new Error(`Invalid age group '${label}' (expected N-M or N+)`);
}

export function pickCategory(rng: Rng, tables: ArticleTables, settings: ArticleSeedSettings): string {
  const pool = settings.priorityCategories.length ? settings.priorityCategories : tables.categories;
  return rng.pick(pool);
}

export function pickAuthor(rng: Rng, tables: ArticleTables, category: string): Author {
  const specialists = tables.authors.filter(a => a.specialties.includes(category));
  // Draw the coin even without specialists so later draws stay aligned.
  const wantSpecialist = rng.chance(tables.seed.specialistProbability);
  if (wantSpecialist && specialists.length) return rng.pick(specialists);
  return rng.pick(tables.authors);
}

export function pickTone(rng: Rng, tables: ArticleTables, settings: ArticleSeedSettings): { tone: string; description: string } {
  const weights = settings.seriousnessWeights ?? tables.seed.seriousness;
  const tone = weightedPick(rng, weightsFromRecord(weights));
  const description = tables.prompts.toneDescriptions[tone];
  if (description === undefined) throw new Error(`No tone description for '${tone}'`);
  return { tone, description };
}

export function pickStoryStatusHint(rng: Rng, tables: ArticleTables, settings: ArticleSeedSettings): string {
  const hints = tables.prompts.storyStatusHints;
  const key = settings.storyStatusWeights
    ? weightedPick(rng, weightsFromRecord(settings.storyStatusWeights))
    : rng.pick(Object.keys(hints));
  return hints[key] ?? key;
}

export function sampleTownFacts(rng: Rng, tables: ArticleTables, town: Town | null): TownFacts | null {
  const cfg = tables.seed.townData;
  if (!town || !rng.chance(cfg.inclusionProbability)) return null;

  const sample = <T>(feature: TownFeature, list: readonly T[]): T[] | undefined => {
    const sampling = cfg.features[feature];
    if (!sampling || !rng.chance(sampling.probability) || !list.length) return undefined;
    return rng.pickK(list, Math.min(sampling.maxCount, list.length));
  };

  const features: TownFacts['features'] = {};
  const streets = sample('streets', town.streets);
  if (streets) features.streets = streets;
  const landmarks = sample('landmarks', town.landmarks);
  if (landmarks) features.landmarks = landmarks;
  const businesses = sample('businesses', town.businesses);
  if (businesses) features.businesses = businesses;
  const parks = sample('parks', town.parks);
  if (parks) features.parks = parks;
  const schools = sample('schools', town.schools);
  if (schools) features.schools = schools;
  const services = sample('services', town.services);
  if (services) features.services = services;

  return { townName: town.name, townPopulation: town.population, features };
}

function occupationMatches(person: Person, keywords: readonly string[]): boolean {
  const occupation = person.occupation.toLowerCase();
  return keywords.some(k => occupation.includes(k.toLowerCase()));
}

export function samplePeople(
  rng: Rng,
  tables: ArticleTables,
  people: readonly Person[],
): { people: Person[]; ageGroup: string | null; occupationCategory: string | null } {
  const cfg = tables.seed.peopleData;
  const none = { people: [], ageGroup: null, occupationCategory: null };
  if (!people.length || !rng.chance(cfg.inclusionProbability)) return none;

  const target = rng.int(cfg.minPeople, cfg.maxPeople);
  let pool: readonly Person[] = people;

  let ageGroup: string | null = null;
  if (cfg.ageGroups.length) {
    const group = weightedPick(rng, cfg.ageGroups.map(g => ({ item: g, weight: cfg.ageWeights[g.label] ?? 0 })));
    ageGroup = group.label;
    pool = pool.filter(p => p.age >= group.min && p.age <= group.max);
  }

  let occupationCategory: string | null = null;
  if (Object.keys(cfg.occupationWeights).length) {
    occupationCategory = weightedPick(rng, weightsFromRecord(cfg.occupationWeights));
    const keywords = cfg.occupationKeywords[occupationCategory] ?? [];
    if (keywords.length) {
      const narrowed = pool.filter(p => occupationMatches(p, keywords));
      if (narrowed.length) pool = narrowed;
    }
  }

  return {
    people: rng.pickK(pool, Math.min(target, pool.length)),
    ageGroup,
    occupationCategory,
  };
}

export function sampleArticleSeed(input: ArticleSeedInput): ArticleSeed {
  const { tables, settings, seed } = input;
  const category = pickCategory(facetRng(seed, 'category'), tables, settings);
  const author = pickAuthor(facetRng(seed, 'author'), tables, category);
  const { tone, description } = pickTone(facetRng(seed, 'tone'), tables, settings);
  const storyStatusHint = pickStoryStatusHint(facetRng(seed, 'story-status'), tables, settings);
  const town = sampleTownFacts(facetRng(seed, 'town'), tables, input.town);
  const sampled = samplePeople(facetRng(seed, 'people'), tables, input.people);

  return {
    seed,
    category,
    author,
    tone,
    toneDescription: description,
    storyStatusHint,
    town,
    people: sampled.people,
    ageGroup: sampled.ageGroup,
    occupationCategory: sampled.occupationCategory,
  };
}
