/**
 * Config document validation.
 *
 * Turns parsed YAML documents (plain `unknown` trees) into the typed tables
 * the generators consume. Every problem throws with the dotted path of the
 * offending key, e.g. `Town config missing: town_sizes.medium`.
 */

import { parseAgeGroup } from './articleSeed';
import { parseAgeRange } from './temperament';
import {
  SIZE_CATEGORIES,
  TOWN_FEATURES,
  type AgeBandWeights,
  type AgeRule,
  type ArticleTables,
  type DailyArticleSettings,
  type FeatureSampling,
  type IntRange,
  type ModelArgValue,
  type ModelArgs,
  type Newspaper,
  type PeopleTables,
  type SizeCategory,
  type SubstringRule,
  type TownFeature,
  type TownSizeTable,
  type TownTables,
} from './types';
import { weightsSumTo } from './utils';

export type TownInitSettings = {
  town: { name: string | null; locale: string; seed: string; size: SizeCategory };
  population: { scaleFactor: number; minPeople: number };
  newspaper: Newspaper | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function join(path: string, key: string | number): string {
  return path ? `${path}.${key}` : String(key);
}

// ─────────────────────────────────────────────────────────────
// Reader
// ─────────────────────────────────────────────────────────────

class ConfigReader {
  constructor(private readonly label: string) {}

  fail(path: string, expected?: string): never {
    if (!expected) throw new Error(`${this.label} missing: ${path}`);
    throw new Error(`${this.label} invalid: ${path} (expected ${expected})`);
  }

  get(obj: Record<string, unknown>, key: string, path: string): unknown {
    const value = obj[key];
    if (value === undefined || value === null) this.fail(join(path, key));
    return value;
  }

  record(value: unknown, path: string): Record<string, unknown> {
    if (!isRecord(value)) this.fail(path, 'a mapping');
    return value;
  }

  child(obj: Record<string, unknown>, key: string, path: string): Record<string, unknown> {
    return this.record(this.get(obj, key, path), join(path, key));
  }

  str(value: unknown, path: string): string {
    if (typeof value === 'number') return String(value);
    if (typeof value !== 'string' || !value.trim()) this.fail(path, 'a non-empty string');
    return value;
  }

  num(value: unknown, path: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) this.fail(path, 'a number');
    return value;
  }

  int(value: unknown, path: string): number {
    const n = this.num(value, path);
    if (!Number.isInteger(n)) this.fail(path, 'an integer');
    return n;
  }

  bool(value: unknown, path: string): boolean {
    if (typeof value !== 'boolean') this.fail(path, 'true or false');
    return value;
  }

  list(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) this.fail(path, 'a list');
    return value;
  }

  strList(value: unknown, path: string, allowEmpty = false): string[] {
    const items = this.list(value, path).map((v, i) => this.str(v, join(path, i)));
    if (!allowEmpty && !items.length) this.fail(path, 'a non-empty list');
    return items;
  }

  numList(value: unknown, path: string): number[] {
    return this.list(value, path).map((v, i) => this.num(v, join(path, i)));
  }

  intList(value: unknown, path: string): number[] {
    return this.list(value, path).map((v, i) => this.int(v, join(path, i)));
  }

  range(value: unknown, path: string): IntRange {
    const [min, max, ...rest] = this.intList(value, path);
    if (min === undefined || max === undefined || rest.length || min > max) this.fail(path, '[min, max] with min <= max');
    return [min, max];
  }

  numRecord(value: unknown, path: string): Record<string, number> {
    const obj = this.record(value, path);
    const out: Record<string, number> = {};
    for (const [k, v] of Object.entries(obj)) out[k] = this.num(v, join(path, k));
    return out;
  }

  strRecord(value: unknown, path: string, allowEmpty = true): Record<string, string> {
    const obj = this.record(value, path);
    const out: Record<string, string> = {};
    for (const [k, v] of Object.entries(obj)) out[k] = this.str(v, join(path, k));
    if (!allowEmpty && !Object.keys(out).length) this.fail(path, 'a non-empty mapping');
    return out;
  }

  weights(value: unknown, path: string): Record<string, number> {
    const weights = this.numRecord(value, path);
    if (!weightsSumTo(weights)) this.fail(path, 'weights summing to 1.0');
    return weights;
  }

  probability(value: unknown, path: string): number {
    const p = this.num(value, path);
    if (p < 0 || p > 1) this.fail(path, 'a probability between 0 and 1');
    return p;
  }
}

// ─────────────────────────────────────────────────────────────
// config/town.yaml
// ─────────────────────────────────────────────────────────────

export function parseTownTables(doc: unknown): TownTables {
  const r: ConfigReader = new ConfigReader('Town config');
  const root = r.record(doc, '(root)');

  const sizes = r.child(root, 'town_sizes', '');
  const sizeTable = (size: SizeCategory): TownSizeTable => {
    const t = r.child(sizes, size, 'town_sizes');
    const p = `town_sizes.${size}`;
    return {
      populationRange: r.range(r.get(t, 'population_range', p), `${p}.population_range`),
      streetCountRange: r.range(r.get(t, 'street_count_range', p), `${p}.street_count_range`),
      businessCountRange: r.range(r.get(t, 'business_count_range', p), `${p}.business_count_range`),
      landmarkCountRange: r.range(r.get(t, 'landmark_count_range', p), `${p}.landmark_count_range`),
      parkCountRange: r.range(r.get(t, 'park_count_range', p), `${p}.park_count_range`),
      schoolCountRange: r.range(r.get(t, 'school_count_range', p), `${p}.school_count_range`),
      serviceCountRange: r.range(r.get(t, 'service_count_range', p), `${p}.service_count_range`),
    };
  };

  const patterns = r.child(root, 'street_patterns', '');
  const streetPatterns: Record<string, string[]> = {};
  for (const [locale, list] of Object.entries(patterns)) {
    streetPatterns[locale] = r.strList(list, `street_patterns.${locale}`);
  }

  const nc = r.child(root, 'name_components', '');
  const ncList = (key: string) => r.strList(r.get(nc, key, 'name_components'), `name_components.${key}`);
  const adjectives = r.child(nc, 'business_name_adjectives', 'name_components');
  const nouns = r.child(nc, 'business_name_nouns', 'name_components');
  const adjPath = 'name_components.business_name_adjectives';
  const nounPath = 'name_components.business_name_nouns';

  return {
    townSizes: {
      small: sizeTable('small'),
      medium: sizeTable('medium'),
      large: sizeTable('large'),
    },
    streetPatterns,
    streetTypes: r.strList(r.get(root, 'street_types', ''), 'street_types'),
    businessTypes: r.weights(r.get(root, 'business_types', ''), 'business_types'),
    landmarkTypes: r.strList(r.get(root, 'landmark_types', ''), 'landmark_types'),
    parkTypes: r.strList(r.get(root, 'park_types', ''), 'park_types'),
    schoolTypes: r.strList(r.get(root, 'school_types', ''), 'school_types'),
    serviceTypes: r.strList(r.get(root, 'service_types', ''), 'service_types'),
    countryMapping: r.strRecord(r.get(root, 'country_mapping', ''), 'country_mapping'),
    nameComponents: {
      treeNames: ncList('tree_names'),
      streetPrefixes: ncList('street_prefixes'),
      directionalPrefixes: ncList('directional_prefixes'),
      ordinalPrefixes: ncList('ordinal_prefixes'),
      businessAdjectives: {
        descriptive: r.strList(r.get(adjectives, 'descriptive', adjPath), `${adjPath}.descriptive`),
        locationBased: r.strList(r.get(adjectives, 'location_based', adjPath), `${adjPath}.location_based`),
        sizeBased: r.strList(r.get(adjectives, 'size_based', adjPath), `${adjPath}.size_based`),
        speedBased: r.strList(r.get(adjectives, 'speed_based', adjPath), `${adjPath}.speed_based`),
      },
      businessNouns: {
        restaurant: r.strList(r.get(nouns, 'restaurant', nounPath), `${nounPath}.restaurant`),
        retail: r.strList(r.get(nouns, 'retail', nounPath), `${nounPath}.retail`),
        gas: r.strList(r.get(nouns, 'gas', nounPath), `${nounPath}.gas`),
      },
      familyOwners: ncList('family_owners'),
      parkPrefixes: ncList('park_prefixes'),
      historicBuildings: ncList('historic_buildings'),
      museumKinds: ncList('museum_kinds'),
      climateTypes: ncList('climate_types'),
      facilityTypes: ncList('facility_types'),
      historicalSignificanceLevels: ncList('historical_significance_levels'),
    },
  };
}

// ─────────────────────────────────────────────────────────────
// config/people.yaml
// ─────────────────────────────────────────────────────────────

function ageBands(r: ConfigReader, value: unknown, path: string, width: number): AgeBandWeights[] {
  const bands = r.list(value, path).map((raw, i) => {
    const p = join(path, i);
    const band = r.record(raw, p);
    const weights = r.numList(r.get(band, 'weights', p), `${p}.weights`);
    if (weights.length !== width) r.fail(`${p}.weights`, `${width} weights`);
    const below = band.below === undefined ? undefined : r.int(band.below, `${p}.below`);
    return below === undefined ? { weights } : { below, weights };
  });
  if (!bands.length) r.fail(path, 'a non-empty list');
  if (bands[bands.length - 1]?.below !== undefined) r.fail(path, 'a final band without `below`');
  return bands;
}

function substringRules(r: ConfigReader, value: unknown, path: string): Record<string, SubstringRule[]> {
  const out: Record<string, SubstringRule[]> = {};
  for (const [type, list] of Object.entries(r.record(value, path))) {
    out[type] = r.list(list, join(path, type)).map((raw, i) => {
      const p = `${join(path, type)}.${i}`;
      const rule = r.record(raw, p);
      const field = rule.field === undefined ? 'status' : r.str(rule.field, `${p}.field`);
      if (field !== 'status' && field !== 'occupation') r.fail(`${p}.field`, "'status' or 'occupation'");
      return {
        field,
        contains: r.strList(r.get(rule, 'contains', p), `${p}.contains`),
        delta: r.num(r.get(rule, 'delta', p), `${p}.delta`),
      };
    });
  }
  return out;
}

export function parsePeopleTables(doc: unknown): PeopleTables {
  const r: ConfigReader = new ConfigReader('People config');
  const root = r.record(doc, '(root)');

  const age = r.child(root, 'age', '');
  const minAge = r.int(r.get(age, 'min_age', 'age'), 'age.min_age');
  const maxAge = r.int(r.get(age, 'max_age', 'age'), 'age.max_age');
  if (minAge > maxAge) r.fail('age.max_age', 'max_age >= min_age');

  const education = r.child(root, 'education', '');
  const levels = r.strList(r.get(education, 'levels', 'education'), 'education.levels');
  const employment = r.child(root, 'employment', '');
  const statuses = r.strList(r.get(employment, 'statuses', 'employment'), 'employment.statuses');
  const marital = r.child(root, 'marital_status', '');
  const maritalStatuses = r.strList(r.get(marital, 'statuses', 'marital_status'), 'marital_status.statuses');

  const household = r.child(root, 'household_size', '');
  const householdBands = r.list(r.get(household, 'by_age', 'household_size'), 'household_size.by_age').map((raw, i) => {
    const p = `household_size.by_age.${i}`;
    const band = r.record(raw, p);
    const sizes = r.intList(r.get(band, 'sizes', p), `${p}.sizes`);
    const weights = r.numList(r.get(band, 'weights', p), `${p}.weights`);
    if (!sizes.length || sizes.length !== weights.length) r.fail(`${p}.weights`, 'one weight per size');
    const below = band.below === undefined ? undefined : r.int(band.below, `${p}.below`);
    return below === undefined ? { sizes, weights } : { below, sizes, weights };
  });
  if (householdBands[householdBands.length - 1]?.below !== undefined) {
    r.fail('household_size.by_age', 'a final band without `below`');
  }

  const income = r.child(root, 'income', '');
  const variation = r.numList(r.get(income, 'variation', 'income'), 'income.variation');
  const [vMin, vMax] = variation;
  if (variation.length !== 2 || vMin === undefined || vMax === undefined || vMin > vMax) {
    r.fail('income.variation', '[min, max]');
  }

  const temperaments = r.list(r.get(root, 'temperaments', ''), 'temperaments').map((raw, i) => {
    const p = `temperaments.${i}`;
    const t = r.record(raw, p);
    return {
      type: r.str(r.get(t, 'type', p), `${p}.type`),
      description: r.str(r.get(t, 'description', p), `${p}.description`),
      traits: r.strList(r.get(t, 'traits', p), `${p}.traits`),
    };
  });
  if (!temperaments.length) r.fail('temperaments', 'a non-empty list');

  const adj = r.child(root, 'temperament_adjustments', '');
  const ageRules: Record<string, AgeRule[]> = {};
  for (const [type, list] of Object.entries(r.child(adj, 'age', 'temperament_adjustments'))) {
    ageRules[type] = r.list(list, `temperament_adjustments.age.${type}`).map((raw, i) => {
      const p = `temperament_adjustments.age.${type}.${i}`;
      const rule = r.record(raw, p);
      const label = r.str(r.get(rule, 'range', p), `${p}.range`);
      return { label, range: parseAgeRange(label), delta: r.num(r.get(rule, 'delta', p), `${p}.delta`) };
    });
  }

  return {
    age: {
      minAge,
      maxAge,
      weights: r.list(r.get(age, 'weights', 'age'), 'age.weights').map((raw, i) => {
        const p = `age.weights.${i}`;
        const band = r.record(raw, p);
        return { range: r.range(r.get(band, 'range', p), `${p}.range`), weight: r.num(r.get(band, 'weight', p), `${p}.weight`) };
      }),
      defaultWeight: age.default_weight === undefined ? 1 : r.num(age.default_weight, 'age.default_weight'),
    },
    genders: r.strList(r.get(root, 'genders', ''), 'genders'),
    education: {
      levels,
      byAge: ageBands(r, r.get(education, 'by_age', 'education'), 'education.by_age', levels.length),
    },
    employment: {
      statuses,
      byAge: ageBands(r, r.get(employment, 'by_age', 'employment'), 'employment.by_age', statuses.length),
      occupationStatuses: r.strList(r.get(employment, 'occupation_statuses', 'employment'), 'employment.occupation_statuses'),
    },
    maritalStatus: {
      statuses: maritalStatuses,
      byAge: ageBands(r, r.get(marital, 'by_age', 'marital_status'), 'marital_status.by_age', maritalStatuses.length),
    },
    householdSize: { byAge: householdBands },
    income: {
      minIncome: r.num(r.get(income, 'min_income', 'income'), 'income.min_income'),
      fixedRanges: r.list(r.get(income, 'fixed_ranges', 'income'), 'income.fixed_ranges').map((raw, i) => {
        const p = `income.fixed_ranges.${i}`;
        const entry = r.record(raw, p);
        return {
          contains: r.strList(r.get(entry, 'contains', p), `${p}.contains`),
          range: r.range(r.get(entry, 'range', p), `${p}.range`),
        };
      }),
      educationBase: r.numRecord(r.get(income, 'education_base', 'income'), 'income.education_base'),
      defaultBase: r.num(r.get(income, 'default_base', 'income'), 'income.default_base'),
      ageMultipliers: r.list(r.get(income, 'age_multipliers', 'income'), 'income.age_multipliers').map((raw, i) => {
        const p = `income.age_multipliers.${i}`;
        const entry = r.record(raw, p);
        return {
          range: r.range(r.get(entry, 'range', p), `${p}.range`),
          multiplier: r.num(r.get(entry, 'multiplier', p), `${p}.multiplier`),
        };
      }),
      defaultMultiplier: r.num(r.get(income, 'default_multiplier', 'income'), 'income.default_multiplier'),
      variation: [vMin, vMax],
    },
    temperaments,
    temperamentAdjustments: {
      minWeight: r.num(r.get(adj, 'min_weight', 'temperament_adjustments'), 'temperament_adjustments.min_weight'),
      age: ageRules,
      education: substringRules(r, r.get(adj, 'education', 'temperament_adjustments'), 'temperament_adjustments.education'),
      employment: substringRules(r, r.get(adj, 'employment', 'temperament_adjustments'), 'temperament_adjustments.employment'),
    },
    countryMapping: r.strRecord(r.get(root, 'country_mapping', ''), 'country_mapping'),
  };
}

// ─────────────────────────────────────────────────────────────
// config/articles.yaml
// ─────────────────────────────────────────────────────────────

function modelArgValue(r: ConfigReader, value: unknown, path: string): ModelArgValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return r.num(value, path);
  if (Array.isArray(value)) return value.map((v, i) => modelArgValue(r, v, join(path, i)));
  if (!isRecord(value)) return r.fail(path, 'a plain YAML value');
  const out: Record<string, ModelArgValue> = {};
  for (const [k, v] of Object.entries(value)) out[k] = modelArgValue(r, v, join(path, k));
  return out;
}

function modelArgs(r: ConfigReader, value: unknown, path: string): ModelArgs {
  const out: ModelArgs = {};
  for (const [k, v] of Object.entries(r.record(value, path))) out[k] = modelArgValue(r, v, join(path, k));
  if (out.model !== undefined && typeof out.model !== 'string') r.fail(join(path, 'model'), 'a string');
  return out;
}

export function parseArticleTables(doc: unknown): ArticleTables {
  const r: ConfigReader = new ConfigReader('Article config');
  const root = r.record(doc, '(root)');

  const prompts = r.child(root, 'prompts', '');
  const toneDescriptions = r.strRecord(r.get(prompts, 'tone_descriptions', 'prompts'), 'prompts.tone_descriptions');

  const seedCfg = r.child(root, 'article_seed', '');
  const tone = r.child(seedCfg, 'tone', 'article_seed');
  const seriousness = r.weights(r.get(tone, 'seriousness', 'article_seed.tone'), 'article_seed.tone.seriousness');
  for (const key of Object.keys(seriousness)) {
    if (toneDescriptions[key] === undefined) r.fail(`prompts.tone_descriptions.${key}`);
  }

  const townData = r.child(seedCfg, 'town_data', 'article_seed');
  const featureCfg = r.child(townData, 'feature_weights', 'article_seed.town_data');
  const features: Partial<Record<TownFeature, FeatureSampling>> = {};
  for (const [key, raw] of Object.entries(featureCfg)) {
    const p = `article_seed.town_data.feature_weights.${key}`;
    const feature = TOWN_FEATURES.find(f => f === key);
    if (!feature) r.fail(p, `one of ${TOWN_FEATURES.join(', ')}`);
    const entry = r.record(raw, p);
    const maxCount = r.int(r.get(entry, 'max_count', p), `${p}.max_count`);
    if (maxCount < 0) r.fail(`${p}.max_count`, 'a count >= 0');
    features[feature] = { probability: r.probability(r.get(entry, 'probability', p), `${p}.probability`), maxCount };
  }

  const peopleData = r.child(seedCfg, 'people_data', 'article_seed');
  const pp = 'article_seed.people_data';
  const minPeople = r.int(r.get(peopleData, 'min_people_per_article', pp), `${pp}.min_people_per_article`);
  const maxPeople = r.int(r.get(peopleData, 'max_people_per_article', pp), `${pp}.max_people_per_article`);
  if (minPeople < 0 || minPeople > maxPeople) r.fail(`${pp}.max_people_per_article`, 'max >= min >= 0');
  const demographics = r.child(peopleData, 'demographic_weights', pp);
  const ageWeights = r.weights(r.get(demographics, 'age', `${pp}.demographic_weights`), `${pp}.demographic_weights.age`);
  const occupationWeights = demographics.occupation_categories === undefined
    ? {}
    : r.weights(demographics.occupation_categories, `${pp}.demographic_weights.occupation_categories`);
  const occupationKeywords: Record<string, string[]> = {};
  if (peopleData.occupation_keywords !== undefined) {
    for (const [k, v] of Object.entries(r.record(peopleData.occupation_keywords, `${pp}.occupation_keywords`))) {
      occupationKeywords[k] = r.strList(v, `${pp}.occupation_keywords.${k}`, true);
    }
  }

  const authors = r.list(r.get(root, 'authors', ''), 'authors').map((raw, i) => {
    const p = `authors.${i}`;
    const a = r.record(raw, p);
    return {
      name: r.str(r.get(a, 'name', p), `${p}.name`),
      persona: r.str(r.get(a, 'persona', p), `${p}.persona`),
      specialties: r.strList(r.get(a, 'specialties', p), `${p}.specialties`),
      writingStyle: r.str(r.get(a, 'writing_style', p), `${p}.writing_style`),
    };
  });
  if (!authors.length) r.fail('authors', 'a non-empty list');

  return {
    categories: r.strList(r.get(root, 'categories', ''), 'categories'),
    modelArgs: root.model_args === undefined ? {} : modelArgs(r, root.model_args, 'model_args'),
    prompts: {
      systemPrompt: r.str(r.get(prompts, 'system_prompt', 'prompts'), 'prompts.system_prompt'),
      userPrompt: r.str(r.get(prompts, 'user_prompt', 'prompts'), 'prompts.user_prompt'),
      toneDescriptions,
      storyStatusHints: r.strRecord(r.get(prompts, 'story_status_hints', 'prompts'), 'prompts.story_status_hints', false),
    },
    seed: {
      specialistProbability: r.probability(
        r.get(seedCfg, 'specialist_probability', 'article_seed'),
        'article_seed.specialist_probability',
      ),
      seriousness,
      townData: {
        inclusionProbability: r.probability(
          r.get(townData, 'inclusion_probability', 'article_seed.town_data'),
          'article_seed.town_data.inclusion_probability',
        ),
        features,
      },
      peopleData: {
        inclusionProbability: r.probability(r.get(peopleData, 'inclusion_probability', pp), `${pp}.inclusion_probability`),
        minPeople,
        maxPeople,
        ageWeights,
        ageGroups: Object.keys(ageWeights).map(parseAgeGroup),
        occupationWeights,
        occupationKeywords,
      },
    },
    authors,
  };
}

// ─────────────────────────────────────────────────────────────
// articles_daily_config.yaml
// ─────────────────────────────────────────────────────────────

export function parseDailySettings(doc: unknown, tables: ArticleTables): DailyArticleSettings {
  const r: ConfigReader = new ConfigReader('Daily article config');
  const root = r.record(doc, '(root)');
  const a = r.child(root, 'articles', '');

  const count = r.int(r.get(a, 'count', 'articles'), 'articles.count');
  if (count < 1) r.fail('articles.count', 'a count >= 1');

  const priorityCategories = a.priority_categories === undefined || a.priority_categories === null
    ? []
    : r.strList(a.priority_categories, 'articles.priority_categories', true);
  priorityCategories.forEach((c, i) => {
    if (!tables.categories.includes(c)) r.fail(`articles.priority_categories.${i}`, `one of ${tables.categories.join(', ')}`);
  });

  let seriousnessWeights: Record<string, number> | null = null;
  if (a.seriousness_weights !== undefined && a.seriousness_weights !== null) {
    seriousnessWeights = r.weights(a.seriousness_weights, 'articles.seriousness_weights');
    for (const key of Object.keys(seriousnessWeights)) {
      if (tables.prompts.toneDescriptions[key] === undefined) r.fail(`articles.seriousness_weights.${key}`, 'a tone with a description');
    }
  }

  let storyStatusWeights: Record<string, number> | null = null;
  if (a.story_status_weights !== undefined && a.story_status_weights !== null) {
    storyStatusWeights = r.weights(a.story_status_weights, 'articles.story_status_weights');
  }

  const save = a.save_options === undefined ? {} : r.record(a.save_options, 'articles.save_options');
  const articleLimit = save.article_limit === undefined ? 0 : r.int(save.article_limit, 'articles.save_options.article_limit');
  if (articleLimit < 0) r.fail('articles.save_options.article_limit', 'a limit >= 0 (0 = unlimited)');
  const delayMs = a.delay_ms === undefined ? 1000 : r.int(a.delay_ms, 'articles.delay_ms');
  if (delayMs < 0) r.fail('articles.delay_ms', 'a delay >= 0');

  return {
    count,
    priorityCategories,
    seriousnessWeights,
    storyStatusWeights,
    delayMs,
    seed: a.seed === undefined || a.seed === null ? null : r.str(a.seed, 'articles.seed'),
    backupBeforeSave: save.backup_before_save === undefined ? true : r.bool(save.backup_before_save, 'articles.save_options.backup_before_save'),
    articleLimit,
    modelArgs: { ...tables.modelArgs, ...(a.model_args === undefined ? {} : modelArgs(r, a.model_args, 'articles.model_args')) },
  };
}

// ─────────────────────────────────────────────────────────────
// town_init_config.yaml
// ─────────────────────────────────────────────────────────────

export function parseTownInitSettings(doc: unknown): TownInitSettings {
  const r: ConfigReader = new ConfigReader('Town init config');
  const root = r.record(doc, '(root)');
  const town = r.child(root, 'town', '');
  const size = town.size === undefined ? 'medium' : r.str(town.size, 'town.size');
  const sizeCategory = SIZE_CATEGORIES.find(s => s === size);
  if (!sizeCategory) r.fail('town.size', SIZE_CATEGORIES.join(' | '));

  const population = root.population === undefined ? {} : r.record(root.population, 'population');
  const scaleFactor = population.scale_factor === undefined ? 0.02 : r.num(population.scale_factor, 'population.scale_factor');
  if (scaleFactor <= 0) r.fail('population.scale_factor', 'a factor > 0');
  const minPeople = population.min_people === undefined ? 100 : r.int(population.min_people, 'population.min_people');
  if (minPeople < 1) r.fail('population.min_people', 'a count >= 1');

  let newspaper: Newspaper | null = null;
  if (root.newspaper !== undefined && root.newspaper !== null) {
    const n = r.record(root.newspaper, 'newspaper');
    newspaper = {
      name: r.str(r.get(n, 'name', 'newspaper'), 'newspaper.name'),
      tagline: n.tagline === undefined ? '' : r.str(n.tagline, 'newspaper.tagline'),
      foundedYear: r.int(r.get(n, 'founded_year', 'newspaper'), 'newspaper.founded_year'),
      publicationFrequency: n.publication_frequency === undefined
        ? 'Daily'
        : r.str(n.publication_frequency, 'newspaper.publication_frequency'),
    };
  }

  return {
    town: {
      name: town.name === undefined || town.name === null ? null : r.str(town.name, 'town.name'),
      locale: town.locale === undefined ? 'en_US' : r.str(town.locale, 'town.locale'),
      seed: town.seed === undefined || town.seed === null ? '' : r.str(town.seed, 'town.seed'),
      size: sizeCategory,
    },
    population: { scaleFactor, minPeople },
    newspaper,
  };
}
