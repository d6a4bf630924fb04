import { readFileSync } from 'fs';
import * as yaml from 'yaml';
import { describe, expect, it } from 'vitest';
import {
  parseArticleTables,
  parseDailySettings,
  parsePeopleTables,
  parseTownInitSettings,
  parseTownTables,
} from '../src/sim';
import {
  defaultConfigPaths,
  loadArticleTables,
  loadDailySettings,
  loadPeopleTables,
  loadTownInitSettings,
  loadTownTables,
  readYamlFile,
} from './config-files';

const paths = defaultConfigPaths();

/** Parses a config file after a textual edit. */
function editedYaml(path: string, from: RegExp | string, to: string): unknown {
  const text = readFileSync(path, 'utf-8');
  const edited = text.replace(from, to);
  if (edited === text) throw new Error(`Edit did not apply to ${path}`);
  return yaml.parse(edited);
}

describe('config/town.yaml', () => {
  it('loads size tiers and name components', () => {
    const tables = loadTownTables();
    expect(tables.townSizes.small.populationRange).toEqual([1000, 5000]);
    expect(tables.townSizes.large.schoolCountRange).toEqual([8, 20]);
    expect(tables.streetPatterns.en_GB?.[0]).toBe('Road');
    expect(tables.businessTypes['Restaurant/Café']).toBe(0.15);
    expect(tables.countryMapping.de_DE).toBe('Germany');
  });

  it('rejects business weights that do not sum to 1', () => {
    const doc = editedYaml(paths.townTables, '"Restaurant/Café": 0.15', '"Restaurant/Café": 0.5');
    expect(() => parseTownTables(doc)).toThrow(
      'Town config invalid: business_types (expected weights summing to 1.0)',
    );
  });

  it('rejects an inverted range', () => {
    const doc = editedYaml(paths.townTables, 'population_range: [1000, 5000]', 'population_range: [5000, 1000]');
    expect(() => parseTownTables(doc)).toThrow(
      'Town config invalid: town_sizes.small.population_range (expected [min, max] with min <= max)',
    );
  });

  it('names the missing key', () => {
    expect(() => parseTownTables({})).toThrow('Town config missing: town_sizes');
  });
});

describe('config/people.yaml', () => {
  it('loads bands and temperament rules', () => {
    const tables = loadPeopleTables();
    expect(tables.age.minAge).toBe(18);
    expect(tables.education.byAge).toHaveLength(3);
    expect(tables.education.byAge[2]?.below).toBeUndefined();
    expect(tables.temperaments).toHaveLength(12);
    expect(tables.temperamentAdjustments.age.Anxious?.[0]).toEqual({ label: '<30', range: { op: 'lt', value: 30 }, delta: 0.5 });
    expect(tables.temperamentAdjustments.employment.Aggressive?.[0]?.field).toBe('occupation');
    expect(tables.temperamentAdjustments.employment.Anxious?.[0]?.field).toBe('status');
    expect(tables.income.variation).toEqual([0.7, 1.5]);
  });

  it('checks band widths against the value list', () => {
    const doc = editedYaml(
      paths.peopleTables,
      '{ below: 25, weights: [15, 30, 25, 15, 15, 0, 0, 0] }',
      '{ below: 25, weights: [15, 30] }',
    );
    expect(() => parsePeopleTables(doc)).toThrow('People config invalid: education.by_age.0.weights (expected 8 weights)');
  });

  it('rejects an unparseable age rule', () => {
    const doc = editedYaml(paths.peopleTables, 'range: "<30", delta: 0.5', 'range: "young", delta: 0.5');
    expect(() => parsePeopleTables(doc)).toThrow("Invalid age range 'young'");
  });
});

describe('config/articles.yaml', () => {
  it('loads categories, authors and sampling settings', () => {
    const tables = loadArticleTables();
    expect(tables.categories[0]).toBe('Politics');
    expect(tables.categories).toContain('Local News');
    expect(tables.authors[0]?.name).toBe('Sarah Johnson');
    expect(tables.seed.specialistProbability).toBe(0.7);
    expect(tables.seed.townData.features.streets).toEqual({ probability: 0.9, maxCount: 1 });
    expect(tables.seed.peopleData.ageGroups).toContainEqual({ label: '71+', min: 71, max: Number.POSITIVE_INFINITY });
    expect(tables.seed.peopleData.occupationKeywords.other).toEqual([]);
    expect(tables.modelArgs.model).toBe('gpt-4o-mini');
  });

  it('requires a description for every weighted tone', () => {
    const doc = editedYaml(paths.articleTables, /^\s+very_serious: "with a grave.*\n/m, '');
    expect(() => parseArticleTables(doc)).toThrow('Article config missing: prompts.tone_descriptions.very_serious');
  });

  it('rejects an empty story status hint mapping', () => {
    const doc = editedYaml(paths.articleTables, /story_status_hints:\n(?: {4}.*\n)+/, 'story_status_hints: {}\n');
    expect(() => parseArticleTables(doc)).toThrow(
      'Article config invalid: prompts.story_status_hints (expected a non-empty mapping)',
    );
  });

  it('bounds probabilities', () => {
    const doc = editedYaml(paths.articleTables, 'specialist_probability: 0.7', 'specialist_probability: 1.7');
    expect(() => parseArticleTables(doc)).toThrow(
      'Article config invalid: article_seed.specialist_probability (expected a probability between 0 and 1)',
    );
  });
});

describe('articles_daily_config.yaml', () => {
  const tables = loadArticleTables();

  it('loads the run settings with model args merged over the defaults', () => {
    const settings = loadDailySettings(tables);
    expect(settings.count).toBe(10);
    expect(settings.priorityCategories).toEqual([]);
    expect(settings.delayMs).toBe(1000);
    expect(settings.articleLimit).toBe(100);
    expect(settings.backupBeforeSave).toBe(true);
    expect(settings.seed).toBeNull();
    expect(settings.storyStatusWeights).toEqual({ breaking: 0.15, ongoing: 0.55, follow_up: 0.3 });
    expect(settings.modelArgs).toEqual(tables.modelArgs);
  });

  it('fills defaults and overrides model args', () => {
    const settings = parseDailySettings({ articles: { count: 2, seed: 'abc', model_args: { temperature: 0.2 } } }, tables);
    expect(settings).toEqual({
      count: 2,
      priorityCategories: [],
      seriousnessWeights: null,
      storyStatusWeights: null,
      delayMs: 1000,
      seed: 'abc',
      backupBeforeSave: true,
      articleLimit: 0,
      modelArgs: { model: 'gpt-4o-mini', temperature: 0.2, max_tokens: 1400, top_p: 0.95 },
    });
  });

  it('rejects unknown priority categories', () => {
    expect(() =>
      parseDailySettings({ articles: { count: 1, priority_categories: ['Weather'] } }, tables),
    ).toThrow('Daily article config invalid: articles.priority_categories.0');
  });

  it('rejects a zero count and unbalanced weights', () => {
    expect(() => parseDailySettings({ articles: { count: 0 } }, tables)).toThrow(
      'Daily article config invalid: articles.count (expected a count >= 1)',
    );
    expect(() => parseDailySettings({ articles: { count: 1, seriousness_weights: { balanced: 0.5 } } }, tables)).toThrow(
      'Daily article config invalid: articles.seriousness_weights (expected weights summing to 1.0)',
    );
  });
});

describe('town_init_config.yaml', () => {
  it('loads the town, population and newspaper settings', () => {
    expect(loadTownInitSettings()).toEqual({
      town: { name: 'Mackney', locale: 'en_GB', seed: '42', size: 'medium' },
      population: { scaleFactor: 0.02, minPeople: 100 },
      newspaper: {
        name: 'The Mackney Gazette',
        tagline: 'All the news that fits, from the heart of Mackney',
        foundedYear: 1887,
        publicationFrequency: 'Daily',
      },
    });
  });

  it('defaults everything but the town block', () => {
    expect(parseTownInitSettings({ town: {} })).toEqual({
      town: { name: null, locale: 'en_US', seed: '', size: 'medium' },
      population: { scaleFactor: 0.02, minPeople: 100 },
      newspaper: null,
    });
  });

  it('rejects unknown sizes', () => {
    expect(() => parseTownInitSettings({ town: { size: 'huge' } })).toThrow(
      'Town init config invalid: town.size (expected small | medium | large)',
    );
    expect(() => parseTownInitSettings({})).toThrow('Town init config missing: town');
  });

  it('reports missing files', () => {
    expect(() => readYamlFile('/nonexistent/gazette.yaml')).toThrow('Config file not found: /nonexistent/gazette.yaml');
  });
});
