import { describe, expect, it } from 'vitest';
import {
  generatePopulation,
  generateTown,
  parseAgeGroup,
  pickAuthor,
  pickCategory,
  pickStoryStatusHint,
  pickTone,
  sampleArticleSeed,
  samplePeople,
  sampleTownFacts,
  type ArticleSeedSettings,
} from '../src/sim';
import { loadArticleTables, loadPeopleTables, loadTownTables } from './config-files';
import { makePerson, sequenceRng } from './fixtures';

const tables = loadArticleTables();
const defaults: ArticleSeedSettings = { priorityCategories: [], seriousnessWeights: null, storyStatusWeights: null };
const town = generateTown({
  tables: loadTownTables(),
  locale: 'en_US',
  seed: 'seed-town',
  name: 'Testville',
  size: 'small',
  now: new Date('2026-06-15T12:00:00Z'),
});

describe('parseAgeGroup', () => {
  it('reads closed and open-ended groups', () => {
    expect(parseAgeGroup('18-30')).toEqual({ label: '18-30', min: 18, max: 30 });
    expect(parseAgeGroup('71+')).toEqual({ label: '71+', min: 71, max: Number.POSITIVE_INFINITY });
    expect(() => parseAgeGroup('old')).toThrow("Invalid age group 'old' (expected N-M or N+)");
  });
});

describe('pickers', () => {
  it('draws categories from the priority list when one is set', () => {
    expect(pickCategory(sequenceRng([0]), tables, { ...defaults, priorityCategories: ['Sports', 'Crime'] })).toBe('Sports');
    expect(pickCategory(sequenceRng([0.95]), tables, defaults)).toBe('Local News');
  });

  it('prefers a specialist when the coin says so', () => {
    expect(pickAuthor(sequenceRng([0.1, 0]), tables, 'Sports').name).toBe('David Thompson');
    expect(pickAuthor(sequenceRng([0.9, 0]), tables, 'Sports').name).toBe('Sarah Johnson');
    expect(pickAuthor(sequenceRng([0.1, 0]), tables, 'Weather').name).toBe('Sarah Johnson');
  });

  it('picks a tone with its description', () => {
    expect(pickTone(sequenceRng([0.5]), tables, defaults)).toEqual({
      tone: 'balanced',
      description: 'with a balanced tone that is neither too serious nor too lighthearted',
    });
    expect(pickTone(sequenceRng([0.5]), tables, { ...defaults, seriousnessWeights: { serious: 1 } }).tone).toBe('serious');
  });

  it('turns the story status into its prompt hint', () => {
    expect(pickStoryStatusHint(sequenceRng([0.5]), tables, defaults)).toBe('developing');
    expect(pickStoryStatusHint(sequenceRng([0.5]), tables, { ...defaults, storyStatusWeights: { follow_up: 1 } })).toBe(
      'follow-up',
    );
  });
});

describe('sampleTownFacts', () => {
  it('samples each feature by its own probability', () => {
    expect(sampleTownFacts(sequenceRng([0.5]), tables, town)).toEqual({
      townName: 'Testville',
      townPopulation: town.population,
      features: {
        streets: town.streets.slice(0, 1),
        businesses: town.businesses.slice(0, 1),
      },
    });
  });

  it('skips the town when the inclusion draw fails or there is no town', () => {
    expect(sampleTownFacts(sequenceRng([0.8]), tables, town)).toBeNull();
    expect(sampleTownFacts(sequenceRng([0]), tables, null)).toBeNull();
  });
});

describe('samplePeople', () => {
  const people = [
    makePerson({ id: 'p1', age: 35, occupation: 'Marketing Manager' }),
    makePerson({ id: 'p2', age: 40, occupation: 'Nurse' }),
    makePerson({ id: 'p3', age: 45, occupation: 'Sales Director' }),
    makePerson({ id: 'p4', age: 60, occupation: 'Accountant' }),
    makePerson({ id: 'p5', age: 33, occupation: '', employmentStatus: 'Unemployed' }),
  ];
  const ids = (result: ReturnType<typeof samplePeople>) => result.people.map(p => p.id);

  it('narrows by age group and occupation keywords', () => {
    const result = samplePeople(sequenceRng([0.5, 0.5, 0.5, 0.1]), tables, people);
    expect(result.ageGroup).toBe('31-50');
    expect(result.occupationCategory).toBe('business');
    expect(ids(result)).toEqual(['p1', 'p3']);
  });

  it('never returns more people than match', () => {
    const result = samplePeople(sequenceRng([0.5, 0.5, 0.5, 0.4]), tables, people);
    expect(result.occupationCategory).toBe('healthcare');
    expect(ids(result)).toEqual(['p2']);
  });

  it('keeps the age pool when no job title matches the category', () => {
    const result = samplePeople(sequenceRng([0.5, 0.5, 0.5, 0.6]), tables, people);
    expect(result.occupationCategory).toBe('education');
    expect(ids(result)).toEqual(['p1', 'p2']);
  });

  it('returns nobody when the inclusion draw fails', () => {
    expect(samplePeople(sequenceRng([0.9]), tables, people)).toEqual({ people: [], ageGroup: null, occupationCategory: null });
    expect(samplePeople(sequenceRng([0]), tables, [])).toEqual({ people: [], ageGroup: null, occupationCategory: null });
  });
});

describe('sampleArticleSeed', () => {
  const residents = generatePopulation(60, { tables: loadPeopleTables(), locale: 'en_US', seed: 'seed-people', asOfYear: 2026 });
  const input = { tables, settings: defaults, town, people: residents, seed: 'run::article::0' };

  it('replays from the same seed string', () => {
    expect(sampleArticleSeed(input)).toEqual(sampleArticleSeed(input));
  });

  it('assembles a consistent seed record', () => {
    for (let i = 0; i < 20; i++) {
      const seed = sampleArticleSeed({ ...input, seed: `run::article::${i}` });
      expect(seed.seed).toBe(`run::article::${i}`);
      expect(tables.categories).toContain(seed.category);
      expect(seed.toneDescription).toBe(tables.prompts.toneDescriptions[seed.tone]);
      expect(Object.values(tables.prompts.storyStatusHints)).toContain(seed.storyStatusHint);
      expect(seed.people.length).toBeLessThanOrEqual(3);
      expect(new Set(seed.people.map(p => p.id)).size).toBe(seed.people.length);
      if (seed.town) {
        expect(seed.town.townName).toBe('Testville');
        for (const list of Object.values(seed.town.features)) expect(list?.length).toBe(1);
      }
    }
  });
});
