import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ArticleRecord } from '../src/news';
import type { ArticleSeed, Person, Rng } from '../src/sim';

/**
 * Rng that replays `values` from next01 (cycling), with the same int/pick
 * arithmetic as makeRng. Lets tests choose draws exactly.
 */
export function sequenceRng(values: readonly number[]): Rng {
  let i = 0;
  const next = () => {
    const v = values[i % values.length] ?? 0;
    i++;
    return v;
  };
  return {
    nextU32: () => (next() * 0x1_0000_0000) >>> 0,
    next01: next,
    int: (min, max) => Math.ceil(min) + Math.floor(next() * (Math.floor(max) - Math.ceil(min) + 1)),
    float: (min, max) => min + next() * (max - min),
    chance: p => next() < p,
    pick: items => {
      const item = items[Math.floor(next() * items.length)];
      if (item === undefined) throw new Error('Cannot pick from an empty list');
      return item;
    },
    pickK: (items, k) => items.slice(0, Math.min(k, items.length)),
  };
}

export function makeTempDir(prefix = 'gazette-test-'): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function makePerson(overrides: Partial<Person> = {}): Person {
  return {
    id: 'abcd1234',
    firstName: 'Ada',
    lastName: 'Fenwick',
    age: 40,
    gender: 'Female',
    birthYear: 1986,
    maritalStatus: 'Married',
    educationLevel: "Bachelor's degree",
    employmentStatus: 'Employed full-time',
    occupation: 'Librarian',
    annualIncome: 52000,
    householdSize: 3,
    location: 'Testville',
    fullAddress: '1 Test Lane, Testville, 00000',
    phoneNumber: '555-0100',
    email: 'ada@example.com',
    temperamentType: 'Calm',
    temperamentDescription: 'Even-tempered, rarely shows strong emotions',
    temperamentTraits: ['peaceful', 'composed', 'steady'],
    country: 'United States',
    locale: 'en_US',
    ...overrides,
  };
}

export function makeArticleSeed(overrides: Partial<ArticleSeed> = {}): ArticleSeed {
  return {
    seed: 'test-seed',
    category: 'Local News',
    author: {
      name: 'James Wilson',
      persona: 'General assignment reporter.',
      specialties: ['Local News'],
      writingStyle: 'Straightforward and efficient',
    },
    tone: 'balanced',
    toneDescription: 'with a balanced tone',
    storyStatusHint: 'developing',
    town: {
      townName: 'Testville',
      townPopulation: 12500,
      features: {
        streets: [{ id: 's1', name: 'Elm Street', type: 'Residential', lengthKm: 1.25 }],
        parks: [{ id: 'k1', name: 'Oak Dog Park', type: 'Dog Park', areaHectares: 2.5, facilities: ['Benches', 'Water Fountain'] }],
      },
    },
    people: [makePerson()],
    ageGroup: '31-50',
    occupationCategory: 'education',
    ...overrides,
  };
}

export function makeArticleRecord(overrides: Partial<ArticleRecord> = {}): ArticleRecord {
  return {
    articleId: 'ART-20260615120000',
    title: 'Library Extends Hours',
    slug: 'library-extends-hours',
    body: 'The library will stay open later.\n\nResidents welcomed the change.',
    summary: 'Longer opening hours start next week.',
    publicationDate: '2026-06-15',
    lastUpdated: '2026-06-15 12:00:00',
    author: 'James Wilson',
    authorPersona: 'General assignment reporter.',
    authorStyle: 'Straightforward and efficient',
    category: 'Local News',
    status: 'Published',
    storyStatus: 'Ongoing',
    tone: 'balanced',
    images: [{ image: 'library at dusk', caption: 'The Testville library' }],
    townData: null,
    peopleData: [],
    ...overrides,
  };
}
