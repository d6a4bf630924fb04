import type { Faker } from '@faker-js/faker';
import { createSeededFaker, localeHasStates } from './fakerLocale';
import { pickTemperament } from './temperament';
import type { AgeBandWeights, IncomeRules, PeopleTables, Person } from './types';
import {
  facetRng,
  facetSeed,
  normalizeSeed,
  seededHexId,
  weightedPick,
  zipWeights,
  type Rng,
  type Weighted,
} from './utils';

export type PopulationInput = {
  tables: PeopleTables;
  locale: string;
  seed: string | number;
  /** Birth years are computed against this year. Defaults to the current year. */
  asOfYear?: number;
};

export type PopulationContext = {
  tables: PeopleTables;
  locale: string;
  country: string;
  seed: string;
  asOfYear: number;
  ageWeights: Array<Weighted<number>>;
  faker: Faker;
  useStates: boolean;
};

export function createPopulationContext(input: PopulationInput): PopulationContext {
  const { tables, locale } = input;
  const country = tables.countryMapping[locale];
  if (country === undefined) {
    throw new Error(`Unsupported locale '${locale}'. Available locales: ${Object.keys(tables.countryMapping).join(', ')}`);
  }
  const seed = normalizeSeed(input.seed);
  return {
    tables,
    locale,
    country,
    seed,
    asOfYear: input.asOfYear ?? new Date().getFullYear(),
    ageWeights: buildAgeWeights(tables),
    faker: createSeededFaker(locale, facetSeed(seed, 'people')),
    useStates: localeHasStates(locale),
  };
}

// ─────────────────────────────────────────────────────────────
// Weighted attributes
// ─────────────────────────────────────────────────────────────

export function buildAgeWeights(tables: PeopleTables): Array<Weighted<number>> {
  const { minAge, maxAge, weights, defaultWeight } = tables.age;
  const out: Array<Weighted<number>> = [];
  for (let age = minAge; age <= maxAge; age++) {
    const band = weights.find(w => age >= w.range[0] && age <= w.range[1]);
    out.push({ item: age, weight: band ? band.weight : defaultWeight });
  }
  return out;
}

/** First band whose `below` exceeds the age; a band without `below` catches the rest. */
export function bandForAge<B extends AgeBandWeights>(bands: readonly B[], age: number, label: string): B {
  const band = bands.find(b => b.below === undefined || age < b.below);
  if (!band) throw new Error(`No ${label} band covers age ${age}`);
  return band;
}

function pickByAge(rng: Rng, values: readonly string[], bands: readonly AgeBandWeights[], age: number, label: string): string {
  return weightedPick(rng, zipWeights(values, bandForAge(bands, age, label).weights));
}

function includesAny(value: string, needles: readonly string[]): boolean {
  return needles.some(n => value.includes(n));
}

export function generateIncome(rng: Rng, rules: IncomeRules, education: string, employment: string, age: number): number {
  const fixed = rules.fixedRanges.find(r => includesAny(employment, r.contains));
  if (fixed) return rng.int(fixed.range[0], fixed.range[1]);

  const base = rules.educationBase[education] ?? rules.defaultBase;
  const ageBand = rules.ageMultipliers.find(m => age >= m.range[0] && age <= m.range[1]);
  const multiplier = ageBand ? ageBand.multiplier : rules.defaultMultiplier;
  const variation = rng.float(rules.variation[0], rules.variation[1]);
  return Math.max(rules.minIncome, Math.floor(base * multiplier * variation));
}

function fakerSex(gender: string): 'male' | 'female' | undefined {
  if (gender === 'Male') return 'male';
  if (gender === 'Female') return 'female';
  return undefined;
}

// ─────────────────────────────────────────────────────────────
// People
// ─────────────────────────────────────────────────────────────

export function personSeed(seed: string, index: number): string {
  return `${seed}::person::${index}`;
}

export function generatePerson(ctx: PopulationContext, index: number): Person {
  const { tables, faker } = ctx;
  const pSeed = personSeed(ctx.seed, index);
  const rng = (facet: string) => facetRng(pSeed, facet);

  faker.seed(facetSeed(pSeed, 'faker'));

  const gender = rng('gender').pick(tables.genders);
  const firstName = faker.person.firstName(fakerSex(gender));
  const lastName = faker.person.lastName();

  const age = weightedPick(rng('age'), ctx.ageWeights);
  const educationLevel = pickByAge(rng('education'), tables.education.levels, tables.education.byAge, age, 'education');
  const employmentStatus = pickByAge(rng('employment'), tables.employment.statuses, tables.employment.byAge, age, 'employment');
  const occupation = includesAny(employmentStatus, tables.employment.occupationStatuses) ? faker.person.jobTitle() : '';
  const annualIncome = generateIncome(rng('income'), tables.income, educationLevel, employmentStatus, age);

  const householdBand = bandForAge(tables.householdSize.byAge, age, 'household size');
  const householdSize = weightedPick(rng('household'), zipWeights(householdBand.sizes, householdBand.weights));
  const maritalStatus = pickByAge(rng('marital'), tables.maritalStatus.statuses, tables.maritalStatus.byAge, age, 'marital status');

  const city = faker.location.city();
  const location = ctx.useStates ? faker.location.state() : city;
  const fullAddress = `${faker.location.streetAddress({ useFullAddress: true })}, ${city}, ${faker.location.zipCode()}`;
  const phoneNumber = faker.phone.number();
  const email = faker.internet.email({ firstName, lastName });

  const temperament = pickTemperament(rng('temperament'), tables.temperaments, tables.temperamentAdjustments, {
    age,
    educationLevel,
    employmentStatus,
    occupation,
  });

  return {
    id: seededHexId(rng('id'), 8),
    firstName,
    lastName,
    age,
    gender,
    birthYear: ctx.asOfYear - age,
    maritalStatus,
    educationLevel,
    employmentStatus,
    occupation,
    annualIncome,
    householdSize,
    location,
    fullAddress,
    phoneNumber,
    email,
    temperamentType: temperament.type,
    temperamentDescription: temperament.description,
    temperamentTraits: [...temperament.traits],
    country: ctx.country,
    locale: ctx.locale,
  };
}

export function generatePopulation(count: number, input: PopulationInput): Person[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new Error('num_people must be a positive integer');
  }
  const ctx = createPopulationContext(input);
  const ids = new Set<string>();
  const people: Person[] = [];
  for (let i = 0; i < count; i++) {
    const person = generatePerson(ctx, i);
    let attempt = 1;
    while (ids.has(person.id)) {
      person.id = seededHexId(facetRng(personSeed(ctx.seed, i), `id::${attempt++}`), 8);
    }
    ids.add(person.id);
    people.push(person);
  }
  return people;
}

export function populationSize(townPopulation: number, scaleFactor: number, minPeople: number): number {
  return Math.max(minPeople, Math.floor(townPopulation * scaleFactor));
}
