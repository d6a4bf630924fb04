import { describe, expect, it } from 'vitest';
import {
  ageMatches,
  bandForAge,
  buildAgeWeights,
  generateIncome,
  generatePopulation,
  parseAgeRange,
  populationSize,
  temperamentWeight,
  type IncomeRules,
  type TemperamentSubject,
} from '../src/sim';
import { loadPeopleTables } from './config-files';
import { sequenceRng } from './fixtures';

const tables = loadPeopleTables();
const adjustments = tables.temperamentAdjustments;

const subject = (overrides: Partial<TemperamentSubject>): TemperamentSubject => ({
  age: 40,
  educationLevel: 'High school diploma/GED',
  employmentStatus: 'Employed full-time',
  occupation: '',
  ...overrides,
});

describe('age ranges', () => {
  it('parses the three rule forms', () => {
    expect(parseAgeRange('<30')).toEqual({ op: 'lt', value: 30 });
    expect(parseAgeRange('> 60')).toEqual({ op: 'gt', value: 60 });
    expect(parseAgeRange('25-45')).toEqual({ op: 'between', min: 25, max: 45 });
    expect(() => parseAgeRange('45-25')).toThrow("Invalid age range '45-25': 45 > 25");
  });

  it('matches bounds the way the rules read', () => {
    expect(ageMatches({ op: 'lt', value: 30 }, 29)).toBe(true);
    expect(ageMatches({ op: 'lt', value: 30 }, 30)).toBe(false);
    expect(ageMatches({ op: 'gt', value: 60 }, 60)).toBe(false);
    expect(ageMatches({ op: 'between', min: 25, max: 45 }, 45)).toBe(true);
  });
});

describe('temperamentWeight', () => {
  it('adds the first matching age rule and the first matching employment rule', () => {
    expect(temperamentWeight('Anxious', adjustments, subject({ age: 22, employmentStatus: 'Unemployed' }))).toBe(2);
  });

  it('applies only the first age rule that matches', () => {
    expect(temperamentWeight('Patient', adjustments, subject({ age: 45 }))).toBeCloseTo(1.4);
    expect(temperamentWeight('Calm', adjustments, subject({ age: 20 }))).toBeCloseTo(0.9);
  });

  it('adds every matching education rule', () => {
    expect(temperamentWeight('Analytical', adjustments, subject({ educationLevel: "Master's degree" }))).toBeCloseTo(1.5);
    expect(temperamentWeight('Analytical', adjustments, subject({ educationLevel: 'Associate degree' }))).toBeCloseTo(1.3);
  });

  it('matches occupation rules against the job title', () => {
    expect(temperamentWeight('Aggressive', adjustments, subject({ occupation: 'Regional Sales Manager' }))).toBeCloseTo(1.2);
    expect(temperamentWeight('Aggressive', adjustments, subject({ occupation: '' }))).toBe(1);
  });

  it('ignores case in substring rules', () => {
    expect(temperamentWeight('Pessimistic', adjustments, subject({ employmentStatus: 'unemployed' }))).toBeCloseTo(1.3);
  });

  it('never drops below the minimum weight', () => {
    const harsh = { ...adjustments, age: { Calm: [{ label: '<99', range: parseAgeRange('<99'), delta: -5 }] } };
    expect(temperamentWeight('Calm', harsh, subject({}))).toBe(0.1);
  });
});

describe('income', () => {
  const rules: IncomeRules = {
    minIncome: 1000,
    fixedRanges: [{ contains: ['Unemployed'], range: [0, 15000] }],
    educationBase: { "Bachelor's degree": 40000 },
    defaultBase: 100,
    ageMultipliers: [{ range: [30, 55], multiplier: 1.5 }],
    defaultMultiplier: 0.5,
    variation: [1, 1],
  };

  it('uses a fixed range when the status matches', () => {
    expect(generateIncome(sequenceRng([0.5]), rules, "Bachelor's degree", 'Unemployed', 40)).toBe(7500);
  });

  it('scales the education base by the age multiplier', () => {
    expect(generateIncome(sequenceRng([0]), rules, "Bachelor's degree", 'Employed full-time', 40)).toBe(60000);
    expect(generateIncome(sequenceRng([0]), rules, "Bachelor's degree", 'Employed full-time', 60)).toBe(20000);
  });

  it('floors at the minimum income', () => {
    expect(generateIncome(sequenceRng([0]), rules, 'Unknown', 'Employed full-time', 40)).toBe(1000);
  });

  it('matches fixed ranges case-sensitively', () => {
    expect(generateIncome(sequenceRng([0]), rules, 'Unknown', 'unemployed', 40)).toBe(1000);
  });
});

describe('age bands', () => {
  it('weights ages by the first band that contains them', () => {
    const weights = buildAgeWeights(tables);
    expect(weights).toHaveLength(82);
    const weightOf = (age: number) => weights.find(w => w.item === age)?.weight;
    expect(weightOf(18)).toBe(2);
    expect(weightOf(30)).toBe(3);
    expect(weightOf(70)).toBe(2);
    expect(weightOf(80)).toBe(1);
  });

  it('picks the first band whose upper bound exceeds the age', () => {
    const bands = tables.education.byAge;
    expect(bandForAge(bands, 24, 'education')).toBe(bands[0]);
    expect(bandForAge(bands, 25, 'education')).toBe(bands[1]);
    expect(bandForAge(bands, 80, 'education')).toBe(bands[2]);
    expect(() => bandForAge([{ below: 30, weights: [1] }], 40, 'test')).toThrow('No test band covers age 40');
  });
});

describe('generatePopulation', () => {
  const people = generatePopulation(25, { tables, locale: 'en_US', seed: 'test-people', asOfYear: 2026 });

  it('builds the requested number of residents with unique ids', () => {
    expect(people).toHaveLength(25);
    expect(new Set(people.map(p => p.id)).size).toBe(25);
    for (const p of people) expect(p.id).toMatch(/^[0-9a-f]{8}$/);
  });

  it('keeps attributes consistent with each other', () => {
    const types = tables.temperaments.map(t => t.type);
    for (const p of people) {
      expect(p.age).toBeGreaterThanOrEqual(18);
      expect(p.age).toBeLessThanOrEqual(99);
      expect(p.birthYear).toBe(2026 - p.age);
      expect(p.country).toBe('United States');
      expect(p.locale).toBe('en_US');
      expect(tables.genders).toContain(p.gender);
      expect(types).toContain(p.temperamentType);
      const temperament = tables.temperaments.find(t => t.type === p.temperamentType);
      expect(p.temperamentTraits).toEqual(temperament?.traits);
      const hasJob = p.employmentStatus.includes('Employed') || p.employmentStatus.includes('Self-employed');
      expect(p.occupation.length > 0).toBe(hasJob);
      expect(p.annualIncome).toBeGreaterThanOrEqual(0);
      expect(Number.isInteger(p.annualIncome)).toBe(true);
    }
  });

  it('replays from the same seed', () => {
    expect(generatePopulation(25, { tables, locale: 'en_US', seed: 'test-people', asOfYear: 2026 })).toEqual(people);
  });

  it('rejects bad counts and locales', () => {
    expect(() => generatePopulation(0, { tables, locale: 'en_US', seed: 1 })).toThrow('num_people must be a positive integer');
    expect(() => generatePopulation(2.5, { tables, locale: 'en_US', seed: 1 })).toThrow('num_people must be a positive integer');
    expect(() => generatePopulation(1, { tables, locale: 'xx_XX', seed: 1 })).toThrow("Unsupported locale 'xx_XX'");
  });
});

describe('populationSize', () => {
  it('scales the town population with a floor', () => {
    expect(populationSize(12000, 0.02, 100)).toBe(240);
    expect(populationSize(1000, 0.02, 100)).toBe(100);
  });
});
