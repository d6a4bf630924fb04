import { describe, expect, it } from 'vitest';
import { createSeededFaker, generateTown, isSizeCategory, makeRng, summarizeTown, TownNamer } from '../src/sim';
import { loadTownTables } from './config-files';

const tables = loadTownTables();
const now = new Date('2026-06-15T12:00:00Z');

function within(value: number, [min, max]: readonly [number, number]) {
  expect(value).toBeGreaterThanOrEqual(min);
  expect(value).toBeLessThanOrEqual(max);
}

describe('generateTown', () => {
  const town = generateTown({ tables, locale: 'en_US', seed: 'test-town', name: 'Testville', size: 'small', now });
  const sizes = tables.townSizes.small;

  it('keeps every count inside the size tier', () => {
    within(town.population, sizes.populationRange);
    within(town.streets.length, sizes.streetCountRange);
    within(town.businesses.length, sizes.businessCountRange);
    within(town.landmarks.length, sizes.landmarkCountRange);
    within(town.parks.length, sizes.parkCountRange);
    within(town.schools.length, sizes.schoolCountRange);
    within(town.services.length, sizes.serviceCountRange);
  });

  it('records the town basics', () => {
    expect(town.name).toBe('Testville');
    expect(town.country).toBe('United States');
    expect(town.sizeCategory).toBe('small');
    expect(town.seed).toBe('test-town');
    expect(town.generatedAt).toBe('2026-06-15T12:00:00.000Z');
    within(town.foundedYear, [1600, 1950]);
    within(town.elevationM, [0, 1500]);
    expect(tables.nameComponents.climateTypes).toContain(town.climate);
  });

  it('gives streets unique names with a locale suffix', () => {
    const names = town.streets.map(s => s.name);
    expect(new Set(names).size).toBe(names.length);
    const suffixes = tables.streetPatterns.en_US ?? [];
    for (const street of town.streets) {
      expect(suffixes.some(s => street.name.includes(s))).toBe(true);
      expect(tables.streetTypes).toContain(street.type);
      within(street.lengthKm, [0.2, 2.5]);
      expect(street.lengthKm).toBe(Math.round(street.lengthKm * 100) / 100);
    }
  });

  it('places features on generated streets', () => {
    const names = new Set(town.streets.map(s => s.name));
    for (const b of town.businesses) {
      expect(names.has(b.street)).toBe(true);
      expect(Object.keys(tables.businessTypes)).toContain(b.type);
      within(b.employees, [1, 50]);
      within(b.establishedYear, [1950, 2025]);
    }
    for (const s of town.services) {
      expect(s.name).toBe(`Testville ${s.type}`);
      expect(names.has(s.street)).toBe(true);
    }
    for (const p of town.parks) {
      expect(p.facilities.length).toBeGreaterThanOrEqual(1);
      expect(p.facilities.length).toBeLessThanOrEqual(4);
      expect(new Set(p.facilities).size).toBe(p.facilities.length);
    }
  });

  it('hands out unique ids', () => {
    const ids = [
      town.id,
      ...town.streets.map(x => x.id),
      ...town.businesses.map(x => x.id),
      ...town.landmarks.map(x => x.id),
      ...town.parks.map(x => x.id),
      ...town.schools.map(x => x.id),
      ...town.services.map(x => x.id),
    ];
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('replays from the same seed', () => {
    const again = generateTown({ tables, locale: 'en_US', seed: 'test-town', name: 'Testville', size: 'small', now });
    expect(again).toEqual(town);
  });

  it('draws the population independently of the town name', () => {
    const unnamed = generateTown({ tables, locale: 'en_US', seed: 'test-town', size: 'small', now });
    expect(unnamed.population).toBe(town.population);
    expect(unnamed.name.length).toBeGreaterThan(0);
  });

  it('rejects unknown sizes and locales', () => {
    expect(() => generateTown({ tables, locale: 'en_US', seed: 1, size: 'huge' })).toThrow(
      "Invalid size 'huge'. Must be one of: small, medium, large",
    );
    expect(() => generateTown({ tables, locale: 'xx_XX', seed: 1 })).toThrow(
      "Unsupported locale 'xx_XX'. Available locales: en_US, en_GB, en_CA, en_AU, fr_FR, de_DE, es_ES, it_IT, pt_BR",
    );
  });

  it('recognizes size categories', () => {
    expect(isSizeCategory('large')).toBe(true);
    expect(isSizeCategory('Large')).toBe(false);
  });
});

describe('summarizeTown', () => {
  it('counts features and lists the five largest employers', () => {
    const town = generateTown({ tables, locale: 'en_GB', seed: 'summary', size: 'medium', now });
    const summary = summarizeTown(town);
    expect(summary.counts.streets).toBe(town.streets.length);
    expect(summary.counts.services).toBe(town.services.length);
    expect(summary.notableBusinesses).toHaveLength(5);
    const employees = summary.notableBusinesses.map(b => b.employees);
    expect(employees).toEqual([...employees].sort((a, b) => b - a));
    expect(employees[0]).toBe(Math.max(...town.businesses.map(b => b.employees)));
  });
});

describe('TownNamer', () => {
  const namer = new TownNamer(tables.nameComponents, ['Lane'], createSeededFaker('en_US', 7), makeRng(7));

  it('uses the given street suffixes', () => {
    for (let i = 0; i < 10; i++) expect(namer.streetName()).toMatch(/ Lane$/);
  });

  it('names landmarks and schools by type', () => {
    expect(namer.landmarkName('Old Church')).toMatch(/^St\. .+'s Church$/);
    expect(namer.landmarkName('Statue')).toMatch(/ Statue$/);
    const historic = namer.landmarkName('Historic Building');
    expect(historic.startsWith('Old ')).toBe(true);
    expect(tables.nameComponents.historicBuildings).toContain(historic.slice(4));
    expect(namer.schoolName('Elementary School')).toMatch(/ Elementary School$/);
    expect(namer.schoolName('Charter School')).toMatch(/ Charter School$/);
  });

  it('keeps the park type in park names', () => {
    for (let i = 0; i < 10; i++) expect(namer.parkName('Dog Park')).toMatch(/ Dog Park$/);
  });

  it('uses the first part of a slash type for generic businesses', () => {
    for (let i = 0; i < 10; i++) expect(namer.businessName('Hair Salon/Barber')).toMatch(/Hair Salon$/);
  });
});
