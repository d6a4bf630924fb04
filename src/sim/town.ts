import { createSeededFaker } from './fakerLocale';
import { TownNamer } from './names';
import {
  SIZE_CATEGORIES,
  type Business,
  type IntRange,
  type Landmark,
  type Park,
  type School,
  type Service,
  type SizeCategory,
  type Street,
  type Town,
  type TownFeature,
  type TownTables,
} from './types';
import {
  facetRng,
  facetSeed,
  normalizeSeed,
  roundTo,
  seededUuid,
  weightedPick,
  weightsFromRecord,
  type Rng,
} from './utils';

export type GenerateTownInput = {
  tables: TownTables;
  locale: string;
  seed: string | number;
  /** Faker city when omitted. */
  name?: string;
  size?: string;
  now?: Date;
};

export type TownSummary = {
  name: string;
  population: number;
  counts: Record<TownFeature, number>;
  notableBusinesses: Business[];
};

const DEFAULT_STREET_LOCALE = 'en_US';
const MAX_STREET_NAME_ATTEMPTS = 20;

export function isSizeCategory(value: string): value is SizeCategory {
  return SIZE_CATEGORIES.some(s => s === value);
}

function intIn(rng: Rng, [min, max]: IntRange): number {
  return rng.int(min, max);
}

function uniqueIdSource(rng: Rng): () => string {
  const seen = new Set<string>();
  return () => {
    let id = seededUuid(rng);
    while (seen.has(id)) id = seededUuid(rng);
    seen.add(id);
    return id;
  };
}

function uniqueStreetName(namer: TownNamer, taken: Set<string>): string {
  let name = namer.streetName();
  for (let attempt = 1; taken.has(name) && attempt < MAX_STREET_NAME_ATTEMPTS; attempt++) {
    name = namer.streetName();
  }
  if (taken.has(name)) {
    const base = name;
    let n = 2;
    while (taken.has(`${base} ${n}`)) n++;
    name = `${base} ${n}`;
  }
  taken.add(name);
  return name;
}

export function generateTown(input: GenerateTownInput): Town {
  const { tables, locale } = input;
  const size = input.size ?? 'medium';
  if (!isSizeCategory(size)) {
    throw new Error(`Invalid size '${size}'. Must be one of: ${SIZE_CATEGORIES.join(', ')}`);
  }
  const country = tables.countryMapping[locale];
  if (country === undefined) {
    throw new Error(`Unsupported locale '${locale}'. Available locales: ${Object.keys(tables.countryMapping).join(', ')}`);
  }

  const seed = normalizeSeed(input.seed);
  const now = input.now ?? new Date();
  const currentYear = now.getFullYear();
  const sizeTable = tables.townSizes[size];
  const nextId = uniqueIdSource(facetRng(seed, 'ids'));

  const faker = createSeededFaker(locale, facetSeed(seed, 'faker'));
  const nameRng = facetRng(seed, 'names');
  const suffixes = tables.streetPatterns[locale] ?? tables.streetPatterns[DEFAULT_STREET_LOCALE] ?? [];
  if (!suffixes.length) throw new Error(`No street patterns for locale '${locale}' or ${DEFAULT_STREET_LOCALE}`);
  const namer = new TownNamer(tables.nameComponents, suffixes, faker, nameRng);

  const townName = input.name?.trim() || faker.location.city();
  const basicsRng = facetRng(seed, 'basics');
  const population = intIn(basicsRng, sizeTable.populationRange);

  // Streets
  const streetRng = facetRng(seed, 'streets');
  const takenStreetNames = new Set<string>();
  const streets: Street[] = Array.from({ length: intIn(streetRng, sizeTable.streetCountRange) }, () => ({
    id: nextId(),
    name: uniqueStreetName(namer, takenStreetNames),
    type: streetRng.pick(tables.streetTypes),
    lengthKm: roundTo(streetRng.float(0.2, 2.5), 2),
  }));
  const streetNames = streets.map(s => s.name);
  const pickStreet = (rng: Rng) => (streetNames.length ? rng.pick(streetNames) : '');

  // Businesses
  const businessRng = facetRng(seed, 'businesses');
  const businessWeights = weightsFromRecord(tables.businessTypes);
  const businesses: Business[] = Array.from({ length: intIn(businessRng, sizeTable.businessCountRange) }, () => {
    const type = weightedPick(businessRng, businessWeights);
    return {
      id: nextId(),
      name: namer.businessName(type),
      type,
      street: pickStreet(businessRng),
      employees: businessRng.int(1, 50),
      establishedYear: businessRng.int(1950, currentYear - 1),
    };
  });

  // Landmarks
  const landmarkRng = facetRng(seed, 'landmarks');
  const landmarks: Landmark[] = Array.from({ length: intIn(landmarkRng, sizeTable.landmarkCountRange) }, () => {
    const type = landmarkRng.pick(tables.landmarkTypes);
    return {
      id: nextId(),
      name: namer.landmarkName(type),
      type,
      street: pickStreet(landmarkRng),
      establishedYear: landmarkRng.int(1800, 2020),
      historicalSignificance: landmarkRng.pick(tables.nameComponents.historicalSignificanceLevels),
    };
  });

  // Parks
  const parkRng = facetRng(seed, 'parks');
  const parks: Park[] = Array.from({ length: intIn(parkRng, sizeTable.parkCountRange) }, () => {
    const type = parkRng.pick(tables.parkTypes);
    return {
      id: nextId(),
      name: namer.parkName(type),
      type,
      areaHectares: roundTo(parkRng.float(0.5, 20), 2),
      facilities: parkRng.pickK(tables.nameComponents.facilityTypes, parkRng.int(1, 4)),
    };
  });

  // Schools
  const schoolRng = facetRng(seed, 'schools');
  const schools: School[] = Array.from({ length: intIn(schoolRng, sizeTable.schoolCountRange) }, () => {
    const type = schoolRng.pick(tables.schoolTypes);
    return {
      id: nextId(),
      name: namer.schoolName(type),
      type,
      street: pickStreet(schoolRng),
      students: schoolRng.int(50, 1200),
      establishedYear: schoolRng.int(1900, 2020),
    };
  });

  // Services
  const serviceRng = facetRng(seed, 'services');
  const services: Service[] = Array.from({ length: intIn(serviceRng, sizeTable.serviceCountRange) }, () => {
    const type = serviceRng.pick(tables.serviceTypes);
    return {
      id: nextId(),
      name: `${townName} ${type}`,
      type,
      street: pickStreet(serviceRng),
      operatingHours: `${serviceRng.int(6, 9)}:00 AM - ${serviceRng.int(4, 8)}:00 PM`,
      staffCount: serviceRng.int(2, 25),
    };
  });

  return {
    id: nextId(),
    name: townName,
    country,
    locale,
    sizeCategory: size,
    seed,
    population,
    areaSqKm: roundTo(population / basicsRng.int(100, 500), 2),
    foundedYear: basicsRng.int(1600, 1950),
    elevationM: basicsRng.int(0, 1500),
    climate: basicsRng.pick(tables.nameComponents.climateTypes),
    streets,
    businesses,
    landmarks,
    parks,
    schools,
    services,
    generatedAt: now.toISOString(),
  };
}

export function summarizeTown(town: Town): TownSummary {
  const notableBusinesses = [...town.businesses]
    .sort((a, b) => b.employees - a.employees)
    .slice(0, 5);
  return {
    name: town.name,
    population: town.population,
    counts: {
      streets: town.streets.length,
      landmarks: town.landmarks.length,
      businesses: town.businesses.length,
      parks: town.parks.length,
      schools: town.schools.length,
      services: town.services.length,
    },
    notableBusinesses,
  };
}
