/**
 * Simulation module exports
 *
 * Pure, seeded generation of towns, residents and article seeds.
 * The canonical source of truth for types is types.ts.
 */

// All type definitions (canonical source)
export * from './types';

// Utility functions
export {
  // RNG
  type Rng,
  type Weighted,
  makeRng,
  facetSeed,
  facetRng,
  normalizeSeed,
  randomSeedString,
  fnv1a32,
  mulberry32,
  // Weighted selection
  weightedPick,
  weightedPickKUnique,
  zipWeights,
  weightsFromRecord,
  // Weight tables
  normalizeWeights,
  sumWeights,
  weightsSumTo,
  // Formatting
  roundTo,
  seededUuid,
  seededHexId,
} from './utils';

// Config tables
export {
  parseTownTables,
  parsePeopleTables,
  parseArticleTables,
  parseDailySettings,
  parseTownInitSettings,
  type TownInitSettings,
} from './tables';

// Generators
export { generateTown, summarizeTown, isSizeCategory, type GenerateTownInput, type TownSummary } from './town';
export { TownNamer } from './names';
export { fakerLocaleChain, createSeededFaker, localeHasStates } from './fakerLocale';
export {
  createPopulationContext,
  generatePerson,
  generatePopulation,
  generateIncome,
  buildAgeWeights,
  bandForAge,
  populationSize,
  type PopulationInput,
  type PopulationContext,
} from './people';
export {
  parseAgeRange,
  ageMatches,
  temperamentWeight,
  temperamentWeights,
  pickTemperament,
  type TemperamentSubject,
} from './temperament';
export {
  parseAgeGroup,
  pickCategory,
  pickAuthor,
  pickTone,
  pickStoryStatusHint,
  sampleTownFacts,
  samplePeople,
  sampleArticleSeed,
  type ArticleSeedInput,
  type ArticleSeedSettings,
} from './articleSeed';
