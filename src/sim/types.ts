// Simulation types: generation tables (parsed from config/*.yaml) and the
// records produced from them.

export type SizeCategory = 'small' | 'medium' | 'large';

export const SIZE_CATEGORIES: readonly SizeCategory[] = ['small', 'medium', 'large'];

/** Inclusive integer range. */
export type IntRange = readonly [number, number];

// ============================================================================
// Town tables
// ============================================================================

export type TownSizeTable = {
  populationRange: IntRange;
  streetCountRange: IntRange;
  businessCountRange: IntRange;
  landmarkCountRange: IntRange;
  parkCountRange: IntRange;
  schoolCountRange: IntRange;
  serviceCountRange: IntRange;
};

export type NameComponents = {
  treeNames: string[];
  streetPrefixes: string[];
  directionalPrefixes: string[];
  ordinalPrefixes: string[];
  businessAdjectives: {
    descriptive: string[];
    locationBased: string[];
    sizeBased: string[];
    speedBased: string[];
  };
  businessNouns: {
    restaurant: string[];
    retail: string[];
    gas: string[];
  };
  familyOwners: string[];
  parkPrefixes: string[];
  historicBuildings: string[];
  museumKinds: string[];
  climateTypes: string[];
  facilityTypes: string[];
  historicalSignificanceLevels: string[];
};

export type TownTables = {
  townSizes: Record<SizeCategory, TownSizeTable>;
  streetPatterns: Record<string, string[]>;
  streetTypes: string[];
  businessTypes: Record<string, number>;
  landmarkTypes: string[];
  parkTypes: string[];
  schoolTypes: string[];
  serviceTypes: string[];
  countryMapping: Record<string, string>;
  nameComponents: NameComponents;
};

// ============================================================================
// Town records
// ============================================================================

export type Street = {
  id: string;
  name: string;
  type: string;
  lengthKm: number;
};

export type Business = {
  id: string;
  name: string;
  type: string;
  street: string;
  employees: number;
  establishedYear: number;
};

export type Landmark = {
  id: string;
  name: string;
  type: string;
  street: string;
  establishedYear: number;
  historicalSignificance: string;
};

export type Park = {
  id: string;
  name: string;
  type: string;
  areaHectares: number;
  facilities: string[];
};

export type School = {
  id: string;
  name: string;
  type: string;
  street: string;
  students: number;
  establishedYear: number;
};

export type Service = {
  id: string;
  name: string;
  type: string;
  street: string;
  operatingHours: string;
  staffCount: number;
};

export type Newspaper = {
  name: string;
  tagline: string;
  foundedYear: number;
  publicationFrequency: string;
};

export type Town = {
  id: string;
  name: string;
  country: string;
  locale: string;
  sizeCategory: SizeCategory;
  seed: string;
  population: number;
  areaSqKm: number;
  foundedYear: number;
  elevationM: number;
  climate: string;
  streets: Street[];
  businesses: Business[];
  landmarks: Landmark[];
  parks: Park[];
  schools: School[];
  services: Service[];
  newspaper?: Newspaper;
  generatedAt: string;
};

export type TownFeature = 'streets' | 'landmarks' | 'businesses' | 'parks' | 'schools' | 'services';

export const TOWN_FEATURES: readonly TownFeature[] = ['streets', 'landmarks', 'businesses', 'parks', 'schools', 'services'];

export type TownFeatureRecord = Town[TownFeature][number];

// ============================================================================
// People tables
// ============================================================================

/** Weights for one age band; a band without `below` matches every remaining age. */
export type AgeBandWeights = { below?: number; weights: number[] };

export type AgeMatcher =
  | { op: 'lt'; value: number }
  | { op: 'gt'; value: number }
  | { op: 'between'; min: number; max: number };

export type AgeRule = { range: AgeMatcher; label: string; delta: number };

export type SubstringRule = {
  field: 'status' | 'occupation';
  contains: string[];
  delta: number;
};

export type TemperamentAdjustments = {
  minWeight: number;
  age: Record<string, AgeRule[]>;
  education: Record<string, SubstringRule[]>;
  employment: Record<string, SubstringRule[]>;
};

export type Temperament = {
  type: string;
  description: string;
  traits: string[];
};

export type IncomeRules = {
  minIncome: number;
  fixedRanges: Array<{ contains: string[]; range: IntRange }>;
  educationBase: Record<string, number>;
  defaultBase: number;
  ageMultipliers: Array<{ range: IntRange; multiplier: number }>;
  defaultMultiplier: number;
  variation: readonly [number, number];
};

export type PeopleTables = {
  age: {
    minAge: number;
    maxAge: number;
    weights: Array<{ range: IntRange; weight: number }>;
    defaultWeight: number;
  };
  genders: string[];
  education: { levels: string[]; byAge: AgeBandWeights[] };
  employment: { statuses: string[]; byAge: AgeBandWeights[]; occupationStatuses: string[] };
  maritalStatus: { statuses: string[]; byAge: AgeBandWeights[] };
  householdSize: { byAge: Array<AgeBandWeights & { sizes: number[] }> };
  income: IncomeRules;
  temperaments: Temperament[];
  temperamentAdjustments: TemperamentAdjustments;
  countryMapping: Record<string, string>;
};

// ============================================================================
// People records
// ============================================================================

export type Person = {
  id: string;
  firstName: string;
  lastName: string;
  age: number;
  gender: string;
  birthYear: number;
  maritalStatus: string;
  educationLevel: string;
  employmentStatus: string;
  occupation: string;
  annualIncome: number;
  householdSize: number;
  location: string;
  fullAddress: string;
  phoneNumber: string;
  email: string;
  temperamentType: string;
  temperamentDescription: string;
  temperamentTraits: string[];
  country: string;
  locale: string;
};

// ============================================================================
// Article tables
// ============================================================================

/** Any YAML value; extra model args reach the API unchanged. */
export type ModelArgValue = string | number | boolean | null | ModelArgValue[] | { [key: string]: ModelArgValue };

export type ModelArgs = {
  model?: string;
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  [key: string]: ModelArgValue | undefined;
};

export type Author = {
  name: string;
  persona: string;
  specialties: string[];
  writingStyle: string;
};

export type FeatureSampling = { probability: number; maxCount: number };

export type AgeGroup = { label: string; min: number; max: number };

export type ArticleTables = {
  categories: string[];
  modelArgs: ModelArgs;
  prompts: {
    systemPrompt: string;
    userPrompt: string;
    toneDescriptions: Record<string, string>;
    storyStatusHints: Record<string, string>;
  };
  seed: {
    specialistProbability: number;
    seriousness: Record<string, number>;
    townData: {
      inclusionProbability: number;
      features: Partial<Record<TownFeature, FeatureSampling>>;
    };
    peopleData: {
      inclusionProbability: number;
      minPeople: number;
      maxPeople: number;
      ageWeights: Record<string, number>;
      ageGroups: AgeGroup[];
      occupationWeights: Record<string, number>;
      occupationKeywords: Record<string, string[]>;
    };
  };
  authors: Author[];
};

/** Per-run overrides read from articles_daily_config.yaml. */
export type DailyArticleSettings = {
  count: number;
  priorityCategories: string[];
  seriousnessWeights: Record<string, number> | null;
  storyStatusWeights: Record<string, number> | null;
  delayMs: number;
  seed: string | null;
  backupBeforeSave: boolean;
  articleLimit: number;
  modelArgs: ModelArgs;
};

// ============================================================================
// Article seed
// ============================================================================

export type TownFacts = {
  townName: string;
  townPopulation: number;
  features: Partial<{
    streets: Street[];
    landmarks: Landmark[];
    businesses: Business[];
    parks: Park[];
    schools: School[];
    services: Service[];
  }>;
};

export type ArticleSeed = {
  seed: string;
  category: string;
  author: Author;
  tone: string;
  toneDescription: string;
  storyStatusHint: string;
  town: TownFacts | null;
  people: Person[];
  ageGroup: string | null;
  occupationCategory: string | null;
};
