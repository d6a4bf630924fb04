/**
 * Place-name grammars for generated towns.
 *
 * Each name is a tracery expansion over rules built from `name_components`
 * in config/town.yaml plus a few fresh faker values (surname, first name,
 * city). Tracery draws from the town's seeded RNG, so names replay with the seed.
 */

import tracery from 'tracery-grammar';
import type { Modifier, RuleSet } from 'tracery-grammar';
import type { Faker } from '@faker-js/faker';
import type { NameComponents } from './types';
import type { Rng } from './utils';

// ─────────────────────────────────────────────────────────────
// Tracery RNG
// ─────────────────────────────────────────────────────────────

let traceryRngCurrent: () => number = Math.random;
function withTraceryRng<T>(rng: () => number, fn: () => T): T {
  const prev = traceryRngCurrent;
  traceryRngCurrent = rng;
  tracery.setRng(rng);
  try {
    return fn();
  } finally {
    traceryRngCurrent = prev;
    tracery.setRng(prev);
  }
}

const clip = (n: number): Modifier => (s: string) => s.slice(0, n).trim();

const NAME_MODIFIERS: Record<string, Modifier> = {
  clip6: clip(6),
  clip8: clip(8),
  trim: (s: string) => s.trim(),
};

// ─────────────────────────────────────────────────────────────
// Namer
// ─────────────────────────────────────────────────────────────

export class TownNamer {
  private readonly staticRules: RuleSet;

  constructor(
    components: NameComponents,
    streetSuffixes: readonly string[],
    private readonly faker: Faker,
    private readonly rng: Rng,
  ) {
    const { businessAdjectives: adj, businessNouns: nouns } = components;
    this.staticRules = {
      suffix: [...streetSuffixes],
      tree: components.treeNames,
      streetPrefix: components.streetPrefixes,
      direction: components.directionalPrefixes,
      ordinal: components.ordinalPrefixes,
      descriptive: adj.descriptive,
      locationBased: adj.locationBased,
      sizeBased: adj.sizeBased,
      speedBased: adj.speedBased,
      restaurantNoun: nouns.restaurant,
      retailNoun: nouns.retail,
      gasNoun: nouns.gas,
      familyOwner: components.familyOwners,
      eatery: ['Pizza', 'Diner', 'Bistro', 'Café'],
      eateryPlace: ['Grill', 'Diner', 'Café', 'Bistro'],
      shopWord: ['Market', 'Store', 'Shop'],
      fuelWord: ['Gas', 'Fuel', 'Service'],
      fuelPlace: ['Gas', 'Fuel', 'Station'],
      monumentWord: ['Monument', 'Memorial'],
      parkPrefix: components.parkPrefixes,
      historicBuilding: components.historicBuildings,
      museumKind: components.museumKinds,
    };
  }

  private expand(origin: string[], kind?: string): string {
    const rules: RuleSet = {
      ...this.staticRules,
      surname: this.faker.person.lastName(),
      firstName: this.faker.person.firstName(),
      fullName: this.faker.person.fullName(),
      city: this.faker.location.city(),
      origin,
    };
    if (kind !== undefined) rules.kind = kind;

    return withTraceryRng(this.rng.next01, () => {
      const grammar = tracery.createGrammar(rules);
      grammar.addModifiers({ ...tracery.baseEngModifiers, ...NAME_MODIFIERS });
      return grammar.flatten('#origin#').replace(/\s+/g, ' ').trim();
    });
  }

  streetName(): string {
    return this.expand([
      '#surname# #suffix#',
      '#firstName# #suffix#',
      '#tree# #suffix#',
      '#streetPrefix# #suffix#',
      '#direction# #suffix#',
      '#ordinal# #suffix#',
    ]);
  }

  businessName(type: string): string {
    if (type === 'Restaurant/Café') {
      return this.expand([
        "#surname#'s Restaurant",
        'The #descriptive# #restaurantNoun#',
        "#familyOwner#'s #eatery#",
        '#city.clip6# #eateryPlace#',
      ]);
    }
    if (type === 'Retail Store') {
      return this.expand([
        "#surname#'s #retailNoun#",
        '#locationBased# #shopWord#',
        'The #sizeBased# #shopWord#',
      ]);
    }
    if (type === 'Gas Station') {
      return this.expand([
        '#speedBased# #gasNoun#',
        "#surname#'s #fuelWord#",
        '#locationBased# #fuelPlace#',
      ]);
    }
    const kind = type.split('/')[0] ?? type;
    return this.expand(["#surname#'s #kind#", '#city.clip6# #kind#', '#descriptive# #kind#'], kind);
  }

  landmarkName(type: string): string {
    if (type.includes('Church')) return this.expand(["St. #firstName#'s Church"]);
    switch (type) {
      case 'Monument':
        return this.expand(['#surname# #monumentWord#']);
      case 'Statue':
        return this.expand(['#fullName# Statue']);
      case 'Historic Building':
        return this.expand(['Old #historicBuilding#']);
      case 'Museum':
        return this.expand(['#city.clip8# #museumKind# Museum']);
      default:
        return this.expand(['#city.clip8# #kind#'], type);
    }
  }

  parkName(type: string): string {
    return this.expand(['#surname# #kind#', '#parkPrefix# #kind#', '#tree# #kind#', 'Memorial #kind#'], type);
  }

  schoolName(type: string): string {
    if (type.includes('Elementary')) return this.expand(['#surname# Elementary School']);
    if (type.includes('Middle')) return this.expand(['#city.clip8# Middle School']);
    if (type.includes('High')) return this.expand(['#city.clip8# High School']);
    return this.expand(['#surname# #kind#'], type);
  }
}
