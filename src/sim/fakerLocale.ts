import { Faker, allLocales, base, en } from '@faker-js/faker';
import type { LocaleDefinition } from '@faker-js/faker';

const LOCALES: Record<string, LocaleDefinition> = Object.fromEntries(Object.entries(allLocales));

/**
 * Faker locale chain for a `ll_CC` locale code: the exact locale, then its
 * language, then English. `fr_FR` resolves to `fr` when faker has no `fr_FR`.
 */
export function fakerLocaleChain(locale: string): LocaleDefinition[] {
  const chain: LocaleDefinition[] = [];
  const exact = LOCALES[locale];
  if (exact) chain.push(exact);
  const language = locale.split('_')[0] ?? '';
  const byLanguage = LOCALES[language];
  if (byLanguage && byLanguage !== exact) chain.push(byLanguage);
  if (!chain.includes(en)) chain.push(en);
  chain.push(base);
  return chain;
}

export function createSeededFaker(locale: string, seed: number): Faker {
  const faker = new Faker({ locale: fakerLocaleChain(locale) });
  faker.seed(seed);
  return faker;
}

/** True when the locale's own data (not the English fallback) lists states or regions. */
export function localeHasStates(locale: string): boolean {
  const own = fakerLocaleChain(locale)[0];
  return Boolean(own && own !== en && own.location?.state?.length);
}
