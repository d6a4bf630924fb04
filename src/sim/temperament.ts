/**
 * Temperament weight adjustment.
 *
 * Every temperament starts at 1.0. Age rules and employment rules apply the
 * first matching entry; education rules all add. The result is floored at
 * `min_weight` before the weighted pick.
 */

import type { AgeMatcher, SubstringRule, Temperament, TemperamentAdjustments } from './types';
import { weightedPick, type Rng, type Weighted } from './utils';

export type TemperamentSubject = {
  age: number;
  educationLevel: string;
  employmentStatus: string;
  occupation: string;
};

const BASE_WEIGHT = 1.0;

/** Parses `<30`, `>60` or `25-45`. */
export function parseAgeRange(text: string): AgeMatcher {
  const s = text.trim();
  const lt = /^<\s*(\d+)$/.exec(s);
  if (lt) return { op: 'lt', value: Number(lt[1]) };
  const gt = /^>\s*(\d+)$/.exec(s);
  if (gt) return { op: 'gt', value: Number(gt[1]) };
  const between = /^(\d+)\s*-\s*(\d+)$/.exec(s);
  if (between) {
    const min = Number(between[1]);
    const max = Number(between[2]);
    if (min > max) throw new Error(`Invalid age range '${text}': ${min} > ${max}`);
    return { op: 'between', min, max };
  }
  throw new Error(`Invalid age range '${text}' (expected <N, >N or N-M)`);
}

export function ageMatches(matcher: AgeMatcher, age: number): boolean {
  switch (matcher.op) {
    case 'lt':
      return age < matcher.value;
    case 'gt':
      return age > matcher.value;
    case 'between':
      return age >= matcher.min && age <= matcher.max;
  }
}

function containsIgnoreCase(value: string, needles: readonly string[]): boolean {
  const haystack = value.toLowerCase();
  return needles.some(n => haystack.includes(n.toLowerCase()));
}

function ruleMatches(rule: SubstringRule, subject: TemperamentSubject, statusValue: string): boolean {
  const value = rule.field === 'occupation' ? subject.occupation : statusValue;
  return containsIgnoreCase(value, rule.contains);
}

export function temperamentWeight(
  type: string,
  adjustments: TemperamentAdjustments,
  subject: TemperamentSubject,
): number {
  let weight = BASE_WEIGHT;

  const ageRule = (adjustments.age[type] ?? []).find(r => ageMatches(r.range, subject.age));
  if (ageRule) weight += ageRule.delta;

  for (const rule of adjustments.education[type] ?? []) {
    if (ruleMatches(rule, subject, subject.educationLevel)) weight += rule.delta;
  }

  const employmentRule = (adjustments.employment[type] ?? []).find(r => ruleMatches(r, subject, subject.employmentStatus));
  if (employmentRule) weight += employmentRule.delta;

  return Math.max(adjustments.minWeight, weight);
}

export function temperamentWeights(
  temperaments: readonly Temperament[],
  adjustments: TemperamentAdjustments,
  subject: TemperamentSubject,
): Array<Weighted<Temperament>> {
  return temperaments.map(t => ({ item: t, weight: temperamentWeight(t.type, adjustments, subject) }));
}

export function pickTemperament(
  rng: Rng,
  temperaments: readonly Temperament[],
  adjustments: TemperamentAdjustments,
  subject: TemperamentSubject,
): Temperament {
  return weightedPick(rng, temperamentWeights(temperaments, adjustments, subject));
}
