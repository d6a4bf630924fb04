import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { TOWN_FEATURES, type Town, type TownFeature } from '../src/sim';
import { errorMessage } from './cli-args';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type FieldCheck = (value: unknown) => boolean;

const isString: FieldCheck = v => typeof v === 'string';
const isNumber: FieldCheck = v => typeof v === 'number' && Number.isFinite(v);
const isStringList: FieldCheck = v => Array.isArray(v) && v.every(isString);

const TOWN_FIELDS: Record<string, FieldCheck> = {
  id: isString,
  name: isString,
  population: isNumber,
};

const NEWSPAPER_FIELDS: Record<string, FieldCheck> = {
  name: isString,
  tagline: isString,
  foundedYear: isNumber,
  publicationFrequency: isString,
};

const FEATURE_FIELDS: Record<TownFeature, Record<string, FieldCheck>> = {
  streets: { id: isString, name: isString, type: isString, lengthKm: isNumber },
  businesses: { id: isString, name: isString, type: isString, street: isString, employees: isNumber, establishedYear: isNumber },
  landmarks: {
    id: isString,
    name: isString,
    type: isString,
    street: isString,
    establishedYear: isNumber,
    historicalSignificance: isString,
  },
  parks: { id: isString, name: isString, type: isString, areaHectares: isNumber, facilities: isStringList },
  schools: { id: isString, name: isString, type: isString, street: isString, students: isNumber, establishedYear: isNumber },
  services: { id: isString, name: isString, type: isString, street: isString, operatingHours: isString, staffCount: isNumber },
};

function badField(value: unknown, fields: Record<string, FieldCheck>, path: string): string | null {
  if (!isRecord(value)) return path || '(root)';
  const prefix = path ? `${path}.` : '';
  const bad = Object.entries(fields).find(([key, check]) => !check(value[key]));
  return bad ? `${prefix}${bad[0]}` : null;
}

/** Dotted path of the first missing or mistyped field, or null for a usable town. */
export function findTownProblem(value: unknown): string | null {
  const top = badField(value, TOWN_FIELDS, '');
  if (top || !isRecord(value)) return top;
  if (value.newspaper !== undefined) {
    const paper = badField(value.newspaper, NEWSPAPER_FIELDS, 'newspaper');
    if (paper) return paper;
  }
  for (const feature of TOWN_FEATURES) {
    const list: unknown = value[feature];
    if (!Array.isArray(list)) return feature;
    const items: unknown[] = list;
    for (const [i, item] of items.entries()) {
      const problem = badField(item, FEATURE_FIELDS[feature], `${feature}.${i}`);
      if (problem) return problem;
    }
  }
  return null;
}

export function isTown(value: unknown): value is Town {
  return findTownProblem(value) === null;
}

export function saveTownJson(path: string, town: Town): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, `${JSON.stringify(town, null, 2)}\n`, 'utf-8');
}

export function loadTownJson(path: string): Town | null {
  if (!existsSync(path)) {
    console.warn(`⚠️  Town data not found at ${path}; run the town initialiser first`);
    return null;
  }
  let doc: unknown;
  try {
    doc = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    console.warn(`⚠️  Town data at ${path} is not valid JSON: ${errorMessage(err)}`);
    return null;
  }
  const problem = findTownProblem(doc);
  if (problem || !isTown(doc)) {
    console.warn(`⚠️  Town data at ${path} is missing required fields: ${problem}`);
    return null;
  }
  return doc;
}
