import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { Person } from '../src/sim';
import { parseCsvTable, stringifyCsv, type CsvRow } from './csv-rows';

export const PEOPLE_COLUMNS = [
  'id',
  'first_name',
  'last_name',
  'age',
  'gender',
  'birth_year',
  'marital_status',
  'education_level',
  'employment_status',
  'occupation',
  'annual_income',
  'household_size',
  'location',
  'full_address',
  'phone_number',
  'email',
  'temperament_type',
  'temperament_description',
  'temperament_traits',
  'country',
  'locale',
] as const;

const TRAIT_SEPARATOR = ', ';

export function personToRow(p: Person): CsvRow {
  return {
    id: p.id,
    first_name: p.firstName,
    last_name: p.lastName,
    age: String(p.age),
    gender: p.gender,
    birth_year: String(p.birthYear),
    marital_status: p.maritalStatus,
    education_level: p.educationLevel,
    employment_status: p.employmentStatus,
    occupation: p.occupation,
    annual_income: String(p.annualIncome),
    household_size: String(p.householdSize),
    location: p.location,
    full_address: p.fullAddress,
    phone_number: p.phoneNumber,
    email: p.email,
    temperament_type: p.temperamentType,
    temperament_description: p.temperamentDescription,
    temperament_traits: p.temperamentTraits.join(TRAIT_SEPARATOR),
    country: p.country,
    locale: p.locale,
  };
}

function toInt(value: string | undefined): number {
  const n = Number.parseInt(value ?? '', 10);
  return Number.isFinite(n) ? n : 0;
}

export function rowToPerson(row: CsvRow): Person {
  const traits = row.temperament_traits ?? '';
  return {
    id: row.id ?? '',
    firstName: row.first_name ?? '',
    lastName: row.last_name ?? '',
    age: toInt(row.age),
    gender: row.gender ?? '',
    birthYear: toInt(row.birth_year),
    maritalStatus: row.marital_status ?? '',
    educationLevel: row.education_level ?? '',
    employmentStatus: row.employment_status ?? '',
    occupation: row.occupation ?? '',
    annualIncome: toInt(row.annual_income),
    householdSize: toInt(row.household_size),
    location: row.location ?? '',
    fullAddress: row.full_address ?? '',
    phoneNumber: row.phone_number ?? '',
    email: row.email ?? '',
    temperamentType: row.temperament_type ?? '',
    temperamentDescription: row.temperament_description ?? '',
    temperamentTraits: traits ? traits.split(TRAIT_SEPARATOR).map(t => t.trim()).filter(Boolean) : [],
    country: row.country ?? '',
    locale: row.locale ?? '',
  };
}

export function writePeopleCsv(path: string, people: readonly Person[]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, stringifyCsv(PEOPLE_COLUMNS, people.map(personToRow)), 'utf-8');
}

export function readPeopleCsv(path: string): Person[] {
  if (!existsSync(path)) {
    console.warn(`⚠️  People data not found at ${path}; continuing without residents`);
    return [];
  }
  const { rows } = parseCsvTable(readFileSync(path, 'utf-8'));
  if (!rows.length) {
    console.warn(`⚠️  People data at ${path} is empty; continuing without residents`);
    return [];
  }
  return rows.map(rowToPerson);
}
