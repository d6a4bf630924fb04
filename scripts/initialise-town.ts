#!/usr/bin/env node
import {
  generatePopulation,
  generateTown,
  populationSize,
  randomSeedString,
  summarizeTown,
  type Person,
  type Town,
} from '../src/sim';
import { errorMessage, getArgValue, hasFlag, isMainModule } from './cli-args';
import {
  defaultConfigPaths,
  defaultDataPaths,
  loadPeopleTables,
  loadTownInitSettings,
  loadTownTables,
  type ConfigPaths,
  type DataPaths,
} from './config-files';
import { writePeopleCsv } from './people-csv';
import { saveTownJson } from './town-json';

export type InitialiseTownOptions = {
  /** town_init_config.yaml; defaults to the project root copy. */
  configPath?: string;
  configPaths?: ConfigPaths;
  dataPaths?: DataPaths;
  now?: Date;
};

export type InitialisedTown = {
  town: Town;
  people: Person[];
  townPath: string;
  peoplePath: string;
};

function logTown(town: Town): void {
  const summary = summarizeTown(town);
  console.log('\n===== TOWN DETAILS =====');
  console.log(`Town Name: ${town.name}`);
  console.log(`Population: ${town.population.toLocaleString('en-US')}`);
  console.log(`Founded: ${town.foundedYear}`);
  console.log(`Area: ${town.areaSqKm.toFixed(2)} km²`);
  console.log(`Climate: ${town.climate}`);
  console.log(`Country: ${town.country}`);

  console.log('\n----- Infrastructure -----');
  console.log(`Streets: ${summary.counts.streets}`);
  console.log(`Businesses: ${summary.counts.businesses}`);
  console.log(`Landmarks: ${summary.counts.landmarks}`);
  console.log(`Parks: ${summary.counts.parks}`);
  console.log(`Schools: ${summary.counts.schools}`);
  console.log(`Municipal Services: ${summary.counts.services}`);

  if (summary.notableBusinesses.length) {
    console.log('\n----- Notable Establishments -----');
    summary.notableBusinesses.forEach((b, i) => {
      console.log(`${i + 1}. ${b.name} (${b.type}) - ${b.street || 'Unknown location'}, ${b.employees} staff`);
    });
  }

  if (town.newspaper) {
    console.log('\n----- Local Newspaper -----');
    console.log(`Name: ${town.newspaper.name}`);
    if (town.newspaper.tagline) console.log(`Tagline: ${town.newspaper.tagline}`);
    console.log(`Founded: ${town.newspaper.foundedYear}`);
    console.log(`Frequency: ${town.newspaper.publicationFrequency}`);
  }
  console.log('\n=========================');
}

export function initialiseTown(options: InitialiseTownOptions = {}): InitialisedTown {
  const configPaths = options.configPaths ?? defaultConfigPaths();
  const dataPaths = options.dataPaths ?? defaultDataPaths();
  const now = options.now ?? new Date();

  const settings = loadTownInitSettings(options.configPath ?? configPaths.townInit);
  const seed = settings.town.seed || randomSeedString();
  console.log(`🏘️  Initialising town: ${settings.town.name ?? '(random name)'}`);
  console.log(`   Locale: ${settings.town.locale}`);
  console.log(`   Seed: ${seed}`);
  console.log(`   Size: ${settings.town.size}`);

  const town = generateTown({
    tables: loadTownTables(configPaths.townTables),
    locale: settings.town.locale,
    seed,
    name: settings.town.name ?? undefined,
    size: settings.town.size,
    now,
  });
  if (settings.newspaper) town.newspaper = settings.newspaper;
  logTown(town);

  saveTownJson(dataPaths.townJson, town);
  console.log(`💾 Town data saved to ${dataPaths.townJson}`);

  const count = populationSize(town.population, settings.population.scaleFactor, settings.population.minPeople);
  console.log(`👥 Generating population: ${count} people`);
  const people = generatePopulation(count, {
    tables: loadPeopleTables(configPaths.peopleTables),
    locale: settings.town.locale,
    seed,
    asOfYear: now.getFullYear(),
  });
  writePeopleCsv(dataPaths.peopleCsv, people);

  const share = ((count / town.population) * 100).toFixed(1);
  console.log('\n===== POPULATION DETAILS =====');
  console.log(`Total town population: ${town.population.toLocaleString('en-US')}`);
  console.log(`Generated residents: ${count.toLocaleString('en-US')} (${share}% of total)`);
  console.log(`Data stored in: ${dataPaths.peopleCsv}`);
  console.log('\n✅ Town initialisation complete');

  return { town, people, townPath: dataPaths.townJson, peoplePath: dataPaths.peopleCsv };
}

function printUsage(): never {
  console.error(
    [
      'Usage: npx tsx scripts/initialise-town.ts [options]',
      '',
      'Options:',
      '  --config <path>  Town init config (default town_init_config.yaml)',
      '  --help           Show this help',
    ].join('\n'),
  );
  process.exit(2);
}

function main() {
  const args = process.argv.slice(2);
  if (hasFlag(args, '--help')) printUsage();
  initialiseTown({ configPath: getArgValue(args, '--config') ?? undefined });
}

if (isMainModule(import.meta.url)) {
  try {
    main();
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}
