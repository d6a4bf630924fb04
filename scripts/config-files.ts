import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'yaml';
import {
  parseArticleTables,
  parseDailySettings,
  parsePeopleTables,
  parseTownInitSettings,
  parseTownTables,
  type ArticleTables,
  type DailyArticleSettings,
  type PeopleTables,
  type TownInitSettings,
  type TownTables,
} from '../src/sim';

export const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');

export type ConfigPaths = {
  townTables: string;
  peopleTables: string;
  articleTables: string;
  townInit: string;
  dailyArticles: string;
};

export type DataPaths = {
  dataDir: string;
  townJson: string;
  peopleCsv: string;
  articlesCsv: string;
  siteData: string;
  credentials: string;
};

export function defaultConfigPaths(root: string = PROJECT_ROOT): ConfigPaths {
  return {
    townTables: join(root, 'config', 'town.yaml'),
    peopleTables: join(root, 'config', 'people.yaml'),
    articleTables: join(root, 'config', 'articles.yaml'),
    townInit: join(root, 'town_init_config.yaml'),
    dailyArticles: join(root, 'articles_daily_config.yaml'),
  };
}

export function defaultDataPaths(root: string = PROJECT_ROOT): DataPaths {
  const dataDir = join(root, 'data');
  return {
    dataDir,
    townJson: join(dataDir, 'town_data.json'),
    peopleCsv: join(dataDir, 'people_data.csv'),
    articlesCsv: join(dataDir, 'articles.csv'),
    siteData: join(root, 'public', 'site-data.json'),
    credentials: join(root, 'credentials'),
  };
}

export function readYamlFile(path: string): unknown {
  if (!existsSync(path)) throw new Error(`Config file not found: ${path}`);
  return yaml.parse(readFileSync(path, 'utf-8'));
}

export function loadTownTables(path = defaultConfigPaths().townTables): TownTables {
  return parseTownTables(readYamlFile(path));
}

export function loadPeopleTables(path = defaultConfigPaths().peopleTables): PeopleTables {
  return parsePeopleTables(readYamlFile(path));
}

export function loadArticleTables(path = defaultConfigPaths().articleTables): ArticleTables {
  return parseArticleTables(readYamlFile(path));
}

export function loadDailySettings(tables: ArticleTables, path = defaultConfigPaths().dailyArticles): DailyArticleSettings {
  return parseDailySettings(readYamlFile(path), tables);
}

export function loadTownInitSettings(path = defaultConfigPaths().townInit): TownInitSettings {
  return parseTownInitSettings(readYamlFile(path));
}
