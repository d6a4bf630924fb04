#!/usr/bin/env node
import { existsSync } from 'fs';
import { setTimeout as delay } from 'timers/promises';
import type { ArticleRecord } from '../src/news';
import { formatDay } from '../src/news';
import { randomSeedString } from '../src/sim';
import { backupArticles, pruneArticles } from './articles-csv';
import { errorMessage, getArgValue, hasFlag, isMainModule } from './cli-args';
import {
  defaultConfigPaths,
  defaultDataPaths,
  loadArticleTables,
  loadDailySettings,
  type ConfigPaths,
  type DataPaths,
} from './config-files';
import { createNewStory } from './generate-article';
import type { ChatCompletionClient } from './llm';
import { readPeopleCsv } from './people-csv';
import { loadTownJson } from './town-json';

export type DailyRunOptions = {
  /** articles_daily_config.yaml; defaults to the project root copy. */
  configPath?: string;
  configPaths?: ConfigPaths;
  dataPaths?: DataPaths;
  client?: ChatCompletionClient;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

export async function generateArticlesDaily(options: DailyRunOptions = {}): Promise<ArticleRecord[]> {
  const configPaths = options.configPaths ?? defaultConfigPaths();
  const dataPaths = options.dataPaths ?? defaultDataPaths();
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const now = options.now ?? (() => new Date());

  const tables = loadArticleTables(configPaths.articleTables);
  const settings = loadDailySettings(tables, options.configPath ?? configPaths.dailyArticles);
  const runSeed = settings.seed ?? randomSeedString();

  console.log(`====== DAILY ARTICLE GENERATION: ${formatDay(now())} ======`);
  console.log(`📰 Generating ${settings.count} article(s) with run seed "${runSeed}"`);
  if (settings.priorityCategories.length) console.log(`🗂️  Priority categories: ${settings.priorityCategories.join(', ')}`);

  if (settings.backupBeforeSave && existsSync(dataPaths.articlesCsv)) {
    const backupPath = backupArticles(dataPaths.articlesCsv);
    if (backupPath) console.log(`💾 Backed up articles to ${backupPath}`);
  }

  const inputs = {
    tables,
    town: loadTownJson(dataPaths.townJson),
    people: readPeopleCsv(dataPaths.peopleCsv),
  };

  const articles: ArticleRecord[] = [];
  let failures = 0;
  for (let i = 0; i < settings.count; i++) {
    console.log(`\n=== Generating article ${i + 1} of ${settings.count} ===`);
    try {
      const article = await createNewStory({
        inputs,
        settings,
        seed: `${runSeed}::article::${i}`,
        articlesCsv: dataPaths.articlesCsv,
        client: options.client,
        now: now(),
      });
      articles.push(article);
    } catch (err) {
      failures++;
      console.error(`❌ Error generating article ${i + 1}: ${errorMessage(err)}`);
    }
    if (i < settings.count - 1 && settings.delayMs > 0) await sleep(settings.delayMs);
  }

  console.log('\n=== Article Generation Summary ===');
  console.log(`✅ Generated ${articles.length} of ${settings.count} article(s)${failures ? `, ${failures} failed` : ''}`);

  if (settings.articleLimit > 0) {
    try {
      const removed = pruneArticles(dataPaths.articlesCsv, settings.articleLimit);
      if (removed) console.log(`🧹 Pruned ${removed} article(s); keeping the ${settings.articleLimit} most recent`);
    } catch (err) {
      console.error(`❌ Error pruning old articles: ${errorMessage(err)}`);
    }
  }

  return articles;
}

function printUsage(): never {
  console.error(
    [
      'Usage: npx tsx scripts/generate-articles-daily.ts [options]',
      '',
      'Options:',
      '  --config <path>  Daily config file (default articles_daily_config.yaml)',
      '  --help           Show this help',
    ].join('\n'),
  );
  process.exit(2);
}

async function main() {
  const args = process.argv.slice(2);
  if (hasFlag(args, '--help')) printUsage();
  await generateArticlesDaily({ configPath: getArgValue(args, '--config') ?? undefined });
}

if (isMainModule(import.meta.url)) {
  main().catch(err => {
    console.error(`❌ ${errorMessage(err)}`);
    process.exit(1);
  });
}
