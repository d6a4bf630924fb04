#!/usr/bin/env node
import {
  buildArticlePrompts,
  buildArticleRecord,
  parseArticleResponse,
  type ArticleRecord,
} from '../src/news';
import {
  TOWN_FEATURES,
  randomSeedString,
  sampleArticleSeed,
  type ArticleSeed,
  type ArticleSeedSettings,
  type ArticleTables,
  type ModelArgs,
  type Person,
  type Town,
} from '../src/sim';
import { appendArticle, readArticles } from './articles-csv';
import { errorMessage, getArgValue, hasFlag, isMainModule } from './cli-args';
import { defaultConfigPaths, defaultDataPaths, loadArticleTables, type ConfigPaths, type DataPaths } from './config-files';
import { callChatCompletion, type ChatCompletionClient } from './llm';
import { readPeopleCsv } from './people-csv';
import { loadTownJson } from './town-json';

export const DEFAULT_NEWSPAPER_NAME = 'The Town Gazette';

export type StoryInputs = {
  tables: ArticleTables;
  town: Town | null;
  people: Person[];
};

export type CreateStoryOptions = {
  inputs?: StoryInputs;
  settings?: ArticleSeedSettings & { modelArgs?: ModelArgs };
  seed?: string;
  articlesCsv?: string;
  client?: ChatCompletionClient;
  now?: Date;
};

const NO_OVERRIDES: ArticleSeedSettings & { modelArgs?: ModelArgs } = { priorityCategories: [], seriousnessWeights: null, storyStatusWeights: null };

export function loadStoryInputs(
  config: ConfigPaths = defaultConfigPaths(),
  data: DataPaths = defaultDataPaths(),
): StoryInputs {
  return {
    tables: loadArticleTables(config.articleTables),
    town: loadTownJson(data.townJson),
    people: readPeopleCsv(data.peopleCsv),
  };
}

export function logArticleSeed(seed: ArticleSeed): void {
  console.log(`🗂️  Category: ${seed.category}`);
  console.log(`✍️  Author: ${seed.author.name} (${seed.author.writingStyle})`);
  console.log(`🎚️  Tone: ${seed.tone}; story: ${seed.storyStatusHint}`);

  const sampled = TOWN_FEATURES.flatMap(kind => {
    const list: ReadonlyArray<{ name: string }> = seed.town?.features[kind] ?? [];
    return list.map(item => `${kind}: ${item.name}`);
  });
  if (!seed.town) console.log('🏘️  No town details sampled');
  else console.log(`🏘️  ${seed.town.townName}: ${sampled.length ? sampled.join('; ') : 'town only'}`);

  if (!seed.people.length) {
    console.log('👥 No residents sampled');
    return;
  }
  const filters = [seed.ageGroup && `age ${seed.ageGroup}`, seed.occupationCategory && `occupation ${seed.occupationCategory}`]
    .filter(Boolean)
    .join(', ');
  console.log(`👥 ${seed.people.length} resident(s)${filters ? ` (${filters})` : ''}`);
  for (const p of seed.people) {
    console.log(`   - ${p.firstName} ${p.lastName}, ${p.age}, ${p.occupation || p.employmentStatus}, ${p.temperamentType}`);
  }
}

export async function createNewStory(options: CreateStoryOptions = {}): Promise<ArticleRecord> {
  const inputs = options.inputs ?? loadStoryInputs();
  const settings = options.settings ?? NO_OVERRIDES;
  const articlesCsv = options.articlesCsv ?? defaultDataPaths().articlesCsv;
  const seed = options.seed ?? randomSeedString();

  const articleSeed = sampleArticleSeed({
    tables: inputs.tables,
    settings,
    town: inputs.town,
    people: inputs.people,
    seed,
  });
  logArticleSeed(articleSeed);

  const newspaperName = inputs.town?.newspaper?.name ?? DEFAULT_NEWSPAPER_NAME;
  const prompts = buildArticlePrompts(inputs.tables, articleSeed, newspaperName);
  const modelArgs = settings.modelArgs ?? inputs.tables.modelArgs;
  const response = await callChatCompletion(prompts.system, [{ role: 'user', content: prompts.user }], modelArgs, options.client);
  const parsed = parseArticleResponse(response);

  const existingIds = new Set(readArticles(articlesCsv).map(a => a.articleId));
  const article = buildArticleRecord({ seed: articleSeed, parsed, now: options.now ?? new Date(), existingIds });
  const { migrated, backupPath } = appendArticle(articlesCsv, article);
  if (migrated) console.warn(`⚠️  Article columns changed; old file backed up to ${backupPath ?? '(none)'}`);

  console.log(`📰 Created ${article.articleId}: "${article.title}"`);
  return article;
}

function printUsage(): never {
  console.error(
    [
      'Usage: npx tsx scripts/generate-article.ts [options]',
      '',
      'Options:',
      '  --seed <str>  Seed for the article sampling (random by default)',
      '  --help        Show this help',
    ].join('\n'),
  );
  process.exit(2);
}

async function main() {
  const args = process.argv.slice(2);
  if (hasFlag(args, '--help')) printUsage();
  await createNewStory({ seed: getArgValue(args, '--seed') ?? undefined });
}

if (isMainModule(import.meta.url)) {
  main().catch(err => {
    console.error(`❌ ${errorMessage(err)}`);
    process.exit(1);
  });
}
