import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ArticleResponseError } from '../src/news';
import { generatePopulation, generateTown, sampleArticleSeed } from '../src/sim';
import { readArticles, writeArticles } from './articles-csv';
import { defaultConfigPaths, defaultDataPaths, loadArticleTables, loadPeopleTables, loadTownTables } from './config-files';
import { buildSiteData, exportSiteData, renderArticleBody } from './export-site-data';
import { makeArticleRecord, makeTempDir } from './fixtures';
import { createNewStory, type StoryInputs } from './generate-article';
import { generateArticlesDaily } from './generate-articles-daily';
import { initialiseTown } from './initialise-town';
import type { ChatCompletionClient, ChatCompletionRequest } from './llm';
import { readPeopleCsv } from './people-csv';
import { loadTownJson } from './town-json';

let dir = '';
let cleanup = () => {};

beforeEach(() => {
  ({ dir, cleanup } = makeTempDir());
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  cleanup();
});

const NOW = new Date(2026, 5, 15, 12, 0, 0);

const REPLY = [
  '```json',
  JSON.stringify({
    title: 'Council Approves New Bike Lanes',
    body: 'The council voted **7-2** on Tuesday.\n\nWork starts in May.',
    summary: 'Bike lanes are coming.',
    story_status: 'ongoing',
    images: [{ image: 'bike lane', caption: 'A painted bike lane' }],
  }),
  '```',
].join('\n');

function scriptedClient(replies: Array<string | Error>) {
  const requests: ChatCompletionRequest[] = [];
  let call = 0;
  const client: ChatCompletionClient = {
    async complete(request) {
      requests.push(request);
      const reply = replies[call++ % replies.length] ?? REPLY;
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
  return { client, requests };
}

describe('createNewStory', () => {
  const tables = loadArticleTables();
  const town = generateTown({ tables: loadTownTables(), locale: 'en_US', seed: 'story-town', name: 'Testville', size: 'small', now: NOW });
  town.newspaper = { name: 'The Testville Courier', tagline: 'Local news', foundedYear: 1901, publicationFrequency: 'Daily' };
  const people = generatePopulation(40, { tables: loadPeopleTables(), locale: 'en_US', seed: 'story-people', asOfYear: 2026 });
  const inputs: StoryInputs = { tables, town, people };

  it('samples a seed, prompts the model and appends the article', async () => {
    const articlesCsv = join(dir, 'articles.csv');
    const { client, requests } = scriptedClient([REPLY]);
    const article = await createNewStory({ inputs, seed: 'story-1', articlesCsv, client, now: NOW });
    const seed = sampleArticleSeed({
      tables,
      settings: { priorityCategories: [], seriousnessWeights: null, storyStatusWeights: null },
      town,
      people,
      seed: 'story-1',
    });

    expect(article.articleId).toBe('ART-20260615120000');
    expect(article.title).toBe('Council Approves New Bike Lanes');
    expect(article.slug).toBe('council-approves-new-bike-lanes');
    expect(article.category).toBe(seed.category);
    expect(article.author).toBe(seed.author.name);
    expect(article.tone).toBe(seed.tone);
    expect(article.storyStatus).toBe('Ongoing');
    expect(article.peopleData.map(p => p.id)).toEqual(seed.people.map(p => p.id));
    expect(readArticles(articlesCsv)).toEqual([article]);

    const request = requests[0];
    expect(request?.model).toBe('gpt-4o-mini');
    expect(request?.temperature).toBe(0.8);
    expect(request?.max_tokens).toBe(1400);
    expect(request?.messages[0]?.role).toBe('system');
    expect(request?.messages[0]?.content).toContain('You are a skilled news journalist for The Testville Courier.');
    expect(request?.messages[1]?.content).toContain(`for the ${seed.category} section of The Testville Courier.`);
  });

  it('gives a second article in the same second a new id', async () => {
    const articlesCsv = join(dir, 'articles.csv');
    const { client } = scriptedClient([REPLY]);
    await createNewStory({ inputs, seed: 'a', articlesCsv, client, now: NOW });
    const second = await createNewStory({ inputs, seed: 'b', articlesCsv, client, now: NOW });
    expect(second.articleId).toBe('ART-20260615120000-2');
    expect(readArticles(articlesCsv)).toHaveLength(2);
  });

  it('uses the default paper name when the town has none', async () => {
    const { client, requests } = scriptedClient([REPLY]);
    await createNewStory({ inputs: { tables, town: null, people: [] }, seed: 'c', articlesCsv: join(dir, 'a.csv'), client, now: NOW });
    expect(requests[0]?.messages[0]?.content).toContain('You are a skilled news journalist for The Town Gazette.');
    expect(requests[0]?.messages[1]?.content).toContain('No specific town details were sampled.');
  });

  it('stores nothing when the reply cannot be parsed', async () => {
    const articlesCsv = join(dir, 'articles.csv');
    const { client } = scriptedClient(['I cannot write that.']);
    await expect(createNewStory({ inputs, seed: 'd', articlesCsv, client, now: NOW })).rejects.toBeInstanceOf(
      ArticleResponseError,
    );
    expect(existsSync(articlesCsv)).toBe(false);
  });
});

describe('generateArticlesDaily', () => {
  it('keeps going past failures, pauses between articles and prunes', async () => {
    const configPath = join(dir, 'daily.yaml');
    writeFileSync(
      configPath,
      [
        'articles:',
        '  count: 3',
        '  delay_ms: 250',
        '  seed: "daily-test"',
        '  save_options:',
        '    backup_before_save: true',
        '    article_limit: 2',
      ].join('\n'),
      'utf-8',
    );
    const dataPaths = defaultDataPaths(dir);
    writeArticles(dataPaths.articlesCsv, [makeArticleRecord({ articleId: 'ART-OLD', lastUpdated: '2020-01-01 00:00:00' })]);
    const before = readFileSync(dataPaths.articlesCsv, 'utf-8');

    const { client, requests } = scriptedClient([REPLY, new Error('rate limited'), REPLY]);
    const pauses: number[] = [];
    const articles = await generateArticlesDaily({
      configPath,
      dataPaths,
      client,
      sleep: async ms => {
        pauses.push(ms);
      },
      now: () => NOW,
    });

    expect(requests).toHaveLength(3);
    expect(pauses).toEqual([250, 250]);
    expect(articles.map(a => a.articleId)).toEqual(['ART-20260615120000', 'ART-20260615120000-2']);
    expect(console.error).toHaveBeenCalledWith('❌ Error generating article 2: rate limited');
    expect(readFileSync(`${dataPaths.articlesCsv}.bak`, 'utf-8')).toBe(before);
    expect(readArticles(dataPaths.articlesCsv).map(a => a.articleId)).toEqual(['ART-20260615120000', 'ART-20260615120000-2']);
  });

  it('does not pause when the delay is zero', async () => {
    const configPath = join(dir, 'daily.yaml');
    writeFileSync(configPath, 'articles:\n  count: 2\n  delay_ms: 0\n  seed: "quick"\n', 'utf-8');
    const { client } = scriptedClient([REPLY]);
    const pauses: number[] = [];
    const articles = await generateArticlesDaily({
      configPath,
      dataPaths: defaultDataPaths(dir),
      client,
      sleep: async ms => {
        pauses.push(ms);
      },
      now: () => NOW,
    });
    expect(articles).toHaveLength(2);
    expect(pauses).toEqual([]);
    expect(existsSync(`${defaultDataPaths(dir).articlesCsv}.bak`)).toBe(false);
  });
});

describe('initialiseTown', () => {
  it('generates and saves the town and its residents', () => {
    const configPath = join(dir, 'town_init.yaml');
    writeFileSync(
      configPath,
      [
        'town:',
        '  name: "Testville"',
        '  locale: "en_US"',
        '  seed: "init-test"',
        '  size: "small"',
        'population:',
        '  scale_factor: 0.01',
        '  min_people: 30',
        'newspaper:',
        '  name: "The Testville Courier"',
        '  founded_year: 1901',
      ].join('\n'),
      'utf-8',
    );
    const dataPaths = defaultDataPaths(dir);
    const result = initialiseTown({ configPath, configPaths: defaultConfigPaths(), dataPaths, now: NOW });

    expect(result.town.name).toBe('Testville');
    expect(result.town.newspaper).toEqual({
      name: 'The Testville Courier',
      tagline: '',
      foundedYear: 1901,
      publicationFrequency: 'Daily',
    });
    expect(result.people).toHaveLength(Math.max(30, Math.floor(result.town.population * 0.01)));
    expect(result.townPath).toBe(dataPaths.townJson);
    expect(loadTownJson(dataPaths.townJson)).toEqual(result.town);
    expect(readPeopleCsv(dataPaths.peopleCsv)).toEqual(result.people);
  });
});

describe('site export', () => {
  it('shows raw HTML in article bodies as text', () => {
    expect(renderArticleBody('Hi <img src=x onerror=alert(1)> **there**')).toBe(
      '<p>Hi &lt;img src=x onerror=alert(1)&gt; <strong>there</strong></p>\n',
    );
    const block = renderArticleBody('<div onclick="x">hi</div>');
    expect(block).toContain('&lt;div onclick=&quot;x&quot;&gt;hi&lt;/div&gt;');
    expect(block).not.toContain('<div');
  });

  it('sorts newest first, renders markdown and lists categories', () => {
    const articles = [
      makeArticleRecord({ articleId: 'a', category: 'Sports', publicationDate: '2026-06-14', lastUpdated: '2026-06-14 09:00:00' }),
      makeArticleRecord({ articleId: 'b', category: 'Crime', publicationDate: '2026-06-15', lastUpdated: '2026-06-15 08:00:00' }),
      makeArticleRecord({ articleId: 'c', category: 'Sports', publicationDate: '2026-06-15', lastUpdated: '2026-06-15 10:00:00', body: 'Hello **town**' }),
    ];
    const data = buildSiteData(articles, null, new Date('2026-06-16T00:00:00Z'));
    expect(data.articles.map(a => a.id)).toEqual(['c', 'b', 'a']);
    expect(data.categories).toEqual(['Crime', 'Sports']);
    expect(data.articles[0]?.bodyHtml).toBe('<p>Hello <strong>town</strong></p>\n');
    expect(data.townName).toBe('');
    expect(data.newspaper).toBeNull();
    expect(data.generatedAt).toBe('2026-06-16T00:00:00.000Z');
  });

  it('writes public/site-data.json from the stored articles and town', () => {
    const dataPaths = defaultDataPaths(dir);
    const town = generateTown({ tables: loadTownTables(), locale: 'en_US', seed: 'export', name: 'Testville', size: 'small', now: NOW });
    town.newspaper = { name: 'The Testville Courier', tagline: 'Local news', foundedYear: 1901, publicationFrequency: 'Daily' };
    writeArticles(dataPaths.articlesCsv, [makeArticleRecord()]);
    writeFileSync(dataPaths.townJson, JSON.stringify(town), 'utf-8');

    const data = exportSiteData(dataPaths, new Date('2026-06-16T00:00:00Z'));
    expect(data.townName).toBe('Testville');
    expect(data.newspaper?.name).toBe('The Testville Courier');
    const written: unknown = JSON.parse(readFileSync(dataPaths.siteData, 'utf-8'));
    expect(written).toEqual(data);
  });
});
