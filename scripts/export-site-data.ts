#!/usr/bin/env node
import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { Marked } from 'marked';
import type { ArticleRecord } from '../src/news';
import type { Town } from '../src/sim';
import { escapeHtml } from '../src/site/render';
import type { SiteArticle, SiteData } from '../src/site/types';
import { readArticles } from './articles-csv';
import { errorMessage, hasFlag, isMainModule } from './cli-args';
import { defaultDataPaths, type DataPaths } from './config-files';
import { loadTownJson } from './town-json';

// Bodies are model output: raw HTML in them is shown as text, never injected.
const markdown = new Marked({
  renderer: {
    html(html) {
      return escapeHtml(html);
    },
  },
});

export function renderArticleBody(body: string): string {
  const html = markdown.parse(body, { async: false });
  if (typeof html !== 'string') throw new Error('Markdown rendering unexpectedly returned a promise');
  return html;
}

export function toSiteArticle(a: ArticleRecord): SiteArticle {
  return {
    id: a.articleId,
    title: a.title,
    slug: a.slug,
    summary: a.summary,
    bodyHtml: renderArticleBody(a.body),
    category: a.category,
    author: a.author,
    authorPersona: a.authorPersona,
    publicationDate: a.publicationDate,
    lastUpdated: a.lastUpdated,
    storyStatus: a.storyStatus,
    tone: a.tone,
    images: a.images,
  };
}

/** Newest first by publication date, then last update. */
export function compareNewestFirst(a: ArticleRecord, b: ArticleRecord): number {
  return b.publicationDate.localeCompare(a.publicationDate) || b.lastUpdated.localeCompare(a.lastUpdated);
}

export function buildSiteData(articles: readonly ArticleRecord[], town: Town | null, now: Date = new Date()): SiteData {
  const sorted = [...articles].sort(compareNewestFirst);
  const categories = [...new Set(sorted.map(a => a.category).filter(Boolean))].sort((a, b) => a.localeCompare(b));
  return {
    townName: town?.name ?? '',
    newspaper: town?.newspaper ?? null,
    categories,
    articles: sorted.map(toSiteArticle),
    generatedAt: now.toISOString(),
  };
}

export function exportSiteData(paths: DataPaths = defaultDataPaths(), now: Date = new Date()): SiteData {
  const articles = readArticles(paths.articlesCsv);
  if (!articles.length) console.warn(`⚠️  No articles found in ${paths.articlesCsv}`);
  const data = buildSiteData(articles, loadTownJson(paths.townJson), now);
  mkdirSync(dirname(paths.siteData), { recursive: true });
  writeFileSync(paths.siteData, JSON.stringify(data, null, 2), 'utf-8');
  console.log(`🗞️  Wrote ${data.articles.length} article(s) in ${data.categories.length} categories → ${paths.siteData}`);
  return data;
}

if (isMainModule(import.meta.url)) {
  if (hasFlag(process.argv.slice(2), '--help')) {
    console.error('Usage: npx tsx scripts/export-site-data.ts');
    process.exit(2);
  }
  try {
    exportSiteData();
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}
