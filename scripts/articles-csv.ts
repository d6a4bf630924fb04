import { appendFileSync, copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { ArticleImage, ArticleRecord, PersonMention } from '../src/news';
import type { TownFacts } from '../src/sim';
import { parseCsvTable, stringifyCsv, type CsvRow } from './csv-rows';

export const ARTICLE_COLUMNS = [
  'article_id',
  'title',
  'slug',
  'body',
  'summary',
  'publication_date',
  'last_updated',
  'author',
  'author_persona',
  'author_style',
  'category',
  'status',
  'story_status',
  'tone',
  'images',
  'town_data',
  'people_data',
] as const;

export type ArticleColumn = (typeof ARTICLE_COLUMNS)[number];

export type AppendResult = { migrated: boolean; backupPath: string | null };

// ─────────────────────────────────────────────────────────────
// Row mapping
// ─────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonCell(cell: string | undefined): unknown {
  if (!cell?.trim()) return null;
  try {
    return JSON.parse(cell);
  } catch {
    return null;
  }
}

function isImage(value: unknown): value is ArticleImage {
  return isRecord(value) && typeof value.image === 'string' && typeof value.caption === 'string';
}

function isPersonMention(value: unknown): value is PersonMention {
  return isRecord(value) && typeof value.id === 'string' && typeof value.name === 'string' && typeof value.age === 'number';
}

function isTownFacts(value: unknown): value is TownFacts {
  return (
    isRecord(value) &&
    typeof value.townName === 'string' &&
    typeof value.townPopulation === 'number' &&
    isRecord(value.features)
  );
}

export function articleToRow(a: ArticleRecord): Record<ArticleColumn, string> {
  return {
    article_id: a.articleId,
    title: a.title,
    slug: a.slug,
    body: a.body,
    summary: a.summary,
    publication_date: a.publicationDate,
    last_updated: a.lastUpdated,
    author: a.author,
    author_persona: a.authorPersona,
    author_style: a.authorStyle,
    category: a.category,
    status: a.status,
    story_status: a.storyStatus,
    tone: a.tone,
    images: JSON.stringify(a.images),
    town_data: a.townData ? JSON.stringify(a.townData) : '',
    people_data: JSON.stringify(a.peopleData),
  };
}

export function rowToArticle(row: CsvRow): ArticleRecord {
  const images = parseJsonCell(row.images);
  const people = parseJsonCell(row.people_data);
  const town = parseJsonCell(row.town_data);
  return {
    articleId: row.article_id ?? '',
    title: row.title ?? '',
    slug: row.slug ?? '',
    body: row.body ?? '',
    summary: row.summary ?? '',
    publicationDate: row.publication_date ?? '',
    lastUpdated: row.last_updated ?? '',
    author: row.author ?? '',
    authorPersona: row.author_persona ?? '',
    authorStyle: row.author_style ?? '',
    category: row.category ?? '',
    status: row.status ?? '',
    storyStatus: (row.story_status ?? '').toLowerCase() === 'concluded' ? 'Concluded' : 'Ongoing',
    tone: row.tone ?? '',
    images: Array.isArray(images) ? images.filter(isImage) : [],
    townData: isTownFacts(town) ? town : null,
    peopleData: Array.isArray(people) ? people.filter(isPersonMention) : [],
  };
}

// ─────────────────────────────────────────────────────────────
// File operations
// ─────────────────────────────────────────────────────────────

function readTable(path: string) {
  if (!existsSync(path)) return { columns: [], rows: [] };
  return parseCsvTable(readFileSync(path, 'utf-8'));
}

export function readArticles(path: string): ArticleRecord[] {
  return readTable(path).rows.map(rowToArticle);
}

export function writeArticles(path: string, articles: readonly ArticleRecord[]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, stringifyCsv(ARTICLE_COLUMNS, articles.map(articleToRow)), 'utf-8');
}

export function backupArticles(path: string): string | null {
  if (!existsSync(path)) return null;
  const backupPath = `${path}.bak`;
  copyFileSync(path, backupPath);
  return backupPath;
}

function sameColumns(columns: readonly string[]): boolean {
  return columns.length === ARTICLE_COLUMNS.length && ARTICLE_COLUMNS.every((c, i) => columns[i] === c);
}

/**
 * Appends one article. A file whose header differs from ARTICLE_COLUMNS is
 * backed up to `<file>.bak` and rewritten with the expected columns first;
 * columns it lacks are filled with "".
 */
export function appendArticle(path: string, article: ArticleRecord): AppendResult {
  const row = articleToRow(article);
  const text = existsSync(path) ? readFileSync(path, 'utf-8') : '';

  if (!text.trim()) {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, stringifyCsv(ARTICLE_COLUMNS, [row]), 'utf-8');
    return { migrated: false, backupPath: null };
  }

  const table = parseCsvTable(text);
  if (sameColumns(table.columns)) {
    const lead = text.endsWith('\n') ? '' : '\n';
    appendFileSync(path, lead + stringifyCsv(ARTICLE_COLUMNS, [row], false), 'utf-8');
    return { migrated: false, backupPath: null };
  }

  const backupPath = backupArticles(path);
  writeFileSync(path, stringifyCsv(ARTICLE_COLUMNS, [...table.rows, row]), 'utf-8');
  return { migrated: true, backupPath };
}

/** Keeps the `limit` newest rows by `last_updated`. Returns how many were removed. */
export function pruneArticles(path: string, limit: number): number {
  if (limit <= 0) return 0;
  const { rows } = readTable(path);
  if (rows.length <= limit) return 0;

  const keep = new Set(
    rows
      .map((row, index) => ({ index, lastUpdated: row.last_updated ?? '' }))
      .sort((a, b) => b.lastUpdated.localeCompare(a.lastUpdated) || b.index - a.index)
      .slice(0, limit)
      .map(x => x.index),
  );
  const kept = rows.filter((_, index) => keep.has(index));
  writeFileSync(path, stringifyCsv(ARTICLE_COLUMNS, kept), 'utf-8');
  return rows.length - kept.length;
}
