import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { generateTown } from '../src/sim';
import {
  ARTICLE_COLUMNS,
  appendArticle,
  backupArticles,
  pruneArticles,
  readArticles,
  writeArticles,
} from './articles-csv';
import { loadTownTables } from './config-files';
import { makeArticleRecord, makeArticleSeed, makePerson, makeTempDir } from './fixtures';
import { readPeopleCsv, writePeopleCsv } from './people-csv';
import { findTownProblem, loadTownJson, saveTownJson } from './town-json';

let dir = '';
let cleanup = () => {};

beforeEach(() => {
  ({ dir, cleanup } = makeTempDir());
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  cleanup();
});

const first = makeArticleRecord({
  body: 'Line one, with a comma.\n\nLine "two".',
  townData: makeArticleSeed().town,
  peopleData: [
    { id: 'p1', name: 'Ada Fenwick', age: 40, occupation: 'Librarian', employmentStatus: 'Employed full-time', temperament: 'Calm' },
  ],
});
const second = makeArticleRecord({
  articleId: 'ART-20260616080000',
  title: 'Bakery Wins Award',
  slug: 'bakery-wins-award',
  lastUpdated: '2026-06-16 08:00:00',
  publicationDate: '2026-06-16',
  storyStatus: 'Concluded',
  images: [],
});

describe('articles CSV', () => {
  it('round-trips articles, including JSON columns', () => {
    const path = join(dir, 'articles.csv');
    writeArticles(path, [first, second]);
    expect(readArticles(path)).toEqual([first, second]);
    expect(readFileSync(path, 'utf-8').split('\n')[0]).toBe(ARTICLE_COLUMNS.join(','));
  });

  it('reads a missing file as empty', () => {
    expect(readArticles(join(dir, 'none.csv'))).toEqual([]);
    expect(backupArticles(join(dir, 'none.csv'))).toBeNull();
  });

  it('creates the file on first append and appends after that', () => {
    const path = join(dir, 'nested', 'articles.csv');
    expect(appendArticle(path, first)).toEqual({ migrated: false, backupPath: null });
    expect(appendArticle(path, second)).toEqual({ migrated: false, backupPath: null });
    expect(readArticles(path)).toEqual([first, second]);
  });

  it('migrates a file with an older header and backs it up', () => {
    const path = join(dir, 'articles.csv');
    const original = 'article_id,title,body\nART-1,Old,Old body\n';
    writeFileSync(path, original, 'utf-8');

    expect(appendArticle(path, second)).toEqual({ migrated: true, backupPath: `${path}.bak` });
    expect(readFileSync(`${path}.bak`, 'utf-8')).toBe(original);
    expect(readFileSync(path, 'utf-8').split('\n')[0]).toBe(ARTICLE_COLUMNS.join(','));

    const [old, added] = readArticles(path);
    expect(old).toEqual(
      makeArticleRecord({
        articleId: 'ART-1',
        title: 'Old',
        slug: '',
        body: 'Old body',
        summary: '',
        publicationDate: '',
        lastUpdated: '',
        author: '',
        authorPersona: '',
        authorStyle: '',
        category: '',
        status: '',
        tone: '',
        images: [],
      }),
    );
    expect(added).toEqual(second);
  });

  it('prunes to the newest rows and keeps file order', () => {
    const path = join(dir, 'articles.csv');
    const at = (id: string, lastUpdated: string) => makeArticleRecord({ articleId: id, lastUpdated });
    writeArticles(path, [
      at('a', '2026-01-01 10:00:00'),
      at('b', '2026-01-03 10:00:00'),
      at('c', '2026-01-02 10:00:00'),
      at('d', '2026-01-03 10:00:00'),
    ]);

    expect(pruneArticles(path, 0)).toBe(0);
    expect(pruneArticles(path, 10)).toBe(0);
    expect(pruneArticles(path, 2)).toBe(2);
    expect(readArticles(path).map(a => a.articleId)).toEqual(['b', 'd']);
  });

  it('breaks timestamp ties in favour of later rows', () => {
    const path = join(dir, 'articles.csv');
    writeArticles(path, [
      makeArticleRecord({ articleId: 'x', lastUpdated: '2026-01-01 00:00:00' }),
      makeArticleRecord({ articleId: 'y', lastUpdated: '2026-01-01 00:00:00' }),
    ]);
    expect(pruneArticles(path, 1)).toBe(1);
    expect(readArticles(path).map(a => a.articleId)).toEqual(['y']);
  });

  it('keeps exactly the newest N when a tie straddles the cut', () => {
    const path = join(dir, 'articles.csv');
    const at = (id: string, lastUpdated: string) => makeArticleRecord({ articleId: id, lastUpdated });
    writeArticles(path, [
      at('p', '2026-02-02 09:00:00'),
      at('q', '2026-02-01 09:00:00'),
      at('r', '2026-02-02 09:00:00'),
      at('s', '2026-02-01 09:00:00'),
    ]);
    const before = readFileSync(path, 'utf-8');

    expect(pruneArticles(path, 4)).toBe(0);
    expect(readFileSync(path, 'utf-8')).toBe(before);

    expect(pruneArticles(path, 3)).toBe(1);
    expect(readArticles(path).map(a => a.articleId)).toEqual(['p', 'r', 's']);
  });
});

describe('people CSV', () => {
  it('round-trips residents with their traits', () => {
    const path = join(dir, 'people.csv');
    const people = [makePerson(), makePerson({ id: 'ffff0000', firstName: 'Tom', occupation: '', temperamentTraits: [] })];
    writePeopleCsv(path, people);
    expect(readPeopleCsv(path)).toEqual(people);
  });

  it('warns and returns nobody when the file is missing', () => {
    const path = join(dir, 'missing.csv');
    expect(readPeopleCsv(path)).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith(`⚠️  People data not found at ${path}; continuing without residents`);
  });
});

describe('town JSON', () => {
  it('saves and reloads a town', () => {
    const path = join(dir, 'town.json');
    const town = generateTown({ tables: loadTownTables(), locale: 'en_US', seed: 'json', size: 'small', now: new Date(0) });
    saveTownJson(path, town);
    expect(existsSync(path)).toBe(true);
    expect(loadTownJson(path)).toEqual(town);
  });

  it('returns null for missing, broken or incomplete files', () => {
    expect(loadTownJson(join(dir, 'none.json'))).toBeNull();
    const broken = join(dir, 'broken.json');
    writeFileSync(broken, '{ not json', 'utf-8');
    expect(loadTownJson(broken)).toBeNull();
    const partial = join(dir, 'partial.json');
    writeFileSync(partial, JSON.stringify({ name: 'Testville', population: 10 }), 'utf-8');
    expect(loadTownJson(partial)).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(`⚠️  Town data at ${partial} is missing required fields: id`);
  });

  it('rejects towns whose nested records use other field names', () => {
    const path = join(dir, 'snake.json');
    const town = generateTown({ tables: loadTownTables(), locale: 'en_US', seed: 'json', size: 'small', now: new Date(0) });
    const landmarks = town.landmarks.map(({ establishedYear, historicalSignificance, ...rest }) => ({
      ...rest,
      established_year: establishedYear,
      historical_significance: historicalSignificance,
    }));
    writeFileSync(path, JSON.stringify({ ...town, landmarks }), 'utf-8');

    expect(loadTownJson(path)).toBeNull();
    expect(console.warn).toHaveBeenCalledWith(`⚠️  Town data at ${path} is missing required fields: landmarks.0.establishedYear`);
  });

  it('names a bad newspaper or a missing feature list', () => {
    const town = generateTown({ tables: loadTownTables(), locale: 'en_US', seed: 'json', size: 'small', now: new Date(0) });
    const { parks, ...withoutParks } = town;
    expect(findTownProblem(withoutParks)).toBe('parks');
    expect(findTownProblem({ ...town, newspaper: { name: 'The Courier' } })).toBe('newspaper.tagline');
    expect(findTownProblem({ ...town, parks: [...parks, 'Oak Park'] })).toBe(`parks.${parks.length}`);
    expect(findTownProblem(town)).toBeNull();
  });
});
