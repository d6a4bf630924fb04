import type { ArticleSeed, Person } from '../sim/types';
import type { ArticleRecord, ParsedArticle, PersonMention } from './types';

export const PUBLISHED = 'Published';

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '');
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/** Local-time `YYYY-MM-DD`. */
export function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** Local-time `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return `${formatDay(date)} ${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

export function articleIdFor(date: Date, existingIds: ReadonlySet<string> = new Set()): string {
  const base = `ART-${formatDay(date).replace(/-/g, '')}${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  if (!existingIds.has(base)) return base;
  let n = 2;
  while (existingIds.has(`${base}-${n}`)) n++;
  return `${base}-${n}`;
}

export function mentionPerson(person: Person): PersonMention {
  return {
    id: person.id,
    name: `${person.firstName} ${person.lastName}`,
    age: person.age,
    occupation: person.occupation,
    employmentStatus: person.employmentStatus,
    temperament: person.temperamentType,
  };
}

export type BuildArticleInput = {
  seed: ArticleSeed;
  parsed: ParsedArticle;
  now: Date;
  existingIds?: ReadonlySet<string>;
};

export function buildArticleRecord({ seed, parsed, now, existingIds }: BuildArticleInput): ArticleRecord {
  return {
    articleId: articleIdFor(now, existingIds),
    title: parsed.title,
    slug: slugify(parsed.title),
    body: parsed.body,
    summary: parsed.summary,
    publicationDate: formatDay(now),
    lastUpdated: formatTimestamp(now),
    author: seed.author.name,
    authorPersona: seed.author.persona,
    authorStyle: seed.author.writingStyle,
    category: seed.category,
    status: PUBLISHED,
    storyStatus: parsed.storyStatus === 'concluded' ? 'Concluded' : 'Ongoing',
    tone: seed.tone,
    images: parsed.images,
    townData: seed.town,
    peopleData: seed.people.map(mentionPerson),
  };
}
