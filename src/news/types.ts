import type { TownFacts } from '../sim/types';

export type ArticleImage = { image: string; caption: string };

export type StoryStatus = 'Ongoing' | 'Concluded';

/** A resident as stored alongside an article. */
export type PersonMention = {
  id: string;
  name: string;
  age: number;
  occupation: string;
  employmentStatus: string;
  temperament: string;
};

export type ArticleRecord = {
  articleId: string;
  title: string;
  slug: string;
  body: string;
  summary: string;
  /** YYYY-MM-DD */
  publicationDate: string;
  /** YYYY-MM-DD HH:mm:ss */
  lastUpdated: string;
  author: string;
  authorPersona: string;
  authorStyle: string;
  category: string;
  status: string;
  storyStatus: StoryStatus;
  tone: string;
  images: ArticleImage[];
  townData: TownFacts | null;
  peopleData: PersonMention[];
};

export type ParsedArticle = {
  title: string;
  body: string;
  summary: string;
  storyStatus: 'ongoing' | 'concluded';
  images: ArticleImage[];
};

export type ArticlePrompts = { system: string; user: string };
