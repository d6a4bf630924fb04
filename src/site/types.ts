import type { ArticleImage, StoryStatus } from '../news/types';
import type { Newspaper } from '../sim/types';

/** An article as published to public/site-data.json. */
export type SiteArticle = {
  id: string;
  title: string;
  slug: string;
  summary: string;
  bodyHtml: string;
  category: string;
  author: string;
  authorPersona: string;
  publicationDate: string;
  lastUpdated: string;
  storyStatus: StoryStatus;
  tone: string;
  images: ArticleImage[];
};

export type SiteData = {
  townName: string;
  newspaper: Newspaper | null;
  categories: string[];
  articles: SiteArticle[];
  generatedAt: string;
};
