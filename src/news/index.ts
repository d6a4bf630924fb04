/**
 * News module exports: prompt assembly, LLM response parsing and the stored
 * article record.
 */

export * from './types';

export { fillTemplate, describeTownContext, describePeopleContext, buildArticlePrompts, type TemplateValues } from './prompt';
export { ArticleResponseError, extractJsonBlock, parseArticleResponse } from './response';
export {
  PUBLISHED,
  slugify,
  formatDay,
  formatTimestamp,
  articleIdFor,
  mentionPerson,
  buildArticleRecord,
  type BuildArticleInput,
} from './article';
