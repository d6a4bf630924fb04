import type { ArticleImage, ParsedArticle } from './types';

export class ArticleResponseError extends Error {
  constructor(message: string, readonly responseText: string) {
    super(message);
    this.name = 'ArticleResponseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First ```json fenced block, else the outermost `{...}`. */
export function extractJsonBlock(text: string): string | null {
  const fenced = /```json\s*([\s\S]*?)```/i.exec(text);
  if (fenced?.[1]?.trim()) return fenced[1].trim();
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

function parseImages(value: unknown): ArticleImage[] {
  if (!Array.isArray(value)) return [];
  const images: ArticleImage[] = [];
  for (const entry of value) {
    if (isRecord(entry) && typeof entry.image === 'string' && typeof entry.caption === 'string') {
      images.push({ image: entry.image, caption: entry.caption });
    }
  }
  return images;
}

function parseJson(json: string, text: string): unknown {
  try {
    return JSON.parse(json);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ArticleResponseError(`Invalid JSON in LLM response: ${message}`, text);
  }
}

export function parseArticleResponse(text: string): ParsedArticle {
  const json = extractJsonBlock(text);
  if (json === null) throw new ArticleResponseError('No JSON object found in LLM response', text);

  const doc = parseJson(json, text);
  if (!isRecord(doc)) throw new ArticleResponseError('LLM response JSON is not an object', text);

  const field = (key: 'title' | 'body' | 'summary'): string => {
    const value = doc[key];
    if (typeof value !== 'string' || !value.trim()) {
      throw new ArticleResponseError(`LLM response is missing '${key}'`, text);
    }
    return value.trim();
  };

  const status = typeof doc.story_status === 'string' ? doc.story_status.trim().toLowerCase() : '';
  return {
    title: field('title'),
    body: field('body'),
    summary: field('summary'),
    storyStatus: status === 'concluded' ? 'concluded' : 'ongoing',
    images: parseImages(doc.images),
  };
}
