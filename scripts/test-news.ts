import { describe, expect, it } from 'vitest';
import {
  ArticleResponseError,
  articleIdFor,
  buildArticlePrompts,
  buildArticleRecord,
  describePeopleContext,
  describeTownContext,
  extractJsonBlock,
  fillTemplate,
  formatDay,
  formatTimestamp,
  parseArticleResponse,
  slugify,
} from '../src/news';
import { loadArticleTables } from './config-files';
import { makeArticleSeed, makePerson } from './fixtures';

describe('fillTemplate', () => {
  it('fills names and unescapes doubled braces', () => {
    expect(fillTemplate('Hi {name}, {{literal}}', { name: 'Ada' })).toBe('Hi Ada, {literal}');
    expect(fillTemplate('{count} stories', { count: 3 })).toBe('3 stories');
  });

  it('leaves braces that are not placeholders alone', () => {
    expect(fillTemplate('{ "a": 1 }', {})).toBe('{ "a": 1 }');
  });

  it('rejects unknown placeholders', () => {
    expect(() => fillTemplate('Dear {reader}', {})).toThrow("Unknown template placeholder '{reader}'");
  });
});

describe('prompt context', () => {
  it('lists the sampled town features', () => {
    expect(describeTownContext(makeArticleSeed())).toBe(
      [
        'Use these details about the town:',
        '- Town: Testville (population 12,500)',
        '- Street: Elm Street (Residential, 1.25 km long)',
        '- Park: Oak Dog Park (Dog Park, 2.5 hectares, facilities: Benches, Water Fountain)',
      ].join('\n'),
    );
  });

  it('asks for invented details when nothing was sampled', () => {
    const seed = makeArticleSeed({ town: null, people: [] });
    expect(describeTownContext(seed)).toBe(
      'No specific town details were sampled. Invent plausible local details for the story.',
    );
    expect(describePeopleContext(seed)).toBe(
      'No specific residents were sampled. Invent plausible residents if the story needs them.',
    );
  });

  it('describes residents by job, or by status when they have none', () => {
    const seed = makeArticleSeed({
      people: [makePerson(), makePerson({ firstName: 'Tom', lastName: 'Hale', age: 70, occupation: '', employmentStatus: 'Retired' })],
    });
    expect(describePeopleContext(seed)).toBe(
      [
        'Feature these residents in the story:',
        '- Ada Fenwick, 40, Librarian; calm temperament (Even-tempered, rarely shows strong emotions)',
        '- Tom Hale, 70, Retired; calm temperament (Even-tempered, rarely shows strong emotions)',
      ].join('\n'),
    );
  });

  it('fills both prompt templates', () => {
    const prompts = buildArticlePrompts(loadArticleTables(), makeArticleSeed(), 'The Testville Gazette');
    expect(prompts.system.startsWith('You are a skilled news journalist for The Testville Gazette.\n')).toBe(true);
    expect(prompts.system).toContain('You write in the style of James Wilson, who is described as:\n"General assignment reporter."');
    expect(prompts.system).toContain('The tone should be with a balanced tone.');
    expect(prompts.user.startsWith(
      'Please write a newspaper article for the Local News section of The Testville Gazette.\nThis should read as a developing story.',
    )).toBe(true);
    expect(prompts.user).toContain('- Street: Elm Street (Residential, 1.25 km long)');
    expect(prompts.user).toContain('```json\n{\n  "title": "A catchy headline for your article",');
    expect(prompts.user.endsWith('each with an image search query and a descriptive caption.')).toBe(true);
  });
});

describe('parseArticleResponse', () => {
  it('reads a fenced JSON block and trims fields', () => {
    const text = [
      'Here you go:',
      '```json',
      '{"title": " Fair Returns ", "body": "Body text", "summary": "Short", "story_status": "Concluded",',
      ' "images": [{"image": "fairground", "caption": "The fair"}, {"image": 3}]}',
      '```',
    ].join('\n');
    expect(parseArticleResponse(text)).toEqual({
      title: 'Fair Returns',
      body: 'Body text',
      summary: 'Short',
      storyStatus: 'concluded',
      images: [{ image: 'fairground', caption: 'The fair' }],
    });
  });

  it('falls back to the outermost braces and defaults to ongoing', () => {
    expect(parseArticleResponse('Sure! {"title":"A","body":"B","summary":"C"} Thanks')).toEqual({
      title: 'A',
      body: 'B',
      summary: 'C',
      storyStatus: 'ongoing',
      images: [],
    });
  });

  it('extracts nothing from prose', () => {
    expect(extractJsonBlock('no json here')).toBeNull();
  });

  it('reports what went wrong with the response attached', () => {
    const attempt = (text: string) => {
      try {
        parseArticleResponse(text);
      } catch (err) {
        return err;
      }
      return null;
    };
    const missing = attempt('no json here');
    expect(missing).toBeInstanceOf(ArticleResponseError);
    expect(missing instanceof ArticleResponseError && missing.responseText).toBe('no json here');
    expect(() => parseArticleResponse('no json here')).toThrow('No JSON object found in LLM response');
    expect(() => parseArticleResponse('{"title": }')).toThrow(/^Invalid JSON in LLM response: /);
    expect(() => parseArticleResponse('```json\n[1]\n```')).toThrow('LLM response JSON is not an object');
    expect(() => parseArticleResponse('{"title":"A","summary":"C"}')).toThrow("LLM response is missing 'body'");
  });
});

describe('article records', () => {
  it('slugifies titles', () => {
    expect(slugify('Hello, World! 2026')).toBe('hello-world-2026');
    expect(slugify('  --Café Opens-- ')).toBe('caf-opens');
  });

  it('formats local dates and timestamps', () => {
    const date = new Date(2026, 0, 5, 9, 3, 7);
    expect(formatDay(date)).toBe('2026-01-05');
    expect(formatTimestamp(date)).toBe('2026-01-05 09:03:07');
  });

  it('suffixes ids that already exist', () => {
    const date = new Date(2026, 0, 5, 9, 3, 7);
    expect(articleIdFor(date)).toBe('ART-20260105090307');
    expect(articleIdFor(date, new Set(['ART-20260105090307', 'ART-20260105090307-2']))).toBe('ART-20260105090307-3');
  });

  it('combines the seed and the parsed response', () => {
    const seed = makeArticleSeed();
    const parsed = {
      title: 'Library Extends Hours',
      body: 'Body',
      summary: 'Summary',
      storyStatus: 'concluded' as const,
      images: [{ image: 'library', caption: 'The library' }],
    };
    expect(buildArticleRecord({ seed, parsed, now: new Date(2026, 5, 15, 12, 0, 0) })).toEqual({
      articleId: 'ART-20260615120000',
      title: 'Library Extends Hours',
      slug: 'library-extends-hours',
      body: 'Body',
      summary: 'Summary',
      publicationDate: '2026-06-15',
      lastUpdated: '2026-06-15 12:00:00',
      author: 'James Wilson',
      authorPersona: 'General assignment reporter.',
      authorStyle: 'Straightforward and efficient',
      category: 'Local News',
      status: 'Published',
      storyStatus: 'Concluded',
      tone: 'balanced',
      images: [{ image: 'library', caption: 'The library' }],
      townData: seed.town,
      peopleData: [
        {
          id: 'abcd1234',
          name: 'Ada Fenwick',
          age: 40,
          occupation: 'Librarian',
          employmentStatus: 'Employed full-time',
          temperament: 'Calm',
        },
      ],
    });
  });
});
