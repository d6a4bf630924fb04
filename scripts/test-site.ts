import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { applyDataLoadWarning, emptySiteData, loadSiteData, type WarningBanner } from '../src/site/dataLoad';
import {
  escapeHtml,
  formatDate,
  formatLongDate,
  pageTitle,
  relatedArticles,
  renderArticle,
  renderCategory,
  renderHeader,
  renderHome,
  renderRoute,
} from '../src/site/render';
import { articleHref, parseRoute, SiteRouter, type HashTarget, type Route } from '../src/site/router';
import type { SiteArticle, SiteData } from '../src/site/types';

function siteArticle(i: number, overrides: Partial<SiteArticle> = {}): SiteArticle {
  return {
    id: `a${i}`,
    title: `Title ${i}`,
    slug: `title-${i}`,
    summary: `Summary ${i}`,
    bodyHtml: `<p>Body ${i}</p>`,
    category: i % 2 === 0 ? 'Sports' : 'Crime',
    author: 'James Wilson',
    authorPersona: 'General assignment reporter.',
    publicationDate: '2026-06-15',
    lastUpdated: '2026-06-15 12:00:00',
    storyStatus: 'Ongoing',
    tone: 'balanced',
    images: [],
    ...overrides,
  };
}

const data: SiteData = {
  townName: 'Testville',
  newspaper: { name: 'The Testville Courier', tagline: 'Local & proud', foundedYear: 1901, publicationFrequency: 'Daily' },
  categories: ['Crime', 'Sports'],
  articles: Array.from({ length: 10 }, (_, i) => siteArticle(i)),
  generatedAt: '2026-06-16T00:00:00.000Z',
};

const count = (haystack: string, needle: string) => haystack.split(needle).length - 1;

describe('parseRoute', () => {
  it('maps hashes to views', () => {
    expect(parseRoute('')).toEqual({ kind: 'home' });
    expect(parseRoute('#/')).toEqual({ kind: 'home' });
    expect(parseRoute('#/article/ART-20260615120000')).toEqual({ kind: 'article', id: 'ART-20260615120000' });
    expect(parseRoute('#/category/Local%20News')).toEqual({ kind: 'category', name: 'Local News' });
  });

  it('sends anything else to not found', () => {
    expect(parseRoute('#/weather')).toEqual({ kind: 'notFound', hash: '#/weather' });
    expect(parseRoute('#/article/')).toEqual({ kind: 'notFound', hash: '#/article/' });
    expect(parseRoute('#/category/%E0%A4%A')).toEqual({ kind: 'notFound', hash: '#/category/%E0%A4%A' });
  });

  it('encodes ids into links', () => {
    expect(articleHref('ART 1')).toBe('#/article/ART%201');
    expect(parseRoute(articleHref('ART 1'))).toEqual({ kind: 'article', id: 'ART 1' });
  });
});

describe('SiteRouter', () => {
  it('reports the initial route and every hash change', () => {
    const listeners: Array<() => void> = [];
    const target: HashTarget = {
      addEventListener: (_type, listener) => {
        listeners.push(listener);
      },
      removeEventListener: (_type, listener) => {
        listeners.splice(listeners.indexOf(listener), 1);
      },
      location: { hash: '#/category/Sports' },
    };
    const seen: Route[] = [];
    const router = new SiteRouter(route => seen.push(route), target);

    target.location.hash = '#/article/a1';
    listeners.forEach(l => l());
    expect(seen).toEqual([
      { kind: 'category', name: 'Sports' },
      { kind: 'article', id: 'a1' },
    ]);
    expect(router.route).toEqual({ kind: 'article', id: 'a1' });

    router.dispose();
    expect(listeners).toHaveLength(0);
  });
});

describe('formatting', () => {
  it('spells out ISO days', () => {
    expect(formatDate('2026-03-07')).toBe('March 7, 2026');
    expect(formatDate('2026-12-25')).toBe('December 25, 2026');
  });

  it('returns anything else unchanged', () => {
    expect(formatDate('2026-02-30')).toBe('2026-02-30');
    expect(formatDate('yesterday')).toBe('yesterday');
    expect(formatDate('2026-06-15 12:00:00')).toBe('2026-06-15 12:00:00');
  });

  it('writes the masthead date with its weekday', () => {
    expect(formatLongDate(new Date(2026, 9, 19))).toBe('Monday, October 19, 2026');
  });

  it('escapes markup', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#039;&amp;&#039;&lt;/a&gt;');
  });
});

describe('views', () => {
  it('features three articles and lists the next six', () => {
    const html = renderHome(data);
    expect(count(html, 'class="article-card featured"')).toBe(3);
    expect(count(html, 'class="article-card compact"')).toBe(6);
    expect(html).toContain('href="#/article/a8"');
    expect(html).not.toContain('href="#/article/a9"');
  });

  it('shows an empty front page when there are no articles', () => {
    expect(renderHome(emptySiteData())).toContain('<h2>No stories yet</h2>');
  });

  it('renders an article with related stories from its category', () => {
    const html = renderArticle(data, 'a0');
    expect(html).toContain('<h1 class="article-title">Title 0</h1>');
    expect(html).toContain('<div class="article-body"><p>Body 0</p></div>');
    expect(html).toContain('By James Wilson · June 15, 2026');
    expect(relatedArticles(data, siteArticle(0)).map(a => a.id)).toEqual(['a2', 'a4', 'a6']);
    expect(html).toContain('href="#/article/a6"');
    expect(html).not.toContain('href="#/article/a8"');
  });

  it('shows a 404 for unknown articles', () => {
    const html = renderArticle(data, 'missing');
    expect(html).toContain('<h1>404</h1>');
    expect(html).toContain('<p>No article with id missing.</p>');
  });

  it('lists a category by exact name', () => {
    const html = renderCategory(data, 'Crime');
    expect(count(html, 'class="article-card featured"')).toBe(5);
    expect(html).not.toContain('href="#/article/a0"');
    expect(renderCategory(data, 'crime')).toContain('No stories in this section yet.');
  });

  it('escapes article text', () => {
    const html = renderHome({ ...data, articles: [siteArticle(0, { title: '<script>alert(1)</script>' })] });
    expect(html).toContain('&lt;script&gt;alert(1)&lt;/script&gt;');
    expect(html).not.toContain('<script>');
  });

  it('builds the masthead and marks the active section', () => {
    const html = renderHeader(data, new Date(2026, 9, 19), 'Sports');
    expect(html).toContain('<a class="masthead-name" href="#/">The Testville Courier</a>');
    expect(html).toContain('<div class="masthead-tagline">Local &amp; proud</div>');
    expect(html).toContain('<div class="masthead-date">Monday, October 19, 2026</div>');
    expect(html).toContain('<a class="nav-link" href="#/">Home</a>');
    expect(html).toContain('<a class="nav-link active" href="#/category/Sports">Sports</a>');
    expect(html).toContain('<a class="nav-link" href="#/category/Crime">Crime</a>');
  });

  it('routes to the right view and title', () => {
    expect(renderRoute({ kind: 'notFound', hash: '#/x' }, data)).toContain('The page you were looking for does not exist.');
    expect(pageTitle({ kind: 'article', id: 'a0' }, data)).toBe('Title 0 | The Testville Courier');
    expect(pageTitle({ kind: 'category', name: 'Crime' }, data)).toBe('Crime | The Testville Courier');
    expect(pageTitle({ kind: 'home' }, emptySiteData())).toBe('The Town Gazette');
  });
});

describe('loadSiteData', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the exported data', async () => {
    const fetcher: typeof fetch = async () => new Response(JSON.stringify(data), { status: 200 });
    await expect(loadSiteData(fetcher)).resolves.toEqual({ data, dataLoadError: null });
  });

  it('falls back to empty data on HTTP errors', async () => {
    const fetcher: typeof fetch = async () => new Response('oops', { status: 500, statusText: 'Server Error' });
    const result = await loadSiteData(fetcher);
    expect(result.dataLoadError).toBe('HTTP 500 Server Error');
    expect(result.data.articles).toEqual([]);
    expect(result.data.townName).toBe('');
    expect(console.warn).toHaveBeenCalledWith('[Town Gazette] Failed to load /site-data.json: HTTP 500 Server Error');
  });

  it('rejects data of the wrong shape', async () => {
    const fetcher: typeof fetch = async () => new Response('{"articles": 3}', { status: 200 });
    expect((await loadSiteData(fetcher)).dataLoadError).toBe('Malformed site data');
  });
});

describe('applyDataLoadWarning', () => {
  function fakeBanner() {
    const classes = new Set<string>(['hidden']);
    const banner: WarningBanner = {
      classList: {
        add: token => {
          classes.add(token);
        },
        remove: token => {
          classes.delete(token);
        },
      },
      innerHTML: '',
      textContent: '',
    };
    return { banner, classes };
  }

  it('explains how to export when loading failed', () => {
    const { banner, classes } = fakeBanner();
    applyDataLoadWarning({ warningBanner: banner, dataLoadError: 'HTTP 404', data: emptySiteData(), protocol: 'http:' });
    expect(classes.has('hidden')).toBe(false);
    expect(banner.innerHTML).toBe('No <code>/site-data.json</code> found. Run <code>npm run export-site</code> then reload.');
  });

  it('mentions file:// when opened from disk', () => {
    const { banner } = fakeBanner();
    applyDataLoadWarning({ warningBanner: banner, dataLoadError: 'Failed to fetch', data: emptySiteData(), protocol: 'file:' });
    expect(banner.innerHTML).toContain('You appear to be opening the site via <code>file://</code>');
  });

  it('warns about an empty export', () => {
    const { banner } = fakeBanner();
    applyDataLoadWarning({ warningBanner: banner, dataLoadError: null, data: emptySiteData() });
    expect(banner.innerHTML).toContain('contains 0 articles');
  });

  it('hides the banner when articles loaded', () => {
    const { banner, classes } = fakeBanner();
    classes.delete('hidden');
    banner.textContent = 'stale';
    applyDataLoadWarning({ warningBanner: banner, dataLoadError: null, data });
    expect(classes.has('hidden')).toBe(true);
    expect(banner.textContent).toBe('');
  });
});
