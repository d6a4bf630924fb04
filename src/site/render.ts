import { articleHref, categoryHref, type Route } from './router';
import type { SiteArticle, SiteData } from './types';

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export const FEATURED_COUNT = 3;
export const RECENT_COUNT = 6;
export const RELATED_COUNT = 3;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/** `2024-03-07` → `March 7, 2024`. Anything else comes back unchanged. */
export function formatDate(value: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return value;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) return value;
  return `${MONTHS[month - 1]} ${day}, ${year}`;
}

export function formatLongDate(date: Date): string {
  return `${WEEKDAYS[date.getDay()]}, ${MONTHS[date.getMonth()]} ${date.getDate()}, ${date.getFullYear()}`;
}

export function findArticle(data: SiteData, id: string): SiteArticle | null {
  return data.articles.find(a => a.id === id) ?? null;
}

export function relatedArticles(data: SiteData, article: SiteArticle, limit = RELATED_COUNT): SiteArticle[] {
  return data.articles.filter(a => a.category === article.category && a.id !== article.id).slice(0, limit);
}

export function articlesInCategory(data: SiteData, name: string): SiteArticle[] {
  return data.articles.filter(a => a.category === name);
}

// ─────────────────────────────────────────────────────────────
// Fragments
// ─────────────────────────────────────────────────────────────

export function renderHeader(data: SiteData, now: Date, activeCategory: string | null = null): string {
  const name = data.newspaper?.name || (data.townName ? `The ${data.townName} Gazette` : 'The Town Gazette');
  const tagline = data.newspaper?.tagline ?? '';
  const nav = data.categories
    .map(c => {
      const active = c === activeCategory ? ' active' : '';
      return `<a class="nav-link${active}" href="${categoryHref(c)}">${escapeHtml(c)}</a>`;
    })
    .join('');

  return `
    <div class="masthead">
      <a class="masthead-name" href="#/">${escapeHtml(name)}</a>
      ${tagline ? `<div class="masthead-tagline">${escapeHtml(tagline)}</div>` : ''}
      <div class="masthead-date">${escapeHtml(formatLongDate(now))}</div>
    </div>
    <nav class="category-nav">
      <a class="nav-link${activeCategory === null ? ' active' : ''}" href="#/">Home</a>${nav}
    </nav>
  `;
}

function renderByline(article: SiteArticle): string {
  return `<div class="byline">By ${escapeHtml(article.author)} · ${escapeHtml(formatDate(article.publicationDate))}</div>`;
}

function renderStatusBadge(article: SiteArticle): string {
  const cls = article.storyStatus === 'Concluded' ? 'concluded' : 'ongoing';
  return `<span class="status-badge ${cls}">${article.storyStatus}</span>`;
}

export function renderArticleCard(article: SiteArticle, variant: 'featured' | 'compact' = 'compact'): string {
  return `
    <article class="article-card ${variant}">
      <a class="card-category" href="${categoryHref(article.category)}">${escapeHtml(article.category)}</a>
      <h3 class="card-title"><a href="${articleHref(article.id)}">${escapeHtml(article.title)}</a></h3>
      ${variant === 'featured' ? `<p class="card-summary">${escapeHtml(article.summary)}</p>` : ''}
      ${renderByline(article)}
    </article>
  `;
}

// ─────────────────────────────────────────────────────────────
// Views
// ─────────────────────────────────────────────────────────────

export function renderHome(data: SiteData): string {
  if (!data.articles.length) {
    return `
      <div class="empty-state">
        <h2>No stories yet</h2>
        <p>Articles will appear here once they have been generated and exported.</p>
      </div>
    `;
  }
  const featured = data.articles.slice(0, FEATURED_COUNT);
  const recent = data.articles.slice(FEATURED_COUNT, FEATURED_COUNT + RECENT_COUNT);
  return `
    <section class="featured">
      ${featured.map(a => renderArticleCard(a, 'featured')).join('')}
    </section>
    ${recent.length ? `
    <section class="recent">
      <h2 class="section-title">Recent Stories</h2>
      ${recent.map(a => renderArticleCard(a)).join('')}
    </section>` : ''}
  `;
}

export function renderArticle(data: SiteData, id: string): string {
  const article = findArticle(data, id);
  if (!article) return renderNotFound(`No article with id ${id}.`);

  const images = article.images
    .map(img => `
      <figure class="article-image">
        <img src="${escapeHtml(img.image)}" alt="${escapeHtml(img.caption)}" loading="lazy" />
        <figcaption>${escapeHtml(img.caption)}</figcaption>
      </figure>`)
    .join('');
  const related = relatedArticles(data, article);

  return `
    <article class="article-page">
      <a class="card-category" href="${categoryHref(article.category)}">${escapeHtml(article.category)}</a>
      <h1 class="article-title">${escapeHtml(article.title)}</h1>
      ${renderByline(article)}
      <div class="article-meta">
        ${renderStatusBadge(article)}
        <span class="updated">Updated ${escapeHtml(article.lastUpdated)}</span>
      </div>
      ${images}
      <div class="article-body">${article.bodyHtml}</div>
      ${article.authorPersona ? `<aside class="author-box"><strong>${escapeHtml(article.author)}</strong> ${escapeHtml(article.authorPersona)}</aside>` : ''}
    </article>
    ${related.length ? `
    <section class="related">
      <h2 class="section-title">More in ${escapeHtml(article.category)}</h2>
      ${related.map(a => renderArticleCard(a)).join('')}
    </section>` : ''}
  `;
}

export function renderCategory(data: SiteData, name: string): string {
  const articles = articlesInCategory(data, name);
  return `
    <section class="category-page">
      <h1 class="section-title">${escapeHtml(name)}</h1>
      ${articles.length
        ? articles.map(a => renderArticleCard(a, 'featured')).join('')
        : '<p class="empty-state">No stories in this section yet.</p>'}
    </section>
  `;
}

export function renderNotFound(message = 'The page you were looking for does not exist.'): string {
  return `
    <div class="not-found">
      <h1>404</h1>
      <p>${escapeHtml(message)}</p>
      <a href="#/">Back to the front page</a>
    </div>
  `;
}

export function renderRoute(route: Route, data: SiteData): string {
  switch (route.kind) {
    case 'home':
      return renderHome(data);
    case 'article':
      return renderArticle(data, route.id);
    case 'category':
      return renderCategory(data, route.name);
    case 'notFound':
      return renderNotFound();
  }
}

export function pageTitle(route: Route, data: SiteData): string {
  const paper = data.newspaper?.name || 'The Town Gazette';
  switch (route.kind) {
    case 'home':
      return paper;
    case 'article': {
      const article = findArticle(data, route.id);
      return article ? `${article.title} | ${paper}` : `Not Found | ${paper}`;
    }
    case 'category':
      return `${route.name} | ${paper}`;
    case 'notFound':
      return `Not Found | ${paper}`;
  }
}
