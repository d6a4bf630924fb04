import './style.css';
import { applyDataLoadWarning, loadSiteData } from './site/dataLoad';
import { initializeSiteDom } from './site/dom';
import { escapeHtml, formatDate, pageTitle, renderHeader, renderRoute } from './site/render';
import { SiteRouter, type Route } from './site/router';

async function main() {
  const dom = initializeSiteDom();
  const { data, dataLoadError } = await loadSiteData();

  applyDataLoadWarning({ warningBanner: dom.warningBanner, dataLoadError, data });
  dom.loading?.classList.add('hidden');

  if (dom.footer) {
    const generated = data.generatedAt.slice(0, 10);
    const town = data.townName ? `${escapeHtml(data.townName)} · ` : '';
    dom.footer.innerHTML = `${town}All stories are fictional · Data generated ${escapeHtml(formatDate(generated))}`;
  }

  const show = (route: Route) => {
    const activeCategory = route.kind === 'category' ? route.name : null;
    dom.header.innerHTML = renderHeader(data, new Date(), activeCategory);
    dom.content.innerHTML = renderRoute(route, data);
    document.title = pageTitle(route, data);
    window.scrollTo(0, 0);
  };

  new SiteRouter(show);
}

main().catch(err => {
  console.error('[Town Gazette] Failed to start:', err);
  const loading = document.getElementById('loading');
  if (loading) loading.textContent = 'Failed to load the site.';
});
