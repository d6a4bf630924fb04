export type SiteDom = {
  loading: HTMLElement | null;
  warningBanner: HTMLElement | null;
  header: HTMLElement;
  content: HTMLElement;
  footer: HTMLElement | null;
};

export function initializeSiteDom(doc: Document = document): SiteDom {
  const loading = doc.getElementById('loading');
  const warningBanner = doc.getElementById('data-warning-banner');
  const header = doc.getElementById('site-header');
  const content = doc.getElementById('site-content');
  const footer = doc.getElementById('site-footer');

  if (!header || !content) {
    throw new Error('Required view elements not found');
  }

  return { loading, warningBanner, header, content, footer };
}
