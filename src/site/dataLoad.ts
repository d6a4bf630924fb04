import type { SiteData } from './types';

type DataLoadResult = {
  data: SiteData;
  dataLoadError: string | null;
};

/** The parts of the banner element the warning touches. */
export type WarningBanner = {
  classList: { add(token: string): void; remove(token: string): void };
  innerHTML: string;
  textContent: string | null;
};

type WarningOptions = {
  warningBanner: WarningBanner | null;
  dataLoadError: string | null;
  data: SiteData;
  protocol?: string;
};

export function emptySiteData(now: Date = new Date()): SiteData {
  return {
    townName: '',
    newspaper: null,
    categories: [],
    articles: [],
    generatedAt: now.toISOString(),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSiteData(value: unknown): value is SiteData {
  return (
    isRecord(value) &&
    typeof value.townName === 'string' &&
    Array.isArray(value.categories) &&
    Array.isArray(value.articles) &&
    typeof value.generatedAt === 'string'
  );
}

export async function loadSiteData(fetcher: typeof fetch = fetch): Promise<DataLoadResult> {
  let data: SiteData;
  let dataLoadError: string | null = null;

  try {
    const response = await fetcher('/site-data.json');
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }
    const json: unknown = await response.json();
    if (!isSiteData(json)) throw new Error('Malformed site data');
    data = json;
  } catch (err) {
    dataLoadError = (err instanceof Error ? err.message : String(err)) || 'Unknown error';
    console.warn(`[Town Gazette] Failed to load /site-data.json: ${dataLoadError}`);
    data = emptySiteData();
  }

  return { data, dataLoadError };
}

export function applyDataLoadWarning({
  warningBanner,
  dataLoadError,
  data,
  protocol,
}: WarningOptions) {
  if (!warningBanner) return;

  if (dataLoadError) {
    warningBanner.classList.remove('hidden');
    const resolvedProtocol =
      protocol ?? (typeof window !== 'undefined' ? window.location.protocol : 'http:');
    const extra =
      resolvedProtocol === 'file:'
        ? ' You appear to be opening the site via <code>file://</code>; use <code>npm run dev</code> or <code>npm run preview</code> instead.'
        : '';
    warningBanner.innerHTML = `No <code>/site-data.json</code> found. Run <code>npm run export-site</code> then reload.${extra}`;
  } else if (data.articles.length === 0) {
    warningBanner.classList.remove('hidden');
    warningBanner.innerHTML = 'Loaded <code>/site-data.json</code> but it contains 0 articles. Run <code>npm run generate-articles</code> and <code>npm run export-site</code>, then reload.';
  } else {
    warningBanner.classList.add('hidden');
    warningBanner.textContent = '';
  }
}
