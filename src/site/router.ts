export type Route =
  | { kind: 'home' }
  | { kind: 'article'; id: string }
  | { kind: 'category'; name: string }
  | { kind: 'notFound'; hash: string };

function decode(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

export function parseRoute(hash: string): Route {
  if (!hash || hash === '#' || hash === '#/') return { kind: 'home' };

  const match = /^#\/(article|category)\/(.+)$/.exec(hash);
  const value = match?.[2] ? decode(match[2]) : null;
  if (match && value) {
    return match[1] === 'article' ? { kind: 'article', id: value } : { kind: 'category', name: value };
  }
  return { kind: 'notFound', hash };
}

export function articleHref(id: string): string {
  return `#/article/${encodeURIComponent(id)}`;
}

export function categoryHref(name: string): string {
  return `#/category/${encodeURIComponent(name)}`;
}

/** Where hash changes come from; `window` in the browser. */
export type HashTarget = {
  addEventListener(type: 'hashchange', listener: () => void): void;
  removeEventListener(type: 'hashchange', listener: () => void): void;
  location: { hash: string };
};

export class SiteRouter {
  private currentRoute: Route = { kind: 'home' };
  private readonly listener = () => this.handleRouteChange();

  constructor(
    private onRouteChange: (route: Route) => void,
    private target: HashTarget = window,
  ) {
    this.target.addEventListener('hashchange', this.listener);
    this.handleRouteChange();
  }

  get route(): Route {
    return this.currentRoute;
  }

  dispose() {
    this.target.removeEventListener('hashchange', this.listener);
  }

  private handleRouteChange() {
    this.currentRoute = parseRoute(this.target.location.hash);
    this.onRouteChange(this.currentRoute);
  }
}
