const TRACKING_PARAM_PREFIXES = ["utm_"];
const TRACKING_PARAMS = new Set(["fbclid", "gclid", "mc_cid", "mc_eid"]);

// Throws on anything that is not an http(s) URL.
export const canonicalizeUrl = (href: string, baseUrl?: string): string => {
  const url = new URL(href.trim(), baseUrl);
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new TypeError(`Unsupported protocol: ${url.protocol}`);
  }
  url.hash = "";
  url.hostname = url.hostname.toLowerCase();

  const toDelete: string[] = [];
  url.searchParams.forEach((_, key) => {
    const lower = key.toLowerCase();
    if (TRACKING_PARAMS.has(lower) || TRACKING_PARAM_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
      toDelete.push(key);
    }
  });
  for (const key of toDelete) url.searchParams.delete(key);
  if (url.searchParams.toString() === "") url.search = "";

  if (url.pathname !== "/" && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.slice(0, -1);
  }

  return url.toString();
};

export const listPageUrl = (rootUrl: string, page: number): string => {
  if (page <= 1) return rootUrl;
  const root = rootUrl.endsWith("/") ? rootUrl : `${rootUrl}/`;
  return new URL(`page/${page}/`, root).toString();
};

const withTrailingSlash = (pathname: string) => (pathname.endsWith("/") ? pathname : `${pathname}/`);

export const isDocumentUrl = (candidate: string, rootUrl: string): boolean => {
  const url = new URL(candidate);
  const root = new URL(rootUrl);
  if (url.hostname.toLowerCase() !== root.hostname.toLowerCase()) return false;
  const rootPath = withTrailingSlash(root.pathname);
  const path = withTrailingSlash(url.pathname);
  if (!path.startsWith(rootPath) || path === rootPath) return false;
  return !/\/page\/\d+\/$/.test(path);
};
