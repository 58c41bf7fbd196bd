import type { ConfigurationSnapshot } from './snapshot';

export type RemotePathResolver = (url: string) => string;

const SCHEME_AND_AUTHORITY = /^(?:[a-z][a-z\d+.-]*:)?\/\/[^/?#]*/i;
const QUERY_OR_FRAGMENT = /[?#]/;

export const trimTrailingSlash = (s: string): string => s.replace(/\/+$/, '');
export const trimLeadingSlash = (s: string): string => s.replace(/^\/+/, '');

function sitePathname(siteUrl: string): string {
  try {
    return new URL(siteUrl).pathname;
  } catch {
    return '/';
  }
}

export function sitePathPrefix(siteUrl: string): string {
  return trimTrailingSlash(sitePathname(siteUrl));
}

const isSingleDot = (s: string) => s === '.' || s.toLowerCase() === '%2e';
const isDoubleDot = (s: string) => /^(?:\.|%2e){2}$/i.test(s);

/**
 * Collapses `.` and `..` segments of an absolute path the way URL resolution
 * does, without touching the bytes of the remaining segments.
 */
export function removeDotSegments(path: string): string {
  const segments = path.split('/').slice(1);
  const out: string[] = [];
  segments.forEach((segment, i) => {
    const last = i === segments.length - 1;
    if (isDoubleDot(segment)) {
      out.pop();
      if (last) out.push('');
    } else if (isSingleDot(segment)) {
      if (last) out.push('');
    } else {
      out.push(segment);
    }
  });
  return `/${out.join('/')}`;
}

/**
 * Derives the path of an asset relative to the site root. The reference is
 * resolved against the site URL textually, so the path is the one eligibility
 * was decided on while query strings, fragments and escapes come through as-is.
 */
export function remotePathFor(url: string, siteUrl: string): string {
  const cut = url.search(QUERY_OR_FRAGMENT);
  const reference = cut < 0 ? url : url.slice(0, cut);
  const suffix = cut < 0 ? '' : url.slice(cut);

  let path = reference.replace(SCHEME_AND_AUTHORITY, '');
  if (path === reference && !path.startsWith('/')) {
    // Path-relative: resolve against the site URL's directory.
    const site = sitePathname(siteUrl);
    path = `${site.slice(0, site.lastIndexOf('/') + 1)}${path}`;
  }
  path = removeDotSegments(path || '/');

  const base = sitePathPrefix(siteUrl);
  if (base && (path === base || path.startsWith(`${base}/`))) {
    path = path.slice(base.length);
  }
  return `${trimLeadingSlash(path)}${suffix}`;
}

export function joinCdnUrl(cdnBaseUrl: string, remotePath: string): string {
  return `${trimTrailingSlash(cdnBaseUrl)}/${trimLeadingSlash(remotePath)}`;
}

/**
 * Only call after `shouldRewrite` accepted the URL.
 */
export function mapToCdnUrl(
  url: string,
  config: ConfigurationSnapshot,
  resolveRemotePath: RemotePathResolver = (u) => remotePathFor(u, config.siteUrl),
): string {
  return joinCdnUrl(config.cdnBaseUrl, resolveRemotePath(url));
}
