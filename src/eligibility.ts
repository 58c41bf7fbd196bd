import { isExcludedPath } from './path_rules';
import type { ConfigurationSnapshot } from './snapshot';

export function containsAdminMarker(url: string, markers: readonly string[]): boolean {
  return markers.some((marker) => url.includes(marker));
}

export function resolveAgainstSite(url: string, siteUrl: string): URL | null {
  try {
    return new URL(url, siteUrl);
  } catch {
    return null;
  }
}

// Extension of the last path segment, without the dot. '' when there is none.
export function extensionOf(path: string): string {
  const segment = path.slice(path.lastIndexOf('/') + 1);
  const dot = segment.lastIndexOf('.');
  if (dot < 0 || dot === segment.length - 1) return '';
  return segment.slice(dot + 1);
}

/**
 * Decides whether a reference found in a page may be served from the CDN.
 * Relative references are resolved against the site URL; anything that ends
 * up on another origin is left alone.
 */
export function shouldRewrite(url: string, config: ConfigurationSnapshot): boolean {
  if (!url || url.startsWith('data:')) return false;
  if (containsAdminMarker(url, config.adminPathMarkers)) return false;
  if (!config.enabled || !config.cdnBaseUrl) return false;

  const resolved = resolveAgainstSite(url, config.siteUrl);
  if (!resolved || resolved.origin !== config.siteOrigin) return false;

  const path = resolved.pathname;
  if (isExcludedPath(path, config.excludedPathRules)) return false;

  const ext = extensionOf(path);
  if (!ext) return false;
  return config.acceptedExtensions.has(ext.toLowerCase());
}
