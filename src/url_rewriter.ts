import { containsAdminMarker, shouldRewrite } from './eligibility';
import type { LogLevel } from './logger';
import { mapToCdnUrl, type RemotePathResolver } from './path_mapper';
import { RewriteCache } from './rewrite_cache';
import type { ConfigurationSnapshot } from './snapshot';

export interface UrlRewriterOptions {
  isAdmin?: () => boolean;
  resolveRemotePath?: RemotePathResolver;
  log?: (message: string, level: LogLevel) => void;
}

/**
 * Rewrites one asset URL to its CDN counterpart. Every higher-level rewriter
 * goes through here so a page pays for each distinct URL once.
 */
export class UrlRewriter {
  readonly config: ConfigurationSnapshot;
  private readonly cache = new RewriteCache();
  private readonly isAdmin: () => boolean;
  private readonly resolveRemotePath?: RemotePathResolver;
  private readonly log?: (message: string, level: LogLevel) => void;

  constructor(config: ConfigurationSnapshot, options: UrlRewriterOptions = {}) {
    this.config = config;
    this.isAdmin = options.isAdmin ?? (() => false);
    this.resolveRemotePath = options.resolveRemotePath;
    this.log = options.log;
  }

  get active(): boolean {
    return this.config.enabled && this.config.cdnBaseUrl !== '' && !this.isAdmin();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  rewrite(url: string): string {
    if (this.isAdmin()) return url;
    // Admin URLs bypass the cache so their decisions never leak into front-end calls.
    if (!this.config.enabled || !url) return url;
    if (containsAdminMarker(url, this.config.adminPathMarkers)) return url;

    const cached = this.cache.get(url);
    if (cached !== undefined) return cached;

    if (!this.config.cdnBaseUrl || !shouldRewrite(url, this.config)) {
      this.cache.set(url, url);
      return url;
    }

    const cdnUrl = mapToCdnUrl(url, this.config, this.resolveRemotePath);
    if (this.config.debug && this.log) {
      this.log(`Rewrote URL: ${url} to ${cdnUrl}`, 'debug');
    }
    this.cache.set(url, cdnUrl);
    return cdnUrl;
  }

  // Call before reusing an instance for another request.
  reset(): void {
    this.cache.clear();
  }
}
