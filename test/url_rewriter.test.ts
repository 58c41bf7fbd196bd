import { describe, expect, it, vi } from 'vitest';
import { parsePathRules } from '../src/path_rules';
import { UrlRewriter } from '../src/url_rewriter';
import { CDN_ROOT, makeConfig } from './fixtures';

describe('UrlRewriter', () => {
  it('rewrites the worked example and keeps the query string', () => {
    const rewriter = new UrlRewriter(makeConfig());
    expect(rewriter.rewrite('https://site.example/wp-content/themes/x/style.css?ver=1.2')).toBe(
      'https://cdn.example/user/repo@main/wp-content/themes/x/style.css?ver=1.2',
    );
  });

  it('returns the same string for repeated calls and caches it once', () => {
    const rewriter = new UrlRewriter(makeConfig());
    const first = rewriter.rewrite('/wp-content/a.js');
    const second = rewriter.rewrite('/wp-content/a.js');
    expect(first).toBe(`${CDN_ROOT}/wp-content/a.js`);
    expect(second).toBe(first);
    expect(rewriter.cacheSize).toBe(1);
  });

  it('leaves an already rewritten URL alone', () => {
    const rewriter = new UrlRewriter(makeConfig());
    const once = rewriter.rewrite('/wp-content/a.js');
    expect(rewriter.rewrite(once)).toBe(once);
  });

  it('is the identity when disabled, without caching', () => {
    const rewriter = new UrlRewriter(makeConfig({ enabled: false }));
    expect(rewriter.rewrite('/wp-content/a.js')).toBe('/wp-content/a.js');
    expect(rewriter.cacheSize).toBe(0);
  });

  it('caches the identity when the CDN base is empty', () => {
    const rewriter = new UrlRewriter(makeConfig({ cdnBaseUrl: '' }));
    expect(rewriter.rewrite('/wp-content/a.js')).toBe('/wp-content/a.js');
    expect(rewriter.cacheSize).toBe(1);
  });

  it('skips admin URLs without touching the cache', () => {
    const rewriter = new UrlRewriter(makeConfig());
    expect(rewriter.rewrite('/wp-admin/x.js')).toBe('/wp-admin/x.js');
    expect(rewriter.rewrite('/wp-login.php')).toBe('/wp-login.php');
    expect(rewriter.cacheSize).toBe(0);
  });

  it('honours an exclusion rule even for an accepted extension', () => {
    const rewriter = new UrlRewriter(makeConfig({ excludedPathRules: parsePathRules('/static/*') }));
    expect(rewriter.rewrite('/static/x.js')).toBe('/static/x.js');
    expect(rewriter.rewrite('/other/x.js')).toBe(`${CDN_ROOT}/other/x.js`);
  });

  it('does nothing in an admin context', () => {
    const rewriter = new UrlRewriter(makeConfig(), { isAdmin: () => true });
    expect(rewriter.rewrite('/wp-content/a.js')).toBe('/wp-content/a.js');
    expect(rewriter.cacheSize).toBe(0);
    expect(rewriter.active).toBe(false);
  });

  it('caches ineligible URLs as themselves', () => {
    const rewriter = new UrlRewriter(makeConfig());
    expect(rewriter.rewrite('/notes.txt')).toBe('/notes.txt');
    expect(rewriter.rewrite('https://other-domain.example/a.css')).toBe(
      'https://other-domain.example/a.css',
    );
    expect(rewriter.rewrite('data:image/png;base64,AAAA')).toBe('data:image/png;base64,AAAA');
    expect(rewriter.cacheSize).toBe(3);
  });

  it('logs successful rewrites only, and only in debug mode', () => {
    const log = vi.fn();
    const rewriter = new UrlRewriter(makeConfig({ debug: true }), { log });
    rewriter.rewrite('/wp-content/a.css');
    rewriter.rewrite('/wp-content/a.css');
    rewriter.rewrite('/notes.txt');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      `Rewrote URL: /wp-content/a.css to ${CDN_ROOT}/wp-content/a.css`,
      'debug',
    );

    const quiet = vi.fn();
    new UrlRewriter(makeConfig(), { log: quiet }).rewrite('/wp-content/a.css');
    expect(quiet).not.toHaveBeenCalled();
  });

  it('keeps relative references with dot segments under the CDN base', () => {
    const rewriter = new UrlRewriter(makeConfig());
    expect(rewriter.rewrite('../fonts/a.woff2')).toBe(`${CDN_ROOT}/fonts/a.woff2`);
    expect(rewriter.rewrite('/wp-content/themes/t/../../uploads/b.png')).toBe(
      `${CDN_ROOT}/wp-content/uploads/b.png`,
    );
  });

  it('applies exclusion rules to the resolved path', () => {
    const rewriter = new UrlRewriter(makeConfig({ excludedPathRules: parsePathRules('/private/*') }));
    expect(rewriter.rewrite('/public/../private/a.css')).toBe('/public/../private/a.css');
  });

  it('uses the injected remote path resolver', () => {
    const rewriter = new UrlRewriter(makeConfig(), { resolveRemotePath: () => 'assets/a.css' });
    expect(rewriter.rewrite('/wp-content/a.css')).toBe(`${CDN_ROOT}/assets/a.css`);
  });

  it('starts over after reset', () => {
    const rewriter = new UrlRewriter(makeConfig());
    rewriter.rewrite('/wp-content/a.css');
    rewriter.reset();
    expect(rewriter.cacheSize).toBe(0);
  });
});
