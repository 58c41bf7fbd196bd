import { describe, expect, it } from 'vitest';
import { extensionOf, shouldRewrite } from '../src/eligibility';
import { parsePathRules } from '../src/path_rules';
import { makeConfig } from './fixtures';

describe('extensionOf', () => {
  it('takes the text after the last dot of the final segment', () => {
    expect(extensionOf('/wp-content/app.min.js')).toBe('js');
    expect(extensionOf('/a/.htaccess')).toBe('htaccess');
    expect(extensionOf('/dir.v2/file')).toBe('');
    expect(extensionOf('/file.')).toBe('');
    expect(extensionOf('/')).toBe('');
  });
});

describe('shouldRewrite', () => {
  const config = makeConfig();

  it('accepts same-site assets with a known extension', () => {
    expect(shouldRewrite('/wp-content/themes/x/style.css', config)).toBe(true);
    expect(shouldRewrite('https://site.example/wp-content/a.js?ver=1.2', config)).toBe(true);
    expect(shouldRewrite('//site.example/wp-includes/b.woff2', config)).toBe(true);
    expect(shouldRewrite('images/photo.jpg', config)).toBe(true);
    expect(shouldRewrite('/wp-content/LOGO.PNG', config)).toBe(true);
  });

  it('ignores the query string and fragment when reading the extension', () => {
    expect(shouldRewrite('/download.php?file=a.css', config)).toBe(false);
    expect(shouldRewrite('/a.css#top', config)).toBe(true);
  });

  it('rejects empty and data URLs', () => {
    expect(shouldRewrite('', config)).toBe(false);
    expect(shouldRewrite('data:image/png;base64,AAAA', config)).toBe(false);
  });

  it('rejects admin and login URLs', () => {
    expect(shouldRewrite('/wp-admin/js/x.js', config)).toBe(false);
    expect(shouldRewrite('https://site.example/wp-login.css', config)).toBe(false);
  });

  it('never rewrites another origin', () => {
    expect(shouldRewrite('https://other-domain.example/a.css', config)).toBe(false);
    expect(shouldRewrite('//other-domain.example/a.css', config)).toBe(false);
    expect(shouldRewrite('http://site.example/a.css', config)).toBe(false);
  });

  it('rejects URLs that do not parse', () => {
    expect(shouldRewrite('https://site.example:notaport/a.css', config)).toBe(false);
  });

  it('gates on the accepted extensions', () => {
    expect(shouldRewrite('/notes.txt', config)).toBe(false);
    expect(shouldRewrite('/readme', config)).toBe(false);
    expect(shouldRewrite('/page.html', config)).toBe(false);
  });

  it('lets excluded paths win over a matching extension', () => {
    const custom = makeConfig({ excludedPathRules: parsePathRules('/static/vendor/*, /favicon.png') });
    expect(shouldRewrite('/static/vendor/lib.js', custom)).toBe(false);
    expect(shouldRewrite('/favicon.png', custom)).toBe(false);
    expect(shouldRewrite('/img/favicon.png', custom)).toBe(true);
  });

  it('is off when disabled or without a CDN base', () => {
    expect(shouldRewrite('/a.css', makeConfig({ enabled: false }))).toBe(false);
    expect(shouldRewrite('/a.css', makeConfig({ cdnBaseUrl: '' }))).toBe(false);
  });

  it('is off when the site URL does not parse', () => {
    const broken = makeConfig({ siteUrl: 'not a url' });
    expect(broken.enabled).toBe(false);
    expect(shouldRewrite('/a.css', broken)).toBe(false);
  });
});
