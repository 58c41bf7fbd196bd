import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_SETTINGS, loadServerConfig, parseSettings } from '../src/config';

describe('settings', () => {
  it('starts disabled with the stock file types and exclusions', () => {
    expect(DEFAULT_SETTINGS).toEqual({
      enabled: false,
      debugMode: false,
      githubUsername: '',
      githubRepository: '',
      githubBranch: 'main',
      fileTypes: 'js,css,png,jpg,jpeg,gif,svg,woff,woff2,ttf,eot',
      excludedPaths: '/wp-admin/*, /wp-login.php',
      cdnBaseUrl: '',
    });
  });

  it('rejects a CDN base that is not a URL', () => {
    expect(() => parseSettings({ cdnBaseUrl: 'cdn' })).toThrow(ConfigError);
  });
});

describe('loadServerConfig', () => {
  it('fills in defaults around the origin URL', () => {
    const config = loadServerConfig({ ORIGIN_URL: 'https://site.example' });
    expect(config.port).toBe(8787);
    expect(config.originUrl).toBe('https://site.example');
    expect(config.siteUrl).toBe('https://site.example');
    expect(config.logLevel).toBe('info');
    expect(config.settings).toEqual(DEFAULT_SETTINGS);
  });

  it('reads the CDN settings', () => {
    const config = loadServerConfig({
      ORIGIN_URL: 'http://127.0.0.1:8080',
      SITE_URL: 'https://site.example',
      PORT: '9000',
      CDN_ENABLED: 'yes',
      CDN_DEBUG: '0',
      CDN_GITHUB_USERNAME: ' user ',
      CDN_GITHUB_REPOSITORY: 'repo',
      CDN_FILE_TYPES: '',
      CDN_EXCLUDED_PATHS: '/private/*',
    });
    expect(config.port).toBe(9000);
    expect(config.siteUrl).toBe('https://site.example');
    expect(config.settings).toEqual({
      ...DEFAULT_SETTINGS,
      enabled: true,
      githubUsername: 'user',
      githubRepository: 'repo',
      excludedPaths: '/private/*',
    });
  });

  it('lowers the log level to debug in debug mode', () => {
    const config = loadServerConfig({
      ORIGIN_URL: 'https://site.example',
      LOG_LEVEL: 'warn',
      CDN_DEBUG: '1',
    });
    expect(config.settings.debugMode).toBe(true);
    expect(config.logLevel).toBe('debug');
    expect(loadServerConfig({ ORIGIN_URL: 'https://site.example', LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
  });

  it('lists every problem when the environment is invalid', () => {
    let caught: unknown;
    try {
      loadServerConfig({ PORT: 'abc' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0].startsWith('PORT: ')).toBe(true);
    expect(caught.issues[1]).toBe('ORIGIN_URL: Required');
  });
});
