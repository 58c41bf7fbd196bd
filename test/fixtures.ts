import { vi } from 'vitest';
import { DEFAULT_EXCLUDED_PATHS, DEFAULT_FILE_TYPES } from '../src/constants';
import { parseFileTypes } from '../src/helper';
import type { Logger } from '../src/logger';
import { parsePathRules } from '../src/path_rules';
import { createSnapshot, type ConfigurationSnapshot, type SnapshotInput } from '../src/snapshot';

export const SITE = 'https://site.example';
export const CDN = 'https://cdn.example/user/repo@main/';
export const CDN_ROOT = 'https://cdn.example/user/repo@main';

export function makeConfig(overrides: SnapshotInput = {}): ConfigurationSnapshot {
  return createSnapshot({
    enabled: true,
    cdnBaseUrl: CDN,
    siteUrl: SITE,
    acceptedExtensions: parseFileTypes(DEFAULT_FILE_TYPES),
    excludedPathRules: parsePathRules(DEFAULT_EXCLUDED_PATHS),
    ...overrides,
  });
}

export function fakeLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
