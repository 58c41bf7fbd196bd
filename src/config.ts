import { z } from 'zod';
import {
  DEFAULT_EXCLUDED_PATHS,
  DEFAULT_FILE_TYPES,
  DEFAULT_GITHUB_BRANCH,
  DEFAULT_PORT,
} from './constants';
import type { LogLevel } from './logger';

export type EnvLike = Record<string, string | undefined>;

const flag = z
  .string()
  .optional()
  .transform((v) => ['1', 'true', 'yes', 'on'].includes((v ?? '').trim().toLowerCase()));

const optionalText = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== '' ? v.trim() : fallback));

const absoluteUrl = z.string().trim().url();

/**
 * Persisted plugin settings. Defaults are the values a fresh install starts with.
 */
export const settingsSchema = z.object({
  enabled: z.boolean().default(false),
  debugMode: z.boolean().default(false),
  githubUsername: z.string().default(''),
  githubRepository: z.string().default(''),
  githubBranch: z.string().default(DEFAULT_GITHUB_BRANCH),
  fileTypes: z.string().default(DEFAULT_FILE_TYPES),
  excludedPaths: z.string().default(DEFAULT_EXCLUDED_PATHS),
  cdnBaseUrl: z.union([absoluteUrl, z.literal('')]).default(''),
});

export type Settings = z.infer<typeof settingsSchema>;

export const DEFAULT_SETTINGS: Settings = settingsSchema.parse({});

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  ORIGIN_URL: absoluteUrl,
  SITE_URL: absoluteUrl.optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CDN_ENABLED: flag,
  CDN_DEBUG: flag,
  CDN_BASE_URL: absoluteUrl.optional(),
  CDN_GITHUB_USERNAME: optionalText(''),
  CDN_GITHUB_REPOSITORY: optionalText(''),
  CDN_GITHUB_BRANCH: optionalText(DEFAULT_GITHUB_BRANCH),
  CDN_FILE_TYPES: optionalText(DEFAULT_FILE_TYPES),
  CDN_EXCLUDED_PATHS: optionalText(DEFAULT_EXCLUDED_PATHS),
});

export interface ServerConfig {
  port: number;
  originUrl: string;
  siteUrl: string;
  logLevel: LogLevel;
  settings: Settings;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseSettings(input: unknown): Settings {
  const result = settingsSchema.safeParse(input);
  if (!result.success) throw new ConfigError(formatIssues(result.error));
  return result.data;
}

/**
 * Reads the server configuration from environment variables.
 * Empty strings count as unset so a blank `.env` line falls back to the default.
 */
export function loadServerConfig(env: EnvLike): ServerConfig {
  const cleaned: EnvLike = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }
  const result = envSchema.safeParse(cleaned);
  if (!result.success) throw new ConfigError(formatIssues(result.error));
  const e = result.data;
  return {
    port: e.PORT,
    originUrl: e.ORIGIN_URL,
    siteUrl: e.SITE_URL ?? e.ORIGIN_URL,
    // Debug mode needs debug-level output for its rewrite log.
    logLevel: e.CDN_DEBUG ? 'debug' : e.LOG_LEVEL,
    settings: parseSettings({
      enabled: e.CDN_ENABLED,
      debugMode: e.CDN_DEBUG,
      githubUsername: e.CDN_GITHUB_USERNAME,
      githubRepository: e.CDN_GITHUB_REPOSITORY,
      githubBranch: e.CDN_GITHUB_BRANCH,
      fileTypes: e.CDN_FILE_TYPES,
      excludedPaths: e.CDN_EXCLUDED_PATHS,
      cdnBaseUrl: e.CDN_BASE_URL ?? '',
    }),
  };
}
