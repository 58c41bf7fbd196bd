import type { Settings } from './config';
import { JSDELIVR_GH_BASE } from './constants';
import type { LogLevel, Logger } from './logger';
import { remotePathFor } from './path_mapper';
import { isExcludedPath, parsePathRules, type PathRule } from './path_rules';

/**
 * Everything the rewriting core needs to know about the installation.
 */
export interface Helper {
  isEnabled(): boolean;
  getCdnBaseUrl(): string;
  getFileTypes(): Set<string>;
  getExcludedPaths(): PathRule[];
  getRemotePathForUrl(url: string): string;
  isExcludedPath(path: string): boolean;
  isDebugEnabled(): boolean;
  getSiteUrl(): string;
  log(message: string, level?: LogLevel): void;
}

export function parseFileTypes(input: string): Set<string> {
  const types = input
    .split(',')
    .map((t) => t.trim().replace(/^\.+/, '').toLowerCase())
    .filter((t) => t.length > 0);
  return new Set(types);
}

export function jsdelivrBaseUrl(username: string, repository: string, branch: string): string {
  if (!username || !repository) return '';
  return `${JSDELIVR_GH_BASE}/${username}/${repository}@${branch || 'main'}/`;
}

export class CdnHelper implements Helper {
  private readonly fileTypes: Set<string>;
  private readonly excludedPaths: PathRule[];

  constructor(
    private readonly settings: Settings,
    private readonly siteUrl: string,
    private readonly logger: Logger,
  ) {
    this.fileTypes = parseFileTypes(settings.fileTypes);
    this.excludedPaths = parsePathRules(settings.excludedPaths);
  }

  isEnabled(): boolean {
    return this.settings.enabled;
  }

  getCdnBaseUrl(): string {
    if (this.settings.cdnBaseUrl) return this.settings.cdnBaseUrl;
    const { githubUsername, githubRepository, githubBranch } = this.settings;
    return jsdelivrBaseUrl(githubUsername.trim(), githubRepository.trim(), githubBranch.trim());
  }

  getFileTypes(): Set<string> {
    return new Set(this.fileTypes);
  }

  getExcludedPaths(): PathRule[] {
    return [...this.excludedPaths];
  }

  getRemotePathForUrl(url: string): string {
    return remotePathFor(url, this.siteUrl);
  }

  isExcludedPath(path: string): boolean {
    return isExcludedPath(path, this.excludedPaths);
  }

  isDebugEnabled(): boolean {
    return this.settings.debugMode;
  }

  getSiteUrl(): string {
    return this.siteUrl;
  }

  log(message: string, level: LogLevel = 'info'): void {
    this.logger[level](message);
  }
}
