import { ADMIN_PATH_MARKERS } from './constants';
import type { Helper } from './helper';
import type { PathRule } from './path_rules';

export interface ConfigurationSnapshot {
  readonly enabled: boolean;
  readonly debug: boolean;
  readonly cdnBaseUrl: string;
  readonly acceptedExtensions: ReadonlySet<string>;
  readonly excludedPathRules: readonly PathRule[];
  readonly siteUrl: string;
  readonly siteOrigin: string;
  readonly adminPathMarkers: readonly string[];
}

export type SnapshotInput = Partial<
  Omit<ConfigurationSnapshot, 'siteOrigin' | 'acceptedExtensions'> & {
    acceptedExtensions: Iterable<string>;
  }
>;

function originOf(siteUrl: string): string | null {
  try {
    return new URL(siteUrl).origin;
  } catch {
    return null;
  }
}

/**
 * Builds a frozen snapshot. A site URL that does not parse disables the
 * feature for the request.
 */
export function createSnapshot(input: SnapshotInput): ConfigurationSnapshot {
  const siteUrl = input.siteUrl ?? '';
  const origin = originOf(siteUrl);
  const extensions = new Set<string>();
  for (const ext of input.acceptedExtensions ?? []) extensions.add(ext.toLowerCase());

  return Object.freeze({
    enabled: Boolean(input.enabled) && origin !== null,
    debug: input.debug ?? false,
    cdnBaseUrl: input.cdnBaseUrl ?? '',
    acceptedExtensions: extensions,
    excludedPathRules: Object.freeze([...(input.excludedPathRules ?? [])]),
    siteUrl,
    siteOrigin: origin ?? '',
    adminPathMarkers: Object.freeze([...(input.adminPathMarkers ?? ADMIN_PATH_MARKERS)]),
  });
}

export function snapshotFromHelper(helper: Helper): ConfigurationSnapshot {
  return createSnapshot({
    enabled: helper.isEnabled(),
    debug: helper.isDebugEnabled(),
    cdnBaseUrl: helper.getCdnBaseUrl(),
    acceptedExtensions: helper.getFileTypes(),
    excludedPathRules: helper.getExcludedPaths(),
    siteUrl: helper.getSiteUrl(),
  });
}
