export type PathRule =
  | { kind: 'exact'; path: string; source: string }
  | { kind: 'prefix'; prefix: string; source: string };

export function parsePathRule(source: string): PathRule {
  if (source.endsWith('*')) {
    return { kind: 'prefix', prefix: source.slice(0, -1), source };
  }
  return { kind: 'exact', path: source, source };
}

// Entries are separated by commas or newlines, blanks dropped.
export function parsePathRules(input: string): PathRule[] {
  return input
    .split(/[,\n]/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map(parsePathRule);
}

export function matchesPathRule(path: string, rule: PathRule): boolean {
  if (rule.kind === 'prefix') return path.startsWith(rule.prefix);
  return path === rule.path;
}

export function isExcludedPath(path: string, rules: readonly PathRule[]): boolean {
  return rules.some((rule) => matchesPathRule(path, rule));
}
