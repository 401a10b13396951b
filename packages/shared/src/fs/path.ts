/**
 * Normalizes a path to use forward slashes, the form whitelist keys are stored in.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * True when `p` starts with any of the given prefixes. Prefixes are compared
 * literally against the forward-slash form of the path, so `docs/` matches
 * `docs/a.md` but not `mydocs/a.md`.
 */
export function matchesPrefix(p: string, prefixes: readonly string[]): boolean {
  const normalized = normalizePath(p);
  return prefixes.some((prefix) => normalized.startsWith(normalizePath(prefix)));
}
