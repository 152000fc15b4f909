/**
 * Source matching for log filters.
 *
 * Patterns are exact names or globs where `*` matches any run of
 * characters ("Router.*", "*.Tick"). `@Name` expands to a named group.
 */

const compiled = new Map<string, RegExp>();

export function globToRegExp(glob: string): RegExp {
  const cached = compiled.get(glob);
  if (cached) return cached;
  const body = glob
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  const re = new RegExp(`^${body}$`);
  compiled.set(glob, re);
  return re;
}

export function matchesPattern(source: string, pattern: string): boolean {
  if (source === pattern) return true;
  if (!pattern.includes('*')) return false;
  return globToRegExp(pattern).test(source);
}

/**
 * Expand `@Group` references; unknown groups expand to nothing
 */
export function expandPattern(pattern: string, groups: Record<string, string[]>): string[] {
  if (!pattern.startsWith('@')) return [pattern];
  return groups[pattern.slice(1)] ?? [];
}

export function matchesAny(
  source: string,
  patterns: ReadonlyArray<string>,
  groups: Record<string, string[]> = {}
): boolean {
  return patterns.some(pattern =>
    expandPattern(pattern, groups).some(expanded => matchesPattern(source, expanded))
  );
}
