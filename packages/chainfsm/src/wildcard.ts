/**
 * Wildcard pattern matching for notification names
 *
 * Supports:
 * - * (single segment wildcard): `fsm:enter:*` matches `fsm:enter:clean`
 * - ** (multi-segment wildcard): `fsm:**` matches every notice of the `fsm` machine
 * - Suffix patterns: `*:transition` matches the transitions of every machine
 *
 * Compiled patterns are kept in a small LRU cache.
 */

const patternCache = new Map<string, RegExp>();

const MAX_CACHE_SIZE = 100;

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const patternToRegex = (pattern: string, delimiter: string): RegExp => {
  const escapedDelimiter = escapeRegex(delimiter);

  if (pattern === '*') {
    return new RegExp(`^[^${escapedDelimiter}]+$`);
  }
  if (pattern === '**') {
    return /^.*$/;
  }

  // Literal segments are escaped so state names such as `a.b` only match themselves
  const source = pattern
    .split('**')
    .map((part) =>
      part
        .split('*')
        .map(escapeRegex)
        .join(`[^${escapedDelimiter}]+`)
    )
    .join('.*');

  return new RegExp(`^${source}$`);
};

export const hasWildcard = (pattern: string): boolean => pattern.includes('*');

/**
 * Get the compiled RegExp for a pattern, compiling and caching it on first use
 */
export const getPatternRegex = (pattern: string, delimiter: string = ':'): RegExp => {
  const cacheKey = `${pattern}::${delimiter}`;

  let regex = patternCache.get(cacheKey);
  if (regex) {
    // Refresh recency
    patternCache.delete(cacheKey);
    patternCache.set(cacheKey, regex);
    return regex;
  }

  regex = patternToRegex(pattern, delimiter);

  if (patternCache.size >= MAX_CACHE_SIZE) {
    const oldest = patternCache.keys().next().value;
    if (oldest !== undefined) {
      patternCache.delete(oldest);
    }
  }

  patternCache.set(cacheKey, regex);
  return regex;
};

export const matchesPattern = (name: string, pattern: string, delimiter: string = ':'): boolean => {
  if (!hasWildcard(pattern)) {
    return name === pattern;
  }
  return getPatternRegex(pattern, delimiter).test(name);
};

/**
 * Filter the patterns that match a notification name
 */
export const findMatchingPatterns = (
  name: string,
  patterns: Iterable<string>,
  delimiter: string = ':'
): string[] => {
  const matching: string[] = [];
  for (const pattern of patterns) {
    if (matchesPattern(name, pattern, delimiter)) {
      matching.push(pattern);
    }
  }
  return matching;
};

export const clearPatternCache = (): void => {
  patternCache.clear();
};

export const getCacheSize = (): number => patternCache.size;
