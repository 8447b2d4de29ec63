/**
 * Glob-style include/exclude matching over relative POSIX paths.
 *
 * Supported wildcards: `**` (any number of segments, `**\/` may match
 * nothing), `*` (within one segment) and `?` (one character). Everything
 * else is matched literally. Patterns are anchored at the start of the
 * path only, so `src` matches `src/app.py` and `*.py` matches `a.pyc`.
 */

export interface PatternMatcher {
  readonly pattern: string;
  readonly regex: RegExp;
  matches(relativePath: string): boolean;
}

const REGEX_SPECIAL = /[.+^${}()|[\]\\/-]/;

export function globToRegExp(pattern: string): RegExp {
  let source = '^';
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i] ?? '';

    if (char === '*') {
      if (pattern[i + 1] === '*') {
        if (pattern[i + 2] === '/') {
          source += '(?:.*/)?';
          i += 3;
        } else {
          source += '.*';
          i += 2;
        }
      } else {
        source += '[^/]*';
        i += 1;
      }
      continue;
    }

    if (char === '?') {
      source += '.';
    } else if (REGEX_SPECIAL.test(char)) {
      source += `\\${char}`;
    } else {
      source += char;
    }
    i += 1;
  }

  return new RegExp(source);
}

export function compilePattern(pattern: string): PatternMatcher {
  const regex = globToRegExp(pattern);
  return {
    pattern,
    regex,
    matches: (relativePath: string) => regex.test(relativePath),
  };
}

export interface PathFilter {
  isExcluded(relativePath: string): boolean;
  isIncluded(relativePath: string): boolean;
  /** Exclude patterns win over include patterns */
  accepts(relativePath: string): boolean;
}

export function createPathFilter(include: string[], exclude: string[]): PathFilter {
  const includeMatchers = include.map(compilePattern);
  const excludeMatchers = exclude.map(compilePattern);

  const isExcluded = (relativePath: string) => excludeMatchers.some(m => m.matches(relativePath));
  const isIncluded = (relativePath: string) => includeMatchers.some(m => m.matches(relativePath));

  return {
    isExcluded,
    isIncluded,
    accepts: (relativePath: string) => !isExcluded(relativePath) && isIncluded(relativePath),
  };
}
