/**
 * Shell-style wildcard matching for subscription names.
 *
 * `*` matches any run of characters, `?` a single character and `[...]` a
 * character class (`[!...]` negates it). Matching is case-sensitive and
 * covers the whole name.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const char = pattern.charAt(i);
    i++;

    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i, close);
      i = close + 1;
      const negate = body.startsWith('!');
      if (negate) body = body.slice(1);
      source += `[${negate ? '^' : ''}${body.replace(/[\\^\]]/g, '\\$&')}]`;
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
    }
  }

  return new RegExp(`^${source}$`);
}

export function isWildcard(pattern: string): boolean {
  return /[*?[]/.test(pattern);
}

export function matchesWildcard(name: string, pattern: string): boolean {
  return wildcardToRegExp(pattern).test(name);
}

export function matchesAny(name: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchesWildcard(name, pattern));
}
