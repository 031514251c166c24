/**
 * Compile a file glob into a RegExp over `/`-separated relative paths.
 * Supports `*`, `**`, `?` and `{a,b}` alternatives.
 */
export function globToRegExp(pattern: string): RegExp {
  let regex = '^';
  let depth = 0;
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i] ?? '';
    if (char === '*') {
      if (pattern[i + 1] === '*') {
        if (pattern[i + 2] === '/') {
          regex += '(?:.*/)?';
          i += 3;
        } else {
          regex += '.*';
          i += 2;
        }
      } else {
        regex += '[^/]*';
        i += 1;
      }
      continue;
    }
    if (char === '?') {
      regex += '[^/]';
    } else if (char === '{') {
      regex += '(?:';
      depth += 1;
    } else if (char === '}' && depth > 0) {
      regex += ')';
      depth -= 1;
    } else if (char === ',' && depth > 0) {
      regex += '|';
    } else {
      regex += escapeRegex(char);
    }
    i += 1;
  }

  regex += ')'.repeat(depth) + '$';
  return new RegExp(regex);
}

function escapeRegex(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Patterns without a slash match the file name; others match the path
 * relative to the search root.
 */
export function matchesGlob(relativePath: string, pattern: string): boolean {
  const normalized = relativePath.replace(/\\/g, '/');
  const target = pattern.includes('/') ? normalized : (normalized.split('/').pop() ?? normalized);
  return globToRegExp(pattern).test(target);
}
