/**
 * Compile a store glob into an anchored RegExp with the same matching rules
 * as Redis `SCAN MATCH`: `*`, `?`, `[abc]`, `[^abc]`, `[a-z]` and `\x` for a
 * literal `x`. A `[` with no closing `]` matches itself.
 */
export function globToRegExp(pattern: string): RegExp {
  const chars = [...pattern];
  let source = '';

  for (let i = 0; i < chars.length; i++) {
    const char = chars[i];
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '\\' && i + 1 < chars.length) {
      i++;
      source += escapeRegExp(chars[i]);
    } else if (char === '[') {
      const parsed = parseClass(chars, i + 1);
      if (parsed) {
        source += parsed.source;
        i = parsed.end;
      } else {
        source += '\\[';
      }
    } else {
      source += escapeRegExp(char);
    }
  }

  return new RegExp(`^${source}$`, 's');
}

/** Escape glob metacharacters so `text` matches only itself */
export function escapeGlob(text: string): string {
  return text.replace(/[*?[\]\\]/g, '\\$&');
}

function parseClass(chars: string[], start: number): { source: string; end: number } | null {
  let i = start;
  let negate = false;
  if (chars[i] === '^') {
    negate = true;
    i++;
  }

  const members: string[] = [];
  for (; i < chars.length; i++) {
    let char = chars[i];
    if (char === ']') {
      const body = members.join('');
      // An empty class matches nothing; negated, it matches any one character.
      const source = body === '' ? (negate ? '[\\s\\S]' : '(?!)') : `[${negate ? '^' : ''}${body}]`;
      return { source, end: i };
    }
    if (char === '\\' && i + 1 < chars.length) {
      i++;
      char = chars[i];
    }
    if (chars[i + 1] === '-' && i + 2 < chars.length && chars[i + 2] !== ']') {
      let to = chars[i + 2];
      i += 2;
      if (to === '\\' && i + 1 < chars.length) {
        i++;
        to = chars[i];
      }
      const [low, high] = char <= to ? [char, to] : [to, char];
      members.push(`${escapeClassChar(low)}-${escapeClassChar(high)}`);
    } else {
      members.push(escapeClassChar(char));
    }
  }

  return null;
}

function escapeRegExp(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function escapeClassChar(char: string): string {
  return char.replace(/[\\\]^[-]/g, '\\$&');
}
