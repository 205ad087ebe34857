/**
 * Wildcard matching for dot-separated event categories.
 *
 * `*` matches exactly one segment (`message.*` matches `message.create` but
 * not `message.reaction.add`); `**` matches any number of segments, including
 * none. A bare `*` or `**` matches every category.
 */

const compiled = new Map<string, RegExp>();

function compile(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) return cached;

  const segments = pattern.split('.');
  let source = '';
  segments.forEach((segment, i) => {
    if (segment === '**') {
      // Zero or more segments; the separator goes with them.
      source += i === 0 ? '(?:[^.]+(?:\\.[^.]+)*\\.)?' : '(?:\\.[^.]+)*';
      return;
    }
    const literal = segment
      .split('*')
      .map((piece) => piece.replace(/[\\^$+?()[\]{}|.]/g, '\\$&'))
      .join('[^.]*');
    const first = i === 0 || (i === 1 && segments[0] === '**');
    source += first ? literal : `\\.${literal}`;
  });
  const regex = new RegExp(`^${source}$`);
  compiled.set(pattern, regex);
  return regex;
}

export function matchPattern(pattern: string, category: string): boolean {
  if (pattern === '*' || pattern === '**') return true;
  if (!pattern.includes('*')) return pattern === category;
  return compile(pattern).test(category);
}
