import { TemplateError } from '../utils/errors';

type Segment<K extends string> = { literal: string } | { placeholder: K };

export interface CompiledPlaceholderPattern<K extends string> {
  pattern: string;
  placeholders: ReadonlySet<K>;
  apply(values: Record<K, string>): string;
}

/**
 * Compiles a `{name}` pattern against a closed set of placeholder names.
 * `{{` and `}}` stand for literal braces; unknown names are rejected.
 */
export function compilePlaceholderPattern<K extends string>(
  pattern: string,
  allowed: readonly K[],
  label = 'pattern'
): CompiledPlaceholderPattern<K> {
  const segments: Array<Segment<K>> = [];
  const used = new Set<K>();
  const tokenRegex = /\{\{|\}\}|\{([^{}]*)\}/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  const isAllowed = (name: string): name is K => allowed.some((known) => known === name);

  while ((match = tokenRegex.exec(pattern)) !== null) {
    if (match.index > lastIndex) {
      segments.push({ literal: pattern.slice(lastIndex, match.index) });
    }
    lastIndex = tokenRegex.lastIndex;

    if (match[0] === '{{') {
      segments.push({ literal: '{' });
      continue;
    }
    if (match[0] === '}}') {
      segments.push({ literal: '}' });
      continue;
    }

    const name = match[1].trim();
    if (!isAllowed(name)) {
      const known = allowed.map((k) => `{${k}}`).join(', ');
      throw new TemplateError(`Unknown placeholder "{${match[1]}}" in ${label} "${pattern}" (known: ${known})`);
    }
    used.add(name);
    segments.push({ placeholder: name });
  }
  if (lastIndex < pattern.length) {
    segments.push({ literal: pattern.slice(lastIndex) });
  }

  return {
    pattern,
    placeholders: used,
    apply(values) {
      return segments
        .map((segment) => ('literal' in segment ? segment.literal : values[segment.placeholder]))
        .join('');
    },
  };
}
