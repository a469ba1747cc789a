/**
 * Placeholder grammar for content prose.
 *
 * A placeholder is "{" + one or more non-"}" characters + "}". Its content either
 * equals one of NAMED_TOKENS exactly, or it is a generic internal link whose
 * visible text is the bracketed words. Anything else is literal text.
 */

export const NAMED_TOKENS = ['City, State', 'cost_lo', 'cost_hi'] as const;

export type NamedToken = (typeof NAMED_TOKENS)[number];

export type TemplateToken =
  | { kind: 'text'; value: string }
  | { kind: 'named'; name: NamedToken; source: string }
  | { kind: 'link'; text: string; source: string };

/** Values for named tokens; a missing entry leaves the placeholder as written */
export type TokenValues = Partial<Record<NamedToken, string>>;

const PLACEHOLDER_PATTERN = /\{([^}]+)\}/g;

export function isNamedToken(name: string): name is NamedToken {
  return NAMED_TOKENS.some((token) => token === name);
}

export function tokenize(source: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let last = 0;

  for (const match of source.matchAll(PLACEHOLDER_PATTERN)) {
    const start = match.index ?? 0;
    const [placeholder, inner] = match;

    if (start > last) {
      tokens.push({ kind: 'text', value: source.slice(last, start) });
    }

    if (isNamedToken(inner)) {
      tokens.push({ kind: 'named', name: inner, source: placeholder });
    } else {
      tokens.push({ kind: 'link', text: inner, source: placeholder });
    }

    last = start + placeholder.length;
  }

  if (last < source.length) {
    tokens.push({ kind: 'text', value: source.slice(last) });
  }

  return tokens;
}
