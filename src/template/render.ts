/**
 * Template rendering: placeholders → escaped markup or plain text
 */

import { escapeHtml } from './escape.js';
import { tokenize, type TemplateToken, type TokenValues } from './tokens.js';

export interface RenderOptions {
  /** Target of generic link placeholders */
  linkHref?: string;
}

function namedValue(token: Extract<TemplateToken, { kind: 'named' }>, values: TokenValues): string {
  return values[token.name] ?? token.source;
}

/**
 * Render prose to markup. Literal text and named-token values are escaped;
 * generic placeholders become links whose text is the bracketed words.
 *
 * @example
 * renderTemplate('Call {poison ivy removal services} today')
 * // 'Call <a href="/">poison ivy removal services</a> today'
 */
export function renderTemplate(source: string, values: TokenValues = {}, options: RenderOptions = {}): string {
  const href = options.linkHref ?? '/';

  return tokenize(source)
    .map((token) => {
      switch (token.kind) {
        case 'text':
          return escapeHtml(token.value);
        case 'named':
          return escapeHtml(namedValue(token, values));
        case 'link':
          return `<a href="${escapeHtml(href)}">${escapeHtml(token.text)}</a>`;
      }
    })
    .join('');
}

/**
 * Resolve named tokens only and return unescaped text.
 * Generic placeholders are kept as written.
 */
export function substituteText(source: string, values: TokenValues = {}): string {
  return tokenize(source)
    .map((token) => {
      switch (token.kind) {
        case 'text':
          return token.value;
        case 'named':
          return namedValue(token, values);
        case 'link':
          return token.source;
      }
    })
    .join('');
}
