/**
 * Status line markup helpers.
 *
 * The host's line renderer understands a small inline markup:
 *
 *   %#Name#        switch to style Name
 *   %12@Fn@ … %X   click region: clicks call Fn with 12 as the first argument
 *   %%             a literal percent sign
 *
 * Markers take no columns. Everything else is text measured in terminal
 * cells (wide characters count two).
 */

import stringWidth from 'string-width';

const MARKER_RE = /%#[^#]*#|%\d+@[^@]*@|%X|%%/g;

/** Escape text so a `%` in it stays visible and cannot start a marker. */
export const escapeText = (text: string): string => text.replace(/%/g, '%%');

export const styleSpan = (style: string, text: string, reset: string): string =>
  `%#${style}#${text}%#${reset}#`;

export const clickSpan = (id: number, handler: string, inner: string): string =>
  `%${id}@${handler}@${inner}%X`;

export const spaces = (count: number): string => ' '.repeat(Math.max(0, count));

/** Terminal cell width of plain text. */
export function displayWidth(text: string): number {
  return stringWidth(text);
}

export interface MarkupToken {
  kind: 'marker' | 'text';
  value: string;
}

/** Split markup into zero-width markers and visible text. */
export function tokenize(markup: string): MarkupToken[] {
  const tokens: MarkupToken[] = [];
  let last = 0;
  for (const match of markup.matchAll(MARKER_RE)) {
    const index = match.index ?? 0;
    if (index > last) {
      tokens.push({ kind: 'text', value: markup.slice(last, index) });
    }
    // An escaped percent is visible text, one cell wide
    tokens.push({ kind: match[0] === '%%' ? 'text' : 'marker', value: match[0] });
    last = index + match[0].length;
  }
  if (last < markup.length) {
    tokens.push({ kind: 'text', value: markup.slice(last) });
  }
  return tokens;
}

function tokenWidth(token: MarkupToken): number {
  if (token.kind === 'marker') return 0;
  return token.value === '%%' ? 1 : displayWidth(token.value);
}

/** Visible text of a markup string. */
export function stripMarkup(markup: string): string {
  return tokenize(markup)
    .filter((token) => token.kind === 'text')
    .map((token) => (token.value === '%%' ? '%' : token.value))
    .join('');
}

/** Display width of a markup string, ignoring markers. */
export function markupWidth(markup: string): number {
  return tokenize(markup).reduce((sum, token) => sum + tokenWidth(token), 0);
}

/**
 * Cut visible text after `maxWidth` cells. Every marker is kept, so style
 * switches and click regions stay balanced. A wide character that would
 * straddle the limit is dropped.
 */
export function truncateMarkup(markup: string, maxWidth: number): string {
  let remaining = Math.max(0, maxWidth);
  let out = '';

  for (const token of tokenize(markup)) {
    if (token.kind === 'marker') {
      out += token.value;
      continue;
    }
    if (token.value === '%%') {
      if (remaining >= 1) {
        out += token.value;
        remaining -= 1;
      }
      continue;
    }
    for (const ch of token.value) {
      const width = displayWidth(ch);
      if (width > remaining) {
        remaining = 0;
        break;
      }
      out += ch;
      remaining -= width;
    }
  }

  return out;
}
