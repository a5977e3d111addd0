/**
 * Plain-text helpers over node-html-parser.
 */

import { parse } from 'node-html-parser';

const BLOCK_BREAK = /<(?:br\s*\/?|\/(?:p|div|li|ul|ol|h[1-6]|tr|section|article))\s*>/gi;

/** Collapse runs of whitespace to single spaces. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Decode entities without touching markup structure. */
export function decodeEntities(text: string): string {
  return parse(`<span>${text}</span>`).text;
}

/**
 * HTML fragment to plain text: one line per block element, entities decoded,
 * whitespace collapsed within lines. Escaped markup (`&lt;p&gt;`) is unwrapped first.
 */
export function htmlToText(html: string): string {
  let source = html;
  if (!/<[a-z!/]/i.test(source) && /&lt;[a-z/]/i.test(source)) {
    source = decodeEntities(source);
  }
  const withBreaks = source.replace(BLOCK_BREAK, '\n$&');
  const root = parse(withBreaks, { blockTextElements: { script: false, style: false, noscript: false } });
  return root.text
    .split('\n')
    .map(collapseWhitespace)
    .filter(Boolean)
    .join('\n');
}

export function truncate(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : text.slice(0, maxChars).trimEnd();
}
