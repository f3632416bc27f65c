/**
 * Collapses the export's indentation and line breaks so that macro patterns
 * can match across what were separate lines. `<pre>` regions come through
 * byte for byte.
 */

import { ProtectedRegionStore } from './protectedRegions.js';

const PREFORMATTED_REGEX = /<pre\b[^>]*>[\s\S]*?<\/pre>/gi;
// ASCII whitespace only; U+00A0 in content is meaningful
const WHITESPACE_RUN_REGEX = /[ \t\r\n\f\v]+/g;
const BETWEEN_TAGS_REGEX = />[ ]+</g;
const AFTER_OPENING_TAG_REGEX = /(<[a-zA-Z][\w:-]*(?:\s[^<>]*)?>) /g;
const BEFORE_CLOSING_TAG_REGEX = / (<\/[a-zA-Z][\w:-]*\s*>)/g;

const VOID_ELEMENTS = new Set(['area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'source', 'track', 'wbr']);

export interface NormalizeOptions {
  store?: ProtectedRegionStore;
}

function tagName(tag: string): string {
  const match = /^<([a-zA-Z][\w:-]*)/.exec(tag);
  return match ? match[1].toLowerCase() : '';
}

export function collapseWhitespace(text: string): string {
  return text
    .replace(WHITESPACE_RUN_REGEX, ' ')
    .replace(BETWEEN_TAGS_REGEX, '><')
    .replace(AFTER_OPENING_TAG_REGEX, (match, tag: string) =>
      tag.endsWith('/>') || VOID_ELEMENTS.has(tagName(tag)) ? match : tag
    )
    .replace(BEFORE_CLOSING_TAG_REGEX, '$1')
    .trim();
}

export function normalizeWhitespace(html: string, options: NormalizeOptions = {}): string {
  const store = options.store ?? new ProtectedRegionStore();

  const withPlaceholders = html.replace(PREFORMATTED_REGEX, (region) => store.protect(region, html));

  return store.restore(collapseWhitespace(withPlaceholders));
}
