/**
 * Small helpers for picking values out of known export markup. These are not
 * a parser; they assume the attribute quoting the export produces.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const codePoint = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return Number.isFinite(codePoint) && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

export function escapeAttribute(value: string): string {
  return value.replace(/&(?![a-z]+;|#\d+;|#x[0-9a-f]+;)/gi, '&amp;').replace(/"/g, '&quot;');
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Value of `name` on a single start tag, undecoded, or undefined when absent.
 */
export function readAttribute(tag: string, name: string): string | undefined {
  const pattern = new RegExp(`\\s${escapeRegExp(name)}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s"'>]+))`, 'i');
  const match = pattern.exec(tag);
  if (!match) return undefined;
  return match[1] ?? match[2] ?? match[3];
}

/**
 * Index just past the close tag that balances an already-open `container`
 * element whose content starts at `from`, or -1 when the markup never closes.
 */
export function findBalancedClose(html: string, from: number, container: string): { bodyEnd: number; end: number } | -1 {
  const tags = new RegExp(`<(/?)${escapeRegExp(container)}\\b[^>]*>`, 'gi');
  tags.lastIndex = from;
  let depth = 1;
  let match: RegExpExecArray | null;

  while ((match = tags.exec(html)) !== null) {
    if (match[1] === '/') {
      depth--;
      if (depth === 0) {
        return { bodyEnd: match.index, end: match.index + match[0].length };
      }
    } else if (!match[0].endsWith('/>')) {
      depth++;
    }
  }
  return -1;
}
