import { randomBytes } from 'crypto';
import type { ProtectedRegion } from '../models/entities.js';

const TOKEN_PATTERN = /^[0-9a-f]{32}$/;
const PLACEHOLDER_REGEX = /<!--protected:([0-9a-f]{32})-->/g;

/**
 * `$` is the only character `String.prototype.replace` templates treat
 * specially (`$1`, `$&`, `$$`, `` $` ``, `$'`, `$<name>`).
 */
export function escapeTemplate(text: string): string {
  return text.replace(/\$/g, '$$$$');
}

export function unescapeTemplate(text: string): string {
  return text.replace(/\$\$/g, '$');
}

export function placeholderFor(token: string): string {
  return `<!--protected:${token}-->`;
}

/**
 * Holds spans lifted out of a document while the rest of it is rewritten.
 * A store lives for one document only.
 */
export class ProtectedRegionStore {
  private readonly regions = new Map<string, ProtectedRegion>();

  constructor(private readonly generateToken: () => string = () => randomBytes(16).toString('hex')) {}

  get size(): number {
    return this.regions.size;
  }

  /**
   * Store `content` and return the placeholder that stands in for it.
   * `haystack` is the text the placeholder will live in; a token already
   * present there is never issued.
   */
  protect(content: string, haystack: string): string {
    let token = this.generateToken();
    while (!TOKEN_PATTERN.test(token) || this.regions.has(token) || haystack.includes(token)) {
      token = randomBytes(16).toString('hex');
    }
    this.regions.set(token, { token, content: escapeTemplate(content) });
    return placeholderFor(token);
  }

  /**
   * Put every stored region back in place of its placeholder. Placeholders
   * with tokens this store never issued are left as they are, and restored
   * text is not scanned again.
   */
  restore(text: string): string {
    const restored = text.replace(PLACEHOLDER_REGEX, (placeholder, token: string) => {
      const region = this.regions.get(token);
      return region ? unescapeTemplate(region.content) : placeholder;
    });
    this.regions.clear();
    return restored;
  }
}
