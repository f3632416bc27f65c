import { basename, dirname, join } from 'path';
import { decodeEntities } from '../util/html.js';
import { logger } from '../util/logger.js';

export const DEFAULT_OUTPUT_PREFIX = 'CONVERTED - ';

const TITLE_REGEX = /<title[^>]*>([\s\S]*?)<\/title>/i;
const DISALLOWED_REGEX = /[^\p{L}\p{M}\p{N}_\s-]/gu;
const WHITESPACE_REGEX = /\s+/g;

export interface OutputName {
  fileName: string;
  fromTitle: boolean;
  title?: string;
}

/**
 * Page title from the export's `<title>Space : Page</title>`; the space name
 * before the first colon is dropped. A title without a colon is used whole.
 */
export function extractTitle(html: string): string | undefined {
  const match = TITLE_REGEX.exec(html);
  if (!match) return undefined;

  const full = decodeEntities(match[1]).replace(WHITESPACE_REGEX, ' ').trim();
  const colon = full.indexOf(':');
  const pageTitle = colon === -1 ? full : full.slice(colon + 1).trim();
  return pageTitle || undefined;
}

export function sanitizeTitle(title: string): string {
  return title
    .replace(DISALLOWED_REGEX, '')
    .trim()
    .replace(WHITESPACE_REGEX, '-')
    .replace(/^-+|-+$/g, '');
}

export function deriveOutputName(html: string, sourcePath: string, prefix = DEFAULT_OUTPUT_PREFIX): OutputName {
  const title = extractTitle(html);
  const sanitized = title ? sanitizeTitle(title) : '';
  if (sanitized) {
    return { fileName: `${prefix}${sanitized}.html`, fromTitle: true, title };
  }

  const stem = basename(sourcePath).replace(/\.html?$/i, '');
  return { fileName: `${prefix}${stem}.html`, fromTitle: false, title };
}

export interface ClaimedName {
  path: string;
  collisionCount: number;
}

/**
 * Hands out output paths for one run. The first document to claim a name in
 * a directory keeps it; later ones get `-1`, `-2`, ... before the extension.
 */
export class OutputNameRegistry {
  private readonly claimed = new Map<string, string>(); // lower-cased path -> claiming source

  claim(sourcePath: string, fileName: string): ClaimedName {
    const dir = dirname(sourcePath);
    const stem = fileName.replace(/\.html$/i, '');
    let candidate = join(dir, fileName);
    let collisionCount = 0;

    while (this.claimed.has(candidate.toLowerCase())) {
      collisionCount++;
      candidate = join(dir, `${stem}-${collisionCount}.html`);
    }

    if (collisionCount > 0) {
      logger.warn('Output name already used in this run, adding suffix', {
        document: sourcePath,
        firstClaimedBy: this.claimed.get(join(dir, fileName).toLowerCase()),
        output: basename(candidate),
      });
    }

    this.claimed.set(candidate.toLowerCase(), sourcePath);
    return { path: candidate, collisionCount };
  }

  get size(): number {
    return this.claimed.size;
  }
}
