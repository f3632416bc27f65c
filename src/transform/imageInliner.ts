/**
 * Replaces the image placeholders left by the macro rewriter with
 * self-contained data-URI images read from the export's attachment files.
 */

import { readFile as fsReadFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import type { ConversionDiagnostic, ImageReference } from '../models/entities.js';
import { MissingAssetError, describeError } from '../core/errors.js';
import { decodeEntities, escapeAttribute } from '../util/html.js';
import { logger } from '../util/logger.js';

export const IMAGE_PLACEHOLDER_REGEX = /<!--inline-image src="([^"]*)" height="([^"]*)" width="([^"]*)"-->/g;
export const IMAGE_MEDIA_TYPE = 'image/png';

export interface InlineImagesOptions {
  baseDir: string; // directory of the document being converted
  documentPath: string;
  readFile?: (path: string) => Promise<Buffer>;
}

export interface InlineImagesResult {
  html: string;
  inlined: number;
  missing: number;
  diagnostics: ConversionDiagnostic[];
}

export function parseImagePlaceholders(html: string): Array<ImageReference & { placeholder: string }> {
  return Array.from(html.matchAll(IMAGE_PLACEHOLDER_REGEX), (match) => ({
    placeholder: match[0],
    path: match[1],
    height: match[2] || undefined,
    width: match[3] || undefined,
  }));
}

/**
 * Filesystem path for an export `src` value: entities decoded, query string
 * dropped, percent-escapes decoded, relative to the document directory.
 */
export function resolveImagePath(src: string, baseDir: string): string {
  const withoutQuery = decodeEntities(src).split(/[?#]/)[0];
  let decoded = withoutQuery;
  try {
    decoded = decodeURIComponent(withoutQuery);
  } catch (error) {
    logger.debug('Image path is not URI-encoded, using it as written', { src, error: describeError(error) });
  }
  return isAbsolute(decoded) ? decoded : resolve(baseDir, decoded);
}

function sizeAttributes(ref: ImageReference): string {
  return (ref.height ? ` height="${ref.height}"` : '') + (ref.width ? ` width="${ref.width}"` : '');
}

export function renderInlineImage(ref: ImageReference, data: Buffer): string {
  return `<img src="data:${IMAGE_MEDIA_TYPE};base64,${data.toString('base64')}"${sizeAttributes(ref)}>`;
}

export function renderMissingImage(ref: ImageReference): string {
  const alt = escapeAttribute(`Missing image: ${decodeEntities(ref.path)}`);
  return `<img src="${ref.path}" alt="${alt}"${sizeAttributes(ref)}>`;
}

export async function inlineImages(html: string, options: InlineImagesOptions): Promise<InlineImagesResult> {
  const readFile = options.readFile ?? ((path: string) => fsReadFile(path));
  const references = parseImagePlaceholders(html);
  const diagnostics: ConversionDiagnostic[] = [];
  const rendered = new Map<string, string>();
  let inlined = 0;
  let missing = 0;

  for (const ref of references) {
    if (rendered.has(ref.placeholder)) {
      continue;
    }
    const filePath = resolveImagePath(ref.path, options.baseDir);
    try {
      const data = await readFile(filePath);
      rendered.set(ref.placeholder, renderInlineImage(ref, data));
      logger.debug('Inlined image', { document: options.documentPath, image: ref.path, bytes: data.length });
    } catch (error) {
      const failure = new MissingAssetError(options.documentPath, ref.path, error);
      diagnostics.push(failure.toDiagnostic());
      rendered.set(ref.placeholder, renderMissingImage(ref));
      logger.warn('Image could not be inlined', {
        document: options.documentPath,
        image: ref.path,
        error: describeError(error),
      });
    }
  }

  const result = html.replace(IMAGE_PLACEHOLDER_REGEX, (placeholder) => {
    const replacement = rendered.get(placeholder) ?? placeholder;
    if (replacement.startsWith('<img src="data:')) {
      inlined++;
    } else {
      missing++;
    }
    return replacement;
  });

  return { html: result, inlined, missing, diagnostics };
}
