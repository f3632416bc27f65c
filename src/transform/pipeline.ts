/**
 * Runs one exported page through normalization, macro rewriting and image
 * inlining, and looks up its title for naming.
 */

import { dirname } from 'path';
import type { ConversionDiagnostic, ConversionResult, ExportDocument, RewriteRule } from '../models/entities.js';
import { MalformedMacroError } from '../core/errors.js';
import { logger } from '../util/logger.js';
import { normalizeWhitespace } from './whitespaceNormalizer.js';
import { findUnconvertedMacros, rewriteMacros } from './macroRewriter.js';
import { inlineImages, type InlineImagesOptions } from './imageInliner.js';
import { extractTitle } from './outputNamer.js';

export interface ConvertOptions {
  readFile?: InlineImagesOptions['readFile'];
}

export async function convertDocument(
  document: ExportDocument,
  rules: readonly RewriteRule[],
  options: ConvertOptions = {}
): Promise<ConversionResult> {
  const diagnostics: ConversionDiagnostic[] = [];

  const normalized = normalizeWhitespace(document.html);
  logger.debug('Whitespace normalized', {
    document: document.sourcePath,
    before: document.html.length,
    after: normalized.length,
  });

  const rewritten = rewriteMacros(normalized, rules);
  logger.debug('Macros rewritten', { document: document.sourcePath, applied: rewritten.applied });

  const images = await inlineImages(rewritten.html, {
    baseDir: dirname(document.sourcePath),
    documentPath: document.sourcePath,
    readFile: options.readFile,
  });

  // Checked after inlining so consumed image placeholders are not reported
  for (const leftover of findUnconvertedMacros(images.html)) {
    const failure = new MalformedMacroError(document.sourcePath, leftover.construct, leftover.excerpt);
    diagnostics.push(failure.toDiagnostic());
    logger.warn('Markup left unconverted', { document: document.sourcePath, construct: leftover.construct });
  }
  diagnostics.push(...images.diagnostics);

  return {
    html: images.html,
    title: extractTitle(images.html),
    images: { inlined: images.inlined, missing: images.missing },
    appliedRules: rewritten.applied,
    diagnostics,
  };
}
