/**
 * Progress logging for conversion runs
 */

import type { BatchSummary } from '../models/entities.js';
import { logger } from '../util/logger.js';

export interface ProgressLogger {
  documentStarted(index: number, total: number, documentPath: string): void;
  documentConverted(documentPath: string, outputPath: string, details: Record<string, unknown>): void;
  documentFailed(documentPath: string, error: string): void;
  logSummary(summary: BatchSummary): void;
}

export function formatDuration(durationMs: number): string {
  const totalSeconds = durationMs / 1000;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.round(totalSeconds % 60);
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

export function createProgressLogger(rootDir: string): ProgressLogger {
  const relative = (documentPath: string) =>
    documentPath.startsWith(rootDir) ? documentPath.slice(rootDir.length).replace(/^[\\/]+/, '') : documentPath;

  return {
    documentStarted(index, total, documentPath) {
      logger.info(`[${index}/${total}] Converting ${relative(documentPath)}`);
    },

    documentConverted(documentPath, outputPath, details) {
      logger.info(`  ✓ ${relative(outputPath)}`, { source: relative(documentPath), ...details });
    },

    documentFailed(documentPath, error) {
      logger.error(`  ✗ Failed to convert ${relative(documentPath)}`, { error });
    },

    logSummary(summary) {
      logger.info('Conversion completed', {
        summary: {
          discovered: summary.discovered,
          converted: summary.converted,
          failed: summary.failed,
          inlinedImages: summary.inlinedImages,
          duration: formatDuration(summary.durationMs),
        },
      });

      if (summary.missingTitles > 0) {
        logger.warn('Documents without a detectable title were named after their source file', {
          count: summary.missingTitles,
          documents: summary.diagnostics.filter(d => d.kind === 'MissingTitle').map(d => relative(d.documentPath)),
        });
      }

      if (summary.missingImages > 0) {
        logger.warn('Images could not be inlined and need manual follow-up', {
          count: summary.missingImages,
          images: summary.diagnostics
            .filter(d => d.kind === 'MissingAsset')
            .map(d => `${relative(d.documentPath)}: ${d.detail ?? ''}`),
        });
      }

      if (summary.unconvertedMacros > 0) {
        logger.warn('Some Confluence markup was left unconverted', { count: summary.unconvertedMacros });
      }

      if (summary.collisions > 0) {
        logger.warn('Several documents shared a title; suffixes were added', { count: summary.collisions });
      }

      if (summary.failed > 0) {
        logger.error('Conversion completed with errors', { errorCount: summary.failed });
      }
    },
  };
}
