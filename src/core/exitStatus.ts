import type { BatchSummary } from '../models/entities.js';

/**
 * Process exit codes; stable for scripts that wrap the converter.
 */
export const EXIT_CODES = {
  SUCCESS: 0,        // every discovered document was converted and written
  CONTENT_FAILURE: 1, // at least one document could not be read or written
  INVALID_USAGE: 2   // invalid CLI flags, environment values or config file
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

/**
 * Missing titles, missing images and unconverted markup are reported but do
 * not fail the run; only documents that produced no output do.
 */
export function exitCodeFor(summary: BatchSummary): ExitCode {
  return summary.failed > 0 ? EXIT_CODES.CONTENT_FAILURE : EXIT_CODES.SUCCESS;
}
