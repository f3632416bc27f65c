/**
 * Error types raised while converting an export.
 *
 * The three recoverable kinds are normally recorded as diagnostics by the
 * stage that detects them; the error classes exist so that callers handling
 * a thrown failure get the same structured fields.
 */

import type { ConversionDiagnostic, DiagnosticKind } from '../models/entities.js';

export class ConversionError extends Error {
  constructor(
    readonly kind: DiagnosticKind,
    readonly documentPath: string,
    message: string,
    readonly detail?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toDiagnostic(): ConversionDiagnostic {
    return {
      kind: this.kind,
      documentPath: this.documentPath,
      message: this.message,
      detail: this.detail,
    };
  }
}

export class MissingTitleError extends ConversionError {
  constructor(documentPath: string, fallbackName: string) {
    super('MissingTitle', documentPath, 'No page title found, using fallback name', fallbackName);
  }
}

export class MissingAssetError extends ConversionError {
  constructor(documentPath: string, assetPath: string, cause?: unknown) {
    super('MissingAsset', documentPath, `Image not readable: ${assetPath}`, assetPath, { cause });
  }
}

export class MalformedMacroError extends ConversionError {
  constructor(documentPath: string, construct: string, excerpt: string) {
    super('MalformedMacro', documentPath, `Unconverted ${construct} markup left in output`, excerpt);
  }
}

export class IOFailureError extends ConversionError {
  constructor(documentPath: string, operation: 'read' | 'convert' | 'write', cause: unknown) {
    super(
      'IOFailure',
      documentPath,
      `Failed to ${operation} document: ${describeError(cause)}`,
      operation,
      { cause }
    );
  }
}

/**
 * Invalid CLI flags, environment values or config file contents.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
