// Core domain interfaces for converting Confluence HTML exports

import type { LogFormat, LogLevel } from '../util/logger.js';

/**
 * One exported page moving through the conversion pipeline.
 */
export interface ExportDocument {
  sourcePath: string; // absolute path of the exported .html file
  html: string;
}

export interface ProtectedRegion {
  token: string; // 32 lowercase hex characters
  content: string; // escaped region text
}

export type Replacer = (match: string, ...groups: Array<string | undefined>) => string;

/**
 * Plain substitution over the whole text. A string `replacement` is literal
 * text; a function gets the match and its capture groups.
 */
export interface PatternRule {
  kind: 'pattern';
  name: string;
  mode: 'once';
  pattern: RegExp;
  replacement: string | Replacer;
}

/**
 * A macro whose body is a balanced container element. `opening` matches
 * everything up to and including the body's start tag; the body runs to the
 * matching close tag and must be followed by `trailingCloses` more close tags.
 */
export interface BlockRule {
  kind: 'block';
  name: string;
  mode: 'fixedPoint';
  opening: RegExp;
  container: string;
  trailingCloses: number;
  render: (groups: Array<string | undefined>, body: string) => string;
}

export type RewriteRule = PatternRule | BlockRule;

export interface ImageReference {
  path: string;
  height?: string;
  width?: string;
}

export type DiagnosticKind = 'MissingTitle' | 'MissingAsset' | 'MalformedMacro' | 'IOFailure';

export interface ConversionDiagnostic {
  kind: DiagnosticKind;
  documentPath: string;
  message: string;
  detail?: string;
}

export interface ImageStats {
  inlined: number;
  missing: number;
}

export interface ConversionResult {
  html: string;
  title?: string;
  images: ImageStats;
  appliedRules: Record<string, number>;
  diagnostics: ConversionDiagnostic[];
}

export interface CheckboxEmojiIds {
  unchecked: string;
  checked: string;
}

export interface ConverterConfig {
  rootDir: string;
  concurrency: number;
  dryRun: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  outputPrefix: string;
  checkboxEmoji: CheckboxEmojiIds;
  codeLanguages: Record<string, string>;
  conversionDate?: Date;
}

export interface BatchSummary {
  discovered: number;
  converted: number;
  failed: number;
  missingTitles: number;
  missingImages: number;
  inlinedImages: number;
  unconvertedMacros: number;
  collisions: number;
  durationMs: number;
  diagnostics: ConversionDiagnostic[];
}
