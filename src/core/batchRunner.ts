/**
 * Converts every page of an export folder and writes each result next to
 * its source.
 */

import { promises as fs } from 'fs';
import pLimit from 'p-limit';
import type { BatchSummary, ConversionDiagnostic, ConversionResult, ConverterConfig, RewriteRule } from '../models/entities.js';
import { atomicWriteFile } from '../fs/atomicWriter.js';
import { findHtmlFiles } from '../fs/htmlDiscovery.js';
import { createMacroRules } from '../transform/macroRules.js';
import { deriveOutputName, OutputNameRegistry } from '../transform/outputNamer.js';
import { convertDocument, type ConvertOptions } from '../transform/pipeline.js';
import { createProgressLogger, type ProgressLogger } from '../cli/progress.js';
import { logger } from '../util/logger.js';
import { IOFailureError, MissingTitleError } from './errors.js';

export interface BatchDependencies {
  readDocument?: (path: string) => Promise<string>;
  writeDocument?: (path: string, html: string) => Promise<void>;
  readImage?: ConvertOptions['readFile'];
  progress?: ProgressLogger;
}

type Converted =
  | { ok: true; result: ConversionResult }
  | { ok: false; error: IOFailureError };

export class BatchRunner {
  private readonly rules: readonly RewriteRule[];
  private readonly readDocument: (path: string) => Promise<string>;
  private readonly writeDocument: (path: string, html: string) => Promise<void>;
  private readonly progress: ProgressLogger;

  constructor(private readonly config: ConverterConfig, private readonly deps: BatchDependencies = {}) {
    this.rules = createMacroRules({
      conversionDate: config.conversionDate,
      checkboxEmoji: config.checkboxEmoji,
      codeLanguages: config.codeLanguages,
    });
    this.readDocument = deps.readDocument ?? ((path) => fs.readFile(path, 'utf-8'));
    this.writeDocument = deps.writeDocument ?? ((path, html) => atomicWriteFile(path, html));
    this.progress = deps.progress ?? createProgressLogger(config.rootDir);
  }

  async run(): Promise<BatchSummary> {
    const startTime = Date.now();
    const files = await findHtmlFiles(this.config.rootDir, { outputPrefix: this.config.outputPrefix });
    const summary: BatchSummary = {
      discovered: files.length,
      converted: 0,
      failed: 0,
      missingTitles: 0,
      missingImages: 0,
      inlinedImages: 0,
      unconvertedMacros: 0,
      collisions: 0,
      durationMs: 0,
      diagnostics: [],
    };

    if (files.length === 0) {
      logger.warn('No HTML files found to convert', { rootDir: this.config.rootDir });
      summary.durationMs = Date.now() - startTime;
      return summary;
    }

    logger.info(`Found ${files.length} HTML files`, { rootDir: this.config.rootDir, dryRun: this.config.dryRun });

    // Conversions may overlap; naming and writing follow discovery order
    const limit = pLimit(this.config.concurrency);
    const pending = files.map((file) => limit(() => this.convertFile(file)));
    const registry = new OutputNameRegistry();

    for (let i = 0; i < files.length; i++) {
      const sourcePath = files[i];
      this.progress.documentStarted(i + 1, files.length, sourcePath);
      const converted = await pending[i];

      if (!converted.ok) {
        this.recordFailure(summary, converted.error);
        continue;
      }

      await this.finish(sourcePath, converted.result, registry, summary);
    }

    summary.durationMs = Date.now() - startTime;
    this.progress.logSummary(summary);
    return summary;
  }

  private async convertFile(sourcePath: string): Promise<Converted> {
    let html: string;
    try {
      html = await this.readDocument(sourcePath);
    } catch (error) {
      return { ok: false, error: new IOFailureError(sourcePath, 'read', error) };
    }
    try {
      const result = await convertDocument({ sourcePath, html }, this.rules, { readFile: this.deps.readImage });
      return { ok: true, result };
    } catch (error) {
      return { ok: false, error: new IOFailureError(sourcePath, 'convert', error) };
    }
  }

  private async finish(
    sourcePath: string,
    result: ConversionResult,
    registry: OutputNameRegistry,
    summary: BatchSummary
  ): Promise<void> {
    const diagnostics: ConversionDiagnostic[] = [...result.diagnostics];
    const name = deriveOutputName(result.html, sourcePath, this.config.outputPrefix);

    if (!name.fromTitle) {
      diagnostics.push(new MissingTitleError(sourcePath, name.fileName).toDiagnostic());
      logger.warn('No page title found, naming output after the source file', {
        document: sourcePath,
        output: name.fileName,
      });
    }

    const claimed = registry.claim(sourcePath, name.fileName);
    if (claimed.collisionCount > 0) summary.collisions++;

    if (!this.config.dryRun) {
      try {
        await this.writeDocument(claimed.path, result.html);
      } catch (error) {
        this.recordFailure(summary, new IOFailureError(sourcePath, 'write', error));
        return;
      }
    }

    summary.converted++;
    summary.inlinedImages += result.images.inlined;
    summary.missingImages += result.images.missing;
    summary.missingTitles += name.fromTitle ? 0 : 1;
    summary.unconvertedMacros += diagnostics.filter(d => d.kind === 'MalformedMacro').length;
    summary.diagnostics.push(...diagnostics);

    this.progress.documentConverted(sourcePath, claimed.path, {
      images: result.images.inlined,
      dryRun: this.config.dryRun || undefined,
    });
  }

  private recordFailure(summary: BatchSummary, failure: IOFailureError): void {
    summary.failed++;
    summary.diagnostics.push(failure.toDiagnostic());
    this.progress.documentFailed(failure.documentPath, failure.message);
  }
}
