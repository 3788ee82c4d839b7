/**
 * Export Service
 *
 * Orchestrates one export call end to end:
 *
 *   initializing → parsing_markdown → converting_diagrams → processing_images
 *     → generating_pdf / generating_word → finalizing → completed | failed
 *
 * Each call owns a ProgressTracker in the injected OperationRegistry; the
 * tracker stays queryable for `export.statusRetentionMs` after it finishes.
 * Failures come back as data: no export method rejects.
 */

import { stat } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import type { DocForgeConfig } from '../config/config.js';
import { createDiagramConverter } from '../diagrams/factory.js';
import type { DiagramConverter } from '../diagrams/types.js';
import { ErrorHandler } from '../errors/error-handler.js';
import {
  DiagramConversionError,
  DocForgeError,
  ExportError,
  ImageResolutionError,
  TemplateError,
} from '../errors/docforge-error.js';
import { moduleLogger } from '../logging/logger.js';
import { MarkdownParser } from '../parser/markdown-parser.js';
import type { MarkdownElement } from '../parser/types.js';
import { OperationRegistry } from '../progress/operation-registry.js';
import type { ProgressTracker } from '../progress/progress-tracker.js';
import type { ExportStage, OperationStatus } from '../progress/types.js';
import { PdfRenderer } from '../renderers/pdf-renderer.js';
import { diagramAssetId, type DocumentRenderer, type RenderAssets } from '../renderers/types.js';
import { WordRenderer } from '../renderers/word-renderer.js';
import { TemplateRegistry } from '../templates/template-registry.js';
import type { OutputFormat, TemplateConfig, TemplateSummary } from '../templates/types.js';
import { ImageResolver } from './image-resolver.js';
import type { DualExportResult, ExportFormat, ExportOptions, ExportResult } from './types.js';

const FORMAT_LABELS: Readonly<Record<OutputFormat, string>> = {
  pdf: 'PDF',
  word: 'Word',
};

const GENERATING_STAGE: Readonly<Record<OutputFormat, ExportStage>> = {
  pdf: 'generating_pdf',
  word: 'generating_word',
};

export interface ExportServiceDependencies {
  parser?: MarkdownParser;
  diagramConverter?: DiagramConverter;
  templates?: TemplateRegistry;
  operations?: OperationRegistry;
  renderers?: Partial<Record<OutputFormat, DocumentRenderer>>;
  imageResolver?: ImageResolver;
  logger?: Logger;
  /** Clock for generated file names */
  now?: () => Date;
}

/** Parsed document plus the assets both renderers share */
interface PreparedDocument {
  elements: MarkdownElement[];
  assets: RenderAssets;
  /** Scratch PNGs to delete once every renderer has run */
  scratchFiles: string[];
}

interface RenderOutcome {
  format: OutputFormat;
  outputPath: string;
  error?: string;
}

export class ExportService {
  private readonly config: DocForgeConfig;
  private readonly parser: MarkdownParser;
  private readonly diagrams: DiagramConverter;
  private readonly templates: TemplateRegistry;
  private readonly operations: OperationRegistry;
  private readonly renderers: Record<OutputFormat, DocumentRenderer>;
  private readonly images: ImageResolver;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: DocForgeConfig, deps: ExportServiceDependencies = {}) {
    this.config = config;
    this.logger = moduleLogger('export', deps.logger);
    this.parser = deps.parser ?? new MarkdownParser();
    this.diagrams =
      deps.diagramConverter ??
      createDiagramConverter(config.diagram, config.paths.scratchDir, deps.logger);
    this.templates =
      deps.templates ?? new TemplateRegistry({ templatesDir: config.paths.templatesDir, logger: deps.logger });
    this.operations = deps.operations ?? new OperationRegistry(deps.logger);
    this.renderers = {
      pdf: deps.renderers?.pdf ?? new PdfRenderer({ footerText: config.export.footerText, logger: deps.logger }),
      word: deps.renderers?.word ?? new WordRenderer({ footerText: config.export.footerText, logger: deps.logger }),
    };
    this.images =
      deps.imageResolver ??
      new ImageResolver({ searchPaths: config.export.imageSearchPaths, logger: deps.logger });
    this.now = deps.now ?? (() => new Date());
  }

  // ─── Export ─────────────────────────────────────────────────────────────────

  exportToPdf(markdown: string, options: ExportOptions = {}): Promise<ExportResult> {
    return this.exportSingle('pdf', markdown, options);
  }

  exportToWord(markdown: string, options: ExportOptions = {}): Promise<ExportResult> {
    return this.exportSingle('word', markdown, options);
  }

  /**
   * Parse and convert diagrams once, then write PDF followed by Word.
   * Succeeds only when both files are written.
   */
  async exportToBoth(markdown: string, options: ExportOptions = {}): Promise<DualExportResult> {
    const tracker = this.startOperation(options);
    const { operationId } = tracker;
    let prepared: PreparedDocument | undefined;

    try {
      tracker.updateProgress('initializing', 0, 'Starting PDF and Word export');
      const template = await this.resolveTemplate(options, tracker);
      const baseName = options.outputName ?? this.defaultOutputName();
      tracker.updateProgress('initializing', 100);

      prepared = await this.prepare(markdown, operationId, tracker);

      const outcomes: RenderOutcome[] = [];
      for (const format of ['pdf', 'word'] as const) {
        const outputPath = this.outputPath(format, baseName, options);
        outcomes.push(await this.generate(format, prepared, template, outputPath, tracker));
      }

      const [pdfResult, wordResult] = await this.finalize(outcomes, tracker);
      const failures = [pdfResult, wordResult]
        .filter((result) => !result.success)
        .map((result) => `${FORMAT_LABELS[result.format]}: ${result.error ?? 'unknown error'}`);
      const success = failures.length === 0;

      tracker.complete(success);
      return {
        success,
        operationId,
        pdfResult: this.withWarnings(pdfResult, tracker),
        wordResult: this.withWarnings(wordResult, tracker),
        ...(success ? {} : { error: failures.join('; ') }),
      };
    } catch (err) {
      return { success: false, operationId, error: this.fail(err, tracker) };
    } finally {
      await this.finish(tracker, prepared);
    }
  }

  export(markdown: string, format: OutputFormat, options?: ExportOptions): Promise<ExportResult>;
  export(markdown: string, format: 'both', options?: ExportOptions): Promise<DualExportResult>;
  export(
    markdown: string,
    format: ExportFormat,
    options?: ExportOptions
  ): Promise<ExportResult | DualExportResult>;
  export(
    markdown: string,
    format: ExportFormat,
    options: ExportOptions = {}
  ): Promise<ExportResult | DualExportResult> {
    return format === 'both'
      ? this.exportToBoth(markdown, options)
      : this.exportSingle(format, markdown, options);
  }

  // ─── Status ─────────────────────────────────────────────────────────────────

  getExportStatus(operationId: string): OperationStatus | undefined {
    return this.operations.get(operationId)?.getStatus();
  }

  /**
   * Stop reporting progress for an operation. Work already under way runs
   * to completion.
   */
  cancelExport(operationId: string): boolean {
    const tracker = this.operations.get(operationId);
    if (!tracker || tracker.isTerminal) return false;
    tracker.cancel();
    return true;
  }

  // ─── Templates ──────────────────────────────────────────────────────────────

  listTemplates(): Promise<TemplateSummary[]> {
    return this.templates.list();
  }

  getTemplate(name: string): Promise<TemplateConfig | undefined> {
    return this.templates.get(name);
  }

  createTemplate(name: string, config: unknown): Promise<boolean> {
    return this.templates.create(name, config);
  }

  deleteTemplate(name: string): Promise<boolean> {
    return this.templates.delete(name);
  }

  /** Drop every tracked operation and its pending eviction timer. */
  dispose(): void {
    this.operations.dispose();
  }

  // ─── Pipeline ───────────────────────────────────────────────────────────────

  private async exportSingle(
    format: OutputFormat,
    markdown: string,
    options: ExportOptions
  ): Promise<ExportResult> {
    const tracker = this.startOperation(options);
    const { operationId } = tracker;
    let prepared: PreparedDocument | undefined;

    try {
      tracker.updateProgress('initializing', 0, `Starting ${FORMAT_LABELS[format]} export`);
      const template = await this.resolveTemplate(options, tracker);
      const outputPath = this.outputPath(format, options.outputName ?? this.defaultOutputName(), options);
      tracker.updateProgress('initializing', 100);

      prepared = await this.prepare(markdown, operationId, tracker);
      const outcome = await this.generate(format, prepared, template, outputPath, tracker);
      const [result] = await this.finalize([outcome], tracker);

      tracker.complete(result.success);
      return this.withWarnings(result, tracker);
    } catch (err) {
      const error = this.fail(err, tracker);
      return { success: false, operationId, format, error, warnings: tracker.getStatus().warnings };
    } finally {
      await this.finish(tracker, prepared);
    }
  }

  private startOperation(options: ExportOptions): ProgressTracker {
    const tracker = this.operations.create();
    if (options.onProgress) {
      tracker.addCallback(options.onProgress);
    }
    return tracker;
  }

  private async resolveTemplate(options: ExportOptions, tracker: ProgressTracker): Promise<TemplateConfig> {
    if (options.customTemplate) {
      return options.customTemplate;
    }

    const name = options.templateName ?? this.config.export.defaultTemplate;
    const template = await this.templates.get(name);
    if (template) return template;

    const fallback = this.config.export.defaultTemplate;
    if (name !== fallback) {
      const defaultTemplate = await this.templates.get(fallback);
      if (defaultTemplate) {
        tracker.addWarning(`Template "${name}" not found; using "${fallback}"`);
        return defaultTemplate;
      }
    }
    throw new TemplateError(`Template "${name}" not found`, { template: name });
  }

  /**
   * Parse, convert diagram blocks and resolve image files. Shared by
   * both formats of a dual export.
   */
  private async prepare(
    markdown: string,
    operationId: string,
    tracker: ProgressTracker
  ): Promise<PreparedDocument> {
    // 1. Parse once
    tracker.updateProgress('parsing_markdown', 0, 'Parsing markdown');
    const parsed = this.parser.parse(markdown);
    tracker.updateProgress('parsing_markdown', 100, `Parsed ${parsed.length} elements`);

    // 2. Diagrams: one converter call per block, progress split evenly
    const sources = parsed.flatMap((element) => (element.type === 'diagram' ? [element.source] : []));
    const diagrams = new Map<string, string>();
    const scratchFiles: string[] = [];
    tracker.updateProgress('converting_diagrams', 0, `Converting ${sources.length} diagrams`);

    let settled = 0;
    await Promise.all(
      sources.map(async (source, index) => {
        const position = index + 1;
        const id = `${operationId}_diagram_${position}`;
        const file = await this.diagrams.render(source, id);
        settled++;
        if (file) {
          diagrams.set(diagramAssetId(position), file);
          scratchFiles.push(file);
        } else {
          const message = `Diagram ${position} could not be rendered; its source is shown instead`;
          this.record(new DiagramConversionError(message, id), tracker);
        }
        tracker.updateProgress('converting_diagrams', (settled / sources.length) * 100);
      })
    );
    tracker.updateProgress('converting_diagrams', 100);

    // 3. Images: unresolved references are dropped
    tracker.updateProgress('processing_images', 0, 'Resolving images');
    const urls = parsed.flatMap((element) => (element.type === 'image' ? [element.url] : []));
    const images = await this.images.resolveAll(urls);
    const elements = parsed.filter((element) => {
      if (element.type !== 'image' || images.has(element.url)) return true;
      this.record(new ImageResolutionError(`Image not found: ${element.url}`, { url: element.url }), tracker);
      return false;
    });
    tracker.updateProgress('processing_images', 100, `Resolved ${images.size} of ${new Set(urls).size} images`);

    return { elements, assets: { diagrams, images }, scratchFiles };
  }

  private async generate(
    format: OutputFormat,
    prepared: PreparedDocument,
    template: TemplateConfig,
    outputPath: string,
    tracker: ProgressTracker
  ): Promise<RenderOutcome> {
    const stage = GENERATING_STAGE[format];
    const label = FORMAT_LABELS[format];
    tracker.updateProgress(stage, 0, `Generating ${label} document`);

    let written: boolean;
    try {
      written = await this.renderers[format].render({
        elements: prepared.elements,
        template,
        assets: prepared.assets,
        outputPath,
        onProgress: (completed, total) => {
          tracker.updateProgress(stage, total === 0 ? 100 : (completed / total) * 100);
        },
      });
    } catch (err) {
      this.logger.error({ err, format, outputPath }, 'Renderer failed');
      written = false;
    }

    if (!written) {
      const error = this.record(
        new ExportError(`Failed to write ${label} file ${outputPath}`, { format, outputPath }),
        tracker
      );
      return { format, outputPath, error };
    }

    tracker.updateProgress(stage, 100, `${label} document written`);
    return { format, outputPath };
  }

  private async finalize(outcomes: RenderOutcome[], tracker: ProgressTracker): Promise<ExportResult[]> {
    tracker.updateProgress('finalizing', 0, 'Finalizing export');
    const results: ExportResult[] = [];

    for (const outcome of outcomes) {
      const base = { operationId: tracker.operationId, format: outcome.format, warnings: [] };
      if (outcome.error) {
        results.push({ ...base, success: false, error: outcome.error });
        continue;
      }
      try {
        const { size } = await stat(outcome.outputPath);
        results.push({ ...base, success: true, outputPath: outcome.outputPath, fileSize: size });
      } catch (err) {
        const error = this.record(
          new ExportError(`Output file missing after write: ${outcome.outputPath}`, {
            outputPath: outcome.outputPath,
            cause: err instanceof Error ? err.message : String(err),
          }),
          tracker
        );
        results.push({ ...base, success: false, error });
      }
    }

    tracker.updateProgress('finalizing', 100);
    return results;
  }

  /**
   * Log a failure and add it to the tracker: recoverable ones as warnings,
   * the rest as errors. Returns the message.
   */
  private record(err: DocForgeError, tracker: ProgressTracker): string {
    const fields = { code: err.code, operationId: tracker.operationId, ...err.context };
    if (ErrorHandler.isRecoverable(err)) {
      this.logger.warn(fields, err.message);
      tracker.addWarning(err.message);
    } else {
      this.logger.error(fields, err.message);
      tracker.addError(err.message);
    }
    return err.message;
  }

  /** Record an unexpected failure on the tracker and return its message. */
  private fail(err: unknown, tracker: ProgressTracker): string {
    const message = ErrorHandler.toUserMessage(err);
    this.logger.error({ err, operationId: tracker.operationId }, 'Export failed');
    tracker.addError(message);
    tracker.complete(false);
    return message;
  }

  private async finish(tracker: ProgressTracker, prepared: PreparedDocument | undefined): Promise<void> {
    if (prepared && prepared.scratchFiles.length > 0) {
      try {
        await this.diagrams.cleanup(prepared.scratchFiles);
      } catch (err) {
        this.logger.warn({ err, operationId: tracker.operationId }, 'Failed to remove diagram scratch files');
      }
    }
    this.operations.scheduleRemoval(tracker.operationId, this.config.export.statusRetentionMs);
  }

  private withWarnings(result: ExportResult, tracker: ProgressTracker): ExportResult {
    return { ...result, warnings: tracker.getStatus().warnings };
  }

  private outputPath(format: OutputFormat, baseName: string, options: ExportOptions): string {
    const dir = options.outputDir ?? this.config.paths.outputDir;
    return path.join(dir, `${baseName}.${this.renderers[format].extension}`);
  }

  private defaultOutputName(): string {
    return `export_${formatTimestamp(this.now())}`;
  }
}

/** Local time as YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
