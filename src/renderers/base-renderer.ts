/**
 * Base Renderer
 *
 * Shared traversal for the output formats. Subclasses build a format
 * specific context, handle each element kind and write the file; the base
 * class owns dispatch, diagram numbering, per-element error isolation and
 * progress reporting.
 */

import type { Logger } from 'pino';
import { RenderError } from '../errors/docforge-error.js';
import { moduleLogger } from '../logging/logger.js';
import type {
  BlockquoteElement,
  CodeElement,
  DiagramElement,
  HeaderElement,
  ImageElement,
  LinkElement,
  ListElement,
  ListItem,
  MarkdownElement,
  ParagraphElement,
  TableElement,
  TextElement,
} from '../parser/types.js';
import type { OutputFormat } from '../templates/types.js';
import {
  diagramAssetId,
  type DocumentRenderer,
  type RendererOptions,
  type RenderRequest,
} from './types.js';

const ORDINAL_PREFIX = /^\d+[.)]\s+/;
const INDENT_PER_LEVEL = 2;
const MAX_LIST_LEVEL = 8;

/**
 * Abstract base class for format renderers
 */
export abstract class BaseRenderer<TContext> implements DocumentRenderer {
  abstract readonly format: OutputFormat;
  abstract readonly extension: string;

  protected readonly footerText: string;
  protected readonly logger: Logger;

  constructor(options: RendererOptions = {}) {
    this.footerText = options.footerText ?? '';
    this.logger = moduleLogger('renderer', options.logger);
  }

  /**
   * Render all elements and write the output file.
   */
  async render(request: RenderRequest): Promise<boolean> {
    const startTime = Date.now();
    const total = request.elements.length;
    const context = this.begin(request);
    let diagramCount = 0;

    for (const [index, element] of request.elements.entries()) {
      try {
        if (element.type === 'diagram') {
          diagramCount++;
          const assetId = diagramAssetId(diagramCount);
          this.renderDiagram(context, element, request.assets.diagrams.get(assetId));
        } else {
          this.renderElement(context, element, request);
        }
      } catch (err) {
        this.logger.error(
          { err, format: this.format, index, elementType: element.type },
          'Failed to render element'
        );
      }
      request.onProgress?.(index + 1, total);
    }

    try {
      await this.save(context, request.outputPath);
    } catch (err) {
      this.logger.error(
        { err: new RenderError(`Failed to write ${this.format} output`, { cause: String(err) }) },
        'Failed to write output file'
      );
      return false;
    }

    this.logger.debug(
      { format: this.format, outputPath: request.outputPath, elements: total, ms: Date.now() - startTime },
      'Render complete'
    );
    return true;
  }

  private renderElement(context: TContext, element: MarkdownElement, request: RenderRequest): void {
    switch (element.type) {
      case 'header':
        return this.renderHeader(context, element);
      case 'paragraph':
        return this.renderParagraph(context, element);
      case 'list':
        return this.renderList(context, element);
      case 'table':
        return this.renderTable(context, element);
      case 'code':
        return this.renderCode(context, element);
      case 'image': {
        const file = request.assets.images.get(element.url);
        if (!file) {
          this.logger.debug({ url: element.url }, 'Image has no resolved file, omitted');
          return;
        }
        return this.renderImage(context, element, file);
      }
      case 'link':
        return this.renderLink(context, element);
      case 'blockquote':
        return this.renderBlockquote(context, element);
      case 'horizontal_rule':
        return this.renderHorizontalRule(context);
      case 'text':
        return this.renderText(context, element);
      case 'diagram':
        // Numbered in render()
        return;
    }
  }

  // ─── Format hooks ──────────────────────────────────────────────────────────

  protected abstract begin(request: RenderRequest): TContext;
  protected abstract save(context: TContext, outputPath: string): Promise<void>;

  protected abstract renderHeader(context: TContext, element: HeaderElement): void;
  protected abstract renderParagraph(context: TContext, element: ParagraphElement): void;
  protected abstract renderList(context: TContext, element: ListElement): void;
  protected abstract renderTable(context: TContext, element: TableElement): void;
  protected abstract renderCode(context: TContext, element: CodeElement): void;
  protected abstract renderImage(context: TContext, element: ImageElement, file: string): void;
  protected abstract renderLink(context: TContext, element: LinkElement): void;
  protected abstract renderBlockquote(context: TContext, element: BlockquoteElement): void;
  protected abstract renderHorizontalRule(context: TContext): void;
  protected abstract renderText(context: TContext, element: TextElement): void;

  /**
   * Diagram with its rendered PNG, or the raw source as a code block when
   * conversion produced nothing.
   */
  protected abstract renderDiagram(
    context: TContext,
    element: DiagramElement,
    assetPath: string | undefined
  ): void;

  // ─── Shared helpers ────────────────────────────────────────────────────────

  /** Code element standing in for a diagram without an image */
  protected diagramFallback(element: DiagramElement): CodeElement {
    return { type: 'code', language: element.language, text: element.source };
  }
}

/** List item text without any leading ordinal ("1. ", "2) ") */
export function listItemText(item: ListItem): string {
  return item.text.replace(ORDINAL_PREFIX, '');
}

/** Nesting level derived from leading whitespace */
export function listLevel(item: ListItem): number {
  return Math.min(Math.floor(item.indent / INDENT_PER_LEVEL), MAX_LIST_LEVEL);
}

/**
 * Pad or truncate every row to the header width.
 */
export function normalizeRows(table: TableElement): string[][] {
  const width = table.headers.length;
  return table.rows.map((row) => {
    const cells = row.slice(0, width);
    while (cells.length < width) cells.push('');
    return cells;
  });
}
