/**
 * PDF Renderer
 *
 * Lays elements out on fixed pages with pdfkit. Pages are buffered so the
 * footer can be stamped on every page once layout is finished.
 */

import { readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import PDFDocument from 'pdfkit';
import { RenderError } from '../errors/docforge-error.js';
import { parseInlineFormatting, stripInlineFormatting } from '../parser/inline-formatter.js';
import type {
  BlockquoteElement,
  CodeElement,
  DiagramElement,
  HeaderElement,
  ImageElement,
  LinkElement,
  ListElement,
  ParagraphElement,
  RichTextRun,
  TableElement,
  TextElement,
} from '../parser/types.js';
import { headingKey, headingSizes, resolveStyle } from '../templates/styles.js';
import type { ResolvedTextStyle, StyleKey, TemplateConfig } from '../templates/types.js';
import { BaseRenderer, listItemText, listLevel, normalizeRows } from './base-renderer.js';
import { fitWithin, readImageSize } from './image-size.js';
import { pdfCodeFont, pdfFontVariant } from './pdf-fonts.js';
import type { RenderRequest } from './types.js';

// ─── Constants ────────────────────────────────────────────────────────────────

const POINTS_PER_INCH = 72;
const CELL_PADDING = 4;
const CODE_PADDING = 6;
const LIST_INDENT = 18;
const RULE_COLOR = '#bdc3c7';
const BULLET = '•';
/** Largest share of the content height a single image may take */
const MAX_IMAGE_HEIGHT_RATIO = 0.6;

interface PdfContext {
  doc: PDFKit.PDFDocument;
  template: TemplateConfig;
  headingSizes: number[];
  styles: Map<StyleKey, ResolvedTextStyle>;
  /** Incremented on every new page */
  pageCount: number;
  output: Promise<Buffer>;
}

interface RunLayout {
  x: number;
  y?: number;
  width: number;
  align?: ResolvedTextStyle['alignment'];
  link?: string;
  /** Force bold on every run (table headers) */
  bold?: boolean;
}

export class PdfRenderer extends BaseRenderer<PdfContext> {
  readonly format = 'pdf';
  readonly extension = 'pdf';

  protected begin(request: RenderRequest): PdfContext {
    const { template } = request;
    const margins = template.page.margins;
    const doc = new PDFDocument({
      size: template.page.size,
      margins: {
        top: margins.top * POINTS_PER_INCH,
        bottom: margins.bottom * POINTS_PER_INCH,
        left: margins.left * POINTS_PER_INCH,
        right: margins.right * POINTS_PER_INCH,
      },
      bufferPages: true,
      info: {
        Title: template.metadata.subject ?? template.name,
        Author: template.metadata.author ?? 'docforge',
        Subject: template.metadata.subject ?? template.description,
        Keywords: (template.metadata.keywords ?? []).join(', '),
        Creator: 'docforge',
      },
    });

    const chunks: Buffer[] = [];
    const output = new Promise<Buffer>((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });

    const context: PdfContext = {
      doc,
      template,
      headingSizes: headingSizes(template, 'pdf'),
      styles: new Map(),
      pageCount: 1,
      output,
    };
    doc.on('pageAdded', () => {
      context.pageCount++;
    });

    return context;
  }

  protected async save(context: PdfContext, outputPath: string): Promise<void> {
    this.stampFooters(context);
    context.doc.end();
    const pdf = await context.output;
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, pdf);
  }

  // ─── Elements ──────────────────────────────────────────────────────────────

  protected renderHeader(context: PdfContext, element: HeaderElement): void {
    const base = this.style(context, headingKey(element.level));
    const style = { ...base, fontSize: context.headingSizes[element.level - 1] };
    const { doc } = context;

    if (doc.y > doc.page.margins.top) {
      doc.y += style.fontSize * 0.5;
    }
    this.ensureSpace(context, style.fontSize * 2.5);
    this.writeRuns(context, parseInlineFormatting(element.text), style, this.block(context, style));
    this.endBlock(context, style);
  }

  protected renderParagraph(context: PdfContext, element: ParagraphElement): void {
    const style = this.style(context, 'body');
    // Line breaks inside a paragraph are soft
    const text = element.text.replace(/\n/g, ' ');
    this.writeRuns(context, parseInlineFormatting(text), style, this.block(context, style));
    this.endBlock(context, style);
  }

  protected renderText(context: PdfContext, element: TextElement): void {
    const style = this.style(context, 'body');
    this.writeRuns(context, parseInlineFormatting(element.text), style, this.block(context, style));
    this.endBlock(context, style);
  }

  protected renderList(context: PdfContext, element: ListElement): void {
    const style = this.style(context, 'body');
    const { left, width } = this.contentBox(context);

    for (const item of element.items) {
      const indent = LIST_INDENT * (listLevel(item) + 1);
      const runs: RichTextRun[] = [
        { text: `${BULLET} ` },
        ...parseInlineFormatting(listItemText(item)),
      ];
      this.writeRuns(context, runs, style, { x: left + indent, width: width - indent });
      context.doc.y += style.fontSize * 0.25;
    }
    this.endBlock(context, style);
  }

  protected renderTable(context: PdfContext, element: TableElement): void {
    if (element.headers.length === 0) {
      this.logger.debug('Table without headers skipped');
      return;
    }

    const { doc } = context;
    const { left, width } = this.contentBox(context);
    const headerStyle = this.style(context, 'tableHeader');
    const cellStyle = this.style(context, 'tableCell');
    const columnWidth = width / element.headers.length;
    const rows = [element.headers.slice(), ...normalizeRows(element)];

    rows.forEach((cells, rowIndex) => {
      const isHeader = rowIndex === 0;
      const style = isHeader ? headerStyle : cellStyle;
      const textWidth = columnWidth - CELL_PADDING * 2;

      doc.font(style.font).fontSize(style.fontSize);
      const rowHeight =
        Math.max(
          ...cells.map((cell) => doc.heightOfString(stripInlineFormatting(cell) || ' ', { width: textWidth }))
        ) +
        CELL_PADDING * 2;

      this.ensureSpace(context, rowHeight);
      const y = doc.y;

      if (style.background) {
        doc.rect(left, y, width, rowHeight).fill(style.background);
      }
      cells.forEach((cell, columnIndex) => {
        const x = left + columnIndex * columnWidth;
        doc
          .lineWidth(0.5)
          .strokeColor(style.borderColor ?? RULE_COLOR)
          .rect(x, y, columnWidth, rowHeight)
          .stroke();
        this.writeRuns(context, parseInlineFormatting(cell), style, {
          x: x + CELL_PADDING,
          y: y + CELL_PADDING,
          width: textWidth,
          bold: isHeader,
        });
      });

      doc.x = left;
      doc.y = y + rowHeight;
    });

    this.endBlock(context, cellStyle);
  }

  protected renderCode(context: PdfContext, element: CodeElement): void {
    const { doc } = context;
    const style = this.style(context, 'code');
    const { left, width } = this.contentBox(context);
    const textWidth = width - CODE_PADDING * 2;
    const lineGap = this.lineGap(style);
    const text = element.text || ' ';

    doc.font(style.font).fontSize(style.fontSize);
    const height = doc.heightOfString(text, { width: textWidth, lineGap }) + CODE_PADDING * 2;
    this.ensureSpace(context, height);

    const y = doc.y;
    if (style.background) {
      doc.rect(left, y, width, height).fill(style.background);
    }
    doc
      .fillColor(style.color)
      .text(text, left + CODE_PADDING, y + CODE_PADDING, { width: textWidth, lineGap });

    doc.x = left;
    doc.y = Math.max(doc.y, y + height);
    this.endBlock(context, style);
  }

  protected renderDiagram(
    context: PdfContext,
    element: DiagramElement,
    assetPath: string | undefined
  ): void {
    if (!assetPath) {
      this.renderCode(context, this.diagramFallback(element));
      return;
    }
    this.placeImage(context, assetPath);
  }

  protected renderImage(context: PdfContext, element: ImageElement, file: string): void {
    this.placeImage(context, file);
    if (element.alt) {
      const caption = this.style(context, 'caption');
      this.writeRuns(context, [{ text: element.alt }], caption, this.block(context, caption));
      this.endBlock(context, caption);
    }
  }

  protected renderLink(context: PdfContext, element: LinkElement): void {
    const style = this.style(context, 'link');
    const runs = [{ text: `${element.text} (${element.url})` }];
    this.writeRuns(context, runs, style, { ...this.block(context, style), link: element.url });
    this.endBlock(context, style);
  }

  protected renderBlockquote(context: PdfContext, element: BlockquoteElement): void {
    const { doc } = context;
    const style = this.style(context, 'blockquote');
    const { left, width } = this.contentBox(context);
    const indent = Math.max(style.indent * POINTS_PER_INCH, LIST_INDENT);

    this.ensureSpace(context, style.fontSize * 2);
    const startPage = context.pageCount;
    const startY = doc.y;

    this.writeRuns(context, parseInlineFormatting(element.text.replace(/\n/g, ' ')), style, {
      x: left + indent,
      width: width - indent,
      align: style.alignment,
    });

    // Bar only when the quote stayed on one page
    if (context.pageCount === startPage) {
      const barX = left + indent / 2;
      doc
        .lineWidth(2)
        .strokeColor(style.borderColor ?? RULE_COLOR)
        .moveTo(barX, startY)
        .lineTo(barX, doc.y)
        .stroke();
    }
    doc.x = left;
    this.endBlock(context, style);
  }

  protected renderHorizontalRule(context: PdfContext): void {
    const { doc } = context;
    const { left, width } = this.contentBox(context);
    const y = doc.y + 4;

    doc.lineWidth(0.75).strokeColor(RULE_COLOR).moveTo(left, y).lineTo(left + width, y).stroke();
    doc.x = left;
    doc.y = y + 10;
  }

  // ─── Layout helpers ────────────────────────────────────────────────────────

  private style(context: PdfContext, key: StyleKey): ResolvedTextStyle {
    let style = context.styles.get(key);
    if (!style) {
      style = resolveStyle(context.template, 'pdf', key);
      context.styles.set(key, style);
    }
    return style;
  }

  private contentBox(context: PdfContext): { left: number; width: number; height: number } {
    const { page } = context.doc;
    return {
      left: page.margins.left,
      width: page.width - page.margins.left - page.margins.right,
      height: page.height - page.margins.top - page.margins.bottom,
    };
  }

  private block(context: PdfContext, style: ResolvedTextStyle): RunLayout {
    const { left, width } = this.contentBox(context);
    const indent = style.indent * POINTS_PER_INCH;
    return { x: left + indent, width: width - indent, align: style.alignment };
  }

  private lineGap(style: ResolvedTextStyle): number {
    return Math.max(0, (style.lineSpacing - 1) * style.fontSize);
  }

  /** Start a new page unless `height` fits below the cursor */
  private ensureSpace(context: PdfContext, height: number): void {
    const { doc } = context;
    const bottom = doc.page.height - doc.page.margins.bottom;
    if (doc.y + height > bottom && height <= this.contentBox(context).height) {
      doc.addPage();
    }
  }

  private endBlock(context: PdfContext, style: ResolvedTextStyle): void {
    context.doc.x = this.contentBox(context).left;
    context.doc.y += style.spacingAfter;
  }

  /**
   * Write rich-text runs as one flowing block using continued text.
   */
  private writeRuns(
    context: PdfContext,
    runs: RichTextRun[],
    style: ResolvedTextStyle,
    layout: RunLayout
  ): void {
    const { doc } = context;
    if (runs.length === 0) return;

    doc.fontSize(style.fontSize);
    runs.forEach((run, index) => {
      const variant = { bold: run.bold || layout.bold, italic: run.italic };
      doc
        .font(run.code ? pdfCodeFont(style.font, variant) : pdfFontVariant(style.font, variant))
        .fillColor(style.color);

      const options = {
        width: layout.width,
        align: layout.align,
        lineGap: this.lineGap(style),
        continued: index < runs.length - 1,
        strike: run.strike,
        link: layout.link,
        underline: layout.link !== undefined,
      };

      if (index === 0) {
        doc.text(run.text, layout.x, layout.y ?? doc.y, options);
      } else {
        doc.text(run.text, options);
      }
    });
  }

  private placeImage(context: PdfContext, file: string): void {
    const { doc } = context;
    const data = readFileSync(file);
    const size = readImageSize(data);
    if (!size) {
      throw new RenderError('Unsupported image format', { file });
    }

    const box = this.contentBox(context);
    const fitted = fitWithin(size, box.width, box.height * MAX_IMAGE_HEIGHT_RATIO);
    this.ensureSpace(context, fitted.height);

    const x = box.left + (box.width - fitted.width) / 2;
    const y = doc.y;
    doc.image(data, x, y, { width: fitted.width, height: fitted.height });
    doc.x = box.left;
    doc.y = y + fitted.height + 10;
  }

  private stampFooters(context: PdfContext): void {
    if (!this.footerText) return;

    const { doc } = context;
    const style = this.style(context, 'footer');
    const range = doc.bufferedPageRange();

    for (let i = range.start; i < range.start + range.count; i++) {
      doc.switchToPage(i);
      const { left, width } = this.contentBox(context);
      const bottomMargin = doc.page.margins.bottom;
      // Writing inside the bottom margin would otherwise trigger a page break
      doc.page.margins.bottom = 0;
      doc
        .font(style.font)
        .fontSize(style.fontSize)
        .fillColor(style.color)
        .text(this.footerText, left, doc.page.height - bottomMargin / 2 - style.fontSize / 2, {
          width,
          align: style.alignment,
          lineBreak: false,
        });
      doc.page.margins.bottom = bottomMargin;
    }
  }
}
