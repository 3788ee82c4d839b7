/**
 * Word Renderer
 *
 * Builds a flow document with the docx package: one section whose
 * children are paragraphs and tables, plus the default footer.
 */

import { readFileSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import {
  AlignmentType,
  BorderStyle,
  Document,
  ExternalHyperlink,
  Footer,
  HeadingLevel,
  ImageRun,
  Packer,
  Paragraph,
  ShadingType,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from 'docx';
import { RenderError } from '../errors/docforge-error.js';
import { parseInlineFormatting } from '../parser/inline-formatter.js';
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
import type { RenderRequest } from './types.js';

// ─── Units ────────────────────────────────────────────────────────────────────

const TWIPS_PER_INCH = 1440;
const TWIPS_PER_POINT = 20;
const PIXELS_PER_INCH = 96;
/** Line spacing unit: 240 = single */
const SINGLE_LINE = 240;

const PAGE_SIZES: Record<TemplateConfig['page']['size'], { width: number; height: number }> = {
  A4: { width: 11906, height: 16838 },
  LETTER: { width: 12240, height: 15840 },
};

const HEADING_LEVELS = [
  HeadingLevel.TITLE,
  HeadingLevel.HEADING_1,
  HeadingLevel.HEADING_2,
  HeadingLevel.HEADING_3,
  HeadingLevel.HEADING_4,
  HeadingLevel.HEADING_5,
] as const;

const ALIGNMENTS = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  right: AlignmentType.RIGHT,
  justify: AlignmentType.JUSTIFIED,
} as const;

const RULE_COLOR = 'bdc3c7';
const MAX_IMAGE_HEIGHT_RATIO = 0.6;

type Block = Paragraph | Table;

interface WordContext {
  template: TemplateConfig;
  children: Block[];
  headingSizes: number[];
  styles: Map<StyleKey, ResolvedTextStyle>;
  /** Content box in inches */
  contentWidth: number;
  contentHeight: number;
}

/** docx colors are hex without the leading # */
function hex(color: string): string {
  const value = color.replace(/^#/, '');
  return value.length === 3 ? value.replace(/(.)/g, '$1$1') : value;
}

function halfPoints(points: number): number {
  return Math.round(points * 2);
}

export class WordRenderer extends BaseRenderer<WordContext> {
  readonly format = 'word';
  readonly extension = 'docx';

  protected begin(request: RenderRequest): WordContext {
    const { template } = request;
    const page = PAGE_SIZES[template.page.size];
    const margins = template.page.margins;

    return {
      template,
      children: [],
      headingSizes: headingSizes(template, 'word'),
      styles: new Map(),
      contentWidth: page.width / TWIPS_PER_INCH - margins.left - margins.right,
      contentHeight: page.height / TWIPS_PER_INCH - margins.top - margins.bottom,
    };
  }

  protected async save(context: WordContext, outputPath: string): Promise<void> {
    const { template } = context;
    const body = this.style(context, 'body');
    const page = PAGE_SIZES[template.page.size];
    const margins = template.page.margins;

    const document = new Document({
      creator: template.metadata.author ?? 'docforge',
      title: template.metadata.subject ?? template.name,
      subject: template.metadata.subject ?? template.description,
      keywords: (template.metadata.keywords ?? []).join(', '),
      description: template.description,
      styles: {
        default: {
          document: {
            run: { font: body.font, size: halfPoints(body.fontSize), color: hex(body.color) },
          },
        },
      },
      sections: [
        {
          properties: {
            page: {
              size: { width: page.width, height: page.height },
              margin: {
                top: margins.top * TWIPS_PER_INCH,
                bottom: margins.bottom * TWIPS_PER_INCH,
                left: margins.left * TWIPS_PER_INCH,
                right: margins.right * TWIPS_PER_INCH,
              },
            },
          },
          footers: this.footerText ? { default: this.footer(context) } : undefined,
          children: context.children,
        },
      ],
    });

    const buffer = await Packer.toBuffer(document);
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, buffer);
  }

  // ─── Elements ──────────────────────────────────────────────────────────────

  protected renderHeader(context: WordContext, element: HeaderElement): void {
    const style = {
      ...this.style(context, headingKey(element.level)),
      fontSize: context.headingSizes[element.level - 1],
    };
    context.children.push(
      new Paragraph({
        heading: HEADING_LEVELS[element.level - 1],
        alignment: ALIGNMENTS[style.alignment],
        spacing: this.spacing(style),
        children: this.runs(parseInlineFormatting(element.text), style, { bold: true }),
      })
    );
  }

  protected renderParagraph(context: WordContext, element: ParagraphElement): void {
    const style = this.style(context, 'body');
    context.children.push(this.paragraph(parseInlineFormatting(element.text.replace(/\n/g, ' ')), style));
  }

  protected renderText(context: WordContext, element: TextElement): void {
    const style = this.style(context, 'body');
    context.children.push(this.paragraph(parseInlineFormatting(element.text), style));
  }

  protected renderList(context: WordContext, element: ListElement): void {
    const style = this.style(context, 'body');
    for (const item of element.items) {
      context.children.push(
        new Paragraph({
          bullet: { level: listLevel(item) },
          spacing: { after: 60, line: Math.round(style.lineSpacing * SINGLE_LINE) },
          children: this.runs(parseInlineFormatting(listItemText(item)), style),
        })
      );
    }
  }

  protected renderTable(context: WordContext, element: TableElement): void {
    if (element.headers.length === 0) {
      this.logger.debug('Table without headers skipped');
      return;
    }

    const headerStyle = this.style(context, 'tableHeader');
    const cellStyle = this.style(context, 'tableCell');
    const tableWidth = Math.round(context.contentWidth * TWIPS_PER_INCH);
    const columnWidth = Math.floor(tableWidth / element.headers.length);
    const border = {
      style: BorderStyle.SINGLE,
      size: 4,
      color: hex(cellStyle.borderColor ?? `#${RULE_COLOR}`),
    };

    const row = (cells: readonly string[], isHeader: boolean): TableRow => {
      const style = isHeader ? headerStyle : cellStyle;
      return new TableRow({
        tableHeader: isHeader,
        children: cells.map(
          (cell) =>
            new TableCell({
              width: { size: columnWidth, type: WidthType.DXA },
              shading: style.background
                ? { type: ShadingType.CLEAR, color: 'auto', fill: hex(style.background) }
                : undefined,
              borders: { top: border, bottom: border, left: border, right: border },
              children: [
                new Paragraph({
                  children: this.runs(parseInlineFormatting(cell), style, { bold: isHeader }),
                }),
              ],
            })
        ),
      });
    };

    context.children.push(
      new Table({
        width: { size: tableWidth, type: WidthType.DXA },
        columnWidths: element.headers.map(() => columnWidth),
        rows: [row(element.headers, true), ...normalizeRows(element).map((cells) => row(cells, false))],
      })
    );
    // Keeps the next block from sticking to the table
    context.children.push(new Paragraph({ spacing: { after: cellStyle.spacingAfter * TWIPS_PER_POINT } }));
  }

  protected renderCode(context: WordContext, element: CodeElement): void {
    const style = this.style(context, 'code');
    const lines = element.text.split('\n');
    const shading = style.background
      ? { type: ShadingType.CLEAR, color: 'auto', fill: hex(style.background) }
      : undefined;

    lines.forEach((line, index) => {
      context.children.push(
        new Paragraph({
          shading,
          spacing: {
            after: index === lines.length - 1 ? style.spacingAfter * TWIPS_PER_POINT : 0,
            line: Math.round(style.lineSpacing * SINGLE_LINE),
          },
          children: [
            new TextRun({
              text: line,
              font: style.font,
              size: halfPoints(style.fontSize),
              color: hex(style.color),
            }),
          ],
        })
      );
    });
  }

  protected renderDiagram(
    context: WordContext,
    element: DiagramElement,
    assetPath: string | undefined
  ): void {
    if (!assetPath) {
      this.renderCode(context, this.diagramFallback(element));
      return;
    }
    context.children.push(this.imageParagraph(context, assetPath));
  }

  protected renderImage(context: WordContext, element: ImageElement, file: string): void {
    context.children.push(this.imageParagraph(context, file));
    if (element.alt) {
      const caption = this.style(context, 'caption');
      context.children.push(this.paragraph([{ text: element.alt, italic: true }], caption));
    }
  }

  protected renderLink(context: WordContext, element: LinkElement): void {
    const style = this.style(context, 'link');
    context.children.push(
      new Paragraph({
        spacing: this.spacing(style),
        children: [
          new ExternalHyperlink({
            link: element.url,
            children: [
              new TextRun({
                text: `${element.text} (${element.url})`,
                style: 'Hyperlink',
                color: hex(style.color),
                underline: {},
                font: style.font,
                size: halfPoints(style.fontSize),
              }),
            ],
          }),
        ],
      })
    );
  }

  protected renderBlockquote(context: WordContext, element: BlockquoteElement): void {
    const style = this.style(context, 'blockquote');
    context.children.push(
      new Paragraph({
        indent: { left: Math.round(Math.max(style.indent, 0.25) * TWIPS_PER_INCH) },
        border: {
          left: {
            style: BorderStyle.SINGLE,
            size: 18,
            space: 8,
            color: hex(style.borderColor ?? `#${RULE_COLOR}`),
          },
        },
        spacing: this.spacing(style),
        children: this.runs(parseInlineFormatting(element.text.replace(/\n/g, ' ')), style, {
          italic: true,
        }),
      })
    );
  }

  protected renderHorizontalRule(context: WordContext): void {
    context.children.push(
      new Paragraph({
        border: { bottom: { style: BorderStyle.SINGLE, size: 6, space: 1, color: RULE_COLOR } },
        spacing: { after: 200 },
      })
    );
  }

  // ─── Builders ──────────────────────────────────────────────────────────────

  private style(context: WordContext, key: StyleKey): ResolvedTextStyle {
    let style = context.styles.get(key);
    if (!style) {
      style = resolveStyle(context.template, 'word', key);
      context.styles.set(key, style);
    }
    return style;
  }

  private spacing(style: ResolvedTextStyle): { after: number; line: number } {
    return {
      after: style.spacingAfter * TWIPS_PER_POINT,
      line: Math.round(style.lineSpacing * SINGLE_LINE),
    };
  }

  private paragraph(runs: RichTextRun[], style: ResolvedTextStyle): Paragraph {
    return new Paragraph({
      alignment: ALIGNMENTS[style.alignment],
      indent: style.indent > 0 ? { left: Math.round(style.indent * TWIPS_PER_INCH) } : undefined,
      spacing: this.spacing(style),
      children: this.runs(runs, style),
    });
  }

  private runs(
    runs: RichTextRun[],
    style: ResolvedTextStyle,
    force: { bold?: boolean; italic?: boolean } = {}
  ): TextRun[] {
    return runs.map(
      (run) =>
        new TextRun({
          text: run.text,
          bold: run.bold || force.bold,
          italics: run.italic || force.italic,
          strike: run.strike,
          font: run.code ? 'Consolas' : style.font,
          size: halfPoints(style.fontSize),
          color: hex(style.color),
          shading: run.code ? { type: ShadingType.CLEAR, color: 'auto', fill: 'f0f0f0' } : undefined,
        })
    );
  }

  private imageParagraph(context: WordContext, file: string): Paragraph {
    const data = readFileSync(file);
    const size = readImageSize(data);
    if (!size) {
      throw new RenderError('Unsupported image format', { file });
    }

    const fitted = fitWithin(
      size,
      context.contentWidth * PIXELS_PER_INCH,
      context.contentHeight * PIXELS_PER_INCH * MAX_IMAGE_HEIGHT_RATIO
    );
    return new Paragraph({
      alignment: AlignmentType.CENTER,
      spacing: { after: 200 },
      children: [
        new ImageRun({
          type: size.type,
          data,
          transformation: { width: fitted.width, height: fitted.height },
        }),
      ],
    });
  }

  private footer(context: WordContext): Footer {
    const style = this.style(context, 'footer');
    return new Footer({
      children: [
        new Paragraph({
          alignment: ALIGNMENTS[style.alignment],
          children: [
            new TextRun({
              text: this.footerText,
              size: halfPoints(style.fontSize),
              color: hex(style.color),
            }),
          ],
        }),
      ],
    });
  }
}
