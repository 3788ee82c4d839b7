/**
 * Document model produced by the markdown parser.
 *
 * Elements are immutable and format-agnostic: both the PDF and the
 * Word renderer consume the same sequence.
 */

export type HeaderLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeaderElement {
  readonly type: 'header';
  readonly level: HeaderLevel;
  readonly text: string;
}

export interface ParagraphElement {
  readonly type: 'paragraph';
  readonly text: string;
}

export interface ListItem {
  /** Leading whitespace count, used for nesting */
  readonly indent: number;
  /** Original marker: -, *, + or "N." */
  readonly marker: string;
  readonly text: string;
}

export interface ListElement {
  readonly type: 'list';
  readonly items: readonly ListItem[];
}

export interface TableElement {
  readonly type: 'table';
  readonly headers: readonly string[];
  /** Rows may be ragged; renderers pad or truncate to the header width */
  readonly rows: readonly (readonly string[])[];
}

export interface CodeElement {
  readonly type: 'code';
  readonly language?: string;
  readonly text: string;
}

export interface DiagramElement {
  readonly type: 'diagram';
  readonly language: 'mermaid';
  readonly source: string;
}

export interface ImageElement {
  readonly type: 'image';
  readonly url: string;
  readonly alt: string;
}

export interface LinkElement {
  readonly type: 'link';
  readonly url: string;
  readonly text: string;
}

export interface BlockquoteElement {
  readonly type: 'blockquote';
  readonly text: string;
}

export interface HorizontalRuleElement {
  readonly type: 'horizontal_rule';
}

export interface TextElement {
  readonly type: 'text';
  readonly text: string;
}

export type MarkdownElement =
  | HeaderElement
  | ParagraphElement
  | ListElement
  | TableElement
  | CodeElement
  | DiagramElement
  | ImageElement
  | LinkElement
  | BlockquoteElement
  | HorizontalRuleElement
  | TextElement;

/** Image reference found anywhere in a document */
export interface ImageReference {
  alt: string;
  url: string;
  /** Character offset in the source text */
  position: number;
}

/** Diagram block found anywhere in a document */
export interface DiagramBlockReference {
  source: string;
  position: number;
}

/** Renderer-agnostic emphasis span */
export interface RichTextRun {
  text: string;
  bold?: boolean;
  italic?: boolean;
  code?: boolean;
  strike?: boolean;
}
